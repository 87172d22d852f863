import { isAbsolute, join } from 'node:path'
import { loadProjectConfig, resolveEnvironmentsDir, resolveRoot, resolveWorkspace } from '../core/config/load'
import { validateRequest } from '../core/pipeline/request'
import { parseEnvFile } from '../core/secrets/env'
import type { ProjectConfig } from '../types/config'
import type { EnvironmentName, Workspace } from '../types/deployment'
import { DeployError, toDeployError } from '../utils/errors'
import { logger } from '../utils/logger'

export interface EnvironmentContext {
  readonly root: string
  readonly config: ProjectConfig
  readonly environment: EnvironmentName
  readonly workspace: Workspace
}

/** Root, config and workspace for single-environment commands other than `deploy`. */
export async function loadEnvironmentContext(args: { readonly root?: string; readonly config?: string; readonly environment: string }): Promise<EnvironmentContext> {
  const root: string = resolveRoot(args.root)
  const config: ProjectConfig = await loadProjectConfig({ root, file: args.config })
  // The action literal is irrelevant here; only the environment is checked
  const v = await validateRequest({ environment: args.environment, action: 'plan', environmentsDir: resolveEnvironmentsDir(root, config) })
  if (!v.ok) {
    throw new DeployError(v.field === 'environment-dir' ? 'missing-config' : 'usage', { code: v.field === 'environment-dir' ? 'ENV_DIR_NOT_FOUND' : 'INVALID_ARGUMENT', message: v.message })
  }
  const environment: EnvironmentName = v.request.environment
  return { root, config, environment, workspace: resolveWorkspace({ root, config, environment }) }
}

/** Credentials for tool child processes from --env-file (relative to the root); empty without one. */
export async function loadToolEnv(root: string, envFile: string | undefined): Promise<Readonly<Record<string, string>>> {
  if (envFile === undefined) return {}
  return await parseEnvFile({ path: isAbsolute(envFile) ? envFile : join(root, envFile) })
}

/** --json on the subcommand, or the global flag recorded by applyGlobalFlags. */
export function isJsonMode(flag: boolean | undefined): boolean {
  return flag === true || process.env.ENVDEPLOY_JSON === '1'
}

export function reportCommandError(command: string, err: unknown, json: boolean): void {
  const error: DeployError = toDeployError(err)
  if (json) logger.json({ ok: false, action: command, code: error.code, message: error.message, ...(error.remedy !== undefined ? { remedy: error.remedy } : {}), final: true })
  logger.error(`${error.message} (${error.code})`)
  if (error.remedy) logger.info(`Try: ${error.remedy}`)
  process.exitCode = 1
}
