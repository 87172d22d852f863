import { isAbsolute, join, resolve } from 'node:path'
import Ajv2020 from 'ajv/dist/2020'
import { constants } from '../../constants'
import { projectConfigSchema } from '../../schemas/config.schema'
import type { ProjectConfig, ProjectConfigFile } from '../../types/config'
import type { EnvironmentConfig, EnvironmentName, Workspace } from '../../types/deployment'
import { DeployError } from '../../utils/errors'
import { fsx } from '../../utils/fs'

export const DEFAULT_CONFIG: ProjectConfig = {
  provisioningDir: constants.PROVISIONING_DIR,
  configurationDir: constants.CONFIGURATION_DIR,
  environmentsDir: constants.ENVIRONMENTS_DIR,
  testsDir: constants.TESTS_DIR,
  ssh: {
    user: constants.SSH_USER,
    privateKeyPath: constants.SSH_KEY_PATH,
    pythonInterpreter: constants.PYTHON_INTERPRETER
  },
  readiness: {
    maxAttempts: constants.PROBE_MAX_ATTEMPTS,
    intervalMs: constants.PROBE_INTERVAL_MS
  },
  verification: {
    testFile: constants.TEST_FILE
  }
}

const ajv = new Ajv2020({ allErrors: true, strict: false })
const validateConfigFile = ajv.compile<ProjectConfigFile>(projectConfigSchema)

export function mergeConfig(file: ProjectConfigFile): ProjectConfig {
  return {
    provisioningDir: file.provisioningDir ?? DEFAULT_CONFIG.provisioningDir,
    configurationDir: file.configurationDir ?? DEFAULT_CONFIG.configurationDir,
    environmentsDir: file.environmentsDir ?? DEFAULT_CONFIG.environmentsDir,
    testsDir: file.testsDir ?? DEFAULT_CONFIG.testsDir,
    ssh: { ...DEFAULT_CONFIG.ssh, ...file.ssh },
    readiness: { ...DEFAULT_CONFIG.readiness, ...file.readiness },
    verification: { ...DEFAULT_CONFIG.verification, ...file.verification }
  }
}

/**
 * Load envdeploy.config.json from the project root (or an explicit path).
 * A missing default file yields the built-in layout; a missing explicit
 * file or a file that fails the schema is a configuration error.
 */
export async function loadProjectConfig(args: { readonly root: string; readonly file?: string }): Promise<ProjectConfig> {
  const file: string | undefined = args.file !== undefined && args.file.length > 0 ? args.file : undefined
  const explicit: boolean = file !== undefined
  const path: string = file !== undefined
    ? (isAbsolute(file) ? file : join(args.root, file))
    : join(args.root, constants.CONFIG_FILE)
  let data: unknown
  try {
    data = await fsx.readJson(path)
  } catch (err) {
    throw new DeployError('missing-config', { code: 'CONFIG_INVALID', message: `Config is not valid JSON: ${path} (${err instanceof Error ? err.message : String(err)})` })
  }
  if (data === null) {
    if (explicit) throw new DeployError('missing-config', { code: 'CONFIG_NOT_FOUND', message: `Config not found: ${path}` })
    return DEFAULT_CONFIG
  }
  if (!validateConfigFile(data)) {
    const errs: string[] = (validateConfigFile.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
    throw new DeployError('missing-config', {
      code: 'CONFIG_INVALID',
      message: `Config ${path} is invalid: ${errs.join('; ')}`,
      remedy: 'Fix the listed keys or remove the file to use the default layout'
    })
  }
  return mergeConfig(data)
}

export function resolveRoot(root?: string): string {
  const fromEnv: string | undefined = process.env.ENVDEPLOY_ROOT
  const chosen: string = root ?? (fromEnv !== undefined && fromEnv.length > 0 ? fromEnv : process.cwd())
  return resolve(chosen)
}

export function resolveEnvironmentsDir(root: string, config: ProjectConfig): string {
  return isAbsolute(config.environmentsDir) ? config.environmentsDir : join(root, config.environmentsDir)
}

export function resolveWorkspace(args: { readonly root: string; readonly config: ProjectConfig; readonly environment: EnvironmentName }): Workspace {
  const at = (p: string): string => (isAbsolute(p) ? p : join(args.root, p))
  const provisioningDir: string = at(args.config.provisioningDir)
  const configurationDir: string = at(args.config.configurationDir)
  return {
    root: args.root,
    provisioningDir,
    configurationDir,
    environmentDir: join(at(args.config.environmentsDir), args.environment),
    testsDir: at(args.config.testsDir),
    variablesTarget: join(provisioningDir, constants.VARIABLES_FILE),
    backendTarget: join(provisioningDir, constants.BACKEND_FILE),
    groupVarsTarget: join(configurationDir, 'group_vars', `${constants.HOST_GROUP}.yml`),
    planFile: join(provisioningDir, constants.PLAN_FILE),
    inventoryFile: join(configurationDir, constants.INVENTORY_FILE),
    lockFile: join(args.root, constants.STATE_DIR, constants.LOCK_FILE)
  }
}

export function resolveEnvironmentConfig(ws: Workspace): EnvironmentConfig {
  return {
    variablesFile: join(ws.environmentDir, constants.VARIABLES_FILE),
    backendFile: join(ws.environmentDir, constants.BACKEND_FILE),
    inventoryVarsFile: join(ws.environmentDir, constants.INVENTORY_VARS_FILE)
  }
}
