import { join } from 'node:path'
import { ACTIONS, ENVIRONMENTS } from '../../constants'
import type { DeployAction, DeploymentRequest, EnvironmentName } from '../../types/deployment'
import { fsx } from '../../utils/fs'

export type RequestField = 'environment' | 'action' | 'environment-dir'

export type RequestValidation =
  | { readonly ok: true; readonly request: DeploymentRequest }
  | { readonly ok: false; readonly field: RequestField; readonly message: string }

export function isEnvironmentName(val: string): val is EnvironmentName {
  return ENVIRONMENTS.some((e) => e === val)
}

export function isDeployAction(val: string): val is DeployAction {
  return ACTIONS.some((a) => a === val)
}

/**
 * Guard for the two positional arguments. Checks run in order (environment,
 * action, directory) and the first failure wins. Touches only the filesystem.
 */
export async function validateRequest(args: {
  readonly environment: string | undefined
  readonly action: string | undefined
  readonly environmentsDir: string
}): Promise<RequestValidation> {
  // Exact match only: surrounding whitespace is not a valid name
  const env: string = args.environment ?? ''
  const action: string = args.action ?? ''
  if (!isEnvironmentName(env)) {
    return { ok: false, field: 'environment', message: `Invalid environment: ${env || '<missing>'} (expected one of: ${ENVIRONMENTS.join(', ')})` }
  }
  if (!isDeployAction(action)) {
    return { ok: false, field: 'action', message: `Invalid action: ${action || '<missing>'} (expected one of: ${ACTIONS.join(', ')})` }
  }
  const dir: string = join(args.environmentsDir, env)
  if (!(await fsx.isDirectory(dir))) {
    return { ok: false, field: 'environment-dir', message: `Environment configuration not found: ${dir}` }
  }
  return { ok: true, request: { environment: env, action } }
}
