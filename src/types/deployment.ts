import type { ACTIONS, ENVIRONMENTS } from '../constants'

export type EnvironmentName = typeof ENVIRONMENTS[number]
export type DeployAction = typeof ACTIONS[number]

export interface DeploymentRequest {
  readonly environment: EnvironmentName
  readonly action: DeployAction
}

/** Source files under environments/<env>/. The originals stay authoritative. */
export interface EnvironmentConfig {
  readonly variablesFile: string
  readonly backendFile: string
  readonly inventoryVarsFile: string
}

/**
 * Every path a run touches, resolved once and passed to each stage.
 */
export interface Workspace {
  readonly root: string
  readonly provisioningDir: string
  readonly configurationDir: string
  readonly environmentDir: string
  readonly testsDir: string
  /** Copies of the environment files inside the tool working directories */
  readonly variablesTarget: string
  readonly backendTarget: string
  readonly groupVarsTarget: string
  readonly planFile: string
  readonly inventoryFile: string
  readonly lockFile: string
}

/** Values the provisioning tool reports after apply; any may be missing. */
export interface ProvisioningOutputs {
  readonly publicIpAddress?: string
  readonly vmName?: string
  readonly resourceGroupName?: string
  readonly sshCommand?: string
}

export interface InventoryRecord {
  readonly hostName: string
  readonly hostAddress: string
  readonly sshUser: string
  readonly sshKeyPath: string
  readonly pythonInterpreter: string
  readonly environmentName: EnvironmentName
}

export type StageName =
  | 'validate'
  | 'prerequisites'
  | 'materialize'
  | 'plan'
  | 'confirm'
  | 'apply'
  | 'inventory'
  | 'configure'
  | 'verify'
  | 'summary'

export type StageStatus = 'ok' | 'skipped' | 'warned' | 'failed'

export interface StageRecord {
  readonly stage: StageName
  readonly status: StageStatus
  readonly durationMs: number
  readonly detail?: string
}
