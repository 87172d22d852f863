export type ErrorKind =
  | 'usage'
  | 'missing-prerequisite'
  | 'missing-config'
  | 'locked'
  | 'tool-failure'
  | 'output-unavailable'
  | 'internal'

export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

/**
 * Fatal pipeline error. Every kind aborts the run with exit code 1.
 */
export class DeployError extends Error {
  public readonly kind: ErrorKind
  public readonly code: string
  public readonly remedy?: string

  public constructor(kind: ErrorKind, info: ErrorInfo) {
    super(info.message)
    this.name = 'DeployError'
    this.kind = kind
    this.code = info.code
    this.remedy = info.remedy
  }
}

export function isDeployError(err: unknown): err is DeployError {
  return err instanceof DeployError
}

/** Wrap anything that is not already a DeployError (fs failures, bugs). */
export function toDeployError(err: unknown): DeployError {
  if (err instanceof DeployError) return err
  const message: string = err instanceof Error ? err.message : String(err)
  return new DeployError('internal', { code: 'INTERNAL_ERROR', message })
}

export type ToolName = 'terraform' | 'ansible'

function normalize(s: string): string {
  return (s || '').toLowerCase()
}

/**
 * Classify the stderr of a failed tool run. Falls back to a generic
 * `<TOOL>_FAILED` code carrying the last non-empty stderr line.
 */
export function mapToolError(tool: ToolName, step: string, raw: string): ErrorInfo {
  const txt = normalize(raw)
  if (tool === 'terraform') {
    if (txt.includes('error acquiring the state lock') || txt.includes('state blob is already locked')) {
      return {
        code: 'TERRAFORM_STATE_LOCKED',
        message: `terraform ${step} failed: the remote state is locked by another operation.`,
        remedy: 'Wait for the other run to finish, or release it with: terraform force-unlock <LOCK_ID>'
      }
    }
    if (txt.includes('az login') || txt.includes('unable to build authorizer') || txt.includes('authenticating using the azure cli')) {
      return {
        code: 'AZURE_AUTH_REQUIRED',
        message: `terraform ${step} failed: Azure credentials are missing or expired.`,
        remedy: 'Run: az login (or pass ARM_* credentials with --env-file)'
      }
    }
    if (txt.includes('backend initialization required') || txt.includes('please run "terraform init"')) {
      return {
        code: 'TERRAFORM_INIT_REQUIRED',
        message: `terraform ${step} failed: the working directory is not initialized for this backend.`,
        remedy: 'Run: envdeploy clean, then deploy again'
      }
    }
    if (txt.includes('saved plan is stale')) {
      return {
        code: 'TERRAFORM_PLAN_STALE',
        message: 'terraform apply failed: the saved plan no longer matches the current state.',
        remedy: 'Re-run the deployment to produce a fresh plan'
      }
    }
  }
  if (tool === 'ansible') {
    if (txt.includes('unreachable!') || txt.includes('failed to connect to the host via ssh')) {
      return {
        code: 'ANSIBLE_HOST_UNREACHABLE',
        message: `ansible ${step} failed: the host could not be reached over SSH.`,
        remedy: 'Check the VM is running, the network security group allows SSH, and the private key path is correct'
      }
    }
    if (txt.includes("couldn't resolve module/action") || txt.includes('was not found in configured module paths')) {
      return {
        code: 'ANSIBLE_COLLECTION_MISSING',
        message: `ansible ${step} failed: a module or collection used by the playbook is not installed.`,
        remedy: 'Add it to configuration-management/requirements.yml'
      }
    }
    if (txt.includes('permission denied (publickey')) {
      return {
        code: 'ANSIBLE_SSH_AUTH_FAILED',
        message: `ansible ${step} failed: SSH public key authentication was rejected.`,
        remedy: 'Verify the key configured in ssh.privateKeyPath matches the VM admin key'
      }
    }
  }
  const lines: readonly string[] = raw.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0)
  const last: string | undefined = lines[lines.length - 1]
  return {
    code: `${tool.toUpperCase()}_FAILED`,
    message: last !== undefined ? `${tool} ${step} failed: ${last}` : `${tool} ${step} failed`
  }
}
