import { constants } from '../../constants'
import { DeployError, mapToolError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import type { CommandRunner, StreamResult } from '../../utils/process'
import { startHeartbeat, type Stopper } from '../../utils/progress'
import { terraformEnv } from '../secrets/env'
import { lineForwarder } from './stream'

export type TerraformOutputName = 'public_ip_address' | 'vm_name' | 'resource_group_name' | 'ssh_connection_command'

export interface TerraformCliOptions {
  readonly runner: CommandRunner
  /** Directory holding the .tf files and the copied tfvars/backend */
  readonly cwd: string
  readonly env?: Readonly<Record<string, string>>
  readonly printCmd?: boolean
}

/**
 * Terraform invoked as a child process. Mutating steps stream their output
 * and throw a `tool-failure` DeployError on a non-zero exit; `output` never throws.
 */
export class TerraformCli {
  private readonly runner: CommandRunner
  private readonly cwd: string
  private readonly env: Readonly<Record<string, string>>
  private readonly printCmd: boolean

  public constructor(opts: TerraformCliOptions) {
    this.runner = opts.runner
    this.cwd = opts.cwd
    this.env = terraformEnv(opts.env ?? {})
    this.printCmd = opts.printCmd === true
  }

  public async init(opts: { readonly backend?: boolean } = {}): Promise<void> {
    const cmd: string = opts.backend === false ? 'terraform init -input=false -backend=false' : 'terraform init -input=false'
    await this.stream('init', cmd)
  }

  /** Writes the plan artifact that `apply` later consumes verbatim. */
  public async plan(opts: { readonly destroy: boolean }): Promise<void> {
    const mode: string = opts.destroy ? ' -destroy' : ''
    await this.stream('plan', `terraform plan -input=false${mode} -var-file=${constants.VARIABLES_FILE} -out=${constants.PLAN_FILE}`)
  }

  public async apply(): Promise<void> {
    const stop: Stopper = startHeartbeat({ label: 'terraform apply', hint: 'Provisioning can take several minutes.' })
    try {
      await this.stream('apply', `terraform apply -input=false -auto-approve ${constants.PLAN_FILE}`)
    } finally {
      stop()
    }
  }

  public async fmtCheck(): Promise<void> {
    await this.stream('fmt', 'terraform fmt -check')
  }

  public async validate(): Promise<void> {
    await this.stream('validate', 'terraform validate')
  }

  /** Empty or failed queries come back as undefined. */
  public async output(name: TerraformOutputName): Promise<string | undefined> {
    const cmd: string = `terraform output -raw ${name}`
    if (this.printCmd) logger.info(`$ ${cmd}`)
    const res = await this.runner.run({ cmd, cwd: this.cwd, env: this.env })
    if (!res.ok) {
      logger.debug(`terraform output ${name} unavailable: ${res.stderr.trim()}`)
      return undefined
    }
    const value: string = res.stdout.trim()
    return value.length > 0 ? value : undefined
  }

  private async stream(step: string, cmd: string): Promise<void> {
    if (this.printCmd) logger.info(`$ ${cmd}`)
    const out = lineForwarder()
    const err = lineForwarder((l: string): void => { logger.warn(l) })
    const res: StreamResult = await this.runner.runStream({ cmd, cwd: this.cwd, env: this.env, onStdout: out.push, onStderr: err.push })
    out.flush()
    err.flush()
    if (!res.ok) {
      const info = mapToolError('terraform', step, res.outputTail)
      throw new DeployError('tool-failure', { ...info, message: `${info.message} (exit ${res.exitCode})` })
    }
  }
}
