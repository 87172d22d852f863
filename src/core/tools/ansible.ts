import { constants } from '../../constants'
import { DeployError, mapToolError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import type { CommandRunner, StreamResult } from '../../utils/process'
import { startHeartbeat, type Stopper } from '../../utils/progress'
import { ansibleEnv } from '../secrets/env'
import { lineForwarder } from './stream'

export interface AnsibleCliOptions {
  readonly runner: CommandRunner
  /** configuration-management directory (site.yml, requirements.yml, inventory/) */
  readonly cwd: string
  readonly env?: Readonly<Record<string, string>>
  readonly printCmd?: boolean
}

export class AnsibleCli {
  private readonly runner: CommandRunner
  private readonly cwd: string
  private readonly env: Readonly<Record<string, string>>
  private readonly printCmd: boolean

  public constructor(opts: AnsibleCliOptions) {
    this.runner = opts.runner
    this.cwd = opts.cwd
    this.env = ansibleEnv(opts.env ?? {})
    this.printCmd = opts.printCmd === true
  }

  public async installCollections(): Promise<void> {
    await this.stream('galaxy', `ansible-galaxy collection install -r ${constants.REQUIREMENTS_FILE} --force`)
  }

  /** Single reachability probe; output is discarded. */
  public async ping(): Promise<boolean> {
    const cmd: string = `ansible all -m ping -i ${constants.INVENTORY_FILE}`
    if (this.printCmd) logger.info(`$ ${cmd}`)
    const res = await this.runner.run({ cmd, cwd: this.cwd, env: this.env })
    return res.ok
  }

  public async playbook(): Promise<void> {
    const stop: Stopper = startHeartbeat({ label: 'ansible-playbook', hint: 'Role execution output follows as it arrives.' })
    try {
      await this.stream('playbook', `ansible-playbook -i ${constants.INVENTORY_FILE} ${constants.PLAYBOOK} --ssh-extra-args='-o StrictHostKeyChecking=no' -v`)
    } finally {
      stop()
    }
  }

  public async syntaxCheck(): Promise<boolean> {
    const cmd: string = `ansible-playbook --syntax-check ${constants.PLAYBOOK} -i ${constants.INVENTORY_FILE}`
    if (this.printCmd) logger.info(`$ ${cmd}`)
    const res = await this.runner.run({ cmd, cwd: this.cwd, env: this.env })
    if (!res.ok) logger.debug(res.stderr.trim())
    return res.ok
  }

  private async stream(step: string, cmd: string): Promise<void> {
    if (this.printCmd) logger.info(`$ ${cmd}`)
    const out = lineForwarder()
    const err = lineForwarder((l: string): void => { logger.warn(l) })
    const res: StreamResult = await this.runner.runStream({ cmd, cwd: this.cwd, env: this.env, onStdout: out.push, onStderr: err.push })
    out.flush()
    err.flush()
    if (!res.ok) {
      const info = mapToolError('ansible', step, res.outputTail)
      throw new DeployError('tool-failure', { ...info, message: `${info.message} (exit ${res.exitCode})` })
    }
  }
}
