import { unlinkSync } from 'node:fs'
import { mkdir, readFile, unlink, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { DeployError } from '../../utils/errors'
import { logger } from '../../utils/logger'

export interface LockInfo {
  readonly environment: string
  readonly action: string
  readonly pid: number
  readonly startedAt: string
}

function isLockInfo(val: unknown): val is LockInfo {
  if (val === null || typeof val !== 'object') return false
  return 'environment' in val && typeof val.environment === 'string'
    && 'action' in val && typeof val.action === 'string'
    && 'pid' in val && typeof val.pid === 'number'
    && 'startedAt' in val && typeof val.startedAt === 'string'
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined
}

/** Signal 0 checks existence only. EPERM means alive under another user. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    return errorCode(err) !== 'ESRCH'
  }
}

export function lockedError(holder: LockInfo | undefined, remedy: string = 'Wait for it to finish, or remove a stale lock with: envdeploy clean --lock'): DeployError {
  const who: string = holder !== undefined
    ? `${holder.environment}/${holder.action} (pid ${holder.pid}, since ${holder.startedAt})`
    : 'an unknown run'
  return new DeployError('locked', { code: 'RUN_LOCKED', message: `Another deployment is using the working directories: ${who}`, remedy })
}

const SIGNAL_EXIT: Readonly<Record<'SIGINT' | 'SIGTERM', number>> = { SIGINT: 130, SIGTERM: 143 }

/**
 * Exclusive marker in .envdeploy/lock.json. The provisioning and configuration
 * directories are shared by every environment, so only one run may use them.
 */
export class RunLock {
  private readonly file: string
  private held = false

  public constructor(args: { readonly file: string }) {
    this.file = args.file
  }

  public async acquire(owner: { readonly environment: string; readonly action: string }): Promise<void> {
    await mkdir(dirname(this.file), { recursive: true })
    const info: LockInfo = { ...owner, pid: process.pid, startedAt: new Date().toISOString() }
    if (!(await this.tryCreate(info))) {
      const holder: LockInfo | undefined = await this.read()
      // A holder whose process is gone was killed before it could release
      if (holder !== undefined && !isProcessAlive(holder.pid)) {
        logger.warn(`Removing stale lock from ${holder.environment}/${holder.action} (pid ${holder.pid} is no longer running)`)
        await unlink(this.file).catch((err: unknown) => { if (errorCode(err) !== 'ENOENT') throw err })
        if (await this.tryCreate(info)) {
          this.onAcquired()
          return
        }
      }
      throw lockedError(await this.read())
    }
    this.onAcquired()
  }

  public async release(): Promise<void> {
    if (!this.held) return
    this.held = false
    this.detachSignals()
    try {
      await unlink(this.file)
    } catch (err) {
      logger.warn(`Could not remove lock ${this.file}: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  /** The recorded holder, when its process is still running. */
  public async liveHolder(): Promise<LockInfo | undefined> {
    const holder: LockInfo | undefined = await this.read()
    return holder !== undefined && isProcessAlive(holder.pid) ? holder : undefined
  }

  private async tryCreate(info: LockInfo): Promise<boolean> {
    try {
      await writeFile(this.file, `${JSON.stringify(info, null, 2)}\n`, { encoding: 'utf8', flag: 'wx' })
      return true
    } catch (err) {
      if (errorCode(err) !== 'EEXIST') throw err
      return false
    }
  }

  // Ctrl+C and SIGTERM skip pending finally blocks; drop the lock before exiting
  private onAcquired(): void {
    this.held = true
    process.once('SIGINT', this.onSignal)
    process.once('SIGTERM', this.onSignal)
  }

  private detachSignals(): void {
    process.off('SIGINT', this.onSignal)
    process.off('SIGTERM', this.onSignal)
  }

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.detachSignals()
    if (this.held) {
      this.held = false
      try {
        unlinkSync(this.file)
      } catch (err) {
        logger.warn(`Could not remove lock ${this.file}: ${err instanceof Error ? err.message : String(err)}`)
      }
    }
    process.exit(signal === 'SIGINT' ? SIGNAL_EXIT.SIGINT : SIGNAL_EXIT.SIGTERM)
  }

  public async read(): Promise<LockInfo | undefined> {
    try {
      const parsed: unknown = JSON.parse(await readFile(this.file, 'utf8'))
      return isLockInfo(parsed) ? parsed : undefined
    } catch {
      return undefined
    }
  }
}
