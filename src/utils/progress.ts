/**
 * Progress heartbeat for long tool runs (terraform apply, ansible-playbook).
 * Emits an elapsed-time line periodically so CI logs show the run is alive.
 *
 * Disabled in JSON/quiet mode and on an interactive TTY, where the tool's own
 * streamed output is already visible.
 */
import { colors } from './colors'

export interface HeartbeatOptions {
  /** Short label for the activity, e.g. "terraform apply" */
  readonly label: string
  readonly hint?: string
  /** Interval in milliseconds between heartbeats (default: 30000) */
  readonly intervalMs?: number
}

export type Stopper = () => void

export function startHeartbeat(opts: HeartbeatOptions): Stopper {
  const isJsonOnly: boolean = process.env.ENVDEPLOY_JSON === '1'
  const isQuiet: boolean = process.env.ENVDEPLOY_QUIET === '1'
  const isTty: boolean = Boolean(process.stdout && process.stdout.isTTY)
  if (isQuiet || isJsonOnly || isTty) return (): void => {}
  const intervalMs: number = opts.intervalMs ?? 30000
  const t0: number = Date.now()
  const tick = (): void => {
    const elapsed: number = Date.now() - t0
    const mins: number = Math.floor(elapsed / 60000)
    const secs: number = Math.floor((elapsed % 60000) / 1000)
    process.stdout.write(`${colors.dim('…')} ${opts.label} still running (${mins}m ${secs}s). ${opts.hint ?? ''}\n`)
  }
  const timer: NodeJS.Timeout = setInterval(tick, intervalMs)
  timer.unref()
  return (): void => { clearInterval(timer) }
}
