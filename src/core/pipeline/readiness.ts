import { constants } from '../../constants'
import type { ReadinessSettings } from '../../types/config'
import { logger } from '../../utils/logger'

export type Sleep = (ms: number) => Promise<void>

export const realSleep: Sleep = async (ms: number): Promise<void> => {
  await new Promise<void>((resolve) => { setTimeout(resolve, ms) })
}

/** Bounded retry: at most `maxAttempts` probes (never more than 10) with `intervalMs` between them. */
export class RetryPolicy {
  public readonly maxAttempts: number
  public readonly intervalMs: number

  public constructor(settings: ReadinessSettings) {
    this.maxAttempts = Math.min(constants.PROBE_MAX_ATTEMPTS, Math.max(1, Math.floor(settings.maxAttempts)))
    this.intervalMs = Math.max(0, Math.floor(settings.intervalMs))
  }

  /** Longest total wait spent sleeping, excluding probe time. */
  public ceilingMs(): number {
    return (this.maxAttempts - 1) * this.intervalMs
  }
}

export type ReadinessState = 'ready' | 'unreachable'

export interface ReadinessResult {
  readonly state: ReadinessState
  readonly attempts: number
}

/**
 * Probe until the hosts answer or the policy is exhausted. Exhaustion is not
 * an error; the caller proceeds and lets the real run report the failure.
 */
export async function waitForHosts(args: {
  readonly probe: () => Promise<boolean>
  readonly policy: RetryPolicy
  readonly sleep: Sleep
}): Promise<ReadinessResult> {
  const { policy } = args
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (await args.probe()) {
      logger.success('VM is ready')
      return { state: 'ready', attempts: attempt }
    }
    logger.warn(`Waiting for VM... (attempt ${attempt}/${policy.maxAttempts})`)
    if (attempt < policy.maxAttempts) await args.sleep(policy.intervalMs)
  }
  return { state: 'unreachable', attempts: policy.maxAttempts }
}
