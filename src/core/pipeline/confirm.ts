import { confirm, isCancel } from '@clack/prompts'
import { logger } from '../../utils/logger'

/**
 * Approval source for the production gate. The pipeline never talks to the
 * terminal itself.
 */
export interface Confirmer {
  readonly confirm: (message: string) => Promise<boolean>
}

export const autoApprove: Confirmer = {
  confirm: async (message: string): Promise<boolean> => {
    logger.note(`${message} (auto-approved)`)
    return true
  }
}

/** Defaults to "no". Cancel (Ctrl+C) and a non-interactive stdin both decline. */
export const interactiveConfirmer: Confirmer = {
  confirm: async (message: string): Promise<boolean> => {
    if (!process.stdin.isTTY) {
      logger.warn('No interactive terminal for confirmation; pass --yes to approve')
      return false
    }
    const answer: boolean | symbol = await confirm({ message, initialValue: false })
    if (isCancel(answer)) return false
    return answer
  }
}

export function pickConfirmer(opts: { readonly yes?: boolean }): Confirmer {
  const fromEnv: boolean = process.env.ENVDEPLOY_AUTO_APPROVE === '1'
  return opts.yes === true || fromEnv ? autoApprove : interactiveConfirmer
}
