import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const prompts = vi.hoisted((): { answer: boolean | symbol; readonly cancel: symbol } => ({
  answer: false,
  cancel: Symbol('cancel')
}))

vi.mock('@clack/prompts', () => ({
  confirm: vi.fn(async () => prompts.answer),
  isCancel: (v: unknown): boolean => v === prompts.cancel
}))

import { confirm } from '@clack/prompts'
import { autoApprove, interactiveConfirmer, pickConfirmer } from '../core/pipeline/confirm'

describe('production confirmation', () => {
  const wasTty: boolean | undefined = process.stdin.isTTY
  beforeEach(() => { process.stdin.isTTY = true })
  afterEach(() => { process.stdin.isTTY = wasTty ?? false })

  it('defaults the prompt to no and returns the answer', async () => {
    prompts.answer = true
    expect(await interactiveConfirmer.confirm('Are you sure you want to continue?')).toBe(true)
    expect(confirm).toHaveBeenCalledWith({ message: 'Are you sure you want to continue?', initialValue: false })
  })

  it('treats a cancelled prompt as a decline', async () => {
    prompts.answer = prompts.cancel
    expect(await interactiveConfirmer.confirm('Continue?')).toBe(false)
  })

  it('declines without prompting when stdin is not a terminal', async () => {
    process.stdin.isTTY = false
    vi.mocked(confirm).mockClear()
    expect(await interactiveConfirmer.confirm('Continue?')).toBe(false)
    expect(confirm).not.toHaveBeenCalled()
  })

  it('auto-approves with --yes or ENVDEPLOY_AUTO_APPROVE=1', () => {
    expect(pickConfirmer({ yes: true })).toBe(autoApprove)
    expect(pickConfirmer({})).toBe(interactiveConfirmer)
    process.env.ENVDEPLOY_AUTO_APPROVE = '1'
    expect(pickConfirmer({})).toBe(autoApprove)
  })
})
