import { afterEach, describe, expect, it, vi } from 'vitest'
import { logger } from '../utils/logger'

describe('logger', () => {
  afterEach(() => {
    logger.setNoEmoji(false)
    logger.setLevel('info')
  })

  it('uses tag prefixes with --no-emoji', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setNoEmoji(true)
    logger.info('Running Terraform init and plan...')
    expect(spy).toHaveBeenLastCalledWith('[info] Running Terraform init and plan...')
  })

  it('sends errors to stderr and drops debug below the level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const err = vi.spyOn(console, 'error').mockImplementation(() => {})
    logger.setNoEmoji(true)
    logger.debug('hidden')
    logger.error('terraform not found')
    expect(log).not.toHaveBeenCalled()
    expect(err).toHaveBeenCalledWith('[error] terraform not found')
  })

  it('suppresses human lines in JSON mode but still prints JSON', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    logger.setJsonOnly(true)
    logger.info('hidden')
    logger.json({ ok: true })
    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith('{\n  "ok": true\n}')
  })
})
