import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { RunLock, isProcessAlive } from '../core/pipeline/lock'
import { isDeployError } from '../utils/errors'
import { fsx } from '../utils/fs'
import { exitedPid } from '../../tests/helpers/project'

describe('RunLock', () => {
  let dir = ''
  beforeEach(async () => { dir = await mkdtemp(join(tmpdir(), 'envdeploy-lock-')) })
  afterEach(async () => { await rm(dir, { recursive: true, force: true }) })

  it('records the holder and removes the file on release', async () => {
    const file: string = join(dir, '.envdeploy', 'lock.json')
    const lock = new RunLock({ file })
    await lock.acquire({ environment: 'staging', action: 'apply' })
    const info = await lock.read()
    expect(info?.environment).toBe('staging')
    expect(info?.action).toBe('apply')
    expect(info?.pid).toBe(process.pid)
    await lock.release()
    expect(await fsx.exists(file)).toBe(false)
  })

  it('refuses a second holder', async () => {
    const file: string = join(dir, 'lock.json')
    const first = new RunLock({ file })
    await first.acquire({ environment: 'dev', action: 'plan' })
    const err: unknown = await new RunLock({ file }).acquire({ environment: 'dev', action: 'apply' }).catch((e: unknown) => e)
    expect(isDeployError(err) && err.code).toBe('RUN_LOCKED')
    expect(isDeployError(err) && err.remedy).toBe('Wait for it to finish, or remove a stale lock with: envdeploy clean --lock')
    await first.release()
  })

  it('does not remove a lock it never acquired', async () => {
    const file: string = join(dir, 'lock.json')
    const holder = new RunLock({ file })
    await holder.acquire({ environment: 'dev', action: 'plan' })
    await new RunLock({ file }).release()
    expect(await fsx.exists(file)).toBe(true)
    await holder.release()
  })

  it('replaces a lock whose holder is no longer running', async () => {
    const file: string = join(dir, 'lock.json')
    const dead: number = exitedPid()
    await writeFile(file, JSON.stringify({ environment: 'production', action: 'apply', pid: dead, startedAt: '2026-01-01T00:00:00.000Z' }), 'utf8')
    expect(isProcessAlive(dead)).toBe(false)
    const lock = new RunLock({ file })
    expect(await lock.liveHolder()).toBeUndefined()
    await lock.acquire({ environment: 'dev', action: 'plan' })
    const parsed: unknown = JSON.parse(await readFile(file, 'utf8'))
    expect(parsed).toMatchObject({ environment: 'dev', action: 'plan', pid: process.pid })
    await lock.release()
  })

  it('keeps a lock it cannot attribute to a process', async () => {
    const file: string = join(dir, 'lock.json')
    await writeFile(file, '{}', 'utf8')
    const err: unknown = await new RunLock({ file }).acquire({ environment: 'dev', action: 'plan' }).catch((e: unknown) => e)
    expect(isDeployError(err) && err.message).toBe('Another deployment is using the working directories: an unknown run')
  })

  it('listens for interrupts only while held', async () => {
    const file: string = join(dir, 'lock.json')
    const before: number = process.listenerCount('SIGINT')
    const lock = new RunLock({ file })
    await lock.acquire({ environment: 'dev', action: 'apply' })
    expect(process.listenerCount('SIGINT')).toBe(before + 1)
    expect(process.listenerCount('SIGTERM')).toBeGreaterThan(0)
    await lock.release()
    expect(process.listenerCount('SIGINT')).toBe(before)
  })
})
