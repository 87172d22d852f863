import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ansibleEnv, parseEnvFile, terraformEnv } from '../core/secrets/env'
import { isDeployError } from '../utils/errors'

describe('credentials env file', () => {
  let dir = ''
  beforeEach(async () => { dir = await mkdtemp(join(tmpdir(), 'envdeploy-env-')) })
  afterEach(async () => { await rm(dir, { recursive: true, force: true }) })

  it('parses KEY=VALUE pairs, trims values and drops empty ones', async () => {
    const file: string = join(dir, '.env')
    await writeFile(file, ['# service principal', 'ARM_CLIENT_ID=test-client', 'ARM_CLIENT_SECRET="test-secret"', 'ARM_TENANT_ID=', ''].join('\n'), 'utf8')
    expect(await parseEnvFile({ path: file })).toEqual({ ARM_CLIENT_ID: 'test-client', ARM_CLIENT_SECRET: 'test-secret' })
    expect(process.env.ARM_CLIENT_SECRET).toBeUndefined()
  })

  it('fails with a configuration error when the file is missing', async () => {
    const err: unknown = await parseEnvFile({ path: join(dir, 'missing.env') }).catch((e: unknown) => e)
    expect(isDeployError(err) && err.kind).toBe('missing-config')
    expect(isDeployError(err) && err.code).toBe('ENV_FILE_NOT_FOUND')
  })

  it('adds the fixed automation variables for each tool', () => {
    expect(terraformEnv({ ARM_CLIENT_ID: 'test-client' })).toEqual({ ARM_CLIENT_ID: 'test-client', TF_IN_AUTOMATION: '1' })
    expect(ansibleEnv({})).toEqual({ ANSIBLE_RETRY_FILES_ENABLED: 'False' })
  })
})
