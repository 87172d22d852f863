import { parse } from 'dotenv'
import { readFile } from 'node:fs/promises'
import { DeployError } from '../../utils/errors'

/**
 * Parse a credentials .env file (ARM_CLIENT_ID, ARM_SUBSCRIPTION_ID, ...)
 * without mutating process.env. Values are handed to child processes only.
 */
export async function parseEnvFile(args: { readonly path: string }): Promise<Readonly<Record<string, string>>> {
  let buf: string
  try {
    buf = await readFile(args.path, 'utf8')
  } catch {
    throw new DeployError('missing-config', { code: 'ENV_FILE_NOT_FOUND', message: `Env file not found: ${args.path}` })
  }
  const parsed: Record<string, string> = parse(buf)
  const trimmed: Record<string, string> = {}
  for (const [k, v] of Object.entries(parsed)) {
    const tv: string = v.trim()
    if (tv.length > 0) trimmed[k] = tv
  }
  return trimmed
}

/** Variables every terraform child process receives. */
export function terraformEnv(extra: Readonly<Record<string, string>>): Readonly<Record<string, string>> {
  return { ...extra, TF_IN_AUTOMATION: '1' }
}

/** Variables every ansible child process receives. */
export function ansibleEnv(extra: Readonly<Record<string, string>>): Readonly<Record<string, string>> {
  // No .retry files in the shared working directory
  return { ...extra, ANSIBLE_RETRY_FILES_ENABLED: 'False' }
}
