import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import type { EnvironmentConfig, EnvironmentName, Workspace } from '../../types/deployment'
import { DeployError } from '../../utils/errors'
import { fsx } from '../../utils/fs'
import { logger } from '../../utils/logger'

export interface MaterializeResult {
  /** Flat scalar assignments from terraform.tfvars (location, vm_size, ...) */
  readonly variables: Readonly<Record<string, string>>
  readonly copied: readonly string[]
}

/**
 * Read top-level scalar assignments from a tfvars file. Maps, lists and
 * heredocs are skipped; the file is only read for reporting.
 */
export function parseTfvars(content: string): Record<string, string> {
  const out: Record<string, string> = {}
  let depth = 0
  for (const raw of content.split(/\r?\n/)) {
    const line: string = raw.trim()
    if (line.length === 0 || line.startsWith('#') || line.startsWith('//')) continue
    if (depth > 0) {
      depth += (line.match(/[{[]/g)?.length ?? 0) - (line.match(/[}\]]/g)?.length ?? 0)
      continue
    }
    const m: RegExpMatchArray | null = line.match(/^([A-Za-z_][A-Za-z0-9_-]*)\s*=\s*(.+)$/)
    if (m === null) continue
    const key: string = m[1] ?? ''
    const value: string = (m[2] ?? '').replace(/\s+(#|\/\/).*$/, '').trim()
    if (value.startsWith('{') || value.startsWith('[')) {
      depth += (value.match(/[{[]/g)?.length ?? 0) - (value.match(/[}\]]/g)?.length ?? 0)
      continue
    }
    if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) out[key] = value.slice(1, -1)
    else if (/^-?\d+(\.\d+)?$/.test(value) || value === 'true' || value === 'false') out[key] = value
  }
  return out
}

async function assertGroupVars(path: string): Promise<void> {
  const text: string = await readFile(path, 'utf8')
  let doc: unknown
  try {
    doc = parseYaml(text)
  } catch (err) {
    throw new DeployError('missing-config', { code: 'ENV_VARS_INVALID', message: `${path} is not valid YAML: ${err instanceof Error ? err.message : String(err)}` })
  }
  if (doc === null || typeof doc !== 'object' || Array.isArray(doc)) {
    throw new DeployError('missing-config', { code: 'ENV_VARS_INVALID', message: `${path} must be a YAML mapping of variables` })
  }
}

/**
 * Copy the environment's files into the shared tool directories. Every
 * source is checked before the first copy, so a missing file leaves the
 * working directories untouched. Targets are overwritten.
 */
export async function materializeEnvironment(args: {
  readonly environment: EnvironmentName
  readonly source: EnvironmentConfig
  readonly workspace: Workspace
  readonly includeGroupVars?: boolean
}): Promise<MaterializeResult> {
  const withGroupVars: boolean = args.includeGroupVars !== false
  const pairs: ReadonlyArray<readonly [string, string]> = [
    [args.source.variablesFile, args.workspace.variablesTarget],
    [args.source.backendFile, args.workspace.backendTarget],
    ...(withGroupVars ? [[args.source.inventoryVarsFile, args.workspace.groupVarsTarget] as const] : [])
  ]
  for (const [from] of pairs) {
    if (!(await fsx.exists(from))) {
      throw new DeployError('missing-config', {
        code: 'ENV_FILE_NOT_FOUND',
        message: `Missing ${args.environment} configuration file: ${from}`,
        remedy: `Add it under environments/${args.environment}/`
      })
    }
  }
  if (withGroupVars) await assertGroupVars(args.source.inventoryVarsFile)
  const copied: string[] = []
  for (const [from, to] of pairs) {
    await fsx.copy(from, to)
    logger.debug(`copied ${from} -> ${to}`)
    copied.push(to)
  }
  const variables: Record<string, string> = parseTfvars(await readFile(args.source.variablesFile, 'utf8'))
  return { variables, copied }
}
