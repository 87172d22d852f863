import { Command } from 'commander'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { loadProjectConfig, resolveEnvironmentsDir, resolveRoot } from '../core/config/load'
import { isEnvironmentName } from '../core/pipeline/request'
import { ENVIRONMENTS } from '../constants'
import type { ProjectConfig } from '../types/config'
import { colors } from '../utils/colors'
import { toDeployError } from '../utils/errors'
import { fsx } from '../utils/fs'
import { logger } from '../utils/logger'
import { proc, type CommandRunner } from '../utils/process'
import { isJsonMode } from './context'

interface CheckOptions {
  readonly root?: string
  readonly config?: string
  readonly json?: boolean
}

export interface CheckResult {
  readonly name: string
  readonly ok: boolean
  readonly message: string
}

export function expandHome(p: string): string {
  if (p === '~') return homedir()
  if (p.startsWith('~/')) return join(homedir(), p.slice(2))
  return p
}

export async function runChecks(args: {
  readonly runner: CommandRunner
  readonly root: string
  readonly config: ProjectConfig
  readonly environment?: string
}): Promise<CheckResult[]> {
  const results: CheckResult[] = []
  for (const tool of ['terraform', 'ansible'] as const) {
    const ok: boolean = await args.runner.has(tool)
    results.push({ name: tool, ok, message: ok ? 'found' : `${tool} is not installed` })
  }
  const keyPath: string = expandHome(args.config.ssh.privateKeyPath)
  const keyOk: boolean = await fsx.exists(keyPath)
  results.push({ name: 'ssh key', ok: keyOk, message: keyOk ? `found ${keyPath}` : `SSH key not found at ${keyPath}` })
  if (args.environment !== undefined) {
    const env: string = args.environment
    if (!isEnvironmentName(env)) {
      results.push({ name: `environment ${env}`, ok: false, message: `invalid (valid environments: ${ENVIRONMENTS.join(', ')})` })
    } else {
      const dir: string = join(resolveEnvironmentsDir(args.root, args.config), env)
      const present: boolean = await fsx.isDirectory(dir)
      results.push({ name: `environment ${env}`, ok: present, message: present ? 'valid' : `configuration not found: ${dir}` })
    }
  }
  return results
}

/**
 * Register the `check` command: tools on PATH, SSH key, environment directory.
 */
export function registerCheckCommand(program: Command, deps: { readonly runner?: CommandRunner } = {}): void {
  program
    .command('check')
    .description('Check prerequisites (terraform, ansible, SSH key) and optionally an environment')
    .argument('[environment]', 'Environment to validate: dev | staging | production')
    .option('--root <dir>', 'Project root')
    .option('--config <path>', 'Path to envdeploy.config.json')
    .option('--json', 'Output JSON')
    .action(async (environment: string | undefined, opts: CheckOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      if (jsonMode) logger.setJsonOnly(true)
      try {
        const root: string = resolveRoot(opts.root)
        const config: ProjectConfig = await loadProjectConfig({ root, file: opts.config })
        const results: CheckResult[] = await runChecks({ runner: deps.runner ?? proc, root, config, environment })
        const failed: number = results.filter((r) => !r.ok).length
        if (jsonMode) {
          logger.json({ ok: failed === 0, action: 'check', results, final: true })
        } else {
          for (const r of results) {
            if (r.ok) logger.success(`${r.name}: ${r.message}`)
            else logger.error(`${r.name}: ${r.message}`)
          }
          logger.info(`\n${colors.bold('Summary')}\n  • Checks: ${results.length}\n  • Passed: ${results.length - failed}\n  • Issues: ${failed}`)
        }
        process.exitCode = failed === 0 ? 0 : 1
      } catch (err) {
        const error = toDeployError(err)
        if (jsonMode) logger.json({ ok: false, action: 'check', code: error.code, message: error.message, final: true })
        logger.error(`${error.message} (${error.code})`)
        process.exitCode = 1
      }
    })
}
