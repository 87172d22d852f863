import { Command } from 'commander'
import { join } from 'node:path'
import { constants } from '../constants'
import { loadProjectConfig, resolveRoot, resolveWorkspace } from '../core/config/load'
import { RunLock, lockedError } from '../core/pipeline/lock'
import { fsx } from '../utils/fs'
import { logger } from '../utils/logger'
import { isJsonMode, reportCommandError } from './context'

interface CleanOptions {
  readonly root?: string
  readonly config?: string
  readonly lock?: boolean
  readonly json?: boolean
}

/**
 * Files produced by runs: terraform caches, the copied environment files,
 * the plan artifact and ansible leftovers. Sources under environments/ are never touched.
 */
export function cleanTargets(args: { readonly provisioningDir: string; readonly configurationDir: string; readonly groupVarsTarget: string }): string[] {
  const p: string = args.provisioningDir
  return [
    join(p, '.terraform'),
    join(p, '.terraform.lock.hcl'),
    join(p, 'terraform.tfstate.backup'),
    join(p, constants.VARIABLES_FILE),
    join(p, constants.BACKEND_FILE),
    join(p, constants.PLAN_FILE),
    join(args.configurationDir, 'ansible.log'),
    args.groupVarsTarget
  ]
}

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove terraform caches, copied environment files and temporary artifacts')
    .option('--root <dir>', 'Project root')
    .option('--config <path>', 'Path to envdeploy.config.json')
    .option('--lock', 'Also remove the run lock, even one held by a running deployment')
    .option('--json', 'Output JSON')
    .action(async (opts: CleanOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      if (jsonMode) logger.setJsonOnly(true)
      try {
        const root: string = resolveRoot(opts.root)
        const config = await loadProjectConfig({ root, file: opts.config })
        // Environment only affects environmentDir, which clean never touches
        const ws = resolveWorkspace({ root, config, environment: 'dev' })
        const holder = await new RunLock({ file: ws.lockFile }).liveHolder()
        if (holder !== undefined && opts.lock !== true) {
          throw lockedError(holder, 'Wait for it to finish, or pass --lock to clean anyway')
        }
        const targets: string[] = cleanTargets(ws)
        if (opts.lock === true) targets.push(ws.lockFile)
        const removed: string[] = []
        for (const t of targets) if (await fsx.remove(t)) removed.push(t)
        if (jsonMode) logger.json({ ok: true, action: 'clean', removed, final: true })
        for (const r of removed) logger.info(`removed ${r}`)
        logger.success(removed.length > 0 ? 'Cleanup completed' : 'Nothing to clean')
      } catch (err) {
        reportCommandError('clean', err, jsonMode)
      }
    })
}
