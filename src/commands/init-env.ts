import { Command } from 'commander'
import { resolveEnvironmentConfig } from '../core/config/load'
import { RunLock } from '../core/pipeline/lock'
import { materializeEnvironment } from '../core/pipeline/materialize'
import { logger } from '../utils/logger'
import { loadEnvironmentContext, isJsonMode, reportCommandError } from './context'

interface InitEnvOptions {
  readonly root?: string
  readonly config?: string
  readonly json?: boolean
}

export function registerInitEnvCommand(program: Command): void {
  program
    .command('init-env')
    .description('Copy an environment\'s tfvars, backend and ansible vars into the tool directories')
    .argument('<environment>', 'Environment: dev | staging | production')
    .option('--root <dir>', 'Project root')
    .option('--config <path>', 'Path to envdeploy.config.json')
    .option('--json', 'Output JSON')
    .action(async (environment: string, opts: InitEnvOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      if (jsonMode) logger.setJsonOnly(true)
      try {
        const ctx = await loadEnvironmentContext({ root: opts.root, config: opts.config, environment })
        const lock = new RunLock({ file: ctx.workspace.lockFile })
        await lock.acquire({ environment: ctx.environment, action: 'init-env' })
        try {
          const res = await materializeEnvironment({ environment: ctx.environment, source: resolveEnvironmentConfig(ctx.workspace), workspace: ctx.workspace })
          if (jsonMode) logger.json({ ok: true, action: 'init-env', environment: ctx.environment, copied: res.copied, final: true })
          for (const f of res.copied) logger.info(`wrote ${f}`)
          logger.success(`Environment ${ctx.environment} initialized`)
        } finally {
          await lock.release()
        }
      } catch (err) {
        reportCommandError('init-env', err, jsonMode)
      }
    })
}
