import { Command } from 'commander'
import { resolveEnvironmentConfig } from '../core/config/load'
import { RunLock } from '../core/pipeline/lock'
import { materializeEnvironment } from '../core/pipeline/materialize'
import { collectSummary, printSummary } from '../core/pipeline/summary'
import { TerraformCli } from '../core/tools/terraform'
import { logger } from '../utils/logger'
import { proc, type CommandRunner } from '../utils/process'
import { loadEnvironmentContext, loadToolEnv, isJsonMode, reportCommandError } from './context'

interface StatusOptions {
  readonly root?: string
  readonly config?: string
  readonly envFile?: string
  readonly printCmd?: boolean
  readonly json?: boolean
}

/**
 * Register the `status` command: point terraform at the environment's backend
 * and print its current outputs. Missing outputs show as N/A.
 */
export function registerStatusCommand(program: Command, deps: { readonly runner?: CommandRunner } = {}): void {
  program
    .command('status')
    .description('Show the current infrastructure outputs for an environment')
    .argument('<environment>', 'Environment: dev | staging | production')
    .option('--root <dir>', 'Project root')
    .option('--config <path>', 'Path to envdeploy.config.json')
    .option('--env-file <path>', 'Load provider credentials (ARM_*) for terraform from a .env file')
    .option('--print-cmd', 'Print underlying terraform commands')
    .option('--json', 'Output JSON')
    .action(async (environment: string, opts: StatusOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      if (jsonMode) logger.setJsonOnly(true)
      try {
        const ctx = await loadEnvironmentContext({ root: opts.root, config: opts.config, environment })
        const toolEnv: Readonly<Record<string, string>> = await loadToolEnv(ctx.root, opts.envFile)
        const lock = new RunLock({ file: ctx.workspace.lockFile })
        await lock.acquire({ environment: ctx.environment, action: 'status' })
        try {
          const { variables } = await materializeEnvironment({ environment: ctx.environment, source: resolveEnvironmentConfig(ctx.workspace), workspace: ctx.workspace, includeGroupVars: false })
          const terraform = new TerraformCli({ runner: deps.runner ?? proc, cwd: ctx.workspace.provisioningDir, env: toolEnv, printCmd: opts.printCmd === true })
          await terraform.init()
          const summary = await collectSummary({ terraform, environment: ctx.environment, variables })
          if (jsonMode) logger.json({ ok: true, action: 'status', summary, final: true })
          else printSummary(summary)
        } finally {
          await lock.release()
        }
      } catch (err) {
        reportCommandError('status', err, jsonMode)
      }
    })
}
