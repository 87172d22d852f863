import { Command } from 'commander'
import { RunLock } from '../core/pipeline/lock'
import { materializeEnvironment } from '../core/pipeline/materialize'
import { checkWebServer, type FetchLike, type SmokeResult } from '../core/pipeline/smoke'
import { resolveEnvironmentConfig } from '../core/config/load'
import { TerraformCli } from '../core/tools/terraform'
import { DeployError } from '../utils/errors'
import { logger } from '../utils/logger'
import { proc, type CommandRunner } from '../utils/process'
import { isJsonMode, loadEnvironmentContext, loadToolEnv, reportCommandError } from './context'

interface TestOptions {
  readonly root?: string
  readonly config?: string
  readonly envFile?: string
  readonly printCmd?: boolean
  readonly json?: boolean
}

/**
 * Register the `test` command: fetch the deployed web server's front page once.
 * A missing public IP fails; a failed connection is only a warning.
 */
export function registerTestCommand(program: Command, deps: { readonly runner?: CommandRunner; readonly fetch?: FetchLike } = {}): void {
  program
    .command('test')
    .description('Send one HTTP request to the deployed web server of an environment')
    .argument('<environment>', 'Environment: dev | staging | production')
    .option('--root <dir>', 'Project root')
    .option('--config <path>', 'Path to envdeploy.config.json')
    .option('--env-file <path>', 'Load provider credentials (ARM_*) for terraform from a .env file')
    .option('--print-cmd', 'Print underlying terraform commands')
    .option('--json', 'Output JSON')
    .action(async (environment: string, opts: TestOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      if (jsonMode) logger.setJsonOnly(true)
      try {
        const ctx = await loadEnvironmentContext({ root: opts.root, config: opts.config, environment })
        const toolEnv: Readonly<Record<string, string>> = await loadToolEnv(ctx.root, opts.envFile)
        const lock = new RunLock({ file: ctx.workspace.lockFile })
        await lock.acquire({ environment: ctx.environment, action: 'test' })
        let ip: string | undefined
        try {
          await materializeEnvironment({ environment: ctx.environment, source: resolveEnvironmentConfig(ctx.workspace), workspace: ctx.workspace, includeGroupVars: false })
          const terraform = new TerraformCli({ runner: deps.runner ?? proc, cwd: ctx.workspace.provisioningDir, env: toolEnv, printCmd: opts.printCmd === true })
          await terraform.init()
          ip = await terraform.output('public_ip_address')
        } finally {
          await lock.release()
        }
        if (ip === undefined) {
          throw new DeployError('output-unavailable', {
            code: 'TERRAFORM_OUTPUTS_MISSING',
            message: 'VM IP not available',
            remedy: `Deploy it first: envdeploy deploy ${ctx.environment} apply`
          })
        }
        logger.info(`Testing HTTP connection to ${ip}...`)
        const res: SmokeResult = await checkWebServer({ host: ip, fetch: deps.fetch })
        if (jsonMode) logger.json({ ok: true, action: 'test', environment: ctx.environment, web: res, final: true })
        if (!res.reachable) logger.warn(`Connection failed: ${res.error}`)
        else if (res.ok) logger.success(`${res.url} answered HTTP ${res.status}`)
        else logger.warn(`${res.url} answered HTTP ${res.status}`)
      } catch (err) {
        reportCommandError('test', err, jsonMode)
      }
    })
}
