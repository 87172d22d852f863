import { Command } from 'commander'
import { ENVIRONMENTS } from '../constants'
import { loadProjectConfig, resolveEnvironmentConfig, resolveEnvironmentsDir, resolveRoot, resolveWorkspace } from '../core/config/load'
import { RunLock } from '../core/pipeline/lock'
import { materializeEnvironment } from '../core/pipeline/materialize'
import { AnsibleCli } from '../core/tools/ansible'
import { TerraformCli } from '../core/tools/terraform'
import { join } from 'node:path'
import type { EnvironmentName } from '../types/deployment'
import { DeployError, toDeployError } from '../utils/errors'
import { fsx } from '../utils/fs'
import { logger } from '../utils/logger'
import { proc, type CommandRunner } from '../utils/process'
import { isJsonMode, reportCommandError } from './context'

interface ValidateOptions {
  readonly root?: string
  readonly config?: string
  readonly printCmd?: boolean
  readonly json?: boolean
}

export interface EnvironmentValidation {
  readonly environment: EnvironmentName
  readonly ok: boolean
  readonly error?: string
}

/**
 * Register the `validate` command: terraform fmt/init/validate against each
 * environment's variables, then an ansible syntax check (advisory).
 */
export function registerValidateCommand(program: Command, deps: { readonly runner?: CommandRunner } = {}): void {
  program
    .command('validate')
    .description('Validate terraform configuration for every environment and the ansible playbook syntax')
    .option('--root <dir>', 'Project root')
    .option('--config <path>', 'Path to envdeploy.config.json')
    .option('--print-cmd', 'Print underlying terraform/ansible commands')
    .option('--json', 'Output JSON')
    .action(async (opts: ValidateOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      if (jsonMode) logger.setJsonOnly(true)
      try {
        const root: string = resolveRoot(opts.root)
        const config = await loadProjectConfig({ root, file: opts.config })
        const runner: CommandRunner = deps.runner ?? proc
        const envRoot: string = resolveEnvironmentsDir(root, config)
        const present: EnvironmentName[] = []
        for (const env of ENVIRONMENTS) if (await fsx.isDirectory(join(envRoot, env))) present.push(env)
        if (present.length === 0) {
          throw new DeployError('missing-config', { code: 'ENV_DIR_NOT_FOUND', message: `No environment directories found under ${envRoot}` })
        }
        const first = resolveWorkspace({ root, config, environment: present[0] ?? 'dev' })
        const lock = new RunLock({ file: first.lockFile })
        await lock.acquire({ environment: present.join(','), action: 'validate' })
        const results: EnvironmentValidation[] = []
        let syntaxOk = false
        try {
          for (const environment of present) {
            logger.section(`Validating ${environment} environment`)
            const workspace = resolveWorkspace({ root, config, environment })
            const terraform = new TerraformCli({ runner, cwd: workspace.provisioningDir, printCmd: opts.printCmd === true })
            try {
              await materializeEnvironment({ environment, source: resolveEnvironmentConfig(workspace), workspace, includeGroupVars: false })
              await terraform.fmtCheck()
              await terraform.init({ backend: false })
              await terraform.validate()
              results.push({ environment, ok: true })
              logger.success(`${environment}: terraform configuration valid`)
            } catch (err) {
              const error = toDeployError(err)
              results.push({ environment, ok: false, error: `${error.code}: ${error.message}` })
              logger.error(`${environment}: ${error.message}`)
            } finally {
              await fsx.remove(workspace.variablesTarget)
              await fsx.remove(workspace.backendTarget)
            }
          }
          const ansible = new AnsibleCli({ runner, cwd: first.configurationDir, printCmd: opts.printCmd === true })
          syntaxOk = await ansible.syntaxCheck()
          if (syntaxOk) logger.success('Ansible playbook syntax valid')
          else logger.warn('Ansible syntax check failed (create a sample inventory for the check)')
        } finally {
          await lock.release()
        }
        const ok: boolean = results.every((r) => r.ok)
        if (jsonMode) logger.json({ ok, action: 'validate', environments: results, ansibleSyntaxOk: syntaxOk, final: true })
        else if (ok) logger.success('All configurations valid')
        process.exitCode = ok ? 0 : 1
      } catch (err) {
        reportCommandError('validate', err, jsonMode)
      }
    })
}
