import { Command, InvalidArgumentError } from 'commander'
import Ajv2020 from 'ajv/dist/2020'
import { constants } from '../constants'
import { loadProjectConfig, resolveRoot } from '../core/config/load'
import { pickConfirmer } from '../core/pipeline/confirm'
import { exitCodeFor, runDeployment, type PipelineDeps, type PipelineOutcome } from '../core/pipeline/orchestrator'
import { realSleep } from '../core/pipeline/readiness'
import { deploySummarySchema } from '../schemas/deploy-summary.schema'
import type { ProjectConfig } from '../types/config'
import { toDeployError, type DeployError } from '../utils/errors'
import { logger } from '../utils/logger'
import { proc } from '../utils/process'
import { isJsonMode, loadToolEnv } from './context'

interface DeployOptions {
  readonly yes?: boolean
  readonly root?: string
  readonly config?: string
  readonly envFile?: string
  readonly skipTests?: boolean
  readonly probeAttempts?: number
  readonly probeIntervalMs?: number
  readonly printCmd?: boolean
  readonly json?: boolean
}

function parseIntOption(min: number, max: number = Number.MAX_SAFE_INTEGER): (v: string) => number {
  return (v: string): number => {
    const n: number = Number(v)
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new InvalidArgumentError(max === Number.MAX_SAFE_INTEGER ? `Expected an integer >= ${min}.` : `Expected an integer from ${min} to ${max}.`)
    }
    return n
  }
}

function withReadinessOverrides(config: ProjectConfig, opts: DeployOptions): ProjectConfig {
  if (opts.probeAttempts === undefined && opts.probeIntervalMs === undefined) return config
  return {
    ...config,
    readiness: {
      maxAttempts: opts.probeAttempts ?? config.readiness.maxAttempts,
      intervalMs: opts.probeIntervalMs ?? config.readiness.intervalMs
    }
  }
}

function errorJson(error: DeployError): Record<string, string> {
  return { kind: error.kind, code: error.code, message: error.message, ...(error.remedy !== undefined ? { remedy: error.remedy } : {}) }
}

/** Final JSON object for --json, before schema annotation. */
export function outcomeToJson(outcome: PipelineOutcome, fallback: { readonly environment: string; readonly operation: string }): Record<string, unknown> {
  const base = {
    ok: outcome.kind !== 'failed',
    action: 'deploy' as const,
    environment: outcome.request?.environment ?? fallback.environment,
    operation: outcome.request?.action ?? fallback.operation,
    outcome: outcome.kind,
    stages: outcome.stages,
    final: true as const
  }
  if (outcome.kind === 'failed') return { ...base, stage: outcome.stage, error: errorJson(outcome.error) }
  if (outcome.kind === 'completed' && outcome.summary !== undefined) return { ...base, summary: outcome.summary }
  return base
}

function reportFailure(error: DeployError): void {
  logger.error(`${error.message} (${error.code})`)
  if (error.remedy) logger.info(`Try: ${error.remedy}`)
}

/**
 * Register the `deploy` command: the full environment pipeline.
 * `deps` replaces the process runner, confirmation and sleep (tests).
 */
export function registerDeployCommand(program: Command, deps: Partial<PipelineDeps> = {}): void {
  const ajv = new Ajv2020({ allErrors: true, strict: false })
  const validate = ajv.compile(deploySummarySchema)
  const annotate = (obj: Record<string, unknown>): Record<string, unknown> => {
    const ok: boolean = validate(obj)
    const errs: string[] = Array.isArray(validate.errors) ? validate.errors.map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim()) : []
    return { ...obj, schemaOk: ok, schemaErrors: errs }
  }
  program
    .command('deploy')
    .description('Plan, apply or destroy an environment and configure its VM')
    .argument('<environment>', 'Environment: dev | staging | production')
    .argument('<action>', 'Action: plan | apply | destroy')
    .option('-y, --yes', 'Approve the production confirmation without prompting (CI)')
    .option('--root <dir>', 'Project root containing provisioning/, configuration-management/ and environments/')
    .option('--config <path>', 'Path to envdeploy.config.json')
    .option('--env-file <path>', 'Load provider credentials (ARM_*) for terraform and ansible from a .env file')
    .option('--skip-tests', 'Skip the deployment test suite')
    .option('--probe-attempts <n>', 'Readiness probes (1-10) before running the playbook anyway', parseIntOption(1, constants.PROBE_MAX_ATTEMPTS))
    .option('--probe-interval-ms <ms>', 'Delay between readiness probes', parseIntOption(0))
    .option('--print-cmd', 'Print underlying terraform/ansible commands')
    .option('--json', 'Output a final JSON summary')
    .action(async (environment: string, action: string, opts: DeployOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      if (jsonMode) {
        logger.setJsonOnly(true)
        process.env.ENVDEPLOY_JSON = '1'
      }
      const root: string = resolveRoot(opts.root)
      let outcome: PipelineOutcome
      try {
        const config: ProjectConfig = withReadinessOverrides(await loadProjectConfig({ root, file: opts.config }), opts)
        const toolEnv: Readonly<Record<string, string>> = await loadToolEnv(root, opts.envFile)
        outcome = await runDeployment({
          environment,
          action,
          options: { root, config, toolEnv, skipTests: opts.skipTests === true, printCmd: opts.printCmd === true },
          deps: {
            runner: deps.runner ?? proc,
            confirmer: deps.confirmer ?? pickConfirmer({ yes: opts.yes }),
            sleep: deps.sleep ?? realSleep
          }
        })
      } catch (err) {
        const error: DeployError = toDeployError(err)
        outcome = { kind: 'failed', stage: 'validate', error, stages: [] }
      }
      if (outcome.kind === 'failed') reportFailure(outcome.error)
      if (jsonMode) logger.json(annotate(outcomeToJson(outcome, { environment, operation: action })))
      process.exitCode = exitCodeFor(outcome)
    })
}
