import type { ProjectConfig } from '../../types/config'
import type { DeploymentRequest, StageName, StageRecord, StageStatus, Workspace } from '../../types/deployment'
import { DeployError, toDeployError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import type { CommandRunner } from '../../utils/process'
import { resolveEnvironmentConfig, resolveEnvironmentsDir, resolveWorkspace } from '../config/load'
import { AnsibleCli } from '../tools/ansible'
import { TerraformCli } from '../tools/terraform'
import type { Confirmer } from './confirm'
import { configureHosts } from './configure'
import { generateInventory } from './inventory'
import { RunLock } from './lock'
import { materializeEnvironment, type MaterializeResult } from './materialize'
import { RetryPolicy, type Sleep } from './readiness'
import { validateRequest } from './request'
import { collectSummary, printSummary, type DeploymentSummary } from './summary'
import { runVerification } from './verify'

export interface PipelineDeps {
  readonly runner: CommandRunner
  readonly confirmer: Confirmer
  readonly sleep: Sleep
}

export interface PipelineOptions {
  readonly root: string
  readonly config: ProjectConfig
  /** Extra variables for terraform/ansible child processes (credentials) */
  readonly toolEnv?: Readonly<Record<string, string>>
  readonly skipTests?: boolean
  readonly printCmd?: boolean
}

export type PipelineOutcome =
  | { readonly kind: 'completed'; readonly request: DeploymentRequest; readonly stages: readonly StageRecord[]; readonly summary?: DeploymentSummary }
  | { readonly kind: 'cancelled'; readonly request: DeploymentRequest; readonly stages: readonly StageRecord[] }
  | { readonly kind: 'failed'; readonly request?: DeploymentRequest; readonly stage: StageName; readonly error: DeployError; readonly stages: readonly StageRecord[] }

export function exitCodeFor(outcome: PipelineOutcome): number {
  return outcome.kind === 'failed' ? 1 : 0
}

/** Raised inside a stage to stop the pipeline; carries the stage it came from. */
class StageFailure extends Error {
  public readonly stage: StageName
  public readonly error: DeployError

  public constructor(stage: StageName, error: DeployError) {
    super(error.message)
    this.stage = stage
    this.error = error
  }
}

/** Thrown when the production gate is declined. */
class Cancelled extends Error {}

class StageLog {
  public readonly records: StageRecord[] = []

  public async run<T>(stage: StageName, fn: () => Promise<T>, status: (result: T) => StageStatus = () => 'ok', detail?: (result: T) => string | undefined): Promise<T> {
    const t0: number = Date.now()
    try {
      const result: T = await fn()
      const d: string | undefined = detail?.(result)
      this.records.push({ stage, status: status(result), durationMs: Date.now() - t0, ...(d !== undefined ? { detail: d } : {}) })
      return result
    } catch (err) {
      const error: DeployError = toDeployError(err)
      this.records.push({ stage, status: 'failed', durationMs: Date.now() - t0, detail: error.code })
      throw new StageFailure(stage, error)
    }
  }

  public skip(stage: StageName, detail: string): void {
    this.records.push({ stage, status: 'skipped', durationMs: 0, detail })
  }
}

/**
 * Validate, materialize, plan, (confirm, apply, inventory, configure, verify),
 * report. Stops at the first fatal error; spawns nothing until the arguments
 * are valid.
 */
export async function runDeployment(args: {
  readonly environment: string | undefined
  readonly action: string | undefined
  readonly options: PipelineOptions
  readonly deps: PipelineDeps
}): Promise<PipelineOutcome> {
  const { options, deps } = args
  const log = new StageLog()
  const validation = await validateRequest({ environment: args.environment, action: args.action, environmentsDir: resolveEnvironmentsDir(options.root, options.config) })
  if (!validation.ok) {
    const kind = validation.field === 'environment-dir' ? 'missing-config' : 'usage'
    const error = new DeployError(kind, {
      code: validation.field === 'environment-dir' ? 'ENV_DIR_NOT_FOUND' : 'INVALID_ARGUMENT',
      message: validation.message,
      remedy: kind === 'usage' ? 'Usage: envdeploy deploy <dev|staging|production> <plan|apply|destroy>' : undefined
    })
    log.records.push({ stage: 'validate', status: 'failed', durationMs: 0, detail: error.code })
    return { kind: 'failed', stage: 'validate', error, stages: log.records }
  }
  const request: DeploymentRequest = validation.request
  log.records.push({ stage: 'validate', status: 'ok', durationMs: 0 })
  logger.section(`Deploying ${request.environment} environment - Action: ${request.action}`)

  const workspace: Workspace = resolveWorkspace({ root: options.root, config: options.config, environment: request.environment })
  const lock = new RunLock({ file: workspace.lockFile })
  try {
    const summary: DeploymentSummary | undefined = await runStages({ request, workspace, lock, log, options, deps })
    return { kind: 'completed', request, stages: log.records, ...(summary !== undefined ? { summary } : {}) }
  } catch (err) {
    if (err instanceof Cancelled) return { kind: 'cancelled', request, stages: log.records }
    if (err instanceof StageFailure) return { kind: 'failed', request, stage: err.stage, error: err.error, stages: log.records }
    throw err
  } finally {
    await lock.release()
  }
}

async function runStages(ctx: {
  readonly request: DeploymentRequest
  readonly workspace: Workspace
  readonly lock: RunLock
  readonly log: StageLog
  readonly options: PipelineOptions
  readonly deps: PipelineDeps
}): Promise<DeploymentSummary | undefined> {
  const { request, workspace, lock, log, options, deps } = ctx
  const { environment, action } = request
  const toolEnv: Readonly<Record<string, string>> = options.toolEnv ?? {}
  const terraform = new TerraformCli({ runner: deps.runner, cwd: workspace.provisioningDir, env: toolEnv, printCmd: options.printCmd })
  const ansible = new AnsibleCli({ runner: deps.runner, cwd: workspace.configurationDir, env: toolEnv, printCmd: options.printCmd })

  await log.run('prerequisites', async () => {
    for (const tool of ['terraform', 'ansible'] as const) {
      if (!(await deps.runner.has(tool))) {
        throw new DeployError('missing-prerequisite', { code: 'TOOL_NOT_FOUND', message: `${tool} not found`, remedy: `Install ${tool} and make sure it is on PATH` })
      }
    }
  })

  const materialized: MaterializeResult = await log.run('materialize', async () => {
    await lock.acquire(request)
    logger.info('Setting up environment configuration...')
    const res: MaterializeResult = await materializeEnvironment({ environment, source: resolveEnvironmentConfig(workspace), workspace })
    logger.info(`Environment ${environment} materialized (${res.copied.length} files)`)
    return res
  })

  await log.run('plan', async () => {
    logger.info('Running Terraform init and plan...')
    await terraform.init()
    await terraform.plan({ destroy: action === 'destroy' })
    logger.success('Terraform plan completed')
  })

  if (action === 'plan') {
    log.skip('apply', 'plan only')
  } else {
    if (environment === 'production' && action === 'apply') {
      const approved: boolean = await log.run(
        'confirm',
        async () => {
          logger.warn('You are about to deploy to PRODUCTION!')
          return await deps.confirmer.confirm('Are you sure you want to continue?')
        },
        () => 'ok',
        (yes: boolean) => (yes ? 'approved' : 'declined')
      )
      if (!approved) {
        logger.info('Deployment cancelled')
        throw new Cancelled()
      }
    }
    await log.run('apply', async () => {
      logger.info('Running Terraform apply...')
      await terraform.apply()
      logger.success('Terraform apply completed')
    })
  }

  if (action === 'apply') {
    await log.run('inventory', async () => {
      const rec = await generateInventory({ terraform, environment, ssh: options.config.ssh, workspace })
      logger.info(`VM IP: ${rec.hostAddress}, VM Name: ${rec.hostName}`)
      return rec
    }, () => 'ok', (rec) => rec.hostName)
    await log.run(
      'configure',
      async () => {
        const res = await configureHosts({ ansible, configurationDir: workspace.configurationDir, policy: new RetryPolicy(options.config.readiness), sleep: deps.sleep })
        logger.success('Ansible deployment completed')
        return res
      },
      (res) => (res.readiness.state === 'ready' ? 'ok' : 'warned'),
      (res) => `${res.readiness.state} after ${res.readiness.attempts} probe(s)`
    )
    if (options.skipTests === true) {
      log.skip('verify', 'skipped by flag')
    } else {
      await log.run(
        'verify',
        async () => {
          logger.info('Running deployment tests...')
          return await runVerification({ runner: deps.runner, workspace, environment, testFile: options.config.verification.testFile, printCmd: options.printCmd })
        },
        (status) => (status === 'passed' ? 'ok' : 'warned'),
        (status) => status
      )
    }
  } else {
    const why: string = `${action} action`
    logger.info(`Skipping Ansible setup and tests for ${why}`)
    log.skip('inventory', why)
    log.skip('configure', why)
    log.skip('verify', why)
  }

  if (action === 'destroy') {
    log.skip('summary', 'destroy action')
    logger.section(`Destroy operation completed for ${environment} environment`)
    return undefined
  }
  const summary: DeploymentSummary = await log.run('summary', async () => {
    const s: DeploymentSummary = await collectSummary({ terraform, environment, variables: materialized.variables })
    printSummary(s)
    return s
  })
  logger.success(action === 'plan' ? 'Plan completed successfully!' : 'Deployment completed successfully!')
  return summary
}
