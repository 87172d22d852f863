import { join, relative } from 'node:path'
import type { EnvironmentName, Workspace } from '../../types/deployment'
import { fsx } from '../../utils/fs'
import { logger } from '../../utils/logger'
import type { CommandRunner } from '../../utils/process'
import { lineForwarder } from '../tools/stream'

export type VerificationStatus = 'passed' | 'failed' | 'unavailable'

/**
 * Run the deployment test suite. Advisory only: every outcome is returned,
 * none is thrown, and the pipeline result does not depend on it.
 */
export async function runVerification(args: {
  readonly runner: CommandRunner
  readonly workspace: Workspace
  readonly environment: EnvironmentName
  readonly testFile: string
  readonly printCmd?: boolean
}): Promise<VerificationStatus> {
  if (!(await args.runner.has('pytest'))) {
    logger.warn('pytest not available, skipping tests')
    return 'unavailable'
  }
  const testPath: string = join(args.workspace.testsDir, args.testFile)
  if (!(await fsx.exists(testPath))) {
    logger.warn(`Test file not found: ${testPath}, skipping tests`)
    return 'unavailable'
  }
  const cmd: string = `python -m pytest ${relative(args.workspace.root, testPath)} -v --env=${args.environment}`
  if (args.printCmd === true) logger.info(`$ ${cmd}`)
  const out = lineForwarder()
  const res = await args.runner.runStream({ cmd, cwd: args.workspace.root, onStdout: out.push, onStderr: out.push })
  out.flush()
  if (!res.ok) {
    logger.warn(`Some tests failed (exit ${res.exitCode})`)
    return 'failed'
  }
  logger.success('Deployment tests passed')
  return 'passed'
}
