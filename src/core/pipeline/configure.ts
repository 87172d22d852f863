import { join } from 'node:path'
import { constants } from '../../constants'
import { fsx } from '../../utils/fs'
import { logger } from '../../utils/logger'
import type { AnsibleCli } from '../tools/ansible'
import { waitForHosts, type ReadinessResult, type RetryPolicy, type Sleep } from './readiness'

export interface ConfigureResult {
  readonly readiness: ReadinessResult
  readonly collectionsInstalled: boolean
}

/**
 * Collections, then the readiness poll, then the playbook. An unreachable
 * host only warns; the playbook runs regardless and its failure is fatal.
 */
export async function configureHosts(args: {
  readonly ansible: AnsibleCli
  readonly configurationDir: string
  readonly policy: RetryPolicy
  readonly sleep: Sleep
}): Promise<ConfigureResult> {
  const hasRequirements: boolean = await fsx.exists(join(args.configurationDir, constants.REQUIREMENTS_FILE))
  if (hasRequirements) {
    logger.info('Installing required Ansible collections...')
    await args.ansible.installCollections()
  } else {
    logger.note(`No ${constants.REQUIREMENTS_FILE} found; skipping collection install`)
  }
  logger.info('Waiting for VM to be ready...')
  const readiness: ReadinessResult = await waitForHosts({ probe: () => args.ansible.ping(), policy: args.policy, sleep: args.sleep })
  if (readiness.state === 'unreachable') {
    logger.warn(`VM did not answer after ${readiness.attempts} attempts; running the playbook anyway`)
  }
  logger.info('Running Ansible playbook...')
  await args.ansible.playbook()
  return { readiness, collectionsInstalled: hasRequirements }
}
