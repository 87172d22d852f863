import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { Command } from 'commander'
import { registerDeployCommand } from '../commands/deploy'
import type { Confirmer } from '../core/pipeline/confirm'
import { FakeRunner, withOutputs } from '../../tests/helpers/fake-runner'
import { captureStdout, lastJson } from '../../tests/helpers/output'
import { makeProject, removeProject } from '../../tests/helpers/project'

const approve: Confirmer = { confirm: async (): Promise<boolean> => true }
const noSleep = async (): Promise<void> => {}

describe('deploy command', () => {
  let root = ''
  beforeEach(async () => { root = await makeProject() })
  afterEach(async () => { await removeProject(root) })

  it('prints a schema-checked JSON summary for a plan', async () => {
    const runner = withOutputs(new FakeRunner(), { vm_name: 'dev-vm', public_ip_address: '203.0.113.10', resource_group_name: 'rg-dev', ssh_connection_command: 'ssh azureuser@203.0.113.10' })
    const out = captureStdout()
    const program = new Command()
    registerDeployCommand(program, { runner, confirmer: approve, sleep: noSleep })
    await program.parseAsync(['node', 'envdeploy', 'deploy', 'dev', 'plan', '--root', root, '--json'])
    expect(lastJson(out)).toMatchObject({
      ok: true,
      action: 'deploy',
      environment: 'dev',
      operation: 'plan',
      outcome: 'completed',
      final: true,
      summary: { vmName: 'dev-vm', publicIp: '203.0.113.10', resourceGroup: 'rg-dev', webUrl: 'http://203.0.113.10' },
      schemaOk: true,
      schemaErrors: []
    })
    expect(process.exitCode).toBe(0)
  })

  it('exits 1 with a usage error for an unknown action', async () => {
    const runner = new FakeRunner()
    const out = captureStdout()
    const program = new Command()
    registerDeployCommand(program, { runner, confirmer: approve, sleep: noSleep })
    await program.parseAsync(['node', 'envdeploy', 'deploy', 'dev', 'rollback', '--root', root, '--json'])
    expect(lastJson(out)).toMatchObject({
      ok: false,
      outcome: 'failed',
      stage: 'validate',
      operation: 'rollback',
      error: {
        kind: 'usage',
        code: 'INVALID_ARGUMENT',
        message: 'Invalid action: rollback (expected one of: plan, apply, destroy)',
        remedy: 'Usage: envdeploy deploy <dev|staging|production> <plan|apply|destroy>'
      },
      schemaOk: true
    })
    expect(runner.calls).toEqual([])
    expect(process.exitCode).toBe(1)
  })

  it('passes --probe-attempts and --env-file through to the run', async () => {
    await writeFile(join(root, 'creds.env'), 'ARM_SUBSCRIPTION_ID=test-subscription\n', 'utf8')
    const runner = withOutputs(new FakeRunner(), { vm_name: 'dev-vm', public_ip_address: '203.0.113.10' }).on('ansible all -m ping', { ok: false })
    captureStdout()
    const program = new Command()
    registerDeployCommand(program, { runner, confirmer: approve, sleep: noSleep })
    await program.parseAsync(['node', 'envdeploy', 'deploy', 'dev', 'apply', '--root', root, '--probe-attempts', '1', '--env-file', 'creds.env', '--skip-tests'])
    expect(runner.count('ansible all -m ping')).toBe(1)
    expect(runner.calls.find((c) => c.cmd === 'terraform apply -input=false -auto-approve tfplan')?.env).toEqual({ ARM_SUBSCRIPTION_ID: 'test-subscription', TF_IN_AUTOMATION: '1' })
    expect(process.exitCode).toBe(0)
  })

  it('rejects --probe-attempts above 10 before running anything', async () => {
    const runner = new FakeRunner()
    const program = new Command()
    program.exitOverride().configureOutput({ writeErr: () => {} })
    registerDeployCommand(program, { runner, confirmer: approve, sleep: noSleep })
    await expect(program.parseAsync(['node', 'envdeploy', 'deploy', 'dev', 'apply', '--root', root, '--probe-attempts', '11']))
      .rejects.toMatchObject({ code: 'commander.invalidArgument' })
    expect(runner.calls).toEqual([])
  })

  it('fails before running anything when the env file is missing', async () => {
    const runner = new FakeRunner()
    const out = captureStdout()
    const program = new Command()
    registerDeployCommand(program, { runner, confirmer: approve, sleep: noSleep })
    await program.parseAsync(['node', 'envdeploy', 'deploy', 'dev', 'plan', '--root', root, '--env-file', 'absent.env', '--json'])
    expect(lastJson(out)).toMatchObject({ ok: false, outcome: 'failed', error: { kind: 'missing-config', code: 'ENV_FILE_NOT_FOUND' } })
    expect(runner.calls).toEqual([])
    expect(process.exitCode).toBe(1)
  })
})
