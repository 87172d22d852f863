import { afterEach, describe, expect, it } from 'vitest'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { collectSummary, printSummary, renderSummaryLines } from '../core/pipeline/summary'
import { TerraformCli } from '../core/tools/terraform'
import { FakeRunner, withOutputs } from '../../tests/helpers/fake-runner'

describe('collectSummary', () => {
  it('falls back to N/A per field and omits the web URL without an IP', async () => {
    const runner = withOutputs(new FakeRunner(), { vm_name: 'dev-vm' }).on('terraform output -raw public_ip_address', { ok: false, stderr: 'Output "public_ip_address" not found' })
    const terraform = new TerraformCli({ runner, cwd: '/work/provisioning' })
    const s = await collectSummary({ terraform, environment: 'dev' })
    expect(s).toEqual({ environment: 'dev', vmName: 'dev-vm', publicIp: 'N/A', resourceGroup: 'N/A', sshCommand: 'N/A' })
    expect(runner.commands()).toEqual([
      'terraform output -raw vm_name',
      'terraform output -raw public_ip_address',
      'terraform output -raw resource_group_name',
      'terraform output -raw ssh_connection_command'
    ])
  })

  it('adds location and VM size from the environment variables', async () => {
    const runner = withOutputs(new FakeRunner(), { public_ip_address: '203.0.113.10' })
    const terraform = new TerraformCli({ runner, cwd: '/work/provisioning' })
    const s = await collectSummary({ terraform, environment: 'staging', variables: { location: 'eastus', vm_size: 'Standard_B2s' } })
    expect(renderSummaryLines(s)).toEqual([
      'Environment: staging',
      'Location: eastus',
      'VM Size: Standard_B2s',
      'VM Name: N/A',
      'Public IP: 203.0.113.10',
      'Resource Group: N/A',
      'SSH Command: N/A',
      'Web URL: http://203.0.113.10'
    ])
  })
})

describe('printSummary', () => {
  let dir = ''
  afterEach(async () => { if (dir) await rm(dir, { recursive: true, force: true }) })

  it('appends a markdown block to the GitHub step summary', async () => {
    dir = await mkdtemp(join(tmpdir(), 'envdeploy-summary-'))
    const file: string = join(dir, 'summary.md')
    process.env.GITHUB_STEP_SUMMARY = file
    printSummary({ environment: 'dev', vmName: 'dev-vm', publicIp: 'N/A', resourceGroup: 'rg-dev', sshCommand: 'N/A' })
    await expect.poll(async () => await readFile(file, 'utf8').catch(() => '')).toBe([
      '## envdeploy: Deployment Summary',
      '',
      '- Environment: dev',
      '- VM Name: dev-vm',
      '- Public IP: N/A',
      '- Resource Group: rg-dev',
      '- SSH Command: N/A',
      '',
      ''
    ].join('\n'))
  })
})
