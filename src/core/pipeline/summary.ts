import { appendFile } from 'node:fs/promises'
import { constants } from '../../constants'
import type { EnvironmentName, ProvisioningOutputs } from '../../types/deployment'
import { colors } from '../../utils/colors'
import { logger } from '../../utils/logger'
import type { TerraformCli, TerraformOutputName } from '../tools/terraform'

export interface DeploymentSummary {
  readonly environment: EnvironmentName
  readonly vmName: string
  readonly publicIp: string
  readonly resourceGroup: string
  readonly sshCommand: string
  /** Present only when the public IP is known */
  readonly webUrl?: string
  /** Scalar tfvars shown as context, when available */
  readonly location?: string
  readonly vmSize?: string
}

async function query(terraform: TerraformCli, name: TerraformOutputName): Promise<string | undefined> {
  try {
    return await terraform.output(name)
  } catch (err) {
    logger.debug(`terraform output ${name} failed: ${err instanceof Error ? err.message : String(err)}`)
    return undefined
  }
}

/**
 * Re-read the outputs from the provisioning tool. Each field is queried on
 * its own and falls back to N/A; this never throws.
 */
export async function collectSummary(args: {
  readonly terraform: TerraformCli
  readonly environment: EnvironmentName
  readonly variables?: Readonly<Record<string, string>>
}): Promise<DeploymentSummary> {
  const outputs: ProvisioningOutputs = {
    vmName: await query(args.terraform, 'vm_name'),
    publicIpAddress: await query(args.terraform, 'public_ip_address'),
    resourceGroupName: await query(args.terraform, 'resource_group_name'),
    sshCommand: await query(args.terraform, 'ssh_connection_command')
  }
  return toSummary(args.environment, outputs, args.variables ?? {})
}

function toSummary(environment: EnvironmentName, o: ProvisioningOutputs, variables: Readonly<Record<string, string>>): DeploymentSummary {
  const na: string = constants.NOT_AVAILABLE
  return {
    environment,
    vmName: o.vmName ?? na,
    publicIp: o.publicIpAddress ?? na,
    resourceGroup: o.resourceGroupName ?? na,
    sshCommand: o.sshCommand ?? na,
    ...(o.publicIpAddress !== undefined ? { webUrl: `http://${o.publicIpAddress}` } : {}),
    ...(variables.location !== undefined ? { location: variables.location } : {}),
    ...(variables.vm_size !== undefined ? { vmSize: variables.vm_size } : {})
  }
}

export function renderSummaryLines(s: DeploymentSummary): string[] {
  const lines: string[] = []
  lines.push(`Environment: ${s.environment}`)
  if (s.location !== undefined) lines.push(`Location: ${s.location}`)
  if (s.vmSize !== undefined) lines.push(`VM Size: ${s.vmSize}`)
  lines.push(`VM Name: ${s.vmName}`)
  lines.push(`Public IP: ${s.publicIp}`)
  lines.push(`Resource Group: ${s.resourceGroup}`)
  lines.push(`SSH Command: ${s.sshCommand}`)
  if (s.webUrl !== undefined) lines.push(`Web URL: ${s.webUrl}`)
  return lines
}

export function printSummary(s: DeploymentSummary): void {
  if (logger.isJsonOnly()) return
  logger.section('Deployment Summary')
  // eslint-disable-next-line no-console
  console.log(renderSummaryLines(s).map((l) => `  ${l.replace(/^([^:]+:)/, (m: string) => colors.bold(m))}`).join('\n'))
  // GitHub Job Summary (Markdown)
  const gh: string | undefined = process.env.GITHUB_STEP_SUMMARY
  if (gh) {
    const md: string = ['## envdeploy: Deployment Summary', '', ...renderSummaryLines(s).map((l) => `- ${l}`), ''].join('\n')
    appendFile(gh, md + '\n', 'utf8').catch((err: unknown) => { logger.debug(`step summary not written: ${String(err)}`) })
  }
}
