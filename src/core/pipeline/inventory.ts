import { constants } from '../../constants'
import type { SshSettings } from '../../types/config'
import type { EnvironmentName, InventoryRecord, Workspace } from '../../types/deployment'
import { DeployError } from '../../utils/errors'
import { fsx } from '../../utils/fs'
import type { TerraformCli } from '../tools/terraform'

export function buildInventoryRecord(args: {
  readonly publicIpAddress: string
  readonly vmName: string
  readonly environment: EnvironmentName
  readonly ssh: SshSettings
}): InventoryRecord {
  return {
    hostName: args.vmName,
    hostAddress: args.publicIpAddress,
    sshUser: args.ssh.user,
    sshKeyPath: args.ssh.privateKeyPath,
    pythonInterpreter: args.ssh.pythonInterpreter,
    environmentName: args.environment
  }
}

/**
 * Render the ansible inventory. Pure: equal records give byte-identical text.
 * Host key checking is disabled because the hosts are freshly created VMs.
 */
export function renderInventory(rec: InventoryRecord): string {
  return [
    'all:',
    '  children:',
    `    ${constants.HOST_GROUP}:`,
    '      hosts:',
    `        ${rec.hostName}:`,
    `          ansible_host: ${rec.hostAddress}`,
    `          ansible_user: ${rec.sshUser}`,
    `          ansible_ssh_private_key_file: ${rec.sshKeyPath}`,
    `          ansible_python_interpreter: ${rec.pythonInterpreter}`,
    '      vars:',
    "        ansible_ssh_common_args: '-o StrictHostKeyChecking=no'",
    `        environment_name: "${rec.environmentName}"`,
    ''
  ].join('\n')
}

/**
 * Query the VM address and name, then overwrite the inventory file.
 * Either output missing is fatal: there is no host to configure.
 */
export async function generateInventory(args: {
  readonly terraform: TerraformCli
  readonly environment: EnvironmentName
  readonly ssh: SshSettings
  readonly workspace: Workspace
}): Promise<InventoryRecord> {
  const publicIpAddress: string | undefined = await args.terraform.output('public_ip_address')
  const vmName: string | undefined = await args.terraform.output('vm_name')
  if (publicIpAddress === undefined || vmName === undefined) {
    const missing: string = [publicIpAddress === undefined ? 'public_ip_address' : '', vmName === undefined ? 'vm_name' : ''].filter(Boolean).join(', ')
    throw new DeployError('output-unavailable', {
      code: 'TERRAFORM_OUTPUTS_MISSING',
      message: `Could not get VM information from Terraform outputs (missing: ${missing})`,
      remedy: 'Check the apply completed and the configuration declares these outputs'
    })
  }
  const rec: InventoryRecord = buildInventoryRecord({ publicIpAddress, vmName, environment: args.environment, ssh: args.ssh })
  await fsx.writeText(args.workspace.inventoryFile, renderInventory(rec))
  return rec
}
