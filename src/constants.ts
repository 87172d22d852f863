export const ENVIRONMENTS = ['dev', 'staging', 'production'] as const
export const ACTIONS = ['plan', 'apply', 'destroy'] as const

export const constants = {
  CONFIG_FILE: 'envdeploy.config.json',
  STATE_DIR: '.envdeploy',
  LOCK_FILE: 'lock.json',
  PROVISIONING_DIR: 'provisioning',
  CONFIGURATION_DIR: 'configuration-management',
  ENVIRONMENTS_DIR: 'environments',
  TESTS_DIR: 'tests',
  TEST_FILE: 'test_deployment.py',
  VARIABLES_FILE: 'terraform.tfvars',
  BACKEND_FILE: 'backend.tf',
  INVENTORY_VARS_FILE: 'ansible_vars.yml',
  PLAN_FILE: 'tfplan',
  INVENTORY_FILE: 'inventory/hosts.yml',
  HOST_GROUP: 'azure_vms',
  PLAYBOOK: 'site.yml',
  REQUIREMENTS_FILE: 'requirements.yml',
  SSH_USER: 'azureuser',
  SSH_KEY_PATH: '~/.ssh/id_rsa',
  PYTHON_INTERPRETER: '/usr/bin/python3',
  PROBE_MAX_ATTEMPTS: 10,
  PROBE_INTERVAL_MS: 30000,
  SMOKE_TIMEOUT_MS: 10000,
  LOG_TAIL_LINES: 50,
  NOT_AVAILABLE: 'N/A'
} as const
