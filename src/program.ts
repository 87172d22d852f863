import { Command } from 'commander'
import { registerCheckCommand } from './commands/check'
import { registerCleanCommand } from './commands/clean'
import { registerDeployCommand } from './commands/deploy'
import { registerInitEnvCommand } from './commands/init-env'
import { registerLogsCommand } from './commands/logs'
import { registerStatusCommand } from './commands/status'
import { registerTestCommand } from './commands/test'
import { registerValidateCommand } from './commands/validate'
import { isColorMode, setColorMode } from './utils/colors'
import { logger } from './utils/logger'

export const VERSION: string = '0.1.0'

/**
 * Apply global output flags before Commander parses, so that early logs
 * (config loading, validation) already honour them.
 */
export function applyGlobalFlags(argv: readonly string[]): void {
  if (argv.includes('--verbose')) logger.setLevel('debug')
  if (argv.includes('--quiet')) {
    logger.setLevel('error')
    process.env.ENVDEPLOY_QUIET = '1'
  }
  if (argv.includes('--json') || process.env.ENVDEPLOY_JSON === '1') {
    logger.setJsonOnly(true)
    process.env.ENVDEPLOY_JSON = '1'
  }
  if (argv.includes('--no-emoji')) logger.setNoEmoji(true)
  if (argv.includes('--timestamps')) logger.setTimestamps(true)
  const colorIx: number = argv.findIndex((a) => a === '--color')
  const mode: string | undefined = colorIx !== -1 ? argv[colorIx + 1] : undefined
  setColorMode(mode !== undefined && isColorMode(mode) ? mode : 'auto')
}

export function buildProgram(): Command {
  const program: Command = new Command()
  program.name('envdeploy')
  program.description('Provision and configure Azure VM environments with terraform and ansible')
  program.version(VERSION)
  program.option('--verbose', 'Verbose output')
  program.option('--quiet', 'Error-only output')
  program.option('--json', 'JSON-only output (suppresses human logs)')
  program.option('--no-emoji', 'Use [tag] prefixes instead of emoji')
  program.option('--timestamps', 'Prefix human logs with ISO timestamps')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  registerDeployCommand(program)
  registerCheckCommand(program)
  registerInitEnvCommand(program)
  registerStatusCommand(program)
  registerValidateCommand(program)
  registerCleanCommand(program)
  registerTestCommand(program)
  registerLogsCommand(program)
  return program
}
