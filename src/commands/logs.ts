import { Command, InvalidArgumentError } from 'commander'
import { join } from 'node:path'
import { constants } from '../constants'
import { loadProjectConfig, resolveRoot, resolveWorkspace } from '../core/config/load'
import { fsx } from '../utils/fs'
import { logger } from '../utils/logger'
import { isJsonMode, reportCommandError } from './context'

interface LogsOptions {
  readonly root?: string
  readonly config?: string
  readonly lines: number
  readonly json?: boolean
}

/** Last `count` lines of a log, ignoring the newline that ends the file. */
export function tailLines(text: string, count: number): string[] {
  const lines: string[] = text.split(/\r?\n/)
  if (lines.at(-1) === '') lines.pop()
  return count > 0 ? lines.slice(-count) : []
}

function parseLineCount(value: string): number {
  const n: number = Number(value)
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.')
  return n
}

export function registerLogsCommand(program: Command): void {
  program
    .command('logs')
    .description('Show the end of the ansible deployment log')
    .option('--root <dir>', 'Project root')
    .option('--config <path>', 'Path to envdeploy.config.json')
    .option('-n, --lines <count>', 'Number of lines to show', parseLineCount, constants.LOG_TAIL_LINES)
    .option('--json', 'Output JSON')
    .action(async (opts: LogsOptions): Promise<void> => {
      const jsonMode: boolean = isJsonMode(opts.json)
      if (jsonMode) logger.setJsonOnly(true)
      try {
        const root: string = resolveRoot(opts.root)
        const config = await loadProjectConfig({ root, file: opts.config })
        // The log is shared by every environment
        const ws = resolveWorkspace({ root, config, environment: 'dev' })
        const file: string = join(ws.configurationDir, 'ansible.log')
        const text: string | null = await fsx.readText(file)
        if (text === null) {
          if (jsonMode) logger.json({ ok: true, action: 'logs', file, found: false, lines: [], final: true })
          logger.warn('No deployment logs found')
          return
        }
        const lines: string[] = tailLines(text, opts.lines)
        if (jsonMode) {
          logger.json({ ok: true, action: 'logs', file, found: true, lines, final: true })
          return
        }
        logger.section('Recent deployment logs')
        // eslint-disable-next-line no-console
        if (lines.length > 0) console.log(lines.join('\n'))
      } catch (err) {
        reportCommandError('logs', err, jsonMode)
      }
    })
}
