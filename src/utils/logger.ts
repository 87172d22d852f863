import { colorize } from './colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly debug: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  readonly json: (val: unknown) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly isJsonOnly: () => boolean
}

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let timestampsOn = false

function enabled(kind: LogLevel): boolean {
  return RANK[kind] <= RANK[level]
}

function prefixFor(kind: LogLevel): string {
  if (noEmoji) return `[${kind}]`
  return kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•'
}

function write(kind: LogLevel, msg: string): void {
  if (jsonOnly || !enabled(kind)) return
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  // Leave pre-colored messages untouched
  const hasAnsi: boolean = msg.includes('\u001b[')
  const colored: string = hasAnsi ? msg : (kind === 'error'
    ? colorize('red', msg)
    : kind === 'warn'
      ? colorize('yellow', msg)
      : kind === 'info'
        ? colorize('cyan', msg)
        : colorize('dim', msg))
  // eslint-disable-next-line no-console
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefixFor(kind)} ${colored}`)
}

export const logger: Logger = {
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  debug: (msg: string): void => { write('debug', msg) },
  success: (msg: string): void => { write('info', colorize('green', `${noEmoji ? '[ok]' : '✓'} ${msg}`)) },
  note: (msg: string): void => { write('info', colorize('blue', `${noEmoji ? '[note]' : '✱'} ${msg}`)) },
  section: (title: string): void => {
    if (jsonOnly || !enabled('info')) return
    const bar: string = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    // eslint-disable-next-line no-console
    console.log(`${colorize('blue', bar)}\n${colorize('bold', title)}\n${colorize('blue', bar)}`)
  },
  json: (val: unknown): void => {
    const enriched: unknown = timestampsOn && val !== null && typeof val === 'object' && !Array.isArray(val)
      ? { ts: new Date().toISOString(), ...val }
      : val
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(enriched, null, 2))
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  isJsonOnly: (): boolean => jsonOnly
}
