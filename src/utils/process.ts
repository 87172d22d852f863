import { spawn, type ChildProcess } from 'node:child_process'

export interface RunArgs { readonly cmd: string; readonly cwd?: string; readonly stdin?: string; readonly env?: Readonly<Record<string, string>> }
export interface RunStreamArgs { readonly cmd: string; readonly cwd?: string; readonly env?: Readonly<Record<string, string>>; readonly onStdout?: (chunk: string) => void; readonly onStderr?: (chunk: string) => void }

export interface RunResult { readonly ok: boolean; readonly exitCode: number; readonly stdout: string; readonly stderr: string }
/** Streamed runs keep only the tail of their combined output, for error classification. */
export interface StreamResult { readonly ok: boolean; readonly exitCode: number; readonly outputTail: string }

/**
 * Child-process seam used by every stage. Tests substitute a recording fake.
 */
export interface CommandRunner {
  readonly run: (args: RunArgs) => Promise<RunResult>
  readonly runStream: (args: RunStreamArgs) => Promise<StreamResult>
  readonly has: (cmd: string) => Promise<boolean>
}

const OUTPUT_TAIL_MAX = 4000

export function splitCmd(cmdline: string): readonly string[] {
  const matches: RegExpMatchArray | null = cmdline.match(/(?:[^\s"']+|"[^"]*"|'[^']*')+/g)
  if (matches === null) return []
  return matches.map((p: string): string => {
    if ((p.startsWith('"') && p.endsWith('"')) || (p.startsWith("'") && p.endsWith("'"))) return p.slice(1, -1)
    return p
  })
}

function spawnShell(cmd: string, cwd: string | undefined, env: Readonly<Record<string, string>> | undefined): ChildProcess | undefined {
  const parts: readonly string[] = splitCmd(cmd)
  const file: string = parts[0] ?? ''
  if (file.length === 0) return undefined
  const shellPath: string = process.env.SHELL ?? (process.platform === 'win32' ? (process.env.ComSpec ?? 'cmd.exe') : '/bin/sh')
  const mergedEnv: NodeJS.ProcessEnv = env !== undefined ? { ...process.env, ...env } : process.env
  return spawn(file, [...parts.slice(1)], { cwd, shell: shellPath, windowsHide: true, env: mergedEnv })
}

async function run(args: RunArgs): Promise<RunResult> {
  return await new Promise<RunResult>((resolve) => {
    const cp: ChildProcess | undefined = spawnShell(args.cmd, args.cwd, args.env)
    if (cp === undefined) return resolve({ ok: false, exitCode: 1, stdout: '', stderr: 'empty command' })
    const outChunks: Buffer[] = []
    const errChunks: Buffer[] = []
    cp.stdout?.on('data', (d: Buffer) => { outChunks.push(Buffer.from(d)) })
    cp.stderr?.on('data', (d: Buffer) => { errChunks.push(Buffer.from(d)) })
    if (typeof args.stdin === 'string' && cp.stdin) {
      cp.stdin.write(args.stdin)
      cp.stdin.end()
    }
    cp.on('error', (err: Error) => {
      resolve({ ok: false, exitCode: 1, stdout: Buffer.concat(outChunks).toString(), stderr: Buffer.concat(errChunks).toString() || err.message })
    })
    cp.on('close', (code: number | null) => {
      const exit: number = code === null ? 1 : code
      resolve({ ok: exit === 0, exitCode: exit, stdout: Buffer.concat(outChunks).toString(), stderr: Buffer.concat(errChunks).toString() })
    })
  })
}

async function runStream(args: RunStreamArgs): Promise<StreamResult> {
  return await new Promise<StreamResult>((resolve) => {
    const cp: ChildProcess | undefined = spawnShell(args.cmd, args.cwd, args.env)
    if (cp === undefined) return resolve({ ok: false, exitCode: 1, outputTail: 'empty command' })
    let tail = ''
    cp.stdout?.setEncoding('utf8')
    cp.stderr?.setEncoding('utf8')
    cp.stdout?.on('data', (d: string) => {
      tail = (tail + d).slice(-OUTPUT_TAIL_MAX)
      args.onStdout?.(d)
    })
    cp.stderr?.on('data', (d: string) => {
      tail = (tail + d).slice(-OUTPUT_TAIL_MAX)
      args.onStderr?.(d)
    })
    cp.on('error', (err: Error) => resolve({ ok: false, exitCode: 1, outputTail: tail || err.message }))
    cp.on('close', (code: number | null) => resolve({ ok: (code ?? 1) === 0, exitCode: code ?? 1, outputTail: tail }))
  })
}

async function has(cmd: string): Promise<boolean> {
  const res: RunResult = await run({ cmd: `${cmd} --version` })
  return res.ok
}

export const proc: CommandRunner = { run, runStream, has }
