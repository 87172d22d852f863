import type { CommandRunner, RunArgs, RunResult, RunStreamArgs, StreamResult } from '../../src/utils/process'

export interface Reply {
  readonly ok?: boolean
  readonly exitCode?: number
  readonly stdout?: string
  readonly stderr?: string
}

export interface RecordedCall {
  readonly kind: 'run' | 'stream' | 'has'
  readonly cmd: string
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
}

interface Script {
  readonly prefix: string
  readonly queue: Reply[]
}

/**
 * In-process CommandRunner. Records every call and answers from scripted
 * replies keyed by command prefix (longest prefix wins). A script's last
 * reply repeats once the earlier ones are used up. Unscripted commands succeed
 * with empty output; `has` is true unless the tool was marked absent.
 */
export class FakeRunner implements CommandRunner {
  public readonly calls: RecordedCall[] = []
  private readonly scripts: Script[] = []
  private readonly absent: Set<string> = new Set()

  public on(prefix: string, ...replies: Reply[]): this {
    this.scripts.push({ prefix, queue: [...replies] })
    return this
  }

  public without(...tools: string[]): this {
    for (const t of tools) this.absent.add(t)
    return this
  }

  /** Commands passed to run/runStream, in order; `has` checks excluded. */
  public commands(): string[] {
    return this.calls.filter((c) => c.kind !== 'has').map((c) => c.cmd)
  }

  public count(prefix: string): number {
    return this.commands().filter((c) => c.startsWith(prefix)).length
  }

  public readonly run = async (args: RunArgs): Promise<RunResult> => {
    this.calls.push({ kind: 'run', cmd: args.cmd, cwd: args.cwd, env: args.env })
    const r: Reply = this.reply(args.cmd)
    const ok: boolean = r.ok ?? true
    return { ok, exitCode: r.exitCode ?? (ok ? 0 : 1), stdout: r.stdout ?? '', stderr: r.stderr ?? '' }
  }

  public readonly runStream = async (args: RunStreamArgs): Promise<StreamResult> => {
    this.calls.push({ kind: 'stream', cmd: args.cmd, cwd: args.cwd, env: args.env })
    const r: Reply = this.reply(args.cmd)
    if (r.stdout !== undefined) args.onStdout?.(r.stdout)
    if (r.stderr !== undefined) args.onStderr?.(r.stderr)
    const ok: boolean = r.ok ?? true
    return { ok, exitCode: r.exitCode ?? (ok ? 0 : 1), outputTail: `${r.stdout ?? ''}${r.stderr ?? ''}` }
  }

  public readonly has = async (cmd: string): Promise<boolean> => {
    this.calls.push({ kind: 'has', cmd })
    return !this.absent.has(cmd)
  }

  private reply(cmd: string): Reply {
    let best: Script | undefined
    for (const s of this.scripts) {
      if (cmd.startsWith(s.prefix) && (best === undefined || s.prefix.length > best.prefix.length)) best = s
    }
    if (best === undefined) return {}
    const next: Reply | undefined = best.queue.length > 1 ? best.queue.shift() : best.queue[0]
    return next ?? {}
  }
}

/** Terraform outputs of a successfully provisioned VM. */
export function withOutputs(runner: FakeRunner, outputs: Readonly<Record<string, string>>): FakeRunner {
  for (const [name, value] of Object.entries(outputs)) runner.on(`terraform output -raw ${name}`, { stdout: `${value}\n` })
  return runner
}
