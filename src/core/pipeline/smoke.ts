import { constants } from '../../constants'

export type FetchLike = (url: string, init: { readonly method: string; readonly signal: AbortSignal }) => Promise<{ readonly status: number; readonly ok: boolean }>

export type SmokeResult =
  | { readonly reachable: true; readonly url: string; readonly status: number; readonly ok: boolean }
  | { readonly reachable: false; readonly url: string; readonly error: string }

/**
 * One HTTP GET against the VM's web server. A connection that cannot be made
 * within the timeout is reported, not thrown.
 */
export async function checkWebServer(args: {
  readonly host: string
  readonly fetch?: FetchLike
  readonly timeoutMs?: number
}): Promise<SmokeResult> {
  const url: string = `http://${args.host}`
  const doFetch: FetchLike = args.fetch ?? fetch
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), args.timeoutMs ?? constants.SMOKE_TIMEOUT_MS)
  try {
    const res = await doFetch(url, { method: 'GET', signal: controller.signal })
    return { reachable: true, url, status: res.status, ok: res.ok }
  } catch (err) {
    const error: string = controller.signal.aborted
      ? `no response within ${args.timeoutMs ?? constants.SMOKE_TIMEOUT_MS} ms`
      : err instanceof Error ? err.message : String(err)
    return { reachable: false, url, error }
  } finally {
    clearTimeout(timer)
  }
}
