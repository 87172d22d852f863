import { logger } from '../../utils/logger'

/**
 * Turn raw stdout/stderr chunks into whole lines for the logger. Partial
 * lines are held until the next chunk or `flush`.
 */
export function lineForwarder(emit: (line: string) => void = (l: string): void => { logger.info(l) }): { readonly push: (chunk: string) => void; readonly flush: () => void } {
  let pending = ''
  const push = (chunk: string): void => {
    const text: string = pending + chunk
    const parts: string[] = text.split(/\r?\n/)
    pending = parts.pop() ?? ''
    for (const p of parts) {
      const t: string = p.replace(/\s+$/, '')
      if (t.length > 0) emit(t)
    }
  }
  const flush = (): void => {
    const t: string = pending.replace(/\s+$/, '')
    pending = ''
    if (t.length > 0) emit(t)
  }
  return { push, flush }
}
