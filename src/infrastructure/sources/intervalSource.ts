import type { PushSink, PushSource } from '../../core/ports/pushSource.js'

export type Tick = {
  seq: number
  at: string
}

export type IntervalSourceConfig = {
  intervalMs: number
  /** Complete the stream after this many ticks. */
  limit?: number
}

/**
 * Emits `{ seq, at }` every `intervalMs`. `seq` starts at 1 and keeps
 * counting across deactivate/activate cycles. Activating while already
 * running is a no-op.
 */
export function intervalSource(config: IntervalSourceConfig, sink: PushSink<Tick>): PushSource {
  if (!Number.isFinite(config.intervalMs) || config.intervalMs <= 0) {
    throw new Error(`intervalMs must be a positive number, got ${config.intervalMs}`)
  }
  if (config.limit !== undefined && (!Number.isInteger(config.limit) || config.limit <= 0)) {
    throw new Error(`limit must be a positive integer, got ${config.limit}`)
  }

  let timer: NodeJS.Timeout | undefined
  let seq = 0

  const stop = () => {
    if (timer === undefined) return
    clearInterval(timer)
    timer = undefined
  }

  const tick = () => {
    seq++
    sink.onEvent({ seq, at: new Date().toISOString() })
    if (config.limit !== undefined && seq >= config.limit) {
      stop()
      sink.onComplete?.()
    }
  }

  return {
    activate() {
      if (timer !== undefined) return
      if (config.limit !== undefined && seq >= config.limit) return
      timer = setInterval(tick, config.intervalMs)
    },
    deactivate: stop
  }
}
