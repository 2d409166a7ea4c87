/**
 * EventEmitter push-source.
 *
 * Adapts a device that announces data through Node's EventEmitter: a
 * listener on `dataEvent` feeds `onEvent`, one on `errorEvent` feeds
 * `onError`, and an optional `endEvent` completes the stream.
 *
 * Listeners are attached on activate and removed on deactivate. Activating
 * twice does not attach a second set.
 */

import type { EventEmitter } from 'node:events'
import type { PushSink, PushSource } from '../../core/ports/pushSource.js'
import { claimDevice } from './deviceClaims.js'

export type EmitterSourceConfig = {
  emitter: EventEmitter
  dataEvent?: string
  errorEvent?: string
  endEvent?: string
  /** Device-specific start, run after listeners are attached. */
  start?: () => void
  /** Device-specific stop, run before listeners are removed. */
  stop?: () => void
}

export function emitterSource<T>(config: EmitterSourceConfig, sink: PushSink<T>): PushSource {
  const { emitter } = config
  const dataEvent = config.dataEvent ?? 'data'
  const errorEvent = config.errorEvent ?? 'error'
  const endEvent = config.endEvent

  claimDevice(emitter, `EventEmitter (${dataEvent})`)

  const onData = (payload: T) => sink.onEvent(payload)
  const onError = (error: unknown) => sink.onError(error)
  const onEnd = () => sink.onComplete?.()
  let listening = false

  return {
    activate() {
      if (listening) return
      listening = true
      emitter.on(dataEvent, onData)
      emitter.on(errorEvent, onError)
      if (endEvent) emitter.on(endEvent, onEnd)
      config.start?.()
    },
    deactivate() {
      if (!listening) return
      config.stop?.()
      listening = false
      emitter.off(dataEvent, onData)
      emitter.off(errorEvent, onError)
      if (endEvent) emitter.off(endEvent, onEnd)
    }
  }
}
