/**
 * Manual push-source: a producer driven by hand.
 *
 * Used by embedding code that already has its own callbacks to forward,
 * and by tests as an in-process producer. `push`/`fail`/`end` only reach
 * the sink while the producer is active.
 */

import type { PushSink, PushSource } from '../../core/ports/pushSource.js'
import { claimDevice } from './deviceClaims.js'

export class ManualProducer<T> {
  #sink: PushSink<T> | undefined
  #active = false
  #activations = 0
  #deactivations = 0

  get active(): boolean {
    return this.#active
  }

  get activations(): number {
    return this.#activations
  }

  get deactivations(): number {
    return this.#deactivations
  }

  attach(sink: PushSink<T>): void {
    claimDevice(this, 'ManualProducer')
    this.#sink = sink
  }

  activate(): void {
    this.#activations++
    this.#active = true
  }

  deactivate(): void {
    this.#deactivations++
    this.#active = false
  }

  /** Returns false when the value was not sent (inactive or unattached). */
  push(value: T): boolean {
    const sink = this.#liveSink()
    if (!sink) return false
    sink.onEvent(value)
    return true
  }

  fail(error: unknown): boolean {
    const sink = this.#liveSink()
    if (!sink) return false
    sink.onError(error)
    return true
  }

  end(): boolean {
    const sink = this.#liveSink()
    if (!sink?.onComplete) return false
    sink.onComplete()
    return true
  }

  #liveSink(): PushSink<T> | undefined {
    return this.#active ? this.#sink : undefined
  }
}

export type ManualSourceConfig<T> = {
  producer: ManualProducer<T>
}

export function manualSource<T>(config: ManualSourceConfig<T>, sink: PushSink<T>): PushSource {
  const { producer } = config
  producer.attach(sink)
  return {
    activate: () => producer.activate(),
    deactivate: () => producer.deactivate()
  }
}
