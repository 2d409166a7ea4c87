/**
 * Core - Bridge
 *
 * Turns one callback-driven push-source into a shared stream.
 *
 * The Bridge builds its source itself and hands the factory its own sink,
 * so nothing else can ever register as the source's callback recipient.
 * Starting and stopping the producer are explicit calls: subscribing does
 * not activate it, and losing the last subscriber does not deactivate it.
 */

import type { PushSink, PushSource, PushSourceFactory } from './ports/pushSource.js'
import type { Subscribable } from './ports/subscribable.js'
import { Subject, type TerminalSignal } from './subject.js'

export type BridgeOptions = {
  /** Log sink calls that arrive after the stream has terminated. */
  debug?: boolean
}

export class Bridge<T> {
  readonly #subject = new Subject<T>()
  readonly #view: Subscribable<T> = this.#subject.asSubscribable()
  readonly #source: PushSource
  readonly #debug: boolean

  private constructor(build: (sink: PushSink<T>) => PushSource, options: BridgeOptions) {
    this.#debug = options.debug ?? false
    this.#source = build({
      onEvent: (payload) => this.#onEvent(payload),
      onError: (error) => this.#onError(error),
      onComplete: () => this.#onComplete()
    })
  }

  /**
   * Construct the source through `factory` with this Bridge as its sink.
   * Errors thrown by the factory (e.g. `SinkAlreadyRegisteredError`) propagate.
   */
  static create<T, C>(factory: PushSourceFactory<T, C>, config: C, options: BridgeOptions = {}): Bridge<T> {
    return new Bridge<T>((sink) => factory(config, sink), options)
  }

  /** Forwarded as-is; repeated calls follow the source's own rules. */
  activate(): void {
    this.#source.activate()
  }

  /**
   * Forwarded as-is. Events the producer sends before it actually stops are
   * still delivered.
   */
  deactivate(): void {
    this.#source.deactivate()
  }

  stream(): Subscribable<T> {
    return this.#view
  }

  get terminal(): TerminalSignal | undefined {
    return this.#subject.terminal
  }

  get isTerminated(): boolean {
    return this.#subject.isTerminated
  }

  get subscriberCount(): number {
    return this.#subject.subscriberCount
  }

  #onEvent(payload: T): void {
    if (this.#subject.isTerminated) {
      this.#dropped('event')
      return
    }
    this.#subject.emit(payload)
  }

  #onError(error: unknown): void {
    if (!this.#subject.error(error)) {
      this.#dropped('error')
    }
  }

  #onComplete(): void {
    if (!this.#subject.complete()) {
      this.#dropped('completion')
    }
  }

  #dropped(kind: string): void {
    if (this.#debug) {
      console.warn(`[Bridge] dropped ${kind} after stream terminated`)
    }
  }
}

export function createBridge<T, C>(
  factory: PushSourceFactory<T, C>,
  config: C,
  options?: BridgeOptions
): Bridge<T> {
  return Bridge.create(factory, config, options)
}
