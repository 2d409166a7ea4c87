/**
 * Core Layer - Ports
 *
 * Contract between a Bridge and the external producer it wraps.
 *
 * A push-source never gets pulled from. After `activate()` it calls
 * `sink.onEvent` zero or more times and `sink.onError` at most once, from
 * whatever callback context it likes (timer, I/O completion, emitter
 * listener), with no ordering guarantee relative to `activate()` returning.
 */

/**
 * The callback table a source reports to. Exactly one per source, handed
 * over when the source is constructed.
 */
export interface PushSink<T> {
  onEvent(payload: T): void
  onError(error: unknown): void
  /** Optional: a bounded source may signal that it has nothing more to send. */
  onComplete?(): void
}

/**
 * Start/stop controls. Idempotency of repeated calls is defined by each
 * source, not by the Bridge.
 */
export interface PushSource {
  activate(): void
  deactivate(): void
}

/**
 * Builds a source bound to `sink`. Throws `SinkAlreadyRegisteredError` when
 * the device behind the source is already owned by another sink.
 */
export type PushSourceFactory<T, C> = (config: C, sink: PushSink<T>) => PushSource
