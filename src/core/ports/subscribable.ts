/**
 * Core Layer - Ports
 *
 * Minimal typed stream contract handed to consumers of a Bridge.
 *
 * Structurally compatible with RxJS: a `Subscription` has `unsubscribe()`
 * and `closed`, and an `Observer` is a partial `{ next, error, complete }`.
 * Consumers that want operators go through `toObservable()` in
 * infrastructure; nothing in core imports a reactive library.
 */

// ============================================================================
// Subscription Handle
// ============================================================================

/**
 * Returned by `Subscribable.subscribe()`.
 *
 * `cancel()` and `unsubscribe()` are the same operation. Both are idempotent;
 * once either returns, the subscription's callbacks are never invoked again.
 */
export interface Subscription {
  readonly id: string
  readonly closed: boolean
  cancel(): void
  unsubscribe(): void
}

// ============================================================================
// Observer
// ============================================================================

export interface Observer<T> {
  next?(value: T): void
  error?(error: unknown): void
  complete?(): void
}

// ============================================================================
// Subscribable Interface
// ============================================================================

/**
 * The read-only side of a stream: attach, get a handle to detach.
 */
export interface Subscribable<T> {
  subscribe(observer: Observer<T>): Subscription
  subscribe(
    onValue?: (value: T) => void,
    onError?: (error: unknown) => void,
    onComplete?: () => void
  ): Subscription
}
