/**
 * Core - Subject
 *
 * Multicast hot stream: every value goes to the subscriptions that are
 * active at the moment it is emitted. No buffering, no replay. The stream
 * ends with exactly one terminal signal, which is kept and handed to anyone
 * who subscribes afterwards.
 *
 * Each operation runs to completion before another can start, so the
 * active set and the terminal slot need no lock. Re-entrancy is the only
 * hazard: an observer may call back into subscribe/cancel/emit/complete
 * while a dispatch is in progress. Dispatch therefore iterates a snapshot
 * of the active set taken before the first callback, and re-checks each
 * member's `active` flag right before delivering to it.
 */

import { nanoid } from 'nanoid'
import type { Observer, Subscribable, Subscription } from './ports/subscribable.js'

// ============================================================================
// Terminal Signal
// ============================================================================

export type TerminalSignal =
  | { readonly kind: 'completed' }
  | { readonly kind: 'failed'; readonly error: unknown }

export const COMPLETED: TerminalSignal = Object.freeze({ kind: 'completed' })

export function failed(error: unknown): TerminalSignal {
  return Object.freeze({ kind: 'failed', error })
}

// ============================================================================
// Observer normalization
// ============================================================================

export function toObserver<T>(
  observerOrNext?: Observer<T> | ((value: T) => void),
  onError?: (error: unknown) => void,
  onComplete?: () => void
): Observer<T> {
  if (typeof observerOrNext === 'function') {
    return { next: observerOrNext, error: onError, complete: onComplete }
  }
  if (observerOrNext) return observerOrNext
  return { error: onError, complete: onComplete }
}

// ============================================================================
// Subscription
// ============================================================================

class SubjectSubscription<T> implements Subscription {
  readonly id = nanoid()
  readonly observer: Observer<T>
  readonly #detach: (sub: SubjectSubscription<T>) => void
  #active: boolean

  constructor(observer: Observer<T>, active: boolean, detach: (sub: SubjectSubscription<T>) => void) {
    this.observer = observer
    this.#active = active
    this.#detach = detach
  }

  get closed(): boolean {
    return !this.#active
  }

  cancel(): void {
    if (!this.#active) return
    this.#active = false
    this.#detach(this)
  }

  unsubscribe(): void {
    this.cancel()
  }

  /** Flip to inactive without touching the owner's set (owner is already clearing it). */
  close(): void {
    this.#active = false
  }
}

// ============================================================================
// Subject
// ============================================================================

export class Subject<T> {
  readonly #subscriptions = new Set<SubjectSubscription<T>>()
  #terminal: TerminalSignal | undefined

  get terminal(): TerminalSignal | undefined {
    return this.#terminal
  }

  get isTerminated(): boolean {
    return this.#terminal !== undefined
  }

  get subscriberCount(): number {
    return this.#subscriptions.size
  }

  subscribe(observer: Observer<T>): Subscription
  subscribe(
    onValue?: (value: T) => void,
    onError?: (error: unknown) => void,
    onComplete?: () => void
  ): Subscription
  subscribe(
    observerOrNext?: Observer<T> | ((value: T) => void),
    onError?: (error: unknown) => void,
    onComplete?: () => void
  ): Subscription {
    return this.#attach(toObserver(observerOrNext, onError, onComplete))
  }

  /**
   * Deliver `value` to every subscription active right now.
   *
   * Subscriptions created during this dispatch miss the value; ones
   * cancelled during it are skipped if their turn has not come yet.
   */
  emit(value: T): void {
    if (this.#terminal) return
    const snapshot = [...this.#subscriptions]
    for (const sub of snapshot) {
      // Also covers a re-entrant complete(), which closes every member.
      if (sub.closed) continue
      guard(() => sub.observer.next?.(value))
    }
  }

  /**
   * Set the terminal signal. First call wins and returns true; later calls
   * return false and do nothing.
   */
  complete(signal: TerminalSignal = COMPLETED): boolean {
    if (this.#terminal) return false
    this.#terminal = signal
    const snapshot = [...this.#subscriptions]
    this.#subscriptions.clear()
    for (const sub of snapshot) {
      if (sub.closed) continue
      sub.close()
      guard(() => deliverTerminal(sub.observer, signal))
    }
    return true
  }

  error(error: unknown): boolean {
    return this.complete(failed(error))
  }

  cancel(subscription: Subscription): void {
    subscription.cancel()
  }

  /** Read-only view: only `subscribe` is reachable through it. */
  asSubscribable(): Subscribable<T> {
    return {
      subscribe: (
        observerOrNext?: Observer<T> | ((value: T) => void),
        onError?: (error: unknown) => void,
        onComplete?: () => void
      ) => this.#attach(toObserver(observerOrNext, onError, onComplete))
    }
  }

  #attach(observer: Observer<T>): Subscription {
    const terminal = this.#terminal
    if (terminal) {
      const sub = new SubjectSubscription(observer, false, () => {})
      guard(() => deliverTerminal(observer, terminal))
      return sub
    }
    const sub = new SubjectSubscription<T>(observer, true, (s) => {
      this.#subscriptions.delete(s)
    })
    this.#subscriptions.add(sub)
    return sub
  }
}

function deliverTerminal<T>(observer: Observer<T>, signal: TerminalSignal): void {
  if (signal.kind === 'completed') {
    observer.complete?.()
  } else {
    observer.error?.(signal.error)
  }
}

function guard(fn: () => void): void {
  try {
    fn()
  } catch (err) {
    console.error('[Subject] subscriber error during dispatch:', err)
  }
}
