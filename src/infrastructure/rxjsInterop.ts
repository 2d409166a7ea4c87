import { Observable } from 'rxjs'
import type { Subscribable } from '../core/ports/subscribable.js'

/**
 * Expose a bridge stream as an RxJS Observable so consumers can use
 * operators. Unsubscribing from the Observable cancels the underlying
 * subscription.
 */
export function toObservable<T>(stream: Subscribable<T>): Observable<T> {
  return new Observable<T>((subscriber) => {
    const subscription = stream.subscribe({
      next: (value) => subscriber.next(value),
      error: (error) => subscriber.error(error),
      complete: () => subscriber.complete()
    })
    return () => subscription.cancel()
  })
}
