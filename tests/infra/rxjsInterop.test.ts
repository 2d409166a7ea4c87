import { filter, firstValueFrom, map, take, toArray } from 'rxjs'
import { describe, expect, test } from 'vitest'
import { Bridge } from '../../src/core/bridge.js'
import { toObservable } from '../../src/infrastructure/rxjsInterop.js'
import { ManualProducer, manualSource } from '../../src/infrastructure/sources/manualSource.js'

function manualBridge<T>() {
  const producer = new ManualProducer<T>()
  const bridge = Bridge.create(manualSource<T>, { producer })
  bridge.activate()
  return { producer, bridge }
}

describe('toObservable', () => {
  test('operators see the bridge stream', async () => {
    const { producer, bridge } = manualBridge<number>()
    const result = firstValueFrom(
      toObservable(bridge.stream()).pipe(
        filter((n) => n % 2 === 0),
        map((n) => n * 10),
        take(2),
        toArray()
      )
    )

    for (const n of [1, 2, 3, 4, 5, 6]) producer.push(n)

    expect(await result).toEqual([20, 40])
  })

  test('take() cancels the underlying subscription', () => {
    const { producer, bridge } = manualBridge<number>()
    const seen: number[] = []
    toObservable(bridge.stream()).pipe(take(1)).subscribe((n) => seen.push(n))
    expect(bridge.subscriberCount).toBe(1)

    producer.push(1)
    producer.push(2)

    expect(seen).toEqual([1])
    expect(bridge.subscriberCount).toBe(0)
  })

  test('producer failure surfaces as an Observable error', async () => {
    const { producer, bridge } = manualBridge<number>()
    const result = firstValueFrom(toObservable(bridge.stream()))

    const cause = new Error('lost signal')
    producer.fail(cause)

    await expect(result).rejects.toBe(cause)
  })

  test('subscribing after completion completes immediately', async () => {
    const { producer, bridge } = manualBridge<number>()
    producer.push(1)
    producer.end()

    const values = await firstValueFrom(toObservable(bridge.stream()).pipe(toArray()))

    expect(values).toEqual([])
  })
})
