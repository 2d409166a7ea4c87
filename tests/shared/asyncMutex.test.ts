import { describe, expect, test } from 'vitest'
import { AsyncMutex } from '../../src/shared/asyncMutex.js'

describe('AsyncMutex', () => {
  test('runs callers one at a time in arrival order', async () => {
    const mutex = new AsyncMutex()
    const order: string[] = []
    const step = (name: string) => async () => {
      order.push(`${name}:start`)
      await new Promise<void>((resolve) => setTimeout(resolve, 5))
      order.push(`${name}:end`)
      return name
    }

    const results = await Promise.all([mutex.runExclusive(step('a')), mutex.runExclusive(step('b'))])

    expect(results).toEqual(['a', 'b'])
    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end'])
  })

  test('isLocked tracks running and waiting callers, and releases after a failure', async () => {
    const mutex = new AsyncMutex()
    expect(mutex.isLocked).toBe(false)

    const failing = mutex.runExclusive(async () => {
      throw new Error('scan failed')
    })
    expect(mutex.isLocked).toBe(true)

    await expect(failing).rejects.toThrow('scan failed')
    expect(mutex.isLocked).toBe(false)
    expect(await mutex.runExclusive(async () => 'next')).toBe('next')
  })
})
