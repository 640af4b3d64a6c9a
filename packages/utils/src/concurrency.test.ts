import { describe, it, expect } from 'vitest'
import { runWithConcurrency } from './concurrency.js'

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1))

describe('runWithConcurrency', () => {
  it('visits every item', async () => {
    const seen: number[] = []
    await runWithConcurrency([1, 2, 3, 4], 2, async (n) => {
      await tick()
      seen.push(n)
    })
    expect([...seen].sort()).toEqual([1, 2, 3, 4])
  })

  it('never runs more than the limit at once', async () => {
    let active = 0
    let peak = 0
    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active++
      peak = Math.max(peak, active)
      await tick()
      active--
    })
    expect(peak).toBe(3)
  })

  it('treats a non-positive limit as one', async () => {
    let active = 0
    let peak = 0
    await runWithConcurrency(['a', 'b'], 0, async () => {
      active++
      peak = Math.max(peak, active)
      await tick()
      active--
    })
    expect(peak).toBe(1)
  })
})
