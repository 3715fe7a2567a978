import { describe, it, expect } from 'vitest'
import { createRng } from './rng'

describe('createRng', () => {
  it('reproduces the same sequence for the same seed', () => {
    const a = createRng(1234)
    const b = createRng(1234)
    const first = Array.from({ length: 5 }, () => a.next())
    const second = Array.from({ length: 5 }, () => b.next())
    expect(first).toEqual(second)
  })

  it('treats string seeds deterministically', () => {
    expect(createRng('game-7').int(1000)).toBe(createRng('game-7').int(1000))
  })

  it('produces different sequences for different seeds', () => {
    const a = Array.from({ length: 5 }, ((rng) => () => rng.next())(createRng(1)))
    const b = Array.from({ length: 5 }, ((rng) => () => rng.next())(createRng(2)))
    expect(a).not.toEqual(b)
  })

  it('keeps int() within bounds', () => {
    const rng = createRng(99)
    for (let i = 0; i < 500; i++) {
      const value = rng.int(7)
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(7)
      expect(Number.isInteger(value)).toBe(true)
    }
  })

  it('rejects a non-positive bound', () => {
    expect(() => createRng(1).int(0)).toThrow(RangeError)
  })

  describe('weightedIndex', () => {
    it('never picks a zero or negative weight', () => {
      const rng = createRng(5)
      for (let i = 0; i < 200; i++) {
        expect(rng.weightedIndex([0, -3, 2, 0])).toBe(2)
      }
    })

    it('falls back to uniform when every weight is zero', () => {
      const rng = createRng(5)
      const seen = new Set<number>()
      for (let i = 0; i < 200; i++) {
        seen.add(rng.weightedIndex([0, 0, 0]))
      }
      expect([...seen].sort()).toEqual([0, 1, 2])
    })

    it('rejects an empty weight list', () => {
      expect(() => createRng(1).weightedIndex([])).toThrow(RangeError)
    })
  })
})
