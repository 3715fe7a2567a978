import { describe, it, expect } from 'vitest'
import { argmaxTarget, encodeKnowledge, getInputShape, maskInvalidTargets } from './encoding'
import { BoardStateTracker } from '../../game/tracker'
import type { Heatmap } from '../heatmap'

function smallBoard(): BoardStateTracker {
  const tracker = new BoardStateTracker(3, [2])
  tracker.recordResult({ row: 0, col: 0 }, { kind: 'hit' })
  tracker.recordResult({ row: 1, col: 1 }, { kind: 'miss' })
  return tracker
}

describe('getInputShape', () => {
  it('is batch, channels, rows, columns', () => {
    expect(getInputShape(10)).toEqual([1, 3, 10, 10])
  })
})

describe('encodeKnowledge', () => {
  it('fills the hit and miss planes', () => {
    const { input, shape } = encodeKnowledge(smallBoard(), null)
    expect(shape).toEqual([1, 3, 3, 3])
    expect(input).toHaveLength(27)
    expect(Array.from(input.subarray(0, 9))).toEqual([1, 0, 0, 0, 0, 0, 0, 0, 0])
    expect(Array.from(input.subarray(9, 18))).toEqual([0, 0, 0, 0, 1, 0, 0, 0, 0])
    expect(Array.from(input.subarray(18))).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0])
  })

  it('scales the heat plane to the hottest valid target', () => {
    const heatmap: Heatmap = {
      size: 3,
      sampleCount: 8,
      probabilities: Float64Array.from([1, 0.5, 0, 0.25, 0.75, 0, 0, 0, 0.125]),
    }
    const { input } = encodeKnowledge(smallBoard(), heatmap)
    // the hit and the miss carry no heat, whatever the map says
    expect(Array.from(input.subarray(18))).toEqual([0, 1, 0, 0.5, 0, 0, 0, 0, 0.25])
  })

  it('counts sunk cells as hits', () => {
    const tracker = new BoardStateTracker(3, [2])
    tracker.recordResult({ row: 2, col: 1 }, { kind: 'hit' })
    tracker.recordResult({ row: 2, col: 2 }, { kind: 'sunk', shipLength: 2 })
    const { input } = encodeKnowledge(tracker, null)
    expect(Array.from(input.subarray(0, 9))).toEqual([0, 0, 0, 0, 0, 0, 0, 1, 1])
  })
})

describe('maskInvalidTargets', () => {
  it('masks resolved cells and unusable scores', () => {
    const masked = maskInvalidTargets([5, Number.NaN, 2, 3, 9, 1, 0, -1], smallBoard())
    expect(masked).toEqual([-Infinity, -Infinity, 2, 3, -Infinity, 1, 0, -1, -Infinity])
  })
})

describe('argmaxTarget', () => {
  it('picks the best valid cell, lowest index on ties', () => {
    const scores = [9, 1, 1, 3, 9, 3, 0, 0, 0]
    expect(argmaxTarget(scores, smallBoard())).toEqual({ row: 1, col: 0 })
  })

  it('returns null when nothing valid has a score', () => {
    expect(argmaxTarget([1, Number.NaN], smallBoard())).toBeNull()
  })
})
