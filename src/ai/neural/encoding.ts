/**
 * Board Knowledge Encoding for Neural Network Input
 *
 * Shape: [1, 3, size, size] = [batch, channels, rows, columns]
 *
 * Channel 0: Hit cells, sunk included (1 where hit, 0 elsewhere)
 * Channel 1: Miss cells
 * Channel 2: Heatmap probability, scaled so the hottest valid cell is 1
 */

import { type Cell, cellAt, cellIndex } from '../../game/fleet'
import type { BoardKnowledge } from '../../game/tracker'
import { type Heatmap, probabilityAt } from '../heatmap'
import type { EncodedKnowledge } from './interface'

export const KNOWLEDGE_CHANNELS = 3

export function getInputShape(size: number): number[] {
  return [1, KNOWLEDGE_CHANNELS, size, size]
}

export function encodeKnowledge(knowledge: BoardKnowledge, heatmap: Heatmap | null): EncodedKnowledge {
  const size = knowledge.size
  const channelSize = size * size
  const input = new Float32Array(KNOWLEDGE_CHANNELS * channelSize)

  let maxHeat = 0
  if (heatmap) {
    for (const cell of knowledge.validTargets()) {
      maxHeat = Math.max(maxHeat, probabilityAt(heatmap, cell))
    }
  }

  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const cell = { row, col }
      const index = row * size + col
      const status = knowledge.statusAt(cell)
      if (status === 'hit' || status === 'sunk') {
        input[index] = 1
      } else if (status === 'miss') {
        input[channelSize + index] = 1
      } else if (heatmap && maxHeat > 0) {
        input[2 * channelSize + index] = probabilityAt(heatmap, cell) / maxHeat
      }
    }
  }

  return { input, shape: getInputShape(size) }
}

/**
 * Replaces the scores of cells that cannot be shot with -Infinity.
 */
export function maskInvalidTargets(scores: ArrayLike<number>, knowledge: BoardKnowledge): number[] {
  const size = knowledge.size
  const masked = new Array<number>(size * size).fill(-Infinity)
  for (const cell of knowledge.validTargets()) {
    const index = cellIndex(cell, size)
    const score = index < scores.length ? Number(scores[index]) : Number.NaN
    masked[index] = Number.isFinite(score) ? score : -Infinity
  }
  return masked
}

/**
 * Highest-scoring valid target, lowest index on ties. Null when no valid
 * target has a finite score.
 */
export function argmaxTarget(scores: ArrayLike<number>, knowledge: BoardKnowledge): Cell | null {
  const masked = maskInvalidTargets(scores, knowledge)
  let best = -1
  for (let index = 0; index < masked.length; index++) {
    if (masked[index] === -Infinity) continue
    if (best < 0 || masked[index] > masked[best]) best = index
  }
  return best < 0 ? null : cellAt(best, knowledge.size)
}
