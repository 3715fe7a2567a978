/**
 * Probability Heatmap
 *
 * Per-cell hit probability estimated from a batch of sampled placements.
 * Built fresh every turn; used directly by the Hard tier, as the expansion
 * prior by MCTS, and as a standalone hint query in networked play.
 */

import type { BoardKnowledge } from '../game/tracker'
import { type Cell, type Placement, cellIndex, neighbors, shipCells } from '../game/fleet'
import type { Rng } from './rng'
import { type PlacementBias, samplePlacements } from './sampler'

export interface Heatmap {
  readonly size: number
  readonly sampleCount: number
  /** Row-major occupancy frequency per cell, each in [0, 1] */
  readonly probabilities: Float64Array
}

/**
 * Aggregates placements into a heatmap. With zero placements every cell
 * reads 0.
 */
export function buildHeatmap(placements: readonly Placement[], size: number): Heatmap {
  const counts = new Float64Array(size * size)
  for (const placement of placements) {
    for (const ship of placement.ships) {
      for (const cell of shipCells(ship)) {
        counts[cellIndex(cell, size)]++
      }
    }
  }
  if (placements.length > 0) {
    for (let i = 0; i < counts.length; i++) {
      counts[i] /= placements.length
    }
  }
  return { size, sampleCount: placements.length, probabilities: counts }
}

export function probabilityAt(heatmap: Heatmap, cell: Cell): number {
  return heatmap.probabilities[cellIndex(cell, heatmap.size)]
}

// ============================================================================
// DETERMINISTIC SELECTION
// ============================================================================

/**
 * Cell indices orthogonally adjacent to an unresolved hit.
 */
export function activeHuntCells(knowledge: BoardKnowledge): Set<number> {
  const adjacent = new Set<number>()
  for (const hit of knowledge.unresolvedHits()) {
    for (const next of neighbors(hit, knowledge.size)) {
      adjacent.add(cellIndex(next, knowledge.size))
    }
  }
  return adjacent
}

/**
 * Orders two equally scored cells: a cell next to an unresolved hit first,
 * then the lower row, then the lower column. Negative means `a` wins.
 */
export function compareTiedCells(a: Cell, b: Cell, huntCells: Set<number>, size: number): number {
  const aHunt = huntCells.has(cellIndex(a, size)) ? 0 : 1
  const bHunt = huntCells.has(cellIndex(b, size)) ? 0 : 1
  if (aHunt !== bHunt) return aHunt - bHunt
  if (a.row !== b.row) return a.row - b.row
  return a.col - b.col
}

/**
 * Highest-probability valid target, with deterministic tie-breaking.
 *
 * @param candidates - Cells to choose from (default: every valid target)
 * @returns null when there is no candidate
 */
export function mostProbableCell(
  heatmap: Heatmap,
  knowledge: BoardKnowledge,
  candidates: readonly Cell[] = knowledge.validTargets()
): Cell | null {
  const huntCells = activeHuntCells(knowledge)
  let best: Cell | null = null
  let bestProbability = -1

  for (const cell of candidates) {
    if (!knowledge.isValidTarget(cell)) continue
    const probability = probabilityAt(heatmap, cell)
    if (
      best === null ||
      probability > bestProbability ||
      (probability === bestProbability && compareTiedCells(cell, best, huntCells, heatmap.size) < 0)
    ) {
      best = cell
      bestProbability = probability
    }
  }
  return best
}

/**
 * Valid targets sorted best-first by probability, ties as in mostProbableCell.
 */
export function rankTargets(heatmap: Heatmap, knowledge: BoardKnowledge): Cell[] {
  const huntCells = activeHuntCells(knowledge)
  return knowledge
    .validTargets()
    .sort(
      (a, b) =>
        probabilityAt(heatmap, b) - probabilityAt(heatmap, a) ||
        compareTiedCells(a, b, huntCells, heatmap.size)
    )
}

// ============================================================================
// STANDALONE QUERIES
// ============================================================================

export interface HintOptions {
  samples: number
  rng: Rng
  attemptMultiplier: number
  maxBacktracks: number
  bias?: PlacementBias
}

/**
 * Samples and aggregates in one call. Used for hints in networked play,
 * where the engine does not pick the shot itself.
 *
 * @throws SamplingExhaustedError if the knowledge is contradictory
 */
export function buildHintHeatmap(knowledge: BoardKnowledge, options: HintOptions): Heatmap {
  const placements = samplePlacements(knowledge, options.samples, {
    rng: options.rng,
    attemptMultiplier: options.attemptMultiplier,
    maxBacktracks: options.maxBacktracks,
    bias: options.bias,
  })
  return buildHeatmap(placements, knowledge.size)
}

/**
 * ASCII view of a heatmap for debugging.
 * `X` hit, `#` sunk, `-` miss, digits 0-9 heat relative to the hottest cell.
 */
export function renderHeatmap(heatmap: Heatmap, knowledge: BoardKnowledge): string {
  const size = heatmap.size
  let max = 0
  for (const cell of knowledge.validTargets()) {
    max = Math.max(max, probabilityAt(heatmap, cell))
  }

  const header = '  ' + Array.from({ length: size }, (_, col) => String(col % 10)).join(' ')
  const lines = [header]
  for (let row = 0; row < size; row++) {
    const marks: string[] = []
    for (let col = 0; col < size; col++) {
      const cell = { row, col }
      const status = knowledge.statusAt(cell)
      if (status === 'hit') marks.push('X')
      else if (status === 'sunk') marks.push('#')
      else if (status === 'miss') marks.push('-')
      else marks.push(max > 0 ? String(Math.floor((probabilityAt(heatmap, cell) / max) * 9)) : '0')
    }
    lines.push(`${String.fromCharCode(65 + row)} ${marks.join(' ')}`)
  }
  return lines.join('\n')
}
