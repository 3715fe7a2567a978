/**
 * Targeting strategies for the cheap tiers
 *
 * Each strategy is a plain function of the board knowledge and the turn's
 * random source. None of them keeps memory between turns: hunt/target mode
 * is derived from the knowledge every time (a live hit means target mode).
 *
 * - selectRandomTarget: Easy
 * - selectHuntTarget: Medium, checkerboard hunt then neighbour probing
 * - selectAdaptiveTarget: Hard, heatmap hunt biased by placement history
 */

import type { BoardKnowledge } from '../game/tracker'
import { type Cell, NEIGHBOR_OFFSETS, cellIndex } from '../game/fleet'
import { InvalidStateError } from '../lib/errorUtils'
import { buildHeatmap, mostProbableCell } from './heatmap'
import type { Rng } from './rng'
import { type PlacementBias, samplePlacements } from './sampler'

// ============================================================================
// HELPERS
// ============================================================================

function requireTargets(knowledge: BoardKnowledge): Cell[] {
  const targets = knowledge.validTargets()
  if (targets.length === 0) {
    throw new InvalidStateError('No valid targets remain on this board')
  }
  return targets
}

/**
 * Whether a cell belongs to the checkerboard hunt set. With every ship at
 * least two long, each ship covers one such cell.
 */
export function isParityCell(cell: Cell): boolean {
  return (cell.row + cell.col) % 2 === 0
}

/**
 * Groups unresolved hits into orthogonally connected clusters, each in
 * row-major order; clusters are ordered by their first cell.
 */
export function groupHits(knowledge: BoardKnowledge): Cell[][] {
  const hits = knowledge.unresolvedHits()
  const size = knowledge.size
  const remaining = new Map(hits.map((hit) => [cellIndex(hit, size), hit]))
  const groups: Cell[][] = []

  for (const hit of hits) {
    const start = cellIndex(hit, size)
    if (!remaining.has(start)) continue
    remaining.delete(start)
    const group: Cell[] = [hit]
    const queue: Cell[] = [hit]
    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined) break
      for (const [dr, dc] of NEIGHBOR_OFFSETS) {
        const index = (current.row + dr) * size + (current.col + dc)
        const next = remaining.get(index)
        if (next && Math.abs(next.row - current.row) + Math.abs(next.col - current.col) === 1) {
          remaining.delete(index)
          group.push(next)
          queue.push(next)
        }
      }
    }
    groups.push(group.sort((a, b) => a.row - b.row || a.col - b.col))
  }
  return groups
}

/**
 * Target-mode shot, or null when no hit is pending (or every hit is boxed in).
 *
 * A straight run of two or more hits is extended at its ends first
 * (vertical: above then below; horizontal: right then left). Otherwise the
 * neighbours of each hit are tried in the fixed order up, right, down, left.
 */
export function targetModeCell(knowledge: BoardKnowledge): Cell | null {
  const groups = groupHits(knowledge)
  if (groups.length === 0) return null

  for (const group of groups) {
    if (group.length < 2) continue
    const first = group[0]
    const last = group[group.length - 1]
    const ends: Cell[] = []
    if (group.every((cell) => cell.col === first.col)) {
      ends.push({ row: first.row - 1, col: first.col }, { row: last.row + 1, col: first.col })
    } else if (group.every((cell) => cell.row === first.row)) {
      ends.push({ row: first.row, col: last.col + 1 }, { row: first.row, col: first.col - 1 })
    }
    const end = ends.find((cell) => knowledge.isValidTarget(cell))
    if (end) return end
  }

  for (const group of groups) {
    for (const hit of group) {
      for (const [dr, dc] of NEIGHBOR_OFFSETS) {
        const next = { row: hit.row + dr, col: hit.col + dc }
        if (knowledge.isValidTarget(next)) return next
      }
    }
  }
  return null
}

// ============================================================================
// EASY: RANDOM
// ============================================================================

/**
 * Uniformly random valid target. Targets are listed row-major, so a fixed
 * seed always yields the same cell.
 */
export function selectRandomTarget(knowledge: BoardKnowledge, rng: Rng): Cell {
  const targets = requireTargets(knowledge)
  return targets[rng.int(targets.length)]
}

// ============================================================================
// MEDIUM: HUNT / TARGET
// ============================================================================

/**
 * Hunt mode: random checkerboard cell, or any valid cell once the
 * checkerboard is used up.
 */
export function huntParityCell(knowledge: BoardKnowledge, rng: Rng): Cell {
  const targets = requireTargets(knowledge)
  const parity = targets.filter(isParityCell)
  const pool = parity.length > 0 ? parity : targets
  return pool[rng.int(pool.length)]
}

export function selectHuntTarget(knowledge: BoardKnowledge, rng: Rng): Cell {
  requireTargets(knowledge)
  return targetModeCell(knowledge) ?? huntParityCell(knowledge, rng)
}

// ============================================================================
// HARD: ADAPTIVE HUNT / TARGET
// ============================================================================

export interface AdaptiveOptions {
  rng: Rng
  samples: number
  attemptMultiplier: number
  maxBacktracks: number
  /** Historical placement bias; null samples uniformly */
  bias: PlacementBias | null
}

/**
 * Same target mode as Medium; in hunt mode the most probable cell of a
 * heatmap sampled under the placement history bias.
 *
 * @throws SamplingExhaustedError if the knowledge is contradictory
 */
export function selectAdaptiveTarget(knowledge: BoardKnowledge, options: AdaptiveOptions): Cell {
  requireTargets(knowledge)
  const target = targetModeCell(knowledge)
  if (target) return target

  const placements = samplePlacements(knowledge, options.samples, {
    rng: options.rng,
    attemptMultiplier: options.attemptMultiplier,
    maxBacktracks: options.maxBacktracks,
    bias: options.bias ?? undefined,
  })
  const heatmap = buildHeatmap(placements, knowledge.size)
  const best = mostProbableCell(heatmap, knowledge)
  if (best === null) {
    throw new InvalidStateError(`No target found in a heatmap of ${placements.length} samples`)
  }
  return best
}
