/**
 * Placement Sampler
 *
 * Draws layouts of the opponent's unsunk ships that agree with everything
 * the tracker has recorded: no ship on a miss or sunk cell, no overlap, and
 * every unresolved hit covered.
 *
 * Randomized greedy backtracking: ships go down longest-first at random
 * candidate positions. A candidate is dropped at once if it overlaps, or if
 * it would leave some uncovered hit out of reach of the ships still to
 * place. Each ship may backtrack a bounded number of times per attempt;
 * past that the attempt restarts from the first ship.
 */

import type { BoardKnowledge } from '../game/tracker'
import {
  type Placement,
  type ShipPlacement,
  cellIndex,
  shipCells,
} from '../game/fleet'
import { SamplingExhaustedError } from '../lib/errorUtils'
import type { Rng } from './rng'

/**
 * Relative preference for candidate ship positions. 1 is neutral.
 */
export interface PlacementBias {
  weight(ship: ShipPlacement, size: number): number
}

export interface SamplerOptions {
  rng: Rng
  /** Attempts allowed per requested placement */
  attemptMultiplier: number
  /** Backtracks allowed per ship within one attempt */
  maxBacktracks: number
  /** Weights candidate positions (Hard tier and above) */
  bias?: PlacementBias
}

interface Candidate {
  ship: ShipPlacement
  cells: number[]
  weight: number
}

/**
 * Reusable sampler over one fixed board knowledge. Candidate positions are
 * computed once, so drawing many placements (or one per MCTS simulation)
 * does not repeat that work.
 */
export class PlacementSampler {
  readonly size: number
  private readonly lengths: number[]
  private readonly candidates: Map<number, Candidate[]>
  /** candidate indices per length, per covered cell */
  private readonly coverage: Map<number, number[][]>
  private readonly hitCells: number[]
  private readonly options: SamplerOptions
  private attemptsUsed = 0

  constructor(knowledge: BoardKnowledge, options: SamplerOptions) {
    this.size = knowledge.size
    this.options = options
    this.lengths = knowledge.remainingShipLengths().sort((a, b) => b - a)

    const blocked = new Uint8Array(this.size * this.size)
    this.hitCells = []
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        const status = knowledge.statusAt({ row, col })
        const index = row * this.size + col
        if (status === 'miss' || status === 'sunk') blocked[index] = 1
        if (status === 'hit') this.hitCells.push(index)
      }
    }

    this.candidates = new Map()
    this.coverage = new Map()
    for (const length of new Set(this.lengths)) {
      const list = this.enumerateCandidates(length, blocked)
      const byCell: number[][] = Array.from({ length: this.size * this.size }, () => [])
      list.forEach((candidate, id) => {
        for (const cell of candidate.cells) byCell[cell].push(id)
      })
      this.candidates.set(length, list)
      this.coverage.set(length, byCell)
    }
  }

  /** Total attempts made by this sampler so far */
  get attempts(): number {
    return this.attemptsUsed
  }

  /**
   * Lazily yields up to `count` placements, stopping early once
   * `count × attemptMultiplier` attempts have been spent.
   */
  *stream(count: number): Generator<Placement, void, undefined> {
    const cap = count * this.options.attemptMultiplier
    let produced = 0
    let attempts = 0
    while (produced < count && attempts < cap) {
      attempts++
      const placement = this.attempt()
      if (placement !== null) {
        produced++
        yield placement
      }
    }
  }

  /**
   * Draws a single placement.
   *
   * @throws SamplingExhaustedError if none is found within the attempt cap
   */
  drawOne(): Placement {
    const before = this.attemptsUsed
    for (const placement of this.stream(1)) {
      return placement
    }
    throw new SamplingExhaustedError(this.attemptsUsed - before)
  }

  /**
   * One longest-first construction with bounded backtracking.
   */
  attempt(): Placement | null {
    this.attemptsUsed++
    const occupied = new Uint8Array(this.size * this.size)
    const chosen: Candidate[] = []
    const backtracks = new Array<number>(this.lengths.length).fill(0)
    return this.placeFrom(0, occupied, chosen, backtracks) ? { ships: chosen.map((c) => c.ship) } : null
  }

  private placeFrom(
    shipIndex: number,
    occupied: Uint8Array,
    chosen: Candidate[],
    backtracks: number[]
  ): boolean {
    if (shipIndex === this.lengths.length) {
      return this.hitCells.every((cell) => occupied[cell] === 1)
    }

    const length = this.lengths[shipIndex]
    const options = this.feasibleCandidates(shipIndex, length, occupied)

    while (options.length > 0) {
      const pick = this.options.rng.weightedIndex(options.map((candidate) => candidate.weight))
      const candidate = options[pick]
      for (const cell of candidate.cells) occupied[cell] = 1
      chosen.push(candidate)

      if (this.placeFrom(shipIndex + 1, occupied, chosen, backtracks)) {
        return true
      }

      chosen.pop()
      for (const cell of candidate.cells) occupied[cell] = 0
      options.splice(pick, 1)
      backtracks[shipIndex]++
      if (backtracks[shipIndex] > this.options.maxBacktracks) {
        return false
      }
    }
    return false
  }

  private feasibleCandidates(shipIndex: number, length: number, occupied: Uint8Array): Candidate[] {
    const all = this.candidates.get(length) ?? []
    const later = this.lengths.slice(shipIndex + 1)
    const laterCells = later.reduce((sum, l) => sum + l, 0)
    const result: Candidate[] = []

    for (const candidate of all) {
      if (candidate.cells.some((cell) => occupied[cell] === 1)) continue

      for (const cell of candidate.cells) occupied[cell] = 1
      const uncovered = this.hitCells.filter((cell) => occupied[cell] === 0)
      const reachable =
        uncovered.length <= laterCells &&
        uncovered.every((hit) => this.canStillCover(hit, later, occupied))
      for (const cell of candidate.cells) occupied[cell] = 0

      if (reachable) result.push(candidate)
    }
    return result
  }

  private canStillCover(hit: number, lengths: number[], occupied: Uint8Array): boolean {
    for (const length of new Set(lengths)) {
      const list = this.candidates.get(length) ?? []
      const ids = this.coverage.get(length)?.[hit] ?? []
      if (ids.some((id) => list[id].cells.every((cell) => occupied[cell] === 0))) {
        return true
      }
    }
    return false
  }

  private enumerateCandidates(length: number, blocked: Uint8Array): Candidate[] {
    const list: Candidate[] = []
    for (const orientation of ['horizontal', 'vertical'] as const) {
      const maxRow = orientation === 'vertical' ? this.size - length : this.size - 1
      const maxCol = orientation === 'horizontal' ? this.size - length : this.size - 1
      for (let row = 0; row <= maxRow; row++) {
        for (let col = 0; col <= maxCol; col++) {
          const ship: ShipPlacement = { length, row, col, orientation }
          const cells = shipCells(ship).map((cell) => cellIndex(cell, this.size))
          if (cells.some((cell) => blocked[cell] === 1)) continue
          const weight = this.options.bias ? this.options.bias.weight(ship, this.size) : 1
          list.push({ ship, cells, weight })
        }
      }
    }
    return list
  }
}

/**
 * Samples up to `count` placements consistent with the knowledge.
 *
 * @throws SamplingExhaustedError if `count > 0` and no placement was found
 */
export function samplePlacements(
  knowledge: BoardKnowledge,
  count: number,
  options: SamplerOptions
): Placement[] {
  const sampler = new PlacementSampler(knowledge, options)
  const placements = [...sampler.stream(count)]
  if (count > 0 && placements.length === 0) {
    throw new SamplingExhaustedError(sampler.attempts)
  }
  return placements
}

/**
 * Lazy form of samplePlacements. Never throws on exhaustion; the
 * sequence simply ends early.
 */
export function placementStream(
  knowledge: BoardKnowledge,
  count: number,
  options: SamplerOptions
): Generator<Placement, void, undefined> {
  return new PlacementSampler(knowledge, options).stream(count)
}

/**
 * Checks a placement against the knowledge it was drawn from.
 */
export function isConsistentPlacement(placement: Placement, knowledge: BoardKnowledge): boolean {
  const size = knowledge.size
  const lengths = placement.ships.map((ship) => ship.length).sort((a, b) => b - a)
  const remaining = knowledge.remainingShipLengths().sort((a, b) => b - a)
  if (lengths.length !== remaining.length || lengths.some((l, i) => l !== remaining[i])) {
    return false
  }

  const covered = new Set<number>()
  for (const ship of placement.ships) {
    for (const cell of shipCells(ship)) {
      if (cell.row < 0 || cell.col < 0 || cell.row >= size || cell.col >= size) return false
      const index = cellIndex(cell, size)
      if (covered.has(index)) return false
      const status = knowledge.statusAt(cell)
      if (status === 'miss' || status === 'sunk') return false
      covered.add(index)
    }
  }
  return knowledge.unresolvedHits().every((hit) => covered.has(cellIndex(hit, size)))
}
