/**
 * Board Consistency
 *
 * Answers whether a board's statuses can still come from a real layout of
 * the ships afloat, and chooses which hit cells each sunk ship occupied.
 * A sunk report only names one cell and a length, so when ships touch the
 * run is ambiguous and a later miss can rule out an earlier reading.
 */

import { type Cell, type CellStatus, cellIndex } from './fleet'

/** A sunk report as received: the cell that sank the ship and its length */
export interface SunkReport {
  cell: Cell
  length: number
}

/**
 * Every straight run of `length` cells through `cell` that fits the grid,
 * horizontal runs first, then lowest start.
 */
export function runsThrough(cell: Cell, length: number, size: number): Cell[][] {
  const runs: Cell[][] = []
  for (const horizontal of [true, false]) {
    const fixed = horizontal ? cell.row : cell.col
    const moving = horizontal ? cell.col : cell.row
    for (let start = moving - length + 1; start <= moving; start++) {
      if (start < 0 || start + length > size) continue
      const run: Cell[] = []
      for (let i = 0; i < length; i++) {
        run.push(horizontal ? { row: fixed, col: start + i } : { row: start + i, col: fixed })
      }
      runs.push(run)
    }
  }
  return runs
}

/**
 * True if the ships in `lengths` fit the board without overlapping, with
 * none on a miss or sunk cell and every hit covered.
 */
export function canCoverHits(statuses: readonly CellStatus[], size: number, lengths: readonly number[]): boolean {
  const occupied = new Uint8Array(size * size)
  const open = (index: number) => !occupied[index] && (statuses[index] === 'unknown' || statuses[index] === 'hit')

  const tryRun = (run: number[], next: () => boolean): boolean => {
    if (!run.every(open)) return false
    for (const index of run) occupied[index] = 1
    if (next()) return true
    for (const index of run) occupied[index] = 0
    return false
  }

  // hits first: the lowest uncovered hit must belong to one of the pending ships
  const coverHits = (pending: number[]): boolean => {
    const target = statuses.findIndex((status, index) => status === 'hit' && !occupied[index])
    if (target === -1) return placeRest(pending, 0)
    const cell = { row: Math.floor(target / size), col: target % size }
    const tried = new Set<number>()
    for (let k = 0; k < pending.length; k++) {
      const length = pending[k]
      if (tried.has(length)) continue
      tried.add(length)
      const rest = [...pending.slice(0, k), ...pending.slice(k + 1)]
      for (const run of runsThrough(cell, length, size)) {
        if (tryRun(run.map((member) => cellIndex(member, size)), () => coverHits(rest))) return true
      }
    }
    return false
  }

  // then the ships no hit pins down, longest first; equal lengths in increasing position
  const placeRest = (pending: number[], from: number): boolean => {
    if (pending.length === 0) return true
    let room = 0
    for (let index = 0; index < statuses.length; index++) if (open(index)) room++
    if (room < pending.reduce((sum, length) => sum + length, 0)) return false
    const [length, ...rest] = pending
    const nextFrom = (start: number) => (rest[0] === length ? start : 0)
    for (let start = from; start < size * size; start++) {
      const row = Math.floor(start / size)
      const col = start % size
      if (col + length <= size) {
        const run = Array.from({ length }, (_, i) => start + i)
        if (tryRun(run, () => placeRest(rest, nextFrom(start)))) return true
      }
      if (length > 1 && row + length <= size) {
        const run = Array.from({ length }, (_, i) => start + i * size)
        if (tryRun(run, () => placeRest(rest, nextFrom(start)))) return true
      }
    }
    return false
  }

  return coverHits([...lengths].sort((a, b) => b - a))
}

/**
 * Chooses the cells of every sunk ship so that the rest of the board stays
 * consistent with the ships afloat.
 *
 * @param statuses - Board statuses with every sunk cell read as a hit
 * @param reports - Sunk reports in the order they arrived
 * @param afloat - Lengths of the ships not yet sunk
 * @param current - Runs currently assigned to the reports, tried first
 * @returns one run per report, or null if no choice keeps the board consistent
 */
export function assignSunkRuns(
  statuses: readonly CellStatus[],
  size: number,
  reports: readonly SunkReport[],
  afloat: readonly number[],
  current: readonly Cell[][] = []
): Cell[][] | null {
  const marks = [...statuses]
  const chosen: Cell[][] = []

  const candidates = (slot: number): Cell[][] => {
    const { cell, length } = reports[slot]
    const runs = runsThrough(cell, length, size)
    const held = current[slot]
    if (held === undefined) return runs
    const key = (run: Cell[]) => run.map((member) => cellIndex(member, size)).join(',')
    const heldKey = key(held)
    return [held, ...runs.filter((run) => key(run) !== heldKey)]
  }

  const assign = (slot: number): boolean => {
    if (slot === reports.length) return canCoverHits(marks, size, afloat)
    for (const run of candidates(slot)) {
      const indices = run.map((member) => cellIndex(member, size))
      if (!indices.every((index) => marks[index] === 'hit')) continue
      for (const index of indices) marks[index] = 'sunk'
      chosen.push(run)
      if (assign(slot + 1)) return true
      chosen.pop()
      for (const index of indices) marks[index] = 'hit'
    }
    return false
  }

  return assign(0) ? chosen : null
}
