/**
 * Grid and fleet model for Broadside
 *
 * Shared coordinate types, ship geometry, and a referee board that holds a
 * real (hidden) fleet and answers shots. The referee is what the game uses to
 * resolve an AI shot before the result is fed back to the tracker.
 */

import type { Rng } from '../ai/rng'

export const DEFAULT_GRID_SIZE = 10
export const DEFAULT_FLEET: readonly number[] = [5, 4, 3, 3, 2]

export const SHIP_NAMES: Record<number, string> = {
  5: 'Carrier',
  4: 'Battleship',
  3: 'Cruiser',
  2: 'Destroyer',
}

export interface Cell {
  row: number
  col: number
}

export type CellStatus = 'unknown' | 'miss' | 'hit' | 'sunk'

export type Orientation = 'horizontal' | 'vertical'

export type ShotOutcome =
  | { kind: 'miss' }
  | { kind: 'hit' }
  | { kind: 'sunk'; shipLength: number }

/**
 * One ship laid on the grid by its top-left cell.
 */
export interface ShipPlacement {
  length: number
  row: number
  col: number
  orientation: Orientation
}

/**
 * An assignment of every remaining ship length to a grid position.
 */
export interface Placement {
  ships: ShipPlacement[]
}

// ============================================================================
// CELL HELPERS
// ============================================================================

/** Orthogonal neighbour offsets in probing order: up, right, down, left. */
export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [0, 1],
  [1, 0],
  [0, -1],
]

export function cellIndex(cell: Cell, size: number): number {
  return cell.row * size + cell.col
}

export function cellAt(index: number, size: number): Cell {
  return { row: Math.floor(index / size), col: index % size }
}

export function inBounds(cell: Cell, size: number): boolean {
  return (
    Number.isInteger(cell.row) &&
    Number.isInteger(cell.col) &&
    cell.row >= 0 &&
    cell.col >= 0 &&
    cell.row < size &&
    cell.col < size
  )
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.col === b.col
}

export function formatCell(cell: Cell): string {
  return `(${cell.row},${cell.col})`
}

/**
 * In-bounds orthogonal neighbours of a cell, in search order.
 */
export function neighbors(cell: Cell, size: number): Cell[] {
  const result: Cell[] = []
  for (const [dr, dc] of NEIGHBOR_OFFSETS) {
    const next = { row: cell.row + dr, col: cell.col + dc }
    if (inBounds(next, size)) {
      result.push(next)
    }
  }
  return result
}

/**
 * Cells covered by a ship, from its anchor outward.
 */
export function shipCells(ship: ShipPlacement): Cell[] {
  const cells: Cell[] = []
  for (let i = 0; i < ship.length; i++) {
    cells.push(
      ship.orientation === 'horizontal'
        ? { row: ship.row, col: ship.col + i }
        : { row: ship.row + i, col: ship.col }
    )
  }
  return cells
}

export function fitsOnGrid(ship: ShipPlacement, size: number): boolean {
  if (ship.row < 0 || ship.col < 0) return false
  return ship.orientation === 'horizontal'
    ? ship.row < size && ship.col + ship.length <= size
    : ship.col < size && ship.row + ship.length <= size
}

/**
 * Checks that every ship fits the grid and no two ships share a cell.
 */
export function isValidLayout(ships: readonly ShipPlacement[], size: number): boolean {
  const occupied = new Set<number>()
  for (const ship of ships) {
    if (!fitsOnGrid(ship, size)) return false
    for (const cell of shipCells(ship)) {
      const index = cellIndex(cell, size)
      if (occupied.has(index)) return false
      occupied.add(index)
    }
  }
  return true
}

/**
 * Checks that a fleet can be laid on a grid at all: every ship fits, and
 * the ships do not need more cells than the grid has.
 */
export function fleetFitsGrid(fleet: readonly number[], size: number): boolean {
  const totalCells = fleet.reduce((sum, length) => sum + length, 0)
  return fleet.every((length) => length >= 1 && length <= size) && totalCells <= size * size
}

// ============================================================================
// REFEREE BOARD
// ============================================================================

interface ShipOnBoard {
  placement: ShipPlacement
  hits: number
}

/**
 * A board holding the real fleet of one player.
 */
export interface FleetBoard {
  readonly size: number
  readonly ships: readonly ShipPlacement[]
  /** Ship id per cell index, -1 for water */
  readonly occupancy: Int16Array
  readonly shipState: ShipOnBoard[]
  readonly shots: Set<number>
}

/**
 * Creates a board from an explicit layout.
 *
 * @throws Error if the layout overlaps or leaves the grid
 */
export function createFleetBoard(ships: readonly ShipPlacement[], size = DEFAULT_GRID_SIZE): FleetBoard {
  if (!isValidLayout(ships, size)) {
    throw new Error('Fleet layout overlaps or leaves the grid')
  }
  const occupancy = new Int16Array(size * size).fill(-1)
  ships.forEach((ship, id) => {
    for (const cell of shipCells(ship)) {
      occupancy[cellIndex(cell, size)] = id
    }
  })
  return {
    size,
    ships: [...ships],
    occupancy,
    shipState: ships.map((placement) => ({ placement, hits: 0 })),
    shots: new Set(),
  }
}

/**
 * Lays out a fleet at random, longest ship first.
 */
export function placeFleetRandomly(
  fleet: readonly number[],
  size: number,
  rng: Rng
): ShipPlacement[] {
  if (!fleetFitsGrid(fleet, size)) {
    throw new Error(`Fleet [${fleet.join(', ')}] does not fit a ${size}x${size} grid`)
  }
  const lengths = [...fleet].sort((a, b) => b - a)

  for (let attempt = 0; attempt < 1000; attempt++) {
    const placed: ShipPlacement[] = []
    let failed = false
    for (const length of lengths) {
      const options: ShipPlacement[] = []
      for (const orientation of ['horizontal', 'vertical'] as const) {
        for (let row = 0; row < size; row++) {
          for (let col = 0; col < size; col++) {
            const ship = { length, row, col, orientation }
            if (isValidLayout([...placed, ship], size)) {
              options.push(ship)
            }
          }
        }
      }
      if (options.length === 0) {
        failed = true
        break
      }
      placed.push(options[rng.int(options.length)])
    }
    if (!failed) return placed
  }
  throw new Error('Could not lay out fleet')
}

/**
 * Resolves a shot against the real fleet.
 *
 * @throws Error if the cell is out of bounds or was already shot
 */
export function fireAt(board: FleetBoard, cell: Cell): ShotOutcome {
  if (!inBounds(cell, board.size)) {
    throw new Error(`Shot ${formatCell(cell)} is off the board`)
  }
  const index = cellIndex(cell, board.size)
  if (board.shots.has(index)) {
    throw new Error(`Cell ${formatCell(cell)} was already shot`)
  }
  board.shots.add(index)

  const shipId = board.occupancy[index]
  if (shipId < 0) {
    return { kind: 'miss' }
  }
  const ship = board.shipState[shipId]
  ship.hits++
  if (ship.hits === ship.placement.length) {
    return { kind: 'sunk', shipLength: ship.placement.length }
  }
  return { kind: 'hit' }
}

export function isFleetDestroyed(board: FleetBoard): boolean {
  return board.shipState.every((ship) => ship.hits === ship.placement.length)
}
