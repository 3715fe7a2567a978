/**
 * Board State Tracker
 *
 * Holds what the attacking player knows about one opposing board: the status
 * of every cell and which ship lengths are still afloat. Strategies only ever
 * see the read-only BoardKnowledge view.
 */

import { z } from 'zod'
import { InvalidStateError } from '../lib/errorUtils'
import { type SunkReport, assignSunkRuns, canCoverHits } from './consistency'
import {
  type Cell,
  type CellStatus,
  type ShotOutcome,
  cellAt,
  cellIndex,
  fleetFitsGrid,
  formatCell,
  inBounds,
} from './fleet'

export interface SunkShip {
  length: number
  cells: Cell[]
}

/**
 * Read-only view of the attacker's knowledge of one board.
 */
export interface BoardKnowledge {
  readonly size: number
  /** Throws for a cell off the board */
  statusAt(cell: Cell): CellStatus
  isValidTarget(cell: Cell): boolean
  /** Unknown cells in row-major order */
  validTargets(): Cell[]
  /** Hit cells whose ship is not yet confirmed sunk, row-major */
  unresolvedHits(): Cell[]
  remainingShipLengths(): number[]
  remainingShipCells(): number
  sunkShips(): readonly SunkShip[]
}

const STATUS_CHARS: Record<CellStatus, string> = {
  unknown: '.',
  miss: 'o',
  hit: 'X',
  sunk: '#',
}

const cellSchema = z.object({
  row: z.number().int().min(0),
  col: z.number().int().min(0),
})

/**
 * Plain JSON form of a tracker, e.g. knowledge received over the wire.
 * Rows use '.' unknown, 'o' miss, 'X' hit, '#' sunk.
 */
export const knowledgeSnapshotSchema = z.object({
  size: z.number().int().min(1),
  rows: z.array(z.string().regex(/^[.oX#]*$/)),
  remaining: z.array(z.number().int().min(1)),
  sunk: z.array(z.object({ length: z.number().int().min(1), cells: z.array(cellSchema) })),
})

export type KnowledgeSnapshot = z.infer<typeof knowledgeSnapshotSchema>

export class BoardStateTracker implements BoardKnowledge {
  readonly size: number
  private statuses: CellStatus[]
  private remaining: number[]
  private sunk: SunkShip[] = []
  private reports: SunkReport[] = []
  private shots = 0
  private hits = 0

  /**
   * @param size - Grid edge length
   * @param fleet - Lengths of every ship on the opposing board
   */
  constructor(size: number, fleet: readonly number[]) {
    if (!fleetFitsGrid(fleet, size)) {
      throw new InvalidStateError(`Fleet [${fleet.join(', ')}] does not fit a ${size}x${size} grid`)
    }
    this.size = size
    this.statuses = Array<CellStatus>(size * size).fill('unknown')
    this.remaining = [...fleet].sort((a, b) => b - a)
  }

  /**
   * Rebuilds a tracker from its JSON snapshot.
   *
   * @throws InvalidStateError if the snapshot is malformed
   */
  static fromSnapshot(input: unknown): BoardStateTracker {
    const parsed = knowledgeSnapshotSchema.safeParse(input)
    if (!parsed.success) {
      throw new InvalidStateError(`Malformed knowledge snapshot: ${parsed.error.message}`)
    }
    const snapshot = parsed.data
    const fleet = [...snapshot.remaining, ...snapshot.sunk.map((ship) => ship.length)]
    const tracker = new BoardStateTracker(snapshot.size, fleet)
    if (snapshot.rows.length !== snapshot.size) {
      throw new InvalidStateError(`Snapshot has ${snapshot.rows.length} rows, expected ${snapshot.size}`)
    }

    snapshot.rows.forEach((line, row) => {
      if (line.length !== snapshot.size) {
        throw new InvalidStateError(`Snapshot row ${row} has length ${line.length}`)
      }
      for (let col = 0; col < line.length; col++) {
        const status = statusFromChar(line[col])
        tracker.statuses[row * snapshot.size + col] = status
        if (status !== 'unknown') tracker.shots++
        if (status === 'hit' || status === 'sunk') tracker.hits++
      }
    })

    for (const ship of snapshot.sunk) {
      if (ship.cells.length !== ship.length) {
        throw new InvalidStateError(`Sunk ship of length ${ship.length} lists ${ship.cells.length} cells`)
      }
      for (const cell of ship.cells) {
        if (!inBounds(cell, snapshot.size) || tracker.statusAt(cell) !== 'sunk') {
          throw new InvalidStateError(`Sunk ship cell ${formatCell(cell)} is not marked sunk`)
        }
      }
    }
    tracker.remaining = [...snapshot.remaining].sort((a, b) => b - a)
    tracker.sunk = snapshot.sunk.map((ship) => ({ length: ship.length, cells: [...ship.cells] }))
    tracker.reports = snapshot.sunk.map((ship) => ({ cell: ship.cells[0], length: ship.length }))
    return tracker
  }

  // ==========================================================================
  // RECORDING
  // ==========================================================================

  /**
   * Records the outcome of a shot.
   *
   * @throws InvalidStateError for an out-of-bounds or already resolved cell,
   *   or an outcome that contradicts what is already known
   */
  recordResult(cell: Cell, outcome: ShotOutcome): void {
    if (!inBounds(cell, this.size)) {
      throw new InvalidStateError(`Cell ${formatCell(cell)} is outside the ${this.size}x${this.size} grid`)
    }
    const current = this.statusAt(cell)
    if (current !== 'unknown') {
      throw new InvalidStateError(`Cell ${formatCell(cell)} is already resolved as ${current}`)
    }

    switch (outcome.kind) {
      case 'miss':
        this.setStatus(cell, 'miss')
        this.shots++
        this.reconcile()
        return

      case 'hit':
        if (this.unresolvedHits().length + 1 > this.remainingShipCells()) {
          throw new InvalidStateError(
            `Hit at ${formatCell(cell)} exceeds the ${this.remainingShipCells()} cells of the remaining ships`
          )
        }
        this.setStatus(cell, 'hit')
        this.shots++
        this.hits++
        this.reconcile()
        return

      case 'sunk': {
        const slot = this.remaining.indexOf(outcome.shipLength)
        if (slot === -1) {
          throw new InvalidStateError(
            `Sunk report for length ${outcome.shipLength}, but remaining ships are [${this.remaining.join(', ')}]`
          )
        }
        const afloat = this.remaining.filter((_, index) => index !== slot)
        const reports = [...this.reports, { cell, length: outcome.shipLength }]
        const base = this.statusesWithSunkAsHits()
        base[cellIndex(cell, this.size)] = 'hit'
        const runs = assignSunkRuns(base, this.size, reports, afloat, this.sunk.map((ship) => ship.cells))
        if (runs === null) {
          throw new InvalidStateError(
            `No run of ${outcome.shipLength} hit cells through ${formatCell(cell)} can form the sunk ship`
          )
        }
        this.remaining = afloat
        this.applySunkRuns(base, reports, runs)
        this.shots++
        this.hits++
        return
      }
    }
  }

  /**
   * Re-reads the sunk ships when a new miss or hit rules out their current
   * cells. Knowledge that no reading fits is left as it is.
   */
  private reconcile(): void {
    if (this.reports.length === 0) return
    if (canCoverHits(this.statuses, this.size, this.remaining)) return
    const base = this.statusesWithSunkAsHits()
    const runs = assignSunkRuns(base, this.size, this.reports, this.remaining, this.sunk.map((ship) => ship.cells))
    if (runs !== null) this.applySunkRuns(base, this.reports, runs)
  }

  private statusesWithSunkAsHits(): CellStatus[] {
    return this.statuses.map((status) => (status === 'sunk' ? 'hit' : status))
  }

  private applySunkRuns(base: CellStatus[], reports: SunkReport[], runs: Cell[][]): void {
    for (const run of runs) {
      for (const member of run) base[cellIndex(member, this.size)] = 'sunk'
    }
    this.statuses = base
    this.reports = reports
    this.sunk = runs.map((cells, index) => ({ length: reports[index].length, cells }))
  }

  private setStatus(cell: Cell, status: CellStatus): void {
    this.statuses[cellIndex(cell, this.size)] = status
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * @throws InvalidStateError for a cell off the board
   */
  statusAt(cell: Cell): CellStatus {
    if (!inBounds(cell, this.size)) {
      throw new InvalidStateError(`Cell ${formatCell(cell)} is outside the ${this.size}x${this.size} grid`)
    }
    return this.statuses[cellIndex(cell, this.size)]
  }

  isValidTarget(cell: Cell): boolean {
    return inBounds(cell, this.size) && this.statusAt(cell) === 'unknown'
  }

  validTargets(): Cell[] {
    return this.cellsWithStatus('unknown')
  }

  unresolvedHits(): Cell[] {
    return this.cellsWithStatus('hit')
  }

  remainingShipLengths(): number[] {
    return [...this.remaining]
  }

  remainingShipCells(): number {
    return this.remaining.reduce((sum, length) => sum + length, 0)
  }

  sunkShips(): readonly SunkShip[] {
    return this.sunk
  }

  shotCount(): number {
    return this.shots
  }

  hitCount(): number {
    return this.hits
  }

  /**
   * True once every ship of the fleet is confirmed sunk.
   */
  isComplete(): boolean {
    return this.remaining.length === 0
  }

  toSnapshot(): KnowledgeSnapshot {
    const rows: string[] = []
    for (let row = 0; row < this.size; row++) {
      let line = ''
      for (let col = 0; col < this.size; col++) {
        line += STATUS_CHARS[this.statusAt({ row, col })]
      }
      rows.push(line)
    }
    return {
      size: this.size,
      rows,
      remaining: this.remainingShipLengths(),
      sunk: this.sunk.map((ship) => ({ length: ship.length, cells: [...ship.cells] })),
    }
  }

  private cellsWithStatus(status: CellStatus): Cell[] {
    const cells: Cell[] = []
    for (let index = 0; index < this.statuses.length; index++) {
      if (this.statuses[index] === status) {
        cells.push(cellAt(index, this.size))
      }
    }
    return cells
  }
}

function statusFromChar(char: string): CellStatus {
  switch (char) {
    case 'o':
      return 'miss'
    case 'X':
      return 'hit'
    case '#':
      return 'sunk'
    default:
      return 'unknown'
  }
}
