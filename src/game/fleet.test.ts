import { describe, it, expect } from 'vitest'
import {
  cellAt,
  cellIndex,
  createFleetBoard,
  fireAt,
  fleetFitsGrid,
  formatCell,
  isFleetDestroyed,
  isValidLayout,
  neighbors,
  placeFleetRandomly,
  shipCells,
  type ShipPlacement,
} from './fleet'
import { createRng } from '../ai/rng'

describe('cell helpers', () => {
  it('converts between cells and row-major indices', () => {
    expect(cellIndex({ row: 3, col: 7 }, 10)).toBe(37)
    expect(cellAt(37, 10)).toEqual({ row: 3, col: 7 })
  })

  it('formats cells as (row,col)', () => {
    expect(formatCell({ row: 2, col: 9 })).toBe('(2,9)')
  })

  it('lists neighbours up, right, down, left and drops off-board ones', () => {
    expect(neighbors({ row: 3, col: 3 }, 10)).toEqual([
      { row: 2, col: 3 },
      { row: 3, col: 4 },
      { row: 4, col: 3 },
      { row: 3, col: 2 },
    ])
    expect(neighbors({ row: 0, col: 0 }, 10)).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
    ])
  })

  it('lays ship cells out from the anchor', () => {
    expect(shipCells({ length: 3, row: 1, col: 2, orientation: 'vertical' })).toEqual([
      { row: 1, col: 2 },
      { row: 2, col: 2 },
      { row: 3, col: 2 },
    ])
  })
})

describe('layout validation', () => {
  it('rejects ships that leave the grid', () => {
    expect(isValidLayout([{ length: 3, row: 0, col: 8, orientation: 'horizontal' }], 10)).toBe(false)
    expect(isValidLayout([{ length: 3, row: 0, col: 7, orientation: 'horizontal' }], 10)).toBe(true)
  })

  it('rejects overlapping ships', () => {
    const ships: ShipPlacement[] = [
      { length: 3, row: 2, col: 2, orientation: 'horizontal' },
      { length: 2, row: 1, col: 3, orientation: 'vertical' },
    ]
    expect(isValidLayout(ships, 10)).toBe(false)
  })

  it('checks that a fleet can fit a grid', () => {
    expect(fleetFitsGrid([5, 4, 3, 3, 2], 10)).toBe(true)
    expect(fleetFitsGrid([6], 5)).toBe(false)
    expect(fleetFitsGrid([2, 2, 2], 2)).toBe(false)
  })
})

describe('referee board', () => {
  const ships: ShipPlacement[] = [
    { length: 2, row: 0, col: 0, orientation: 'horizontal' },
    { length: 3, row: 2, col: 4, orientation: 'vertical' },
  ]

  it('answers miss, hit and sunk', () => {
    const board = createFleetBoard(ships, 6)
    expect(fireAt(board, { row: 5, col: 5 })).toEqual({ kind: 'miss' })
    expect(fireAt(board, { row: 0, col: 0 })).toEqual({ kind: 'hit' })
    expect(fireAt(board, { row: 0, col: 1 })).toEqual({ kind: 'sunk', shipLength: 2 })
    expect(isFleetDestroyed(board)).toBe(false)

    fireAt(board, { row: 2, col: 4 })
    fireAt(board, { row: 3, col: 4 })
    expect(fireAt(board, { row: 4, col: 4 })).toEqual({ kind: 'sunk', shipLength: 3 })
    expect(isFleetDestroyed(board)).toBe(true)
  })

  it('refuses repeated and off-board shots', () => {
    const board = createFleetBoard(ships, 6)
    fireAt(board, { row: 1, col: 1 })
    expect(() => fireAt(board, { row: 1, col: 1 })).toThrow('Cell (1,1) was already shot')
    expect(() => fireAt(board, { row: 6, col: 0 })).toThrow('Shot (6,0) is off the board')
  })

  it('refuses invalid layouts', () => {
    expect(() => createFleetBoard([{ length: 4, row: 0, col: 3, orientation: 'horizontal' }], 6)).toThrow(
      'Fleet layout overlaps or leaves the grid'
    )
  })

  it('places a random fleet that is valid and reproducible', () => {
    const first = placeFleetRandomly([5, 4, 3, 3, 2], 10, createRng(42))
    const second = placeFleetRandomly([5, 4, 3, 3, 2], 10, createRng(42))
    expect(first).toEqual(second)
    expect(first.map((ship) => ship.length)).toEqual([5, 4, 3, 3, 2])
    expect(isValidLayout(first, 10)).toBe(true)
  })
})
