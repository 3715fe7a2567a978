import { describe, it, expect } from 'vitest'
import { AiPlayer, playOut } from './aiPlayer'
import { StrategySelector } from './selector'
import { OpponentPlacementModel } from './placementModel'
import { PolicyRegistry } from './neural/interface'
import {
  type ShipPlacement,
  createFleetBoard,
  isFleetDestroyed,
  sameCell,
} from '../game/fleet'
import { parseEngineConfig } from '../lib/config'
import { MemoryStatsStore, PerformanceTracker } from '../lib/stats'

/** No two ships touch, so every sunk report has one reading */
const opponentShips: ShipPlacement[] = [
  { length: 5, row: 0, col: 0, orientation: 'horizontal' },
  { length: 4, row: 2, col: 9, orientation: 'vertical' },
  { length: 3, row: 9, col: 4, orientation: 'horizontal' },
  { length: 3, row: 5, col: 5, orientation: 'vertical' },
  { length: 2, row: 7, col: 1, orientation: 'horizontal' },
]

function selectorWith(overrides: Record<string, unknown> = {}, model: OpponentPlacementModel | null = null) {
  const config = parseEngineConfig(overrides)
  return new StrategySelector({ config, model, policies: new PolicyRegistry() })
}

describe('AiPlayer', () => {
  it('takes the difficulty and think time from the config', async () => {
    const player = new AiPlayer({ selector: selectorWith({ difficulty: 'hard' }), seed: 1 })
    expect(player.difficulty).toBe('hard')
    expect(player.thinkTimeMs).toBe(1500)
    const turn = await player.takeTurn()
    expect(turn.thinkTimeMs).toBe(1500)
    expect(turn.decision.strategy).toBe('adaptive-hunt-target')
  })

  it('plays a medium game to the end', async () => {
    const board = createFleetBoard(opponentShips, 10)
    const player = new AiPlayer({ selector: selectorWith(), seed: 'medium-game' })

    const shots = await playOut(player, board)

    expect(isFleetDestroyed(board)).toBe(true)
    expect(player.tracker.isComplete()).toBe(true)
    expect(player.tracker.shotCount()).toBe(shots)
    expect(shots).toBeGreaterThanOrEqual(17)
    expect(shots).toBeLessThanOrEqual(100)
    await expect(player.takeTurn()).rejects.toThrow('Every ship is already sunk')
  })

  it('replays the same game for the same seed', async () => {
    const run = async () => {
      const board = createFleetBoard(opponentShips, 10)
      const player = new AiPlayer({ selector: selectorWith(), seed: 42 })
      await playOut(player, board)
      return player.tracker.toSnapshot()
    }
    expect(await run()).toEqual(await run())
  })

  describe('error rate', () => {
    it('always swaps the target at rate 1', async () => {
      const selector = selectorWith({ tiers: { easy: { errorRate: 1, thinkTimeMs: 0 } } })
      const player = new AiPlayer({ selector, difficulty: 'easy', seed: 3 })
      const turn = await player.takeTurn()
      expect(turn.mistake).toBe(true)
      expect(sameCell(turn.cell, turn.decision.cell)).toBe(false)
      expect(player.tracker.isValidTarget(turn.cell)).toBe(true)
    })

    it('never swaps at rate 0', async () => {
      const selector = selectorWith({ tiers: { medium: { errorRate: 0, thinkTimeMs: 0 } } })
      const player = new AiPlayer({ selector, seed: 3 })
      for (let i = 0; i < 5; i++) {
        const turn = await player.takeTurn()
        expect(turn.mistake).toBe(false)
        expect(turn.cell).toEqual(turn.decision.cell)
        player.recordResult(turn.cell, { kind: 'miss' })
      }
    })
  })

  describe('endGame', () => {
    it('feeds the placement model and closes the stats', async () => {
      const model = await OpponentPlacementModel.open(null, { bucketsPerAxis: 5 })
      let now = 1000
      const stats = await PerformanceTracker.open(new MemoryStatsStore(), () => now)
      const player = new AiPlayer({ selector: selectorWith({}, model), seed: 1, stats, gameId: 'g1' })

      player.recordResult({ row: 0, col: 0 }, { kind: 'hit' })
      player.recordOpponentShot({ kind: 'miss' })
      now = 2500

      const result = await player.endGame(opponentShips, true)
      expect(result).toMatchObject({
        id: 'g1',
        difficulty: 'medium',
        playerWon: true,
        aiShots: 1,
        aiHits: 1,
        playerShots: 1,
        playerHits: 0,
        firstHitTurn: 1,
        durationMs: 1500,
      })
      expect(model.gamesRecorded).toBe(1)
      expect(player.isFinished).toBe(true)
    })

    it('returns null without a stats tracker', async () => {
      const player = new AiPlayer({ selector: selectorWith(), seed: 1 })
      await expect(player.endGame(opponentShips, false)).resolves.toBeNull()
    })

    it('refuses to end twice or to play on', async () => {
      const player = new AiPlayer({ selector: selectorWith(), seed: 1, gameId: 'g2' })
      await player.endGame(opponentShips, false)
      await expect(player.endGame(opponentShips, false)).rejects.toThrow('Game g2 has already ended')
      await expect(player.takeTurn()).rejects.toThrow('Game g2 has ended')
    })

    it('rejects an impossible opponent layout', async () => {
      const player = new AiPlayer({ selector: selectorWith(), seed: 1 })
      const overlapping: ShipPlacement[] = [
        { length: 3, row: 0, col: 0, orientation: 'horizontal' },
        { length: 3, row: 0, col: 1, orientation: 'vertical' },
      ]
      await expect(player.endGame(overlapping, true)).rejects.toThrow('Opponent layout does not fit the board')
      expect(player.isFinished).toBe(false)
    })
  })
})
