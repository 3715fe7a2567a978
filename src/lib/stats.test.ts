import { describe, it, expect, vi, afterEach } from 'vitest'
import { MemoryStatsStore, PerformanceTracker, SqliteStatsStore, type GameStats } from './stats'
import { createDb } from '../../shared/db/client'
import { gameStats } from '../../shared/db/schema'
import type { Difficulty } from '../../shared/db/json-schemas'

let nextId = 0

function game(difficulty: Difficulty, playerWon: boolean, overrides: Partial<GameStats> = {}): GameStats {
  nextId++
  return {
    id: `game-${nextId}`,
    difficulty,
    playerWon,
    totalTurns: 40,
    playerShots: 40,
    playerHits: 17,
    playerAccuracy: 17 / 40,
    aiShots: 40,
    aiHits: 15,
    aiAccuracy: 15 / 40,
    shipsSunkByPlayer: 5,
    shipsSunkByAi: 4,
    firstHitTurn: 3,
    firstSinkTurn: 9,
    durationMs: 60_000,
    createdAt: nextId,
    ...overrides,
  }
}

async function trackerWith(games: GameStats[]): Promise<PerformanceTracker> {
  const store = new MemoryStatsStore()
  for (const entry of games) {
    await store.save(entry)
  }
  return PerformanceTracker.open(store)
}

const repeat = (count: number, make: () => GameStats): GameStats[] => Array.from({ length: count }, make)

afterEach(() => {
  vi.restoreAllMocks()
})

describe('PerformanceTracker', () => {
  it('counts shots for both sides and stores the finished game', async () => {
    let now = 1000
    const store = new MemoryStatsStore()
    const tracker = await PerformanceTracker.open(store, () => now)

    tracker.startGame('g1', 'hard')
    expect(tracker.inGame).toBe(true)
    tracker.recordShot('ai', { kind: 'miss' })
    tracker.recordShot('player', { kind: 'hit' })
    tracker.recordShot('ai', { kind: 'hit' })
    tracker.recordShot('player', { kind: 'miss' })
    tracker.recordShot('ai', { kind: 'sunk', shipLength: 2 })
    now = 4000

    const stats = await tracker.endGame(false)
    expect(stats).toEqual({
      id: 'g1',
      difficulty: 'hard',
      playerWon: false,
      totalTurns: 3,
      playerShots: 2,
      playerHits: 1,
      playerAccuracy: 0.5,
      aiShots: 3,
      aiHits: 2,
      aiAccuracy: 2 / 3,
      shipsSunkByPlayer: 0,
      shipsSunkByAi: 1,
      firstHitTurn: 2,
      firstSinkTurn: 3,
      durationMs: 3000,
      createdAt: 4000,
    })
    expect(tracker.inGame).toBe(false)
    expect(tracker.history).toHaveLength(1)
    await expect(store.list()).resolves.toEqual([stats])
  })

  it('leaves first hit and sink empty when the engine never scored', async () => {
    const tracker = await PerformanceTracker.open(new MemoryStatsStore(), () => 0)
    tracker.startGame('g2', 'easy')
    tracker.recordShot('player', { kind: 'sunk', shipLength: 2 })
    tracker.recordShot('ai', { kind: 'miss' })
    const stats = await tracker.endGame(true)
    expect(stats?.firstHitTurn).toBeNull()
    expect(stats?.firstSinkTurn).toBeNull()
    expect(stats?.shipsSunkByPlayer).toBe(1)
    expect(stats?.totalTurns).toBe(1)
  })

  it('ignores shots and endings outside a game', async () => {
    const tracker = await PerformanceTracker.open(new MemoryStatsStore())
    tracker.recordShot('ai', { kind: 'hit' })
    await expect(tracker.endGame(true)).resolves.toBeNull()
    expect(tracker.history).toEqual([])
  })

  it('summarizes results per difficulty', async () => {
    const tracker = await trackerWith([
      game('hard', true, { playerAccuracy: 0.5, aiAccuracy: 0.25, durationMs: 100, totalTurns: 10 }),
      game('hard', false, { playerAccuracy: 0.3, aiAccuracy: 0.75, durationMs: 300, totalTurns: 20 }),
      game('easy', true),
    ])
    const summary = tracker.summary()

    expect(summary.totalGames).toBe(3)
    expect(Object.keys(summary.byDifficulty)).toEqual(['easy', 'hard'])
    const hard = summary.byDifficulty.hard
    expect(hard).toMatchObject({ gamesPlayed: 2, playerWins: 1, aiWins: 1, winRate: 0.5 })
    expect(hard?.avgPlayerAccuracy).toBeCloseTo(0.4, 10)
    expect(hard?.avgAiAccuracy).toBeCloseTo(0.5, 10)
    expect(hard?.avgDurationMs).toBe(200)
    expect(hard?.avgTurns).toBe(15)
  })

  describe('recommendDifficulty', () => {
    it('suggests medium until five games are played', async () => {
      const tracker = await trackerWith(repeat(4, () => game('nightmare', true)))
      expect(tracker.recommendDifficulty()).toBe('medium')
    })

    it('moves up from the hardest tier when the player keeps winning', async () => {
      const tracker = await trackerWith([...repeat(4, () => game('hard', true)), game('medium', true)])
      expect(tracker.recommendDifficulty()).toBe('expert')
    })

    it('moves down when the player keeps losing', async () => {
      const tracker = await trackerWith(repeat(5, () => game('hard', false)))
      expect(tracker.recommendDifficulty()).toBe('medium')
    })

    it('keeps the last tier for mixed results', async () => {
      const tracker = await trackerWith([
        game('hard', true),
        game('hard', false),
        game('expert', true),
        game('expert', false),
        game('medium', false),
      ])
      expect(tracker.recommendDifficulty()).toBe('medium')
    })

    it('stays within the tier range', async () => {
      const top = await trackerWith(repeat(5, () => game('nightmare', true)))
      expect(top.recommendDifficulty()).toBe('nightmare')
      const bottom = await trackerWith(repeat(5, () => game('easy', false)))
      expect(bottom.recommendDifficulty()).toBe('easy')
    })

    it('only looks at the last ten games', async () => {
      const tracker = await trackerWith([
        ...repeat(5, () => game('expert', false)),
        ...repeat(10, () => game('medium', true)),
      ])
      expect(tracker.recommendDifficulty()).toBe('hard')
    })
  })
})

describe('SqliteStatsStore', () => {
  it('round-trips games oldest first', async () => {
    const store = new SqliteStatsStore(createDb())
    const later = game('expert', false, { createdAt: 200, firstSinkTurn: null })
    const earlier = game('medium', true, { createdAt: 100, playerShots: 4, playerHits: 1, playerAccuracy: 0.25 })
    await store.save(later)
    await store.save(earlier)

    await expect(store.list()).resolves.toEqual([earlier, later])
  })

  it('feeds a tracker its history', async () => {
    const db = createDb()
    const store = new SqliteStatsStore(db)
    for (const entry of repeat(5, () => game('hard', true))) {
      await store.save(entry)
    }
    const tracker = await PerformanceTracker.open(new SqliteStatsStore(db))
    expect(tracker.history).toHaveLength(5)
    expect(tracker.recommendDifficulty()).toBe('expert')
  })

  it('skips rows with an unknown difficulty', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const db = createDb()
    db.insert(gameStats)
      .values({
        id: 'odd',
        difficulty: 'impossible',
        playerWon: 0,
        totalTurns: 1,
        playerShots: 1,
        playerHits: 0,
        aiShots: 1,
        aiHits: 0,
        shipsSunkByPlayer: 0,
        shipsSunkByAi: 0,
        durationMs: 10,
        createdAt: 1,
      })
      .run()

    await expect(new SqliteStatsStore(db).list()).resolves.toEqual([])
    expect(warn).toHaveBeenCalledWith('[stats]', 'Skipping game odd with unknown difficulty "impossible"')
  })
})
