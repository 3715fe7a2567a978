/**
 * Performance Tracking
 *
 * Per-game shot statistics for both sides, summaries by difficulty, and a
 * difficulty recommendation from the opponent's recent results.
 */

import { asc, sql } from 'drizzle-orm'
import type { Database } from '../../shared/db/client'
import { type Difficulty, DIFFICULTIES, difficultySchema } from '../../shared/db/json-schemas'
import { gameStats } from '../../shared/db/schema'
import type { ShotOutcome } from '../game/fleet'
import { logWarning } from './errorUtils'

export type Shooter = 'player' | 'ai'

export interface GameStats {
  id: string
  difficulty: Difficulty
  playerWon: boolean
  /** Rounds of one shot per side, a lone last shot counting as a round */
  totalTurns: number
  playerShots: number
  playerHits: number
  playerAccuracy: number
  aiShots: number
  aiHits: number
  aiAccuracy: number
  shipsSunkByPlayer: number
  shipsSunkByAi: number
  /** Round of the engine's first hit; null if it never hit */
  firstHitTurn: number | null
  /** Round of the engine's first sink; null if it never sank a ship */
  firstSinkTurn: number | null
  durationMs: number
  createdAt: number
}

export interface DifficultySummary {
  gamesPlayed: number
  playerWins: number
  aiWins: number
  /** Player's win rate */
  winRate: number
  avgPlayerAccuracy: number
  avgAiAccuracy: number
  avgDurationMs: number
  avgTurns: number
}

export interface StatsSummary {
  totalGames: number
  byDifficulty: Partial<Record<Difficulty, DifficultySummary>>
}

// ============================================================================
// STORES
// ============================================================================

export interface GameStatsStore {
  save(stats: GameStats): Promise<void>
  /** Oldest first */
  list(): Promise<GameStats[]>
}

export class MemoryStatsStore implements GameStatsStore {
  private readonly games: GameStats[] = []

  async save(stats: GameStats): Promise<void> {
    this.games.push({ ...stats })
  }

  async list(): Promise<GameStats[]> {
    return this.games.map((game) => ({ ...game }))
  }
}

function accuracy(hits: number, shots: number): number {
  return shots > 0 ? hits / shots : 0
}

export class SqliteStatsStore implements GameStatsStore {
  constructor(private readonly db: Database) {}

  async save(stats: GameStats): Promise<void> {
    this.db
      .insert(gameStats)
      .values({
        id: stats.id,
        difficulty: stats.difficulty,
        playerWon: stats.playerWon ? 1 : 0,
        totalTurns: stats.totalTurns,
        playerShots: stats.playerShots,
        playerHits: stats.playerHits,
        aiShots: stats.aiShots,
        aiHits: stats.aiHits,
        shipsSunkByPlayer: stats.shipsSunkByPlayer,
        shipsSunkByAi: stats.shipsSunkByAi,
        firstHitTurn: stats.firstHitTurn,
        firstSinkTurn: stats.firstSinkTurn,
        durationMs: stats.durationMs,
        createdAt: stats.createdAt,
      })
      .run()
  }

  async list(): Promise<GameStats[]> {
    const rows = this.db
      .select()
      .from(gameStats)
      .orderBy(asc(gameStats.createdAt), sql`rowid`)
      .all()

    const games: GameStats[] = []
    for (const row of rows) {
      const difficulty = difficultySchema.safeParse(row.difficulty)
      if (!difficulty.success) {
        logWarning('stats', `Skipping game ${row.id} with unknown difficulty "${row.difficulty}"`)
        continue
      }
      games.push({
        id: row.id,
        difficulty: difficulty.data,
        playerWon: row.playerWon === 1,
        totalTurns: row.totalTurns,
        playerShots: row.playerShots,
        playerHits: row.playerHits,
        playerAccuracy: accuracy(row.playerHits, row.playerShots),
        aiShots: row.aiShots,
        aiHits: row.aiHits,
        aiAccuracy: accuracy(row.aiHits, row.aiShots),
        shipsSunkByPlayer: row.shipsSunkByPlayer,
        shipsSunkByAi: row.shipsSunkByAi,
        firstHitTurn: row.firstHitTurn,
        firstSinkTurn: row.firstSinkTurn,
        durationMs: row.durationMs,
        createdAt: row.createdAt,
      })
    }
    return games
  }
}

// ============================================================================
// TRACKER
// ============================================================================

interface CurrentGame {
  id: string
  difficulty: Difficulty
  startedAt: number
  shots: number
  playerShots: number
  playerHits: number
  aiShots: number
  aiHits: number
  shipsSunkByPlayer: number
  shipsSunkByAi: number
  firstHitTurn: number | null
  firstSinkTurn: number | null
}

const MIN_GAMES_FOR_RECOMMENDATION = 5
const RECENT_WINDOW = 10

export class PerformanceTracker {
  private current: CurrentGame | null = null
  private readonly games: GameStats[]

  private constructor(
    private readonly store: GameStatsStore,
    history: GameStats[],
    private readonly clock: () => number
  ) {
    this.games = history
  }

  static async open(
    store: GameStatsStore,
    clock: () => number = Date.now
  ): Promise<PerformanceTracker> {
    return new PerformanceTracker(store, await store.list(), clock)
  }

  get history(): readonly GameStats[] {
    return this.games
  }

  get inGame(): boolean {
    return this.current !== null
  }

  startGame(id: string, difficulty: Difficulty): void {
    this.current = {
      id,
      difficulty,
      startedAt: this.clock(),
      shots: 0,
      playerShots: 0,
      playerHits: 0,
      aiShots: 0,
      aiHits: 0,
      shipsSunkByPlayer: 0,
      shipsSunkByAi: 0,
      firstHitTurn: null,
      firstSinkTurn: null,
    }
  }

  /**
   * Counts one shot. Ignored when no game is in progress.
   */
  recordShot(shooter: Shooter, outcome: ShotOutcome): void {
    const game = this.current
    if (!game) return

    game.shots++
    const turn = Math.ceil(game.shots / 2)
    const hit = outcome.kind !== 'miss'
    const sunk = outcome.kind === 'sunk'

    if (shooter === 'player') {
      game.playerShots++
      if (hit) game.playerHits++
      if (sunk) game.shipsSunkByPlayer++
      return
    }

    game.aiShots++
    if (hit) {
      game.aiHits++
      game.firstHitTurn ??= turn
    }
    if (sunk) {
      game.shipsSunkByAi++
      game.firstSinkTurn ??= turn
    }
  }

  /**
   * Closes the current game and persists it.
   *
   * @returns The finished game, or null if none was in progress
   */
  async endGame(playerWon: boolean): Promise<GameStats | null> {
    const game = this.current
    if (!game) return null
    this.current = null

    const now = this.clock()
    const stats: GameStats = {
      id: game.id,
      difficulty: game.difficulty,
      playerWon,
      totalTurns: Math.ceil(game.shots / 2),
      playerShots: game.playerShots,
      playerHits: game.playerHits,
      playerAccuracy: accuracy(game.playerHits, game.playerShots),
      aiShots: game.aiShots,
      aiHits: game.aiHits,
      aiAccuracy: accuracy(game.aiHits, game.aiShots),
      shipsSunkByPlayer: game.shipsSunkByPlayer,
      shipsSunkByAi: game.shipsSunkByAi,
      firstHitTurn: game.firstHitTurn,
      firstSinkTurn: game.firstSinkTurn,
      durationMs: now - game.startedAt,
      createdAt: now,
    }
    this.games.push(stats)
    await this.store.save(stats)
    return stats
  }

  summary(): StatsSummary {
    const byDifficulty: StatsSummary['byDifficulty'] = {}
    for (const difficulty of DIFFICULTIES) {
      const games = this.games.filter((game) => game.difficulty === difficulty)
      if (games.length === 0) continue
      const total = games.length
      const wins = games.filter((game) => game.playerWon).length
      const mean = (pick: (game: GameStats) => number): number =>
        games.reduce((sum, game) => sum + pick(game), 0) / total
      byDifficulty[difficulty] = {
        gamesPlayed: total,
        playerWins: wins,
        aiWins: total - wins,
        winRate: wins / total,
        avgPlayerAccuracy: mean((game) => game.playerAccuracy),
        avgAiAccuracy: mean((game) => game.aiAccuracy),
        avgDurationMs: mean((game) => game.durationMs),
        avgTurns: mean((game) => game.totalTurns),
      }
    }
    return { totalGames: this.games.length, byDifficulty }
  }

  /**
   * Suggests the tier for the player's next game.
   *
   * Under five games: medium. Otherwise, over the last ten games, a player
   * win rate above 0.8 moves one tier up from the hardest tier played, below
   * 0.2 one tier down from it, and anything between keeps the last tier.
   */
  recommendDifficulty(): Difficulty {
    if (this.games.length < MIN_GAMES_FOR_RECOMMENDATION) return 'medium'

    const recent = this.games.slice(-RECENT_WINDOW)
    const winRate = recent.filter((game) => game.playerWon).length / recent.length
    const hardest = Math.max(...recent.map((game) => DIFFICULTIES.indexOf(game.difficulty)))

    if (winRate > 0.8) {
      return DIFFICULTIES[Math.min(hardest + 1, DIFFICULTIES.length - 1)]
    }
    if (winRate < 0.2) {
      return DIFFICULTIES[Math.max(hardest - 1, 0)]
    }
    return recent[recent.length - 1].difficulty
  }
}
