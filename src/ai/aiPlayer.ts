/**
 * AI Player
 *
 * One game from the engine's side: its own board knowledge, a difficulty
 * fixed at creation, and the tier's human touches (an occasional random
 * shot instead of the chosen one, a think time for the caller to show).
 * At game end the opponent's layout goes into the placement model.
 */

import { randomUUID } from 'node:crypto'
import type { Difficulty, TierBehavior } from '../../shared/db/json-schemas'
import {
  type Cell,
  type FleetBoard,
  type ShipPlacement,
  type ShotOutcome,
  fireAt,
  isFleetDestroyed,
  isValidLayout,
  sameCell,
} from '../game/fleet'
import { BoardStateTracker } from '../game/tracker'
import { InvalidStateError } from '../lib/errorUtils'
import type { GameStats, PerformanceTracker } from '../lib/stats'
import { type Rng, createRng } from './rng'
import type { StrategySelector, TargetDecision } from './selector'

export interface AiPlayerOptions {
  selector: StrategySelector
  /** Defaults to the selector config's difficulty */
  difficulty?: Difficulty
  seed?: string | number
  stats?: PerformanceTracker | null
  gameId?: string
  /** Milliseconds, for search time budgets */
  clock?: () => number
}

export interface AiTurn {
  /** Shot to fire */
  cell: Cell
  /** What the strategy chose, before any mistake */
  decision: TargetDecision
  /** True when the error rate replaced the chosen cell */
  mistake: boolean
  /** Delay the caller should show before revealing the shot */
  thinkTimeMs: number
}

export class AiPlayer {
  readonly difficulty: Difficulty
  readonly gameId: string
  readonly tracker: BoardStateTracker
  private readonly selector: StrategySelector
  private readonly behavior: TierBehavior
  private readonly rng: Rng
  private readonly stats: PerformanceTracker | null
  private readonly clock: (() => number) | undefined
  private finished = false

  constructor(options: AiPlayerOptions) {
    const { config } = options.selector
    this.selector = options.selector
    this.difficulty = options.difficulty ?? config.difficulty
    this.behavior = config.tiers[this.difficulty]
    this.gameId = options.gameId ?? randomUUID()
    this.rng = createRng(options.seed)
    this.stats = options.stats ?? null
    this.clock = options.clock
    this.tracker = new BoardStateTracker(config.gridSize, config.fleet)
    this.stats?.startGame(this.gameId, this.difficulty)
  }

  get thinkTimeMs(): number {
    return this.behavior.thinkTimeMs
  }

  get isFinished(): boolean {
    return this.finished
  }

  /**
   * Picks the next shot.
   *
   * @throws InvalidStateError if the game is over or no target remains
   * @throws SearchCancelledError if the signal aborts the search
   */
  async takeTurn(signal?: AbortSignal): Promise<AiTurn> {
    if (this.finished) {
      throw new InvalidStateError(`Game ${this.gameId} has ended`)
    }
    if (this.tracker.isComplete()) {
      throw new InvalidStateError('Every ship is already sunk')
    }

    const decision = await this.selector.decide(this.difficulty, this.tracker, {
      rng: this.rng,
      signal,
      clock: this.clock,
    })

    let cell = decision.cell
    let mistake = false
    if (this.behavior.errorRate > 0 && this.rng.next() < this.behavior.errorRate) {
      const alternatives = this.tracker.validTargets().filter((target) => !sameCell(target, cell))
      if (alternatives.length > 0) {
        cell = alternatives[this.rng.int(alternatives.length)]
        mistake = true
      }
    }

    return { cell, decision, mistake, thinkTimeMs: this.behavior.thinkTimeMs }
  }

  /**
   * Records the referee's answer to one of our shots.
   */
  recordResult(cell: Cell, outcome: ShotOutcome): void {
    this.tracker.recordResult(cell, outcome)
    this.stats?.recordShot('ai', outcome)
  }

  /**
   * Records the outcome of one of the opponent's shots, for statistics only.
   */
  recordOpponentShot(outcome: ShotOutcome): void {
    this.stats?.recordShot('player', outcome)
  }

  /**
   * Closes the game: the opponent's final layout feeds the placement model
   * and the game's statistics are stored.
   *
   * @throws InvalidStateError if called twice or with an impossible layout
   */
  async endGame(opponentShips: readonly ShipPlacement[], playerWon: boolean): Promise<GameStats | null> {
    if (this.finished) {
      throw new InvalidStateError(`Game ${this.gameId} has already ended`)
    }
    const size = this.tracker.size
    if (!isValidLayout(opponentShips, size)) {
      throw new InvalidStateError('Opponent layout does not fit the board')
    }
    this.finished = true

    if (this.selector.model) {
      await this.selector.model.recordGame(opponentShips, size)
    }
    return this.stats ? this.stats.endGame(playerWon) : null
  }
}

/**
 * Lets the player shoot at a referee board until every ship is sunk.
 *
 * @returns Shots fired
 */
export async function playOut(player: AiPlayer, board: FleetBoard, maxShots = board.size * board.size): Promise<number> {
  let shots = 0
  while (!isFleetDestroyed(board) && shots < maxShots) {
    const { cell } = await player.takeTurn()
    player.recordResult(cell, fireAt(board, cell))
    shots++
  }
  return shots
}
