/**
 * Strategy Selector
 *
 * Maps a difficulty tier to a targeting strategy and runs it:
 *
 *   easy       random
 *   medium     hunt/target with checkerboard parity
 *   hard       hunt/target, heatmap hunt under the placement history bias
 *   expert     MCTS, fixed simulation budget
 *   master     learned policy, falling back to the expert search
 *   nightmare  MCTS, larger simulation budget capped by wall-clock time
 */

import type { Difficulty, EngineConfig, MctsBudget } from '../../shared/db/json-schemas'
import type { Cell } from '../game/fleet'
import type { BoardKnowledge } from '../game/tracker'
import {
  SearchCancelledError,
  StrategyUnavailableError,
  getErrorMessage,
  isEngineError,
  logError,
  logWarning,
} from '../lib/errorUtils'
import { buildHintHeatmap } from './heatmap'
import { MctsSearch, type SearchInfo } from './mcts'
import type { PolicyRegistry } from './neural/interface'
import { policyRegistry } from './neural/loader'
import type { OpponentPlacementModel } from './placementModel'
import type { Rng } from './rng'
import type { PlacementBias } from './sampler'
import { selectAdaptiveTarget, selectHuntTarget, selectRandomTarget } from './strategies'

// ============================================================================
// STRATEGIES
// ============================================================================

export type SearchStrategy = { kind: 'mcts'; budget: MctsBudget }

export type Strategy =
  | { kind: 'random' }
  | { kind: 'hunt-target' }
  | { kind: 'adaptive-hunt-target' }
  | SearchStrategy
  | { kind: 'learned-policy'; policyName: string; fallback: SearchStrategy }

export type StrategyKind = Strategy['kind']

/** Tiers that read the opponent placement model */
const BIASED_TIERS: ReadonlySet<Difficulty> = new Set(['hard', 'expert', 'master', 'nightmare'])

export function usesPlacementBias(difficulty: Difficulty): boolean {
  return BIASED_TIERS.has(difficulty)
}

export function strategyFor(difficulty: Difficulty, config: EngineConfig): Strategy {
  switch (difficulty) {
    case 'easy':
      return { kind: 'random' }
    case 'medium':
      return { kind: 'hunt-target' }
    case 'hard':
      return { kind: 'adaptive-hunt-target' }
    case 'expert':
      return { kind: 'mcts', budget: config.budgets.expert }
    case 'master':
      return {
        kind: 'learned-policy',
        policyName: config.policy.name,
        fallback: { kind: 'mcts', budget: config.budgets.expert },
      }
    case 'nightmare':
      return { kind: 'mcts', budget: config.budgets.nightmare }
  }
}

// ============================================================================
// DECISION
// ============================================================================

export interface DecisionContext {
  config: EngineConfig
  rng: Rng
  /** Placement history bias snapshot; ignored below Hard */
  bias?: PlacementBias | null
  policies?: PolicyRegistry
  signal?: AbortSignal
  /** Milliseconds, for the search time budget */
  clock?: () => number
}

export interface TargetDecision {
  cell: Cell
  difficulty: Difficulty
  /** Strategy that produced the cell, after any fallback */
  strategy: StrategyKind
  searchInfo: SearchInfo | null
  /** Why the learned policy was skipped, when it was */
  fallbackReason: string | null
}

/**
 * Chooses the next shot for a tier.
 *
 * @throws InvalidStateError if no valid target remains
 * @throws SamplingExhaustedError if the knowledge admits no placement
 * @throws SearchCancelledError if the signal aborts the decision
 */
export async function decide(
  difficulty: Difficulty,
  knowledge: BoardKnowledge,
  context: DecisionContext
): Promise<TargetDecision> {
  if (context.signal?.aborted) {
    throw new SearchCancelledError(0)
  }
  const scoped: DecisionContext = usesPlacementBias(difficulty) ? context : { ...context, bias: null }
  const decision = await runStrategy(strategyFor(difficulty, context.config), knowledge, scoped)
  return { ...decision, difficulty }
}

type StrategyResult = Omit<TargetDecision, 'difficulty'>

async function runStrategy(
  strategy: Strategy,
  knowledge: BoardKnowledge,
  context: DecisionContext
): Promise<StrategyResult> {
  const { config, rng } = context
  const plain = (cell: Cell): StrategyResult => ({
    cell,
    strategy: strategy.kind,
    searchInfo: null,
    fallbackReason: null,
  })

  switch (strategy.kind) {
    case 'random':
      return plain(selectRandomTarget(knowledge, rng))
    case 'hunt-target':
      return plain(selectHuntTarget(knowledge, rng))
    case 'adaptive-hunt-target':
      return plain(
        selectAdaptiveTarget(knowledge, {
          rng,
          samples: config.heatmap.samples,
          attemptMultiplier: config.sampler.attemptMultiplier,
          maxBacktracks: config.sampler.maxBacktracks,
          bias: context.bias ?? null,
        })
      )
    case 'mcts':
      return runSearch(strategy, knowledge, context)
    case 'learned-policy':
      try {
        return plain(await askPolicy(strategy.policyName, knowledge, context))
      } catch (error) {
        if (!isEngineError(error, 'STRATEGY_UNAVAILABLE')) throw error
        const reason = getErrorMessage(error)
        logWarning('selector', `${reason}; falling back to search`)
        const fallback = await runSearch(strategy.fallback, knowledge, context)
        return { ...fallback, fallbackReason: reason }
      }
  }
}

async function runSearch(
  strategy: SearchStrategy,
  knowledge: BoardKnowledge,
  context: DecisionContext
): Promise<StrategyResult> {
  const { config } = context
  const search = new MctsSearch(knowledge, {
    rng: context.rng,
    explorationConstant: config.mcts.explorationConstant,
    priorSamples: config.mcts.priorSamples,
    rolloutDepth: config.mcts.rolloutDepth,
    hitReward: config.mcts.hitReward,
    sunkBonus: config.mcts.sunkBonus,
    attemptMultiplier: config.sampler.attemptMultiplier,
    maxBacktracks: config.sampler.maxBacktracks,
    bias: context.bias ?? undefined,
    signal: context.signal,
    clock: context.clock,
  })
  const result = await search.runAsync(
    strategy.budget.simulations,
    strategy.budget.timeLimitMs,
    config.mcts.yieldEvery
  )
  if (result.info.stopReason === 'cancelled') {
    throw new SearchCancelledError(result.info.simulations)
  }
  return { cell: result.cell, strategy: 'mcts', searchInfo: result.info, fallbackReason: null }
}

/**
 * @throws StrategyUnavailableError if the policy cannot produce a valid target
 */
async function askPolicy(
  policyName: string,
  knowledge: BoardKnowledge,
  context: DecisionContext
): Promise<Cell> {
  const registry = context.policies ?? policyRegistry
  const policy = registry.require(policyName)
  const { config } = context
  const heatmap = buildHintHeatmap(knowledge, {
    samples: config.heatmap.samples,
    rng: context.rng,
    attemptMultiplier: config.sampler.attemptMultiplier,
    maxBacktracks: config.sampler.maxBacktracks,
    bias: context.bias ?? undefined,
  })
  let cell: Cell | null
  try {
    cell = await policy.suggestTarget(knowledge, heatmap)
  } catch (error) {
    if (isEngineError(error)) throw error
    logError('selector', error)
    throw new StrategyUnavailableError(`Policy "${policyName}" failed: ${getErrorMessage(error)}`)
  }
  if (cell === null || !knowledge.isValidTarget(cell)) {
    throw new StrategyUnavailableError(`Policy "${policyName}" returned no valid target`)
  }
  return cell
}

// ============================================================================
// SELECTOR
// ============================================================================

export interface SelectorOptions {
  config: EngineConfig
  /** Shared placement history; null plays without one */
  model?: OpponentPlacementModel | null
  policies?: PolicyRegistry
}

export interface TurnOptions {
  rng: Rng
  signal?: AbortSignal
  clock?: () => number
}

/**
 * Engine-wide entry point. Holds what outlives a game (config, placement
 * model, policies) and snapshots the model bias at the start of each turn.
 */
export class StrategySelector {
  readonly config: EngineConfig
  readonly model: OpponentPlacementModel | null
  readonly policies: PolicyRegistry

  constructor(options: SelectorOptions) {
    this.config = options.config
    this.model = options.model ?? null
    this.policies = options.policies ?? policyRegistry
  }

  async decide(
    difficulty: Difficulty,
    knowledge: BoardKnowledge,
    turn: TurnOptions
  ): Promise<TargetDecision> {
    const bias =
      this.model && usesPlacementBias(difficulty)
        ? await this.model.snapshot(this.config.adaptive.biasStrength)
        : null
    return decide(difficulty, knowledge, {
      config: this.config,
      rng: turn.rng,
      bias,
      policies: this.policies,
      signal: turn.signal,
      clock: turn.clock,
    })
  }
}
