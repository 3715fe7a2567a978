/**
 * Broadside opponent decision engine
 *
 * @example
 * ```typescript
 * import { AiPlayer, StrategySelector, parseEngineConfig } from 'broadside'
 *
 * const config = parseEngineConfig({ difficulty: 'expert' })
 * const player = new AiPlayer({ selector: new StrategySelector({ config }) })
 * const { cell } = await player.takeTurn()
 * player.recordResult(cell, { kind: 'miss' })
 * ```
 */

// Game model
export type {
  Cell,
  CellStatus,
  Orientation,
  ShotOutcome,
  ShipPlacement,
  Placement,
  FleetBoard,
} from './game/fleet'
export {
  DEFAULT_GRID_SIZE,
  DEFAULT_FLEET,
  SHIP_NAMES,
  cellIndex,
  cellAt,
  formatCell,
  shipCells,
  isValidLayout,
  createFleetBoard,
  placeFleetRandomly,
  fireAt,
  isFleetDestroyed,
} from './game/fleet'

export type { BoardKnowledge, SunkShip, KnowledgeSnapshot } from './game/tracker'
export { BoardStateTracker, knowledgeSnapshotSchema } from './game/tracker'

// Sampling and heatmaps
export type { Rng } from './ai/rng'
export { createRng } from './ai/rng'
export type { PlacementBias, SamplerOptions } from './ai/sampler'
export { PlacementSampler, samplePlacements, placementStream, isConsistentPlacement } from './ai/sampler'
export type { Heatmap, HintOptions } from './ai/heatmap'
export {
  buildHeatmap,
  buildHintHeatmap,
  mostProbableCell,
  rankTargets,
  renderHeatmap,
} from './ai/heatmap'

// Opponent placement model
export type { PlacementModelStore, BucketKey } from './ai/placementModel'
export {
  OpponentPlacementModel,
  FrequencyBias,
  JsonFilePlacementStore,
  SqlitePlacementStore,
} from './ai/placementModel'

// Strategies and search
export {
  selectRandomTarget,
  selectHuntTarget,
  selectAdaptiveTarget,
  targetModeCell,
} from './ai/strategies'
export type { MctsOptions, MctsResult, SearchInfo, StopReason } from './ai/mcts'
export { MctsSearch, selectTarget } from './ai/mcts'
export type {
  Strategy,
  StrategyKind,
  DecisionContext,
  TargetDecision,
  SelectorOptions,
} from './ai/selector'
export { StrategySelector, decide, strategyFor } from './ai/selector'
export type { AiPlayerOptions, AiTurn } from './ai/aiPlayer'
export { AiPlayer, playOut } from './ai/aiPlayer'
export * from './ai/neural'

// Configuration, errors, persistence, stats
export type { Difficulty, EngineConfig, EngineConfigInput } from '../shared/db/json-schemas'
export { DIFFICULTIES, engineConfigSchema } from '../shared/db/json-schemas'
export { parseEngineConfig, loadEngineConfig } from './lib/config'
export {
  EngineError,
  InvalidStateError,
  SamplingExhaustedError,
  StrategyUnavailableError,
  SearchCancelledError,
  ConfigError,
  isEngineError,
  getErrorMessage,
} from './lib/errorUtils'
export type { EngineErrorCode } from './lib/errorUtils'
export { createDb } from '../shared/db/client'
export type { Database } from '../shared/db/client'
export type { GameStats, GameStatsStore, StatsSummary } from './lib/stats'
export { PerformanceTracker, MemoryStatsStore, SqliteStatsStore } from './lib/stats'
