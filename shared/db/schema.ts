import { sqliteTable, text, integer, index, primaryKey } from 'drizzle-orm/sqlite-core'

// =============================================================================
// Placement Frequencies Table
// =============================================================================

/**
 * Historical opponent ship placements, one row per
 * (bucket grid, ship length, orientation, position bucket).
 */
export const placementFrequencies = sqliteTable('placement_frequencies', {
  bucketsPerAxis: integer('buckets_per_axis').notNull(),
  key: text('key').notNull(),
  length: integer('length').notNull(),
  orientation: text('orientation', { enum: ['horizontal', 'vertical'] }).notNull(),
  bucketRow: integer('bucket_row').notNull(),
  bucketCol: integer('bucket_col').notNull(),
  count: integer('count').notNull().default(0),
  updatedAt: integer('updated_at').notNull(),
}, (table) => [
  primaryKey({ columns: [table.bucketsPerAxis, table.key] }),
  index('idx_placement_frequencies_length').on(table.length),
])

// =============================================================================
// Game Stats Table
// =============================================================================

export const gameStats = sqliteTable('game_stats', {
  id: text('id').primaryKey(),
  difficulty: text('difficulty').notNull(),
  playerWon: integer('player_won').notNull(),
  totalTurns: integer('total_turns').notNull(),
  playerShots: integer('player_shots').notNull(),
  playerHits: integer('player_hits').notNull(),
  aiShots: integer('ai_shots').notNull(),
  aiHits: integer('ai_hits').notNull(),
  shipsSunkByPlayer: integer('ships_sunk_by_player').notNull(),
  shipsSunkByAi: integer('ships_sunk_by_ai').notNull(),
  firstHitTurn: integer('first_hit_turn'),
  firstSinkTurn: integer('first_sink_turn'),
  durationMs: integer('duration_ms').notNull(),
  createdAt: integer('created_at').notNull(),
}, (table) => [
  index('idx_game_stats_difficulty').on(table.difficulty),
  index('idx_game_stats_created').on(table.createdAt),
])

export type PlacementFrequencyRow = typeof placementFrequencies.$inferSelect
export type GameStatsRow = typeof gameStats.$inferSelect
export type NewGameStatsRow = typeof gameStats.$inferInsert
