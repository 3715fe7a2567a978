import SQLite from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { sql } from 'drizzle-orm'
import * as schema from './schema'

/**
 * Create a Drizzle database client over a SQLite file.
 * Tables are created when missing, so a fresh file (or ':memory:') is usable
 * straight away.
 *
 * @example
 * ```typescript
 * const db = createDb('./data/broadside.db')
 * const rows = db.select().from(schema.gameStats).all()
 * ```
 */
export function createDb(filename = ':memory:') {
  const db = drizzle(new SQLite(filename), { schema })
  ensureSchema(db)
  return db
}

export type Database = ReturnType<typeof createDb>

function ensureSchema(db: BetterSQLite3Database<typeof schema>): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS placement_frequencies (
      buckets_per_axis INTEGER NOT NULL,
      key TEXT NOT NULL,
      length INTEGER NOT NULL,
      orientation TEXT NOT NULL,
      bucket_row INTEGER NOT NULL,
      bucket_col INTEGER NOT NULL,
      count INTEGER NOT NULL DEFAULT 0,
      updated_at INTEGER NOT NULL,
      PRIMARY KEY (buckets_per_axis, key)
    )
  `)
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_placement_frequencies_length ON placement_frequencies (length)`)
  db.run(sql`
    CREATE TABLE IF NOT EXISTS game_stats (
      id TEXT PRIMARY KEY,
      difficulty TEXT NOT NULL,
      player_won INTEGER NOT NULL,
      total_turns INTEGER NOT NULL,
      player_shots INTEGER NOT NULL,
      player_hits INTEGER NOT NULL,
      ai_shots INTEGER NOT NULL,
      ai_hits INTEGER NOT NULL,
      ships_sunk_by_player INTEGER NOT NULL,
      ships_sunk_by_ai INTEGER NOT NULL,
      first_hit_turn INTEGER,
      first_sink_turn INTEGER,
      duration_ms INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    )
  `)
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_game_stats_difficulty ON game_stats (difficulty)`)
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_game_stats_created ON game_stats (created_at)`)
}
