/**
 * Opponent Placement Model
 *
 * Frequency table of where human opponents put their ships, keyed by ship
 * length, orientation and a coarse position bucket. The Hard tier and above
 * read it at the start of a turn to bias placement sampling; the table is
 * updated with the opponent's final layout at the end of each game.
 *
 * This is the one piece of state shared between games. Reads may overlap
 * each other but never an end-of-game write.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { and, eq } from 'drizzle-orm'
import {
  BUCKET_KEY_PATTERN,
  type FrequencyTable,
  placementModelFileSchema,
} from '../../shared/db/json-schemas'
import type { Database } from '../../shared/db/client'
import { placementFrequencies } from '../../shared/db/schema'
import type { Orientation, ShipPlacement } from '../game/fleet'
import { isMissingFile } from '../lib/config'
import { logWarning } from '../lib/errorUtils'
import { ReadWriteLock } from '../lib/rwLock'
import type { PlacementBias } from './sampler'

// ============================================================================
// BUCKETING
// ============================================================================

export interface BucketKey {
  length: number
  orientation: Orientation
  bucketRow: number
  bucketCol: number
}

/**
 * Maps a grid coordinate onto `bucketsPerAxis` evenly sized bands, so tables
 * learned on one grid size still apply to another.
 */
export function bucketOf(position: number, gridSize: number, bucketsPerAxis: number): number {
  return Math.min(bucketsPerAxis - 1, Math.floor((position * bucketsPerAxis) / gridSize))
}

export function bucketKeyOf(ship: ShipPlacement, gridSize: number, bucketsPerAxis: number): string {
  return formatBucketKey({
    length: ship.length,
    orientation: ship.orientation,
    bucketRow: bucketOf(ship.row, gridSize, bucketsPerAxis),
    bucketCol: bucketOf(ship.col, gridSize, bucketsPerAxis),
  })
}

export function formatBucketKey(key: BucketKey): string {
  return `${key.length}:${key.orientation}:${key.bucketRow}:${key.bucketCol}`
}

export function parseBucketKey(key: string): BucketKey | null {
  const match = BUCKET_KEY_PATTERN.exec(key)
  if (!match) return null
  const orientation: Orientation = match[2] === 'horizontal' ? 'horizontal' : 'vertical'
  return {
    length: Number(match[1]),
    orientation,
    bucketRow: Number(match[3]),
    bucketCol: Number(match[4]),
  }
}

/**
 * Sums two tables key by key.
 */
export function mergeTables(a: FrequencyTable, b: FrequencyTable): FrequencyTable {
  const merged: FrequencyTable = { ...a }
  for (const [key, count] of Object.entries(b)) {
    merged[key] = (merged[key] ?? 0) + count
  }
  return merged
}

// ============================================================================
// BIAS SNAPSHOT
// ============================================================================

/**
 * Immutable view of the table taken at turn start.
 *
 * For a candidate ship the smoothed historical share of its bucket is
 * compared with the uniform share; `biasStrength` blends between ignoring
 * history (0) and weighting fully by it (1):
 *
 *   weight = 1 + biasStrength * (share / uniformShare - 1)
 */
export class FrequencyBias implements PlacementBias {
  readonly biasStrength: number
  readonly bucketsPerAxis: number
  private readonly counts: ReadonlyMap<string, number>
  private readonly totalsByLength: ReadonlyMap<number, number>

  constructor(table: FrequencyTable, bucketsPerAxis: number, biasStrength: number) {
    this.bucketsPerAxis = bucketsPerAxis
    this.biasStrength = biasStrength
    this.counts = new Map(Object.entries(table))
    const totals = new Map<number, number>()
    for (const [key, count] of this.counts) {
      const parsed = parseBucketKey(key)
      if (parsed) totals.set(parsed.length, (totals.get(parsed.length) ?? 0) + count)
    }
    this.totalsByLength = totals
  }

  weight(ship: ShipPlacement, size: number): number {
    const buckets = 2 * this.bucketsPerAxis * this.bucketsPerAxis
    const total = this.totalsByLength.get(ship.length) ?? 0
    const count = this.counts.get(bucketKeyOf(ship, size, this.bucketsPerAxis)) ?? 0
    const ratio = ((count + 1) / (total + buckets)) * buckets
    return 1 + this.biasStrength * (ratio - 1)
  }

  /** Ships of this length seen so far */
  observations(length: number): number {
    return this.totalsByLength.get(length) ?? 0
  }
}

// ============================================================================
// STORES
// ============================================================================

/**
 * Where the table lives between processes. Absence is not an error:
 * `load` resolves to null and the model starts uniform.
 */
export interface PlacementModelStore {
  load(bucketsPerAxis: number): Promise<FrequencyTable | null>
  save(table: FrequencyTable, bucketsPerAxis: number): Promise<void>
}

/**
 * JSON file store. Writes go to a temp file that is renamed into place.
 */
export class JsonFilePlacementStore implements PlacementModelStore {
  constructor(private readonly path: string) {}

  async load(bucketsPerAxis: number): Promise<FrequencyTable | null> {
    let text: string
    try {
      text = await readFile(this.path, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) return null
      throw error
    }

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch {
      logWarning('placement-model', `${this.path} is not valid JSON, starting uniform`)
      return null
    }
    const parsed = placementModelFileSchema.safeParse(raw)
    if (!parsed.success) {
      logWarning('placement-model', `${this.path} failed validation, starting uniform`)
      return null
    }
    if (parsed.data.bucketsPerAxis !== bucketsPerAxis) {
      logWarning(
        'placement-model',
        `${this.path} uses ${parsed.data.bucketsPerAxis} buckets per axis, expected ${bucketsPerAxis}; starting uniform`
      )
      return null
    }
    return parsed.data.counts
  }

  async save(table: FrequencyTable, bucketsPerAxis: number): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true })
    const tempPath = `${this.path}.tmp`
    const body = JSON.stringify({ version: 1, bucketsPerAxis, counts: table }, null, 2)
    await writeFile(tempPath, body, 'utf-8')
    await rename(tempPath, this.path)
  }
}

/**
 * SQLite store, one row per bucket. Each row carries the bucket count it was
 * counted under; load only reads rows of the requested count.
 */
export class SqlitePlacementStore implements PlacementModelStore {
  constructor(private readonly db: Database) {}

  async load(bucketsPerAxis: number): Promise<FrequencyTable | null> {
    const rows = this.db
      .select()
      .from(placementFrequencies)
      .where(eq(placementFrequencies.bucketsPerAxis, bucketsPerAxis))
      .all()
    if (rows.length === 0) {
      const other = this.db.select({ buckets: placementFrequencies.bucketsPerAxis }).from(placementFrequencies).get()
      if (other) {
        logWarning(
          'placement-model',
          `Stored counts use ${other.buckets} buckets per axis, expected ${bucketsPerAxis}; starting uniform`
        )
      }
      return null
    }

    const table: FrequencyTable = {}
    for (const row of rows) {
      table[row.key] = row.count
    }
    return table
  }

  async save(table: FrequencyTable, bucketsPerAxis: number): Promise<void> {
    const now = Date.now()
    this.db.transaction((tx) => {
      for (const [key, count] of Object.entries(table)) {
        const parsed = parseBucketKey(key)
        if (!parsed || parsed.bucketRow >= bucketsPerAxis || parsed.bucketCol >= bucketsPerAxis) continue
        const match = and(eq(placementFrequencies.bucketsPerAxis, bucketsPerAxis), eq(placementFrequencies.key, key))
        const existing = tx
          .select({ key: placementFrequencies.key })
          .from(placementFrequencies)
          .where(match)
          .get()
        if (existing) {
          tx.update(placementFrequencies)
            .set({ count, updatedAt: now })
            .where(match)
            .run()
        } else {
          tx.insert(placementFrequencies)
            .values({ bucketsPerAxis, key, ...parsed, count, updatedAt: now })
            .run()
        }
      }
    })
  }
}

// ============================================================================
// MODEL
// ============================================================================

export interface PlacementModelOptions {
  bucketsPerAxis: number
}

/**
 * Process-wide placement history with an explicit lifecycle:
 * `open` at engine start, `snapshot` at turn start, `recordGame` at game end.
 */
export class OpponentPlacementModel {
  readonly bucketsPerAxis: number
  private table: FrequencyTable
  private games = 0
  private readonly lock = new ReadWriteLock()

  private constructor(
    private readonly store: PlacementModelStore | null,
    table: FrequencyTable,
    options: PlacementModelOptions
  ) {
    this.table = table
    this.bucketsPerAxis = options.bucketsPerAxis
  }

  /**
   * Loads the model from its store. A missing table starts uniform.
   *
   * @param store - null keeps the model in memory only
   */
  static async open(
    store: PlacementModelStore | null,
    options: PlacementModelOptions
  ): Promise<OpponentPlacementModel> {
    const table = store ? await store.load(options.bucketsPerAxis) : null
    return new OpponentPlacementModel(store, table ?? {}, options)
  }

  /**
   * Bias snapshot for one turn.
   */
  snapshot(biasStrength: number): Promise<FrequencyBias> {
    return this.lock.read(() => new FrequencyBias(this.table, this.bucketsPerAxis, biasStrength))
  }

  /**
   * Adds the opponent's final layout to the table and persists it.
   */
  recordGame(ships: readonly ShipPlacement[], gridSize: number): Promise<void> {
    return this.lock.write(async () => {
      const observed: FrequencyTable = {}
      for (const ship of ships) {
        const key = bucketKeyOf(ship, gridSize, this.bucketsPerAxis)
        observed[key] = (observed[key] ?? 0) + 1
      }
      this.table = mergeTables(this.table, observed)
      this.games++
      await this.persist()
    })
  }

  /**
   * Merges a table from elsewhere (another process, an import) and persists.
   */
  merge(table: FrequencyTable): Promise<void> {
    return this.lock.write(async () => {
      this.table = mergeTables(this.table, table)
      await this.persist()
    })
  }

  /** Copy of the table under a read lock */
  toTable(): Promise<FrequencyTable> {
    return this.lock.read(() => ({ ...this.table }))
  }

  /** Games recorded since the model was opened */
  get gamesRecorded(): number {
    return this.games
  }

  private async persist(): Promise<void> {
    if (this.store) {
      await this.store.save({ ...this.table }, this.bucketsPerAxis)
    }
  }
}
