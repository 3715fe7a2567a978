import { z } from 'zod'

// =============================================================================
// Difficulty
// =============================================================================

export const difficultySchema = z.enum(['easy', 'medium', 'hard', 'expert', 'master', 'nightmare'])

export type Difficulty = z.infer<typeof difficultySchema>

/** Difficulty tiers from weakest to strongest */
export const DIFFICULTIES: readonly Difficulty[] = difficultySchema.options

// =============================================================================
// Engine Config Schema
// =============================================================================

export const mctsBudgetSchema = z.object({
  simulations: z.number().int().min(0),
  /** null = no wall-clock limit */
  timeLimitMs: z.number().positive().nullable(),
})

export type MctsBudget = z.infer<typeof mctsBudgetSchema>

export const tierBehaviorSchema = z.object({
  /** Chance of replacing the chosen target with a random valid one (0-1) */
  errorRate: z.number().min(0).max(1),
  /** Delay the caller should show before revealing the shot */
  thinkTimeMs: z.number().int().min(0),
})

export type TierBehavior = z.infer<typeof tierBehaviorSchema>

export const engineConfigSchema = z
  .object({
    difficulty: difficultySchema.default('medium'),
    gridSize: z.number().int().min(2).max(26).default(10),
    fleet: z.array(z.number().int().min(1)).min(1).default([5, 4, 3, 3, 2]),
    budgets: z
      .object({
        expert: mctsBudgetSchema.default({ simulations: 200, timeLimitMs: null }),
        nightmare: mctsBudgetSchema.default({ simulations: 500, timeLimitMs: 5000 }),
      })
      .default({}),
    sampler: z
      .object({
        attemptMultiplier: z.number().int().min(1).default(50),
        maxBacktracks: z.number().int().min(0).default(8),
      })
      .default({}),
    heatmap: z
      .object({
        samples: z.number().int().min(1).default(300),
      })
      .default({}),
    adaptive: z
      .object({
        /** 0 = ignore history, 1 = weight positions fully by historical frequency */
        biasStrength: z.number().min(0).max(1).default(0.5),
        bucketsPerAxis: z.number().int().min(1).max(26).default(5),
      })
      .default({}),
    mcts: z
      .object({
        explorationConstant: z.number().positive().default(Math.SQRT2),
        /** Placements sampled for the expansion prior; 0 = random expansion order */
        priorSamples: z.number().int().min(0).default(100),
        /** null = remaining ship cell count */
        rolloutDepth: z.number().int().min(0).nullable().default(null),
        hitReward: z.number().min(0).default(1),
        sunkBonus: z.number().min(0).default(5),
        /** Simulations between event-loop yields */
        yieldEvery: z.number().int().min(1).default(25),
      })
      .default({}),
    tiers: z
      .object({
        easy: tierBehaviorSchema.default({ errorRate: 0.3, thinkTimeMs: 500 }),
        medium: tierBehaviorSchema.default({ errorRate: 0.1, thinkTimeMs: 1000 }),
        hard: tierBehaviorSchema.default({ errorRate: 0, thinkTimeMs: 1500 }),
        expert: tierBehaviorSchema.default({ errorRate: 0, thinkTimeMs: 2000 }),
        master: tierBehaviorSchema.default({ errorRate: 0.05, thinkTimeMs: 2500 }),
        nightmare: tierBehaviorSchema.default({ errorRate: 0, thinkTimeMs: 1000 }),
      })
      .default({}),
    policy: z
      .object({
        /** Registry name of the learned policy used by the master tier */
        name: z.string().min(1).default('onnx-policy'),
        /** ONNX model file; null = no model */
        modelPath: z.string().min(1).nullable().default(null),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const totalCells = config.fleet.reduce((sum, length) => sum + length, 0)
    if (config.fleet.some((length) => length > config.gridSize)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fleet'],
        message: `Every ship must fit a ${config.gridSize}x${config.gridSize} grid`,
      })
    }
    if (totalCells > config.gridSize * config.gridSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['fleet'],
        message: `Fleet needs ${totalCells} cells, grid has ${config.gridSize * config.gridSize}`,
      })
    }
  })

export type EngineConfig = z.infer<typeof engineConfigSchema>
export type EngineConfigInput = z.input<typeof engineConfigSchema>

// =============================================================================
// Placement Model File Schema
// =============================================================================

/** `length:orientation:bucketRow:bucketCol` */
export const BUCKET_KEY_PATTERN = /^(\d+):(horizontal|vertical):(\d+):(\d+)$/

export const frequencyTableSchema = z.record(
  z.string().regex(BUCKET_KEY_PATTERN),
  z.number().int().min(0)
)

export type FrequencyTable = z.infer<typeof frequencyTableSchema>

export const placementModelFileSchema = z.object({
  version: z.literal(1),
  bucketsPerAxis: z.number().int().min(1),
  counts: frequencyTableSchema,
})

export type PlacementModelFile = z.infer<typeof placementModelFileSchema>
