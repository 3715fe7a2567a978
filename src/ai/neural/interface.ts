/**
 * Learned Targeting Policy Interface
 *
 * The Master tier asks a learned policy for its shot. Policies are looked
 * up by name in a registry; one that is missing, unavailable or not loaded
 * makes the Master tier fall back to Expert search.
 */

import type { Cell } from '../../game/fleet'
import type { BoardKnowledge } from '../../game/tracker'
import { StrategyUnavailableError } from '../../lib/errorUtils'
import type { Heatmap } from '../heatmap'

/**
 * Network input. Shape is [batch, channels, rows, cols].
 */
export interface EncodedKnowledge {
  input: Float32Array
  shape: number[]
}

export interface PolicyMetadata {
  /** Registry name */
  name: string
  description: string
  /** Model architecture, when known */
  architecture?: 'mlp' | 'cnn'
  /** Channels expected per cell */
  channels: number
}

export interface TargetingPolicy {
  readonly name: string

  /**
   * Checks if the model is loaded and ready.
   */
  isReady(): boolean

  /**
   * Suggests a shot. The heatmap feeds the probability channel; without one
   * that channel is zero.
   *
   * @returns A valid target, or null if the policy has no opinion
   */
  suggestTarget(knowledge: BoardKnowledge, heatmap: Heatmap | null): Promise<Cell | null>

  getMetadata(): PolicyMetadata

  /**
   * Frees the inference session.
   */
  dispose(): void
}

// ============================================================================
// POLICY REGISTRY
// ============================================================================

interface PolicyEntry {
  policy: TargetingPolicy
  available: boolean
}

/**
 * Registry of targeting policies by name.
 */
export class PolicyRegistry {
  private policies: Map<string, PolicyEntry> = new Map()

  /**
   * Register a policy.
   *
   * @param available - Whether the policy may be used right now
   */
  register(policy: TargetingPolicy, available = true): void {
    this.policies.set(policy.name, { policy, available })
  }

  unregister(name: string): void {
    const entry = this.policies.get(name)
    if (entry) {
      entry.policy.dispose()
      this.policies.delete(name)
    }
  }

  get(name: string): TargetingPolicy | null {
    return this.policies.get(name)?.policy ?? null
  }

  /**
   * Get a policy that can answer right now.
   *
   * @throws StrategyUnavailableError if it is missing, disabled or not loaded
   */
  require(name: string): TargetingPolicy {
    const entry = this.policies.get(name)
    if (!entry) {
      throw new StrategyUnavailableError(`Policy "${name}" is not registered`)
    }
    if (!entry.available) {
      throw new StrategyUnavailableError(`Policy "${name}" is disabled`)
    }
    if (!entry.policy.isReady()) {
      throw new StrategyUnavailableError(`Policy "${name}" has no model loaded`)
    }
    return entry.policy
  }

  setAvailability(name: string, available: boolean): void {
    const entry = this.policies.get(name)
    if (entry) {
      entry.available = available
    }
  }

  list(): Array<{ name: string; available: boolean; ready: boolean }> {
    return Array.from(this.policies.entries()).map(([name, entry]) => ({
      name,
      available: entry.available,
      ready: entry.policy.isReady(),
    }))
  }

  has(name: string): boolean {
    return this.policies.has(name)
  }
}
