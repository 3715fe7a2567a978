/**
 * Learned Targeting Policy Module
 *
 * @example
 * ```typescript
 * import { loadPolicies } from './ai/neural'
 *
 * const registry = await loadPolicies(config)
 * const policy = registry.require(config.policy.name)
 * const cell = await policy.suggestTarget(tracker, heatmap)
 * ```
 */

export type {
  TargetingPolicy,
  PolicyMetadata,
  EncodedKnowledge,
} from './interface'

export { PolicyRegistry } from './interface'

export {
  KNOWLEDGE_CHANNELS,
  encodeKnowledge,
  maskInvalidTargets,
  argmaxTarget,
  getInputShape,
} from './encoding'

export { OnnxTargetingPolicy, createOnnxPolicy } from './onnx'

export { policyRegistry, loadPolicies } from './loader'
