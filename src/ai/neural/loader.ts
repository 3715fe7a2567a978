/**
 * Policy Loading
 *
 * Builds the policy registry an engine starts with. Nothing is registered
 * unless the config names a model file, so the Master tier plays as Expert
 * out of the box.
 */

import type { EngineConfig } from '../../../shared/db/json-schemas'
import { PolicyRegistry } from './interface'
import { createOnnxPolicy } from './onnx'

/** Registry used when a caller does not bring its own */
export const policyRegistry = new PolicyRegistry()

/**
 * Registers the configured policy. A model that fails to load is still
 * registered, as unavailable, so the registry reports why Master fell back.
 */
export async function loadPolicies(
  config: EngineConfig,
  registry: PolicyRegistry = policyRegistry
): Promise<PolicyRegistry> {
  const { name, modelPath } = config.policy
  if (modelPath === null) {
    return registry
  }

  const policy = await createOnnxPolicy(modelPath, { name })
  registry.register(policy, policy.isReady())
  return registry
}
