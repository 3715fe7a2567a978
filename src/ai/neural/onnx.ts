/**
 * ONNX Runtime Wrapper for Targeting Policy Inference
 *
 * Loads a model file from disk and scores every cell in one forward pass.
 * The runtime is imported lazily, so an engine without a model never loads it.
 */

import { readFile } from 'node:fs/promises'
import type { InferenceSession } from 'onnxruntime-web'
import type { Cell } from '../../game/fleet'
import type { BoardKnowledge } from '../../game/tracker'
import { isMissingFile } from '../../lib/config'
import { StrategyUnavailableError, getErrorMessage, logWarning } from '../../lib/errorUtils'
import type { Heatmap } from '../heatmap'
import { KNOWLEDGE_CHANNELS, argmaxTarget, encodeKnowledge } from './encoding'
import type { PolicyMetadata, TargetingPolicy } from './interface'

type OnnxRuntimeModule = typeof import('onnxruntime-web')

/** Cached ONNX runtime module */
let onnxRuntime: OnnxRuntimeModule | null = null

async function getOnnxRuntime(): Promise<OnnxRuntimeModule> {
  if (!onnxRuntime) {
    onnxRuntime = await import('onnxruntime-web')
  }
  return onnxRuntime
}

export interface OnnxPolicyOptions {
  name: string
  description?: string
}

/**
 * Policy network over the 3-channel knowledge encoding. The first output is
 * read as one score per cell, row-major.
 */
export class OnnxTargetingPolicy implements TargetingPolicy {
  readonly name: string
  private readonly description: string
  private session: InferenceSession | null = null
  private ort: OnnxRuntimeModule | null = null

  constructor(
    private readonly modelPath: string,
    options: OnnxPolicyOptions
  ) {
    this.name = options.name
    this.description = options.description ?? `ONNX policy from ${modelPath}`
  }

  /**
   * Loads the model. A missing or unreadable model leaves the policy
   * not ready; it does not throw.
   *
   * @returns Whether the policy is ready
   */
  async load(): Promise<boolean> {
    if (this.session) return true

    let bytes: Uint8Array
    try {
      bytes = await readFile(this.modelPath)
    } catch (error) {
      if (isMissingFile(error)) {
        logWarning('onnx-policy', `No model at ${this.modelPath}`)
        return false
      }
      throw error
    }

    try {
      this.ort = await getOnnxRuntime()
      this.session = await this.ort.InferenceSession.create(bytes)
    } catch (error) {
      logWarning('onnx-policy', `Failed to load ${this.modelPath}: ${getErrorMessage(error)}`)
      this.session = null
      return false
    }
    return true
  }

  isReady(): boolean {
    return this.session !== null
  }

  getMetadata(): PolicyMetadata {
    return {
      name: this.name,
      description: this.description,
      channels: KNOWLEDGE_CHANNELS,
    }
  }

  async suggestTarget(knowledge: BoardKnowledge, heatmap: Heatmap | null): Promise<Cell | null> {
    if (!this.session || !this.ort) {
      throw new StrategyUnavailableError(`Policy "${this.name}" has no model loaded`)
    }

    const encoded = encodeKnowledge(knowledge, heatmap)
    const tensor = new this.ort.Tensor('float32', encoded.input, encoded.shape)
    const inputName = this.session.inputNames[0]
    const outputName = this.session.outputNames[0]
    const results = await this.session.run({ [inputName]: tensor }).catch((error: unknown) => {
      throw new StrategyUnavailableError(`Policy "${this.name}" failed: ${getErrorMessage(error)}`)
    })

    const scores = results[outputName]?.data
    if (!(scores instanceof Float32Array)) {
      throw new StrategyUnavailableError(`Policy "${this.name}" returned no float32 scores`)
    }
    return argmaxTarget(scores, knowledge)
  }

  dispose(): void {
    if (this.session) {
      void this.session.release()
      this.session = null
    }
  }
}

/**
 * Creates a policy and tries to load its model.
 */
export async function createOnnxPolicy(
  modelPath: string,
  options: OnnxPolicyOptions
): Promise<OnnxTargetingPolicy> {
  const policy = new OnnxTargetingPolicy(modelPath, options)
  await policy.load()
  return policy
}
