import { describe, it, expect, vi, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { PolicyRegistry, type TargetingPolicy } from './interface'
import { OnnxTargetingPolicy, createOnnxPolicy } from './onnx'
import { loadPolicies } from './loader'
import { BoardStateTracker } from '../../game/tracker'
import { parseEngineConfig } from '../../lib/config'
import { StrategyUnavailableError } from '../../lib/errorUtils'

const runtime = vi.hoisted(() => ({ run: vi.fn() }))

vi.mock('onnxruntime-web', () => ({
  Tensor: class {
    constructor(
      readonly type: string,
      readonly data: Float32Array,
      readonly dims: number[]
    ) {}
  },
  InferenceSession: {
    create: async () => ({
      inputNames: ['board'],
      outputNames: ['scores'],
      run: runtime.run,
      release: async () => {},
    }),
  },
}))

const missingModel = join(tmpdir(), 'broadside-no-such-model.onnx')

async function withModelFile(use: (path: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'broadside-onnx-'))
  try {
    const path = join(dir, 'policy.onnx')
    await writeFile(path, 'model bytes')
    await use(path)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}

function fakePolicy(name: string, ready = true): TargetingPolicy {
  return {
    name,
    isReady: () => ready,
    suggestTarget: async () => ({ row: 0, col: 0 }),
    getMetadata: () => ({ name, description: 'fake', channels: 3 }),
    dispose: vi.fn(),
  }
}

afterEach(() => {
  vi.restoreAllMocks()
  runtime.run.mockReset()
})

describe('PolicyRegistry', () => {
  it('lists policies with their availability', () => {
    const registry = new PolicyRegistry()
    registry.register(fakePolicy('a'))
    registry.register(fakePolicy('b', false), false)
    expect(registry.list()).toEqual([
      { name: 'a', available: true, ready: true },
      { name: 'b', available: false, ready: false },
    ])
    expect(registry.has('a')).toBe(true)
    expect(registry.get('c')).toBeNull()
  })

  it('hands out only usable policies', () => {
    const registry = new PolicyRegistry()
    const policy = fakePolicy('a')
    registry.register(policy)
    expect(registry.require('a')).toBe(policy)

    registry.setAvailability('a', false)
    expect(() => registry.require('a')).toThrow('Policy "a" is disabled')
    expect(() => registry.require('z')).toThrow(StrategyUnavailableError)

    registry.register(fakePolicy('cold', false))
    expect(() => registry.require('cold')).toThrow('Policy "cold" has no model loaded')
  })

  it('disposes a policy when it is unregistered', () => {
    const registry = new PolicyRegistry()
    const policy = fakePolicy('a')
    registry.register(policy)
    registry.unregister('a')
    expect(policy.dispose).toHaveBeenCalledTimes(1)
    expect(registry.has('a')).toBe(false)
  })
})

describe('OnnxTargetingPolicy', () => {
  it('stays unloaded when the model file is missing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const policy = await createOnnxPolicy(missingModel, { name: 'onnx-policy' })

    expect(policy.isReady()).toBe(false)
    expect(warn).toHaveBeenCalledWith('[onnx-policy]', `No model at ${missingModel}`)
    expect(policy.getMetadata()).toEqual({
      name: 'onnx-policy',
      description: `ONNX policy from ${missingModel}`,
      channels: 3,
    })
  })

  it('picks the highest scoring valid cell', async () => {
    runtime.run.mockResolvedValueOnce({ scores: { data: Float32Array.from([0, 1, 0, 2, 7, 0, 0, 0, 3]) } })
    await withModelFile(async (path) => {
      const policy = await createOnnxPolicy(path, { name: 'onnx-policy' })
      expect(policy.isReady()).toBe(true)
      await expect(policy.suggestTarget(new BoardStateTracker(3, [2]), null)).resolves.toEqual({ row: 1, col: 1 })
      expect(runtime.run).toHaveBeenCalledTimes(1)
    })
  })

  it('reports a failed inference as an unavailable policy', async () => {
    runtime.run.mockRejectedValueOnce(new Error('Got invalid dimensions for input'))
    await withModelFile(async (path) => {
      const policy = await createOnnxPolicy(path, { name: 'onnx-policy' })
      const attempt = policy.suggestTarget(new BoardStateTracker(3, [2]), null)
      await expect(attempt).rejects.toBeInstanceOf(StrategyUnavailableError)
      await expect(attempt).rejects.toThrow('Policy "onnx-policy" failed: Got invalid dimensions for input')
    })
  })

  it('refuses to suggest without a model', async () => {
    const policy = new OnnxTargetingPolicy(missingModel, { name: 'onnx-policy', description: 'test' })
    await expect(policy.suggestTarget(new BoardStateTracker(10, [2]), null)).rejects.toThrow(
      'Policy "onnx-policy" has no model loaded'
    )
  })
})

describe('loadPolicies', () => {
  it('registers nothing without a model path', async () => {
    const registry = await loadPolicies(parseEngineConfig({}), new PolicyRegistry())
    expect(registry.list()).toEqual([])
  })

  it('registers an unloadable model as unavailable', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const config = parseEngineConfig({ policy: { modelPath: missingModel } })
    const registry = await loadPolicies(config, new PolicyRegistry())
    expect(registry.list()).toEqual([{ name: 'onnx-policy', available: false, ready: false }])
    expect(() => registry.require('onnx-policy')).toThrow('Policy "onnx-policy" is disabled')
  })
})
