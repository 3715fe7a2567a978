/**
 * Monte Carlo Tree Search over shot sequences
 *
 * Each node is a sequence of shots taken from the root position. A
 * simulation draws one fresh placement of the hidden fleet, walks the tree
 * with UCB1, expands one untried shot, then plays the path plus a short
 * random continuation against that placement.
 *
 *   UCB1 = mean + C * sqrt(ln(N_parent) / N_child)
 *
 * Reward: `hitReward` per hit, plus `sunkBonus` for every ship the shots
 * finish off. A node with untried shots is always expanded before any of its
 * children is re-selected. The root move returned is the most visited one.
 *
 * Budgets are only checked between simulations; a simulation in flight
 * always completes.
 */

import type { BoardKnowledge } from '../game/tracker'
import { type Cell, type Placement, cellAt, cellIndex, shipCells } from '../game/fleet'
import { InvalidStateError } from '../lib/errorUtils'
import { activeHuntCells, buildHeatmap, compareTiedCells, rankTargets } from './heatmap'
import type { Rng } from './rng'
import { type PlacementBias, PlacementSampler, samplePlacements } from './sampler'

// ============================================================================
// TYPES
// ============================================================================

export interface MctsTuning {
  explorationConstant: number
  /** Placements sampled to order expansion; 0 = random order */
  priorSamples: number
  /** Random shots after the tree path; null = remaining ship cells */
  rolloutDepth: number | null
  hitReward: number
  sunkBonus: number
}

export interface MctsOptions extends MctsTuning {
  rng: Rng
  attemptMultiplier: number
  maxBacktracks: number
  bias?: PlacementBias
  signal?: AbortSignal
  /** Milliseconds; defaults to performance.now */
  clock?: () => number
}

export type StopReason = 'simulations' | 'time' | 'cancelled'

export interface SearchInfo {
  simulations: number
  elapsedMs: number
  stopReason: StopReason
  /** Nodes in the tree, root included */
  treeSize: number
  /** Deepest shot sequence expanded */
  maxDepth: number
}

export interface RootMoveStats {
  cell: Cell
  visits: number
  meanReward: number
}

export interface MctsResult {
  cell: Cell
  info: SearchInfo
  /** Root children, most visited first */
  moves: RootMoveStats[]
}

interface SearchNode {
  /** Shot leading to this node; -1 at the root */
  shot: number
  parent: SearchNode | null
  depth: number
  /** Placement drawn by the simulation that expanded this node; null at the root */
  placement: Placement | null
  visits: number
  totalReward: number
  /** Untried shots, best prior last */
  untried: number[]
  children: Map<number, SearchNode>
}

// ============================================================================
// SEARCH
// ============================================================================

/**
 * One search from a fixed board knowledge. `step` runs exactly one
 * simulation, so a driver can interleave budget checks, cancellation and
 * event-loop yields as it likes.
 */
export class MctsSearch {
  readonly size: number
  private readonly root: SearchNode
  private readonly sampler: PlacementSampler
  private readonly options: MctsOptions
  private readonly rng: Rng
  /** Valid targets, best prior first */
  private readonly order: number[]
  /** Cells hit but not yet sunk; shots there are never legal */
  private readonly priorHits: Uint8Array
  private readonly huntCells: Set<number>
  private readonly clock: () => number
  private readonly startedAt: number
  private nodes = 1
  private deepest = 0
  private simulations = 0
  private elapsed = 0

  constructor(knowledge: BoardKnowledge, options: MctsOptions) {
    this.size = knowledge.size
    this.options = options
    this.rng = options.rng
    this.clock = options.clock ?? (() => performance.now())
    this.startedAt = this.clock()

    const targets = knowledge.validTargets()
    if (targets.length === 0) {
      throw new InvalidStateError('No valid targets remain on this board')
    }

    const samplerOptions = {
      rng: options.rng,
      attemptMultiplier: options.attemptMultiplier,
      maxBacktracks: options.maxBacktracks,
      bias: options.bias,
    }
    this.order = this.expansionOrder(knowledge, samplerOptions)
    this.sampler = new PlacementSampler(knowledge, samplerOptions)

    this.priorHits = new Uint8Array(this.size * this.size)
    for (const hit of knowledge.unresolvedHits()) {
      this.priorHits[cellIndex(hit, this.size)] = 1
    }
    this.huntCells = activeHuntCells(knowledge)

    this.root = {
      shot: -1,
      parent: null,
      depth: 0,
      placement: null,
      visits: 0,
      totalReward: 0,
      untried: [...this.order].reverse(),
      children: new Map(),
    }
  }

  get simulationCount(): number {
    return this.simulations
  }

  /**
   * Checks the budgets. Called before every simulation.
   */
  shouldStop(simulationBudget: number, timeBudgetMs: number | null): StopReason | null {
    this.elapsed = this.clock() - this.startedAt
    if (this.simulations >= simulationBudget) return 'simulations'
    if (timeBudgetMs !== null && this.elapsed >= timeBudgetMs) return 'time'
    if (this.options.signal?.aborted) return 'cancelled'
    return null
  }

  /**
   * Runs one simulation: sample, select, expand, roll out, back up.
   *
   * @throws SamplingExhaustedError if no placement fits the knowledge
   */
  step(): void {
    const placement = this.sampler.drawOne()

    let node = this.root
    while (node.untried.length === 0 && node.children.size > 0) {
      node = this.bestUcbChild(node)
    }

    const shot = node.untried.pop()
    if (shot !== undefined) {
      const child: SearchNode = {
        shot,
        parent: node,
        depth: node.depth + 1,
        placement,
        visits: 0,
        totalReward: 0,
        untried: [],
        children: new Map(),
      }
      const path = this.pathOf(child)
      child.untried = [...this.order].reverse().filter((cell) => !path.has(cell))
      node.children.set(shot, child)
      this.nodes++
      this.deepest = Math.max(this.deepest, child.depth)
      node = child
    }

    const reward = this.rollout(node, placement)
    for (let current: SearchNode | null = node; current; current = current.parent) {
      current.visits++
      current.totalReward += reward
    }
    this.simulations++
  }

  /**
   * Runs simulations until a budget is hit.
   */
  run(simulationBudget: number, timeBudgetMs: number | null): MctsResult {
    let stop = this.shouldStop(simulationBudget, timeBudgetMs)
    while (stop === null) {
      this.step()
      stop = this.shouldStop(simulationBudget, timeBudgetMs)
    }
    return this.result(stop)
  }

  /**
   * Same as run, handing control back to the event loop every `yieldEvery`
   * simulations so an abort signal can be delivered mid-search.
   */
  async runAsync(
    simulationBudget: number,
    timeBudgetMs: number | null,
    yieldEvery: number
  ): Promise<MctsResult> {
    let stop = this.shouldStop(simulationBudget, timeBudgetMs)
    while (stop === null) {
      this.step()
      if (this.simulations % yieldEvery === 0) {
        await new Promise<void>((resolve) => setImmediate(resolve))
      }
      stop = this.shouldStop(simulationBudget, timeBudgetMs)
    }
    return this.result(stop)
  }

  /**
   * Most visited root shot; ties go to the higher mean reward, then to the
   * heatmap tie rule. With no simulations the best prior cell is returned.
   */
  result(stopReason: StopReason): MctsResult {
    const moves = [...this.root.children.values()].map((child) => ({
      cell: cellAt(child.shot, this.size),
      visits: child.visits,
      meanReward: child.visits > 0 ? child.totalReward / child.visits : 0,
    }))
    const huntCells = this.huntCells
    moves.sort(
      (a, b) =>
        b.visits - a.visits ||
        b.meanReward - a.meanReward ||
        compareTiedCells(a.cell, b.cell, huntCells, this.size)
    )

    return {
      cell: moves.length > 0 ? moves[0].cell : cellAt(this.order[0], this.size),
      info: {
        simulations: this.simulations,
        elapsedMs: this.elapsed,
        stopReason,
        treeSize: this.nodes,
        maxDepth: this.deepest,
      },
      moves,
    }
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private expansionOrder(
    knowledge: BoardKnowledge,
    samplerOptions: ConstructorParameters<typeof PlacementSampler>[1]
  ): number[] {
    if (this.options.priorSamples > 0) {
      const placements = samplePlacements(knowledge, this.options.priorSamples, samplerOptions)
      const heatmap = buildHeatmap(placements, this.size)
      return rankTargets(heatmap, knowledge).map((cell) => cellIndex(cell, this.size))
    }

    // Fisher-Yates over the row-major targets
    const order = knowledge.validTargets().map((cell) => cellIndex(cell, this.size))
    for (let i = order.length - 1; i > 0; i--) {
      const j = this.rng.int(i + 1)
      ;[order[i], order[j]] = [order[j], order[i]]
    }
    return order
  }

  private bestUcbChild(node: SearchNode): SearchNode {
    const logParent = Math.log(node.visits)
    let best: SearchNode | null = null
    let bestValue = -Infinity
    for (const child of node.children.values()) {
      const mean = child.totalReward / child.visits
      const value = mean + this.options.explorationConstant * Math.sqrt(logParent / child.visits)
      if (value > bestValue) {
        bestValue = value
        best = child
      }
    }
    if (best === null) {
      throw new InvalidStateError('Selection reached a node without children')
    }
    return best
  }

  private pathOf(node: SearchNode): Set<number> {
    const path = new Set<number>()
    for (let current: SearchNode | null = node; current && current.shot >= 0; current = current.parent) {
      path.add(current.shot)
    }
    return path
  }

  private pathShots(node: SearchNode): number[] {
    const shots: number[] = []
    for (let current: SearchNode | null = node; current && current.shot >= 0; current = current.parent) {
      shots.push(current.shot)
    }
    return shots.reverse()
  }

  /**
   * Scores the node's shot path plus random follow-up shots against one
   * sampled placement.
   */
  private rollout(node: SearchNode, placement: Placement): number {
    const cellCount = this.size * this.size
    const occupant = new Int16Array(cellCount).fill(-1)
    const afloat: number[] = []
    placement.ships.forEach((ship, shipId) => {
      let unhit = 0
      for (const cell of shipCells(ship)) {
        const index = cellIndex(cell, this.size)
        occupant[index] = shipId
        if (this.priorHits[index] === 0) unhit++
      }
      afloat.push(unhit)
    })

    const { hitReward, sunkBonus } = this.options
    let reward = 0
    const fire = (index: number): void => {
      const shipId = occupant[index]
      if (shipId < 0) return
      reward += hitReward
      afloat[shipId]--
      if (afloat[shipId] === 0) reward += sunkBonus
    }

    const path = this.pathShots(node)
    path.forEach(fire)

    const taken = new Set(path)
    const pool = this.order.filter((cell) => !taken.has(cell))
    const remainingCells = afloat.reduce((sum, n) => sum + Math.max(0, n), 0)
    const depth = Math.min(pool.length, this.options.rolloutDepth ?? remainingCells)
    for (let i = 0; i < depth; i++) {
      const j = i + this.rng.int(pool.length - i)
      ;[pool[i], pool[j]] = [pool[j], pool[i]]
      fire(pool[i])
    }
    return reward
  }
}

// ============================================================================
// ENTRY POINT
// ============================================================================

/**
 * Runs a search to completion and returns the chosen shot.
 *
 * @param simulationBudget - Maximum simulations
 * @param timeBudgetMs - Wall-clock limit checked between simulations; null = none
 */
export function selectTarget(
  knowledge: BoardKnowledge,
  simulationBudget: number,
  timeBudgetMs: number | null,
  options: MctsOptions
): MctsResult {
  return new MctsSearch(knowledge, options).run(simulationBudget, timeBudgetMs)
}
