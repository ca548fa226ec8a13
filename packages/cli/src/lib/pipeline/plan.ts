import type { JobAttributes } from 'shared'
import type { PipelineGraph } from './dag.js'
import { isKept, type PruneResult } from './pruner.js'
import type { SpecNode } from './spec-node.js'

/** A pruned graph together with the attribute set of every kept node. */
export interface AnnotatedPipeline {
  graph: PipelineGraph
  pruning: PruneResult
  attributes: ReadonlyMap<string, JobAttributes>
}

export interface PlannedJob {
  node: SpecNode
  attributes: JobAttributes
  /** Hashes of the nearest kept dependencies, pruned nodes bridged over. */
  needs: string[]
  stage: number
}

export interface JobPlan {
  jobs: PlannedJob[]
  /** Stage numbers in use, ascending. */
  stages: number[]
}

function compareNodes(graph: PipelineGraph) {
  return (a: string, b: string): number => {
    const left = graph.get(a)
    const right = graph.get(b)
    const nameA = left?.name ?? ''
    const nameB = right?.name ?? ''
    if (nameA !== nameB) return nameA < nameB ? -1 : 1
    return a < b ? -1 : a > b ? 1 : 0
  }
}

/**
 * For each direct dependency of `hash`: the dependency itself when kept,
 * otherwise the nearest kept nodes below it.
 */
export function bridgedDependencies(
  graph: PipelineGraph,
  pruning: PruneResult,
  hash: string,
  memo: Map<string, Set<string>> = new Map(),
): string[] {
  function nearestKept(current: string): Set<string> {
    if (isKept(pruning, current)) return new Set([current])
    const cached = memo.get(current)
    if (cached) return cached
    const found = new Set<string>()
    for (const dep of graph.dependenciesOf(current)) {
      for (const kept of nearestKept(dep)) found.add(kept)
    }
    memo.set(current, found)
    return found
  }

  const needs = new Set<string>()
  for (const dep of graph.dependenciesOf(hash)) {
    for (const kept of nearestKept(dep)) needs.add(kept)
  }
  return [...needs].sort(compareNodes(graph))
}

/**
 * One job per kept node. A job's stage is its order hint, pushed past the
 * stage of every job it needs, so no job waits on its own or a later stage.
 */
export function planJobs(pipeline: AnnotatedPipeline): JobPlan {
  const { graph, pruning, attributes } = pipeline
  const memo = new Map<string, Set<string>>()
  const stageOf = new Map<string, number>()
  const jobs: PlannedJob[] = []

  for (const node of graph.topologicalOrder()) {
    if (!isKept(pruning, node.hash)) continue
    const nodeAttributes = attributes.get(node.hash)
    if (!nodeAttributes) {
      throw new Error(`No job attributes resolved for ${node.name}/${node.hash}`)
    }

    const needs = bridgedDependencies(graph, pruning, node.hash, memo)
    let stage = nodeAttributes.orderHint
    for (const dep of needs) {
      stage = Math.max(stage, (stageOf.get(dep) ?? 0) + 1)
    }
    stageOf.set(node.hash, stage)
    jobs.push({ node, attributes: nodeAttributes, needs, stage })
  }

  const byNode = compareNodes(graph)
  jobs.sort((a, b) => a.stage - b.stage || byNode(a.node.hash, b.node.hash))
  const stages = [...new Set(jobs.map(j => j.stage))].sort((a, b) => a - b)
  return { jobs, stages }
}
