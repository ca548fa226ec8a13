import type { CiConfig, ConcreteSpec, Result } from 'shared'
import type { CyclicDependencyError, MissingRequiredAttributeError } from 'shared'
import { resolveAttributes } from './attributes.js'
import { buildPipelineGraph } from './dag.js'
import type { AnnotatedPipeline } from './plan.js'
import { prunePipeline, type PruneOptions, type PruneSignals } from './pruner.js'

export { PipelineGraph, buildPipelineGraph } from './dag.js'
export { prunePipeline, formatPruningSummary, keptNodes, type PruneResult, type PruneSignals } from './pruner.js'
export { resolveAttributes } from './attributes.js'
export { planJobs, type AnnotatedPipeline, type JobPlan, type PlannedJob } from './plan.js'
export { formatSpec, shortHash, type SpecNode } from './spec-node.js'

/**
 * Build → prune → resolve attributes. Pure: reads nothing and writes nothing.
 */
export function assemblePipeline(
  roots: readonly ConcreteSpec[],
  ci: CiConfig,
  options: PruneOptions,
  signals: PruneSignals = {},
): Result<AnnotatedPipeline, CyclicDependencyError | MissingRequiredAttributeError> {
  const built = buildPipelineGraph(roots)
  if (!built.ok) return built

  const graph = built.value
  const pruning = prunePipeline(graph, options, signals)

  const attributes = resolveAttributes(graph, pruning, ci)
  if (!attributes.ok) return attributes

  return { ok: true, value: { graph, pruning, attributes: attributes.value } }
}
