import type { CiConfig, ConcreteSpec, PipelineOptions, Result } from 'shared'
import { resolveAttributes } from '../src/lib/pipeline/attributes.js'
import { buildPipelineGraph, type PipelineGraph } from '../src/lib/pipeline/dag.js'
import type { AnnotatedPipeline } from '../src/lib/pipeline/plan.js'
import { prunePipeline, type PruneOptions, type PruneSignals } from '../src/lib/pipeline/pruner.js'
import type { SpecNode } from '../src/lib/pipeline/spec-node.js'

export function spec(name: string, dependencies: ConcreteSpec[] = [], extra: Partial<ConcreteSpec> = {}): ConcreteSpec {
  return { name, version: '1.0.0', ...extra, dependencies }
}

/** R depends on A and B, A depends on C. */
export function scenarioStack(): { R: ConcreteSpec; A: ConcreteSpec; B: ConcreteSpec; C: ConcreteSpec } {
  const C = spec('C')
  const A = spec('A', [C])
  const B = spec('B')
  const R = spec('R', [A, B])
  return { R, A, B, C }
}

export function unwrap<T>(result: Result<T, Error>): T {
  if (!result.ok) throw result.error
  return result.value
}

export function build(roots: ConcreteSpec[]): PipelineGraph {
  const result = buildPipelineGraph(roots)
  if (!result.ok) throw result.error
  return result.value
}

export function nodeNamed(graph: PipelineGraph, name: string): SpecNode {
  const node = graph.nodes().find(n => n.name === name)
  if (!node) throw new Error(`No node named ${name}`)
  return node
}

export function hashOf(graph: PipelineGraph, name: string): string {
  return nodeNamed(graph, name).hash
}

export const NO_PRUNING: PruneOptions = {
  pruneBroken: false,
  pruneUpToDate: false,
  affectedOnly: false,
  pruneExternal: false,
}

export const BASIC_CI: CiConfig = {
  defaults: { tags: ['default'], orderHint: 0 },
}

export function pipelineOptions(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  return {
    platform: 'gitlab',
    outputPath: '.gitlab-ci.yml',
    pruneUpToDate: false,
    pruneBroken: false,
    affectedOnly: false,
    pruneExternal: false,
    printSummary: false,
    artifactsRoot: 'jobs_scratch_dir',
    ...overrides,
  }
}

/** Build, prune and resolve, throwing on any failure. */
export function annotate(
  roots: ConcreteSpec[],
  options: PruneOptions = NO_PRUNING,
  signals: PruneSignals = {},
  ci: CiConfig = BASIC_CI,
): AnnotatedPipeline {
  const graph = build(roots)
  const pruning = prunePipeline(graph, options, signals)
  const attributes = resolveAttributes(graph, pruning, ci)
  if (!attributes.ok) throw attributes.error
  return { graph, pruning, attributes: attributes.value }
}
