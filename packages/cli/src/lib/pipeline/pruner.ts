import type { NodeStatus, PipelineOptions } from 'shared'
import type { PipelineGraph } from './dag.js'
import { formatSpec, type SpecNode } from './spec-node.js'

export interface PruneSignals {
  /** Hashes reported as known-broken. */
  broken?: ReadonlySet<string>
  /** Hashes already present in the build cache. */
  available?: ReadonlySet<string>
  /** Package names or hashes touched by the change under test. */
  changed?: readonly string[]
}

export interface PruneDecision {
  status: NodeStatus
  reason: string
}

export type PruneResult = ReadonlyMap<string, PruneDecision>

export type PruneOptions = Pick<
  PipelineOptions,
  'pruneBroken' | 'pruneUpToDate' | 'affectedOnly' | 'pruneExternal' | 'dependentDepth'
>

type PrunedStatus = Exclude<NodeStatus, 'keep'>

interface PruningPolicy {
  status: PrunedStatus
  enabled(options: PruneOptions): boolean
  /** Returns [prune, reason] for one node. */
  prepare(graph: PipelineGraph, signals: PruneSignals, options: PruneOptions): (node: SpecNode) => [boolean, string]
}

/**
 * Nodes whose package changed, every dependent up to `dependentDepth` levels
 * above them (unbounded when undefined), and the dependency closure of all of
 * those. A negative depth keeps only changed roots and their closure.
 */
export function computeAffected(
  graph: PipelineGraph,
  changed: readonly string[],
  dependentDepth?: number,
): Set<string> {
  const affected = new Set<string>()
  const wanted = new Set(changed)
  const matched = graph.nodes()
    .filter(n => wanted.has(n.name) || wanted.has(n.hash))
    .map(n => n.hash)

  const negative = dependentDepth !== undefined && dependentDepth < 0
  const roots = new Set(graph.roots)
  const start = negative ? matched.filter(hash => roots.has(hash)) : matched

  const reached = new Set(start)
  let frontier = start
  let depth = 0
  while (!negative && frontier.length > 0 && (dependentDepth === undefined || depth < dependentDepth)) {
    const next: string[] = []
    for (const hash of frontier) {
      for (const parent of graph.dependentsOf(hash)) {
        if (reached.has(parent)) continue
        reached.add(parent)
        next.push(parent)
      }
    }
    frontier = next
    depth++
  }

  for (const hash of reached) {
    for (const member of graph.closure(hash)) affected.add(member)
  }
  return affected
}

// Fixed order: the first policy that prunes a node decides its status.
const POLICIES: readonly PruningPolicy[] = [
  {
    status: 'pruned-broken',
    enabled: options => options.pruneBroken,
    prepare: (_graph, signals) => {
      const broken = signals.broken ?? new Set<string>()
      return node => broken.has(node.hash) ? [true, 'known broken'] : [false, 'not known broken']
    },
  },
  {
    status: 'pruned-available',
    enabled: options => options.pruneUpToDate,
    prepare: (_graph, signals) => {
      const available = signals.available ?? new Set<string>()
      return node => available.has(node.hash)
        ? [true, 'up-to-date in build cache']
        : [false, 'not found in build cache']
    },
  },
  {
    status: 'pruned-unaffected',
    enabled: options => options.affectedOnly,
    prepare: (graph, signals, options) => {
      const affected = computeAffected(graph, signals.changed ?? [], options.dependentDepth)
      return node => affected.has(node.hash) ? [false, 'affected by change'] : [true, 'unaffected by change']
    },
  },
  {
    status: 'pruned-external',
    enabled: options => options.pruneExternal,
    prepare: () => node => node.external ? [true, 'external spec'] : [false, 'not external'],
  },
]

/**
 * Decide a status for every node. The graph is left untouched: pruned nodes
 * stay in it and only lose their job. Statuses already pruned in `previous`
 * are carried over, so pruning a pruned result again changes nothing.
 */
export function prunePipeline(
  graph: PipelineGraph,
  options: PruneOptions,
  signals: PruneSignals = {},
  previous?: PruneResult,
): PruneResult {
  const decisions = new Map<string, PruneDecision>()
  const keepReasons = new Map<string, string[]>()

  for (const node of graph.nodes()) {
    const earlier = previous?.get(node.hash)
    if (earlier && earlier.status !== 'keep') {
      decisions.set(node.hash, earlier)
    } else {
      keepReasons.set(node.hash, [])
    }
  }

  for (const policy of POLICIES) {
    if (!policy.enabled(options)) continue
    const check = policy.prepare(graph, signals, options)
    for (const [hash, reasons] of keepReasons) {
      const node = graph.get(hash)
      if (!node) continue
      const [prune, reason] = check(node)
      if (prune) {
        decisions.set(hash, { status: policy.status, reason })
        keepReasons.delete(hash)
      } else {
        reasons.push(reason)
      }
    }
  }

  for (const [hash, reasons] of keepReasons) {
    decisions.set(hash, { status: 'keep', reason: reasons.length > 0 ? reasons.join(', ') : 'no pruning enabled' })
  }

  return decisions
}

export function isKept(pruning: PruneResult, hash: string): boolean {
  return pruning.get(hash)?.status === 'keep'
}

export function keptNodes(graph: PipelineGraph, pruning: PruneResult): SpecNode[] {
  return graph.nodes().filter(n => isKept(pruning, n.hash))
}

/**
 * Human-readable rebuild/prune listing, sorted by `name/hash7`.
 */
export function formatPruningSummary(graph: PipelineGraph, pruning: PruneResult): string[] {
  const rebuild: string[] = []
  const prune: string[] = []
  const sortKey = (node: SpecNode) => `${node.name}/${node.hash.slice(0, 7)}`
  const nodes = graph.nodes().sort((a, b) => (sortKey(a) < sortKey(b) ? -1 : sortKey(a) > sortKey(b) ? 1 : 0))

  for (const node of nodes) {
    const decision = pruning.get(node.hash)
    if (!decision) continue
    const label = formatSpec(node, { compiler: true, hash: true })
    if (decision.status === 'keep') {
      rebuild.push(`  [x] ${label} (${decision.reason})`)
    } else {
      prune.push(`   -  ${label} (${decision.status}: ${decision.reason})`)
    }
  }

  const lines = ['Pipeline pruning summary:']
  if (rebuild.length > 0) lines.push(' Rebuild list:', ...rebuild)
  if (prune.length > 0) lines.push(' Prune list:', ...prune)
  return lines
}
