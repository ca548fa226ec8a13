import type { ConcreteSpec, Result } from 'shared'
import { CyclicDependencyError } from 'shared'
import { createSpecNode, type SpecNode } from './spec-node.js'

function byNameThenHash(a: SpecNode, b: SpecNode): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1
  return a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0
}

/**
 * Directed acyclic graph of spec nodes keyed by hash. Edges point from a
 * dependent to its dependencies; shared dependencies are stored once.
 */
export class PipelineGraph {
  readonly roots: readonly string[]
  private readonly table: ReadonlyMap<string, SpecNode>
  private readonly parents: ReadonlyMap<string, readonly string[]>

  constructor(nodes: Iterable<SpecNode>, roots: readonly string[]) {
    const table = new Map<string, SpecNode>()
    for (const node of nodes) table.set(node.hash, node)

    const parents = new Map<string, string[]>()
    for (const hash of table.keys()) parents.set(hash, [])
    for (const node of table.values()) {
      for (const dep of node.dependencies) {
        const list = parents.get(dep)
        if (!list) {
          throw new Error(`Node ${node.name}/${node.hash} references unknown dependency ${dep}`)
        }
        list.push(node.hash)
      }
    }
    for (const list of parents.values()) list.sort()

    for (const root of roots) {
      if (!table.has(root)) throw new Error(`Unknown root ${root}`)
    }

    this.table = table
    this.parents = parents
    this.roots = Object.freeze([...new Set(roots)])
  }

  get size(): number {
    return this.table.size
  }

  has(hash: string): boolean {
    return this.table.has(hash)
  }

  get(hash: string): SpecNode | undefined {
    return this.table.get(hash)
  }

  /** All nodes, sorted by package name then hash. */
  nodes(): SpecNode[] {
    return [...this.table.values()].sort(byNameThenHash)
  }

  dependenciesOf(hash: string): readonly string[] {
    return this.table.get(hash)?.dependencies ?? []
  }

  dependentsOf(hash: string): readonly string[] {
    return this.parents.get(hash) ?? []
  }

  /** Hashes reachable from `hash` through dependency edges, `hash` included. */
  closure(hash: string): Set<string> {
    const seen = new Set<string>()
    const stack = [hash]
    while (stack.length > 0) {
      const current = stack.pop()
      if (current === undefined || seen.has(current) || !this.table.has(current)) continue
      seen.add(current)
      stack.push(...this.dependenciesOf(current))
    }
    return seen
  }

  /**
   * Dependencies before dependents. Ties are broken by name then hash so the
   * order is the same on every run.
   */
  topologicalOrder(): SpecNode[] {
    const remaining = new Map<string, number>()
    for (const node of this.table.values()) remaining.set(node.hash, node.dependencies.length)

    const ready = [...this.table.values()].filter(n => n.dependencies.length === 0).sort(byNameThenHash)
    const order: SpecNode[] = []

    while (ready.length > 0) {
      const node = ready.shift()
      if (!node) break
      order.push(node)
      const unlocked: SpecNode[] = []
      for (const parent of this.dependentsOf(node.hash)) {
        const count = (remaining.get(parent) ?? 0) - 1
        remaining.set(parent, count)
        const parentNode = this.table.get(parent)
        if (count === 0 && parentNode) unlocked.push(parentNode)
      }
      ready.push(...unlocked)
      ready.sort(byNameThenHash)
    }

    return order
  }
}

function label(spec: ConcreteSpec): string {
  return `${spec.name}@${spec.version}`
}

interface Frame {
  spec: ConcreteSpec
  next: number
  dependencyHashes: string[]
}

/**
 * Build the pipeline graph for the closure of `roots`. Equal specs reached
 * along different paths collapse into one node with several dependents.
 * The walk keeps its own stack, so chain depth is not bounded by the call stack.
 */
export function buildPipelineGraph(roots: readonly ConcreteSpec[]): Result<PipelineGraph, CyclicDependencyError> {
  const table = new Map<string, SpecNode>()
  const hashes = new Map<ConcreteSpec, string>()

  function visit(root: ConcreteSpec): Result<string, CyclicDependencyError> {
    const known = hashes.get(root)
    if (known) return { ok: true, value: known }

    const stack: Frame[] = [{ spec: root, next: 0, dependencyHashes: [] }]
    const onPath = new Set<ConcreteSpec>([root])
    let rootHash = ''

    while (stack.length > 0) {
      const frame = stack[stack.length - 1]
      const dependencies = frame.spec.dependencies ?? []

      if (frame.next < dependencies.length) {
        const dependency = dependencies[frame.next]
        frame.next++

        const done = hashes.get(dependency)
        if (done) {
          frame.dependencyHashes.push(done)
          continue
        }
        if (onPath.has(dependency)) {
          const path = stack.map(f => f.spec)
          const cycle = [...path.slice(path.indexOf(dependency)), dependency].map(label)
          return { ok: false, error: new CyclicDependencyError(cycle) }
        }
        onPath.add(dependency)
        stack.push({ spec: dependency, next: 0, dependencyHashes: [] })
        continue
      }

      stack.pop()
      onPath.delete(frame.spec)

      const node = createSpecNode(frame.spec, frame.dependencyHashes)
      if (!table.has(node.hash)) table.set(node.hash, node)
      hashes.set(frame.spec, node.hash)

      const parent = stack[stack.length - 1]
      if (parent) parent.dependencyHashes.push(node.hash)
      else rootHash = node.hash
    }

    return { ok: true, value: rootHash }
  }

  const rootHashes: string[] = []
  for (const root of roots) {
    const result = visit(root)
    if (!result.ok) return result
    rootHashes.push(result.value)
  }

  return { ok: true, value: new PipelineGraph(table.values(), rootHashes) }
}
