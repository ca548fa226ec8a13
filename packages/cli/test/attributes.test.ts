import { describe, it, expect } from 'vitest'
import { MissingRequiredAttributeError } from 'shared'
import type { CiConfig } from 'shared'
import {
  builtinVariables,
  compileRules,
  globToRegExp,
  resolveAttributes,
  resolveNodeAttributes,
  ruleMatches,
} from '../src/lib/pipeline/attributes.js'
import { prunePipeline } from '../src/lib/pipeline/pruner.js'
import { createSpecNode } from '../src/lib/pipeline/spec-node.js'
import { build, hashOf, NO_PRUNING, scenarioStack } from './helpers.js'

const gccNode = createSpecNode({
  name: 'py-numpy',
  version: '1.26.4',
  compiler: { name: 'gcc', version: '12.2.0' },
  arch: 'linux-ubuntu22.04-x86_64',
  variants: { blas: 'openblas', shared: true, targets: ['x86', 'arm'] },
}, [])

function resolveAll(ci: CiConfig) {
  const graph = build([scenarioStack().R])
  const pruning = prunePipeline(graph, NO_PRUNING)
  return { graph, result: resolveAttributes(graph, pruning, ci) }
}

describe('compileRules', () => {
  it('orders rules by specificity, then declaration', () => {
    const rules = compileRules({
      defaults: { tags: ['default'] },
      rules: [
        { match: { package: 'A' }, tags: ['gpu'] },
        { tags: ['x'] },
      ],
    })
    expect(rules.map(r => [r.specificity, r.index])).toEqual([[0, -1], [0, 1], [1, 0]])
  })

  it('counts each variant as a constraint', () => {
    const [rule] = compileRules({ rules: [{ match: { package: 'A', variants: { shared: true, pic: false } } }] })
    expect(rule.specificity).toBe(3)
  })

  it('returns nothing without a ci section', () => {
    expect(compileRules(undefined)).toEqual([])
  })
})

describe('ruleMatches', () => {
  it('matches package globs', () => {
    expect(globToRegExp('py-*').test('py-numpy')).toBe(true)
    expect(globToRegExp('lib?').test('libz')).toBe(true)
    expect(globToRegExp('lib?').test('libzz')).toBe(false)
    expect(globToRegExp('a.b').test('aXb')).toBe(false)
    expect(ruleMatches({ package: 'py-*' }, gccNode)).toBe(true)
    expect(ruleMatches({ package: 'py' }, gccNode)).toBe(false)
  })

  it('matches version ranges', () => {
    expect(ruleMatches({ version: '^1.26' }, gccNode)).toBe(true)
    expect(ruleMatches({ version: '<1.26' }, gccNode)).toBe(false)
  })

  it('matches compilers by name or name@version', () => {
    expect(ruleMatches({ compiler: 'gcc' }, gccNode)).toBe(true)
    expect(ruleMatches({ compiler: 'gcc@12*' }, gccNode)).toBe(true)
    expect(ruleMatches({ compiler: 'clang' }, gccNode)).toBe(false)
    expect(ruleMatches({ compiler: 'gcc' }, createSpecNode({ name: 'x', version: '1' }, []))).toBe(false)
  })

  it('matches arch and variants', () => {
    expect(ruleMatches({ arch: 'linux-*-x86_64' }, gccNode)).toBe(true)
    expect(ruleMatches({ variants: { shared: true, blas: 'openblas' } }, gccNode)).toBe(true)
    expect(ruleMatches({ variants: { targets: ['arm', 'x86'] } }, gccNode)).toBe(true)
    expect(ruleMatches({ variants: { targets: ['arm'] } }, gccNode)).toBe(false)
    expect(ruleMatches({ variants: { shared: false } }, gccNode)).toBe(false)
    expect(ruleMatches({ variants: { debug: true } }, gccNode)).toBe(false)
  })

  it('matches everything with an empty predicate', () => {
    expect(ruleMatches({}, gccNode)).toBe(true)
  })
})

describe('builtinVariables', () => {
  it('describes the spec a job builds', () => {
    expect(builtinVariables(gccNode)).toEqual({
      STACKCI_JOB_SPEC_HASH: gccNode.hash,
      STACKCI_JOB_SPEC_PKG_NAME: 'py-numpy',
      STACKCI_JOB_SPEC_PKG_VERSION: '1.26.4',
      STACKCI_JOB_SPEC_COMPILER_NAME: 'gcc',
      STACKCI_JOB_SPEC_COMPILER_VERSION: '12.2.0',
      STACKCI_JOB_SPEC_ARCH: 'linux-ubuntu22.04-x86_64',
      STACKCI_JOB_SPEC_VARIANTS: 'blas=openblas+shared targets=arm,x86',
    })
  })
})

describe('resolveAttributes', () => {
  it('lets a package rule override a global rule', () => {
    const { graph, result } = resolveAll({
      rules: [
        { tags: ['default'], orderHint: 0 },
        { match: { package: 'A' }, tags: ['gpu'] },
      ],
    })
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.get(hashOf(graph, 'A'))?.tags).toEqual(['gpu'])
      for (const name of ['B', 'C', 'R']) {
        expect(result.value.get(hashOf(graph, name))?.tags).toEqual(['default'])
      }
    }
  })

  it('prefers the more specific rule whatever the declaration order', () => {
    const { graph, result } = resolveAll({
      rules: [
        { match: { package: 'A' }, tags: ['gpu'] },
        { tags: ['default'], orderHint: 0 },
      ],
    })
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.get(hashOf(graph, 'A'))?.tags).toEqual(['gpu'])
      expect(result.value.get(hashOf(graph, 'B'))?.tags).toEqual(['default'])
    }
  })

  it('lets the later of two equally specific rules win', () => {
    const { graph, result } = resolveAll({
      defaults: { tags: ['default'], orderHint: 0 },
      rules: [
        { match: { package: 'A' }, tags: ['one'] },
        { match: { package: 'A*' }, tags: ['two'] },
      ],
    })
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.get(hashOf(graph, 'A'))?.tags).toEqual(['two'])
    }
  })

  it('merges fields independently', () => {
    const { graph, result } = resolveAll({
      defaults: { tags: ['default'], orderHint: 0, variables: { X: '1', Y: '1' } },
      rules: [
        { match: { package: 'A' }, variables: { Y: '2' }, allowFailure: true },
        { match: { package: 'A', version: '1.0.0' }, orderHint: 5 },
      ],
    })
    expect(result.ok).toBe(true)
    if (result.ok) {
      const A = result.value.get(hashOf(graph, 'A'))
      expect(A?.tags).toEqual(['default'])
      expect(A?.orderHint).toBe(5)
      expect(A?.allowFailure).toBe(true)
      expect(A?.variables.X).toBe('1')
      expect(A?.variables.Y).toBe('2')
      expect(result.value.get(hashOf(graph, 'B'))?.allowFailure).toBe(false)
    }
  })

  it('sorts tags and variable names', () => {
    const node = createSpecNode({ name: 'zlib', version: '1.3.1' }, [])
    const rules = compileRules({ defaults: { tags: ['b', 'a', 'b'], orderHint: 0, variables: { ZZ: '1', AA: '2' } } })
    const result = resolveNodeAttributes(node, rules)
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.tags).toEqual(['a', 'b'])
      expect(Object.keys(result.value.variables)).toEqual([
        'AA',
        'STACKCI_JOB_SPEC_HASH',
        'STACKCI_JOB_SPEC_PKG_NAME',
        'STACKCI_JOB_SPEC_PKG_VERSION',
        'ZZ',
      ])
      expect(Object.isFrozen(result.value)).toBe(true)
    }
  })

  it('drops reserved runner tags', () => {
    const node = createSpecNode({ name: 'zlib', version: '1.3.1' }, [])
    const result = resolveNodeAttributes(node, compileRules({
      defaults: { tags: ['default'], orderHint: 0 },
      rules: [{ match: { package: 'zlib' }, tags: ['protected', 'gpu'] }],
    }))
    expect(result.ok && result.value.tags).toEqual(['gpu'])
  })

  it('fails when only reserved tags are left', () => {
    const node = createSpecNode({ name: 'zlib', version: '1.3.1' }, [])
    const result = resolveNodeAttributes(node, compileRules({ defaults: { tags: ['notary', 'public'], orderHint: 0 } }))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(MissingRequiredAttributeError)
      expect(result.error.field).toBe('tags')
    }
  })

  it('gives identical results on every run', () => {
    const ci: CiConfig = {
      defaults: { tags: ['default'], orderHint: 0 },
      rules: [{ match: { package: 'R' }, tags: ['big', 'linux'], variables: { JOBS: '8' } }],
    }
    const first = resolveAll(ci).result
    const second = resolveAll(ci).result
    expect(first.ok && second.ok).toBe(true)
    if (first.ok && second.ok) {
      expect(JSON.stringify([...second.value])).toBe(JSON.stringify([...first.value]))
    }
  })

  it('fails when no rule gives a node tags', () => {
    const { graph, result } = resolveAll({ defaults: { orderHint: 0 } })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(MissingRequiredAttributeError)
      expect(result.error.field).toBe('tags')
      const first = graph.nodes().map(n => n.hash).sort()[0]
      expect(result.error.hash).toBe(first)
    }
  })

  it('fails on a missing or negative orderHint', () => {
    const missing = resolveAll({ defaults: { tags: ['default'] } }).result
    expect(!missing.ok && missing.error.field).toBe('orderHint')

    const negative = resolveAll({ defaults: { tags: ['default'], orderHint: -1 } }).result
    expect(!negative.ok && negative.error.field).toBe('orderHint')
  })

  it('only resolves kept nodes', () => {
    const graph = build([scenarioStack().R])
    const C = hashOf(graph, 'C')
    const pruning = prunePipeline(graph, { ...NO_PRUNING, pruneUpToDate: true }, { available: new Set([C]) })
    // C has no tags, but it is pruned so that does not matter
    const byName = resolveAttributes(graph, pruning, {
      defaults: { orderHint: 0 },
      rules: ['A', 'B', 'R'].map(name => ({ match: { package: name }, tags: ['t'] })),
    })
    expect(byName.ok).toBe(true)
    if (byName.ok) {
      expect(byName.value.size).toBe(3)
      expect(byName.value.has(C)).toBe(false)
    }
  })
})
