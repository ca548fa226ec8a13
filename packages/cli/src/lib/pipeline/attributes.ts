import type { CiConfig, JobAttributes, Result, RuleAttributes, RuleMatch, VariantValue } from 'shared'
import { MissingRequiredAttributeError } from 'shared'
import { satisfiesRange } from '../versions.js'
import type { PipelineGraph } from './dag.js'
import { isKept, type PruneResult } from './pruner.js'
import { formatSpec, formatVariants, type SpecNode } from './spec-node.js'

/**
 * A configuration rule with its precedence made explicit. Higher
 * `specificity` wins; among equals the higher (later) `index` wins.
 */
export interface AttributeRule {
  predicate: RuleMatch
  attributes: RuleAttributes
  specificity: number
  index: number
}

const DEFAULTS_INDEX = -1

/** Runner tags kept for signing jobs; no build job may request them. */
export const RESERVED_TAGS: readonly string[] = ['notary', 'protected', 'public']

export function withoutReservedTags(tags: readonly string[]): string[] {
  return tags.filter(tag => !RESERVED_TAGS.includes(tag))
}

function countConstraints(match: RuleMatch | undefined): number {
  if (!match) return 0
  let count = 0
  if (match.package !== undefined) count++
  if (match.version !== undefined) count++
  if (match.compiler !== undefined) count++
  if (match.arch !== undefined) count++
  count += Object.keys(match.variants ?? {}).length
  return count
}

function byPrecedence(a: AttributeRule, b: AttributeRule): number {
  return a.specificity - b.specificity || a.index - b.index
}

/**
 * Turn `ci.defaults` and `ci.rules` into precedence-ordered rules, lowest
 * precedence first. `ci.defaults` sits below every declared rule.
 */
export function compileRules(ci: CiConfig | undefined): AttributeRule[] {
  const rules: AttributeRule[] = []
  if (ci?.defaults) {
    rules.push({ predicate: {}, attributes: ci.defaults, specificity: 0, index: DEFAULTS_INDEX })
  }
  for (const [index, rule] of (ci?.rules ?? []).entries()) {
    const { match, ...attributes } = rule
    rules.push({
      predicate: match ?? {},
      attributes,
      specificity: countConstraints(match),
      index,
    })
  }
  return rules.sort(byPrecedence)
}

const globCache = new Map<string, RegExp>()

export function globToRegExp(pattern: string): RegExp {
  const cached = globCache.get(pattern)
  if (cached) return cached
  let source = ''
  for (const char of pattern) {
    if (char === '*') source += '.*'
    else if (char === '?') source += '.'
    else source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&')
  }
  const regex = new RegExp(`^${source}$`)
  globCache.set(pattern, regex)
  return regex
}

function variantEquals(actual: VariantValue | undefined, expected: VariantValue): boolean {
  if (actual === undefined) return false
  if (Array.isArray(expected) || Array.isArray(actual)) {
    const left = Array.isArray(actual) ? [...actual].sort() : [actual]
    const right = Array.isArray(expected) ? [...expected].sort() : [expected]
    return left.length === right.length && left.every((v, i) => v === right[i])
  }
  return actual === expected
}

export function ruleMatches(predicate: RuleMatch, node: SpecNode): boolean {
  if (predicate.package !== undefined && !globToRegExp(predicate.package).test(node.name)) {
    return false
  }
  if (predicate.version !== undefined && !satisfiesRange(node.version, predicate.version)) {
    return false
  }
  if (predicate.compiler !== undefined) {
    if (!node.compiler) return false
    const pattern = globToRegExp(predicate.compiler)
    const { name, version } = node.compiler
    if (!pattern.test(name) && !pattern.test(`${name}@${version}`)) return false
  }
  if (predicate.arch !== undefined) {
    if (!node.arch || !globToRegExp(predicate.arch).test(node.arch)) return false
  }
  for (const [key, expected] of Object.entries(predicate.variants ?? {})) {
    if (!variantEquals(node.variants[key], expected)) return false
  }
  return true
}

/**
 * Variables every job carries so its script can tell which spec it builds.
 */
export function builtinVariables(node: SpecNode): Record<string, string> {
  const variables: Record<string, string> = {
    STACKCI_JOB_SPEC_HASH: node.hash,
    STACKCI_JOB_SPEC_PKG_NAME: node.name,
    STACKCI_JOB_SPEC_PKG_VERSION: node.version,
  }
  if (node.compiler) {
    variables.STACKCI_JOB_SPEC_COMPILER_NAME = node.compiler.name
    variables.STACKCI_JOB_SPEC_COMPILER_VERSION = node.compiler.version
  }
  if (node.arch) variables.STACKCI_JOB_SPEC_ARCH = node.arch
  const variants = formatVariants(node.variants)
  if (variants) variables.STACKCI_JOB_SPEC_VARIANTS = variants
  return variables
}

function sortedRecord(record: Record<string, string>): Record<string, string> {
  const sorted: Record<string, string> = {}
  for (const key of Object.keys(record).sort()) sorted[key] = record[key]
  return sorted
}

/**
 * Merge every matching rule onto one node, lowest precedence first. Each rule
 * only touches the fields it sets: `tags` replaces, `variables` merges per
 * key, `orderHint` and `allowFailure` replace. Reserved tags are dropped from
 * the result.
 */
export function resolveNodeAttributes(
  node: SpecNode,
  rules: readonly AttributeRule[],
): Result<JobAttributes, MissingRequiredAttributeError> {
  let tags: string[] | undefined
  const variables = builtinVariables(node)
  let orderHint: number | undefined
  let allowFailure = false

  for (const rule of [...rules].sort(byPrecedence)) {
    if (!ruleMatches(rule.predicate, node)) continue
    const { attributes } = rule
    if (attributes.tags !== undefined) tags = withoutReservedTags(attributes.tags)
    if (attributes.variables !== undefined) Object.assign(variables, attributes.variables)
    if (attributes.orderHint !== undefined) orderHint = attributes.orderHint
    if (attributes.allowFailure !== undefined) allowFailure = attributes.allowFailure
  }

  const label = formatSpec(node)
  if (!tags || tags.length === 0) {
    return { ok: false, error: new MissingRequiredAttributeError(node.hash, label, 'tags') }
  }
  if (orderHint === undefined || !Number.isInteger(orderHint) || orderHint < 0) {
    return { ok: false, error: new MissingRequiredAttributeError(node.hash, label, 'orderHint') }
  }

  return {
    ok: true,
    value: Object.freeze({
      tags: [...new Set(tags)].sort(),
      variables: sortedRecord(variables),
      orderHint,
      allowFailure,
    }),
  }
}

/**
 * Attribute sets for every node the pruner kept. Nodes are visited in hash
 * order, and the first failure (by that order) is reported.
 */
export function resolveAttributes(
  graph: PipelineGraph,
  pruning: PruneResult,
  ci: CiConfig | undefined,
): Result<Map<string, JobAttributes>, MissingRequiredAttributeError> {
  const rules = compileRules(ci)
  const attributes = new Map<string, JobAttributes>()
  const hashes = graph.nodes().map(n => n.hash).sort()

  for (const hash of hashes) {
    const node = graph.get(hash)
    if (!node || !isKept(pruning, hash)) continue
    const result = resolveNodeAttributes(node, rules)
    if (!result.ok) return result
    attributes.set(hash, result.value)
  }

  return { ok: true, value: attributes }
}
