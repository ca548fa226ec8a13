import { createHash } from 'node:crypto'
import type { ConcreteSpec, CompilerRef, VariantValue } from 'shared'

export const HASH_LENGTH = 32

/**
 * One concrete build unit of the pipeline graph. Identity is `hash`; edges
 * are stored as dependency hashes, never as owned child objects.
 */
export interface SpecNode {
  readonly hash: string
  readonly name: string
  readonly version: string
  readonly variants: Readonly<Record<string, VariantValue>>
  readonly compiler?: Readonly<CompilerRef>
  readonly arch?: string
  readonly external: boolean
  readonly dependencies: readonly string[]
}

type SpecContent = Omit<ConcreteSpec, 'dependencies'>

function normalizeVariants(variants: Record<string, VariantValue> | undefined): Record<string, VariantValue> {
  const normalized: Record<string, VariantValue> = {}
  for (const key of Object.keys(variants ?? {}).sort()) {
    const value = variants?.[key]
    if (value === undefined) continue
    normalized[key] = Array.isArray(value) ? [...value].sort() : value
  }
  return normalized
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`)
    return `{${entries.join(',')}}`
  }
  return JSON.stringify(value)
}

/**
 * Content hash over the spec's own fields and the hashes of its direct
 * dependencies. Dependency order does not affect the result.
 */
export function computeSpecHash(spec: SpecContent, dependencyHashes: readonly string[]): string {
  const payload = canonicalJson({
    name: spec.name,
    version: spec.version,
    variants: normalizeVariants(spec.variants),
    compiler: spec.compiler ? { name: spec.compiler.name, version: spec.compiler.version } : undefined,
    arch: spec.arch,
    external: spec.external === true,
    dependencies: [...new Set(dependencyHashes)].sort(),
  })
  return createHash('sha256').update(payload).digest('hex').slice(0, HASH_LENGTH)
}

export function createSpecNode(spec: SpecContent, dependencyHashes: readonly string[]): SpecNode {
  const dependencies = Object.freeze([...new Set(dependencyHashes)].sort())
  const node: SpecNode = {
    hash: computeSpecHash(spec, dependencies),
    name: spec.name,
    version: spec.version,
    variants: Object.freeze(normalizeVariants(spec.variants)),
    ...(spec.compiler ? { compiler: Object.freeze({ name: spec.compiler.name, version: spec.compiler.version }) } : {}),
    ...(spec.arch ? { arch: spec.arch } : {}),
    external: spec.external === true,
    dependencies,
  }
  return Object.freeze(node)
}

export function shortHash(hash: string): string {
  return hash.slice(0, 7)
}

/**
 * Render variants the way build tools print them: `+on~off key=value`.
 */
export function formatVariants(variants: Readonly<Record<string, VariantValue>>): string {
  let out = ''
  for (const key of Object.keys(variants).sort()) {
    const value = variants[key]
    if (value === true) out += `+${key}`
    else if (value === false) out += `~${key}`
    else if (Array.isArray(value)) out += ` ${key}=${value.join(',')}`
    else out += ` ${key}=${value}`
  }
  return out.trim()
}

/**
 * `name@version`, optionally followed by `%compiler@version` and `/hash7`.
 */
export function formatSpec(node: SpecNode, options: { compiler?: boolean; hash?: boolean } = {}): string {
  let label = `${node.name}@${node.version}`
  if (options.compiler && node.compiler) {
    label += ` %${node.compiler.name}@${node.compiler.version}`
  }
  if (options.hash) {
    label += ` /${shortHash(node.hash)}`
  }
  return label
}
