export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  path: string
  message: string
}

export type VariantValue = string | boolean | string[]

export interface CompilerRef {
  name: string
  version: string
}

/**
 * A concretized package build as read from the `specs` table of stackci.yaml.
 * Dependencies are keys into the same table.
 */
export interface SpecEntry {
  name: string
  version: string
  variants?: Record<string, VariantValue>
  compiler?: CompilerRef
  arch?: string
  external?: boolean
  dependencies?: string[]
}

/**
 * A concretized spec with its dependencies linked as object references.
 * Distinct objects with equal content describe the same build.
 */
export interface ConcreteSpec {
  name: string
  version: string
  variants?: Record<string, VariantValue>
  compiler?: CompilerRef
  arch?: string
  external?: boolean
  dependencies?: ConcreteSpec[]
}

export interface RuleMatch {
  package?: string
  version?: string
  compiler?: string
  arch?: string
  variants?: Record<string, VariantValue>
}

export interface RuleAttributes {
  tags?: string[]
  variables?: Record<string, string>
  orderHint?: number
  allowFailure?: boolean
}

export interface RuleConfig extends RuleAttributes {
  match?: RuleMatch
}

export interface CiConfig {
  target?: string
  defaults?: RuleAttributes
  rules?: RuleConfig[]
  script?: string[]
  beforeScript?: string[]
  image?: string
  rebuildIndex?: boolean
  indexScript?: string[]
  variables?: Record<string, string>
  artifactsRoot?: string
  pruneUpToDate?: boolean
  pruneBroken?: boolean
  pruneExternal?: boolean
  affectedOnly?: boolean
}

export interface StackManifest {
  name: string
  roots: string[]
  specs: Record<string, SpecEntry>
  ci?: CiConfig
}

export type NodeStatus =
  | 'keep'
  | 'pruned-broken'
  | 'pruned-available'
  | 'pruned-unaffected'
  | 'pruned-external'

export interface PipelineOptions {
  platform: string
  outputPath: string
  pruneUpToDate: boolean
  pruneBroken: boolean
  affectedOnly: boolean
  pruneExternal: boolean
  dependentDepth?: number
  printSummary: boolean
  artifactsRoot: string
}

export interface JobAttributes {
  tags: string[]
  variables: Record<string, string>
  orderHint: number
  allowFailure: boolean
}
