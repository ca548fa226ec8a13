export type PipelineErrorType =
  | 'cyclic-dependency'
  | 'duplicate-generator'
  | 'unknown-generator'
  | 'missing-required-attribute'
  | 'duplicate-job'
  | 'output-write'

export abstract class PipelineError extends Error {
  abstract readonly type: PipelineErrorType

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class CyclicDependencyError extends PipelineError {
  readonly type = 'cyclic-dependency'

  /** Specs on the cycle, first entry repeated at the end. */
  readonly cycle: string[]

  constructor(cycle: string[]) {
    super(`Cyclic dependency detected: ${cycle.join(' → ')}`)
    this.cycle = cycle
  }
}

export class DuplicateGeneratorError extends PipelineError {
  readonly type = 'duplicate-generator'
  readonly platform: string

  constructor(platform: string) {
    super(`A generator is already registered for platform "${platform}"`)
    this.platform = platform
  }
}

export class UnknownGeneratorError extends PipelineError {
  readonly type = 'unknown-generator'
  readonly platform: string
  readonly known: string[]

  constructor(platform: string, known: string[]) {
    const list = known.length > 0 ? known.join(', ') : '(none)'
    super(`No registered generator for platform "${platform}". Known platforms: ${list}`)
    this.platform = platform
    this.known = known
  }
}

export class MissingRequiredAttributeError extends PipelineError {
  readonly type = 'missing-required-attribute'
  readonly hash: string
  readonly spec: string
  readonly field: 'tags' | 'orderHint'

  constructor(hash: string, spec: string, field: 'tags' | 'orderHint') {
    const missing = field === 'tags' ? 'tags' : 'non-negative orderHint'
    super(`Job for ${spec} /${hash.slice(0, 7)} has no ${missing}; add a matching rule or ci.defaults entry`)
    this.hash = hash
    this.spec = spec
    this.field = field
  }
}

export class DuplicateJobError extends PipelineError {
  readonly type = 'duplicate-job'
  readonly job: string
  /** Hashes of the two specs that map to `job`. */
  readonly hashes: [string, string]

  constructor(job: string, first: string, second: string) {
    super(`Job "${job}" would be emitted for both ${first} and ${second}`)
    this.job = job
    this.hashes = [first, second]
  }
}

export class OutputWriteError extends PipelineError {
  readonly type = 'output-write'
  readonly path: string

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to write pipeline to ${path}: ${reason}`, { cause })
    this.path = path
  }
}
