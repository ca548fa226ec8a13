import type { CiConfig, PipelineOptions, Result } from 'shared'
import { DuplicateGeneratorError, UnknownGeneratorError, type PipelineError } from 'shared'
import type { AnnotatedPipeline } from '../pipeline/plan.js'

/**
 * A CI backend. `render` must be pure: same input, same text, no I/O and no
 * mutation of the pipeline it is given. It fails instead of emitting fewer
 * jobs than the pipeline keeps.
 */
export interface PipelineGenerator {
  readonly platform: string
  /** Where the file goes when no output path is configured. */
  readonly defaultOutputPath: string
  render(pipeline: AnnotatedPipeline, config: CiConfig, options: PipelineOptions): Result<string, PipelineError>
}

/**
 * Platform name → generator. Filled by explicit `register` calls at start-up
 * and only read afterwards.
 */
export class GeneratorRegistry {
  private readonly generators = new Map<string, PipelineGenerator>()

  register(platform: string, generator: PipelineGenerator): void {
    if (this.generators.has(platform)) {
      throw new DuplicateGeneratorError(platform)
    }
    this.generators.set(platform, generator)
  }

  resolve(platform: string): Result<PipelineGenerator, UnknownGeneratorError> {
    const generator = this.generators.get(platform)
    if (!generator) {
      return { ok: false, error: new UnknownGeneratorError(platform, this.platforms()) }
    }
    return { ok: true, value: generator }
  }

  platforms(): string[] {
    return [...this.generators.keys()].sort()
  }
}
