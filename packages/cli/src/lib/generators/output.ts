import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join, resolve } from 'node:path'
import { randomBytes } from 'node:crypto'
import type { CiConfig, PipelineOptions, Result } from 'shared'
import { OutputWriteError, type PipelineError } from 'shared'
import type { AnnotatedPipeline } from '../pipeline/plan.js'
import type { PipelineGenerator } from './registry.js'

/**
 * Write `content` next to `path` under a temporary name, then rename it into
 * place. On failure the temporary file is removed and `path` is untouched.
 */
export async function writeFileAtomic(path: string, content: string): Promise<Result<string, OutputWriteError>> {
  const target = resolve(path)
  const directory = dirname(target)
  const temp = join(directory, `.${basename(target)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`)

  try {
    await mkdir(directory, { recursive: true })
    await writeFile(temp, content, 'utf-8')
    await rename(temp, target)
    return { ok: true, value: target }
  } catch (error) {
    try {
      await rm(temp, { force: true })
    } catch (cleanupError) {
      return { ok: false, error: new OutputWriteError(target, new AggregateError([error, cleanupError])) }
    }
    return { ok: false, error: new OutputWriteError(target, error) }
  }
}

/**
 * Render with `generator` and write the result to `options.outputPath`.
 * Resolves to the absolute path written. Nothing is written when rendering
 * fails.
 */
export async function writePipeline(
  generator: PipelineGenerator,
  pipeline: AnnotatedPipeline,
  config: CiConfig,
  options: PipelineOptions,
): Promise<Result<string, PipelineError>> {
  const content = generator.render(pipeline, config, options)
  if (!content.ok) return content
  return writeFileAtomic(options.outputPath, content.value)
}
