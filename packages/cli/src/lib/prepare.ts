import { resolve } from 'node:path'
import type { CiConfig, PipelineOptions, Result, StackManifest } from 'shared'
import { linkSpecs, loadStackManifest } from './loader.js'
import { collectPipelineOptions, selectPlatform, type PipelineFlags } from './options.js'
import { loadSignals } from './signals.js'
import { assemblePipeline, type AnnotatedPipeline } from './pipeline/index.js'
import type { GeneratorRegistry, PipelineGenerator } from './generators/index.js'

export interface PrepareFlags extends PipelineFlags {
  /** Manifest file or the directory holding stackci.yaml. */
  manifest?: string
  changed?: string
  available?: string
  broken?: string
}

export interface PreparedPipeline {
  manifest: StackManifest
  config: CiConfig
  generator: PipelineGenerator
  options: PipelineOptions
  pipeline: AnnotatedPipeline
}

/**
 * Everything up to rendering: load and link the manifest, pick the generator,
 * settle the options, read the signal files, then build, prune and resolve.
 */
export async function preparePipeline(
  flags: PrepareFlags,
  registry: GeneratorRegistry,
  cwd: string = process.cwd(),
): Promise<Result<PreparedPipeline, string>> {
  const loaded = await loadStackManifest(resolve(cwd, flags.manifest ?? '.'))
  if (!loaded.ok) {
    return { ok: false, error: loaded.error.map(e => `${e.path}: ${e.message}`).join('\n') }
  }
  const manifest = loaded.value
  const config = manifest.ci ?? {}

  const linked = linkSpecs(manifest)
  if (!linked.ok) {
    return { ok: false, error: linked.error.map(e => `${e.path}: ${e.message}`).join('\n') }
  }

  const generator = registry.resolve(selectPlatform(flags, config))
  if (!generator.ok) {
    return { ok: false, error: generator.error.message }
  }

  const collected = collectPipelineOptions(flags, config, generator.value.defaultOutputPath)
  if (!collected.ok) return collected
  let options = collected.value
  if (options.affectedOnly && flags.changed === undefined) {
    console.error('Warning: affected-only pruning needs --changed; keeping unaffected specs')
    options = Object.freeze({ ...options, affectedOnly: false })
  }
  options = Object.freeze({ ...options, outputPath: resolve(cwd, options.outputPath) })

  const signals = await loadSignals({
    ...(flags.available ? { available: resolve(cwd, flags.available) } : {}),
    ...(flags.broken ? { broken: resolve(cwd, flags.broken) } : {}),
    ...(flags.changed !== undefined ? { changed: flags.changed } : {}),
  })
  if (!signals.ok) return signals

  const assembled = assemblePipeline(linked.value, config, options, signals.value)
  if (!assembled.ok) {
    return { ok: false, error: assembled.error.message }
  }

  return {
    ok: true,
    value: { manifest, config, generator: generator.value, options, pipeline: assembled.value },
  }
}
