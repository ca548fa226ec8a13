import { relative } from 'node:path'
import type { Result } from 'shared'
import type { GeneratorRegistry } from '../lib/generators/index.js'
import { writePipeline } from '../lib/generators/index.js'
import { formatPruningSummary, keptNodes } from '../lib/pipeline/index.js'
import { preparePipeline, type PrepareFlags } from '../lib/prepare.js'

export type GenerateOptions = PrepareFlags

export interface GenerateResult {
  platform: string
  outputPath: string
  jobs: number
  pruned: number
}

export async function generateCommand(
  options: GenerateOptions,
  registry: GeneratorRegistry,
): Promise<Result<GenerateResult, string>> {
  const prepared = await preparePipeline(options, registry)
  if (!prepared.ok) return prepared

  const { generator, config, pipeline, options: pipelineOptions } = prepared.value

  if (pipelineOptions.printSummary) {
    for (const line of formatPruningSummary(pipeline.graph, pipeline.pruning)) {
      console.error(line)
    }
  }

  const written = await writePipeline(generator, pipeline, config, pipelineOptions)
  if (!written.ok) {
    return { ok: false, error: written.error.message }
  }

  const jobs = keptNodes(pipeline.graph, pipeline.pruning).length
  const pruned = pipeline.graph.size - jobs
  console.error(`✅ Generated ${generator.platform} pipeline with ${jobs} job(s): ${relative(process.cwd(), written.value) || written.value}`)

  return {
    ok: true,
    value: { platform: generator.platform, outputPath: written.value, jobs, pruned },
  }
}
