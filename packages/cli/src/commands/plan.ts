import type { NodeStatus, Result } from 'shared'
import type { GeneratorRegistry } from '../lib/generators/index.js'
import { formatSpec, planJobs, shortHash } from '../lib/pipeline/index.js'
import { preparePipeline, type PrepareFlags } from '../lib/prepare.js'

export interface PlanOptions extends PrepareFlags {
  json?: boolean
}

export interface PlanReport {
  platform: string
  stages: {
    stage: number
    jobs: { spec: string; hash: string; tags: string[]; needs: string[] }[]
  }[]
  pruned: { spec: string; hash: string; status: NodeStatus; reason: string }[]
}

export async function planCommand(
  options: PlanOptions,
  registry: GeneratorRegistry,
): Promise<Result<PlanReport, string>> {
  const prepared = await preparePipeline(options, registry)
  if (!prepared.ok) return prepared

  const { pipeline, generator } = prepared.value
  const { graph, pruning } = pipeline
  const plan = planJobs(pipeline)

  const report: PlanReport = {
    platform: generator.platform,
    stages: plan.stages.map(stage => ({
      stage,
      jobs: plan.jobs
        .filter(job => job.stage === stage)
        .map(job => ({
          spec: formatSpec(job.node),
          hash: job.node.hash,
          tags: job.attributes.tags,
          needs: job.needs,
        })),
    })),
    pruned: graph.nodes().flatMap(node => {
      const decision = pruning.get(node.hash)
      if (!decision || decision.status === 'keep') return []
      return [{ spec: formatSpec(node), hash: node.hash, status: decision.status, reason: decision.reason }]
    }),
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2))
    return { ok: true, value: report }
  }

  console.error(`\nPipeline plan (${report.platform}): ${plan.jobs.length} job(s) in ${plan.stages.length} stage(s)\n`)
  for (const { stage, jobs } of report.stages) {
    console.error(`  stage-${stage}`)
    for (const job of jobs) {
      const needs = job.needs.length > 0 ? ` ← ${job.needs.map(shortHash).join(', ')}` : ''
      console.error(`    ${job.spec} /${shortHash(job.hash)} [${job.tags.join(', ')}]${needs}`)
    }
  }
  if (report.pruned.length > 0) {
    console.error(`\n  pruned`)
    for (const entry of report.pruned) {
      console.error(`    ${entry.spec} /${shortHash(entry.hash)} (${entry.status}: ${entry.reason})`)
    }
  }
  console.error('')

  return { ok: true, value: report }
}
