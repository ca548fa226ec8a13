import { stringify } from 'yaml'
import type { CiConfig, DuplicateJobError, PipelineOptions, Result } from 'shared'
import { planJobs, type AnnotatedPipeline } from '../pipeline/plan.js'
import { withoutReservedTags } from '../pipeline/attributes.js'
import { formatSpec, shortHash, type SpecNode } from '../pipeline/spec-node.js'
import { DEFAULT_BUILD_SCRIPT, jobKeys, NOOP_MESSAGE, pipelineVariables } from './common.js'
import type { PipelineGenerator } from './registry.js'

const FALLBACK_RUNNER = 'ubuntu-latest'

/**
 * Job ids may only hold letters, digits, `-` and `_`, and must not start with
 * a digit or `-`.
 */
export function githubJobId(node: SpecNode): string {
  const base = node.name.replace(/[^A-Za-z0-9_-]/g, '-')
  const prefixed = /^[A-Za-z_]/.test(base) ? base : `pkg-${base}`
  return `${prefixed}-${shortHash(node.hash)}`
}

export function renderGithub(
  pipeline: AnnotatedPipeline,
  config: CiConfig,
  options: PipelineOptions,
): Result<string, DuplicateJobError> {
  const plan = planJobs(pipeline)
  const ids = jobKeys(plan.jobs.map(job => job.node), githubJobId)
  if (!ids.ok) return ids
  const jobs: Record<string, unknown> = {}
  const script = [...(config.beforeScript ?? []), ...(config.script ?? DEFAULT_BUILD_SCRIPT)]

  for (const job of plan.jobs) {
    const needs = job.needs.flatMap(hash => {
      const id = ids.value.get(hash)
      return id ? [id] : []
    })
    jobs[githubJobId(job.node)] = {
      name: `stage-${job.stage}: ${formatSpec(job.node, { hash: true })}`,
      'runs-on': [...job.attributes.tags],
      ...(needs.length > 0 ? { needs } : {}),
      ...(config.image ? { container: config.image } : {}),
      'continue-on-error': job.attributes.allowFailure,
      env: { ...job.attributes.variables },
      steps: script.map(run => ({ run })),
    }
  }

  if (plan.jobs.length === 0) {
    const runner = withoutReservedTags(config.defaults?.tags ?? [])
    jobs.noop = {
      'runs-on': runner.length > 0 ? runner : [FALLBACK_RUNNER],
      steps: [{ run: NOOP_MESSAGE }],
    }
  }

  const workflow = {
    name: 'stackci',
    on: { workflow_dispatch: {} },
    env: pipelineVariables(config, options),
    jobs,
  }

  return { ok: true, value: stringify(workflow, { lineWidth: 0, aliasDuplicateObjects: false }) }
}

export const githubGenerator: PipelineGenerator = {
  platform: 'github',
  defaultOutputPath: '.github/workflows/stackci.yml',
  render: renderGithub,
}
