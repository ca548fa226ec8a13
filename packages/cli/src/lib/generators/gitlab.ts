import { stringify } from 'yaml'
import type { CiConfig, DuplicateJobError, PipelineOptions, Result } from 'shared'
import { planJobs, type AnnotatedPipeline } from '../pipeline/plan.js'
import { withoutReservedTags } from '../pipeline/attributes.js'
import { formatSpec, shortHash, type SpecNode } from '../pipeline/spec-node.js'
import { DEFAULT_BUILD_SCRIPT, jobKeys, NOOP_MESSAGE, pipelineVariables } from './common.js'
import type { PipelineGenerator } from './registry.js'

// https://docs.gitlab.com/ee/ci/yaml/#retry
const JOB_RETRY_CONDITIONS = [
  'unknown_failure',
  'script_failure',
  'api_failure',
  'stuck_or_timeout_failure',
  'runner_system_failure',
  'runner_unsupported',
  'stale_schedule',
  'archived_failure',
  'unmet_prerequisites',
  'scheduler_failure',
  'data_integrity_failure',
]

const SERVICE_RETRY_CONDITIONS = ['runner_system_failure', 'stuck_or_timeout_failure', 'script_failure']

const DEFAULT_INDEX_SCRIPT = ['echo "Rebuilding build cache index"']

const MAX_JOB_NAME_LENGTH = 255

/**
 * `name@version /hash7`. Long labels are cut to GitLab's job name limit
 * before the hash, which is always kept.
 */
export function gitlabJobName(node: SpecNode): string {
  const suffix = ` /${shortHash(node.hash)}`
  return formatSpec(node).slice(0, MAX_JOB_NAME_LENGTH - suffix.length) + suffix
}

function stageName(stage: number): string {
  return `stage-${stage}`
}

function sortKeys(record: Record<string, unknown>): Record<string, unknown> {
  const sorted: Record<string, unknown> = {}
  for (const key of Object.keys(record).sort()) sorted[key] = record[key]
  return sorted
}

export function renderGitlab(
  pipeline: AnnotatedPipeline,
  config: CiConfig,
  options: PipelineOptions,
): Result<string, DuplicateJobError> {
  const plan = planJobs(pipeline)
  const names = jobKeys(plan.jobs.map(job => job.node), gitlabJobName)
  if (!names.ok) return names
  const output: Record<string, unknown> = {}
  const serviceTags = withoutReservedTags(config.defaults?.tags ?? [])

  for (const job of plan.jobs) {
    const needs = job.needs.flatMap(hash => {
      const name = names.value.get(hash)
      return name ? [{ job: name, artifacts: false }] : []
    })
    output[gitlabJobName(job.node)] = {
      stage: stageName(job.stage),
      tags: [...job.attributes.tags],
      ...(config.image ? { image: config.image } : {}),
      variables: { ...job.attributes.variables },
      ...(config.beforeScript ? { before_script: [...config.beforeScript] } : {}),
      script: [...(config.script ?? DEFAULT_BUILD_SCRIPT)],
      needs,
      allow_failure: job.attributes.allowFailure,
      retry: { max: 2, when: [...JOB_RETRY_CONDITIONS] },
      interruptible: true,
    }
  }

  if (plan.jobs.length > 0) {
    const stages = plan.stages.map(stageName)
    if (config.rebuildIndex) {
      stages.push('stage-rebuild-index')
      output['rebuild-index'] = {
        stage: 'stage-rebuild-index',
        ...(serviceTags.length > 0 ? { tags: [...serviceTags] } : {}),
        ...(config.image ? { image: config.image } : {}),
        script: [...(config.indexScript ?? DEFAULT_INDEX_SCRIPT)],
        when: 'always',
        retry: { max: 2, when: [...SERVICE_RETRY_CONDITIONS] },
        interruptible: true,
        dependencies: [],
      }
    }
    output.stages = stages
    output.variables = pipelineVariables(config, options)
  } else {
    output['no-specs-to-rebuild'] = {
      ...(serviceTags.length > 0 ? { tags: [...serviceTags] } : {}),
      script: [NOOP_MESSAGE],
      retry: 0,
      allow_failure: true,
    }
  }

  // Child pipelines must always run
  output.workflow = { rules: [{ when: 'always' }] }

  return { ok: true, value: stringify(sortKeys(output), { lineWidth: 0, aliasDuplicateObjects: false }) }
}

export const gitlabGenerator: PipelineGenerator = {
  platform: 'gitlab',
  defaultOutputPath: '.gitlab-ci.yml',
  render: renderGitlab,
}
