import type { CiConfig, PipelineOptions, Result } from 'shared'

export const DEFAULT_PLATFORM = 'gitlab'
export const DEFAULT_ARTIFACTS_ROOT = 'jobs_scratch_dir'

/** Pipeline flags as commander hands them over. */
export interface PipelineFlags {
  platform?: string
  output?: string
  pruneUpToDate?: boolean
  pruneBroken?: boolean
  pruneExternal?: boolean
  affectedOnly?: boolean
  dependentDepth?: string
  summary?: boolean
  artifactsRoot?: string
}

type Env = Record<string, string | undefined>

export function selectPlatform(flags: PipelineFlags, ci: CiConfig | undefined): string {
  return flags.platform ?? ci?.target ?? DEFAULT_PLATFORM
}

function envFlag(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase()
  if (raw === undefined || raw === '') return undefined
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true
  if (['0', 'false', 'no', 'off'].includes(raw)) return false
  console.error(`Warning: ignoring ${key}=${env[key]}, expected true or false`)
  return undefined
}

function parseDepth(raw: string): number | undefined {
  const trimmed = raw.trim()
  if (!/^-?\d+$/.test(trimmed)) return undefined
  return Number.parseInt(trimmed, 10)
}

/**
 * Merge pipeline settings. Precedence, highest first: command-line flags,
 * STACKCI_* environment variables, the manifest's `ci` section, built-in
 * defaults.
 */
export function collectPipelineOptions(
  flags: PipelineFlags,
  ci: CiConfig | undefined,
  defaultOutputPath: string,
  env: Env = process.env,
): Result<PipelineOptions, string> {
  let dependentDepth: number | undefined
  if (flags.dependentDepth !== undefined) {
    dependentDepth = parseDepth(flags.dependentDepth)
    if (dependentDepth === undefined) {
      return { ok: false, error: `--dependent-depth must be an integer, got "${flags.dependentDepth}"` }
    }
  } else if (env.STACKCI_PRUNE_UNTOUCHED_DEPENDENT_DEPTH !== undefined) {
    const raw = env.STACKCI_PRUNE_UNTOUCHED_DEPENDENT_DEPTH
    dependentDepth = parseDepth(raw)
    if (dependentDepth === undefined) {
      console.error(`Warning: ignoring STACKCI_PRUNE_UNTOUCHED_DEPENDENT_DEPTH=${raw}, expected an integer`)
    }
  }

  const options: PipelineOptions = {
    platform: selectPlatform(flags, ci),
    outputPath: flags.output ?? defaultOutputPath,
    pruneUpToDate: flags.pruneUpToDate ?? envFlag(env, 'STACKCI_PRUNE_UP_TO_DATE') ?? ci?.pruneUpToDate ?? false,
    pruneBroken: flags.pruneBroken ?? ci?.pruneBroken ?? false,
    pruneExternal: flags.pruneExternal ?? ci?.pruneExternal ?? true,
    affectedOnly: flags.affectedOnly ?? envFlag(env, 'STACKCI_PRUNE_UNTOUCHED') ?? ci?.affectedOnly ?? false,
    ...(dependentDepth !== undefined ? { dependentDepth } : {}),
    printSummary: flags.summary ?? true,
    artifactsRoot: flags.artifactsRoot ?? ci?.artifactsRoot ?? DEFAULT_ARTIFACTS_ROOT,
  }

  return { ok: true, value: Object.freeze(options) }
}
