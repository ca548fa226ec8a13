import type { CiConfig, PipelineOptions, Result } from 'shared'
import { DuplicateJobError } from 'shared'
import type { SpecNode } from '../pipeline/spec-node.js'

export const DEFAULT_BUILD_SCRIPT = [
  'echo "Building $STACKCI_JOB_SPEC_PKG_NAME@$STACKCI_JOB_SPEC_PKG_VERSION /$STACKCI_JOB_SPEC_HASH"',
]

export const NOOP_MESSAGE = 'echo "All specs already up to date, nothing to rebuild."'

/**
 * Pipeline-wide variables: `ci.variables` plus the run settings downstream
 * jobs read. Keys sorted.
 */
export function pipelineVariables(config: CiConfig, options: PipelineOptions): Record<string, string> {
  const rebuildEverything = !options.pruneUpToDate && !options.affectedOnly
  const merged: Record<string, string> = {
    ...config.variables,
    STACKCI_ARTIFACTS_ROOT: options.artifactsRoot.replace(/\\/g, '/'),
    STACKCI_REBUILD_CHECK_UP_TO_DATE: String(options.pruneUpToDate),
    STACKCI_REBUILD_EVERYTHING: String(rebuildEverything),
  }
  const sorted: Record<string, string> = {}
  for (const key of Object.keys(merged).sort()) sorted[key] = merged[key]
  return sorted
}

/** Hash → job key for every node. Two nodes sharing a key is an error. */
export function jobKeys(
  nodes: readonly SpecNode[],
  keyOf: (node: SpecNode) => string,
): Result<Map<string, string>, DuplicateJobError> {
  const keys = new Map<string, string>()
  const owners = new Map<string, string>()
  for (const node of nodes) {
    const key = keyOf(node)
    const owner = owners.get(key)
    if (owner !== undefined && owner !== node.hash) {
      return { ok: false, error: new DuplicateJobError(key, owner, node.hash) }
    }
    owners.set(key, node.hash)
    keys.set(node.hash, key)
  }
  return { ok: true, value: keys }
}
