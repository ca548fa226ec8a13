import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import type { Result } from 'shared'
import type { PruneSignals } from './pipeline/pruner.js'

export interface SignalSources {
  available?: string
  broken?: string
  changed?: string
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

/**
 * Read a list of spec hashes. The file holds either a YAML/JSON sequence or a
 * mapping with a `hashes` sequence.
 */
export async function loadHashList(path: string): Promise<Result<Set<string>, string>> {
  let data: unknown
  try {
    data = parseYaml(await readFile(path, 'utf-8'))
  } catch (error) {
    return { ok: false, error: `Failed to read hash list ${path}: ${error}` }
  }

  if (data === null || data === undefined) {
    return { ok: true, value: new Set() }
  }
  if (isStringList(data)) {
    return { ok: true, value: new Set(data.map(h => h.trim()).filter(Boolean)) }
  }
  if (typeof data === 'object' && 'hashes' in data && isStringList(data.hashes)) {
    return { ok: true, value: new Set(data.hashes.map(h => h.trim()).filter(Boolean)) }
  }
  return { ok: false, error: `Hash list ${path} must be a list of hashes or a mapping with a "hashes" list` }
}

/** Comma-separated package names or hashes, duplicates dropped. */
export function parseChanged(value: string): string[] {
  return [...new Set(value.split(',').map(s => s.trim()).filter(Boolean))]
}

export async function loadSignals(sources: SignalSources): Promise<Result<PruneSignals, string>> {
  const signals: PruneSignals = {}

  if (sources.available) {
    const available = await loadHashList(sources.available)
    if (!available.ok) return available
    signals.available = available.value
  }

  if (sources.broken) {
    const broken = await loadHashList(sources.broken)
    if (!broken.ok) return broken
    signals.broken = broken.value
  }

  if (sources.changed !== undefined) {
    signals.changed = parseChanged(sources.changed)
  }

  return { ok: true, value: signals }
}
