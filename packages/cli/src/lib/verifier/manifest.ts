import { readFile } from 'node:fs/promises'
import { parse as parseYaml } from 'yaml'
import type { StackManifest } from 'shared'
import { fileExists, linkSpecs, manifestPath, MANIFEST_FILE, validateStackManifest } from '../loader.js'
import { buildPipelineGraph } from '../pipeline/dag.js'
import { compileRules, ruleMatches } from '../pipeline/attributes.js'

export interface VerificationIssue {
  severity: 'error' | 'warning' | 'info'
  code: string
  message: string
  file?: string
  path?: string
}

export interface VerificationResult {
  passed: boolean
  issues: VerificationIssue[]
  /** Distinct specs after de-duplication, when the graph could be built. */
  specCount?: number
  timestamp: string
}

function finish(issues: VerificationIssue[], specCount?: number): VerificationResult {
  const hasErrors = issues.some(i => i.severity === 'error')
  return {
    passed: !hasErrors,
    issues,
    ...(specCount !== undefined ? { specCount } : {}),
    timestamp: new Date().toISOString(),
  }
}

function reachableKeys(manifest: StackManifest): Set<string> {
  const seen = new Set<string>()
  const stack = [...manifest.roots]
  while (stack.length > 0) {
    const key = stack.pop()
    if (key === undefined || seen.has(key)) continue
    seen.add(key)
    stack.push(...(manifest.specs[key]?.dependencies ?? []))
  }
  return seen
}

export async function verifyManifest(location: string): Promise<VerificationResult> {
  const issues: VerificationIssue[] = []
  const path = await manifestPath(location)

  if (!(await fileExists(path))) {
    issues.push({
      severity: 'error', code: 'MANIFEST-MISSING',
      message: `${MANIFEST_FILE} not found`, file: MANIFEST_FILE,
    })
    return finish(issues)
  }

  let data: unknown
  try {
    data = parseYaml(await readFile(path, 'utf-8'))
  } catch (error) {
    issues.push({
      severity: 'error', code: 'MANIFEST-PARSE',
      message: `Failed to parse ${MANIFEST_FILE}: ${error}`, file: MANIFEST_FILE,
    })
    return finish(issues)
  }

  if (data === null || typeof data !== 'object') {
    issues.push({
      severity: 'error', code: 'MANIFEST-PARSE',
      message: `${MANIFEST_FILE} is empty or not an object`, file: MANIFEST_FILE,
    })
    return finish(issues)
  }

  const validated = validateStackManifest(data)
  if (!validated.ok) {
    for (const error of validated.error) {
      issues.push({
        severity: 'error', code: 'SCHEMA-INVALID',
        message: error.message, file: MANIFEST_FILE, path: error.path,
      })
    }
    return finish(issues)
  }
  const manifest = validated.value

  const linked = linkSpecs(manifest)
  if (!linked.ok) {
    for (const error of linked.error) {
      issues.push({
        severity: 'error',
        code: error.path === 'roots' ? 'ROOT-UNKNOWN' : 'DEPENDENCY-UNKNOWN',
        message: error.message, file: MANIFEST_FILE, path: error.path,
      })
    }
    return finish(issues)
  }

  const built = buildPipelineGraph(linked.value)
  if (!built.ok) {
    issues.push({
      severity: 'error', code: 'DEPENDENCY-CYCLE',
      message: built.error.message, file: MANIFEST_FILE, path: 'specs',
    })
    return finish(issues)
  }
  const graph = built.value

  const reachable = reachableKeys(manifest)
  for (const key of Object.keys(manifest.specs).sort()) {
    if (!reachable.has(key)) {
      issues.push({
        severity: 'warning', code: 'SPEC-UNREACHABLE',
        message: `Spec "${key}" is not reachable from any root and will never become a job`,
        file: MANIFEST_FILE, path: `specs.${key}`,
      })
    }
  }

  const duplicates = reachable.size - graph.size
  if (duplicates > 0) {
    issues.push({
      severity: 'info', code: 'SPEC-DUPLICATE',
      message: `${duplicates} of ${reachable.size} reachable spec entries repeat an already listed build and will be merged`,
      file: MANIFEST_FILE, path: 'specs',
    })
  }

  const nodes = graph.nodes()
  const declared = compileRules(manifest.ci)
    .filter(rule => rule.index >= 0)
    .sort((a, b) => a.index - b.index)
  for (const rule of declared) {
    if (!nodes.some(node => ruleMatches(rule.predicate, node))) {
      issues.push({
        severity: 'warning', code: 'RULE-UNUSED',
        message: `Rule #${rule.index + 1} matches no spec`,
        file: MANIFEST_FILE, path: `ci.rules[${rule.index}]`,
      })
    }
  }

  return finish(issues, graph.size)
}
