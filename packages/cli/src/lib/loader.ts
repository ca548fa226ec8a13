import { readFile, access, stat } from 'node:fs/promises'
import { join } from 'node:path'
import AjvModule from 'ajv'
import { parse as parseYaml } from 'yaml'
import { stackManifestSchema } from 'shared'
import type { ConcreteSpec, StackManifest, Result, ValidationError } from 'shared'

export const MANIFEST_FILE = 'stackci.yaml'

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
const validateManifest = ajv.compile<StackManifest>(stackManifestSchema)

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Resolve a manifest location: a directory means `<dir>/stackci.yaml`.
 */
export async function manifestPath(location: string): Promise<string> {
  try {
    const info = await stat(location)
    return info.isDirectory() ? join(location, MANIFEST_FILE) : location
  } catch {
    return location
  }
}

export function validateStackManifest(data: unknown): Result<StackManifest, ValidationError[]> {
  if (validateManifest(data)) return { ok: true, value: data }
  const errors = (validateManifest.errors ?? []).map(e => ({
    path: e.instancePath || '/',
    message: `${e.instancePath || '/'}: ${e.message ?? 'Unknown validation error'}`,
  }))
  return { ok: false, error: errors }
}

export async function loadStackManifest(location: string): Promise<Result<StackManifest, ValidationError[]>> {
  const path = await manifestPath(location)

  if (!(await fileExists(path))) {
    return { ok: false, error: [{ path: MANIFEST_FILE, message: `${MANIFEST_FILE} not found` }] }
  }

  let data: unknown
  try {
    const content = await readFile(path, 'utf-8')
    data = parseYaml(content)
  } catch (error) {
    return { ok: false, error: [{ path: MANIFEST_FILE, message: `Failed to parse ${MANIFEST_FILE}: ${error}` }] }
  }

  return validateStackManifest(data)
}

/**
 * Replace the table keys in `specs.*.dependencies` and `roots` with object
 * references. Unknown keys are reported; cycles are left for the graph
 * builder to detect.
 */
export function linkSpecs(manifest: StackManifest): Result<ConcreteSpec[], ValidationError[]> {
  const errors: ValidationError[] = []
  const linked = new Map<string, ConcreteSpec>()

  for (const [key, entry] of Object.entries(manifest.specs)) {
    const { dependencies: _keys, ...content } = entry
    linked.set(key, { ...content, dependencies: [] })
  }

  for (const [key, entry] of Object.entries(manifest.specs)) {
    const spec = linked.get(key)
    if (!spec) continue
    for (const depKey of entry.dependencies ?? []) {
      const dep = linked.get(depKey)
      if (!dep) {
        errors.push({ path: `specs.${key}.dependencies`, message: `Unknown dependency: ${depKey}` })
        continue
      }
      spec.dependencies?.push(dep)
    }
  }

  const roots: ConcreteSpec[] = []
  for (const rootKey of manifest.roots) {
    const root = linked.get(rootKey)
    if (!root) {
      errors.push({ path: 'roots', message: `Unknown root spec: ${rootKey}` })
      continue
    }
    roots.push(root)
  }

  if (errors.length > 0) {
    return { ok: false, error: errors }
  }
  return { ok: true, value: roots }
}
