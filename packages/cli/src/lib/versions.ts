/**
 * Parse a dotted numeric version ("1.3", "2.39.1", "3.12.0.4") into its
 * components. Trailing non-numeric suffixes ("1.2.3-rc1") are ignored.
 */
function parseVersion(version: string): number[] | null {
  const match = version.match(/^\d+(\.\d+)*/)
  if (!match) return null
  return match[0].split('.').map(part => parseInt(part, 10))
}

function compareVer(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0
    const right = b[i] ?? 0
    if (left !== right) return left - right
  }
  return 0
}

/**
 * Check if a version satisfies a range.
 * Supports: exact, ^, ~, >=, >, <=, <, *
 */
export function satisfiesRange(version: string, range: string): boolean {
  const trimmed = range.trim()
  if (trimmed === '*') return true

  const ver = parseVersion(version)
  if (!ver) return version === trimmed

  const operator = trimmed.match(/^(\^|~|>=|>|<=|<|=)?(.+)$/)
  if (!operator) return false
  const bound = parseVersion(operator[2])
  if (!bound) return false

  switch (operator[1]) {
    case '>=':
      return compareVer(ver, bound) >= 0
    case '>':
      return compareVer(ver, bound) > 0
    case '<=':
      return compareVer(ver, bound) <= 0
    case '<':
      return compareVer(ver, bound) < 0
    case '^': {
      // Changes allowed right of the left-most non-zero component
      if (compareVer(ver, bound) < 0) return false
      const pivot = bound.findIndex(part => part !== 0)
      const fixed = pivot === -1 ? bound.length : pivot + 1
      for (let i = 0; i < fixed; i++) {
        if ((ver[i] ?? 0) !== (bound[i] ?? 0)) return false
      }
      return true
    }
    case '~': {
      // ~1 fixes the major, ~1.2 and ~1.2.3 fix major and minor
      if (compareVer(ver, bound) < 0) return false
      const fixed = bound.length <= 2 ? bound.length : bound.length - 1
      for (let i = 0; i < fixed; i++) {
        if ((ver[i] ?? 0) !== (bound[i] ?? 0)) return false
      }
      return true
    }
    default:
      return compareVer(ver, bound) === 0
  }
}
