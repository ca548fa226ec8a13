import { resolve } from 'node:path'
import type { Result } from 'shared'
import { verifyManifest, type VerificationResult } from '../lib/verifier/manifest.js'

export interface VerifyOptions {
  json?: boolean
}

export async function verifyCommand(path: string, options: VerifyOptions): Promise<Result<VerificationResult, string>> {
  const result = await verifyManifest(resolve(path))

  if (options.json) {
    console.log(JSON.stringify(result, null, 2))
  } else {
    console.error(`\nVerification: ${result.passed ? '✅ PASSED' : '❌ FAILED'}\n`)
    for (const issue of result.issues) {
      const icon = issue.severity === 'error' ? '✗' : issue.severity === 'warning' ? '⚠' : 'ℹ'
      const where = issue.path ? ` (${issue.path})` : ''
      console.error(`  ${icon} [${issue.code}] ${issue.message}${where}`)
    }
    if (result.issues.length === 0) {
      console.error(`  All checks passed (${result.specCount ?? 0} specs).`)
    }
    console.error('')
  }

  return { ok: true, value: result }
}
