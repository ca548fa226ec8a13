import { writeFile } from 'node:fs/promises'
import { join, basename } from 'node:path'
import { createInterface } from 'node:readline'
import { stringify } from 'yaml'
import type { Result, StackManifest } from 'shared'
import type { GeneratorRegistry } from '../lib/generators/index.js'
import { fileExists, MANIFEST_FILE } from '../lib/loader.js'
import { DEFAULT_PLATFORM } from '../lib/options.js'

export interface InitOptions {
  name?: string
  platform?: string
  yes?: boolean
  force?: boolean
}

interface InitAnswers {
  name: string
  platform: string
}

export function sanitizeStackName(dirName: string): string {
  return dirName.toLowerCase().replace(/[^a-z0-9-]/g, '-').replace(/^-+|-+$/g, '') || 'my-stack'
}

async function prompt(question: string, defaultValue: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr })
  return new Promise((resolve) => {
    const suffix = defaultValue ? ` (${defaultValue})` : ''
    rl.question(`${question}${suffix}: `, (answer) => {
      rl.close()
      resolve(answer.trim() || defaultValue)
    })
  })
}

export function starterManifest(answers: InitAnswers): StackManifest {
  return {
    name: answers.name,
    roots: ['app'],
    specs: {
      app: { name: 'app', version: '0.1.0', dependencies: ['zlib'] },
      zlib: { name: 'zlib', version: '1.3.1' },
    },
    ci: {
      target: answers.platform,
      defaults: { tags: ['default'], orderHint: 0 },
      rules: [],
      pruneUpToDate: true,
      pruneBroken: true,
    },
  }
}

export async function initCommand(options: InitOptions, registry: GeneratorRegistry): Promise<Result<string, string>> {
  const cwd = process.cwd()
  const manifestPath = join(cwd, MANIFEST_FILE)

  if (await fileExists(manifestPath)) {
    if (!options.force) {
      return { ok: false, error: `${MANIFEST_FILE} already exists. Use --force to overwrite.` }
    }
  }

  const defaultName = sanitizeStackName(basename(cwd))
  let answers: InitAnswers

  if (options.yes || !process.stdin.isTTY) {
    answers = {
      name: options.name ?? defaultName,
      platform: options.platform ?? DEFAULT_PLATFORM,
    }
  } else {
    answers = {
      name: await prompt('Stack name', options.name ?? defaultName),
      platform: await prompt(`CI platform (${registry.platforms().join(', ')})`, options.platform ?? DEFAULT_PLATFORM),
    }
  }

  const generator = registry.resolve(answers.platform)
  if (!generator.ok) {
    return { ok: false, error: generator.error.message }
  }

  await writeFile(manifestPath, stringify(starterManifest(answers)))

  console.error(`✅ Initialized stack: ${answers.name}`)
  console.error(`\nNext steps:`)
  console.error(`  stackci verify     Check ${MANIFEST_FILE}`)
  console.error(`  stackci generate   Write the ${answers.platform} pipeline`)

  return { ok: true, value: answers.name }
}
