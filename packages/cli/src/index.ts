#!/usr/bin/env node
import { Command } from 'commander'
import { initCommand } from './commands/init.js'
import { verifyCommand } from './commands/verify.js'
import { planCommand } from './commands/plan.js'
import { generateCommand } from './commands/generate.js'
import { GeneratorRegistry, registerBuiltinGenerators } from './lib/generators/index.js'

const registry = registerBuiltinGenerators(new GeneratorRegistry())

const program = new Command()

program
  .name('stackci')
  .description('Generate CI pipelines from a concretized package stack')
  .version('0.1.0')

program
  .command('init')
  .description('Write a starter stackci.yaml')
  .option('--name <name>', 'Stack name')
  .option('--platform <platform>', `CI platform (${registry.platforms().join(', ')})`)
  .option('--yes', 'Accept all defaults, no prompts')
  .option('--force', 'Overwrite existing stackci.yaml')
  .action(async (options) => {
    const result = await initCommand(options, registry)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('verify [path]')
  .description('Check a stack manifest for schema, reference and cycle errors')
  .option('--json', 'Output as JSON')
  .action(async (path, options) => {
    const result = await verifyCommand(path ?? '.', options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.passed) {
      process.exit(1)
    }
  })

function pipelineOptions(command: Command): Command {
  return command
    .option('--manifest <path>', 'stackci.yaml or the directory holding it', '.')
    .option('--platform <platform>', `CI platform (${registry.platforms().join(', ')})`)
    .option('--changed <specs>', 'Changed package names or hashes (comma-separated)')
    .option('--available <file>', 'File listing hashes present in the build cache')
    .option('--broken <file>', 'File listing hashes known to be broken')
    .option('--prune-up-to-date', 'Skip specs already in the build cache')
    .option('--no-prune-up-to-date', 'Rebuild specs even if cached')
    .option('--prune-broken', 'Skip specs known to be broken')
    .option('--no-prune-broken', 'Keep specs known to be broken')
    .option('--prune-externals', 'Skip external specs')
    .option('--no-prune-externals', 'Build external specs too')
    .option('--affected-only', 'Only rebuild specs affected by --changed')
    .option('--no-affected-only', 'Ignore --changed when pruning')
    .option('--dependent-depth <n>', 'How many levels of dependents of a changed spec count as affected')
    .option('--artifacts-root <path>', 'Directory jobs write artifacts under')
}

pipelineOptions(program.command('plan'))
  .description('Show the stages and jobs a pipeline would contain')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const result = await planCommand({ ...options, pruneExternal: options.pruneExternals }, registry)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

pipelineOptions(program.command('generate'))
  .description('Write the CI pipeline for the stack')
  .option('--output <path>', 'Where to write the pipeline (default: the platform\'s usual location)')
  .option('--no-summary', 'Do not print the pruning summary')
  .action(async (options) => {
    const result = await generateCommand({ ...options, pruneExternal: options.pruneExternals }, registry)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

await program.parseAsync()
