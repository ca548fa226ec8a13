import { githubGenerator } from './github.js'
import { gitlabGenerator } from './gitlab.js'
import { GeneratorRegistry } from './registry.js'

export { GeneratorRegistry, type PipelineGenerator } from './registry.js'
export { writePipeline, writeFileAtomic } from './output.js'

export function registerBuiltinGenerators(registry: GeneratorRegistry): GeneratorRegistry {
  registry.register(gitlabGenerator.platform, gitlabGenerator)
  registry.register(githubGenerator.platform, githubGenerator)
  return registry
}
