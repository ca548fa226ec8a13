import { describe, it, expect } from 'vitest'
import { parse as parseYaml } from 'yaml'
import type { CiConfig } from 'shared'
import { DuplicateJobError } from 'shared'
import { gitlabJobName, renderGitlab } from '../src/lib/generators/gitlab.js'
import { DEFAULT_BUILD_SCRIPT, jobKeys, NOOP_MESSAGE } from '../src/lib/generators/common.js'
import { createSpecNode } from '../src/lib/pipeline/spec-node.js'
import type { PruneOptions, PruneSignals } from '../src/lib/pipeline/pruner.js'
import { annotate, BASIC_CI, hashOf, NO_PRUNING, nodeNamed, pipelineOptions, scenarioStack, spec, unwrap } from './helpers.js'

function render(ci: CiConfig = BASIC_CI, options: PruneOptions = NO_PRUNING, signals: PruneSignals = {}) {
  const pipeline = annotate([scenarioStack().R], options, signals, ci)
  const text = unwrap(renderGitlab(pipeline, ci, pipelineOptions()))
  return { pipeline, text, doc: parseYaml(text) }
}

describe('renderGitlab', () => {
  it('emits one job per spec with needs and stages', () => {
    const { pipeline, doc } = render()
    const name = (n: string) => gitlabJobName(nodeNamed(pipeline.graph, n))

    expect(Object.keys(doc)).toEqual([name('A'), name('B'), name('C'), name('R'), 'stages', 'variables', 'workflow'])
    expect(doc.stages).toEqual(['stage-0', 'stage-1', 'stage-2'])

    const R = doc[name('R')]
    expect(R.stage).toBe('stage-2')
    expect(R.tags).toEqual(['default'])
    expect(R.script).toEqual(DEFAULT_BUILD_SCRIPT)
    expect(R.needs).toEqual([
      { job: name('A'), artifacts: false },
      { job: name('B'), artifacts: false },
    ])
    expect(R.variables).toEqual({
      STACKCI_JOB_SPEC_HASH: hashOf(pipeline.graph, 'R'),
      STACKCI_JOB_SPEC_PKG_NAME: 'R',
      STACKCI_JOB_SPEC_PKG_VERSION: '1.0.0',
    })
    expect(R.allow_failure).toBe(false)
    expect(R.interruptible).toBe(true)
    expect(R.retry.max).toBe(2)

    expect(doc[name('A')].needs).toEqual([{ job: name('C'), artifacts: false }])
    expect(doc[name('B')].needs).toEqual([])
    expect(doc[name('C')].needs).toEqual([])
  })

  it('names jobs after the spec and its short hash', () => {
    const { pipeline } = render()
    const A = nodeNamed(pipeline.graph, 'A')
    expect(gitlabJobName(A)).toBe(`A@1.0.0 /${A.hash.slice(0, 7)}`)
  })

  it('keeps the short hash when cutting long names to the limit', () => {
    const long = 'x'.repeat(260)
    const pipeline = annotate([spec('R', [
      spec(long, [], { variants: { a: true } }),
      spec(long, [], { variants: { a: false } }),
    ])])
    const doc = parseYaml(unwrap(renderGitlab(pipeline, BASIC_CI, pipelineOptions())))

    const longNodes = pipeline.graph.nodes().filter(n => n.name === long)
    const names = longNodes.map(gitlabJobName)
    expect(names).toEqual(longNodes.map(n => `${'x'.repeat(246)} /${n.hash.slice(0, 7)}`))
    expect(names[0]).toHaveLength(255)

    expect(Object.keys(doc).filter(key => names.includes(key))).toHaveLength(2)
    const R = doc[gitlabJobName(nodeNamed(pipeline.graph, 'R'))]
    expect(R.needs.map((n: { job: string }) => n.job)).toEqual(names)
  })

  it('uses service tags without reserved ones', () => {
    const { doc } = render({ defaults: { tags: ['default', 'protected'], orderHint: 0 }, rebuildIndex: true })
    expect(doc['rebuild-index'].tags).toEqual(['default'])
  })

  it('writes pipeline variables and an always-run workflow', () => {
    const { doc } = render({ ...BASIC_CI, variables: { BUILD_COLOR: 'always' } })
    expect(doc.variables).toEqual({
      BUILD_COLOR: 'always',
      STACKCI_ARTIFACTS_ROOT: 'jobs_scratch_dir',
      STACKCI_REBUILD_CHECK_UP_TO_DATE: 'false',
      STACKCI_REBUILD_EVERYTHING: 'true',
    })
    expect(doc.workflow).toEqual({ rules: [{ when: 'always' }] })
  })

  it('skips pruned specs', () => {
    const unpruned = annotate([scenarioStack().R])
    const { pipeline, doc } = render(BASIC_CI, { ...NO_PRUNING, pruneUpToDate: true }, {
      available: new Set([hashOf(unpruned.graph, 'C')]),
    })
    const name = (n: string) => gitlabJobName(nodeNamed(pipeline.graph, n))
    expect(Object.keys(doc)).toEqual([name('A'), name('B'), name('R'), 'stages', 'variables', 'workflow'])
    expect(doc[name('A')].needs).toEqual([])
    expect(doc.stages).toEqual(['stage-0', 'stage-1'])
  })

  it('adds image, before_script and a custom script', () => {
    const { pipeline, doc } = render({
      ...BASIC_CI,
      image: 'ubuntu:22.04',
      beforeScript: ['. ./env.sh'],
      script: ['make install'],
    })
    const job = doc[gitlabJobName(nodeNamed(pipeline.graph, 'B'))]
    expect(job.image).toBe('ubuntu:22.04')
    expect(job.before_script).toEqual(['. ./env.sh'])
    expect(job.script).toEqual(['make install'])
  })

  it('appends a rebuild-index job in its own final stage', () => {
    const { doc } = render({ ...BASIC_CI, rebuildIndex: true })
    expect(doc.stages).toEqual(['stage-0', 'stage-1', 'stage-2', 'stage-rebuild-index'])
    expect(doc['rebuild-index']).toMatchObject({
      stage: 'stage-rebuild-index',
      tags: ['default'],
      when: 'always',
      script: ['echo "Rebuilding build cache index"'],
    })
  })

  it('writes a single no-op job when nothing needs rebuilding', () => {
    const { doc } = render(BASIC_CI, { ...NO_PRUNING, affectedOnly: true }, { changed: [] })
    expect(doc).toEqual({
      'no-specs-to-rebuild': {
        tags: ['default'],
        script: [NOOP_MESSAGE],
        retry: 0,
        allow_failure: true,
      },
      workflow: { rules: [{ when: 'always' }] },
    })
  })

  it('renders identical text for identical input', () => {
    expect(render().text).toBe(render().text)

    // same stack described with the dependencies listed the other way round
    const C = spec('C')
    const reordered = annotate([spec('R', [spec('B'), spec('A', [C])])])
    expect(unwrap(renderGitlab(reordered, BASIC_CI, pipelineOptions()))).toBe(render().text)
  })
})

describe('jobKeys', () => {
  it('refuses to give two specs the same job', () => {
    const a = createSpecNode({ name: 'zlib', version: '1.3.1' }, [])
    const b = createSpecNode({ name: 'zlib', version: '1.3.1', variants: { shared: true } }, [])

    const result = jobKeys([a, b], node => node.name)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DuplicateJobError)
      expect(result.error.job).toBe('zlib')
      expect(result.error.hashes).toEqual([a.hash, b.hash])
    }
  })

  it('maps each hash to its key', () => {
    const a = createSpecNode({ name: 'zlib', version: '1.3.1' }, [])
    expect(jobKeys([a, a], gitlabJobName)).toEqual({ ok: true, value: new Map([[a.hash, gitlabJobName(a)]]) })
  })
})
