import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ValidationError} from '@cairn/core'
import {composePipeline, PipelineLoader, slugify} from '../pipeline-loader.js'
import {createTmpDir, openTestEngine} from './helpers.js'

const loader = new PipelineLoader()

// ---------------------------------------------------------------------------
// slugify
// ---------------------------------------------------------------------------

test('slugify removes accents and collapses separators', t => {
  t.is(slugify('Build & Test Étapes'), 'build-test-etapes')
  t.is(slugify('--lint--'), 'lint')
  t.is(slugify('step_1'), 'step_1')
})

// ---------------------------------------------------------------------------
// parse
// ---------------------------------------------------------------------------

test('parse reads a YAML pipeline', t => {
  const pipeline = loader.parse([
    'name: Release Build',
    'steps:',
    '  - name: Install Deps',
    '    from: node:20',
    '    workdir: /app',
    '    env: {CI: true, JOBS: 4}',
    '    mounts:',
    '      - {path: /root/.npm, cache: npm, sharing: LOCKED}',
    '      - {path: /tmp, temp: true}',
    '    exec: npm ci',
    '  - id: test',
    '    exec: [npm, test]',
    '    expect: ANY',
    'outputs:',
    '  - {step: test, directory: /app/dist, to: ./dist}',
    '  - {step: test, stdout: true}'
  ].join('\n'), '/work/pipeline.yml')

  t.is(pipeline.id, 'release-build')
  t.is(pipeline.root, '/work')
  t.deepEqual(pipeline.steps.map(step => step.id), ['install-deps', 'test'])
  const [install, testStep] = pipeline.steps
  t.deepEqual(install.env, {CI: 'true', JOBS: '4'})
  t.deepEqual(install.exec, ['sh', '-c', 'npm ci'])
  t.deepEqual(install.mounts, [
    {type: 'cache', path: '/root/.npm', key: 'npm', sharing: 'LOCKED'},
    {type: 'temp', path: '/tmp'}
  ])
  t.is(testStep.expect, 'ANY')
  t.deepEqual(pipeline.outputs, [
    {type: 'directory', step: 'test', path: '/app/dist', to: './dist'},
    {type: 'stdout', step: 'test'}
  ])
})

test('parse reads a JSON pipeline', t => {
  const pipeline = loader.parse(JSON.stringify({
    id: 'json',
    steps: [{id: 'only', from: 'alpine', ports: [8080], args: ['serve']}]
  }), '/work/pipeline.json')
  t.is(pipeline.id, 'json')
  t.deepEqual(pipeline.steps[0].ports, [8080])
  t.deepEqual(pipeline.steps[0].args, ['serve'])
  t.deepEqual(pipeline.outputs, [])
})

test('parse rejects invalid pipelines', t => {
  const invalid: Array<[string, RegExp]> = [
    ['steps: [{from: alpine}]', /at least one of "id" or "name"/],
    ['id: p', /steps must be a non-empty array/],
    ['id: p\nsteps: [{id: a, from: alpine}, {id: a}]', /Duplicate step id: 'a'/],
    ['id: p\nsteps: [{id: a, container: b}, {id: b, from: alpine}]', /refers to 'b', which is not an earlier step/],
    ['id: p\nsteps: [{id: a, from: alpine, container: b}]', /mutually exclusive/],
    ['id: p\nsteps: [{id: a, mounts: [{path: /x}]}]', /needs one of "source", "cache", "secret" or "temp: true"/],
    ['id: p\nsteps: [{id: a, expect: SOMETIMES}]', /must be SUCCESS, FAILURE or ANY/],
    ['id: p\nsteps: [{id: a, mounts: [{path: /c, cache: c, sharing: SOMETIMES}]}]', /sharing must be one of SHARED, PRIVATE, LOCKED/],
    ['id: p\nsteps: [{id: a, ports: [http]}]', /must be a port number/],
    ['id: p\nsteps: [{id: a}]\noutputs: [{step: b, stdout: true}]', /unknown step 'b'/],
    ['id: p\nsteps: [{id: a}]\noutputs: [{step: a}]', /needs one of "directory"/]
  ]

  for (const [content, message] of invalid) {
    t.throws(() => loader.parse(content, 'pipeline.yml'), {instanceOf: ValidationError, message})
  }
})

test('load reads the pipeline file from disk', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'pipeline.yml')
  await writeFile(file, 'id: disk\nsteps:\n  - {id: a, from: alpine}\n', 'utf8')
  const pipeline = await loader.load(file)
  t.is(pipeline.id, 'disk')
  t.is(pipeline.root, dir)
})

// ---------------------------------------------------------------------------
// composePipeline
// ---------------------------------------------------------------------------

test('composePipeline chains steps onto the previous one', async t => {
  const {engine} = await openTestEngine()
  const dir = await createTmpDir()
  await mkdir(join(dir, 'app'))
  await writeFile(join(dir, 'app', 'main.ts'), 'main')
  const pipeline = loader.parse([
    'id: demo',
    'steps:',
    '  - id: base',
    '    from: alpine:3.18',
    '    env: {MODE: test}',
    '    exec: [echo, base]',
    '  - id: test',
    '    workdir: /src',
    '    copy: [{path: /src, source: app}]',
    '    secrets: {TOKEN: CAIRN_TOKEN}',
    '    exec: [echo, test]'
  ].join('\n'), join(dir, 'pipeline.yml'))

  const containers = await composePipeline(engine, pipeline, {CAIRN_TOKEN: 'test-secret'})
  const testStep = containers.get('test')
  if (!testStep) {
    t.fail('missing test step')
    return
  }

  t.deepEqual(engine.ancestry(testStep.id()).map(node => node.kind), [
    'ContainerScratch',
    'FromImage',
    'WithEnvVariable',
    'WithExec',
    'SetSecret',
    'WithSecretVariable',
    'WithWorkdir',
    'HostDirectory',
    'WithDirectory',
    'WithExec'
  ])
  t.deepEqual(engine.store.require(testStep.id()).pipeline.map(label => label.name), ['test'])
  t.is(await testStep.stdout(), 'echo test\nMODE=test\nTOKEN=test-secret\n')
  t.deepEqual(await testStep.directory('/src').entries(), ['main.ts'])
  await engine.close()
})

test('composePipeline starts over on from and continues from a named container', async t => {
  const {engine} = await openTestEngine()
  const pipeline = loader.parse([
    'id: branches',
    'steps:',
    '  - {id: a, from: alpine, env: {STEP: a}}',
    '  - {id: b, from: busybox}',
    '  - {id: c, container: a, exec: [echo, c]}'
  ].join('\n'), '/work/pipeline.yml')

  const containers = await composePipeline(engine, pipeline, {})
  const b = containers.get('b')
  const c = containers.get('c')
  if (!b || !c) {
    t.fail('missing steps')
    return
  }

  t.deepEqual(engine.ancestry(b.id()).map(node => node.kind), ['ContainerScratch', 'FromImage'])
  t.is(await c.stdout(), 'echo c\nSTEP=a\n')
  await engine.close()
})

test('composePipeline binds earlier steps as services', async t => {
  const {engine, executor} = await openTestEngine()
  const pipeline = loader.parse([
    'id: services',
    'steps:',
    '  - {id: db, from: postgres, args: [postgres], ports: [5432]}',
    '  - {id: app, from: alpine, services: {database: db}, exec: [echo, app]}'
  ].join('\n'), '/work/pipeline.yml')

  const containers = await composePipeline(engine, pipeline, {})
  const app = containers.get('app')
  if (!app) {
    t.fail('missing app step')
    return
  }

  t.is(await app.stdout(), 'echo app\n')
  t.deepEqual(executor.requests[0].hosts, [{alias: 'database', host: '10.0.0.1'}])
  await engine.close()
})

test('composePipeline fails when a secret variable is not set', async t => {
  const {engine} = await openTestEngine()
  const pipeline = loader.parse('id: p\nsteps: [{id: a, from: alpine, secrets: {TOKEN: MISSING_TOKEN}}]', '/work/pipeline.yml')
  await t.throwsAsync(composePipeline(engine, pipeline, {}), {instanceOf: ValidationError, message: /MISSING_TOKEN/})
  await engine.close()
})
