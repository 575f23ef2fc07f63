import test from 'ava'
import {DockerNotAvailableError, EngineLockedError, ResourceError} from '../errors.js'
import {FakeExecutor, openTestEngine} from './helpers.js'

test('a single exec leaves its file for the next one', async t => {
  const {engine} = await openTestEngine()
  const listed = engine.container().from('alpine:3.18').withExec(['touch', '/a']).withExec(['ls', '/'])
  t.is(await listed.stdout(), 'a\netc\n')
  await engine.close()
})

test('sibling branches of one container do not see each other', async t => {
  const {engine} = await openTestEngine()
  const base = engine.container().from('alpine').withExec(['touch', '/shared'])
  const left = base.withExec(['touch', '/left'])
  const right = base.withExec(['touch', '/right'])
  t.not(left.id(), right.id())
  t.not(left.id(), base.id())

  t.is(await left.withExec(['ls', '/']).stdout(), 'etc\nleft\nshared\n')
  t.is(await right.withExec(['ls', '/']).stdout(), 'etc\nright\nshared\n')
  t.is(await base.withExec(['ls', '/']).stdout(), 'etc\nshared\n')
  await engine.close()
})

test('each exec builds on the filesystem of the previous one', async t => {
  const {engine, executor} = await openTestEngine()
  const touched = engine.container().from('alpine:3.18').withExec(['touch', '/a']).withExec(['touch', '/b'])
  t.is(await touched.withExec(['ls', '/']).stdout(), 'a\nb\netc\n')

  const again = engine.container().from('alpine:3.18').withExec(['touch', '/a']).withExec(['touch', '/b'])
  t.is(again.id(), touched.id())
  t.is(await again.withExec(['ls', '/']).stdout(), 'a\nb\netc\n')
  t.is(executor.execs.length, 3)
  t.deepEqual(executor.pulls, ['alpine:3.18'])
  await engine.close()
})

test('results survive a restart of the engine', async t => {
  const first = await openTestEngine()
  const chain = first.engine.container().from('alpine').withExec(['echo', 'hi'])
  t.is(await chain.stdout(), 'hi\n')
  const id = chain.id()
  await first.engine.close()

  const second = await openTestEngine({stateDir: first.stateDir, executor: new FakeExecutor()})
  t.is(await second.engine.loadContainerFromID(id).stdout(), 'hi\n')
  t.is(await second.engine.container().from('alpine').withExec(['echo', 'hi']).stdout(), 'hi\n')
  t.deepEqual(second.executor.execs, [])
  t.deepEqual(second.executor.pulls, [])
  await second.engine.close()
})

test('a state directory is owned by one engine at a time', async t => {
  const first = await openTestEngine()
  await t.throwsAsync(openTestEngine({stateDir: first.stateDir}), {instanceOf: EngineLockedError})
  await first.engine.close()
  const second = await openTestEngine({stateDir: first.stateDir})
  await second.engine.close()
  t.pass()
})

test('requests on a closed engine fail', async t => {
  const {engine} = await openTestEngine()
  const container = engine.container()
  await engine.close()
  await t.throwsAsync(container.sync(), {instanceOf: ResourceError})
  await t.notThrowsAsync(engine.close())
})

test('eviction keeps the artifacts of running requests', async t => {
  const {engine, executor} = await openTestEngine()
  const greet = engine.container().from('alpine').withExec(['echo', 'hi'])
  await greet.sync()
  const result = await engine.request(greet.id(), async () => engine.prune({maxAgeMs: 0, now: Date.now() + 60_000}))
  t.is(result.artifacts, 2)
  t.true(engine.cache.has(greet.id()))
  t.false(engine.cache.has(engine.container().from('alpine').id()))

  t.is(await greet.stdout(), 'hi\n')
  t.is(executor.execs.length, 1)
  await engine.container().from('alpine').sync()
  t.is(executor.pulls.length, 2)
  await engine.close()
})

test('ancestry lists the chain dependencies first', async t => {
  const {engine} = await openTestEngine()
  const source = engine.directory().withNewFile('a.txt', 'a')
  const container = engine.container().from('alpine').withMountedDirectory('/src', source)
  t.deepEqual(engine.ancestry(container.id()).map(node => node.kind), [
    'ContainerScratch',
    'FromImage',
    'DirectoryScratch',
    'DirectoryWithNewFile',
    'WithMountedDirectory'
  ])
  await engine.close()
})

test('the executor is checked once, before its first use', async t => {
  const {engine, executor} = await openTestEngine()
  t.is(executor.checks, 0)
  await engine.container().from('alpine').sync()
  await engine.container().from('busybox').sync()
  t.is(executor.checks, 1)
  await engine.close()
})

test('requests fail with DockerNotAvailableError when the executor check fails', async t => {
  class UnavailableExecutor extends FakeExecutor {
    override async check(): Promise<void> {
      this.checks++
      throw new DockerNotAvailableError()
    }
  }

  const {engine, executor} = await openTestEngine({executor: new UnavailableExecutor()})
  await t.throwsAsync(engine.container().from('alpine').sync(), {instanceOf: DockerNotAvailableError})
  await t.throwsAsync(engine.container().from('alpine').stdout(), {instanceOf: DockerNotAvailableError})
  t.is(executor.checks, 2)
  t.deepEqual(executor.pulls, [])
  await engine.close()
})
