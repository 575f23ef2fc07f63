import {stat} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ConflictError, ExecutionError, NotFoundError, ValidationError} from '../errors.js'
import {createTmpDir, openTestEngine} from './helpers.js'

test('a tarball imports back into the same filesystem and configuration', async t => {
  const {engine} = await openTestEngine()
  const original = engine.container().from('alpine')
    .withNewFile('/app/hello.txt', 'hi')
    .withEnvVariable('MODE', 'test')
    .withWorkdir('/app')
    .withDefaultArgs(['serve'])
  const tarball = original.asTarball()
  t.is(await tarball.name(), 'image.tar')

  const imported = engine.container().import(tarball)
  t.is(await imported.file('/app/hello.txt').contents(), 'hi')
  t.is(await imported.file('/etc/image').contents(), 'alpine linux/amd64\n')
  t.is(await imported.envVariable('MODE'), 'test')
  t.is(await imported.workdir(), '/app')
  t.deepEqual(await imported.defaultArgs(), ['serve'])
  await engine.close()
})

test('publish pushes the tarball and returns the digest reference', async t => {
  const first = await openTestEngine()
  const second = await openTestEngine()
  const build = (engine: typeof first.engine) => engine.container().withNewFile('/a.txt', 'a')
  t.is(build(first.engine).asTarball().id(), build(second.engine).asTarball().id())
  const published = await build(first.engine).publish('registry.test/app:1')
  t.regex(published, /^registry\.test\/app:1@sha256:[\da-f]{64}$/)
  t.deepEqual(first.executor.published, [{ref: 'registry.test/app:1', credentials: []}])
  await first.engine.close()
  await second.engine.close()
})

test('platform variants are bundled and selected on import', async t => {
  const {engine} = await openTestEngine()
  const amd = engine.container().withNewFile('/arch', 'amd64')
  const arm = engine.container({platform: 'linux/arm64'}).withNewFile('/arch', 'arm64')
  const tarball = amd.asTarball({platformVariants: [arm]})
  t.is(await engine.container({platform: 'linux/arm64'}).import(tarball).file('/arch').contents(), 'arm64')
  t.is(await engine.container().import(tarball).file('/arch').contents(), 'amd64')
  await t.throwsAsync(engine.container({platform: 'linux/s390x'}).import(tarball).sync(), {instanceOf: NotFoundError})
  await t.throwsAsync(amd.asTarball({platformVariants: [amd]}).sync(), {instanceOf: ConflictError})
  await engine.close()
})

test('export writes the tarball to the host', async t => {
  const {engine} = await openTestEngine()
  const target = join(await createTmpDir(), 'out', 'image.tar')
  t.true(await engine.container().withNewFile('/a.txt', 'a').export(target, {compression: 'Uncompressed'}))
  t.true((await stat(target)).size > 0)
  await engine.close()
})

test('unsupported export options are rejected', async t => {
  const {engine} = await openTestEngine()
  const container = engine.container()
  t.throws(() => container.asTarball({compression: 'Zstd', mediaTypes: 'DockerMediaTypes'}), {instanceOf: ValidationError})
  await t.throwsAsync(container.asTarball({compression: 'EStarGZ'}).sync(), {instanceOf: ExecutionError})
  await engine.close()
})

test('publish passes registry credentials from secrets', async t => {
  const {engine, executor} = await openTestEngine()
  const password = engine.setSecret('registry-password', 'test-secret')
  await engine.container()
    .withRegistryAuth('registry.test', 'ci', password)
    .publish('registry.test/app:latest')
  t.deepEqual(executor.published, [{
    ref: 'registry.test/app:latest',
    credentials: [{address: 'registry.test', username: 'ci', password: 'test-secret'}]
  }])
  await engine.close()
})
