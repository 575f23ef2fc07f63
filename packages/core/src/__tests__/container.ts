import {access, symlink, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {NotFoundError} from '../errors.js'
import {createTmpDir, openTestEngine} from './helpers.js'

test('an image configuration is adopted by from()', async t => {
  const {engine} = await openTestEngine({images: {'node:20': {env: ['PATH=/bin'], workdir: '/app', cmd: ['node'], labels: {team: 'web'}}}})
  const node = engine.container().from('node:20')
  t.is(await node.envVariable('PATH'), '/bin')
  t.is(await node.workdir(), '/app')
  t.deepEqual(await node.defaultArgs(), ['node'])
  t.deepEqual(await node.labels(), [{name: 'team', value: 'web'}])
  t.is(await node.withFile('/etc/copy', node.file('/etc/image')).file('/etc/copy').contents(), 'node:20 linux/amd64\n')
  await engine.close()
})

test('environment variables expand against earlier ones', async t => {
  const {engine} = await openTestEngine()
  const container = engine.container()
    .withEnvVariable('A', 'x')
    .withEnvVariable('B', '$A-y', {expand: true})
    .withEnvVariable('C', '${A}z')
  t.is(await container.envVariable('B'), 'x-y')
  t.is(await container.envVariable('C'), '${A}z')
  t.is(await container.withoutEnvVariable('A').envVariable('A'), undefined)
  await engine.close()
})

test('secret variables reach the process but not the graph', async t => {
  const {engine} = await openTestEngine()
  const secret = engine.setSecret('token', 'test-secret')
  const container = engine.container().from('alpine').withSecretVariable('TOKEN', secret).withExec(['env'])
  t.is(await container.stdout(), 'TOKEN=test-secret\n')
  t.false(engine.ancestry(container.id()).some(node => JSON.stringify(node.params).includes('test-secret')))
  t.deepEqual(await container.envVariables(), [])
  await engine.close()
})

test('withNewFile writes into the root filesystem', async t => {
  const {engine} = await openTestEngine()
  const container = engine.container().withWorkdir('/app').withNewFile('hello.txt', 'hello')
  t.is(await container.file('/app/hello.txt').contents(), 'hello')
  t.is(await container.file('/app/hello.txt').size(), 5)
  await t.throwsAsync(container.file('/app/missing.txt').contents(), {instanceOf: NotFoundError})
  await engine.close()
})

test('a relative working directory resolves against the current one', async t => {
  const {engine} = await openTestEngine()
  t.is(await engine.container().withWorkdir('/app').withWorkdir('src').workdir(), '/app/src')
  await engine.close()
})

test('entrypoint and default arguments wrap the command', async t => {
  const {engine, executor} = await openTestEngine()
  const echo = engine.container().from('alpine').withEntrypoint(['echo'])
  t.is(await echo.withExec(['hi']).stdout(), 'hi\n')
  t.is(await echo.withExec(['echo', 'plain'], {skipEntrypoint: true}).stdout(), 'plain\n')
  t.is(await echo.withDefaultArgs(['default']).withExec([]).stdout(), 'default\n')
  t.deepEqual(executor.execs, [['echo', 'hi'], ['echo', 'plain'], ['echo', 'default']])
  await engine.close()
})

test('redirectStdout writes the output to a file', async t => {
  const {engine} = await openTestEngine()
  const container = engine.container().from('alpine').withExec(['echo', 'hi'], {redirectStdout: '/out.txt'})
  t.is(await container.file('/out.txt').contents(), 'hi\n')
  t.is(await container.stdout(), 'hi\n')
  await engine.close()
})

test('writes to a mounted directory are kept in the mount', async t => {
  const {engine} = await openTestEngine()
  const source = engine.directory().withNewFile('in.txt', 'in')
  const container = engine.container().from('alpine')
    .withMountedDirectory('/src', source)
    .withExec(['write', '/src/out.txt', 'out'])
  t.deepEqual(await container.directory('/src').entries(), ['in.txt', 'out.txt'])
  t.deepEqual(await container.mounts(), ['/src'])
  t.deepEqual(await source.entries(), ['in.txt'])
  t.deepEqual(await container.withoutMount('/src').mounts(), [])
  await engine.close()
})

test('secret mounts are read-only files', async t => {
  const {engine} = await openTestEngine()
  const secret = engine.setSecret('token', 'test-secret')
  const base = engine.container().from('alpine').withMountedSecret('/run/token', secret)
  t.is(await base.withExec(['cat', '/run/token']).stdout(), 'test-secret')
  const write = base.withExec(['write', '/run/token', 'x'], {expect: 'ANY'})
  t.is(await write.exitCode(), 1)
  t.is(await write.stderr(), 'Read-only file system\n')
  await engine.close()
})

test('bound services run for the duration of the process', async t => {
  const {engine, executor} = await openTestEngine()
  const database = engine.container().from('alpine').withDefaultArgs(['serve']).withExposedPort(5432).asService()
  const client = engine.container().from('alpine').withServiceBinding('db', database).withExec(['echo', 'ok'])
  t.is(await client.stdout(), 'ok\n')
  t.deepEqual(executor.services, ['serve'])
  t.is(executor.stopped, 1)
  await engine.close()
})

test('reading process output without a process fails', async t => {
  const {engine} = await openTestEngine()
  await t.throwsAsync(engine.container().from('alpine').stdout(), {instanceOf: NotFoundError})
  await engine.close()
})

test('exposed ports and labels are configuration only', async t => {
  const {engine} = await openTestEngine()
  const container = engine.container()
    .withExposedPort(8080, {description: 'http'})
    .withExposedPort(53, {protocol: 'UDP'})
    .withoutExposedPort(53, 'UDP')
    .withLabel('a', '1')
    .withLabel('a', '2')
  t.deepEqual(await container.exposedPorts(), [{port: 8080, protocol: 'TCP', description: 'http'}])
  t.deepEqual(await container.labels(), [{name: 'a', value: '2'}])
  t.is(await container.platform(), 'linux/amd64')
  await engine.close()
})

test('symlinks in the root filesystem resolve inside it', async t => {
  const {engine} = await openTestEngine()
  const outside = await createTmpDir()
  await writeFile(join(outside, 'host-secret'), 'HOST DATA')
  const links = await createTmpDir()
  await symlink(outside, join(links, 'link'))
  await symlink('../../..', join(links, 'up'))

  const base = engine.container().from('alpine').withDirectory('/', await engine.host().directory(links))
  const written = base.withNewFile('/link/pwned', 'inside')
  await written.sync()
  await t.throwsAsync(access(join(outside, 'pwned')))
  t.is(await written.file(join(outside, 'pwned')).contents(), 'inside')
  t.is(await written.file('/link/pwned').contents(), 'inside')

  await t.throwsAsync(base.file('/link/host-secret').contents(), {instanceOf: NotFoundError})
  t.is(await base.file('/up/etc/image').contents(), 'alpine linux/amd64\n')

  const copied = base.withDirectory('/link/sub', engine.directory().withNewFile('a.txt', 'a'))
  t.deepEqual(await copied.directory(join(outside, 'sub')).entries(), ['a.txt'])
  await t.throwsAsync(access(join(outside, 'sub')))
  await engine.close()
})
