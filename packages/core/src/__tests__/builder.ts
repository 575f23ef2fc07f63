import test from 'ava'
import {ConflictError, NotFoundError, ValidationError} from '../errors.js'
import {validateSharing} from '../api/validate.js'
import {openTestEngine} from './helpers.js'

test('identical chains have the same id and pipeline labels do not change it', async t => {
  const {engine, executor} = await openTestEngine()
  const a = engine.container().from('alpine:3.18').withExec(['echo', 'hi'])
  const b = engine.container().from('alpine:3.18').pipeline('greet', {description: 'say hi'}).withExec(['echo', 'hi'])
  t.is(a.id(), b.id())
  t.not(a.id(), engine.container().from('alpine:3.18').withExec(['echo', 'ho']).id())
  t.deepEqual(executor.execs, [])
  await engine.close()
})

test('withExec without arguments needs a default command', async t => {
  const {engine} = await openTestEngine()
  t.throws(() => engine.container().withExec([]), {instanceOf: ValidationError})
  t.notThrows(() => engine.container().from('alpine').withExec([]))
  t.notThrows(() => engine.container().withDefaultArgs(['run']).withExec([]))
  t.throws(() => engine.container().from('alpine').withExec(['a', '']), {instanceOf: ValidationError})
  await engine.close()
})

test('nothing can be mounted below a file mount', async t => {
  const {engine} = await openTestEngine()
  const conf = engine.directory().withNewFile('conf', 'x=1').file('conf')
  const base = engine.container().from('alpine').withMountedFile('/etc/conf', conf)
  t.throws(() => base.withMountedDirectory('/etc/conf/sub', engine.directory()), {instanceOf: ConflictError})
  t.notThrows(() => base.withMountedDirectory('/etc/conf', engine.directory()))
  await engine.close()
})

test('withoutMount on an unmounted absolute path returns the same container', async t => {
  const {engine} = await openTestEngine()
  const base = engine.container().from('alpine').withMountedTemp('/tmp')
  t.is(base.withoutMount('/nothing'), base)
  t.not(base.withoutMount('/tmp').id(), base.id())

  const relative = base.withMountedTemp('work')
  t.not(relative.withoutMount('/nothing').id(), relative.id())
  await engine.close()
})

test('invalid arguments are rejected when the chain is built', async t => {
  const {engine} = await openTestEngine()
  const base = engine.container().from('alpine')
  const secret = engine.setSecret('token', 'test-secret')
  t.throws(() => base.withMountedSecret('/run/token', secret, {mode: 0o600}), {instanceOf: ValidationError})
  t.notThrows(() => base.withMountedSecret('/run/token', secret, {mode: 0o600, owner: '1000'}))
  t.throws(() => validateSharing('SOMETIMES'), {instanceOf: ValidationError})
  t.is(validateSharing('LOCKED'), 'LOCKED')
  t.throws(() => base.withExposedPort(70_000), {instanceOf: ValidationError})
  t.throws(() => base.withExec(['sleep', '1'], {timeoutMs: 0}), {instanceOf: ValidationError})
  t.throws(() => base.withMountedTemp('/'), {instanceOf: ValidationError})
  t.throws(() => engine.cacheVolume(''), {instanceOf: ValidationError})
  t.throws(() => engine.container({platform: 'linux'}), {instanceOf: ValidationError})
  await engine.close()
})

test('handles of another engine instance are rejected', async t => {
  const first = await openTestEngine()
  const second = await openTestEngine()
  t.throws(() => first.engine.container().withMountedDirectory('/src', second.engine.directory()), {instanceOf: ValidationError})
  await first.engine.close()
  await second.engine.close()
})

test('load*FromID checks the id, its existence and its family', async t => {
  const {engine} = await openTestEngine()
  const container = engine.container().from('alpine')
  const directory = engine.directory().withNewFile('a.txt', 'a')
  t.is(engine.loadContainerFromID(container.id()).id(), container.id())
  t.is(engine.loadDirectoryFromID(directory.id()).id(), directory.id())
  t.throws(() => engine.loadContainerFromID(directory.id()), {instanceOf: ValidationError})
  t.throws(() => engine.loadContainerFromID(`sha256:${'a'.repeat(64)}`), {instanceOf: NotFoundError})
  t.throws(() => engine.loadContainerFromID('alpine'), {instanceOf: ValidationError})
  await engine.close()
})

test('a secret enters the graph as a digest only', async t => {
  const {engine} = await openTestEngine()
  const secret = engine.setSecret('token', 'test-secret')
  const [node] = engine.ancestry(secret.id())
  t.is(node.kind, 'SetSecret')
  t.false(JSON.stringify(node.params).includes('test-secret'))
  t.is(secret.name(), 'token')
  t.is(await secret.plaintext(), 'test-secret')
  await engine.close()
})
