import test from 'ava'
import {CancelledError, ContainerTimeoutError, ExecutionError} from '../errors.js'
import {openTestEngine} from './helpers.js'

test('a computed node is reused by later requests', async t => {
  const {engine, executor} = await openTestEngine()
  const greet = engine.container().from('alpine').withExec(['echo', 'hi'])
  t.is(await greet.stdout(), 'hi\n')
  t.is(await engine.container().from('alpine').withExec(['echo', 'hi']).stdout(), 'hi\n')
  t.deepEqual(executor.execs, [['echo', 'hi']])
  t.deepEqual(executor.pulls, ['alpine'])
  await engine.close()
})

test('concurrent requests share one computation', async t => {
  const {engine, executor} = await openTestEngine()
  const slow = engine.container().from('alpine').withExec(['sleep', '50'])
  const [a, b] = await Promise.all([slow.sync(), slow.withExec(['echo', 'done']).stdout()])
  t.is(a, slow.id())
  t.is(b, 'done\n')
  t.deepEqual(executor.execs, [['sleep', '50'], ['echo', 'done']])
  await engine.close()
})

test('failures are reported with the exit code and not cached', async t => {
  const {engine, executor} = await openTestEngine()
  const failing = engine.container().from('alpine').withExec(['exit', '3'])
  const error = await t.throwsAsync(failing.sync(), {instanceOf: ExecutionError})
  t.is(error?.exitCode, 3)
  t.is(error?.stderr, 'exit 3\n')
  t.is(error?.operation?.kind, 'WithExec')
  t.is(error?.operation?.argument, 'exit 3')

  await t.throwsAsync(failing.sync(), {instanceOf: ExecutionError})
  t.is(executor.execs.length, 2)
  t.is(executor.pulls.length, 1)
  await engine.close()
})

test('expect FAILURE turns a non-zero exit into a result', async t => {
  const {engine} = await openTestEngine()
  const base = engine.container().from('alpine')
  t.is(await base.withExec(['exit', '3'], {expect: 'FAILURE'}).exitCode(), 3)
  t.is(await base.withExec(['exit', '4'], {expect: 'ANY'}).exitCode(), 4)
  await t.throwsAsync(base.withExec(['echo', 'ok'], {expect: 'FAILURE'}).sync(), {instanceOf: ExecutionError})
  await engine.close()
})

test('a process exceeding its timeout fails the operation', async t => {
  const {engine} = await openTestEngine()
  const slow = engine.container().from('alpine').withExec(['sleep', '200'], {timeoutMs: 20})
  await t.throwsAsync(slow.sync(), {instanceOf: ContainerTimeoutError, message: /exceeded timeout of 20ms/})
  t.false(engine.cache.has(slow.id()))
  await engine.close()
})

test('a timed out request stops waiting while the computation completes', async t => {
  const {engine, executor, events} = await openTestEngine()
  const slow = engine.container().from('alpine').withExec(['sleep', '200'])
  await t.throwsAsync(slow.sync({timeoutMs: 20}), {instanceOf: CancelledError})
  t.is(await slow.sync(), slow.id())
  t.is(executor.execs.length, 1)
  t.true(events.some(event => event.event === 'OPERATION_FINISHED' && event.kind === 'WithExec'))
  t.true(engine.cache.has(slow.id()))
  await engine.close()
})

test('an aborted signal cancels the request', async t => {
  const {engine} = await openTestEngine()
  const controller = new AbortController()
  controller.abort()
  await t.throwsAsync(engine.container().from('alpine').sync({signal: controller.signal}), {instanceOf: CancelledError})
  await engine.close()
})

test('requests report operations in dependency order', async t => {
  const {engine, events} = await openTestEngine()
  const greet = engine.container().from('alpine').withExec(['echo', 'hi'])
  await greet.sync()
  t.deepEqual(events.map(event => event.event === 'EXEC_LOG' ? `${event.event} ${event.line}` : `${event.event} ${event.kind}`), [
    'REQUEST_START WithExec',
    'OPERATION_STARTED ContainerScratch',
    'OPERATION_FINISHED ContainerScratch',
    'OPERATION_STARTED FromImage',
    'OPERATION_FINISHED FromImage',
    'OPERATION_STARTED WithExec',
    'EXEC_LOG hi',
    'OPERATION_FINISHED WithExec',
    'REQUEST_FINISHED WithExec'
  ])

  events.length = 0
  await greet.sync()
  t.deepEqual(events.map(event => `${event.event} ${event.kind}`), [
    'REQUEST_START WithExec',
    'OPERATION_CACHED WithExec',
    'REQUEST_FINISHED WithExec'
  ])
  await engine.close()
})
