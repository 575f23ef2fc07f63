import test from 'ava'
import {SingleFlight} from '../single-flight.js'

test('concurrent callers of one key share a computation', async t => {
  const flights = new SingleFlight<string, number>()
  let calls = 0
  const compute = async () => {
    calls++
    return 42
  }

  const results = await Promise.all([flights.run('k', compute), flights.run('k', compute)])
  t.deepEqual(results, [42, 42])
  t.is(calls, 1)
  t.is(flights.size, 0)
})

test('a failed computation is not kept', async t => {
  const flights = new SingleFlight<string, number>()
  await t.throwsAsync(flights.run('k', async () => {
    throw new Error('boom')
  }), {message: 'boom'})
  t.is(await flights.run('k', async () => 1), 1)
})

test('distinct keys compute separately', async t => {
  const flights = new SingleFlight<string, string>()
  const results = await Promise.all([
    flights.run('a', async () => 'first'),
    flights.run('b', async () => 'second'),
  ])
  t.deepEqual(results, ['first', 'second'])
  t.is(flights.size, 0)
})
