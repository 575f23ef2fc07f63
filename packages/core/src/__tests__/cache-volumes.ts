import {readdir, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {CacheVolumeManager} from '../cache-volumes.js'
import {ConflictError} from '../errors.js'
import {createTmpDir} from './helpers.js'

test('resolve returns the same volume for a key, across instances', async t => {
  const root = await createTmpDir()
  const volumes = await CacheVolumeManager.open(root)
  const [a, b] = await Promise.all([volumes.resolve('npm'), volumes.resolve('npm')])
  t.is(a, b)

  const reopened = await CacheVolumeManager.open(root)
  const again = await reopened.resolve('npm')
  t.is(again.id, a.id)
  t.is(again.createdAt, a.createdAt)
})

test('SHARED leases are granted concurrently on the same data', async t => {
  const volumes = await CacheVolumeManager.open(await createTmpDir())
  const volume = await volumes.resolve('shared')
  const first = await volumes.acquire(volume, {sharing: 'SHARED', pipelineId: 'p1'})
  const second = await volumes.acquire(volume, {sharing: 'SHARED', pipelineId: 'p2'})
  t.is(first.path, second.path)
  t.is(volumes.leaseCount(volume), 2)
  first.release()
  second.release()
  t.is(volumes.leaseCount(volume), 0)
})

test('LOCKED leases are exclusive and granted in request order', async t => {
  const volumes = await CacheVolumeManager.open(await createTmpDir())
  const volume = await volumes.resolve('locked')
  const order: string[] = []
  let waits = 0
  const holder = await volumes.acquire(volume, {sharing: 'LOCKED', pipelineId: 'p0'})
  const waiters = ['p1', 'p2', 'p3'].map(async pipelineId => {
    const lease = await volumes.acquire(volume, {
      sharing: 'LOCKED',
      pipelineId,
      onWait() {
        waits++
      }
    })
    order.push(pipelineId)
    lease.release()
  })

  t.is(waits, 3)
  holder.release()
  await Promise.all(waiters)
  t.deepEqual(order, ['p1', 'p2', 'p3'])
})

test('PRIVATE leases fork the shared data once per pipeline', async t => {
  const volumes = await CacheVolumeManager.open(await createTmpDir())
  const volume = await volumes.resolve('private')
  const shared = await volumes.acquire(volume, {sharing: 'SHARED', pipelineId: 'p0'})
  await writeFile(join(shared.path, 'seed.txt'), 'seed')
  shared.release()

  const a1 = await volumes.acquire(volume, {sharing: 'PRIVATE', pipelineId: 'a'})
  const a2 = await volumes.acquire(volume, {sharing: 'PRIVATE', pipelineId: 'a'})
  const b = await volumes.acquire(volume, {sharing: 'PRIVATE', pipelineId: 'b'})
  t.is(a1.path, a2.path)
  t.not(a1.path, b.path)
  t.is(await readFile(join(b.path, 'seed.txt'), 'utf8'), 'seed')

  await writeFile(join(a1.path, 'a.txt'), 'a')
  t.deepEqual(await readdir(b.path), ['seed.txt'])
  t.deepEqual(await readdir(shared.path), ['seed.txt'])

  for (const lease of [a1, a2, b]) {
    lease.release()
  }

  await volumes.releasePipeline('a')
  const [info] = await volumes.list()
  t.is(info.forks, 1)
})

test('remove deletes an idle volume and refuses a leased one', async t => {
  const volumes = await CacheVolumeManager.open(await createTmpDir())
  const volume = await volumes.resolve('gone')
  const lease = await volumes.acquire(volume, {sharing: 'SHARED', pipelineId: 'p'})
  await t.throwsAsync(volumes.remove('gone'), {instanceOf: ConflictError})
  lease.release()
  t.true(await volumes.remove('gone'))
  t.false(await volumes.remove('gone'))
  t.deepEqual(await volumes.list(), [])
})
