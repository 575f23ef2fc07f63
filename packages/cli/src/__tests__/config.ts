import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ValidationError} from '@cairn/core'
import {evictionPolicy, loadConfig} from '../config.js'
import {createTmpDir} from './helpers.js'

test('loadConfig returns {} when no .cairn.yml', async t => {
  const dir = await createTmpDir()
  t.deepEqual(await loadConfig(dir), {})
})

test('loadConfig parses platform and cache limits', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.cairn.yml'), 'platform: linux/arm64\ncache:\n  maxSize: 10GB\n  maxAge: 7d\n', 'utf8')
  t.deepEqual(await loadConfig(dir), {
    platform: 'linux/arm64',
    cache: {maxSize: '10GB', maxAge: '7d'}
  })
})

test('loadConfig returns {} for empty file', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.cairn.yml'), '', 'utf8')
  t.deepEqual(await loadConfig(dir), {})
})

test('loadConfig throws on invalid YAML', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.cairn.yml'), ':\n  - :\n    bad: [', 'utf8')
  await t.throwsAsync(async () => loadConfig(dir))
})

test('loadConfig rejects a document that is not a mapping', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.cairn.yml'), '- linux/amd64\n', 'utf8')
  await t.throwsAsync(async () => loadConfig(dir), {instanceOf: ValidationError})
})

test('loadConfig rejects a cache section that is not a mapping', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, '.cairn.yml'), 'cache: 10GB\n', 'utf8')
  await t.throwsAsync(async () => loadConfig(dir), {instanceOf: ValidationError, message: /cache must be a mapping/})
})

test('evictionPolicy converts sizes and durations', t => {
  t.deepEqual(evictionPolicy({maxSize: '2MB', maxAge: '12h'}), {maxBytes: 2 * 1024 * 1024, maxAgeMs: 12 * 60 * 60 * 1000})
  t.deepEqual(evictionPolicy({}), {})
})

test('evictionPolicy rejects values that do not parse', t => {
  t.throws(() => evictionPolicy({maxSize: 'lots'}), {instanceOf: ValidationError, message: /Invalid size "lots"/})
  t.throws(() => evictionPolicy({maxAge: '7'}), {instanceOf: ValidationError, message: /Invalid duration "7"/})
})
