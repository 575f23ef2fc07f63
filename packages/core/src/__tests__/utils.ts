import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {dirSize, formatDuration, formatSize, parseDuration, parseSize} from '../utils.js'
import {createTmpDir} from './helpers.js'

test('formatSize picks the largest fitting unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(1536), '1.5 KB')
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
  t.is(formatSize(2 * 1024 ** 3), '2.0 GB')
})

test('formatDuration', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('parseSize accepts bare numbers and units', t => {
  t.is(parseSize('512'), 512)
  t.is(parseSize('200MB'), 200 * 1024 ** 2)
  t.is(parseSize('1.5 gb'), 1.5 * 1024 ** 3)
  t.is(parseSize('ten'), undefined)
  t.is(parseSize('10PB'), undefined)
})

test('parseDuration requires a unit', t => {
  t.is(parseDuration('500ms'), 500)
  t.is(parseDuration('12h'), 12 * 60 * 60 * 1000)
  t.is(parseDuration('7d'), 7 * 24 * 60 * 60 * 1000)
  t.is(parseDuration('7'), undefined)
})

test('dirSize sums file sizes recursively', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'nested'))
  await writeFile(join(dir, 'a.txt'), 'abc')
  await writeFile(join(dir, 'nested', 'b.txt'), 'de')
  t.is(await dirSize(dir), 5)
  t.is(await dirSize(join(dir, 'missing')), 0)
})
