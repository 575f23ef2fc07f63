import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ConflictError, NotFoundError} from '../errors.js'
import {createTmpDir, openTestEngine} from './helpers.js'

test('directories are built from files and subdirectories', async t => {
  const {engine} = await openTestEngine()
  const tree = engine.directory()
    .withNewFile('a/b.txt', 'b')
    .withNewFile('c.txt', 'c')
    .withNewDirectory('empty')
  t.deepEqual(await tree.entries(), ['a', 'c.txt', 'empty'])
  t.deepEqual(await tree.entries('a'), ['b.txt'])
  t.is(await tree.file('a/b.txt').contents(), 'b')
  t.is(await tree.file('a/b.txt').name(), 'b.txt')
  t.deepEqual(await tree.directory('a').entries(), ['b.txt'])
  t.deepEqual(await tree.withoutPath('a').entries(), ['c.txt', 'empty'])
  await t.throwsAsync(tree.file('a').contents(), {instanceOf: NotFoundError})
  await engine.close()
})

test('withDirectory merges filtered contents', async t => {
  const {engine} = await openTestEngine()
  const source = engine.directory()
    .withNewFile('main.ts', 'main')
    .withNewFile('debug.log', 'log')
  const merged = engine.directory()
    .withNewFile('src/keep.txt', 'keep')
    .withDirectory('src', source, {exclude: ['*.log']})
  t.deepEqual(await merged.entries('src'), ['keep.txt', 'main.ts'])
  t.deepEqual(await engine.directory().withFile('copy.ts', source.file('main.ts')).entries(), ['copy.ts'])
  await engine.close()
})

test('export copies the tree to the host', async t => {
  const {engine} = await openTestEngine()
  const target = await createTmpDir()
  const tree = engine.directory().withNewFile('a/b.txt', 'b')
  t.true(await tree.export(target))
  t.is(await readFile(join(target, 'a', 'b.txt'), 'utf8'), 'b')
  t.true(await tree.file('a/b.txt').export(join(target, 'out', 'b.txt')))
  t.is(await readFile(join(target, 'out', 'b.txt'), 'utf8'), 'b')
  await engine.close()
})

test('host directories are addressed by their content', async t => {
  const {engine} = await openTestEngine()
  const dir = await createTmpDir()
  await mkdir(join(dir, 'src'))
  await writeFile(join(dir, 'src', 'x.txt'), 'one')
  await writeFile(join(dir, 'build.log'), 'log')

  const host = engine.host()
  const first = await host.directory(dir, {exclude: ['*.log']})
  t.is((await host.directory(dir, {exclude: ['*.log']})).id(), first.id())
  t.deepEqual(await first.entries(), ['src'])

  await writeFile(join(dir, 'build.log'), 'changed')
  t.is((await host.directory(dir, {exclude: ['*.log']})).id(), first.id())

  await writeFile(join(dir, 'src', 'x.txt'), 'two')
  const second = await host.directory(dir, {exclude: ['*.log']})
  t.not(second.id(), first.id())
  t.is(await second.file('src/x.txt').contents(), 'two')
  await engine.close()
})

test('a host directory changed before its first use fails', async t => {
  const {engine} = await openTestEngine()
  const dir = await createTmpDir()
  await writeFile(join(dir, 'x.txt'), 'one')
  const loaded = await engine.host().directory(dir)
  await writeFile(join(dir, 'x.txt'), 'two')
  await t.throwsAsync(loaded.sync(), {instanceOf: ConflictError})
  await engine.close()
})

test('host files keep their name', async t => {
  const {engine} = await openTestEngine()
  const dir = await createTmpDir()
  await writeFile(join(dir, 'notes.md'), '# notes')
  const file = await engine.host().file(join(dir, 'notes.md'))
  t.is(await file.name(), 'notes.md')
  t.is(await file.contents(), '# notes')
  await engine.close()
})
