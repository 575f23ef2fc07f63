import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {NotFoundError} from '@cairn/core'
import {pipelineFilenames, resolvePipelineFile} from '../utils.js'
import {createTmpDir} from './helpers.js'

test('resolvePipelineFile finds each known file name in a directory', async t => {
  for (const filename of pipelineFilenames) {
    const dir = await createTmpDir()
    await writeFile(join(dir, filename), 'id: test')
    t.is(await resolvePipelineFile(dir), join(dir, filename))
  }
})

test('resolvePipelineFile prefers cairn.yml over the other names', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'pipeline.yml'), 'id: pipeline')
  await writeFile(join(dir, 'pipeline.json'), '{"id":"json"}')
  await writeFile(join(dir, 'cairn.yml'), 'id: cairn')
  t.is(await resolvePipelineFile(dir), join(dir, 'cairn.yml'))
})

test('resolvePipelineFile skips a directory carrying a pipeline file name', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'cairn.yml'))
  await writeFile(join(dir, 'pipeline.json'), '{"id":"json"}')
  t.is(await resolvePipelineFile(dir), join(dir, 'pipeline.json'))
})

test('resolvePipelineFile returns a file path as is', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'release.yaml')
  await writeFile(file, 'id: release')
  t.is(await resolvePipelineFile(file), file)
})

test('resolvePipelineFile rejects a missing path or a directory without pipeline', async t => {
  const dir = await createTmpDir()
  await t.throwsAsync(resolvePipelineFile(join(dir, 'missing')), {instanceOf: NotFoundError, message: /Path does not exist/})
  await t.throwsAsync(resolvePipelineFile(dir), {instanceOf: NotFoundError, message: /No pipeline file in/})
})
