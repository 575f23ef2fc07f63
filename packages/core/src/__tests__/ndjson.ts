import {Buffer} from 'node:buffer'
import {Readable} from 'node:stream'
import {pipeline} from 'node:stream/promises'
import test from 'ava'
import {NdjsonDecoder, NdjsonEncoder} from '../ndjson.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

async function decode(chunks: Array<string | Buffer>): Promise<{records: unknown[]; skipped: number}> {
  const records: unknown[] = []
  const decoder = new NdjsonDecoder(isRecord)
  await pipeline(Readable.from(chunks.map(chunk => typeof chunk === 'string' ? Buffer.from(chunk) : chunk)), decoder, async (source: AsyncIterable<unknown>) => {
    for await (const value of source) {
      records.push(value)
    }
  })
  return {records, skipped: decoder.skipped}
}

test('decodes lines split across chunks', async t => {
  const {records} = await decode(['{"kind":"With', 'User"}\n{"a":', '1}\n'])
  t.deepEqual(records, [{kind: 'WithUser'}, {a: 1}])
})

test('decodes a multibyte character split across chunks', async t => {
  const bytes = Buffer.from('{"name":"é"}\n')
  const {records} = await decode([bytes.subarray(0, 10), bytes.subarray(10)])
  t.deepEqual(records, [{name: 'é'}])
})

test('counts malformed and rejected lines and ignores empty ones', async t => {
  const {records, skipped} = await decode(['{"valid":true}\n\nnot-json\n[1,2]\n{"also":"valid"}\n'])
  t.deepEqual(records, [{valid: true}, {also: 'valid'}])
  t.is(skipped, 2)
})

test('decodes a final line without newline and skips a torn one', async t => {
  t.deepEqual((await decode(['{"a":1}\n{"final":true}'])).records, [{a: 1}, {final: true}])
  const torn = await decode(['{"a":1}\n{"torn":'])
  t.deepEqual(torn.records, [{a: 1}])
  t.is(torn.skipped, 1)
})

test('encoder writes one JSON document per line', async t => {
  const chunks: string[] = []
  await pipeline(Readable.from([{x: 1}, {y: [2]}]), new NdjsonEncoder(), async (source: AsyncIterable<Uint8Array>) => {
    for await (const chunk of source) {
      chunks.push(Buffer.from(chunk).toString())
    }
  })
  t.is(chunks.join(''), '{"x":1}\n{"y":[2]}\n')
})
