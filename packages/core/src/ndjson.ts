import type {Buffer} from 'node:buffer'
import {StringDecoder} from 'node:string_decoder'
import {Transform, type TransformCallback} from 'node:stream'

/**
 * Writes each record of an object stream as one JSON line.
 */
export class NdjsonEncoder extends Transform {
  constructor() {
    super({writableObjectMode: true})
  }

  override _transform(record: unknown, _encoding: BufferEncoding, callback: TransformCallback): void {
    let line: string
    try {
      line = JSON.stringify(record)
    } catch (error) {
      callback(new Error('Record cannot be serialized to JSON', {cause: error}))
      return
    }

    callback(null, `${line}\n`)
  }
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line)
  } catch {
    return undefined
  }
}

/**
 * Reads JSON lines and emits the records `accept` recognizes.
 *
 * Lines that do not parse or are rejected are counted in `skipped`; an
 * append interrupted by a crash leaves a torn last line.
 */
export class NdjsonDecoder<T> extends Transform {
  skipped = 0
  private readonly text = new StringDecoder('utf8')
  private partial = ''

  constructor(private readonly accept: (value: unknown) => value is T) {
    super({readableObjectMode: true})
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    const lines = (this.partial + this.text.write(chunk)).split('\n')
    this.partial = lines.pop() ?? ''
    for (const line of lines) {
      this.takeLine(line)
    }

    callback()
  }

  override _flush(callback: TransformCallback): void {
    this.takeLine(this.partial + this.text.end())
    this.partial = ''
    callback()
  }

  private takeLine(line: string): void {
    if (line.trim() === '') {
      return
    }

    const value = parseLine(line)
    if (value !== undefined && this.accept(value)) {
      this.push(value)
    } else {
      this.skipped++
    }
  }
}
