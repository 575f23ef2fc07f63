import {copyFile, lstat, mkdir, readFile} from 'node:fs/promises'
import {dirname, resolve} from 'node:path'
import {ResourceError} from '../errors.js'
import {expectFile} from '../operations/context.js'
import {hostPath} from '../operations/filesystem.js'
import type {MaterializeOptions} from '../scheduler.js'
import type {Address} from '../types.js'
import {Handle} from './handle.js'

export class File extends Handle {
  pipeline(name: string, options?: {description?: string; labels?: Record<string, string>}): File {
    return new File(this.session, this.address, this.nestedLabels(name, options))
  }

  async contents(options?: MaterializeOptions): Promise<string> {
    return this.read(async path => readFile(path, 'utf8'), options)
  }

  async size(options?: MaterializeOptions): Promise<number> {
    return this.read(async path => (await lstat(path)).size, options)
  }

  async name(options?: MaterializeOptions): Promise<string> {
    return this.session.request(this.address, async artifact => expectFile(artifact).name, options)
  }

  /**
   * Copies the file to a host path, creating parent directories.
   */
  async export(path: string, options?: MaterializeOptions): Promise<boolean> {
    const target = resolve(path)
    await this.read(async source => {
      try {
        await mkdir(dirname(target), {recursive: true})
        await copyFile(source, target)
      } catch (error) {
        throw new ResourceError(`Failed to export file to ${target}`, {cause: error})
      }
    }, options)
    return true
  }

  async sync(options?: MaterializeOptions): Promise<Address> {
    await this.session.request(this.address, async artifact => expectFile(artifact), options)
    return this.address
  }

  /** Host path of the materialized file, valid while `fn` runs. */
  private async read<T>(fn: (path: string) => Promise<T>, options?: MaterializeOptions): Promise<T> {
    return this.session.request(this.address, async artifact => {
      const file = expectFile(artifact)
      return fn(hostPath(this.session.snapshotPath(file.snapshot), file.name))
    }, options)
  }
}
