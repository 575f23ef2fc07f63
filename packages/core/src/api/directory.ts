import {readdir} from 'node:fs/promises'
import {resolve} from 'node:path'
import {ResourceError} from '../errors.js'
import {expectDirectory} from '../operations/context.js'
import {copyTree, requireEntry, resolveHostPath} from '../operations/filesystem.js'
import type {MaterializeOptions} from '../scheduler.js'
import type {Address, OperationSpec} from '../types.js'
import {Handle} from './handle.js'
import {File} from './file.js'
import {validatePath, validatePermissions} from './validate.js'

export type DirectoryCopyOptions = {
  include?: string[];
  exclude?: string[];
}

/**
 * Immutable directory tree. Paths are relative to its root.
 */
export class Directory extends Handle {
  pipeline(name: string, options?: {description?: string; labels?: Record<string, string>}): Directory {
    return new Directory(this.session, this.address, this.nestedLabels(name, options))
  }

  withNewFile(path: string, contents: string, options: {permissions?: number} = {}): Directory {
    return this.next({
      kind: 'DirectoryWithNewFile',
      params: {path: validatePath(path), contents, permissions: validatePermissions(options.permissions) ?? 0o644}
    })
  }

  withFile(path: string, file: File, options: {permissions?: number} = {}): Directory {
    return this.next({
      kind: 'DirectoryWithFile',
      params: {path: validatePath(path), permissions: validatePermissions(options.permissions)}
    }, [file])
  }

  withDirectory(path: string, directory: Directory, options: DirectoryCopyOptions = {}): Directory {
    return this.next({
      kind: 'DirectoryWithDirectory',
      params: {path: validatePath(path), include: options.include ?? [], exclude: options.exclude ?? []}
    }, [directory])
  }

  withNewDirectory(path: string, options: {permissions?: number} = {}): Directory {
    return this.next({
      kind: 'DirectoryWithNewDirectory',
      params: {path: validatePath(path), permissions: validatePermissions(options.permissions) ?? 0o755}
    })
  }

  withoutPath(path: string): Directory {
    return this.next({kind: 'DirectoryWithoutPath', params: {path: validatePath(path)}})
  }

  file(path: string): File {
    const node = this.derive({kind: 'DirectoryFile', params: {path: validatePath(path)}})
    return new File(this.session, node.address, this.pipelineLabels)
  }

  directory(path: string): Directory {
    return this.next({kind: 'Subdirectory', params: {path: validatePath(path)}})
  }

  /**
   * Lists the names of the entries at `path`, sorted.
   */
  async entries(path = '.', options?: MaterializeOptions): Promise<string[]> {
    return this.session.request(this.address, async artifact => {
      const target = await resolveHostPath(this.session.snapshotPath(expectDirectory(artifact).snapshot), path)
      await requireEntry(target, 'directory', path)
      return (await readdir(target)).sort()
    }, options)
  }

  /**
   * Copies the tree into a host directory, merging with its contents.
   */
  async export(path: string, options?: MaterializeOptions): Promise<boolean> {
    const target = resolve(path)
    await this.session.request(this.address, async artifact => {
      try {
        await copyTree(this.session.snapshotPath(expectDirectory(artifact).snapshot), target)
      } catch (error) {
        throw new ResourceError(`Failed to export directory to ${target}`, {cause: error})
      }
    }, options)
    return true
  }

  async sync(options?: MaterializeOptions): Promise<Address> {
    await this.session.request(this.address, async artifact => expectDirectory(artifact), options)
    return this.address
  }

  private next(spec: OperationSpec, inputs: Handle[] = []): Directory {
    return new Directory(this.session, this.derive(spec, inputs).address, this.pipelineLabels)
  }
}
