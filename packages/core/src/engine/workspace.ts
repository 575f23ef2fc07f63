import {access, mkdir, readdir, readFile, rename, rm, writeFile} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {ResourceError, ValidationError} from '../errors.js'
import {dirSize} from '../utils.js'
import type {SnapshotId} from '../types.js'

export type SnapshotMeta = {
  id: SnapshotId;
  size: number;
  createdAt: string;
}

function isSnapshotMeta(value: unknown): value is SnapshotMeta {
  return typeof value === 'object' && value !== null
    && 'id' in value && typeof value.id === 'string'
    && 'size' in value && typeof value.size === 'number'
    && 'createdAt' in value && typeof value.createdAt === 'string'
}

/**
 * On-disk state of an engine instance.
 *
 * A workspace provides:
 * - **staging/**: Snapshots being written (cleared on open)
 * - **snapshots/**: Committed filesystem snapshots (immutable)
 * - **artifacts/**: Artifact index records, managed by the artifact cache
 * - **volumes/**: Cache volume storage, managed by the volume manager
 * - **nodes.ndjson**: Operation node log, managed by the node store
 *
 * ## Snapshot Lifecycle
 *
 * 1. `prepareSnapshot()` creates `staging/{id}/fs/`
 * 2. An operation writes the filesystem into `staging/{id}/fs/`
 * 3. Success: `commitSnapshot()` records its size in `meta.json` and
 *    atomically moves it to `snapshots/{id}/`
 *    OR Failure: `discardSnapshot()` deletes `staging/{id}/`
 *
 * Snapshots are immutable once committed.
 *
 * @example
 * ```typescript
 * const ws = await Workspace.create('/var/lib/cairn')
 * const id = ws.generateSnapshotId()
 * const fs = await ws.prepareSnapshot(id)
 * // ... write into fs ...
 * await ws.commitSnapshot(id) // On success
 * // OR await ws.discardSnapshot(id) // On failure
 * ```
 */
export class Workspace {
  /**
   * Creates the workspace directories under `root` (idempotent).
   */
  static async create(root: string): Promise<Workspace> {
    try {
      for (const dir of ['staging', 'snapshots', 'artifacts', 'volumes']) {
        await mkdir(join(root, dir), {recursive: true})
      }
    } catch (error) {
      throw new ResourceError(`Cannot create state directory ${root}`, {cause: error})
    }

    return new Workspace(root)
  }

  /**
   * Opens an existing workspace.
   * @throws If the directory does not exist
   */
  static async open(root: string): Promise<Workspace> {
    await access(join(root, 'snapshots'))
    return new Workspace(root)
  }

  private constructor(readonly root: string) {}

  get nodesPath(): string {
    return join(this.root, 'nodes.ndjson')
  }

  get artifactsPath(): string {
    return join(this.root, 'artifacts')
  }

  get volumesPath(): string {
    return join(this.root, 'volumes')
  }

  /**
   * @returns Snapshot ID in format: `{timestamp}-{uuid-prefix}`
   */
  generateSnapshotId(): SnapshotId {
    return `${Date.now()}-${randomUUID().slice(0, 8)}`
  }

  stagingPath(id: SnapshotId): string {
    this.validateSnapshotId(id)
    return join(this.root, 'staging', id)
  }

  stagingFsPath(id: SnapshotId): string {
    return join(this.stagingPath(id), 'fs')
  }

  snapshotPath(id: SnapshotId): string {
    this.validateSnapshotId(id)
    return join(this.root, 'snapshots', id)
  }

  snapshotFsPath(id: SnapshotId): string {
    return join(this.snapshotPath(id), 'fs')
  }

  /**
   * Creates `staging/{id}/fs/`.
   * @returns Absolute path to the staging filesystem root
   */
  async prepareSnapshot(id: SnapshotId): Promise<string> {
    try {
      const path = this.stagingFsPath(id)
      await mkdir(path, {recursive: true})
      return path
    } catch (error) {
      throw new ResourceError(`Failed to prepare snapshot ${id}`, {cause: error})
    }
  }

  /**
   * Commits a staging snapshot. Uses atomic rename.
   */
  async commitSnapshot(id: SnapshotId): Promise<SnapshotMeta> {
    try {
      const meta: SnapshotMeta = {
        id,
        size: await dirSize(this.stagingFsPath(id)),
        createdAt: new Date().toISOString()
      }
      await writeFile(join(this.stagingPath(id), 'meta.json'), JSON.stringify(meta, null, 2), 'utf8')
      await rename(this.stagingPath(id), this.snapshotPath(id))
      return meta
    } catch (error) {
      throw new ResourceError(`Failed to commit snapshot ${id}`, {cause: error})
    }
  }

  async discardSnapshot(id: SnapshotId): Promise<void> {
    try {
      await rm(this.stagingPath(id), {recursive: true, force: true})
    } catch (error) {
      throw new ResourceError(`Failed to discard snapshot ${id}`, {cause: error})
    }
  }

  /**
   * Removes all staging directories left over by an interrupted process.
   */
  async cleanupStaging(): Promise<void> {
    const stagingDir = join(this.root, 'staging')
    const entries = await readdir(stagingDir, {withFileTypes: true})
    for (const entry of entries) {
      if (entry.isDirectory()) {
        await rm(join(stagingDir, entry.name), {recursive: true, force: true})
      }
    }
  }

  async listSnapshots(): Promise<SnapshotId[]> {
    const entries = await readdir(join(this.root, 'snapshots'), {withFileTypes: true})
    return entries.filter(e => e.isDirectory()).map(e => e.name)
  }

  /**
   * Reads a committed snapshot's metadata.
   * @returns Metadata, or undefined when the snapshot is missing or incomplete
   */
  async readSnapshotMeta(id: SnapshotId): Promise<SnapshotMeta | undefined> {
    let meta: unknown
    try {
      meta = JSON.parse(await readFile(join(this.snapshotPath(id), 'meta.json'), 'utf8'))
    } catch {
      return undefined
    }

    return isSnapshotMeta(meta) ? meta : undefined
  }

  async removeSnapshot(id: SnapshotId): Promise<void> {
    await rm(this.snapshotPath(id), {recursive: true, force: true})
  }

  /**
   * Validates a snapshot ID to prevent path traversal.
   * @internal
   */
  private validateSnapshotId(id: string): void {
    if (!/^[\w-]+$/.test(id)) {
      throw new ValidationError(`Invalid snapshot ID: ${id}. Must contain only alphanumeric characters, dashes, and underscores.`)
    }
  }
}
