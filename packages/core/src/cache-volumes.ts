import {cp, mkdir, readdir, readFile, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {sha256} from './address.js'
import {ConflictError, ResourceError, ValidationError} from './errors.js'
import {SingleFlight} from './single-flight.js'
import {dirSize} from './utils.js'
import {VolumeLock} from './volume-lock.js'
import type {CacheSharingMode} from './types.js'

export type CacheVolume = {
  key: string;
  /** sha256 of the key, names the storage directory */
  id: string;
  root: string;
  createdAt: string;
}

/**
 * Declared use of a lease. LOCKED volumes treat readers as writers:
 * nothing tells a read-only exec apart inside a mount.
 */
export type VolumeIntent = 'read' | 'write'

export type AcquireOptions = {
  sharing: CacheSharingMode;
  intent?: VolumeIntent;
  /** Pipeline instance; PRIVATE volumes fork once per instance. */
  pipelineId: string;
  /** Called when the lease has to wait for another holder. */
  onWait?: () => void;
}

export type VolumeLease = {
  volume: CacheVolume;
  sharing: CacheSharingMode;
  intent: VolumeIntent;
  /** Directory to mount. */
  path: string;
  /** Idempotent. */
  release: () => void;
}

export type VolumeInfo = {
  key: string;
  id: string;
  createdAt: string;
  size: number;
  leases: number;
  forks: number;
}

type VolumeMeta = {
  key: string;
  createdAt: string;
}

function isVolumeMeta(value: unknown): value is VolumeMeta {
  return typeof value === 'object' && value !== null
    && 'key' in value && typeof value.key === 'string'
    && 'createdAt' in value && typeof value.createdAt === 'string'
}

const pipelineIdPattern = /^[\w-]+$/

/**
 * Maps cache keys to persistent volumes and arbitrates access to them.
 *
 * Layout, under the volumes directory:
 * - `{id}/meta.json`: key and creation time
 * - `{id}/data/`: shared contents, mounted by SHARED and LOCKED leases
 * - `{id}/private/{pipelineId}/`: PRIVATE forks, deleted with their pipeline
 *
 * Concurrent writers on a SHARED volume are not arbitrated: leases are
 * counted, nothing more.
 */
export class CacheVolumeManager {
  static async open(root: string): Promise<CacheVolumeManager> {
    const manager = new CacheVolumeManager(root)
    await manager.load()
    return manager
  }

  private readonly volumes = new Map<string, CacheVolume>()
  private readonly creating = new SingleFlight<string, CacheVolume>()
  private readonly locks = new Map<string, VolumeLock>()
  private readonly leases = new Map<string, number>()
  private readonly forks = new Map<string, Promise<string>>()

  private constructor(private readonly root: string) {}

  /**
   * Returns the volume for a key, creating it on first use.
   */
  async resolve(key: string): Promise<CacheVolume> {
    if (key.length === 0 || key.includes('\0')) {
      throw new ValidationError(`Invalid cache volume key ${JSON.stringify(key)}`)
    }

    const id = sha256(key)
    const existing = this.volumes.get(id)
    if (existing) {
      return existing
    }

    return this.creating.run(id, async () => this.create(key, id))
  }

  async acquire(volume: CacheVolume, options: AcquireOptions): Promise<VolumeLease> {
    const {sharing, pipelineId} = options
    const intent = options.intent ?? 'write'
    let unlock = () => {}
    let path: string

    switch (sharing) {
      case 'SHARED': {
        path = join(volume.root, 'data')
        break
      }

      case 'LOCKED': {
        const lock = this.lockOf(volume.id)
        if (lock.locked) {
          options.onWait?.()
        }

        unlock = await lock.acquire()
        path = join(volume.root, 'data')
        break
      }

      case 'PRIVATE': {
        path = await this.fork(volume, pipelineId)
        break
      }
    }

    this.leases.set(volume.id, (this.leases.get(volume.id) ?? 0) + 1)
    let released = false
    return {
      volume,
      sharing,
      intent,
      path,
      release: () => {
        if (released) {
          return
        }

        released = true
        this.leases.set(volume.id, (this.leases.get(volume.id) ?? 1) - 1)
        unlock()
      }
    }
  }

  release(lease: VolumeLease): void {
    lease.release()
  }

  /** Number of outstanding leases on a volume. */
  leaseCount(volume: CacheVolume): number {
    return this.leases.get(volume.id) ?? 0
  }

  /**
   * Deletes the PRIVATE forks of a finished pipeline instance.
   */
  async releasePipeline(pipelineId: string): Promise<void> {
    const suffix = `:${pipelineId}`
    for (const [forkKey, pending] of this.forks) {
      if (!forkKey.endsWith(suffix)) {
        continue
      }

      this.forks.delete(forkKey)
      let path: string
      try {
        path = await pending
      } catch {
        // The fork was never created
        continue
      }

      await rm(path, {recursive: true, force: true})
    }
  }

  async list(): Promise<VolumeInfo[]> {
    const infos: VolumeInfo[] = []
    for (const volume of this.volumes.values()) {
      let forks = 0
      try {
        forks = (await readdir(join(volume.root, 'private'))).length
      } catch {
        forks = 0
      }

      infos.push({
        key: volume.key,
        id: volume.id,
        createdAt: volume.createdAt,
        size: await dirSize(volume.root),
        leases: this.leaseCount(volume),
        forks
      })
    }

    return infos.sort((a, b) => a.key.localeCompare(b.key))
  }

  /**
   * Deletes a volume and its contents.
   * @returns false when no volume exists for the key
   * @throws ConflictError while the volume is leased
   */
  async remove(key: string): Promise<boolean> {
    const id = sha256(key)
    const volume = this.volumes.get(id)
    if (!volume) {
      return false
    }

    if (this.leaseCount(volume) > 0) {
      throw new ConflictError(`Cache volume "${key}" is in use`)
    }

    this.volumes.delete(id)
    this.locks.delete(id)
    this.leases.delete(id)
    try {
      await rm(volume.root, {recursive: true, force: true})
    } catch (error) {
      throw new ResourceError(`Failed to remove cache volume "${key}"`, {cause: error})
    }

    return true
  }

  private lockOf(id: string): VolumeLock {
    let lock = this.locks.get(id)
    if (!lock) {
      lock = new VolumeLock()
      this.locks.set(id, lock)
    }

    return lock
  }

  private async fork(volume: CacheVolume, pipelineId: string): Promise<string> {
    if (!pipelineIdPattern.test(pipelineId)) {
      throw new ValidationError(`Invalid pipeline id ${pipelineId}`)
    }

    const forkKey = `${volume.id}:${pipelineId}`
    let pending = this.forks.get(forkKey)
    if (!pending) {
      pending = this.createFork(volume, pipelineId)
      this.forks.set(forkKey, pending)
    }

    return pending
  }

  private async createFork(volume: CacheVolume, pipelineId: string): Promise<string> {
    const path = join(volume.root, 'private', pipelineId)
    try {
      await rm(path, {recursive: true, force: true})
      await mkdir(path, {recursive: true})
      await cp(join(volume.root, 'data'), path, {recursive: true, verbatimSymlinks: true})
      return path
    } catch (error) {
      throw new ResourceError(`Failed to fork cache volume "${volume.key}"`, {cause: error})
    }
  }

  private async create(key: string, id: string): Promise<CacheVolume> {
    const volume: CacheVolume = {key, id, root: join(this.root, id), createdAt: new Date().toISOString()}
    try {
      await mkdir(join(volume.root, 'data'), {recursive: true})
      const meta: VolumeMeta = {key, createdAt: volume.createdAt}
      await writeFile(join(volume.root, 'meta.json'), JSON.stringify(meta, null, 2), 'utf8')
    } catch (error) {
      throw new ResourceError(`Failed to create cache volume "${key}"`, {cause: error})
    }

    this.volumes.set(id, volume)
    return volume
  }

  private async load(): Promise<void> {
    await mkdir(this.root, {recursive: true})
    for (const id of await readdir(this.root)) {
      let meta: unknown
      try {
        meta = JSON.parse(await readFile(join(this.root, id, 'meta.json'), 'utf8'))
      } catch {
        continue
      }

      if (!isVolumeMeta(meta)) {
        continue
      }

      const root = join(this.root, id)
      // Forks never outlive the process that made them
      await rm(join(root, 'private'), {recursive: true, force: true})
      this.volumes.set(id, {key: meta.key, id, root, createdAt: meta.createdAt})
    }
  }
}
