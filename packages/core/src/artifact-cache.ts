import {readdir, readFile, rename, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {randomUUID} from 'node:crypto'
import {ResourceError} from './errors.js'
import type {SnapshotMeta, Workspace} from './engine/workspace.js'
import {isAddress, type Address, type SnapshotId, type StoredArtifact} from './types.js'

export type ArtifactEntry = {
  address: Address;
  artifact: StoredArtifact;
  createdAt: number;
  lastUsedAt: number;
}

export type EvictionPolicy = {
  /** Upper bound for the total size of snapshots kept by cached artifacts. */
  maxBytes?: number;
  /** Entries not used for longer than this are dropped. */
  maxAgeMs?: number;
  /** Reference time, defaults to now. */
  now?: number;
}

export type EvictionResult = {
  artifacts: number;
  snapshots: number;
  freedBytes: number;
}

export type CacheStats = {
  artifacts: number;
  snapshots: number;
  bytes: number;
  pinned: number;
}

type ArtifactRecord = {
  address: Address;
  artifact: StoredArtifact;
  createdAt: string;
}

const artifactTypes = new Set(['container', 'directory', 'file'])

function isArtifactRecord(value: unknown): value is ArtifactRecord {
  return typeof value === 'object' && value !== null
    && 'address' in value && typeof value.address === 'string' && isAddress(value.address)
    && 'createdAt' in value && typeof value.createdAt === 'string'
    && 'artifact' in value && typeof value.artifact === 'object' && value.artifact !== null
    && 'type' in value.artifact && typeof value.artifact.type === 'string' && artifactTypes.has(value.artifact.type)
}

/**
 * Snapshots an artifact depends on. Mount sources recorded in a container's
 * config count as well: the artifact reads them on every later exec.
 */
export function snapshotsOf(artifact: StoredArtifact): SnapshotId[] {
  switch (artifact.type) {
    case 'container': {
      const ids = [artifact.rootfs]
      for (const mount of artifact.config.mounts) {
        if (mount.type === 'directory' || mount.type === 'file') {
          ids.push(mount.snapshot)
        } else if (mount.type === 'cache' && mount.seed) {
          ids.push(mount.seed)
        }
      }

      return ids
    }

    case 'directory':
    case 'file': {
      return [artifact.snapshot]
    }
  }
}

/**
 * Maps node addresses to materialized artifacts.
 *
 * Records are written to `artifacts/{hex}.json` through a temporary file and
 * a rename, and become visible to `get()` only once durable. Snapshots are
 * shared between artifacts (a config-only operation reuses its parent's
 * rootfs), so eviction drops index entries first and then sweeps the
 * snapshots no remaining entry references.
 *
 * Pinned addresses are never evicted. The scheduler pins the dependencies of
 * every operation it computes for as long as the computation runs.
 */
export class ArtifactCache {
  static async open(workspace: Workspace): Promise<ArtifactCache> {
    const cache = new ArtifactCache(workspace)
    await cache.load()
    return cache
  }

  private readonly entries = new Map<Address, ArtifactEntry>()
  private readonly snapshots = new Map<SnapshotId, number>()
  private readonly fresh = new Set<SnapshotId>()
  private readonly pins = new Map<Address, number>()

  private constructor(private readonly workspace: Workspace) {}

  has(address: Address): boolean {
    return this.entries.has(address)
  }

  get(address: Address): StoredArtifact | undefined {
    const entry = this.entries.get(address)
    if (!entry) {
      return undefined
    }

    entry.lastUsedAt = Date.now()
    return entry.artifact
  }

  /**
   * Records an artifact. Its snapshots must have been registered.
   */
  async put(address: Address, artifact: StoredArtifact): Promise<void> {
    const record: ArtifactRecord = {address, artifact, createdAt: new Date().toISOString()}
    const target = this.recordPath(address)
    const tmpPath = `${target}.${randomUUID().slice(0, 8)}.tmp`
    try {
      await writeFile(tmpPath, JSON.stringify(record), 'utf8')
      await rename(tmpPath, target)
    } catch (error) {
      await rm(tmpPath, {force: true})
      throw new ResourceError(`Failed to record artifact ${address}`, {cause: error})
    }

    const now = Date.now()
    this.entries.set(address, {address, artifact, createdAt: now, lastUsedAt: now})
    for (const id of snapshotsOf(artifact)) {
      this.fresh.delete(id)
    }
  }

  /**
   * Tracks a committed snapshot. Until an artifact referencing it is put,
   * the snapshot is protected from sweeps.
   */
  registerSnapshot(meta: SnapshotMeta): void {
    this.snapshots.set(meta.id, meta.size)
    this.fresh.add(meta.id)
  }

  /**
   * Deletes registered snapshots that will never be referenced
   * (the operation that produced them failed).
   */
  async discardSnapshots(ids: SnapshotId[]): Promise<void> {
    for (const id of ids) {
      this.fresh.delete(id)
      this.snapshots.delete(id)
      await this.workspace.removeSnapshot(id)
    }
  }

  snapshotPath(id: SnapshotId): string {
    return this.workspace.snapshotFsPath(id)
  }

  /**
   * Pins addresses (present or not yet computed) against eviction.
   * @returns An idempotent release function
   */
  pin(addresses: Address[]): () => void {
    for (const address of addresses) {
      this.pins.set(address, (this.pins.get(address) ?? 0) + 1)
    }

    let released = false
    return () => {
      if (released) {
        return
      }

      released = true
      for (const address of addresses) {
        const count = (this.pins.get(address) ?? 1) - 1
        if (count <= 0) {
          this.pins.delete(address)
        } else {
          this.pins.set(address, count)
        }
      }
    }
  }

  isPinned(address: Address): boolean {
    return this.pins.has(address)
  }

  list(): ArtifactEntry[] {
    return [...this.entries.values()].sort((a, b) => a.lastUsedAt - b.lastUsedAt)
  }

  stats(): CacheStats {
    return {
      artifacts: this.entries.size,
      snapshots: this.snapshots.size,
      bytes: this.referencedBytes(),
      pinned: this.pins.size
    }
  }

  /**
   * Drops least recently used, unpinned entries until the policy holds,
   * then deletes snapshots nothing references anymore.
   */
  async evict(policy: EvictionPolicy): Promise<EvictionResult> {
    const now = policy.now ?? Date.now()
    let artifacts = 0

    for (const entry of this.list()) {
      if (this.isPinned(entry.address)) {
        continue
      }

      const expired = policy.maxAgeMs !== undefined && now - entry.lastUsedAt > policy.maxAgeMs
      const oversized = policy.maxBytes !== undefined && this.referencedBytes() > policy.maxBytes
      if (!expired && !oversized) {
        continue
      }

      this.entries.delete(entry.address)
      await rm(this.recordPath(entry.address), {force: true})
      artifacts++
    }

    const referenced = this.referencedSnapshots()
    let snapshots = 0
    let freedBytes = 0
    for (const [id, size] of this.snapshots) {
      if (referenced.has(id) || this.fresh.has(id)) {
        continue
      }

      this.snapshots.delete(id)
      await this.workspace.removeSnapshot(id)
      snapshots++
      freedBytes += size
    }

    return {artifacts, snapshots, freedBytes}
  }

  private referencedSnapshots(): Set<SnapshotId> {
    const referenced = new Set<SnapshotId>()
    for (const entry of this.entries.values()) {
      for (const id of snapshotsOf(entry.artifact)) {
        referenced.add(id)
      }
    }

    return referenced
  }

  private referencedBytes(): number {
    let total = 0
    for (const id of this.referencedSnapshots()) {
      total += this.snapshots.get(id) ?? 0
    }

    return total
  }

  private recordPath(address: Address): string {
    return join(this.workspace.artifactsPath, `${address.slice('sha256:'.length)}.json`)
  }

  private async load(): Promise<void> {
    for (const id of await this.workspace.listSnapshots()) {
      const meta = await this.workspace.readSnapshotMeta(id)
      if (meta) {
        this.snapshots.set(id, meta.size)
      } else {
        await this.workspace.removeSnapshot(id)
      }
    }

    const files = await readdir(this.workspace.artifactsPath)
    for (const file of files) {
      const path = join(this.workspace.artifactsPath, file)
      if (!file.endsWith('.json')) {
        await rm(path, {force: true})
        continue
      }

      let parsed: unknown
      try {
        parsed = JSON.parse(await readFile(path, 'utf8'))
      } catch {
        parsed = undefined
      }

      if (!isArtifactRecord(parsed) || !snapshotsOf(parsed.artifact).every(id => this.snapshots.has(id))) {
        await rm(path, {force: true})
        continue
      }

      const createdAt = Date.parse(parsed.createdAt)
      this.entries.set(parsed.address, {address: parsed.address, artifact: parsed.artifact, createdAt, lastUsedAt: createdAt})
    }
  }
}
