import type {ArtifactCache} from '../artifact-cache.js'
import type {CacheVolumeManager} from '../cache-volumes.js'
import type {ContainerExecutor} from '../engine/executor.js'
import type {Workspace} from '../engine/workspace.js'
import {ConflictError, NotFoundError, ValidationError} from '../errors.js'
import type {NodeStore} from '../node-store.js'
import type {ExecLogEvent, OperationRef, VolumeWaitingEvent} from '../reporter.js'
import type {SecretStore} from '../secrets.js'
import type {
  Address,
  Artifact,
  ContainerArtifact,
  DirectoryArtifact,
  FileArtifact,
  MountEntry,
  OperationNode,
  SnapshotId
} from '../types.js'
import {containerPath, copyTree, hostPath, isWithin, relativeTo, resolveHostPath} from './filesystem.js'

/** Events an operation reports; the scheduler fills in the operation fields. */
export type OperationEvent =
  | Omit<ExecLogEvent, keyof OperationRef>
  | Omit<VolumeWaitingEvent, keyof OperationRef>

/**
 * Everything an operation needs while it is applied. One context exists
 * per computation; snapshots and scratch directories it hands out are
 * cleaned up by the scheduler when the operation fails.
 */
export type ApplyContext = {
  node: OperationNode;
  /** Top-level request that started the computation. */
  requestId: string;
  workspace: Workspace;
  cache: ArtifactCache;
  store: NodeStore;
  executor: ContainerExecutor;
  secrets: SecretStore;
  volumes: CacheVolumeManager;
  /** Materializes another node. */
  resolve(address: Address): Promise<Artifact>;
  /** Creates a staging directory to be committed as a snapshot. */
  stage(): Promise<{id: SnapshotId; path: string}>;
  /** Commits a staged directory and registers the snapshot. */
  commit(id: SnapshotId): Promise<SnapshotId>;
  /** Stages, fills and commits a snapshot. */
  snapshot(fill: (path: string) => Promise<void>): Promise<SnapshotId>;
  /** Directory removed once the computation settles. */
  scratch(): Promise<string>;
  emit(event: OperationEvent): void;
}

export function expectContainer(artifact: Artifact | undefined, what = 'container'): ContainerArtifact {
  if (artifact?.type !== 'container') {
    throw new ValidationError(`Expected a ${what}, got ${artifact?.type ?? 'nothing'}`)
  }

  return artifact
}

export function expectDirectory(artifact: Artifact | undefined): DirectoryArtifact {
  if (artifact?.type !== 'directory') {
    throw new ValidationError(`Expected a directory, got ${artifact?.type ?? 'nothing'}`)
  }

  return artifact
}

export function expectFile(artifact: Artifact | undefined): FileArtifact {
  if (artifact?.type !== 'file') {
    throw new ValidationError(`Expected a file, got ${artifact?.type ?? 'nothing'}`)
  }

  return artifact
}

export function expectReference(artifact: Artifact | undefined): Address {
  if (artifact?.type !== 'reference') {
    throw new ValidationError(`Expected a reference, got ${artifact?.type ?? 'nothing'}`)
  }

  return artifact.address
}

/**
 * Where a container path lives: in the root filesystem or in the mount
 * with the longest matching path.
 */
export type Location =
  | {where: 'rootfs'; path: string}
  | {where: 'mount'; mount: MountEntry; index: number; inner: string}

export function locate(container: ContainerArtifact, path: string): Location {
  const target = containerPath(path, container.config.workdir)
  let best: {mount: MountEntry; index: number} | undefined
  for (const [index, mount] of container.config.mounts.entries()) {
    if (isWithin(target, mount.path) && (!best || mount.path.length > best.mount.path.length)) {
      best = {mount, index}
    }
  }

  if (!best) {
    return {where: 'rootfs', path: target}
  }

  return {where: 'mount', mount: best.mount, index: best.index, inner: relativeTo(target, best.mount.path)}
}

/**
 * Host path of a container path, for reading.
 * @throws NotFoundError for paths inside mounts that have no snapshot
 */
export async function readablePath(cache: ArtifactCache, container: ContainerArtifact, path: string): Promise<string> {
  const location = locate(container, path)
  if (location.where === 'rootfs') {
    return resolveHostPath(cache.snapshotPath(container.rootfs), location.path)
  }

  const {mount, inner} = location
  switch (mount.type) {
    case 'directory': {
      return resolveHostPath(cache.snapshotPath(mount.snapshot), inner)
    }

    case 'file': {
      if (inner !== '/') {
        throw new NotFoundError(`${path}: ${mount.path} is a file`)
      }

      return hostPath(cache.snapshotPath(mount.snapshot), mount.name)
    }

    default: {
      throw new NotFoundError(`${path} lies in a ${mount.type} mount at ${mount.path}, which cannot be read`)
    }
  }
}

/**
 * Applies a write to a container path. The root filesystem, or the
 * directory mount holding the path, is copied into a new snapshot first.
 * @param write - Receives the host path of the target, the host path of the root filesystem
 * and the host path of the filesystem the target lies in
 * @throws ConflictError for paths inside file, secret, socket, cache or temp mounts
 */
export async function writeInto(
  ctx: ApplyContext,
  container: ContainerArtifact,
  path: string,
  write: (target: string, rootfs: string, root: string) => Promise<void>
): Promise<ContainerArtifact> {
  const location = locate(container, path)
  const rootfs = ctx.cache.snapshotPath(container.rootfs)

  if (location.where === 'rootfs') {
    const snapshot = await ctx.snapshot(async fs => {
      await copyTree(rootfs, fs)
      await write(await resolveHostPath(fs, location.path), fs, fs)
    })
    return {...container, rootfs: snapshot}
  }

  const {mount, index, inner} = location
  if (mount.type !== 'directory') {
    throw new ConflictError(`Cannot write ${path}: it lies in a ${mount.type} mount at ${mount.path}`)
  }

  const snapshot = await ctx.snapshot(async fs => {
    await copyTree(ctx.cache.snapshotPath(mount.snapshot), fs)
    await write(await resolveHostPath(fs, inner), rootfs, fs)
  })
  const mounts = container.config.mounts.map((entry, i) => (i === index ? {...mount, snapshot} : entry))
  return {...container, config: {...container.config, mounts}}
}
