import type {NodeStore} from '../node-store.js'
import {containerPath, isWithin} from '../operations/filesystem.js'
import type {Address, MountEntry, OperationKind, OperationNode} from '../types.js'

/** A container node followed by its parents up to the root. */
function chainOf(store: NodeStore, address: Address): OperationNode[] {
  const chain: OperationNode[] = []
  for (let current: Address | null = address; current;) {
    const node = store.require(current)
    chain.push(node)
    current = node.parent
  }

  return chain
}

export type KnownMount = {
  path: string;
  type: MountEntry['type'];
}

const fileLike = new Set<MountEntry['type']>(['file', 'secret', 'socket'])

/**
 * Mount table of a container node as far as it is known before anything
 * runs. Only absolute mount paths are tracked: relative ones depend on a
 * working directory an image may set, and make the table inexact.
 */
export function knownMounts(store: NodeStore, address: Address): {mounts: KnownMount[]; exact: boolean} {
  let mounts: KnownMount[] = []
  let exact = true
  const add = (path: string, type: MountEntry['type']) => {
    exact &&= path.startsWith('/')
    if (path.startsWith('/')) {
      const target = containerPath(path)
      mounts = [...mounts.filter(mount => !isWithin(mount.path, target)), {path: target, type}]
    }
  }

  const remove = (path: string, type?: MountEntry['type']) => {
    exact &&= path.startsWith('/')
    if (path.startsWith('/')) {
      const target = containerPath(path)
      mounts = mounts.filter(mount => mount.path !== target || (type !== undefined && mount.type !== type))
    }
  }

  for (const node of chainOf(store, address).reverse()) {
    switch (node.kind) {
      case 'WithMountedDirectory': {
        add(node.params.path, 'directory')
        break
      }

      case 'WithMountedFile': {
        add(node.params.path, 'file')
        break
      }

      case 'WithMountedCache': {
        add(node.params.path, 'cache')
        break
      }

      case 'WithMountedSecret': {
        add(node.params.path, 'secret')
        break
      }

      case 'WithMountedTemp': {
        add(node.params.path, 'temp')
        break
      }

      case 'WithUnixSocket': {
        add(node.params.path, 'socket')
        break
      }

      case 'WithoutMount': {
        remove(node.params.path)
        break
      }

      case 'WithoutUnixSocket': {
        remove(node.params.path, 'socket')
        break
      }

      default: {
        break
      }
    }
  }

  return {mounts, exact}
}

/**
 * File-like mount (file, secret or socket) strictly above `path`, which
 * leaves no room for another mount below it.
 */
export function blockingMount(mounts: KnownMount[], path: string): KnownMount | undefined {
  const target = containerPath(path)
  return mounts.find(mount => fileLike.has(mount.type) && mount.path !== target && isWithin(target, mount.path))
}

const commandSources = new Set<OperationKind>(['FromImage', 'Build', 'Import', 'WithEntrypoint', 'WithDefaultArgs'])

/**
 * Whether a container may have an entrypoint or default arguments: set
 * explicitly, or coming from an image.
 */
export function mayHaveDefaultCommand(store: NodeStore, address: Address): boolean {
  return chainOf(store, address).some(node => commandSources.has(node.kind))
}
