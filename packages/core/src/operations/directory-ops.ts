import {chmod, copyFile, lstat, mkdir, rm, writeFile} from 'node:fs/promises'
import {basename, dirname, resolve} from 'node:path'
import {ConflictError} from '../errors.js'
import type {ContainerArtifact, DirectoryArtifact, FileArtifact, OperationParams} from '../types.js'
import {readablePath, type ApplyContext} from './context.js'
import {
  copyFiltered,
  copyTree,
  createPathFilter,
  fileDigest,
  hostPath,
  requireEntry,
  resolveHostPath,
  treeDigest
} from './filesystem.js'

/**
 * Digest recorded by `HostDirectory` nodes: a changed host tree gets a new
 * address, and a node whose tree changed after it was built fails.
 */
export async function hostDirectoryDigest(path: string, include: string[], exclude: string[]): Promise<string> {
  await requireEntry(path, 'directory', path)
  return treeDigest(path, createPathFilter(include, exclude))
}

export async function hostFileDigest(path: string): Promise<string> {
  await requireEntry(path, 'file', path)
  return fileDigest(path)
}

export async function directoryScratch(ctx: ApplyContext): Promise<DirectoryArtifact> {
  return {type: 'directory', snapshot: await ctx.snapshot(async () => {})}
}

export async function hostDirectory(ctx: ApplyContext, params: OperationParams['HostDirectory']): Promise<DirectoryArtifact> {
  const source = resolve(params.path)
  const digest = await hostDirectoryDigest(source, params.include, params.exclude)
  if (digest !== params.digest) {
    throw new ConflictError(`Host directory ${source} changed since it was loaded`)
  }

  const filter = createPathFilter(params.include, params.exclude)
  const snapshot = await ctx.snapshot(async fs => {
    await copyFiltered(source, fs, filter, params.include.length === 0)
  })
  return {type: 'directory', snapshot}
}

export async function hostFile(ctx: ApplyContext, params: OperationParams['HostFile']): Promise<FileArtifact> {
  const source = resolve(params.path)
  if (await hostFileDigest(source) !== params.digest) {
    throw new ConflictError(`Host file ${source} changed since it was loaded`)
  }

  const name = basename(source)
  const snapshot = await ctx.snapshot(async fs => {
    await copyFile(source, hostPath(fs, name))
    await chmod(hostPath(fs, name), (await lstat(source)).mode & 0o7777)
  })
  return {type: 'file', snapshot, name}
}

export async function containerDirectory(ctx: ApplyContext, container: ContainerArtifact, path: string): Promise<DirectoryArtifact> {
  const source = await readablePath(ctx.cache, container, path)
  await requireEntry(source, 'directory', path)
  const snapshot = await ctx.snapshot(async fs => {
    await copyTree(source, fs)
  })
  return {type: 'directory', snapshot}
}

export async function containerFile(ctx: ApplyContext, container: ContainerArtifact, path: string): Promise<FileArtifact> {
  const source = await readablePath(ctx.cache, container, path)
  await requireEntry(source, 'file', path)
  return copyIntoFile(ctx, source)
}

export async function directoryFile(ctx: ApplyContext, directory: DirectoryArtifact, path: string): Promise<FileArtifact> {
  const source = await resolveHostPath(ctx.cache.snapshotPath(directory.snapshot), path)
  await requireEntry(source, 'file', path)
  return copyIntoFile(ctx, source)
}

export async function subdirectory(ctx: ApplyContext, directory: DirectoryArtifact, path: string): Promise<DirectoryArtifact> {
  const source = await resolveHostPath(ctx.cache.snapshotPath(directory.snapshot), path)
  await requireEntry(source, 'directory', path)
  const snapshot = await ctx.snapshot(async fs => {
    await copyTree(source, fs)
  })
  return {type: 'directory', snapshot}
}

/**
 * Copies the parent directory into a new snapshot and lets `change`
 * modify it.
 */
async function changeDirectory(
  ctx: ApplyContext,
  directory: DirectoryArtifact,
  change: (fs: string) => Promise<void>
): Promise<DirectoryArtifact> {
  const snapshot = await ctx.snapshot(async fs => {
    await copyTree(ctx.cache.snapshotPath(directory.snapshot), fs)
    await change(fs)
  })
  return {type: 'directory', snapshot}
}

export async function directoryWithNewFile(
  ctx: ApplyContext,
  directory: DirectoryArtifact,
  params: OperationParams['DirectoryWithNewFile']
): Promise<DirectoryArtifact> {
  return changeDirectory(ctx, directory, async fs => {
    await writeNewFile(await resolveHostPath(fs, params.path), params.contents, params.permissions)
  })
}

export async function directoryWithFile(
  ctx: ApplyContext,
  directory: DirectoryArtifact,
  file: FileArtifact,
  params: OperationParams['DirectoryWithFile']
): Promise<DirectoryArtifact> {
  return changeDirectory(ctx, directory, async fs => {
    await placeFile(ctx, file, await resolveHostPath(fs, params.path), params.permissions)
  })
}

export async function directoryWithDirectory(
  ctx: ApplyContext,
  directory: DirectoryArtifact,
  source: DirectoryArtifact,
  params: OperationParams['DirectoryWithDirectory']
): Promise<DirectoryArtifact> {
  return changeDirectory(ctx, directory, async fs => {
    await mergeDirectory(ctx, source, await resolveHostPath(fs, params.path), fs, params.include, params.exclude)
  })
}

export async function directoryWithNewDirectory(
  ctx: ApplyContext,
  directory: DirectoryArtifact,
  params: OperationParams['DirectoryWithNewDirectory']
): Promise<DirectoryArtifact> {
  return changeDirectory(ctx, directory, async fs => {
    const target = await resolveHostPath(fs, params.path)
    await mkdir(target, {recursive: true})
    await chmod(target, params.permissions)
  })
}

export async function directoryWithoutPath(
  ctx: ApplyContext,
  directory: DirectoryArtifact,
  params: OperationParams['DirectoryWithoutPath']
): Promise<DirectoryArtifact> {
  return changeDirectory(ctx, directory, async fs => {
    await rm(await resolveHostPath(fs, params.path, {followLast: false}), {recursive: true, force: true})
  })
}

// -- Shared by container file operations -------------------------------------

export async function writeNewFile(target: string, contents: string, permissions: number): Promise<void> {
  await rm(target, {recursive: true, force: true})
  await mkdir(dirname(target), {recursive: true})
  await writeFile(target, contents, 'utf8')
  await chmod(target, permissions)
}

export async function placeFile(ctx: ApplyContext, file: FileArtifact, target: string, permissions?: number): Promise<void> {
  const source = hostPath(ctx.cache.snapshotPath(file.snapshot), file.name)
  await rm(target, {recursive: true, force: true})
  await mkdir(dirname(target), {recursive: true})
  await copyFile(source, target)
  await chmod(target, permissions ?? ((await lstat(source)).mode & 0o7777))
}

export async function mergeDirectory(
  ctx: ApplyContext,
  source: DirectoryArtifact,
  target: string,
  root: string,
  include: string[],
  exclude: string[]
): Promise<void> {
  await mkdir(target, {recursive: true})
  const filter = createPathFilter(include, exclude)
  await copyFiltered(ctx.cache.snapshotPath(source.snapshot), target, filter, include.length === 0, root)
}

async function copyIntoFile(ctx: ApplyContext, source: string): Promise<FileArtifact> {
  const name = basename(source)
  const snapshot = await ctx.snapshot(async fs => {
    await copyFile(source, hostPath(fs, name))
    await chmod(hostPath(fs, name), (await lstat(source)).mode & 0o7777)
  })
  return {type: 'file', snapshot, name}
}
