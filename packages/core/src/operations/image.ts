import {Buffer} from 'node:buffer'
import {createHash} from 'node:crypto'
import {mkdir, readdir, readFile, rm, writeFile} from 'node:fs/promises'
import {join, posix} from 'node:path'
import {Readable} from 'node:stream'
import {buffer as streamToBuffer} from 'node:stream/consumers'
import {pipeline} from 'node:stream/promises'
import {promisify} from 'node:util'
import {gunzip, gzip} from 'node:zlib'
import {execa} from 'execa'
import * as tar from 'tar'
import {parseImageConfig} from '../engine/image-config.js'
import {ConflictError, ExecutionError, NotFoundError, ValidationError} from '../errors.js'
import type {
  ContainerArtifact,
  ImageConfig,
  ImageLayerCompression,
  ImageMediaTypes,
  Platform
} from '../types.js'
import type {ApplyContext} from './context.js'
import {resolveHostPath} from './filesystem.js'

const gzipAsync = promisify(gzip)
const gunzipAsync = promisify(gunzip)

const epoch = new Date(0)
const ociIndexType = 'application/vnd.oci.image.index.v1+json'

type MediaTypeSet = {
  index: string;
  manifest: string;
  config: string;
  layers: Partial<Record<ImageLayerCompression, string>>;
}

export const mediaTypeSets: Record<ImageMediaTypes, MediaTypeSet> = {
  OCIMediaTypes: {
    index: ociIndexType,
    manifest: 'application/vnd.oci.image.manifest.v1+json',
    config: 'application/vnd.oci.image.config.v1+json',
    layers: {
      Uncompressed: 'application/vnd.oci.image.layer.v1.tar',
      Gzip: 'application/vnd.oci.image.layer.v1.tar+gzip',
      Zstd: 'application/vnd.oci.image.layer.v1.tar+zstd'
    }
  },
  DockerMediaTypes: {
    index: 'application/vnd.docker.distribution.manifest.list.v2+json',
    manifest: 'application/vnd.docker.distribution.manifest.v2+json',
    config: 'application/vnd.docker.container.image.v1+json',
    layers: {
      Uncompressed: 'application/vnd.docker.image.rootfs.diff.tar',
      Gzip: 'application/vnd.docker.image.rootfs.diff.tar.gzip'
    }
  }
}

/**
 * Whether a layer compression can be expressed with a media type set.
 * Docker media types have no Zstd or eStargz layers.
 */
export function supportsCompression(mediaTypes: ImageMediaTypes, compression: ImageLayerCompression): boolean {
  return compression === 'EStarGZ' ? mediaTypes === 'OCIMediaTypes' : mediaTypeSets[mediaTypes].layers[compression] !== undefined
}

export type PlatformSpec = {
  os: string;
  architecture: string;
  variant?: string;
}

const platformPattern = /^([a-z\d]+)\/([a-z\d_]+)(?:\/([a-z\d]+))?$/

export function isValidPlatform(platform: string): boolean {
  return platformPattern.test(platform)
}

export function parsePlatform(platform: Platform): PlatformSpec {
  const match = platformPattern.exec(platform)
  if (!match) {
    throw new ValidationError(`Invalid platform "${platform}", expected os/arch[/variant]`)
  }

  return match[3] ? {os: match[1], architecture: match[2], variant: match[3]} : {os: match[1], architecture: match[2]}
}

type Descriptor = {
  mediaType: string;
  digest: string;
  size: number;
  platform?: PlatformSpec;
  annotations?: Record<string, string>;
}

function isDescriptor(value: unknown): value is Descriptor {
  return typeof value === 'object' && value !== null
    && 'mediaType' in value && typeof value.mediaType === 'string'
    && 'digest' in value && typeof value.digest === 'string' && /^sha256:[\da-f]{64}$/.test(value.digest)
}

function descriptorsOf(value: unknown, field: 'manifests' | 'layers'): Descriptor[] {
  if (typeof value !== 'object' || value === null || !(field in value)) {
    return []
  }

  const list: unknown = Object.getOwnPropertyDescriptor(value, field)?.value
  return Array.isArray(list) ? list.filter(isDescriptor) : []
}

// -- Export ------------------------------------------------------------------

/**
 * Relative paths of a tree, sorted, every directory before its contents.
 */
async function listTree(root: string, prefix = ''): Promise<string[]> {
  const paths: string[] = []
  const entries = await readdir(join(root, prefix), {withFileTypes: true})
  entries.sort((a, b) => (a.name < b.name ? -1 : (a.name > b.name ? 1 : 0)))
  for (const entry of entries) {
    const path = prefix ? `${prefix}/${entry.name}` : entry.name
    paths.push(path)
    if (entry.isDirectory()) {
      paths.push(...await listTree(root, path))
    }
  }

  return paths
}

/**
 * Squashes a root filesystem into one uncompressed layer with fixed
 * modification times.
 */
async function createLayer(rootfs: string): Promise<Buffer> {
  const paths = await listTree(rootfs)
  if (paths.length === 0) {
    // End-of-archive marker only
    return Buffer.alloc(1024)
  }

  return streamToBuffer(tar.create({cwd: rootfs, noDirRecurse: true, mtime: epoch}, paths))
}

async function compress(layer: Buffer, compression: ImageLayerCompression): Promise<Buffer> {
  switch (compression) {
    case 'Uncompressed': {
      return layer
    }

    case 'Gzip': {
      return gzipAsync(layer)
    }

    case 'Zstd': {
      try {
        const {stdout} = await execa('zstd', ['-q', '-c'], {input: layer, encoding: 'buffer'})
        return Buffer.from(stdout)
      } catch (error) {
        throw new ExecutionError('zstd compression failed', {cause: error})
      }
    }

    case 'EStarGZ': {
      throw new ExecutionError('eStargz layers are not supported by this engine')
    }
  }
}

async function decompress(blob: Buffer, mediaType: string): Promise<Buffer> {
  if (mediaType.endsWith('gzip')) {
    return gunzipAsync(blob)
  }

  if (mediaType.endsWith('zstd')) {
    try {
      const {stdout} = await execa('zstd', ['-d', '-q', '-c'], {input: blob, encoding: 'buffer'})
      return Buffer.from(stdout)
    } catch (error) {
      throw new ExecutionError('zstd decompression failed', {cause: error})
    }
  }

  return blob
}

function sha256Digest(data: Buffer | string): string {
  return `sha256:${createHash('sha256').update(data).digest('hex')}`
}

function ociConfig(container: ContainerArtifact, diffId: string): Record<string, unknown> {
  const {config} = container
  return {
    created: epoch.toISOString(),
    ...parsePlatform(config.platform),
    config: {
      Env: config.env.map(({name, value}) => `${name}=${value}`),
      WorkingDir: config.workdir,
      User: config.user || undefined,
      Entrypoint: config.entrypoint.length > 0 ? config.entrypoint : undefined,
      Cmd: config.defaultArgs.length > 0 ? config.defaultArgs : undefined,
      Labels: config.labels.length > 0 ? Object.fromEntries(config.labels.map(({name, value}) => [name, value])) : undefined,
      ExposedPorts: config.exposedPorts.length > 0
        ? Object.fromEntries(config.exposedPorts.map(({port, protocol}) => [`${port}/${protocol.toLowerCase()}`, {}]))
        : undefined
    },
    rootfs: {type: 'layers', diff_ids: [diffId]},
    history: [{created: epoch.toISOString(), created_by: 'cairn'}]
  }
}

/**
 * Writes an OCI image layout tarball holding one image per container,
 * each squashed into a single layer.
 */
export async function writeImageLayout(
  ctx: ApplyContext,
  containers: ContainerArtifact[],
  options: {compression: ImageLayerCompression; mediaTypes: ImageMediaTypes},
  target: string
): Promise<void> {
  if (options.compression === 'EStarGZ') {
    throw new ExecutionError('eStargz layers are not supported by this engine')
  }

  const types = mediaTypeSets[options.mediaTypes]
  const layerType = types.layers[options.compression]
  if (!layerType) {
    throw new ExecutionError(`${options.compression} layers cannot use ${options.mediaTypes}`)
  }

  const layout = await ctx.scratch()
  const blobsDir = join(layout, 'blobs', 'sha256')
  await mkdir(blobsDir, {recursive: true})
  const blobs: string[] = []
  const writeBlob = async (mediaType: string, data: Buffer | string): Promise<Descriptor> => {
    const digest = sha256Digest(data)
    const hex = digest.slice('sha256:'.length)
    if (!blobs.includes(hex)) {
      await writeFile(join(blobsDir, hex), data)
      blobs.push(hex)
    }

    return {mediaType, digest, size: Buffer.byteLength(data)}
  }

  const seen = new Set<string>()
  const manifests: Descriptor[] = []
  for (const container of containers) {
    if (seen.has(container.config.platform)) {
      throw new ConflictError(`Platform ${container.config.platform} appears more than once`)
    }

    seen.add(container.config.platform)
    const uncompressed = await createLayer(ctx.cache.snapshotPath(container.rootfs))
    const layer = await writeBlob(layerType, await compress(uncompressed, options.compression))
    const config = await writeBlob(types.config, JSON.stringify(ociConfig(container, sha256Digest(uncompressed))))
    const manifest = await writeBlob(types.manifest, JSON.stringify({
      schemaVersion: 2,
      mediaType: types.manifest,
      config,
      layers: [layer]
    }))
    manifests.push({...manifest, platform: parsePlatform(container.config.platform)})
  }

  await writeFile(join(layout, 'oci-layout'), JSON.stringify({imageLayoutVersion: '1.0.0'}))
  await writeFile(join(layout, 'index.json'), JSON.stringify({schemaVersion: 2, mediaType: ociIndexType, manifests}))
  blobs.sort()
  await tar.create(
    {cwd: layout, file: target, portable: true, noDirRecurse: true, mtime: epoch},
    ['oci-layout', 'index.json', 'blobs', 'blobs/sha256', ...blobs.map(hex => `blobs/sha256/${hex}`)]
  )
}

// -- Import ------------------------------------------------------------------

async function readBlob(layout: string, digest: string): Promise<Buffer> {
  let data: Buffer
  try {
    data = await readFile(join(layout, 'blobs', 'sha256', digest.slice('sha256:'.length)))
  } catch (error) {
    throw new NotFoundError(`Blob ${digest} missing from image layout`, {cause: error})
  }

  if (sha256Digest(data) !== digest) {
    throw new ValidationError(`Blob ${digest} does not match its digest`)
  }

  return data
}

async function readJsonBlob(layout: string, digest: string): Promise<unknown> {
  const data = await readBlob(layout, digest)
  try {
    return JSON.parse(data.toString('utf8'))
  } catch (error) {
    throw new ValidationError(`Blob ${digest} is not valid JSON`, {cause: error})
  }
}

function isIndexType(mediaType: string): boolean {
  return mediaType.endsWith('index.v1+json') || mediaType.endsWith('manifest.list.v2+json')
}

function matchesPlatform(descriptor: Descriptor, wanted: PlatformSpec): boolean {
  const {platform} = descriptor
  return platform !== undefined
    && platform.os === wanted.os
    && platform.architecture === wanted.architecture
    && (wanted.variant === undefined || platform.variant === wanted.variant)
}

async function pickManifest(layout: string, index: unknown, platform: PlatformSpec, tag?: string): Promise<Descriptor> {
  let candidates = descriptorsOf(index, 'manifests')
  if (tag !== undefined) {
    const tagged = candidates.find(d => d.annotations?.['org.opencontainers.image.ref.name'] === tag
      || d.annotations?.['io.containerd.image.name']?.endsWith(`:${tag}`))
    if (!tagged) {
      throw new NotFoundError(`No image tagged "${tag}" in the tarball`)
    }

    candidates = [tagged]
  }

  for (let depth = 0; depth < 4; depth++) {
    const [first] = candidates
    const chosen = candidates.length === 1 && first && !first.platform
      ? first
      : candidates.find(d => matchesPlatform(d, platform))
    if (!chosen) {
      break
    }

    if (!isIndexType(chosen.mediaType)) {
      return chosen
    }

    candidates = descriptorsOf(await readJsonBlob(layout, chosen.digest), 'manifests')
  }

  throw new NotFoundError(`No image for platform ${platform.os}/${platform.architecture} in the tarball`)
}

/**
 * Applies a layer, honoring whiteouts: `.wh.{name}` deletes a path from
 * lower layers and `.wh..wh..opq` empties its directory.
 */
async function applyLayer(layer: Buffer, rootfs: string): Promise<void> {
  const opaque: string[] = []
  const deleted: string[] = []
  await pipeline(Readable.from(layer), tar.list({
    onReadEntry(entry) {
      const path = posix.normalize(entry.path)
      const name = posix.basename(path)
      if (name === '.wh..wh..opq') {
        opaque.push(posix.dirname(path))
      } else if (name.startsWith('.wh.')) {
        deleted.push(posix.join(posix.dirname(path), name.slice('.wh.'.length)))
      }
    }
  }))

  for (const dir of opaque) {
    const target = await resolveHostPath(rootfs, dir)
    let entries: string[]
    try {
      entries = await readdir(target)
    } catch {
      entries = []
    }

    for (const entry of entries) {
      await rm(join(target, entry), {recursive: true, force: true})
    }
  }

  for (const path of deleted) {
    await rm(await resolveHostPath(rootfs, path, {followLast: false}), {recursive: true, force: true})
  }

  await pipeline(Readable.from(layer), tar.extract({
    cwd: rootfs,
    filter: path => !posix.basename(path).startsWith('.wh.')
  }))
}

/**
 * Reads an OCI image layout tarball: selects the image for `platform`
 * (or the one tagged `tag`) and extracts its layers in order into `rootfs`.
 * @returns The image configuration
 */
export async function readImageLayout(
  ctx: ApplyContext,
  tarball: string,
  platform: Platform,
  rootfs: string,
  tag?: string
): Promise<ImageConfig> {
  const layout = await ctx.scratch()
  try {
    await tar.extract({file: tarball, cwd: layout})
  } catch (error) {
    throw new ValidationError('File is not a tar archive', {cause: error})
  }

  let index: unknown
  try {
    index = JSON.parse(await readFile(join(layout, 'index.json'), 'utf8'))
  } catch (error) {
    throw new ValidationError('File is not an OCI image layout (index.json missing or invalid)', {cause: error})
  }

  const descriptor = await pickManifest(layout, index, parsePlatform(platform), tag)
  const manifest = await readJsonBlob(layout, descriptor.digest)
  for (const layer of descriptorsOf(manifest, 'layers')) {
    await applyLayer(await decompress(await readBlob(layout, layer.digest), layer.mediaType), rootfs)
  }

  const configDescriptor = typeof manifest === 'object' && manifest !== null && 'config' in manifest ? manifest.config : undefined
  if (!isDescriptor(configDescriptor)) {
    throw new ValidationError(`Manifest ${descriptor.digest} has no config`)
  }

  const config = await readJsonBlob(layout, configDescriptor.digest)
  return parseImageConfig(typeof config === 'object' && config !== null && 'config' in config ? config.config : undefined)
}
