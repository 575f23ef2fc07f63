import {join} from 'node:path'
import {ConflictError, ValidationError} from '../errors.js'
import type {
  Address,
  ContainerArtifact,
  ContainerConfig,
  DirectoryArtifact,
  FileArtifact,
  ImageConfig,
  MountEntry,
  OperationParams,
  Platform
} from '../types.js'
import {writeInto, type ApplyContext} from './context.js'
import {mergeDirectory, placeFile, writeNewFile} from './directory-ops.js'
import {chownTree, containerPath, copyTree, hostPath, isWithin, resolveOwner} from './filesystem.js'
import {readImageLayout, writeImageLayout} from './image.js'

export function scratchConfig(platform: Platform): ContainerConfig {
  return {
    platform,
    env: [],
    secretEnv: [],
    labels: [],
    user: '',
    workdir: '/',
    entrypoint: [],
    defaultArgs: [],
    exposedPorts: [],
    mounts: [],
    services: [],
    registryAuths: [],
    focus: false
  }
}

/**
 * Adopts an image configuration. The image settings replace those of the
 * receiver; mounts, services, secrets and registry auths are kept.
 */
function withImageConfig(config: ContainerConfig, image: ImageConfig, imageRef?: string): ContainerConfig {
  const defaults = scratchConfig(config.platform)
  return {
    ...config,
    env: (image.env ?? []).map(entry => {
      const index = entry.indexOf('=')
      return index === -1 ? {name: entry, value: ''} : {name: entry.slice(0, index), value: entry.slice(index + 1)}
    }),
    workdir: image.workdir ?? defaults.workdir,
    user: image.user ?? defaults.user,
    entrypoint: image.entrypoint ?? defaults.entrypoint,
    defaultArgs: image.cmd ?? defaults.defaultArgs,
    labels: Object.entries(image.labels ?? {}).map(([name, value]) => ({name, value})),
    exposedPorts: image.exposedPorts ?? defaults.exposedPorts,
    imageRef
  }
}

export async function containerScratch(ctx: ApplyContext, params: OperationParams['ContainerScratch']): Promise<ContainerArtifact> {
  const rootfs = await ctx.snapshot(async () => {})
  return {type: 'container', rootfs, config: scratchConfig(params.platform)}
}

export async function fromImage(ctx: ApplyContext, container: ContainerArtifact, params: OperationParams['FromImage']): Promise<ContainerArtifact> {
  const {id, path} = await ctx.stage()
  const image = await ctx.executor.pull(params.ref, container.config.platform, path)
  return {
    type: 'container',
    rootfs: await ctx.commit(id),
    config: withImageConfig(container.config, image, params.ref)
  }
}

export async function build(
  ctx: ApplyContext,
  container: ContainerArtifact,
  context: DirectoryArtifact,
  secrets: Address[],
  params: OperationParams['Build']
): Promise<ContainerArtifact> {
  const {id, path} = await ctx.stage()
  const image = await ctx.executor.build({
    context: ctx.cache.snapshotPath(context.snapshot),
    dockerfile: params.dockerfile,
    platform: container.config.platform,
    target: params.target,
    buildArgs: params.buildArgs,
    secrets: params.secretNames.map((name, i) => ({name, value: ctx.secrets.get(secrets[i])})),
    rootfs: path
  })
  return {type: 'container', rootfs: await ctx.commit(id), config: withImageConfig(container.config, image)}
}

export async function importImage(
  ctx: ApplyContext,
  container: ContainerArtifact,
  file: FileArtifact,
  params: OperationParams['Import']
): Promise<ContainerArtifact> {
  const tarball = hostPath(ctx.cache.snapshotPath(file.snapshot), file.name)
  const {id, path} = await ctx.stage()
  const image = await readImageLayout(ctx, tarball, container.config.platform, path, params.tag)
  return {type: 'container', rootfs: await ctx.commit(id), config: withImageConfig(container.config, image)}
}

export const tarballName = 'image.tar'

export async function asTarball(
  ctx: ApplyContext,
  container: ContainerArtifact,
  variants: ContainerArtifact[],
  params: OperationParams['AsTarball']
): Promise<FileArtifact> {
  const snapshot = await ctx.snapshot(async fs => {
    await writeImageLayout(ctx, [container, ...variants], params, join(fs, tarballName))
  })
  return {type: 'file', snapshot, name: tarballName}
}

// -- Mounts ------------------------------------------------------------------

function withConfig(container: ContainerArtifact, change: Partial<ContainerConfig>): ContainerArtifact {
  return {...container, config: {...container.config, ...change}}
}

/**
 * Resolves a mount path against the working directory and checks it can
 * take a mount.
 */
function mountPath(container: ContainerArtifact, path: string): string {
  const target = containerPath(path, container.config.workdir)
  if (target === '/') {
    throw new ValidationError('Cannot mount at /')
  }

  const blocking = container.config.mounts.find(mount =>
    (mount.type === 'file' || mount.type === 'secret' || mount.type === 'socket')
    && mount.path !== target && isWithin(target, mount.path))
  if (blocking) {
    throw new ConflictError(`Cannot mount at ${target}: ${blocking.path} is a ${blocking.type} mount`)
  }

  return target
}

/**
 * Adds a mount. A mount replaces every mount at or below its path.
 */
function addMount(container: ContainerArtifact, mount: MountEntry): ContainerArtifact {
  const mounts = container.config.mounts.filter(entry => !isWithin(entry.path, mount.path))
  return withConfig(container, {mounts: [...mounts, mount]})
}

export async function withMountedDirectory(
  ctx: ApplyContext,
  container: ContainerArtifact,
  directory: DirectoryArtifact,
  params: OperationParams['WithMountedDirectory']
): Promise<ContainerArtifact> {
  const path = mountPath(container, params.path)
  let {snapshot} = directory
  if (params.owner) {
    const owner = await resolveOwner(ctx.cache.snapshotPath(container.rootfs), params.owner)
    snapshot = await ctx.snapshot(async fs => {
      await copyTree(ctx.cache.snapshotPath(directory.snapshot), fs)
      await chownTree(fs, owner)
    })
  }

  return addMount(container, {type: 'directory', path, snapshot, owner: params.owner})
}

export async function withMountedFile(
  ctx: ApplyContext,
  container: ContainerArtifact,
  file: FileArtifact,
  params: OperationParams['WithMountedFile']
): Promise<ContainerArtifact> {
  const path = mountPath(container, params.path)
  let {snapshot} = file
  if (params.owner) {
    const owner = await resolveOwner(ctx.cache.snapshotPath(container.rootfs), params.owner)
    snapshot = await ctx.snapshot(async fs => {
      await copyTree(ctx.cache.snapshotPath(file.snapshot), fs)
      await chownTree(hostPath(fs, file.name), owner)
    })
  }

  return addMount(container, {type: 'file', path, snapshot, name: file.name, owner: params.owner})
}

export function withMountedCache(
  container: ContainerArtifact,
  seed: DirectoryArtifact | undefined,
  params: OperationParams['WithMountedCache']
): ContainerArtifact {
  return addMount(container, {
    type: 'cache',
    path: mountPath(container, params.path),
    key: params.key,
    sharing: params.sharing,
    owner: params.owner,
    seed: seed?.snapshot
  })
}

export function withMountedSecret(container: ContainerArtifact, secret: Address, params: OperationParams['WithMountedSecret']): ContainerArtifact {
  return addMount(container, {
    type: 'secret',
    path: mountPath(container, params.path),
    secret,
    mode: params.mode,
    owner: params.owner
  })
}

export function withMountedTemp(container: ContainerArtifact, params: OperationParams['WithMountedTemp']): ContainerArtifact {
  return addMount(container, {type: 'temp', path: mountPath(container, params.path)})
}

export function withUnixSocket(container: ContainerArtifact, socketPath: string, params: OperationParams['WithUnixSocket']): ContainerArtifact {
  return addMount(container, {type: 'socket', path: mountPath(container, params.path), hostPath: socketPath})
}

/**
 * Removes the mount at a path. A path that holds no mount leaves the
 * container unchanged.
 */
export function withoutMount(container: ContainerArtifact, params: {path: string}, type?: MountEntry['type']): ContainerArtifact {
  const target = containerPath(params.path, container.config.workdir)
  const mounts = container.config.mounts.filter(mount => mount.path !== target || (type !== undefined && mount.type !== type))
  return mounts.length === container.config.mounts.length ? container : withConfig(container, {mounts})
}

// -- Files -------------------------------------------------------------------

async function chownOwned(target: string, rootfs: string, owner: string | undefined): Promise<void> {
  if (owner) {
    await chownTree(target, await resolveOwner(rootfs, owner))
  }
}

export async function withFile(
  ctx: ApplyContext,
  container: ContainerArtifact,
  file: FileArtifact,
  params: OperationParams['WithFile']
): Promise<ContainerArtifact> {
  return writeInto(ctx, container, params.path, async (target, rootfs) => {
    await placeFile(ctx, file, target, params.permissions)
    await chownOwned(target, rootfs, params.owner)
  })
}

export async function withNewFile(
  ctx: ApplyContext,
  container: ContainerArtifact,
  params: OperationParams['WithNewFile']
): Promise<ContainerArtifact> {
  return writeInto(ctx, container, params.path, async (target, rootfs) => {
    await writeNewFile(target, params.contents, params.permissions)
    await chownOwned(target, rootfs, params.owner)
  })
}

export async function withDirectory(
  ctx: ApplyContext,
  container: ContainerArtifact,
  directory: DirectoryArtifact,
  params: OperationParams['WithDirectory']
): Promise<ContainerArtifact> {
  return writeInto(ctx, container, params.path, async (target, rootfs, root) => {
    await mergeDirectory(ctx, directory, target, root, params.include, params.exclude)
    await chownOwned(target, rootfs, params.owner)
  })
}

// -- Configuration -----------------------------------------------------------

const variablePattern = /\$(?:{(\w+)}|(\w+))/g

/**
 * Expands `$NAME` and `${NAME}` against the container environment.
 * Unknown variables expand to an empty string.
 */
export function expandVariables(value: string, env: ContainerConfig['env']): string {
  return value.replaceAll(variablePattern, (_match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare
    return env.find(variable => variable.name === name)?.value ?? ''
  })
}

export function withEnvVariable(container: ContainerArtifact, params: OperationParams['WithEnvVariable']): ContainerArtifact {
  const {env, secretEnv} = container.config
  const value = params.expand ? expandVariables(params.value, env) : params.value
  return withConfig(container, {
    env: [...env.filter(variable => variable.name !== params.name), {name: params.name, value}],
    secretEnv: secretEnv.filter(variable => variable.name !== params.name)
  })
}

export function withoutEnvVariable(container: ContainerArtifact, params: OperationParams['WithoutEnvVariable']): ContainerArtifact {
  const {env, secretEnv} = container.config
  return withConfig(container, {
    env: env.filter(variable => variable.name !== params.name),
    secretEnv: secretEnv.filter(variable => variable.name !== params.name)
  })
}

export function withSecretVariable(container: ContainerArtifact, secret: Address, params: OperationParams['WithSecretVariable']): ContainerArtifact {
  const {env, secretEnv} = container.config
  return withConfig(container, {
    env: env.filter(variable => variable.name !== params.name),
    secretEnv: [...secretEnv.filter(variable => variable.name !== params.name), {name: params.name, secret}]
  })
}

export function withLabel(container: ContainerArtifact, params: OperationParams['WithLabel']): ContainerArtifact {
  const labels = container.config.labels.filter(label => label.name !== params.name)
  return withConfig(container, {labels: [...labels, {name: params.name, value: params.value}]})
}

export function withoutLabel(container: ContainerArtifact, params: OperationParams['WithoutLabel']): ContainerArtifact {
  return withConfig(container, {labels: container.config.labels.filter(label => label.name !== params.name)})
}

export function withUser(container: ContainerArtifact, params: OperationParams['WithUser']): ContainerArtifact {
  return withConfig(container, {user: params.name})
}

export function withWorkdir(container: ContainerArtifact, params: OperationParams['WithWorkdir']): ContainerArtifact {
  return withConfig(container, {workdir: containerPath(params.path, container.config.workdir)})
}

export function withEntrypoint(container: ContainerArtifact, params: OperationParams['WithEntrypoint']): ContainerArtifact {
  return withConfig(container, {
    entrypoint: params.args,
    defaultArgs: params.keepDefaultArgs ? container.config.defaultArgs : []
  })
}

export function withDefaultArgs(container: ContainerArtifact, params: OperationParams['WithDefaultArgs']): ContainerArtifact {
  return withConfig(container, {defaultArgs: params.args})
}

export function withExposedPort(container: ContainerArtifact, params: OperationParams['WithExposedPort']): ContainerArtifact {
  const ports = container.config.exposedPorts.filter(p => p.port !== params.port || p.protocol !== params.protocol)
  return withConfig(container, {
    exposedPorts: [...ports, {port: params.port, protocol: params.protocol, description: params.description}]
  })
}

export function withoutExposedPort(container: ContainerArtifact, params: OperationParams['WithoutExposedPort']): ContainerArtifact {
  return withConfig(container, {
    exposedPorts: container.config.exposedPorts.filter(p => p.port !== params.port || p.protocol !== params.protocol)
  })
}

export function withServiceBinding(container: ContainerArtifact, service: Address, params: OperationParams['WithServiceBinding']): ContainerArtifact {
  const services = container.config.services.filter(binding => binding.alias !== params.alias)
  return withConfig(container, {services: [...services, {alias: params.alias, service}]})
}

export function withRegistryAuth(container: ContainerArtifact, secret: Address, params: OperationParams['WithRegistryAuth']): ContainerArtifact {
  const auths = container.config.registryAuths.filter(auth => auth.address !== params.address)
  return withConfig(container, {registryAuths: [...auths, {address: params.address, username: params.username, secret}]})
}

export function withoutRegistryAuth(container: ContainerArtifact, params: OperationParams['WithoutRegistryAuth']): ContainerArtifact {
  return withConfig(container, {registryAuths: container.config.registryAuths.filter(auth => auth.address !== params.address)})
}

export function withFocus(container: ContainerArtifact, focus: boolean): ContainerArtifact {
  return withConfig(container, {focus})
}
