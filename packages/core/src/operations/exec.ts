import {chmod, copyFile, lchown, mkdir, readdir, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import type {VolumeLease} from '../cache-volumes.js'
import type {BindMount, HostAlias, ServiceHandle} from '../engine/types.js'
import {ConflictError, ExecutionError, ResourceError, ValidationError} from '../errors.js'
import type {
  Address,
  ContainerArtifact,
  ContainerConfig,
  MountEntry,
  OperationParams,
  SnapshotId
} from '../types.js'
import {expectContainer, locate, type ApplyContext} from './context.js'
import {copyTree, hostPath, resolveHostPath, resolveOwner} from './filesystem.js'

type CacheMountEntry = Extract<MountEntry, {type: 'cache'}>

/**
 * Process environment: plain variables, then secret variables with their
 * plaintext.
 */
function environment(ctx: ApplyContext, config: ContainerConfig): Record<string, string> {
  const env: Record<string, string> = {}
  for (const {name, value} of config.env) {
    env[name] = value
  }

  for (const {name, secret} of config.secretEnv) {
    env[name] = ctx.secrets.get(secret)
  }

  return env
}

function byPathDepth(a: MountEntry, b: MountEntry): number {
  return a.path.length - b.path.length
}

/**
 * Mounts, cache leases and services held for the duration of one exec.
 *
 * Cache leases are taken once per volume and session, in key order, before
 * anything else: a LOCKED volume mounted twice, or by a bound service as
 * well, must not wait on itself, and two sessions must not wait on each
 * other.
 */
class ExecSession {
  private readonly leases = new Map<string, VolumeLease>()
  private readonly services: ServiceHandle[] = []
  /** Writable copies of directory and file mounts, by mount index */
  readonly staged = new Map<number, {id: SnapshotId; path: string}>()

  constructor(
    private readonly ctx: ApplyContext,
    private readonly rootfs: string
  ) {}

  async acquireCaches(entries: CacheMountEntry[]): Promise<void> {
    const sorted = [...entries].sort((a, b) => a.key.localeCompare(b.key))
    for (const entry of sorted) {
      const id = `${entry.key}\0${entry.sharing}`
      if (this.leases.has(id)) {
        continue
      }

      const volume = await this.ctx.volumes.resolve(entry.key)
      const lease = await this.ctx.volumes.acquire(volume, {
        sharing: entry.sharing,
        intent: 'write',
        pipelineId: this.ctx.requestId,
        onWait: () => {
          this.ctx.emit({event: 'VOLUME_WAITING', key: entry.key})
        }
      })
      this.leases.set(id, lease)

      if (entry.seed && (await readdir(lease.path)).length === 0) {
        await copyTree(this.ctx.cache.snapshotPath(entry.seed), lease.path)
      }
    }
  }

  /**
   * Host side of every mount. With `writable`, directory and file mounts
   * are copies whose changes are committed back; otherwise the snapshots
   * are mounted read-only.
   */
  async bind(mounts: MountEntry[], writable: boolean): Promise<BindMount[]> {
    const binds: BindMount[] = []
    const ordered = [...mounts.entries()].sort(([, a], [, b]) => byPathDepth(a, b))
    for (const [index, mount] of ordered) {
      binds.push(await this.bindOne(mount, index, writable))
    }

    return binds
  }

  async startServices(bindings: ContainerConfig['services']): Promise<HostAlias[]> {
    const hosts: HostAlias[] = []
    for (const {alias, service} of bindings) {
      const container = await this.serviceContainer(service)
      const {config} = container
      const args = [...config.entrypoint, ...config.defaultArgs]
      if (args.length === 0) {
        throw new ValidationError(`Service "${alias}" has no command: set an entrypoint or default arguments`)
      }

      const rootfs = await this.ctx.scratch()
      await copyTree(this.ctx.cache.snapshotPath(container.rootfs), rootfs)
      const handle = await this.ctx.executor.startService({
        rootfs,
        platform: config.platform,
        args,
        env: environment(this.ctx, config),
        workdir: config.workdir,
        user: config.user,
        mounts: await this.bind(config.mounts, false),
        hosts: [],
        insecureRootCapabilities: false,
        exposedPorts: config.exposedPorts
      })
      this.services.push(handle)
      hosts.push({alias, host: handle.host})
    }

    return hosts
  }

  async serviceContainer(service: Address): Promise<ContainerArtifact> {
    const node = this.ctx.store.require(service)
    if (!node.parent) {
      throw new ValidationError(`Service ${service} has no container`)
    }

    return expectContainer(await this.ctx.resolve(node.parent), 'service container')
  }

  /**
   * Releases leases and stops services. Errors from stopping are collected
   * and rethrown once everything is released.
   */
  async close(): Promise<void> {
    for (const lease of this.leases.values()) {
      lease.release()
    }

    const results = await Promise.allSettled(this.services.map(async service => service.stop()))
    const failure = results.find(result => result.status === 'rejected')
    if (failure?.status === 'rejected') {
      throw new ResourceError('Failed to stop a service', {cause: failure.reason})
    }
  }

  private async bindOne(mount: MountEntry, index: number, writable: boolean): Promise<BindMount> {
    const {cache} = this.ctx
    switch (mount.type) {
      case 'directory': {
        if (!writable) {
          return {hostPath: cache.snapshotPath(mount.snapshot), containerPath: mount.path, readOnly: true}
        }

        const staged = await this.ctx.stage()
        await copyTree(cache.snapshotPath(mount.snapshot), staged.path)
        this.staged.set(index, staged)
        return {hostPath: staged.path, containerPath: mount.path, readOnly: false}
      }

      case 'file': {
        const source = hostPath(cache.snapshotPath(mount.snapshot), mount.name)
        if (!writable) {
          return {hostPath: source, containerPath: mount.path, readOnly: true}
        }

        const staged = await this.ctx.stage()
        const target = hostPath(staged.path, mount.name)
        await copyFile(source, target)
        this.staged.set(index, staged)
        return {hostPath: target, containerPath: mount.path, readOnly: false}
      }

      case 'cache': {
        const lease = this.leases.get(`${mount.key}\0${mount.sharing}`)
        if (!lease) {
          throw new ResourceError(`Cache volume "${mount.key}" was not acquired`)
        }

        if (mount.owner) {
          const {uid, gid} = await resolveOwner(this.rootfs, mount.owner)
          await this.chown(lease.path, uid, gid)
        }

        return {hostPath: lease.path, containerPath: mount.path, readOnly: false}
      }

      case 'secret': {
        const dir = await this.ctx.scratch()
        const file = join(dir, 'secret')
        await writeFile(file, this.ctx.secrets.get(mount.secret), {mode: mount.mode})
        await chmod(file, mount.mode)
        if (mount.owner) {
          const {uid, gid} = await resolveOwner(this.rootfs, mount.owner)
          await this.chown(file, uid, gid)
        }

        return {hostPath: file, containerPath: mount.path, readOnly: true}
      }

      case 'temp': {
        return {hostPath: await this.ctx.scratch(), containerPath: mount.path, readOnly: false}
      }

      case 'socket': {
        return {hostPath: mount.hostPath, containerPath: mount.path, readOnly: false}
      }
    }
  }

  private async chown(path: string, uid: number, gid: number): Promise<void> {
    try {
      await lchown(path, uid, gid)
    } catch (error) {
      throw new ResourceError(`Cannot change owner of ${path} to ${uid}:${gid}`, {cause: error})
    }
  }
}

function checkExpectation(expect: OperationParams['WithExec']['expect'], exitCode: number, stderr: string): void {
  const ok = expect === 'ANY' || (expect === 'SUCCESS' ? exitCode === 0 : exitCode !== 0)
  if (!ok) {
    const message = expect === 'SUCCESS'
      ? `Process exited with code ${exitCode}`
      : 'Process succeeded but a failure was expected'
    throw new ExecutionError(message, {exitCode, stderr})
  }
}

/**
 * Runs a process on a copy of the container's root filesystem.
 *
 * Directory and file mounts are mounted as copies and committed back into
 * the mount table, so later operations see what the process wrote there.
 * Cache volumes are leased for the duration of the process. Bound services
 * are started before it and stopped after it.
 */
export async function withExec(
  ctx: ApplyContext,
  container: ContainerArtifact,
  params: OperationParams['WithExec']
): Promise<ContainerArtifact> {
  const {config} = container
  const command = params.args.length > 0 ? params.args : config.defaultArgs
  const args = params.skipEntrypoint ? command : [...config.entrypoint, ...command]
  if (args.length === 0) {
    throw new ValidationError('No command to run: no arguments and no default arguments')
  }

  const rootfs = await ctx.stage()
  await copyTree(ctx.cache.snapshotPath(container.rootfs), rootfs.path)
  const session = new ExecSession(ctx, rootfs.path)
  try {
    const services = await Promise.all(config.services.map(async ({service}) => session.serviceContainer(service)))
    const caches = [config, ...services.map(s => s.config)]
      .flatMap(c => c.mounts)
      .filter((mount): mount is CacheMountEntry => mount.type === 'cache')
    await session.acquireCaches(caches)

    const mounts = await session.bind(config.mounts, true)
    const hosts = await session.startServices(config.services)
    const result = await ctx.executor.exec({
      rootfs: rootfs.path,
      platform: config.platform,
      args,
      env: environment(ctx, config),
      workdir: config.workdir,
      user: config.user,
      mounts,
      hosts,
      stdin: params.stdin,
      insecureRootCapabilities: params.insecureRootCapabilities,
      timeoutMs: params.timeoutMs
    }, ({stream, line}) => {
      ctx.emit({event: 'EXEC_LOG', stream, line})
    })

    checkExpectation(params.expect, result.exitCode, result.stderr)

    const redirects: Array<[string | undefined, string]> = [[params.redirectStdout, result.stdout], [params.redirectStderr, result.stderr]]
    for (const [path, content] of redirects) {
      if (path !== undefined) {
        await writeRedirect(container, session, rootfs.path, path, content)
      }
    }

    const mountTable: MountEntry[] = []
    for (const [index, mount] of config.mounts.entries()) {
      const staged = session.staged.get(index)
      if (staged && (mount.type === 'directory' || mount.type === 'file')) {
        mountTable.push({...mount, snapshot: await ctx.commit(staged.id)})
      } else {
        mountTable.push(mount)
      }
    }

    return {
      type: 'container',
      rootfs: await ctx.commit(rootfs.id),
      config: {...config, mounts: mountTable},
      exec: {args, exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr}
    }
  } finally {
    await session.close()
  }
}

async function writeRedirect(container: ContainerArtifact, session: ExecSession, rootfs: string, path: string, content: string): Promise<void> {
  const location = locate(container, path)
  let target: string
  if (location.where === 'rootfs') {
    target = await resolveHostPath(rootfs, location.path)
  } else {
    const staged = session.staged.get(location.index)
    if (location.mount.type !== 'directory' || !staged) {
      throw new ConflictError(`Cannot redirect output to ${path}: it lies in a ${location.mount.type} mount`)
    }

    target = await resolveHostPath(staged.path, location.inner)
  }

  await mkdir(dirname(target), {recursive: true})
  await writeFile(target, content, 'utf8')
}
