import process from 'node:process'
import {resolve} from 'node:path'
import {sha256} from './address.js'
import {CacheVolume} from './api/cache-volume.js'
import {Container} from './api/container.js'
import {Directory} from './api/directory.js'
import {File} from './api/file.js'
import {insertRoot, type Session} from './api/handle.js'
import {Host} from './api/host.js'
import {Secret} from './api/secret.js'
import {Service} from './api/service.js'
import {Socket} from './api/socket.js'
import {validateCacheKey, validatePlatform} from './api/validate.js'
import {ArtifactCache, type EvictionPolicy, type EvictionResult} from './artifact-cache.js'
import {CacheVolumeManager} from './cache-volumes.js'
import {DockerCliExecutor} from './engine/docker-executor.js'
import {EngineLock} from './engine/engine-lock.js'
import type {ContainerExecutor} from './engine/executor.js'
import {Workspace} from './engine/workspace.js'
import {NotFoundError, ResourceError, ValidationError} from './errors.js'
import {NodeStore} from './node-store.js'
import {ConsoleReporter, type Reporter} from './reporter.js'
import {Scheduler, type MaterializeOptions} from './scheduler.js'
import {SecretStore} from './secrets.js'
import {
  isAddress,
  kindFamilies,
  type Address,
  type Artifact,
  type Family,
  type OperationNode,
  type Platform,
  type SnapshotId
} from './types.js'

export type EngineOptions = {
  /** Directory holding nodes, artifacts, snapshots and cache volumes. */
  stateDir: string;
  executor?: ContainerExecutor;
  reporter?: Reporter;
  /** Platform of new containers (default: linux on the host architecture). */
  platform?: Platform;
  /** Artifact cache limits, enforced after each request. */
  cache?: Omit<EvictionPolicy, 'now'>;
}

const architectures: Record<string, string> = {
  x64: 'amd64',
  arm64: 'arm64',
  arm: 'arm/v7',
  ppc64: 'ppc64le',
  s390x: 's390x',
  riscv64: 'riscv64'
}

export function hostPlatform(): Platform {
  return `linux/${architectures[process.arch] ?? process.arch}`
}

/**
 * Engine instance: the root of every pipeline and the owner of the state
 * directory while it is open. Several instances can run in one process on
 * different state directories.
 *
 * @example
 * ```typescript
 * const engine = await Engine.open({stateDir: '.cairn'})
 * const out = await engine.container()
 *   .from('alpine:3.18')
 *   .withExec(['echo', 'hello'])
 *   .stdout()
 * await engine.close()
 * ```
 */
export class Engine implements Session {
  static async open(options: EngineOptions): Promise<Engine> {
    const stateDir = resolve(options.stateDir)
    const lock = await EngineLock.acquire(stateDir)
    try {
      const workspace = await Workspace.create(stateDir)
      await workspace.cleanupStaging()
      const store = await NodeStore.open(workspace.nodesPath)
      const cache = await ArtifactCache.open(workspace)
      const volumes = await CacheVolumeManager.open(workspace.volumesPath)
      return new Engine(options, lock, workspace, store, cache, volumes)
    } catch (error) {
      await lock.release()
      throw error
    }
  }

  readonly secrets = new SecretStore()
  readonly executor: ContainerExecutor
  readonly platform: Platform
  private readonly scheduler: Scheduler
  private readonly limits?: Omit<EvictionPolicy, 'now'>
  private eviction: Promise<unknown> = Promise.resolve()
  private executorReady?: Promise<void>
  private closed = false

  private constructor(
    options: EngineOptions,
    private readonly lock: EngineLock,
    readonly workspace: Workspace,
    readonly store: NodeStore,
    readonly cache: ArtifactCache,
    readonly volumes: CacheVolumeManager
  ) {
    this.executor = options.executor ?? new DockerCliExecutor()
    this.platform = validatePlatform(options.platform ?? hostPlatform())
    this.limits = options.cache
    this.scheduler = new Scheduler({
      workspace,
      store,
      cache,
      volumes,
      executor: this.executor,
      secrets: this.secrets,
      reporter: options.reporter ?? new ConsoleReporter()
    })
  }

  get stateDir(): string {
    return this.workspace.root
  }

  // -- Roots -----------------------------------------------------------------

  container(options: {platform?: Platform} = {}): Container {
    const platform = validatePlatform(options.platform ?? this.platform)
    return new Container(this, insertRoot(this, {kind: 'ContainerScratch', params: {platform}}).address)
  }

  directory(): Directory {
    return new Directory(this, insertRoot(this, {kind: 'DirectoryScratch', params: {}}).address)
  }

  cacheVolume(key: string): CacheVolume {
    return new CacheVolume(this, insertRoot(this, {kind: 'CacheVolume', params: {key: validateCacheKey(key)}}).address)
  }

  /**
   * Registers a secret. Only a digest of the plaintext enters the graph.
   */
  setSecret(name: string, plaintext: string): Secret {
    if (name.length === 0) {
      throw new ValidationError('Secret names must not be empty')
    }

    const node = insertRoot(this, {kind: 'SetSecret', params: {name, digest: sha256(plaintext)}})
    this.secrets.set(node.address, plaintext)
    return new Secret(this, node.address)
  }

  host(): Host {
    return new Host(this)
  }

  loadContainerFromID(id: string): Container {
    return new Container(this, this.load(id, 'container'))
  }

  loadDirectoryFromID(id: string): Directory {
    return new Directory(this, this.load(id, 'directory'))
  }

  loadFileFromID(id: string): File {
    return new File(this, this.load(id, 'file'))
  }

  loadSecretFromID(id: string): Secret {
    return new Secret(this, this.load(id, 'secret'))
  }

  loadServiceFromID(id: string): Service {
    return new Service(this, this.load(id, 'service'))
  }

  loadCacheVolumeFromID(id: string): CacheVolume {
    return new CacheVolume(this, this.load(id, 'cacheVolume'))
  }

  loadSocketFromID(id: string): Socket {
    return new Socket(this, this.load(id, 'socket'))
  }

  // -- Requests --------------------------------------------------------------

  async request<T>(address: Address, fn: (artifact: Artifact) => Promise<T>, options?: MaterializeOptions): Promise<T> {
    if (this.closed) {
      throw new ResourceError('Engine is closed')
    }

    await this.checkExecutor()
    try {
      return await this.scheduler.use(address, fn, options)
    } finally {
      await this.store.flush()
      await this.enforceLimits()
    }
  }

  snapshotPath(id: SnapshotId): string {
    return this.cache.snapshotPath(id)
  }

  /**
   * A node and its transitive dependencies, dependencies first.
   */
  ancestry(id: string): OperationNode[] {
    return this.store.ancestry(this.load(id)).map(address => this.store.require(address))
  }

  /**
   * Applies an eviction policy to the artifact cache.
   */
  async prune(policy: EvictionPolicy): Promise<EvictionResult> {
    const run = async () => this.cache.evict(policy)
    const result = this.eviction.then(run, run)
    this.eviction = result
    return result
  }

  /**
   * Waits for running cleanups, persists nodes and releases the state
   * directory. Requests started afterwards fail.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }

    this.closed = true
    try {
      await this.scheduler.drain()
      await this.eviction
      await this.store.flush()
    } finally {
      await this.lock.release()
    }
  }

  /**
   * Checks the executor before its first use. A failed check is retried
   * by the next request.
   */
  private async checkExecutor(): Promise<void> {
    if (!this.executorReady) {
      this.executorReady = this.executor.check().catch((error: unknown) => {
        this.executorReady = undefined
        throw error
      })
    }

    await this.executorReady
  }

  private async enforceLimits(): Promise<void> {
    if (this.limits && (this.limits.maxBytes !== undefined || this.limits.maxAgeMs !== undefined)) {
      await this.prune(this.limits)
    }
  }

  private load(id: string, family?: Family): Address {
    if (!isAddress(id)) {
      throw new ValidationError(`Invalid id "${id}", expected sha256:<hex>`)
    }

    const node = this.store.get(id)
    if (!node) {
      throw new NotFoundError(`No operation with id ${id}`)
    }

    if (family && kindFamilies[node.kind] !== family) {
      throw new ValidationError(`${id} is a ${kindFamilies[node.kind]}, not a ${family}`)
    }

    return id
  }
}
