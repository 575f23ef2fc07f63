import {randomUUID} from 'node:crypto'
import {clearTimeout, setTimeout} from 'node:timers'
import type {ArtifactCache} from './artifact-cache.js'
import {snapshotsOf} from './artifact-cache.js'
import type {CacheVolumeManager} from './cache-volumes.js'
import type {ContainerExecutor} from './engine/executor.js'
import type {Workspace} from './engine/workspace.js'
import {CairnError, CancelledError, ExecutionError, ResourceError, ValidationError} from './errors.js'
import {dependenciesOf, type NodeStore} from './node-store.js'
import {
  expectContainer,
  expectDirectory,
  expectFile,
  expectReference,
  type ApplyContext,
  type OperationEvent
} from './operations/context.js'
import * as containerOps from './operations/container-ops.js'
import * as directoryOps from './operations/directory-ops.js'
import {withExec} from './operations/exec.js'
import type {OperationRef, Reporter} from './reporter.js'
import type {SecretStore} from './secrets.js'
import {SingleFlight} from './single-flight.js'
import {
  isReferenceKind,
  type Address,
  type Artifact,
  type OperationNode,
  type SnapshotId,
  type StoredArtifact
} from './types.js'

export type MaterializeOptions = {
  /** Stops waiting when aborted. The computation itself carries on. */
  signal?: AbortSignal;
  /** Stops waiting after this delay. */
  timeoutMs?: number;
}

export type SchedulerDeps = {
  workspace: Workspace;
  store: NodeStore;
  cache: ArtifactCache;
  volumes: CacheVolumeManager;
  executor: ContainerExecutor;
  secrets: SecretStore;
  reporter: Reporter;
}

/** One top-level materialization and the computations it started. */
type Request = {
  id: string;
  running: Set<Promise<unknown>>;
}

function assertNever(value: never): never {
  throw new Error(`Unexpected operation: ${JSON.stringify(value)}`)
}

/**
 * Argument reported with a failure, to tell apart operations of the same kind.
 */
function describeArgument(node: OperationNode): string | undefined {
  if (node.kind === 'WithExec') {
    return node.params.args.join(' ') || undefined
  }

  const params: Record<string, unknown> = node.params
  for (const key of ['path', 'ref', 'name', 'key', 'alias', 'address']) {
    const value = params[key]
    if (typeof value === 'string') {
      return value
    }
  }

  return undefined
}

function locateError(error: unknown, node: OperationNode): CairnError {
  const context = {kind: node.kind, address: node.address, argument: describeArgument(node)}
  if (error instanceof CairnError) {
    return error.locate(context)
  }

  const message = error instanceof Error ? error.message : String(error)
  return new ResourceError(message, {cause: error}).locate(context)
}

/**
 * Settles with `work` unless the signal aborts or the timeout expires first.
 */
async function raceRequest<T>(work: Promise<T>, {signal, timeoutMs}: MaterializeOptions): Promise<T> {
  if (!signal && timeoutMs === undefined) {
    return work
  }

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined
    const stop = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }

    const onAbort = () => {
      stop()
      reject(new CancelledError('Request cancelled', {cause: signal?.reason}))
    }

    if (signal?.aborted) {
      onAbort()
      return
    }

    signal?.addEventListener('abort', onAbort, {once: true})
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        stop()
        reject(new CancelledError(`Request timed out after ${timeoutMs}ms`))
      }, timeoutMs)
    }

    void work.then(value => {
      stop()
      resolve(value)
    }, (error: unknown) => {
      stop()
      reject(error)
    })
  })
}

/**
 * Staging directories, committed snapshots and scratch directories
 * handed out to one computation.
 */
class ComputationScope {
  private readonly staged = new Set<SnapshotId>()
  private readonly committed: SnapshotId[] = []
  private readonly scratches: SnapshotId[] = []
  private readonly pins: Array<() => void> = []

  constructor(
    private readonly workspace: Workspace,
    private readonly cache: ArtifactCache
  ) {}

  async stage(): Promise<{id: SnapshotId; path: string}> {
    const id = this.workspace.generateSnapshotId()
    this.staged.add(id)
    return {id, path: await this.workspace.prepareSnapshot(id)}
  }

  async commit(id: SnapshotId): Promise<SnapshotId> {
    const meta = await this.workspace.commitSnapshot(id)
    this.staged.delete(id)
    this.cache.registerSnapshot(meta)
    this.committed.push(id)
    return id
  }

  async snapshot(fill: (path: string) => Promise<void>): Promise<SnapshotId> {
    const {id, path} = await this.stage()
    await fill(path)
    return this.commit(id)
  }

  async scratch(): Promise<string> {
    const id = this.workspace.generateSnapshotId()
    this.scratches.push(id)
    return this.workspace.prepareSnapshot(id)
  }

  pin(address: Address): void {
    this.pins.push(this.cache.pin([address]))
  }

  /**
   * Removes staging and scratch directories, and the committed snapshots
   * the resulting artifact does not reference (all of them on failure).
   */
  async close(artifact?: StoredArtifact): Promise<void> {
    for (const release of this.pins) {
      release()
    }

    for (const id of [...this.staged, ...this.scratches]) {
      await this.workspace.discardSnapshot(id)
    }

    const kept = new Set(artifact ? snapshotsOf(artifact) : [])
    await this.cache.discardSnapshots(this.committed.filter(id => !kept.has(id)))
  }
}

/**
 * Materializes operation nodes.
 *
 * Each node is computed at most once: results are stored in the artifact
 * cache, and concurrent requests for a node being computed wait for the
 * same computation. Dependencies are pinned for as long as a computation
 * runs. Failures are not cached.
 */
export class Scheduler {
  private readonly flights = new SingleFlight<Address, StoredArtifact>()
  private readonly cleanups = new Set<Promise<void>>()
  private readonly cleanupErrors: unknown[] = []

  constructor(private readonly deps: SchedulerDeps) {}

  /** Number of computations currently running. */
  get running(): number {
    return this.flights.size
  }

  /**
   * Materializes a node as a top-level request. Cancelling the request
   * only stops this caller from waiting.
   * @throws CancelledError when aborted or timed out
   */
  async materialize(address: Address, options: MaterializeOptions = {}): Promise<Artifact> {
    const node = this.deps.store.require(address)
    const request: Request = {id: randomUUID(), running: new Set()}
    const ref = this.refOf(node, request)
    const started = Date.now()
    this.deps.reporter.emit({event: 'REQUEST_START', ...ref})

    let cancelled = false
    try {
      const work = this.resolve(address, request)
      request.running.add(work)
      const artifact = await raceRequest(work, options)
      this.deps.reporter.emit({event: 'REQUEST_FINISHED', ...ref, durationMs: Date.now() - started})
      return artifact
    } catch (error) {
      cancelled = error instanceof CancelledError
      const code = error instanceof CairnError ? error.code : 'UNKNOWN'
      const message = error instanceof Error ? error.message : String(error)
      this.deps.reporter.emit({event: 'REQUEST_FAILED', ...ref, code, message})
      throw error
    } finally {
      const cleanup = this.closeRequest(request)
      if (!cancelled) {
        await cleanup
      }
    }
  }

  /**
   * Materializes a node and keeps it pinned while `fn` runs.
   */
  async use<T>(address: Address, fn: (artifact: Artifact) => Promise<T>, options?: MaterializeOptions): Promise<T> {
    const release = this.deps.cache.pin([address])
    try {
      return await fn(await this.materialize(address, options))
    } finally {
      release()
    }
  }

  /**
   * Waits for cleanups of cancelled requests.
   * @throws ResourceError when one of them failed
   */
  async drain(): Promise<void> {
    await Promise.all(this.cleanups)
    const errors = this.cleanupErrors.splice(0)
    if (errors.length > 0) {
      throw new ResourceError('Failed to clean up after a request', {cause: errors[0]})
    }
  }

  /**
   * Releases the request's PRIVATE cache volume forks once every
   * computation it started has settled.
   */
  private async closeRequest(request: Request): Promise<void> {
    const cleanup = (async () => {
      await Promise.allSettled(request.running)
      await this.deps.volumes.releasePipeline(request.id)
    })().catch((error: unknown) => {
      this.cleanupErrors.push(error)
    })
    this.cleanups.add(cleanup)
    await cleanup
    this.cleanups.delete(cleanup)
  }

  private refOf(node: OperationNode, request: Request): OperationRef {
    return {requestId: request.id, address: node.address, kind: node.kind, pipeline: node.pipeline}
  }

  private async resolve(address: Address, request: Request): Promise<Artifact> {
    const node = this.deps.store.require(address)
    if (isReferenceKind(node.kind)) {
      return {type: 'reference', address}
    }

    const cached = this.deps.cache.get(address)
    if (cached) {
      this.deps.reporter.emit({event: 'OPERATION_CACHED', ...this.refOf(node, request)})
      return cached
    }

    const flight = this.flights.run(address, async () => this.compute(node, request))
    request.running.add(flight)
    return flight
  }

  private async compute(node: OperationNode, request: Request): Promise<StoredArtifact> {
    const {reporter, workspace, cache} = this.deps
    const ref = this.refOf(node, request)
    const release = cache.pin(dependenciesOf(node))
    try {
      const [parent, inputs] = await Promise.all([
        node.parent ? this.resolve(node.parent, request) : Promise.resolve(undefined),
        Promise.all(node.extraInputs.map(async input => this.resolve(input, request)))
      ])

      reporter.emit({event: 'OPERATION_STARTED', ...ref})
      const started = Date.now()
      const scope = new ComputationScope(workspace, cache)
      let artifact: StoredArtifact
      try {
        artifact = await this.apply(node, parent, inputs, this.contextFor(node, request, scope))
        await cache.put(node.address, artifact)
      } catch (error) {
        const failure = locateError(error, node)
        await scope.close()
        reporter.emit({
          event: 'OPERATION_FAILED',
          ...ref,
          code: failure.code,
          message: failure.message,
          exitCode: failure instanceof ExecutionError ? failure.exitCode : undefined
        })
        throw failure
      }

      await scope.close(artifact)
      reporter.emit({
        event: 'OPERATION_FINISHED',
        ...ref,
        durationMs: Date.now() - started,
        exitCode: node.kind === 'WithExec' && artifact.type === 'container' ? artifact.exec?.exitCode : undefined
      })
      return artifact
    } finally {
      release()
    }
  }

  private contextFor(node: OperationNode, request: Request, scope: ComputationScope): ApplyContext {
    const {reporter} = this.deps
    const ref = this.refOf(node, request)
    return {
      ...this.deps,
      node,
      requestId: request.id,
      resolve: async address => {
        scope.pin(address)
        return this.resolve(address, request)
      },
      stage: async () => scope.stage(),
      commit: async id => scope.commit(id),
      snapshot: async fill => scope.snapshot(fill),
      scratch: async () => scope.scratch(),
      emit(event: OperationEvent) {
        reporter.emit({...event, ...ref})
      }
    }
  }

  private socketPath(address: Address): string {
    const node = this.deps.store.require(address)
    if (node.kind !== 'HostUnixSocket') {
      throw new ValidationError(`Expected a socket, got ${node.kind}`)
    }

    return node.params.path
  }

  private async apply(node: OperationNode, parent: Artifact | undefined, inputs: Artifact[], ctx: ApplyContext): Promise<StoredArtifact> {
    const [input, seed] = inputs
    switch (node.kind) {
      // Container family
      case 'ContainerScratch': {
        return containerOps.containerScratch(ctx, node.params)
      }

      case 'FromImage': {
        return containerOps.fromImage(ctx, expectContainer(parent), node.params)
      }

      case 'Build': {
        const secrets = inputs.slice(1).map(secret => expectReference(secret))
        return containerOps.build(ctx, expectContainer(parent), expectDirectory(input), secrets, node.params)
      }

      case 'Import': {
        return containerOps.importImage(ctx, expectContainer(parent), expectFile(input), node.params)
      }

      case 'WithExec': {
        return withExec(ctx, expectContainer(parent), node.params)
      }

      case 'WithMountedDirectory': {
        return containerOps.withMountedDirectory(ctx, expectContainer(parent), expectDirectory(input), node.params)
      }

      case 'WithMountedFile': {
        return containerOps.withMountedFile(ctx, expectContainer(parent), expectFile(input), node.params)
      }

      case 'WithMountedCache': {
        expectReference(input)
        return containerOps.withMountedCache(expectContainer(parent), seed ? expectDirectory(seed) : undefined, node.params)
      }

      case 'WithMountedSecret': {
        return containerOps.withMountedSecret(expectContainer(parent), expectReference(input), node.params)
      }

      case 'WithMountedTemp': {
        return containerOps.withMountedTemp(expectContainer(parent), node.params)
      }

      case 'WithoutMount': {
        return containerOps.withoutMount(expectContainer(parent), node.params)
      }

      case 'WithFile': {
        return containerOps.withFile(ctx, expectContainer(parent), expectFile(input), node.params)
      }

      case 'WithNewFile': {
        return containerOps.withNewFile(ctx, expectContainer(parent), node.params)
      }

      case 'WithDirectory': {
        return containerOps.withDirectory(ctx, expectContainer(parent), expectDirectory(input), node.params)
      }

      case 'WithUnixSocket': {
        return containerOps.withUnixSocket(expectContainer(parent), this.socketPath(expectReference(input)), node.params)
      }

      case 'WithoutUnixSocket': {
        return containerOps.withoutMount(expectContainer(parent), node.params, 'socket')
      }

      case 'WithEnvVariable': {
        return containerOps.withEnvVariable(expectContainer(parent), node.params)
      }

      case 'WithoutEnvVariable': {
        return containerOps.withoutEnvVariable(expectContainer(parent), node.params)
      }

      case 'WithSecretVariable': {
        return containerOps.withSecretVariable(expectContainer(parent), expectReference(input), node.params)
      }

      case 'WithLabel': {
        return containerOps.withLabel(expectContainer(parent), node.params)
      }

      case 'WithoutLabel': {
        return containerOps.withoutLabel(expectContainer(parent), node.params)
      }

      case 'WithUser': {
        return containerOps.withUser(expectContainer(parent), node.params)
      }

      case 'WithWorkdir': {
        return containerOps.withWorkdir(expectContainer(parent), node.params)
      }

      case 'WithEntrypoint': {
        return containerOps.withEntrypoint(expectContainer(parent), node.params)
      }

      case 'WithDefaultArgs': {
        return containerOps.withDefaultArgs(expectContainer(parent), node.params)
      }

      case 'WithExposedPort': {
        return containerOps.withExposedPort(expectContainer(parent), node.params)
      }

      case 'WithoutExposedPort': {
        return containerOps.withoutExposedPort(expectContainer(parent), node.params)
      }

      case 'WithServiceBinding': {
        return containerOps.withServiceBinding(expectContainer(parent), expectReference(input), node.params)
      }

      case 'WithRegistryAuth': {
        return containerOps.withRegistryAuth(expectContainer(parent), expectReference(input), node.params)
      }

      case 'WithoutRegistryAuth': {
        return containerOps.withoutRegistryAuth(expectContainer(parent), node.params)
      }

      case 'WithFocus': {
        return containerOps.withFocus(expectContainer(parent), true)
      }

      case 'WithoutFocus': {
        return containerOps.withFocus(expectContainer(parent), false)
      }

      case 'AsTarball': {
        const variants = inputs.map(variant => expectContainer(variant, 'platform variant'))
        return containerOps.asTarball(ctx, expectContainer(parent), variants, node.params)
      }

      // Directory family
      case 'DirectoryScratch': {
        return directoryOps.directoryScratch(ctx)
      }

      case 'HostDirectory': {
        return directoryOps.hostDirectory(ctx, node.params)
      }

      case 'ContainerDirectory': {
        return directoryOps.containerDirectory(ctx, expectContainer(parent), node.params.path)
      }

      case 'DirectoryWithNewFile': {
        return directoryOps.directoryWithNewFile(ctx, expectDirectory(parent), node.params)
      }

      case 'DirectoryWithFile': {
        return directoryOps.directoryWithFile(ctx, expectDirectory(parent), expectFile(input), node.params)
      }

      case 'DirectoryWithDirectory': {
        return directoryOps.directoryWithDirectory(ctx, expectDirectory(parent), expectDirectory(input), node.params)
      }

      case 'DirectoryWithNewDirectory': {
        return directoryOps.directoryWithNewDirectory(ctx, expectDirectory(parent), node.params)
      }

      case 'DirectoryWithoutPath': {
        return directoryOps.directoryWithoutPath(ctx, expectDirectory(parent), node.params)
      }

      case 'Subdirectory': {
        return directoryOps.subdirectory(ctx, expectDirectory(parent), node.params.path)
      }

      // File family
      case 'HostFile': {
        return directoryOps.hostFile(ctx, node.params)
      }

      case 'ContainerFile': {
        return directoryOps.containerFile(ctx, expectContainer(parent), node.params.path)
      }

      case 'DirectoryFile': {
        return directoryOps.directoryFile(ctx, expectDirectory(parent), node.params.path)
      }

      case 'SetSecret':
      case 'CacheVolume':
      case 'AsService':
      case 'HostUnixSocket': {
        throw new ValidationError(`${node.kind} nodes produce no artifact`)
      }

      default: {
        return assertNever(node)
      }
    }
  }
}
