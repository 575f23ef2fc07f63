import {ConflictError, NotFoundError, ValidationError} from '../errors.js'
import type {RegistryCredential} from '../engine/types.js'
import {expectContainer, expectFile} from '../operations/context.js'
import {containerPath, hostPath} from '../operations/filesystem.js'
import type {MaterializeOptions} from '../scheduler.js'
import type {
  Address,
  CacheSharingMode,
  ContainerArtifact,
  ExposedPort,
  ImageLayerCompression,
  ImageMediaTypes,
  MountEntry,
  NetworkProtocol,
  OperationSpec,
  ReturnType
} from '../types.js'
import type {CacheVolume} from './cache-volume.js'
import {Directory, type DirectoryCopyOptions} from './directory.js'
import {File} from './file.js'
import {Handle} from './handle.js'
import {blockingMount, knownMounts, mayHaveDefaultCommand} from './known-config.js'
import type {Secret} from './secret.js'
import {Service} from './service.js'
import type {Socket} from './socket.js'
import {
  validateAlias,
  validateCacheKey,
  validateEnvName,
  validateExpect,
  validateExportOptions,
  validateImageRef,
  validateLabelName,
  validateMountPath,
  validateOwner,
  validatePath,
  validatePermissions,
  validatePort,
  validateProtocol,
  validateSharing,
  validateTimeout
} from './validate.js'

export type ExecOptions = {
  /** Run the arguments without the entrypoint. */
  skipEntrypoint?: boolean;
  stdin?: string;
  /** Container path receiving the standard output. */
  redirectStdout?: string;
  redirectStderr?: string;
  /** Exit status that counts as success (default `SUCCESS`). */
  expect?: ReturnType;
  insecureRootCapabilities?: boolean;
  /** Kills the process after this delay; the operation then fails. */
  timeoutMs?: number;
}

export type BuildOptions = {
  dockerfile?: string;
  target?: string;
  buildArgs?: Record<string, string>;
  secrets?: Secret[];
}

export type TarballOptions = {
  /** Images for other platforms, bundled in the same index. */
  platformVariants?: Container[];
  compression?: ImageLayerCompression;
  mediaTypes?: ImageMediaTypes;
}

export type OwnerOptions = {
  /** `user[:group]`, by name or id. */
  owner?: string;
}

export type CacheMountOptions = OwnerOptions & {
  /** Contents copied into the volume when it is empty. */
  source?: Directory;
  sharing?: CacheSharingMode;
}

export type SecretMountOptions = OwnerOptions & {
  /** File mode, only with an owner. */
  mode?: number;
}

/**
 * Container state: a root filesystem, a configuration and, after
 * `withExec`, the result of the last process run.
 */
export class Container extends Handle {
  pipeline(name: string, options?: {description?: string; labels?: Record<string, string>}): Container {
    return new Container(this.session, this.address, this.nestedLabels(name, options))
  }

  // -- Root filesystem -------------------------------------------------------

  from(ref: string): Container {
    return this.next({kind: 'FromImage', params: {ref: validateImageRef(ref)}})
  }

  build(context: Directory, options: BuildOptions = {}): Container {
    const buildArgs = Object.entries(options.buildArgs ?? {})
      .map(([name, value]) => ({name, value}))
      .sort((a, b) => (a.name < b.name ? -1 : (a.name > b.name ? 1 : 0)))
    const secrets = options.secrets ?? []
    return this.next({
      kind: 'Build',
      params: {
        dockerfile: validatePath(options.dockerfile ?? 'Dockerfile', 'Dockerfile path'),
        target: options.target,
        buildArgs,
        secretNames: secrets.map(secret => secret.name())
      }
    }, [context, ...secrets])
  }

  import(source: File, options: {tag?: string} = {}): Container {
    return this.next({kind: 'Import', params: {tag: options.tag}}, [source])
  }

  withExec(args: string[], options: ExecOptions = {}): Container {
    if (args.length === 0 && !mayHaveDefaultCommand(this.session.store, this.address)) {
      throw new ValidationError('No command to run: no arguments and no default arguments')
    }

    if (args.includes('')) {
      throw new ValidationError('Command arguments must not be empty strings')
    }

    return this.next({
      kind: 'WithExec',
      params: {
        args,
        skipEntrypoint: options.skipEntrypoint ?? false,
        stdin: options.stdin,
        redirectStdout: options.redirectStdout === undefined ? undefined : validatePath(options.redirectStdout, 'stdout path'),
        redirectStderr: options.redirectStderr === undefined ? undefined : validatePath(options.redirectStderr, 'stderr path'),
        expect: validateExpect(options.expect ?? 'SUCCESS'),
        insecureRootCapabilities: options.insecureRootCapabilities ?? false,
        timeoutMs: validateTimeout(options.timeoutMs)
      }
    })
  }

  // -- Mounts ----------------------------------------------------------------

  withMountedDirectory(path: string, source: Directory, options: OwnerOptions = {}): Container {
    return this.next({kind: 'WithMountedDirectory', params: {path: this.mountPath(path), owner: validateOwner(options.owner)}}, [source])
  }

  withMountedFile(path: string, source: File, options: OwnerOptions = {}): Container {
    return this.next({kind: 'WithMountedFile', params: {path: this.mountPath(path), owner: validateOwner(options.owner)}}, [source])
  }

  withMountedCache(path: string, cache: CacheVolume, options: CacheMountOptions = {}): Container {
    const params = {
      path: this.mountPath(path),
      key: validateCacheKey(cache.key()),
      sharing: validateSharing(options.sharing ?? 'SHARED'),
      owner: validateOwner(options.owner),
      seeded: options.source !== undefined
    }
    return this.next({kind: 'WithMountedCache', params}, options.source ? [cache, options.source] : [cache])
  }

  withMountedSecret(path: string, secret: Secret, options: SecretMountOptions = {}): Container {
    if (options.mode !== undefined && options.owner === undefined) {
      throw new ValidationError('A secret mount mode requires an owner')
    }

    const params = {
      path: this.mountPath(path),
      owner: validateOwner(options.owner),
      mode: validatePermissions(options.mode, 'mode') ?? 0o400
    }
    return this.next({kind: 'WithMountedSecret', params}, [secret])
  }

  withMountedTemp(path: string): Container {
    return this.next({kind: 'WithMountedTemp', params: {path: this.mountPath(path)}})
  }

  withUnixSocket(path: string, socket: Socket): Container {
    return this.next({kind: 'WithUnixSocket', params: {path: this.mountPath(path)}}, [socket])
  }

  /**
   * Removes the mount at `path`. Removing an absolute path that holds no
   * mount returns this container.
   */
  withoutMount(path: string): Container {
    validatePath(path)
    if (this.isUnmounted(path)) {
      return this
    }

    return this.next({kind: 'WithoutMount', params: {path}})
  }

  withoutUnixSocket(path: string): Container {
    validatePath(path)
    if (this.isUnmounted(path, 'socket')) {
      return this
    }

    return this.next({kind: 'WithoutUnixSocket', params: {path}})
  }

  // -- Files -----------------------------------------------------------------

  withFile(path: string, source: File, options: OwnerOptions & {permissions?: number} = {}): Container {
    return this.next({
      kind: 'WithFile',
      params: {path: validatePath(path), permissions: validatePermissions(options.permissions), owner: validateOwner(options.owner)}
    }, [source])
  }

  withNewFile(path: string, contents: string, options: OwnerOptions & {permissions?: number} = {}): Container {
    return this.next({
      kind: 'WithNewFile',
      params: {
        path: validatePath(path),
        contents,
        permissions: validatePermissions(options.permissions) ?? 0o644,
        owner: validateOwner(options.owner)
      }
    })
  }

  withDirectory(path: string, source: Directory, options: OwnerOptions & DirectoryCopyOptions = {}): Container {
    return this.next({
      kind: 'WithDirectory',
      params: {
        path: validatePath(path),
        include: options.include ?? [],
        exclude: options.exclude ?? [],
        owner: validateOwner(options.owner)
      }
    }, [source])
  }

  // -- Configuration ---------------------------------------------------------

  withEnvVariable(name: string, value: string, options: {expand?: boolean} = {}): Container {
    return this.next({kind: 'WithEnvVariable', params: {name: validateEnvName(name), value, expand: options.expand ?? false}})
  }

  withoutEnvVariable(name: string): Container {
    return this.next({kind: 'WithoutEnvVariable', params: {name: validateEnvName(name)}})
  }

  withSecretVariable(name: string, secret: Secret): Container {
    return this.next({kind: 'WithSecretVariable', params: {name: validateEnvName(name)}}, [secret])
  }

  withLabel(name: string, value: string): Container {
    return this.next({kind: 'WithLabel', params: {name: validateLabelName(name), value}})
  }

  withoutLabel(name: string): Container {
    return this.next({kind: 'WithoutLabel', params: {name: validateLabelName(name)}})
  }

  withUser(name: string): Container {
    return this.next({kind: 'WithUser', params: {name}})
  }

  withWorkdir(path: string): Container {
    return this.next({kind: 'WithWorkdir', params: {path: validatePath(path, 'working directory')}})
  }

  withEntrypoint(args: string[], options: {keepDefaultArgs?: boolean} = {}): Container {
    return this.next({kind: 'WithEntrypoint', params: {args, keepDefaultArgs: options.keepDefaultArgs ?? false}})
  }

  withDefaultArgs(args: string[]): Container {
    return this.next({kind: 'WithDefaultArgs', params: {args}})
  }

  withExposedPort(port: number, options: {protocol?: NetworkProtocol; description?: string} = {}): Container {
    return this.next({
      kind: 'WithExposedPort',
      params: {port: validatePort(port), protocol: validateProtocol(options.protocol ?? 'TCP'), description: options.description}
    })
  }

  withoutExposedPort(port: number, protocol: NetworkProtocol = 'TCP'): Container {
    return this.next({kind: 'WithoutExposedPort', params: {port: validatePort(port), protocol: validateProtocol(protocol)}})
  }

  withServiceBinding(alias: string, service: Service): Container {
    return this.next({kind: 'WithServiceBinding', params: {alias: validateAlias(alias)}}, [service])
  }

  withRegistryAuth(address: string, username: string, secret: Secret): Container {
    return this.next({kind: 'WithRegistryAuth', params: {address: validateImageRef(address), username}}, [secret])
  }

  withoutRegistryAuth(address: string): Container {
    return this.next({kind: 'WithoutRegistryAuth', params: {address: validateImageRef(address)}})
  }

  withFocus(): Container {
    return this.next({kind: 'WithFocus', params: {}})
  }

  withoutFocus(): Container {
    return this.next({kind: 'WithoutFocus', params: {}})
  }

  // -- Derived handles -------------------------------------------------------

  file(path: string): File {
    return new File(this.session, this.derive({kind: 'ContainerFile', params: {path: validatePath(path)}}).address, this.pipelineLabels)
  }

  directory(path: string): Directory {
    return new Directory(this.session, this.derive({kind: 'ContainerDirectory', params: {path: validatePath(path)}}).address, this.pipelineLabels)
  }

  asService(): Service {
    return new Service(this.session, this.derive({kind: 'AsService', params: {}}).address, this.pipelineLabels)
  }

  /**
   * OCI image layout tarball of this container and its platform variants.
   */
  asTarball(options: TarballOptions = {}): File {
    const params = validateExportOptions(options.compression ?? 'Gzip', options.mediaTypes ?? 'OCIMediaTypes')
    const node = this.derive({kind: 'AsTarball', params}, options.platformVariants ?? [])
    return new File(this.session, node.address, this.pipelineLabels)
  }

  // -- Terminal operations ---------------------------------------------------

  async sync(options?: MaterializeOptions): Promise<Address> {
    await this.inspect(() => true, options)
    return this.address
  }

  async stdout(options?: MaterializeOptions): Promise<string> {
    return this.inspect(container => this.execOutput(container).stdout, options)
  }

  async stderr(options?: MaterializeOptions): Promise<string> {
    return this.inspect(container => this.execOutput(container).stderr, options)
  }

  async exitCode(options?: MaterializeOptions): Promise<number> {
    return this.inspect(container => this.execOutput(container).exitCode, options)
  }

  async envVariable(name: string, options?: MaterializeOptions): Promise<string | undefined> {
    return this.inspect(({config}) => config.env.find(variable => variable.name === name)?.value, options)
  }

  async envVariables(options?: MaterializeOptions): Promise<Array<{name: string; value: string}>> {
    return this.inspect(({config}) => config.env, options)
  }

  async labels(options?: MaterializeOptions): Promise<Array<{name: string; value: string}>> {
    return this.inspect(({config}) => config.labels, options)
  }

  async workdir(options?: MaterializeOptions): Promise<string> {
    return this.inspect(({config}) => config.workdir, options)
  }

  async user(options?: MaterializeOptions): Promise<string> {
    return this.inspect(({config}) => config.user, options)
  }

  async entrypoint(options?: MaterializeOptions): Promise<string[]> {
    return this.inspect(({config}) => config.entrypoint, options)
  }

  async defaultArgs(options?: MaterializeOptions): Promise<string[]> {
    return this.inspect(({config}) => config.defaultArgs, options)
  }

  async exposedPorts(options?: MaterializeOptions): Promise<ExposedPort[]> {
    return this.inspect(({config}) => config.exposedPorts, options)
  }

  async mounts(options?: MaterializeOptions): Promise<string[]> {
    return this.inspect(({config}) => config.mounts.map(mount => mount.path), options)
  }

  async platform(options?: MaterializeOptions): Promise<string> {
    return this.inspect(({config}) => config.platform, options)
  }

  /**
   * Writes the image as an OCI layout tarball to a host path.
   */
  async export(path: string, options: TarballOptions & MaterializeOptions = {}): Promise<boolean> {
    return this.asTarball(options).export(path, options)
  }

  /**
   * Pushes the image, with its platform variants, to a registry.
   * @returns The pushed reference with its digest
   */
  async publish(ref: string, options: TarballOptions & MaterializeOptions = {}): Promise<string> {
    validateImageRef(ref)
    const tarball = this.asTarball(options)
    return this.session.request(this.address, async artifact => {
      const credentials: RegistryCredential[] = expectContainer(artifact).config.registryAuths.map(auth => ({
        address: auth.address,
        username: auth.username,
        password: this.session.secrets.get(auth.secret)
      }))
      return this.session.request(tarball.address, async file => {
        const {snapshot, name} = expectFile(file)
        return this.session.executor.publish(hostPath(this.session.snapshotPath(snapshot), name), ref, credentials)
      }, options)
    }, options)
  }

  private async inspect<T>(fn: (container: ContainerArtifact) => T, options?: MaterializeOptions): Promise<T> {
    return this.session.request(this.address, async artifact => fn(expectContainer(artifact)), options)
  }

  private execOutput(container: ContainerArtifact): NonNullable<ContainerArtifact['exec']> {
    if (!container.exec) {
      throw new NotFoundError('No command has been run on this container')
    }

    return container.exec
  }

  private mountPath(path: string): string {
    validateMountPath(path)
    const blocking = blockingMount(knownMounts(this.session.store, this.address).mounts, path)
    if (blocking) {
      throw new ConflictError(`Cannot mount at ${path}: ${blocking.path} is a ${blocking.type} mount`)
    }

    return path
  }

  /**
   * Whether `path` certainly holds no mount (of the given type). Unknown
   * when a relative path is involved.
   */
  private isUnmounted(path: string, type?: MountEntry['type']): boolean {
    if (!path.startsWith('/')) {
      return false
    }

    const {mounts, exact} = knownMounts(this.session.store, this.address)
    const target = containerPath(path)
    return exact && !mounts.some(mount => mount.path === target && (type === undefined || mount.type === type))
  }

  private next(spec: OperationSpec, inputs: Handle[] = []): Container {
    return new Container(this.session, this.derive(spec, inputs).address, this.pipelineLabels)
  }
}
