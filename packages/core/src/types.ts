/**
 * Content address of an operation node: `sha256:` followed by 64 hex digits.
 */
export type Address = `sha256:${string}`

const addressPattern = /^sha256:[\da-f]{64}$/

export function isAddress(value: string): value is Address {
  return addressPattern.test(value)
}

/** Target platform in `os/arch[/variant]` form (e.g. `linux/amd64`). */
export type Platform = string

export const cacheSharingModes = ['SHARED', 'PRIVATE', 'LOCKED'] as const
export type CacheSharingMode = typeof cacheSharingModes[number]

export const imageLayerCompressions = ['Gzip', 'Zstd', 'EStarGZ', 'Uncompressed'] as const
export type ImageLayerCompression = typeof imageLayerCompressions[number]

export const imageMediaTypes = ['OCIMediaTypes', 'DockerMediaTypes'] as const
export type ImageMediaTypes = typeof imageMediaTypes[number]

export const networkProtocols = ['TCP', 'UDP'] as const
export type NetworkProtocol = typeof networkProtocols[number]

export const returnTypes = ['SUCCESS', 'FAILURE', 'ANY'] as const
export type ReturnType = typeof returnTypes[number]

/** Cosmetic grouping attached to nodes for reporting. Never addressed. */
export type PipelineLabel = {
  name: string;
  description?: string;
  labels?: Record<string, string>;
}

export type BuildArg = {
  name: string;
  value: string;
}

// -- Operation parameters ----------------------------------------------------

/**
 * Parameters of every operation kind. The keys of this map are the closed
 * set of kinds; the scheduler switches over them exhaustively.
 */
export type OperationParams = {
  // Container family
  ContainerScratch: {platform: Platform};
  FromImage: {ref: string};
  Build: {dockerfile: string; target?: string; buildArgs: BuildArg[]; secretNames: string[]};
  Import: {tag?: string};
  WithExec: {
    args: string[];
    skipEntrypoint: boolean;
    stdin?: string;
    redirectStdout?: string;
    redirectStderr?: string;
    expect: ReturnType;
    insecureRootCapabilities: boolean;
    timeoutMs?: number;
  };
  WithMountedDirectory: {path: string; owner?: string};
  WithMountedFile: {path: string; owner?: string};
  WithMountedCache: {path: string; key: string; sharing: CacheSharingMode; owner?: string; seeded: boolean};
  WithMountedSecret: {path: string; owner?: string; mode: number};
  WithMountedTemp: {path: string};
  WithoutMount: {path: string};
  WithFile: {path: string; permissions?: number; owner?: string};
  WithNewFile: {path: string; contents: string; permissions: number; owner?: string};
  WithDirectory: {path: string; include: string[]; exclude: string[]; owner?: string};
  WithUnixSocket: {path: string};
  WithoutUnixSocket: {path: string};
  WithEnvVariable: {name: string; value: string; expand: boolean};
  WithoutEnvVariable: {name: string};
  WithSecretVariable: {name: string};
  WithLabel: {name: string; value: string};
  WithoutLabel: {name: string};
  WithUser: {name: string};
  WithWorkdir: {path: string};
  WithEntrypoint: {args: string[]; keepDefaultArgs: boolean};
  WithDefaultArgs: {args: string[]};
  WithExposedPort: {port: number; protocol: NetworkProtocol; description?: string};
  WithoutExposedPort: {port: number; protocol: NetworkProtocol};
  WithServiceBinding: {alias: string};
  WithRegistryAuth: {address: string; username: string};
  WithoutRegistryAuth: {address: string};
  WithFocus: Record<string, never>;
  WithoutFocus: Record<string, never>;
  AsTarball: {compression: ImageLayerCompression; mediaTypes: ImageMediaTypes};
  // Directory family
  DirectoryScratch: Record<string, never>;
  HostDirectory: {path: string; include: string[]; exclude: string[]; digest: string};
  ContainerDirectory: {path: string};
  DirectoryWithNewFile: {path: string; contents: string; permissions: number};
  DirectoryWithFile: {path: string; permissions?: number};
  DirectoryWithDirectory: {path: string; include: string[]; exclude: string[]};
  DirectoryWithNewDirectory: {path: string; permissions: number};
  DirectoryWithoutPath: {path: string};
  Subdirectory: {path: string};
  // File family
  HostFile: {path: string; digest: string};
  ContainerFile: {path: string};
  DirectoryFile: {path: string};
  // Reference kinds
  SetSecret: {name: string; digest: string};
  CacheVolume: {key: string};
  AsService: Record<string, never>;
  HostUnixSocket: {path: string};
}

export type OperationKind = keyof OperationParams

/** Handle type a node of each kind yields. */
export type Family = 'container' | 'directory' | 'file' | 'secret' | 'service' | 'cacheVolume' | 'socket'

export const kindFamilies: Record<OperationKind, Family> = {
  ContainerScratch: 'container',
  FromImage: 'container',
  Build: 'container',
  Import: 'container',
  WithExec: 'container',
  WithMountedDirectory: 'container',
  WithMountedFile: 'container',
  WithMountedCache: 'container',
  WithMountedSecret: 'container',
  WithMountedTemp: 'container',
  WithoutMount: 'container',
  WithFile: 'container',
  WithNewFile: 'container',
  WithDirectory: 'container',
  WithUnixSocket: 'container',
  WithoutUnixSocket: 'container',
  WithEnvVariable: 'container',
  WithoutEnvVariable: 'container',
  WithSecretVariable: 'container',
  WithLabel: 'container',
  WithoutLabel: 'container',
  WithUser: 'container',
  WithWorkdir: 'container',
  WithEntrypoint: 'container',
  WithDefaultArgs: 'container',
  WithExposedPort: 'container',
  WithoutExposedPort: 'container',
  WithServiceBinding: 'container',
  WithRegistryAuth: 'container',
  WithoutRegistryAuth: 'container',
  WithFocus: 'container',
  WithoutFocus: 'container',
  AsTarball: 'file',
  DirectoryScratch: 'directory',
  HostDirectory: 'directory',
  ContainerDirectory: 'directory',
  DirectoryWithNewFile: 'directory',
  DirectoryWithFile: 'directory',
  DirectoryWithDirectory: 'directory',
  DirectoryWithNewDirectory: 'directory',
  DirectoryWithoutPath: 'directory',
  Subdirectory: 'directory',
  HostFile: 'file',
  ContainerFile: 'file',
  DirectoryFile: 'file',
  SetSecret: 'secret',
  CacheVolume: 'cacheVolume',
  AsService: 'service',
  HostUnixSocket: 'socket'
}

export function isOperationKind(value: unknown): value is OperationKind {
  return typeof value === 'string' && Object.hasOwn(kindFamilies, value)
}

/** Kinds whose nodes name something instead of producing filesystem state. */
export const referenceKinds = ['SetSecret', 'CacheVolume', 'AsService', 'HostUnixSocket'] as const
export type ReferenceKind = typeof referenceKinds[number]

const referenceKindNames: readonly string[] = referenceKinds

export function isReferenceKind(kind: OperationKind): kind is ReferenceKind {
  return referenceKindNames.includes(kind)
}

/**
 * Everything that determines a node's address.
 * Distributes over kinds so that `kind` narrows `params`.
 */
export type OperationDefinition = {
  [K in OperationKind]: {
    kind: K;
    params: OperationParams[K];
    parent: Address | null;
    extraInputs: Address[];
  }
}[OperationKind]

/** Kind and parameters of an operation, before it is attached to a parent. */
export type OperationSpec = {
  [K in OperationKind]: {kind: K; params: OperationParams[K]}
}[OperationKind]

export type OperationNode = OperationDefinition & {
  address: Address;
  pipeline: PipelineLabel[];
}

// -- Artifacts ---------------------------------------------------------------

export type SnapshotId = string

export type MountEntry =
  | {type: 'directory'; path: string; snapshot: SnapshotId; owner?: string}
  | {type: 'file'; path: string; snapshot: SnapshotId; name: string; owner?: string}
  | {type: 'cache'; path: string; key: string; sharing: CacheSharingMode; owner?: string; seed?: SnapshotId}
  | {type: 'secret'; path: string; secret: Address; mode: number; owner?: string}
  | {type: 'temp'; path: string}
  | {type: 'socket'; path: string; hostPath: string}

export type EnvVariable = {
  name: string;
  value: string;
}

export type ExposedPort = {
  port: number;
  protocol: NetworkProtocol;
  description?: string;
}

export type ContainerConfig = {
  platform: Platform;
  env: EnvVariable[];
  secretEnv: Array<{name: string; secret: Address}>;
  labels: Array<{name: string; value: string}>;
  user: string;
  workdir: string;
  entrypoint: string[];
  defaultArgs: string[];
  exposedPorts: ExposedPort[];
  mounts: MountEntry[];
  services: Array<{alias: string; service: Address}>;
  registryAuths: Array<{address: string; username: string; secret: Address}>;
  focus: boolean;
  imageRef?: string;
}

export type ExecOutput = {
  args: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ContainerArtifact = {
  type: 'container';
  rootfs: SnapshotId;
  config: ContainerConfig;
  exec?: ExecOutput;
}

export type DirectoryArtifact = {
  type: 'directory';
  snapshot: SnapshotId;
}

export type FileArtifact = {
  type: 'file';
  snapshot: SnapshotId;
  name: string;
}

export type ReferenceArtifact = {
  type: 'reference';
  address: Address;
}

export type Artifact = ContainerArtifact | DirectoryArtifact | FileArtifact | ReferenceArtifact

export type StoredArtifact = Exclude<Artifact, ReferenceArtifact>

/**
 * Image configuration returned by the runtime for pulled, built or imported
 * images. Missing fields leave the container defaults untouched.
 */
export type ImageConfig = {
  env?: string[];
  workdir?: string;
  user?: string;
  entrypoint?: string[];
  cmd?: string[];
  labels?: Record<string, string>;
  exposedPorts?: ExposedPort[];
}
