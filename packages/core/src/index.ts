// Engine facade
export {Engine, hostPlatform, type EngineOptions} from './engine.js'

// Handles
export {Container, type ExecOptions, type BuildOptions, type TarballOptions, type OwnerOptions, type CacheMountOptions, type SecretMountOptions} from './api/container.js'
export {Directory, type DirectoryCopyOptions} from './api/directory.js'
export {File} from './api/file.js'
export {Secret} from './api/secret.js'
export {Service} from './api/service.js'
export {CacheVolume} from './api/cache-volume.js'
export {Socket} from './api/socket.js'
export {Host} from './api/host.js'

// Executor layer
export {Workspace} from './engine/workspace.js'
export {ContainerExecutor, type LogLine, type OnLogLine} from './engine/executor.js'
export {DockerCliExecutor} from './engine/docker-executor.js'
export type {BindMount, HostAlias, ExecRequest, ExecResult, BuildRequest, ServiceRequest, ServiceHandle, RegistryCredential} from './engine/types.js'

// Storage
export {NodeStore} from './node-store.js'
export {ArtifactCache, type ArtifactEntry, type EvictionPolicy, type EvictionResult, type CacheStats} from './artifact-cache.js'
export {CacheVolumeManager, type VolumeInfo, type AcquireOptions, type VolumeLease, type VolumeIntent} from './cache-volumes.js'
export {address, canonicalize} from './address.js'
export type {MaterializeOptions} from './scheduler.js'

// Reporting
export {ConsoleReporter, silentReporter} from './reporter.js'
export type {
  Reporter,
  OperationRef,
  EngineEvent,
  RequestStartEvent,
  OperationStartedEvent,
  OperationCachedEvent,
  OperationFinishedEvent,
  OperationFailedEvent,
  ExecLogEvent,
  VolumeWaitingEvent,
  RequestFinishedEvent,
  RequestFailedEvent
} from './reporter.js'

// Utilities
export {dirSize, formatSize, formatDuration, parseSize, parseDuration} from './utils.js'

// Domain types
export {isAddress, kindFamilies, isOperationKind, cacheSharingModes} from './types.js'
export type {
  Address,
  Platform,
  Family,
  CacheSharingMode,
  ImageLayerCompression,
  ImageMediaTypes,
  NetworkProtocol,
  ReturnType,
  PipelineLabel,
  BuildArg,
  OperationKind,
  OperationParams,
  OperationSpec,
  OperationNode,
  MountEntry,
  ContainerConfig,
  ImageConfig,
  Artifact
} from './types.js'

// Errors
export {
  CairnError,
  ValidationError,
  ConflictError,
  NotFoundError,
  ExecutionError,
  ContainerTimeoutError,
  CancelledError,
  ResourceError,
  DockerNotAvailableError,
  ImagePullError,
  EngineLockedError
} from './errors.js'
export type {LockInfo, OperationContext} from './errors.js'
