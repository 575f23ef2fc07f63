import type {ImageConfig, Platform} from '../types.js'
import type {
  BuildRequest,
  ExecRequest,
  ExecResult,
  RegistryCredential,
  ServiceHandle,
  ServiceRequest
} from './types.js'

/**
 * Log line from container execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during container execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface to a container runtime.
 *
 * Implementations:
 * - `DockerCliExecutor`: Uses Docker CLI
 *
 * The engine owns every filesystem: it hands the executor host directories
 * to fill (pull, build) or to run a process on (exec), and reads the result
 * back from them. The executor never keeps state between calls.
 */
export abstract class ContainerExecutor {
  /**
   * Verifies that the executor is available and functional.
   * @throws If the executor is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Writes the filesystem of an image into `rootfs`.
   * @returns The image configuration
   */
  abstract pull(ref: string, platform: Platform, rootfs: string): Promise<ImageConfig>

  /**
   * Builds a Dockerfile and writes the resulting filesystem into `request.rootfs`.
   * @returns The built image configuration
   */
  abstract build(request: BuildRequest): Promise<ImageConfig>

  /**
   * Runs a process. A non-zero exit code is a result, not an error.
   * @param onLogLine - Callback for real-time stdout/stderr lines
   */
  abstract exec(request: ExecRequest, onLogLine: OnLogLine): Promise<ExecResult>

  /**
   * Starts a long-running container for service bindings.
   */
  abstract startService(request: ServiceRequest): Promise<ServiceHandle>

  /**
   * Pushes an OCI layout tarball to a registry.
   * @returns The pushed reference, `ref@sha256:...`
   */
  abstract publish(tarball: string, ref: string, credentials: RegistryCredential[]): Promise<string>

  /**
   * Force-remove all containers currently started by this process.
   * Called from signal handlers (SIGINT/SIGTERM) to prevent orphaned containers.
   */
  abstract killRunningContainers(): Promise<void>
}
