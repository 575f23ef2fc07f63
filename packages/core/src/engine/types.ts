import type {BuildArg, ExposedPort, Platform} from '../types.js'

/**
 * Host path made visible inside the container.
 */
export type BindMount = {
  /** Absolute path on the host */
  hostPath: string;
  /** Absolute path in the container */
  containerPath: string;
  readOnly: boolean;
}

/**
 * Extra `/etc/hosts` entry, used for service bindings.
 */
export type HostAlias = {
  alias: string;
  host: string;
}

/**
 * Request to run one process on a root filesystem.
 *
 * The executor runs `args` with `rootfs` as the container's root and writes
 * filesystem changes back into `rootfs`. Bind mounts are applied on top.
 */
export type ExecRequest = {
  /** Host directory holding the root filesystem, modified in place */
  rootfs: string;
  platform: Platform;
  /** Command and arguments, entrypoint already applied */
  args: string[];
  env: Record<string, string>;
  workdir: string;
  /** Empty for the image default */
  user: string;
  mounts: BindMount[];
  hosts: HostAlias[];
  stdin?: string;
  insecureRootCapabilities: boolean;
  timeoutMs?: number;
}

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  startedAt: Date;
  finishedAt: Date;
}

export type BuildRequest = {
  /** Host directory used as the build context */
  context: string;
  /** Dockerfile path, relative to the context */
  dockerfile: string;
  platform: Platform;
  target?: string;
  buildArgs: BuildArg[];
  secrets: Array<{name: string; value: string}>;
  /** Empty directory receiving the built filesystem */
  rootfs: string;
}

export type ServiceRequest = Omit<ExecRequest, 'stdin' | 'timeoutMs'> & {
  exposedPorts: ExposedPort[];
}

/**
 * A running service. `host` resolves from containers started with the
 * matching host alias.
 */
export type ServiceHandle = {
  host: string;
  stop: () => Promise<void>;
}

export type RegistryCredential = {
  address: string;
  username: string;
  password: string;
}
