import process from 'node:process'
import {randomUUID} from 'node:crypto'
import {mkdir, rm} from 'node:fs/promises'
import {join} from 'node:path'
import {pipeline} from 'node:stream/promises'
import {execa} from 'execa'
import * as tar from 'tar'
import {
  ContainerTimeoutError,
  DockerNotAvailableError,
  ExecutionError,
  ImagePullError
} from '../errors.js'
import type {ImageConfig, Platform} from '../types.js'
import {ContainerExecutor, type OnLogLine} from './executor.js'
import {parseImageConfig} from './image-config.js'
import type {
  BindMount,
  BuildRequest,
  ExecRequest,
  ExecResult,
  HostAlias,
  RegistryCredential,
  ServiceHandle,
  ServiceRequest
} from './types.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept so that host secrets never leak
 * into containers.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

function stderrOf(error: unknown): string {
  return error instanceof Error && 'stderr' in error ? String(error.stderr) : ''
}

function timedOut(error: unknown): boolean {
  return error instanceof Error && 'timedOut' in error && error.timedOut === true
}

/**
 * Runs containers through the Docker CLI.
 *
 * Root filesystems are moved in and out of Docker as tar streams:
 * `docker export` of a created container fills a host directory, and
 * `docker import` of a host directory gives an image to run. Every
 * container and temporary image is labelled and removed after use.
 */
export class DockerCliExecutor extends ContainerExecutor {
  private readonly env = dockerCliEnv()
  private readonly activeContainers = new Set<string>()

  async check(): Promise<void> {
    try {
      await execa('docker', ['--version'], {env: this.env})
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async killRunningContainers(): Promise<void> {
    const names = [...this.activeContainers]
    if (names.length === 0) {
      return
    }

    await execa('docker', ['rm', '-f', ...names], {env: this.env, reject: false})
  }

  async pull(ref: string, platform: Platform, rootfs: string): Promise<ImageConfig> {
    try {
      await execa('docker', ['pull', '--platform', platform, ref], {env: this.env})
    } catch (error) {
      throw new ImagePullError(ref, {cause: error})
    }

    const config = await this.inspectImage(ref)
    await this.exportImage(ref, platform, rootfs)
    return config
  }

  async build(request: BuildRequest): Promise<ImageConfig> {
    const tag = `cairn-build-${randomUUID()}`
    const args = ['build', '--platform', request.platform, '-f', join(request.context, request.dockerfile), '-t', tag]
    if (request.target) {
      args.push('--target', request.target)
    }

    for (const {name, value} of request.buildArgs) {
      args.push('--build-arg', `${name}=${value}`)
    }

    // Build secrets reach BuildKit through the CLI environment, never argv
    const secretEnv: Record<string, string> = {}
    for (const [index, secret] of request.secrets.entries()) {
      const variable = `CAIRN_BUILD_SECRET_${index}`
      secretEnv[variable] = secret.value
      args.push('--secret', `id=${secret.name},env=${variable}`)
    }

    args.push(request.context)
    try {
      await execa('docker', args, {env: {...this.env, ...secretEnv}})
    } catch (error) {
      throw new ExecutionError('docker build failed', {stderr: stderrOf(error), cause: error})
    }

    try {
      const config = await this.inspectImage(tag)
      await this.exportImage(tag, request.platform, request.rootfs)
      return config
    } finally {
      await execa('docker', ['rmi', '-f', tag], {env: this.env, reject: false})
    }
  }

  async exec(request: ExecRequest, onLogLine: OnLogLine): Promise<ExecResult> {
    const startedAt = new Date()
    const image = await this.importRootfs(request.rootfs)
    const name = `cairn-exec-${randomUUID()}`
    const [command, ...args] = request.args

    this.activeContainers.add(name)
    try {
      await execa('docker', [
        ...this.createArgs(name, request),
        ...(request.stdin === undefined ? [] : ['--interactive']),
        '--entrypoint',
        command,
        image,
        ...args
      ], {env: this.env})

      const proc = execa('docker', ['start', '--attach', ...(request.stdin === undefined ? [] : ['--interactive']), name], {
        env: this.env,
        reject: false,
        buffer: false,
        input: request.stdin,
        timeout: request.timeoutMs
      })

      const {stdout, stderr} = await this.streamLogs(proc, onLogLine)
      const result = await proc
      if (result.timedOut) {
        throw new ContainerTimeoutError(request.timeoutMs ?? 0)
      }

      await this.exportContainer(name, request.rootfs)
      return {exitCode: result.exitCode ?? 1, stdout, stderr, startedAt, finishedAt: new Date()}
    } catch (error) {
      if (error instanceof ContainerTimeoutError || error instanceof ExecutionError) {
        throw error
      }

      if (timedOut(error)) {
        throw new ContainerTimeoutError(request.timeoutMs ?? 0, {cause: error})
      }

      throw new ExecutionError(`Cannot run ${command}`, {stderr: stderrOf(error), cause: error})
    } finally {
      await this.cleanup(name)
      await execa('docker', ['rmi', '-f', image], {env: this.env, reject: false})
    }
  }

  async startService(request: ServiceRequest): Promise<ServiceHandle> {
    const image = await this.importRootfs(request.rootfs)
    const name = `cairn-service-${randomUUID()}`
    const [command, ...args] = request.args
    const ports = request.exposedPorts.flatMap(({port, protocol}) => ['--expose', `${port}/${protocol.toLowerCase()}`])

    this.activeContainers.add(name)
    try {
      await execa('docker', [...this.createArgs(name, request), ...ports, '--entrypoint', command, image, ...args], {env: this.env})
      await execa('docker', ['start', name], {env: this.env})
      const {stdout} = await execa('docker', [
        'inspect', '--format', '{{range .NetworkSettings.Networks}}{{.IPAddress}}{{end}}', name
      ], {env: this.env})

      return {
        host: stdout.trim(),
        stop: async () => {
          await this.cleanup(name)
          await execa('docker', ['rmi', '-f', image], {env: this.env, reject: false})
        }
      }
    } catch (error) {
      await this.cleanup(name)
      await execa('docker', ['rmi', '-f', image], {env: this.env, reject: false})
      throw new ExecutionError(`Cannot start service ${command}`, {stderr: stderrOf(error), cause: error})
    }
  }

  async publish(tarball: string, ref: string, credentials: RegistryCredential[]): Promise<string> {
    for (const {address, username, password} of credentials) {
      try {
        await execa('docker', ['login', address, '--username', username, '--password-stdin'], {env: this.env, input: password})
      } catch (error) {
        throw new ExecutionError(`Cannot log in to ${address}`, {stderr: stderrOf(error), cause: error})
      }
    }

    try {
      const {stdout: loaded} = await execa('docker', ['load', '--input', tarball], {env: this.env})
      const image = /Loaded image(?: ID)?: (\S+)/.exec(loaded)?.[1]
      if (!image) {
        throw new ExecutionError(`Unexpected docker load output: ${loaded}`)
      }

      await execa('docker', ['tag', image, ref], {env: this.env})
      const {stdout: pushed} = await execa('docker', ['push', ref], {env: this.env})
      const digest = /digest: (sha256:[\da-f]{64})/.exec(pushed)?.[1]
      if (!digest) {
        throw new ExecutionError(`Unexpected docker push output: ${pushed}`)
      }

      return `${ref}@${digest}`
    } catch (error) {
      if (error instanceof ExecutionError) {
        throw error
      }

      throw new ExecutionError(`Cannot publish ${ref}`, {stderr: stderrOf(error), cause: error})
    }
  }

  private createArgs(name: string, request: Omit<ExecRequest, 'stdin' | 'timeoutMs'>): string[] {
    const args = ['create', '--name', name, '--platform', request.platform, '--label', 'cairn=true', '--workdir', request.workdir]
    if (request.user) {
      args.push('--user', request.user)
    }

    if (request.insecureRootCapabilities) {
      args.push('--privileged')
    }

    for (const [key, value] of Object.entries(request.env)) {
      args.push('--env', `${key}=${value}`)
    }

    args.push(...this.mountArgs(request.mounts), ...this.hostArgs(request.hosts))
    return args
  }

  private mountArgs(mounts: BindMount[]): string[] {
    return mounts.flatMap(mount => [
      '--mount',
      `type=bind,source=${mount.hostPath},target=${mount.containerPath}${mount.readOnly ? ',readonly' : ''}`
    ])
  }

  private hostArgs(hosts: HostAlias[]): string[] {
    return hosts.flatMap(({alias, host}) => ['--add-host', `${alias}:${host}`])
  }

  private async inspectImage(ref: string): Promise<ImageConfig> {
    const {stdout} = await execa('docker', ['image', 'inspect', '--format', '{{json .Config}}', ref], {env: this.env})
    return parseImageConfig(JSON.parse(stdout))
  }

  /**
   * Writes the filesystem of an image into `rootfs` through a created,
   * never started, container.
   */
  private async exportImage(ref: string, platform: Platform, rootfs: string): Promise<void> {
    const name = `cairn-export-${randomUUID()}`
    this.activeContainers.add(name)
    try {
      // The command is never run; it only satisfies images without one
      await execa('docker', ['create', '--platform', platform, '--name', name, ref, 'true'], {env: this.env})
      await this.exportContainer(name, rootfs)
    } finally {
      await this.cleanup(name)
    }
  }

  /**
   * Replaces the contents of `rootfs` with the container's filesystem.
   */
  private async exportContainer(name: string, rootfs: string): Promise<void> {
    await rm(rootfs, {recursive: true, force: true})
    await mkdir(rootfs, {recursive: true})
    const proc = execa('docker', ['export', name], {env: this.env, buffer: false, encoding: 'buffer'})
    await Promise.all([
      pipeline(proc.stdout, tar.extract({cwd: rootfs, preservePaths: false})),
      proc
    ])
  }

  private async importRootfs(rootfs: string): Promise<string> {
    const tag = `cairn-rootfs-${randomUUID()}`
    const proc = execa('docker', ['import', '-', tag], {env: this.env})
    try {
      await Promise.all([
        pipeline(tar.create({cwd: rootfs}, ['.']), proc.stdin),
        proc
      ])
    } catch (error) {
      throw new ExecutionError('docker import failed', {stderr: stderrOf(error), cause: error})
    }

    return tag
  }

  /**
   * Stream stdout/stderr from a subprocess via iterables, keeping the
   * full output.
   */
  private async streamLogs(proc: ReturnType<typeof execa>, onLogLine: OnLogLine): Promise<{stdout: string; stderr: string}> {
    const collect = async (from: 'stdout' | 'stderr') => {
      let output = ''
      for await (const line of proc.iterable({from, preserveNewlines: true})) {
        const text = String(line)
        output += text
        onLogLine({stream: from, line: text.replace(/\r?\n$/, '')})
      }

      return output
    }

    const [stdout, stderr] = await Promise.all([collect('stdout'), collect('stderr')])
    return {stdout, stderr}
  }

  /**
   * Force-remove a container and release tracking.
   */
  private async cleanup(name: string): Promise<void> {
    this.activeContainers.delete(name)
    await execa('docker', ['rm', '-f', '-v', name], {env: this.env, reject: false})
  }
}
