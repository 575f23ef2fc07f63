import {createHash} from 'node:crypto'
import {appendFile, cp, mkdir, mkdtemp, readdir, readFile, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join, posix} from 'node:path'
import {setTimeout as sleep} from 'node:timers/promises'
import {Engine} from '../engine.js'
import {ContainerTimeoutError} from '../errors.js'
import {ContainerExecutor, type OnLogLine} from '../engine/executor.js'
import type {
  BuildRequest,
  ExecRequest,
  ExecResult,
  RegistryCredential,
  ServiceHandle,
  ServiceRequest
} from '../engine/types.js'
import type {EngineEvent, Reporter} from '../reporter.js'
import type {ImageConfig, Platform} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'cairn-test-'))
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: EngineEvent[]} {
  const events: EngineEvent[] = []
  const reporter: Reporter = {
    emit(event: EngineEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

class ReadOnlyError extends Error {}

/**
 * In-process stand-in for a container runtime. Images are directories
 * holding `/etc/image`; processes are a handful of shell-like commands
 * interpreted directly on the root filesystem and bind mounts:
 *
 * - `touch <path>`, `write <path> <text>`, `append <path> <text>`
 * - `cat <path>`, `ls <path>`, `echo <words...>`, `env`
 * - `sleep <ms>` (bounded by the request timeout), `exit <code>`
 */
export class FakeExecutor extends ContainerExecutor {
  readonly pulls: string[] = []
  readonly execs: string[][] = []
  readonly builds: BuildRequest[] = []
  readonly published: Array<{ref: string; credentials: RegistryCredential[]}> = []
  readonly services: string[] = []
  active = 0
  maxActive = 0
  stopped = 0

  constructor(private readonly images: Record<string, ImageConfig> = {}) {
    super()
  }

  checks = 0

  async check(): Promise<void> {
    this.checks++
  }

  async pull(ref: string, platform: Platform, rootfs: string): Promise<ImageConfig> {
    this.pulls.push(ref)
    await mkdir(join(rootfs, 'etc'), {recursive: true})
    await writeFile(join(rootfs, 'etc', 'image'), `${ref} ${platform}\n`)
    return this.images[ref] ?? {}
  }

  async build(request: BuildRequest): Promise<ImageConfig> {
    this.builds.push(request)
    await cp(request.context, join(request.rootfs, 'src'), {recursive: true})
    return {workdir: '/src'}
  }

  async exec(request: ExecRequest, onLogLine: OnLogLine): Promise<ExecResult> {
    this.execs.push(request.args)
    this.active++
    this.maxActive = Math.max(this.maxActive, this.active)
    const startedAt = new Date()
    try {
      const {exitCode, stdout, stderr} = await this.interpret(request)
      for (const line of stdout.split('\n').filter(Boolean)) {
        onLogLine({stream: 'stdout', line})
      }

      for (const line of stderr.split('\n').filter(Boolean)) {
        onLogLine({stream: 'stderr', line})
      }

      return {exitCode, stdout, stderr, startedAt, finishedAt: new Date()}
    } finally {
      this.active--
    }
  }

  async startService(request: ServiceRequest): Promise<ServiceHandle> {
    this.services.push(request.args.join(' '))
    return {
      host: `10.0.0.${this.services.length}`,
      stop: async () => {
        this.stopped++
      }
    }
  }

  async publish(tarball: string, ref: string, credentials: RegistryCredential[]): Promise<string> {
    this.published.push({ref, credentials})
    const digest = createHash('sha256').update(await readFile(tarball)).digest('hex')
    return `${ref}@sha256:${digest}`
  }

  async killRunningContainers(): Promise<void> {}

  private async interpret(request: ExecRequest): Promise<{exitCode: number; stdout: string; stderr: string}> {
    const [command, ...args] = request.args
    const resolve = (path: string) => this.hostPathOf(request, posix.resolve(request.workdir, path))
    try {
      switch (command) {
        case 'touch': {
          await this.write(resolve(args[0]), '', 'w')
          return {exitCode: 0, stdout: '', stderr: ''}
        }

        case 'write':
        case 'append': {
          await this.write(resolve(args[0]), args.slice(1).join(' '), command === 'write' ? 'w' : 'a')
          return {exitCode: 0, stdout: '', stderr: ''}
        }

        case 'cat': {
          return {exitCode: 0, stdout: await readFile(resolve(args[0]).path, 'utf8'), stderr: ''}
        }

        case 'ls': {
          const entries = (await readdir(resolve(args[0] ?? '.').path)).sort()
          return {exitCode: 0, stdout: entries.map(entry => `${entry}\n`).join(''), stderr: ''}
        }

        case 'echo': {
          return {exitCode: 0, stdout: `${args.join(' ')}\n`, stderr: ''}
        }

        case 'env': {
          const lines = Object.entries(request.env).map(([name, value]) => `${name}=${value}`).sort()
          return {exitCode: 0, stdout: lines.map(line => `${line}\n`).join(''), stderr: ''}
        }

        case 'sleep': {
          const ms = Number(args[0])
          if (request.timeoutMs !== undefined && ms > request.timeoutMs) {
            await sleep(request.timeoutMs)
            throw new ContainerTimeoutError(request.timeoutMs)
          }

          await sleep(ms)
          return {exitCode: 0, stdout: '', stderr: ''}
        }

        case 'exit': {
          return {exitCode: Number(args[0]), stdout: '', stderr: `exit ${args[0]}\n`}
        }

        default: {
          return {exitCode: 127, stdout: '', stderr: `${command}: command not found\n`}
        }
      }
    } catch (error) {
      if (error instanceof ContainerTimeoutError) {
        throw error
      }

      const message = error instanceof ReadOnlyError ? error.message : String(error)
      return {exitCode: 1, stdout: '', stderr: `${message}\n`}
    }
  }

  private async write(target: {path: string; readOnly: boolean}, content: string, mode: 'w' | 'a'): Promise<void> {
    if (target.readOnly) {
      throw new ReadOnlyError('Read-only file system')
    }

    await mkdir(dirname(target.path), {recursive: true})
    await (mode === 'w' ? writeFile(target.path, content) : appendFile(target.path, content))
  }

  /** Host location of a container path: the deepest mount covering it, or the rootfs. */
  private hostPathOf(request: ExecRequest, path: string): {path: string; readOnly: boolean} {
    const mount = request.mounts
      .filter(m => path === m.containerPath || path.startsWith(`${m.containerPath}/`))
      .sort((a, b) => b.containerPath.length - a.containerPath.length)[0]
    if (mount) {
      const rest = path.slice(mount.containerPath.length)
      return {path: rest ? join(mount.hostPath, rest) : mount.hostPath, readOnly: mount.readOnly}
    }

    return {path: join(request.rootfs, path), readOnly: false}
  }
}

/**
 * Opens an engine on a fresh state directory with a fake executor.
 */
export async function openTestEngine(options: {images?: Record<string, ImageConfig>; stateDir?: string; executor?: FakeExecutor} = {}): Promise<{engine: Engine; executor: FakeExecutor; events: EngineEvent[]; stateDir: string}> {
  const stateDir = options.stateDir ?? await createTmpDir()
  const executor = options.executor ?? new FakeExecutor(options.images)
  const {reporter, events} = recordingReporter()
  const engine = await Engine.open({stateDir, executor, reporter, platform: 'linux/amd64'})
  return {engine, executor, events, stateDir}
}
