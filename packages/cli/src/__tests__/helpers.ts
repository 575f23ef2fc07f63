import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {
  ContainerExecutor,
  Engine,
  type ExecRequest,
  type ExecResult,
  type ImageConfig,
  type ServiceHandle,
  silentReporter
} from '@cairn/core'

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'cairn-cli-test-'))
}

/**
 * Executor whose processes print their arguments and environment.
 */
export class EchoExecutor extends ContainerExecutor {
  readonly requests: ExecRequest[] = []

  async check(): Promise<void> {}

  async pull(): Promise<ImageConfig> {
    return {}
  }

  async build(): Promise<ImageConfig> {
    return {}
  }

  async exec(request: ExecRequest): Promise<ExecResult> {
    this.requests.push(request)
    const env = Object.entries(request.env).map(([name, value]) => `${name}=${value}`).sort()
    return {
      exitCode: 0,
      stdout: [request.args.join(' '), ...env].map(line => `${line}\n`).join(''),
      stderr: '',
      startedAt: new Date(),
      finishedAt: new Date()
    }
  }

  async startService(): Promise<ServiceHandle> {
    return {host: '10.0.0.1', stop: async () => {}}
  }

  async publish(_tarball: string, ref: string): Promise<string> {
    return `${ref}@sha256:${'0'.repeat(64)}`
  }

  async killRunningContainers(): Promise<void> {}
}

export async function openTestEngine(): Promise<{engine: Engine; executor: EchoExecutor}> {
  const executor = new EchoExecutor()
  const engine = await Engine.open({stateDir: await createTmpDir(), executor, reporter: silentReporter, platform: 'linux/amd64'})
  return {engine, executor}
}
