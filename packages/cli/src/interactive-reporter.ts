import process from 'node:process'
import {createLogUpdate} from 'log-update'
import chalk from 'chalk'
import {
  formatDuration,
  type EngineEvent,
  type OperationFailedEvent,
  type OperationFinishedEvent,
  type OperationRef,
  type Reporter
} from '@cairn/core'

type GroupStatus = 'running' | 'done' | 'failed'

/** Operations reported under one pipeline label (a step). */
type GroupDisplayState = {
  name: string;
  running: number;
  computed: number;
  cached: number;
  failed?: string;
  durationMs: number;
  waiting?: string;
}

const spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

const ungrouped = '(engine)'

function groupName(ref: OperationRef): string {
  return ref.pipeline.at(-1)?.name ?? ungrouped
}

/**
 * Reporter with interactive terminal UI using log-update, one line per
 * pipeline step. Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly logUpdate = createLogUpdate(process.stderr)
  private readonly groups = new Map<string, GroupDisplayState>()
  private readonly stderrBuffers = new Map<string, string[]>()
  private requests = 0
  private frame = 0
  private timer: ReturnType<typeof setInterval> | undefined

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: EngineEvent): void {
    switch (event.event) {
      case 'REQUEST_START': {
        this.requests++
        this.startRendering()
        break
      }

      case 'OPERATION_STARTED': {
        const group = this.group(event)
        group.running++
        group.waiting = undefined
        break
      }

      case 'OPERATION_CACHED': {
        this.group(event).cached++
        break
      }

      case 'OPERATION_FINISHED': {
        this.handleFinished(event)
        break
      }

      case 'OPERATION_FAILED': {
        this.handleFailed(event)
        break
      }

      case 'VOLUME_WAITING': {
        this.group(event).waiting = event.key
        break
      }

      case 'EXEC_LOG': {
        this.handleLog(groupName(event), event.stream, event.line)
        break
      }

      case 'REQUEST_FINISHED':
      case 'REQUEST_FAILED': {
        this.requests--
        if (this.requests === 0) {
          this.stopRendering()
        }

        if (event.event === 'REQUEST_FAILED') {
          this.printFailedStderr()
          console.error(chalk.bold.red(`\n✗ ${event.message}\n`))
        }

        break
      }
    }
  }

  private group(ref: OperationRef): GroupDisplayState {
    const name = groupName(ref)
    let group = this.groups.get(name)
    if (!group) {
      group = {name, running: 0, computed: 0, cached: 0, durationMs: 0}
      this.groups.set(name, group)
    }

    return group
  }

  private statusOf(group: GroupDisplayState): GroupStatus {
    if (group.failed !== undefined) {
      return 'failed'
    }

    return group.running > 0 ? 'running' : 'done'
  }

  private render(): void {
    const lines: string[] = []
    for (const group of this.groups.values()) {
      lines.push(`  ${this.symbolFor(group)} ${this.textFor(group)}`)
    }

    this.logUpdate(lines.join('\n'))
    this.frame++
  }

  private symbolFor(group: GroupDisplayState): string {
    switch (this.statusOf(group)) {
      case 'running': {
        return chalk.cyan(spinnerFrames[this.frame % spinnerFrames.length])
      }

      case 'done': {
        return group.computed === 0 ? chalk.gray('⊙') : chalk.green('✓')
      }

      case 'failed': {
        return chalk.red('✗')
      }
    }
  }

  private textFor(group: GroupDisplayState): string {
    switch (this.statusOf(group)) {
      case 'running': {
        return group.waiting ? `${group.name} ${chalk.yellow(`(waiting for cache ${group.waiting})`)}` : group.name
      }

      case 'done': {
        const details: string[] = []
        if (group.computed > 0) {
          details.push(formatDuration(group.durationMs))
        }

        if (group.cached > 0) {
          details.push(`${group.cached} cached`)
        }

        const text = details.length > 0 ? `${group.name} (${details.join(', ')})` : group.name
        return group.computed === 0 ? chalk.gray(text) : chalk.green(text)
      }

      case 'failed': {
        return chalk.red(`${group.name} (${group.failed ?? 'failed'})`)
      }
    }
  }

  private startRendering(): void {
    if (!this.timer) {
      this.render()
      this.timer = setInterval(() => {
        this.render()
      }, 80)
    }
  }

  private stopRendering(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }

    this.render()
    this.logUpdate.done()
  }

  private handleFinished(event: OperationFinishedEvent): void {
    const group = this.group(event)
    group.running = Math.max(0, group.running - 1)
    group.computed++
    group.durationMs += event.durationMs
    if (event.kind === 'WithExec') {
      this.stderrBuffers.delete(group.name)
    }
  }

  private handleFailed(event: OperationFailedEvent): void {
    const group = this.group(event)
    group.running = Math.max(0, group.running - 1)
    group.failed = event.exitCode === undefined ? event.code : `exit ${event.exitCode}`
  }

  private handleLog(name: string, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      const prefix = chalk.gray(`  [${name}]`)
      this.logUpdate.clear()
      console.error(`${prefix} ${line}`)
      this.render()
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(name)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(name, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private printFailedStderr(): void {
    for (const [name, group] of this.groups) {
      if (group.failed !== undefined) {
        const stderr = this.stderrBuffers.get(name)
        if (stderr?.length) {
          console.error(chalk.red(`  ── ${name} stderr ──`))
          for (const line of stderr) {
            console.error(chalk.red(`  ${line}`))
          }
        }
      }
    }
  }
}
