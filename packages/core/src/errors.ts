/**
 * Where in a pipeline an error happened: the operation that failed,
 * its node address and, when known, the offending argument.
 */
export type OperationContext = {
  kind: string;
  address: string;
  argument?: string;
}

export class CairnError extends Error {
  private context?: OperationContext

  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'CairnError'
  }

  get transient(): boolean {
    return false
  }

  get operation(): OperationContext | undefined {
    return this.context
  }

  /**
   * Attaches the failing operation. The first location wins: dependents
   * rethrow the same error and must not overwrite where it happened.
   */
  locate(context: OperationContext): this {
    if (!this.context) {
      this.context = context
      const where = context.argument ? `${context.kind}(${context.argument})` : context.kind
      this.message = `${where} [${context.address.slice(0, 19)}]: ${this.message}`
    }

    return this
  }
}

// -- Builder errors ----------------------------------------------------------

export class ValidationError extends CairnError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class ConflictError extends CairnError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CONFLICT', message, options)
    this.name = 'ConflictError'
  }
}

export class NotFoundError extends CairnError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('NOT_FOUND', message, options)
    this.name = 'NotFoundError'
  }
}

// -- Execution errors --------------------------------------------------------

export class ExecutionError extends CairnError {
  readonly exitCode?: number
  readonly stderr?: string

  constructor(message: string, options?: {exitCode?: number; stderr?: string; cause?: unknown}) {
    super('EXECUTION_FAILED', message, options)
    this.name = 'ExecutionError'
    this.exitCode = options?.exitCode
    this.stderr = options?.stderr
  }
}

export class ContainerTimeoutError extends ExecutionError {
  constructor(timeoutMs: number, options?: {cause?: unknown}) {
    super(`Container exceeded timeout of ${timeoutMs}ms`, options)
    this.name = 'ContainerTimeoutError'
  }
}

export class CancelledError extends CairnError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CANCELLED', message, options)
    this.name = 'CancelledError'
  }
}

// -- Resource errors ---------------------------------------------------------

export class ResourceError extends CairnError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('RESOURCE_ERROR', message, options)
    this.name = 'ResourceError'
  }
}

export class DockerNotAvailableError extends ResourceError {
  constructor(options?: {cause?: unknown}) {
    super('Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

export class ImagePullError extends ResourceError {
  constructor(image: string, options?: {cause?: unknown}) {
    super(`Failed to pull image "${image}"`, options)
    this.name = 'ImagePullError'
  }

  override get transient(): boolean {
    return true
  }
}

export type LockInfo = {
  pid: number;
  startedAt: string;
  version: number;
}

export class EngineLockedError extends ResourceError {
  constructor(
    readonly stateDir: string,
    readonly lockInfo: LockInfo,
    options?: {cause?: unknown}
  ) {
    super(`State directory ${stateDir} is in use by process ${lockInfo.pid} (since ${lockInfo.startedAt})`, options)
    this.name = 'EngineLockedError'
  }
}
