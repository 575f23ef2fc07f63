import pino from 'pino'
import type {Address, OperationKind, PipelineLabel} from './types.js'

/** Common fields identifying the operation an event is about. */
export type OperationRef = {
  requestId: string;
  address: Address;
  kind: OperationKind;
  pipeline: PipelineLabel[];
}

/**
 * Discriminated union of engine events.
 *
 * Lifecycle of a top-level request (`sync()`, `stdout()`, `export()`, ...):
 * 1. REQUEST_START - Materialization of the requested node begins
 * 2. For each node of its ancestry:
 *    a. OPERATION_CACHED - Artifact reused from the cache
 *       OR OPERATION_STARTED - Computation begins
 *    b. EXEC_LOG - Process output line (WithExec only)
 *       VOLUME_WAITING - Blocked on a LOCKED cache volume
 *    c. OPERATION_FINISHED OR OPERATION_FAILED
 * 3. REQUEST_FINISHED OR REQUEST_FAILED
 *
 * A computation shared by concurrent requests reports once, under the
 * request that started it.
 */
export type RequestStartEvent = {
  event: 'REQUEST_START';
} & OperationRef

export type OperationStartedEvent = {
  event: 'OPERATION_STARTED';
} & OperationRef

export type OperationCachedEvent = {
  event: 'OPERATION_CACHED';
} & OperationRef

export type OperationFinishedEvent = {
  event: 'OPERATION_FINISHED';
  durationMs: number;
  exitCode?: number;
} & OperationRef

export type OperationFailedEvent = {
  event: 'OPERATION_FAILED';
  code: string;
  message: string;
  exitCode?: number;
} & OperationRef

export type ExecLogEvent = {
  event: 'EXEC_LOG';
  stream: 'stdout' | 'stderr';
  line: string;
} & OperationRef

export type VolumeWaitingEvent = {
  event: 'VOLUME_WAITING';
  key: string;
} & OperationRef

export type RequestFinishedEvent = {
  event: 'REQUEST_FINISHED';
  durationMs: number;
} & OperationRef

export type RequestFailedEvent = {
  event: 'REQUEST_FAILED';
  code: string;
  message: string;
} & OperationRef

export type EngineEvent =
  | RequestStartEvent
  | OperationStartedEvent
  | OperationCachedEvent
  | OperationFinishedEvent
  | OperationFailedEvent
  | ExecLogEvent
  | VolumeWaitingEvent
  | RequestFinishedEvent
  | RequestFailedEvent

/**
 * Interface for reporting engine events.
 */
export type Reporter = {
  emit(event: EngineEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(options?: {level?: pino.Level}) {
    this.logger = pino({level: options?.level ?? 'info'})
  }

  emit(event: EngineEvent): void {
    switch (event.event) {
      case 'EXEC_LOG': {
        this.logger.debug(event)
        break
      }

      case 'OPERATION_FAILED':
      case 'REQUEST_FAILED': {
        this.logger.error(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}

/**
 * Reporter that drops every event.
 */
export const silentReporter: Reporter = {
  emit() {}
}
