import {ValidationError} from '../errors.js'
import type {ContainerExecutor} from '../engine/executor.js'
import type {NodeStore} from '../node-store.js'
import type {MaterializeOptions} from '../scheduler.js'
import type {SecretStore} from '../secrets.js'
import type {
  Address,
  Artifact,
  OperationNode,
  OperationSpec,
  PipelineLabel,
  Platform,
  SnapshotId
} from '../types.js'

/**
 * What handles need from the engine instance that created them.
 */
export type Session = {
  readonly store: NodeStore;
  readonly secrets: SecretStore;
  readonly executor: ContainerExecutor;
  readonly platform: Platform;
  snapshotPath(id: SnapshotId): string;
  /** Runs a top-level request: materializes `address` and passes it to `fn` while pinned. */
  request<T>(address: Address, fn: (artifact: Artifact) => Promise<T>, options?: MaterializeOptions): Promise<T>;
}

/**
 * Immutable reference to an operation node. Mutations return new handles;
 * nothing runs until a terminal method is awaited.
 */
export abstract class Handle {
  constructor(
    protected readonly session: Session,
    readonly address: Address,
    protected readonly pipelineLabels: PipelineLabel[] = []
  ) {}

  /** Serializable identifier, accepted by the engine's `load*FromID` methods. */
  id(): Address {
    return this.address
  }

  /**
   * Inserts a node whose parent is this handle's node.
   */
  protected derive(spec: OperationSpec, inputs: Handle[] = []): OperationNode {
    for (const input of inputs) {
      if (input.session !== this.session) {
        throw new ValidationError(`${input.address} belongs to another engine instance`)
      }
    }

    return this.session.store.insert({...spec, parent: this.address, extraInputs: inputs.map(input => input.address)}, this.pipelineLabels)
  }

  protected nestedLabels(name: string, options?: {description?: string; labels?: Record<string, string>}): PipelineLabel[] {
    return [...this.pipelineLabels, {name, ...options}]
  }
}

/**
 * Inserts a node without parent (scratch containers and directories,
 * host content, secrets, cache volumes).
 */
export function insertRoot(session: Session, spec: OperationSpec, labels: PipelineLabel[] = []): OperationNode {
  return session.store.insert({...spec, parent: null, extraInputs: []}, labels)
}
