import {createReadStream, createWriteStream} from 'node:fs'
import {access} from 'node:fs/promises'
import {Readable} from 'node:stream'
import {pipeline} from 'node:stream/promises'
import {address as computeAddress} from './address.js'
import {NotFoundError, ResourceError} from './errors.js'
import {NdjsonDecoder, NdjsonEncoder} from './ndjson.js'
import {
  isAddress,
  isOperationKind,
  type Address,
  type OperationDefinition,
  type OperationNode,
  type PipelineLabel
} from './types.js'

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStoredNode(value: unknown): value is OperationNode {
  if (!isPlainObject(value)) {
    return false
  }

  const {address, kind, parent, params, extraInputs, pipeline} = value
  return typeof address === 'string' && isAddress(address)
    && isOperationKind(kind)
    && (parent === null || (typeof parent === 'string' && isAddress(parent)))
    && isPlainObject(params)
    && Array.isArray(extraInputs) && extraInputs.every(i => typeof i === 'string' && isAddress(i))
    && Array.isArray(pipeline)
}

/**
 * Append-only store of immutable operation nodes keyed by address.
 *
 * Inserts are synchronous and idempotent: re-deriving a node returns the
 * node already stored under its address. When opened on a file, inserted
 * nodes are appended to it as NDJSON on `flush()` and reloaded by the next
 * `open()`; lines whose address does not match their content are ignored.
 */
export class NodeStore {
  /**
   * Opens a store. Without a path the store lives in memory only.
   */
  static async open(path?: string): Promise<NodeStore> {
    const store = new NodeStore(path)
    if (path) {
      await store.load(path)
    }

    return store
  }

  /** Lines of the backing file ignored by the last load. */
  skippedLines = 0

  private readonly nodes = new Map<Address, OperationNode>()
  private pending: OperationNode[] = []
  private flushing: Promise<void> = Promise.resolve()

  private constructor(private readonly path?: string) {}

  get size(): number {
    return this.nodes.size
  }

  has(address: Address): boolean {
    return this.nodes.has(address)
  }

  get(address: Address): OperationNode | undefined {
    return this.nodes.get(address)
  }

  /**
   * Returns the node or throws NotFoundError.
   */
  require(address: Address): OperationNode {
    const node = this.nodes.get(address)
    if (!node) {
      throw new NotFoundError(`Unknown node ${address}`)
    }

    return node
  }

  /**
   * Inserts a node unless one with the same address exists.
   * Parent and extra inputs must already be stored.
   * @returns The stored node (existing or new)
   */
  insert(definition: OperationDefinition, pipeline: PipelineLabel[] = []): OperationNode {
    const address = computeAddress(definition)
    const existing = this.nodes.get(address)
    if (existing) {
      return existing
    }

    for (const dependency of dependenciesOf(definition)) {
      this.require(dependency)
    }

    const node: OperationNode = {...definition, address, pipeline}
    this.nodes.set(address, node)
    if (this.path) {
      this.pending.push(node)
    }

    return node
  }

  /**
   * Lists the transitive dependencies of a node followed by the node itself,
   * every dependency before its dependents.
   */
  ancestry(address: Address): Address[] {
    const order: Address[] = []
    const visited = new Set<Address>()
    const visit = (current: Address) => {
      if (visited.has(current)) {
        return
      }

      visited.add(current)
      for (const dependency of dependenciesOf(this.require(current))) {
        visit(dependency)
      }

      order.push(current)
    }

    visit(address)
    return order
  }

  /**
   * Appends nodes inserted since the last flush to the backing file.
   */
  async flush(): Promise<void> {
    const {path} = this
    if (!path) {
      return
    }

    const write = async () => {
      if (this.pending.length === 0) {
        return
      }

      const batch = this.pending
      this.pending = []
      try {
        await pipeline(Readable.from(batch), new NdjsonEncoder(), createWriteStream(path, {flags: 'a'}))
      } catch (error) {
        this.pending = [...batch, ...this.pending]
        throw new ResourceError(`Failed to persist nodes to ${path}`, {cause: error})
      }
    }

    // Writes are serialized; a failed flush must not block the next one
    this.flushing = this.flushing.then(write, write)
    await this.flushing
  }

  private async load(path: string): Promise<void> {
    try {
      await access(path)
    } catch {
      return
    }

    const decoder = new NdjsonDecoder((value: unknown): value is OperationNode => isStoredNode(value) && computeAddress(value) === value.address)
    await pipeline(createReadStream(path), decoder, async (source: AsyncIterable<OperationNode>) => {
      for await (const node of source) {
        this.nodes.set(node.address, node)
      }
    })
    this.skippedLines = decoder.skipped
  }
}

export function dependenciesOf(definition: OperationDefinition): Address[] {
  return definition.parent ? [definition.parent, ...definition.extraInputs] : [...definition.extraInputs]
}
