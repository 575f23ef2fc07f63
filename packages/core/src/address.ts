import {createHash} from 'node:crypto'
import type {Address, OperationDefinition} from './types.js'

function stableReplacer(_key: string, value: unknown): unknown {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return value
  }

  const entries: Array<[string, unknown]> = Object.entries(value)
  entries.sort((a, b) => (a[0] < b[0] ? -1 : (a[0] > b[0] ? 1 : 0)))
  return Object.fromEntries(entries)
}

/**
 * Canonical JSON: object keys sorted at every depth, array order kept,
 * `undefined` members dropped.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(value, stableReplacer)
}

export function sha256(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex')
}

/**
 * Computes the content address of an operation definition.
 *
 * The address covers the kind, the parameters, the parent address and the
 * extra input addresses in declaration order, so it transitively covers
 * the whole ancestry. Pipeline labels are not part of a definition.
 */
export function address(definition: OperationDefinition): Address {
  const digest = sha256(canonicalize({
    kind: definition.kind,
    params: definition.params,
    parent: definition.parent,
    extraInputs: definition.extraInputs
  }))
  return `sha256:${digest}`
}
