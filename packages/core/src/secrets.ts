import {NotFoundError} from './errors.js'
import type {Address} from './types.js'

/**
 * Plaintext of the secrets set on an engine instance, keyed by the address
 * of their SetSecret node. Held in memory only: after a restart the nodes
 * remain but their plaintext has to be set again.
 */
export class SecretStore {
  private readonly values = new Map<Address, string>()

  set(address: Address, plaintext: string): void {
    this.values.set(address, plaintext)
  }

  has(address: Address): boolean {
    return this.values.has(address)
  }

  get(address: Address): string {
    const value = this.values.get(address)
    if (value === undefined) {
      throw new NotFoundError(`Secret ${address} has no plaintext in this engine instance`)
    }

    return value
  }
}
