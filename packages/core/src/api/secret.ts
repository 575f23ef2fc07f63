import {NotFoundError} from '../errors.js'
import {Handle} from './handle.js'

/**
 * Secret set on the engine. Its node records a digest of the plaintext;
 * the plaintext itself stays in memory.
 */
export class Secret extends Handle {
  name(): string {
    const node = this.session.store.require(this.address)
    if (node.kind !== 'SetSecret') {
      throw new NotFoundError(`${this.address} is not a secret`)
    }

    return node.params.name
  }

  async plaintext(): Promise<string> {
    return this.session.secrets.get(this.address)
  }
}
