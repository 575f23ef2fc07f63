import {NotFoundError} from '../errors.js'
import {Handle} from './handle.js'

/** Unix socket of the host, mountable into containers. */
export class Socket extends Handle {
  path(): string {
    const node = this.session.store.require(this.address)
    if (node.kind !== 'HostUnixSocket') {
      throw new NotFoundError(`${this.address} is not a socket`)
    }

    return node.params.path
  }
}
