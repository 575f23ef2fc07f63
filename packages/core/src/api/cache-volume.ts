import {NotFoundError} from '../errors.js'
import {Handle} from './handle.js'

/**
 * Named persistent volume. Its contents live outside the content-addressed
 * graph: only the key is part of the addresses of containers mounting it.
 */
export class CacheVolume extends Handle {
  key(): string {
    const node = this.session.store.require(this.address)
    if (node.kind !== 'CacheVolume') {
      throw new NotFoundError(`${this.address} is not a cache volume`)
    }

    return node.params.key
  }
}
