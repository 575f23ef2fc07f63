import {resolve} from 'node:path'
import {hostDirectoryDigest, hostFileDigest} from '../operations/directory-ops.js'
import {Directory, type DirectoryCopyOptions} from './directory.js'
import {File} from './file.js'
import {insertRoot, type Session} from './handle.js'
import {Socket} from './socket.js'
import {validatePath} from './validate.js'

/**
 * Content of the machine running the engine. Directories and files are
 * digested when loaded: their nodes change address when the content does.
 */
export class Host {
  constructor(private readonly session: Session) {}

  async directory(path: string, options: DirectoryCopyOptions = {}): Promise<Directory> {
    const source = resolve(validatePath(path))
    const include = options.include ?? []
    const exclude = options.exclude ?? []
    const digest = await hostDirectoryDigest(source, include, exclude)
    const node = insertRoot(this.session, {kind: 'HostDirectory', params: {path: source, include, exclude, digest}})
    return new Directory(this.session, node.address)
  }

  async file(path: string): Promise<File> {
    const source = resolve(validatePath(path))
    const digest = await hostFileDigest(source)
    const node = insertRoot(this.session, {kind: 'HostFile', params: {path: source, digest}})
    return new File(this.session, node.address)
  }

  unixSocket(path: string): Socket {
    const node = insertRoot(this.session, {kind: 'HostUnixSocket', params: {path: resolve(validatePath(path))}})
    return new Socket(this.session, node.address)
  }
}
