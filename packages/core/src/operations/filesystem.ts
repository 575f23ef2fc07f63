import {
  chmod,
  copyFile,
  cp,
  lchown,
  lstat,
  mkdir,
  readdir,
  readFile,
  readlink,
  rm,
  symlink
} from 'node:fs/promises'
import {createReadStream, type Stats} from 'node:fs'
import {createHash} from 'node:crypto'
import {dirname, join, posix, relative} from 'node:path'
import ignore from 'ignore'
import {NotFoundError, ResourceError, ValidationError} from '../errors.js'

/**
 * Normalizes a container path against a working directory.
 * Relative paths resolve against `workdir`; `..` never climbs above `/`.
 */
export function containerPath(path: string, workdir = '/'): string {
  return posix.resolve('/', workdir, path)
}

/**
 * Host location of a container path under a filesystem root, joined as
 * written. Only for names the engine chose itself; paths that may cross
 * symlinks of the filesystem go through `resolveHostPath`.
 */
export function hostPath(root: string, path: string): string {
  const normalized = containerPath(path)
  return normalized === '/' ? root : join(root, normalized.slice(1))
}

const maxSymlinkHops = 40

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
}

/**
 * Host location of a container path under a filesystem root, following
 * symlinks as a process chrooted at `root` would: absolute link targets
 * restart at `root` and `..` stops there. Components that do not exist
 * yet are kept as written.
 * @param options.followLast - Whether a symlink in the last component is followed (default true)
 */
export async function resolveHostPath(root: string, path: string, options?: {followLast?: boolean}): Promise<string> {
  const normalized = containerPath(path)
  if (options?.followLast === false && normalized !== '/') {
    return join(await resolveHostPath(root, posix.dirname(normalized)), posix.basename(normalized))
  }

  const pending = normalized.split('/').filter(Boolean)
  const resolved: string[] = []
  let exists = true
  let hops = 0
  for (let part = pending.shift(); part !== undefined; part = pending.shift()) {
    if (part === '.') {
      continue
    }

    if (part === '..') {
      resolved.pop()
      continue
    }

    if (!exists) {
      resolved.push(part)
      continue
    }

    const candidate = join(root, ...resolved, part)
    let stats: Stats
    try {
      stats = await lstat(candidate)
    } catch (error) {
      if (!isMissing(error)) {
        throw new ResourceError(`Cannot resolve ${path}`, {cause: error})
      }

      exists = false
      resolved.push(part)
      continue
    }

    if (!stats.isSymbolicLink()) {
      resolved.push(part)
      continue
    }

    hops++
    if (hops > maxSymlinkHops) {
      throw new NotFoundError(`${path}: too many levels of symbolic links`)
    }

    const target = await readlink(candidate)
    if (target.startsWith('/')) {
      resolved.length = 0
    }

    pending.unshift(...target.split('/').filter(Boolean))
  }

  return join(root, ...resolved)
}

/**
 * Whether `path` equals `prefix` or lies below it. Both must be normalized.
 */
export function isWithin(path: string, prefix: string): boolean {
  return prefix === '/' || path === prefix || path.startsWith(`${prefix}/`)
}

/**
 * Path of `path` relative to `prefix`, as a container path (`/` for equal).
 */
export function relativeTo(path: string, prefix: string): string {
  return prefix === '/' ? path : (path.slice(prefix.length) || '/')
}

export type PathFilter = (relativePath: string, isDirectory: boolean) => boolean

/**
 * Builds a filter from gitignore-style include and exclude patterns.
 * With no include pattern every path is included.
 */
export function createPathFilter(include: string[], exclude: string[]): PathFilter {
  const included = include.length > 0 ? ignore().add(include) : undefined
  const excluded = exclude.length > 0 ? ignore().add(exclude) : undefined

  return (relativePath, isDirectory) => {
    const candidate = isDirectory ? `${relativePath}/` : relativePath
    if (excluded?.ignores(candidate)) {
      return false
    }

    // Directories are walked regardless; their files decide what is kept
    return isDirectory || !included || included.ignores(candidate)
  }
}

/**
 * Copies a tree, preserving symlinks as they are.
 */
export async function copyTree(source: string, target: string): Promise<void> {
  await mkdir(dirname(target), {recursive: true})
  await cp(source, target, {recursive: true, verbatimSymlinks: true, force: true, preserveTimestamps: true})
}

/**
 * Copies the entries of `source` accepted by `filter` into `target`,
 * merging with what `target` holds. Directories are created only when
 * something below them is copied, or when no include pattern is set.
 * @returns Number of copied entries
 */
export async function copyFiltered(
  source: string,
  target: string,
  filter: PathFilter,
  keepEmptyDirs: boolean,
  root = target,
  prefix = ''
): Promise<number> {
  let copied = 0
  const entries = await readdir(source, {withFileTypes: true})
  entries.sort((a, b) => (a.name < b.name ? -1 : (a.name > b.name ? 1 : 0)))

  for (const entry of entries) {
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name
    const from = join(source, entry.name)
    // Symlinks already in `target` resolve within `root`; a copied entry replaces a link it lands on
    const to = await resolveHostPath(root, `/${relative(root, join(target, entry.name))}`, {followLast: entry.isDirectory()})

    if (entry.isDirectory()) {
      if (!filter(relativePath, true)) {
        continue
      }

      if (keepEmptyDirs) {
        await mkdir(to, {recursive: true})
      }

      copied += await copyFiltered(from, to, filter, keepEmptyDirs, root, relativePath)
      continue
    }

    if (!filter(relativePath, false)) {
      continue
    }

    await mkdir(dirname(to), {recursive: true})
    await rm(to, {recursive: true, force: true})
    if (entry.isSymbolicLink()) {
      await symlink(await readlink(from), to)
    } else {
      await copyFile(from, to)
      await chmod(to, (await lstat(from)).mode & 0o7777)
    }

    copied++
  }

  return copied
}

/**
 * Content digest of a host tree restricted by a filter: paths, modes,
 * symlink targets and file contents in sorted order.
 */
export async function treeDigest(root: string, filter: PathFilter): Promise<string> {
  const hash = createHash('sha256')
  const walk = async (dir: string, prefix: string) => {
    const entries = await readdir(dir, {withFileTypes: true})
    entries.sort((a, b) => (a.name < b.name ? -1 : (a.name > b.name ? 1 : 0)))
    for (const entry of entries) {
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name
      const path = join(dir, entry.name)
      if (!filter(relativePath, entry.isDirectory())) {
        continue
      }

      const stats = await lstat(path)
      hash.update(`${relativePath}\0${stats.mode}\0`)
      if (entry.isDirectory()) {
        await walk(path, relativePath)
      } else if (entry.isSymbolicLink()) {
        hash.update(await readlink(path))
      } else if (entry.isFile()) {
        for await (const chunk of createReadStream(path)) {
          hash.update(chunk)
        }
      }

      hash.update('\0')
    }
  }

  await walk(root, '')
  return hash.digest('hex')
}

export async function fileDigest(path: string): Promise<string> {
  const hash = createHash('sha256')
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk)
  }

  return hash.digest('hex')
}

/**
 * Ensures a path exists and has the expected type.
 * @throws NotFoundError otherwise
 */
export async function requireEntry(path: string, type: 'file' | 'directory', displayPath: string): Promise<void> {
  let stats: Stats
  try {
    stats = await lstat(path)
  } catch (error) {
    throw new NotFoundError(`${displayPath}: no such ${type}`, {cause: error})
  }

  if (type === 'directory' ? !stats.isDirectory() : !stats.isFile()) {
    throw new NotFoundError(`${displayPath} is not a ${type}`)
  }
}

// -- Ownership ---------------------------------------------------------------

export type Ownership = {
  uid: number;
  gid: number;
}

const ownerPattern = /^[^:\s]+(?::[^:\s]+)?$/

export function isValidOwner(owner: string): boolean {
  return ownerPattern.test(owner)
}

type AccountEntry = {
  name: string;
  id: number;
  primaryGroup?: number;
}

async function readAccounts(path: string): Promise<AccountEntry[]> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch {
    return []
  }

  const accounts: AccountEntry[] = []
  for (const line of content.split('\n')) {
    const fields = line.split(':')
    if (fields.length < 3) {
      continue
    }

    const id = Number(fields[2])
    if (Number.isInteger(id)) {
      const primaryGroup = fields.length >= 4 ? Number(fields[3]) : Number.NaN
      accounts.push({name: fields[0], id, primaryGroup: Number.isInteger(primaryGroup) ? primaryGroup : undefined})
    }
  }

  return accounts
}

/**
 * Resolves `user[:group]` against the `/etc/passwd` and `/etc/group` files
 * of a root filesystem. Numeric ids need no entry. Without a group the
 * user's primary group is used, or the uid when the user has no entry.
 */
export async function resolveOwner(rootfs: string, owner: string): Promise<Ownership> {
  if (!isValidOwner(owner)) {
    throw new ValidationError(`Invalid owner "${owner}", expected user[:group]`)
  }

  const [user, group] = owner.split(':')
  const users = await readAccounts(await resolveHostPath(rootfs, '/etc/passwd'))

  let uid: number
  let primaryGroup: number | undefined
  if (/^\d+$/.test(user)) {
    uid = Number(user)
    primaryGroup = users.find(u => u.id === uid)?.primaryGroup
  } else {
    const entry = users.find(u => u.name === user)
    if (!entry) {
      throw new NotFoundError(`Unknown user "${user}" in /etc/passwd`)
    }

    uid = entry.id
    primaryGroup = entry.primaryGroup
  }

  if (group === undefined) {
    return {uid, gid: primaryGroup ?? uid}
  }

  if (/^\d+$/.test(group)) {
    return {uid, gid: Number(group)}
  }

  const groups = await readAccounts(await resolveHostPath(rootfs, '/etc/group'))
  const entry = groups.find(g => g.name === group)
  if (!entry) {
    throw new NotFoundError(`Unknown group "${group}" in /etc/group`)
  }

  return {uid, gid: entry.id}
}

/**
 * Changes ownership of a path and, for directories, everything below it.
 */
export async function chownTree(path: string, {uid, gid}: Ownership): Promise<void> {
  try {
    await lchown(path, uid, gid)
    const stats = await lstat(path)
    if (stats.isDirectory()) {
      for (const entry of await readdir(path)) {
        await chownTree(join(path, entry), {uid, gid})
      }
    }
  } catch (error) {
    if (error instanceof ResourceError) {
      throw error
    }

    throw new ResourceError(`Cannot change owner of ${path} to ${uid}:${gid}`, {cause: error})
  }
}
