import process from 'node:process'
import {mkdir, readFile, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {EngineLockedError, ResourceError, type LockInfo} from '../errors.js'

const lockFileName = 'engine.lock'

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch {
    return false
  }
}

function isLockInfo(value: unknown): value is LockInfo {
  return typeof value === 'object' && value !== null
    && 'pid' in value && typeof value.pid === 'number'
    && 'startedAt' in value && typeof value.startedAt === 'string'
}

/**
 * Exclusive lock on a state directory.
 * At most one engine instance works on a state directory at a time.
 */
export class EngineLock {
  /**
   * Acquires the lock.
   * Throws EngineLockedError if already locked by a live process.
   * Cleans stale locks from dead processes automatically.
   */
  static async acquire(stateDir: string): Promise<EngineLock> {
    const lockPath = join(stateDir, lockFileName)
    const info: LockInfo = {
      pid: process.pid,
      startedAt: new Date().toISOString(),
      version: 1
    }

    await mkdir(stateDir, {recursive: true})
    for (let attempt = 0; attempt < 2; attempt++) {
      const existing = await EngineLock.check(stateDir)
      if (existing) {
        throw new EngineLockedError(stateDir, existing)
      }

      try {
        // `wx` fails when another process created the file since the check
        await writeFile(lockPath, JSON.stringify(info, null, 2), {encoding: 'utf8', flag: 'wx'})
        return new EngineLock(lockPath, info)
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
          throw new ResourceError(`Cannot write ${lockPath}`, {cause: error})
        }
      }
    }

    throw new ResourceError(`Cannot acquire ${lockPath}`)
  }

  /**
   * Checks if a state directory is locked.
   * Returns LockInfo if locked by a live process, undefined otherwise.
   * Cleans up stale locks from dead processes.
   */
  static async check(stateDir: string): Promise<LockInfo | undefined> {
    const lockPath = join(stateDir, lockFileName)

    let content: string
    try {
      content = await readFile(lockPath, 'utf8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined
      }

      throw new ResourceError(`Cannot read ${lockPath}`, {cause: error})
    }

    let info: unknown
    try {
      info = JSON.parse(content)
    } catch {
      info = undefined
    }

    if (!isLockInfo(info) || !isPidAlive(info.pid)) {
      // Malformed or stale
      await rm(lockPath, {force: true})
      return undefined
    }

    return info
  }

  private released = false

  private constructor(
    private readonly lockPath: string,
    readonly info: LockInfo
  ) {}

  async release(): Promise<void> {
    if (this.released) {
      return
    }

    this.released = true
    await rm(this.lockPath, {force: true})
  }
}
