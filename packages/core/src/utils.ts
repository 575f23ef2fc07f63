import type {Dirent} from 'node:fs'
import {lstat, readdir} from 'node:fs/promises'
import {join} from 'node:path'

/**
 * Total size of the regular files below a directory, symlinks not followed.
 * A missing directory weighs 0 bytes.
 */
export async function dirSize(dirPath: string): Promise<number> {
  let entries: Dirent[]
  try {
    entries = await readdir(dirPath, {withFileTypes: true})
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return 0
    }

    throw error
  }

  let total = 0
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name)
    if (entry.isDirectory()) {
      total += await dirSize(fullPath)
    } else if (entry.isFile()) {
      total += (await lstat(fullPath)).size
    }
  }

  return total
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`
  }

  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  }

  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

const sizeUnits: Record<string, number> = {
  b: 1,
  kb: 1024,
  mb: 1024 ** 2,
  gb: 1024 ** 3,
  tb: 1024 ** 4
}

/**
 * Parses sizes such as `512`, `200MB` or `1.5 GB` into bytes.
 * @returns Bytes, or undefined when the input is not a size
 */
export function parseSize(input: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)\s*([kmgt]?b)?$/i.exec(input.trim())
  if (!match) {
    return undefined
  }

  const unit = sizeUnits[(match[2] ?? 'b').toLowerCase()]
  return unit === undefined ? undefined : Math.round(Number(match[1]) * unit)
}

const durationUnits: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000
}

/**
 * Parses durations such as `500ms`, `30s`, `12h` or `7d` into milliseconds.
 * @returns Milliseconds, or undefined when the input is not a duration
 */
export function parseDuration(input: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i.exec(input.trim())
  if (!match) {
    return undefined
  }

  const unit = durationUnits[match[2].toLowerCase()]
  return unit === undefined ? undefined : Math.round(Number(match[1]) * unit)
}
