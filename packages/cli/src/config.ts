import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError, parseDuration, parseSize, type EvictionPolicy} from '@cairn/core'

/**
 * Project-level settings read from `.cairn.yml`.
 */
export type CairnConfig = {
  /** Platform of new containers, e.g. `linux/arm64`. */
  platform?: string;
  cache?: {
    /** Size limit of the artifact cache, e.g. `10GB`. */
    maxSize?: string;
    /** Unused artifacts older than this are evicted, e.g. `7d`. */
    maxAge?: string;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ValidationError(`.cairn.yml: ${field} must be a string`)
  }

  return String(value)
}

/**
 * Loads the project-level `.cairn.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<CairnConfig> {
  let content: string
  try {
    content = await readFile(join(dir, '.cairn.yml'), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (!isRecord(parsed)) {
    throw new ValidationError('.cairn.yml must contain a mapping')
  }

  const config: CairnConfig = {}
  const platform = optionalString(parsed.platform, 'platform')
  if (platform !== undefined) {
    config.platform = platform
  }

  if (parsed.cache !== undefined && parsed.cache !== null) {
    if (!isRecord(parsed.cache)) {
      throw new ValidationError('.cairn.yml: cache must be a mapping')
    }

    config.cache = {
      maxSize: optionalString(parsed.cache.maxSize, 'cache.maxSize'),
      maxAge: optionalString(parsed.cache.maxAge, 'cache.maxAge')
    }
  }

  return config
}

/**
 * Converts size and age strings into an eviction policy.
 * @throws ValidationError when a value does not parse
 */
export function evictionPolicy(limits: {maxSize?: string; maxAge?: string}): Omit<EvictionPolicy, 'now'> {
  const policy: Omit<EvictionPolicy, 'now'> = {}
  if (limits.maxSize !== undefined) {
    const bytes = parseSize(limits.maxSize)
    if (bytes === undefined) {
      throw new ValidationError(`Invalid size "${limits.maxSize}", expected e.g. 500MB or 2GB`)
    }

    policy.maxBytes = bytes
  }

  if (limits.maxAge !== undefined) {
    const ms = parseDuration(limits.maxAge)
    if (ms === undefined) {
      throw new ValidationError(`Invalid duration "${limits.maxAge}", expected e.g. 12h or 7d`)
    }

    policy.maxAgeMs = ms
  }

  return policy
}
