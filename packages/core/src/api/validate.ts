import {ValidationError} from '../errors.js'
import {isValidOwner} from '../operations/filesystem.js'
import {isValidPlatform, supportsCompression} from '../operations/image.js'
import {
  cacheSharingModes,
  imageLayerCompressions,
  imageMediaTypes,
  networkProtocols,
  returnTypes,
  type CacheSharingMode,
  type ImageLayerCompression,
  type ImageMediaTypes,
  type NetworkProtocol,
  type ReturnType
} from '../types.js'

function oneOf<T extends string>(values: readonly T[], value: string, what: string): T {
  const match = values.find(v => v === value)
  if (match === undefined) {
    throw new ValidationError(`Invalid ${what} "${value}", expected one of ${values.join(', ')}`)
  }

  return match
}

export function validatePath(path: string, what = 'path'): string {
  if (path.length === 0) {
    throw new ValidationError(`The ${what} must not be empty`)
  }

  if (path.includes('\0')) {
    throw new ValidationError(`The ${what} must not contain NUL characters`)
  }

  return path
}

/**
 * Mount targets: a valid path other than `/`.
 */
export function validateMountPath(path: string): string {
  validatePath(path, 'mount path')
  if (/^\/+$/.test(path)) {
    throw new ValidationError('Cannot mount at /')
  }

  return path
}

export function validateOwner(owner: string | undefined): string | undefined {
  if (owner !== undefined && !isValidOwner(owner)) {
    throw new ValidationError(`Invalid owner "${owner}", expected user[:group]`)
  }

  return owner
}

export function validatePermissions(permissions: number | undefined, what = 'permissions'): number | undefined {
  if (permissions !== undefined && (!Number.isInteger(permissions) || permissions < 0 || permissions > 0o7777)) {
    throw new ValidationError(`Invalid ${what} ${permissions}, expected an octal mode up to 07777`)
  }

  return permissions
}

export function validatePort(port: number): number {
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new ValidationError(`Invalid port ${port}, expected 1 to 65535`)
  }

  return port
}

export function validateTimeout(timeoutMs: number | undefined): number | undefined {
  if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
    throw new ValidationError(`Invalid timeout ${timeoutMs}, expected a positive number of milliseconds`)
  }

  return timeoutMs
}

export function validateProtocol(protocol: string): NetworkProtocol {
  return oneOf(networkProtocols, protocol, 'protocol')
}

export function validateSharing(sharing: string): CacheSharingMode {
  return oneOf(cacheSharingModes, sharing, 'sharing mode')
}

export function validateExpect(expect: string): ReturnType {
  return oneOf(returnTypes, expect, 'expected result')
}

export function validateEnvName(name: string): string {
  if (name.length === 0) {
    throw new ValidationError('Environment variable names must not be empty')
  }

  if (name.includes('=') || name.includes('\0')) {
    throw new ValidationError(`Invalid environment variable name "${name}"`)
  }

  return name
}

export function validateLabelName(name: string): string {
  if (name.length === 0) {
    throw new ValidationError('Label names must not be empty')
  }

  return name
}

export function validateImageRef(ref: string): string {
  if (ref.trim().length === 0) {
    throw new ValidationError('Image references must not be empty')
  }

  if (/\s/.test(ref)) {
    throw new ValidationError(`Invalid image reference "${ref}"`)
  }

  return ref
}

export function validateCacheKey(key: string): string {
  if (key.length === 0) {
    throw new ValidationError('Cache volume keys must not be empty')
  }

  if (key.includes('\0')) {
    throw new ValidationError('Cache volume keys must not contain NUL characters')
  }

  return key
}

export function validatePlatform(platform: string): string {
  if (!isValidPlatform(platform)) {
    throw new ValidationError(`Invalid platform "${platform}", expected os/arch[/variant]`)
  }

  return platform
}

export function validateAlias(alias: string): string {
  if (!/^[a-zA-Z\d]([\w.-]*[a-zA-Z\d])?$/.test(alias)) {
    throw new ValidationError(`Invalid service alias "${alias}"`)
  }

  return alias
}

export function validateExportOptions(compression: string, mediaTypes: string): {compression: ImageLayerCompression; mediaTypes: ImageMediaTypes} {
  const layerCompression = oneOf(imageLayerCompressions, compression, 'layer compression')
  const types = oneOf(imageMediaTypes, mediaTypes, 'media types')
  if (!supportsCompression(types, layerCompression)) {
    throw new ValidationError(`${layerCompression} layers cannot be used with ${types}`)
  }

  return {compression: layerCompression, mediaTypes: types}
}
