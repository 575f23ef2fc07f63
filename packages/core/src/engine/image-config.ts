import type {ExposedPort, ImageConfig} from '../types.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringArray(value: unknown): string[] | undefined {
  return Array.isArray(value) && value.every(v => typeof v === 'string') ? value : undefined
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function parsePorts(value: unknown): ExposedPort[] | undefined {
  if (!isRecord(value)) {
    return undefined
  }

  const ports: ExposedPort[] = []
  for (const spec of Object.keys(value)) {
    const [port, protocol = 'tcp'] = spec.split('/')
    const number = Number(port)
    if (Number.isInteger(number) && number > 0 && number < 65_536) {
      ports.push({port: number, protocol: protocol.toLowerCase() === 'udp' ? 'UDP' : 'TCP'})
    }
  }

  return ports
}

/**
 * Reads the `config` object of an OCI image configuration, which
 * `docker image inspect` also reports as `.Config`.
 * Unknown or malformed fields are left out.
 */
export function parseImageConfig(raw: unknown): ImageConfig {
  if (!isRecord(raw)) {
    return {}
  }

  const labels = isRecord(raw.Labels)
    ? Object.fromEntries(Object.entries(raw.Labels).filter((entry): entry is [string, string] => typeof entry[1] === 'string'))
    : undefined

  return {
    env: stringArray(raw.Env),
    workdir: nonEmptyString(raw.WorkingDir),
    user: nonEmptyString(raw.User),
    entrypoint: stringArray(raw.Entrypoint),
    cmd: stringArray(raw.Cmd),
    labels,
    exposedPorts: parsePorts(raw.ExposedPorts)
  }
}
