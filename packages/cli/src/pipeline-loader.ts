import {readFile} from 'node:fs/promises'
import {dirname, extname, resolve} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ValidationError, cacheSharingModes, type CacheSharingMode, type Container, type Engine} from '@cairn/core'

export type ExpectedStatus = 'SUCCESS' | 'FAILURE' | 'ANY'

export type CopyDefinition = {
  /** Container path receiving the host directory. */
  path: string;
  /** Host directory, relative to the pipeline file. */
  source: string;
  include?: string[];
  exclude?: string[];
}

export type MountDefinition =
  | {type: 'directory'; path: string; source: string; include?: string[]; exclude?: string[]}
  | {type: 'cache'; path: string; key: string; sharing?: CacheSharingMode}
  | {type: 'secret'; path: string; variable: string}
  | {type: 'temp'; path: string}

export type BuildDefinition = {
  context: string;
  dockerfile?: string;
  target?: string;
  args?: Record<string, string>;
}

export type StepDefinition = {
  id: string;
  name?: string;
  /** Image reference to start from. */
  from?: string;
  build?: BuildDefinition;
  /** Earlier step to continue from (default: the previous step). */
  container?: string;
  workdir?: string;
  user?: string;
  entrypoint?: string[];
  /** Default arguments, the command of a step run as a service. */
  args?: string[];
  ports?: number[];
  env?: Record<string, string>;
  /** Container variable name to the name of the variable holding the secret. */
  secrets?: Record<string, string>;
  copy?: CopyDefinition[];
  mounts?: MountDefinition[];
  /** Alias to the id of an earlier step run as a service. */
  services?: Record<string, string>;
  exec?: string[];
  expect?: ExpectedStatus;
}

export type OutputDefinition =
  | {type: 'directory'; step: string; path: string; to: string}
  | {type: 'file'; step: string; path: string; to: string}
  | {type: 'tarball'; step: string; to: string}
  | {type: 'publish'; step: string; ref: string}
  | {type: 'stdout'; step: string}

export type Pipeline = {
  id: string;
  name?: string;
  /** Directory of the pipeline file, base of relative host paths. */
  root: string;
  steps: StepDefinition[];
  outputs: OutputDefinition[];
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

export function parsePipelineFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  return JSON.parse(content)
}

// -- Field readers -------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ValidationError(`${where} must be an object`)
  }

  return value
}

function readString(value: unknown, where: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${where} must be a non-empty string`)
  }

  return value
}

function optionalString(value: unknown, where: string): string | undefined {
  return value === undefined ? undefined : readString(value, where)
}

function optionalStrings(value: unknown, where: string): string[] | undefined {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ValidationError(`${where} must be an array of strings`)
  }

  return value.map((item, index) => readString(item, `${where}[${index}]`))
}

function optionalMap(value: unknown, where: string): Record<string, string> | undefined {
  if (value === undefined) {
    return undefined
  }

  const map: Record<string, string> = {}
  for (const [key, item] of Object.entries(readRecord(value, where))) {
    if (typeof item !== 'string' && typeof item !== 'number' && typeof item !== 'boolean') {
      throw new ValidationError(`${where}.${key} must be a scalar`)
    }

    map[key] = String(item)
  }

  return map
}

function optionalPorts(value: unknown, where: string): number[] | undefined {
  return optionalList(value, where)?.map((item, index) => {
    if (typeof item !== 'number' || !Number.isInteger(item)) {
      throw new ValidationError(`${where}[${index}] must be a port number`)
    }

    return item
  })
}

function optionalList(value: unknown, where: string): unknown[] | undefined {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ValidationError(`${where} must be an array`)
  }

  return value
}

// -- Definitions -----------------------------------------------------------------

function readMount(value: unknown, where: string): MountDefinition {
  const raw = readRecord(value, where)
  const path = readString(raw.path, `${where}.path`)
  if (raw.source !== undefined) {
    return {
      type: 'directory',
      path,
      source: readString(raw.source, `${where}.source`),
      include: optionalStrings(raw.include, `${where}.include`),
      exclude: optionalStrings(raw.exclude, `${where}.exclude`)
    }
  }

  if (raw.cache !== undefined) {
    return {type: 'cache', path, key: readString(raw.cache, `${where}.cache`), sharing: readSharing(raw.sharing, `${where}.sharing`)}
  }

  if (raw.secret !== undefined) {
    return {type: 'secret', path, variable: readString(raw.secret, `${where}.secret`)}
  }

  if (raw.temp === true) {
    return {type: 'temp', path}
  }

  throw new ValidationError(`${where} needs one of "source", "cache", "secret" or "temp: true"`)
}

function readCopy(value: unknown, where: string): CopyDefinition {
  const raw = readRecord(value, where)
  return {
    path: readString(raw.path, `${where}.path`),
    source: readString(raw.source, `${where}.source`),
    include: optionalStrings(raw.include, `${where}.include`),
    exclude: optionalStrings(raw.exclude, `${where}.exclude`)
  }
}

function readExec(value: unknown, where: string): string[] | undefined {
  if (typeof value === 'string') {
    return ['sh', '-c', value]
  }

  return optionalStrings(value, where)
}

const expectedStatuses = new Set<string>(['SUCCESS', 'FAILURE', 'ANY'])

function isExpectedStatus(value: string): value is ExpectedStatus {
  return expectedStatuses.has(value)
}

function readExpect(value: unknown, where: string): ExpectedStatus | undefined {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string' || !isExpectedStatus(value)) {
    throw new ValidationError(`${where} must be SUCCESS, FAILURE or ANY`)
  }

  return value
}

function readSharing(value: unknown, where: string): CacheSharingMode | undefined {
  if (value === undefined) {
    return undefined
  }

  const mode = cacheSharingModes.find(mode => mode === value)
  if (mode === undefined) {
    throw new ValidationError(`${where} must be one of ${cacheSharingModes.join(', ')}`)
  }

  return mode
}

function readStep(value: unknown, index: number): StepDefinition {
  const where = `steps[${index}]`
  const raw = readRecord(value, where)
  const name = optionalString(raw.name, `${where}.name`)
  const id = optionalString(raw.id, `${where}.id`) ?? (name ? slugify(name) : undefined)
  if (!id) {
    throw new ValidationError(`${where}: at least one of "id" or "name" must be defined`)
  }

  let build: BuildDefinition | undefined
  if (raw.build !== undefined) {
    const rawBuild = readRecord(raw.build, `${where}.build`)
    build = {
      context: readString(rawBuild.context, `${where}.build.context`),
      dockerfile: optionalString(rawBuild.dockerfile, `${where}.build.dockerfile`),
      target: optionalString(rawBuild.target, `${where}.build.target`),
      args: optionalMap(rawBuild.args, `${where}.build.args`)
    }
  }

  const starts = [raw.from, build, raw.container].filter(start => start !== undefined)
  if (starts.length > 1) {
    throw new ValidationError(`Step '${id}': "from", "build" and "container" are mutually exclusive`)
  }

  return {
    id,
    name,
    from: optionalString(raw.from, `${where}.from`),
    build,
    container: optionalString(raw.container, `${where}.container`),
    workdir: optionalString(raw.workdir, `${where}.workdir`),
    user: optionalString(raw.user, `${where}.user`),
    entrypoint: optionalStrings(raw.entrypoint, `${where}.entrypoint`),
    args: optionalStrings(raw.args, `${where}.args`),
    ports: optionalPorts(raw.ports, `${where}.ports`),
    env: optionalMap(raw.env, `${where}.env`),
    secrets: optionalMap(raw.secrets, `${where}.secrets`),
    copy: optionalList(raw.copy, `${where}.copy`)?.map((item, i) => readCopy(item, `${where}.copy[${i}]`)),
    mounts: optionalList(raw.mounts, `${where}.mounts`)?.map((item, i) => readMount(item, `${where}.mounts[${i}]`)),
    services: optionalMap(raw.services, `${where}.services`),
    exec: readExec(raw.exec, `${where}.exec`),
    expect: readExpect(raw.expect, `${where}.expect`)
  }
}

function readOutput(value: unknown, index: number): OutputDefinition {
  const where = `outputs[${index}]`
  const raw = readRecord(value, where)
  const step = readString(raw.step, `${where}.step`)
  if (raw.directory !== undefined) {
    return {type: 'directory', step, path: readString(raw.directory, `${where}.directory`), to: readString(raw.to, `${where}.to`)}
  }

  if (raw.file !== undefined) {
    return {type: 'file', step, path: readString(raw.file, `${where}.file`), to: readString(raw.to, `${where}.to`)}
  }

  if (raw.tarball !== undefined) {
    return {type: 'tarball', step, to: readString(raw.tarball, `${where}.tarball`)}
  }

  if (raw.publish !== undefined) {
    return {type: 'publish', step, ref: readString(raw.publish, `${where}.publish`)}
  }

  if (raw.stdout === true) {
    return {type: 'stdout', step}
  }

  throw new ValidationError(`${where} needs one of "directory", "file", "tarball", "publish" or "stdout: true"`)
}

export class PipelineLoader {
  async load(filePath: string): Promise<Pipeline> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): Pipeline {
    const raw = readRecord(parsePipelineFile(content, filePath), 'Pipeline')
    const name = optionalString(raw.name, 'name')
    const id = optionalString(raw.id, 'id') ?? (name ? slugify(name) : undefined)
    if (!id) {
      throw new ValidationError('Invalid pipeline: at least one of "id" or "name" must be defined')
    }

    const steps = optionalList(raw.steps, 'steps')?.map((step, index) => readStep(step, index)) ?? []
    if (steps.length === 0) {
      throw new ValidationError('Invalid pipeline: steps must be a non-empty array')
    }

    const outputs = optionalList(raw.outputs, 'outputs')?.map((output, index) => readOutput(output, index)) ?? []
    this.validateReferences(steps, outputs)
    return {id, name, root: dirname(resolve(filePath)), steps, outputs}
  }

  /**
   * Steps may only refer to steps defined before them.
   */
  private validateReferences(steps: StepDefinition[], outputs: OutputDefinition[]): void {
    const seen = new Set<string>()
    for (const step of steps) {
      if (seen.has(step.id)) {
        throw new ValidationError(`Duplicate step id: '${step.id}'`)
      }

      const references = [step.container, ...Object.values(step.services ?? {})]
      for (const reference of references) {
        if (reference !== undefined && !seen.has(reference)) {
          throw new ValidationError(`Step '${step.id}' refers to '${reference}', which is not an earlier step`)
        }
      }

      seen.add(step.id)
    }

    for (const output of outputs) {
      if (!seen.has(output.step)) {
        throw new ValidationError(`Output refers to unknown step '${output.step}'`)
      }
    }
  }
}

// -- Composition -----------------------------------------------------------------

function secretValue(env: Record<string, string>, variable: string, stepId: string): string {
  const value = env[variable]
  if (value === undefined) {
    throw new ValidationError(`Step '${stepId}' needs the variable ${variable}, which is not set`)
  }

  return value
}

/**
 * Maps every step onto builder calls. Nothing runs: the returned handles
 * are materialized by the outputs that use them.
 *
 * @param env - Variables that secrets are read from
 */
export async function composePipeline(engine: Engine, pipeline: Pipeline, env: Record<string, string>): Promise<Map<string, Container>> {
  const containers = new Map<string, Container>()
  const host = engine.host()
  let previous: Container | undefined

  for (const step of pipeline.steps) {
    const base = step.from || step.build ? undefined : (step.container ? containers.get(step.container) : previous)
    let container = (base ? engine.loadContainerFromID(base.id()) : engine.container())
      .pipeline(step.id, {description: step.name})

    if (step.from) {
      container = container.from(step.from)
    } else if (step.build) {
      const context = await host.directory(resolve(pipeline.root, step.build.context))
      container = container.build(context, {
        dockerfile: step.build.dockerfile,
        target: step.build.target,
        buildArgs: step.build.args
      })
    }

    for (const [name, value] of Object.entries(step.env ?? {})) {
      container = container.withEnvVariable(name, value)
    }

    for (const [name, variable] of Object.entries(step.secrets ?? {})) {
      container = container.withSecretVariable(name, engine.setSecret(variable, secretValue(env, variable, step.id)))
    }

    if (step.workdir) {
      container = container.withWorkdir(step.workdir)
    }

    if (step.user) {
      container = container.withUser(step.user)
    }

    if (step.entrypoint) {
      container = container.withEntrypoint(step.entrypoint)
    }

    if (step.args) {
      container = container.withDefaultArgs(step.args)
    }

    for (const port of step.ports ?? []) {
      container = container.withExposedPort(port)
    }

    for (const copy of step.copy ?? []) {
      const source = await host.directory(resolve(pipeline.root, copy.source), {include: copy.include, exclude: copy.exclude})
      container = container.withDirectory(copy.path, source)
    }

    for (const mount of step.mounts ?? []) {
      switch (mount.type) {
        case 'directory': {
          const source = await host.directory(resolve(pipeline.root, mount.source), {include: mount.include, exclude: mount.exclude})
          container = container.withMountedDirectory(mount.path, source)
          break
        }

        case 'cache': {
          container = container.withMountedCache(mount.path, engine.cacheVolume(mount.key), {sharing: mount.sharing})
          break
        }

        case 'secret': {
          container = container.withMountedSecret(mount.path, engine.setSecret(mount.variable, secretValue(env, mount.variable, step.id)))
          break
        }

        case 'temp': {
          container = container.withMountedTemp(mount.path)
          break
        }
      }
    }

    for (const [alias, serviceStep] of Object.entries(step.services ?? {})) {
      const service = containers.get(serviceStep)
      if (!service) {
        throw new ValidationError(`Step '${step.id}' binds unknown service step '${serviceStep}'`)
      }

      container = container.withServiceBinding(alias, service.asService())
    }

    if (step.exec) {
      container = container.withExec(step.exec, {expect: step.expect})
    }

    containers.set(step.id, container)
    previous = container
  }

  return containers
}
