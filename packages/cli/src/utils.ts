import process from 'node:process'
import {stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {Command} from 'commander'
import {Engine, NotFoundError, type Reporter} from '@cairn/core'
import {evictionPolicy, loadConfig, type CairnConfig} from './config.js'

export type GlobalOptions = {
  stateDir: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

/**
 * Opens the engine on the state directory of the global options,
 * with the limits and platform of the project configuration.
 */
export async function openEngine(options: GlobalOptions, config: CairnConfig, reporter?: Reporter): Promise<Engine> {
  return Engine.open({
    stateDir: resolve(options.stateDir),
    platform: config.platform,
    cache: config.cache ? evictionPolicy(config.cache) : undefined,
    reporter
  })
}

/**
 * Runs `fn` on an engine opened with the project configuration, closing it afterwards.
 */
export async function withEngine(options: GlobalOptions, fn: (engine: Engine) => Promise<void>): Promise<void> {
  const engine = await openEngine(options, await loadConfig(process.cwd()))
  try {
    await fn(engine)
  } finally {
    await engine.close()
  }
}

/** File names looked up, in order, when `run` is given a directory. */
export const pipelineFilenames = ['cairn.yml', 'cairn.yaml', 'pipeline.yml', 'pipeline.yaml', 'pipeline.json']

async function statOrUndefined(path: string) {
  try {
    return await stat(path)
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined
    }

    throw error
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/**
 * Resolves a pipeline file path: a file is taken as is, a directory is
 * searched for the first of `pipelineFilenames`.
 */
export async function resolvePipelineFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())
  const stats = await statOrUndefined(target)
  if (!stats) {
    throw new NotFoundError(`Path does not exist: ${target}`)
  }

  if (!stats.isDirectory()) {
    return target
  }

  for (const filename of pipelineFilenames) {
    const candidate = join(target, filename)
    if ((await statOrUndefined(candidate))?.isFile()) {
      return candidate
    }
  }

  throw new NotFoundError(`No pipeline file in ${target} (looked for ${pipelineFilenames.join(', ')})`)
}
