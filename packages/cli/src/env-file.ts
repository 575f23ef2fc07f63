import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'

export async function loadEnvFile(filePath: string): Promise<Record<string, string>> {
  const content = await readFile(filePath, 'utf8')
  return parse(content)
}

/**
 * Variables visible to a pipeline: the process environment, overridden by
 * the dotenv file when one is given.
 */
export async function pipelineEnv(envFile?: string): Promise<Record<string, string>> {
  const env: Record<string, string> = {}
  for (const [name, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[name] = value
    }
  }

  return envFile ? {...env, ...await loadEnvFile(envFile)} : env
}
