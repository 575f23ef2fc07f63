import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {ConsoleReporter, type Container, type MaterializeOptions} from '@cairn/core'
import {InteractiveReporter} from '../interactive-reporter.js'
import {loadConfig} from '../config.js'
import {pipelineEnv} from '../env-file.js'
import {composePipeline, PipelineLoader, type OutputDefinition, type Pipeline} from '../pipeline-loader.js'
import {getGlobalOptions, openEngine, resolvePipelineFile} from '../utils.js'

/**
 * Materializes one output.
 * @returns A line describing what was produced
 */
async function produce(output: OutputDefinition, container: Container, pipeline: Pipeline, options: MaterializeOptions): Promise<string> {
  switch (output.type) {
    case 'directory': {
      const target = resolve(pipeline.root, output.to)
      await container.directory(output.path).export(target, options)
      return `${output.step}:${output.path} → ${target}`
    }

    case 'file': {
      const target = resolve(pipeline.root, output.to)
      await container.file(output.path).export(target, options)
      return `${output.step}:${output.path} → ${target}`
    }

    case 'tarball': {
      const target = resolve(pipeline.root, output.to)
      await container.export(target, options)
      return `${output.step} → ${target}`
    }

    case 'publish': {
      const ref = await container.publish(output.ref, options)
      return `${output.step} → ${ref}`
    }

    case 'stdout': {
      return container.stdout(options)
    }
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute a pipeline')
    .argument('[pipeline]', 'Pipeline file or directory (default: current directory)')
    .option('--verbose', 'Stream container logs in real-time (interactive mode)')
    .option('--env-file <path>', 'Load secret variables from a dotenv file')
    .option('--timeout <seconds>', 'Cancel the run after this many seconds', Number)
    .action(async (pipelineArg: string | undefined, options: {verbose?: boolean; envFile?: string; timeout?: number}, cmd: Command) => {
      const pipelineFile = await resolvePipelineFile(pipelineArg)
      const global = getGlobalOptions(cmd)
      const config = await loadConfig(process.cwd())
      const reporter = global.json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const pipeline = await new PipelineLoader().load(pipelineFile)
      const env = await pipelineEnv(options.envFile)

      const engine = await openEngine(global, config, reporter)
      const controller = new AbortController()
      const onSignal = (signal: NodeJS.Signals) => {
        controller.abort()
        void (async () => {
          await engine.executor.killRunningContainers()
          process.kill(process.pid, signal)
        })()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const containers = await composePipeline(engine, pipeline, env)
        const requestOptions: MaterializeOptions = {
          signal: controller.signal,
          timeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000
        }

        const results = await Promise.all(pipeline.outputs.map(async output => {
          const container = containers.get(output.step)
          if (!container) {
            throw new Error(`Unknown step ${output.step}`)
          }

          return produce(output, container, pipeline, requestOptions)
        }))

        // Without outputs, the last step is materialized and its id printed
        const last = pipeline.steps.at(-1)
        const lastContainer = last ? containers.get(last.id) : undefined
        if (results.length === 0 && last && lastContainer) {
          results.push(`${last.id} → ${await lastContainer.sync(requestOptions)}`)
        }

        if (global.json) {
          console.log(JSON.stringify({pipeline: pipeline.id, outputs: results}))
        } else {
          for (const result of results) {
            process.stdout.write(result.endsWith('\n') ? result : `${result}\n`)
          }

          console.error(chalk.bold.green(`\n✓ Pipeline ${pipeline.name ?? pipeline.id} completed\n`))
        }
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
        await engine.close()
      }
    })
}
