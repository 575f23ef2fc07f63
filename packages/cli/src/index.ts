#!/usr/bin/env -S node --import tsx
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {CairnError} from '@cairn/core'
import {registerCacheCommand} from './commands/cache.js'
import {registerInspectCommand} from './commands/inspect.js'
import {registerRunCommand} from './commands/run.js'
import {registerVolumeCommand} from './commands/volume.js'

async function main() {
  const program = new Command()

  program
    .name('cairn')
    .description('Content-addressed container pipelines')
    .version('0.1.0')
    .option('--state-dir <path>', 'Engine state directory', process.env.CAIRN_STATE_DIR ?? '.cairn')
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerInspectCommand(program)
  registerCacheCommand(program)
  registerVolumeCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof CairnError) {
    console.error(chalk.red(`${error.name}: ${error.message}`))
  } else {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : error)
  }

  process.exitCode = 1
}
