import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {formatSize} from '@cairn/core'
import {getGlobalOptions, withEngine} from '../utils.js'

export function registerVolumeCommand(program: Command): void {
  const volume = program
    .command('volume')
    .description('Manage persistent cache volumes')

  volume
    .command('list')
    .alias('ls')
    .description('List cache volumes')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      await withEngine(global, async engine => {
        const volumes = await engine.volumes.list()
        if (global.json) {
          console.log(JSON.stringify(volumes))
          return
        }

        if (volumes.length === 0) {
          console.log(chalk.gray('No cache volumes.'))
          return
        }

        const rows = volumes.map(v => ({...v, sizeFormatted: formatSize(v.size)}))
        const keyWidth = Math.max('KEY'.length, ...rows.map(r => r.key.length))
        const sizeWidth = Math.max('SIZE'.length, ...rows.map(r => r.sizeFormatted.length))
        console.log(chalk.bold(`${'KEY'.padEnd(keyWidth)}  ${'SIZE'.padStart(sizeWidth)}  FORKS  CREATED`))
        for (const row of rows) {
          console.log(`${row.key.padEnd(keyWidth)}  ${row.sizeFormatted.padStart(sizeWidth)}  ${String(row.forks).padStart(5)}  ${row.createdAt}`)
        }
      })
    })

  volume
    .command('rm')
    .description('Delete cache volumes')
    .argument('<keys...>', 'Cache keys')
    .action(async (keys: string[], _options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      await withEngine(global, async engine => {
        for (const key of keys) {
          if (await engine.volumes.remove(key)) {
            console.log(chalk.green(`Removed ${key}`))
          } else {
            console.error(chalk.yellow(`No cache volume ${key}`))
            process.exitCode = 1
          }
        }
      })
    })
}
