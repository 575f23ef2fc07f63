import chalk from 'chalk'
import type {Command} from 'commander'
import {formatSize} from '@cairn/core'
import {evictionPolicy} from '../config.js'
import {getGlobalOptions, withEngine} from '../utils.js'

export function registerCacheCommand(program: Command): void {
  const cache = program
    .command('cache')
    .description('Manage the artifact cache')

  cache
    .command('list')
    .alias('ls')
    .description('List cached artifacts, least recently used first')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      await withEngine(global, async engine => {
        const entries = engine.cache.list()
        if (global.json) {
          console.log(JSON.stringify({entries, stats: engine.cache.stats()}))
          return
        }

        if (entries.length === 0) {
          console.log(chalk.gray('Cache is empty.'))
          return
        }

        console.log(chalk.bold(`${'ID'.padEnd(19)}  ${'KIND'.padEnd(24)}  TYPE       LAST USED`))
        for (const entry of entries) {
          const kind = engine.store.get(entry.address)?.kind ?? '?'
          console.log(`${entry.address.slice(0, 19)}  ${kind.padEnd(24)}  ${entry.artifact.type.padEnd(9)}  ${new Date(entry.lastUsedAt).toISOString()}`)
        }

        const stats = engine.cache.stats()
        console.log(chalk.gray(`\n${stats.artifacts} artifacts, ${stats.snapshots} snapshots, ${formatSize(stats.bytes)}`))
      })
    })

  cache
    .command('prune')
    .description('Evict least recently used artifacts and unreferenced snapshots')
    .option('--max-size <size>', 'Keep the cache under this size (e.g. 10GB)')
    .option('--max-age <duration>', 'Evict artifacts unused for longer than this (e.g. 7d)')
    .action(async (options: {maxSize?: string; maxAge?: string}, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      const policy = evictionPolicy(options)
      await withEngine(global, async engine => {
        const result = await engine.prune(policy)
        if (global.json) {
          console.log(JSON.stringify(result))
          return
        }

        if (result.artifacts === 0 && result.snapshots === 0) {
          console.log(chalk.gray('Nothing to remove.'))
        } else {
          console.log(chalk.green(`Removed ${result.artifacts} artifact${result.artifacts === 1 ? '' : 's'} and ${result.snapshots} snapshot${result.snapshots === 1 ? '' : 's'} (${formatSize(result.freedBytes)}).`))
        }
      })
    })
}
