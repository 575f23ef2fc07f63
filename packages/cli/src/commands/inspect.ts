import chalk from 'chalk'
import type {Command} from 'commander'
import type {OperationNode} from '@cairn/core'
import {getGlobalOptions, withEngine} from '../utils.js'

function shortAddress(address: string): string {
  return address.slice(0, 19)
}

function describeNode(node: OperationNode, cached: boolean): string {
  const params = JSON.stringify(node.params)
  const labels = node.pipeline.map(label => label.name).join(' › ')
  const parts = [
    chalk.cyan(shortAddress(node.address)),
    chalk.bold(node.kind),
    params === '{}' ? '' : chalk.gray(params.length > 80 ? `${params.slice(0, 77)}...` : params),
    labels ? chalk.magenta(`[${labels}]`) : '',
    cached ? chalk.green('cached') : ''
  ]
  return parts.filter(Boolean).join(' ')
}

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show the operation chain of a node, dependencies first')
    .argument('<id>', 'Node id (sha256:...)')
    .action(async (id: string, _options: Record<string, unknown>, cmd: Command) => {
      const global = getGlobalOptions(cmd)
      await withEngine(global, async engine => {
        const nodes = engine.ancestry(id)
        if (global.json) {
          console.log(JSON.stringify(nodes.map(node => ({...node, cached: engine.cache.has(node.address)}))))
          return
        }

        for (const node of nodes) {
          console.log(describeNode(node, engine.cache.has(node.address)))
        }
      })
    })
}
