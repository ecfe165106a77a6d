/**
 * Order Command
 *
 * Print the order in which `import` would write a source tree.
 *
 * Usage:
 *   aspectdb order <dir> [--lenient]
 */

import type { ParsedArgs } from '../types'
import { print, printError } from '../utils'
import { prepare } from '../setup'
import { resolveOrder } from '../../dependencies'

export async function orderCommand(parsed: ParsedArgs, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { config, tree } = await prepare(parsed, env)
  const result = resolveOrder(tree.records, { mode: config.importMode })

  if (parsed.options.json) {
    print(JSON.stringify({
      order: result.order,
      unresolved: Object.fromEntries([...result.unresolved].map(([slug, deps]) => [slug, [...deps]])),
    }, null, 2))
  } else {
    for (const slug of result.order) {
      print(slug)
    }
  }

  if (result.unresolved.size > 0) {
    printError(`Unresolved: ${[...result.unresolved.keys()].join(', ')}`)
    return 1
  }
  return 0
}
