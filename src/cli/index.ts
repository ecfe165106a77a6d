#!/usr/bin/env node
/**
 * aspectdb CLI
 *
 * Commands:
 *   import          Import a source tree in dependency order
 *   order           Print the import order of a source tree
 *
 * Usage:
 *   aspectdb import <dir> [options]
 *   aspectdb order <dir> [options]
 */

import { importCommand } from './commands/import'
import { orderCommand } from './commands/order'
import type { ParsedArgs } from './types'
import { print, printError } from './utils'
import { CLI_NAME, VERSION } from '../constants'

export type { ParsedArgs } from './types'
export { print, printError, printSuccess } from './utils'

// =============================================================================
// Constants
// =============================================================================

const HELP_TEXT = `
${CLI_NAME} v${VERSION}

Import versioned, multi-language documents from a source tree.

USAGE:
  ${CLI_NAME} <command> [options]

COMMANDS:
  import <dir>                  Import every domain under <dir>
  order <dir>                   Print the order documents would be imported in

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  -c, --config <file>           Config file (JSON or YAML)
  --strict                      Abort on dependency cycles (default)
  --lenient                     Skip documents caught in dependency cycles
  --permissive                  Accept unknown keys in aspect definitions
  --json                        Print a JSON report
  -q, --quiet                   Only print errors and the final line
  --debug                       Log to the console

EXAMPLES:
  # Import a source tree
  ${CLI_NAME} import ./data

  # See the import order, ignoring cycles
  ${CLI_NAME} order ./data --lenient
`

// =============================================================================
// Argument Parser
// =============================================================================

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      json: false,
      quiet: false,
      debug: false,
    },
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    if (arg.startsWith('-')) {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '-c':
        case '--config': {
          const file = argv[++i]
          if (!file) {
            throw new Error(`${arg} needs a file`)
          }
          result.options.config = file
          break
        }
        case '--strict':
          result.options.mode = 'strict'
          break
        case '--lenient':
          result.options.mode = 'lenient'
          break
        case '--permissive':
          result.options.parseMode = 'permissive'
          break
        case '--json':
          result.options.json = true
          break
        case '-q':
        case '--quiet':
          result.options.quiet = true
          break
        case '--debug':
          result.options.debug = true
          break
        default:
          throw new Error(`Unknown option: ${arg}`)
      }
    } else if (!result.command) {
      result.command = arg
    } else {
      result.args.push(arg)
    }
    i++
  }

  return result
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Main CLI entry point
 *
 * @returns process exit code
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const parsed = parseArgs(argv)

    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    if (parsed.options.version) {
      print(`${CLI_NAME} v${VERSION}`)
      return 0
    }

    if (!parsed.command) {
      print(HELP_TEXT)
      return 0
    }

    switch (parsed.command) {
      case 'import':
        return await importCommand(parsed, env)
      case 'order':
        return await orderCommand(parsed, env)
      case 'help':
        print(HELP_TEXT)
        return 0
      default:
        printError(`Unknown command: ${parsed.command}`)
        print(`\nRun "${CLI_NAME} --help" for usage.`)
        return 1
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}

// Run when executed as the package binary
if (process.argv[1]?.endsWith('/cli/index.js') || process.argv[1]?.endsWith('aspectdb')) {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      printError(String(error))
      process.exit(1)
    }
  )
}
