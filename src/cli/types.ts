/**
 * CLI types
 */

import type { OrderMode } from '../dependencies'
import type { ParseMode } from '../schema/parser'

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    /** Cycle handling for `import` and `order` */
    mode?: OrderMode | undefined
    parseMode?: ParseMode | undefined
    /** Config file (JSON or YAML) */
    config?: string | undefined
    json: boolean
    quiet: boolean
    debug: boolean
  }
}
