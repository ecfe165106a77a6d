/**
 * Shared command setup: configuration and source loading
 */

import type { ParsedArgs } from './types'
import type { AspectDBConfig, AspectDBConfigInput } from '../config'
import { loadConfigFile, loadConfigFromEnv, resolveConfig } from '../config'
import { configFromSource, loadSourceTree } from '../import/loader'
import type { SourceTree } from '../import/loader'
import { consoleLogger, noopLogger, setLogger } from '../utils/logger'

export interface CommandContext {
  config: AspectDBConfig
  tree: SourceTree
}

/**
 * Resolve configuration (file, then environment, then the tree's domain
 * files, then flags) and load the source tree named by the first argument
 */
export async function prepare(parsed: ParsedArgs, env: NodeJS.ProcessEnv = process.env): Promise<CommandContext> {
  const dir = parsed.args[0]
  if (!dir) {
    throw new Error(`Missing source directory. Usage: aspectdb ${parsed.command} <dir>`)
  }

  const fileConfig = parsed.options.config ? await loadConfigFile(parsed.options.config) : {}
  const envConfig = loadConfigFromEnv(env)
  const flags: AspectDBConfigInput = {}
  if (parsed.options.mode) flags.importMode = parsed.options.mode
  if (parsed.options.parseMode) flags.parseMode = parsed.options.parseMode
  if (parsed.options.debug) flags.debug = true

  const preliminary = resolveConfig(fileConfig, envConfig, flags)
  setLogger(preliminary.debug && !parsed.options.quiet ? consoleLogger : noopLogger)

  const tree = await loadSourceTree(dir, { parseMode: preliminary.parseMode })
  const config = resolveConfig(fileConfig, envConfig, configFromSource(tree), flags)
  return { config, tree }
}
