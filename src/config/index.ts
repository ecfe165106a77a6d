/**
 * Configuration
 *
 * Configuration is a plain value passed to the components that need it.
 * It can be written in code with {@link defineConfig}, read from the
 * environment with {@link loadConfigFromEnv}, or read from a JSON/YAML file
 * with {@link loadConfigFile}; {@link resolveConfig} fills in defaults.
 *
 * Environment variables:
 * - ASPECTDB_DEFAULT_LANGUAGE
 * - ASPECTDB_PARSE_MODE (`strict` | `permissive`)
 * - ASPECTDB_IMPORT_MODE (`strict` | `lenient`)
 * - ASPECTDB_DEBUG (`1` / `true`)
 *
 * @module config
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import * as yaml from 'yaml'
import { z } from 'zod'
import { DEFAULT_LANGUAGE } from '../constants'
import { ConfigurationError } from '../errors'
import type { ParseMode } from '../schema/parser'
import type { OrderMode } from '../dependencies'

// =============================================================================
// Types
// =============================================================================

export interface DomainConfig {
  /** Language every overlay of the domain falls back to */
  defaultLanguage: string
}

export interface AspectDBConfig {
  /** Default language of domains that do not name one */
  defaultLanguage: string
  /** Per-domain settings */
  domains: Record<string, DomainConfig>
  /** How unknown keys in aspect trees are treated */
  parseMode: ParseMode
  /** How reference cycles in a batch import are treated */
  importMode: OrderMode
  /** Log to the console */
  debug: boolean
}

/**
 * What a config file or `defineConfig` call may contain
 */
export type AspectDBConfigInput = {
  defaultLanguage?: string | undefined
  domains?: Record<string, Partial<DomainConfig>> | undefined
  parseMode?: ParseMode | undefined
  importMode?: OrderMode | undefined
  debug?: boolean | undefined
}

// =============================================================================
// Validation
// =============================================================================

const languageSchema = z.string().min(2)

const configSchema = z.object({
  defaultLanguage: languageSchema.optional(),
  domains: z.record(z.object({ defaultLanguage: languageSchema.optional() })).optional(),
  parseMode: z.enum(['strict', 'permissive']).optional(),
  importMode: z.enum(['strict', 'lenient']).optional(),
  debug: z.boolean().optional(),
}).strict()

function validate(input: unknown, source: string): AspectDBConfigInput {
  const result = configSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const key = issue ? issue.path.join('.') : undefined
    throw new ConfigurationError(
      `Invalid configuration in ${source}${issue ? `: ${key || '<root>'}: ${issue.message}` : ''}`,
      { configKey: key }
    )
  }
  return result.data
}

// =============================================================================
// Building Configs
// =============================================================================

/**
 * Type helper for configuration written in code
 *
 * @example
 * ```typescript
 * export default defineConfig({
 *   defaultLanguage: 'en',
 *   domains: { birds: { defaultLanguage: 'fr' } },
 * })
 * ```
 */
export function defineConfig(config: AspectDBConfigInput): AspectDBConfigInput {
  return config
}

/**
 * Merge partial configs (later ones win) over the defaults
 */
export function resolveConfig(...inputs: AspectDBConfigInput[]): AspectDBConfig {
  const config: AspectDBConfig = {
    defaultLanguage: DEFAULT_LANGUAGE,
    domains: {},
    parseMode: 'strict',
    importMode: 'strict',
    debug: false,
  }

  for (const input of inputs) {
    const checked = validate(input, 'configuration')
    if (checked.defaultLanguage !== undefined) config.defaultLanguage = checked.defaultLanguage
    if (checked.parseMode !== undefined) config.parseMode = checked.parseMode
    if (checked.importMode !== undefined) config.importMode = checked.importMode
    if (checked.debug !== undefined) config.debug = checked.debug
    for (const [domain, settings] of Object.entries(checked.domains ?? {})) {
      const language = settings.defaultLanguage ?? config.domains[domain]?.defaultLanguage
      if (language !== undefined) {
        config.domains[domain] = { defaultLanguage: language }
      }
    }
  }

  return config
}

/**
 * Default language of a domain, falling back to the global default
 */
export function domainDefaultLanguage(config: AspectDBConfig, domain: string): string {
  return config.domains[domain]?.defaultLanguage ?? config.defaultLanguage
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Read the ASPECTDB_* variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AspectDBConfigInput {
  const input: AspectDBConfigInput = {}

  const language = env.ASPECTDB_DEFAULT_LANGUAGE
  if (language) input.defaultLanguage = language

  const parseMode = env.ASPECTDB_PARSE_MODE
  if (parseMode) {
    if (parseMode !== 'strict' && parseMode !== 'permissive') {
      throw new ConfigurationError(`ASPECTDB_PARSE_MODE must be "strict" or "permissive", got "${parseMode}"`, {
        configKey: 'ASPECTDB_PARSE_MODE',
        actualValue: parseMode,
      })
    }
    input.parseMode = parseMode
  }

  const importMode = env.ASPECTDB_IMPORT_MODE
  if (importMode) {
    if (importMode !== 'strict' && importMode !== 'lenient') {
      throw new ConfigurationError(`ASPECTDB_IMPORT_MODE must be "strict" or "lenient", got "${importMode}"`, {
        configKey: 'ASPECTDB_IMPORT_MODE',
        actualValue: importMode,
      })
    }
    input.importMode = importMode
  }

  const debug = env.ASPECTDB_DEBUG
  if (debug) input.debug = debug === '1' || debug.toLowerCase() === 'true'

  return input
}

/**
 * Read a `.json`, `.yaml` or `.yml` config file
 *
 * @throws ConfigurationError when the file cannot be read or is invalid
 */
export async function loadConfigFile(path: string): Promise<AspectDBConfigInput> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${path}`,
      { configKey: 'configFile', actualValue: path },
      error instanceof Error ? error : undefined
    )
  }

  let parsed: unknown
  try {
    parsed = extname(path) === '.json' ? JSON.parse(text) : yaml.parse(text)
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse config file ${path}`,
      { configKey: 'configFile', actualValue: path },
      error instanceof Error ? error : undefined
    )
  }

  return validate(parsed ?? {}, path)
}
