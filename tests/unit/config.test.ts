/**
 * Configuration Test Suite
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  defineConfig,
  domainDefaultLanguage,
  loadConfigFile,
  loadConfigFromEnv,
  resolveConfig,
} from '../../src/config'
import { ConfigurationError } from '../../src/errors'

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual({
      defaultLanguage: 'en',
      domains: {},
      parseMode: 'strict',
      importMode: 'strict',
      debug: false,
    })
  })

  it('lets later inputs win', () => {
    const config = resolveConfig(
      defineConfig({ defaultLanguage: 'de', parseMode: 'permissive' }),
      { defaultLanguage: 'fr', debug: true }
    )

    expect(config).toMatchObject({ defaultLanguage: 'fr', parseMode: 'permissive', debug: true })
  })

  it('keeps a domain language an empty later entry does not set', () => {
    const config = resolveConfig({ domains: { birds: { defaultLanguage: 'fr' } } }, { domains: { birds: {} } })

    expect(config.domains).toEqual({ birds: { defaultLanguage: 'fr' } })
  })

  it('rejects an invalid value', () => {
    let caught: unknown
    try {
      resolveConfig({ defaultLanguage: 'e' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigurationError)
    if (!(caught instanceof ConfigurationError)) return
    expect(caught.configKey).toBe('defaultLanguage')
    expect(caught.message).toBe(
      'Invalid configuration in configuration: defaultLanguage: String must contain at least 2 character(s)'
    )
  })
})

describe('domainDefaultLanguage', () => {
  it('prefers the domain setting over the global default', () => {
    const config = resolveConfig({ defaultLanguage: 'en', domains: { alpine: { defaultLanguage: 'de' } } })

    expect(domainDefaultLanguage(config, 'alpine')).toBe('de')
    expect(domainDefaultLanguage(config, 'birds')).toBe('en')
  })
})

describe('loadConfigFromEnv', () => {
  it('reads every variable', () => {
    expect(
      loadConfigFromEnv({
        ASPECTDB_DEFAULT_LANGUAGE: 'fr',
        ASPECTDB_PARSE_MODE: 'permissive',
        ASPECTDB_IMPORT_MODE: 'lenient',
        ASPECTDB_DEBUG: 'true',
      })
    ).toEqual({ defaultLanguage: 'fr', parseMode: 'permissive', importMode: 'lenient', debug: true })
  })

  it('returns nothing for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({})
  })

  it('reads debug flags', () => {
    expect(loadConfigFromEnv({ ASPECTDB_DEBUG: '1' }).debug).toBe(true)
    expect(loadConfigFromEnv({ ASPECTDB_DEBUG: 'TRUE' }).debug).toBe(true)
    expect(loadConfigFromEnv({ ASPECTDB_DEBUG: '0' }).debug).toBe(false)
  })

  it('rejects unknown modes', () => {
    expect(() => loadConfigFromEnv({ ASPECTDB_PARSE_MODE: 'loose' })).toThrow(
      'ASPECTDB_PARSE_MODE must be "strict" or "permissive", got "loose"'
    )
    expect(() => loadConfigFromEnv({ ASPECTDB_IMPORT_MODE: 'loose' })).toThrow(ConfigurationError)
  })
})

describe('loadConfigFile', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'aspectdb-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads YAML', async () => {
    const path = join(dir, 'aspectdb.yaml')
    await writeFile(path, 'defaultLanguage: de\ndomains:\n  birds:\n    defaultLanguage: fr\n')

    expect(await loadConfigFile(path)).toEqual({
      defaultLanguage: 'de',
      domains: { birds: { defaultLanguage: 'fr' } },
    })
  })

  it('reads JSON', async () => {
    const path = join(dir, 'aspectdb.json')
    await writeFile(path, JSON.stringify({ importMode: 'lenient' }))

    expect(await loadConfigFile(path)).toEqual({ importMode: 'lenient' })
  })

  it('treats an empty file as no settings', async () => {
    const path = join(dir, 'empty.yml')
    await writeFile(path, '')

    expect(await loadConfigFile(path)).toEqual({})
  })

  it('names the file holding an unknown key', async () => {
    const path = join(dir, 'bad.json')
    await writeFile(path, JSON.stringify({ colour: 'blue' }))

    await expect(loadConfigFile(path)).rejects.toThrow(
      `Invalid configuration in ${path}: <root>: Unrecognized key(s) in object: 'colour'`
    )
  })

  it('reports a file it cannot read', async () => {
    const path = join(dir, 'missing.yaml')

    await expect(loadConfigFile(path)).rejects.toThrow(`Cannot read config file ${path}`)
  })

  it('reports a file it cannot parse', async () => {
    const path = join(dir, 'broken.json')
    await writeFile(path, '{ not json')

    await expect(loadConfigFile(path)).rejects.toThrow(`Cannot parse config file ${path}`)
  })
})
