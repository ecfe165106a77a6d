/**
 * Source tree loader
 *
 * Reads a directory of documents laid out as:
 *
 * ```
 * <root>/<domain>/domain.(json|yaml)              default_language, ...
 * <root>/<domain>/schema/<slug>.(json|yaml)       schemas
 * <root>/<domain>/template/<slug>.(json|yaml)     base templates
 * <root>/<domain>/code/<slug>.(json|yaml)         base code lists
 * <root>/<domain>/lang/<language>/template/<slug>.(json|yaml)
 * <root>/<domain>/lang/<language>/code/<slug>.(json|yaml)
 * ```
 *
 * The slug is the file name; a `slug` key inside the file that disagrees is
 * reported and ignored. Overlays are listed default language first.
 *
 * @module import/loader
 */

import { readdir, readFile } from 'node:fs/promises'
import { basename, extname, join } from 'node:path'
import * as yaml from 'yaml'
import type { TreeObject } from '../types/tree'
import { isTreeObject, toTree } from '../types/tree'
import type { StructuralKind } from '../types/document'
import { parseAspects, aspectsOf } from '../schema/parser'
import type { ParseMode } from '../schema/parser'
import { extractReferences, referencedSlugs } from '../schema/references'
import { DOMAIN_FILE_STEM, LANGUAGE_FOLDER, SOURCE_EXTENSIONS, SOURCE_FOLDERS } from '../constants'
import { ErrorCode, NotFoundError, ValidationError, isValidationError } from '../errors'
import type { AspectDBConfigInput } from '../config'
import type { Logger } from '../utils/logger'
import { resolveLogger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface SourceOverlay {
  language: string
  content: TreeObject
  file: string
}

export interface SourceRecord {
  slug: string
  domain: string
  kind: StructuralKind
  content: TreeObject
  /** The document this one instantiates */
  templateSlug?: string | undefined
  /** Every slug this record references (template first) */
  refs: string[]
  overlays: SourceOverlay[]
  file: string
}

export interface SourceDomain {
  name: string
  defaultLanguage?: string | undefined
}

export interface SourceTree {
  domains: SourceDomain[]
  records: SourceRecord[]
}

export interface LoadOptions {
  /** Parse mode used to find references */
  parseMode?: ParseMode | undefined
  logger?: Logger | undefined
}

/** Keys describing a document's identity rather than its content */
const IDENTITY_KEYS = new Set(['slug', 'template', 'type', 'domain', 'language'])

// =============================================================================
// Loading
// =============================================================================

/**
 * Load every domain under `root`
 *
 * @throws NotFoundError when `root` does not exist
 * @throws ValidationError when a file is not a JSON/YAML object
 */
export async function loadSourceTree(root: string, options: LoadOptions = {}): Promise<SourceTree> {
  const log = resolveLogger(options.logger)
  const entries = await listDir(root)
  if (entries === null) {
    throw new NotFoundError(`Source directory not found: ${root}`, ErrorCode.FILE_NOT_FOUND, { path: root })
  }

  const tree: SourceTree = { domains: [], records: [] }
  for (const name of entries.directories) {
    const domain = await loadDomain(join(root, name), name, options)
    tree.domains.push(domain.domain)
    tree.records.push(...domain.records)
    log.debug(`domain ${name}: ${domain.records.length} document(s)`)
  }
  return tree
}

async function loadDomain(
  dir: string,
  name: string,
  options: LoadOptions
): Promise<{ domain: SourceDomain; records: SourceRecord[] }> {
  const log = resolveLogger(options.logger)
  const listing = await listDir(dir)
  const files = listing?.files ?? []

  const domain: SourceDomain = { name }
  const domainFile = files.find(file => stemOf(file) === DOMAIN_FILE_STEM && isSourceFile(file))
  if (domainFile) {
    const settings = await readSourceFile(join(dir, domainFile))
    const language = settings.default_language
    if (typeof language === 'string') domain.defaultLanguage = language
  }

  const records: SourceRecord[] = []
  const bySlug = new Map<string, SourceRecord>()
  for (const [folder, kind] of Object.entries(SOURCE_FOLDERS)) {
    for (const file of await sourceFiles(join(dir, folder))) {
      const record = await loadRecord(join(dir, folder, file), name, kind, options)
      if (bySlug.has(record.slug)) {
        log.warn(`${record.file}: slug "${record.slug}" already defined in domain ${name}, skipped`)
        continue
      }
      bySlug.set(record.slug, record)
      records.push(record)
    }
  }

  const languages = (await listDir(join(dir, LANGUAGE_FOLDER)))?.directories ?? []
  for (const language of orderLanguages(languages, domain.defaultLanguage)) {
    for (const folder of ['template', 'code'] as const) {
      const langDir = join(dir, LANGUAGE_FOLDER, language, folder)
      for (const file of await sourceFiles(langDir)) {
        const path = join(langDir, file)
        const slug = stemOf(file)
        const record = bySlug.get(slug)
        if (!record || record.kind !== SOURCE_FOLDERS[folder]) {
          log.warn(`${path}: no ${folder} "${slug}" in domain ${name}, skipped`)
          continue
        }
        const raw = await readSourceFile(path)
        record.overlays.push({ language, content: stripIdentity(raw), file: path })
      }
    }
  }

  return { domain, records }
}

async function loadRecord(
  path: string,
  domain: string,
  kind: StructuralKind,
  options: LoadOptions
): Promise<SourceRecord> {
  const log = resolveLogger(options.logger)
  const raw = await readSourceFile(path)
  const slug = stemOf(basename(path))

  if (typeof raw.slug === 'string' && raw.slug !== slug) {
    log.warn(`${path}: slug "${raw.slug}" does not match file name, using "${slug}"`)
  }

  const templateSlug = templateOf(raw)
  const content = stripIdentity(raw)

  const refs: string[] = templateSlug !== undefined ? [templateSlug] : []
  try {
    const aspects = parseAspects(aspectsOf(content), {
      mode: options.parseMode ?? 'strict',
      slug,
      logger: options.logger,
    })
    for (const ref of referencedSlugs(extractReferences(aspects))) {
      if (!refs.includes(ref)) refs.push(ref)
    }
  } catch (error) {
    if (!isValidationError(error)) throw error
    // the importer reports the document itself; ordering just loses its edges
    log.warn(`${path}: aspects do not parse, references unknown`, error.context.issues)
  }

  return { slug, domain, kind, content, templateSlug, refs, overlays: [], file: path }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Per-domain default languages found in the tree, as configuration
 */
export function configFromSource(tree: SourceTree): AspectDBConfigInput {
  const domains: Record<string, { defaultLanguage: string }> = {}
  for (const domain of tree.domains) {
    if (domain.defaultLanguage !== undefined) {
      domains[domain.name] = { defaultLanguage: domain.defaultLanguage }
    }
  }
  return { domains }
}

function templateOf(raw: TreeObject): string | undefined {
  const template = raw.template
  if (typeof template === 'string') return template
  if (isTreeObject(template) && typeof template.slug === 'string') return template.slug
  return undefined
}

function stripIdentity(raw: TreeObject): TreeObject {
  const content: TreeObject = {}
  for (const [key, value] of Object.entries(raw)) {
    if (!IDENTITY_KEYS.has(key)) content[key] = value
  }
  return content
}

function orderLanguages(languages: string[], defaultLanguage: string | undefined): string[] {
  const sorted = [...languages].sort()
  if (defaultLanguage === undefined || !sorted.includes(defaultLanguage)) return sorted
  return [defaultLanguage, ...sorted.filter(language => language !== defaultLanguage)]
}

function stemOf(file: string): string {
  return basename(file, extname(file))
}

function isSourceFile(file: string): boolean {
  return SOURCE_EXTENSIONS.some(ext => ext === extname(file))
}

async function listDir(dir: string): Promise<{ files: string[]; directories: string[] } | null> {
  try {
    const entries = await readdir(dir, { withFileTypes: true })
    return {
      files: entries.filter(e => e.isFile()).map(e => e.name).sort(),
      directories: entries.filter(e => e.isDirectory()).map(e => e.name).sort(),
    }
  } catch (error) {
    if (isMissing(error)) return null
    throw error
  }
}

async function sourceFiles(dir: string): Promise<string[]> {
  return ((await listDir(dir))?.files ?? []).filter(isSourceFile)
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Read a JSON or YAML file holding one object
 */
export async function readSourceFile(path: string): Promise<TreeObject> {
  const text = await readFile(path, 'utf8')
  let parsed: unknown
  try {
    parsed = extname(path) === '.json' ? JSON.parse(text) : yaml.parse(text)
  } catch (error) {
    throw new ValidationError(
      `Cannot parse ${path}`,
      { value: path },
      error instanceof Error ? error : undefined
    )
  }
  const tree = toTree(parsed)
  if (!isTreeObject(tree)) {
    throw new ValidationError(`${path} does not hold an object`, { value: path })
  }
  return tree
}
