/**
 * DocumentService - the write and read surface of aspectdb
 *
 * Coordinates the parser, merge engine, version store and reference
 * resolver over one {@link DocumentStore}. Every mutation runs inside a
 * single store transaction, so a failure leaves nothing half written.
 * Observers hear about a change only after its transaction has committed.
 *
 * @example
 * ```typescript
 * const service = new DocumentService({ config: resolveConfig({ defaultLanguage: 'en' }) })
 *
 * service.updateOrInsert({
 *   slug: 'bird_obs',
 *   domain: 'birds',
 *   kind: 'base_template',
 *   content: { aspects: [{ name: 'species', type: 'str' }] },
 * })
 * service.submitOverlay({
 *   slug: 'bird_obs',
 *   language: 'en',
 *   content: { title: 'Bird observation', aspects: [{ label: 'Species' }] },
 * })
 *
 * const { merged } = service.getMerged('bird_obs', 'en')
 * ```
 */

import { randomUUID } from 'node:crypto'
import type { TreeObject } from '../types/tree'
import { isTreeObject } from '../types/tree'
import type {
  BaseDocument,
  LanguageOverlay,
  MergedDocument,
  StoredDocument,
  StructuralKind,
} from '../types/document'
import { concreteKindOf, formatKey, isStructuralKind, keyOf } from '../types/document'
import type { DocumentStore } from '../store/types'
import { MemoryDocumentStore } from '../store/memory'
import { StoreDependents } from '../store/dependents'
import { VersionStore } from '../versioning'
import type { UpdateOutcome } from '../versioning'
import { ReferenceResolver } from '../references'
import type { Resolution } from '../references'
import { mergeDocument } from '../merge'
import { parseAspects, aspectsOf } from '../schema/parser'
import type { ParseMode } from '../schema/parser'
import { extractReferences } from '../schema/references'
import { CommitObservers } from '../events'
import type { CommitEvent, CommitHandler } from '../events'
import type { AspectDBConfig } from '../config'
import { domainDefaultLanguage, resolveConfig } from '../config'
import { stripNulls } from '../utils/comparison'
import { isValidLanguage, isValidSlug } from '../utils/slug'
import { ErrorCode, MergeError, NotFoundError, ValidationError } from '../errors'
import { INITIAL_VERSION, MERGE_REJECTED_MESSAGE } from '../constants'
import type { Logger } from '../utils/logger'
import { resolveLogger } from '../utils/logger'
import { overlayStatus } from './status'

// =============================================================================
// Types
// =============================================================================

export interface BaseDocumentInput {
  slug: string
  domain: string
  kind: StructuralKind
  content: TreeObject
  /** Slug of the document this one instantiates (a code list's schema) */
  templateSlug?: string | undefined
  /** Keep a known uuid instead of generating one (first insert only) */
  uuid?: string | undefined
}

export interface OverlayInput {
  slug: string
  language: string
  content: TreeObject
  uuid?: string | undefined
}

export type WriteOutcome = 'created' | UpdateOutcome

export interface WriteResult<D extends StoredDocument> {
  document: D
  version: number
  outcome: WriteOutcome
}

export interface OverlayWriteResult extends WriteResult<LanguageOverlay> {
  merged: MergedDocument
}

export interface MergedRead {
  merged: MergedDocument
  servedLanguage: string
  fallback: boolean
}

export interface WriteOptions {
  /** Overrides the configured parse mode for this call */
  parseMode?: ParseMode | undefined
}

export interface DocumentServiceOptions {
  store?: DocumentStore | undefined
  config?: AspectDBConfig | undefined
  logger?: Logger | undefined
  /** uuid factory, for deterministic tests */
  generateUuid?: (() => string) | undefined
}

// =============================================================================
// DocumentService
// =============================================================================

export class DocumentService {
  readonly store: DocumentStore
  readonly config: AspectDBConfig
  readonly versions: VersionStore
  readonly references: ReferenceResolver
  private readonly observers: CommitObservers
  private readonly logger: Logger | undefined
  private readonly generateUuid: () => string

  constructor(options: DocumentServiceOptions = {}) {
    this.store = options.store ?? new MemoryDocumentStore()
    this.config = options.config ?? resolveConfig()
    this.logger = options.logger
    this.generateUuid = options.generateUuid ?? randomUUID
    this.versions = new VersionStore(this.store, new StoreDependents(this.store), { logger: options.logger })
    this.references = new ReferenceResolver(this.store, {
      defaultLanguage: domain => domainDefaultLanguage(this.config, domain),
      logger: options.logger,
    })
    this.observers = new CommitObservers(options.logger)
  }

  private get log(): Logger {
    return resolveLogger(this.logger)
  }

  // ===========================================================================
  // Observers
  // ===========================================================================

  /**
   * Register a handler for committed changes
   * @returns Function to unregister the handler
   */
  onDocumentCommitted(handler: CommitHandler): () => void {
    return this.observers.onDocumentCommitted(handler)
  }

  /**
   * Wait for async commit handlers to finish
   */
  async flushObservers(): Promise<void> {
    await this.observers.flush()
  }

  // ===========================================================================
  // Base Documents
  // ===========================================================================

  /**
   * Insert a base document, or record a new state of an existing one
   *
   * @throws ValidationError when the slug, kind or aspects are invalid, or the slug belongs to another domain
   * @throws NotFoundError when `templateSlug` names a document that does not exist
   */
  updateOrInsert(input: BaseDocumentInput, options: WriteOptions = {}): WriteResult<BaseDocument> {
    if (!isValidSlug(input.slug)) {
      throw new ValidationError(`Invalid slug "${input.slug}"`, { field: 'slug', value: input.slug })
    }
    if (!isStructuralKind(input.kind)) {
      throw new ValidationError(`"${input.kind}" is not a base document kind`, {
        field: 'kind',
        slug: input.slug,
      })
    }

    const content = normalizeContent(input.content)
    const aspects = parseAspects(aspectsOf(content), {
      mode: options.parseMode ?? this.config.parseMode,
      slug: input.slug,
      logger: this.logger,
    })
    const references = extractReferences(aspects)

    if (input.templateSlug !== undefined && !this.store.getBase(input.templateSlug)) {
      throw new NotFoundError(
        `"${input.slug}" instantiates "${input.templateSlug}", which does not exist`,
        ErrorCode.DOCUMENT_NOT_FOUND,
        { slug: input.templateSlug }
      )
    }
    const templateReference = input.templateSlug !== undefined ? { slug: input.templateSlug } : undefined

    const result = this.store.transaction((): WriteResult<BaseDocument> => {
      const existing = this.store.getBase(input.slug)

      if (!existing) {
        const document: BaseDocument = {
          uuid: input.uuid ?? this.generateUuid(),
          slug: input.slug,
          domain: input.domain,
          kind: input.kind,
          version: INITIAL_VERSION,
          content,
          references,
          templateReference,
        }
        this.store.putBase(document)
        return { document, version: document.version, outcome: 'created' }
      }

      if (existing.domain !== input.domain) {
        throw new ValidationError(
          `"${input.slug}" already exists in domain "${existing.domain}"`,
          { field: 'domain', slug: input.slug, value: input.domain }
        )
      }
      if (existing.kind !== input.kind) {
        throw new ValidationError(
          `"${input.slug}" is a ${existing.kind}, not a ${input.kind}`,
          { field: 'kind', slug: input.slug, value: input.kind }
        )
      }

      const update = this.versions.updateVersion(existing, {
        ...existing,
        content,
        references,
        templateReference,
      })
      if (update.outcome !== 'unchanged') {
        this.store.putBase(update.document)
      }
      return { document: update.document, version: update.document.version, outcome: update.outcome }
    })

    this.log.info(`${input.slug}: ${result.outcome} (version ${result.version})`)
    this.notify(result)
    return result
  }

  // ===========================================================================
  // Overlays
  // ===========================================================================

  /**
   * Store the texts of a document in one language
   *
   * The texts are merged against the latest base version first. If they do
   * not line up the write is rejected with a MergeError and nothing is
   * stored; the per-aspect breakdown goes to the log.
   *
   * @throws NotFoundError when the base document does not exist
   * @throws MergeError when the overlay does not line up with the latest base
   */
  submitOverlay(input: OverlayInput): OverlayWriteResult {
    if (!isValidLanguage(input.language)) {
      throw new ValidationError(`Invalid language "${input.language}"`, {
        field: 'language',
        slug: input.slug,
        value: input.language,
      })
    }

    const base = this.references.resolveBase(input.slug).document
    const kind = concreteKindOf(base.kind)
    if (kind === null) {
      throw new ValidationError(`Documents of kind "${base.kind}" have no language overlays`, {
        field: 'language',
        slug: base.slug,
      })
    }

    const content = normalizeContent(input.content)
    const defaultLanguage = domainDefaultLanguage(this.config, base.domain)
    const defaultOverlay = input.language === defaultLanguage
      ? undefined
      : this.store.getOverlay(base.slug, defaultLanguage)
    const status = overlayStatus(content, defaultOverlay?.content)

    const result = this.store.transaction((): OverlayWriteResult => {
      const existing = this.store.getOverlay(base.slug, input.language)
      const candidate: LanguageOverlay = existing
        ? { ...existing, content, templateVersion: base.version, status }
        : {
            uuid: input.uuid ?? this.generateUuid(),
            slug: base.slug,
            domain: base.domain,
            language: input.language,
            kind,
            version: INITIAL_VERSION,
            templateVersion: base.version,
            status,
            content,
          }

      const merged = this.mergeOrReject(base, candidate)

      if (!existing) {
        this.store.putOverlay(candidate)
        return { document: candidate, version: candidate.version, outcome: 'created', merged }
      }

      const update = this.versions.updateVersion(existing, candidate)
      const document = update.outcome === 'unchanged' ? { ...existing, status } : update.document
      if (update.outcome !== 'unchanged' || existing.status !== status) {
        this.store.putOverlay(document)
      }
      return { document, version: document.version, outcome: update.outcome, merged }
    })

    this.log.info(`${formatKey(keyOf(result.document))}: ${result.outcome} (version ${result.version}, ${result.document.status})`)
    this.notify(result)
    return result
  }

  private mergeOrReject(base: BaseDocument, overlay: LanguageOverlay): MergedDocument {
    try {
      return mergeDocument(base, overlay, this.logger)
    } catch (error) {
      if (!(error instanceof MergeError)) throw error
      throw new MergeError(error.kind, error.path, MERGE_REJECTED_MESSAGE, error)
    }
  }

  /**
   * Merge a document in a language, falling back to the domain's default
   * language when there is no overlay in the requested one
   */
  getMerged(slug: string, language: string): MergedRead {
    const base = this.references.resolveBase(slug).document
    const resolution = this.references.resolveOverlay(slug, language)
    return {
      merged: this.mergeOrReject(base, resolution.document),
      servedLanguage: resolution.document.language,
      fallback: resolution.fallback,
    }
  }

  /**
   * Remove one language overlay and its history
   */
  removeOverlay(slug: string, language: string): void {
    const overlay = this.store.getOverlay(slug, language)
    if (!overlay) {
      throw new NotFoundError(`"${slug}" has no "${language}" overlay`, ErrorCode.OVERLAY_NOT_FOUND, {
        slug,
        language,
      })
    }
    this.store.transaction(() => {
      this.store.deleteOverlay(slug, language)
    })
    this.log.info(`${slug}@${language}: removed`)
    this.observers.notify({ action: 'removed', document: overlay, version: overlay.version })
  }

  // ===========================================================================
  // Versions
  // ===========================================================================

  /**
   * Content of a document (or of one of its overlays) at a version
   *
   * @throws VersionError INVALID_VERSION when the version does not exist
   */
  getVersion(slug: string, version: number, language?: string): TreeObject {
    const document = this.lookup(slug, language)
    return this.versions.getContent(document, version)
  }

  /**
   * Fold the current version of a document into the previous one
   *
   * @throws VersionError SMASH_REJECTED when a dependent still pins an older version
   */
  smashVersion(slug: string, language?: string): StoredDocument {
    const document = this.lookup(slug, language)
    const smashed = this.store.transaction((): StoredDocument => {
      if ('language' in document) {
        const result = this.versions.smashVersion(document)
        this.store.putOverlay(result)
        return result
      }
      const result = this.versions.smashVersion(document)
      this.store.putBase(result)
      return result
    })
    this.observers.notify({ action: 'version-smashed', document: smashed, version: smashed.version })
    return smashed
  }

  /**
   * Record that an external instance was written against an overlay version
   */
  pinInstance(slug: string, language: string, instanceId: string, version?: number): void {
    const overlay = this.references.resolveOverlay(slug, language)
    if (overlay.fallback) {
      throw new NotFoundError(`"${slug}" has no "${language}" overlay`, ErrorCode.OVERLAY_NOT_FOUND, {
        slug,
        language,
      })
    }
    const pinned = version ?? overlay.document.version
    this.versions.getVersion(overlay.document, pinned)
    this.store.pinInstance({ slug, language }, instanceId, pinned)
  }

  // ===========================================================================
  // Lookup & Teardown
  // ===========================================================================

  resolve(query: { uuid?: string; slug?: string; language?: string }): Resolution {
    return this.references.resolve(query)
  }

  /**
   * Remove every document of a domain, overlays and history included
   *
   * @returns slugs removed
   */
  teardownDomain(domain: string): string[] {
    const bases = this.store.listBases(domain)
    this.store.transaction(() => {
      for (const base of bases) {
        for (const overlay of this.store.listOverlays(base.slug)) {
          this.store.deleteOverlay(overlay.slug, overlay.language)
        }
        this.store.deleteBase(base.slug)
      }
    })
    this.log.info(`domain ${domain}: removed ${bases.length} document(s)`)
    return bases.map(base => base.slug)
  }

  private lookup(slug: string, language?: string): StoredDocument {
    if (language === undefined) {
      return this.references.resolveBase(slug).document
    }
    const overlay = this.store.getOverlay(slug, language)
    if (!overlay) {
      throw new NotFoundError(`"${slug}" has no "${language}" overlay`, ErrorCode.OVERLAY_NOT_FOUND, {
        slug,
        language,
        tried: [language],
      })
    }
    return overlay
  }

  private notify(result: WriteResult<StoredDocument>): void {
    if (result.outcome === 'unchanged') return
    const event: CommitEvent = { action: result.outcome, document: result.document, version: result.version }
    this.observers.notify(event)
  }
}

function normalizeContent(content: TreeObject): TreeObject {
  const cleaned = stripNulls(content)
  if (!isTreeObject(cleaned)) {
    throw new ValidationError('Document content must be an object')
  }
  return cleaned
}
