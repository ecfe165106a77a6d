/**
 * Reference resolver
 *
 * Looks a document up by uuid, by slug and language, or by slug alone.
 * A slug+language lookup that misses retries once in the default language
 * of the document's domain and says so in the result.
 *
 * @module references
 */

import type { BaseDocument, LanguageOverlay, StoredDocument } from '../types/document'
import type { DocumentStore } from '../store/types'
import { ErrorCode, NotFoundError, ValidationError } from '../errors'
import type { Logger } from '../utils/logger'
import { resolveLogger } from '../utils/logger'

export interface ReferenceQuery {
  uuid?: string | undefined
  slug?: string | undefined
  language?: string | undefined
}

export interface Resolution<D extends StoredDocument = StoredDocument> {
  document: D
  /** Language asked for, null when none was */
  requestedLanguage: string | null
  /** Language of the returned document, null for a base document */
  servedLanguage: string | null
  /** True when the default language was served instead of the requested one */
  fallback: boolean
}

export interface ReferenceResolverOptions {
  /** Default language of a domain */
  defaultLanguage: (domain: string) => string
  logger?: Logger | undefined
}

export class ReferenceResolver {
  constructor(
    private readonly store: DocumentStore,
    private readonly options: ReferenceResolverOptions
  ) {}

  /**
   * @throws ValidationError when the query names neither uuid nor slug
   * @throws NotFoundError when nothing matches; `tried` lists the languages attempted
   */
  resolve(query: ReferenceQuery): Resolution {
    if (query.uuid !== undefined) {
      return this.resolveUuid(query.uuid)
    }
    if (query.slug !== undefined) {
      return query.language !== undefined
        ? this.resolveOverlay(query.slug, query.language)
        : this.resolveBase(query.slug)
    }
    throw new ValidationError('A reference needs a uuid or a slug')
  }

  resolveUuid(uuid: string): Resolution {
    const document = this.store.getByUuid(uuid)
    if (!document) {
      throw new NotFoundError(`No document with uuid "${uuid}"`, ErrorCode.DOCUMENT_NOT_FOUND, { uuid })
    }
    const servedLanguage = 'language' in document ? document.language : null
    return { document, requestedLanguage: null, servedLanguage, fallback: false }
  }

  resolveBase(slug: string): Resolution<BaseDocument> {
    const document = this.store.getBase(slug)
    if (!document) {
      throw new NotFoundError(`No document "${slug}"`, ErrorCode.DOCUMENT_NOT_FOUND, { slug })
    }
    return { document, requestedLanguage: null, servedLanguage: null, fallback: false }
  }

  resolveOverlay(slug: string, language: string): Resolution<LanguageOverlay> {
    const direct = this.store.getOverlay(slug, language)
    if (direct) {
      return { document: direct, requestedLanguage: language, servedLanguage: language, fallback: false }
    }

    const base = this.store.getBase(slug)
    if (!base) {
      throw new NotFoundError(`No document "${slug}"`, ErrorCode.DOCUMENT_NOT_FOUND, {
        slug,
        language,
        tried: [language],
      })
    }

    const defaultLanguage = this.options.defaultLanguage(base.domain)
    if (defaultLanguage !== language) {
      const fallback = this.store.getOverlay(slug, defaultLanguage)
      if (fallback) {
        resolveLogger(this.options.logger).debug(
          `"${slug}" has no "${language}" overlay, serving "${defaultLanguage}"`
        )
        return { document: fallback, requestedLanguage: language, servedLanguage: defaultLanguage, fallback: true }
      }
    }

    const tried = defaultLanguage === language ? [language] : [language, defaultLanguage]
    throw new NotFoundError(
      `"${slug}" has no overlay in ${tried.map(l => `"${l}"`).join(' or ')}`,
      ErrorCode.OVERLAY_NOT_FOUND,
      { slug, language, tried }
    )
  }
}
