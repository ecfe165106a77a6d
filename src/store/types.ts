/**
 * Document store interfaces
 *
 * The engine's collaborator for persistence. It holds:
 * - base documents by slug and overlays by (slug, language)
 * - a uuid index over both
 * - the reverse-delta arena, keyed by document key and version index
 * - instance pins: which overlay version each external instance was
 *   written against
 *
 * All operations are synchronous; `transaction` makes a group of them
 * atomic.
 *
 * @module store/types
 */

import type { Patch } from '../diff'
import type { BaseDocument, DocumentKey, LanguageOverlay, StoredDocument } from '../types/document'

// =============================================================================
// Delta Log
// =============================================================================

/**
 * Ordered reverse deltas per document. Entry `i` turns the content of
 * version `i + 2` into the content of version `i + 1`.
 */
export interface DeltaLog {
  entries(key: DocumentKey): readonly Patch[]
  append(key: DocumentKey, patch: Patch): void
  removeLast(key: DocumentKey): Patch | undefined
  clear(key: DocumentKey): void
}

// =============================================================================
// Dependents
// =============================================================================

/**
 * Who depends on a document, and on which of its versions
 */
export interface DependentsQuery {
  /** Versions of `doc` pinned by its dependents, one entry per dependent */
  pinnedVersions(doc: StoredDocument): number[]
  /** Move every dependent pinning version `from` of `doc` to version `to` */
  repin(doc: StoredDocument, from: number, to: number): void
}

// =============================================================================
// Document Store
// =============================================================================

export interface DocumentStore extends DeltaLog {
  getBase(slug: string): BaseDocument | undefined
  getOverlay(slug: string, language: string): LanguageOverlay | undefined
  getByUuid(uuid: string): StoredDocument | undefined
  listBases(domain?: string): BaseDocument[]
  listOverlays(slug: string): LanguageOverlay[]

  putBase(doc: BaseDocument): void
  putOverlay(doc: LanguageOverlay): void
  deleteBase(slug: string): void
  deleteOverlay(slug: string, language: string): void

  /** Record that an external instance was written against `version` of `key` */
  pinInstance(key: DocumentKey, instanceId: string, version: number): void
  unpinInstance(key: DocumentKey, instanceId: string): void
  /** Pinned versions, one per instance */
  instancePins(key: DocumentKey): number[]
  /** Move every instance pinned at `from` to `to` */
  repinInstances(key: DocumentKey, from: number, to: number): void

  /**
   * Run `fn` atomically: if it throws, every change it made is undone.
   * Nested calls join the outermost transaction.
   */
  transaction<T>(fn: () => T): T
}
