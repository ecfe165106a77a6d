/**
 * MemoryDocumentStore - in-process document store
 *
 * Keeps everything in Maps. Transactions take a snapshot of the maps and
 * restore it when the transaction body throws.
 *
 * Useful for:
 * - Unit tests
 * - Batch imports that are written out elsewhere afterwards
 * - The CLI's dry runs
 */

import type { Patch } from '../diff'
import type { BaseDocument, DocumentKey, LanguageOverlay, StoredDocument } from '../types/document'
import { formatKey } from '../types/document'
import { AspectDBError, StoreCommitError } from '../errors'
import type { DocumentStore } from './types'

interface StoreState {
  bases: Map<string, BaseDocument>
  overlays: Map<string, LanguageOverlay>
  uuids: Map<string, DocumentKey>
  deltas: Map<string, Patch[]>
  pins: Map<string, Map<string, number>>
}

function emptyState(): StoreState {
  return {
    bases: new Map(),
    overlays: new Map(),
    uuids: new Map(),
    deltas: new Map(),
    pins: new Map(),
  }
}

/**
 * Copy the containers; documents and patches are never mutated in place,
 * so sharing them between snapshot and live state is safe.
 */
function snapshotState(state: StoreState): StoreState {
  return {
    bases: new Map(state.bases),
    overlays: new Map(state.overlays),
    uuids: new Map(state.uuids),
    deltas: new Map([...state.deltas].map(([k, v]) => [k, [...v]])),
    pins: new Map([...state.pins].map(([k, v]) => [k, new Map(v)])),
  }
}

export class MemoryDocumentStore implements DocumentStore {
  private state: StoreState = emptyState()
  private depth = 0

  // ===========================================================================
  // Documents
  // ===========================================================================

  getBase(slug: string): BaseDocument | undefined {
    return this.state.bases.get(slug)
  }

  getOverlay(slug: string, language: string): LanguageOverlay | undefined {
    return this.state.overlays.get(formatKey({ slug, language }))
  }

  getByUuid(uuid: string): StoredDocument | undefined {
    const key = this.state.uuids.get(uuid)
    if (!key) return undefined
    return key.language === null ? this.getBase(key.slug) : this.getOverlay(key.slug, key.language)
  }

  listBases(domain?: string): BaseDocument[] {
    const all = [...this.state.bases.values()]
    return domain === undefined ? all : all.filter(doc => doc.domain === domain)
  }

  listOverlays(slug: string): LanguageOverlay[] {
    return [...this.state.overlays.values()].filter(doc => doc.slug === slug)
  }

  putBase(doc: BaseDocument): void {
    const previous = this.state.bases.get(doc.slug)
    if (previous && previous.uuid !== doc.uuid) this.state.uuids.delete(previous.uuid)
    this.state.bases.set(doc.slug, doc)
    this.state.uuids.set(doc.uuid, { slug: doc.slug, language: null })
  }

  putOverlay(doc: LanguageOverlay): void {
    const key = formatKey({ slug: doc.slug, language: doc.language })
    const previous = this.state.overlays.get(key)
    if (previous && previous.uuid !== doc.uuid) this.state.uuids.delete(previous.uuid)
    this.state.overlays.set(key, doc)
    this.state.uuids.set(doc.uuid, { slug: doc.slug, language: doc.language })
  }

  deleteBase(slug: string): void {
    const doc = this.state.bases.get(slug)
    if (!doc) return
    this.state.bases.delete(slug)
    this.state.uuids.delete(doc.uuid)
    this.clear({ slug, language: null })
  }

  deleteOverlay(slug: string, language: string): void {
    const key = { slug, language }
    const doc = this.state.overlays.get(formatKey(key))
    if (!doc) return
    this.state.overlays.delete(formatKey(key))
    this.state.uuids.delete(doc.uuid)
    this.state.pins.delete(formatKey(key))
    this.clear(key)
  }

  // ===========================================================================
  // Delta Log
  // ===========================================================================

  entries(key: DocumentKey): readonly Patch[] {
    return this.state.deltas.get(formatKey(key)) ?? []
  }

  append(key: DocumentKey, patch: Patch): void {
    const id = formatKey(key)
    const list = this.state.deltas.get(id)
    if (list) {
      list.push(patch)
    } else {
      this.state.deltas.set(id, [patch])
    }
  }

  removeLast(key: DocumentKey): Patch | undefined {
    return this.state.deltas.get(formatKey(key))?.pop()
  }

  clear(key: DocumentKey): void {
    this.state.deltas.delete(formatKey(key))
  }

  // ===========================================================================
  // Instance Pins
  // ===========================================================================

  pinInstance(key: DocumentKey, instanceId: string, version: number): void {
    const id = formatKey(key)
    const pins = this.state.pins.get(id) ?? new Map<string, number>()
    pins.set(instanceId, version)
    this.state.pins.set(id, pins)
  }

  unpinInstance(key: DocumentKey, instanceId: string): void {
    this.state.pins.get(formatKey(key))?.delete(instanceId)
  }

  instancePins(key: DocumentKey): number[] {
    return [...(this.state.pins.get(formatKey(key))?.values() ?? [])]
  }

  repinInstances(key: DocumentKey, from: number, to: number): void {
    const pins = this.state.pins.get(formatKey(key))
    if (!pins) return
    for (const [instanceId, version] of pins) {
      if (version === from) pins.set(instanceId, to)
    }
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  transaction<T>(fn: () => T): T {
    if (this.depth > 0) {
      return fn()
    }

    const snapshot = snapshotState(this.state)
    this.depth++
    try {
      return fn()
    } catch (error) {
      this.state = snapshot
      if (error instanceof AspectDBError) throw error
      throw new StoreCommitError(
        'Transaction failed and was rolled back',
        {},
        error instanceof Error ? error : new Error(String(error))
      )
    } finally {
      this.depth--
    }
  }

  /**
   * Drop everything (test helper)
   */
  reset(): void {
    this.state = emptyState()
  }
}
