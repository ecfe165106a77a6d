/**
 * Dependents of stored documents
 *
 * - a base document's dependents are its language overlays, each pinned at
 *   the base version it was last merged against (`templateVersion`)
 * - an overlay's dependents are the external instances written against it
 *
 * @module store/dependents
 */

import type { StoredDocument } from '../types/document'
import { isOverlay, keyOf } from '../types/document'
import type { DependentsQuery, DocumentStore } from './types'

export class StoreDependents implements DependentsQuery {
  constructor(private readonly store: DocumentStore) {}

  pinnedVersions(doc: StoredDocument): number[] {
    if (isOverlay(doc)) {
      return this.store.instancePins(keyOf(doc))
    }
    return this.store.listOverlays(doc.slug).map(overlay => overlay.templateVersion)
  }

  repin(doc: StoredDocument, from: number, to: number): void {
    if (isOverlay(doc)) {
      this.store.repinInstances(keyOf(doc), from, to)
      return
    }
    for (const overlay of this.store.listOverlays(doc.slug)) {
      if (overlay.templateVersion === from) {
        this.store.putOverlay({ ...overlay, templateVersion: to })
      }
    }
  }
}
