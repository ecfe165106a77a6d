/**
 * Version store
 *
 * Keeps the full live content of every document plus one reverse delta per
 * older version, so any version still pinned by a dependent can be rebuilt
 * by walking the deltas backwards from the live content.
 *
 * An update either:
 * - is a no-op, when the change detector finds nothing to record
 * - bumps the version, when dependents could be pinned to the current one
 * - is folded into the current version ("smashed"), when nobody can be
 *
 * Base documents always count as having dependents: their overlays are
 * re-merged against them. Overlays only do when an instance pins their
 * current version.
 *
 * @module versioning
 */

import type { Tree, TreeObject } from '../types/tree'
import { isTreeObject } from '../types/tree'
import type { StoredDocument } from '../types/document'
import { formatKey, isOverlay, keyOf } from '../types/document'
import { applyPatch, compare, createPatch } from '../diff'
import type { DeltaLog, DependentsQuery } from '../store/types'
import { ErrorCode, VersionError } from '../errors'
import { DEFAULT_IGNORE_FIELDS } from '../constants'
import type { Logger } from '../utils/logger'
import { resolveLogger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export type UpdateOutcome = 'unchanged' | 'bumped' | 'smashed'

export interface VersionUpdate<D extends StoredDocument> {
  /** The document to persist (the current one, unchanged, for a no-op) */
  document: D
  outcome: UpdateOutcome
}

export interface VersionStoreOptions {
  /** Top-level content fields that never count as a change */
  ignoreFields?: readonly string[] | undefined
  logger?: Logger | undefined
}

// =============================================================================
// Snapshots
// =============================================================================

/**
 * The versioned view of a document: its content and, for an overlay, the
 * base version it was merged against. Rebasing an overlay is a change.
 */
export function snapshotOf(doc: StoredDocument): TreeObject {
  return isOverlay(doc)
    ? { content: doc.content, template_version: doc.templateVersion }
    : { content: doc.content }
}

/**
 * The content part of a snapshot
 */
export function contentOf(snapshot: Tree, doc?: StoredDocument): TreeObject {
  const content = isTreeObject(snapshot) ? snapshot.content : undefined
  if (!isTreeObject(content)) {
    throw new VersionError(ErrorCode.VERSION_HISTORY_CORRUPT, 'Reconstructed version has no content', {
      slug: doc?.slug,
    })
  }
  return content
}

// =============================================================================
// VersionStore
// =============================================================================

export class VersionStore {
  private readonly ignoreFields: readonly string[]
  private readonly logger: Logger | undefined

  constructor(
    private readonly deltas: DeltaLog,
    private readonly dependents: DependentsQuery,
    options: VersionStoreOptions = {}
  ) {
    this.ignoreFields = options.ignoreFields ?? DEFAULT_IGNORE_FIELDS
    this.logger = options.logger
  }

  private get log(): Logger {
    return resolveLogger(this.logger)
  }

  // ===========================================================================
  // Reconstruction
  // ===========================================================================

  /**
   * Rebuild the snapshot of `doc` as it was at version `target`
   *
   * @throws VersionError INVALID_VERSION when target is outside 1..doc.version
   * @throws VersionError VERSION_HISTORY_CORRUPT when the delta count does not match the version
   */
  getVersion(doc: StoredDocument, target: number): TreeObject {
    if (!Number.isInteger(target) || target < 1 || target > doc.version) {
      throw new VersionError(
        ErrorCode.INVALID_VERSION,
        `Version ${target} of "${formatKey(keyOf(doc))}" does not exist (current version is ${doc.version})`,
        { slug: doc.slug, language: keyOf(doc).language, version: doc.version, target }
      )
    }

    const entries = this.checkedEntries(doc)
    let snapshot: Tree = snapshotOf(doc)
    for (let i = doc.version - 2; i >= target - 1; i--) {
      const patch = entries[i]
      if (patch === undefined) break
      snapshot = applyPatch(snapshot, patch)
    }

    if (!isTreeObject(snapshot)) {
      throw new VersionError(ErrorCode.VERSION_HISTORY_CORRUPT, 'Reconstructed version is not an object', {
        slug: doc.slug,
        target,
      })
    }
    return snapshot
  }

  /**
   * Content of `doc` at version `target`
   */
  getContent(doc: StoredDocument, target: number): TreeObject {
    return contentOf(this.getVersion(doc, target), doc)
  }

  private checkedEntries(doc: StoredDocument) {
    const entries = this.deltas.entries(keyOf(doc))
    if (entries.length !== doc.version - 1) {
      throw new VersionError(
        ErrorCode.VERSION_HISTORY_CORRUPT,
        `"${formatKey(keyOf(doc))}" is at version ${doc.version} but has ${entries.length} delta(s)`,
        { slug: doc.slug, version: doc.version, deltas: entries.length }
      )
    }
    return entries
  }

  // ===========================================================================
  // Update
  // ===========================================================================

  /**
   * Whether someone may be pinned to the current version of `doc`
   */
  hasDependents(doc: StoredDocument): boolean {
    if (!isOverlay(doc)) return true
    return this.dependents.pinnedVersions(doc).includes(doc.version)
  }

  /**
   * Record `next` as the new state of `current`
   *
   * The returned document carries the right version number; the caller
   * persists it (nothing to persist when the outcome is `unchanged`).
   */
  updateVersion<D extends StoredDocument>(current: D, next: D): VersionUpdate<D> {
    const key = keyOf(current)
    const contentDiff = compare(current.content, next.content, this.ignoreFields)
    const rebased = isOverlay(current) && isOverlay(next) && current.templateVersion !== next.templateVersion

    if (contentDiff.isEqual && !rebased) {
      this.log.debug(`${formatKey(key)}: no changes, staying at version ${current.version}`)
      return { document: current, outcome: 'unchanged' }
    }

    const nextSnapshot = snapshotOf(next)

    if (this.hasDependents(current)) {
      this.checkedEntries(current)
      this.deltas.append(key, createPatch(nextSnapshot, snapshotOf(current)))
      const version = current.version + 1
      this.log.debug(`${formatKey(key)}: version ${current.version} -> ${version}`)
      return { document: { ...next, version }, outcome: 'bumped' }
    }

    if (current.version > 1) {
      const previous = this.getVersion(current, current.version - 1)
      this.deltas.removeLast(key)
      this.deltas.append(key, createPatch(nextSnapshot, previous))
    }
    this.log.debug(`${formatKey(key)}: changes folded into version ${current.version}`)
    return { document: { ...next, version: current.version }, outcome: 'smashed' }
  }

  // ===========================================================================
  // Maintenance Smash
  // ===========================================================================

  /**
   * A version can be dropped when there is an older one to fold into and
   * every dependent already pins the current version
   */
  canSmash(doc: StoredDocument): boolean {
    if (doc.version <= 1) return false
    return this.dependents.pinnedVersions(doc).every(pinned => pinned === doc.version)
  }

  /**
   * Drop version `doc.version - 1`: the live content becomes that version
   * and dependents are re-pinned to it.
   *
   * @throws VersionError SMASH_REJECTED when {@link canSmash} is false
   */
  smashVersion<D extends StoredDocument>(doc: D): D {
    const key = keyOf(doc)
    if (!this.canSmash(doc)) {
      throw new VersionError(
        ErrorCode.SMASH_REJECTED,
        doc.version <= 1
          ? `"${formatKey(key)}" has no older version to fold into`
          : `"${formatKey(key)}" has dependents pinned to an older version`,
        { slug: doc.slug, language: key.language, version: doc.version }
      )
    }

    this.checkedEntries(doc)
    const version = doc.version
    const older = version - 1 > 1 ? this.getVersion(doc, version - 2) : undefined

    this.deltas.removeLast(key)
    if (older !== undefined) {
      this.deltas.removeLast(key)
      this.deltas.append(key, createPatch(snapshotOf(doc), older))
    }

    this.dependents.repin(doc, version, version - 1)
    this.log.info(`${formatKey(key)}: smashed version ${version} into ${version - 1}`)
    return { ...doc, version: version - 1 }
  }
}
