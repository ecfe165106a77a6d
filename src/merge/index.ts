/**
 * Merge engine
 *
 * Combines a language-neutral base tree with a language overlay tree into
 * one tree. The overlay is expected to parallel the base: same aspects in
 * the same positions, with texts where the base has structure.
 *
 * Rules:
 * - objects merge key-wise, recursing into keys present on both sides
 * - arrays merge position by position
 * - when exactly one side is absent, the other side is taken as is
 * - when both sides are leaves, the overlay wins
 *
 * In strict mode arrays of different length and collection-shape conflicts
 * (array against object, collection against leaf) raise a {@link MergeError}
 * naming the first disagreement. In lenient mode the missing side is filled
 * from the present side and shape conflicts go to the overlay.
 *
 * @module merge
 */

import type { PathSegment, Tree, TreeObject } from '../types/tree'
import { formatPath, isCollection, isTreeArray, isTreeObject } from '../types/tree'
import type { BaseDocument, LanguageOverlay, MergedDocument } from '../types/document'
import { concreteKindOf } from '../types/document'
import { deepClone } from '../utils/comparison'
import { ErrorCode, MergeError, ValidationError } from '../errors'
import type { Logger } from '../utils/logger'
import { resolveLogger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface MergeOptions {
  /** Reject length mismatches and shape conflicts instead of reconciling them */
  strict: boolean
}

/**
 * Outcome of merging one aspect pair
 */
export interface AspectMergeReport {
  index: number
  /** `name` of the base aspect, when there is one */
  baseName: string | null
  /** `label` of the overlay aspect, when there is one */
  overlayLabel: string | null
  error: MergeError | null
}

// =============================================================================
// Tree Merge
// =============================================================================

/**
 * Merge an overlay tree onto a base tree. Neither input is modified.
 *
 * Two leaves never conflict: the overlay value wins whatever its type.
 * A shape conflict (array against object, or a collection against a leaf)
 * is a `TYPE_CONFLICT` in strict mode, so a translation cannot replace a
 * structural list or group with text. Lenient mode lets the overlay win
 * there too, the same as a plain override-style deep merge.
 *
 * @example
 * ```typescript
 * merge(
 *   { aspects: [{ name: 'species', type: 'str' }] },
 *   { aspects: [{ label: 'Species' }] },
 *   { strict: true }
 * )
 * // { aspects: [{ name: 'species', type: 'str', label: 'Species' }] }
 * ```
 *
 * @throws MergeError in strict mode, when the trees do not line up
 */
export function merge(
  base: Tree | undefined,
  overlay: Tree | undefined,
  options: MergeOptions
): Tree {
  return mergeAt(base, overlay, [], options)
}

function mergeAt(
  base: Tree | undefined,
  overlay: Tree | undefined,
  path: PathSegment[],
  options: MergeOptions
): Tree {
  if (overlay === undefined || overlay === null) {
    return base === undefined ? null : deepClone(base)
  }
  if (base === undefined || base === null) return deepClone(overlay)

  if (isTreeObject(base) && isTreeObject(overlay)) {
    const out: TreeObject = {}
    for (const [key, value] of Object.entries(base)) {
      out[key] = Object.prototype.hasOwnProperty.call(overlay, key)
        ? mergeAt(value, overlay[key], [...path, key], options)
        : deepClone(value)
    }
    for (const [key, value] of Object.entries(overlay)) {
      if (!Object.prototype.hasOwnProperty.call(base, key)) {
        out[key] = deepClone(value)
      }
    }
    return out
  }

  if (isTreeArray(base) && isTreeArray(overlay)) {
    if (options.strict && base.length !== overlay.length) {
      const at = Math.min(base.length, overlay.length)
      throw new MergeError(ErrorCode.STRUCTURAL_MISMATCH, formatPath([...path, at]))
    }
    const length = Math.max(base.length, overlay.length)
    const out: Tree[] = []
    for (let i = 0; i < length; i++) {
      out.push(mergeAt(base[i], overlay[i], [...path, i], options))
    }
    return out
  }

  if (isCollection(base) || isCollection(overlay)) {
    if (options.strict) {
      throw new MergeError(ErrorCode.TYPE_CONFLICT, formatPath(path))
    }
  }

  return deepClone(overlay)
}

// =============================================================================
// Per-Aspect Diagnostics
// =============================================================================

/**
 * Merge the `aspects` lists of two trees pair by pair and report which
 * pairs fail. Never throws; used to explain a whole-document failure.
 */
export function mergeAspectsOneByOne(
  base: TreeObject,
  overlay: TreeObject,
  options: MergeOptions
): AspectMergeReport[] {
  const baseAspects = isTreeArray(base.aspects) ? base.aspects : []
  const overlayAspects = isTreeArray(overlay.aspects) ? overlay.aspects : []
  const count = Math.max(baseAspects.length, overlayAspects.length)
  const reports: AspectMergeReport[] = []

  for (let index = 0; index < count; index++) {
    const baseAspect = baseAspects[index]
    const overlayAspect = overlayAspects[index]
    const report: AspectMergeReport = {
      index,
      baseName: stringField(baseAspect, 'name'),
      overlayLabel: stringField(overlayAspect, 'label'),
      error: null,
    }

    if (baseAspect === undefined || overlayAspect === undefined) {
      report.error = new MergeError(ErrorCode.STRUCTURAL_MISMATCH, formatPath(['aspects', index]))
    } else {
      try {
        mergeAt(baseAspect, overlayAspect, ['aspects', index], options)
      } catch (error) {
        if (!(error instanceof MergeError)) throw error
        report.error = error
      }
    }
    reports.push(report)
  }

  return reports
}

function stringField(tree: Tree | undefined, key: string): string | null {
  if (!isTreeObject(tree)) return null
  const value = tree[key]
  return typeof value === 'string' ? value : null
}

// =============================================================================
// Document Merge
// =============================================================================

/**
 * Merge an overlay onto its base document (strict mode).
 *
 * On failure the per-aspect breakdown is logged before the error is rethrown,
 * so the log names every aspect that no longer lines up.
 */
export function mergeDocument(
  base: BaseDocument,
  overlay: LanguageOverlay,
  logger?: Logger
): MergedDocument {
  const log = resolveLogger(logger)
  const kind = concreteKindOf(base.kind)
  if (kind === null) {
    throw new ValidationError(`Documents of kind "${base.kind}" have no language overlays`, {
      slug: base.slug,
    })
  }

  let merged: Tree
  try {
    merged = merge(base.content, overlay.content, { strict: true })
  } catch (error) {
    if (error instanceof MergeError) {
      logMergeDiagnostics(base, overlay, log)
    }
    throw error
  }

  if (!isTreeObject(merged)) {
    throw new MergeError(ErrorCode.TYPE_CONFLICT, '')
  }

  return {
    slug: base.slug,
    domain: base.domain,
    kind,
    language: overlay.language,
    version: base.version,
    templateVersion: overlay.templateVersion,
    outdated: overlay.templateVersion < base.version,
    content: merged,
  }
}

/**
 * Log which aspect pairs of a failed merge disagree, as `name:index`
 */
export function logMergeDiagnostics(
  base: BaseDocument,
  overlay: LanguageOverlay,
  logger?: Logger
): AspectMergeReport[] {
  const log = resolveLogger(logger)
  const reports = mergeAspectsOneByOne(base.content, overlay.content, { strict: true })
  for (const report of reports) {
    const label = `${report.baseName ?? '?'}:${report.index}`
    if (report.error) {
      log.warn(`merge ${base.slug}@${overlay.language} failed at aspect ${label}`, report.error.path)
    } else {
      log.debug(`merge ${base.slug}@${overlay.language} aspect ${label} ok`)
    }
  }
  return reports
}
