/**
 * Overlay completeness
 *
 * An overlay is `published` once it has every text its domain's default
 * language has. A text counts as missing when the default language has
 * the key and this overlay does not, or when the default language has a
 * non-empty string where this overlay has an empty one.
 *
 * @module service/status
 */

import type { TreeObject } from '../types/tree'
import type { OverlayStatus } from '../types/document'
import { diffTrees, project } from '../diff'

/**
 * Dotted paths of the texts `candidate` lacks compared with `reference`
 *
 * @example
 * missingTexts(
 *   { title: 'Birds', aspects: [{ label: 'Species' }] },
 *   { title: 'Oiseaux', aspects: [{ label: '' }] }
 * )
 * // ['aspects.0.label']
 */
export function missingTexts(reference: TreeObject, candidate: TreeObject): string[] {
  const missing: string[] = []
  for (const change of diffTrees(project(reference, []), project(candidate, []))) {
    if (change.kind === 'item-removed') {
      missing.push(change.path)
    } else if (
      change.kind === 'value-changed' &&
      typeof change.oldValue === 'string' &&
      change.oldValue !== '' &&
      change.newValue === ''
    ) {
      missing.push(change.path)
    }
  }
  return missing
}

/**
 * Status of an overlay given the default-language overlay, if any
 */
export function overlayStatus(
  content: TreeObject,
  defaultLanguageContent: TreeObject | undefined
): OverlayStatus {
  if (defaultLanguageContent === undefined) return 'published'
  return missingTexts(defaultLanguageContent, content).length === 0 ? 'published' : 'draft'
}
