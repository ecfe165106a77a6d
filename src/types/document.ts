/**
 * Document types
 *
 * A document lives in two layers:
 * - a {@link BaseDocument}: the language-neutral structure (aspect names,
 *   types, item values, rules), versioned on its own
 * - one {@link LanguageOverlay} per language: labels, descriptions and item
 *   texts that parallel the base structure, also versioned
 *
 * Reading a document in a language merges the two into a
 * {@link MergedDocument}, which is never persisted.
 *
 * @module types/document
 */

import type { TreeObject } from './tree'

// =============================================================================
// Kinds
// =============================================================================

/**
 * Kinds that carry structure (the base tier)
 */
export type StructuralKind = 'schema' | 'base_template' | 'base_code'

/**
 * Kinds that carry language text (the overlay tier)
 */
export type ConcreteKind = 'template' | 'code'

export type DocumentKind = StructuralKind | ConcreteKind

export const STRUCTURAL_KINDS: readonly StructuralKind[] = ['schema', 'base_template', 'base_code']

export const CONCRETE_KINDS: readonly ConcreteKind[] = ['template', 'code']

export function isStructuralKind(kind: string): kind is StructuralKind {
  return kind === 'schema' || kind === 'base_template' || kind === 'base_code'
}

export function isConcreteKind(kind: string): kind is ConcreteKind {
  return kind === 'template' || kind === 'code'
}

/**
 * The overlay kind a base kind is translated into. Schemas have none.
 */
export function concreteKindOf(kind: StructuralKind): ConcreteKind | null {
  switch (kind) {
    case 'base_template':
      return 'template'
    case 'base_code':
      return 'code'
    case 'schema':
      return null
  }
}

// =============================================================================
// References
// =============================================================================

/**
 * How a reference is consumed: as a code list or as a tag vocabulary
 */
export type ReferenceType = 'code' | 'tag'

/**
 * A directed edge from a document to another document it needs
 */
export interface Reference {
  /** Slug of the referenced document */
  destSlug: string
  refType: ReferenceType
  /** Dotted path of the aspect holding the reference, e.g. `habitat.vegetation` */
  aspectPath: string
  /** Tag name, for `tag` references */
  tag?: string | undefined
}

// =============================================================================
// Documents
// =============================================================================

export interface BaseDocument {
  uuid: string
  slug: string
  domain: string
  kind: StructuralKind
  /** Current version, starting at 1 */
  version: number
  content: TreeObject
  references: Reference[]
  /** The template a code document instantiates */
  templateReference?: { slug: string } | undefined
}

/**
 * Overlay status: `draft` while some text of the domain's default
 * language has no counterpart in this language
 */
export type OverlayStatus = 'draft' | 'published'

export interface LanguageOverlay {
  uuid: string
  slug: string
  domain: string
  language: string
  kind: ConcreteKind
  version: number
  /** Version of the base document this overlay was merged against */
  templateVersion: number
  status: OverlayStatus
  content: TreeObject
}

export interface MergedDocument {
  slug: string
  domain: string
  kind: ConcreteKind
  language: string
  /** Base version at merge time */
  version: number
  templateVersion: number
  /** True when the base has moved on since the overlay was last merged */
  outdated: boolean
  content: TreeObject
}

export type StoredDocument = BaseDocument | LanguageOverlay

export function isOverlay(doc: StoredDocument): doc is LanguageOverlay {
  return isConcreteKind(doc.kind)
}

// =============================================================================
// Keys
// =============================================================================

/**
 * Identifies a versioned document: base documents have no language
 */
export interface DocumentKey {
  slug: string
  language: string | null
}

export function keyOf(doc: StoredDocument): DocumentKey {
  return isOverlay(doc)
    ? { slug: doc.slug, language: doc.language }
    : { slug: doc.slug, language: null }
}

/**
 * Stable string form of a key: `slug` or `slug@language`
 */
export function formatKey(key: DocumentKey): string {
  return key.language === null ? key.slug : `${key.slug}@${key.language}`
}
