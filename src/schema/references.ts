/**
 * Reference extraction
 *
 * Walks a parsed aspect tree and lists every other document it depends on:
 * select-style aspects whose items come from a code document. The
 * aspect's `attr.tag` turns a code reference into a tag reference.
 *
 * @module schema/references
 */

import type { AspectNode } from '../types/aspect'
import { assertNever } from '../types/aspect'
import type { Reference } from '../types/document'

/**
 * Collect the references of a list of aspects, in document order
 *
 * @example
 * ```typescript
 * extractReferences(parseAspects([
 *   { name: 'habitat', type: 'composite', components: [
 *     { name: 'vegetation', type: 'select', items: 'vegetation_types' },
 *   ] },
 * ], { mode: 'strict' }))
 * // [{ destSlug: 'vegetation_types', refType: 'code', aspectPath: 'habitat.vegetation' }]
 * ```
 */
export function extractReferences(aspects: readonly AspectNode[]): Reference[] {
  const out: Reference[] = []
  for (const aspect of aspects) {
    collect(aspect, [], out)
  }
  return out
}

function collect(aspect: AspectNode, parents: string[], out: Reference[]): void {
  const path = [...parents, aspect.name]
  switch (aspect.type) {
    case 'scalar':
      return
    case 'select': {
      if (aspect.items.source !== 'code') return
      const tag = aspect.attr?.tag
      if (tag !== undefined && tag !== null && tag !== false && tag !== '') {
        out.push({
          destSlug: aspect.items.slug,
          refType: 'tag',
          aspectPath: path.join('.'),
          tag: typeof tag === 'string' ? tag : undefined,
        })
      } else {
        out.push({ destSlug: aspect.items.slug, refType: 'code', aspectPath: path.join('.') })
      }
      return
    }
    case 'list':
      collect(aspect.itemSchema, path, out)
      return
    case 'composite':
      for (const field of aspect.fields.values()) {
        collect(field, path, out)
      }
      return
    default:
      assertNever(aspect)
  }
}

/**
 * Distinct destination slugs, first occurrence first
 */
export function referencedSlugs(references: readonly Reference[]): string[] {
  return [...new Set(references.map(r => r.destSlug))]
}
