/**
 * Tree value types
 *
 * Document content is plain JSON: every stored document, overlay, merged
 * document and delta payload is a {@link Tree}.
 *
 * @module types/tree
 */

export type TreePrimitive = string | number | boolean | null

export type TreeArray = Tree[]

export interface TreeObject {
  [key: string]: Tree
}

export type Tree = TreePrimitive | TreeArray | TreeObject

/**
 * Segment of a path into a tree: object key or array index
 */
export type PathSegment = string | number

// =============================================================================
// Type Guards
// =============================================================================

export function isTreeObject(value: Tree | undefined): value is TreeObject {
  return value !== null && value !== undefined && typeof value === 'object' && !Array.isArray(value)
}

export function isTreeArray(value: Tree | undefined): value is TreeArray {
  return Array.isArray(value)
}

/**
 * Objects and arrays are collections; everything else is a leaf
 */
export function isCollection(value: Tree | undefined): value is TreeObject | TreeArray {
  return isTreeObject(value) || isTreeArray(value)
}

/**
 * Narrow an arbitrary parsed value (JSON.parse, YAML) into a Tree.
 * Returns undefined for anything JSON cannot represent.
 */
export function toTree(value: unknown): Tree | undefined {
  if (value === null) return null
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value
    case 'number':
      return Number.isFinite(value) ? value : undefined
    case 'object': {
      if (Array.isArray(value)) {
        const items: Tree[] = []
        for (const item of value) {
          const converted = toTree(item)
          if (converted === undefined) return undefined
          items.push(converted)
        }
        return items
      }
      if (value instanceof Date) return value.toISOString()
      const out: TreeObject = {}
      for (const [key, child] of Object.entries(value)) {
        if (child === undefined) continue
        const converted = toTree(child)
        if (converted === undefined) return undefined
        out[key] = converted
      }
      return out
    }
    default:
      return undefined
  }
}

/**
 * Join path segments into the dotted form used in diagnostics: `aspects.2.label`
 */
export function formatPath(segments: readonly PathSegment[]): string {
  return segments.map(String).join('.')
}
