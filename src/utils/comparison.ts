/**
 * Comparison and value utilities for document trees
 *
 * @module utils/comparison
 */

import type { PathSegment, Tree, TreeObject } from '../types/tree'
import { isTreeArray, isTreeObject } from '../types/tree'

// =============================================================================
// Deep Equality
// =============================================================================

/**
 * Deep equality check for two trees
 *
 * Arrays compare element-wise, objects key-wise regardless of key order.
 * `undefined` (an absent value) only equals itself.
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual([1, 2], [2, 1]) // false
 */
export function deepEqual(a: Tree | undefined, b: Tree | undefined): boolean {
  if (a === b) return true
  if (a === undefined || b === undefined || a === null || b === null) return false

  if (isTreeArray(a) && isTreeArray(b)) {
    if (a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (isTreeObject(a) && isTreeObject(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every(k => Object.prototype.hasOwnProperty.call(b, k) && deepEqual(a[k], b[k]))
  }

  return false
}

// =============================================================================
// Cloning
// =============================================================================

/**
 * Deep clone a tree. Callers get a value they may mutate freely.
 */
export function deepClone<T extends Tree>(value: T): T {
  return structuredClone(value)
}

// =============================================================================
// Normalisation
// =============================================================================

/**
 * Drop every object key whose value is null, at any depth.
 * Array items are kept (positions are significant), but objects inside
 * arrays are cleaned too.
 */
export function stripNulls(value: Tree): Tree {
  if (isTreeArray(value)) {
    return value.map(stripNulls)
  }
  if (isTreeObject(value)) {
    const out: TreeObject = {}
    for (const [key, child] of Object.entries(value)) {
      if (child === null) continue
      out[key] = stripNulls(child)
    }
    return out
  }
  return value
}

// =============================================================================
// Nested Value Access
// =============================================================================

/**
 * Read the value at a path, or undefined when any segment is missing
 *
 * @example
 * getAt({ aspects: [{ name: 'species' }] }, ['aspects', 0, 'name']) // 'species'
 */
export function getAt(tree: Tree | undefined, path: readonly PathSegment[]): Tree | undefined {
  let current: Tree | undefined = tree
  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!isTreeArray(current)) return undefined
      current = current[segment]
    } else {
      if (!isTreeObject(current)) return undefined
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined
    }
  }
  return current
}
