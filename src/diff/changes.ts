/**
 * Change detection for document trees
 *
 * Compares a persisted tree with an incoming one after projecting away
 * bookkeeping fields and null values. An empty diff means the write is a
 * no-op. The same diff, turned into a patch, is what the version
 * store records as a reverse delta.
 *
 * @module diff/changes
 */

import type { PathSegment, Tree, TreeObject } from '../types/tree'
import { formatPath, isTreeArray, isTreeObject } from '../types/tree'
import { deepEqual, stripNulls } from '../utils/comparison'
import { DEFAULT_IGNORE_FIELDS } from '../constants'

// =============================================================================
// Types
// =============================================================================

export type ChangeKind = 'item-added' | 'item-removed' | 'value-changed'

/**
 * One difference between two trees
 */
export interface ChangeRecord {
  kind: ChangeKind
  /** Dotted location, e.g. `aspects.1.label` (empty string for the root) */
  path: string
  /** The same location as segments */
  segments: PathSegment[]
  oldValue?: Tree | undefined
  newValue?: Tree | undefined
}

export interface CompareResult {
  isEqual: boolean
  diff: ChangeRecord[]
}

// =============================================================================
// Projection
// =============================================================================

/**
 * Drop top-level ignored fields, then null-valued keys at every depth
 *
 * @example
 * project({ uuid: 'x', title: 'Birds', description: null }, ['uuid'])
 * // { title: 'Birds' }
 */
export function project(tree: Tree, ignoreFields: Iterable<string> = DEFAULT_IGNORE_FIELDS): Tree {
  if (!isTreeObject(tree)) return stripNulls(tree)
  const ignored = new Set(ignoreFields)
  const kept: TreeObject = {}
  for (const [key, value] of Object.entries(tree)) {
    if (ignored.has(key)) continue
    kept[key] = value
  }
  return stripNulls(kept)
}

// =============================================================================
// Diff
// =============================================================================

/**
 * Structural diff from `a` to `b`
 *
 * Objects are compared key-wise, arrays by index. When `a` has more array
 * items than `b`, the removed items are listed from the highest index down,
 * so that applying them in order never shifts a later position.
 */
export function diffTrees(a: Tree, b: Tree): ChangeRecord[] {
  const out: ChangeRecord[] = []
  walk(a, b, [], out)
  return out
}

function walk(a: Tree, b: Tree, segments: PathSegment[], out: ChangeRecord[]): void {
  if (deepEqual(a, b)) return

  if (isTreeObject(a) && isTreeObject(b)) {
    for (const [key, oldValue] of Object.entries(a)) {
      const at = [...segments, key]
      const newValue = Object.prototype.hasOwnProperty.call(b, key) ? b[key] : undefined
      if (newValue === undefined) {
        out.push(record('item-removed', at, oldValue, undefined))
      } else {
        walk(oldValue, newValue, at, out)
      }
    }
    for (const [key, newValue] of Object.entries(b)) {
      if (!Object.prototype.hasOwnProperty.call(a, key)) {
        out.push(record('item-added', [...segments, key], undefined, newValue))
      }
    }
    return
  }

  if (isTreeArray(a) && isTreeArray(b)) {
    const common = Math.min(a.length, b.length)
    for (let i = 0; i < common; i++) {
      const oldItem = a[i]
      const newItem = b[i]
      if (oldItem !== undefined && newItem !== undefined) {
        walk(oldItem, newItem, [...segments, i], out)
      }
    }
    for (let i = common; i < b.length; i++) {
      out.push(record('item-added', [...segments, i], undefined, b[i]))
    }
    for (let i = a.length - 1; i >= common; i--) {
      out.push(record('item-removed', [...segments, i], a[i], undefined))
    }
    return
  }

  out.push(record('value-changed', segments, a, b))
}

function record(
  kind: ChangeKind,
  segments: PathSegment[],
  oldValue: Tree | undefined,
  newValue: Tree | undefined
): ChangeRecord {
  const change: ChangeRecord = { kind, path: formatPath(segments), segments }
  if (oldValue !== undefined) change.oldValue = oldValue
  if (newValue !== undefined) change.newValue = newValue
  return change
}

// =============================================================================
// Compare
// =============================================================================

/**
 * Compare a persisted tree with an incoming one
 *
 * @example
 * ```typescript
 * const { isEqual } = compare(stored, incoming)
 * if (isEqual) return // nothing to write
 * ```
 */
export function compare(
  persisted: Tree,
  incoming: Tree,
  ignoreFields: Iterable<string> = DEFAULT_IGNORE_FIELDS
): CompareResult {
  const ignored = [...ignoreFields]
  const diff = diffTrees(project(persisted, ignored), project(incoming, ignored))
  return { isEqual: diff.length === 0, diff }
}
