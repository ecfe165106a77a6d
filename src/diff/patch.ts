/**
 * Reversible structural patches
 *
 * A patch is the list of operations that turns one tree into another. The
 * version store keeps one patch per historical version, turning the newer
 * content back into the older one.
 *
 * @module diff/patch
 */

import type { PathSegment, Tree } from '../types/tree'
import { formatPath, isTreeArray, isTreeObject } from '../types/tree'
import { deepClone, getAt } from '../utils/comparison'
import { ValidationError } from '../errors'
import { diffTrees } from './changes'

export type PatchOperation =
  | { op: 'add'; path: PathSegment[]; value: Tree }
  | { op: 'remove'; path: PathSegment[] }
  | { op: 'replace'; path: PathSegment[]; value: Tree }

export interface Patch {
  ops: PatchOperation[]
}

/**
 * Build the patch that turns `from` into `to`
 */
export function createPatch(from: Tree, to: Tree): Patch {
  const ops: PatchOperation[] = []
  for (const change of diffTrees(from, to)) {
    switch (change.kind) {
      case 'item-added':
        ops.push({ op: 'add', path: change.segments, value: change.newValue ?? null })
        break
      case 'item-removed':
        ops.push({ op: 'remove', path: change.segments })
        break
      case 'value-changed':
        ops.push({ op: 'replace', path: change.segments, value: change.newValue ?? null })
        break
    }
  }
  return { ops }
}

/**
 * Apply a patch to a copy of `tree`; the input is left untouched
 *
 * @throws ValidationError when an operation addresses a location that does not exist
 */
export function applyPatch(tree: Tree, patch: Patch): Tree {
  let root = deepClone(tree)

  for (const operation of patch.ops) {
    const { path } = operation
    if (path.length === 0) {
      if (operation.op === 'remove') {
        throw new ValidationError('Patch cannot remove the root of a tree')
      }
      root = deepClone(operation.value)
      continue
    }

    const parentPath = path.slice(0, -1)
    const last = path[path.length - 1]
    const parent = getAt(root, parentPath)
    const where = formatPath(path)

    if (isTreeArray(parent) && typeof last === 'number') {
      if (last < 0 || last > parent.length || (operation.op !== 'add' && last === parent.length)) {
        throw new ValidationError(`Patch index out of range at "${where}"`)
      }
      switch (operation.op) {
        case 'add':
          parent.splice(last, 0, deepClone(operation.value))
          break
        case 'remove':
          parent.splice(last, 1)
          break
        case 'replace':
          parent[last] = deepClone(operation.value)
          break
      }
      continue
    }

    if (isTreeObject(parent) && typeof last === 'string') {
      switch (operation.op) {
        case 'add':
        case 'replace':
          parent[last] = deepClone(operation.value)
          break
        case 'remove':
          if (!Object.prototype.hasOwnProperty.call(parent, last)) {
            throw new ValidationError(`Patch removes missing key at "${where}"`)
          }
          delete parent[last]
          break
      }
      continue
    }

    throw new ValidationError(`Patch path does not exist: "${where}"`)
  }

  return root
}
