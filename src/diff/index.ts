/**
 * Change detection and structural patches
 *
 * @module diff
 */

export { project, diffTrees, compare } from './changes'
export type { ChangeKind, ChangeRecord, CompareResult } from './changes'
export { createPatch, applyPatch } from './patch'
export type { Patch, PatchOperation } from './patch'
