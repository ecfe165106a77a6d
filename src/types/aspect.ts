/**
 * Aspect model
 *
 * An aspect is one field of a template: a scalar, a choice from a list of
 * items, a repeated sub-aspect or a group of named sub-aspects. Nodes form a
 * closed tagged union, so every walker can switch on `type` exhaustively.
 *
 * @module types/aspect
 */

import type { TreeObject } from './tree'

export type ScalarKind =
  | 'str'
  | 'int'
  | 'float'
  | 'date'
  | 'month'
  | 'images'
  | 'video'
  | 'location'
  | 'geometry'
  | 'entrylink'
  | 'entry_roles'
  | 'external_account'
  | 'any'

export const SCALAR_KINDS: readonly ScalarKind[] = [
  'str', 'int', 'float', 'date', 'month', 'images', 'video', 'location',
  'geometry', 'entrylink', 'entry_roles', 'external_account', 'any',
]

export type SelectMode = 'select' | 'multiselect' | 'tree' | 'treemultiselect'

export const SELECT_MODES: readonly SelectMode[] = ['select', 'multiselect', 'tree', 'treemultiselect']

export interface SelectItem {
  value: string
  text?: string | undefined
  icon?: string | undefined
  tag?: string | undefined
  description?: string | undefined
  children?: SelectItem[] | undefined
}

/**
 * Where a select aspect takes its items from
 */
export type ItemSource =
  | { source: 'inline'; items: SelectItem[] }
  | { source: 'code'; slug: string }

interface AspectCommon {
  name: string
  label?: string | undefined
  description?: string | undefined
  attr?: TreeObject | undefined
}

export interface ScalarAspect extends AspectCommon {
  type: 'scalar'
  kind: ScalarKind
}

export interface SelectAspect extends AspectCommon {
  type: 'select'
  mode: SelectMode
  items: ItemSource
}

export interface ListAspect extends AspectCommon {
  type: 'list'
  itemSchema: AspectNode
}

export interface CompositeAspect extends AspectCommon {
  type: 'composite'
  /** Insertion ordered */
  fields: Map<string, AspectNode>
}

export type AspectNode = ScalarAspect | SelectAspect | ListAspect | CompositeAspect

/**
 * Compile-time exhaustiveness check for switches over a union
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`)
}
