/**
 * Aspect Parser
 *
 * Validates raw aspect trees (as they come from source files or callers)
 * with zod and converts them into {@link AspectNode} values.
 *
 * The parse mode is an argument of every call:
 * - `strict` rejects keys the aspect model does not know
 * - `permissive` keeps them in the raw tree and ignores them
 *
 * @module schema/parser
 */

import { z } from 'zod'
import type { AspectNode, ItemSource, SelectItem } from '../types/aspect'
import { SCALAR_KINDS, SELECT_MODES } from '../types/aspect'
import type { Tree, TreeObject } from '../types/tree'
import { isTreeArray, isTreeObject, toTree } from '../types/tree'
import { ValidationError } from '../errors'
import type { Logger } from '../utils/logger'
import { resolveLogger } from '../utils/logger'

export type ParseMode = 'strict' | 'permissive'

export const PARSE_MODES: readonly ParseMode[] = ['strict', 'permissive']

// =============================================================================
// Raw Shapes
// =============================================================================

export type RawItem = string | {
  value: string
  text?: string | undefined
  icon?: string | undefined
  tag?: string | undefined
  description?: string | undefined
  children?: RawItem[] | undefined
}

export interface RawAspect {
  name: string
  type: string
  label?: string | undefined
  description?: string | undefined
  attr?: Record<string, unknown> | undefined
  items?: string | RawItem[] | undefined
  list_items?: RawAspect | undefined
  components?: RawAspect[] | undefined
}

const ASPECT_TYPES: readonly string[] = [...SCALAR_KINDS, ...SELECT_MODES, 'list', 'composite']

interface ModeSchemas {
  aspect: z.ZodType<RawAspect>
  aspects: z.ZodType<RawAspect[]>
}

function buildSchemas(mode: ParseMode): ModeSchemas {
  const shape = <T extends z.ZodRawShape>(raw: T) =>
    mode === 'strict' ? z.object(raw).strict() : z.object(raw).passthrough()

  const item: z.ZodType<RawItem> = z.lazy(() =>
    z.union([
      z.string(),
      shape({
        value: z.string(),
        text: z.string().optional(),
        icon: z.string().optional(),
        tag: z.string().optional(),
        description: z.string().optional(),
        children: z.array(item).optional(),
      }),
    ])
  )

  const aspect: z.ZodType<RawAspect> = z.lazy(() =>
    shape({
      name: z.string().min(1),
      type: z.string().refine(t => ASPECT_TYPES.includes(t), t => ({
        message: `Unknown aspect type "${t}"`,
      })),
      label: z.string().optional(),
      description: z.string().optional(),
      attr: z.record(z.unknown()).optional(),
      items: z.union([z.string().min(1), z.array(item)]).optional(),
      list_items: aspect.optional(),
      components: z.array(aspect).optional(),
    })
  )

  return { aspect, aspects: z.array(aspect) }
}

const schemas: Record<ParseMode, ModeSchemas> = {
  strict: buildSchemas('strict'),
  permissive: buildSchemas('permissive'),
}

// =============================================================================
// Parsing
// =============================================================================

export interface ParseOptions {
  mode: ParseMode
  logger?: Logger | undefined
  /** Slug of the owning document, for error context */
  slug?: string | undefined
}

/**
 * Validate and convert a document's `aspects` list
 *
 * @example
 * ```typescript
 * const nodes = parseAspects(
 *   [{ name: 'species', type: 'select', items: 'bird_species' }],
 *   { mode: 'strict' }
 * )
 * nodes[0].type // 'select'
 * ```
 *
 * @throws ValidationError when the tree does not describe valid aspects
 */
export function parseAspects(raw: Tree | undefined, options: ParseOptions): AspectNode[] {
  const result = schemas[options.mode].aspects.safeParse(raw ?? [])
  if (!result.success) {
    throw new ValidationError(`Invalid aspects${options.slug ? ` in "${options.slug}"` : ''}`, {
      slug: options.slug,
      issues: formatIssues(result.error),
    })
  }
  return result.data.map(a => toNode(a, options))
}

/**
 * Validate and convert a single aspect
 */
export function parseAspect(raw: Tree, options: ParseOptions): AspectNode {
  const result = schemas[options.mode].aspect.safeParse(raw)
  if (!result.success) {
    throw new ValidationError('Invalid aspect', {
      slug: options.slug,
      issues: formatIssues(result.error),
    })
  }
  return toNode(result.data, options)
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
}

// =============================================================================
// Raw -> Node
// =============================================================================

function toNode(raw: RawAspect, options: ParseOptions): AspectNode {
  const common = {
    name: raw.name,
    label: raw.label,
    description: raw.description,
    attr: toAttr(raw.attr),
  }

  if (isScalarKind(raw.type)) {
    return { ...common, type: 'scalar', kind: raw.type }
  }

  if (isSelectMode(raw.type)) {
    if (raw.items === undefined) {
      throw new ValidationError(`Aspect "${raw.name}" of type ${raw.type} needs items`, {
        field: `${raw.name}.items`,
        slug: options.slug,
      })
    }
    return { ...common, type: 'select', mode: raw.type, items: toItemSource(raw.items) }
  }

  if (raw.type === 'list') {
    if (raw.list_items === undefined) {
      throw new ValidationError(`List aspect "${raw.name}" needs list_items`, {
        field: `${raw.name}.list_items`,
        slug: options.slug,
      })
    }
    return { ...common, type: 'list', itemSchema: toNode(raw.list_items, options) }
  }

  // composite
  const fields = new Map<string, AspectNode>()
  if (raw.components === undefined) {
    resolveLogger(options.logger).warn(`Composite aspect "${raw.name}" has no components`)
  }
  for (const component of raw.components ?? []) {
    if (fields.has(component.name)) {
      throw new ValidationError(`Composite aspect "${raw.name}" repeats component "${component.name}"`, {
        field: `${raw.name}.components`,
        slug: options.slug,
      })
    }
    fields.set(component.name, toNode(component, options))
  }
  return { ...common, type: 'composite', fields }
}

function isScalarKind(type: string): type is (typeof SCALAR_KINDS)[number] {
  return SCALAR_KINDS.some(kind => kind === type)
}

function isSelectMode(type: string): type is (typeof SELECT_MODES)[number] {
  return SELECT_MODES.some(mode => mode === type)
}

function toAttr(attr: Record<string, unknown> | undefined): TreeObject | undefined {
  if (attr === undefined) return undefined
  const tree = toTree(attr)
  return isTreeObject(tree) ? tree : undefined
}

function toItemSource(items: string | RawItem[]): ItemSource {
  if (typeof items === 'string') {
    return { source: 'code', slug: items }
  }
  return { source: 'inline', items: items.map(toSelectItem) }
}

function toSelectItem(item: RawItem): SelectItem {
  if (typeof item === 'string') return { value: item }
  const out: SelectItem = { value: item.value }
  if (item.text !== undefined) out.text = item.text
  if (item.icon !== undefined) out.icon = item.icon
  if (item.tag !== undefined) out.tag = item.tag
  if (item.description !== undefined) out.description = item.description
  if (item.children !== undefined) out.children = item.children.map(toSelectItem)
  return out
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * The `aspects` list of a content tree, or an empty list
 */
export function aspectsOf(content: TreeObject): Tree[] {
  const aspects = content.aspects
  return isTreeArray(aspects) ? aspects : []
}
