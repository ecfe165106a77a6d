/**
 * Dependency resolver
 *
 * Orders a batch of documents so that every document comes after the
 * documents it references. Only edges to slugs inside the batch count;
 * anything else is assumed to exist already.
 *
 * Ordering runs in rounds (Kahn's algorithm): each round emits, in input
 * order, every node whose in-batch dependencies have all been emitted.
 * Identical input yields identical output.
 *
 * @module dependencies
 */

import { CircularDependencyError } from '../errors'
import type { Logger } from '../utils/logger'
import { resolveLogger } from '../utils/logger'

export type OrderMode = 'strict' | 'lenient'

export const ORDER_MODES: readonly OrderMode[] = ['strict', 'lenient']

export interface DependencyNode {
  slug: string
  /** Slugs this node references */
  refs: Iterable<string>
}

export interface OrderOptions {
  /**
   * `strict` throws on a cycle; `lenient` returns what could be ordered and
   * reports the rest as unresolved
   */
  mode: OrderMode
  logger?: Logger | undefined
}

export interface OrderResult<N extends DependencyNode> {
  /** Slugs in dependency order */
  order: string[]
  /** The nodes, in the same order */
  nodes: N[]
  /** Nodes that could not be ordered, with their unresolved in-batch deps */
  unresolved: Map<string, Set<string>>
}

/**
 * @example
 * ```typescript
 * resolveOrder([
 *   { slug: 'bird_obs', refs: ['bird_species'] },
 *   { slug: 'bird_species', refs: [] },
 * ], { mode: 'strict' }).order
 * // ['bird_species', 'bird_obs']
 * ```
 *
 * @throws CircularDependencyError in strict mode when some nodes can never be ordered
 */
export function resolveOrder<N extends DependencyNode>(
  nodes: readonly N[],
  options: OrderOptions
): OrderResult<N> {
  const log = resolveLogger(options.logger)

  const bySlug = new Map<string, N>()
  for (const node of nodes) {
    if (bySlug.has(node.slug)) {
      log.warn(`Duplicate slug "${node.slug}" in batch, keeping the first occurrence`)
      continue
    }
    bySlug.set(node.slug, node)
  }

  const remaining = new Map<string, Set<string>>()
  for (const [slug, node] of bySlug) {
    const deps = new Set<string>()
    for (const ref of node.refs) {
      if (bySlug.has(ref)) deps.add(ref)
    }
    remaining.set(slug, deps)
  }

  const order: string[] = []
  while (remaining.size > 0) {
    const ready = [...remaining].filter(([, deps]) => deps.size === 0).map(([slug]) => slug)

    if (ready.length === 0) {
      if (options.mode === 'strict') {
        throw new CircularDependencyError(remaining)
      }
      log.warn(`Could not order ${remaining.size} document(s): ${[...remaining.keys()].join(', ')}`)
      break
    }

    for (const slug of ready) {
      remaining.delete(slug)
      order.push(slug)
    }
    for (const deps of remaining.values()) {
      for (const slug of ready) deps.delete(slug)
    }
  }

  const ordered: N[] = []
  for (const slug of order) {
    const node = bySlug.get(slug)
    if (node) ordered.push(node)
  }

  return { order, nodes: ordered, unresolved: remaining }
}
