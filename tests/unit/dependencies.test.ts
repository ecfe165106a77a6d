/**
 * Dependency Resolver Test Suite
 */

import { describe, it, expect } from 'vitest'
import { resolveOrder } from '../../src/dependencies'
import { CircularDependencyError, ErrorCode } from '../../src/errors'
import { createRecordingLogger } from '../factories'

describe('resolveOrder', () => {
  it('puts referenced documents first, in input order within a round', () => {
    const result = resolveOrder(
      [
        { slug: 'bird_obs', refs: ['bird_species', 'vegetation_types'] },
        { slug: 'vegetation_types', refs: [] },
        { slug: 'bird_species', refs: [] },
      ],
      { mode: 'strict' }
    )

    expect(result.order).toEqual(['vegetation_types', 'bird_species', 'bird_obs'])
    expect(result.nodes.map(n => n.slug)).toEqual(result.order)
    expect(result.unresolved.size).toBe(0)
  })

  it('orders a chain', () => {
    const result = resolveOrder(
      [
        { slug: 'c', refs: ['b'] },
        { slug: 'b', refs: ['a'] },
        { slug: 'a', refs: [] },
      ],
      { mode: 'strict' }
    )

    expect(result.order).toEqual(['a', 'b', 'c'])
  })

  it('ignores references to documents outside the batch', () => {
    expect(resolveOrder([{ slug: 'x', refs: ['missing'] }], { mode: 'strict' }).order).toEqual(['x'])
  })

  it('gives the same order for the same input', () => {
    const nodes = [
      { slug: 'b', refs: [] },
      { slug: 'a', refs: [] },
      { slug: 'c', refs: ['a'] },
    ]

    expect(resolveOrder(nodes, { mode: 'strict' }).order).toEqual(resolveOrder(nodes, { mode: 'strict' }).order)
    expect(resolveOrder(nodes, { mode: 'strict' }).order).toEqual(['b', 'a', 'c'])
  })

  it('keeps the first of two nodes with the same slug', () => {
    const logger = createRecordingLogger()
    const first = { slug: 'a', refs: [] }
    const result = resolveOrder([first, { slug: 'a', refs: ['b'] }, { slug: 'b', refs: [] }], {
      mode: 'strict',
      logger,
    })

    expect(result.order).toEqual(['a', 'b'])
    expect(result.nodes[0]).toBe(first)
    expect(logger.warn).toHaveBeenCalledWith('Duplicate slug "a" in batch, keeping the first occurrence')
  })

  // ===========================================================================
  // Cycles
  // ===========================================================================

  describe('cycles', () => {
    const cyclic = [
      { slug: 'a', refs: ['b'] },
      { slug: 'b', refs: ['a'] },
      { slug: 'c', refs: [] },
    ]

    it('throws in strict mode, naming only the documents in the cycle', () => {
      let caught: unknown
      try {
        resolveOrder(cyclic, { mode: 'strict' })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(CircularDependencyError)
      if (!(caught instanceof CircularDependencyError)) return
      expect(caught.code).toBe(ErrorCode.CIRCULAR_DEPENDENCY)
      expect(caught.message).toBe('Circular dependency among 2 document(s): a -> [b]; b -> [a]')
      expect(caught.context).toEqual({ remaining: { a: ['b'], b: ['a'] } })
    })

    it('returns what it could order in lenient mode', () => {
      const logger = createRecordingLogger()
      const result = resolveOrder(cyclic, { mode: 'lenient', logger })

      expect(result.order).toEqual(['c'])
      expect([...result.unresolved.keys()]).toEqual(['a', 'b'])
      expect(logger.warn).toHaveBeenCalledWith('Could not order 2 document(s): a, b')
    })

    it('treats a self-reference as a cycle', () => {
      expect(() => resolveOrder([{ slug: 's', refs: ['s'] }], { mode: 'strict' })).toThrow(
        'Circular dependency among 1 document(s): s -> [s]'
      )
    })

    it('leaves documents behind a cycle unresolved', () => {
      const result = resolveOrder([...cyclic, { slug: 'd', refs: ['a'] }], { mode: 'lenient' })

      expect(result.order).toEqual(['c'])
      expect(result.unresolved.get('d')).toEqual(new Set(['a']))
    })
  })
})
