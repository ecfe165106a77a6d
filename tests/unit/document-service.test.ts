/**
 * DocumentService Test Suite
 *
 * Writes, merged reads, language fallback, versions and observers.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { DocumentService } from '../../src/service/DocumentService'
import type { CommitEvent } from '../../src/events'
import {
  ErrorCode,
  MergeError,
  NotFoundError,
  ValidationError,
  VersionError,
} from '../../src/errors'
import type { TreeObject } from '../../src/types/tree'
import { isTreeArray } from '../../src/types/tree'
import {
  birdObsContent,
  birdObsEnglish,
  birdObsInput,
  colorsInput,
  colorsTexts,
  createRecordingLogger,
  createService,
} from '../factories'

function withAspect(content: TreeObject, aspect: TreeObject): TreeObject {
  const aspects = isTreeArray(content.aspects) ? content.aspects : []
  return { ...content, aspects: [...aspects, aspect] }
}

function catchError<E extends Error>(type: new (...args: never[]) => E, fn: () => unknown): E {
  try {
    fn()
  } catch (error) {
    if (error instanceof type) return error
    throw error
  }
  throw new Error(`expected a ${type.name}`)
}

describe('DocumentService', () => {
  let service: DocumentService

  beforeEach(() => {
    service = createService()
  })

  // ===========================================================================
  // Base Documents
  // ===========================================================================

  describe('updateOrInsert', () => {
    it('creates a document at version 1 with its references', () => {
      const result = service.updateOrInsert(birdObsInput())

      expect(result.outcome).toBe('created')
      expect(result.version).toBe(1)
      expect(result.document.uuid).toBe('uuid-1')
      expect(result.document.references).toEqual([
        { destSlug: 'bird_species', refType: 'code', aspectPath: 'species' },
        { destSlug: 'vegetation_types', refType: 'tag', aspectPath: 'habitat.vegetation', tag: 'vegetation' },
      ])
    })

    it('keeps a uuid given on insert', () => {
      expect(service.updateOrInsert(birdObsInput({ uuid: 'fixed-uuid' })).document.uuid).toBe('fixed-uuid')
    })

    it('bumps on a content change and ignores a repeated write', () => {
      service.updateOrInsert(birdObsInput())
      const bumped = service.updateOrInsert(
        birdObsInput({ content: withAspect(birdObsContent(), { name: 'date', type: 'date' }) })
      )
      const repeated = service.updateOrInsert(
        birdObsInput({ content: withAspect(birdObsContent(), { name: 'date', type: 'date' }) })
      )

      expect(bumped.outcome).toBe('bumped')
      expect(bumped.version).toBe(2)
      expect(repeated.outcome).toBe('unchanged')
      expect(repeated.version).toBe(2)
    })

    it('drops null values before storing', () => {
      const result = service.updateOrInsert(birdObsInput({ content: { ...birdObsContent(), note: null } }))

      expect(result.document.content).toEqual(birdObsContent())
    })

    it('rejects an invalid slug', () => {
      expect(() => service.updateOrInsert(birdObsInput({ slug: 'Bird Obs' }))).toThrow('Invalid slug "Bird Obs"')
    })

    it('rejects a slug owned by another domain', () => {
      service.updateOrInsert(birdObsInput())

      const error = catchError(ValidationError, () => service.updateOrInsert(birdObsInput({ domain: 'fish' })))
      expect(error.message).toBe('"bird_obs" already exists in domain "birds"')
      expect(error.field).toBe('domain')
    })

    it('rejects a change of kind', () => {
      service.updateOrInsert(birdObsInput())

      expect(() => service.updateOrInsert(birdObsInput({ kind: 'base_code' }))).toThrow(
        '"bird_obs" is a base_template, not a base_code'
      )
    })

    it('rejects aspects of an unknown type', () => {
      const error = catchError(ValidationError, () =>
        service.updateOrInsert(birdObsInput({ content: { aspects: [{ name: 'x', type: 'nope' }] } }))
      )

      expect(error.message).toBe('Invalid aspects in "bird_obs"')
      expect(error.context.issues).toEqual(['0.type: Unknown aspect type "nope"'])
    })

    it('accepts unknown aspect keys only in permissive mode', () => {
      const input = birdObsInput({ content: { aspects: [{ name: 'x', type: 'str', widget: 'slider' }] } })

      expect(() => service.updateOrInsert(input)).toThrow(ValidationError)
      expect(service.updateOrInsert(input, { parseMode: 'permissive' }).outcome).toBe('created')
    })

    it('requires the instantiated template to exist', () => {
      const error = catchError(NotFoundError, () =>
        service.updateOrInsert({ ...colorsInput(), templateSlug: 'color_schema' })
      )

      expect(error.code).toBe(ErrorCode.DOCUMENT_NOT_FOUND)
      expect(error.message).toBe('"colors" instantiates "color_schema", which does not exist')
    })

    it('records the instantiated template', () => {
      service.updateOrInsert({ slug: 'color_schema', domain: 'birds', kind: 'schema', content: {} })
      const result = service.updateOrInsert({ ...colorsInput(), templateSlug: 'color_schema' })

      expect(result.document.templateReference).toEqual({ slug: 'color_schema' })
    })

    it('logs each write', () => {
      const logger = createRecordingLogger()
      const logged = createService({}, { logger })
      logged.updateOrInsert(birdObsInput())

      expect(logger.info).toHaveBeenCalledWith('bird_obs: created (version 1)')
    })
  })

  // ===========================================================================
  // Overlays
  // ===========================================================================

  describe('submitOverlay', () => {
    beforeEach(() => {
      service.updateOrInsert(birdObsInput())
    })

    it('stores texts and returns them merged with the base', () => {
      const result = service.submitOverlay({ slug: 'bird_obs', language: 'en', content: birdObsEnglish() })

      expect(result.outcome).toBe('created')
      expect(result.document).toMatchObject({
        uuid: 'uuid-2',
        language: 'en',
        kind: 'template',
        version: 1,
        templateVersion: 1,
        status: 'published',
      })
      expect(result.merged.outdated).toBe(false)
      expect(result.merged.content).toEqual({
        title: 'Bird observation',
        aspects: [
          { name: 'species', type: 'select', items: 'bird_species', label: 'Species' },
          { name: 'count', type: 'int', label: 'Count' },
          {
            name: 'habitat',
            type: 'composite',
            label: 'Habitat',
            components: [
              {
                name: 'vegetation',
                type: 'select',
                items: 'vegetation_types',
                attr: { tag: 'vegetation' },
                label: 'Vegetation',
              },
              { name: 'notes', type: 'str', label: 'Notes' },
            ],
          },
        ],
      })
    })

    it('rejects texts that no longer line up and stores nothing', () => {
      service.updateOrInsert(
        birdObsInput({ content: withAspect(birdObsContent(), { name: 'date', type: 'date' }) })
      )

      const error = catchError(MergeError, () =>
        service.submitOverlay({ slug: 'bird_obs', language: 'fr', content: birdObsEnglish() })
      )
      expect(error.message).toBe('cannot merge language data with latest base version')
      expect(error.kind).toBe(ErrorCode.STRUCTURAL_MISMATCH)
      expect(error.path).toBe('aspects.3')
      expect(error.cause).toBeInstanceOf(MergeError)
      expect(service.store.getOverlay('bird_obs', 'fr')).toBeUndefined()
    })

    it('rebases an existing overlay onto the latest base', () => {
      service.submitOverlay({ slug: 'bird_obs', language: 'en', content: birdObsEnglish() })
      service.updateOrInsert(
        birdObsInput({ content: withAspect(birdObsContent(), { name: 'date', type: 'date' }) })
      )

      expect(() => service.getMerged('bird_obs', 'en')).toThrow(MergeError)

      const result = service.submitOverlay({
        slug: 'bird_obs',
        language: 'en',
        content: withAspect(birdObsEnglish(), { label: 'Date' }),
      })
      expect(result.outcome).toBe('smashed')
      expect(result.document.templateVersion).toBe(2)
      expect(result.merged.version).toBe(2)
      expect(service.getMerged('bird_obs', 'en').merged.outdated).toBe(false)
    })

    it('marks an overlay missing default-language texts as draft', () => {
      service.submitOverlay({ slug: 'bird_obs', language: 'en', content: birdObsEnglish() })

      const draft = service.submitOverlay({
        slug: 'bird_obs',
        language: 'fr',
        content: {
          title: 'Observation',
          aspects: [
            { label: 'Espèce' },
            { label: 'Nombre' },
            { label: 'Habitat', components: [{ label: 'Végétation' }, { label: '' }] },
          ],
        },
      })
      expect(draft.document.status).toBe('draft')

      const published = service.submitOverlay({
        slug: 'bird_obs',
        language: 'fr',
        content: {
          title: 'Observation',
          aspects: [
            { label: 'Espèce' },
            { label: 'Nombre' },
            { label: 'Habitat', components: [{ label: 'Végétation' }, { label: 'Notes' }] },
          ],
        },
      })
      expect(published.document.status).toBe('published')
    })

    it('updates the status of an unchanged resubmission', () => {
      const french: TreeObject = {
        title: 'Observation',
        aspects: [
          { label: 'Espèce' },
          { label: 'Nombre' },
          { label: 'Habitat', components: [{ label: 'Végétation' }, { label: 'Notes' }] },
        ],
      }
      service.submitOverlay({ slug: 'bird_obs', language: 'en', content: birdObsEnglish() })
      service.submitOverlay({ slug: 'bird_obs', language: 'fr', content: french })
      service.submitOverlay({
        slug: 'bird_obs',
        language: 'en',
        content: { ...birdObsEnglish(), description: 'Sightings of wild birds' },
      })

      const result = service.submitOverlay({ slug: 'bird_obs', language: 'fr', content: french })

      expect(result.outcome).toBe('unchanged')
      expect(result.document.status).toBe('draft')
      expect(service.store.getOverlay('bird_obs', 'fr')?.status).toBe('draft')
    })

    it('rejects an invalid language', () => {
      expect(() => service.submitOverlay({ slug: 'bird_obs', language: 'English', content: {} })).toThrow(
        'Invalid language "English"'
      )
    })

    it('rejects overlays of a schema', () => {
      service.updateOrInsert({ slug: 'obs_schema', domain: 'birds', kind: 'schema', content: {} })

      expect(() => service.submitOverlay({ slug: 'obs_schema', language: 'en', content: {} })).toThrow(
        'Documents of kind "schema" have no language overlays'
      )
    })

    it('needs the base document', () => {
      const error = catchError(NotFoundError, () =>
        service.submitOverlay({ slug: 'missing', language: 'en', content: {} })
      )

      expect(error.code).toBe(ErrorCode.DOCUMENT_NOT_FOUND)
    })
  })

  // ===========================================================================
  // Merged Reads
  // ===========================================================================

  describe('getMerged', () => {
    beforeEach(() => {
      service.updateOrInsert(colorsInput())
      service.submitOverlay({ slug: 'colors', language: 'en', content: colorsTexts('Color', 'Red', 'Green') })
    })

    it('serves the requested language', () => {
      const read = service.getMerged('colors', 'en')

      expect(read.fallback).toBe(false)
      expect(read.merged.kind).toBe('code')
      expect(read.merged.content).toEqual({
        aspects: [
          {
            name: 'color',
            type: 'select',
            label: 'Color',
            items: [
              { value: 'red', text: 'Red' },
              { value: 'green', text: 'Green' },
            ],
          },
        ],
      })
    })

    it('falls back to the default language', () => {
      const read = service.getMerged('colors', 'fr')

      expect(read.fallback).toBe(true)
      expect(read.servedLanguage).toBe('en')
      expect(read.merged.language).toBe('en')
    })

    it('prefers the requested language once it exists', () => {
      service.submitOverlay({ slug: 'colors', language: 'fr', content: colorsTexts('Couleur', 'Rouge', 'Vert') })

      const read = service.getMerged('colors', 'fr')
      expect(read.fallback).toBe(false)
      expect(read.merged.content).toEqual({
        aspects: [
          {
            name: 'color',
            type: 'select',
            label: 'Couleur',
            items: [
              { value: 'red', text: 'Rouge' },
              { value: 'green', text: 'Vert' },
            ],
          },
        ],
      })
    })

    it('uses the default language configured for the domain', () => {
      const german = createService({ domains: { birds: { defaultLanguage: 'de' } } })
      german.updateOrInsert(colorsInput())
      german.submitOverlay({ slug: 'colors', language: 'de', content: colorsTexts('Farbe', 'Rot', 'Grün') })

      expect(german.getMerged('colors', 'fr').servedLanguage).toBe('de')
    })

    it('lists the languages it tried when nothing matches', () => {
      service.removeOverlay('colors', 'en')

      const error = catchError(NotFoundError, () => service.getMerged('colors', 'fr'))
      expect(error.code).toBe(ErrorCode.OVERLAY_NOT_FOUND)
      expect(error.tried).toEqual(['fr', 'en'])
      expect(error.message).toBe('"colors" has no overlay in "fr" or "en"')
    })
  })

  // ===========================================================================
  // Versions
  // ===========================================================================

  describe('versions', () => {
    beforeEach(() => {
      service.updateOrInsert(birdObsInput())
      service.submitOverlay({ slug: 'bird_obs', language: 'en', content: birdObsEnglish() })
    })

    it('returns the content of an older base version', () => {
      service.updateOrInsert(
        birdObsInput({ content: withAspect(birdObsContent(), { name: 'date', type: 'date' }) })
      )

      expect(service.getVersion('bird_obs', 1)).toEqual(birdObsContent())
      expect(() => service.getVersion('bird_obs', 3)).toThrow(VersionError)
    })

    it('keeps overlay versions pinned by an instance', () => {
      service.pinInstance('bird_obs', 'en', 'obs-1')
      const result = service.submitOverlay({
        slug: 'bird_obs',
        language: 'en',
        content: { ...birdObsEnglish(), title: 'Bird sighting' },
      })

      expect(result.outcome).toBe('bumped')
      expect(result.version).toBe(2)
      expect(service.getVersion('bird_obs', 1, 'en')).toEqual(birdObsEnglish())
    })

    it('refuses to smash a version an instance still pins', () => {
      service.pinInstance('bird_obs', 'en', 'obs-1')
      service.submitOverlay({ slug: 'bird_obs', language: 'en', content: { ...birdObsEnglish(), title: 'B' } })

      const error = catchError(VersionError, () => service.smashVersion('bird_obs', 'en'))
      expect(error.kind).toBe(ErrorCode.SMASH_REJECTED)
    })

    it('smashes once every instance moved to the current version', () => {
      service.pinInstance('bird_obs', 'en', 'obs-1')
      service.submitOverlay({ slug: 'bird_obs', language: 'en', content: { ...birdObsEnglish(), title: 'B' } })
      service.pinInstance('bird_obs', 'en', 'obs-1', 2)

      const smashed = service.smashVersion('bird_obs', 'en')

      expect(smashed.version).toBe(1)
      expect(smashed.content).toEqual({ ...birdObsEnglish(), title: 'B' })
      expect(service.store.instancePins({ slug: 'bird_obs', language: 'en' })).toEqual([1])
    })

    it('re-pins overlays when a base version is smashed', () => {
      service.updateOrInsert(
        birdObsInput({ content: withAspect(birdObsContent(), { name: 'date', type: 'date' }) })
      )
      service.submitOverlay({
        slug: 'bird_obs',
        language: 'en',
        content: withAspect(birdObsEnglish(), { label: 'Date' }),
      })

      const smashed = service.smashVersion('bird_obs')

      expect(smashed.version).toBe(1)
      expect(service.store.getOverlay('bird_obs', 'en')?.templateVersion).toBe(1)
      expect(service.getMerged('bird_obs', 'en').merged.outdated).toBe(false)
    })

    it('rejects pinning a version that does not exist', () => {
      expect(() => service.pinInstance('bird_obs', 'en', 'obs-1', 5)).toThrow(VersionError)
    })

    it('rejects pinning a language that only resolves by fallback', () => {
      expect(() => service.pinInstance('bird_obs', 'fr', 'obs-1')).toThrow('"bird_obs" has no "fr" overlay')
    })

    it('needs the overlay to read its versions', () => {
      const error = catchError(NotFoundError, () => service.getVersion('bird_obs', 1, 'fr'))

      expect(error.tried).toEqual(['fr'])
    })
  })

  describe('history of a growing template', () => {
    const count: TreeObject = { name: 'count', type: 'int' }
    const notes: TreeObject = { name: 'notes', type: 'str' }
    const baseKey = { slug: 'bird_obs', language: null }

    it('bumps the base on every change and tracks the overlay against it', () => {
      const created = service.updateOrInsert(birdObsInput({ content: { aspects: [count] } }))
      expect(created.version).toBe(1)
      expect(service.store.entries(baseKey)).toEqual([])

      const withNotes = service.updateOrInsert(birdObsInput({ content: { aspects: [count, notes] } }))
      expect(withNotes.outcome).toBe('bumped')
      expect(withNotes.version).toBe(2)
      expect(service.store.entries(baseKey)).toHaveLength(1)

      const english = service.submitOverlay({
        slug: 'bird_obs',
        language: 'en',
        content: { aspects: [{ label: 'Count' }, { label: 'Notes' }] },
      })
      expect(english.document.templateVersion).toBe(2)
      expect(english.merged.outdated).toBe(false)

      const relabelled = service.updateOrInsert(
        birdObsInput({ content: { aspects: [{ ...count, label: 'Number seen' }, notes] } })
      )
      expect(relabelled.outcome).toBe('bumped')
      expect(relabelled.version).toBe(3)
      expect(service.store.entries(baseKey)).toHaveLength(2)

      expect(service.getVersion('bird_obs', 1)).toEqual({ aspects: [count] })
      expect(service.getVersion('bird_obs', 2)).toEqual({ aspects: [count, notes] })
      expect(service.getMerged('bird_obs', 'en').merged.outdated).toBe(true)
    })
  })

  // ===========================================================================
  // Lookup & Teardown
  // ===========================================================================

  describe('resolve and teardown', () => {
    beforeEach(() => {
      service.updateOrInsert(birdObsInput())
      service.updateOrInsert(colorsInput())
      service.submitOverlay({ slug: 'colors', language: 'en', content: colorsTexts('Color', 'Red', 'Green') })
    })

    it('resolves by uuid, slug and language', () => {
      expect(service.resolve({ uuid: 'uuid-1' }).document.slug).toBe('bird_obs')
      expect(service.resolve({ slug: 'colors' }).servedLanguage).toBeNull()
      expect(service.resolve({ slug: 'colors', language: 'en' }).servedLanguage).toBe('en')
      expect(() => service.resolve({})).toThrow('A reference needs a uuid or a slug')
    })

    it('removes a domain with its overlays and history', () => {
      expect(service.teardownDomain('birds')).toEqual(['bird_obs', 'colors'])
      expect(service.store.listBases()).toEqual([])
      expect(service.store.getOverlay('colors', 'en')).toBeUndefined()
      expect(() => service.resolve({ uuid: 'uuid-3' })).toThrow(NotFoundError)
    })

    it('leaves other domains alone', () => {
      service.updateOrInsert(birdObsInput({ slug: 'fish_obs', domain: 'fish' }))

      expect(service.teardownDomain('birds')).toEqual(['bird_obs', 'colors'])
      expect(service.store.listBases().map(doc => doc.slug)).toEqual(['fish_obs'])
    })

    it('needs an overlay to remove', () => {
      expect(() => service.removeOverlay('colors', 'fr')).toThrow('"colors" has no "fr" overlay')
    })
  })

  // ===========================================================================
  // Observers
  // ===========================================================================

  describe('observers', () => {
    it('hears committed changes but not no-ops', () => {
      const events: CommitEvent[] = []
      service.onDocumentCommitted(event => {
        events.push(event)
      })

      service.updateOrInsert(birdObsInput())
      service.updateOrInsert(birdObsInput())
      service.submitOverlay({ slug: 'bird_obs', language: 'en', content: birdObsEnglish() })
      service.removeOverlay('bird_obs', 'en')

      expect(events.map(e => [e.action, e.document.slug, e.version])).toEqual([
        ['created', 'bird_obs', 1],
        ['created', 'bird_obs', 1],
        ['removed', 'bird_obs', 1],
      ])
    })

    it('stops notifying after unsubscribe', () => {
      const events: CommitEvent[] = []
      const unsubscribe = service.onDocumentCommitted(event => {
        events.push(event)
      })
      unsubscribe()

      service.updateOrInsert(birdObsInput())
      expect(events).toEqual([])
    })

    it('keeps a write when an observer fails', async () => {
      const logger = createRecordingLogger()
      const logged: DocumentService = createService({}, { logger })
      const seen: string[] = []
      logged.onDocumentCommitted(() => {
        throw new Error('observer down')
      })
      logged.onDocumentCommitted(async event => {
        await Promise.resolve()
        seen.push(event.document.slug)
      })

      const result = logged.updateOrInsert(birdObsInput())
      await logged.flushObservers()

      expect(result.outcome).toBe('created')
      expect(seen).toEqual(['bird_obs'])
      expect(logger.warn).toHaveBeenCalledWith(
        '[commit] Callback error (context: {"action":"created","slug":"bird_obs","version":1}): observer down',
        expect.any(Error)
      )
    })
  })
})
