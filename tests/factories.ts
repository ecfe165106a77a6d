/**
 * Test Data Factories
 *
 * Factory functions for services and documents with sensible defaults.
 */

import { vi } from 'vitest'
import type { Mock } from 'vitest'
import type { Logger } from '../src/utils/logger'
import type { TreeObject } from '../src/types/tree'
import type { BaseDocument, LanguageOverlay } from '../src/types/document'
import { DocumentService } from '../src/service/DocumentService'
import type { BaseDocumentInput, DocumentServiceOptions } from '../src/service/DocumentService'
import { MemoryDocumentStore } from '../src/store/memory'
import { resolveConfig } from '../src/config'
import type { AspectDBConfigInput } from '../src/config'

// =============================================================================
// ID Generation
// =============================================================================

/**
 * Deterministic uuid factory: uuid-1, uuid-2, ...
 */
export function createUuidSequence(prefix = 'uuid'): () => string {
  let counter = 0
  return () => `${prefix}-${++counter}`
}

// =============================================================================
// Logger
// =============================================================================

export interface RecordingLogger extends Logger {
  debug: Mock<(message: string, ...args: unknown[]) => void>
  info: Mock<(message: string, ...args: unknown[]) => void>
  warn: Mock<(message: string, ...args: unknown[]) => void>
  error: Mock<(message: string, error?: unknown, ...args: unknown[]) => void>
}

/**
 * Logger whose methods are spies
 */
export function createRecordingLogger(): RecordingLogger {
  return {
    debug: vi.fn<(message: string, ...args: unknown[]) => void>(),
    info: vi.fn<(message: string, ...args: unknown[]) => void>(),
    warn: vi.fn<(message: string, ...args: unknown[]) => void>(),
    error: vi.fn<(message: string, error?: unknown, ...args: unknown[]) => void>(),
  }
}

// =============================================================================
// Service
// =============================================================================

export function createService(
  config: AspectDBConfigInput = {},
  options: Omit<DocumentServiceOptions, 'config'> = {}
): DocumentService {
  return new DocumentService({
    store: new MemoryDocumentStore(),
    generateUuid: createUuidSequence(),
    ...options,
    config: resolveConfig({ defaultLanguage: 'en' }, config),
  })
}

// =============================================================================
// Documents
// =============================================================================

/**
 * Base template of a bird observation with three aspects
 */
export function birdObsContent(): TreeObject {
  return {
    aspects: [
      { name: 'species', type: 'select', items: 'bird_species' },
      { name: 'count', type: 'int' },
      {
        name: 'habitat',
        type: 'composite',
        components: [
          { name: 'vegetation', type: 'select', items: 'vegetation_types', attr: { tag: 'vegetation' } },
          { name: 'notes', type: 'str' },
        ],
      },
    ],
  }
}

/**
 * English texts paralleling {@link birdObsContent}
 */
export function birdObsEnglish(): TreeObject {
  return {
    title: 'Bird observation',
    aspects: [
      { label: 'Species' },
      { label: 'Count' },
      {
        label: 'Habitat',
        components: [{ label: 'Vegetation' }, { label: 'Notes' }],
      },
    ],
  }
}

export function birdObsInput(overrides: Partial<BaseDocumentInput> = {}): BaseDocumentInput {
  return {
    slug: 'bird_obs',
    domain: 'birds',
    kind: 'base_template',
    content: birdObsContent(),
    ...overrides,
  }
}

/**
 * A code list of colors: the base holds values, overlays hold texts
 */
export function colorsInput(): BaseDocumentInput {
  return {
    slug: 'colors',
    domain: 'birds',
    kind: 'base_code',
    content: {
      aspects: [{ name: 'color', type: 'select', items: [{ value: 'red' }, { value: 'green' }] }],
    },
  }
}

/**
 * Texts for {@link colorsInput}
 */
export function colorsTexts(label: string, red: string, green: string): TreeObject {
  return { aspects: [{ label, items: [{ text: red }, { text: green }] }] }
}

export function createBaseDocument(overrides: Partial<BaseDocument> = {}): BaseDocument {
  return {
    uuid: 'base-uuid',
    slug: 'doc',
    domain: 'test',
    kind: 'base_template',
    version: 1,
    content: { title: 'v1' },
    references: [],
    ...overrides,
  }
}

export function createOverlay(overrides: Partial<LanguageOverlay> = {}): LanguageOverlay {
  return {
    uuid: 'overlay-uuid',
    slug: 'doc',
    domain: 'test',
    language: 'en',
    kind: 'template',
    version: 1,
    templateVersion: 1,
    status: 'published',
    content: { title: 'v1' },
    ...overrides,
  }
}
