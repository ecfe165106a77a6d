/**
 * aspectdb Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Change Detection
// =============================================================================

/**
 * Top-level fields that never count as a content change.
 * Bookkeeping (identity, version counter, authorship, the template link
 * and tag lists) is maintained by the store, not by the author.
 */
export const DEFAULT_IGNORE_FIELDS: readonly string[] = ['uuid', 'version', 'actors', 'template', 'tags']

// =============================================================================
// Languages
// =============================================================================

/**
 * Default language when neither configuration nor the domain names one
 */
export const DEFAULT_LANGUAGE = 'en'

// =============================================================================
// Versioning
// =============================================================================

/**
 * Version number of a freshly inserted document
 */
export const INITIAL_VERSION = 1

// =============================================================================
// Source Tree Layout
// =============================================================================

/**
 * Folder name -> structural kind, in import order
 */
export const SOURCE_FOLDERS = {
  schema: 'schema',
  template: 'base_template',
  code: 'base_code',
} as const

/**
 * Folder holding language overlays: `<domain>/lang/<language>/<template|code>/<slug>`
 */
export const LANGUAGE_FOLDER = 'lang'

/**
 * File holding a domain's own settings
 */
export const DOMAIN_FILE_STEM = 'domain'

/**
 * Extensions the source-tree loader reads
 */
export const SOURCE_EXTENSIONS = ['.json', '.yaml', '.yml'] as const

// =============================================================================
// CLI
// =============================================================================

export const CLI_NAME = 'aspectdb'

export const VERSION = '0.1.0'

// =============================================================================
// Error Messages
// =============================================================================

/**
 * Message a caller sees when an overlay no longer lines up with its base
 */
export const MERGE_REJECTED_MESSAGE = 'cannot merge language data with latest base version'
