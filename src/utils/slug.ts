/**
 * Slug Validation Utilities
 *
 * Slugs name documents across the whole store and double as file names in
 * the source tree. They are lowercase alphanumeric with `_` or `-`
 * separators, 1-64 characters, and cannot start or end with a separator.
 *
 * @module utils/slug
 */

export const SLUG_MIN_LENGTH = 1

export const SLUG_MAX_LENGTH = 64

const SLUG_PATTERN = /^[a-z0-9](?:[a-z0-9_-]{0,62}[a-z0-9])?$/

/**
 * @example
 * isValidSlug('bird_obs') // true
 * isValidSlug('Bird-Obs') // false
 * isValidSlug('_draft') // false
 */
export function isValidSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug)
}

/**
 * Language codes: `en`, `fr`, `pt-BR`, `zh_hant`
 */
const LANGUAGE_PATTERN = /^[a-z]{2,3}(?:[-_][A-Za-z0-9]{2,8})*$/

export function isValidLanguage(language: string): boolean {
  return LANGUAGE_PATTERN.test(language)
}
