/**
 * Aspect parsing and reference extraction
 *
 * @module schema
 */

export { parseAspects, parseAspect, aspectsOf, PARSE_MODES } from './parser'
export type { ParseMode, ParseOptions, RawAspect, RawItem } from './parser'
export { extractReferences, referencedSlugs } from './references'
