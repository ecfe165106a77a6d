export { loadSourceTree, readSourceFile, configFromSource } from './loader'
export type { SourceTree, SourceRecord, SourceOverlay, SourceDomain, LoadOptions } from './loader'
export { BatchImporter, summarize } from './batch'
export type { ImportReport, ImportResult, ImportSkip, ImportFailure, ImportOptions, ImportSummary } from './batch'
