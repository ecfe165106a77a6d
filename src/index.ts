/**
 * aspectdb - versioned documents with language overlays
 *
 * Base documents hold structure, language overlays hold texts; reading a
 * document in a language merges the two. Every document keeps a compact
 * reverse-delta history, and whole source trees import in dependency order.
 *
 * @packageDocumentation
 */

// =============================================================================
// Service
// =============================================================================

export { DocumentService } from './service/DocumentService'
export type {
  BaseDocumentInput,
  OverlayInput,
  WriteOutcome,
  WriteResult,
  OverlayWriteResult,
  MergedRead,
  WriteOptions,
  DocumentServiceOptions,
} from './service/DocumentService'
export { missingTexts, overlayStatus } from './service/status'

// =============================================================================
// Engine
// =============================================================================

export { merge, mergeAspectsOneByOne, mergeDocument, logMergeDiagnostics } from './merge'
export type { MergeOptions, AspectMergeReport } from './merge'

export { VersionStore, snapshotOf, contentOf } from './versioning'
export type { UpdateOutcome, VersionUpdate, VersionStoreOptions } from './versioning'

export { resolveOrder, ORDER_MODES } from './dependencies'
export type { OrderMode, DependencyNode, OrderOptions, OrderResult } from './dependencies'

export { ReferenceResolver } from './references'
export type { ReferenceQuery, Resolution, ReferenceResolverOptions } from './references'

export { project, diffTrees, compare, createPatch, applyPatch } from './diff'
export type { ChangeKind, ChangeRecord, CompareResult, Patch, PatchOperation } from './diff'

// =============================================================================
// Aspects
// =============================================================================

export { parseAspects, parseAspect, aspectsOf, PARSE_MODES, extractReferences, referencedSlugs } from './schema'
export type { ParseMode, ParseOptions, RawAspect, RawItem } from './schema'

// =============================================================================
// Store
// =============================================================================

export { MemoryDocumentStore, StoreDependents } from './store'
export type { DocumentStore, DeltaLog, DependentsQuery } from './store'

// =============================================================================
// Import
// =============================================================================

export { loadSourceTree, readSourceFile, configFromSource, BatchImporter, summarize } from './import'
export type {
  SourceTree,
  SourceRecord,
  SourceOverlay,
  SourceDomain,
  ImportReport,
  ImportResult,
  ImportSkip,
  ImportFailure,
  ImportOptions,
  ImportSummary,
} from './import'

// =============================================================================
// Events
// =============================================================================

export { CommitObservers } from './events'
export type { CommitAction, CommitEvent, CommitHandler } from './events'

// =============================================================================
// Configuration
// =============================================================================

export {
  defineConfig,
  resolveConfig,
  domainDefaultLanguage,
  loadConfigFromEnv,
  loadConfigFile,
} from './config'
export type { AspectDBConfig, AspectDBConfigInput, DomainConfig } from './config'

// =============================================================================
// Types
// =============================================================================

export type { Tree, TreeObject, TreeArray, TreePrimitive, PathSegment } from './types/tree'
export { isTreeObject, isTreeArray, toTree } from './types/tree'
export type {
  StructuralKind,
  ConcreteKind,
  DocumentKind,
  Reference,
  ReferenceType,
  BaseDocument,
  LanguageOverlay,
  MergedDocument,
  StoredDocument,
  OverlayStatus,
  DocumentKey,
} from './types/document'
export { concreteKindOf, isStructuralKind, isConcreteKind, isOverlay, keyOf, formatKey } from './types/document'
export type {
  AspectNode,
  ScalarAspect,
  SelectAspect,
  ListAspect,
  CompositeAspect,
  ScalarKind,
  SelectMode,
  SelectItem,
  ItemSource,
} from './types/aspect'

// =============================================================================
// Errors & Logging
// =============================================================================

export {
  AspectDBError,
  ErrorCode,
  ValidationError,
  NotFoundError,
  MergeError,
  VersionError,
  CircularDependencyError,
  StoreCommitError,
  ConfigurationError,
  isAspectDBError,
  isValidationError,
  isNotFoundError,
  isMergeError,
  isVersionError,
  isCircularDependencyError,
  isStoreCommitError,
  isConfigurationError,
  wrapError,
  toUserFacing,
} from './errors'
export type { SerializedError, UserFacingError, MergeFailureKind, VersionFailureKind } from './errors'

export { setLogger, consoleLogger, noopLogger } from './utils/logger'
export type { Logger } from './utils/logger'
