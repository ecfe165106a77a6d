export { MemoryDocumentStore } from './memory'
export { StoreDependents } from './dependents'
export type { DocumentStore, DeltaLog, DependentsQuery } from './types'
