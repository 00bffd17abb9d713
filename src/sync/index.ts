export type { ChangeSet, DetectChangesInput, KnownDocuments } from './change-detector'
export {
  detectChanges,
  groupKnownDocuments,
  lookbackStart,
  newestRecordedInstant
} from './change-detector'
export type { IndexContext, IndexingModels, IndexingPipelineOptions } from './indexer'
export { IndexingPipeline } from './indexer'
export { KeyedLock } from './keyed-lock'
export type { InitRequest, SyncOrchestratorOptions, SyncRequest } from './orchestrator'
export { SyncOrchestrator } from './orchestrator'
