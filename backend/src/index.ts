// reflect-metadata MUST be imported first for InversifyJS decorator metadata to work
import 'reflect-metadata'

export * from './config/recallConfig.js'
export { TOKENS } from './di/tokens.js'
export * from './indexing/recordIndex.js'
export * from './inversify.config.js'
export { FileRecordStore } from './repos/recordStore.file.js'
export { MemoryRecordStore } from './repos/recordStore.memory.js'
export type { CommitHooks, DeleteOptions, DeleteOutcome, IRecordStore, RecordReadResult } from './repos/recordStore.js'
export { ScopedLock, type IScopedLock, type ScopedLockOptions } from './repos/utils/scopedLock.js'
export * from './services/bookmarkService.js'
export * from './services/embeddingProvider.js'
export * from './services/embeddingProviderAdapter.js'
export * from './services/lexicalScorer.js'
export * from './services/recallCoordinator.js'
export * from './services/recallEngine.js'
export * from './services/semanticScorer.js'
export * from './services/snippet.js'
export { ConsoleTelemetryClient } from './telemetry/ConsoleTelemetryClient.js'
export type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
export { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'
export * from './telemetry/TelemetryService.js'
