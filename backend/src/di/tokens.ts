/**
 * Centralized Inversify tokens (string identifiers).
 *
 * This repo uses string tokens rather than Symbol tokens.
 * Keeping them in one place reduces drift and typos across container configs
 * and @inject decorators.
 */
export const TOKENS = {
    // Core
    RecallConfig: 'RecallConfig',
    TelemetryClient: 'ITelemetryClient',
    Clock: 'IClock',

    // Storage
    RecordStore: 'IRecordStore',
    ScopedLock: 'IScopedLock',

    // Embeddings
    EmbeddingProvider: 'IEmbeddingProvider',
    EmbeddingPolicy: 'EmbeddingPolicy'
} as const
