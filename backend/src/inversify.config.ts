/**
 * Recall Engine container configuration.
 *
 * - RECORD_STORE=memory binds the in-memory store (tests, demos); anything else uses the file store
 * - APPLICATIONINSIGHTS_CONNECTION_STRING set: Application Insights default client
 * - NODE_ENV=test: NullTelemetryClient (never load real Application Insights in tests)
 * - otherwise: ConsoleTelemetryClient
 */
import 'reflect-metadata'
import type { IClock } from '@bookmark-recall/shared'
import { SystemClock } from '@bookmark-recall/shared'
import appInsights from 'applicationinsights'
import { Container } from 'inversify'
import { loadRecallConfig, type EmbeddingPolicy, type RecallConfig } from './config/recallConfig.js'
import { TOKENS } from './di/tokens.js'
import { RecordIndex } from './indexing/recordIndex.js'
import { FileRecordStore } from './repos/recordStore.file.js'
import { MemoryRecordStore } from './repos/recordStore.memory.js'
import type { IRecordStore } from './repos/recordStore.js'
import { ScopedLock, type IScopedLock } from './repos/utils/scopedLock.js'
import { BookmarkService } from './services/bookmarkService.js'
import { createEmbeddingProvider, NullEmbeddingProvider, type IEmbeddingProvider } from './services/embeddingProvider.js'
import { EmbeddingProviderAdapter } from './services/embeddingProviderAdapter.js'
import { RecallCoordinator } from './services/recallCoordinator.js'
import { RecallEngine } from './services/recallEngine.js'
import { SemanticScorer } from './services/semanticScorer.js'
import { ConsoleTelemetryClient } from './telemetry/ConsoleTelemetryClient.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'
import { TelemetryService } from './telemetry/TelemetryService.js'

export type RecordStoreMode = 'file' | 'memory'

export interface RecallContainerOptions {
    storeMode?: RecordStoreMode
    /** Replaces the provider built from configured credentials */
    embeddingProvider?: IEmbeddingProvider
    telemetryClient?: ITelemetryClient
    clock?: IClock
    /** Config warnings to report once telemetry is bound */
    warnings?: string[]
}

function resolveTelemetryClient(config: RecallConfig): ITelemetryClient {
    if (process.env.NODE_ENV === 'test') return new NullTelemetryClient()
    if (config.appInsightsConnectionString) {
        appInsights.setup(config.appInsightsConnectionString).start()
        return appInsights.defaultClient
    }
    return new ConsoleTelemetryClient()
}

function resolveEmbeddingProvider(config: RecallConfig): IEmbeddingProvider {
    if (!config.semanticEnabled) return new NullEmbeddingProvider(config.embedding.modelId)
    return createEmbeddingProvider(config.provider, config.embedding.modelId)
}

/**
 * Bind every engine component into a fresh container. Components are singletons:
 * the index, the lock registry and the embedding cache are process-wide state.
 */
export function createRecallContainer(config: RecallConfig, options: RecallContainerOptions = {}): Container {
    const container = new Container()

    container.bind<RecallConfig>(TOKENS.RecallConfig).toConstantValue(config)
    container.bind<EmbeddingPolicy>(TOKENS.EmbeddingPolicy).toConstantValue(config.embedding)
    container.bind<IClock>(TOKENS.Clock).toConstantValue(options.clock ?? new SystemClock())
    container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(options.telemetryClient ?? resolveTelemetryClient(config))

    // Consistency policy: concrete services use class-based injection only (no string token).
    container.bind<TelemetryService>(TelemetryService).toSelf().inSingletonScope()

    container.bind<IScopedLock>(TOKENS.ScopedLock).to(ScopedLock).inSingletonScope()
    const storeMode = options.storeMode ?? (process.env.RECORD_STORE === 'memory' ? 'memory' : 'file')
    if (storeMode === 'memory') {
        container.bind<IRecordStore>(TOKENS.RecordStore).to(MemoryRecordStore).inSingletonScope()
    } else {
        container.bind<IRecordStore>(TOKENS.RecordStore).to(FileRecordStore).inSingletonScope()
    }

    container.bind<IEmbeddingProvider>(TOKENS.EmbeddingProvider).toConstantValue(options.embeddingProvider ?? resolveEmbeddingProvider(config))

    container.bind(RecordIndex).toSelf().inSingletonScope()
    container.bind(EmbeddingProviderAdapter).toSelf().inSingletonScope()
    container.bind(SemanticScorer).toSelf().inSingletonScope()
    container.bind(RecallCoordinator).toSelf().inSingletonScope()
    container.bind(BookmarkService).toSelf().inSingletonScope()
    container.bind(RecallEngine).toSelf().inSingletonScope()

    const telemetry = container.get(TelemetryService)
    const provider = container.get<IEmbeddingProvider>(TOKENS.EmbeddingProvider)
    for (const warning of options.warnings ?? []) {
        telemetry.trackRecallEvent('Config.ValidationWarning', { warning })
        telemetry.log('warn', warning)
    }
    telemetry.trackRecallEvent('Config.Loaded', {
        storageCount: config.storageLocations.length,
        semanticEnabled: config.semanticEnabled,
        provider: provider.name,
        modelId: provider.modelId,
        storeMode
    })

    return container
}

/**
 * Load configuration from the environment (and RECALL_CONFIG_FILE) and build the container.
 */
export function setupContainer(env: Record<string, string | undefined> = process.env, options: RecallContainerOptions = {}): Container {
    const { config, warnings } = loadRecallConfig(env)
    return createRecallContainer(config, { ...options, warnings: [...warnings, ...(options.warnings ?? [])] })
}
