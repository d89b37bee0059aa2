/**
 * Engine lifecycle: prepares every configured storage and builds its index before the first query.
 */
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import { RecordIndex, type IndexStats } from '../indexing/recordIndex.js'
import type { IRecordStore } from '../repos/recordStore.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { BookmarkService } from './bookmarkService.js'
import { RecallCoordinator } from './recallCoordinator.js'

export interface EngineStartReport {
    storages: Record<string, IndexStats>
    durationMs: number
}

@injectable()
export class RecallEngine {
    private started = false

    constructor(
        @inject(TOKENS.RecordStore) private readonly store: IRecordStore,
        @inject(RecordIndex) private readonly index: RecordIndex,
        @inject(RecallCoordinator) readonly coordinator: RecallCoordinator,
        @inject(BookmarkService) readonly bookmarks: BookmarkService,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    get isStarted(): boolean {
        return this.started
    }

    /**
     * Validate and prepare each storage, then rebuild its index. A storage that fails to
     * prepare stops startup: serving recall over a missing storage would silently under-return.
     */
    async start(): Promise<EngineStartReport> {
        const started = performance.now()
        const storages: Record<string, IndexStats> = {}
        for (const name of this.store.listStorageNames()) {
            await this.store.ensureStorage(name)
            storages[name] = await this.index.rebuild(name)
        }
        this.started = true

        const durationMs = Math.round(performance.now() - started)
        this.telemetry.trackRecallEvent('Engine.Start.Completed', { storageCount: Object.keys(storages).length, durationMs })
        return { storages, durationMs }
    }

    /**
     * Re-scan one storage (external edits to record files).
     */
    async rebuild(storageName: string): Promise<IndexStats> {
        return this.index.rebuild(storageName)
    }

    async rebuildAll(): Promise<Record<string, IndexStats>> {
        const storages: Record<string, IndexStats> = {}
        for (const name of this.store.listStorageNames()) {
            storages[name] = await this.index.rebuild(name)
        }
        return storages
    }
}
