import { StorageNotFoundError, type IClock } from '@bookmark-recall/shared'
import { inject, injectable } from 'inversify'
import type { RecallConfig } from '../config/recallConfig.js'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { BaseRecordStore } from './base/BaseRecordStore.js'
import { RECORD_FILE_EXTENSION } from './utils/recordSerializer.js'
import type { IScopedLock, ScopedLockOptions } from './utils/scopedLock.js'

interface MemoryStorage {
    prepared: boolean
    files: Map<string, string>
    assets: Set<string>
}

/**
 * In-memory implementation of IRecordStore for local dev & tests.
 * Stores the serialized YAML text per file name, so parsing, corruption handling
 * and locking behave exactly as in the file-backed store.
 */
@injectable()
export class MemoryRecordStore extends BaseRecordStore {
    private readonly storages = new Map<string, MemoryStorage>()
    private readonly lockTimeoutMs: number

    constructor(
        @inject(TOKENS.RecallConfig) config: RecallConfig,
        @inject(TOKENS.ScopedLock) lock: IScopedLock,
        @inject(TelemetryService) telemetry: TelemetryService,
        @inject(TOKENS.Clock) clock: IClock
    ) {
        super(lock, telemetry, clock)
        this.lockTimeoutMs = config.lockTimeoutMs
        for (const location of config.storageLocations) {
            this.storages.set(location.name, { prepared: false, files: new Map(), assets: new Set() })
        }
    }

    listStorageNames(): string[] {
        return [...this.storages.keys()]
    }

    async ensureStorage(name: string): Promise<void> {
        this.storage(name).prepared = true
        this.telemetry.trackRecallEvent('RecordStore.Storage.Prepared', { root: `memory:${name}` }, { storageName: name })
    }

    // Test helpers

    /** Place raw file content, bypassing validation (e.g. a corrupt or duplicate file) */
    putRaw(storageName: string, fileName: string, content: string): void {
        this.storage(storageName).files.set(fileName, content)
    }

    getRaw(storageName: string, fileName: string): string | undefined {
        return this.storage(storageName).files.get(fileName)
    }

    putAsset(storageName: string, assetRef: string): void {
        this.storage(storageName).assets.add(assetRef)
    }

    hasAsset(storageName: string, assetRef: string): boolean {
        return this.storage(storageName).assets.has(assetRef)
    }

    isPrepared(storageName: string): boolean {
        return this.storage(storageName).prepared
    }

    protected async readFile(storageName: string, fileName: string): Promise<string | undefined> {
        return this.storage(storageName).files.get(fileName)
    }

    protected async commitFile(storageName: string, fileName: string, content: string): Promise<void> {
        this.storage(storageName).files.set(fileName, content)
    }

    protected async removeFile(storageName: string, fileName: string): Promise<boolean> {
        return this.storage(storageName).files.delete(fileName)
    }

    protected async listFiles(storageName: string): Promise<string[]> {
        return [...this.storage(storageName).files.keys()].filter((name) => name.endsWith(RECORD_FILE_EXTENSION))
    }

    protected async removeAsset(storageName: string, assetRef: string): Promise<boolean> {
        return this.storage(storageName).assets.delete(assetRef)
    }

    protected lockOptions(): ScopedLockOptions {
        return { timeoutMs: this.lockTimeoutMs }
    }

    private storage(name: string): MemoryStorage {
        const storage = this.storages.get(name)
        if (!storage) {
            throw new StorageNotFoundError(`Storage not found: ${name}`, name)
        }
        return storage
    }
}
