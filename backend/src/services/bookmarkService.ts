/**
 * Bookmark lifecycle on top of the Record Store.
 *
 * This is the component that owns Index mutation: every operation writes through the store
 * and mirrors the committed result into the Index from the store's commit hook, while the
 * per-record lock is still held.
 */
import {
    BookmarkAlreadyDeletedError,
    BookmarkNotFoundError,
    BookmarkStateError,
    CorruptRecordError,
    mergeKeywords,
    RecordNotFoundError,
    selectCurrentStorageName,
    StorageNotFoundError,
    type BookmarkRecord,
    type IClock
} from '@bookmark-recall/shared'
import { inject, injectable } from 'inversify'
import { v4 as uuidv4 } from 'uuid'
import type { RecallConfig } from '../config/recallConfig.js'
import { TOKENS } from '../di/tokens.js'
import { RecordIndex, type IndexStats } from '../indexing/recordIndex.js'
import type { CommitHooks, DeleteOutcome, IRecordStore } from '../repos/recordStore.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

export interface CreateBookmarkInput {
    url: string
    title: string
    /** Defaults to the current storage */
    storageLocation?: string
    /** User keywords, highest priority first */
    keywords?: string[]
    /** Keywords from content analysis; appended after user keywords up to the limit of four */
    derivedKeywords?: string[]
    description?: string
    tags?: string[]
    folderPath?: string
    faviconRef?: string
    screenshotRef?: string
}

export type BookmarkPatch = Partial<Pick<BookmarkRecord, 'url' | 'title' | 'keywords' | 'description' | 'tags' | 'folderPath'>>

export interface ListBookmarksOptions {
    storage?: string
    includeDeleted?: boolean
    folderPath?: string
}

@injectable()
export class BookmarkService {
    constructor(
        @inject(TOKENS.RecordStore) private readonly store: IRecordStore,
        @inject(RecordIndex) private readonly index: RecordIndex,
        @inject(TOKENS.RecallConfig) private readonly config: RecallConfig,
        @inject(TOKENS.Clock) private readonly clock: IClock,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    /**
     * @throws RecordValidationError for invalid input, StorageNotFoundError for an unknown storage
     */
    async create(input: CreateBookmarkInput): Promise<BookmarkRecord> {
        const storageLocation = input.storageLocation ?? this.currentStorage()
        const record: BookmarkRecord = {
            id: uuidv4(),
            url: input.url,
            title: input.title,
            keywords: mergeKeywords(input.keywords ?? [], input.derivedKeywords ?? []),
            description: input.description,
            tags: input.tags ?? [],
            folderPath: input.folderPath,
            createdAt: this.clock.nowIso(),
            deleted: false,
            faviconRef: input.faviconRef,
            screenshotRef: input.screenshotRef,
            storageLocation
        }
        const written = await this.store.write(record, this.upsertHook())
        this.telemetry.trackRecallEvent('Bookmark.Created', { recordId: written.id }, { storageName: storageLocation })
        return written
    }

    /**
     * @throws BookmarkNotFoundError
     */
    get(id: string, storage?: string): BookmarkRecord {
        const record = this.index.get(storage, id)
        if (!record) {
            throw new BookmarkNotFoundError(`Bookmark not found: ${id}`, id)
        }
        return record
    }

    async update(id: string, patch: BookmarkPatch, storage?: string): Promise<BookmarkRecord> {
        const updated = await this.mutate(id, storage, (current) => ({
            ...current,
            ...definedFields(patch),
            lastModified: this.clock.nowIso()
        }))
        this.telemetry.trackRecallEvent('Bookmark.Updated', { recordId: id, fields: Object.keys(definedFields(patch)).join(',') })
        return updated
    }

    /**
     * @throws BookmarkAlreadyDeletedError when the bookmark is already soft-deleted
     */
    async softDelete(id: string, storage?: string): Promise<BookmarkRecord> {
        const { storageLocation } = this.get(id, storage)
        const outcome = await this.guardStore(storageLocation, id, () =>
            this.store.delete(storageLocation, id, { hard: false }, this.deleteHook())
        )
        if (outcome.mode !== 'soft' || !outcome.changed) {
            throw new BookmarkAlreadyDeletedError(`Bookmark ${id} is already deleted`, id)
        }
        this.telemetry.trackRecallEvent('Bookmark.SoftDeleted', { recordId: id }, { storageName: storageLocation })
        return outcome.record
    }

    /**
     * @throws BookmarkStateError when the bookmark is not deleted
     */
    async restore(id: string, storage?: string): Promise<BookmarkRecord> {
        const restored = await this.mutate(id, storage, (current) => {
            if (!current.deleted) {
                throw new BookmarkStateError(`Bookmark ${id} is not deleted`, id)
            }
            return { ...current, deleted: false, deletedAt: undefined }
        })
        this.telemetry.trackRecallEvent('Bookmark.Restored', { recordId: id }, { storageName: restored.storageLocation })
        return restored
    }

    /**
     * Permanently remove a soft-deleted bookmark and the assets no other record references.
     * @throws BookmarkStateError when the bookmark has not been soft-deleted first
     */
    async hardDelete(id: string, storage?: string): Promise<string[]> {
        const record = this.get(id, storage)
        if (!record.deleted) {
            throw new BookmarkStateError(`Bookmark ${id} must be soft-deleted before hard delete`, id)
        }
        const preserveAssets = [...this.index.referencedAssets(record.storageLocation, id)]
        const outcome = await this.guardStore(record.storageLocation, id, () =>
            this.store.delete(record.storageLocation, id, { hard: true, preserveAssets }, this.deleteHook())
        )
        const removedAssets = outcome.mode === 'hard' ? outcome.removedAssets : []
        this.telemetry.trackRecallEvent('Bookmark.HardDeleted', { recordId: id, removedAssets: removedAssets.length }, { storageName: record.storageLocation })
        return removedAssets
    }

    async trackAccess(id: string, storage?: string): Promise<BookmarkRecord> {
        const accessed = await this.mutate(id, storage, (current) => ({ ...current, lastAccessed: this.clock.nowIso() }))
        this.telemetry.trackRecallEvent('Bookmark.Accessed', { recordId: id }, { storageName: accessed.storageLocation })
        return accessed
    }

    list(options: ListBookmarksOptions = {}): BookmarkRecord[] {
        const storage = options.storage ?? 'all'
        if (storage !== 'all' && !this.store.hasStorage(storage)) {
            throw new StorageNotFoundError(`Storage not found: ${storage}`, storage)
        }
        return this.index.query({ storage, includeDeleted: options.includeDeleted ?? false, folderPath: options.folderPath })
    }

    stats(storage: string): IndexStats {
        return this.index.stats(storage)
    }

    currentStorage(): string {
        const current = selectCurrentStorageName(this.config.storageLocations) ?? this.store.listStorageNames()[0]
        if (!current) {
            throw new StorageNotFoundError('No storage location is configured', 'current')
        }
        return current
    }

    private async mutate(id: string, storage: string | undefined, fn: (current: BookmarkRecord) => BookmarkRecord): Promise<BookmarkRecord> {
        const { storageLocation } = this.get(id, storage)
        return this.guardStore(storageLocation, id, () => this.store.update(storageLocation, id, fn, this.upsertHook()))
    }

    /**
     * The Index said the record exists but the store disagrees: resync the entry, then report.
     */
    private async guardStore<T>(storageName: string, id: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn()
        } catch (error) {
            if (error instanceof RecordNotFoundError || error instanceof CorruptRecordError) {
                this.telemetry.trackException(error, { recordId: id, storageName })
                await this.index.refresh(storageName, id)
                if (error instanceof RecordNotFoundError) {
                    throw new BookmarkNotFoundError(`Bookmark not found: ${id}`, id)
                }
            }
            throw error
        }
    }

    private upsertHook(): CommitHooks<BookmarkRecord> {
        return { onCommitted: (record) => this.index.upsert(record) }
    }

    private deleteHook(): CommitHooks<DeleteOutcome> {
        return {
            onCommitted: (outcome) => {
                if (outcome.mode === 'soft') this.index.upsert(outcome.record)
                else this.index.remove(outcome.storageName, outcome.id)
            }
        }
    }
}

function definedFields(patch: BookmarkPatch): BookmarkPatch {
    const fields: BookmarkPatch = {}
    if (patch.url !== undefined) fields.url = patch.url
    if (patch.title !== undefined) fields.title = patch.title
    if (patch.keywords !== undefined) fields.keywords = patch.keywords
    if (patch.description !== undefined) fields.description = patch.description
    if (patch.tags !== undefined) fields.tags = patch.tags
    if (patch.folderPath !== undefined) fields.folderPath = patch.folderPath
    return fields
}
