/**
 * Shared read-modify-write discipline for record stores.
 *
 * Subclasses supply raw file primitives (read/commit/remove/list) and lock options;
 * this base owns validation, serialization, locking, commit hooks and telemetry so the
 * file-backed and in-memory stores cannot drift apart semantically.
 */
import {
    AssetRefSchema,
    CorruptRecordError,
    LockTimeoutError,
    parseBookmarkRecord,
    RecordNotFoundError,
    RecordValidationError,
    StorageNotFoundError,
    type BookmarkRecord,
    type IClock
} from '@bookmark-recall/shared'
import { injectable } from 'inversify'
import type { TelemetryService } from '../../telemetry/TelemetryService.js'
import type { CommitHooks, DeleteOptions, DeleteOutcome, IRecordStore, RecordReadResult } from '../recordStore.js'
import { deserializeRecord, isSafeRecordId, recordFileName, serializeRecord } from '../utils/recordSerializer.js'
import type { IScopedLock, ScopedLockOptions } from '../utils/scopedLock.js'

@injectable()
export abstract class BaseRecordStore implements IRecordStore {
    constructor(
        protected readonly lock: IScopedLock,
        protected readonly telemetry: TelemetryService,
        protected readonly clock: IClock
    ) {}

    abstract listStorageNames(): string[]

    abstract ensureStorage(name: string): Promise<void>

    /** Raw file content, or undefined when the file does not exist */
    protected abstract readFile(storageName: string, fileName: string): Promise<string | undefined>

    /** Atomically replace the file content */
    protected abstract commitFile(storageName: string, fileName: string, content: string): Promise<void>

    /** @returns false when the file did not exist */
    protected abstract removeFile(storageName: string, fileName: string): Promise<boolean>

    /** Record file names (`*.yaml`) under the storage's bookmarks directory */
    protected abstract listFiles(storageName: string): Promise<string[]>

    /** @returns false when the asset did not exist */
    protected abstract removeAsset(storageName: string, assetRef: string): Promise<boolean>

    protected abstract lockOptions(storageName: string, fileName: string): ScopedLockOptions

    hasStorage(name: string): boolean {
        return this.listStorageNames().includes(name)
    }

    async write(record: BookmarkRecord, hooks?: CommitHooks<BookmarkRecord>): Promise<BookmarkRecord> {
        const valid = this.validate(record)
        this.assertStorage(valid.storageLocation)
        this.assertRecordId(valid.id)
        const fileName = recordFileName(valid.id)

        return this.locked(valid.storageLocation, fileName, async () => {
            await this.commitFile(valid.storageLocation, fileName, serializeRecord(valid))
            hooks?.onCommitted?.(valid)
            this.telemetry.trackRecallEvent('RecordStore.Record.Written', { recordId: valid.id }, { storageName: valid.storageLocation })
            return valid
        })
    }

    async update(
        storageName: string,
        id: string,
        mutate: (current: BookmarkRecord) => BookmarkRecord,
        hooks?: CommitHooks<BookmarkRecord>
    ): Promise<BookmarkRecord> {
        this.assertStorage(storageName)
        const fileName = recordFileName(id)

        return this.locked(storageName, fileName, async () => {
            const current = await this.requireParsed(storageName, id)
            const next = this.validate(mutate(current))
            if (next.id !== id || next.storageLocation !== storageName) {
                throw new RecordValidationError(`Record ${id} cannot change its id or storage`, ['id/storageLocation are immutable'])
            }
            await this.commitFile(storageName, fileName, serializeRecord(next))
            hooks?.onCommitted?.(next)
            this.telemetry.trackRecallEvent('RecordStore.Record.Written', { recordId: id }, { storageName })
            return next
        })
    }

    async read(storageName: string, id: string): Promise<RecordReadResult | undefined> {
        this.assertStorage(storageName)
        if (!isSafeRecordId(id)) return undefined
        return this.readResult(storageName, recordFileName(id))
    }

    async *scan(storageName: string): AsyncGenerator<RecordReadResult> {
        this.assertStorage(storageName)
        const files = [...(await this.listFiles(storageName))].sort()
        for (const file of files) {
            const result = await this.readResult(storageName, file)
            // Removed between listing and reading
            if (result) yield result
        }
    }

    async delete(storageName: string, id: string, options: DeleteOptions, hooks?: CommitHooks<DeleteOutcome>): Promise<DeleteOutcome> {
        this.assertStorage(storageName)
        const fileName = recordFileName(id)

        return this.locked(storageName, fileName, async () => {
            if (!options.hard) {
                const current = await this.requireParsed(storageName, id)
                if (current.deleted) {
                    const outcome: DeleteOutcome = { mode: 'soft', record: current, changed: false }
                    hooks?.onCommitted?.(outcome)
                    return outcome
                }
                const next = this.validate({ ...current, deleted: true, deletedAt: this.clock.nowIso() })
                await this.commitFile(storageName, fileName, serializeRecord(next))
                const outcome: DeleteOutcome = { mode: 'soft', record: next, changed: true }
                hooks?.onCommitted?.(outcome)
                this.telemetry.trackRecallEvent('RecordStore.Record.Deleted', { recordId: id, hard: false }, { storageName })
                return outcome
            }

            const existing = isSafeRecordId(id) ? await this.readResult(storageName, fileName) : undefined
            if (!existing) {
                throw new RecordNotFoundError(`Record not found: ${id}`, id)
            }
            const record = existing.kind === 'parsed' ? existing.record : undefined

            // Record file first: a crash in between leaves an orphaned asset, never a dangling reference
            await this.removeFile(storageName, fileName)

            const preserved = new Set(options.preserveAssets ?? [])
            const removedAssets: string[] = []
            for (const ref of [record?.faviconRef, record?.screenshotRef]) {
                if (ref === undefined || preserved.has(ref) || !AssetRefSchema.safeParse(ref).success) continue
                if (await this.removeAsset(storageName, ref)) removedAssets.push(ref)
            }

            const outcome: DeleteOutcome = { mode: 'hard', storageName, id, record, removedAssets }
            hooks?.onCommitted?.(outcome)
            this.telemetry.trackRecallEvent(
                'RecordStore.Record.Deleted',
                { recordId: id, hard: true, removedAssets: removedAssets.length },
                { storageName }
            )
            return outcome
        })
    }

    protected assertStorage(storageName: string): void {
        if (!this.hasStorage(storageName)) {
            throw new StorageNotFoundError(`Storage not found: ${storageName}`, storageName)
        }
    }

    private assertRecordId(id: string): void {
        if (!isSafeRecordId(id)) {
            throw new RecordValidationError(`Record id '${id}' cannot be used as a file name`, [`id: unsafe file name`])
        }
    }

    private validate(record: BookmarkRecord): BookmarkRecord {
        const parsed = parseBookmarkRecord(record)
        if (!parsed.success) {
            throw new RecordValidationError(`Invalid bookmark record ${record.id}: ${parsed.reason}`, parsed.issues)
        }
        return parsed.record
    }

    private async requireParsed(storageName: string, id: string): Promise<BookmarkRecord> {
        const result = isSafeRecordId(id) ? await this.readResult(storageName, recordFileName(id)) : undefined
        if (!result) {
            throw new RecordNotFoundError(`Record not found: ${id}`, id)
        }
        if (result.kind === 'corrupt') {
            throw new CorruptRecordError(`Record ${id} in ${storageName} is corrupt: ${result.reason}`, storageName, result.file, result.reason)
        }
        return result.record
    }

    /**
     * Read and parse one file. I/O failures other than "missing" are reported as corrupt.
     * The directory a record was read from is authoritative for its storageLocation.
     */
    private async readResult(storageName: string, fileName: string): Promise<RecordReadResult | undefined> {
        let content: string | undefined
        try {
            content = await this.readFile(storageName, fileName)
        } catch (error) {
            return this.corrupt(storageName, fileName, `Failed to read file: ${error instanceof Error ? error.message : String(error)}`)
        }
        if (content === undefined) return undefined

        const parsed = deserializeRecord(content)
        if (!parsed.success) {
            return this.corrupt(storageName, fileName, parsed.reason)
        }
        return { kind: 'parsed', storageName, file: fileName, record: { ...parsed.record, storageLocation: storageName } }
    }

    private corrupt(storageName: string, file: string, reason: string): RecordReadResult {
        this.telemetry.trackRecallEvent('RecordStore.Record.Corrupt', { file, reason }, { storageName })
        this.telemetry.log('warn', `Corrupted record file ${file} in ${storageName}: ${reason}`, { storageName, file })
        return { kind: 'corrupt', storageName, file, reason }
    }

    private async locked<T>(storageName: string, fileName: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await this.lock.withLock(`${storageName}/${fileName}`, this.lockOptions(storageName, fileName), fn)
        } catch (error) {
            if (error instanceof LockTimeoutError) {
                this.telemetry.trackRecallEvent('RecordStore.Lock.Timeout', { lockKey: error.lockKey, timeoutMs: error.timeoutMs }, { storageName })
            }
            throw error
        }
    }
}
