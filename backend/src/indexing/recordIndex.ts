/**
 * In-memory index of bookmark records, keyed by (storage, id).
 *
 * The Record Store is the source of truth; this is a derived read-through cache.
 * - rebuild(storage) scans the store into a fresh view and swaps it in atomically
 * - upsert/remove are called from Record Store commit hooks, i.e. only after a write commits
 *   and while the per-record lock is still held, so index order follows commit order
 * - mutations that land while a rebuild of the same storage is scanning are applied to the
 *   live view AND journaled, then replayed onto the fresh view right before the swap
 *
 * When a record cannot be validated or re-read the entry is dropped and logged:
 * under-returning is preferred over serving stale or partial data.
 *
 * Stored records are frozen copies; query and get hand them out without copying.
 */
import { ALL_STORAGES, parseBookmarkRecord, recordRevisionTime, StorageNotFoundError, type BookmarkRecord } from '@bookmark-recall/shared'
import { Mutex } from 'async-mutex'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IRecordStore } from '../repos/recordStore.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

export interface IndexQuery {
    /** Storage name or 'all' */
    storage: string
    includeDeleted: boolean
    folderPath?: string
}

export interface IndexStats {
    total: number
    active: number
    deleted: number
    errors: number
    conflicts: number
}

interface StorageView {
    records: Map<string, BookmarkRecord>
    byFolder: Map<string, Set<string>>
    loadErrors: string[]
    conflicts: string[]
}

type JournalEntry = { op: 'upsert'; record: BookmarkRecord } | { op: 'remove'; id: string }

function emptyView(): StorageView {
    return { records: new Map(), byFolder: new Map(), loadErrors: [], conflicts: [] }
}

function freezeRecord(record: BookmarkRecord): BookmarkRecord {
    const copy = { ...record, keywords: [...record.keywords], tags: [...record.tags] }
    Object.freeze(copy.keywords)
    Object.freeze(copy.tags)
    return Object.freeze(copy)
}

function setRecord(view: StorageView, record: BookmarkRecord): void {
    deleteRecord(view, record.id)
    view.records.set(record.id, freezeRecord(record))
    if (record.folderPath !== undefined) {
        let ids = view.byFolder.get(record.folderPath)
        if (!ids) {
            ids = new Set()
            view.byFolder.set(record.folderPath, ids)
        }
        ids.add(record.id)
    }
}

function deleteRecord(view: StorageView, id: string): boolean {
    const existing = view.records.get(id)
    if (!existing) return false
    view.records.delete(id)
    if (existing.folderPath !== undefined) {
        const ids = view.byFolder.get(existing.folderPath)
        ids?.delete(id)
        if (ids && ids.size === 0) view.byFolder.delete(existing.folderPath)
    }
    return true
}

@injectable()
export class RecordIndex {
    private readonly views = new Map<string, StorageView>()
    private readonly journals = new Map<string, JournalEntry[]>()
    private readonly rebuildLocks = new Map<string, Mutex>()

    constructor(
        @inject(TOKENS.RecordStore) private readonly store: IRecordStore,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    /**
     * Fully repopulate one storage's view from the Record Store.
     * Rebuilds of the same storage run one at a time; different storages are independent.
     */
    async rebuild(storageName: string): Promise<IndexStats> {
        let mutex = this.rebuildLocks.get(storageName)
        if (!mutex) {
            mutex = new Mutex()
            this.rebuildLocks.set(storageName, mutex)
        }
        return mutex.runExclusive(() => this.telemetry.withTiming('index.rebuild', () => this.rebuildExclusive(storageName), { storageName }))
    }

    /**
     * Re-validate and store a committed record. Invalid records are dropped from the view.
     * @returns whether the record is now in the view
     */
    upsert(record: BookmarkRecord): boolean {
        const parsed = parseBookmarkRecord(record)
        if (!parsed.success) {
            this.drop(record.storageLocation, record.id, parsed.reason)
            return false
        }
        this.apply(parsed.record.storageLocation, { op: 'upsert', record: parsed.record })
        return true
    }

    remove(storageName: string, id: string): void {
        this.apply(storageName, { op: 'remove', id })
    }

    /**
     * Re-read one record from the store (external change entry point for a single file).
     */
    async refresh(storageName: string, id: string): Promise<BookmarkRecord | undefined> {
        const result = await this.store.read(storageName, id)
        if (!result) {
            this.remove(storageName, id)
            return undefined
        }
        if (result.kind === 'corrupt') {
            this.drop(storageName, id, result.reason)
            return undefined
        }
        return this.upsert(result.record) ? result.record : undefined
    }

    /**
     * Candidate set for recall. With a folder filter only that folder's entries are visited.
     */
    query(query: IndexQuery): BookmarkRecord[] {
        const storageNames = query.storage === ALL_STORAGES ? this.indexedStorageNames() : [query.storage]
        const candidates: BookmarkRecord[] = []
        for (const name of storageNames) {
            const view = this.views.get(name)
            if (!view) continue
            const records =
                query.folderPath === undefined
                    ? view.records.values()
                    : [...(view.byFolder.get(query.folderPath) ?? [])].map((id) => view.records.get(id))
            for (const record of records) {
                if (!record) continue
                if (!query.includeDeleted && record.deleted) continue
                candidates.push(record)
            }
        }
        return candidates
    }

    /**
     * Look a record up by id in one storage, or across all indexed storages.
     */
    get(storageName: string | undefined, id: string): BookmarkRecord | undefined {
        const names = storageName === undefined ? this.indexedStorageNames() : [storageName]
        for (const name of names) {
            const record = this.views.get(name)?.records.get(id)
            if (record) return record
        }
        return undefined
    }

    indexedStorageNames(): string[] {
        return [...this.views.keys()]
    }

    stats(storageName: string): IndexStats {
        const view = this.requireView(storageName)
        let deleted = 0
        for (const record of view.records.values()) {
            if (record.deleted) deleted += 1
        }
        return {
            total: view.records.size,
            active: view.records.size - deleted,
            deleted,
            errors: view.loadErrors.length,
            conflicts: view.conflicts.length
        }
    }

    loadErrors(storageName: string): string[] {
        return [...this.requireView(storageName).loadErrors]
    }

    conflicts(storageName: string): string[] {
        return [...this.requireView(storageName).conflicts]
    }

    /**
     * Asset refs (favicon, screenshot) held by records of a storage other than `exceptId`,
     * deleted ones included since their files are still on disk.
     */
    referencedAssets(storageName: string, exceptId: string): Set<string> {
        const refs = new Set<string>()
        for (const record of this.views.get(storageName)?.records.values() ?? []) {
            if (record.id === exceptId) continue
            if (record.faviconRef) refs.add(record.faviconRef)
            if (record.screenshotRef) refs.add(record.screenshotRef)
        }
        return refs
    }

    private async rebuildExclusive(storageName: string): Promise<IndexStats> {
        const journal: JournalEntry[] = []
        this.journals.set(storageName, journal)
        try {
            const fresh = emptyView()
            const sources = new Map<string, string>()

            for await (const result of this.store.scan(storageName)) {
                if (result.kind === 'corrupt') {
                    fresh.loadErrors.push(`${result.file}: ${result.reason}`)
                    continue
                }
                const candidate = result.record
                const existing = fresh.records.get(candidate.id)
                if (!existing) {
                    setRecord(fresh, candidate)
                    sources.set(candidate.id, result.file)
                    continue
                }

                // Last writer wins; on equal revision time the later file in scan order wins
                const candidateWins = recordRevisionTime(candidate) >= recordRevisionTime(existing)
                const message = `Conflict for record ID ${candidate.id}: ${sources.get(candidate.id) ?? '?'} vs ${result.file}`
                fresh.conflicts.push(message)
                if (candidateWins) {
                    setRecord(fresh, candidate)
                    sources.set(candidate.id, result.file)
                }
                this.telemetry.trackRecallEvent(
                    'Index.Rebuild.Conflict',
                    { recordId: candidate.id, winner: sources.get(candidate.id) },
                    { storageName }
                )
                this.telemetry.log('warn', message, { storageName })
            }

            // No await between replay and swap: readers see the old view or the complete new one
            for (const entry of journal) {
                if (entry.op === 'upsert') setRecord(fresh, entry.record)
                else deleteRecord(fresh, entry.id)
            }
            this.views.set(storageName, fresh)
        } finally {
            this.journals.delete(storageName)
        }

        const stats = this.stats(storageName)
        this.telemetry.trackRecallEvent('Index.Rebuild.Completed', { ...stats, replayed: journal.length }, { storageName })
        return stats
    }

    private apply(storageName: string, entry: JournalEntry): void {
        let view = this.views.get(storageName)
        if (!view && entry.op === 'upsert') {
            view = emptyView()
            this.views.set(storageName, view)
        }
        if (view) {
            if (entry.op === 'upsert') setRecord(view, entry.record)
            else deleteRecord(view, entry.id)
        }
        this.journals.get(storageName)?.push(entry)
    }

    private drop(storageName: string, id: string, reason: string): void {
        this.remove(storageName, id)
        this.telemetry.trackRecallEvent('Index.Record.Dropped', { recordId: id, reason }, { storageName })
        this.telemetry.log('warn', `Dropped record ${id} from index: ${reason}`, { storageName, recordId: id })
    }

    private requireView(storageName: string): StorageView {
        const view = this.views.get(storageName)
        if (!view) {
            throw new StorageNotFoundError(`Storage not indexed: ${storageName}`, storageName)
        }
        return view
    }
}
