import type { BookmarkRecord } from '@bookmark-recall/shared'

/**
 * Outcome of reading one record file. Parsing never throws past the store:
 * a file that does not parse or misses required fields comes back as `corrupt`.
 */
export type RecordReadResult =
    | { kind: 'parsed'; storageName: string; file: string; record: BookmarkRecord }
    | { kind: 'corrupt'; storageName: string; file: string; reason: string }

export type DeleteOutcome =
    | { mode: 'soft'; record: BookmarkRecord; changed: boolean }
    | { mode: 'hard'; storageName: string; id: string; record?: BookmarkRecord; removedAssets: string[] }

export interface DeleteOptions {
    hard: boolean
    /** Asset refs that must survive a hard delete (still referenced by another record) */
    preserveAssets?: readonly string[]
}

/**
 * Callbacks run after the file is committed and before the per-record lock is released,
 * so whoever mirrors the store (the Index) observes commits in lock order.
 */
export interface CommitHooks<T> {
    onCommitted?: (value: T) => void
}

/**
 * Repository contract for bookmark records.
 *
 * Persistence: one YAML file per record at `<storage>/bookmarks/<id>.yaml`
 * Implementations: File (production), Memory (tests/local; same serialization in memory)
 *
 * Concurrency: every mutation holds the per-record ScopedLock for its whole
 * read-modify-write and fails with LockTimeoutError when the bounded wait expires.
 * Writes are atomic from a reader's perspective (write-to-temp-then-rename).
 */
export interface IRecordStore {
    listStorageNames(): string[]

    hasStorage(name: string): boolean

    /**
     * Validate the storage root and create `bookmarks/`, `favicons/`, `screenshots/`.
     * @throws StorageNotFoundError when the storage is not configured or its root is unusable
     */
    ensureStorage(name: string): Promise<void>

    /**
     * Validate, serialize and replace the record file.
     * @throws RecordValidationError before any I/O when the record is invalid
     * @throws LockTimeoutError when the per-record lock is not acquired in time
     */
    write(record: BookmarkRecord, hooks?: CommitHooks<BookmarkRecord>): Promise<BookmarkRecord>

    /**
     * Read-modify-write against the on-disk record under one lock acquisition.
     * `id` and `storageLocation` cannot change.
     * @throws RecordNotFoundError, CorruptRecordError, RecordValidationError, LockTimeoutError
     */
    update(
        storageName: string,
        id: string,
        mutate: (current: BookmarkRecord) => BookmarkRecord,
        hooks?: CommitHooks<BookmarkRecord>
    ): Promise<BookmarkRecord>

    /** @returns undefined when no file exists for the id */
    read(storageName: string, id: string): Promise<RecordReadResult | undefined>

    /**
     * Lazy, finite, restartable sequence over every record file of a storage, in file-name order.
     * Individual file failures are yielded as `corrupt`; the scan continues.
     */
    scan(storageName: string): AsyncGenerator<RecordReadResult>

    /**
     * Soft: set `deleted`/`deletedAt` and rewrite (no-op when already deleted).
     * Hard: remove the record file and its screenshot/favicon assets except `preserveAssets`. Irreversible.
     * @throws RecordNotFoundError, CorruptRecordError (soft only), LockTimeoutError
     */
    delete(storageName: string, id: string, options: DeleteOptions, hooks?: CommitHooks<DeleteOutcome>): Promise<DeleteOutcome>
}
