/**
 * Domain exceptions for the recall engine.
 *
 * Propagation policy:
 * - storage/parse errors are recovered per file or per record (CorruptRecordError is
 *   mostly carried as a tagged result, only thrown where a caller asked for one record)
 * - embedding errors are recovered per query (lexical fallback)
 * - lock and input errors propagate to the caller
 */

export type RecallErrorCode =
    | 'CorruptRecord'
    | 'EmbeddingUnavailable'
    | 'LockTimeout'
    | 'InvalidQuery'
    | 'InvalidScope'
    | 'StorageNotFound'
    | 'RecordNotFound'
    | 'RecordValidation'
    | 'BookmarkNotFound'
    | 'BookmarkAlreadyDeleted'
    | 'BookmarkState'
    | 'RecallConfig'

/**
 * Base class for all recall engine exceptions.
 */
export abstract class RecallException extends Error {
    abstract readonly code: RecallErrorCode

    constructor(
        message: string,
        public readonly retryable: boolean = false
    ) {
        super(message)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

/**
 * A record file that does not parse or misses required fields.
 */
export class CorruptRecordError extends RecallException {
    readonly code = 'CorruptRecord'

    constructor(
        message: string,
        public readonly storageName: string,
        public readonly file: string,
        public readonly reason: string
    ) {
        super(message)
    }
}

export type EmbeddingFailureReason = 'timeout' | 'auth' | 'quota' | 'transport' | 'invalid-response' | 'not-configured'

/**
 * External embedding call failed or timed out.
 * Callers degrade to lexical recall; this never reaches an end user as a hard error.
 */
export class EmbeddingUnavailableError extends RecallException {
    readonly code = 'EmbeddingUnavailable'

    constructor(
        message: string,
        public readonly reason: EmbeddingFailureReason,
        public readonly httpStatus?: number
    ) {
        super(message, true)
    }
}

/**
 * Per-record lock not acquired within the bounded wait. Safe to retry.
 */
export class LockTimeoutError extends RecallException {
    readonly code = 'LockTimeout'

    constructor(
        message: string,
        public readonly lockKey: string,
        public readonly timeoutMs: number
    ) {
        super(message, true)
    }
}

export class InvalidQueryError extends RecallException {
    readonly code = 'InvalidQuery'
}

export class InvalidScopeError extends RecallException {
    readonly code = 'InvalidScope'

    constructor(
        message: string,
        public readonly scope: string
    ) {
        super(message)
    }
}

export class StorageNotFoundError extends RecallException {
    readonly code = 'StorageNotFound'

    constructor(
        message: string,
        public readonly storageName: string
    ) {
        super(message)
    }
}

export class RecordNotFoundError extends RecallException {
    readonly code = 'RecordNotFound'

    constructor(
        message: string,
        public readonly recordId: string
    ) {
        super(message)
    }
}

/**
 * A record rejected before it reaches disk (e.g. five keywords, relative URL).
 */
export class RecordValidationError extends RecallException {
    readonly code = 'RecordValidation'

    constructor(
        message: string,
        public readonly issues: string[]
    ) {
        super(message)
    }
}

export class BookmarkNotFoundError extends RecallException {
    readonly code = 'BookmarkNotFound'

    constructor(
        message: string,
        public readonly bookmarkId: string
    ) {
        super(message)
    }
}

export class BookmarkAlreadyDeletedError extends RecallException {
    readonly code = 'BookmarkAlreadyDeleted'

    constructor(
        message: string,
        public readonly bookmarkId: string
    ) {
        super(message)
    }
}

/**
 * Lifecycle transition not allowed from the bookmark's current state
 * (restore of a live bookmark, hard delete before soft delete).
 */
export class BookmarkStateError extends RecallException {
    readonly code = 'BookmarkState'

    constructor(
        message: string,
        public readonly bookmarkId: string
    ) {
        super(message)
    }
}

export class RecallConfigError extends RecallException {
    readonly code = 'RecallConfig'
}

export function isRecallException(error: unknown): error is RecallException {
    return error instanceof RecallException
}
