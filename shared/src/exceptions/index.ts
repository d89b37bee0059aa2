/**
 * Domain exceptions for recall engine operations.
 */

export {
    BookmarkAlreadyDeletedError,
    BookmarkNotFoundError,
    BookmarkStateError,
    CorruptRecordError,
    EmbeddingUnavailableError,
    InvalidQueryError,
    InvalidScopeError,
    isRecallException,
    LockTimeoutError,
    RecallConfigError,
    RecallException,
    RecordNotFoundError,
    RecordValidationError,
    StorageNotFoundError
} from './recallExceptions.js'
export type { EmbeddingFailureReason, RecallErrorCode } from './recallExceptions.js'
