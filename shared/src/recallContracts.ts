/**
 * Recall request/result payload types. Results are plain JSON-serializable objects
 * so an HTTP or CLI layer can return them unchanged.
 */
import type { BookmarkRecord } from './bookmarkRecord.js'

// Requests

export const ALL_STORAGES = 'all'
export const CURRENT_STORAGE = 'current'

/**
 * Candidate scope. `storage` is a storage name, `'all'` or `'current'`.
 */
export interface RecallScope {
    storage: string
    includeDeleted?: boolean
    folderPath?: string
}

/** POST /recall/query - Request body */
export interface RecallQuery {
    text: string
    /** Shorthand string is read as `{ storage: scope }`. Defaults to `'all'`. */
    scope?: RecallScope | string
    limit?: number
}

// Responses

export type RecallMode = 'hybrid' | 'lexical'

export type FallbackReason = 'embedding_unavailable' | 'semantic_disabled'

export type MatchedField = 'title' | 'keywords' | 'tags' | 'description' | 'url'

export interface ScoreBreakdown {
    /** Raw field-weighted lexical score (0..3.2) */
    lexical: number
    /** Cosine similarity clamped to 0..1; absent in lexical mode or when the record had no vector */
    semantic?: number
}

export interface RecallResultItem {
    record: BookmarkRecord
    score: number
    matchedFields: MatchedField[]
    scoreBreakdown: ScoreBreakdown
    snippet: string
    highlights: string[]
}

export interface RecallResult {
    query: string
    mode: RecallMode
    semanticAvailable: boolean
    fallbackReason?: FallbackReason
    /** Bounded diagnostic for the fallback (e.g. 'timeout', 'auth') */
    fallbackDetail?: string
    results: RecallResultItem[]
    totalCandidates: number
    totalReturned: number
    searchedStorageNames: string[]
}

export function normalizeScope(scope: RecallScope | string | undefined): RecallScope {
    if (scope === undefined) return { storage: ALL_STORAGES }
    if (typeof scope === 'string') return { storage: scope }
    return scope
}
