/**
 * Recall Coordinator - single public query entry point.
 *
 * 1. validate input (no work is done for a rejected query)
 * 2. resolve candidates from the Index for the scope
 * 3. lexical scores for every candidate
 * 4. semantic scores when enabled and the adapter is healthy; a failed query embedding
 *    degrades the whole query to lexical mode with a fallback reason
 * 5. merge: semanticWeight * semantic + lexicalWeight * (lexical / MAX_LEXICAL_SCORE),
 *    drop zero scores, sort (score desc, createdAt desc, id asc), truncate to limit
 *
 * Never mutates records; may populate the embedding cache.
 */
import {
    ALL_STORAGES,
    CURRENT_STORAGE,
    EmbeddingUnavailableError,
    FolderPathSchema,
    InvalidQueryError,
    InvalidScopeError,
    normalizeScope,
    selectCurrentStorageName,
    type BookmarkRecord,
    type FallbackReason,
    type RecallQuery,
    type RecallResult,
    type RecallResultItem,
    type RecallScope
} from '@bookmark-recall/shared'
import { inject, injectable } from 'inversify'
import { DEFAULT_WEIGHTS, type RecallConfig, type RecallWeights } from '../config/recallConfig.js'
import { TOKENS } from '../di/tokens.js'
import { RecordIndex } from '../indexing/recordIndex.js'
import type { IRecordStore } from '../repos/recordStore.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { EmbeddingProviderAdapter } from './embeddingProviderAdapter.js'
import { compareRanked, normalizeLexicalScore, scoreLexical, type LexicalScore } from './lexicalScorer.js'
import { recordKey, SemanticScorer } from './semanticScorer.js'
import { buildSnippet, tokenizeQuery } from './snippet.js'

interface ResolvedScope {
    storageNames: string[]
    includeDeleted: boolean
    folderPath?: string
}

interface SemanticOutcome {
    scores?: Map<string, number>
    fallbackReason?: FallbackReason
    fallbackDetail?: string
}

@injectable()
export class RecallCoordinator {
    constructor(
        @inject(RecordIndex) private readonly index: RecordIndex,
        @inject(TOKENS.RecordStore) private readonly store: IRecordStore,
        @inject(EmbeddingProviderAdapter) private readonly adapter: EmbeddingProviderAdapter,
        @inject(SemanticScorer) private readonly semanticScorer: SemanticScorer,
        @inject(TOKENS.RecallConfig) private readonly config: RecallConfig,
        @inject(TelemetryService) private readonly telemetry: TelemetryService
    ) {}

    /**
     * @throws InvalidQueryError for empty text or a limit that is not a positive integer
     * @throws InvalidScopeError for an unknown storage (or 'current' with none configured)
     */
    async query(request: RecallQuery): Promise<RecallResult> {
        const started = performance.now()
        const text = this.validateText(request.text)
        const limit = this.resolveLimit(request.limit)
        const scope = this.resolveScope(normalizeScope(request.scope))

        const candidates = scope.storageNames.flatMap((storage) =>
            this.index.query({ storage, includeDeleted: scope.includeDeleted, folderPath: scope.folderPath })
        )

        const lexical = new Map<string, LexicalScore>()
        for (const record of candidates) {
            lexical.set(recordKey(record), scoreLexical(text, record))
        }

        const semantic = await this.scoreSemantic(text, candidates)
        const mode = semantic.scores ? 'hybrid' : 'lexical'
        const weights = this.effectiveWeights()
        const queryTokens = tokenizeQuery(text)

        const ranked: RecallResultItem[] = []
        for (const record of candidates) {
            const key = recordKey(record)
            const lex = lexical.get(key) ?? { score: 0, matchedFields: [] }
            const normalized = normalizeLexicalScore(lex.score)
            const semanticScore = semantic.scores?.get(key)

            const score = semantic.scores ? weights.semantic * (semanticScore ?? 0) + weights.lexical * normalized : normalized
            if (score <= 0) continue

            ranked.push({
                record,
                score,
                matchedFields: lex.matchedFields,
                scoreBreakdown: semanticScore === undefined ? { lexical: lex.score } : { lexical: lex.score, semantic: semanticScore },
                ...buildSnippet(record, queryTokens)
            })
        }
        ranked.sort(compareRanked)
        const results = ranked.slice(0, limit)

        const result: RecallResult = {
            query: text,
            mode,
            semanticAvailable: mode === 'hybrid',
            results,
            totalCandidates: candidates.length,
            totalReturned: results.length,
            searchedStorageNames: scope.storageNames
        }
        if (semantic.fallbackReason) {
            result.fallbackReason = semantic.fallbackReason
            if (semantic.fallbackDetail) result.fallbackDetail = semantic.fallbackDetail
            this.telemetry.trackRecallEvent('Recall.Query.Fallback', { reason: semantic.fallbackReason, detail: semantic.fallbackDetail })
        }

        // Query text is user content: only its length is recorded
        const durationMs = Math.round(performance.now() - started)
        this.telemetry.trackRecallEvent('Recall.Query.Executed', {
            mode,
            queryLength: text.length,
            candidates: candidates.length,
            returned: results.length,
            storageCount: scope.storageNames.length,
            durationMs
        })
        this.telemetry.trackMetric('Recall.Query.DurationMs', durationMs, { mode })
        return result
    }

    private async scoreSemantic(text: string, candidates: readonly BookmarkRecord[]): Promise<SemanticOutcome> {
        if (!this.config.semanticEnabled) {
            return { fallbackReason: 'semantic_disabled' }
        }
        if (!this.adapter.isHealthy()) {
            return { fallbackReason: 'embedding_unavailable', fallbackDetail: this.adapter.health().lastFailureReason ?? 'cooldown' }
        }

        let queryVector: number[]
        try {
            queryVector = await this.adapter.embed(text)
        } catch (error) {
            if (error instanceof EmbeddingUnavailableError) {
                return { fallbackReason: 'embedding_unavailable', fallbackDetail: error.reason }
            }
            throw error
        }
        return { scores: await this.semanticScorer.scoreCandidates(queryVector, candidates) }
    }

    private validateText(text: unknown): string {
        const trimmed = typeof text === 'string' ? text.trim() : ''
        if (!trimmed) {
            this.telemetry.trackRecallEvent('Recall.Query.Rejected', { reason: 'empty-query' })
            throw new InvalidQueryError('Query text cannot be empty')
        }
        return trimmed
    }

    private resolveLimit(limit: number | undefined): number {
        if (limit === undefined) return this.config.defaultLimit
        if (!Number.isInteger(limit) || limit < 1) {
            this.telemetry.trackRecallEvent('Recall.Query.Rejected', { reason: 'invalid-limit' })
            throw new InvalidQueryError(`Limit must be a positive integer, got ${limit}`)
        }
        return Math.min(limit, this.config.maxLimit)
    }

    private resolveScope(scope: RecallScope): ResolvedScope {
        let folderPath: string | undefined
        if (scope.folderPath !== undefined) {
            const folder = FolderPathSchema.safeParse(scope.folderPath)
            if (!folder.success) {
                this.telemetry.trackRecallEvent('Recall.Query.Rejected', { reason: 'invalid-folder' })
                throw new InvalidScopeError(`Invalid folder filter: ${scope.folderPath}`, scope.folderPath)
            }
            folderPath = folder.data
        }
        const includeDeleted = scope.includeDeleted ?? false

        if (scope.storage === ALL_STORAGES) {
            return { storageNames: this.store.listStorageNames(), includeDeleted, folderPath }
        }
        if (scope.storage === CURRENT_STORAGE) {
            const current = selectCurrentStorageName(this.config.storageLocations) ?? this.store.listStorageNames()[0]
            if (!current) {
                this.telemetry.trackRecallEvent('Recall.Query.Rejected', { reason: 'no-current-storage' })
                throw new InvalidScopeError('No current storage is configured', scope.storage)
            }
            return { storageNames: [current], includeDeleted, folderPath }
        }
        if (!this.store.hasStorage(scope.storage)) {
            this.telemetry.trackRecallEvent('Recall.Query.Rejected', { reason: 'unknown-storage' })
            throw new InvalidScopeError(`Unknown storage scope: ${scope.storage}`, scope.storage)
        }
        return { storageNames: [scope.storage], includeDeleted, folderPath }
    }

    private effectiveWeights(): RecallWeights {
        const { semantic, lexical } = this.config.weights
        if (semantic <= 0 && lexical <= 0) return { ...DEFAULT_WEIGHTS }
        return { semantic: Math.max(0, semantic), lexical: Math.max(0, lexical) }
    }
}
