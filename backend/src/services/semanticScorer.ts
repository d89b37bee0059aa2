/**
 * Semantic Scorer: cosine similarity between the query vector and each candidate's vector.
 * Candidate vectors come from the adapter's content-hash cache and are filled lazily;
 * a candidate whose vector cannot be obtained is left out of the semantic map (it can still
 * surface lexically).
 */
import type { BookmarkRecord } from '@bookmark-recall/shared'
import { inject, injectable } from 'inversify'
import { cosineSimilarity, type Vector } from '../utils/vector.js'
import { EmbeddingProviderAdapter } from './embeddingProviderAdapter.js'

/** Identity of a record across storages (ids are only unique within one storage) */
export function recordKey(record: Pick<BookmarkRecord, 'storageLocation' | 'id'>): string {
    return `${record.storageLocation}/${record.id}`
}

/**
 * Text embedded for a record: title, url, description, keywords, tags on separate lines.
 * Any edit to these fields changes the text, hence the cache key.
 */
export function recordEmbeddingText(record: BookmarkRecord): string {
    return [record.title, record.url, record.description ?? '', record.keywords.join(' '), record.tags.join(' ')].join('\n')
}

/** Cosine similarity clamped to 0..1 */
export function semanticScore(queryVector: Vector, recordVector: Vector): number {
    return Math.min(1, Math.max(0, cosineSimilarity(queryVector, recordVector)))
}

@injectable()
export class SemanticScorer {
    constructor(@inject(EmbeddingProviderAdapter) private readonly adapter: EmbeddingProviderAdapter) {}

    /**
     * @returns recordKey → score for every candidate that has a vector
     */
    async scoreCandidates(queryVector: Vector, candidates: readonly BookmarkRecord[]): Promise<Map<string, number>> {
        const texts = new Map<string, string>()
        for (const record of candidates) {
            texts.set(recordKey(record), recordEmbeddingText(record))
        }

        const vectors = await this.adapter.embedMany([...texts.values()])
        const scores = new Map<string, number>()
        for (const [key, text] of texts) {
            const vector = vectors.get(text)
            if (vector) scores.set(key, semanticScore(queryVector, vector))
        }
        return scores
    }
}
