/**
 * Field-weighted substring relevance.
 *
 * Case-insensitive contiguous-substring containment of the whole (trimmed) query, not token matching:
 * "python code" does not match "Python Best Practices Guide". Each field contributes its weight
 * at most once, however many of its keywords/tags contain the query.
 */
import type { BookmarkRecord, MatchedField } from '@bookmark-recall/shared'

export const LEXICAL_FIELD_WEIGHTS = {
    title: 1.0,
    keywords: 0.8,
    tags: 0.6,
    description: 0.5,
    url: 0.3
} as const satisfies Record<MatchedField, number>

export const MAX_LEXICAL_SCORE = 3.2

export interface LexicalScore {
    score: number
    /** In weight order: title, keywords, tags, description, url */
    matchedFields: MatchedField[]
}

export function normalizeQueryText(text: string): string {
    return text.trim().toLowerCase()
}

function fieldMatches(record: BookmarkRecord, field: MatchedField, needle: string): boolean {
    switch (field) {
        case 'title':
            return record.title.toLowerCase().includes(needle)
        case 'keywords':
            return record.keywords.some((keyword) => keyword.toLowerCase().includes(needle))
        case 'tags':
            return record.tags.some((tag) => tag.toLowerCase().includes(needle))
        case 'description':
            return (record.description ?? '').toLowerCase().includes(needle)
        case 'url':
            return record.url.toLowerCase().includes(needle)
    }
}

const FIELD_ORDER: readonly MatchedField[] = ['title', 'keywords', 'tags', 'description', 'url']

export function scoreLexical(query: string, record: BookmarkRecord): LexicalScore {
    const needle = normalizeQueryText(query)
    const matchedFields: MatchedField[] = []
    let score = 0
    if (!needle) return { score, matchedFields }

    for (const field of FIELD_ORDER) {
        if (fieldMatches(record, field, needle)) {
            score += LEXICAL_FIELD_WEIGHTS[field]
            matchedFields.push(field)
        }
    }
    return { score, matchedFields }
}

/** Lexical score on a 0..1 scale, comparable with cosine similarity */
export function normalizeLexicalScore(score: number): number {
    return Math.min(1, Math.max(0, score / MAX_LEXICAL_SCORE))
}

export interface Rankable {
    score: number
    record: Pick<BookmarkRecord, 'id' | 'createdAt'>
}

function createdAtMs(record: Pick<BookmarkRecord, 'createdAt'>): number {
    const ms = Date.parse(record.createdAt)
    return Number.isNaN(ms) ? 0 : ms
}

/**
 * Score descending, then createdAt descending, then id ascending.
 */
export function compareRanked(a: Rankable, b: Rankable): number {
    if (a.score !== b.score) return b.score - a.score
    const byCreated = createdAtMs(b.record) - createdAtMs(a.record)
    if (byCreated !== 0) return byCreated
    return a.record.id < b.record.id ? -1 : a.record.id > b.record.id ? 1 : 0
}
