import type { BookmarkRecord } from '@bookmark-recall/shared'

export const SNIPPET_MAX_LENGTH = 180
export const MAX_HIGHLIGHTS = 8

const TOKEN_PATTERN = /[a-z0-9]{2,}/g

export interface Snippet {
    snippet: string
    highlights: string[]
}

/** Lowercased alphanumeric tokens of two or more characters, first occurrence order, de-duplicated */
export function tokenizeQuery(text: string): string[] {
    return [...new Set(text.toLowerCase().match(TOKEN_PATTERN) ?? [])]
}

/**
 * Pick the field (title, description, keywords, url) containing the most query tokens;
 * the title wins when nothing matches. Earlier fields win ties.
 */
export function buildSnippet(record: BookmarkRecord, queryTokens: readonly string[]): Snippet {
    const candidates = [record.title, record.description ?? '', record.keywords.join(', '), record.url]

    let bestText = record.title
    let bestMatches = -1
    let highlights: string[] = []
    for (const text of candidates) {
        const lowered = text.toLowerCase()
        const matched = queryTokens.filter((token) => lowered.includes(token))
        if (matched.length > bestMatches) {
            bestMatches = matched.length
            bestText = text
            highlights = matched
        }
    }

    let snippet = bestText.trim()
    if (snippet.length > SNIPPET_MAX_LENGTH) {
        snippet = `${snippet.slice(0, SNIPPET_MAX_LENGTH - 3)}...`
    }
    return { snippet, highlights: highlights.slice(0, MAX_HIGHLIGHTS) }
}
