/**
 * Content hash utilities for embedding cache validity.
 * A cached vector is only valid for the exact text (and model) it was computed from,
 * so edits to title/keywords/description/tags change the key and miss the cache.
 */
import crypto from 'crypto'

/**
 * Compute a deterministic hash of the text handed to an embedding model.
 * @returns SHA-256 hex hash of `modelId + "\n" + text`
 */
export function computeContentHash(modelId: string, text: string): string {
    return crypto.createHash('sha256').update(`${modelId}\n${text}`, 'utf8').digest('hex')
}
