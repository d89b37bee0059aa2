/**
 * YAML (de)serialization of bookmark records.
 * One document per file, snake_case keys, insertion-ordered, absent optional fields omitted.
 */
import { parseBookmarkDocument, recordToDocument, type BookmarkParseResult, type BookmarkRecord } from '@bookmark-recall/shared'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'

export const RECORD_FILE_EXTENSION = '.yaml'

export function serializeRecord(record: BookmarkRecord): string {
    return stringifyYaml(recordToDocument(record), { lineWidth: 0 })
}

/**
 * Never throws: YAML syntax errors and schema failures both come back as `{ success: false }`.
 */
export function deserializeRecord(text: string): BookmarkParseResult {
    let data: unknown
    try {
        data = parseYaml(text)
    } catch (error) {
        const detail = error instanceof Error ? error.message.split('\n')[0] : String(error)
        return { success: false, reason: `Invalid YAML format: ${detail}`, issues: [detail] }
    }
    return parseBookmarkDocument(data)
}

export function recordFileName(id: string): string {
    return `${id}${RECORD_FILE_EXTENSION}`
}

/** Only plain file-system-safe ids map to record files */
export function isSafeRecordId(id: string): boolean {
    return /^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(id) && !id.includes('..')
}
