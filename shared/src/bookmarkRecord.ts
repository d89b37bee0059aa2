/**
 * Bookmark Record schema (Zod validation)
 *
 * Two shapes are defined here:
 * - BookmarkRecord: the in-memory camelCase record every engine component works with
 * - BookmarkDocument: the snake_case document stored as one YAML file per record
 *
 * Parsing never throws: callers receive a tagged result and must handle the corrupt case.
 */
import { z } from 'zod'

export const MAX_KEYWORDS = 4
export const MAX_TITLE_LENGTH = 500
export const MAX_DESCRIPTION_LENGTH = 5000

const IsoTimestampSchema = z.string().datetime({ offset: true })

function isAbsoluteUrl(value: string): boolean {
    try {
        new URL(value)
        return true
    } catch {
        return false
    }
}

function cleanList(values: string[]): string[] {
    return values.map((v) => v.trim()).filter((v) => v.length > 0)
}

export const FolderPathSchema = z
    .string()
    .trim()
    .refine((value) => !value.includes('..') && !value.startsWith('/') && !value.startsWith('\\'), {
        message: "Folder path cannot contain '..' or start with / or \\"
    })

/**
 * Relative asset reference inside a storage root (e.g. `favicons/example.com.ico`).
 */
export const AssetRefSchema = z
    .string()
    .trim()
    .min(1)
    .refine((value) => !value.split(/[\\/]/).includes('..') && !value.startsWith('/') && !value.startsWith('\\'), {
        message: 'Asset reference must stay inside the storage root'
    })

export const BookmarkRecordSchema = z.object({
    id: z.string().trim().min(1),
    url: z.string().trim().refine(isAbsoluteUrl, { message: 'URL must be absolute' }),
    title: z.string().trim().min(1, { message: 'Title cannot be empty or whitespace' }).max(MAX_TITLE_LENGTH),
    keywords: z.array(z.string()).max(MAX_KEYWORDS, { message: `Maximum ${MAX_KEYWORDS} keywords allowed` }).transform(cleanList),
    description: z.string().max(MAX_DESCRIPTION_LENGTH).optional(),
    tags: z.array(z.string()).transform(cleanList),
    folderPath: FolderPathSchema.optional(),
    createdAt: IsoTimestampSchema,
    lastModified: IsoTimestampSchema.optional(),
    lastAccessed: IsoTimestampSchema.optional(),
    deleted: z.boolean(),
    deletedAt: IsoTimestampSchema.optional(),
    faviconRef: AssetRefSchema.optional(),
    screenshotRef: AssetRefSchema.optional(),
    storageLocation: z.string().trim().min(1)
})

export type BookmarkRecord = z.infer<typeof BookmarkRecordSchema>

/**
 * On-disk document. Optional fields may be `null` (older files) or absent.
 */
export const BookmarkDocumentSchema = z.object({
    id: z.string(),
    url: z.string(),
    title: z.string(),
    keywords: z.array(z.string()).nullish(),
    description: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    folder_path: z.string().nullish(),
    created_at: z.string(),
    last_modified: z.string().nullish(),
    last_accessed: z.string().nullish(),
    deleted: z.boolean().nullish(),
    deleted_at: z.string().nullish(),
    favicon_path: z.string().nullish(),
    screenshot_path: z.string().nullish(),
    storage_location: z.string()
})

export type BookmarkDocument = z.infer<typeof BookmarkDocumentSchema>

export type BookmarkParseResult = { success: true; record: BookmarkRecord } | { success: false; reason: string; issues: string[] }

function formatIssues(error: z.ZodError<unknown>): string[] {
    return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

/**
 * Drop keys whose value is undefined so that records compare equal
 * regardless of how their optional fields were produced.
 */
export function compactRecord(record: BookmarkRecord): BookmarkRecord {
    const compacted: BookmarkRecord = {
        id: record.id,
        url: record.url,
        title: record.title,
        keywords: [...record.keywords],
        tags: [...record.tags],
        createdAt: record.createdAt,
        deleted: record.deleted,
        storageLocation: record.storageLocation
    }
    if (record.description !== undefined) compacted.description = record.description
    if (record.folderPath !== undefined) compacted.folderPath = record.folderPath
    if (record.lastModified !== undefined) compacted.lastModified = record.lastModified
    if (record.lastAccessed !== undefined) compacted.lastAccessed = record.lastAccessed
    if (record.deletedAt !== undefined) compacted.deletedAt = record.deletedAt
    if (record.faviconRef !== undefined) compacted.faviconRef = record.faviconRef
    if (record.screenshotRef !== undefined) compacted.screenshotRef = record.screenshotRef
    return compacted
}

/**
 * Validate an in-memory record (write path, index upsert).
 */
export function parseBookmarkRecord(data: unknown): BookmarkParseResult {
    const result = BookmarkRecordSchema.safeParse(data)
    if (!result.success) {
        const issues = formatIssues(result.error)
        return { success: false, reason: issues.join('; '), issues }
    }
    return { success: true, record: compactRecord(result.data) }
}

export function documentToRecordInput(doc: BookmarkDocument): Record<string, unknown> {
    return {
        id: doc.id,
        url: doc.url,
        title: doc.title,
        keywords: doc.keywords ?? [],
        description: doc.description ?? undefined,
        tags: doc.tags ?? [],
        folderPath: doc.folder_path ?? undefined,
        createdAt: doc.created_at,
        lastModified: doc.last_modified ?? undefined,
        lastAccessed: doc.last_accessed ?? undefined,
        deleted: doc.deleted ?? false,
        deletedAt: doc.deleted_at ?? undefined,
        faviconRef: doc.favicon_path ?? undefined,
        screenshotRef: doc.screenshot_path ?? undefined,
        storageLocation: doc.storage_location
    }
}

/**
 * Parse a deserialized on-disk document into a record.
 */
export function parseBookmarkDocument(data: unknown): BookmarkParseResult {
    if (data === null || data === undefined) {
        return { success: false, reason: 'Document is empty', issues: ['Document is empty'] }
    }
    const doc = BookmarkDocumentSchema.safeParse(data)
    if (!doc.success) {
        const issues = formatIssues(doc.error)
        return { success: false, reason: issues.join('; '), issues }
    }
    return parseBookmarkRecord(documentToRecordInput(doc.data))
}

/**
 * Map a record to its on-disk document, omitting absent optional fields.
 */
export function recordToDocument(record: BookmarkRecord): Partial<BookmarkDocument> & Pick<BookmarkDocument, 'id' | 'url' | 'title'> {
    const doc: Partial<BookmarkDocument> & Pick<BookmarkDocument, 'id' | 'url' | 'title'> = {
        id: record.id,
        url: record.url,
        title: record.title,
        keywords: [...record.keywords]
    }
    if (record.description !== undefined) doc.description = record.description
    doc.tags = [...record.tags]
    if (record.folderPath !== undefined) doc.folder_path = record.folderPath
    doc.created_at = record.createdAt
    if (record.lastModified !== undefined) doc.last_modified = record.lastModified
    if (record.lastAccessed !== undefined) doc.last_accessed = record.lastAccessed
    doc.deleted = record.deleted
    if (record.deletedAt !== undefined) doc.deleted_at = record.deletedAt
    if (record.faviconRef !== undefined) doc.favicon_path = record.faviconRef
    if (record.screenshotRef !== undefined) doc.screenshot_path = record.screenshotRef
    doc.storage_location = record.storageLocation
    return doc
}

/**
 * Write-time keyword policy: user keywords first, then derived ones,
 * case-insensitive de-duplication, capped at MAX_KEYWORDS.
 */
export function mergeKeywords(userKeywords: readonly string[], derivedKeywords: readonly string[] = []): string[] {
    const seen = new Set<string>()
    const merged: string[] = []
    for (const raw of [...userKeywords, ...derivedKeywords]) {
        const keyword = raw.trim()
        const key = keyword.toLowerCase()
        if (!keyword || seen.has(key)) continue
        seen.add(key)
        merged.push(keyword)
        if (merged.length === MAX_KEYWORDS) break
    }
    return merged
}

/**
 * Timestamp used for last-writer-wins conflict resolution.
 */
export function recordRevisionTime(record: BookmarkRecord): number {
    const stamp = Date.parse(record.lastModified ?? record.createdAt)
    return Number.isNaN(stamp) ? 0 : stamp
}
