import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import {
    mergeKeywords,
    parseBookmarkDocument,
    parseBookmarkRecord,
    recordRevisionTime,
    recordToDocument,
    type BookmarkRecord
} from '../src/bookmarkRecord.js'

function baseRecord(overrides: Partial<BookmarkRecord> = {}): BookmarkRecord {
    return {
        id: 'bm-1',
        url: 'https://example.com/guide',
        title: 'Example Guide',
        keywords: ['example'],
        tags: ['docs'],
        createdAt: '2026-02-03T10:30:00Z',
        deleted: false,
        storageLocation: 'work',
        ...overrides
    }
}

describe('parseBookmarkRecord', () => {
    test('trims title and drops empty keywords and tags', () => {
        const result = parseBookmarkRecord(baseRecord({ title: '  Example  ', keywords: [' a ', '', 'b'], tags: ['  ', 'x'] }))
        assert.equal(result.success, true)
        if (!result.success) return
        assert.equal(result.record.title, 'Example')
        assert.deepEqual(result.record.keywords, ['a', 'b'])
        assert.deepEqual(result.record.tags, ['x'])
    })

    test('omits optional fields that were undefined', () => {
        const result = parseBookmarkRecord({ ...baseRecord(), description: undefined })
        assert.equal(result.success, true)
        if (!result.success) return
        assert.equal(Object.prototype.hasOwnProperty.call(result.record, 'description'), false)
        assert.deepEqual(result.record, baseRecord())
    })

    test('rejects more than four keywords', () => {
        const result = parseBookmarkRecord(baseRecord({ keywords: ['a', 'b', 'c', 'd', 'e'] }))
        assert.equal(result.success, false)
        if (result.success) return
        assert.deepEqual(result.issues, ['keywords: Maximum 4 keywords allowed'])
    })

    test('accepts exactly four keywords in priority order', () => {
        const result = parseBookmarkRecord(baseRecord({ keywords: ['d', 'c', 'b', 'a'] }))
        assert.equal(result.success, true)
        if (!result.success) return
        assert.deepEqual(result.record.keywords, ['d', 'c', 'b', 'a'])
    })

    test('rejects relative URLs', () => {
        const result = parseBookmarkRecord(baseRecord({ url: 'example.com/guide' }))
        assert.equal(result.success, false)
        if (result.success) return
        assert.deepEqual(result.issues, ['url: URL must be absolute'])
    })

    test('rejects folder paths that escape the storage', () => {
        const result = parseBookmarkRecord(baseRecord({ folderPath: '../secrets' }))
        assert.equal(result.success, false)
        if (result.success) return
        assert.deepEqual(result.issues, ["folderPath: Folder path cannot contain '..' or start with / or \\"])
    })

    test('rejects whitespace-only titles', () => {
        const result = parseBookmarkRecord(baseRecord({ title: '   ' }))
        assert.equal(result.success, false)
        if (result.success) return
        assert.deepEqual(result.issues, ['title: Title cannot be empty or whitespace'])
    })
})

describe('parseBookmarkDocument', () => {
    test('reads null optional fields as absent', () => {
        const result = parseBookmarkDocument({
            id: 'bm-2',
            url: 'https://example.com/',
            title: 'Home',
            keywords: null,
            description: null,
            tags: null,
            folder_path: null,
            created_at: '2026-02-03T10:30:00+00:00',
            deleted: null,
            deleted_at: null,
            storage_location: 'personal'
        })
        assert.equal(result.success, true)
        if (!result.success) return
        assert.deepEqual(result.record, {
            id: 'bm-2',
            url: 'https://example.com/',
            title: 'Home',
            keywords: [],
            tags: [],
            createdAt: '2026-02-03T10:30:00+00:00',
            deleted: false,
            storageLocation: 'personal'
        })
    })

    test('reports missing required fields', () => {
        const result = parseBookmarkDocument({
            id: 'bm-3',
            url: 'https://example.com/',
            created_at: '2026-02-03T10:30:00Z',
            storage_location: 'work'
        })
        assert.equal(result.success, false)
        if (result.success) return
        assert.deepEqual(result.issues, ['title: Required'])
    })

    test('reports empty documents', () => {
        const result = parseBookmarkDocument(null)
        assert.equal(result.success, false)
        if (result.success) return
        assert.equal(result.reason, 'Document is empty')
    })

    test('maps a record to snake_case and back without loss', () => {
        const record = baseRecord({
            description: 'Notes',
            folderPath: 'development/python',
            lastModified: '2026-02-04T08:00:00Z',
            deleted: true,
            deletedAt: '2026-02-05T08:00:00Z',
            faviconRef: 'favicons/example.com.ico',
            screenshotRef: 'screenshots/bm-1.png'
        })
        const doc = recordToDocument(record)
        assert.equal(doc.folder_path, 'development/python')
        assert.equal(doc.favicon_path, 'favicons/example.com.ico')
        assert.equal(Object.prototype.hasOwnProperty.call(doc, 'last_accessed'), false)

        const parsed = parseBookmarkDocument(doc)
        assert.equal(parsed.success, true)
        if (!parsed.success) return
        assert.deepEqual(parsed.record, record)
    })
})

describe('mergeKeywords', () => {
    test('user keywords precede derived ones and duplicates collapse', () => {
        assert.deepEqual(mergeKeywords(['Python', 'guide'], ['python', 'tips', 'style', 'extra']), ['Python', 'guide', 'tips', 'style'])
    })

    test('empty inputs yield no keywords', () => {
        assert.deepEqual(mergeKeywords([], ['  ']), [])
    })
})

describe('recordRevisionTime', () => {
    test('prefers lastModified over createdAt', () => {
        const record = baseRecord({ lastModified: '2026-03-01T00:00:00Z' })
        assert.equal(recordRevisionTime(record), Date.parse('2026-03-01T00:00:00Z'))
    })

    test('falls back to createdAt', () => {
        assert.equal(recordRevisionTime(baseRecord()), Date.parse('2026-02-03T10:30:00Z'))
    })
})
