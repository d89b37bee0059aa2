import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import { StorageLocationSchema, selectCurrentStorageName } from '../src/storageLocation.js'

describe('StorageLocationSchema', () => {
    test('applies flag defaults', () => {
        const parsed = StorageLocationSchema.parse({ name: 'work', path: '/data/work' })
        assert.deepEqual(parsed, { name: 'work', path: '/data/work', isCurrent: false, isDefault: false })
    })

    test('rejects names with unsafe characters', () => {
        const result = StorageLocationSchema.safeParse({ name: 'my work', path: '/data/work' })
        assert.equal(result.success, false)
        if (result.success) return
        assert.equal(result.error.issues[0]?.message, 'Storage name must contain only letters, numbers, dashes, and underscores')
    })

    test('rejects the scope keywords as names', () => {
        for (const name of ['all', 'current']) {
            const result = StorageLocationSchema.safeParse({ name, path: '/data/x' })
            assert.equal(result.success, false)
            if (result.success) return
            assert.equal(result.error.issues[0]?.message, 'Storage name cannot be one of: all, current')
        }
        assert.equal(StorageLocationSchema.safeParse({ name: 'all-work', path: '/data/x' }).success, true)
    })
})

describe('selectCurrentStorageName', () => {
    test('prefers the storage flagged current', () => {
        const name = selectCurrentStorageName([
            { name: 'work', path: '/w', isCurrent: false, isDefault: true },
            { name: 'personal', path: '/p', isCurrent: true, isDefault: false }
        ])
        assert.equal(name, 'personal')
    })

    test('falls back to the first configured storage', () => {
        assert.equal(selectCurrentStorageName([{ name: 'work', path: '/w', isCurrent: false, isDefault: false }]), 'work')
    })

    test('returns undefined when nothing is configured', () => {
        assert.equal(selectCurrentStorageName([]), undefined)
    })
})
