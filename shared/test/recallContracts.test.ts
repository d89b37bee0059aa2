import assert from 'node:assert/strict'
import { describe, test } from 'node:test'
import { normalizeScope } from '../src/recallContracts.js'

describe('normalizeScope', () => {
    test('defaults to all storages', () => {
        assert.deepEqual(normalizeScope(undefined), { storage: 'all' })
    })

    test('reads a string as a storage name', () => {
        assert.deepEqual(normalizeScope('work'), { storage: 'work' })
    })

    test('passes structured scopes through', () => {
        const scope = { storage: 'work', includeDeleted: true, folderPath: 'dev' }
        assert.deepEqual(normalizeScope(scope), scope)
    })
})
