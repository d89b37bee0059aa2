import 'reflect-metadata'
import { CorruptRecordError, FakeClock, StorageNotFoundError } from '@bookmark-recall/shared'
import assert from 'node:assert/strict'
import { beforeEach, describe, test } from 'node:test'
import { defaultRecallConfig } from '../../src/config/recallConfig.js'
import { MemoryRecordStore } from '../../src/repos/recordStore.memory.js'
import type { RecordReadResult } from '../../src/repos/recordStore.js'
import { ScopedLock } from '../../src/repos/utils/scopedLock.js'
import { TelemetryService } from '../../src/telemetry/TelemetryService.js'
import { makeRecord } from '../helpers/recallFixtures.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

describe('Memory record store', () => {
    let store: MemoryRecordStore
    let telemetry: MockTelemetryClient

    beforeEach(() => {
        const config = defaultRecallConfig()
        config.storageLocations = [{ name: 'work', path: 'memory://work', isCurrent: true, isDefault: false }]
        telemetry = new MockTelemetryClient()
        store = new MemoryRecordStore(config, new ScopedLock(), new TelemetryService(telemetry), new FakeClock())
    })

    test('ensureStorage marks the storage prepared', async () => {
        assert.equal(store.isPrepared('work'), false)
        await store.ensureStorage('work')
        assert.equal(store.isPrepared('work'), true)
        assert.deepEqual(store.listStorageNames(), ['work'])
    })

    test('an unknown storage is rejected', async () => {
        await assert.rejects(store.ensureStorage('home'), StorageNotFoundError)
        assert.equal(store.hasStorage('home'), false)
    })

    test('writes are stored as YAML text', async () => {
        await store.write(makeRecord({ id: 'a', title: 'Stored' }))

        const raw = store.getRaw('work', 'a.yaml')
        assert.ok(raw?.startsWith('id: a\n'))
        assert.ok(raw?.includes('title: Stored\n'))
    })

    test('onCommitted runs with the validated record', async () => {
        const seen: string[] = []
        await store.write(makeRecord({ id: 'a' }), { onCommitted: (record) => seen.push(record.id) })
        assert.deepEqual(seen, ['a'])
    })

    test('scan ignores files that are not records', async () => {
        await store.write(makeRecord({ id: 'a' }))
        store.putRaw('work', 'README.md', '# notes')

        const results: RecordReadResult[] = []
        for await (const result of store.scan('work')) results.push(result)

        assert.deepEqual(
            results.map((result) => result.file),
            ['a.yaml']
        )
    })

    test('updating a corrupt record fails and leaves the file alone', async () => {
        store.putRaw('work', 'a.yaml', 'title: [unclosed\n')

        await assert.rejects(
            store.update('work', 'a', (current) => current),
            CorruptRecordError
        )
        assert.equal(store.getRaw('work', 'a.yaml'), 'title: [unclosed\n')
    })

    test('hard delete of a corrupt record still removes its file', async () => {
        store.putRaw('work', 'a.yaml', 'title: [unclosed\n')

        const outcome = await store.delete('work', 'a', { hard: true })

        assert.ok(outcome.mode === 'hard')
        assert.equal(outcome.record, undefined)
        assert.deepEqual(outcome.removedAssets, [])
        assert.equal(store.getRaw('work', 'a.yaml'), undefined)
    })

    test('hard delete removes assets that exist and reports only those', async () => {
        store.putAsset('work', 'favicons/a.ico')
        await store.write(makeRecord({ id: 'a', faviconRef: 'favicons/a.ico', screenshotRef: 'screenshots/a.png' }))

        const outcome = await store.delete('work', 'a', { hard: true })

        assert.ok(outcome.mode === 'hard')
        assert.deepEqual(outcome.removedAssets, ['favicons/a.ico'])
        assert.equal(store.hasAsset('work', 'favicons/a.ico'), false)
    })

    test('an unsafe id reads as missing', async () => {
        assert.equal(await store.read('work', '../escape'), undefined)
    })
})
