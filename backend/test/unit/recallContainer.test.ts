import 'reflect-metadata'
import { StorageNotFoundError } from '@bookmark-recall/shared'
import assert from 'node:assert/strict'
import { mkdir, readdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, test } from 'node:test'
import { defaultRecallConfig } from '../../src/config/recallConfig.js'
import { TOKENS } from '../../src/di/tokens.js'
import { createRecallContainer, setupContainer } from '../../src/inversify.config.js'
import { RecordIndex } from '../../src/indexing/recordIndex.js'
import { FileRecordStore } from '../../src/repos/recordStore.file.js'
import type { IRecordStore } from '../../src/repos/recordStore.js'
import { serializeRecord } from '../../src/repos/utils/recordSerializer.js'
import { NullEmbeddingProvider, type IEmbeddingProvider } from '../../src/services/embeddingProvider.js'
import { RecallEngine } from '../../src/services/recallEngine.js'
import type { ITelemetryClient } from '../../src/telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from '../../src/telemetry/NullTelemetryClient.js'
import { FakeEmbeddingProvider, makeRecord, makeTempDir, removeTempDir } from '../helpers/recallFixtures.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

describe('Recall container', () => {
    let dir: string

    beforeEach(async () => {
        dir = await makeTempDir()
    })

    afterEach(async () => {
        await removeTempDir(dir)
    })

    test('components resolve as singletons', () => {
        const container = createRecallContainer(defaultRecallConfig(), {
            storeMode: 'memory',
            telemetryClient: new MockTelemetryClient(),
            embeddingProvider: new FakeEmbeddingProvider()
        })

        assert.equal(container.get(RecallEngine), container.get(RecallEngine))
        assert.equal(container.get(RecallEngine).coordinator, container.get(RecallEngine).coordinator)
        assert.equal(container.get(RecordIndex), container.get(RecordIndex))
    })

    test('Config.Loaded describes the wiring and warnings are reported', () => {
        const telemetry = new MockTelemetryClient()
        createRecallContainer(defaultRecallConfig(), {
            storeMode: 'memory',
            telemetryClient: telemetry,
            embeddingProvider: new FakeEmbeddingProvider('fake-model'),
            warnings: ['RECALL_MAX_LIMIT=0 is below 1; clamped']
        })

        const [loaded] = telemetry.eventsNamed('Config.Loaded')
        assert.equal(loaded.properties?.provider, 'fake')
        assert.equal(loaded.properties?.modelId, 'fake-model')
        assert.equal(loaded.properties?.storeMode, 'memory')
        assert.equal(telemetry.eventsNamed('Config.ValidationWarning')[0].properties?.warning, 'RECALL_MAX_LIMIT=0 is below 1; clamped')
        assert.equal(telemetry.tracesAt('warn')[0].message, 'RECALL_MAX_LIMIT=0 is below 1; clamped')
    })

    test('semantic search disabled binds the null provider', () => {
        const config = defaultRecallConfig()
        config.semanticEnabled = false
        config.provider.openaiApiKey = 'test-secret'

        const container = createRecallContainer(config, { storeMode: 'memory', telemetryClient: new MockTelemetryClient() })

        assert.ok(container.get<IEmbeddingProvider>(TOKENS.EmbeddingProvider) instanceof NullEmbeddingProvider)
    })

    test('under NODE_ENV=test the null telemetry client is bound', () => {
        const previous = process.env.NODE_ENV
        process.env.NODE_ENV = 'test'
        try {
            const container = createRecallContainer(defaultRecallConfig(), { storeMode: 'memory', embeddingProvider: new FakeEmbeddingProvider() })
            assert.ok(container.get<ITelemetryClient>(TOKENS.TelemetryClient) instanceof NullTelemetryClient)
        } finally {
            if (previous === undefined) delete process.env.NODE_ENV
            else process.env.NODE_ENV = previous
        }
    })

    describe('engine start from a config file', () => {
        test('prepares each storage and indexes its records', async () => {
            const work = path.join(dir, 'work')
            const home = path.join(dir, 'home')
            const configFile = path.join(dir, 'recall.yaml')
            await writeFile(
                configFile,
                ['storage_locations:', '  - name: work', '    path: work', '    is_current: true', '  - name: home', '    path: home', ''].join('\n')
            )
            const telemetry = new MockTelemetryClient()
            const container = setupContainer(
                { RECALL_CONFIG_FILE: configFile, RECALL_DEFAULT_LIMIT: 'many' },
                { storeMode: 'file', telemetryClient: telemetry, embeddingProvider: new FakeEmbeddingProvider() }
            )
            assert.ok(container.get<IRecordStore>(TOKENS.RecordStore) instanceof FileRecordStore)

            // Roots must exist; the engine creates their subdirectories
            await mkdir(work)
            await mkdir(home)
            const engine = container.get(RecallEngine)
            assert.equal(engine.isStarted, false)
            const first = await engine.start()
            assert.deepEqual(first.storages.work, { total: 0, active: 0, deleted: 0, errors: 0, conflicts: 0 })

            await writeFile(path.join(work, 'bookmarks', 'a.yaml'), serializeRecord(makeRecord({ id: 'a', title: 'Added outside' })))
            const rebuilt = await engine.rebuildAll()

            assert.equal(engine.isStarted, true)
            assert.deepEqual(Object.keys(rebuilt), ['work', 'home'])
            assert.equal(rebuilt.work.total, 1)
            assert.deepEqual((await readdir(home)).sort(), ['bookmarks', 'favicons', 'screenshots'])
            assert.equal(engine.bookmarks.get('a').title, 'Added outside')
            assert.equal(telemetry.eventsNamed('Engine.Start.Completed')[0].properties?.storageCount, 2)
            assert.equal(telemetry.eventsNamed('Config.ValidationWarning')[0].properties?.warning, "RECALL_DEFAULT_LIMIT='many' is not a valid number; using 20")
        })

        test('a storage whose root is missing stops startup', async () => {
            const config = defaultRecallConfig()
            config.storageLocations = [{ name: 'work', path: path.join(dir, 'missing'), isCurrent: true, isDefault: false }]
            const container = createRecallContainer(config, {
                storeMode: 'file',
                telemetryClient: new MockTelemetryClient(),
                embeddingProvider: new FakeEmbeddingProvider()
            })
            const engine = container.get(RecallEngine)

            await assert.rejects(engine.start(), StorageNotFoundError)
            assert.equal(engine.isStarted, false)
        })
    })
})
