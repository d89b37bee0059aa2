import 'reflect-metadata'
import { RecallConfigError } from '@bookmark-recall/shared'
import assert from 'node:assert/strict'
import { writeFile } from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, test } from 'node:test'
import { defaultRecallConfig, hasEmbeddingCredentials, loadRecallConfig } from '../../src/config/recallConfig.js'
import { makeTempDir, removeTempDir } from '../helpers/recallFixtures.js'

describe('Recall config', () => {
    let dir: string

    beforeEach(async () => {
        dir = await makeTempDir()
    })

    afterEach(async () => {
        await removeTempDir(dir)
    })

    async function configFile(content: string): Promise<string> {
        const file = path.join(dir, 'recall.yaml')
        await writeFile(file, content)
        return file
    }

    test('defaults apply with an empty environment', () => {
        const { config, warnings, configFile } = loadRecallConfig({})

        assert.deepEqual(config.weights, { semantic: 0.55, lexical: 0.45 })
        assert.equal(config.semanticEnabled, true)
        assert.equal(config.embedding.timeoutMs, 1200)
        assert.equal(config.defaultLimit, 20)
        assert.equal(config.maxLimit, 50)
        assert.deepEqual(config.storageLocations, [])
        assert.deepEqual(warnings, [])
        assert.equal(configFile, undefined)
    })

    test('the file overrides defaults and the environment overrides the file', async () => {
        const file = await configFile(
            [
                'storage_locations:',
                '  - name: work',
                '    path: ./work',
                '    is_current: true',
                'recall_semantic_weight: 0.7',
                'recall_keyword_weight: 0.3',
                'recall_default_limit: 10',
                ''
            ].join('\n')
        )

        const { config, warnings } = loadRecallConfig({ RECALL_CONFIG_FILE: file, RECALL_DEFAULT_LIMIT: '15' })

        assert.deepEqual(config.weights, { semantic: 0.7, lexical: 0.3 })
        assert.equal(config.defaultLimit, 15)
        assert.deepEqual(config.storageLocations, [{ name: 'work', path: path.join(dir, 'work'), isCurrent: true, isDefault: false }])
        assert.deepEqual(warnings, [])
    })

    test('an invalid number keeps the lower layer value and warns', async () => {
        const file = await configFile('recall_default_limit: 10\n')

        const { config, warnings } = loadRecallConfig({ RECALL_CONFIG_FILE: file, RECALL_DEFAULT_LIMIT: 'ten' })

        assert.equal(config.defaultLimit, 10)
        assert.deepEqual(warnings, ["RECALL_DEFAULT_LIMIT='ten' is not a valid number; using 10"])
    })

    test('out of range values are clamped with a warning', () => {
        const { config, warnings } = loadRecallConfig({ RECALL_EMBEDDING_TIMEOUT_MS: '20', RECALL_SEMANTIC_WEIGHT: '1.5' })

        assert.equal(config.embedding.timeoutMs, 100)
        assert.equal(config.weights.semantic, 1)
        assert.deepEqual(warnings, ['RECALL_EMBEDDING_TIMEOUT_MS=20 is below 100; clamped', 'RECALL_SEMANTIC_WEIGHT=1.5 is above 1; clamped'])
    })

    test('integer settings reject fractions', () => {
        const { config, warnings } = loadRecallConfig({ RECALL_MAX_LIMIT: '2.5' })
        assert.equal(config.maxLimit, 50)
        assert.deepEqual(warnings, ["RECALL_MAX_LIMIT='2.5' is not a valid number; using 50"])
    })

    test('booleans accept the usual spellings', () => {
        assert.equal(loadRecallConfig({ RECALL_SEMANTIC_ENABLED: 'off' }).config.semanticEnabled, false)
        assert.equal(loadRecallConfig({ RECALL_SEMANTIC_ENABLED: 'YES' }).config.semanticEnabled, true)

        const { config, warnings } = loadRecallConfig({ RECALL_SEMANTIC_ENABLED: 'maybe' })
        assert.equal(config.semanticEnabled, true)
        assert.deepEqual(warnings, ["RECALL_SEMANTIC_ENABLED='maybe' is not a boolean; using true"])
    })

    test('a default limit above the max limit is clamped', () => {
        const { config, warnings } = loadRecallConfig({ RECALL_DEFAULT_LIMIT: '80', RECALL_MAX_LIMIT: '30' })
        assert.equal(config.defaultLimit, 30)
        assert.deepEqual(warnings, ['default limit 80 exceeds max limit 30; clamped'])
    })

    test('two zero weights fall back to the defaults', () => {
        const { config, warnings } = loadRecallConfig({ RECALL_SEMANTIC_WEIGHT: '0', RECALL_LEXICAL_WEIGHT: '0' })
        assert.deepEqual(config.weights, { semantic: 0.55, lexical: 0.45 })
        assert.deepEqual(warnings, ['semantic and lexical weights are both zero; using defaults'])
    })

    test('provider settings are read from the environment', () => {
        const { config } = loadRecallConfig({
            OPENAI_API_KEY: 'test-secret',
            AZURE_OPENAI_ENDPOINT: '  ',
            APPLICATIONINSIGHTS_CONNECTION_STRING: 'InstrumentationKey=test'
        })

        assert.equal(config.provider.openaiApiKey, 'test-secret')
        assert.equal(config.provider.azureEndpoint, undefined)
        assert.equal(config.provider.azureApiVersion, '2024-10-21')
        assert.equal(config.appInsightsConnectionString, 'InstrumentationKey=test')
        assert.equal(hasEmbeddingCredentials(config.provider), true)
        assert.equal(hasEmbeddingCredentials(defaultRecallConfig().provider), false)
    })

    describe('config file errors', () => {
        test('malformed YAML', async () => {
            const file = await configFile('storage_locations: [unclosed\n')
            assert.throws(() => loadRecallConfig({ RECALL_CONFIG_FILE: file }), RecallConfigError)
        })

        test('a missing file', () => {
            assert.throws(() => loadRecallConfig({ RECALL_CONFIG_FILE: path.join(dir, 'absent.yaml') }), /Cannot read config file/)
        })

        test('a value of the wrong type', async () => {
            const file = await configFile('recall_default_limit: lots\n')
            assert.throws(() => loadRecallConfig({ RECALL_CONFIG_FILE: file }), /recall_default_limit/)
        })

        test('duplicate storage names', async () => {
            const file = await configFile(
                ['storage_locations:', '  - name: work', '    path: a', '  - name: work', '    path: b', ''].join('\n')
            )
            assert.throws(() => loadRecallConfig({ RECALL_CONFIG_FILE: file }), /Duplicate storage location 'work'/)
        })

        test('a storage name with unsafe characters', async () => {
            const file = await configFile(['storage_locations:', '  - name: my work', '    path: a', ''].join('\n'))
            assert.throws(() => loadRecallConfig({ RECALL_CONFIG_FILE: file }), /Invalid storage location 'my work'/)
        })

        test('a storage named after a scope keyword', async () => {
            const file = await configFile(['storage_locations:', '  - name: current', '    path: a', ''].join('\n'))
            assert.throws(() => loadRecallConfig({ RECALL_CONFIG_FILE: file }), /Invalid storage location 'current'.*Storage name cannot be one of: all, current/)
        })

        test('an empty file means defaults', async () => {
            const file = await configFile('')
            const { config } = loadRecallConfig({ RECALL_CONFIG_FILE: file })
            assert.equal(config.defaultLimit, 20)
        })
    })
})
