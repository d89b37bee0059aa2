/**
 * Recall Engine configuration.
 *
 * Read once at startup. Precedence (lowest to highest):
 * 1. Built-in defaults
 * 2. YAML file named by RECALL_CONFIG_FILE (snake_case keys, storage locations live here)
 * 3. Environment variables:
 *    - RECALL_SEMANTIC_ENABLED: 'true' | 'false' (default true)
 *    - RECALL_EMBEDDING_MODEL: embedding model id (default text-embedding-3-small)
 *    - RECALL_EMBEDDING_TIMEOUT_MS: bound per provider call (default 1200, 100..10000)
 *    - RECALL_EMBEDDING_COOLDOWN_MS: unhealthy window after a provider failure (default 30000)
 *    - RECALL_EMBEDDING_BATCH_SIZE: texts per provider call (default 64)
 *    - RECALL_EMBEDDING_CACHE_MAX_ENTRIES: embedding cache bound (default 5000)
 *    - RECALL_SEMANTIC_WEIGHT / RECALL_LEXICAL_WEIGHT: blend weights (default 0.55 / 0.45)
 *    - RECALL_DEFAULT_LIMIT / RECALL_MAX_LIMIT: result limits (default 20 / 50)
 *    - RECALL_LOCK_TIMEOUT_MS: per-record lock wait (default 5000)
 *    - OPENAI_API_KEY, OPENAI_BASE_URL
 *    - AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_EMBEDDING_DEPLOYMENT, AZURE_OPENAI_API_VERSION
 *    - APPLICATIONINSIGHTS_CONNECTION_STRING
 *
 * Invalid numeric env values fall back to the current value; out-of-range values are clamped.
 * Both cases are reported as warnings. A malformed config file throws RecallConfigError.
 */
import { RecallConfigError, StorageLocationSchema, type StorageLocation } from '@bookmark-recall/shared'
import { readFileSync } from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'

export interface EmbeddingPolicy {
    modelId: string
    timeoutMs: number
    cooldownMs: number
    batchSize: number
    cacheMaxEntries: number
}

export interface RecallWeights {
    semantic: number
    lexical: number
}

export interface EmbeddingProviderSettings {
    openaiApiKey?: string
    openaiBaseUrl?: string
    azureEndpoint?: string
    azureDeployment?: string
    azureApiVersion: string
}

export interface RecallConfig {
    storageLocations: StorageLocation[]
    semanticEnabled: boolean
    embedding: EmbeddingPolicy
    weights: RecallWeights
    defaultLimit: number
    maxLimit: number
    lockTimeoutMs: number
    provider: EmbeddingProviderSettings
    appInsightsConnectionString?: string
}

export interface RecallConfigLoadResult {
    config: RecallConfig
    warnings: string[]
    configFile?: string
}

export const DEFAULT_WEIGHTS: Readonly<RecallWeights> = { semantic: 0.55, lexical: 0.45 }

export const EMBEDDING_TIMEOUT_RANGE = { min: 100, max: 10_000 } as const

export function defaultRecallConfig(): RecallConfig {
    return {
        storageLocations: [],
        semanticEnabled: true,
        embedding: {
            modelId: 'text-embedding-3-small',
            timeoutMs: 1200,
            cooldownMs: 30_000,
            batchSize: 64,
            cacheMaxEntries: 5000
        },
        weights: { ...DEFAULT_WEIGHTS },
        defaultLimit: 20,
        maxLimit: 50,
        lockTimeoutMs: 5000,
        provider: { azureApiVersion: '2024-10-21' }
    }
}

const ConfigFileStorageSchema = z.object({
    name: z.string(),
    path: z.string(),
    is_current: z.boolean().optional(),
    is_default: z.boolean().optional()
})

const ConfigFileSchema = z.object({
    storage_locations: z.array(ConfigFileStorageSchema).optional(),
    enable_semantic_search: z.boolean().optional(),
    embedding_model: z.string().trim().min(1).optional(),
    embedding_cooldown_ms: z.number().int().min(0).optional(),
    embedding_batch_size: z.number().int().min(1).max(2048).optional(),
    embedding_cache_max_entries: z.number().int().min(0).optional(),
    recall_default_limit: z.number().int().min(1).max(100).optional(),
    recall_max_limit: z.number().int().min(1).max(200).optional(),
    recall_semantic_weight: z.number().min(0).max(1).optional(),
    recall_keyword_weight: z.number().min(0).max(1).optional(),
    recall_query_timeout_ms: z.number().int().min(EMBEDDING_TIMEOUT_RANGE.min).max(EMBEDDING_TIMEOUT_RANGE.max).optional(),
    lock_timeout_ms: z.number().int().min(1).optional()
})

export type RecallConfigFile = z.infer<typeof ConfigFileSchema>

type Env = Record<string, string | undefined>

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim()
    return trimmed ? trimmed : undefined
}

interface NumberRange {
    min: number
    max?: number
    integer?: boolean
}

function parseNumberEnv(env: Env, key: string, range: NumberRange, current: number, warnings: string[]): number {
    const raw = nonEmpty(env[key])
    if (raw === undefined) return current
    const parsed = range.integer ? Number.parseInt(raw, 10) : Number.parseFloat(raw)
    if (!Number.isFinite(parsed) || (range.integer && !/^-?\d+$/.test(raw))) {
        warnings.push(`${key}='${raw}' is not a valid number; using ${current}`)
        return current
    }
    if (parsed < range.min) {
        warnings.push(`${key}=${parsed} is below ${range.min}; clamped`)
        return range.min
    }
    if (range.max !== undefined && parsed > range.max) {
        warnings.push(`${key}=${parsed} is above ${range.max}; clamped`)
        return range.max
    }
    return parsed
}

function parseBooleanEnv(env: Env, key: string, current: boolean, warnings: string[]): boolean {
    const raw = nonEmpty(env[key])?.toLowerCase()
    if (raw === undefined) return current
    if (['1', 'true', 'yes', 'on'].includes(raw)) return true
    if (['0', 'false', 'no', 'off'].includes(raw)) return false
    warnings.push(`${key}='${raw}' is not a boolean; using ${current}`)
    return current
}

function formatZodIssues(error: z.ZodError<unknown>): string {
    return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ')
}

/**
 * Read and validate a YAML config file. Relative storage paths resolve against the file's directory.
 */
export function readRecallConfigFile(filePath: string): { file: RecallConfigFile; storageLocations: StorageLocation[] } {
    let raw: string
    try {
        raw = readFileSync(filePath, 'utf8')
    } catch (error) {
        throw new RecallConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
    }

    let data: unknown
    try {
        data = parseYaml(raw)
    } catch (error) {
        throw new RecallConfigError(`Config file ${filePath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`)
    }

    // An empty file means "all defaults"
    const parsed = ConfigFileSchema.safeParse(data ?? {})
    if (!parsed.success) {
        throw new RecallConfigError(`Invalid config file ${filePath}: ${formatZodIssues(parsed.error)}`)
    }

    const baseDir = path.dirname(path.resolve(filePath))
    const storageLocations: StorageLocation[] = []
    for (const entry of parsed.data.storage_locations ?? []) {
        const location = StorageLocationSchema.safeParse({
            name: entry.name,
            path: path.resolve(baseDir, entry.path),
            isCurrent: entry.is_current,
            isDefault: entry.is_default
        })
        if (!location.success) {
            throw new RecallConfigError(`Invalid storage location '${entry.name}' in ${filePath}: ${formatZodIssues(location.error)}`)
        }
        if (storageLocations.some((existing) => existing.name === location.data.name)) {
            throw new RecallConfigError(`Duplicate storage location '${entry.name}' in ${filePath}`)
        }
        storageLocations.push(location.data)
    }

    return { file: parsed.data, storageLocations }
}

function applyConfigFile(config: RecallConfig, file: RecallConfigFile, storageLocations: StorageLocation[]): void {
    config.storageLocations = storageLocations
    if (file.enable_semantic_search !== undefined) config.semanticEnabled = file.enable_semantic_search
    if (file.embedding_model !== undefined) config.embedding.modelId = file.embedding_model
    if (file.recall_query_timeout_ms !== undefined) config.embedding.timeoutMs = file.recall_query_timeout_ms
    if (file.embedding_cooldown_ms !== undefined) config.embedding.cooldownMs = file.embedding_cooldown_ms
    if (file.embedding_batch_size !== undefined) config.embedding.batchSize = file.embedding_batch_size
    if (file.embedding_cache_max_entries !== undefined) config.embedding.cacheMaxEntries = file.embedding_cache_max_entries
    if (file.recall_semantic_weight !== undefined) config.weights.semantic = file.recall_semantic_weight
    if (file.recall_keyword_weight !== undefined) config.weights.lexical = file.recall_keyword_weight
    if (file.recall_default_limit !== undefined) config.defaultLimit = file.recall_default_limit
    if (file.recall_max_limit !== undefined) config.maxLimit = file.recall_max_limit
    if (file.lock_timeout_ms !== undefined) config.lockTimeoutMs = file.lock_timeout_ms
}

function applyEnv(config: RecallConfig, env: Env, warnings: string[]): void {
    config.semanticEnabled = parseBooleanEnv(env, 'RECALL_SEMANTIC_ENABLED', config.semanticEnabled, warnings)
    config.embedding.modelId = nonEmpty(env.RECALL_EMBEDDING_MODEL) ?? config.embedding.modelId
    config.embedding.timeoutMs = parseNumberEnv(
        env,
        'RECALL_EMBEDDING_TIMEOUT_MS',
        { ...EMBEDDING_TIMEOUT_RANGE, integer: true },
        config.embedding.timeoutMs,
        warnings
    )
    config.embedding.cooldownMs = parseNumberEnv(env, 'RECALL_EMBEDDING_COOLDOWN_MS', { min: 0, integer: true }, config.embedding.cooldownMs, warnings)
    config.embedding.batchSize = parseNumberEnv(env, 'RECALL_EMBEDDING_BATCH_SIZE', { min: 1, max: 2048, integer: true }, config.embedding.batchSize, warnings)
    config.embedding.cacheMaxEntries = parseNumberEnv(
        env,
        'RECALL_EMBEDDING_CACHE_MAX_ENTRIES',
        { min: 0, integer: true },
        config.embedding.cacheMaxEntries,
        warnings
    )
    config.weights.semantic = parseNumberEnv(env, 'RECALL_SEMANTIC_WEIGHT', { min: 0, max: 1 }, config.weights.semantic, warnings)
    config.weights.lexical = parseNumberEnv(env, 'RECALL_LEXICAL_WEIGHT', { min: 0, max: 1 }, config.weights.lexical, warnings)
    config.defaultLimit = parseNumberEnv(env, 'RECALL_DEFAULT_LIMIT', { min: 1, integer: true }, config.defaultLimit, warnings)
    config.maxLimit = parseNumberEnv(env, 'RECALL_MAX_LIMIT', { min: 1, integer: true }, config.maxLimit, warnings)
    config.lockTimeoutMs = parseNumberEnv(env, 'RECALL_LOCK_TIMEOUT_MS', { min: 1, integer: true }, config.lockTimeoutMs, warnings)

    config.provider = {
        openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
        openaiBaseUrl: nonEmpty(env.OPENAI_BASE_URL),
        azureEndpoint: nonEmpty(env.AZURE_OPENAI_ENDPOINT),
        azureDeployment: nonEmpty(env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT),
        azureApiVersion: nonEmpty(env.AZURE_OPENAI_API_VERSION) ?? config.provider.azureApiVersion
    }
    config.appInsightsConnectionString = nonEmpty(env.APPLICATIONINSIGHTS_CONNECTION_STRING)
}

/**
 * Cross-field rules that hold whichever source set the values.
 */
function reconcile(config: RecallConfig, warnings: string[]): void {
    if (config.defaultLimit > config.maxLimit) {
        warnings.push(`default limit ${config.defaultLimit} exceeds max limit ${config.maxLimit}; clamped`)
        config.defaultLimit = config.maxLimit
    }
    if (config.weights.semantic <= 0 && config.weights.lexical <= 0) {
        warnings.push('semantic and lexical weights are both zero; using defaults')
        config.weights = { ...DEFAULT_WEIGHTS }
    }
}

export function loadRecallConfig(env: Env = process.env): RecallConfigLoadResult {
    const config = defaultRecallConfig()
    const warnings: string[] = []

    const configFile = nonEmpty(env.RECALL_CONFIG_FILE)
    if (configFile) {
        const { file, storageLocations } = readRecallConfigFile(configFile)
        applyConfigFile(config, file, storageLocations)
    }

    applyEnv(config, env, warnings)
    reconcile(config, warnings)

    return { config, warnings, configFile }
}

/**
 * True when some embedding provider can be constructed from the settings.
 */
export function hasEmbeddingCredentials(settings: EmbeddingProviderSettings): boolean {
    return Boolean(settings.azureEndpoint || settings.openaiApiKey)
}
