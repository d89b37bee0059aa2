/**
 * Embedding Provider
 *
 * Capability boundary translating text to fixed-length vectors via an external service.
 * Providers make exactly one attempt per call (SDK retries disabled) and report failures as
 * EmbeddingUnavailableError with a bounded reason; timeouts are driven by the caller's AbortSignal.
 *
 * Configuration (see config/recallConfig.ts):
 * - AZURE_OPENAI_ENDPOINT (+ AZURE_OPENAI_EMBEDDING_DEPLOYMENT, AZURE_OPENAI_API_VERSION):
 *   Azure OpenAI with DefaultAzureCredential (Managed Identity in prod, az login locally)
 * - OPENAI_API_KEY (+ OPENAI_BASE_URL): OpenAI or any compatible endpoint
 * - neither: NullEmbeddingProvider, every call fails with reason 'not-configured'
 */
import { DefaultAzureCredential, getBearerTokenProvider } from '@azure/identity'
import { EmbeddingUnavailableError, type EmbeddingFailureReason } from '@bookmark-recall/shared'
import OpenAI, { AzureOpenAI } from 'openai'
import type { EmbeddingProviderSettings } from '../config/recallConfig.js'
import { isFiniteVector } from '../utils/vector.js'

export interface EmbedRequestOptions {
    signal: AbortSignal
}

export interface IEmbeddingProvider {
    /** Low-cardinality provider label for telemetry ('openai', 'azure-openai', 'null') */
    readonly name: string
    readonly modelId: string

    /**
     * Embed a batch of texts; the result is index-aligned with `texts`.
     * @throws EmbeddingUnavailableError on any failure (never partial results)
     */
    embed(texts: string[], options: EmbedRequestOptions): Promise<number[][]>
}

/**
 * The slice of the OpenAI SDK the provider calls; `OpenAI` and `AzureOpenAI` both satisfy it.
 */
export interface EmbeddingsClient {
    embeddings: {
        create(
            body: { model: string; input: string[] },
            options?: { signal?: AbortSignal }
        ): PromiseLike<{ data: Array<{ embedding: number[] | string; index: number }> }>
    }
}

export interface EmbeddingErrorDiagnostics {
    reason: EmbeddingFailureReason
    httpStatus?: number
    errorCode?: string
    errorName?: string
    // Not for dashboards (high cardinality); exception/debug only.
    errorMessage?: string
}

function stringField(source: unknown, key: string): string | undefined {
    if (typeof source !== 'object' || source === null) return undefined
    const value: unknown = Reflect.get(source, key)
    return typeof value === 'string' ? value : undefined
}

function numberField(source: unknown, key: string): number | undefined {
    if (typeof source !== 'object' || source === null) return undefined
    const value: unknown = Reflect.get(source, key)
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

/**
 * Map OpenAI/Azure SDK errors (or plain transport errors) to a bounded failure reason.
 * Checks shape rather than class so errors from either SDK flavour classify the same way.
 */
export function extractEmbeddingDiagnostics(error: unknown, aborted: boolean): EmbeddingErrorDiagnostics {
    const errorName = error instanceof Error ? error.name : stringField(error, 'name')
    const errorMessage = error instanceof Error ? error.message : stringField(error, 'message')
    const httpStatus = numberField(error, 'status')
    const errorCode = stringField(error, 'code')

    let reason: EmbeddingFailureReason
    if (aborted || errorName === 'AbortError' || errorName === 'APIUserAbortError' || errorName === 'APIConnectionTimeoutError') {
        reason = 'timeout'
    } else if (httpStatus === 401 || httpStatus === 403) {
        reason = 'auth'
    } else if (httpStatus === 429 || errorCode === 'insufficient_quota') {
        reason = 'quota'
    } else {
        reason = 'transport'
    }
    return { reason, httpStatus, errorCode, errorName, errorMessage }
}

/**
 * OpenAI-compatible embedding provider (OpenAI, Azure OpenAI, or a compatible base URL).
 */
export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
    constructor(
        private readonly client: EmbeddingsClient,
        readonly modelId: string,
        readonly name: string = 'openai'
    ) {}

    async embed(texts: string[], options: EmbedRequestOptions): Promise<number[][]> {
        if (texts.length === 0) return []

        let response: { data: Array<{ embedding: number[] | string; index: number }> }
        try {
            response = await this.client.embeddings.create({ model: this.modelId, input: texts }, { signal: options.signal })
        } catch (error) {
            const diag = extractEmbeddingDiagnostics(error, options.signal.aborted)
            throw new EmbeddingUnavailableError(
                `Embedding request to ${this.name} failed (${diag.reason}): ${diag.errorMessage ?? 'unknown error'}`,
                diag.reason,
                diag.httpStatus
            )
        }

        const vectors: number[][] = new Array<number[]>(texts.length)
        for (const item of response.data ?? []) {
            if (item.index >= 0 && item.index < texts.length && isFiniteVector(item.embedding)) {
                vectors[item.index] = item.embedding
            }
        }
        for (let i = 0; i < texts.length; i++) {
            if (!vectors[i]) {
                throw new EmbeddingUnavailableError(`Embedding response from ${this.name} is missing a vector for input ${i}`, 'invalid-response')
            }
        }
        const dimensions = vectors[0].length
        if (vectors.some((vector) => vector.length !== dimensions)) {
            throw new EmbeddingUnavailableError(`Embedding response from ${this.name} mixes vector dimensions`, 'invalid-response')
        }
        return vectors
    }
}

/**
 * No-op provider (used when no embedding credentials are configured).
 * Every call fails fast so recall degrades to lexical mode.
 */
export class NullEmbeddingProvider implements IEmbeddingProvider {
    readonly name = 'null'

    constructor(readonly modelId: string = 'none') {}

    async embed(): Promise<number[][]> {
        throw new EmbeddingUnavailableError('No embedding provider is configured', 'not-configured')
    }
}

/**
 * Build the provider for the configured credentials. Azure wins when both are present.
 */
export function createEmbeddingProvider(settings: EmbeddingProviderSettings, modelId: string): IEmbeddingProvider {
    if (settings.azureEndpoint) {
        // Automatically handles: System-assigned MI (prod), az login (local), OIDC (CI/CD)
        const credential = new DefaultAzureCredential()
        const azureADTokenProvider = getBearerTokenProvider(credential, 'https://cognitiveservices.azure.com/.default')
        const deployment = settings.azureDeployment ?? modelId
        const client = new AzureOpenAI({
            endpoint: settings.azureEndpoint,
            azureADTokenProvider,
            deployment,
            apiVersion: settings.azureApiVersion,
            maxRetries: 0
        })
        return new OpenAIEmbeddingProvider(client, deployment, 'azure-openai')
    }

    if (settings.openaiApiKey) {
        const client = new OpenAI({ apiKey: settings.openaiApiKey, baseURL: settings.openaiBaseUrl, maxRetries: 0 })
        return new OpenAIEmbeddingProvider(client, modelId, 'openai')
    }

    return new NullEmbeddingProvider(modelId)
}
