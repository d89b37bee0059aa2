/**
 * Embedding Provider Adapter
 *
 * Wraps an IEmbeddingProvider with:
 * - a vector cache keyed by sha256(modelId + "\n" + text), so any edit to the embedded text misses
 * - in-flight de-duplication: concurrent requests for one key share one provider call
 * - one bounded attempt per call (AbortController + timer), timeout reported as EmbeddingUnavailable
 * - health signaling: after a failed query embedding (`embed`) the adapter reports unhealthy
 *   for `cooldownMs`; the next successful call restores health. Record batches (`embedMany`)
 *   never change health.
 * - a record batch rejected for its input is split in halves until the failing texts are isolated
 *
 * A failed call is never repeated as-is; degrading is the Recall Coordinator's decision.
 */
import { EmbeddingUnavailableError, type EmbeddingFailureReason, type IClock } from '@bookmark-recall/shared'
import { inject, injectable } from 'inversify'
import type { EmbeddingPolicy } from '../config/recallConfig.js'
import { TOKENS } from '../di/tokens.js'
import { computeContentHash } from '../repos/utils/contentHash.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import type { IEmbeddingProvider } from './embeddingProvider.js'

export interface EmbeddingCacheEntry {
    key: string
    modelId: string
    dimensions: number
    vector: number[]
    createdAt: string
}

export interface EmbeddingCacheStats {
    entries: number
    maxEntries: number
    hits: number
    misses: number
    inFlight: number
}

export interface EmbeddingHealth {
    healthy: boolean
    lastFailureReason?: EmbeddingFailureReason
    /** Epoch ms at which the cooldown ends */
    unhealthyUntil?: number
}

/** Settles with either the vector or the failure; never rejects */
type InFlight = Promise<number[] | EmbeddingUnavailableError>

/** Failures that one bad text in a batch can cause; the others would fail every sub-batch too */
const SPLITTABLE_REASONS: ReadonlySet<EmbeddingFailureReason> = new Set<EmbeddingFailureReason>(['transport', 'invalid-response'])

function asUnavailable(error: unknown): EmbeddingUnavailableError {
    return error instanceof EmbeddingUnavailableError
        ? error
        : new EmbeddingUnavailableError(`Embedding call failed: ${error instanceof Error ? error.message : String(error)}`, 'transport')
}

@injectable()
export class EmbeddingProviderAdapter {
    private readonly cache = new Map<string, EmbeddingCacheEntry>()
    private readonly inFlight = new Map<string, InFlight>()
    private hits = 0
    private misses = 0
    private unhealthyUntil = 0
    private lastFailureReason?: EmbeddingFailureReason

    constructor(
        @inject(TOKENS.EmbeddingProvider) private readonly provider: IEmbeddingProvider,
        @inject(TOKENS.EmbeddingPolicy) private readonly policy: EmbeddingPolicy,
        @inject(TelemetryService) private readonly telemetry: TelemetryService,
        @inject(TOKENS.Clock) private readonly clock: IClock
    ) {}

    get modelId(): string {
        return this.provider.modelId
    }

    get providerName(): string {
        return this.provider.name
    }

    isHealthy(): boolean {
        return this.clock.nowMs() >= this.unhealthyUntil
    }

    health(): EmbeddingHealth {
        if (this.isHealthy()) return { healthy: true, lastFailureReason: this.lastFailureReason }
        return { healthy: false, lastFailureReason: this.lastFailureReason, unhealthyUntil: this.unhealthyUntil }
    }

    /**
     * Vector for one text. A failure starts the cooldown.
     * @throws EmbeddingUnavailableError when the provider fails or the call times out
     */
    async embed(text: string): Promise<number[]> {
        const key = this.cacheKey(text)
        const cached = this.cache.get(key)
        if (cached) {
            this.hits += 1
            this.telemetry.trackRecallEvent('Embedding.Cache.Hit', { count: 1 })
            return cached.vector
        }

        this.misses += 1
        this.telemetry.trackRecallEvent('Embedding.Cache.Miss', { count: 1 })
        const outcome = await (this.inFlight.get(key) ?? this.startBatch([text])[0])
        if (outcome instanceof EmbeddingUnavailableError) {
            this.markUnhealthy(outcome)
            throw outcome
        }
        return outcome
    }

    /**
     * Vectors for many texts. Texts that could not be embedded are absent from the map; never throws.
     */
    async embedMany(texts: readonly string[]): Promise<Map<string, number[]>> {
        const vectors = new Map<string, number[]>()
        const waiting: Array<{ text: string; pending: InFlight }> = []
        const toFetch: string[] = []
        let hits = 0

        for (const text of new Set(texts)) {
            const key = this.cacheKey(text)
            const cached = this.cache.get(key)
            if (cached) {
                hits += 1
                vectors.set(text, cached.vector)
                continue
            }
            const pending = this.inFlight.get(key)
            if (pending) waiting.push({ text, pending })
            else toFetch.push(text)
        }

        this.hits += hits
        this.misses += waiting.length + toFetch.length
        if (hits > 0) this.telemetry.trackRecallEvent('Embedding.Cache.Hit', { count: hits })
        if (waiting.length + toFetch.length > 0) {
            this.telemetry.trackRecallEvent('Embedding.Cache.Miss', { count: waiting.length + toFetch.length })
        }

        for (let i = 0; i < toFetch.length; i += this.policy.batchSize) {
            const batch = toFetch.slice(i, i + this.policy.batchSize)
            const pendings = this.startBatch(batch)
            batch.forEach((text, index) => waiting.push({ text, pending: pendings[index] }))
        }

        const outcomes = await Promise.all(waiting.map(async ({ text, pending }) => ({ text, outcome: await pending })))
        for (const { text, outcome } of outcomes) {
            if (!(outcome instanceof EmbeddingUnavailableError)) vectors.set(text, outcome)
        }
        return vectors
    }

    cacheStats(): EmbeddingCacheStats {
        return {
            entries: this.cache.size,
            maxEntries: this.policy.cacheMaxEntries,
            hits: this.hits,
            misses: this.misses,
            inFlight: this.inFlight.size
        }
    }

    private cacheKey(text: string): string {
        return computeContentHash(this.provider.modelId, text)
    }

    /**
     * Resolves `texts` as one batch, registered as in-flight under each text's key until it settles.
     */
    private startBatch(texts: string[]): InFlight[] {
        const keys = texts.map((text) => this.cacheKey(text))
        const call = this.resolveBatch(texts, keys)

        return keys.map((key, index) => {
            const pending: InFlight = call.then((outcomes) => outcomes[index])
            this.inFlight.set(key, pending)
            void pending.then(() => {
                if (this.inFlight.get(key) === pending) this.inFlight.delete(key)
            })
            return pending
        })
    }

    /**
     * One outcome per text. A multi-text batch that fails with a splittable reason is retried
     * as two halves, down to single texts.
     */
    private async resolveBatch(texts: string[], keys: string[]): Promise<Array<number[] | EmbeddingUnavailableError>> {
        try {
            const vectors = await this.callProvider(texts)
            vectors.forEach((vector, index) => this.store(keys[index], vector))
            return vectors
        } catch (error) {
            const failure = asUnavailable(error)
            if (texts.length < 2 || !SPLITTABLE_REASONS.has(failure.reason)) {
                return texts.map(() => failure)
            }
            const middle = Math.ceil(texts.length / 2)
            const [head, tail] = await Promise.all([
                this.resolveBatch(texts.slice(0, middle), keys.slice(0, middle)),
                this.resolveBatch(texts.slice(middle), keys.slice(middle))
            ])
            return [...head, ...tail]
        }
    }

    private async callProvider(texts: string[]): Promise<number[][]> {
        const controller = new AbortController()
        let timer: NodeJS.Timeout | undefined
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort()
                reject(new EmbeddingUnavailableError(`Embedding call exceeded ${this.policy.timeoutMs}ms`, 'timeout'))
            }, this.policy.timeoutMs)
        })

        const started = this.clock.nowMs()
        try {
            const vectors = await Promise.race([this.provider.embed(texts, { signal: controller.signal }), timeout])
            if (vectors.length !== texts.length) {
                throw new EmbeddingUnavailableError(`Provider returned ${vectors.length} vectors for ${texts.length} texts`, 'invalid-response')
            }
            this.recordSuccess(texts.length, this.clock.nowMs() - started)
            return vectors
        } catch (error) {
            const failure = asUnavailable(error)
            this.recordFailure(failure, texts.length, this.clock.nowMs() - started)
            throw failure
        } finally {
            clearTimeout(timer)
        }
    }

    private store(key: string, vector: number[]): void {
        if (this.policy.cacheMaxEntries <= 0) return
        // Last write wins; re-inserting moves the key to the newest position
        this.cache.delete(key)
        this.cache.set(key, {
            key,
            modelId: this.provider.modelId,
            dimensions: vector.length,
            vector,
            createdAt: this.clock.nowIso()
        })
        while (this.cache.size > this.policy.cacheMaxEntries) {
            const oldest = this.cache.keys().next()
            if (oldest.done) break
            this.cache.delete(oldest.value)
        }
    }

    private recordSuccess(batchSize: number, durationMs: number): void {
        this.telemetry.trackDependency({
            target: `${this.provider.name}:${this.provider.modelId}`,
            name: 'embeddings.create',
            durationMs,
            success: true,
            resultCode: 200,
            properties: { batchSize }
        })
        this.telemetry.trackRecallEvent('Embedding.Call.Succeeded', { provider: this.provider.name, batchSize, durationMs })

        if (this.unhealthyUntil > 0) {
            this.unhealthyUntil = 0
            this.telemetry.trackRecallEvent('Embedding.Health.Restored', { provider: this.provider.name })
        }
    }

    private recordFailure(failure: EmbeddingUnavailableError, batchSize: number, durationMs: number): void {
        this.telemetry.trackDependency({
            target: `${this.provider.name}:${this.provider.modelId}`,
            name: 'embeddings.create',
            durationMs,
            success: false,
            resultCode: failure.httpStatus ?? failure.reason,
            properties: { batchSize, reason: failure.reason }
        })
        this.telemetry.trackRecallEvent('Embedding.Call.Failed', {
            provider: this.provider.name,
            reason: failure.reason,
            httpStatus: failure.httpStatus,
            batchSize
        })
    }

    private markUnhealthy(failure: EmbeddingUnavailableError): void {
        const wasHealthy = this.isHealthy()
        this.lastFailureReason = failure.reason
        this.unhealthyUntil = this.clock.nowMs() + this.policy.cooldownMs
        if (wasHealthy) {
            this.telemetry.trackRecallEvent('Embedding.Health.Degraded', {
                provider: this.provider.name,
                reason: failure.reason,
                cooldownMs: this.policy.cooldownMs
            })
        }
    }
}
