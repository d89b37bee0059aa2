/**
 * Telemetry Service - Central service for emitting recall engine telemetry
 *
 * Provides enriched telemetry methods that wrap ITelemetryClient.
 * Engine components inject this service rather than the raw client.
 */
import { isRecallEventName, SERVICE_RECALL_ENGINE, type RecallEventName } from '@bookmark-recall/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { TOKENS } from '../di/tokens.js'
import type { ITelemetryClient } from './ITelemetryClient.js'

export interface RecallTelemetryOptions {
    serviceOverride?: string
    correlationId?: string | null
    storageName?: string | null
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface DependencyCall {
    /** Logical target, e.g. `openai:text-embedding-3-small` */
    target: string
    name: string
    durationMs: number
    success: boolean
    resultCode: string | number
    properties?: Record<string, unknown>
}

@injectable()
export class TelemetryService {
    constructor(@inject(TOKENS.TelemetryClient) private client: ITelemetryClient) {}

    /**
     * Track a recall event with automatic enrichment (service, correlationId, storage).
     * Unregistered names are reported as Telemetry.EventName.Invalid instead of being emitted.
     */
    trackRecallEvent(name: RecallEventName, properties?: Record<string, unknown>, opts?: RecallTelemetryOptions): void {
        if (!isRecallEventName(name)) {
            this.emit('Telemetry.EventName.Invalid', { requested: name }, opts)
            return
        }
        this.emit(name, properties, opts)
    }

    trackException(error: Error, properties?: Record<string, unknown>): void {
        const finalProps: Record<string, unknown> = { service: this.inferService(), ...properties }
        if (typeof Reflect.get(error, 'code') === 'string') {
            finalProps.errorCode = Reflect.get(error, 'code')
        }
        this.client.trackException({ exception: error, properties: finalProps })
    }

    trackDependency(call: DependencyCall): void {
        this.client.trackDependency({
            target: call.target,
            name: call.name,
            data: call.name,
            duration: call.durationMs,
            resultCode: call.resultCode,
            success: call.success,
            dependencyTypeName: 'HTTP',
            properties: { service: this.inferService(), ...call.properties }
        })
    }

    trackMetric(name: string, value: number, properties?: Record<string, unknown>): void {
        this.client.trackMetric({ name, value, properties: { service: this.inferService(), ...properties } })
    }

    /**
     * Structured log line, sent as a trace. The level travels as a property so sinks can filter.
     */
    log(level: LogLevel, message: string, properties?: Record<string, unknown>): void {
        this.client.trackTrace({ message, properties: { level, service: this.inferService(), ...properties } })
    }

    /**
     * Run `fn` and emit a Timing.Op event with its duration and outcome. Errors are rethrown.
     */
    async withTiming<T>(op: string, fn: () => Promise<T>, properties?: Record<string, unknown>): Promise<T> {
        const started = performance.now()
        let success = false
        try {
            const result = await fn()
            success = true
            return result
        } finally {
            this.emit('Timing.Op', { op, ms: Math.round(performance.now() - started), success, ...properties }, undefined)
        }
    }

    private emit(name: RecallEventName, properties: Record<string, unknown> | undefined, opts: RecallTelemetryOptions | undefined): void {
        const finalProps: Record<string, unknown> = { ...properties }

        if (finalProps.service === undefined) {
            finalProps.service = opts?.serviceOverride || this.inferService()
        }

        if (opts?.storageName && finalProps.storageName === undefined) {
            finalProps.storageName = opts.storageName
        }

        // Always attach correlationId; generate if not supplied
        if (finalProps.correlationId === undefined) {
            finalProps.correlationId = opts?.correlationId || randomUUID()
        }

        this.client.trackEvent({ name, properties: finalProps })
    }

    private inferService(): string {
        return process.env.RECALL_SERVICE_NAME || SERVICE_RECALL_ENGINE
    }
}
