import type { Contracts } from 'applicationinsights'
import { injectable } from 'inversify'
import type { ITelemetryClient } from './ITelemetryClient.js'

/**
 * Local development sink: writes traces, exceptions and failed dependencies to the console.
 * Events and metrics are only echoed when RECALL_TELEMETRY_VERBOSE is set.
 */
@injectable()
export class ConsoleTelemetryClient implements ITelemetryClient {
    private readonly verbose = ['1', 'true'].includes((process.env.RECALL_TELEMETRY_VERBOSE || '').toLowerCase())

    trackEvent(telemetry: Contracts.EventTelemetry): void {
        if (this.verbose) console.log(`[event] ${telemetry.name}`, telemetry.properties ?? {})
    }

    trackException(telemetry: Contracts.ExceptionTelemetry): void {
        console.error(`[exception] ${telemetry.exception.name}: ${telemetry.exception.message}`, telemetry.properties ?? {})
    }

    trackMetric(telemetry: Contracts.MetricTelemetry): void {
        if (this.verbose) console.log(`[metric] ${telemetry.name}=${telemetry.value}`)
    }

    trackTrace(telemetry: Contracts.TraceTelemetry): void {
        const level = telemetry.properties?.level
        const line = `[${typeof level === 'string' ? level : 'info'}] ${telemetry.message}`
        if (level === 'error') console.error(line, telemetry.properties ?? {})
        else if (level === 'warn') console.warn(line, telemetry.properties ?? {})
        else console.log(line, telemetry.properties ?? {})
    }

    trackDependency(telemetry: Contracts.DependencyTelemetry): void {
        if (!telemetry.success || this.verbose) {
            console.log(`[dependency] ${telemetry.name} ${telemetry.resultCode} ${telemetry.duration}ms`)
        }
    }

    flush(): void {
        // console output is unbuffered
    }
}
