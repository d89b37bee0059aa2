import { injectable } from 'inversify'
import type { ITelemetryClient } from './ITelemetryClient.js'

/**
 * Discards everything. Bound under NODE_ENV=test so engine code never needs a telemetry guard.
 */
@injectable()
export class NullTelemetryClient implements ITelemetryClient {
    readonly discarded = { events: 0, traces: 0 }

    trackEvent(): void {
        this.discarded.events++
    }

    trackException(): void {}

    trackMetric(): void {}

    trackTrace(): void {
        this.discarded.traces++
    }

    trackDependency(): void {}

    flush(options?: { callback?: (response: string) => void }): void {
        options?.callback?.('')
    }
}
