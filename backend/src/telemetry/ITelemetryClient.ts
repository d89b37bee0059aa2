import type { Contracts } from 'applicationinsights'

/**
 * Telemetry client interface for dependency injection.
 * Matches the subset of the Application Insights TelemetryClient the engine uses,
 * so `appInsights.defaultClient` can be bound directly.
 */
export interface ITelemetryClient {
    trackEvent(telemetry: Contracts.EventTelemetry): void

    trackException(telemetry: Contracts.ExceptionTelemetry): void

    trackMetric(telemetry: Contracts.MetricTelemetry): void

    /** Log lines (index drops, corrupt files, fallbacks) go out as traces */
    trackTrace(telemetry: Contracts.TraceTelemetry): void

    /** Embedding provider calls are tracked as dependencies */
    trackDependency(telemetry: Contracts.DependencyTelemetry): void

    flush(options?: { callback?: (response: string) => void; isAppCrashing?: boolean }): void
}
