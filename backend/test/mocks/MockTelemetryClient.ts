import type { Contracts } from 'applicationinsights'
import { injectable } from 'inversify'
import type { ITelemetryClient } from '../../src/telemetry/ITelemetryClient.js'

/**
 * Mock implementation of ITelemetryClient for unit tests.
 * Stores tracked telemetry for verification in tests.
 */
@injectable()
export class MockTelemetryClient implements ITelemetryClient {
    public events: Contracts.EventTelemetry[] = []
    public exceptions: Contracts.ExceptionTelemetry[] = []
    public metrics: Contracts.MetricTelemetry[] = []
    public traces: Contracts.TraceTelemetry[] = []
    public dependencies: Contracts.DependencyTelemetry[] = []

    trackEvent(telemetry: Contracts.EventTelemetry): void {
        this.events.push(telemetry)
    }

    trackException(telemetry: Contracts.ExceptionTelemetry): void {
        this.exceptions.push(telemetry)
    }

    trackMetric(telemetry: Contracts.MetricTelemetry): void {
        this.metrics.push(telemetry)
    }

    trackTrace(telemetry: Contracts.TraceTelemetry): void {
        this.traces.push(telemetry)
    }

    trackDependency(telemetry: Contracts.DependencyTelemetry): void {
        this.dependencies.push(telemetry)
    }

    flush(): void {
        // No-op in mock
    }

    // Test helpers
    clear(): void {
        this.events = []
        this.exceptions = []
        this.metrics = []
        this.traces = []
        this.dependencies = []
    }

    eventsNamed(name: string): Contracts.EventTelemetry[] {
        return this.events.filter((e) => e.name === name)
    }

    tracesAt(level: string): Contracts.TraceTelemetry[] {
        return this.traces.filter((t) => t.properties?.level === level)
    }
}
