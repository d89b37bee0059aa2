// Central service naming constants so telemetry from every caller of the engine stays comparable.
// Extend this list as new logical services are introduced.

export const SERVICE_RECALL_ENGINE = 'recall-engine'
export const SERVICE_WEB_UI = 'web-ui'
export const SERVICE_CLI = 'cli'
export const SERVICE_EXTENSION = 'browser-extension' // reserved for ingestion calls from the extension

// Derive a runtime display label (can be localized later)
export function serviceLabel(name: string): string {
    switch (name) {
        case SERVICE_RECALL_ENGINE:
            return 'Recall Engine'
        case SERVICE_WEB_UI:
            return 'Web UI'
        case SERVICE_CLI:
            return 'Command Line'
        case SERVICE_EXTENSION:
            return 'Browser Extension'
        default:
            return name
    }
}
