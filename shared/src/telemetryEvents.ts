// Canonical recall telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: All event names must be referenced from this registry.
// To verify no inline usage outside registry:
// grep -rn "trackRecallEvent('" --include="*.ts" --exclude-dir=node_modules backend/src
// (every argument should be a name declared below)

export const RECALL_EVENT_NAMES = [
    // Recall queries
    'Recall.Query.Executed',
    'Recall.Query.Fallback',
    'Recall.Query.Rejected',
    // Record store
    'RecordStore.Record.Written',
    'RecordStore.Record.Corrupt',
    'RecordStore.Record.Deleted',
    'RecordStore.Lock.Timeout',
    'RecordStore.Storage.Prepared',
    // Index maintenance
    'Index.Rebuild.Completed',
    'Index.Rebuild.Conflict',
    'Index.Record.Dropped',
    // Embedding provider adapter
    'Embedding.Cache.Hit',
    'Embedding.Cache.Miss',
    'Embedding.Call.Succeeded',
    'Embedding.Call.Failed',
    'Embedding.Health.Degraded',
    'Embedding.Health.Restored',
    // Bookmark lifecycle
    'Bookmark.Created',
    'Bookmark.Updated',
    'Bookmark.SoftDeleted',
    'Bookmark.Restored',
    'Bookmark.HardDeleted',
    'Bookmark.Accessed',
    // Engine lifecycle / configuration
    'Engine.Start.Completed',
    'Config.Loaded',
    'Config.ValidationWarning',
    // Internal / fallback diagnostics
    'Telemetry.EventName.Invalid',
    // Timing telemetry
    'Timing.Op'
] as const

// Future deprecations or renames should follow the pattern:
// - Add comment with date and reason: "Deprecated (YYYY-MM-DD): OldName → NewName. Reason."
// - Keep old event in array until retention window expires

export type RecallEventName = (typeof RECALL_EVENT_NAMES)[number]

export function isRecallEventName(name: string): name is RecallEventName {
    return (RECALL_EVENT_NAMES as readonly string[]).includes(name)
}

// Regex enforced for every registered name (duplicated in tests)
export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
