// Root barrel – intentionally concise. Grouped re-exports delegate to per-module files to keep exports close to implementation.

export * from './bookmarkRecord.js'
export * from './clock.js'
export * from './exceptions/index.js'
export * from './recallContracts.js'
export * from './storageLocation.js'
export * from './telemetryEvents.js'
export * from './serviceConstants.js'
