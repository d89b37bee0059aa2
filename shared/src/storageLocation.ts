import { z } from 'zod'
import { ALL_STORAGES, CURRENT_STORAGE } from './recallContracts.js'

/** Scope keywords; a storage with one of these names could never be addressed on its own */
export const RESERVED_STORAGE_NAMES: readonly string[] = [ALL_STORAGES, CURRENT_STORAGE]

/**
 * Named partition of the bookmark collection (e.g. "work", "personal").
 * Each storage root holds `bookmarks/`, `favicons/` and `screenshots/`.
 */
export const StorageLocationSchema = z.object({
    name: z
        .string()
        .min(1, { message: 'Storage name cannot be empty' })
        .regex(/^[A-Za-z0-9_-]+$/, { message: 'Storage name must contain only letters, numbers, dashes, and underscores' })
        .refine((name) => !RESERVED_STORAGE_NAMES.includes(name), { message: `Storage name cannot be one of: ${RESERVED_STORAGE_NAMES.join(', ')}` }),
    path: z.string().min(1, { message: 'Storage path cannot be empty' }),
    isCurrent: z.boolean().default(false),
    isDefault: z.boolean().default(false)
})

export type StorageLocation = z.infer<typeof StorageLocationSchema>

export const STORAGE_SUBDIRECTORIES = ['bookmarks', 'favicons', 'screenshots'] as const
export type StorageSubdirectory = (typeof STORAGE_SUBDIRECTORIES)[number]

/**
 * Pick the current storage: the one flagged current, otherwise the first configured.
 */
export function selectCurrentStorageName(locations: readonly StorageLocation[]): string | undefined {
    const flagged = locations.find((location) => location.isCurrent)
    return flagged?.name ?? locations[0]?.name
}
