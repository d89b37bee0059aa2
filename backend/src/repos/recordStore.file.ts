import { STORAGE_SUBDIRECTORIES, StorageNotFoundError, type IClock, type StorageLocation } from '@bookmark-recall/shared'
import { inject, injectable } from 'inversify'
import { randomUUID } from 'node:crypto'
import { constants } from 'node:fs'
import { access, mkdir, readdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { RecallConfig } from '../config/recallConfig.js'
import { TOKENS } from '../di/tokens.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { BaseRecordStore } from './base/BaseRecordStore.js'
import { RECORD_FILE_EXTENSION } from './utils/recordSerializer.js'
import type { IScopedLock, ScopedLockOptions } from './utils/scopedLock.js'

const BOOKMARKS_DIR = 'bookmarks'

function errorCode(error: unknown): string | undefined {
    const code: unknown = error instanceof Error ? Reflect.get(error, 'code') : undefined
    return typeof code === 'string' ? code : undefined
}

/**
 * File-backed record store: `<storage root>/bookmarks/<id>.yaml`.
 * Commits write a uniquely named temp file in the same directory and rename it over the target,
 * so readers see either the old or the new content. Lock files sit beside the record file.
 */
@injectable()
export class FileRecordStore extends BaseRecordStore {
    private readonly locations: Map<string, StorageLocation>
    private readonly lockTimeoutMs: number

    constructor(
        @inject(TOKENS.RecallConfig) config: RecallConfig,
        @inject(TOKENS.ScopedLock) lock: IScopedLock,
        @inject(TelemetryService) telemetry: TelemetryService,
        @inject(TOKENS.Clock) clock: IClock
    ) {
        super(lock, telemetry, clock)
        this.locations = new Map(config.storageLocations.map((location) => [location.name, location]))
        this.lockTimeoutMs = config.lockTimeoutMs
    }

    listStorageNames(): string[] {
        return [...this.locations.keys()]
    }

    /** Absolute root of a configured storage */
    storageRoot(storageName: string): string {
        const location = this.locations.get(storageName)
        if (!location) {
            throw new StorageNotFoundError(`Storage not found: ${storageName}`, storageName)
        }
        return path.resolve(location.path)
    }

    async ensureStorage(name: string): Promise<void> {
        const root = this.storageRoot(name)

        let isDirectory: boolean
        try {
            isDirectory = (await stat(root)).isDirectory()
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                throw new StorageNotFoundError(`Storage path does not exist: ${root}`, name)
            }
            throw error
        }
        if (!isDirectory) {
            throw new StorageNotFoundError(`Storage path is not a directory: ${root}`, name)
        }
        try {
            await access(root, constants.W_OK)
        } catch {
            throw new StorageNotFoundError(`Cannot access storage: permission denied for ${root}`, name)
        }

        for (const sub of STORAGE_SUBDIRECTORIES) {
            await mkdir(path.join(root, sub), { recursive: true })
        }
        this.telemetry.trackRecallEvent('RecordStore.Storage.Prepared', { root }, { storageName: name })
    }

    protected async readFile(storageName: string, fileName: string): Promise<string | undefined> {
        try {
            return await readFile(this.recordPath(storageName, fileName), 'utf8')
        } catch (error) {
            if (errorCode(error) === 'ENOENT') return undefined
            throw error
        }
    }

    protected async commitFile(storageName: string, fileName: string, content: string): Promise<void> {
        const target = this.recordPath(storageName, fileName)
        const temp = `${target}.${randomUUID()}.tmp`
        await mkdir(path.dirname(target), { recursive: true })
        try {
            await writeFile(temp, content, { encoding: 'utf8', flag: 'wx' })
            await rename(temp, target)
        } catch (error) {
            await unlink(temp).catch((cleanupError: unknown) => {
                if (errorCode(cleanupError) !== 'ENOENT') {
                    this.telemetry.log('warn', `Failed to remove temp file ${temp}`, { storageName, error: String(cleanupError) })
                }
            })
            throw error
        }
    }

    protected async removeFile(storageName: string, fileName: string): Promise<boolean> {
        return this.unlinkIfPresent(this.recordPath(storageName, fileName))
    }

    protected async listFiles(storageName: string): Promise<string[]> {
        try {
            const entries = await readdir(path.join(this.storageRoot(storageName), BOOKMARKS_DIR), { withFileTypes: true })
            return entries.filter((entry) => entry.isFile() && entry.name.endsWith(RECORD_FILE_EXTENSION)).map((entry) => entry.name)
        } catch (error) {
            if (errorCode(error) === 'ENOENT') return []
            throw error
        }
    }

    protected async removeAsset(storageName: string, assetRef: string): Promise<boolean> {
        const root = this.storageRoot(storageName)
        const target = path.resolve(root, assetRef)
        if (!target.startsWith(root + path.sep)) return false
        return this.unlinkIfPresent(target)
    }

    protected lockOptions(storageName: string, fileName: string): ScopedLockOptions {
        return { timeoutMs: this.lockTimeoutMs, lockFile: `${this.recordPath(storageName, fileName)}.lock` }
    }

    private recordPath(storageName: string, fileName: string): string {
        return path.join(this.storageRoot(storageName), BOOKMARKS_DIR, fileName)
    }

    private async unlinkIfPresent(target: string): Promise<boolean> {
        try {
            await unlink(target)
            return true
        } catch (error) {
            if (errorCode(error) === 'ENOENT') return false
            throw error
        }
    }
}
