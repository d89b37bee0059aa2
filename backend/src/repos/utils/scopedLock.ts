/**
 * Scoped per-record lock with a bounded wait and guaranteed release.
 *
 * Two layers, acquired in order:
 * 1. In-process keyed mutex (async-mutex), serializing callers sharing this process.
 * 2. Optional cross-process lock file (`<record>.yaml.lock`) created with an exclusive open,
 *    so other processes syncing the same directory are sequenced too. A lock file older than
 *    `staleLockMs` is treated as abandoned and removed.
 *
 * Both layers share one deadline; missing it throws LockTimeoutError.
 */
import { LockTimeoutError } from '@bookmark-recall/shared'
import { Mutex, withTimeout, type MutexInterface } from 'async-mutex'
import { open, stat, unlink } from 'node:fs/promises'
import { setTimeout as sleep } from 'node:timers/promises'
import { injectable } from 'inversify'

export interface ScopedLockOptions {
    timeoutMs: number
    /** Lock file path for the cross-process layer; omitted for in-memory stores */
    lockFile?: string
    /** Age after which an existing lock file is considered abandoned (default 2 × timeoutMs) */
    staleLockMs?: number
}

export interface IScopedLock {
    withLock<T>(key: string, options: ScopedLockOptions, fn: () => Promise<T>): Promise<T>
}

interface KeyedMutex {
    mutex: Mutex
    users: number
}

const LOCK_FILE_POLL_MS = 25

function errorCode(error: unknown): string | undefined {
    const code: unknown = error instanceof Error ? Reflect.get(error, 'code') : undefined
    return typeof code === 'string' ? code : undefined
}

@injectable()
export class ScopedLock implements IScopedLock {
    private readonly mutexes = new Map<string, KeyedMutex>()

    async withLock<T>(key: string, options: ScopedLockOptions, fn: () => Promise<T>): Promise<T> {
        const deadline = Date.now() + options.timeoutMs
        const entry = this.retain(key)
        const timeoutError = new LockTimeoutError(`Could not acquire lock on ${key} after ${options.timeoutMs}ms`, key, options.timeoutMs)
        const bounded: MutexInterface = withTimeout(entry.mutex, options.timeoutMs, timeoutError)

        try {
            return await bounded.runExclusive(async () => {
                if (!options.lockFile) return fn()
                await this.acquireLockFile(key, options.lockFile, deadline, options)
                try {
                    return await fn()
                } finally {
                    await this.releaseLockFile(options.lockFile)
                }
            })
        } finally {
            this.releaseKey(key, entry)
        }
    }

    /** Number of keys with a holder or waiter (for tests) */
    activeKeys(): number {
        return this.mutexes.size
    }

    private retain(key: string): KeyedMutex {
        let entry = this.mutexes.get(key)
        if (!entry) {
            entry = { mutex: new Mutex(), users: 0 }
            this.mutexes.set(key, entry)
        }
        entry.users += 1
        return entry
    }

    private releaseKey(key: string, entry: KeyedMutex): void {
        entry.users -= 1
        if (entry.users === 0 && this.mutexes.get(key) === entry) {
            this.mutexes.delete(key)
        }
    }

    private async acquireLockFile(key: string, lockFile: string, deadline: number, options: ScopedLockOptions): Promise<void> {
        const staleMs = options.staleLockMs ?? options.timeoutMs * 2
        for (;;) {
            try {
                const handle = await open(lockFile, 'wx')
                try {
                    await handle.writeFile(`${process.pid}\n`)
                } finally {
                    await handle.close()
                }
                return
            } catch (error) {
                if (errorCode(error) !== 'EEXIST') throw error
            }

            if (await this.removeIfStale(lockFile, staleMs)) continue

            if (Date.now() >= deadline) {
                throw new LockTimeoutError(`Could not acquire lock file ${lockFile} after ${options.timeoutMs}ms`, key, options.timeoutMs)
            }
            await sleep(LOCK_FILE_POLL_MS)
        }
    }

    private async removeIfStale(lockFile: string, staleMs: number): Promise<boolean> {
        try {
            const info = await stat(lockFile)
            if (Date.now() - info.mtimeMs <= staleMs) return false
            await unlink(lockFile)
            return true
        } catch (error) {
            // Released between our open and stat: retry immediately
            if (errorCode(error) === 'ENOENT') return true
            throw error
        }
    }

    private async releaseLockFile(lockFile: string): Promise<void> {
        try {
            await unlink(lockFile)
        } catch (error) {
            if (errorCode(error) !== 'ENOENT') throw error
        }
    }
}
