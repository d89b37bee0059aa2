import 'reflect-metadata'
import { LockTimeoutError } from '@bookmark-recall/shared'
import assert from 'node:assert/strict'
import { existsSync } from 'node:fs'
import { utimes, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, test } from 'node:test'
import { ScopedLock } from '../../src/repos/utils/scopedLock.js'
import { makeTempDir, removeTempDir } from '../helpers/recallFixtures.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve = () => {}
    const promise = new Promise<void>((r) => {
        resolve = r
    })
    return { promise, resolve }
}

describe('Scoped lock', () => {
    let lock: ScopedLock
    let dir: string

    beforeEach(async () => {
        lock = new ScopedLock()
        dir = await makeTempDir()
    })

    afterEach(async () => {
        await removeTempDir(dir)
    })

    test('holders of one key run one at a time', async () => {
        const order: string[] = []
        const gate = deferred()

        const first = lock.withLock('work/a.yaml', { timeoutMs: 1000 }, async () => {
            order.push('first:start')
            await gate.promise
            order.push('first:end')
        })
        const second = lock.withLock('work/a.yaml', { timeoutMs: 1000 }, async () => {
            order.push('second')
        })

        await Promise.resolve()
        gate.resolve()
        await Promise.all([first, second])

        assert.deepEqual(order, ['first:start', 'first:end', 'second'])
        assert.equal(lock.activeKeys(), 0)
    })

    test('different keys do not wait on each other', async () => {
        const gate = deferred()
        const held = lock.withLock('work/a.yaml', { timeoutMs: 1000 }, () => gate.promise)

        const other = await lock.withLock('work/b.yaml', { timeoutMs: 50 }, async () => 'done')

        assert.equal(other, 'done')
        gate.resolve()
        await held
    })

    test('the lock is released when the body throws', async () => {
        await assert.rejects(
            lock.withLock('work/a.yaml', { timeoutMs: 100 }, async () => {
                throw new Error('serialization failed')
            }),
            /serialization failed/
        )

        const value = await lock.withLock('work/a.yaml', { timeoutMs: 100 }, async () => 42)
        assert.equal(value, 42)
        assert.equal(lock.activeKeys(), 0)
    })

    test('waiting past the timeout throws LockTimeoutError', async () => {
        const gate = deferred()
        const held = lock.withLock('work/a.yaml', { timeoutMs: 1000 }, () => gate.promise)

        await assert.rejects(
            lock.withLock('work/a.yaml', { timeoutMs: 30 }, async () => 'never'),
            (error: unknown) => error instanceof LockTimeoutError && error.lockKey === 'work/a.yaml' && error.timeoutMs === 30
        )

        gate.resolve()
        await held
    })

    test('creates the lock file while held and removes it afterwards', async () => {
        const lockFile = path.join(dir, 'a.yaml.lock')
        let seen = false

        await lock.withLock('work/a.yaml', { timeoutMs: 200, lockFile }, async () => {
            seen = existsSync(lockFile)
        })

        assert.equal(seen, true)
        assert.equal(existsSync(lockFile), false)
    })

    test('a fresh lock file held elsewhere times out', async () => {
        const lockFile = path.join(dir, 'a.yaml.lock')
        await writeFile(lockFile, '99999\n')

        await assert.rejects(
            lock.withLock('work/a.yaml', { timeoutMs: 60, lockFile, staleLockMs: 60_000 }, async () => 'never'),
            LockTimeoutError
        )
        assert.equal(existsSync(lockFile), true)
    })

    test('a stale lock file is taken over', async () => {
        const lockFile = path.join(dir, 'a.yaml.lock')
        await writeFile(lockFile, '99999\n')
        const old = new Date(Date.now() - 60_000)
        await utimes(lockFile, old, old)

        const value = await lock.withLock('work/a.yaml', { timeoutMs: 100, lockFile, staleLockMs: 1000 }, async () => 'acquired')

        assert.equal(value, 'acquired')
        assert.equal(existsSync(lockFile), false)
    })
})
