/**
 * Clock abstraction so timestamps (createdAt, lastModified, deletedAt) and
 * cooldown windows can be driven deterministically in tests.
 */
export interface IClock {
    /** Current time as epoch milliseconds */
    nowMs(): number

    /** Current time as ISO 8601 string */
    nowIso(): string
}

export class SystemClock implements IClock {
    nowMs(): number {
        return Date.now()
    }

    nowIso(): string {
        return new Date().toISOString()
    }
}

/**
 * Test clock; only moves when told to.
 */
export class FakeClock implements IClock {
    private current: number

    constructor(initial: string | number = '2026-01-01T00:00:00.000Z') {
        this.current = typeof initial === 'number' ? initial : Date.parse(initial)
    }

    nowMs(): number {
        return this.current
    }

    nowIso(): string {
        return new Date(this.current).toISOString()
    }

    advance(ms: number): void {
        this.current += ms
    }

    set(time: string | number): void {
        this.current = typeof time === 'number' ? time : Date.parse(time)
    }
}
