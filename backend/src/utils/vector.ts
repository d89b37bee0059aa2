export type Vector = readonly number[]

export function dot(a: Vector, b: Vector): number {
    let s = 0
    for (let i = 0; i < a.length; i++) {
        s += a[i] * b[i]
    }
    return s
}

export function norm(a: Vector): number {
    return Math.sqrt(dot(a, a))
}

/**
 * dot(a, b) / (|a| * |b|). Zero magnitude and dimension mismatch are defined as 0, not errors.
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
    if (a.length !== b.length || a.length === 0) return 0
    const na = norm(a)
    const nb = norm(b)
    if (na === 0 || nb === 0) return 0
    return dot(a, b) / (na * nb)
}

export function isFiniteVector(value: unknown): value is number[] {
    return Array.isArray(value) && value.length > 0 && value.every((x) => typeof x === 'number' && Number.isFinite(x))
}
