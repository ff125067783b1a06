import { Comparator } from '../util'
import { Defaulted } from './domain'

// One end of an interval. An included bound contains its point, an excluded
// one stops just short of it.
export type Bound<T> = {
    readonly kind: 'included'
    readonly point: T
} | {
    readonly kind: 'excluded'
    readonly point: T
}

export function included<T>(point: T): Bound<T> {
    return { kind: 'included', point }
}

export function excluded<T>(point: T): Bound<T> {
    return { kind: 'excluded', point }
}

// A bare point becomes an included bound.
export function fromPoint<T>(point: T): Bound<T> {
    return included(point)
}

export function defaultBound<T>(source: Defaulted<T>): Bound<T> {
    return included(source.defaultPoint())
}

export function point<T>(b: Bound<T>): T {
    return b.point
}

export function isClosed<T>(b: Bound<T>): boolean {
    return b.kind === 'included'
}

export function isOpen<T>(b: Bound<T>): boolean {
    return !isClosed(b)
}

export function mapBound<T>(b: Bound<T>, fn: (point: T) => T): Bound<T> {
    return { kind: b.kind, point: fn(b.point) }
}

export function boundsEqual<T>(cmp: Comparator<T>, a: Bound<T>, b: Bound<T>): boolean {
    return a.kind === b.kind && cmp(a.point, b.point) === 0
}

// Orders lower bounds: by point, and at the same point an included bound
// starts earlier than an excluded one.
export function compareBounds<T>(cmp: Comparator<T>, a: Bound<T>, b: Bound<T>): number {
    const byPoint = cmp(a.point, b.point)
    if (byPoint !== 0) {
        return byPoint
    }
    if (a.kind === b.kind) {
        return 0
    }
    return isClosed(a) ? -1 : 1
}

// At a shared point the result is included only when both are.
function intersectAt<T>(a: Bound<T>, b: Bound<T>): Bound<T> {
    return isClosed(a) && isClosed(b) ? a : excluded(a.point)
}

// At a shared point the result is included when either is.
function unionAt<T>(a: Bound<T>, b: Bound<T>): Bound<T> {
    return isOpen(a) && isOpen(b) ? a : included(a.point)
}

/**
 * Combines two bounds for an intersection, taking the one with the lesser
 * point when they differ.
 *
 * ```ts
 * intersectOrLeast(cmp, included(0), excluded(0)) // excluded(0)
 * ```
 */
export function intersectOrLeast<T>(cmp: Comparator<T>, a: Bound<T>, b: Bound<T>): Bound<T> {
    const c = cmp(a.point, b.point)
    if (c === 0) {
        return intersectAt(a, b)
    }
    return c < 0 ? a : b
}

/**
 * Combines two bounds for an intersection, taking the one with the greater
 * point when they differ.
 */
export function intersectOrGreatest<T>(cmp: Comparator<T>, a: Bound<T>, b: Bound<T>): Bound<T> {
    const c = cmp(a.point, b.point)
    if (c === 0) {
        return intersectAt(a, b)
    }
    return c > 0 ? a : b
}

/**
 * Combines two bounds for a union, taking the one with the lesser point when
 * they differ.
 *
 * ```ts
 * unionOrLeast(cmp, included(0), excluded(0)) // included(0)
 * ```
 */
export function unionOrLeast<T>(cmp: Comparator<T>, a: Bound<T>, b: Bound<T>): Bound<T> {
    const c = cmp(a.point, b.point)
    if (c === 0) {
        return unionAt(a, b)
    }
    return c < 0 ? a : b
}

/**
 * Combines two bounds for a union, taking the one with the greater point when
 * they differ.
 */
export function unionOrGreatest<T>(cmp: Comparator<T>, a: Bound<T>, b: Bound<T>): Bound<T> {
    const c = cmp(a.point, b.point)
    if (c === 0) {
        return unionAt(a, b)
    }
    return c > 0 ? a : b
}
