import { Comparator, strcmp, primitiveCompare } from '../util'

// Anything whose primitive value orders it: numbers, bigints, strings and
// dates, or objects with a numeric or string `valueOf`. The static Interval
// constructors accept these without an explicit domain.
export interface Ordered {
    valueOf(): number | bigint | string
}

// What an interval needs to know about its point type. Only `compare` is
// required; the set algebra never does arithmetic.
export interface Domain<T> {
    compare: Comparator<T>
    // Points failing this never make it into an interval.
    isValid?: (point: T) => boolean
    format?: (point: T) => string
}

export interface Defaulted<T> {
    defaultPoint(): T
}

// Needed by width and the crop/extend mutators only. `D` is the type of a
// distance between two points, which differs from `T` for dates.
export interface Arithmetic<T, D = T> {
    add(point: T, amount: D): T
    subtract(point: T, amount: D): T
    difference(right: T, left: T): D
}

export function isValidPoint<T>(domain: Domain<T>, point: T): boolean {
    return domain.isValid === undefined || domain.isValid(point)
}

export function formatPoint<T>(domain: Domain<T>, point: T): string {
    return domain.format === undefined ? String(point) : domain.format(point)
}

export const numbers: Domain<number> & Defaulted<number> & Arithmetic<number> = {
    compare: primitiveCompare,
    isValid: (n) => !Number.isNaN(n),
    defaultPoint: () => 0,
    add: (point, amount) => point + amount,
    subtract: (point, amount) => point - amount,
    difference: (right, left) => right - left,
}

export const bigints: Domain<bigint> & Defaulted<bigint> & Arithmetic<bigint> = {
    compare: primitiveCompare,
    defaultPoint: () => 0n,
    add: (point, amount) => point + amount,
    subtract: (point, amount) => point - amount,
    difference: (right, left) => right - left,
}

export const strings: Domain<string> & Defaulted<string> = {
    compare: strcmp,
    defaultPoint: () => '',
}

// Dates are ordered by their timestamp; distances are in milliseconds.
export const dates: Domain<Date> & Defaulted<Date> & Arithmetic<Date, number> = {
    compare: (a, b) => primitiveCompare(a.getTime(), b.getTime()),
    isValid: (d) => !Number.isNaN(d.getTime()),
    format: (d) => d.toISOString(),
    defaultPoint: () => new Date(0),
    add: (point, amount) => new Date(point.getTime() + amount),
    subtract: (point, amount) => new Date(point.getTime() - amount),
    difference: (right, left) => right.getTime() - left.getTime(),
}

// Orders by `valueOf`. Mixing strings with numbers in one interval is not
// meaningful and falls back to JavaScript's relational rules.
export const natural: Domain<Ordered> = {
    compare: (a, b) => {
        const x = a.valueOf()
        const y = b.valueOf()
        if (x < y) { return -1; }
        if (y < x) { return 1; }
        return 0;
    },
    isValid: (p) => {
        const key = p.valueOf()
        return typeof key !== 'number' || !Number.isNaN(key)
    },
    format: (p) => p instanceof Date ? p.toISOString() : String(p),
}
