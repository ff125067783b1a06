
export type Comparator<T> = (a: T, b: T) => number

export function strcmp(a: string, b: string): number {
    if (a < b) { return -1; }
    if (b < a) { return 1; }
    return 0;
}

// Works across number and bigint, but NaN compares equal to everything, so
// callers reject it before it gets here.
export function primitiveCompare(a: number | bigint, b: number | bigint): number {
    if (a < b) { return -1; }
    if (b < a) { return 1; }
    return 0;
}
