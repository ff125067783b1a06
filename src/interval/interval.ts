import { strict as assert } from 'assert'
import { inspect } from 'util'
import { from, toArray } from 'ix/iterable'
import { filter } from 'ix/iterable/operators'

import { OptionView, some, none } from '../util/option'
import {
    Bound, included, excluded, isClosed, isOpen, mapBound, boundsEqual, compareBounds,
    intersectOrLeast, intersectOrGreatest, unionOrLeast, unionOrGreatest, defaultBound,
} from './bound'
import { Domain, Defaulted, Arithmetic, Ordered, natural, isValidPoint, formatPoint } from './domain'

// Constructors bound to one domain, for point types that have no natural
// ordering or want a different one.
export interface IntervalFactory<T> {
    between(start: Bound<T>, end?: Bound<T>): Interval<T>
    open(start: T, end: T): Interval<T>
    closed(start: T, end: T): Interval<T>
    leftOpen(start: T, end: T): Interval<T>
    rightOpen(start: T, end: T): Interval<T>
    point(p: T): Interval<T>
}

/**
 * A contiguous range of points with independently open or closed ends.
 *
 * The left bound never lies after the right bound: the constructor puts its
 * arguments in order. An interval is empty only when both bounds are the same
 * excluded point, so `[x, x]` is a non-empty interval of width zero.
 *
 * Everything except the four crop/extend mutators returns new values, never
 * one of its operands. Binary operations compare points with the receiver's
 * domain and give their result that domain.
 */
export class Interval<T> {
    private start: Bound<T>
    private end: Bound<T>

    /**
     * Builds the interval spanning `start` and `end` in whichever order they
     * come. Without `end` the result is the degenerate interval at `start`.
     *
     * When both bounds sit on the same point they are merged with the union
     * rule, so `between(included(1), excluded(1))` is `[1, 1]`.
     */
    constructor(readonly domain: Domain<T>, start: Bound<T>, end?: Bound<T>) {
        assertValid(domain, start)
        if (end === undefined) {
            this.start = start
            this.end = start
        } else {
            assertValid(domain, end)
            this.start = unionOrLeast(domain.compare, start, end)
            this.end = unionOrGreatest(domain.compare, start, end)
        }
    }

    static of<T>(domain: Domain<T>): IntervalFactory<T> {
        return {
            between: (start, end) => new Interval(domain, start, end),
            open: (start, end) => new Interval(domain, excluded(start), excluded(end)),
            closed: (start, end) => new Interval(domain, included(start), included(end)),
            leftOpen: (start, end) => new Interval(domain, excluded(start), included(end)),
            rightOpen: (start, end) => new Interval(domain, included(start), excluded(end)),
            point: (p) => new Interval(domain, included(p), included(p)),
        }
    }

    static between<T extends Ordered>(start: Bound<T>, end?: Bound<T>): Interval<T> {
        return new Interval<T>(natural, start, end)
    }

    static open<T extends Ordered>(start: T, end: T): Interval<T> {
        return new Interval<T>(natural, excluded(start), excluded(end))
    }

    static closed<T extends Ordered>(start: T, end: T): Interval<T> {
        return new Interval<T>(natural, included(start), included(end))
    }

    static leftOpen<T extends Ordered>(start: T, end: T): Interval<T> {
        return new Interval<T>(natural, excluded(start), included(end))
    }

    static rightOpen<T extends Ordered>(start: T, end: T): Interval<T> {
        return new Interval<T>(natural, included(start), excluded(end))
    }

    // The closed interval holding only `p`.
    static point<T extends Ordered>(p: T): Interval<T> {
        return Interval.closed(p, p)
    }

    static default<T>(domain: Domain<T> & Defaulted<T>): Interval<T> {
        return new Interval(domain, defaultBound(domain))
    }

    leftPoint(): T {
        return this.start.point
    }

    rightPoint(): T {
        return this.end.point
    }

    leftBound(): Bound<T> {
        return this.start
    }

    rightBound(): Bound<T> {
        return this.end
    }

    isEmpty(): boolean {
        return boundsEqual(this.domain.compare, this.start, this.end) && isOpen(this.start)
    }

    intoNonEmpty(): OptionView<Interval<T>> {
        return this.isEmpty() ? none() : some(this.clone())
    }

    contains(p: T): boolean {
        const left = this.domain.compare(p, this.start.point)
        const right = this.domain.compare(p, this.end.point)
        return (left > 0 && right < 0)
            || (left === 0 && isClosed(this.start))
            || (right === 0 && isClosed(this.end))
    }

    equals(other: Interval<T>): boolean {
        const cmp = this.domain.compare
        return boundsEqual(cmp, this.start, other.start) && boundsEqual(cmp, this.end, other.end)
    }

    clone(): Interval<T> {
        return new Interval(this.domain, this.start, this.end)
    }

    // Puts the operand with the lesser left bound first. At a shared point the
    // closed bound leads, so a single point meeting an open end is seen as
    // touching whichever operand is the receiver.
    private orient(other: Interval<T>): [Interval<T>, Interval<T>] {
        return compareBounds(this.domain.compare, this.start, other.start) <= 0
            ? [this, other]
            : [other, this]
    }

    // Both intervals and everything between them.
    private span(other: Interval<T>): Interval<T> {
        const cmp = this.domain.compare
        return new Interval(
            this.domain,
            unionOrLeast(cmp, this.start, other.start),
            unionOrGreatest(cmp, this.end, other.end),
        )
    }

    /**
     * The points in both intervals, or none when they share no point. Touching
     * at a single point only counts when both sides include it.
     */
    intersect(other: Interval<T>): OptionView<Interval<T>> {
        if (this.isEmpty() || other.isEmpty()) {
            return none()
        }
        const cmp = this.domain.compare
        const [a, b] = this.orient(other)
        const gap = cmp(a.end.point, b.start.point)
        if (gap < 0 || (gap === 0 && (isOpen(a.end) || isOpen(b.start)))) {
            return none()
        }
        return some(new Interval(
            this.domain,
            intersectOrGreatest(cmp, a.start, b.start),
            intersectOrLeast(cmp, a.end, b.end),
        ))
    }

    /**
     * The points in either interval, when they form one contiguous range.
     * Touching at a point is enough unless both sides exclude it. An empty
     * operand contributes nothing.
     */
    union(other: Interval<T>): OptionView<Interval<T>> {
        if (this.isEmpty() && other.isEmpty()) {
            return none()
        } else if (this.isEmpty()) {
            return some(other.clone())
        } else if (other.isEmpty()) {
            return some(this.clone())
        }
        const cmp = this.domain.compare
        const [a, b] = this.orient(other)
        const gap = cmp(a.end.point, b.start.point)
        if (gap < 0 || (gap === 0 && isOpen(a.end) && isOpen(b.start))) {
            return none()
        }
        return some(new Interval(
            this.domain,
            unionOrLeast(cmp, a.start, b.start),
            unionOrGreatest(cmp, a.end, b.end),
        ))
    }

    /**
     * The smallest interval holding every point of every non-empty input,
     * gaps included. None when there is no non-empty input.
     */
    static enclose<T>(intervals: Iterable<Interval<T>>): OptionView<Interval<T>> {
        let hull: Interval<T> | null = null
        for (const next of from(intervals).pipe(filter((i: Interval<T>) => !i.isEmpty()))) {
            hull = hull === null ? next.clone() : hull.span(next)
        }
        return hull === null ? none() : some(hull)
    }

    /**
     * Merges intervals by repeated union, in input order: each non-empty
     * interval replaces the first entry it unions with, or is appended.
     *
     * One pass, no sorting. The result depends on input order and is not
     * always minimal; see `coalesce` for a sorted, order-independent merge.
     */
    static normalize<T>(intervals: Iterable<Interval<T>>): Interval<T>[] {
        const out: Interval<T>[] = []
        for (const next of from(intervals).pipe(filter((i: Interval<T>) => !i.isEmpty()))) {
            let merged = false
            for (let idx = 0; idx < out.length; idx++) {
                const u = out[idx].union(next)
                if (u.data.some) {
                    out[idx] = u.data.value
                    merged = true
                    break
                }
            }
            if (!merged) {
                out.push(next.clone())
            }
        }
        return out
    }

    /**
     * Sorts the non-empty intervals by left bound and sweeps them, merging
     * each one into the previous when their union is contiguous. The result
     * is sorted and no two entries can be unioned.
     */
    static coalesce<T>(intervals: Iterable<Interval<T>>): Interval<T>[] {
        const sorted = toArray(from(intervals).pipe(filter((i: Interval<T>) => !i.isEmpty())))
            .sort((a, b) => compareBounds(a.domain.compare, a.start, b.start))
        const out: Interval<T>[] = []
        for (const next of sorted) {
            const last = out.length - 1
            const merged = last < 0 ? none<Interval<T>>() : out[last].union(next)
            if (merged.data.some) {
                out[last] = merged.data.value
            } else {
                out.push(next.clone())
            }
        }
        return out
    }

    // The right point minus the left point.
    width<D>(arithmetic: Arithmetic<T, D>): D {
        return arithmetic.difference(this.end.point, this.start.point)
    }

    // The mutators below rebuild through the constructor, so an amount large
    // enough to carry one end past the other swaps them instead of leaving an
    // inverted interval.

    leftCrop<D>(amount: D, arithmetic: Arithmetic<T, D>): void {
        this.reset(mapBound(this.start, p => arithmetic.add(p, amount)), this.end)
    }

    rightCrop<D>(amount: D, arithmetic: Arithmetic<T, D>): void {
        this.reset(this.start, mapBound(this.end, p => arithmetic.subtract(p, amount)))
    }

    leftExtend<D>(amount: D, arithmetic: Arithmetic<T, D>): void {
        this.reset(mapBound(this.start, p => arithmetic.subtract(p, amount)), this.end)
    }

    rightExtend<D>(amount: D, arithmetic: Arithmetic<T, D>): void {
        this.reset(this.start, mapBound(this.end, p => arithmetic.add(p, amount)))
    }

    private reset(start: Bound<T>, end: Bound<T>): void {
        const next = new Interval(this.domain, start, end)
        this.start = next.start
        this.end = next.end
    }

    toString(): string {
        return (isOpen(this.start) ? '(' : '[')
            + formatPoint(this.domain, this.start.point)
            + ', '
            + formatPoint(this.domain, this.end.point)
            + (isOpen(this.end) ? ')' : ']')
    }

    [inspect.custom](): string {
        return `Interval ${this.toString()}`
    }
}

function assertValid<T>(domain: Domain<T>, b: Bound<T>): void {
    if (!isValidPoint(domain, b.point)) {
        assert.fail(`invalid interval point: ${String(b.point)}`)
    }
}
