import { Option, OptionView, some, none, from as fromOption } from '../util/option'
import { ResultView, ok, err } from '../util/result'
import { Bound, included, excluded } from './bound'
import { Domain, numbers, isValidPoint } from './domain'
import { Interval } from './interval'

export type ParseError = {
    kind: 'syntax'
    input: string
    message: string
} | {
    kind: 'point'
    input: string
    text: string
    message: string
}

export type PointParser<T> = (text: string) => Option<T>

// `[a, b)` and friends. The first comma separates the two points.
const NOTATION = /^\s*([[(])\s*([^,]*?)\s*,\s*(.*?)\s*([\])])\s*$/

/**
 * Reads an interval written the way `Interval.toString` writes one. The
 * points may come in either order; the constructor sorts them.
 */
export function parse<T>(input: string, domain: Domain<T>, parsePoint: PointParser<T>): ResultView<Interval<T>, ParseError> {
    const match = NOTATION.exec(input)
    if (match === null) {
        return err<Interval<T>, ParseError>({
            kind: 'syntax',
            input,
            message: 'expected "[a, b]", "(a, b)", "[a, b)" or "(a, b]"',
        })
    }
    const [, open, leftText, rightText, close] = match

    const readBound = (text: string, isExcluded: boolean): ResultView<Bound<T>, ParseError> => {
        const parsed = fromOption(parsePoint(text))
        if (!parsed.data.some) {
            return err<Bound<T>, ParseError>({ kind: 'point', input, text, message: `could not read point "${text}"` })
        }
        const p = parsed.data.value
        if (!isValidPoint(domain, p)) {
            return err<Bound<T>, ParseError>({ kind: 'point', input, text, message: `point "${text}" is not valid in this domain` })
        }
        return ok<Bound<T>, ParseError>(isExcluded ? excluded(p) : included(p))
    }

    return readBound(leftText, open === '(')
        .andThen(start => readBound(rightText, close === ')')
            .map(end => new Interval(domain, start, end)))
}

export function parseNumber(text: string): OptionView<number> {
    if (text.trim() === '') {
        return none()
    }
    const n = Number(text)
    return Number.isNaN(n) ? none() : some(n)
}

export function parseBigint(text: string): OptionView<bigint> {
    return /^[+-]?\d+$/.test(text) ? some(BigInt(text)) : none()
}

export function parseDate(text: string): OptionView<Date> {
    const d = new Date(text)
    return Number.isNaN(d.getTime()) ? none() : some(d)
}

export function parseString(text: string): OptionView<string> {
    return some(text)
}

export function parseNumberInterval(input: string): ResultView<Interval<number>, ParseError> {
    return parse(input, numbers, parseNumber)
}
