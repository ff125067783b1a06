
export type ResultData<R, E> = {
    status: 'ok',
    value: R,
} | {
    status: 'err'
    error: E
}

export type Result<R, E> = {
    data: ResultData<R, E>
}

export class ResultView<R, E> implements Result<R, E> {
    constructor(public data: ResultData<R, E>) { }

    isOk(): boolean {
        return this.data.status === 'ok'
    }

    or_else<D>(def: () => D): R | D {
        if (this.data.status === 'ok') {
            return this.data.value
        } else {
            return def()
        }
    }

    err_or_else<D>(def: () => D): E | D {
        if (this.data.status === 'err') {
            return this.data.error
        } else {
            return def()
        }
    }

    map<O>(fn: (r: R) => O): ResultView<O, E> {
        if (this.data.status === 'ok') {
            return ok(fn(this.data.value))
        }
        return err(this.data.error)
    }

    andThen<O>(fn: (r: R) => Result<O, E>): ResultView<O, E> {
        if (this.data.status === 'ok') {
            return from(fn(this.data.value))
        }
        return err(this.data.error)
    }

    unwrap(): R {
        if (this.data.status === 'err') {
            throw new Error(`result unwrapped with error: ${describe(this.data.error)}`)
        }
        return this.data.value
    }
}

function describe(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error) {
        return String(error.message)
    }
    return String(error)
}

export function from<R, E>(r: Result<R, E>): ResultView<R, E> {
    return new ResultView(r.data)
}

export function fromData<R, E>(r: ResultData<R, E>): ResultView<R, E> {
    return new ResultView(r)
}

export function ok<R, E>(r: R): ResultView<R, E> {
    return fromData({ status: 'ok', value: r })
}

export function err<R, E>(e: E): ResultView<R, E> {
    return fromData({ status: 'err', error: e })
}
