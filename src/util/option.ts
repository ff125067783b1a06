
export type OptionData<T> = {
    some: true
    value: T
} | {
    some: false
}

export interface Option<T> {
    data: OptionData<T>
}

export function from<T>(o: Option<T>): OptionView<T> {
    return new OptionView(o)
}

export function fromData<T>(data: OptionData<T>): OptionView<T> {
    return new OptionView({ data })
}

export function some<T>(r: T): OptionView<T> {
    return fromData({ some: true, value: r })
}

export function none<T>(): OptionView<T> {
    return fromData({ some: false })
}

export class OptionView<T> implements Option<T> {
    data: OptionData<T>

    constructor(o: Option<T>) { this.data = o.data }

    isSome(): boolean {
        return this.data.some
    }

    isNone(): boolean {
        return !this.data.some
    }

    unwrap(): T {
        if (this.data.some) {
            return this.data.value
        } else {
            throw new Error("option unwrapped without value")
        }
    }

    expect(msg: string): T {
        if (this.data.some) {
            return this.data.value
        } else {
            throw new Error("expected option to be some: " + msg)
        }
    }

    orElse(def: () => T): T {
        if (this.data.some) {
            return this.data.value
        } else {
            return def()
        }
    }

    map<O>(fn: (a: T) => O): OptionView<O> {
        if (this.data.some) {
            return some(fn(this.data.value))
        } else {
            return none()
        }
    }

    andThen<O>(fn: (a: T) => Option<O>): OptionView<O> {
        if (this.data.some) {
            return from(fn(this.data.value))
        } else {
            return none()
        }
    }
}
