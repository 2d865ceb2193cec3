import { ArgumentError } from "../errors";
import { Series } from "../series";
import { FunctionTable, NamedArgs, RuntimeValue } from "../types";
import { expandArgs } from "../utils/args";

function windowArgs(
    args: RuntimeValue[],
    kwargs: NamedArgs,
    defaultLength?: number,
): { values: number[]; length: number } {
    const a = expandArgs(args, kwargs, [
        { name: "source", required: true },
        { name: "length", required: defaultLength === undefined },
    ]);
    const length = a.get("length", "int") ?? defaultLength ?? 0;
    if (length <= 0) {
        throw new ArgumentError(`length must be positive, got ${length}`);
    }
    return { values: a.need("source", "series").numbers(), length };
}

function result(samples: number[]): RuntimeValue {
    return { type: "series", value: new Series(samples) };
}

export function sma(values: number[], period: number): number[] {
    const out = new Array<number>(values.length).fill(Number.NaN);

    let rolling = 0;
    for (let i = 0; i < values.length; i++) {
        rolling += values[i];
        if (i >= period) {
            rolling -= values[i - period];
        }
        if (i >= period - 1) {
            out[i] = rolling / period;
        }
    }

    return out;
}

export function ema(values: number[], period: number): number[] {
    const out = new Array<number>(values.length).fill(Number.NaN);
    if (values.length === 0) return out;

    const alpha = 2 / (period + 1);
    let prev = values[0];
    out[0] = prev;

    for (let i = 1; i < values.length; i++) {
        prev = alpha * values[i] + (1 - alpha) * prev;
        out[i] = prev;
    }

    return out;
}

function rolling(
    values: number[],
    period: number,
    pick: (win: number[]) => number,
): number[] {
    return values.map((_, i) =>
        i < period - 1 ? NaN : pick(values.slice(i - period + 1, i + 1)),
    );
}

export const ta: FunctionTable = {
    sma: (_runtime, args, kwargs) => {
        const { values, length } = windowArgs(args, kwargs);
        return result(sma(values, length));
    },

    ema: (_runtime, args, kwargs) => {
        const { values, length } = windowArgs(args, kwargs);
        return result(ema(values, length));
    },

    highest: (_runtime, args, kwargs) => {
        const { values, length } = windowArgs(args, kwargs);
        return result(rolling(values, length, (w) => Math.max(...w)));
    },

    lowest: (_runtime, args, kwargs) => {
        const { values, length } = windowArgs(args, kwargs);
        return result(rolling(values, length, (w) => Math.min(...w)));
    },

    change: (_runtime, args, kwargs) => {
        const { values, length } = windowArgs(args, kwargs, 1);
        return result(values.map((v, i) => (i < length ? NaN : v - values[i - length])));
    },
};
