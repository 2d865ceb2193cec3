import { ArgumentError, UnimplementedError } from "../errors";
import { Series } from "../series";
import { FunctionTable, RuntimeValue } from "../types";
import { expandArgs } from "../utils/args";
import { isSeries } from "../values";

/**
 * Applies `fn` to scalar arguments, or sample by sample when any argument
 * is a series. Series are aligned on their current bar.
 */
export function lift(
    name: string,
    values: RuntimeValue[],
    fn: (xs: number[]) => number,
    integral: boolean = values.every((v) => v.type === "int"),
): RuntimeValue {
    for (const v of values) {
        if (v.type !== "int" && v.type !== "float" && !isSeries(v)) {
            throw new ArgumentError(
                `${name} expects numbers or series, got ${v.type}`,
            );
        }
    }

    const length = Math.max(
        0,
        ...values.map((v) => (isSeries(v) ? v.value.length : 0)),
    );
    const sampleAt = (v: RuntimeValue, offset: number): number => {
        if (isSeries(v)) {
            const s = v.value.at(offset);
            return typeof s === "number" ? s : NaN;
        }
        return v.type === "int" || v.type === "float" ? v.value : NaN;
    };

    if (!values.some(isSeries)) {
        const out = fn(values.map((v) => sampleAt(v, 0)));
        return integral ? { type: "int", value: out } : { type: "float", value: out };
    }

    const out: number[] = [];
    for (let i = 0; i < length; i++) {
        const offset = i - (length - 1);
        out.push(fn(values.map((v) => sampleAt(v, offset))));
    }
    return { type: "series", value: new Series(out) };
}

export const math: FunctionTable = {
    math__abs: (_runtime, args, kwargs) => {
        const a = expandArgs(args, kwargs, [{ name: "x", required: true }]);
        return lift("math.abs", [a.need("x", "any")], ([x]) => Math.abs(x));
    },

    math__max: (_runtime, args) => {
        if (args.length === 0) throw new ArgumentError("expected at least one value");
        return lift("math.max", args, (xs) => Math.max(...xs));
    },

    math__min: (_runtime, args) => {
        if (args.length === 0) throw new ArgumentError("expected at least one value");
        return lift("math.min", args, (xs) => Math.min(...xs));
    },

    math__round: (_runtime, args, kwargs) => {
        const a = expandArgs(args, kwargs, [{ name: "x", required: true }]);
        return lift("math.round", [a.need("x", "any")], ([x]) => Math.round(x), true);
    },

    nz: (_runtime, args, kwargs) => {
        const a = expandArgs(args, kwargs, [
            { name: "x", required: true },
            { name: "replacement" },
        ]);
        const x = a.need("x", "any");
        const replacement = a.get("replacement", "any") ?? { type: "int", value: 0 };
        return lift("nz", [x, replacement], ([v, r]) => (Number.isNaN(v) ? r : v));
    },

    na: (_runtime, args, kwargs) => {
        const a = expandArgs(args, kwargs, [{ name: "x", required: true }]);
        const x = a.need("x", "any");
        if (isSeries(x)) {
            return {
                type: "series",
                value: x.value.map((s) => typeof s === "number" && Number.isNaN(s)),
            };
        }
        return {
            type: "bool",
            value: x.type === "nil" || (x.type === "float" && Number.isNaN(x.value)),
        };
    },

    security: () => {
        throw new UnimplementedError("security requires data from other markets");
    },
};
