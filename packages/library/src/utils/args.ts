import { ArgumentError } from "../errors";
import { Series } from "../series";
import { DrawCommand, NamedArgs, RuntimeValue } from "../types";
import { isSeries } from "../values";

export interface ArgSpec {
    name: string;
    required?: boolean;
}

interface ArgKinds {
    any: RuntimeValue;
    number: number;
    int: number;
    string: string;
    bool: boolean;
    series: Series;
    color: string;
    plot: DrawCommand;
    array: RuntimeValue[];
}

export type ArgKind = keyof ArgKinds;

const readers: { [K in ArgKind]: (val: RuntimeValue) => ArgKinds[K] | undefined } = {
    any: (val) => val,
    number: (val) =>
        val.type === "int" || val.type === "float" ? val.value : undefined,
    int: (val) => (val.type === "int" ? val.value : undefined),
    string: (val) => (val.type === "str" ? val.value : undefined),
    bool: (val) => (val.type === "bool" ? val.value : undefined),
    series: (val) => (isSeries(val) ? val.value : undefined),
    // A series of colours resolves to its current sample.
    color: (val) => {
        if (val.type === "color" || val.type === "str") return val.value;
        if (isSeries(val)) return String(val.value.at(0));
        return undefined;
    },
    plot: (val) => (val.type === "plot" ? val.value : undefined),
    array: (val) => (val.type === "array" ? val.value : undefined),
};

/**
 * Call arguments matched against their declared names.
 */
export class Arguments {
    constructor(private values: Map<string, RuntimeValue>) {}

    /**
     * Reads an optional argument; `na` counts as absent.
     */
    public get<K extends ArgKind>(name: string, kind: K): ArgKinds[K] | undefined {
        const val = this.values.get(name);
        if (val === undefined || (val.type === "nil" && kind !== "any")) {
            return undefined;
        }
        const out = readers[kind](val);
        if (out === undefined) {
            throw new ArgumentError(
                `argument '${name}' must be ${kind}, got ${val.type}`,
            );
        }
        return out;
    }

    /**
     * Validates arguments the caller accepts but does not use.
     */
    public check(kinds: Record<string, ArgKind>): void {
        for (const [name, kind] of Object.entries(kinds)) {
            this.get(name, kind);
        }
    }

    public need<K extends ArgKind>(name: string, kind: K): ArgKinds[K] {
        const out = this.get(name, kind);
        if (out === undefined) {
            throw new ArgumentError(`missing required argument '${name}'`);
        }
        return out;
    }
}

/**
 * Matches positional then named arguments against `spec`.
 */
export function expandArgs(
    args: RuntimeValue[],
    kwargs: NamedArgs,
    spec: readonly ArgSpec[],
): Arguments {
    if (args.length > spec.length) {
        throw new ArgumentError(
            `too many arguments: expected at most ${spec.length}, got ${args.length}`,
        );
    }

    const values = new Map<string, RuntimeValue>();
    args.forEach((val, i) => values.set(spec[i].name, val));

    for (const [name, val] of Object.entries(kwargs)) {
        if (!spec.some((s) => s.name === name)) {
            throw new ArgumentError(`unexpected argument '${name}'`);
        }
        if (values.has(name)) {
            throw new ArgumentError(`argument '${name}' given twice`);
        }
        values.set(name, val);
    }

    for (const s of spec) {
        if (s.required && !values.has(s.name)) {
            throw new ArgumentError(`missing required argument '${s.name}'`);
        }
    }

    return new Arguments(values);
}
