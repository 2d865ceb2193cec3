import {
    ArgumentError,
    CandleMarket,
    NIL,
    RuntimeValue,
    ScriptRuntime,
    Series,
    UnimplementedError,
    functions,
    parseInputArgs,
    variables,
} from "../src";

function stubRuntime(): ScriptRuntime {
    return {
        market: new CandleMarket("TEST", "60", [
            { time: 1, open: 1, high: 2, low: 1, close: 2, volume: 5 },
            { time: 2, open: 2, high: 4, low: 2, close: 4, volume: 7 },
        ]),
        title: "No Title",
        lookup: () => NIL,
        call: () => NIL,
    };
}

function run(name: string, args: RuntimeValue[], kwargs: Record<string, RuntimeValue> = {}) {
    return functions[name](stubRuntime(), args, kwargs);
}

const n = (value: number): RuntimeValue => ({ type: "int", value });
const f = (value: number): RuntimeValue => ({ type: "float", value });
const s = (...samples: number[]): RuntimeValue => ({ type: "series", value: new Series(samples) });

function samples(val: RuntimeValue): unknown[] {
    if (val.type !== "series") throw new Error(`expected a series, got ${val.type}`);
    return val.value.toArray();
}

describe("math", () => {
    test("scalars keep their kind", () => {
        expect(run("math__max", [n(1), n(4)])).toEqual({ type: "int", value: 4 });
        expect(run("math__min", [n(1), f(0.5)])).toEqual({ type: "float", value: 0.5 });
        expect(run("math__abs", [n(-3)])).toEqual({ type: "int", value: 3 });
        expect(run("math__round", [f(2.6)])).toEqual({ type: "int", value: 3 });
    });

    test("series are combined on their current bar", () => {
        expect(samples(run("math__max", [s(1, 5, 2), s(4, 3)]))).toEqual([NaN, 5, 3]);
        expect(samples(run("math__max", [s(1, 5), n(2)]))).toEqual([2, 5]);
    });

    test("non-numeric arguments are rejected", () => {
        expect(() => run("math__abs", [{ type: "str", value: "x" }])).toThrow(ArgumentError);
        expect(() => run("math__max", [])).toThrow("expected at least one value");
    });

    test("nz replaces na", () => {
        expect(run("nz", [f(NaN)])).toEqual({ type: "float", value: 0 });
        expect(run("nz", [f(NaN), n(7)])).toEqual({ type: "float", value: 7 });
        expect(samples(run("nz", [s(NaN, 2)]))).toEqual([0, 2]);
    });

    test("na detects missing values", () => {
        expect(run("na", [f(NaN)])).toEqual({ type: "bool", value: true });
        expect(run("na", [n(1)])).toEqual({ type: "bool", value: false });
        expect(samples(run("na", [s(NaN, 1)]))).toEqual([true, false]);
    });

    test("security is not available", () => {
        expect(() => run("security", [])).toThrow(UnimplementedError);
    });
});

describe("ta", () => {
    test("sma averages a sliding window", () => {
        expect(samples(run("sma", [s(1, 2, 3, 4), n(2)]))).toEqual([NaN, 1.5, 2.5, 3.5]);
    });

    test("ema starts from the first sample", () => {
        expect(samples(run("ema", [s(1, 3), n(3)]))).toEqual([1, 2]);
    });

    test("highest and lowest look back over the window", () => {
        expect(samples(run("highest", [s(1, 3, 2), n(2)]))).toEqual([NaN, 3, 3]);
        expect(samples(run("lowest", [s(1, 3, 2), n(2)]))).toEqual([NaN, 1, 2]);
    });

    test("change defaults to one bar", () => {
        expect(samples(run("change", [s(1, 4, 9)]))).toEqual([NaN, 3, 5]);
        expect(samples(run("change", [s(1, 4, 9)], { length: n(2) }))).toEqual([NaN, NaN, 8]);
    });

    test("lengths must be positive integers", () => {
        expect(() => run("sma", [s(1), n(0)])).toThrow("length must be positive, got 0");
        expect(() => run("sma", [s(1), f(1.5)])).toThrow("argument 'length' must be int, got float");
    });
});

describe("chart defaults", () => {
    test("study sets the runtime title", () => {
        const rt = stubRuntime();
        functions.study(rt, [{ type: "str", value: "RSI" }], {});
        expect(rt.title).toBe("RSI");
    });

    test("input returns its default", () => {
        expect(run("input", [n(3), { type: "str", value: "Length" }])).toEqual(n(3));
    });

    test("drawing calls do nothing", () => {
        expect(run("plot", [s(1)])).toEqual(NIL);
        expect(run("fill", [])).toEqual(NIL);
    });

    test("parseInputArgs reads the full signature", () => {
        const parsed = parseInputArgs([n(5), { type: "str", value: "Len" }], {
            minval: n(1),
            maxval: n(10),
            step: n(1),
            confirm: { type: "bool", value: false },
        });
        expect(parsed).toEqual({
            defval: n(5),
            title: "Len",
            type: undefined,
            minval: 1,
            maxval: 10,
            confirm: false,
            step: 1,
            options: undefined,
        });
    });
});

describe("variables", () => {
    test("market variables read the runtime's market", () => {
        const close = variables.close;
        expect(close.type).toBe("accessor");
        if (close.type === "accessor") {
            const val = close.read(stubRuntime());
            expect(val.type === "source" && val.value.toArray()).toEqual([2, 4]);
        }
    });

    test("namespaced constants use double underscores", () => {
        expect(variables.plot__style_area).toEqual({ type: "int", value: 5 });
        expect(variables.hline__style_solid).toEqual({ type: "int", value: 0 });
        expect(variables.input__source).toEqual({ type: "str", value: "source" });
    });
});
