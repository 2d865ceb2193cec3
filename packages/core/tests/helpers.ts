import { Candle, CandleMarket, NIL, RuntimeValue } from "@chartscript/library";
import { Evaluable, Runtime, ScriptError } from "../src";

// Minimal evaluable nodes standing in for parsed scripts.

export const lit = (value: RuntimeValue): Evaluable => ({ evaluate: () => value });
export const int = (value: number): Evaluable => lit({ type: "int", value });
export const float = (value: number): Evaluable => lit({ type: "float", value });
export const str = (value: string): Evaluable => lit({ type: "str", value });
export const bool = (value: boolean): Evaluable => lit({ type: "bool", value });

export const ref = (name: string): Evaluable => ({
    evaluate: (rt) => rt.lookup(name),
});

export const define = (name: string, node: Evaluable): Evaluable => ({
    evaluate: (rt) => {
        const value = node.evaluate(rt);
        rt.define(name, value);
        return value;
    },
});

export const assign = (name: string, node: Evaluable): Evaluable => ({
    evaluate: (rt) => rt.assign(name, node.evaluate(rt)),
});

export const call = (
    name: string,
    args: Evaluable[] = [],
    kwargs: Record<string, Evaluable> = {},
): Evaluable => ({
    evaluate: (rt) => {
        const named: Record<string, RuntimeValue> = {};
        for (const [key, node] of Object.entries(kwargs)) {
            named[key] = node.evaluate(rt);
        }
        return rt.call(
            name,
            args.map((a) => a.evaluate(rt)),
            named,
        );
    },
});

export const block = (...nodes: Evaluable[]): Evaluable => ({
    evaluate: (rt) => {
        let last: RuntimeValue = NIL;
        for (const node of nodes) last = node.evaluate(rt);
        return last;
    },
});

export const scoped = (...nodes: Evaluable[]): Evaluable => ({
    evaluate: (rt) => rt.withScope(() => block(...nodes).evaluate(rt)),
});

export const func = (
    name: string,
    params: string[],
    body: Evaluable,
): Evaluable => ({
    evaluate: (rt) => {
        rt.defineFunction(name, params, body);
        return NIL;
    },
});

export const fail = (message: string): Evaluable => ({
    evaluate: () => {
        throw new Error(message);
    },
});

export const CANDLES: Candle[] = [
    { time: 1000, open: 10, high: 12, low: 9, close: 11, volume: 100 },
    { time: 2000, open: 11, high: 13, low: 10, close: 12, volume: 150 },
    { time: 3000, open: 12, high: 14, low: 11, close: 13, volume: 120 },
    { time: 4000, open: 13, high: 15, low: 12, close: 14, volume: 90 },
];

export function market(): CandleMarket {
    return new CandleMarket("TEST:ABC", "60", CANDLES);
}

export function runtime(): Runtime {
    return new Runtime(market());
}

export function thrown(fn: () => unknown): ScriptError {
    try {
        fn();
    } catch (e) {
        if (e instanceof ScriptError) return e;
        throw e;
    }
    throw new Error("expected a ScriptError");
}
