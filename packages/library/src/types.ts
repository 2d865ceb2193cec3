import type { MarketContext } from "./market";
import type { MarketSeries, Series } from "./series";

export type DrawType =
    | "line"
    | "bar"
    | "marker"
    | "band"
    | "fill"
    | "horizontal-line";

export type LineStyle = "solid" | "dotted" | "dashed";

/**
 * One chart overlay element produced by a drawing call.
 */
export interface DrawCommand {
    type: DrawType;
    title?: string;
    series: Series | number;
    series2?: Series | number;
    mark?: "+" | "o";
    color?: string;
    width?: number;
    opacity?: number;
    style?: LineStyle;
}

export type RuntimeValue =
    | { type: "bool"; value: boolean }
    | { type: "int"; value: number }
    | { type: "float"; value: number }
    | { type: "str"; value: string }
    | { type: "color"; value: string }
    | { type: "nil"; value: null }
    | { type: "array"; value: RuntimeValue[] }
    | { type: "series"; value: Series }
    | { type: "source"; value: MarketSeries }
    | { type: "plot"; value: DrawCommand };

export type ValueType = RuntimeValue["type"];

export type NamedArgs = Record<string, RuntimeValue>;

/**
 * The part of the runtime visible to builtins.
 */
export interface ScriptRuntime {
    readonly market: MarketContext;
    title: string;
    lookup(name: string): RuntimeValue;
    call(name: string, args?: RuntimeValue[], kwargs?: NamedArgs): RuntimeValue;
}

export type HostFunction = (
    runtime: ScriptRuntime,
    args: RuntimeValue[],
    kwargs: NamedArgs,
) => RuntimeValue;

/**
 * Builtin variable whose value is read from the live runtime on every lookup.
 */
export interface VariableAccessor {
    type: "accessor";
    read(runtime: ScriptRuntime): RuntimeValue;
}

export type Binding = RuntimeValue | VariableAccessor;

export type FunctionTable = Record<string, HostFunction>;
export type VariableTable = Record<string, Binding>;

export type InputType =
    | "bool"
    | "integer"
    | "float"
    | "string"
    | "symbol"
    | "resolution"
    | "session"
    | "source";

export type StoredInput = boolean | number | string;

export interface InputDescriptor {
    default: StoredInput;
    title: string;
    type: InputType;
    min?: number;
    max?: number;
    options?: StoredInput[];
}
