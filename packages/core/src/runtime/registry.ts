import {
    Binding,
    FunctionTable,
    HostFunction,
    RuntimeValue,
    VariableTable,
} from "@chartscript/library";
import type { Runtime } from "./Runtime";

/**
 * Anything the runtime can evaluate: a script, a statement, a function body.
 */
export interface Evaluable {
    evaluate(runtime: Runtime): RuntimeValue;
}

export type FunctionEntry =
    | { kind: "host"; fn: HostFunction }
    | { kind: "user"; params: readonly string[]; body: Evaluable };

/**
 * Registered name for a table key: `null` for private (`_`-prefixed) keys,
 * `__` otherwise becomes a namespace dot (`math__max` is `math.max`).
 */
export function builtinName(key: string): string | null {
    if (key.startsWith("_")) return null;
    return key.replace(/__/g, ".");
}

export function loadFunctions(table: FunctionTable): Map<string, FunctionEntry> {
    const out = new Map<string, FunctionEntry>();
    for (const [key, fn] of Object.entries(table)) {
        const name = builtinName(key);
        if (name !== null) out.set(name, { kind: "host", fn });
    }
    return out;
}

export function loadVariables(table: VariableTable): Map<string, Binding> {
    const out = new Map<string, Binding>();
    for (const [key, val] of Object.entries(table)) {
        const name = builtinName(key);
        if (name !== null) out.set(name, val);
    }
    return out;
}
