import chalk from "chalk";
import {
    ArgumentError,
    Binding,
    FunctionTable,
    MarketContext,
    NamedArgs,
    RuntimeValue,
    ScriptRuntime,
    UnimplementedError,
    VariableTable,
    canReassign,
    functions,
    unify,
    variables,
} from "@chartscript/library";

import { DEFAULT_TITLE, RuntimeConfig } from "./Config";
import {
    Evaluable,
    FunctionEntry,
    loadFunctions,
    loadVariables,
} from "./registry";
import { ScriptError, unboundVariable, unknownFunction } from "../utils/Error";

export interface RuntimeOptions extends RuntimeConfig {
    /** Builtin functions; defaults to the standard library. */
    functions?: FunctionTable;
    /** Builtin variables; defaults to the standard library. */
    variables?: VariableTable;
    /** Mode-specific handlers, consulted before the builtins. */
    overlay?: FunctionTable;
}

/**
 * Scope stack and function registry for one evaluation of a script.
 *
 * The first scope holds the builtin variables and is never popped. Every
 * nested scope must be released on the way out, including on failure, so
 * prefer {@link Runtime.withScope} over raw push/pop.
 */
export class Runtime implements ScriptRuntime {
    public title: string;

    private scopes: Map<string, Binding>[];
    private functionTable: Map<string, FunctionEntry>;
    private overlay: Map<string, FunctionEntry>;
    private trace: boolean;

    constructor(
        public readonly market: MarketContext,
        options: RuntimeOptions = {},
    ) {
        this.title = options.title ?? DEFAULT_TITLE;
        this.trace = options.trace ?? false;
        this.functionTable = loadFunctions(options.functions ?? functions);
        this.overlay = loadFunctions(options.overlay ?? {});
        this.scopes = [loadVariables(options.variables ?? variables)];
    }

    public get depth(): number {
        return this.scopes.length;
    }

    public define(name: string, value: RuntimeValue): void {
        this.scopes[this.scopes.length - 1].set(name, value);
    }

    public assign(name: string, value: RuntimeValue): RuntimeValue {
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            const scope = this.scopes[i];
            const current = scope.get(name);
            if (current === undefined) continue;

            if (!canReassign(current, value)) {
                throw new ScriptError(
                    "TypeMismatch",
                    name,
                    `Cannot assign ${unify(value)} (${value.type}) to '${name}' of type '${current.type}'.`,
                );
            }
            scope.set(name, value);
            return value;
        }
        throw unboundVariable(name);
    }

    public lookup(name: string): RuntimeValue {
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            const binding = this.scopes[i].get(name);
            if (binding === undefined) continue;
            if (binding.type !== "accessor") return binding;

            try {
                return binding.read(this);
            } catch (e) {
                if (e instanceof UnimplementedError) {
                    throw new ScriptError(
                        "UnimplementedVariable",
                        name,
                        `Variable '${name}' is not implemented.`,
                        e.message,
                        e,
                    );
                }
                throw e;
            }
        }
        throw unboundVariable(name);
    }

    public pushScope(): void {
        this.scopes.push(new Map());
    }

    public popScope(): void {
        if (this.scopes.length <= 1) {
            throw new Error("Cannot pop the global scope.");
        }
        this.scopes.pop();
    }

    /**
     * Runs `fn` in a fresh scope, released however `fn` exits.
     */
    public withScope<T>(fn: () => T): T {
        this.pushScope();
        try {
            return fn();
        } finally {
            this.popScope();
        }
    }

    /**
     * Registers a script-defined function. A later registration of the same
     * name, from any source, replaces it.
     */
    public defineFunction(
        name: string,
        params: readonly string[],
        body: Evaluable,
    ): void {
        this.overlay.delete(name);
        this.functionTable.set(name, { kind: "user", params, body });
    }

    public hasFunction(name: string): boolean {
        return this.overlay.has(name) || this.functionTable.has(name);
    }

    public call(
        name: string,
        args: RuntimeValue[] = [],
        kwargs: NamedArgs = {},
    ): RuntimeValue {
        const entry = this.overlay.get(name) ?? this.functionTable.get(name);
        if (!entry) throw unknownFunction(name);

        if (this.trace) {
            const shown = [
                ...args.map(unify),
                ...Object.entries(kwargs).map(([k, v]) => `${k}=${unify(v)}`),
            ];
            console.log(
                chalk.gray(`[Runtime] ${entry.kind} ${name}(${shown.join(", ")})`),
            );
        }

        if (entry.kind === "host") {
            try {
                return entry.fn(this, args, kwargs);
            } catch (e) {
                if (e instanceof ArgumentError) {
                    throw new ScriptError(
                        "ArgumentShapeError",
                        name,
                        `Invalid arguments to '${name}': ${e.message}`,
                        undefined,
                        e,
                    );
                }
                if (e instanceof UnimplementedError) {
                    throw new ScriptError(
                        "UnimplementedFunction",
                        name,
                        `Function '${name}' is not implemented.`,
                        e.message,
                        e,
                    );
                }
                throw e;
            }
        }

        const { params, body } = entry;
        return this.withScope(() => {
            this.bindArguments(name, params, args, kwargs);
            return body.evaluate(this);
        });
    }

    /**
     * Evaluates a whole script in its own scope, so its locals never reach
     * the global scope.
     */
    public evaluateTopLevel(node: Evaluable): RuntimeValue {
        return this.withScope(() => node.evaluate(this));
    }

    private bindArguments(
        fname: string,
        params: readonly string[],
        args: RuntimeValue[],
        kwargs: NamedArgs,
    ): void {
        // Surplus positional arguments are dropped.
        params.forEach((param, i) => {
            if (i < args.length) this.define(param, args[i]);
        });
        for (const [key, val] of Object.entries(kwargs)) {
            this.define(key, val);
        }

        const local = this.scopes[this.scopes.length - 1];
        for (const param of params) {
            if (!local.has(param)) {
                throw new ScriptError(
                    "MissingArgument",
                    param,
                    `Missing argument '${param}' in call to '${fname}'.`,
                );
            }
        }
    }
}
