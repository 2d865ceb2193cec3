import {
    InputDescriptor,
    MarketContext,
    NamedArgs,
    RuntimeValue,
    inferInputType,
    parseInputArgs,
} from "@chartscript/library";

import { RuntimeConfig } from "../runtime/Config";
import { Evaluable } from "../runtime/registry";
import { Runtime } from "../runtime/Runtime";
import { storedValue } from "./inputs";

/**
 * Runs a script to discover its input declarations. Every input evaluates
 * to its default, so the rest of the script runs as it would unconfigured.
 */
export class InputScanner {
    public readonly runtime: Runtime;
    public readonly inputs: InputDescriptor[] = [];

    constructor(market: MarketContext, config: RuntimeConfig = {}) {
        this.runtime = new Runtime(market, {
            ...config,
            overlay: {
                input: (_runtime, args, kwargs) => this.input(args, kwargs),
            },
        });
    }

    public scan(script: Evaluable): InputDescriptor[] {
        this.runtime.evaluateTopLevel(script);
        return this.inputs;
    }

    private input(args: RuntimeValue[], kwargs: NamedArgs): RuntimeValue {
        const { defval, title, type, minval, maxval, options } =
            parseInputArgs(args, kwargs);

        const descriptor: InputDescriptor = {
            default: storedValue(defval),
            title: title || `input${this.inputs.length + 1}`,
            type: type ?? inferInputType(defval),
        };
        if (minval !== undefined) descriptor.min = minval;
        if (maxval !== undefined) descriptor.max = maxval;
        if (options !== undefined) {
            descriptor.options = options.map(storedValue);
        }

        this.inputs.push(descriptor);
        return defval;
    }
}
