import {
    DrawCommand,
    InputDescriptor,
    MarketContext,
    RuntimeValue,
} from "@chartscript/library";

import { InputScanner } from "./modes/InputScanner";
import { Renderer } from "./modes/Renderer";
import { InputValues, defaultsOf } from "./modes/inputs";
import { RuntimeConfig } from "./runtime/Config";
import { Evaluable } from "./runtime/registry";

export { Runtime } from "./runtime/Runtime";
export type { RuntimeOptions } from "./runtime/Runtime";
export * from "./runtime/Config";
export * from "./runtime/registry";
export { InputScanner } from "./modes/InputScanner";
export { Renderer } from "./modes/Renderer";
export type { RenderResult } from "./modes/Renderer";
export * from "./modes/inputs";
export * from "./utils/Error";

export interface ScriptResult {
    title: string;
    inputs: InputDescriptor[];
    commands: DrawCommand[];
    value: RuntimeValue;
}

/**
 * Scans a script for its inputs, then renders it with `values` laid over
 * the scanned defaults.
 */
export function runScript(
    script: Evaluable,
    market: MarketContext,
    values: InputValues = {},
    config: RuntimeConfig = {},
): ScriptResult {
    const scanner = new InputScanner(market, config);
    const inputs = scanner.scan(script);

    const renderer = new Renderer(
        market,
        { ...defaultsOf(inputs), ...values },
        config,
    );
    const { commands, value } = renderer.render(script);

    return { title: renderer.runtime.title, inputs, commands, value };
}
