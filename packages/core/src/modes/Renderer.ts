import {
    DrawCommand,
    DrawType,
    HLINE_STYLES,
    LineStyle,
    MarketContext,
    NamedArgs,
    PLOT_STYLES,
    RuntimeValue,
    expandArgs,
    inferInputType,
    parseInputArgs,
} from "@chartscript/library";

import { RuntimeConfig } from "../runtime/Config";
import { Evaluable } from "../runtime/registry";
import { Runtime } from "../runtime/Runtime";
import { InputValues, coerceInput, storedValue } from "./inputs";

export interface RenderResult {
    commands: DrawCommand[];
    value: RuntimeValue;
}

const PLOT_TYPES: Record<number, { type: DrawType; mark?: "+" | "o" }> = {
    [PLOT_STYLES.style_line]: { type: "line" },
    [PLOT_STYLES.style_stepline]: { type: "line" },
    [PLOT_STYLES.style_histogram]: { type: "bar" },
    [PLOT_STYLES.style_cross]: { type: "marker", mark: "+" },
    [PLOT_STYLES.style_area]: { type: "band" },
    [PLOT_STYLES.style_columns]: { type: "bar" },
    [PLOT_STYLES.style_circles]: { type: "marker", mark: "o" },
};

const LINE_STYLES: Record<number, LineStyle> = {
    [HLINE_STYLES.style_solid]: "solid",
    [HLINE_STYLES.style_dotted]: "dotted",
    [HLINE_STYLES.style_dashed]: "dashed",
};

/**
 * Runs a script with configured input values and collects what it draws.
 */
export class Renderer {
    public readonly runtime: Runtime;
    public readonly commands: DrawCommand[] = [];
    private inputCount = 0;

    constructor(
        market: MarketContext,
        private values: InputValues = {},
        config: RuntimeConfig = {},
    ) {
        this.runtime = new Runtime(market, {
            ...config,
            overlay: {
                input: (_runtime, args, kwargs) => this.input(args, kwargs),
                plot: (_runtime, args, kwargs) => this.plot(args, kwargs),
                hline: (_runtime, args, kwargs) => this.hline(args, kwargs),
                fill: (_runtime, args, kwargs) => this.fill(args, kwargs),
            },
        });
    }

    public render(script: Evaluable): RenderResult {
        const value = this.runtime.evaluateTopLevel(script);
        return { commands: this.commands, value };
    }

    private input(args: RuntimeValue[], kwargs: NamedArgs): RuntimeValue {
        const { defval, title, type } = parseInputArgs(args, kwargs);

        this.inputCount += 1;
        const key = title || `input${this.inputCount}`;
        const stored = Object.hasOwn(this.values, key)
            ? this.values[key]
            : storedValue(defval);

        return coerceInput(
            this.runtime,
            key,
            type ?? inferInputType(defval),
            stored,
            defval.type,
        );
    }

    private draw(command: DrawCommand): RuntimeValue {
        this.commands.push(command);
        return { type: "plot", value: command };
    }

    private plot(args: RuntimeValue[], kwargs: NamedArgs): RuntimeValue {
        const a = expandArgs(args, kwargs, [
            { name: "series", required: true },
            { name: "title", required: true },
            { name: "color" },
            { name: "linewidth" },
            { name: "style" },
            { name: "trackprice" },
            { name: "transp" },
            { name: "histbase" },
            { name: "offset" },
            { name: "join" },
            { name: "editable" },
            { name: "show_last" },
        ]);
        a.check({
            trackprice: "bool",
            histbase: "number",
            offset: "int",
            join: "bool",
            editable: "bool",
            show_last: "int",
        });

        const style = a.get("style", "int");
        const { type, mark } =
            (style !== undefined ? PLOT_TYPES[style] : undefined) ??
            PLOT_TYPES[PLOT_STYLES.style_line];

        const command: DrawCommand = {
            type,
            title: a.need("title", "string"),
            series: a.need("series", "series"),
        };
        if (mark) command.mark = mark;

        const color = a.get("color", "color");
        if (color !== undefined) command.color = color;
        const width = a.get("linewidth", "int");
        if (width !== undefined) command.width = width;
        const transp = a.get("transp", "number");
        if (transp !== undefined) command.opacity = transp / 100;

        return this.draw(command);
    }

    private hline(args: RuntimeValue[], kwargs: NamedArgs): RuntimeValue {
        const a = expandArgs(args, kwargs, [
            { name: "price", required: true },
            { name: "title" },
            { name: "color" },
            { name: "linestyle" },
            { name: "linewidth" },
            { name: "editable" },
        ]);
        a.check({ editable: "bool" });

        const command: DrawCommand = {
            type: "horizontal-line",
            series: a.need("price", "number"),
        };
        const title = a.get("title", "string");
        if (title !== undefined) command.title = title;
        const color = a.get("color", "color");
        if (color !== undefined) command.color = color;
        const linestyle = a.get("linestyle", "int");
        if (linestyle !== undefined) command.style = LINE_STYLES[linestyle] ?? "solid";
        const width = a.get("linewidth", "int");
        if (width !== undefined) command.width = width;

        return this.draw(command);
    }

    private fill(args: RuntimeValue[], kwargs: NamedArgs): RuntimeValue {
        const a = expandArgs(args, kwargs, [
            { name: "series1", required: true },
            { name: "series2", required: true },
            { name: "color" },
            { name: "transp" },
            { name: "title" },
            { name: "editable" },
            { name: "show_last" },
        ]);
        a.check({ editable: "bool", show_last: "int" });

        const command: DrawCommand = {
            type: "fill",
            series: a.need("series1", "plot").series,
            series2: a.need("series2", "plot").series,
        };
        const title = a.get("title", "string");
        if (title !== undefined) command.title = title;
        const color = a.get("color", "color");
        if (color !== undefined) command.color = color;
        const transp = a.get("transp", "number");
        if (transp !== undefined) command.opacity = transp / 100;

        return this.draw(command);
    }
}
