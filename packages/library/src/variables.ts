import { UnimplementedError } from "./errors";
import { MarketField } from "./series";
import { Binding, VariableAccessor, VariableTable } from "./types";

function source(field: MarketField): VariableAccessor {
    return {
        type: "accessor",
        read: (runtime) => ({ type: "source", value: runtime.market.series(field) }),
    };
}

export const PLOT_STYLES = {
    style_line: 1,
    style_stepline: 2,
    style_histogram: 3,
    style_cross: 4,
    style_area: 5,
    style_columns: 6,
    style_circles: 7,
} as const;

export const HLINE_STYLES = {
    style_solid: 0,
    style_dotted: 1,
    style_dashed: 2,
} as const;

const COLORS: Record<string, string> = {
    aqua: "#00bcd4",
    black: "#363a45",
    blue: "#2196f3",
    fuchsia: "#e040fb",
    gray: "#787b86",
    green: "#4caf50",
    lime: "#00e676",
    maroon: "#880e4f",
    navy: "#311b92",
    olive: "#808000",
    orange: "#ff9800",
    purple: "#9c27b0",
    red: "#f23645",
    silver: "#b2b5be",
    teal: "#089981",
    white: "#ffffff",
    yellow: "#ffeb3b",
};

function namespaced<T>(
    prefix: string,
    entries: Record<string, T>,
    wrap: (val: T) => Binding,
): VariableTable {
    const out: VariableTable = {};
    for (const [name, val] of Object.entries(entries)) {
        out[`${prefix}__${name}`] = wrap(val);
    }
    return out;
}

const styleConstant = (value: number): Binding => ({ type: "int", value });

export const variables: VariableTable = {
    open: source("open"),
    high: source("high"),
    low: source("low"),
    close: source("close"),
    volume: source("volume"),
    hl2: source("hl2"),
    hlc3: source("hlc3"),
    ohlc4: source("ohlc4"),
    time: source("time"),

    bar_index: {
        type: "accessor",
        read: (runtime) => ({ type: "int", value: runtime.market.length - 1 }),
    },
    syminfo__ticker: {
        type: "accessor",
        read: (runtime) => ({ type: "str", value: runtime.market.symbol }),
    },
    timeframe__period: {
        type: "accessor",
        read: (runtime) => ({ type: "str", value: runtime.market.resolution }),
    },
    timenow: {
        type: "accessor",
        read: () => {
            throw new UnimplementedError("wall clock time is not available");
        },
    },

    na: { type: "float", value: NaN },

    ...namespaced("plot", PLOT_STYLES, styleConstant),
    ...namespaced("hline", HLINE_STYLES, styleConstant),
    ...namespaced("color", COLORS, (hex) => ({ type: "color", value: hex })),
    ...namespaced(
        "input",
        {
            bool: "bool",
            integer: "integer",
            float: "float",
            string: "string",
            symbol: "symbol",
            resolution: "resolution",
            session: "session",
            source: "source",
        },
        (name) => ({ type: "str", value: name }),
    ),
};
