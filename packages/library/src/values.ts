import { MarketSeries, Series } from "./series";
import { Binding, RuntimeValue } from "./types";

export const NIL: RuntimeValue = { type: "nil", value: null };

export function isSeries(
    val: Binding,
): val is
    | { type: "series"; value: Series }
    | { type: "source"; value: MarketSeries } {
    return val.type === "series" || val.type === "source";
}

/**
 * Whether `next` may replace `current` in an existing variable. Any series
 * replaces any other series; everything else keeps its exact kind.
 */
export function canReassign(current: Binding, next: RuntimeValue): boolean {
    if (isSeries(current)) return isSeries(next);
    return current.type === next.type;
}
