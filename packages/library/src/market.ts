import { MarketField, MarketSeries } from "./series";

export interface Candle {
    time: number;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

/**
 * Market data handle passed through the runtime to builtins.
 */
export interface MarketContext {
    readonly symbol: string;
    readonly resolution: string;
    /** Number of bars available. */
    readonly length: number;
    series(field: MarketField): MarketSeries;
}

const derived: Record<MarketField, (c: Candle) => number> = {
    open: (c) => c.open,
    high: (c) => c.high,
    low: (c) => c.low,
    close: (c) => c.close,
    volume: (c) => c.volume,
    time: (c) => c.time,
    hl2: (c) => (c.high + c.low) / 2,
    hlc3: (c) => (c.high + c.low + c.close) / 3,
    ohlc4: (c) => (c.open + c.high + c.low + c.close) / 4,
};

/**
 * In-memory market built from a list of candles, oldest first.
 */
export class CandleMarket implements MarketContext {
    private cache: Map<MarketField, MarketSeries> = new Map();

    constructor(
        public readonly symbol: string,
        public readonly resolution: string,
        private readonly candles: readonly Candle[],
    ) {}

    public get length(): number {
        return this.candles.length;
    }

    public series(field: MarketField): MarketSeries {
        let cached = this.cache.get(field);
        if (!cached) {
            cached = new MarketSeries(field, this.candles.map(derived[field]));
            this.cache.set(field, cached);
        }
        return cached;
    }
}
