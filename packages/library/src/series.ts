export type Sample = number | string | boolean;

/**
 * Append-only sequence of samples addressed relative to the current bar.
 *
 * `at(0)` is the current (last) sample, `at(-1)` the one before it and so on.
 * Reaching past the first sample yields `NaN`, the language's "na".
 */
export class Series {
    protected readonly samples: Sample[];

    constructor(samples: Iterable<Sample> = []) {
        this.samples = Array.from(samples);
    }

    public get length(): number {
        return this.samples.length;
    }

    public push(sample: Sample): this {
        this.samples.push(sample);
        return this;
    }

    public at(offset: number = 0): Sample {
        if (offset > 0) {
            throw new RangeError(
                `Series offset must not be positive, got ${offset}`,
            );
        }
        const index = this.samples.length - 1 + Math.trunc(offset);
        if (index < 0) return NaN;
        return this.samples[index];
    }

    public toArray(): Sample[] {
        return this.samples.slice();
    }

    /**
     * Samples as numbers; anything non-numeric becomes NaN.
     */
    public numbers(): number[] {
        return this.samples.map((s) => (typeof s === "number" ? s : NaN));
    }

    public map(fn: (sample: Sample, index: number) => Sample): Series {
        return new Series(this.samples.map(fn));
    }
}

export type MarketField =
    | "open"
    | "high"
    | "low"
    | "close"
    | "volume"
    | "hl2"
    | "hlc3"
    | "ohlc4"
    | "time";

export const MARKET_FIELDS: readonly MarketField[] = [
    "open",
    "high",
    "low",
    "close",
    "volume",
    "hl2",
    "hlc3",
    "ohlc4",
    "time",
];

export function isMarketField(name: string): name is MarketField {
    return MARKET_FIELDS.some((field) => field === name);
}

/**
 * A series read straight from a market data channel. Input declarations
 * record its `field` instead of the samples.
 */
export class MarketSeries extends Series {
    constructor(
        public readonly field: MarketField,
        samples: Iterable<number> = [],
    ) {
        super(samples);
    }
}
