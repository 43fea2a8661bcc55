export interface PriceBar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type PriceTable = readonly PriceBar[];

export const PRICE_COLUMNS = ["open", "high", "low", "close", "volume"] as const;
export type PriceColumn = (typeof PRICE_COLUMNS)[number];

/** Columns a simulator may fill at. */
export const PRICE_FIELDS = ["open", "high", "low", "close"] as const;
export type PriceField = (typeof PRICE_FIELDS)[number];

/**
 * Row-aligned numbers; `undefined` marks a row without enough history
 * (indicator warm-up, lookback before the first bar).
 */
export type NumericSeries = ReadonlyArray<number | undefined>;

/** Row-aligned condition results before warm-up rows are collapsed. */
export type TriStateSeries = ReadonlyArray<boolean | undefined>;

export type SignalSeries = readonly boolean[];
