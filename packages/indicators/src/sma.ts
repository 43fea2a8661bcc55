import type { NumericSeries } from "@rulecraft/core";
import { assertPositiveInteger, emptySeries, windowMean } from "./series";

export function smaSeries(
	values: NumericSeries,
	period: number
): Array<number | undefined> {
	assertPositiveInteger(period, "SMA period");

	const result = emptySeries(values.length);
	for (let i = period - 1; i < values.length; i += 1) {
		result[i] = windowMean(values, i, period);
	}
	return result;
}
