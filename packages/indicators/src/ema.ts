import type { NumericSeries } from "@rulecraft/core";
import {
	assertPositiveInteger,
	emptySeries,
	isDefinedNumber,
	windowMean,
} from "./series";

/**
 * Exponential moving average seeded with the simple mean of the first
 * `length` values. A gap in the input drops the average and the next full
 * window of values seeds it again.
 */
export function emaSeries(
	values: NumericSeries,
	length: number
): Array<number | undefined> {
	assertPositiveInteger(length, "EMA period");

	const result = emptySeries(values.length);
	const multiplier = 2 / (length + 1);
	let emaValue: number | undefined;
	let run = 0;

	for (let i = 0; i < values.length; i += 1) {
		const value = values[i];
		if (!isDefinedNumber(value)) {
			emaValue = undefined;
			run = 0;
			continue;
		}
		run += 1;

		if (emaValue === undefined) {
			if (run < length) {
				continue;
			}
			emaValue = windowMean(values, i, length);
		} else {
			emaValue = (value - emaValue) * multiplier + emaValue;
		}
		result[i] = emaValue;
	}

	return result;
}
