import type { NumericSeries } from "@rulecraft/core";
import { assertPositiveInteger, emptySeries, isDefinedNumber } from "./series";

export function shiftSeries(
	values: NumericSeries,
	lag: number
): Array<number | undefined> {
	assertPositiveInteger(lag, "Lag");
	const result = emptySeries(values.length);
	for (let i = lag; i < values.length; i += 1) {
		const value = values[i - lag];
		result[i] = isDefinedNumber(value) ? value : undefined;
	}
	return result;
}

export function changeSeries(
	values: NumericSeries,
	lag: number
): Array<number | undefined> {
	assertPositiveInteger(lag, "Lag");
	const result = emptySeries(values.length);
	for (let i = lag; i < values.length; i += 1) {
		const current = values[i];
		const base = values[i - lag];
		if (isDefinedNumber(current) && isDefinedNumber(base)) {
			result[i] = current - base;
		}
	}
	return result;
}

/** Percent change against the value `lag` rows back; undefined on a zero base. */
export function percentChangeSeries(
	values: NumericSeries,
	lag: number
): Array<number | undefined> {
	assertPositiveInteger(lag, "Lag");
	const result = emptySeries(values.length);
	for (let i = lag; i < values.length; i += 1) {
		const current = values[i];
		const base = values[i - lag];
		if (isDefinedNumber(current) && isDefinedNumber(base) && base !== 0) {
			result[i] = ((current - base) / base) * 100;
		}
	}
	return result;
}
