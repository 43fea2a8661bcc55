import type { NumericSeries, TriStateSeries } from "@rulecraft/core";
import { isDefinedNumber } from "./series";

export type CrossDirection = "above" | "below";

/**
 * Row `i` is true when `a` moves from at-or-below `b` to strictly above it
 * ("above"), or from at-or-above to strictly below ("below"). Row 0 and rows
 * touching a missing value are undefined.
 */
export function crossSeries(
	a: NumericSeries,
	b: NumericSeries,
	direction: CrossDirection
): Array<boolean | undefined> {
	if (a.length !== b.length) {
		throw new RangeError(
			`Cross inputs must be aligned, got ${a.length} and ${b.length} rows`
		);
	}

	const result = new Array<boolean | undefined>(a.length).fill(undefined);
	for (let i = 1; i < a.length; i += 1) {
		const prevA = a[i - 1];
		const prevB = b[i - 1];
		const currA = a[i];
		const currB = b[i];
		if (
			!isDefinedNumber(prevA) ||
			!isDefinedNumber(prevB) ||
			!isDefinedNumber(currA) ||
			!isDefinedNumber(currB)
		) {
			continue;
		}
		result[i] =
			direction === "above"
				? prevA <= prevB && currA > currB
				: prevA >= prevB && currA < currB;
	}
	return result;
}

export const crossesAbove = (
	a: NumericSeries,
	b: NumericSeries
): TriStateSeries => crossSeries(a, b, "above");

export const crossesBelow = (
	a: NumericSeries,
	b: NumericSeries
): TriStateSeries => crossSeries(a, b, "below");
