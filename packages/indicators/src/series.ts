import type { NumericSeries } from "@rulecraft/core";

export const isDefinedNumber = (value: number | undefined): value is number =>
	typeof value === "number" && Number.isFinite(value);

export const assertPositiveInteger = (value: number, label: string): void => {
	if (!Number.isInteger(value) || value <= 0) {
		throw new RangeError(`${label} must be a positive integer, got ${value}`);
	}
};

export const emptySeries = (length: number): Array<number | undefined> =>
	new Array<number | undefined>(length).fill(undefined);

/**
 * Mean of `values[end - period + 1 .. end]`, or undefined when any value in
 * the window is missing or the window starts before the first row.
 */
export const windowMean = (
	values: NumericSeries,
	end: number,
	period: number
): number | undefined => {
	const start = end - period + 1;
	if (start < 0) {
		return undefined;
	}
	let sum = 0;
	for (let i = start; i <= end; i += 1) {
		const value = values[i];
		if (!isDefinedNumber(value)) {
			return undefined;
		}
		sum += value;
	}
	return sum / period;
};
