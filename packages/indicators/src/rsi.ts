import type { NumericSeries } from "@rulecraft/core";
import { assertPositiveInteger, emptySeries, isDefinedNumber } from "./series";

const toRsi = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		return 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Wilder RSI. The first `period` rows are undefined; the first value uses
 * plain averages of the opening `period` changes and later values the
 * `(prev * (period - 1) + current) / period` smoothing.
 */
export function rsiSeries(
	values: NumericSeries,
	period = 14
): Array<number | undefined> {
	assertPositiveInteger(period, "RSI period");

	const rsis = emptySeries(values.length);
	let gains = 0;
	let losses = 0;
	let run = 0;
	let avgGain: number | undefined;
	let avgLoss: number | undefined;

	for (let i = 1; i < values.length; i += 1) {
		const previous = values[i - 1];
		const current = values[i];
		if (!isDefinedNumber(previous) || !isDefinedNumber(current)) {
			gains = 0;
			losses = 0;
			run = 0;
			avgGain = undefined;
			avgLoss = undefined;
			continue;
		}

		const change = current - previous;
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);

		if (avgGain === undefined || avgLoss === undefined) {
			gains += gain;
			losses += loss;
			run += 1;
			if (run < period) {
				continue;
			}
			avgGain = gains / period;
			avgLoss = losses / period;
		} else {
			avgGain = (avgGain * (period - 1) + gain) / period;
			avgLoss = (avgLoss * (period - 1) + loss) / period;
		}

		rsis[i] = toRsi(avgGain, avgLoss);
	}

	return rsis;
}
