import { PriceTableError } from "./errors";
import { PRICE_COLUMNS, type PriceColumn, type PriceTable } from "./types";

/**
 * Checks that every bar carries finite OHLCV numbers and that timestamps
 * strictly increase. Returns the table unchanged so callers can chain it.
 */
export const validatePriceTable = (table: PriceTable): PriceTable => {
	for (let i = 0; i < table.length; i += 1) {
		const bar = table[i];
		if (!Number.isFinite(bar.timestamp)) {
			throw new PriceTableError(`Row ${i} has an invalid timestamp`, i);
		}
		for (const column of PRICE_COLUMNS) {
			if (!Number.isFinite(bar[column])) {
				throw new PriceTableError(
					`Row ${i} has a non-finite ${column} value`,
					i
				);
			}
		}
		if (i > 0 && bar.timestamp <= table[i - 1].timestamp) {
			throw new PriceTableError(
				bar.timestamp === table[i - 1].timestamp
					? `Duplicate timestamp ${formatDay(bar.timestamp)} at row ${i}`
					: `Timestamps must increase; row ${i} is earlier than row ${i - 1}`,
				i
			);
		}
	}
	return table;
};

export const pluckColumn = (
	table: PriceTable,
	column: PriceColumn
): number[] => table.map((bar) => bar[column]);

export const formatDay = (timestamp: number): string =>
	new Date(timestamp).toISOString().slice(0, 10);
