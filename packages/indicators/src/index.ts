export { smaSeries } from "./sma";
export { emaSeries } from "./ema";
export { rsiSeries } from "./rsi";
export { shiftSeries, changeSeries, percentChangeSeries } from "./lookback";
export {
	crossSeries,
	crossesAbove,
	crossesBelow,
	type CrossDirection,
} from "./cross";
export { assertPositiveInteger, isDefinedNumber } from "./series";
