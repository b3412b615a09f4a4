import type { Candle, IndicatorParams, IndicatorSeries } from "../types";
import { calculateEma } from "./ema";
import { calculateMacdHistogram } from "./macd";
import { findPivots } from "./pivots";
import { calculateRsi } from "./rsi";

export { calculateAtr } from "./atr";
export { calculateEma } from "./ema";
export { calculateMacdHistogram, MACD_SIGNAL, MACD_SLOW } from "./macd";
export { findPivots } from "./pivots";
export { calculateRsi } from "./rsi";

export function buildIndicatorSeries(
	candles: Candle[],
	params: IndicatorParams,
): IndicatorSeries {
	const closes = candles.map((c) => c.close);
	const times = candles.map((c) => c.openTime);

	const rsi = calculateRsi(closes, params.rsiPeriod);

	return {
		rsi,
		rsiEma: calculateEma(rsi, params.rsiEmaPeriod),
		emaShort: calculateEma(closes, params.shortEmaPeriod),
		emaLong: calculateEma(closes, params.longEmaPeriod),
		macdHistogram: calculateMacdHistogram(closes),
		pivotHighs: findPivots(closes, times, params.trendlineLength, "high"),
		pivotLows: findPivots(closes, times, params.trendlineLength, "low"),
		rsiPivotHighs: findPivots(rsi, times, params.trendlineLength, "high"),
		rsiPivotLows: findPivots(rsi, times, params.trendlineLength, "low"),
	};
}
