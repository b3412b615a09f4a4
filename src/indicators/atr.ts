import type { Candle } from "../types";

function trueRange(prev: Candle, curr: Candle): number {
	return Math.max(
		curr.high - curr.low,
		Math.abs(curr.high - prev.close),
		Math.abs(curr.low - prev.close),
	);
}

/**
 * Wilder ATR: seeded with the mean of the first `period` true ranges, then
 * smoothed as `(prev * (period - 1) + tr) / period` through the last bar.
 */
export function calculateAtr(
	candles: Candle[],
	period: number,
): number | undefined {
	if (period < 1 || candles.length < period + 1) return undefined;

	let atr = 0;
	for (let i = 1; i <= period; i++) {
		atr += trueRange(candles[i - 1], candles[i]);
	}
	atr /= period;

	for (let i = period + 1; i < candles.length; i++) {
		atr = (atr * (period - 1) + trueRange(candles[i - 1], candles[i])) / period;
	}
	return atr;
}
