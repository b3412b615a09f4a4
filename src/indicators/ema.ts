import type { Series } from "../types";

/**
 * Exponential moving average seeded with the first defined value and
 * smoothed by 2 / (period + 1). Leading undefined samples are skipped, and
 * indices before `period` defined samples have been seen stay undefined.
 */
export function calculateEma(values: Series, period: number): Series {
	const ema: Series = new Array(values.length).fill(undefined);
	const start = values.findIndex((v) => v !== undefined);
	if (period < 1 || start < 0 || values.length - start < period) return ema;

	const k = 2 / (period + 1);
	let prev: number | undefined;

	for (let i = start; i < values.length; i++) {
		const value = values[i];
		if (value === undefined) {
			// gaps after the seed break the recurrence
			return new Array(values.length).fill(undefined);
		}
		prev = prev === undefined ? value : value * k + prev * (1 - k);
		if (i - start >= period - 1) ema[i] = prev;
	}

	return ema;
}
