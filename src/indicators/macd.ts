import type { Series } from "../types";
import { calculateEma } from "./ema";

const MACD_FAST = 12;
export const MACD_SLOW = 26;
export const MACD_SIGNAL = 9;

export function calculateMacdHistogram(values: number[]): Series {
	const fast = calculateEma(values, MACD_FAST);
	const slow = calculateEma(values, MACD_SLOW);

	const macd: Series = values.map((_, i) => {
		const f = fast[i];
		const s = slow[i];
		return f === undefined || s === undefined ? undefined : f - s;
	});
	const signal = calculateEma(macd, MACD_SIGNAL);

	return macd.map((line, i) => {
		const sig = signal[i];
		return line === undefined || sig === undefined ? undefined : line - sig;
	});
}
