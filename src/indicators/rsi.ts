import type { Series } from "../types";

/**
 * Relative Strength Index with Wilder smoothing. The first value sits at
 * index `period`, seeded by the simple average of the first `period`
 * changes.
 */
export function calculateRsi(values: number[], period: number): Series {
	const rsi: Series = new Array(values.length).fill(undefined);
	if (period < 1 || values.length < period + 1) return rsi;

	let gainSum = 0;
	let lossSum = 0;
	for (let i = 1; i <= period; i++) {
		const change = values[i] - values[i - 1];
		if (change > 0) gainSum += change;
		else lossSum -= change;
	}

	let avgGain = gainSum / period;
	let avgLoss = lossSum / period;
	rsi[period] = toRsi(avgGain, avgLoss);

	for (let i = period + 1; i < values.length; i++) {
		const change = values[i] - values[i - 1];
		const gain = change > 0 ? change : 0;
		const loss = change < 0 ? -change : 0;
		avgGain = (avgGain * (period - 1) + gain) / period;
		avgLoss = (avgLoss * (period - 1) + loss) / period;
		rsi[i] = toRsi(avgGain, avgLoss);
	}

	return rsi;
}

function toRsi(avgGain: number, avgLoss: number): number {
	if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
	const rs = avgGain / avgLoss;
	return 100 - 100 / (1 + rs);
}
