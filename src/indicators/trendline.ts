import type {
	Candle,
	Pivot,
	SlopeMethod,
	TrendlineKind,
	TrendlineSegment,
} from "../types";
import { calculateAtr } from "./atr";

const HOUR_MS = 60 * 60 * 1000;

export const TRENDLINE_KINDS: readonly TrendlineKind[] = [
	"price-support",
	"price-resistance",
	"rsi-support",
	"rsi-resistance",
];

function hoursBetween(from: number, to: number): number {
	return (to - from) / HOUR_MS;
}

function isSupport(kind: TrendlineKind): boolean {
	return kind.endsWith("support");
}

/** Line value at `time`, or undefined once the segment has expired. */
export function trendlineValueAt(
	segment: TrendlineSegment,
	time: number,
): number | undefined {
	if (time > segment.expiryTime) return undefined;
	return (
		segment.anchorValue + segment.slope * hoursBetween(segment.anchorTime, time)
	);
}

export function twoPivotSlope(p1: Pivot, p2: Pivot): number {
	const hours = hoursBetween(p1.time, p2.time);
	if (hours === 0) return 0;
	return (p2.value - p1.value) / hours;
}

function stdev(values: number[]): number {
	const mean = values.reduce((acc, v) => acc + v, 0) / values.length;
	const variance =
		values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
	return Math.sqrt(variance);
}

function linregSlope(values: number[]): number {
	const n = values.length;
	const meanX = (n - 1) / 2;
	const meanY = values.reduce((acc, v) => acc + v, 0) / n;
	let num = 0;
	let den = 0;
	for (let i = 0; i < n; i++) {
		num += (i - meanX) * (values[i] - meanY);
		den += (i - meanX) ** 2;
	}
	return den === 0 ? 0 : num / den;
}

function meanAbsChange(values: number[]): number {
	let sum = 0;
	for (let i = 1; i < values.length; i++) {
		sum += Math.abs(values[i] - values[i - 1]);
	}
	return sum / (values.length - 1);
}

/**
 * Channel width per bar for the volatility-based estimators. Resistance
 * lines descend by this much per bar from their pivot, support lines rise.
 * Without candles (an indicator line) the ATR method falls back to the mean
 * absolute change, which is the true range of a close-only series.
 */
export function channelWidthPerBar(
	method: Exclude<SlopeMethod, "pivots">,
	values: number[],
	candles: Candle[] | undefined,
	length: number,
): number | undefined {
	if (values.length < length || length < 2) return undefined;
	const window = values.slice(-length);

	switch (method) {
		case "stdev":
			return stdev(window) / length;
		case "atr": {
			if (!candles) return meanAbsChange(values.slice(-(length + 1))) / length;
			const atr = calculateAtr(candles, length);
			return atr === undefined ? undefined : atr / length;
		}
		case "linreg":
			return Math.abs(linregSlope(window));
	}
}

export type TrendlineOptions = {
	method: SlopeMethod;
	multiplier: number;
	length: number;
	extensionHours: number;
	/** Open time of the newest bar the line was built from. */
	lastBarTime: number;
	barMs: number;
};

/**
 * Builds a segment anchored at the newer pivot p2. The slope comes from the
 * two pivots, or from a channel-width estimator over `values` when another
 * method is selected.
 */
export function buildTrendline(
	kind: TrendlineKind,
	p1: Pivot,
	p2: Pivot,
	values: number[],
	candles: Candle[] | undefined,
	options: TrendlineOptions,
): TrendlineSegment | undefined {
	let slope: number;
	if (options.method === "pivots") {
		slope = twoPivotSlope(p1, p2);
	} else {
		const width = channelWidthPerBar(
			options.method,
			values,
			candles,
			options.length,
		);
		if (width === undefined || options.barMs <= 0) return undefined;
		const perHour = (width * options.multiplier) / (options.barMs / HOUR_MS);
		slope = isSupport(kind) ? perHour : -perHour;
	}

	return {
		kind,
		anchorTime: p2.time,
		anchorValue: p2.value,
		slope,
		expiryTime: options.lastBarTime + options.extensionHours * HOUR_MS,
		createdAt: options.lastBarTime,
	};
}
