import { describe, expect, it } from "vitest";

import { HOUR, makeCandles } from "../testing/fixtures";
import {
	buildTrendline,
	channelWidthPerBar,
	trendlineValueAt,
	twoPivotSlope,
} from "./trendline";

const p1 = { index: 0, time: 0, value: 100 };
const p2 = { index: 2, time: 2 * HOUR, value: 110 };

const baseOptions = {
	method: "pivots" as const,
	multiplier: 1,
	length: 4,
	extensionHours: 24,
	lastBarTime: 4 * HOUR,
	barMs: HOUR,
};

describe("twoPivotSlope", () => {
	it("divides the value change by the hours between pivots", () => {
		expect(twoPivotSlope(p1, p2)).toBe(5);
	});

	it("is flat when both pivots share a timestamp", () => {
		expect(twoPivotSlope(p1, { ...p2, time: 0 })).toBe(0);
	});
});

describe("buildTrendline", () => {
	it("anchors at the newer pivot and expires after the extension", () => {
		const line = buildTrendline("price-resistance", p1, p2, [], undefined, baseOptions);
		expect(line).toEqual({
			kind: "price-resistance",
			anchorTime: 2 * HOUR,
			anchorValue: 110,
			slope: 5,
			expiryTime: 28 * HOUR,
			createdAt: 4 * HOUR,
		});
	});

	it("descends resistance by the stdev channel width", () => {
		const line = buildTrendline("price-resistance", p1, p2, [1, 2, 3, 4], undefined, {
			...baseOptions,
			method: "stdev",
			multiplier: 2,
		});
		expect(line?.slope).toBeCloseTo(-(Math.sqrt(1.25) / 4) * 2, 10);
	});

	it("raises support by the regression slope per hour", () => {
		const line = buildTrendline("price-support", p1, p2, [1, 3, 5, 7], undefined, {
			...baseOptions,
			method: "linreg",
			barMs: 2 * HOUR,
		});
		expect(line?.slope).toBeCloseTo(1, 10);
	});
});

describe("channelWidthPerBar", () => {
	it("uses mean absolute change for ATR on an indicator line", () => {
		expect(channelWidthPerBar("atr", [1, 3, 2, 4], undefined, 3)).toBeCloseTo(5 / 9, 10);
	});

	it("uses candle ATR when candles are given", () => {
		const candles = makeCandles([10, 10, 10, 10]).map((c) => ({ ...c, high: 11, low: 8 }));
		expect(channelWidthPerBar("atr", [10, 10, 10, 10], candles, 3)).toBe(1);
	});

	it("returns undefined when the window cannot fill", () => {
		expect(channelWidthPerBar("stdev", [1, 2], undefined, 3)).toBeUndefined();
	});
});

describe("trendlineValueAt", () => {
	const line = buildTrendline("price-resistance", p1, p2, [], undefined, baseOptions);

	it("projects the line forward from its anchor", () => {
		expect(line && trendlineValueAt(line, 3 * HOUR)).toBe(115);
	});

	it("stops answering after expiry", () => {
		expect(line && trendlineValueAt(line, 29 * HOUR)).toBeUndefined();
	});
});
