import { describe, expect, it } from "vitest";

import { createCondition, type SignalCondition } from "../patterns";
import { emptyVerdict } from "../patterns/types";
import { HOUR, makeCandles, scriptedCondition, testParams } from "../testing/fixtures";
import type { TrendlineSegment } from "../types";
import { SignalDetector } from "./signalDetector";

const candles = makeCandles([1, 2, 3, 4, 5]);

function detector(condition: SignalCondition, cooldownMs = 0, maxStoredTrendlines = 5) {
	return new SignalDetector(condition, {
		params: testParams,
		cooldownMs,
		maxStoredTrendlines,
	});
}

function resistance(anchorTime: number, expiryTime = 1000 * HOUR): TrendlineSegment {
	return {
		kind: "price-resistance",
		anchorTime,
		anchorValue: 10,
		slope: -1,
		expiryTime,
		createdAt: anchorTime,
	};
}

/** Enters long on every call, carrying one resistance segment per call. */
function segmentCondition(segments: TrendlineSegment[]): SignalCondition {
	let call = 0;
	return {
		name: "segments",
		requiredBars: () => 2,
		evaluate: () => {
			const segment = segments[call];
			call += 1;
			const verdict = emptyVerdict();
			verdict.triggers.ENTER_LONG = "breakout";
			if (segment) verdict.segments.ENTER_LONG = [segment];
			return verdict;
		},
	};
}

function signalTypes(result: ReturnType<SignalDetector["evaluate"]>) {
	return result.status === "ok" ? result.signals.map((s) => s.type) : [];
}

describe("SignalDetector", () => {
	it("needs the condition's bars plus three", () => {
		expect(detector(createCondition("rsi")).minimumBars()).toBe(26);
	});

	it("reports insufficient data without touching state", () => {
		const d = detector(scriptedCondition([{ ENTER_LONG: "up" }]));
		expect(d.evaluate("X", candles.slice(0, 4))).toEqual({
			status: "insufficient_data",
			required: 5,
			received: 4,
		});
		expect(d.getState("X").lastSignal).toBe("FLAT");
	});

	it("evaluates the last closed bar and ignores the forming one", () => {
		const d = detector(scriptedCondition([{ ENTER_LONG: "up" }]));
		expect(d.evaluate("X", candles)).toEqual({
			status: "ok",
			signals: [
				{
					instrument: "X",
					type: "ENTER_LONG",
					price: 4,
					barTime: 3 * HOUR,
					reason: "up",
				},
			],
		});
		expect(d.getState("X").lastSignal).toBe("LONG");
	});

	it("does not repeat an entry while the side is held", () => {
		const d = detector(scriptedCondition([{ ENTER_LONG: "up" }, { ENTER_LONG: "up again" }]));
		d.evaluate("X", candles);
		expect(signalTypes(d.evaluate("X", candles))).toEqual([]);
	});

	it("ignores exits for a side it does not hold", () => {
		const d = detector(scriptedCondition([{ EXIT_LONG: "down", EXIT_SHORT: "up" }]));
		expect(signalTypes(d.evaluate("X", candles))).toEqual([]);
	});

	it("emits a flagged exit ahead of an opposite entry", () => {
		const d = detector(
			scriptedCondition([{ ENTER_LONG: "up" }, { ENTER_SHORT: "down" }]),
		);
		d.evaluate("X", candles);
		const result = d.evaluate("X", candles);

		expect(result.status).toBe("ok");
		if (result.status !== "ok") return;
		expect(result.signals.map((s) => [s.type, s.reason, s.flip])).toEqual([
			["EXIT_LONG", "flip: down", true],
			["ENTER_SHORT", "down", undefined],
		]);
		expect(d.getState("X").lastSignal).toBe("SHORT");
	});

	it("orders an explicit exit before a new entry on the same bar", () => {
		const d = detector(
			scriptedCondition([
				{ ENTER_LONG: "up" },
				{ EXIT_LONG: "weak", ENTER_SHORT: "down" },
			]),
		);
		d.evaluate("X", candles);
		const result = d.evaluate("X", candles);

		expect(result.status).toBe("ok");
		if (result.status !== "ok") return;
		expect(result.signals.map((s) => s.type)).toEqual(["EXIT_LONG", "ENTER_SHORT"]);
		expect(result.signals[0].flip).toBeUndefined();
	});

	it("takes at most one entry per bar", () => {
		const d = detector(scriptedCondition([{ ENTER_LONG: "up", ENTER_SHORT: "down" }]));
		expect(signalTypes(d.evaluate("X", candles))).toEqual(["ENTER_LONG"]);
	});

	it("suppresses a repeated signal type inside the cooldown window", () => {
		const d = detector(
			scriptedCondition([
				{ ENTER_LONG: "up" },
				{ ENTER_LONG: "up" },
				{ ENTER_LONG: "up" },
			]),
			HOUR,
		);
		d.evaluate("X", candles);
		d.markFlat("X");

		expect(signalTypes(d.evaluate("X", candles))).toEqual([]);
		expect(d.getState("X").lastSignal).toBe("FLAT");

		const nextBar = makeCandles([1, 2, 3, 4, 5, 6]);
		expect(signalTypes(d.evaluate("X", nextBar))).toEqual(["ENTER_LONG"]);
	});

	it("keeps the newest trendlines up to the configured cap", () => {
		const d = detector(
			segmentCondition([resistance(HOUR), resistance(3 * HOUR), resistance(2 * HOUR)]),
			0,
			2,
		);
		for (let i = 0; i < 3; i++) {
			d.evaluate("X", candles);
			d.confirmEntry("X");
			d.markFlat("X");
		}

		const lines = d.getState("X").trendlines["price-resistance"] ?? [];
		expect(lines.map((l) => l.anchorTime)).toEqual([3 * HOUR, 2 * HOUR]);
	});

	it("drops duplicate trendlines", () => {
		const d = detector(segmentCondition([resistance(HOUR), resistance(HOUR)]));
		d.evaluate("X", candles);
		d.confirmEntry("X");
		d.markFlat("X");
		d.evaluate("X", candles);
		d.confirmEntry("X");

		expect(d.getState("X").trendlines["price-resistance"]).toHaveLength(1);
	});

	it("prunes trendlines that expired before the evaluated bar", () => {
		const d = detector(segmentCondition([resistance(0, 2 * HOUR)]));
		d.evaluate("X", candles);
		d.confirmEntry("X");
		expect(d.getState("X").trendlines["price-resistance"]).toHaveLength(1);

		d.evaluate("X", candles);
		expect(d.getState("X").trendlines["price-resistance"]).toEqual([]);
	});

	it("hands out copies of its state", () => {
		const d = detector(segmentCondition([resistance(HOUR)]));
		d.evaluate("X", candles);
		d.confirmEntry("X");
		d.getState("X").trendlines["price-resistance"]?.pop();

		expect(d.getState("X").trendlines["price-resistance"]).toHaveLength(1);
	});

	it("holds trendlines back until the entry is confirmed", () => {
		const d = detector(segmentCondition([resistance(HOUR)]));
		d.evaluate("X", candles);
		expect(d.getState("X").trendlines).toEqual({});

		d.markFlat("X");
		d.confirmEntry("X");
		expect(d.getState("X").trendlines).toEqual({});
	});

	it("takes the side held by the ledger", () => {
		const d = detector(scriptedCondition([{ ENTER_LONG: "up", EXIT_SHORT: "up" }]));
		d.syncSide("X", "SHORT");

		const result = d.evaluate("X", candles);
		expect(result.status === "ok" && result.signals.map((s) => [s.type, s.flip])).toEqual([
			["EXIT_SHORT", undefined],
			["ENTER_LONG", undefined],
		]);
	});

	it("starts over after forget", () => {
		const d = detector(scriptedCondition([{ ENTER_LONG: "up" }]));
		d.evaluate("X", candles);
		d.forget("X");
		expect(d.getState("X")).toEqual({ lastSignal: "FLAT", trendlines: {} });
	});
});
