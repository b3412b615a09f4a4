import { describe, expect, it } from "vitest";

import type { ClosedTrade, NotificationSink, OpenFill } from "../types";
import { formatCloseMessage, formatOpenMessage, formatStatusMessage, Notifier } from "./notifier";

const trade: ClosedTrade = {
	instrument: "BTCUSDT",
	side: "SHORT",
	entryPrice: 100,
	exitPrice: 90,
	quantity: 0.15,
	entryFee: 0.015,
	exitFee: 0.0135,
	netProfit: 1.4715,
	netProceeds: 16.4865,
	balanceBefore: 984.985,
	balanceAfter: 1001.4715,
	openedAt: 0,
	closedAt: 1,
	reason: "signal",
};

describe("message formatting", () => {
	it("describes an opened position", () => {
		const fill: OpenFill = {
			kind: "OPEN",
			position: {
				instrument: "BTCUSDT",
				side: "LONG",
				entryPrice: 100,
				quantity: 0.15,
				notional: 15,
				entryFee: 0.015,
				openedAt: 0,
			},
			debit: 15.015,
			balanceBefore: 1000,
			balanceAfter: 984.985,
		};

		expect(formatOpenMessage(fill, "RSI crossed above 30").split("\n")).toEqual([
			"Opened LONG BTCUSDT",
			"Entry: 100",
			"Qty: 0.15",
			"Notional: 15.0000 USDT",
			"Fee: 0.0150 USDT",
			"Balance: 1000.0000 USDT -> 984.9850 USDT",
			"Reason: RSI crossed above 30",
		]);
	});

	it("describes a closed trade with an optional reason line", () => {
		expect(formatCloseMessage(trade).split("\n")).toEqual([
			"Closed SHORT BTCUSDT (exit signal)",
			"Entry: 100 Exit: 90",
			"Qty: 0.15",
			"Fees: 0.0285 USDT",
			"Net PnL: 1.4715 USDT",
			"Balance: 984.9850 USDT -> 1001.4715 USDT",
		]);
		expect(formatCloseMessage(trade, "MACD flipped").split("\n").pop()).toBe(
			"Reason: MACD flipped",
		);
	});

	it("lists positions without quotes in the status", () => {
		const text = formatStatusMessage(
			1000,
			[],
			{ usdt: 0, percent: 0, skipped: ["ETHUSDT"] },
			{ trades: 0, wins: 0, losses: 0, winRate: 0, netProfit: 0, fees: 0 },
		);
		expect(text.split("\n").pop()).toBe("No quote: ETHUSDT");
	});
});

describe("Notifier", () => {
	it("keeps going when the sink fails", async () => {
		const sink: NotificationSink = {
			send: async () => {
				throw new Error("chat unreachable");
			},
		};
		await expect(new Notifier(sink).closed(trade)).resolves.toBeUndefined();
	});
});
