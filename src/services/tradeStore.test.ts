import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { AccountSnapshot, ClosedTrade } from "../types";
import { logTrade } from "./tradeLogger";
import { FilePersistenceSink } from "./tradeStore";

const trade: ClosedTrade = {
	instrument: "BTCUSDT",
	side: "LONG",
	entryPrice: 100,
	exitPrice: 110,
	quantity: 0.15,
	entryFee: 0.015,
	exitFee: 0.0165,
	netProfit: 1.4685,
	netProceeds: 16.4835,
	balanceBefore: 984.985,
	balanceAfter: 1001.4685,
	openedAt: 1,
	closedAt: 2,
	reason: "target",
};

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(path.join(tmpdir(), "ledger-"));
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
});

describe("FilePersistenceSink", () => {
	it("returns null before the first export", async () => {
		const sink = new FilePersistenceSink(path.join(dir, "history.json"));
		expect(await sink.load()).toBeNull();
	});

	it("restores the exported snapshot", async () => {
		const sink = new FilePersistenceSink(path.join(dir, "nested", "history.json"));
		const snapshot: AccountSnapshot = {
			balance: 986.4535,
			positions: [
				{
					instrument: "ETHUSDT",
					side: "SHORT",
					entryPrice: 50,
					quantity: 0.3,
					notional: 15,
					entryFee: 0.015,
					openedAt: 2,
				},
			],
			history: [trade],
			exportedAt: 3,
		};
		await sink.export(snapshot);

		expect(await sink.load()).toEqual(snapshot);
	});

	it("reads files written without positions", async () => {
		const file = path.join(dir, "history.json");
		await writeFile(file, JSON.stringify({ balance: 1000, history: [], exportedAt: 1 }), "utf8");

		expect(await new FilePersistenceSink(file).load()).toEqual({
			balance: 1000,
			positions: [],
			history: [],
			exportedAt: 1,
		});
	});

	it("rejects a file without trade history", async () => {
		const file = path.join(dir, "history.json");
		await writeFile(file, JSON.stringify({ balance: 1000, exportedAt: 1 }), "utf8");

		await expect(new FilePersistenceSink(file).load()).rejects.toThrow(
			`Malformed trade history in ${file}: history: Required`,
		);
	});
});

describe("logTrade", () => {
	it("appends one JSON line per trade", async () => {
		const file = path.join(dir, "trades.log");
		await logTrade(trade, file);
		await logTrade({ ...trade, instrument: "ETHUSDT" }, file);

		const lines = (await readFile(file, "utf8")).trimEnd().split("\n");
		expect(lines.map((line) => JSON.parse(line).instrument)).toEqual(["BTCUSDT", "ETHUSDT"]);
	});
});
