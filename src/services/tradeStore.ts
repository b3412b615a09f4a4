import { z } from "zod";
import { config } from "../config";
import type { AccountSnapshot, PersistenceSink } from "../types";
import { logger } from "../utils/logger";
import { readJson, writeJson } from "../utils/storage";

const PositionSideSchema = z.enum(["LONG", "SHORT"]);

const PositionSchema = z.object({
	instrument: z.string().min(1),
	side: PositionSideSchema,
	entryPrice: z.number().positive(),
	quantity: z.number().positive(),
	notional: z.number().positive(),
	entryFee: z.number().nonnegative(),
	openedAt: z.number(),
});

const ClosedTradeSchema = z.object({
	instrument: z.string().min(1),
	side: PositionSideSchema,
	entryPrice: z.number(),
	exitPrice: z.number(),
	quantity: z.number(),
	entryFee: z.number(),
	exitFee: z.number(),
	netProfit: z.number(),
	netProceeds: z.number(),
	balanceBefore: z.number(),
	balanceAfter: z.number(),
	openedAt: z.number(),
	closedAt: z.number(),
	reason: z.enum(["signal", "flip", "target", "stop-loss", "manual"]),
});

const AccountSnapshotSchema = z.object({
	balance: z.number(),
	// snapshots written before positions were tracked carry none
	positions: z.array(PositionSchema).default([]),
	history: z.array(ClosedTradeSchema),
	exportedAt: z.number(),
});

/** Writes account snapshots as a single JSON document. */
export class FilePersistenceSink implements PersistenceSink {
	constructor(private readonly filePath: string = config.paths.tradeHistory) {}

	async export(snapshot: AccountSnapshot): Promise<void> {
		await writeJson(this.filePath, snapshot);
	}

	/** Null when nothing was exported yet; throws on a malformed file. */
	async load(): Promise<AccountSnapshot | null> {
		const stored = await readJson<unknown>(this.filePath, null);
		if (stored === null) return null;

		const parsed = AccountSnapshotSchema.safeParse(stored);
		if (!parsed.success) {
			const issues = parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
				.join("; ");
			throw new Error(`Malformed trade history in ${this.filePath}: ${issues}`);
		}

		const snapshot: AccountSnapshot = parsed.data;
		logger.info(
			{
				trades: snapshot.history.length,
				positions: snapshot.positions.length,
				balance: snapshot.balance,
			},
			"Restored trade history",
		);
		return snapshot;
	}
}
