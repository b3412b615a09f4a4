import { from, lastValueFrom } from "rxjs";
import { mergeMap, toArray } from "rxjs/operators";
import type {
	CloseFill,
	CloseReason,
	ClosedTrade,
	OpenFill,
	PersistenceSink,
	Position,
	PositionSide,
	QuoteSource,
	TradeStats,
} from "../types";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { Account } from "./account";
import type { LedgerStore } from "./ledgerStore";

const BALANCE_EPSILON = 1e-9;
const THRESHOLD_EPSILON = 1e-9;

export type LedgerOptions = {
	feeRatePercent: number;
	takeProfitPercent: number;
	stopLossPercent: number;
	/** Export the account snapshot after every Nth close. */
	exportEvery: number;
};

export type OpenResult =
	| { ok: true; fill: OpenFill }
	| {
			ok: false;
			reason: "insufficient_balance";
			required: number;
			available: number;
	  }
	| { ok: false; reason: "position_exists"; position: Position }
	| { ok: false; reason: "invalid_order"; detail: string };

export type CloseResult =
	| { ok: true; fill: CloseFill }
	| { ok: false; reason: "no_position" }
	| { ok: false; reason: "side_mismatch"; position: Position };

export type UnrealizedPnl = {
	usdt: number;
	percent: number;
	skipped: string[];
};

function directionalPnl(
	side: PositionSide,
	entryPrice: number,
	price: number,
	quantity: number,
): number {
	const diff = side === "LONG" ? price - entryPrice : entryPrice - price;
	return diff * quantity;
}

function unrealizedPercent(position: Position, price: number): number {
	const diff =
		position.side === "LONG"
			? price - position.entryPrice
			: position.entryPrice - price;
	return (diff * 100) / position.entryPrice;
}

export class PositionLedger {
	constructor(
		private readonly account: Account,
		private readonly store: LedgerStore,
		private readonly persistence: PersistenceSink,
		private readonly options: LedgerOptions,
		private readonly now: () => number = Date.now,
	) {}

	get balance(): number {
		return this.account.balance;
	}

	get feeRate(): number {
		return this.options.feeRatePercent / 100;
	}

	position(instrument: string): Position | undefined {
		return this.store.get(instrument);
	}

	positions(): Position[] {
		return this.store.list();
	}

	stats(): TradeStats {
		return this.account.stats();
	}

	trades(): ClosedTrade[] {
		return this.account.trades();
	}

	async open(
		instrument: string,
		side: PositionSide,
		notional: number,
		price: number,
	): Promise<OpenResult> {
		if (!(price > 0) || !(notional > 0)) {
			logger.warn({ instrument, price, notional }, "Rejected open with invalid size or price");
			return {
				ok: false,
				reason: "invalid_order",
				detail: `notional ${notional} at price ${price}`,
			};
		}

		return this.account.runExclusive((): OpenResult => {
			const existing = this.store.get(instrument);
			if (existing) {
				logger.warn(
					{ instrument, side: existing.side },
					"Open rejected; instrument already has a position",
				);
				return { ok: false, reason: "position_exists", position: existing };
			}

			const entryFee = notional * this.feeRate;
			const required = notional + entryFee;
			const balanceBefore = this.account.balance;
			if (balanceBefore < required) {
				logger.warn(
					{ instrument, required, available: balanceBefore },
					"Insufficient balance to open position",
				);
				return {
					ok: false,
					reason: "insufficient_balance",
					required,
					available: balanceBefore,
				};
			}

			const position: Position = {
				instrument,
				side,
				entryPrice: price,
				quantity: notional / price,
				notional,
				entryFee,
				openedAt: this.now(),
			};
			this.account.debit(required);
			this.store.insert(position);
			const balanceAfter = this.account.balance;
			this.assertBalance(instrument, "OPEN", balanceBefore - required, balanceAfter);

			logger.info(
				{
					instrument,
					side,
					price,
					quantity: position.quantity,
					entryFee,
					balanceBefore,
					balanceAfter,
				},
				"Opened position",
			);
			return {
				ok: true,
				fill: { kind: "OPEN", position, debit: required, balanceBefore, balanceAfter },
			};
		});
	}

	/**
	 * Settles the open position at `exitPrice`. When `side` is given, a
	 * position held on the other side is left untouched.
	 */
	async close(
		instrument: string,
		exitPrice: number,
		reason: CloseReason = "signal",
		side?: PositionSide,
	): Promise<CloseResult> {
		const outcome = await this.account.runExclusive((): {
			result: CloseResult;
			exportDue: boolean;
		} => {
			const position = this.store.get(instrument);
			if (!position) {
				logger.warn({ instrument, reason }, "Close requested without an open position");
				return { result: { ok: false, reason: "no_position" }, exportDue: false };
			}
			if (side && position.side !== side) {
				logger.warn(
					{ instrument, held: position.side, requested: side, reason },
					"Close refused; position is on the other side",
				);
				return {
					result: { ok: false, reason: "side_mismatch", position },
					exportDue: false,
				};
			}

			const pnl = directionalPnl(
				position.side,
				position.entryPrice,
				exitPrice,
				position.quantity,
			);
			const proceeds = position.notional + pnl;
			const exitFee = position.quantity * exitPrice * this.feeRate;
			const netProceeds = proceeds - exitFee;
			const balanceBefore = this.account.balance;

			this.account.credit(netProceeds);
			this.store.remove(instrument);
			const balanceAfter = this.account.balance;

			const trade: ClosedTrade = {
				instrument,
				side: position.side,
				entryPrice: position.entryPrice,
				exitPrice,
				quantity: position.quantity,
				entryFee: position.entryFee,
				exitFee,
				netProfit: pnl - position.entryFee - exitFee,
				netProceeds,
				balanceBefore,
				balanceAfter,
				openedAt: position.openedAt,
				closedAt: this.now(),
				reason,
			};
			const evicted = this.account.recordTrade(trade);
			if (evicted) {
				logger.debug(
					{ instrument: evicted.instrument, closedAt: evicted.closedAt },
					"Evicted oldest trade from history",
				);
			}
			this.assertBalance(instrument, "CLOSE", balanceBefore + netProceeds, balanceAfter);

			logger.info(
				{
					instrument,
					side: position.side,
					exitPrice,
					netProfit: trade.netProfit,
					netProceeds,
					balanceAfter,
					reason,
				},
				"Closed position",
			);

			const exportDue =
				this.options.exportEvery > 0 &&
				this.account.closedTrades % this.options.exportEvery === 0;
			const fill: CloseFill = { kind: "CLOSE", trade };
			return { result: { ok: true, fill }, exportDue };
		});

		if (outcome.exportDue) await this.exportHistory();
		return outcome.result;
	}

	/**
	 * Closes the position when its unrealized move reaches the take-profit
	 * or stop-loss percentage. Returns null when nothing tripped.
	 */
	async checkExogenousTriggers(
		instrument: string,
		currentPrice: number,
	): Promise<CloseFill | null> {
		const position = this.store.get(instrument);
		if (!position) {
			logger.warn({ instrument }, "Trigger check on instrument without a position");
			return null;
		}

		const percent = unrealizedPercent(position, currentPrice);
		let reason: CloseReason | null = null;
		if (percent >= this.options.takeProfitPercent - THRESHOLD_EPSILON) {
			reason = "target";
		} else if (percent <= -this.options.stopLossPercent + THRESHOLD_EPSILON) {
			reason = "stop-loss";
		}

		logger.debug({ instrument, currentPrice, percent, reason }, "Monitoring position");
		if (!reason) return null;

		const result = await this.close(instrument, currentPrice, reason);
		return result.ok ? result.fill : null;
	}

	async unrealizedPnl(quotes: QuoteSource): Promise<UnrealizedPnl> {
		const marks = await lastValueFrom(
			from(this.store.list()).pipe(
				mergeMap(async (position) => {
					try {
						const price = await quotes.getLastPrice(position.instrument);
						return { position, price };
					} catch (error) {
						logger.warn(
							{ instrument: position.instrument, error: describeError(error) },
							"Quote fetch failed during mark-to-market",
						);
						return { position, price: null };
					}
				}, 5),
				toArray(),
			),
		);

		let usdt = 0;
		let notional = 0;
		const skipped: string[] = [];
		for (const { position, price } of marks) {
			if (price === null) {
				logger.warn({ instrument: position.instrument }, "Quote unavailable; skipped in unrealized P&L");
				skipped.push(position.instrument);
				continue;
			}
			usdt += directionalPnl(position.side, position.entryPrice, price, position.quantity);
			notional += position.notional;
		}

		return { usdt, percent: notional > 0 ? (usdt / notional) * 100 : 0, skipped };
	}

	async exportHistory(): Promise<void> {
		const snapshot = this.account.snapshot(this.store.list(), this.now());
		try {
			await this.persistence.export(snapshot);
			logger.info(
				{ trades: snapshot.history.length, positions: snapshot.positions.length },
				"Exported trade history",
			);
		} catch (error) {
			logger.error({ error: describeError(error) }, "Trade history export failed");
		}
	}

	private assertBalance(
		instrument: string,
		kind: "OPEN" | "CLOSE",
		expected: number,
		actual: number,
	): void {
		if (Math.abs(expected - actual) <= BALANCE_EPSILON) return;
		logger.error(
			{ instrument, kind, expected, actual, drift: actual - expected },
			"BalanceMismatch after ledger mutation",
		);
	}
}
