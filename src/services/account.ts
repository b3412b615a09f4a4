import type { AccountSnapshot, ClosedTrade, Position, TradeStats } from "../types";
import { BoundedLog } from "../utils/boundedLog";
import { Mutex } from "../utils/mutex";

/**
 * Virtual balance plus the bounded log of closed trades. Every mutation
 * goes through `runExclusive`, so no two fills observe the same balance.
 */
export class Account {
	private balanceUsdt: number;
	private readonly history: BoundedLog<ClosedTrade>;
	private readonly lock = new Mutex();
	private closedCount = 0;

	constructor(initialBalance: number, historyCap: number, restored: ClosedTrade[] = []) {
		this.balanceUsdt = initialBalance;
		this.history = new BoundedLog<ClosedTrade>(historyCap);
		for (const trade of restored) this.history.push(trade);
	}

	get balance(): number {
		return this.balanceUsdt;
	}

	/** Closed trades recorded since this process started. */
	get closedTrades(): number {
		return this.closedCount;
	}

	runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
		return this.lock.runExclusive(task);
	}

	debit(amount: number): void {
		this.balanceUsdt -= amount;
	}

	credit(amount: number): void {
		this.balanceUsdt += amount;
	}

	recordTrade(trade: ClosedTrade): ClosedTrade | undefined {
		this.closedCount += 1;
		return this.history.push(trade);
	}

	trades(): ClosedTrade[] {
		return this.history.toArray();
	}

	/** Balance excludes the notional and entry fees locked in `positions`. */
	snapshot(positions: Position[], now = Date.now()): AccountSnapshot {
		return {
			balance: this.balanceUsdt,
			positions: positions.map((p) => ({ ...p })),
			history: this.trades(),
			exportedAt: now,
		};
	}

	stats(): TradeStats {
		const trades = this.trades();
		const wins = trades.filter((t) => t.netProfit > 0).length;
		return {
			trades: trades.length,
			wins,
			losses: trades.length - wins,
			winRate: trades.length ? (wins / trades.length) * 100 : 0,
			netProfit: trades.reduce((acc, t) => acc + t.netProfit, 0),
			fees: trades.reduce((acc, t) => acc + t.entryFee + t.exitFee, 0),
		};
	}
}
