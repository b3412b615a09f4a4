import type {
	ClosedTrade,
	NotificationSink,
	OpenFill,
	Position,
	PositionSide,
	TradeStats,
} from "../types";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { UnrealizedPnl } from "./positionLedger";

const usdt = (value: number) => `${value.toFixed(4)} USDT`;

const CLOSE_LABELS: Record<ClosedTrade["reason"], string> = {
	signal: "exit signal",
	flip: "signal flip",
	target: "take-profit",
	"stop-loss": "stop-loss",
	manual: "manual request",
};

export function formatOpenMessage(fill: OpenFill, reason: string): string {
	const { position } = fill;
	return [
		`Opened ${position.side} ${position.instrument}`,
		`Entry: ${position.entryPrice}`,
		`Qty: ${position.quantity}`,
		`Notional: ${usdt(position.notional)}`,
		`Fee: ${usdt(position.entryFee)}`,
		`Balance: ${usdt(fill.balanceBefore)} -> ${usdt(fill.balanceAfter)}`,
		`Reason: ${reason}`,
	].join("\n");
}

export function formatCloseMessage(trade: ClosedTrade, detail?: string): string {
	return [
		`Closed ${trade.side} ${trade.instrument} (${CLOSE_LABELS[trade.reason]})`,
		`Entry: ${trade.entryPrice} Exit: ${trade.exitPrice}`,
		`Qty: ${trade.quantity}`,
		`Fees: ${usdt(trade.entryFee + trade.exitFee)}`,
		`Net PnL: ${usdt(trade.netProfit)}`,
		`Balance: ${usdt(trade.balanceBefore)} -> ${usdt(trade.balanceAfter)}`,
		...(detail ? [`Reason: ${detail}`] : []),
	].join("\n");
}

function formatRefusalMessage(
	instrument: string,
	side: PositionSide,
	balance: number,
	detail: string,
): string {
	return [
		`Skipped ${side} ${instrument}`,
		`Reason: ${detail}`,
		`Balance: ${usdt(balance)} -> ${usdt(balance)}`,
	].join("\n");
}

export function formatStatusMessage(
	balance: number,
	positions: Position[],
	pnl: UnrealizedPnl,
	stats: TradeStats,
): string {
	const lines = [
		`Balance: ${usdt(balance)}`,
		`Open positions: ${positions.length}`,
		...positions.map(
			(p) => `- ${p.instrument} ${p.side} @ ${p.entryPrice} (${usdt(p.notional)})`,
		),
		`Unrealized: ${usdt(pnl.usdt)} (${pnl.percent.toFixed(2)}%)`,
		`Trades: ${stats.trades} (wins ${stats.wins}, losses ${stats.losses}, win rate ${stats.winRate.toFixed(1)}%)`,
		`Realized net: ${usdt(stats.netProfit)}`,
	];
	if (pnl.skipped.length) {
		lines.push(`No quote: ${pnl.skipped.join(", ")}`);
	}
	return lines.join("\n");
}

/** Delivers messages through the sink; failures are logged and dropped. */
export class Notifier {
	constructor(private readonly sink: NotificationSink) {}

	async opened(fill: OpenFill, reason: string): Promise<void> {
		await this.deliver(fill.position.instrument, formatOpenMessage(fill, reason));
	}

	async closed(trade: ClosedTrade, detail?: string): Promise<void> {
		await this.deliver(trade.instrument, formatCloseMessage(trade, detail));
	}

	async refused(
		instrument: string,
		side: PositionSide,
		balance: number,
		detail: string,
	): Promise<void> {
		await this.deliver(instrument, formatRefusalMessage(instrument, side, balance, detail));
	}

	async status(text: string): Promise<void> {
		await this.deliver("*", text);
	}

	private async deliver(instrument: string, text: string): Promise<void> {
		try {
			await this.sink.send(instrument, text);
		} catch (error) {
			logger.warn(
				{ instrument, error: describeError(error) },
				"Notification send failed",
			);
		}
	}
}
