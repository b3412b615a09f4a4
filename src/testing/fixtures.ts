import type { ConditionVerdict, SignalCondition } from "../patterns";
import { emptyVerdict } from "../patterns/types";
import type {
	AccountSnapshot,
	BarSource,
	Candle,
	IndicatorParams,
	NotificationSink,
	PersistenceSink,
	QuoteSource,
} from "../types";

export const HOUR = 60 * 60 * 1000;

export const testParams: IndicatorParams = {
	rsiPeriod: 14,
	rsiEmaPeriod: 9,
	rsiOversold: 30,
	rsiOverbought: 70,
	shortEmaPeriod: 9,
	longEmaPeriod: 21,
	trendlineLength: 1,
	trendlineExtensionHours: 24,
	slopeMethod: "pivots",
	slopeMultiplier: 1,
};

export function makeCandles(closes: number[], barMs = HOUR, start = 0): Candle[] {
	return closes.map((close, i) => ({
		openTime: start + i * barMs,
		closeTime: start + (i + 1) * barMs - 1,
		open: close,
		high: close,
		low: close,
		close,
		volume: 1,
	}));
}

/** Condition that replays a fixed list of verdicts, one per evaluation. */
export function scriptedCondition(
	verdicts: Array<Partial<ConditionVerdict["triggers"]>>,
	requiredBars = 2,
): SignalCondition {
	let call = 0;
	return {
		name: "scripted",
		requiredBars: () => requiredBars,
		evaluate: () => {
			const triggers = verdicts[call] ?? {};
			call += 1;
			return { ...emptyVerdict(), triggers: { ...triggers } };
		},
	};
}

export class FakeBarSource implements BarSource {
	readonly calls: string[] = [];

	constructor(
		private readonly bars: Record<string, Candle[] | Error>,
	) {}

	async getBars(instrument: string): Promise<Candle[]> {
		this.calls.push(instrument);
		const result = this.bars[instrument];
		if (result instanceof Error) throw result;
		return result ?? [];
	}
}

export class FakeQuoteSource implements QuoteSource {
	constructor(readonly prices: Record<string, number | null> = {}) {}

	async getLastPrice(instrument: string): Promise<number | null> {
		return this.prices[instrument] ?? null;
	}
}

type SentMessage = {
	instrument: string;
	text: string;
};

export class MemoryNotificationSink implements NotificationSink {
	readonly messages: SentMessage[] = [];

	async send(instrument: string, text: string): Promise<void> {
		this.messages.push({ instrument, text });
	}
}

export class MemoryPersistenceSink implements PersistenceSink {
	readonly snapshots: AccountSnapshot[] = [];

	async export(snapshot: AccountSnapshot): Promise<void> {
		this.snapshots.push(snapshot);
	}
}
