import { from, Subject, type Subscription, timer } from "rxjs";
import { exhaustMap, takeUntil } from "rxjs/operators";
import type {
	BarSource,
	ClosedTrade,
	Fill,
	Granularity,
	PositionSide,
	QuoteSource,
	Signal,
} from "../types";
import {
	describeError,
	EvictedInstrumentError,
	TransientDataError,
} from "../utils/errors";
import { logger } from "../utils/logger";
import { Mutex } from "../utils/mutex";
import type { HealthTracker } from "./healthTracker";
import type { Notifier } from "./notifier";
import { formatStatusMessage } from "./notifier";
import { monitorPositions } from "./positionManager";
import type { CloseResult, PositionLedger } from "./positionLedger";
import type { SignalDetector } from "./signalDetector";
import type { UniverseResolver } from "./universe";

export type EngineOptions = {
	granularity: Granularity;
	barLimit: number;
	positionNotional: number;
	checkIntervalMs: number;
};

export type EngineDeps = {
	bars: BarSource;
	quotes: QuoteSource;
	ledger: PositionLedger;
	detector: SignalDetector;
	health: HealthTracker;
	notifier: Notifier;
	resolveUniverse: UniverseResolver;
	/** Called once per closed trade, e.g. to append it to the trade log. */
	onTradeClosed?: (trade: ClosedTrade) => Promise<void>;
};

type InstrumentOutcome = "processed" | "skipped" | "failed";

export type CycleReport = {
	processed: string[];
	skipped: string[];
	failed: string[];
	evicted: string[];
	signals: Signal[];
	fills: Fill[];
};

export type ManualCloseResult =
	| CloseResult
	| { ok: false; reason: "no_quote" };

const ENTRY_SIDES: Partial<Record<Signal["type"], PositionSide>> = {
	ENTER_LONG: "LONG",
	ENTER_SHORT: "SHORT",
};

const EXIT_SIDES: Partial<Record<Signal["type"], PositionSide>> = {
	EXIT_LONG: "LONG",
	EXIT_SHORT: "SHORT",
};

/**
 * Drives one pass per active instrument per cycle:
 * bars -> detector -> ledger -> notifications, with the health tracker
 * gating who takes part. Evictions found during a cycle are applied at the
 * start of the next one, so the active set is never changed mid-iteration.
 * Instrument passes, trigger checks and manual closes hold `passLock`, so a
 * manual close runs between two passes, never inside one.
 */
export class TradingEngine {
	private readonly active = new Set<string>();
	private readonly pendingEvictions = new Set<string>();
	private readonly evicted = new Set<string>();
	private readonly passLock = new Mutex();
	private readonly stop$ = new Subject<void>();
	private subscription: Subscription | null = null;
	private inFlight: Promise<CycleReport> | null = null;
	private stopping = false;

	constructor(
		private readonly deps: EngineDeps,
		private readonly options: EngineOptions,
	) {}

	activeInstruments(): string[] {
		return [...this.active];
	}

	evictedInstruments(): string[] {
		return [...this.evicted];
	}

	addInstrument(instrument: string): void {
		if (this.evicted.delete(instrument)) {
			logger.info({ instrument }, "Re-admitted evicted instrument");
		}
		this.pendingEvictions.delete(instrument);
		this.deps.health.reset(instrument);
		// a position may have outlived the detector state (eviction, universe churn, restart)
		const held = this.deps.ledger.position(instrument);
		this.deps.detector.syncSide(instrument, held ? held.side : "FLAT");
		this.active.add(instrument);
	}

	/** Re-resolves the universe; evicted instruments that come back are re-admitted. */
	async refreshUniverse(): Promise<string[]> {
		const instruments = await this.deps.resolveUniverse();
		const next = new Set(instruments);

		for (const instrument of this.activeInstruments()) {
			if (!next.has(instrument)) {
				this.active.delete(instrument);
				this.deps.detector.forget(instrument);
			}
		}
		for (const instrument of instruments) {
			if (!this.active.has(instrument)) this.addInstrument(instrument);
		}

		logger.info(
			{ active: this.active.size, evicted: this.evicted.size },
			"Universe refreshed",
		);
		return this.activeInstruments();
	}

	async runCycle(): Promise<CycleReport> {
		const report: CycleReport = {
			processed: [],
			skipped: [],
			failed: [],
			evicted: this.sweepEvictions(),
			signals: [],
			fills: [],
		};

		const instruments = this.activeInstruments();
		for (const instrument of instruments) {
			if (this.stopping) break;
			const outcome = await this.passLock.runExclusive(() =>
				this.processInstrument(instrument, report),
			);
			report[outcome].push(instrument);
		}

		if (!this.stopping) {
			const triggered = await this.passLock.runExclusive(() =>
				this.runTriggerChecks(),
			);
			report.fills.push(...triggered);
		}

		logger.info(
			{
				processed: report.processed.length,
				skipped: report.skipped.length,
				failed: report.failed.length,
				evicted: report.evicted,
				signals: report.signals.length,
				fills: report.fills.length,
				balance: this.deps.ledger.balance,
			},
			"Cycle finished",
		);
		return report;
	}

	start(): void {
		if (this.subscription) return;
		this.stopping = false;
		this.subscription = timer(0, this.options.checkIntervalMs)
			.pipe(
				takeUntil(this.stop$),
				// a slow cycle swallows ticks instead of queueing them
				exhaustMap(() => from(this.trackCycle())),
			)
			.subscribe({
				error: (error) =>
					logger.error({ error: describeError(error) }, "Scheduler loop errored"),
			});
		logger.info(
			{ intervalSeconds: this.options.checkIntervalMs / 1000 },
			"Started trading engine",
		);
	}

	/** Stops after the in-flight instrument finishes, then checkpoints history. */
	async stop(): Promise<void> {
		this.stopping = true;
		this.stop$.next();
		this.subscription?.unsubscribe();
		this.subscription = null;
		if (this.inFlight) await this.inFlight;
		await this.deps.ledger.exportHistory();
		logger.info({ balance: this.deps.ledger.balance }, "Trading engine stopped");
	}

	/** Closes at the current quote once the in-flight instrument pass is done. */
	requestClose(instrument: string): Promise<ManualCloseResult> {
		return this.passLock.runExclusive(async (): Promise<ManualCloseResult> => {
			const price = await this.deps.quotes.getLastPrice(instrument);
			if (price === null) {
				logger.warn({ instrument }, "Manual close skipped; no quote available");
				return { ok: false, reason: "no_quote" };
			}
			const result = await this.deps.ledger.close(instrument, price, "manual");
			if (result.ok) await this.afterClose(result.fill.trade, { resetDetector: true });
			return result;
		});
	}

	async statusReport(): Promise<string> {
		const { ledger, quotes, notifier } = this.deps;
		const pnl = await ledger.unrealizedPnl(quotes);
		const text = formatStatusMessage(
			ledger.balance,
			ledger.positions(),
			pnl,
			ledger.stats(),
		);
		await notifier.status(text);
		return text;
	}

	private trackCycle(): Promise<CycleReport> {
		const cycle = this.runCycle().catch((error: unknown) => {
			// runCycle handles per-instrument errors; this is a last resort
			logger.error({ error: describeError(error) }, "Cycle failed");
			return this.emptyReport();
		});
		this.inFlight = cycle;
		return cycle;
	}

	private emptyReport(): CycleReport {
		return { processed: [], skipped: [], failed: [], evicted: [], signals: [], fills: [] };
	}

	private sweepEvictions(): string[] {
		const swept = [...this.pendingEvictions];
		for (const instrument of swept) {
			this.active.delete(instrument);
			this.evicted.add(instrument);
			this.deps.detector.forget(instrument);
		}
		this.pendingEvictions.clear();
		return swept;
	}

	private async processInstrument(
		instrument: string,
		report: CycleReport,
	): Promise<InstrumentOutcome> {
		const { health, detector } = this.deps;
		if (health.shouldSkip(instrument)) {
			logger.debug({ instrument }, "Instrument cooling down after failure");
			return "skipped";
		}

		try {
			const candles = await this.deps.bars.getBars(
				instrument,
				this.options.granularity,
				this.options.barLimit,
			);
			const detection = detector.evaluate(instrument, candles);
			if (detection.status === "insufficient_data") {
				throw new TransientDataError(
					instrument,
					`insufficient data: ${detection.received}/${detection.required} bars`,
				);
			}

			for (const signal of detection.signals) {
				report.signals.push(signal);
				const fill = await this.applySignal(signal);
				if (fill) report.fills.push(fill);
			}

			health.recordSuccess(instrument);
			return "processed";
		} catch (error) {
			this.recordFailure(instrument, error);
			return "failed";
		}
	}

	private recordFailure(instrument: string, error: unknown): void {
		const { health } = this.deps;
		health.recordFailure(instrument, describeError(error));
		if (health.shouldEvict(instrument)) {
			const eviction = new EvictedInstrumentError(
				instrument,
				health.record(instrument).consecutiveFailures,
			);
			logger.error({ instrument }, eviction.message);
			this.pendingEvictions.add(instrument);
		}
	}

	private async applySignal(signal: Signal): Promise<Fill | null> {
		const side = ENTRY_SIDES[signal.type];
		if (side) return this.enter(signal, side);
		return this.exit(signal);
	}

	private async exit(signal: Signal): Promise<Fill | null> {
		const { ledger, quotes, detector } = this.deps;
		const quote = await quotes.getLastPrice(signal.instrument);
		const price = quote ?? signal.price;
		if (quote === null) {
			logger.warn(
				{ instrument: signal.instrument, barClose: signal.price },
				"No quote for exit; using bar close",
			);
		}

		const result = await ledger.close(
			signal.instrument,
			price,
			signal.flip ? "flip" : "signal",
			EXIT_SIDES[signal.type],
		);
		if (!result.ok) {
			if (result.reason === "side_mismatch") {
				detector.syncSide(signal.instrument, result.position.side);
			}
			logger.warn(
				{ instrument: signal.instrument, signal: signal.type, reason: result.reason },
				"Exit signal does not match the ledger position; skipped",
			);
			return null;
		}
		// the detector already moved on; resetting it here would undo a flip
		await this.afterClose(result.fill.trade, { detail: signal.reason });
		return result.fill;
	}

	private async enter(signal: Signal, side: PositionSide): Promise<Fill | null> {
		const { ledger, quotes, detector, notifier } = this.deps;
		const { instrument } = signal;

		const price = await quotes.getLastPrice(instrument);
		if (price === null) {
			detector.markFlat(instrument);
			throw new TransientDataError(instrument, `no quote to open ${side}`);
		}

		const result = await ledger.open(
			instrument,
			side,
			this.options.positionNotional,
			price,
		);
		if (result.ok) {
			detector.confirmEntry(instrument);
			await notifier.opened(result.fill, signal.reason);
			return result.fill;
		}

		switch (result.reason) {
			case "insufficient_balance":
				detector.markFlat(instrument);
				await notifier.refused(
					instrument,
					side,
					result.available,
					`insufficient balance (needs ${result.required.toFixed(4)} USDT)`,
				);
				break;
			case "invalid_order":
				detector.markFlat(instrument);
				await notifier.refused(instrument, side, ledger.balance, result.detail);
				break;
			case "position_exists":
				detector.syncSide(instrument, result.position.side);
				logger.warn(
					{ instrument, existing: result.position.side, requested: side },
					"Entry ignored; position already open",
				);
				break;
		}
		return null;
	}

	private async runTriggerChecks(): Promise<Fill[]> {
		try {
			const fills = await monitorPositions(this.deps.ledger, this.deps.quotes);
			for (const fill of fills) {
				await this.afterClose(fill.trade, { resetDetector: true });
			}
			return fills;
		} catch (error) {
			logger.error({ error: describeError(error) }, "Position monitor failed");
			return [];
		}
	}

	private async afterClose(
		trade: ClosedTrade,
		options: { detail?: string; resetDetector?: boolean },
	): Promise<void> {
		if (options.resetDetector) this.deps.detector.markFlat(trade.instrument);
		await this.deps.notifier.closed(trade, options.detail);
		if (!this.deps.onTradeClosed) return;
		try {
			await this.deps.onTradeClosed(trade);
		} catch (error) {
			logger.warn(
				{ instrument: trade.instrument, error: describeError(error) },
				"Trade log append failed",
			);
		}
	}
}
