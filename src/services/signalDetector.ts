import { buildIndicatorSeries } from "../indicators";
import { TRENDLINE_KINDS } from "../indicators/trendline";
import type { ConditionVerdict, SignalCondition } from "../patterns";
import type {
	Candle,
	EnterSignalType,
	IndicatorParams,
	Signal,
	SignalDirection,
	SignalState,
	SignalType,
	TrendlineKind,
	TrendlineSegment,
} from "../types";
import { logger } from "../utils/logger";

export type DetectorOptions = {
	params: IndicatorParams;
	cooldownMs: number;
	maxStoredTrendlines: number;
};

export type DetectionResult =
	| { status: "ok"; signals: Signal[] }
	| { status: "insufficient_data"; required: number; received: number };

type InstrumentMemory = {
	state: SignalState;
	lastEmitted: Partial<Record<SignalType, number>>;
	/** Segments of the last Enter, kept only once the position is confirmed open. */
	pendingSegments: TrendlineSegment[];
};

const ENTRY_SIDE: Record<EnterSignalType, SignalDirection> = {
	ENTER_LONG: "LONG",
	ENTER_SHORT: "SHORT",
};

function freshState(): SignalState {
	return { lastSignal: "FLAT", trendlines: {} };
}

export class SignalDetector {
	private readonly memory = new Map<string, InstrumentMemory>();

	constructor(
		private readonly condition: SignalCondition,
		private readonly options: DetectorOptions,
	) {}

	get strategyName(): string {
		return this.condition.name;
	}

	minimumBars(): number {
		return this.condition.requiredBars(this.options.params) + 3;
	}

	getState(instrument: string): SignalState {
		const { state } = this.memoryOf(instrument);
		const trendlines: SignalState["trendlines"] = {};
		for (const kind of TRENDLINE_KINDS) {
			const lines = state.trendlines[kind];
			if (lines) trendlines[kind] = [...lines];
		}
		return { lastSignal: state.lastSignal, trendlines };
	}

	/** Position went away outside the detector (target, stop, refusal, manual). */
	markFlat(instrument: string): void {
		this.syncSide(instrument, "FLAT");
	}

	/**
	 * Aligns the state machine with the side the ledger actually holds.
	 * Segments of an unconfirmed Enter are discarded.
	 */
	syncSide(instrument: string, side: SignalDirection): void {
		const memory = this.memoryOf(instrument);
		if (memory.state.lastSignal !== side) {
			logger.debug(
				{ instrument, from: memory.state.lastSignal, to: side },
				"Detector state aligned with ledger",
			);
		}
		memory.state.lastSignal = side;
		memory.pendingSegments = [];
	}

	/** The ledger accepted the last Enter; its trendlines are retained now. */
	confirmEntry(instrument: string): void {
		const memory = this.memoryOf(instrument);
		this.retain(memory.state, memory.pendingSegments);
		memory.pendingSegments = [];
	}

	forget(instrument: string): void {
		this.memory.delete(instrument);
	}

	/**
	 * Runs the condition on the newest closed bar. The last bar of `candles`
	 * is treated as still forming and ignored.
	 */
	evaluate(instrument: string, candles: Candle[]): DetectionResult {
		const required = this.minimumBars();
		if (candles.length < required) {
			logger.info(
				{ instrument, required, received: candles.length },
				"Insufficient bars for signal detection",
			);
			return { status: "insufficient_data", required, received: candles.length };
		}

		const closed = candles.slice(0, -1);
		const index = closed.length - 1;
		const bar = closed[index];
		const memory = this.memoryOf(instrument);
		this.pruneExpired(memory.state, bar.openTime);

		const verdict = this.condition.evaluate({
			candles: closed,
			series: buildIndicatorSeries(closed, this.options.params),
			index,
			state: this.getState(instrument),
			params: this.options.params,
		});

		const signals = this.applyTransitions(instrument, memory, verdict, bar);
		if (signals.length) {
			logger.info(
				{
					instrument,
					strategy: this.condition.name,
					signals: signals.map((s) => s.type),
					barTime: bar.openTime,
				},
				"Signals detected",
			);
		}
		return { status: "ok", signals };
	}

	private applyTransitions(
		instrument: string,
		memory: InstrumentMemory,
		verdict: ConditionVerdict,
		bar: Candle,
	): Signal[] {
		const { state } = memory;
		const signals: Signal[] = [];
		const emit = (type: SignalType, reason: string, flip = false) => {
			signals.push({
				instrument,
				type,
				price: bar.close,
				barTime: bar.openTime,
				reason,
				...(flip ? { flip } : {}),
			});
			memory.lastEmitted[type] = bar.openTime;
		};

		const exitLong = verdict.triggers.EXIT_LONG;
		if (
			state.lastSignal === "LONG" &&
			exitLong &&
			!this.coolingDown(instrument, memory, "EXIT_LONG", bar.openTime)
		) {
			emit("EXIT_LONG", exitLong);
			state.lastSignal = "FLAT";
		}

		const exitShort = verdict.triggers.EXIT_SHORT;
		if (
			state.lastSignal === "SHORT" &&
			exitShort &&
			!this.coolingDown(instrument, memory, "EXIT_SHORT", bar.openTime)
		) {
			emit("EXIT_SHORT", exitShort);
			state.lastSignal = "FLAT";
		}

		for (const type of ["ENTER_LONG", "ENTER_SHORT"] as const) {
			const reason = verdict.triggers[type];
			const side = ENTRY_SIDE[type];
			if (!reason || state.lastSignal === side) continue;
			if (this.coolingDown(instrument, memory, type, bar.openTime)) continue;

			if (state.lastSignal !== "FLAT") {
				// flip: the open side is closed before the new one opens
				emit(
					state.lastSignal === "LONG" ? "EXIT_LONG" : "EXIT_SHORT",
					`flip: ${reason}`,
					true,
				);
			}
			emit(type, reason);
			state.lastSignal = side;
			memory.pendingSegments = verdict.segments[type] ?? [];
			// at most one entry per bar
			break;
		}

		return signals;
	}

	private coolingDown(
		instrument: string,
		memory: InstrumentMemory,
		type: SignalType,
		time: number,
	): boolean {
		const last = memory.lastEmitted[type];
		if (last === undefined || time - last >= this.options.cooldownMs) return false;
		logger.debug(
			{ instrument, type, lastEmitted: last, barTime: time },
			"Signal suppressed by cooldown",
		);
		return true;
	}

	private retain(state: SignalState, segments: TrendlineSegment[]): void {
		const kinds = new Set<TrendlineKind>(segments.map((s) => s.kind));
		for (const kind of kinds) {
			const merged = [...(state.trendlines[kind] ?? [])];
			for (const segment of segments.filter((s) => s.kind === kind)) {
				const duplicate = merged.some(
					(s) => s.anchorTime === segment.anchorTime && s.slope === segment.slope,
				);
				if (!duplicate) merged.push(segment);
			}
			state.trendlines[kind] = merged
				.sort((a, b) => b.anchorTime - a.anchorTime)
				.slice(0, this.options.maxStoredTrendlines);
		}
	}

	private pruneExpired(state: SignalState, time: number): void {
		for (const kind of TRENDLINE_KINDS) {
			const lines = state.trendlines[kind];
			if (!lines) continue;
			const alive = lines.filter((line) => line.expiryTime >= time);
			if (alive.length !== lines.length) {
				logger.debug(
					{ kind, expired: lines.length - alive.length },
					"Dropped expired trendlines",
				);
			}
			state.trendlines[kind] = alive;
		}
	}

	private memoryOf(instrument: string): InstrumentMemory {
		let memory = this.memory.get(instrument);
		if (!memory) {
			memory = { state: freshState(), lastEmitted: {}, pendingSegments: [] };
			this.memory.set(instrument, memory);
		}
		return memory;
	}
}
