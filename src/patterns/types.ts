import type {
	Candle,
	EnterSignalType,
	IndicatorParams,
	IndicatorSeries,
	SignalState,
	SignalType,
	TrendlineSegment,
} from "../types";

export type ConditionContext = {
	/** Closed bars only; the newest is the one being evaluated. */
	candles: Candle[];
	series: IndicatorSeries;
	index: number;
	state: SignalState;
	params: IndicatorParams;
};

export type ConditionVerdict = {
	/** Triggered signal types mapped to a human readable reason. */
	triggers: Partial<Record<SignalType, string>>;
	/** Segments to retain when the matching Enter signal is accepted. */
	segments: Partial<Record<EnterSignalType, TrendlineSegment[]>>;
};

export interface SignalCondition {
	readonly name: string;
	requiredBars(params: IndicatorParams): number;
	evaluate(ctx: ConditionContext): ConditionVerdict;
}

export function emptyVerdict(): ConditionVerdict {
	return { triggers: {}, segments: {} };
}
