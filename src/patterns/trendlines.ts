import { buildTrendline, trendlineValueAt } from "../indicators/trendline";
import type {
	Candle,
	Pivot,
	Series,
	TrendlineKind,
	TrendlineSegment,
} from "../types";
import { crossOver, crossUnder } from "./crosses";
import { type ConditionContext, emptyVerdict, type SignalCondition } from "./types";

type TrendlineSource = "price" | "rsi";

type SourceView = {
	values: Series;
	highs: Pivot[];
	lows: Pivot[];
	candles: Candle[] | undefined;
	support: TrendlineKind;
	resistance: TrendlineKind;
};

function viewOf(source: TrendlineSource, ctx: ConditionContext): SourceView {
	if (source === "price") {
		return {
			values: ctx.candles.map((c) => c.close),
			highs: ctx.series.pivotHighs,
			lows: ctx.series.pivotLows,
			candles: ctx.candles,
			support: "price-support",
			resistance: "price-resistance",
		};
	}
	return {
		values: ctx.series.rsi,
		highs: ctx.series.rsiPivotHighs,
		lows: ctx.series.rsiPivotLows,
		candles: undefined,
		support: "rsi-support",
		resistance: "rsi-resistance",
	};
}

function definedUpTo(values: Series, index: number): number[] {
	return values
		.slice(0, index + 1)
		.filter((v): v is number => v !== undefined);
}

function barMsOf(candles: Candle[]): number {
	if (candles.length < 2) return 0;
	return candles[candles.length - 1].openTime - candles[candles.length - 2].openTime;
}

function lineFrom(
	kind: TrendlineKind,
	pivots: Pivot[],
	view: SourceView,
	ctx: ConditionContext,
): TrendlineSegment | undefined {
	if (pivots.length < 2) return undefined;
	const [p1, p2] = pivots.slice(-2);
	return buildTrendline(
		kind,
		p1,
		p2,
		definedUpTo(view.values, ctx.index),
		view.candles,
		{
			method: ctx.params.slopeMethod,
			multiplier: ctx.params.slopeMultiplier,
			length: ctx.params.trendlineLength,
			extensionHours: ctx.params.trendlineExtensionHours,
			lastBarTime: ctx.candles[ctx.index].openTime,
			barMs: barMsOf(ctx.candles),
		},
	);
}

type Crossing = "over" | "under";

function crosses(
	segment: TrendlineSegment | undefined,
	direction: Crossing,
	view: SourceView,
	ctx: ConditionContext,
): boolean {
	if (!segment || ctx.index < 1) return false;
	const prevTime = ctx.candles[ctx.index - 1].openTime;
	const currTime = ctx.candles[ctx.index].openTime;
	// only the part of the line after its anchor is tradable
	if (prevTime < segment.anchorTime) return false;

	const prev = view.values[ctx.index - 1];
	const curr = view.values[ctx.index];
	const prevLine = trendlineValueAt(segment, prevTime);
	const currLine = trendlineValueAt(segment, currTime);
	if (prev === undefined || curr === undefined) return false;
	if (prevLine === undefined || currLine === undefined) return false;

	return direction === "over"
		? crossOver(prev - prevLine, curr - currLine, 0)
		: crossUnder(prev - prevLine, curr - currLine, 0);
}

function retained(ctx: ConditionContext, kind: TrendlineKind): TrendlineSegment[] {
	return ctx.state.trendlines[kind] ?? [];
}

/**
 * Breakout of the line through the two latest pivot highs opens a long,
 * breakdown through the line over the two latest pivot lows opens a short.
 * A long is closed when the source falls back under a retained resistance
 * line or under the live support line; shorts mirror that.
 */
export function trendlineBreakout(source: TrendlineSource): SignalCondition {
	return {
		name: source === "price" ? "trendline" : "rsi-trendline",
		requiredBars: (params) =>
			(source === "rsi" ? params.rsiPeriod : 0) + 2 * params.trendlineLength + 1,
		evaluate: (ctx) => {
			const verdict = emptyVerdict();
			const view = viewOf(source, ctx);
			const resistance = lineFrom(view.resistance, view.highs, view, ctx);
			const support = lineFrom(view.support, view.lows, view, ctx);

			const brokenResistance = retained(ctx, view.resistance).find((line) =>
				crosses(line, "under", view, ctx),
			);
			if (brokenResistance || crosses(support, "under", view, ctx)) {
				verdict.triggers.EXIT_LONG = brokenResistance
					? `${source} fell back under ${view.resistance} line`
					: `${source} broke ${view.support} line`;
			}

			const brokenSupport = retained(ctx, view.support).find((line) =>
				crosses(line, "over", view, ctx),
			);
			if (brokenSupport || crosses(resistance, "over", view, ctx)) {
				verdict.triggers.EXIT_SHORT = brokenSupport
					? `${source} climbed back over ${view.support} line`
					: `${source} broke ${view.resistance} line`;
			}

			if (resistance && crosses(resistance, "over", view, ctx)) {
				verdict.triggers.ENTER_LONG = `${source} broke above ${view.resistance} line`;
				verdict.segments.ENTER_LONG = [resistance];
			}
			if (support && crosses(support, "under", view, ctx)) {
				verdict.triggers.ENTER_SHORT = `${source} broke below ${view.support} line`;
				verdict.segments.ENTER_SHORT = [support];
			}
			return verdict;
		},
	};
}
