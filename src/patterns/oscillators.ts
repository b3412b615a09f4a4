import { MACD_SIGNAL, MACD_SLOW } from "../indicators";
import { crossOver, crossOverLine, crossUnder, crossUnderLine, sampleAt } from "./crosses";
import { emptyVerdict, type SignalCondition } from "./types";

const fmt = (value: number | undefined) => (value ?? Number.NaN).toFixed(2);

/**
 * RSI leaving the oversold/overbought band opens a position; RSI crossing
 * back through its own EMA closes it.
 */
export const rsiThreshold: SignalCondition = {
	name: "rsi",
	requiredBars: (params) => params.rsiPeriod + params.rsiEmaPeriod,
	evaluate: ({ series, index, params }) => {
		const verdict = emptyVerdict();
		const rsi = sampleAt(series.rsi, index);
		const rsiEma = sampleAt(series.rsiEma, index);

		if (crossUnderLine(rsi, rsiEma)) {
			verdict.triggers.EXIT_LONG = `RSI ${fmt(rsi.curr)} crossed below its EMA ${fmt(rsiEma.curr)}`;
		}
		if (crossOverLine(rsi, rsiEma)) {
			verdict.triggers.EXIT_SHORT = `RSI ${fmt(rsi.curr)} crossed above its EMA ${fmt(rsiEma.curr)}`;
		}
		if (crossOver(rsi.prev, rsi.curr, params.rsiOversold)) {
			verdict.triggers.ENTER_LONG = `RSI crossed above ${params.rsiOversold} (${fmt(rsi.prev)} -> ${fmt(rsi.curr)})`;
		}
		if (crossUnder(rsi.prev, rsi.curr, params.rsiOverbought)) {
			verdict.triggers.ENTER_SHORT = `RSI crossed below ${params.rsiOverbought} (${fmt(rsi.prev)} -> ${fmt(rsi.curr)})`;
		}
		return verdict;
	},
};

export const rsiEmaCross: SignalCondition = {
	name: "rsi-ema",
	requiredBars: (params) => params.rsiPeriod + params.rsiEmaPeriod,
	evaluate: ({ series, index }) => {
		const verdict = emptyVerdict();
		const rsi = sampleAt(series.rsi, index);
		const rsiEma = sampleAt(series.rsiEma, index);

		if (crossOverLine(rsi, rsiEma)) {
			const reason = `RSI ${fmt(rsi.curr)} crossed above its EMA ${fmt(rsiEma.curr)}`;
			verdict.triggers.ENTER_LONG = reason;
			verdict.triggers.EXIT_SHORT = reason;
		}
		if (crossUnderLine(rsi, rsiEma)) {
			const reason = `RSI ${fmt(rsi.curr)} crossed below its EMA ${fmt(rsiEma.curr)}`;
			verdict.triggers.ENTER_SHORT = reason;
			verdict.triggers.EXIT_LONG = reason;
		}
		return verdict;
	},
};

export const macdHistogram: SignalCondition = {
	name: "macd",
	requiredBars: () => MACD_SLOW + MACD_SIGNAL,
	evaluate: ({ series, index }) => {
		const verdict = emptyVerdict();
		const hist = sampleAt(series.macdHistogram, index);

		if (crossOver(hist.prev, hist.curr, 0)) {
			const reason = `MACD histogram turned positive (${fmt(hist.curr)})`;
			verdict.triggers.ENTER_LONG = reason;
			verdict.triggers.EXIT_SHORT = reason;
		}
		if (crossUnder(hist.prev, hist.curr, 0)) {
			const reason = `MACD histogram turned negative (${fmt(hist.curr)})`;
			verdict.triggers.ENTER_SHORT = reason;
			verdict.triggers.EXIT_LONG = reason;
		}
		return verdict;
	},
};
