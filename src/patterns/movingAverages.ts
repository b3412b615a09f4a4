import { crossOverLine, crossUnderLine, sampleAt } from "./crosses";
import { emptyVerdict, type SignalCondition } from "./types";

export const emaCross: SignalCondition = {
	name: "ema",
	requiredBars: (params) => Math.max(params.shortEmaPeriod, params.longEmaPeriod),
	evaluate: ({ series, index, params }) => {
		const verdict = emptyVerdict();
		const short = sampleAt(series.emaShort, index);
		const long = sampleAt(series.emaLong, index);

		if (crossOverLine(short, long)) {
			const reason = `EMA(${params.shortEmaPeriod}) crossed above EMA(${params.longEmaPeriod})`;
			verdict.triggers.ENTER_LONG = reason;
			verdict.triggers.EXIT_SHORT = reason;
		}
		if (crossUnderLine(short, long)) {
			const reason = `EMA(${params.shortEmaPeriod}) crossed below EMA(${params.longEmaPeriod})`;
			verdict.triggers.ENTER_SHORT = reason;
			verdict.triggers.EXIT_LONG = reason;
		}
		return verdict;
	},
};
