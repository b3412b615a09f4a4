import type { EnterSignalType, SignalType, StrategyName } from "../types";
import { emaCross } from "./movingAverages";
import { macdHistogram, rsiEmaCross, rsiThreshold } from "./oscillators";
import { trendlineBreakout } from "./trendlines";
import { emptyVerdict, type SignalCondition } from "./types";

export type { ConditionContext, ConditionVerdict, SignalCondition } from "./types";
export { crossOver, crossUnder } from "./crosses";

const ENTRIES: EnterSignalType[] = ["ENTER_LONG", "ENTER_SHORT"];
const EXITS: SignalType[] = ["EXIT_LONG", "EXIT_SHORT"];

const conditions: Record<Exclude<StrategyName, "combined">, SignalCondition> = {
	rsi: rsiThreshold,
	"rsi-ema": rsiEmaCross,
	ema: emaCross,
	macd: macdHistogram,
	trendline: trendlineBreakout("price"),
	"rsi-trendline": trendlineBreakout("rsi"),
};

function isSingleStrategy(
	name: string,
): name is Exclude<StrategyName, "combined"> {
	return Object.hasOwn(conditions, name);
}

/**
 * All members must agree before an Enter fires; any single member is
 * enough to exit.
 */
export function combineConditions(members: SignalCondition[]): SignalCondition {
	if (!members.length) {
		throw new Error("Combined strategy needs at least one member");
	}
	return {
		name: `combined(${members.map((m) => m.name).join("+")})`,
		requiredBars: (params) =>
			Math.max(...members.map((m) => m.requiredBars(params))),
		evaluate: (ctx) => {
			const verdicts = members.map((m) => m.evaluate(ctx));
			const combined = emptyVerdict();

			for (const type of EXITS) {
				const reasons = verdicts
					.map((v) => v.triggers[type])
					.filter((r): r is string => Boolean(r));
				if (reasons.length) combined.triggers[type] = reasons.join("; ");
			}

			for (const type of ENTRIES) {
				const reasons = verdicts.map((v) => v.triggers[type]);
				if (reasons.every(Boolean)) {
					combined.triggers[type] = reasons.join(" & ");
					combined.segments[type] = verdicts.flatMap(
						(v) => v.segments[type] ?? [],
					);
				}
			}
			return combined;
		},
	};
}

export function createCondition(
	name: StrategyName,
	combinedMembers: string[] = [],
): SignalCondition {
	if (name !== "combined") return conditions[name];

	const members = combinedMembers.map((member) => {
		if (!isSingleStrategy(member)) {
			throw new Error(`Unknown strategy in combined list: ${member}`);
		}
		return conditions[member];
	});
	return combineConditions(members);
}
