import type { Pivot, Series } from "../types";

export type PivotMode = "high" | "low";

/**
 * Index i is a pivot when its value is the extremum of the full window
 * [i - length, i + length]. Windows cut by either end of the series, or
 * holding an undefined sample, never produce a pivot. On ties the earliest
 * index in the window wins.
 */
export function findPivots(
	values: Series,
	times: number[],
	length: number,
	mode: PivotMode,
): Pivot[] {
	const pivots: Pivot[] = [];
	if (length < 1 || values.length < 2 * length + 1) return pivots;

	const beats = (candidate: number, other: number, strict: boolean) => {
		if (mode === "high") return strict ? candidate > other : candidate >= other;
		return strict ? candidate < other : candidate <= other;
	};

	for (let i = length; i < values.length - length; i++) {
		const value = values[i];
		if (value === undefined) continue;

		let isPivot = true;
		for (let j = i - length; j <= i + length && isPivot; j++) {
			if (j === i) continue;
			const other = values[j];
			if (other === undefined) {
				isPivot = false;
			} else {
				// earlier equal values take the pivot, later ones do not
				isPivot = beats(value, other, j < i);
			}
		}

		if (isPivot) pivots.push({ index: i, time: times[i], value });
	}

	return pivots;
}
