/**
 * Cross helpers. The trailing sample may touch the boundary, the leading
 * sample must clear it, so a flat touch fires once at most.
 */
export function crossOver(
	prev: number | undefined,
	curr: number | undefined,
	boundary: number | undefined,
): boolean {
	if (prev === undefined || curr === undefined || boundary === undefined)
		return false;
	return prev <= boundary && curr > boundary;
}

export function crossUnder(
	prev: number | undefined,
	curr: number | undefined,
	boundary: number | undefined,
): boolean {
	if (prev === undefined || curr === undefined || boundary === undefined)
		return false;
	return prev >= boundary && curr < boundary;
}

type Sample = {
	prev: number | undefined;
	curr: number | undefined;
};

function diff(a: Sample, b: Sample): Sample {
	return {
		prev: a.prev === undefined || b.prev === undefined ? undefined : a.prev - b.prev,
		curr: a.curr === undefined || b.curr === undefined ? undefined : a.curr - b.curr,
	};
}

/** `a` moves from at-or-below `b` to strictly above it. */
export function crossOverLine(a: Sample, b: Sample): boolean {
	const d = diff(a, b);
	return crossOver(d.prev, d.curr, 0);
}

/** `a` moves from at-or-above `b` to strictly below it. */
export function crossUnderLine(a: Sample, b: Sample): boolean {
	const d = diff(a, b);
	return crossUnder(d.prev, d.curr, 0);
}

export function sampleAt(
	series: Array<number | undefined>,
	index: number,
): Sample {
	return { prev: series[index - 1], curr: series[index] };
}
