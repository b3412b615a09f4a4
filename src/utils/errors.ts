export class TransientDataError extends Error {
	readonly name = "TransientDataError";

	constructor(
		readonly instrument: string,
		message: string,
		cause?: unknown,
	) {
		super(`${instrument}: ${message}`, { cause });
	}
}

export class EvictedInstrumentError extends Error {
	readonly name = "EvictedInstrumentError";

	constructor(
		readonly instrument: string,
		readonly failures: number,
	) {
		super(`${instrument} evicted after ${failures} consecutive failures`);
	}
}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
