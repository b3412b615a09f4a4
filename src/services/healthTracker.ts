import type { HealthRecord } from "../types";
import { logger } from "../utils/logger";

export type HealthOptions = {
	maxRetries: number;
	cooldownMs: number;
};

/**
 * Per-instrument failure counters. A failing instrument sits out until its
 * cooldown passes and is due for eviction once it reaches `maxRetries`.
 */
export class HealthTracker {
	private readonly records = new Map<string, HealthRecord>();

	constructor(
		private readonly options: HealthOptions,
		private readonly now: () => number = Date.now,
	) {}

	get maxRetries(): number {
		return this.options.maxRetries;
	}

	record(instrument: string): HealthRecord {
		const record = this.records.get(instrument);
		return record
			? { ...record }
			: { consecutiveFailures: 0, lastAttempt: 0 };
	}

	recordFailure(instrument: string, reason?: string): HealthRecord {
		const previous = this.record(instrument);
		const next: HealthRecord = {
			consecutiveFailures: previous.consecutiveFailures + 1,
			lastAttempt: this.now(),
		};
		this.records.set(instrument, next);
		logger.warn(
			{
				instrument,
				failures: next.consecutiveFailures,
				maxRetries: this.options.maxRetries,
				reason,
			},
			"Instrument pass failed",
		);
		return next;
	}

	recordSuccess(instrument: string): void {
		const previous = this.records.get(instrument);
		if (previous && previous.consecutiveFailures > 0) {
			logger.info(
				{ instrument, failures: previous.consecutiveFailures },
				"Instrument recovered",
			);
		}
		this.records.set(instrument, { consecutiveFailures: 0, lastAttempt: this.now() });
	}

	shouldSkip(instrument: string): boolean {
		const record = this.records.get(instrument);
		if (!record || record.consecutiveFailures === 0) return false;
		return this.now() - record.lastAttempt < this.options.cooldownMs;
	}

	shouldEvict(instrument: string): boolean {
		return this.record(instrument).consecutiveFailures >= this.options.maxRetries;
	}

	reset(instrument: string): void {
		this.records.delete(instrument);
	}
}
