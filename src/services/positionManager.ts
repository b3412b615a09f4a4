import { from, lastValueFrom } from "rxjs";
import { filter, mergeMap, toArray } from "rxjs/operators";
import type { CloseFill, Position, QuoteSource } from "../types";
import { describeError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { PositionLedger } from "./positionLedger";

const QUOTE_CONCURRENCY = 5;

/**
 * Marks every open position against its latest quote and closes the ones
 * that reached take-profit or stop-loss. Positions whose quote is missing
 * are left alone until the next pass.
 */
export async function monitorPositions(
	ledger: PositionLedger,
	quotes: QuoteSource,
): Promise<CloseFill[]> {
	const positions = ledger.positions();
	if (!positions.length) return [];

	const priced = await lastValueFrom(
		from(positions).pipe(
			mergeMap(async (position) => {
				try {
					const price = await quotes.getLastPrice(position.instrument);
					if (price === null) {
						logger.warn(
							{ instrument: position.instrument },
							"No quote for open position; trigger check skipped",
						);
						return null;
					}
					return { position, price };
				} catch (error) {
					logger.warn(
						{ instrument: position.instrument, error: describeError(error) },
						"Quote fetch failed; trigger check skipped",
					);
					return null;
				}
			}, QUOTE_CONCURRENCY),
			filter((entry): entry is { position: Position; price: number } =>
				Boolean(entry),
			),
			toArray(),
		),
	);

	// ledger mutations stay sequential
	const closed: CloseFill[] = [];
	for (const { position, price } of priced) {
		const fill = await ledger.checkExogenousTriggers(position.instrument, price);
		if (fill) closed.push(fill);
	}
	return closed;
}
