import { config } from "../config";
import type { ClosedTrade } from "../types";
import { logger } from "../utils/logger";
import { appendLine } from "../utils/storage";

export async function logTrade(
	record: ClosedTrade,
	filePath: string = config.paths.tradeLog,
): Promise<void> {
	await appendLine(filePath, JSON.stringify(record));
	logger.info(
		{ instrument: record.instrument, netProfit: record.netProfit },
		"Trade recorded",
	);
}
