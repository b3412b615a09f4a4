import { fetchTradingSymbols } from "../clients/binance";
import { config } from "../config";
import { logger } from "../utils/logger";

export type UniverseResolver = () => Promise<string[]>;

/**
 * Static instrument list when configured, otherwise the first
 * `maxInstruments` trading symbols quoted in `quoteAsset`.
 */
export async function resolveUniverse(
	settings = config.universe,
): Promise<string[]> {
	if (settings.instruments.length) {
		return [...new Set(settings.instruments)];
	}

	const symbols = await fetchTradingSymbols(settings.quoteAsset, true);
	const instruments = symbols
		.map((s) => s.symbol)
		.slice(0, settings.maxInstruments);
	logger.info(
		{ count: instruments.length, quoteAsset: settings.quoteAsset },
		"Resolved instrument universe",
	);
	return instruments;
}
