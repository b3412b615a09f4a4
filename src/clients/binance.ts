import { USDMClient } from "binance";
import { config } from "../config";
import type {
	BarSource,
	Candle,
	Granularity,
	QuoteSource,
	SymbolMeta,
} from "../types";
import { describeError, TransientDataError } from "../utils/errors";
import { logger } from "../utils/logger";

const isTestnet = config.binance.baseUrl.includes("testnet");

const restClient = new USDMClient({
	api_key: config.binance.apiKey,
	api_secret: config.binance.apiSecret,
	baseUrl: config.binance.baseUrl,
	beautifyResponses: true,
	testnet: isTestnet,
});

let cachedSymbols: SymbolMeta[] | null = null;

export async function fetchTradingSymbols(
	quoteAsset: string,
	refresh = false,
): Promise<SymbolMeta[]> {
	if (!cachedSymbols || refresh) {
		const info = await restClient.getExchangeInfo();
		cachedSymbols = info.symbols.map((s) => ({
			symbol: s.symbol,
			status: String(s.status),
			quoteAsset: s.quoteAsset,
		}));
	}

	return cachedSymbols.filter(
		(s) =>
			s.status === "TRADING" &&
			s.quoteAsset === quoteAsset &&
			!s.symbol.includes("_"),
	);
}

async function fetchKlines(
	symbol: string,
	interval: Granularity,
	limit: number,
): Promise<Candle[]> {
	const data = await restClient.getKlines({ symbol, interval, limit });

	return data.map((kline) => ({
		openTime: kline[0],
		open: Number(kline[1]),
		high: Number(kline[2]),
		low: Number(kline[3]),
		close: Number(kline[4]),
		volume: Number(kline[5]),
		closeTime: kline[6],
	}));
}

async function fetchLastPrice(symbol: string): Promise<number> {
	const ticker = await restClient.getSymbolPriceTicker({ symbol });
	const entry = Array.isArray(ticker)
		? ticker.find((t) => t.symbol === symbol)
		: ticker;
	return entry ? Number(entry.price) : Number.NaN;
}

export class BinanceBarSource implements BarSource {
	async getBars(
		instrument: string,
		granularity: Granularity,
		limit: number,
	): Promise<Candle[]> {
		try {
			return await fetchKlines(instrument, granularity, limit);
		} catch (error) {
			throw new TransientDataError(
				instrument,
				`kline fetch failed: ${describeError(error)}`,
				error,
			);
		}
	}
}

export class BinanceQuoteSource implements QuoteSource {
	async getLastPrice(instrument: string): Promise<number | null> {
		try {
			const price = await fetchLastPrice(instrument);
			return Number.isFinite(price) && price > 0 ? price : null;
		} catch (error) {
			logger.warn(
				{ instrument, error: describeError(error) },
				"Price ticker fetch failed",
			);
			return null;
		}
	}
}
