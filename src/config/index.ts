import path from "node:path";
import dotenv from "dotenv";
import type {
	Granularity,
	IndicatorParams,
	SlopeMethod,
	StrategyName,
} from "../types";

dotenv.config();

const GRANULARITIES: Granularity[] = ["1m", "5m", "15m", "30m", "1h", "4h", "1d"];
const STRATEGIES: StrategyName[] = [
	"rsi",
	"rsi-ema",
	"ema",
	"macd",
	"trendline",
	"rsi-trendline",
	"combined",
];
const SLOPE_METHODS: SlopeMethod[] = ["pivots", "stdev", "atr", "linreg"];

function oneOf<T extends string>(
	name: string,
	allowed: readonly T[],
	fallback: T,
): T {
	const raw = process.env[name] || fallback;
	const match = allowed.find((value) => value === raw);
	if (!match) {
		throw new Error(`${name} must be one of ${allowed.join(", ")}, got "${raw}"`);
	}
	return match;
}

function list(value: string | undefined): string[] {
	return (value || "")
		.split(",")
		.map((item) => item.trim())
		.filter(Boolean);
}

function granularityMs(granularity: Granularity): number {
	const unit = granularity.slice(-1);
	const amount = Number(granularity.slice(0, -1));
	const minute = 60 * 1000;
	if (unit === "m") return amount * minute;
	if (unit === "h") return amount * 60 * minute;
	return amount * 24 * 60 * minute;
}

const useTestnet =
	(process.env.BINANCE_USE_TESTNET || "true").toLowerCase() === "true";
const futuresUrl =
	process.env.BINANCE_FUTURES_URL ||
	(useTestnet
		? "https://testnet.binancefuture.com"
		: "https://fapi.binance.com");
const granularity = oneOf("BAR_GRANULARITY", GRANULARITIES, "1h");
const dataDir = process.env.DATA_DIR || path.join(process.cwd(), "data");

const indicators: IndicatorParams = {
	rsiPeriod: Number(process.env.RSI_PERIOD || "14"),
	rsiEmaPeriod: Number(process.env.RSI_EMA_PERIOD || "9"),
	rsiOversold: Number(process.env.RSI_OVERSOLD || "30"),
	rsiOverbought: Number(process.env.RSI_OVERBOUGHT || "70"),
	shortEmaPeriod: Number(process.env.SHORT_EMA_PERIOD || "9"),
	longEmaPeriod: Number(process.env.LONG_EMA_PERIOD || "21"),
	trendlineLength: Number(process.env.TRENDLINE_LENGTH || "14"),
	trendlineExtensionHours: Number(
		process.env.TRENDLINE_EXTENSION_HOURS || "24",
	),
	slopeMethod: oneOf("SLOPE_METHOD", SLOPE_METHODS, "pivots"),
	slopeMultiplier: Number(process.env.SLOPE_MULTIPLIER || "1"),
};

export const config = {
	binance: {
		apiKey: process.env.BINANCE_API_KEY || "",
		apiSecret: process.env.BINANCE_API_SECRET || "",
		baseUrl: futuresUrl,
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
	},
	universe: {
		instruments: list(process.env.INSTRUMENTS).map((symbol) =>
			symbol.toUpperCase(),
		),
		maxInstruments: Number(process.env.MAX_INSTRUMENTS || "20"),
		quoteAsset: process.env.QUOTE_ASSET || "USDT",
	},
	ledger: {
		initialBalance: Number(process.env.INITIAL_BALANCE_USDT || "1000"),
		positionNotional: Number(process.env.POSITION_NOTIONAL_USDT || "15"),
		feeRatePercent: Number(process.env.FEE_RATE_PERCENT || "0.1"),
		takeProfitPercent: Number(process.env.TAKE_PROFIT_PERCENT || "15"),
		stopLossPercent: Number(process.env.STOP_LOSS_PERCENT || "15"),
		historyCap: Number(process.env.TRADE_HISTORY_CAP || "1000"),
		exportEvery: Number(process.env.EXPORT_EVERY_TRADES || "100"),
	},
	health: {
		maxRetries: Number(process.env.MAX_RETRIES || "5"),
		cooldownMs: Number(process.env.COOLDOWN_DURATION_SEC || "300") * 1000,
	},
	strategy: {
		name: oneOf("STRATEGY", STRATEGIES, "rsi"),
		combined: list(process.env.COMBINED_STRATEGIES || "ema,rsi-ema"),
		granularity,
		barLimit: Number(process.env.BAR_LIMIT || "200"),
		signalCooldownMs: process.env.SIGNAL_COOLDOWN_SEC
			? Number(process.env.SIGNAL_COOLDOWN_SEC) * 1000
			: granularityMs(granularity),
		maxStoredTrendlines: Number(process.env.MAX_STORED_TRENDLINES || "5"),
		indicators,
	},
	scheduling: {
		checkIntervalSec: Number(process.env.CHECK_INTERVAL_SEC || "60"),
		universeCron: process.env.UNIVERSE_CRON || "0 * * * *", // hourly
		timezone: "UTC",
	},
	paths: {
		tradeHistory: path.join(dataDir, "trade-history.json"),
		tradeLog: path.join(dataDir, "trades.log"),
	},
};
