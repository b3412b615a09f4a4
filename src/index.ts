import cron, { type ScheduledTask } from "node-cron";
import { BinanceBarSource, BinanceQuoteSource } from "./clients/binance";
import { TelegramNotificationSink } from "./clients/telegram";
import { config } from "./config";
import { createCondition } from "./patterns";
import { Account } from "./services/account";
import { HealthTracker } from "./services/healthTracker";
import { LedgerStore } from "./services/ledgerStore";
import { Notifier } from "./services/notifier";
import { PositionLedger } from "./services/positionLedger";
import { SignalDetector } from "./services/signalDetector";
import { logTrade } from "./services/tradeLogger";
import { FilePersistenceSink } from "./services/tradeStore";
import { TradingEngine } from "./services/tradingEngine";
import { resolveUniverse } from "./services/universe";
import { describeError } from "./utils/errors";
import { logger } from "./utils/logger";

type Runtime = {
	engine: TradingEngine;
	universeTask: ScheduledTask;
};

async function bootstrap(): Promise<Runtime> {
	logger.info(
		{ strategy: config.strategy.name, granularity: config.strategy.granularity },
		"Starting signal ledger bot",
	);

	const persistence = new FilePersistenceSink();
	const restored = await persistence.load();
	const account = new Account(
		restored?.balance ?? config.ledger.initialBalance,
		config.ledger.historyCap,
		restored?.history ?? [],
	);
	const ledger = new PositionLedger(
		account,
		new LedgerStore(restored?.positions ?? []),
		persistence,
		config.ledger,
	);
	const detector = new SignalDetector(
		createCondition(config.strategy.name, config.strategy.combined),
		{
			params: config.strategy.indicators,
			cooldownMs: config.strategy.signalCooldownMs,
			maxStoredTrendlines: config.strategy.maxStoredTrendlines,
		},
	);
	const notifier = new Notifier(new TelegramNotificationSink());

	const engine = new TradingEngine(
		{
			bars: new BinanceBarSource(),
			quotes: new BinanceQuoteSource(),
			ledger,
			detector,
			health: new HealthTracker(config.health),
			notifier,
			resolveUniverse: () => resolveUniverse(),
			onTradeClosed: (trade) => logTrade(trade),
		},
		{
			granularity: config.strategy.granularity,
			barLimit: Math.max(config.strategy.barLimit, detector.minimumBars()),
			positionNotional: config.ledger.positionNotional,
			checkIntervalMs: Math.max(config.scheduling.checkIntervalSec, 5) * 1000,
		},
	);

	const instruments = await engine.refreshUniverse();
	if (!instruments.length) {
		throw new Error("No instruments resolvable; check INSTRUMENTS / QUOTE_ASSET");
	}

	const universeTask = cron.schedule(
		config.scheduling.universeCron,
		() => {
			engine
				.refreshUniverse()
				.then(() => engine.statusReport())
				.catch((err) => {
					logger.error({ error: describeError(err) }, "Universe refresh failed");
				});
		},
		{ timezone: config.scheduling.timezone },
	);

	await notifier.status(
		`Watching ${instruments.length} instruments with ${detector.strategyName}: ${instruments.join(", ")}`,
	);
	engine.start();
	return { engine, universeTask };
}

function handleShutdown({ engine, universeTask }: Runtime): void {
	let stopping = false;
	const shutdown = (signal: NodeJS.Signals) => {
		if (stopping) return;
		stopping = true;
		logger.info({ signal }, "Shutting down");
		universeTask.stop();
		engine
			.stop()
			.then(() => process.exit(0))
			.catch((err) => {
				logger.error({ error: describeError(err) }, "Shutdown failed");
				process.exit(1);
			});
	};
	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);
}

bootstrap()
	.then(handleShutdown)
	.catch((err) => {
		logger.fatal({ error: describeError(err) }, "Fatal error");
		process.exit(1);
	});
