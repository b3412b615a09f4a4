export type Candle = {
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type Granularity = "1m" | "5m" | "15m" | "30m" | "1h" | "4h" | "1d";

export type PositionSide = "LONG" | "SHORT";

export type SignalDirection = "FLAT" | PositionSide;

export type SignalType = "ENTER_LONG" | "ENTER_SHORT" | "EXIT_LONG" | "EXIT_SHORT";

export type EnterSignalType = Extract<SignalType, `ENTER_${string}`>;

export type Signal = {
	instrument: string;
	type: SignalType;
	price: number;
	barTime: number;
	reason: string;
	/** Set on the exit emitted ahead of an opposite entry. */
	flip?: boolean;
};

export type StrategyName =
	| "rsi"
	| "rsi-ema"
	| "ema"
	| "macd"
	| "trendline"
	| "rsi-trendline"
	| "combined";

export type SlopeMethod = "pivots" | "stdev" | "atr" | "linreg";

export type TrendlineKind =
	| "price-support"
	| "price-resistance"
	| "rsi-support"
	| "rsi-resistance";

export type TrendlineSegment = {
	kind: TrendlineKind;
	anchorTime: number;
	anchorValue: number;
	/** Value change per hour. */
	slope: number;
	expiryTime: number;
	createdAt: number;
};

export type Pivot = {
	index: number;
	time: number;
	value: number;
};

export type Series = Array<number | undefined>;

export type IndicatorParams = {
	rsiPeriod: number;
	rsiEmaPeriod: number;
	rsiOversold: number;
	rsiOverbought: number;
	shortEmaPeriod: number;
	longEmaPeriod: number;
	trendlineLength: number;
	trendlineExtensionHours: number;
	slopeMethod: SlopeMethod;
	slopeMultiplier: number;
};

export type IndicatorSeries = {
	rsi: Series;
	rsiEma: Series;
	emaShort: Series;
	emaLong: Series;
	macdHistogram: Series;
	pivotHighs: Pivot[];
	pivotLows: Pivot[];
	rsiPivotHighs: Pivot[];
	rsiPivotLows: Pivot[];
};

export type SignalState = {
	lastSignal: SignalDirection;
	trendlines: Partial<Record<TrendlineKind, TrendlineSegment[]>>;
};

export type Position = {
	instrument: string;
	side: PositionSide;
	entryPrice: number;
	quantity: number;
	notional: number;
	entryFee: number;
	openedAt: number;
};

export type CloseReason = "signal" | "flip" | "target" | "stop-loss" | "manual";

export type ClosedTrade = {
	instrument: string;
	side: PositionSide;
	entryPrice: number;
	exitPrice: number;
	quantity: number;
	entryFee: number;
	exitFee: number;
	netProfit: number;
	netProceeds: number;
	balanceBefore: number;
	balanceAfter: number;
	openedAt: number;
	closedAt: number;
	reason: CloseReason;
};

export type OpenFill = {
	kind: "OPEN";
	position: Position;
	debit: number;
	balanceBefore: number;
	balanceAfter: number;
};

export type CloseFill = {
	kind: "CLOSE";
	trade: ClosedTrade;
};

export type Fill = OpenFill | CloseFill;

export type HealthRecord = {
	consecutiveFailures: number;
	lastAttempt: number;
};

export type TradeStats = {
	trades: number;
	wins: number;
	losses: number;
	winRate: number;
	netProfit: number;
	fees: number;
};

export type AccountSnapshot = {
	balance: number;
	positions: Position[];
	history: ClosedTrade[];
	exportedAt: number;
};

export interface BarSource {
	getBars(
		instrument: string,
		granularity: Granularity,
		limit: number,
	): Promise<Candle[]>;
}

export interface QuoteSource {
	getLastPrice(instrument: string): Promise<number | null>;
}

export interface NotificationSink {
	send(instrument: string, text: string): Promise<void>;
}

export interface PersistenceSink {
	export(snapshot: AccountSnapshot): Promise<void>;
}

export type SymbolMeta = {
	symbol: string;
	status: string;
	quoteAsset: string;
};
