export type Candle = Readonly<{
	datetime: string;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}>;

export type CandleSeries = readonly Candle[];

export type CacheEntry = {
	symbol: string;
	interval: string;
	data: Candle[];
	timestamp: number;
	ttl_seconds: number;
};

export type UsageRecord = {
	date: string;
	calls: number;
	last_reset: string;
	minute_calls: number[];
};

export type UsageStats = {
	provider: string;
	date: string;
	callsUsed: number;
	callsRemaining: number;
	limit: number;
	usagePct: number;
};

export type PyramidAdd = {
	price: number;
	percent: number;
	time: string;
};

export type PositionStatus = "ACTIVE" | "CLOSED";

export type Position = {
	ticker: string;
	entryPrice: number;
	entryTime: string;
	interval: string;
	stopLoss: number;
	highestPrice: number;
	adds: PyramidAdd[];
	status: PositionStatus;
	lastUpdate?: string;
	exitPrice?: number;
	exitReason?: string;
	exitTime?: string;
};

export type AtrData = {
	atr: number;
	atrPercent: number;
};

export type RiskMetrics = {
	entryPrice: number;
	stopLoss: number;
	stopDistancePct: number;
	positionSizePct: number;
	riskRewardRatio: number;
	target1: number;
	target2: number;
	target3: number;
};

export type VolumeType = "CLIMAX" | "RISING" | "BACKGROUND" | "STEADY" | "UNKNOWN";

export type EffortVsResult = "BULLISH" | "BEARISH" | "NEUTRAL";

export type VolumeTrend = "INCREASING" | "DECREASING" | "STEADY";

export type VpaAnalysis = {
	volumeType: VolumeType;
	effortVsResult: EffortVsResult;
	volumeTrend: VolumeTrend;
	strengthScore: number;
};

export type PyramidAction = "INITIAL" | "ADD_25" | "ADD_50" | "HOLD" | "EXIT";

export type PyramidSignal = {
	action: PyramidAction;
	reasoning: string;
	currentProfitPct: number;
	suggestedAddPrice?: number;
};

export type OptionsStrategy = "CALL" | "CALL_SPREAD" | "SHARES_THEN_CALLS";

export type OptionsRecommendation = {
	strategy: OptionsStrategy;
	strike: number;
	expiryDays: number;
	reasoning: string;
};

export type BreakoutSignal = Readonly<{
	ticker: string;
	interval: string;
	tier: string;
	price: number;
	time: string;
	rangePct: number;
	volumeMultiple: number;
	atr: Readonly<AtrData>;
	risk: Readonly<RiskMetrics>;
	vpa: Readonly<VpaAnalysis>;
	options: Readonly<OptionsRecommendation>;
	pyramid: Readonly<PyramidSignal>;
	strength: number;
}>;

export type ScanTier = {
	name: string;
	description: string;
	interval: string;
	cron: string;
	symbols: string[];
};
