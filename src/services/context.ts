import type { AxiosInstance } from "axios";
import { AlphaVantageProvider } from "../clients/alphaVantage";
import { FmpProvider } from "../clients/fmp";
import { createHttpClient } from "../clients/http";
import type { ProviderAdapter } from "../clients/provider";
import { TwelveDataProvider } from "../clients/twelveData";
import { YahooProvider } from "../clients/yahoo";
import type { AppConfig } from "../config";
import type { CacheEntry, Position, UsageRecord } from "../types";
import {
	type Guard,
	JsonFileStore,
	type KeyValueStore,
	MemoryStore,
} from "../utils/keyValueStore";
import type { Logger } from "../utils/logger";
import { type Clock, systemClock } from "../utils/time";
import { BreakoutDetector } from "./breakoutDetector";
import { FallbackFetcher } from "./fallbackFetcher";
import { isPosition, PositionStore } from "./positionStore";
import { PyramidEngine } from "./pyramidEngine";
import { isCacheEntry, ResponseCache } from "./responseCache";
import { isUsageRecord, UsageTracker, type UsageLimits } from "./usageTracker";

export type StoreFactory = <V>(filePath: string, isValue: Guard<V>) => KeyValueStore<V>;

export type ContextConfig = Pick<AppConfig, "providers" | "cache" | "scan" | "paths">;

export type ContextDeps = {
	logger: Logger;
	http?: AxiosInstance;
	clock?: Clock;
	createStore?: StoreFactory;
	priority?: Record<string, number>;
};

export type ScannerContext = {
	config: ContextConfig;
	logger: Logger;
	providers: readonly ProviderAdapter[];
	cache: ResponseCache;
	fetcher: FallbackFetcher;
	positions: PositionStore;
	pyramid: PyramidEngine;
	detector: BreakoutDetector;
	priority: Record<string, number>;
};

export function fileStoreFactory(logger: Logger): StoreFactory {
	return <V>(filePath: string, isValue: Guard<V>) =>
		new JsonFileStore<V>({ filePath, isValue, logger });
}

export const memoryStoreFactory: StoreFactory = <V>() => new MemoryStore<V>();

export function createScannerContext(
	config: ContextConfig,
	deps: ContextDeps,
): ScannerContext {
	const { logger } = deps;
	const http = deps.http ?? createHttpClient();
	const clock = deps.clock ?? systemClock;
	const createStore = deps.createStore ?? fileStoreFactory(logger);

	const tracker = (provider: string, limits: UsageLimits) =>
		new UsageTracker({
			provider,
			limits,
			store: createStore<UsageRecord>(config.paths.usage(provider), isUsageRecord),
			logger: logger.child({ component: "usage", provider }),
			clock,
		});
	const providerDeps = (
		provider: string,
		settings: UsageLimits & { timeoutMs: number },
	) => ({
		http,
		tracker: tracker(provider, settings),
		logger: logger.child({ component: "provider", provider }),
		timeoutMs: settings.timeoutMs,
	});

	const { fmp, twelveData, alphaVantage, yahoo } = config.providers;
	const providers: ProviderAdapter[] = [
		new FmpProvider(providerDeps("fmp", fmp), fmp.apiKey),
		new TwelveDataProvider(providerDeps("twelve_data", twelveData), twelveData.apiKey),
		new AlphaVantageProvider(
			providerDeps("alpha_vantage", alphaVantage),
			alphaVantage.apiKey,
		),
		new YahooProvider(providerDeps("yahoo", yahoo)),
	];

	const cache = new ResponseCache({
		store: createStore<CacheEntry>(config.paths.cache, isCacheEntry),
		logger: logger.child({ component: "cache" }),
		clock,
	});
	const fetcher = new FallbackFetcher({
		providers,
		cache,
		cacheTtlSeconds: config.cache.ttlSeconds,
		logger: logger.child({ component: "fetcher" }),
	});

	const positions = new PositionStore({
		store: createStore<Position>(config.paths.positions, isPosition),
		logger: logger.child({ component: "positions" }),
		clock,
	});
	const pyramid = new PyramidEngine(positions, logger.child({ component: "pyramid" }));
	const detector = new BreakoutDetector(pyramid, logger.child({ component: "detector" }));

	return {
		config,
		logger,
		providers,
		cache,
		fetcher,
		positions,
		pyramid,
		detector,
		priority: deps.priority ?? {},
	};
}
