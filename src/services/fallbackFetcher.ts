import type { ProviderAdapter, ProviderResult } from "../clients/provider";
import type { Candle, UsageStats } from "../types";
import type { Logger } from "../utils/logger";
import { cacheKey, type ResponseCache } from "./responseCache";

export const DEFAULT_OUTPUT_SIZE = 120;
const DEFAULT_TTL_SECONDS = 300;

export type FetcherStats = {
	cacheHits: number;
	misses: number;
	failures: number;
	byProvider: Record<string, number>;
};

export type FallbackFetcherOptions = {
	providers: readonly ProviderAdapter[];
	cache: ResponseCache;
	cacheTtlSeconds: Readonly<Record<string, number>>;
	logger: Logger;
};

/** Never throws; total failure is an empty array. */
export class FallbackFetcher {
	private readonly providers: readonly ProviderAdapter[];
	private readonly cache: ResponseCache;
	private readonly ttl: Readonly<Record<string, number>>;
	private readonly log: Logger;
	private readonly inFlight = new Map<string, Promise<Candle[]>>();
	private readonly counters: FetcherStats;

	constructor(options: FallbackFetcherOptions) {
		this.providers = options.providers;
		this.cache = options.cache;
		this.ttl = options.cacheTtlSeconds;
		this.log = options.logger;
		this.counters = {
			cacheHits: 0,
			misses: 0,
			failures: 0,
			byProvider: Object.fromEntries(this.providers.map((p) => [p.name, 0])),
		};
	}

	ttlFor(interval: string): number {
		return this.ttl[interval] ?? DEFAULT_TTL_SECONDS;
	}

	fetchCandles(
		symbol: string,
		interval: string,
		outputSize = DEFAULT_OUTPUT_SIZE,
	): Promise<Candle[]> {
		const key = `${cacheKey(symbol, interval)}_${outputSize}`;
		const pending = this.inFlight.get(key);
		if (pending) return pending;

		const request = this.resolve(symbol, interval, outputSize).finally(() => {
			this.inFlight.delete(key);
		});
		this.inFlight.set(key, request);
		return request;
	}

	async usageStats(): Promise<UsageStats[]> {
		return Promise.all(this.providers.map((p) => p.tracker.stats()));
	}

	stats(): FetcherStats {
		return { ...this.counters, byProvider: { ...this.counters.byProvider } };
	}

	clearExpired(): Promise<number> {
		return this.cache.clearExpired();
	}

	private async resolve(
		symbol: string,
		interval: string,
		outputSize: number,
	): Promise<Candle[]> {
		try {
			const cached = await this.cache.get(symbol, interval);
			if (cached) {
				this.counters.cacheHits++;
				return [...cached];
			}
		} catch (error) {
			this.log.warn({ symbol, interval, error }, "Cache read failed");
		}
		this.counters.misses++;

		for (const provider of this.providers) {
			let result: ProviderResult;
			try {
				result = await provider.fetch(symbol, interval, outputSize);
			} catch (error) {
				this.log.error({ provider: provider.name, symbol, error }, "Provider threw");
				continue;
			}
			if (!result.ok) {
				continue;
			}

			this.counters.byProvider[provider.name] =
				(this.counters.byProvider[provider.name] ?? 0) + 1;
			try {
				await this.cache.put(symbol, interval, result.candles, this.ttlFor(interval));
			} catch (error) {
				this.log.warn({ symbol, interval, error }, "Cache write failed");
			}
			return result.candles;
		}

		this.counters.failures++;
		this.log.warn({ symbol, interval }, "All providers failed");
		return [];
	}
}
