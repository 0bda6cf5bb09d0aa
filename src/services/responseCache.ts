import type { CacheEntry, Candle, CandleSeries } from "../types";
import type { KeyValueStore } from "../utils/keyValueStore";
import type { Logger } from "../utils/logger";
import { isRecord } from "../utils/storage";
import { type Clock, systemClock } from "../utils/time";

export function cacheKey(symbol: string, interval: string): string {
	return `${symbol}_${interval}`;
}

function isCandle(value: unknown): value is Candle {
	return (
		isRecord(value) &&
		typeof value.datetime === "string" &&
		typeof value.open === "number" &&
		typeof value.high === "number" &&
		typeof value.low === "number" &&
		typeof value.close === "number" &&
		typeof value.volume === "number"
	);
}

export function isCacheEntry(value: unknown): value is CacheEntry {
	return (
		isRecord(value) &&
		typeof value.symbol === "string" &&
		typeof value.interval === "string" &&
		typeof value.timestamp === "number" &&
		typeof value.ttl_seconds === "number" &&
		Array.isArray(value.data) &&
		value.data.every(isCandle)
	);
}

export function isExpired(entry: CacheEntry, nowSeconds: number): boolean {
	return nowSeconds - entry.timestamp > entry.ttl_seconds;
}

export type ResponseCacheOptions = {
	store: KeyValueStore<CacheEntry>;
	logger: Logger;
	clock?: Clock;
};

export class ResponseCache {
	private readonly store: KeyValueStore<CacheEntry>;
	private readonly log: Logger;
	private readonly clock: Clock;

	constructor(options: ResponseCacheOptions) {
		this.store = options.store;
		this.log = options.logger;
		this.clock = options.clock ?? systemClock;
	}

	async get(symbol: string, interval: string): Promise<CandleSeries | null> {
		const key = cacheKey(symbol, interval);
		const now = this.nowSeconds();
		const entry = await this.store.get(key);
		if (!entry) return null;

		if (isExpired(entry, now)) {
			await this.store.deleteWhere(
				(current, currentKey) => currentKey === key && isExpired(current, now),
			);
			this.log.debug({ key }, "Evicted expired cache entry");
			return null;
		}

		return entry.data;
	}

	async put(
		symbol: string,
		interval: string,
		data: CandleSeries,
		ttlSeconds: number,
	): Promise<void> {
		await this.store.put(cacheKey(symbol, interval), {
			symbol,
			interval,
			data: [...data],
			timestamp: this.nowSeconds(),
			ttl_seconds: ttlSeconds,
		});
	}

	async clearExpired(): Promise<number> {
		const now = this.nowSeconds();
		const removed = await this.store.deleteWhere((entry) => isExpired(entry, now));
		if (removed > 0) {
			this.log.info({ removed }, "Cleared expired cache entries");
		}
		return removed;
	}

	async clear(): Promise<void> {
		await this.store.deleteWhere(() => true);
	}

	private nowSeconds(): number {
		return this.clock() / 1000;
	}
}
