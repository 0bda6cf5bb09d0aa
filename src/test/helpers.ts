import axios, {
	type AxiosAdapter,
	type AxiosInstance,
	type InternalAxiosRequestConfig,
} from "axios";
import type {
	ProviderAdapter,
	ProviderResult,
} from "../clients/provider";
import { UsageTracker, type UsageLimits } from "../services/usageTracker";
import type { Candle, UsageRecord } from "../types";
import { MemoryStore } from "../utils/keyValueStore";
import { silentLogger } from "../utils/logger";

export const T0 = Date.UTC(2026, 2, 10, 15, 0, 0);

export function fakeClock(start = T0) {
	let now = start;
	return {
		clock: () => now,
		advance: (ms: number) => {
			now += ms;
		},
		set: (ms: number) => {
			now = ms;
		},
	};
}

export type FakeReply = { status?: number; data: unknown };

/** An axios instance whose requests are answered in process by `handler`. */
export function fakeHttp(
	handler: (config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>,
): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
	const requests: InternalAxiosRequestConfig[] = [];
	const adapter: AxiosAdapter = async (config) => {
		requests.push(config);
		const reply = await handler(config);
		return {
			data: reply.data,
			status: reply.status ?? 200,
			statusText: "",
			headers: {},
			config,
		};
	};
	return { http: axios.create({ adapter }), requests };
}

export function makeTracker(
	provider: string,
	limits: UsageLimits = { maxPerDay: 100, maxPerMinute: 100 },
	clock: () => number = () => T0,
): UsageTracker {
	return new UsageTracker({
		provider,
		limits,
		store: new MemoryStore<UsageRecord>(),
		logger: silentLogger,
		clock,
	});
}

export function candle(
	index: number,
	overrides: Partial<Candle> = {},
): Candle {
	const minute = String(index % 60).padStart(2, "0");
	const hour = String(10 + Math.floor(index / 60)).padStart(2, "0");
	return {
		datetime: `2026-03-10 ${hour}:${minute}:00`,
		open: 100,
		high: 101,
		low: 99,
		close: 100,
		volume: 200_000,
		...overrides,
	};
}

export function series(count: number): Candle[] {
	return Array.from({ length: count }, (_, i) => candle(i));
}

/**
 * 51 bars: a 99-101 base with gently rising closes, then a bullish bar
 * closing at 103 on 2.5x the 20-bar average volume.
 */
export function breakoutSeries(lastBar: Partial<Candle> = {}): Candle[] {
	const bars: Candle[] = [];
	for (let i = 0; i < 50; i++) {
		const close = 99.5 + 0.02 * i;
		let volume = 200_000;
		if (i >= 31 && i <= 48) volume = 180_000;
		if (i === 49) volume = 260_000;
		bars.push(candle(i, { open: close - 0.01, high: 101, low: 99, close, volume }));
	}
	bars.push(
		candle(50, {
			open: 101,
			high: 103.5,
			low: 100.8,
			close: 103,
			volume: 500_000,
			...lastBar,
		}),
	);
	return bars;
}

/** Scripted provider for fetcher tests. */
export class FakeProvider implements ProviderAdapter {
	readonly tracker: UsageTracker;
	readonly calls: Array<{ symbol: string; interval: string; outputSize: number }> = [];

	constructor(
		readonly name: string,
		private readonly respond: (symbol: string) => ProviderResult | Promise<ProviderResult>,
	) {
		this.tracker = makeTracker(name);
	}

	async fetch(
		symbol: string,
		interval: string,
		outputSize: number,
	): Promise<ProviderResult> {
		this.calls.push({ symbol, interval, outputSize });
		return this.respond(symbol);
	}
}
