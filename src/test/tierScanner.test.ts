import { describe, it, expect } from "vitest";
import type { ProviderResult } from "../clients/provider";
import { config, SYMBOL_BUDGET_MARGIN_MS, symbolTimeoutFor } from "../config";
import { formatAlert } from "../services/alertFormatter";
import { BreakoutDetector } from "../services/breakoutDetector";
import type { ScannerContext } from "../services/context";
import { FallbackFetcher } from "../services/fallbackFetcher";
import { PositionStore } from "../services/positionStore";
import { PyramidEngine } from "../services/pyramidEngine";
import { ResponseCache } from "../services/responseCache";
import { createNonOverlappingJob, runTierScan } from "../services/scanScheduler";
import { prioritizeSymbols, scanTier } from "../services/tierScanner";
import type { BreakoutSignal, CacheEntry, Position, ScanTier } from "../types";
import { MemoryStore } from "../utils/keyValueStore";
import { silentLogger } from "../utils/logger";
import { breakoutSeries, FakeProvider, fakeClock, series } from "./helpers";

type Respond = (symbol: string) => ProviderResult | Promise<ProviderResult>;

function scannerContext(
	respond: Respond | FakeProvider[],
	symbolTimeoutMs = 50,
): ScannerContext {
	const { clock } = fakeClock();
	const providers = Array.isArray(respond) ? respond : [new FakeProvider("yahoo", respond)];
	const cache = new ResponseCache({
		store: new MemoryStore<CacheEntry>(),
		logger: silentLogger,
		clock,
	});
	const positions = new PositionStore({
		store: new MemoryStore<Position>(),
		logger: silentLogger,
		clock,
	});
	const pyramid = new PyramidEngine(positions, silentLogger);
	return {
		config: {
			...config,
			scan: { outputSize: 120, concurrency: 2, symbolTimeoutMs, maxSymbolsPerScan: 0 },
		},
		logger: silentLogger,
		providers,
		cache,
		fetcher: new FallbackFetcher({
			providers,
			cache,
			cacheTtlSeconds: { "5min": 300 },
			logger: silentLogger,
		}),
		positions,
		pyramid,
		detector: new BreakoutDetector(pyramid, silentLogger),
		priority: {},
	};
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const after = (ms: number, result: ProviderResult): Promise<ProviderResult> =>
	delay(ms).then(() => result);

const tier = (symbols: string[]): ScanTier => ({
	name: "intraday_5m",
	description: "test tier",
	interval: "5min",
	cron: "*/5 * * * *",
	symbols,
});

const scripted = (symbol: string): ProviderResult | Promise<ProviderResult> => {
	switch (symbol) {
		case "BRK1":
		case "BRK2":
			return { ok: true, candles: breakoutSeries() };
		case "FLAT":
			return { ok: true, candles: series(60) };
		case "HANG":
			return new Promise<ProviderResult>(() => {});
		case "BOOM":
			throw new Error("boom");
		default:
			return { ok: false, reason: "empty" };
	}
};

describe("prioritizeSymbols", () => {
	it("orders by priority, then reverse alphabetically, and dedupes", () => {
		const priority = { MSFT: 90, AAPL: 100 };
		expect(prioritizeSymbols(["AMD", "MSFT", "ZS", "AAPL", "AMD"], priority)).toEqual([
			"AAPL",
			"MSFT",
			"ZS",
			"AMD",
		]);
	});

	it("truncates to the cap when one is set", () => {
		expect(prioritizeSymbols(["A", "B", "C"], { C: 10 }, 2)).toEqual(["B", "A"]);
	});
});

describe("symbolTimeoutFor", () => {
	it("covers every provider timing out in turn", () => {
		expect(symbolTimeoutFor([10_000, 10_000, 15_000, 10_000])).toBe(50_000);
		expect(symbolTimeoutFor([10_000, 10_000, 15_000, 10_000], 30_000)).toBe(50_000);
		expect(symbolTimeoutFor([10_000, 10_000, 15_000, 10_000], 90_000)).toBe(90_000);
	});

	it("keeps the configured budget above the provider chain", () => {
		const chain = Object.values(config.providers).reduce((acc, p) => acc + p.timeoutMs, 0);
		expect(config.scan.symbolTimeoutMs).toBeGreaterThanOrEqual(chain + SYMBOL_BUDGET_MARGIN_MS);
	});
});

describe("scanTier", () => {
	it("returns only breakouts and survives failing or hanging symbols", async () => {
		const ctx = scannerContext(scripted);
		const signals = await scanTier(ctx, tier(["BRK1", "FLAT", "HANG", "BOOM", "NONE"]));

		expect(signals.map((s) => s.ticker)).toEqual(["BRK1"]);
		expect(signals[0].tier).toBe("intraday_5m");
		expect(ctx.fetcher.stats().failures).toBe(2);
	});

	it("leaves positions untouched when a fetch overruns its budget", async () => {
		const ctx = scannerContext(() => after(100, { ok: true, candles: breakoutSeries() }), 50);

		expect(await scanTier(ctx, tier(["SLOW"]))).toEqual([]);
		await delay(200);
		expect(await ctx.positions.get("SLOW")).toBeUndefined();
	});

	it("reaches the last provider when every earlier one times out", async () => {
		const timedOut: ProviderResult = { ok: false, reason: "transport", detail: "ECONNABORTED" };
		const providers = [
			new FakeProvider("fmp", () => after(40, timedOut)),
			new FakeProvider("twelve_data", () => after(40, timedOut)),
			new FakeProvider("alpha_vantage", () => after(40, timedOut)),
			new FakeProvider("yahoo", () => after(40, { ok: true, candles: breakoutSeries() })),
		];
		const ctx = scannerContext(providers, symbolTimeoutFor([40, 40, 40, 40], undefined, 100));

		const signals = await scanTier(ctx, tier(["AAPL"]));

		expect(signals.map((s) => s.ticker)).toEqual(["AAPL"]);
		expect(ctx.fetcher.stats().byProvider.yahoo).toBe(1);
	});

	it("returns an empty list when nothing breaks out", async () => {
		const ctx = scannerContext(scripted);
		expect(await scanTier(ctx, tier(["FLAT", "NONE"]))).toEqual([]);
	});
});

describe("runTierScan", () => {
	it("keeps delivering after a sink failure", async () => {
		const ctx = scannerContext(scripted);
		const delivered: string[] = [];
		const sink = async (signal: BreakoutSignal) => {
			delivered.push(signal.ticker);
			if (delivered.length === 1) throw new Error("telegram down");
		};

		const signals = await runTierScan(ctx, tier(["BRK1", "BRK2"]), sink);

		expect(signals).toHaveLength(2);
		expect([...delivered].sort()).toEqual(["BRK1", "BRK2"]);
	});
});

describe("createNonOverlappingJob", () => {
	it("skips a tick while the previous run is in flight", async () => {
		let runs = 0;
		let finish: () => void = () => {};
		const job = createNonOverlappingJob(
			"test",
			() =>
				new Promise<void>((resolve) => {
					runs++;
					finish = resolve;
				}),
			silentLogger,
		);

		const first = job();
		await job();
		expect(runs).toBe(1);

		finish();
		await first;
		const third = job();
		finish();
		await third;
		expect(runs).toBe(2);
	});

	it("logs and swallows a failed run", async () => {
		const job = createNonOverlappingJob(
			"failing",
			async () => {
				throw new Error("scan failed");
			},
			silentLogger,
		);
		await expect(job()).resolves.toBeUndefined();
	});
});

describe("formatAlert", () => {
	it("renders the headline figures", async () => {
		const ctx = scannerContext(scripted);
		const [signal] = await scanTier(ctx, tier(["BRK1"]));
		const lines = formatAlert(signal).split("\n");

		expect(lines[0]).toBe("*BREAKOUT ALERT*");
		expect(lines[1]).toBe("Score: *75/100* | Strong");
		expect(lines[3]).toBe("*BRK1* @ $103.00");
		expect(lines[4]).toBe("2026-03-10 10:50:00 | 5min | Tier: intraday_5m");
		expect(lines[7]).toBe("Volume: 2.5x avg (RISING, STEADY)");
		expect(lines[lines.length - 1]).toBe("Position: New entry - New breakout - initial entry");
	});
});
