import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import type { ScanTier } from "../types";
import { isRecord } from "../utils/storage";

dotenv.config();

const dataDir = process.env.DATA_DIR || path.join(process.cwd(), "data");
const universeFile =
	process.env.UNIVERSE_FILE || path.join(process.cwd(), "data/universe.json");

function numberEnv(name: string, fallback: number): number {
	const raw = process.env[name];
	if (raw === undefined || raw.trim() === "") return fallback;
	const value = Number(raw);
	return Number.isFinite(value) ? value : fallback;
}

function optionalNumberEnv(name: string): number | undefined {
	const value = numberEnv(name, Number.NaN);
	return Number.isNaN(value) ? undefined : value;
}

function limitEnv(name: string, fallback: number): number {
	const raw = process.env[name];
	if (raw && raw.trim().toLowerCase() === "unlimited") {
		return Number.POSITIVE_INFINITY;
	}
	return numberEnv(name, fallback);
}

export type Universe = {
	tiers: ScanTier[];
	priority: Record<string, number>;
};

export function parseUniverse(raw: unknown): Universe {
	if (!isRecord(raw) || !isRecord(raw.tiers)) {
		throw new Error("Universe file must define a tiers object");
	}

	const tiers = Object.entries(raw.tiers).map(([name, tier]): ScanTier => {
		if (
			!isRecord(tier) ||
			typeof tier.interval !== "string" ||
			typeof tier.cron !== "string" ||
			!Array.isArray(tier.symbols)
		) {
			throw new Error(`Invalid tier definition: ${name}`);
		}
		return {
			name,
			description: typeof tier.description === "string" ? tier.description : name,
			interval: tier.interval,
			cron: tier.cron,
			symbols: tier.symbols.filter((s): s is string => typeof s === "string"),
		};
	});

	const priority: Record<string, number> = {};
	if (isRecord(raw.priority)) {
		for (const [symbol, value] of Object.entries(raw.priority)) {
			if (typeof value === "number") priority[symbol] = value;
		}
	}
	return { tiers, priority };
}

export function loadUniverse(filePath = universeFile): Universe {
	return parseUniverse(JSON.parse(fs.readFileSync(filePath, "utf8")));
}

export const SYMBOL_BUDGET_MARGIN_MS = 5_000;

/** Per-symbol budget; never shorter than the whole provider chain plus a margin. */
export function symbolTimeoutFor(
	providerTimeouts: readonly number[],
	requestedMs?: number,
	marginMs = SYMBOL_BUDGET_MARGIN_MS,
): number {
	const chainMs = providerTimeouts.reduce((acc, ms) => acc + ms, 0) + marginMs;
	return requestedMs === undefined ? chainMs : Math.max(requestedMs, chainMs);
}

const cacheTtlSeconds: Record<string, number> = {
	"1min": numberEnv("CACHE_TTL_1MIN_SEC", 120),
	"5min": numberEnv("CACHE_TTL_5MIN_SEC", 300),
	"15min": numberEnv("CACHE_TTL_15MIN_SEC", 900),
};

const providers = {
	fmp: {
		apiKey: process.env.FMP_API_KEY || "",
		maxPerDay: limitEnv("FMP_MAX_PER_DAY", 250),
		maxPerMinute: limitEnv("FMP_MAX_PER_MINUTE", 10),
		timeoutMs: numberEnv("FMP_TIMEOUT_MS", 10_000),
	},
	twelveData: {
		apiKey: process.env.TWELVE_DATA_API_KEY || "",
		// 800 calls/month on the free plan
		maxPerDay: limitEnv("TWELVE_DATA_MAX_PER_DAY", 25),
		maxPerMinute: limitEnv("TWELVE_DATA_MAX_PER_MINUTE", 5),
		timeoutMs: numberEnv("TWELVE_DATA_TIMEOUT_MS", 10_000),
	},
	alphaVantage: {
		apiKey: process.env.ALPHA_VANTAGE_API_KEY || "",
		maxPerDay: limitEnv("ALPHA_VANTAGE_MAX_PER_DAY", 25),
		maxPerMinute: limitEnv("ALPHA_VANTAGE_MAX_PER_MINUTE", 5),
		timeoutMs: numberEnv("ALPHA_VANTAGE_TIMEOUT_MS", 15_000),
	},
	yahoo: {
		maxPerDay: limitEnv("YAHOO_MAX_PER_DAY", Number.POSITIVE_INFINITY),
		maxPerMinute: limitEnv("YAHOO_MAX_PER_MINUTE", Number.POSITIVE_INFINITY),
		timeoutMs: numberEnv("YAHOO_TIMEOUT_MS", 10_000),
	},
};

export const config = {
	providers,
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
	},
	cache: {
		ttlSeconds: cacheTtlSeconds,
	},
	scan: {
		outputSize: numberEnv("OUTPUT_SIZE", 120),
		concurrency: Math.max(1, numberEnv("SCAN_CONCURRENCY", 4)),
		symbolTimeoutMs: symbolTimeoutFor(
			Object.values(providers).map((p) => p.timeoutMs),
			optionalNumberEnv("SYMBOL_TIMEOUT_MS"),
		),
		maxSymbolsPerScan: numberEnv("MAX_SYMBOLS_PER_SCAN", 0),
	},
	scheduling: {
		cacheSweepCron: "0 * * * *",
		timezone: process.env.SCHEDULE_TIMEZONE || "America/New_York",
		runOnStart: (process.env.RUN_ON_START || "false").toLowerCase() === "true",
	},
	paths: {
		cache: path.join(dataDir, "api-cache.json"),
		usage: (provider: string) => path.join(dataDir, `${provider}-usage.json`),
		positions: path.join(dataDir, "positions.json"),
	},
};

export type AppConfig = typeof config;
