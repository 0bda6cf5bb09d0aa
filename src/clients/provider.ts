import axios, { type AxiosInstance } from "axios";
import type { UsageTracker } from "../services/usageTracker";
import type { Candle } from "../types";
import type { Logger } from "../utils/logger";

export type FetchFailureReason =
	| "not_configured"
	| "quota_exhausted"
	| "transport"
	| "provider_error"
	| "empty";

export type ProviderResult =
	| { ok: true; candles: Candle[] }
	| { ok: false; reason: FetchFailureReason; detail?: string };

export interface ProviderAdapter {
	readonly name: string;
	readonly tracker: UsageTracker;
	fetch(
		symbol: string,
		interval: string,
		outputSize: number,
	): Promise<ProviderResult>;
}

export type RawCandleRow = {
	datetime: unknown;
	open: unknown;
	high: unknown;
	low: unknown;
	close: unknown;
	volume: unknown;
};

export type ProviderRequest = {
	url: string;
	params: Record<string, string | number>;
};

export type ProviderDeps = {
	http: AxiosInstance;
	tracker: UsageTracker;
	logger: Logger;
	timeoutMs: number;
};

export function failure(
	reason: FetchFailureReason,
	detail?: string,
): ProviderResult {
	return { ok: false, reason, detail };
}

function toNumber(value: unknown): number {
	if (typeof value === "number") return value;
	if (typeof value === "string" && value.trim() !== "") return Number(value);
	return Number.NaN;
}

function isUsable(value: number): boolean {
	return Number.isFinite(value) && value >= 0;
}

// Duplicate datetimes keep the last row seen.
export function normalizeRows(
	rows: readonly RawCandleRow[],
	outputSize: number,
): Candle[] {
	const byTime = new Map<string, Candle>();

	for (const row of rows) {
		if (typeof row.datetime !== "string" || row.datetime === "") continue;
		const candle: Candle = {
			datetime: row.datetime,
			open: toNumber(row.open),
			high: toNumber(row.high),
			low: toNumber(row.low),
			close: toNumber(row.close),
			volume: toNumber(row.volume),
		};
		if (
			!isUsable(candle.open) ||
			!isUsable(candle.high) ||
			!isUsable(candle.low) ||
			!isUsable(candle.close) ||
			!isUsable(candle.volume)
		) {
			continue;
		}
		byTime.set(candle.datetime, candle);
	}

	const sorted = [...byTime.values()].sort((a, b) =>
		a.datetime < b.datetime ? -1 : a.datetime > b.datetime ? 1 : 0,
	);
	return outputSize > 0 ? sorted.slice(-outputSize) : sorted;
}

/** Any response counts against the budget; a transport failure does not. */
export abstract class MeteredProvider implements ProviderAdapter {
	abstract readonly name: string;
	readonly tracker: UsageTracker;
	protected readonly http: AxiosInstance;
	protected readonly log: Logger;
	protected readonly timeoutMs: number;

	constructor(deps: ProviderDeps) {
		this.http = deps.http;
		this.tracker = deps.tracker;
		this.log = deps.logger;
		this.timeoutMs = deps.timeoutMs;
	}

	protected isConfigured(): boolean {
		return true;
	}

	protected abstract buildRequest(
		symbol: string,
		interval: string,
		outputSize: number,
	): ProviderRequest;

	protected abstract parse(
		body: unknown,
		interval: string,
		outputSize: number,
	): ProviderResult;

	async fetch(
		symbol: string,
		interval: string,
		outputSize: number,
	): Promise<ProviderResult> {
		if (!this.isConfigured()) {
			return failure("not_configured");
		}

		let result: ProviderResult;
		try {
			result = await this.request(symbol, interval, outputSize);
		} catch (error) {
			result = failure("provider_error", String(error));
		}

		if (result.ok) {
			this.log.info(
				{ provider: this.name, symbol, interval, candles: result.candles.length },
				"Fetched candles",
			);
		} else {
			this.log.debug(
				{ provider: this.name, symbol, interval, reason: result.reason, detail: result.detail },
				"Provider fetch failed",
			);
		}
		return result;
	}

	private async request(
		symbol: string,
		interval: string,
		outputSize: number,
	): Promise<ProviderResult> {
		const reservation = await this.tracker.reserve();
		if (!reservation) {
			return failure("quota_exhausted");
		}

		const { url, params } = this.buildRequest(symbol, interval, outputSize);
		let status: number;
		let body: unknown;
		try {
			const response = await this.http.get<unknown>(url, {
				params,
				timeout: this.timeoutMs,
				validateStatus: () => true,
			});
			status = response.status;
			body = response.data;
		} catch (error) {
			reservation.release();
			const detail = axios.isAxiosError(error)
				? `${error.code ?? "ERR"} ${error.message}`
				: String(error);
			return failure("transport", detail);
		}

		await reservation.commit();

		if (status >= 400) {
			return failure("provider_error", `HTTP ${status}`);
		}
		const parsed = this.parse(body, interval, outputSize);
		if (parsed.ok && parsed.candles.length === 0) {
			return failure("empty");
		}
		return parsed;
	}
}
