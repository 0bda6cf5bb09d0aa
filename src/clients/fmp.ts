import { isRecord } from "../utils/storage";
import {
	failure,
	MeteredProvider,
	normalizeRows,
	type ProviderDeps,
	type ProviderRequest,
	type ProviderResult,
} from "./provider";

const BASE_URL = "https://financialmodelingprep.com/api/v3";

const INTERVALS: Record<string, string> = {
	"1min": "1min",
	"5min": "5min",
	"15min": "15min",
	"30min": "30min",
	"1h": "1hour",
	"1hour": "1hour",
};

export function toFmpInterval(interval: string): string {
	return INTERVALS[interval] ?? "5min";
}

export class FmpProvider extends MeteredProvider {
	readonly name = "fmp";

	constructor(
		deps: ProviderDeps,
		private readonly apiKey: string,
	) {
		super(deps);
	}

	protected isConfigured(): boolean {
		return this.apiKey !== "";
	}

	protected buildRequest(symbol: string, interval: string): ProviderRequest {
		return {
			url: `${BASE_URL}/historical-chart/${toFmpInterval(interval)}/${encodeURIComponent(symbol)}`,
			params: { apikey: this.apiKey },
		};
	}

	protected parse(
		body: unknown,
		_interval: string,
		outputSize: number,
	): ProviderResult {
		if (isRecord(body) && "Error Message" in body) {
			return failure("provider_error", String(body["Error Message"]));
		}
		if (!Array.isArray(body) || body.length === 0) {
			return failure("empty");
		}

		const newest = body.slice(0, outputSize).filter(isRecord);
		return {
			ok: true,
			candles: normalizeRows(
				newest.map((row) => ({
					datetime: row.date,
					open: row.open,
					high: row.high,
					low: row.low,
					close: row.close,
					volume: row.volume,
				})),
				outputSize,
			),
		};
	}
}
