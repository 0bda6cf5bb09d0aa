import { isRecord } from "../utils/storage";
import {
	failure,
	MeteredProvider,
	normalizeRows,
	type ProviderDeps,
	type ProviderRequest,
	type ProviderResult,
} from "./provider";

const BASE_URL = "https://api.twelvedata.com";

const INTERVALS: Record<string, string> = {
	"1min": "1min",
	"5min": "5min",
	"15min": "15min",
	"30min": "30min",
	"45min": "45min",
	"1h": "1h",
	"1hour": "1h",
	"1day": "1day",
};

export function toTwelveDataInterval(interval: string): string {
	return INTERVALS[interval] ?? "5min";
}

export class TwelveDataProvider extends MeteredProvider {
	readonly name = "twelve_data";

	constructor(
		deps: ProviderDeps,
		private readonly apiKey: string,
	) {
		super(deps);
	}

	protected isConfigured(): boolean {
		return this.apiKey !== "";
	}

	protected buildRequest(
		symbol: string,
		interval: string,
		outputSize: number,
	): ProviderRequest {
		return {
			url: `${BASE_URL}/time_series`,
			params: {
				symbol,
				interval: toTwelveDataInterval(interval),
				outputsize: outputSize,
				apikey: this.apiKey,
				order: "ASC",
			},
		};
	}

	protected parse(
		body: unknown,
		_interval: string,
		outputSize: number,
	): ProviderResult {
		if (!isRecord(body)) {
			return failure("provider_error", "Unexpected payload");
		}
		if (body.status === "error") {
			return failure("provider_error", String(body.message ?? "Unknown error"));
		}
		const values = body.values;
		if (!Array.isArray(values) || values.length === 0) {
			return failure("empty");
		}

		return {
			ok: true,
			candles: normalizeRows(
				values.filter(isRecord).map((row) => ({
					datetime: row.datetime,
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
