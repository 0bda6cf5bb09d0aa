import { isRecord } from "../utils/storage";
import {
	failure,
	MeteredProvider,
	normalizeRows,
	type ProviderDeps,
	type ProviderRequest,
	type ProviderResult,
} from "./provider";

const BASE_URL = "https://www.alphavantage.co/query";
const COMPACT_SIZE = 100;

const INTERVALS: Record<string, string> = {
	"1min": "1min",
	"5min": "5min",
	"15min": "15min",
	"30min": "30min",
	"60min": "60min",
	"1h": "60min",
	"1hour": "60min",
};

export function toAlphaVantageInterval(interval: string): string {
	return INTERVALS[interval] ?? "5min";
}

export class AlphaVantageProvider extends MeteredProvider {
	readonly name = "alpha_vantage";

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
			url: BASE_URL,
			params: {
				function: "TIME_SERIES_INTRADAY",
				symbol,
				interval: toAlphaVantageInterval(interval),
				apikey: this.apiKey,
				outputsize: outputSize > COMPACT_SIZE ? "full" : "compact",
			},
		};
	}

	protected parse(
		body: unknown,
		interval: string,
		outputSize: number,
	): ProviderResult {
		if (!isRecord(body)) {
			return failure("provider_error", "Unexpected payload");
		}
		for (const key of ["Error Message", "Note", "Information"]) {
			if (key in body) {
				return failure("provider_error", String(body[key]));
			}
		}

		const series = body[`Time Series (${toAlphaVantageInterval(interval)})`];
		if (!isRecord(series)) {
			return failure("provider_error", "Missing time series");
		}

		const rows = Object.entries(series).flatMap(([datetime, values]) =>
			isRecord(values)
				? [
						{
							datetime,
							open: values["1. open"],
							high: values["2. high"],
							low: values["3. low"],
							close: values["4. close"],
							volume: values["5. volume"],
						},
					]
				: [],
		);
		return { ok: true, candles: normalizeRows(rows, outputSize) };
	}
}
