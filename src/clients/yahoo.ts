import { isRecord } from "../utils/storage";
import { formatUtcDateTime } from "../utils/time";
import {
	failure,
	MeteredProvider,
	normalizeRows,
	type ProviderRequest,
	type ProviderResult,
	type RawCandleRow,
} from "./provider";

const BASE_URL = "https://query1.finance.yahoo.com/v8/finance/chart";

const INTERVALS: Record<string, string> = {
	"1min": "1m",
	"5min": "5m",
	"15min": "15m",
	"30min": "30m",
	"1h": "1h",
	"1hour": "1h",
};

export function toYahooInterval(interval: string): string {
	return INTERVALS[interval] ?? "5m";
}

export function yahooRange(interval: string): string {
	if (interval === "1min" || interval === "5min") return "5d";
	if (interval === "15min") return "1mo";
	return "3mo";
}

function at(values: unknown, index: number): unknown {
	return Array.isArray(values) ? values[index] : undefined;
}

// Timestamps are rendered in exchange-local time.
export class YahooProvider extends MeteredProvider {
	readonly name = "yahoo";

	protected buildRequest(symbol: string, interval: string): ProviderRequest {
		return {
			url: `${BASE_URL}/${encodeURIComponent(symbol)}`,
			params: {
				interval: toYahooInterval(interval),
				range: yahooRange(interval),
			},
		};
	}

	protected parse(
		body: unknown,
		_interval: string,
		outputSize: number,
	): ProviderResult {
		const chart = isRecord(body) ? body.chart : undefined;
		if (!isRecord(chart)) {
			return failure("provider_error", "Unexpected payload");
		}
		if (isRecord(chart.error)) {
			return failure("provider_error", String(chart.error.description ?? "Unknown error"));
		}

		const result = Array.isArray(chart.result) ? chart.result[0] : undefined;
		if (!isRecord(result) || !Array.isArray(result.timestamp)) {
			return failure("empty");
		}

		const meta = isRecord(result.meta) ? result.meta : {};
		const offsetSeconds = typeof meta.gmtoffset === "number" ? meta.gmtoffset : 0;
		const indicators = isRecord(result.indicators) ? result.indicators : {};
		const quote = Array.isArray(indicators.quote) ? indicators.quote[0] : undefined;
		if (!isRecord(quote)) {
			return failure("empty");
		}

		const rows: RawCandleRow[] = result.timestamp.map((ts: unknown, i: number) => ({
			datetime:
				typeof ts === "number"
					? formatUtcDateTime((ts + offsetSeconds) * 1000)
					: undefined,
			open: at(quote.open, i),
			high: at(quote.high, i),
			low: at(quote.low, i),
			close: at(quote.close, i),
			volume: at(quote.volume, i),
		}));
		return { ok: true, candles: normalizeRows(rows, outputSize) };
	}
}
