import { ema } from "../indicators/ema";
import type { CandleSeries } from "../types";

export type BreakoutOptions = {
	lookbackBars: number;
	volLength: number;
	volMultiplier: number;
	maxRangePct: number;
	minAvgVolume: number;
};

export const DEFAULT_BREAKOUT_OPTIONS: BreakoutOptions = {
	lookbackBars: 20,
	volLength: 20,
	volMultiplier: 2.0,
	maxRangePct: 3.0,
	minAvgVolume: 100_000,
};

const MIN_BARS = 50;

export type BreakoutConditions = {
	rangeHigh: number;
	rangeLow: number;
	rangePct: number;
	avgVolume: number;
	volumeMultiple: number;
	ema20: number;
	ema50: number;
	ema200: number;
	consolidating: boolean;
	volumeSpike: boolean;
	breaksRange: boolean;
	bullishBar: boolean;
	trendOk: boolean;
};

export type BreakoutCheck =
	| { status: "insufficient_data" }
	| { status: "illiquid"; avgVolume: number }
	| { status: "evaluated"; conditions: BreakoutConditions; triggered: boolean };

// The base range excludes the current bar.
export function checkBreakout(
	candles: CandleSeries,
	options: BreakoutOptions = DEFAULT_BREAKOUT_OPTIONS,
): BreakoutCheck {
	const { lookbackBars, volLength, volMultiplier, maxRangePct, minAvgVolume } =
		options;
	const n = candles.length;
	if (n < Math.max(lookbackBars + 1, volLength + 1, MIN_BARS)) {
		return { status: "insufficient_data" };
	}

	const last = candles[n - 1];
	if (last.close === 0) {
		return { status: "insufficient_data" };
	}

	const base = candles.slice(n - 1 - lookbackBars, n - 1);
	const rangeHigh = Math.max(...base.map((c) => c.high));
	const rangeLow = Math.min(...base.map((c) => c.low));
	const rangePct = ((rangeHigh - rangeLow) / last.close) * 100;

	const recentVols = candles.slice(-volLength).map((c) => c.volume);
	const avgVolume = recentVols.reduce((acc, v) => acc + v, 0) / recentVols.length;
	if (avgVolume < minAvgVolume) {
		return { status: "illiquid", avgVolume };
	}

	const closes = candles.map((c) => c.close);
	const ema20 = ema(closes, 20);
	const ema50 = ema(closes, 50);
	const ema200 = ema(closes, Math.min(200, closes.length));

	const conditions: BreakoutConditions = {
		rangeHigh,
		rangeLow,
		rangePct,
		avgVolume,
		volumeMultiple: avgVolume > 0 ? last.volume / avgVolume : 0,
		ema20,
		ema50,
		ema200,
		consolidating: rangePct <= maxRangePct,
		volumeSpike: last.volume >= volMultiplier * avgVolume,
		breaksRange: last.close > rangeHigh,
		bullishBar: last.close > last.open,
		trendOk: last.close > ema20 && ema20 > ema50 && ema50 > ema200,
	};

	return {
		status: "evaluated",
		conditions,
		triggered:
			conditions.consolidating &&
			conditions.volumeSpike &&
			conditions.breaksRange &&
			conditions.bullishBar &&
			conditions.trendOk,
	};
}
