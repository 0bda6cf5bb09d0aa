import type { AtrData, CandleSeries } from "../types";

export const DEFAULT_ATR_PERIOD = 14;

function withPercent(atr: number, lastClose: number): AtrData {
	return {
		atr,
		atrPercent: lastClose > 0 ? (atr / lastClose) * 100 : 0,
	};
}

/**
 * Simple-average ATR over the last `period` true ranges. With fewer than
 * `period + 1` candles it degrades to the mean high-low range of the tail.
 */
export function calculateAtr(
	candles: CandleSeries,
	period = DEFAULT_ATR_PERIOD,
): AtrData {
	if (candles.length === 0) {
		return { atr: 0, atrPercent: 0 };
	}
	const lastClose = candles[candles.length - 1].close;

	if (candles.length < period + 1) {
		const recent = candles.slice(-period);
		const avgRange =
			recent.reduce((acc, c) => acc + (c.high - c.low), 0) / recent.length;
		return withPercent(Math.max(0, avgRange), lastClose);
	}

	const trueRanges: number[] = [];

	for (let i = 1; i < candles.length; i++) {
		const prev = candles[i - 1];
		const curr = candles[i];
		const tr = Math.max(
			curr.high - curr.low,
			Math.abs(curr.high - prev.close),
			Math.abs(curr.low - prev.close),
		);
		trueRanges.push(tr);
	}

	const recent = trueRanges.slice(-period);
	const sum = recent.reduce((acc, val) => acc + val, 0);
	return withPercent(sum / period, lastClose);
}
