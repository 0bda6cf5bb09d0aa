import type { AtrData, OptionsRecommendation } from "../types";

const HIGH_VOLATILITY_ATR_PCT = 3.0;

export function recommendOptions(
	price: number,
	atrData: AtrData,
	interval: string,
): OptionsRecommendation {
	if (interval === "1min") {
		return {
			strategy: "SHARES_THEN_CALLS",
			strike: price,
			expiryDays: 7,
			reasoning: "Fast 1m breakout - enter with shares, add calls on confirmation",
		};
	}

	if (interval === "5min") {
		if (atrData.atrPercent > HIGH_VOLATILITY_ATR_PCT) {
			return {
				strategy: "CALL_SPREAD",
				strike: price * 1.02,
				expiryDays: 14,
				reasoning: "High volatility - call spread to reduce premium",
			};
		}
		return {
			strategy: "CALL",
			strike: price,
			expiryDays: 14,
			reasoning: "Clean intraday breakout - ATM calls",
		};
	}

	return {
		strategy: "CALL",
		strike: price,
		expiryDays: 30,
		reasoning: "Swing setup - monthly calls for time",
	};
}
