import { describe, it, expect } from "vitest";
import { recommendOptions } from "../signals/options";
import { calculateRiskMetrics } from "../signals/risk";
import { calculateSignalStrength } from "../signals/score";
import { analyzeVpa } from "../signals/vpa";
import type { Candle } from "../types";
import { candle } from "./helpers";

/** 20 bars of 2-point range; the last bar's range and the volume halves are configurable. */
function vpaBars(lastRange: number, earlyVolume = 100_000, lateVolume = 100_000): Candle[] {
	return Array.from({ length: 20 }, (_, i) => {
		const range = i === 19 ? lastRange : 2;
		return candle(i, {
			high: 100 + range / 2,
			low: 100 - range / 2,
			volume: i < 10 ? earlyVolume : lateVolume,
		});
	});
}

describe("analyzeVpa", () => {
	it("returns the neutral default with fewer than 20 candles", () => {
		expect(analyzeVpa(vpaBars(2).slice(1), 3.5)).toEqual({
			volumeType: "UNKNOWN",
			effortVsResult: "NEUTRAL",
			volumeTrend: "STEADY",
			strengthScore: 5,
		});
	});

	it("classifies volume by multiple", () => {
		expect(analyzeVpa(vpaBars(2), 3.0).volumeType).toBe("CLIMAX");
		expect(analyzeVpa(vpaBars(2), 1.5).volumeType).toBe("RISING");
		expect(analyzeVpa(vpaBars(2), 0.7).volumeType).toBe("BACKGROUND");
		expect(analyzeVpa(vpaBars(2), 1.0).volumeType).toBe("STEADY");
	});

	it("reads a wide high-volume bar as bullish effort with result", () => {
		expect(analyzeVpa(vpaBars(3.2), 2.0)).toEqual({
			volumeType: "RISING",
			effortVsResult: "BULLISH",
			volumeTrend: "STEADY",
			strengthScore: 8,
		});
	});

	it("reads a narrow high-volume bar as absorption", () => {
		const vpa = analyzeVpa(vpaBars(1.2), 2.5);
		expect(vpa.effortVsResult).toBe("BEARISH");
		expect(vpa.strengthScore).toBe(3);
	});

	it("ignores range below the effort threshold", () => {
		const vpa = analyzeVpa(vpaBars(4), 1.9);
		expect(vpa.effortVsResult).toBe("NEUTRAL");
		expect(vpa.strengthScore).toBe(5);
	});

	it("adjusts strength by the volume trend", () => {
		const rising = analyzeVpa(vpaBars(3.2, 100_000, 140_000), 2.0);
		expect(rising.volumeTrend).toBe("INCREASING");
		expect(rising.strengthScore).toBe(9);

		const fading = analyzeVpa(vpaBars(1.2, 100_000, 60_000), 2.0);
		expect(fading.volumeTrend).toBe("DECREASING");
		expect(fading.strengthScore).toBe(2);
	});
});

describe("calculateRiskMetrics", () => {
	it("places the stop two ATRs below entry with ATR targets", () => {
		const risk = calculateRiskMetrics(100, { atr: 2, atrPercent: 2 });
		expect(risk.stopLoss).toBe(96);
		expect(risk.stopDistancePct).toBe(4);
		expect(risk.positionSizePct).toBe(25);
		expect(risk.target1).toBe(104);
		expect(risk.target2).toBe(106);
		expect(risk.target3).toBe(110);
		expect(risk.riskRewardRatio).toBe((risk.target1 - 100) / (100 - risk.stopLoss));
	});

	it("sizes the position to lose one percent at the stop", () => {
		const risk = calculateRiskMetrics(50, { atr: 2.5, atrPercent: 5 });
		expect(risk.stopDistancePct).toBeCloseTo(10, 10);
		expect(risk.positionSizePct).toBeCloseTo(10, 10);
	});

	it("caps size at 25 percent and guards a zero stop distance", () => {
		const risk = calculateRiskMetrics(100, { atr: 0, atrPercent: 0 });
		expect(risk.stopLoss).toBe(100);
		expect(risk.positionSizePct).toBe(25);
		expect(risk.riskRewardRatio).toBe(0);
	});
});

describe("calculateSignalStrength", () => {
	it("clamps a maxed-out setup to 100", () => {
		// 50 + (8 - 5) * 2 + 20 + 15 + 15 = 106
		expect(
			calculateSignalStrength({ strengthScore: 8 }, { riskRewardRatio: 3.5 }, 3.2, 0.8),
		).toBe(100);
	});

	it("adds the tiered bonuses", () => {
		// 50 + 0 + 15 + 10 + 0
		expect(
			calculateSignalStrength({ strengthScore: 5 }, { riskRewardRatio: 1 }, 2.5, 1.94),
		).toBe(75);
		// 50 - 4 + 10 + 5 + 5
		expect(
			calculateSignalStrength({ strengthScore: 3 }, { riskRewardRatio: 1.5 }, 1.5, 3.0),
		).toBe(66);
		// 50 - 10 + 0 + 0 + 0
		expect(
			calculateSignalStrength({ strengthScore: 0 }, { riskRewardRatio: 0 }, 1.0, 4.0),
		).toBe(40);
	});
});

describe("recommendOptions", () => {
	it("follows the interval and volatility rule table", () => {
		expect(recommendOptions(100, { atr: 1, atrPercent: 1 }, "1min")).toMatchObject({
			strategy: "SHARES_THEN_CALLS",
			strike: 100,
			expiryDays: 7,
		});
		const spread = recommendOptions(100, { atr: 4, atrPercent: 4 }, "5min");
		expect(spread.strategy).toBe("CALL_SPREAD");
		expect(spread.strike).toBeCloseTo(102, 10);
		expect(spread.expiryDays).toBe(14);
		expect(recommendOptions(100, { atr: 1, atrPercent: 1 }, "5min")).toMatchObject({
			strategy: "CALL",
			expiryDays: 14,
		});
		expect(recommendOptions(100, { atr: 1, atrPercent: 1 }, "15min")).toMatchObject({
			strategy: "CALL",
			expiryDays: 30,
		});
	});
});
