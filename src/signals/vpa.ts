import type {
	CandleSeries,
	EffortVsResult,
	VolumeTrend,
	VolumeType,
	VpaAnalysis,
} from "../types";

const WINDOW = 20;
const HALF = WINDOW / 2;

function classifyVolume(multiple: number): VolumeType {
	if (multiple >= 3.0) return "CLIMAX";
	if (multiple >= 1.5) return "RISING";
	if (multiple <= 0.7) return "BACKGROUND";
	return "STEADY";
}

function average(values: readonly number[]): number {
	return values.length ? values.reduce((acc, v) => acc + v, 0) / values.length : 0;
}

export function analyzeVpa(
	candles: CandleSeries,
	volumeMultiple: number,
): VpaAnalysis {
	if (candles.length < WINDOW) {
		return {
			volumeType: "UNKNOWN",
			effortVsResult: "NEUTRAL",
			volumeTrend: "STEADY",
			strengthScore: 5,
		};
	}

	const recent = candles.slice(-WINDOW);
	const last = recent[recent.length - 1];

	let effortVsResult: EffortVsResult = "NEUTRAL";
	let strength = 5;
	if (volumeMultiple >= 2.0) {
		const range = last.high - last.low;
		const avgRange = average(recent.slice(0, -1).map((c) => c.high - c.low));
		if (range > avgRange * 1.5) {
			effortVsResult = "BULLISH";
			strength = 8;
		} else if (range < avgRange * 0.7) {
			effortVsResult = "BEARISH";
			strength = 3;
		}
	}

	const earlyVol = average(recent.slice(0, HALF).map((c) => c.volume));
	const lateVol = average(recent.slice(-HALF).map((c) => c.volume));
	let volumeTrend: VolumeTrend = "STEADY";
	if (lateVol > earlyVol * 1.3) {
		volumeTrend = "INCREASING";
		strength += 1;
	} else if (lateVol < earlyVol * 0.7) {
		volumeTrend = "DECREASING";
		strength -= 1;
	}

	return {
		volumeType: classifyVolume(volumeMultiple),
		effortVsResult,
		volumeTrend,
		strengthScore: Math.min(10, Math.max(0, strength)),
	};
}
