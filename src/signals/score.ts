import type { RiskMetrics, VpaAnalysis } from "../types";

function volumeBonus(multiple: number): number {
	if (multiple >= 3.0) return 20;
	if (multiple >= 2.0) return 15;
	if (multiple >= 1.5) return 10;
	return 0;
}

function tightBaseBonus(rangePct: number): number {
	if (rangePct <= 1.0) return 15;
	if (rangePct <= 2.0) return 10;
	if (rangePct <= 3.0) return 5;
	return 0;
}

function riskRewardBonus(ratio: number): number {
	if (ratio >= 3.0) return 15;
	if (ratio >= 2.0) return 10;
	if (ratio >= 1.5) return 5;
	return 0;
}

export function calculateSignalStrength(
	vpa: Pick<VpaAnalysis, "strengthScore">,
	risk: Pick<RiskMetrics, "riskRewardRatio">,
	volumeMultiple: number,
	rangePct: number,
): number {
	const score =
		50 +
		(vpa.strengthScore - 5) * 2 +
		volumeBonus(volumeMultiple) +
		tightBaseBonus(rangePct) +
		riskRewardBonus(risk.riskRewardRatio);
	return Math.min(100, Math.max(0, score));
}
