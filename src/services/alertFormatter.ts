import type { BreakoutSignal, PyramidAction } from "../types";

const PYRAMID_LABEL: Record<PyramidAction, string> = {
	INITIAL: "New entry",
	ADD_25: "Add 25%",
	ADD_50: "Add 50%",
	HOLD: "Hold",
	EXIT: "Exit",
};

function scoreRating(score: number): string {
	if (score >= 85) return "Excellent";
	if (score >= 70) return "Strong";
	if (score >= 55) return "Moderate";
	return "Weak";
}

function money(value: number): string {
	return `$${value.toFixed(2)}`;
}

export function formatAlert(signal: BreakoutSignal): string {
	const { risk, vpa, atr, options, pyramid } = signal;
	return [
		"*BREAKOUT ALERT*",
		`Score: *${signal.strength.toFixed(0)}/100* | ${scoreRating(signal.strength)}`,
		"",
		`*${signal.ticker}* @ ${money(signal.price)}`,
		`${signal.time} | ${signal.interval} | Tier: ${signal.tier}`,
		"",
		`Base: ${signal.rangePct.toFixed(1)}% range`,
		`Volume: ${signal.volumeMultiple.toFixed(1)}x avg (${vpa.volumeType}, ${vpa.volumeTrend})`,
		`Effort vs result: ${vpa.effortVsResult} | VPA ${vpa.strengthScore.toFixed(1)}/10`,
		`ATR: ${money(atr.atr)} (${atr.atrPercent.toFixed(2)}%)`,
		"",
		`Stop: ${money(risk.stopLoss)} (-${risk.stopDistancePct.toFixed(2)}%)`,
		`Targets: ${money(risk.target1)} / ${money(risk.target2)} / ${money(risk.target3)}`,
		`Size: ${risk.positionSizePct.toFixed(1)}% | R:R ${risk.riskRewardRatio.toFixed(2)}`,
		"",
		`Options: ${options.strategy} ${money(options.strike)} ${options.expiryDays}d - ${options.reasoning}`,
		`Position: ${PYRAMID_LABEL[pyramid.action]} - ${pyramid.reasoning}`,
	].join("\n");
}
