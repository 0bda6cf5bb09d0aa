import type { AtrData, RiskMetrics } from "../types";

export const DEFAULT_ATR_MULTIPLIER = 2.0;
/** Portfolio percent lost when the stop is hit. */
const RISK_PER_TRADE_PCT = 1;
const MAX_POSITION_PCT = 25;

export function calculateRiskMetrics(
	price: number,
	atrData: AtrData,
	atrMultiplier = DEFAULT_ATR_MULTIPLIER,
): RiskMetrics {
	const { atr } = atrData;
	const stopLoss = price - atr * atrMultiplier;
	const stopDistancePct = price > 0 ? ((price - stopLoss) / price) * 100 : 0;
	const positionSizePct =
		stopDistancePct > 0
			? Math.min((RISK_PER_TRADE_PCT / stopDistancePct) * 100, MAX_POSITION_PCT)
			: MAX_POSITION_PCT;

	const target1 = price + atr * 2;
	const risk = price - stopLoss;
	const reward = target1 - price;

	return {
		entryPrice: price,
		stopLoss,
		stopDistancePct,
		positionSizePct,
		riskRewardRatio: risk > 0 ? reward / risk : 0,
		target1,
		target2: price + atr * 3,
		target3: price + atr * 5,
	};
}
