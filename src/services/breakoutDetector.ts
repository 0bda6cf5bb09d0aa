import { calculateAtr, DEFAULT_ATR_PERIOD } from "../indicators/atr";
import {
	type BreakoutOptions,
	checkBreakout,
	DEFAULT_BREAKOUT_OPTIONS,
} from "../patterns/breakout";
import { recommendOptions } from "../signals/options";
import { calculateRiskMetrics, DEFAULT_ATR_MULTIPLIER } from "../signals/risk";
import { calculateSignalStrength } from "../signals/score";
import { analyzeVpa } from "../signals/vpa";
import type { BreakoutSignal, CandleSeries } from "../types";
import type { Logger } from "../utils/logger";
import type { PyramidEngine } from "./pyramidEngine";

export type DetectorOptions = BreakoutOptions & {
	atrPeriod: number;
	atrMultiplier: number;
};

export const DEFAULT_DETECTOR_OPTIONS: DetectorOptions = {
	...DEFAULT_BREAKOUT_OPTIONS,
	atrPeriod: DEFAULT_ATR_PERIOD,
	atrMultiplier: DEFAULT_ATR_MULTIPLIER,
};

function deepFreeze<T extends object>(value: T): Readonly<T> {
	for (const nested of Object.values(value)) {
		if (typeof nested === "object" && nested !== null) {
			deepFreeze(nested);
		}
	}
	return Object.freeze(value);
}

export class BreakoutDetector {
	private readonly options: DetectorOptions;

	constructor(
		private readonly pyramid: PyramidEngine,
		private readonly log: Logger,
		options: Partial<DetectorOptions> = {},
	) {
		this.options = { ...DEFAULT_DETECTOR_OPTIONS, ...options };
	}

	// The pyramid decision updates the position store.
	async detectBreakout(
		symbol: string,
		interval: string,
		candles: CandleSeries,
		tier = "",
	): Promise<BreakoutSignal | null> {
		const check = checkBreakout(candles, this.options);
		if (check.status === "insufficient_data") {
			this.log.debug({ symbol, interval, bars: candles.length }, "Not enough bars");
			return null;
		}
		if (check.status === "illiquid") {
			this.log.debug({ symbol, avgVolume: check.avgVolume }, "Below liquidity floor");
			return null;
		}
		if (!check.triggered) {
			return null;
		}

		const { rangePct, volumeMultiple } = check.conditions;
		const last = candles[candles.length - 1];
		const price = last.close;

		const atr = calculateAtr(candles, this.options.atrPeriod);
		const risk = calculateRiskMetrics(price, atr, this.options.atrMultiplier);
		const vpa = analyzeVpa(candles, volumeMultiple);
		const options = recommendOptions(price, atr, interval);
		const pyramid = await this.pyramid.evaluate({
			ticker: symbol,
			price,
			time: last.datetime,
			interval,
			stopLoss: risk.stopLoss,
		});
		const strength = calculateSignalStrength(vpa, risk, volumeMultiple, rangePct);

		this.log.info(
			{ symbol, interval, price, volumeMultiple, rangePct, strength, action: pyramid.action },
			"Breakout detected",
		);

		return deepFreeze({
			ticker: symbol,
			interval,
			tier,
			price,
			time: last.datetime,
			rangePct,
			volumeMultiple,
			atr,
			risk,
			vpa,
			options,
			pyramid,
			strength,
		});
	}
}
