import type { Position, PyramidAction, PyramidSignal } from "../types";
import type { Logger } from "../utils/logger";
import type { PositionStore } from "./positionStore";

const EXIT_BELOW_PCT = -2.0;
const FIRST_ADD_PCT = 10.0;
const SECOND_ADD_PCT = 20.0;
const LET_RUN_PCT = 5.0;

const ADD_PERCENT: Partial<Record<PyramidAction, number>> = {
	ADD_25: 25,
	ADD_50: 50,
};

export function profitPct(entryPrice: number, price: number): number {
	return ((price - entryPrice) / entryPrice) * 100;
}

// One rung per evaluation: +20% with no adds yet still takes ADD_25 first.
export function decidePyramid(
	position: Position | undefined,
	price: number,
): PyramidSignal {
	if (!position || position.status !== "ACTIVE") {
		return {
			action: "INITIAL",
			reasoning: "New breakout - initial entry",
			currentProfitPct: 0,
		};
	}

	const profit = profitPct(position.entryPrice, price);
	const adds = position.adds.length;

	if (profit < EXIT_BELOW_PCT) {
		return {
			action: "EXIT",
			reasoning: "Position against us - cut the loss",
			currentProfitPct: profit,
		};
	}
	if (profit >= FIRST_ADD_PCT && adds === 0) {
		return {
			action: "ADD_25",
			reasoning: "Strong move +10% - add 25% to the winner",
			currentProfitPct: profit,
			suggestedAddPrice: price,
		};
	}
	if (profit >= SECOND_ADD_PCT && adds === 1) {
		return {
			action: "ADD_50",
			reasoning: "Exceptional move +20% - final 50% add",
			currentProfitPct: profit,
			suggestedAddPrice: price,
		};
	}
	if (profit >= LET_RUN_PCT) {
		return {
			action: "HOLD",
			reasoning: `In profit +${profit.toFixed(1)}% - let it run`,
			currentProfitPct: profit,
		};
	}
	return {
		action: "HOLD",
		reasoning: "Early in trade - monitor",
		currentProfitPct: profit,
	};
}

export type PyramidInput = {
	ticker: string;
	price: number;
	time: string;
	interval: string;
	stopLoss: number;
};

export class PyramidEngine {
	constructor(
		private readonly positions: PositionStore,
		private readonly log: Logger,
	) {}

	evaluate(input: PyramidInput): Promise<PyramidSignal> {
		const { ticker, price } = input;

		return this.positions.withTicker(ticker, async () => {
			const position = await this.positions.get(ticker);
			const signal = decidePyramid(position, price);

			if (signal.action === "INITIAL") {
				await this.positions.open({
					ticker,
					entryPrice: price,
					entryTime: input.time,
					interval: input.interval,
					stopLoss: input.stopLoss,
				});
				return signal;
			}

			await this.positions.markPrice(ticker, price);

			const addPercent = ADD_PERCENT[signal.action];
			if (addPercent !== undefined) {
				await this.positions.addPyramid(ticker, price, addPercent);
			} else if (signal.action === "EXIT") {
				await this.positions.close(ticker, price, signal.reasoning);
			}

			this.log.debug(
				{ ticker, action: signal.action, profitPct: signal.currentProfitPct },
				"Pyramid decision",
			);
			return signal;
		});
	}
}
