import type { Position, PyramidAdd } from "../types";
import type { KeyValueStore } from "../utils/keyValueStore";
import type { Logger } from "../utils/logger";
import { KeyedMutex } from "../utils/mutex";
import { isRecord } from "../utils/storage";
import { type Clock, systemClock } from "../utils/time";

function isPyramidAdd(value: unknown): value is PyramidAdd {
	return (
		isRecord(value) &&
		typeof value.price === "number" &&
		typeof value.percent === "number" &&
		typeof value.time === "string"
	);
}

export function isPosition(value: unknown): value is Position {
	return (
		isRecord(value) &&
		typeof value.ticker === "string" &&
		typeof value.entryPrice === "number" &&
		typeof value.entryTime === "string" &&
		typeof value.interval === "string" &&
		typeof value.stopLoss === "number" &&
		typeof value.highestPrice === "number" &&
		Array.isArray(value.adds) &&
		value.adds.every(isPyramidAdd) &&
		(value.status === "ACTIVE" || value.status === "CLOSED")
	);
}

export type NewPosition = {
	ticker: string;
	entryPrice: number;
	entryTime: string;
	interval: string;
	stopLoss: number;
};

export type PositionStoreOptions = {
	store: KeyValueStore<Position>;
	logger: Logger;
	clock?: Clock;
};

export class PositionStore {
	private readonly store: KeyValueStore<Position>;
	private readonly log: Logger;
	private readonly clock: Clock;
	private readonly mutex = new KeyedMutex();

	constructor(options: PositionStoreOptions) {
		this.store = options.store;
		this.log = options.logger;
		this.clock = options.clock ?? systemClock;
	}

	withTicker<T>(ticker: string, task: () => Promise<T>): Promise<T> {
		return this.mutex.run(ticker, task);
	}

	get(ticker: string): Promise<Position | undefined> {
		return this.store.get(ticker);
	}

	async hasActive(ticker: string): Promise<boolean> {
		const position = await this.store.get(ticker);
		return position?.status === "ACTIVE";
	}

	async list(): Promise<Position[]> {
		const entries = await this.store.entries();
		return entries.map(([, position]) => position);
	}

	async open(entry: NewPosition): Promise<Position> {
		const position: Position = {
			...entry,
			highestPrice: entry.entryPrice,
			adds: [],
			status: "ACTIVE",
			lastUpdate: this.nowIso(),
		};
		await this.store.put(entry.ticker, position);
		this.log.info(
			{ ticker: entry.ticker, entryPrice: entry.entryPrice, stopLoss: entry.stopLoss },
			"Opened position",
		);
		return position;
	}

	markPrice(ticker: string, price: number): Promise<Position | undefined> {
		return this.updateActive(ticker, (position) => ({
			...position,
			highestPrice: Math.max(position.highestPrice, price),
			lastUpdate: this.nowIso(),
		}));
	}

	async addPyramid(
		ticker: string,
		price: number,
		percent: number,
	): Promise<Position | undefined> {
		const updated = await this.updateActive(ticker, (position) => ({
			...position,
			adds: [...position.adds, { price, percent, time: this.nowIso() }],
		}));
		if (updated) {
			this.log.info({ ticker, price, percent, adds: updated.adds.length }, "Recorded pyramid add");
		}
		return updated;
	}

	async close(
		ticker: string,
		exitPrice: number,
		reason: string,
	): Promise<Position | undefined> {
		const closed = await this.updateActive(ticker, (position) => ({
			...position,
			status: "CLOSED",
			exitPrice,
			exitReason: reason,
			exitTime: this.nowIso(),
		}));
		if (closed) {
			this.log.info({ ticker, exitPrice, reason }, "Closed position");
		}
		return closed;
	}

	private async updateActive(
		ticker: string,
		apply: (position: Position) => Position,
	): Promise<Position | undefined> {
		const outcome = { applied: false };
		const result = await this.store.update(ticker, (current) => {
			if (!current || current.status !== "ACTIVE") return current;
			outcome.applied = true;
			return apply(current);
		});
		return outcome.applied ? result : undefined;
	}

	private nowIso(): string {
		return new Date(this.clock()).toISOString();
	}
}
