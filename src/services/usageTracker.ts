import type { UsageRecord, UsageStats } from "../types";
import type { KeyValueStore } from "../utils/keyValueStore";
import type { Logger } from "../utils/logger";
import { KeyedMutex } from "../utils/mutex";
import { isRecord } from "../utils/storage";
import { type Clock, localDay, systemClock } from "../utils/time";

const MINUTE_MS = 60 * 1000;

export type UsageLimits = {
	maxPerDay: number;
	maxPerMinute: number;
};

export type UsageTrackerOptions = {
	provider: string;
	limits: UsageLimits;
	store: KeyValueStore<UsageRecord>;
	logger: Logger;
	clock?: Clock;
};

export type Reservation = {
	commit(): Promise<void>;
	release(): void;
};

export function isUsageRecord(value: unknown): value is UsageRecord {
	return (
		isRecord(value) &&
		typeof value.date === "string" &&
		typeof value.calls === "number" &&
		typeof value.last_reset === "string" &&
		Array.isArray(value.minute_calls) &&
		value.minute_calls.every((t) => typeof t === "number")
	);
}

function emptyUsage(now: number): UsageRecord {
	return {
		date: localDay(now),
		calls: 0,
		last_reset: new Date(now).toISOString(),
		minute_calls: [],
	};
}

export class UsageTracker {
	readonly provider: string;
	readonly limits: UsageLimits;
	private readonly store: KeyValueStore<UsageRecord>;
	private readonly log: Logger;
	private readonly clock: Clock;
	private readonly mutex = new KeyedMutex();
	private pending = 0;

	constructor(options: UsageTrackerOptions) {
		this.provider = options.provider;
		this.limits = options.limits;
		this.store = options.store;
		this.log = options.logger;
		this.clock = options.clock ?? systemClock;
	}

	canCall(): Promise<boolean> {
		return this.locked(async (usage, now) => this.allows(usage, now));
	}

	async recordCall(): Promise<void> {
		await this.locked((usage, now) => this.increment(usage, now));
	}

	remaining(): Promise<number> {
		return this.locked(async (usage) => this.remainingFor(usage));
	}

	reserve(): Promise<Reservation | null> {
		return this.locked(async (usage, now) => {
			if (!this.allows(usage, now)) {
				this.log.debug(
					{ provider: this.provider, calls: usage.calls },
					"Call budget exhausted",
				);
				return null;
			}
			this.pending++;
			let settled = false;
			return {
				commit: async () => {
					if (settled) return;
					settled = true;
					await this.locked(async (current, at) => {
						this.pending--;
						await this.increment(current, at);
					});
				},
				release: () => {
					if (settled) return;
					settled = true;
					this.pending--;
				},
			};
		});
	}

	stats(): Promise<UsageStats> {
		return this.locked(async (usage) => {
			const { maxPerDay } = this.limits;
			return {
				provider: this.provider,
				date: usage.date,
				callsUsed: usage.calls,
				callsRemaining: this.remainingFor(usage),
				limit: maxPerDay,
				usagePct: Number.isFinite(maxPerDay) ? (usage.calls / maxPerDay) * 100 : 0,
			};
		});
	}

	private remainingFor(usage: UsageRecord): number {
		return Math.max(0, this.limits.maxPerDay - usage.calls - this.pending);
	}

	private allows(usage: UsageRecord, now: number): boolean {
		if (usage.calls + this.pending >= this.limits.maxPerDay) return false;
		const lastMinute = usage.minute_calls.filter((t) => now - t < MINUTE_MS);
		return lastMinute.length + this.pending < this.limits.maxPerMinute;
	}

	private async increment(usage: UsageRecord, now: number): Promise<void> {
		const next: UsageRecord = {
			...usage,
			calls: usage.calls + 1,
			minute_calls: [
				...usage.minute_calls.filter((t) => now - t < MINUTE_MS),
				now,
			],
		};
		await this.store.put(this.provider, next);
	}

	private locked<T>(
		task: (usage: UsageRecord, now: number) => Promise<T>,
	): Promise<T> {
		return this.mutex.run(this.provider, async () => {
			const now = this.clock();
			const usage = await this.currentUsage(now);
			return task(usage, now);
		});
	}

	private async currentUsage(now: number): Promise<UsageRecord> {
		const today = localDay(now);
		const stored = await this.store.get(this.provider);
		if (!stored) {
			const fresh = emptyUsage(now);
			await this.store.put(this.provider, fresh);
			return fresh;
		}
		if (stored.date !== today) {
			const fresh = emptyUsage(now);
			await this.store.put(this.provider, fresh);
			this.log.info(
				{ provider: this.provider, previousDay: stored.date, day: today },
				"Reset daily call counter",
			);
			return fresh;
		}
		return stored;
	}
}
