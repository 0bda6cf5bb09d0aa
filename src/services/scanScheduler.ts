import cron, { type ScheduledTask } from "node-cron";
import type { BreakoutSignal, ScanTier } from "../types";
import type { Logger } from "../utils/logger";
import type { ScannerContext } from "./context";
import { scanTier } from "./tierScanner";

export type SignalSink = (signal: BreakoutSignal) => Promise<void>;

export function createNonOverlappingJob(
	name: string,
	job: () => Promise<void>,
	log: Logger,
): () => Promise<void> {
	let running = false;
	return async () => {
		if (running) {
			log.warn({ job: name }, "Previous run still in progress, skipping tick");
			return;
		}
		running = true;
		const startedAt = Date.now();
		try {
			await job();
		} catch (error) {
			log.error({ job: name, error }, "Scheduled run failed");
		} finally {
			running = false;
			log.debug({ job: name, durationMs: Date.now() - startedAt }, "Run finished");
		}
	};
}

export async function runTierScan(
	ctx: ScannerContext,
	tier: ScanTier,
	sink: SignalSink,
): Promise<BreakoutSignal[]> {
	const signals = await scanTier(ctx, tier);
	if (!signals.length) {
		ctx.logger.info({ tier: tier.name }, "No signals");
		return signals;
	}

	for (const signal of signals) {
		try {
			await sink(signal);
		} catch (error) {
			ctx.logger.error(
				{ tier: tier.name, symbol: signal.ticker, error },
				"Failed to deliver signal",
			);
		}
	}
	return signals;
}

export type SchedulerOptions = {
	tiers: readonly ScanTier[];
	sink: SignalSink;
	cacheSweepCron: string;
	timezone: string;
};

export type RunningScheduler = {
	tasks: ScheduledTask[];
	runAll(): Promise<void>;
	stop(): void;
};

export function startScheduler(
	ctx: ScannerContext,
	options: SchedulerOptions,
): RunningScheduler {
	const jobs = options.tiers.map((tier) =>
		createNonOverlappingJob(
			tier.name,
			async () => {
				await runTierScan(ctx, tier, options.sink);
			},
			ctx.logger,
		),
	);
	const tasks = options.tiers.map((tier, i) => {
		ctx.logger.info({ tier: tier.name, cron: tier.cron }, "Scheduling tier");
		return cron.schedule(tier.cron, jobs[i], { timezone: options.timezone });
	});

	const sweep = createNonOverlappingJob(
		"cache-sweep",
		async () => {
			await ctx.fetcher.clearExpired();
		},
		ctx.logger,
	);
	tasks.push(cron.schedule(options.cacheSweepCron, sweep, { timezone: options.timezone }));

	return {
		tasks,
		runAll: async () => {
			await Promise.all(jobs.map((job) => job()));
		},
		stop: () => {
			for (const task of tasks) task.stop();
		},
	};
}
