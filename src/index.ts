import { createHttpClient } from "./clients/http";
import { sendTelegramMessage } from "./clients/telegram";
import { config, loadUniverse } from "./config";
import { formatAlert } from "./services/alertFormatter";
import { createScannerContext } from "./services/context";
import { startScheduler, type SignalSink } from "./services/scanScheduler";
import { logger } from "./utils/logger";

async function bootstrap() {
	logger.info("Starting tiered breakout scanner");
	const universe = loadUniverse();
	const http = createHttpClient();
	const ctx = createScannerContext(config, {
		logger,
		http,
		priority: universe.priority,
	});

	const sink: SignalSink = (signal) =>
		sendTelegramMessage(http, config.telegram, formatAlert(signal), logger);

	const usage = await ctx.fetcher.usageStats();
	logger.info({ usage }, "Provider quota status");
	await ctx.fetcher.clearExpired();

	const scheduler = startScheduler(ctx, {
		tiers: universe.tiers,
		sink,
		cacheSweepCron: config.scheduling.cacheSweepCron,
		timezone: config.scheduling.timezone,
	});
	logger.info({ tiers: universe.tiers.map((t) => t.name) }, "Scheduler started");

	if (config.scheduling.runOnStart) {
		await scheduler.runAll();
	}
}

bootstrap().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
