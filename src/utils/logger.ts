import pino from "pino";

export type { Logger } from "pino";

export const logger = pino({
	level: process.env.LOG_LEVEL || "info",
	base: { service: "breakout-scanner" },
	timestamp: pino.stdTimeFunctions.isoTime,
});

export const silentLogger = pino({ level: "silent" });
