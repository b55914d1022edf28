import { type Logger, pino } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger };

export function createLogger(level: LogLevel = "info"): Logger {
	return pino({
		name: "boardgame-connector",
		level,
		base: { pid: process.pid },
		timestamp: pino.stdTimeFunctions.isoTime,
	});
}

/**
 * Logger used by tests and by modules constructed without one.
 */
export const silentLogger: Logger = pino({ level: "silent" });
