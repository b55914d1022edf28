import type { EventEmitter } from "node:events";
import { loadConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { type RunningService, type ServiceOverrides, startService } from "./service.js";

export interface RunOptions {
	argv: string[];
	env?: NodeJS.ProcessEnv;
	exit: (code: number) => void;
	/** Defaults to a pino logger at the configured level. */
	logger?: Logger;
	/** Where SIGINT and SIGTERM are delivered; the process unless replaced. */
	signals?: EventEmitter;
	overrides?: ServiceOverrides;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

async function start(options: RunOptions): Promise<{ service: RunningService; logger: Logger }> {
	const config = loadConfig({ argv: options.argv, env: options.env });
	const logger = options.logger ?? createLogger(config.logLevel);
	const service = await startService(config, logger, options.overrides);
	return { service, logger };
}

/**
 * Start the service and stop it on SIGINT or SIGTERM.
 *
 * Exits with 1 when startup fails and with 0 once a signal has closed the
 * server. Resolves with the running service, or null after a failed start.
 */
export async function run(options: RunOptions): Promise<RunningService | null> {
	const { exit, signals = process } = options;

	let started: { service: RunningService; logger: Logger };
	try {
		started = await start(options);
	} catch (error) {
		(options.logger ?? createLogger("error")).fatal({ err: error }, "Failed to start boardgame-connector");
		exit(1);
		return null;
	}
	const { service, logger } = started;

	const handlers = new Map<NodeJS.Signals, () => void>();
	let stopping = false;

	const shutdown = (signal: NodeJS.Signals) => {
		if (stopping) return;
		stopping = true;
		for (const [name, handler] of handlers) {
			signals.off(name, handler);
		}
		logger.info({ signal }, "Shutting down");
		service.server.close().then(
			() => exit(0),
			(error: unknown) => {
				logger.error({ err: error }, "Failed to close server");
				exit(1);
			},
		);
	};

	for (const signal of SHUTDOWN_SIGNALS) {
		const handler = () => shutdown(signal);
		handlers.set(signal, handler);
		signals.on(signal, handler);
	}

	return service;
}
