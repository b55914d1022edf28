import type { AddressInfo } from "node:net";
import { createApp } from "./app.js";
import { type BggDataSource, BggApiClient } from "./client/bgg-api.js";
import type { ConnectorConfig } from "./config.js";
import { ConnectorHttpServer } from "./http-server.js";
import type { Logger } from "./logger.js";
import { Views } from "./views/render.js";

export interface ServiceOverrides {
	source?: BggDataSource;
	fetch?: typeof globalThis.fetch;
	templateDir?: string;
}

export interface RunningService {
	server: ConnectorHttpServer;
	address: AddressInfo;
}

/**
 * Wire the BGG client, templates and routes together and start listening.
 * Rejects when the templates cannot be loaded or the port is taken.
 */
export async function startService(
	config: ConnectorConfig,
	logger: Logger,
	overrides: ServiceOverrides = {},
): Promise<RunningService> {
	const views = Views.load(overrides.templateDir);

	const source =
		overrides.source ??
		new BggApiClient({
			baseUrl: config.bgg.baseUrl,
			timeout: config.bgg.timeoutMs,
			maxRetries: config.bgg.maxRetries,
			cacheTtlMs: config.bgg.cacheTtlMs,
			fetch: overrides.fetch,
			logger,
		});

	let server: ConnectorHttpServer | undefined;
	const app = createApp({
		source,
		views,
		logger,
		rateLimit: config.rateLimit,
		state: () => server?.state ?? "NOT_STARTED",
	});
	server = new ConnectorHttpServer(app, logger);

	const address = await server.listen(config.port, config.host);
	return { server, address };
}
