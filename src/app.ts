import { Hono } from "hono";
import { ConnectorError, type ErrorStatus } from "./errors.js";
import { RateLimiter, rateLimit } from "./middleware/rate-limit.js";
import { securityHeaders } from "./middleware/security-headers.js";
import { apiRoutes } from "./routes/api.js";
import type { AppEnv, RouteDeps } from "./routes/deps.js";
import { healthRoutes } from "./routes/health.js";
import { playsRoutes } from "./routes/plays.js";

export interface AppOptions extends RouteDeps {
	rateLimit?: { windowMs: number; max: number };
}

function isJsonPath(path: string): boolean {
	return path === "/health" || path.startsWith("/health/") || path.startsWith("/api/");
}

function createLogId(): string {
	return `ERR-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

export function createApp(options: AppOptions): Hono<AppEnv> {
	const { views, logger } = options;
	const limiter = new RateLimiter(options.rateLimit?.windowMs, options.rateLimit?.max);

	const app = new Hono<AppEnv>();

	app.use("*", securityHeaders());
	app.use("*", rateLimit(limiter));

	app.route("/health", healthRoutes(options));
	app.route("/api", apiRoutes(options));
	app.route("/", playsRoutes(options));

	app.notFound((c) => c.json({ error: "Not found" }, 404));

	app.onError((error, c) => {
		let status: ErrorStatus = 500;
		let code = "INTERNAL_ERROR";
		let message = "An internal error occurred. Contact support with log ID.";
		let logId: string | undefined;

		if (error instanceof ConnectorError) {
			status = error.status;
			code = error.code;
			message = error.message;
			logger.warn({ err: error, path: c.req.path, code }, "Request failed");
		} else {
			logId = createLogId();
			logger.error({ err: error, path: c.req.path, logId }, "Unhandled error");
		}

		if (isJsonPath(c.req.path)) {
			return c.json({ error: message, code, ...(logId ? { logId } : {}) }, status);
		}
		return c.html(views.error(status, logId ? `${message} (${logId})` : message), status);
	});

	return app;
}
