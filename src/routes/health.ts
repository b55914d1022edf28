import type { Context } from "hono";
import { Hono } from "hono";
import type { AppEnv, RouteDeps } from "./deps.js";

export const SERVICE_NAME = "boardgame-connector";
export const SERVICE_VERSION = "0.1.0";

export function healthRoutes(deps: Pick<RouteDeps, "state">): Hono<AppEnv> {
	const app = new Hono<AppEnv>();
	const startedAt = Date.now();

	// GET /health
	app.get("/", (c: Context<AppEnv>) => {
		const state = deps.state?.() ?? "LISTENING";
		const health = {
			status: state === "LISTENING" ? "healthy" : "unhealthy",
			service: SERVICE_NAME,
			version: SERVICE_VERSION,
			state,
			uptimeMs: Date.now() - startedAt,
		};
		c.header("Cache-Control", "no-cache, no-store, must-revalidate");
		return c.json(health, health.status === "healthy" ? 200 : 503);
	});

	return app;
}
