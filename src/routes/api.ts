import { Hono } from "hono";
import { type AppEnv, loadPlays, type RouteDeps } from "./deps.js";

/**
 * JSON variants of the play pages, mounted under /api.
 */
export function apiRoutes(deps: RouteDeps): Hono<AppEnv> {
	const app = new Hono<AppEnv>();

	app.get("/:name/plays", async (c) => {
		const plays = await loadPlays(deps, c.req.param("name"));
		return c.json({ username: plays.username, plays: plays.plays });
	});

	app.get("/:name/statistics", async (c) => {
		const plays = await loadPlays(deps, c.req.param("name"));
		const [latestGames, mostPlayed] = await Promise.all([plays.latestPlayedGames(), plays.mostPlayedGame()]);
		return c.json({
			username: plays.username,
			latestGames,
			coop: plays.cooperativeGameStatistics(),
			mostPlayed,
		});
	});

	return app;
}
