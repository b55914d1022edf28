import { Hono } from "hono";
import { type AppEnv, loadPlays, type RouteDeps } from "./deps.js";

export const MISSING_USERNAME_TEXT = "Please give the username to fetch data for";

/**
 * HTML pages for a user's plays.
 */
export function playsRoutes(deps: RouteDeps): Hono<AppEnv> {
	const app = new Hono<AppEnv>();

	app.get("/", (c) => c.text(MISSING_USERNAME_TEXT));

	app.get("/:name", async (c) => {
		const plays = await loadPlays(deps, c.req.param("name"));
		const games = await plays.latestPlayedGames();
		return c.html(deps.views.fullStatistics({ name: plays.username, games }));
	});

	app.get("/:name/plays/latestgames", async (c) => {
		const plays = await loadPlays(deps, c.req.param("name"));
		return c.html(deps.views.gameList(await plays.latestPlayedGames()));
	});

	app.get("/:name/plays/statistics", async (c) => {
		const plays = await loadPlays(deps, c.req.param("name"));
		const coops = plays.cooperativeGameStatistics();
		const mostPlayed = await plays.mostPlayedGame();
		return c.html(deps.views.statistics({ coops, mostPlayed }));
	});

	return app;
}
