/**
 * BggPlays: play log of a single BGG user and the statistics derived from it.
 *
 * Call `fetchData()` once, then read statistics from the in-memory copy.
 * Network traffic goes through the data source, which caches responses.
 */

import type { BggDataSource } from "../client/bgg-api.js";
import { GameNotFoundError, NotFetchedError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type { CoopStatistics, GameInfo, LatestGame, MostPlayedGame, Play } from "../types.js";

/** Text in a play comment that marks a cooperative game win */
export const WON_TEXT = "Won";

/** Text in a play comment that marks a cooperative game loss */
export const LOST_TEXT = "Lost";

export const LATEST_GAMES_LIMIT = 10;

export class BggPlays {
	private data: Play[] | null = null;
	private logger: Logger;

	constructor(
		readonly username: string,
		private source: BggDataSource,
		logger: Logger = silentLogger,
	) {
		this.logger = logger.child({ component: "plays", username });
	}

	get plays(): readonly Play[] {
		return this.requirePlays("plays");
	}

	async fetchData(): Promise<void> {
		this.data = await this.source.getPlays(this.username);
	}

	/**
	 * The most recently logged plays, newest first, with game thumbnails.
	 * The same game appears once per play.
	 */
	async latestPlayedGames(): Promise<LatestGame[]> {
		const plays = this.requirePlays("latest played games").slice(0, LATEST_GAMES_LIMIT);

		const games = await Promise.all(
			plays.map(async (play) => ({
				name: play.gameName,
				date: play.date,
				thumbnail: await this.source.getThumbnail(play.gameId),
			})),
		);

		this.logger.debug({ games }, "latest games played");
		return games;
	}

	/**
	 * Wins and losses of cooperative games, read from play comments.
	 */
	cooperativeGameStatistics(): CoopStatistics {
		const plays = this.requirePlays("cooperative game statistics");

		const wins = plays.filter((play) => play.comment?.includes(WON_TEXT)).length;
		const losses = plays.filter((play) => play.comment?.includes(LOST_TEXT)).length;
		const total = wins + losses;
		const winPercentage = total === 0 ? 0 : Math.trunc((wins / total) * 100);

		const statistics = { wins, losses, winPercentage };
		this.logger.debug({ statistics }, "coop statistics");
		return statistics;
	}

	async gameInfoById(gameId: number): Promise<GameInfo> {
		const play = this.requirePlays("game info").find((p) => p.gameId === gameId);
		if (!play) {
			throw new GameNotFoundError(gameId);
		}
		return { name: play.gameName, thumbnail: await this.source.getThumbnail(play.gameId) };
	}

	/**
	 * The game with the most minutes logged. Ties go to the lowest game id.
	 * Resolves to null when the user has no plays.
	 */
	async mostPlayedGame(): Promise<MostPlayedGame | null> {
		const plays = this.requirePlays("most played game");

		const totals = new Map<number, number>();
		for (const play of plays) {
			totals.set(play.gameId, (totals.get(play.gameId) ?? 0) + play.length);
		}

		let best: { gameId: number; time: number } | null = null;
		for (const [gameId, time] of [...totals].sort(([a], [b]) => a - b)) {
			if (best === null || time > best.time) {
				best = { gameId, time };
			}
		}

		if (best === null) {
			return null;
		}

		const game = await this.gameInfoById(best.gameId);
		const mostPlayed = { ...game, time: best.time };
		this.logger.debug({ mostPlayed }, "most played game");
		return mostPlayed;
	}

	private requirePlays(what: string): Play[] {
		if (this.data === null) {
			throw new NotFetchedError(what);
		}
		return this.data;
	}
}
