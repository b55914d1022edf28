import { describe, expect, it } from "vitest";
import type { BggDataSource } from "../client/bgg-api.js";
import { GameNotFoundError, NotFetchedError } from "../errors.js";
import type { Play } from "../types.js";
import { BggPlays } from "./BggPlays.js";

class StubSource implements BggDataSource {
	thumbnailRequests: number[] = [];

	constructor(
		private playsData: Play[],
		private thumbnails: Record<number, string> = {},
	) {}

	async getPlays(): Promise<Play[]> {
		return this.playsData;
	}

	async getThumbnail(gameId: number): Promise<string | null> {
		this.thumbnailRequests.push(gameId);
		return this.thumbnails[gameId] ?? null;
	}
}

function play(gameId: number, overrides: Partial<Play> = {}): Play {
	return { date: "2024-01-01", gameId, gameName: `Game ${gameId}`, length: 30, ...overrides };
}

async function fetched(plays: Play[], thumbnails: Record<number, string> = {}) {
	const source = new StubSource(plays, thumbnails);
	const model = new BggPlays("alice", source);
	await model.fetchData();
	return { model, source };
}

describe("BggPlays before fetching", () => {
	const model = new BggPlays("alice", new StubSource([]));

	it("refuses to compute statistics", async () => {
		expect(() => model.cooperativeGameStatistics()).toThrow(NotFetchedError);
		await expect(model.latestPlayedGames()).rejects.toBeInstanceOf(NotFetchedError);
		await expect(model.mostPlayedGame()).rejects.toBeInstanceOf(NotFetchedError);
		await expect(model.gameInfoById(1)).rejects.toBeInstanceOf(NotFetchedError);
	});

	it("explains what is missing", () => {
		expect(() => model.plays).toThrow("No data found for plays. Maybe it has not been fetched yet.");
	});
});

describe("BggPlays.latestPlayedGames", () => {
	it("lists the first ten plays with thumbnails, newest first", async () => {
		const plays = Array.from({ length: 12 }, (_, i) =>
			play(i + 1, { date: `2024-01-${String(12 - i).padStart(2, "0")}` }),
		);
		const { model } = await fetched(plays, { 1: "https://images.test/1.jpg" });

		const games = await model.latestPlayedGames();

		expect(games).toHaveLength(10);
		expect(games[0]).toEqual({ name: "Game 1", date: "2024-01-12", thumbnail: "https://images.test/1.jpg" });
		expect(games[1]).toEqual({ name: "Game 2", date: "2024-01-11", thumbnail: null });
		expect(games[9]?.name).toBe("Game 10");
	});

	it("keeps repeated plays of the same game", async () => {
		const { model, source } = await fetched([play(7), play(7, { date: "2023-12-31" })]);

		const games = await model.latestPlayedGames();

		expect(games.map((g) => g.date)).toEqual(["2024-01-01", "2023-12-31"]);
		expect(source.thumbnailRequests).toEqual([7, 7]);
	});
});

describe("BggPlays.cooperativeGameStatistics", () => {
	it("counts wins and losses from play comments", async () => {
		const { model } = await fetched([
			play(1, { comment: "Won" }),
			play(1, { comment: "Lost" }),
			play(2, { comment: "We Won with one card left" }),
			play(2, { comment: "lost badly" }),
			play(3),
		]);

		expect(model.cooperativeGameStatistics()).toEqual({ wins: 2, losses: 1, winPercentage: 66 });
	});

	it("counts a comment mentioning both outcomes as both", async () => {
		const { model } = await fetched([play(1, { comment: "Won the first, Lost the second" })]);

		expect(model.cooperativeGameStatistics()).toEqual({ wins: 1, losses: 1, winPercentage: 50 });
	});

	it("reports zero percent when no cooperative games were logged", async () => {
		const { model } = await fetched([play(1), play(2, { comment: "Great game" })]);

		expect(model.cooperativeGameStatistics()).toEqual({ wins: 0, losses: 0, winPercentage: 0 });
	});
});

describe("BggPlays.mostPlayedGame", () => {
	it("sums play lengths per game", async () => {
		const { model } = await fetched(
			[play(3, { length: 30 }), play(2, { length: 50 }), play(3, { length: 25 })],
			{ 3: "https://images.test/3.jpg" },
		);

		expect(await model.mostPlayedGame()).toEqual({
			name: "Game 3",
			thumbnail: "https://images.test/3.jpg",
			time: 55,
		});
	});

	it("breaks ties in favour of the lowest game id", async () => {
		const { model } = await fetched([
			play(3, { length: 30 }),
			play(1, { length: 20 }),
			play(1, { length: 10 }),
			play(2, { length: 25 }),
		]);

		expect(await model.mostPlayedGame()).toEqual({ name: "Game 1", thumbnail: null, time: 30 });
	});

	it("is null without plays", async () => {
		const { model } = await fetched([]);

		expect(await model.mostPlayedGame()).toBeNull();
	});
});

describe("BggPlays.gameInfoById", () => {
	it("uses the name from the first matching play", async () => {
		const { model } = await fetched([play(5, { gameName: "Spirit Island" }), play(5, { gameName: "Renamed" })]);

		expect(await model.gameInfoById(5)).toEqual({ name: "Spirit Island", thumbnail: null });
	});

	it("rejects an unknown game", async () => {
		const { model } = await fetched([play(5)]);

		await expect(model.gameInfoById(6)).rejects.toBeInstanceOf(GameNotFoundError);
	});
});
