/** A single logged play as returned by the BGG plays endpoint. */
export interface Play {
	/** ISO date (YYYY-MM-DD) the play was logged for */
	date: string;
	gameId: number;
	gameName: string;
	/** Minutes played */
	length: number;
	comment?: string;
}

export interface GameInfo {
	name: string;
	thumbnail: string | null;
}

export interface LatestGame extends GameInfo {
	date: string;
}

export interface CoopStatistics {
	wins: number;
	losses: number;
	winPercentage: number;
}

export interface MostPlayedGame extends GameInfo {
	/** Total minutes across every play of the game */
	time: number;
}
