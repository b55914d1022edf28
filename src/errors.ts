/** HTTP statuses connector errors map to */
export type ErrorStatus = 400 | 404 | 500 | 502 | 503;

/**
 * Base error for everything the connector raises on purpose.
 * `status` is the HTTP status the error maps to when it reaches a route.
 */
export class ConnectorError extends Error {
	readonly code: string;
	readonly status: ErrorStatus;

	constructor(message: string, code: string, status: ErrorStatus = 500) {
		super(message);
		this.name = "ConnectorError";
		this.code = code;
		this.status = status;
	}
}

export class ConfigError extends ConnectorError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`, "CONFIG_INVALID");
		this.name = "ConfigError";
		this.issues = issues;
	}
}

export class PortInUseError extends ConnectorError {
	readonly port: number;

	constructor(port: number, host: string) {
		super(`Port ${port} is already in use on ${host}`, "PORT_IN_USE");
		this.name = "PortInUseError";
		this.port = port;
	}
}

export class NotFetchedError extends ConnectorError {
	constructor(what: string) {
		super(`No data found for ${what}. Maybe it has not been fetched yet.`, "NOT_FETCHED", 500);
		this.name = "NotFetchedError";
	}
}

export class GameNotFoundError extends ConnectorError {
	constructor(gameId: number) {
		super(`No play found for game ${gameId}`, "GAME_NOT_FOUND", 404);
		this.name = "GameNotFoundError";
	}
}

/**
 * The BGG API answered with something other than 200, could not be reached,
 * or returned XML that does not look like what we expect.
 */
export class BggApiError extends ConnectorError {
	readonly upstreamStatus?: number;

	constructor(message: string, upstreamStatus?: number) {
		super(message, "BGG_API_ERROR", 502);
		this.name = "BggApiError";
		this.upstreamStatus = upstreamStatus;
	}
}

export class BggUnavailableError extends ConnectorError {
	constructor() {
		super("BoardGameGeek API is temporarily unavailable", "BGG_UNAVAILABLE", 503);
		this.name = "BggUnavailableError";
	}
}

export class ValidationError extends ConnectorError {
	constructor(message: string) {
		super(message, "VALIDATION_ERROR", 400);
		this.name = "ValidationError";
	}
}
