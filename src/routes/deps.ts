import type { HttpBindings } from "@hono/node-server";
import { z } from "zod";
import type { BggDataSource } from "../client/bgg-api.js";
import { ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { BggPlays } from "../services/BggPlays.js";
import type { Views } from "../views/render.js";

export type AppEnv = { Bindings: HttpBindings };

export type ServerState = "NOT_STARTED" | "LISTENING" | "STOPPED";

export interface RouteDeps {
	source: BggDataSource;
	views: Views;
	logger: Logger;
	/** Lifecycle state of the owning server, reported by /health */
	state?: () => ServerState;
}

const UsernameSchema = z
	.string()
	.min(1, "username must not be empty")
	.max(64, "username must be at most 64 characters")
	.regex(/^[^/\p{Cc}]+$/u, "username contains invalid characters");

export function parseUsername(raw: string): string {
	const result = UsernameSchema.safeParse(raw);
	if (!result.success) {
		throw new ValidationError(result.error.issues[0]?.message ?? "invalid username");
	}
	return result.data;
}

/**
 * Validate `rawName`, then build a plays model for it and fetch its data.
 */
export async function loadPlays(deps: RouteDeps, rawName: string): Promise<BggPlays> {
	const plays = new BggPlays(parseUsername(rawName), deps.source, deps.logger);
	await plays.fetchData();
	return plays;
}
