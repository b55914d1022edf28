import {
	BrokenCircuitError,
	ConsecutiveBreaker,
	circuitBreaker,
	ExponentialBackoff,
	handleWhen,
	type IPolicy,
	retry,
	TaskCancelledError,
	TimeoutStrategy,
	timeout,
	wrap,
} from "cockatiel";
import { XMLParser } from "fast-xml-parser";
import ky, { HTTPError, type KyInstance, type Options } from "ky";
import { LRUCache } from "lru-cache";
import { z } from "zod";
import { BggApiError, BggUnavailableError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type { Play } from "../types.js";

export interface BggClientConfig {
	baseUrl: string;
	timeout?: number;
	maxRetries?: number;
	cacheTtlMs?: number;
	fetch?: typeof globalThis.fetch; // For testing
	logger?: Logger;
}

/**
 * The subset of the BGG API the plays model needs. Tests substitute their own.
 */
export interface BggDataSource {
	getPlays(username: string): Promise<Play[]>;
	getThumbnail(gameId: number): Promise<string | null>;
}

const PlayXmlSchema = z.object({
	"@_date": z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
	"@_length": z.coerce.number().int().min(0),
	item: z.object({
		"@_name": z.string(),
		"@_objectid": z.coerce.number().int().positive(),
	}),
	comments: z.string().optional(),
});

// An element with neither attributes nor children (<plays/>) parses to ""
const emptyElementAsObject = (value: unknown) => (value === "" ? {} : value);

const PlaysDocumentSchema = z.object({
	plays: z.preprocess(emptyElementAsObject, z.object({ play: z.array(PlayXmlSchema).default([]) })),
});

const ThingDocumentSchema = z.object({
	items: z.preprocess(
		emptyElementAsObject,
		z.object({ item: z.array(z.object({ thumbnail: z.string().optional() })).default([]) }),
	),
});

const xmlParser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: "@_",
	parseTagValue: false,
	parseAttributeValue: false,
	// BGG escapes apostrophes and newlines as &#039; and &#10;
	htmlEntities: true,
	isArray: (_name, jpath) => jpath === "plays.play" || jpath === "items.item",
});

// Failures that count toward retries and the breaker: network errors,
// 5xx, 429 and BGG's 202 "queued" answer. Other 4xx are final.
function isTransient(error: Error): boolean {
	if (error instanceof BggApiError && error.upstreamStatus !== undefined) {
		const status = error.upstreamStatus;
		return status === 202 || status === 429 || status >= 500;
	}
	return !(error instanceof BrokenCircuitError);
}

export class BggApiClient implements BggDataSource {
	private client: KyInstance;
	private resilience: IPolicy;
	private cache: LRUCache<string, string>;
	private inFlight: Map<string, Promise<string>> = new Map();
	private logger: Logger;

	constructor(config: BggClientConfig) {
		this.logger = (config.logger ?? silentLogger).child({ component: "bgg-api" });

		const kyOptions: Options = {
			prefixUrl: config.baseUrl,
			timeout: false, // Cockatiel handles timeout
			retry: {
				limit: 0, // Cockatiel handles retries
			},
			headers: {
				Accept: "application/xml, text/xml",
			},
		};

		if (config.fetch) {
			kyOptions.fetch = config.fetch;
		}

		this.client = ky.create(kyOptions);

		this.cache = new LRUCache<string, string>({
			max: 500,
			ttl: config.cacheTtlMs ?? 12 * 60 * 60 * 1000,
		});

		const transient = handleWhen(isTransient);

		const retryPolicy = retry(transient, {
			maxAttempts: config.maxRetries ?? 3,
			backoff: new ExponentialBackoff({
				initialDelay: 100,
				maxDelay: 5000,
				exponent: 2,
			}),
		});

		const circuitBreakerPolicy = circuitBreaker(transient, {
			halfOpenAfter: 30000,
			breaker: new ConsecutiveBreaker(5),
		});

		const timeoutPolicy = timeout(config.timeout ?? 30000, TimeoutStrategy.Cooperative);

		// timeout → retry → circuitBreaker
		this.resilience = wrap(timeoutPolicy, wrap(retryPolicy, circuitBreakerPolicy));
	}

	/**
	 * Fetch the plays logged by `username`, newest first.
	 */
	async getPlays(username: string): Promise<Play[]> {
		this.logger.info({ username }, "Fetching data from the BGG API");
		const document = this.parse(await this.requestData("plays", { username }), PlaysDocumentSchema);

		const plays = document.plays.play.map((xmlPlay) => {
			const play: Play = {
				date: xmlPlay["@_date"],
				gameId: xmlPlay.item["@_objectid"],
				gameName: xmlPlay.item["@_name"],
				length: xmlPlay["@_length"],
			};
			if (xmlPlay.comments !== undefined) {
				play.comment = xmlPlay.comments;
			}
			this.logger.debug({ play }, "Play parsed");
			return play;
		});

		this.logger.info({ username, count: plays.length }, "Data fetched");
		return plays;
	}

	/**
	 * Thumbnail URL for a game, or null when BGG has none.
	 */
	async getThumbnail(gameId: number): Promise<string | null> {
		const document = this.parse(await this.requestData("thing", { id: String(gameId) }), ThingDocumentSchema);
		return document.items.item[0]?.thumbnail ?? null;
	}

	/**
	 * GET `uri` below the API base URL and return the body, served from cache
	 * when a fresh copy exists.
	 */
	async requestData(uri: string, params: Record<string, string>): Promise<string> {
		const key = `${uri}?${new URLSearchParams(params).toString()}`;

		const cached = this.cache.get(key);
		if (cached !== undefined) {
			this.logger.debug({ key }, "Cache hit");
			return cached;
		}

		const pending = this.inFlight.get(key);
		if (pending) {
			return pending;
		}

		const request = this.fetchBody(uri, params)
			.then((body) => {
				this.cache.set(key, body);
				return body;
			})
			.finally(() => {
				this.inFlight.delete(key);
			});
		this.inFlight.set(key, request);
		return request;
	}

	clearCache(): void {
		this.cache.clear();
	}

	private async fetchBody(uri: string, params: Record<string, string>): Promise<string> {
		try {
			return await this.resilience.execute(async ({ signal }) => {
				try {
					const response = await this.client.get(uri, { searchParams: params, signal });
					if (response.status !== 200) {
						this.logger.error({ uri, status: response.status }, "Fetching failed");
						throw new BggApiError(`BGG API error: ${response.status} ${response.statusText}`, response.status);
					}
					return await response.text();
				} catch (error) {
					// A cooperative timeout aborts the request; ky rethrows the abort as-is
					if (signal.aborted) {
						throw new TaskCancelledError(`Request to ${uri} was cancelled`);
					}
					if (error instanceof HTTPError) {
						const { status, statusText } = error.response;
						this.logger.error({ uri, status }, "Fetching failed");
						throw new BggApiError(`BGG API error: ${status} ${statusText}`, status);
					}
					throw error;
				}
			});
		} catch (error) {
			if (error instanceof BggApiError) {
				throw error;
			}
			if (error instanceof BrokenCircuitError) {
				throw new BggUnavailableError();
			}
			if (error instanceof TaskCancelledError) {
				throw new BggApiError(`BGG API request timed out: ${uri}`);
			}
			const message = error instanceof Error ? error.message : String(error);
			throw new BggApiError(`BGG API request failed: ${message}`);
		}
	}

	private parse<T>(body: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
		let document: unknown;
		try {
			document = xmlParser.parse(body, true);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			throw new BggApiError(`Malformed XML from BGG API: ${message}`);
		}

		const result = schema.safeParse(document);
		if (!result.success) {
			throw new BggApiError(`Unexpected response from BGG API: ${result.error.issues[0]?.message ?? "invalid"}`);
		}
		return result.data;
	}
}
