import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_BGG_API_URL = "https://boardgamegeek.com/xmlapi2/";

// Accept the upper-case names the service has always taken on the command line
// alongside pino's own level names.
const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
	DEBUG: "debug",
	INFO: "info",
	WARNING: "warn",
	WARN: "warn",
	ERROR: "error",
	debug: "debug",
	info: "info",
	warn: "warn",
	error: "error",
	silent: "silent",
};

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const intFromString = z.coerce.number().int();

const ConfigSchema = z.object({
	host: z.string().min(1),
	port: intFromString.min(0).max(65535),
	logLevel: z.string().transform((value, ctx) => {
		const level = LOG_LEVEL_ALIASES[value];
		if (!level) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `unknown log level "${value}" (expected INFO, WARNING or DEBUG)`,
			});
			return z.NEVER;
		}
		return level;
	}),
	bgg: z.object({
		baseUrl: z
			.string()
			.url()
			.transform((url) => (url.endsWith("/") ? url : `${url}/`)),
		cacheTtlMs: intFromString.positive(),
		timeoutMs: intFromString.positive(),
		maxRetries: intFromString.min(0).max(10),
	}),
	rateLimit: z.object({
		windowMs: intFromString.positive(),
		max: intFromString.positive(),
	}),
});

export type ConnectorConfig = z.infer<typeof ConfigSchema>;

export interface LoadConfigOptions {
	argv?: string[];
	env?: NodeJS.ProcessEnv;
}

function parseCliFlags(argv: string[]): { port?: string; host?: string; loglevel?: string } {
	try {
		const { values } = parseArgs({
			args: argv,
			options: {
				port: { type: "string", short: "p" },
				host: { type: "string" },
				loglevel: { type: "string" },
			},
			strict: true,
			allowPositionals: false,
		});
		return values;
	} catch (error) {
		throw new ConfigError([error instanceof Error ? error.message : String(error)]);
	}
}

/**
 * Build the runtime configuration. Command line flags win over environment
 * variables, which win over the built-in defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConnectorConfig {
	const env = options.env ?? process.env;
	const flags = parseCliFlags(options.argv ?? []);

	const raw = {
		host: flags.host ?? (env.HOST || "0.0.0.0"),
		port: flags.port ?? (env.PORT || "8080"),
		logLevel: flags.loglevel ?? (env.LOG_LEVEL || "INFO"),
		bgg: {
			baseUrl: env.BGG_API_URL || DEFAULT_BGG_API_URL,
			cacheTtlMs: env.BGG_CACHE_TTL_MS || 12 * 60 * 60 * 1000,
			timeoutMs: env.BGG_TIMEOUT_MS || 30_000,
			maxRetries: env.BGG_MAX_RETRIES || 3,
		},
		rateLimit: {
			windowMs: env.RATE_LIMIT_WINDOW_MS || 60_000,
			max: env.RATE_LIMIT_MAX || 100,
		},
	};

	const parsed = ConfigSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
	}
	return parsed.data;
}
