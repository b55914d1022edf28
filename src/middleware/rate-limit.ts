import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../routes/deps.js";

/**
 * Fixed-window, in-memory request counter keyed by client IP.
 */
export class RateLimiter {
	private requests: Map<string, { count: number; resetTime: number }> = new Map();
	private windowMs: number;
	private maxRequests: number;

	constructor(windowMs = 60000, maxRequests = 100) {
		this.windowMs = windowMs;
		this.maxRequests = maxRequests;
	}

	isAllowed(ip: string, now = Date.now()): boolean {
		const window = this.requests.get(ip);

		if (!window || window.resetTime <= now) {
			this.requests.set(ip, {
				count: 1,
				resetTime: now + this.windowMs,
			});
			if (this.requests.size > 10_000) {
				this.prune(now);
			}
			return true;
		}

		if (window.count >= this.maxRequests) {
			return false;
		}

		window.count++;
		return true;
	}

	/** Seconds until `ip` may send again */
	retryAfter(ip: string, now = Date.now()): number {
		const window = this.requests.get(ip);
		if (!window) return 0;
		return Math.max(0, Math.ceil((window.resetTime - now) / 1000));
	}

	prune(now = Date.now()): void {
		for (const [ip, window] of this.requests) {
			if (window.resetTime <= now) {
				this.requests.delete(ip);
			}
		}
	}
}

function getClientIp(headers: Headers, remoteAddress: string | undefined): string {
	return (
		headers.get("x-forwarded-for")?.split(",")[0]?.trim() ||
		headers.get("x-real-ip") ||
		remoteAddress ||
		"unknown"
	);
}

export function rateLimit(limiter: RateLimiter): MiddlewareHandler<AppEnv> {
	return async (c, next) => {
		const clientIp = getClientIp(c.req.raw.headers, c.env?.incoming?.socket.remoteAddress);

		if (!limiter.isAllowed(clientIp)) {
			c.header("Retry-After", String(limiter.retryAfter(clientIp)));
			return c.json(
				{
					error: "Too Many Requests",
					message: "Rate limit exceeded. Please try again later.",
				},
				429,
			);
		}

		await next();
	};
}
