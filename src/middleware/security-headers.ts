import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../routes/deps.js";

export function securityHeaders(): MiddlewareHandler<AppEnv> {
	return async (c, next) => {
		await next();
		c.res.headers.set("X-Content-Type-Options", "nosniff");
		c.res.headers.set("X-Frame-Options", "DENY");
		c.res.headers.set("X-XSS-Protection", "1; mode=block");
		c.res.headers.set("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
		// Thumbnails are served by BGG's image CDN
		c.res.headers.set("Content-Security-Policy", "default-src 'self'; img-src 'self' https:");
	};
}
