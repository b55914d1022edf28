import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { getRequestListener } from "@hono/node-server";
import type { Hono } from "hono";
import { ConnectorError, PortInUseError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { AppEnv, ServerState } from "./routes/deps.js";

/**
 * Owns the listening socket for a Hono app.
 *
 * NOT_STARTED → LISTENING → STOPPED. A failed listen leaves the server in
 * NOT_STARTED; a stopped server cannot be restarted.
 */
export class ConnectorHttpServer {
	private server: Server;
	private logger: Logger;
	private currentState: ServerState = "NOT_STARTED";
	private pendingListen: Promise<void> | null = null;

	constructor(app: Hono<AppEnv>, logger: Logger) {
		this.logger = logger.child({ component: "http-server" });
		this.server = createServer(getRequestListener(app.fetch));
	}

	get state(): ServerState {
		return this.currentState;
	}

	/**
	 * Address actually bound; differs from the requested one when port 0 was asked for.
	 */
	address(): AddressInfo | null {
		const address = this.server.address();
		return address !== null && typeof address === "object" ? address : null;
	}

	async listen(port: number, host = "0.0.0.0"): Promise<AddressInfo> {
		if (this.currentState !== "NOT_STARTED" || this.pendingListen) {
			throw new ConnectorError(`Cannot listen: server is ${this.currentState}`, "INVALID_STATE");
		}

		this.pendingListen = new Promise<void>((resolve, reject) => {
			const onError = (error: NodeJS.ErrnoException) => {
				this.server.off("listening", onListening);
				reject(error.code === "EADDRINUSE" ? new PortInUseError(port, host) : error);
			};
			const onListening = () => {
				this.server.off("error", onError);
				this.currentState = "LISTENING";
				resolve();
			};
			this.server.once("error", onError);
			this.server.once("listening", onListening);
			this.server.listen(port, host);
		});
		try {
			await this.pendingListen;
		} finally {
			this.pendingListen = null;
		}

		const address = this.address();
		if (!address) {
			throw new ConnectorError("Server is listening on a pipe, not a TCP port", "INVALID_STATE");
		}
		this.logger.info({ host: address.address, port: address.port }, "Listening");
		return address;
	}

	/**
	 * Stop accepting connections. A listen still in progress is allowed to
	 * settle first, then its socket is closed too.
	 */
	async close(): Promise<void> {
		if (this.pendingListen) {
			// The listen() caller receives its own rejection
			await Promise.allSettled([this.pendingListen]);
		}
		if (this.currentState !== "LISTENING") {
			this.currentState = "STOPPED";
			return;
		}

		await new Promise<void>((resolve, reject) => {
			this.server.close((error) => {
				if (error) {
					reject(error);
					return;
				}
				resolve();
			});
		});
		this.currentState = "STOPPED";
		this.logger.info("Server stopped");
	}
}
