import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "./app.js";
import type { BggDataSource } from "./client/bgg-api.js";
import { loadConfig } from "./config.js";
import { PortInUseError } from "./errors.js";
import { ConnectorHttpServer } from "./http-server.js";
import { silentLogger } from "./logger.js";
import { type RunningService, startService } from "./service.js";
import { Views } from "./views/render.js";

const config = loadConfig({ argv: ["--port", "0", "--host", "127.0.0.1"], env: {} });

const emptySource: BggDataSource = {
	getPlays: async () => [],
	getThumbnail: async () => null,
};

const running: RunningService[] = [];

async function start(overrides: Parameters<typeof startService>[2] = { source: emptySource }) {
	const service = await startService(config, silentLogger, overrides);
	running.push(service);
	return service;
}

function baseUrl({ address }: RunningService): string {
	return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
	await Promise.all(running.splice(0).map(({ server }) => server.close()));
});

describe("startService", () => {
	it("listens and serves requests", async () => {
		const service = await start();

		expect(service.server.state).toBe("LISTENING");
		expect(service.address.port).toBeGreaterThan(0);

		const res = await fetch(`${baseUrl(service)}/health`);
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({ status: "healthy", state: "LISTENING" });
	});

	it("stops when closed", async () => {
		const service = await start();

		await service.server.close();

		expect(service.server.state).toBe("STOPPED");
		await expect(fetch(`${baseUrl(service)}/health`)).rejects.toThrow();
	});

	it("fetches plays from BGG through the configured fetch", async () => {
		const requested: string[] = [];
		const fetchImpl: typeof fetch = async (input) => {
			const url = new URL(input instanceof Request ? input.url : String(input));
			requested.push(url.pathname);
			if (url.pathname.endsWith("/plays")) {
				return new Response(
					'<plays username="alice" total="1" page="1"><play date="2024-05-01" length="60"><item name="Azul" objectid="230802"/><comments>Fun</comments></play></plays>',
				);
			}
			return new Response('<items><item id="230802"><thumbnail>https://images.test/azul.jpg</thumbnail></item></items>');
		};
		const service = await start({ fetch: fetchImpl });

		const res = await fetch(`${baseUrl(service)}/alice`);
		const html = await res.text();

		expect(res.status).toBe(200);
		expect(html).toContain(
			'<li class="game"><img src="https://images.test/azul.jpg" alt="Azul"> <span class="name">Azul</span> <time datetime="2024-05-01">2024-05-01</time></li>',
		);
		expect(requested).toEqual(["/xmlapi2/plays", "/xmlapi2/thing"]);
	});

	it("fails to start when the templates are missing", async () => {
		await expect(startService(config, silentLogger, { source: emptySource, templateDir: "/nonexistent" })).rejects.toThrow(
			/ENOENT/,
		);
	});
});

describe("ConnectorHttpServer", () => {
	const app = createApp({ source: emptySource, views: Views.load(), logger: silentLogger });

	it("refuses a port that is already bound", async () => {
		const first = await start();
		const second = new ConnectorHttpServer(app, silentLogger);

		await expect(second.listen(first.address.port, "127.0.0.1")).rejects.toBeInstanceOf(PortInUseError);
		expect(second.state).toBe("NOT_STARTED");
	});

	it("cannot listen twice", async () => {
		const server = new ConnectorHttpServer(app, silentLogger);
		await server.listen(0, "127.0.0.1");

		try {
			await expect(server.listen(0, "127.0.0.1")).rejects.toMatchObject({ code: "INVALID_STATE" });
		} finally {
			await server.close();
		}
	});

	it("closes a server that is still starting", async () => {
		const server = new ConnectorHttpServer(app, silentLogger);

		const listening = server.listen(0, "127.0.0.1");
		const closing = server.close();
		const address = await listening;
		await closing;

		expect(server.state).toBe("STOPPED");
		expect(server.address()).toBeNull();
		await expect(fetch(`http://127.0.0.1:${address.port}/health`)).rejects.toThrow();
	});

	it("cannot be restarted once stopped", async () => {
		const server = new ConnectorHttpServer(app, silentLogger);

		await server.close();

		expect(server.state).toBe("STOPPED");
		await expect(server.listen(0, "127.0.0.1")).rejects.toMatchObject({ code: "INVALID_STATE" });
	});
});
