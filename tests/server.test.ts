import http from "node:http";
import type { AddressInfo } from "node:net";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTriggerHandler, startHttpServer } from "../src/server";
import type { Config } from "../src/types";

const cfg: Config = {
	dryRun: true,
	groups: [{ name: "social", interfaceId: "Wireguard0", domainFiles: ["/lists/social.txt"], domainURLs: [] }],
};

type Reply = { status: number; body: string; allow?: string };

const servers: http.Server[] = [];

async function listen(server: http.Server): Promise<string> {
	servers.push(server);
	if (!server.listening) {
		await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	}
	const { port } = server.address() as AddressInfo;
	return `http://127.0.0.1:${port}`;
}

function request(url: string, method = "GET"): Promise<Reply> {
	return new Promise((resolve, reject) => {
		const req = http.request(url, { method }, (res) => {
			let body = "";
			res.setEncoding("utf8");
			res.on("data", (chunk: string) => {
				body += chunk;
			});
			res.on("end", () => resolve({ status: res.statusCode ?? 0, body, allow: res.headers.allow }));
		});
		req.on("error", reject);
		req.end();
	});
}

beforeEach(() => {
	vi.spyOn(console, "log").mockImplementation(() => {});
	vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
	for (const server of servers.splice(0)) {
		server.closeAllConnections();
		await new Promise<void>((resolve) => server.close(() => resolve()));
	}
	vi.restoreAllMocks();
});

describe("createTriggerHandler", () => {
	it("отвечает на /health без запуска", async () => {
		const apply = vi.fn(async () => {});
		const base = await listen(http.createServer(createTriggerHandler(cfg, { apply })));

		expect(await request(`${base}/health`)).toMatchObject({ status: 200, body: "OK\n" });
		expect(apply).not.toHaveBeenCalled();
	});

	it("запускает apply по GET и delete по POST", async () => {
		const apply = vi.fn(async () => {});
		const remove = vi.fn(async () => {});
		const base = await listen(http.createServer(createTriggerHandler(cfg, { apply, remove })));

		expect(await request(`${base}/apply`)).toMatchObject({ status: 200, body: "OK\n" });
		expect(await request(`${base}/delete?force=1`, "POST")).toMatchObject({ status: 200, body: "OK\n" });
		expect(apply).toHaveBeenCalledWith(cfg);
		expect(remove).toHaveBeenCalledTimes(1);
	});

	it("возвращает 429 при параллельном запросе", async () => {
		let release!: () => void;
		const block = new Promise<void>((resolve) => {
			release = resolve;
		});
		const apply = vi.fn(async () => block);
		const base = await listen(http.createServer(createTriggerHandler(cfg, { apply })));

		const first = request(`${base}/apply`);
		await vi.waitFor(() => expect(apply).toHaveBeenCalledTimes(1));

		expect(await request(`${base}/apply`)).toMatchObject({ status: 429, body: "Run already in progress\n" });
		expect(await request(`${base}/delete`)).toMatchObject({ status: 429 });

		release();
		expect(await first).toMatchObject({ status: 200, body: "OK\n" });
		expect(apply).toHaveBeenCalledTimes(1);
	});

	it("404 для неизвестного пути и 405 для чужого метода", async () => {
		const base = await listen(http.createServer(createTriggerHandler(cfg, { apply: async () => {} })));

		expect(await request(`${base}/sync`)).toMatchObject({ status: 404, body: "Not found\n" });
		expect(await request(`${base}/apply`, "PUT")).toEqual({
			status: 405,
			body: "Method not allowed\n",
			allow: "GET, POST",
		});
	});

	it("500 при ошибке запуска, следующий запуск снова разрешён", async () => {
		const apply = vi
			.fn<(c: Config) => Promise<void>>()
			.mockRejectedValueOnce(new Error("router down"))
			.mockResolvedValueOnce(undefined);
		const base = await listen(http.createServer(createTriggerHandler(cfg, { apply })));

		expect(await request(`${base}/apply`)).toMatchObject({ status: 500, body: "Run failed\n" });
		expect(await request(`${base}/apply`)).toMatchObject({ status: 200 });
	});

	it("500, если обработчик не задан", async () => {
		const base = await listen(http.createServer(createTriggerHandler(cfg, { apply: async () => {} })));

		expect(await request(`${base}/delete`)).toMatchObject({
			status: 500,
			body: "Handler for /delete not configured\n",
		});
	});
});

describe("startHttpServer", () => {
	it("без listen только создаёт сервер", () => {
		const server = startHttpServer(cfg, {}, { listen: false });
		expect(server.listening).toBe(false);
	});

	it("слушает указанный адрес и запускает apply", async () => {
		const apply = vi.fn(async () => {});
		const server = startHttpServer(cfg, { apply }, { host: "127.0.0.1", port: 0 });
		await new Promise<void>((resolve) => server.once("listening", resolve));
		const base = await listen(server);

		expect(await request(`${base}/apply`)).toMatchObject({ status: 200 });
		expect(apply).toHaveBeenCalledTimes(1);
	});
});
