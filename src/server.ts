import http from "node:http";
import type { Config } from "./types";
import { errorMessage } from "./utils";

export type RunFn = (cfg: Config) => Promise<void>;

export type ServerDeps = {
	apply?: RunFn;
	remove?: RunFn;
};

export type ServerOpts = {
	host?: string;
	port?: number;
	listen?: boolean;
};

export const DEFAULT_SERVER_PORT = 3940;

function reply(res: http.ServerResponse, status: number, body: string): void {
	res.statusCode = status;
	res.end(`${body}\n`);
}

// Обработчик /apply|/delete|/health; параллельный запуск отклоняем с 429.
export function createTriggerHandler(cfg: Config, deps: ServerDeps = {}): http.RequestListener {
	const routes = new Map<string, RunFn | undefined>([
		["/apply", deps.apply],
		["/delete", deps.remove],
	]);
	let active: string | null = null;

	return async (req, res) => {
		const { pathname } = new URL(req.url ?? "/", "http://localhost");

		if (pathname === "/health") return reply(res, 200, "OK");
		if (!routes.has(pathname)) return reply(res, 404, "Not found");

		if (req.method !== "GET" && req.method !== "POST") {
			res.setHeader("Allow", "GET, POST");
			return reply(res, 405, "Method not allowed");
		}

		if (active) return reply(res, 429, "Run already in progress");

		const run = routes.get(pathname);
		if (!run) return reply(res, 500, `Handler for ${pathname} not configured`);

		active = pathname;
		console.log(`[serve] ${pathname} requested from ${req.socket.remoteAddress ?? "unknown"}`);

		try {
			await run(cfg);
			reply(res, 200, "OK");
		} catch (err) {
			console.error(`[serve] ${pathname} failed: ${errorMessage(err)}`);
			reply(res, 500, "Run failed");
		} finally {
			active = null;
		}
	};
}

// HTTP-триггер для запусков по запросу; адрес из опций, затем из конфига.
export function startHttpServer(cfg: Config, deps: ServerDeps, opts: ServerOpts = {}): http.Server {
	const host = opts.host ?? cfg.server?.host ?? "0.0.0.0";
	const port = opts.port ?? cfg.server?.port ?? DEFAULT_SERVER_PORT;
	const server = http.createServer(createTriggerHandler(cfg, deps));

	server.on("error", (err) => {
		console.error(`[serve] server error: ${errorMessage(err)}`);
	});

	if (opts.listen ?? true) {
		server.listen(port, host, () => {
			console.log(`[serve] listening on http://${host}:${port}, GET/POST /apply or /delete to trigger a run`);
		});
	}

	return server;
}
