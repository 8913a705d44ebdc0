#!/usr/bin/env node
import path from "node:path";
import { DEFAULT_URL_CACHE_TTL_MS, FileUrlCache, MemoryValidationCache, resolveCacheDir } from "./cache";
import { loadConfig } from "./config";
import { applyDnsRouting, deleteDnsRouting } from "./dnsRouting";
import { createFetchContext, DEFAULT_FETCH_TIMEOUT_MS } from "./domainsList";
import { NdmcRouter } from "./keenetic";
import { startHttpServer } from "./server";
import type { Config, RouterBackend } from "./types";
import { DomainValidator } from "./validator";

// Кэш проверок живёт весь процесс, в том числе между запусками из HTTP-сервера.
const validationCache = new MemoryValidationCache();

export type RunContext = {
	router?: RouterBackend;
};

// Подключаемся к роутеру и запоминаем версию прошивки для проверки поддержки.
function connectRouter(cfg: Config): RouterBackend {
	const router = new NdmcRouter({ dryRun: cfg.dryRun });
	router.connect();
	return router;
}

// Основной сценарий: загрузка списков и приведение роутера к конфигу.
export async function runApply(cfg: Config, ctx: RunContext = {}): Promise<void> {
	const ttlMs = cfg.urlCacheTtlMs ?? DEFAULT_URL_CACHE_TTL_MS;
	const timeoutMs = cfg.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;

	console.log(
		`[config] groups=${cfg.groups.length}, dryRun=${Boolean(cfg.dryRun)}, urlCacheTtlMs=${ttlMs}, fetchTimeoutMs=${timeoutMs}`,
	);

	const router = ctx.router ?? connectRouter(cfg);
	const cache = new FileUrlCache(resolveCacheDir(cfg.dataDir));

	const result = await applyDnsRouting(cfg.groups, {
		router,
		fetchCtx: createFetchContext(cache, ttlMs, timeoutMs),
		validator: new DomainValidator({ cache: validationCache }),
		debug: cfg.debug,
	});

	console.log(`Done. commands=${result.commands.length}, conflicts=${result.conflicts.length}`);
}

// Удаление групп, привязанных к интерфейсам из конфига или к одному указанному.
export async function runDelete(cfg: Config, interfaceId?: string, ctx: RunContext = {}): Promise<void> {
	const router = ctx.router ?? connectRouter(cfg);
	const result = await deleteDnsRouting(router, { groups: cfg.groups, interfaceId, debug: cfg.debug });
	console.log(`Delete complete. groups=${result.groups.length}`);
}

// Точка входа CLI: apply (по умолчанию), delete [interfaceId] или serve.
async function main(): Promise<void> {
	const [cmd = "apply", arg] = process.argv.slice(2);
	const configPath = process.env.KEENETIC_DNS_CONFIG ?? path.join(__dirname, "config.json");
	const cfg = loadConfig(configPath);
	console.log(`[config] path=${configPath}`);

	switch (cmd) {
		case "apply":
			await runApply(cfg);
			return;
		case "delete":
			await runDelete(cfg, arg);
			return;
		case "serve":
			startHttpServer(cfg, { apply: (c) => runApply(c), remove: (c) => runDelete(c) });
			await runApply(cfg);
			return;
		default:
			throw new Error(`unknown command: ${cmd} (expected apply, delete or serve)`);
	}
}

export { createTriggerHandler, startHttpServer } from "./server";

if (require.main === module) {
	main().catch((err) => {
		console.error("ERROR:", err instanceof Error ? err.message : String(err));
		process.exit(1);
	});
}
