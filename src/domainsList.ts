import fs from "node:fs";
import http from "node:http";
import https from "node:https";
import path from "node:path";
import { isFresh } from "./cache";
import { LoadError } from "./errors";
import type { DnsRoutingGroup, DomainListFetchContext, SourceLines } from "./types";

export const DEFAULT_FETCH_TIMEOUT_MS = 5000;

const MAX_REDIRECTS = 10;
const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);

// Загрузка текста по HTTP(S): редиректы, общий дедлайн на всю цепочку, принимаем только 200.
export function httpGetText(url: string, timeoutMs: number): Promise<string> {
	return new Promise((resolve, reject) => {
		let req: http.ClientRequest | undefined;
		let settled = false;

		const settle = (err: Error | null, body = "") => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			if (err) {
				req?.destroy();
				reject(err);
			} else {
				resolve(body);
			}
		};

		// таймаут сокета ловит только простой, медленную отдачу режем общим таймером
		const timer = setTimeout(() => settle(new Error(`timeout after ${timeoutMs}ms`)), timeoutMs);

		const get = (target: string, redirects: number): void => {
			try {
				const client = target.startsWith("http://") ? http : https;
				req = client.get(target, { headers: { "user-agent": "keenetic-dns-routing/1.0" } }, (res) => {
					const { location } = res.headers;

					if (res.statusCode && REDIRECT_CODES.has(res.statusCode) && location) {
						res.resume();
						if (redirects >= MAX_REDIRECTS) {
							settle(new Error(`stopped after ${MAX_REDIRECTS} redirects`));
							return;
						}
						get(new URL(location, target).toString(), redirects + 1);
						return;
					}

					if (res.statusCode !== 200) {
						res.resume();
						settle(new Error(`status code ${res.statusCode ?? "unknown"}`));
						return;
					}

					let body = "";
					res.setEncoding("utf8");
					res.on("data", (chunk: string) => {
						body += chunk;
					});
					res.on("end", () => settle(null, body));
					res.on("error", (err) => settle(err));
				});
				req.on("error", (err) => settle(err));
			} catch (err) {
				settle(err instanceof Error ? err : new Error(String(err)));
			}
		};

		get(url, 0);
	});
}

export function splitLines(text: string): string[] {
	return text.replace(/^\uFEFF/, "").split(/\r?\n/);
}

// Читаем локальный файл целиком.
export function loadFileLines(filePath: string): SourceLines {
	const text = fs.readFileSync(filePath, "utf8");
	return { label: `file ${path.basename(filePath)}`, lines: splitLines(text) };
}

export type UrlLoad = SourceLines & {
	fromCache: boolean;
	changed: boolean;
	checksum: string;
};

// Загружаем URL: свежий кэш без сети, иначе скачиваем и сверяем checksum с прошлой записью.
export async function loadUrlLines(url: string, ctx: DomainListFetchContext): Promise<UrlLoad> {
	const now = ctx.now ?? Date.now;
	const previous = ctx.cache.read(url);

	if (previous && isFresh(previous, now())) {
		console.log(`  [cache] ${url}: using cached copy`);
		return {
			label: url,
			lines: splitLines(previous.content),
			fromCache: true,
			changed: false,
			checksum: previous.checksum,
		};
	}

	const fetch = ctx.fetchFn ?? httpGetText;
	const content = await fetch(url, ctx.timeoutMs);
	const entry = ctx.cache.write(url, content, ctx.ttlMs);
	const changed = previous !== undefined && previous.checksum !== entry.checksum;

	if (changed) console.log(`  [load] domain list updated (checksum changed): ${url}`);

	return {
		label: url,
		lines: splitLines(content),
		fromCache: false,
		changed,
		checksum: entry.checksum,
	};
}

export type GroupSources = {
	sources: SourceLines[];
	errors: LoadError[];
};

// Все источники группы по порядку: сначала файлы, затем URL. Ошибки копим, не прерываясь.
export async function loadGroupSources(
	group: DnsRoutingGroup,
	ctx: DomainListFetchContext,
): Promise<GroupSources> {
	const result: GroupSources = { sources: [], errors: [] };

	for (const file of group.domainFiles) {
		try {
			result.sources.push(loadFileLines(file));
		} catch (err) {
			result.errors.push(new LoadError(group.name, `file '${file}'`, err));
		}
	}

	for (const url of group.domainURLs) {
		try {
			result.sources.push(await loadUrlLines(url, ctx));
		} catch (err) {
			result.errors.push(new LoadError(group.name, `URL '${url}'`, err));
		}
	}

	return result;
}

// Удобный конструктор контекста загрузки списков.
export function createFetchContext(
	cache: DomainListFetchContext["cache"],
	ttlMs: number,
	timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
	fetchFn?: DomainListFetchContext["fetchFn"],
): DomainListFetchContext {
	return { cache, ttlMs, timeoutMs, fetchFn };
}
