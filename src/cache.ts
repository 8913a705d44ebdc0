import { createHash } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { UrlCache, UrlCacheEntry, ValidationCache } from "./types";
import { errorMessage, isObject } from "./utils";

export const DEFAULT_URL_CACHE_TTL_MS = 60_000;
const CACHE_DIR_NAME = ".keenetic-dns-routing";

// MD5 содержимого в hex, по нему ловим изменения удалённых списков.
export function computeChecksum(content: string): string {
	return createHash("md5").update(content).digest("hex");
}

export function isFresh(entry: UrlCacheEntry, now: number): boolean {
	return now <= entry.expiresAt;
}

// Каталог кэша: dataDir из конфига или домашний каталог пользователя.
export function resolveCacheDir(dataDir?: string): string {
	const root = dataDir ? path.resolve(dataDir) : os.homedir();
	return path.join(root, CACHE_DIR_NAME);
}

function urlToCacheFilename(url: string): string {
	return `url_${createHash("md5").update(url).digest("hex")}.json`;
}

function isCacheEntry(value: unknown): value is UrlCacheEntry {
	return (
		isObject(value) &&
		typeof value.content === "string" &&
		typeof value.checksum === "string" &&
		typeof value.expiresAt === "number"
	);
}

// Кэш содержимого URL на диске: один JSON-файл на URL.
export class FileUrlCache implements UrlCache {
	constructor(
		private readonly dir: string,
		private readonly now: () => number = Date.now,
	) {}

	filePath(url: string): string {
		return path.join(this.dir, urlToCacheFilename(url));
	}

	// Просроченную запись тоже отдаём: по её checksum сравниваем новую версию.
	read(url: string): UrlCacheEntry | undefined {
		let raw: string;
		try {
			raw = fs.readFileSync(this.filePath(url), "utf8");
		} catch {
			return undefined;
		}

		try {
			const parsed: unknown = JSON.parse(raw);
			return isCacheEntry(parsed) ? parsed : undefined;
		} catch {
			console.warn(`[cache:warn] corrupt entry for ${url}, ignoring`);
			return undefined;
		}
	}

	write(url: string, content: string, ttlMs: number): UrlCacheEntry {
		const entry: UrlCacheEntry = {
			content,
			checksum: computeChecksum(content),
			expiresAt: this.now() + ttlMs,
		};

		try {
			fs.mkdirSync(this.dir, { recursive: true });
			fs.writeFileSync(this.filePath(url), JSON.stringify(entry), { mode: 0o600 });
		} catch (err) {
			console.warn(`[cache:warn] failed to persist ${url}: ${errorMessage(err)}`);
		}

		return entry;
	}
}

// Кэш в памяти для результатов проверки доменов; clear() нужен тестам.
export class MemoryValidationCache implements ValidationCache {
	private readonly entries = new Map<string, boolean>();

	get(token: string): boolean | undefined {
		return this.entries.get(token);
	}

	set(token: string, valid: boolean): void {
		this.entries.set(token, valid);
	}

	clear(): void {
		this.entries.clear();
	}

	get size(): number {
		return this.entries.size;
	}
}
