import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { computeChecksum, FileUrlCache, isFresh, resolveCacheDir } from "../src/cache";

let dir: string;

beforeEach(() => {
	dir = fs.mkdtempSync(path.join(os.tmpdir(), "dns-routing-cache-"));
});

afterEach(() => {
	fs.rmSync(dir, { recursive: true, force: true });
});

describe("FileUrlCache", () => {
	it("сохраняет содержимое, checksum и срок жизни", () => {
		const cache = new FileUrlCache(dir, () => 1_000);
		const entry = cache.write("https://lists.test/a.txt", "a.com\nb.com\n", 60_000);

		expect(entry).toEqual({
			content: "a.com\nb.com\n",
			checksum: computeChecksum("a.com\nb.com\n"),
			expiresAt: 61_000,
		});
		expect(cache.read("https://lists.test/a.txt")).toEqual(entry);
	});

	it("кладёт по файлу на URL с md5 в имени и правами 0600", () => {
		const cache = new FileUrlCache(dir);
		cache.write("https://lists.test/a.txt", "a.com", 1000);

		const file = cache.filePath("https://lists.test/a.txt");
		expect(path.basename(file)).toMatch(/^url_[0-9a-f]{32}\.json$/);
		expect(fs.statSync(file).mode & 0o777).toBe(0o600);
		expect(cache.filePath("https://lists.test/b.txt")).not.toBe(file);
	});

	it("отдаёт просроченную запись для сравнения checksum", () => {
		let now = 0;
		const cache = new FileUrlCache(dir, () => now);
		cache.write("https://lists.test/a.txt", "a.com", 10);

		now = 100;
		const entry = cache.read("https://lists.test/a.txt");
		expect(entry?.checksum).toBe(computeChecksum("a.com"));
		expect(entry && isFresh(entry, now)).toBe(false);
	});

	it("считает промахом отсутствующий и битый файл", () => {
		const cache = new FileUrlCache(dir);
		expect(cache.read("https://lists.test/missing.txt")).toBeUndefined();

		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		fs.writeFileSync(cache.filePath("https://lists.test/broken.txt"), "{not json");
		expect(cache.read("https://lists.test/broken.txt")).toBeUndefined();
		warn.mockRestore();

		fs.writeFileSync(cache.filePath("https://lists.test/partial.txt"), JSON.stringify({ content: "x" }));
		expect(cache.read("https://lists.test/partial.txt")).toBeUndefined();
	});

	it("создаёт каталог кэша при первой записи", () => {
		const nested = path.join(dir, "nested", "cache");
		const cache = new FileUrlCache(nested);
		cache.write("https://lists.test/a.txt", "a.com", 1000);
		expect(fs.existsSync(nested)).toBe(true);
	});
});

describe("checksum и свежесть", () => {
	it("одинаковое содержимое даёт одинаковый checksum", () => {
		expect(computeChecksum("a.com\n")).toBe(computeChecksum("a.com\n"));
		expect(computeChecksum("a.com\n")).not.toBe(computeChecksum("b.com\n"));
		expect(computeChecksum("")).toBe("d41d8cd98f00b204e9800998ecf8427e");
	});

	it("запись свежа до expiresAt включительно", () => {
		const entry = { content: "", checksum: "", expiresAt: 500 };
		expect(isFresh(entry, 499)).toBe(true);
		expect(isFresh(entry, 500)).toBe(true);
		expect(isFresh(entry, 501)).toBe(false);
	});

	it("кладёт кэш в dataDir или домашний каталог", () => {
		expect(resolveCacheDir("/var/lib/app")).toBe(path.join("/var/lib/app", ".keenetic-dns-routing"));
		expect(resolveCacheDir()).toBe(path.join(os.homedir(), ".keenetic-dns-routing"));
	});
});
