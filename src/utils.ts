import fs from "node:fs";

export function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

// Читаем JSON с диска, при отсутствии файла возвращаем undefined.
export function readJson(filePath: string): unknown {
	let raw: string;
	try {
		raw = fs.readFileSync(filePath, "utf8");
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
		throw err;
	}
	return JSON.parse(raw);
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
