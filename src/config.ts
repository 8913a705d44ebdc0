import path from "node:path";
import { ConfigError } from "./errors";
import type { Config, DnsRoutingGroup } from "./types";
import { isObject, isStringArray, readJson } from "./utils";

const INTERFACE_ID_PATTERN = /^[A-Za-z0-9/_.-]+$/;

function optionalStrings(value: unknown, field: string, index: number): string[] {
	if (value === undefined) return [];
	if (!isStringArray(value)) throw new ConfigError(`groups[${index}].${field} must be an array of strings`);
	return value;
}

function optionalNumber(value: unknown, field: string): number | undefined {
	if (value === undefined) return undefined;
	if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
		throw new ConfigError(`${field} must be a non-negative number`);
	}
	return value;
}

// Группа из JSON; пути к файлам считаем от каталога конфига.
function parseGroup(raw: unknown, index: number, baseDir: string): DnsRoutingGroup {
	if (!isObject(raw)) throw new ConfigError(`groups[${index}] must be an object`);

	const { name, interfaceId } = raw;
	if (typeof name !== "string") throw new ConfigError(`groups[${index}].name must be a string`);
	if (typeof interfaceId !== "string") throw new ConfigError(`groups[${index}].interfaceId must be a string`);

	return {
		name,
		interfaceId,
		domainFiles: optionalStrings(raw.domainFiles, "domainFiles", index).map((file) => path.resolve(baseDir, file)),
		domainURLs: optionalStrings(raw.domainURLs, "domainURLs", index),
	};
}

// Проверяем группы до любого обращения к файлам, сети и роутеру.
export function validateDnsRoutingGroups(groups: DnsRoutingGroup[]): void {
	const seen = new Map<string, number>();

	groups.forEach((group, index) => {
		if (!group.name) throw new ConfigError("DNS routing group name cannot be empty");
		if (!group.name.trim()) throw new ConfigError("DNS routing group name cannot contain only whitespace");

		const first = seen.get(group.name);
		if (first !== undefined) {
			throw new ConfigError(
				`duplicate DNS routing group name '${group.name}' found at positions ${first} and ${index}`,
			);
		}
		seen.set(group.name, index);

		if (!group.domainFiles.length && !group.domainURLs.length) {
			throw new ConfigError(`DNS routing group '${group.name}' must contain at least one domain file or domain URL`);
		}

		if (!group.interfaceId) {
			throw new ConfigError(`interface ID cannot be empty in DNS routing group '${group.name}' at position ${index}`);
		}
		if (!INTERFACE_ID_PATTERN.test(group.interfaceId)) {
			throw new ConfigError(`invalid interface ID '${group.interfaceId}' in DNS routing group '${group.name}'`);
		}
	});
}

export function parseConfig(raw: unknown, baseDir: string): Config {
	if (!isObject(raw)) throw new ConfigError("config must be a JSON object");
	const rawGroups: unknown = raw.groups ?? [];
	if (!Array.isArray(rawGroups)) throw new ConfigError("groups must be an array");

	const groups = rawGroups.map((group: unknown, index: number) => parseGroup(group, index, baseDir));

	let server: Config["server"];
	const rawServer = raw.server;
	if (rawServer !== undefined) {
		if (!isObject(rawServer)) throw new ConfigError("server must be an object");
		const { host } = rawServer;
		if (host !== undefined && typeof host !== "string") throw new ConfigError("server.host must be a string");
		server = { host, port: optionalNumber(rawServer.port, "server.port") };
	}

	const { dataDir } = raw;
	if (dataDir !== undefined && typeof dataDir !== "string") throw new ConfigError("dataDir must be a string");

	return {
		dataDir: dataDir === undefined ? undefined : path.resolve(baseDir, dataDir),
		dryRun: Boolean(raw.dryRun),
		debug: Boolean(raw.debug),
		urlCacheTtlMs: optionalNumber(raw.urlCacheTtlMs, "urlCacheTtlMs"),
		fetchTimeoutMs: optionalNumber(raw.fetchTimeoutMs, "fetchTimeoutMs"),
		groups,
		server,
	};
}

// Читаем config.json и приводим к Config.
export function loadConfig(configPath: string): Config {
	const raw = readJson(configPath);
	if (raw === undefined) throw new ConfigError(`Config not found: ${configPath}`);
	return parseConfig(raw, path.dirname(configPath));
}
