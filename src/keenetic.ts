import { execFileSync } from "node:child_process";
import type { CommandResult, ExecOpts, ExistingGroups, ExistingRoutes, RouterBackend } from "./types";
import { errorMessage, isObject } from "./utils";

// Функция запуска ndmc, подменяется в тестах.
export type NdmcRunner = (command: string) => string;

// ndmc не найден или не запускается: дальше выполнять пакет бессмысленно.
export class NdmcUnavailableError extends Error {
	constructor(command: string, cause: unknown) {
		super(`ndmc недоступен (нет бинаря или прав); запустите на Keenetic или включите dryRun: ${command}`, {
			cause,
		});
		this.name = "NdmcUnavailableError";
	}
}

// Выполняем команду ndmc на самом роутере.
export function ndmc(command: string): string {
	try {
		return execFileSync("ndmc", ["-c", command], {
			encoding: "utf8",
		}).trim();
	} catch (error) {
		const code = isObject(error) ? error.code : undefined;
		if (code === "ENOENT" || code === "EACCES") throw new NdmcUnavailableError(command, error);
		throw error;
	}
}

// Текст ошибки ndmc: message, код выхода и начало stderr.
export function describeNdmcError(error: unknown): string {
	if (!isObject(error)) return String(error);

	const details: string[] = [];
	const stderr = String(error.stderr ?? "").trim();
	if (stderr) details.push(stderr.slice(0, 200));
	else if (typeof error.message === "string") details.push(error.message);
	if (error.status !== undefined && error.status !== null) details.push(`status=${String(error.status)}`);

	return details.join("; ");
}

// Ищем в running-config группы object-group fqdn и их include.
export function parseObjectGroups(runningConfig: string): ExistingGroups {
	const groups: ExistingGroups = new Map();
	let current: string[] | null = null;

	for (const rawLine of runningConfig.split(/\r?\n/)) {
		const line = rawLine.trim();

		if (line === "!") {
			current = null;
			continue;
		}

		const flat = line.match(/^object-group\s+fqdn\s+(\S+)\s+include\s+(\S+)/i);
		if (flat) {
			const [, name, address] = flat;
			const list = groups.get(name) ?? [];
			list.push(address);
			groups.set(name, list);
			continue;
		}

		const start = line.match(/^object-group\s+fqdn\s+(\S+)\s*$/i);
		if (start) {
			current = groups.get(start[1]) ?? [];
			groups.set(start[1], current);
			continue;
		}

		// новая секция верхнего уровня закрывает группу
		if (rawLine === line && line) {
			current = null;
			continue;
		}

		const include = line.match(/^include\s+(\S+)/i);
		if (current && include) current.push(include[1]);
	}

	return groups;
}

// Разбираем маршруты DNS-прокси: группа -> интерфейс.
export function parseDnsProxyRoutes(runningConfig: string): ExistingRoutes {
	const routes: ExistingRoutes = new Map();
	const pattern = /^(dns-proxy\s+)?route\s+object-group\s+(\S+)\s+(\S+)/i;
	let inDnsProxy = false;

	for (const raw of runningConfig.split(/\r?\n/)) {
		// строки из JSON-выгрузки бывают в кавычках и с запятой
		const line = raw.trim().replace(/,$/, "").replace(/^"+|"+$/g, "");
		if (/^dns-proxy$/i.test(line)) {
			inDnsProxy = true;
			continue;
		}
		if (inDnsProxy && line === "!") {
			inDnsProxy = false;
			continue;
		}

		const match = line.match(pattern);
		if (!match) continue;

		const [, flatPrefix, group, iface] = match;
		if (flatPrefix || inDnsProxy) routes.set(group, iface);
	}

	return routes;
}

// Интерфейсы роутера из секций "interface <id>".
export function parseInterfaces(runningConfig: string): Set<string> {
	const interfaces = new Set<string>();
	for (const raw of runningConfig.split(/\r?\n/)) {
		const match = raw.match(/^interface\s+(\S+)/);
		if (match) interfaces.add(match[1]);
	}
	return interfaces;
}

// Версия прошивки из "show version" (поле title).
export function parseVersionTitle(showVersion: string): string {
	const match = showVersion.match(/^\s*title:\s*(\S+)/m);
	return match ? match[1] : "";
}

export type NdmcRouterOpts = ExecOpts & {
	run?: NdmcRunner;
};

// Роутер Keenetic через локальный ndmc: чтение running-config и выполнение команд по порядку.
export class NdmcRouter implements RouterBackend {
	private readonly run: NdmcRunner;
	private readonly dryRun: boolean;
	private firmwareVersion = "";

	constructor(opts: NdmcRouterOpts = {}) {
		this.run = opts.run ?? ndmc;
		this.dryRun = Boolean(opts.dryRun);
	}

	// Читаем версию один раз за сессию; дальше проверки берут её из памяти.
	connect(): string {
		this.firmwareVersion = parseVersionTitle(this.run("show version"));
		console.log(`[router] firmware version: ${this.firmwareVersion || "unknown"}`);
		return this.firmwareVersion;
	}

	getFirmwareVersion(): string {
		return this.firmwareVersion;
	}

	private runningConfig(): string {
		return this.run("show running-config");
	}

	getExistingGroups(): ExistingGroups {
		return parseObjectGroups(this.runningConfig());
	}

	getExistingRoutes(): ExistingRoutes {
		return parseDnsProxyRoutes(this.runningConfig());
	}

	getInterfaces(): Set<string> {
		return parseInterfaces(this.runningConfig());
	}

	execute(batch: string[]): CommandResult[] {
		return batch.map((command): CommandResult => {
			if (this.dryRun) {
				console.log(`[dryRun] ndmc -c ${command}`);
				return { command, status: "ok", message: "dry run" };
			}

			try {
				return { command, status: "ok", message: this.run(command) };
			} catch (error) {
				if (error instanceof NdmcUnavailableError) throw error;
				const message = describeNdmcError(error);
				console.warn(`[ndmc:warn] command failed: "${command}" (${message})`);
				return { command, status: "error", message: message || errorMessage(error) };
			}
		});
	}
}
