import type { ApplyResult, CommandResult } from "./types";

// Некорректная группа в конфигурации: останавливаем запуск до любого I/O.
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

// Прошивка роутера не поддерживает DNS-маршрутизацию.
export class VersionGateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "VersionGateError";
	}
}

// Не удалось прочитать файл или URL со списком.
export class LoadError extends Error {
	readonly group: string;
	readonly source: string;

	constructor(group: string, source: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`group '${group}': failed to load ${source}: ${reason}`, { cause });
		this.name = "LoadError";
		this.group = group;
		this.source = source;
	}
}

// Группа не помещается в лимит роутера.
export class LimitError extends Error {
	readonly group: string;
	readonly size: number;

	constructor(group: string, limit: number, size: number) {
		super(`group '${group}': exceeds router limit of ${limit} domains (has ${size} domains)`);
		this.name = "LimitError";
		this.group = group;
		this.size = size;
	}
}

// Сводный отчёт по ошибкам загрузки и лимитов; applied есть, если соседние группы успели примениться.
export class DnsRoutingReportError extends AggregateError {
	readonly applied?: ApplyResult;

	constructor(errors: Error[], applied?: ApplyResult) {
		super(
			errors,
			`${errors.length} error(s) while preparing DNS-routing groups:\n${errors.map((e) => `  - ${e.message}`).join("\n")}`,
		);
		this.name = "DnsRoutingReportError";
		this.applied = applied;
	}
}

// Не удалось прочитать текущее состояние роутера.
export class StateFetchError extends Error {
	constructor(what: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`failed to get existing ${what}: ${reason}`, { cause });
		this.name = "StateFetchError";
	}
}

// Часть команд пакета отклонена роутером; принятые команды не откатываются.
export class PartialApplyError extends Error {
	readonly results: CommandResult[];

	constructor(results: CommandResult[]) {
		const failed = results.filter((r) => r.status === "error");
		super(
			`${failed.length} of ${results.length} command(s) failed, already applied commands are kept:\n` +
				failed.map((r) => `  - ${r.command}: ${r.message}`).join("\n"),
		);
		this.name = "PartialApplyError";
		this.results = results;
	}
}
