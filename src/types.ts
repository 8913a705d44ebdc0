// Конфигурация приложения, загружаемая из config.json.
export type Config = {
	dataDir?: string;
	dryRun?: boolean;
	debug?: boolean;
	urlCacheTtlMs?: number;
	fetchTimeoutMs?: number;
	groups: DnsRoutingGroup[];
	server?: { host?: string; port?: number };
};

// Группа доменов с привязкой к интерфейсу.
export type DnsRoutingGroup = {
	name: string;
	domainFiles: string[];
	domainURLs: string[];
	interfaceId: string;
};

// Опции исполнения команд ndmc.
export type ExecOpts = { dryRun?: boolean };

// Функция загрузки текста по URL (подменяется в тестах).
export type FetchFn = (url: string, timeoutMs: number) => Promise<string>;

// Запись кэша удалённого списка.
export type UrlCacheEntry = {
	content: string;
	checksum: string;
	expiresAt: number;
};

export interface UrlCache {
	read(url: string): UrlCacheEntry | undefined;
	write(url: string, content: string, ttlMs: number): UrlCacheEntry;
}

export interface ValidationCache {
	get(token: string): boolean | undefined;
	set(token: string, valid: boolean): void;
	clear(): void;
}

// Результат проверки одной строки списка.
export type LineVerdict =
	| { kind: "ignored" }
	| { kind: "accepted"; token: string }
	| { kind: "rejected"; token: string; reason: string };

// Строки одного источника (файл или URL).
export type SourceLines = {
	label: string;
	lines: string[];
};

// Принятые домены из одного источника.
export type ParsedSource = {
	label: string;
	domains: string[];
	rejected: number;
};

// Контекст загрузки источников.
export type DomainListFetchContext = {
	timeoutMs: number;
	ttlMs: number;
	cache: UrlCache;
	fetchFn?: FetchFn;
	now?: () => number;
};

// Итог сборки групп.
export type AssembledGroups = {
	domains: Map<string, string[]>;
	skipped: string[];
	errors: Error[];
};

// Пересечение доменов между группами.
export type DomainConflict = {
	domain: string;
	groups: string[];
};

// Существующие на роутере группы и маршруты.
export type ExistingGroups = Map<string, string[]>;
export type ExistingRoutes = Map<string, string>;

export type CommandStatus = "ok" | "error";

export type CommandResult = {
	command: string;
	status: CommandStatus;
	message: string;
};

// Всё, что нужно движку от роутера.
export interface RouterBackend {
	getFirmwareVersion(): string;
	getExistingGroups(): ExistingGroups;
	getExistingRoutes(): ExistingRoutes;
	getInterfaces(): Set<string>;
	execute(commands: string[]): CommandResult[];
}

export type PlanSummary = {
	groupsToCreate: number;
	domainsToAdd: number;
	domainsToRemove: number;
	routesToSet: number;
};

export type Plan = {
	commands: string[];
	summary: PlanSummary;
};

export type ApplyResult = {
	commands: string[];
	results: CommandResult[];
	summary: PlanSummary;
	conflicts: DomainConflict[];
};

export type DeleteResult = {
	groups: DnsRoutingGroup[];
	commands: string[];
	results: CommandResult[];
};
