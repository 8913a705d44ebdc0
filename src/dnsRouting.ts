import { assembleGroups, findCrossGroupConflicts, reportConflicts, type GroupInput } from "./assembler";
import { validateDnsRoutingGroups } from "./config";
import { loadGroupSources } from "./domainsList";
import { ConfigError, DnsRoutingReportError, type LoadError, PartialApplyError, StateFetchError } from "./errors";
import { planApply, planDelete } from "./planner";
import type {
	ApplyResult,
	CommandResult,
	DeleteResult,
	DnsRoutingGroup,
	DomainListFetchContext,
	PlanSummary,
	RouterBackend,
} from "./types";
import type { DomainValidator } from "./validator";
import { checkDnsRoutingSupport } from "./version";

export type DnsRoutingDeps = {
	router: RouterBackend;
	fetchCtx: DomainListFetchContext;
	validator: DomainValidator;
	debug?: boolean;
	limit?: number;
};

const EMPTY_SUMMARY: PlanSummary = { groupsToCreate: 0, domainsToAdd: 0, domainsToRemove: 0, routesToSet: 0 };

// Чтение состояния роутера: любая ошибка фатальна и останавливает запуск до записи.
function fetchState<T>(what: string, read: () => T): T {
	try {
		return read();
	} catch (err) {
		throw new StateFetchError(what, err);
	}
}

function printResults(results: CommandResult[], debug?: boolean): void {
	for (const result of results) {
		if (result.status === "error") {
			console.error(`  [apply:error] ${result.command}: ${result.message}`);
		} else if (debug && result.message) {
			console.log(`  [apply] ${result.command}: ${result.message}`);
		}
	}
}

// Отправляем пакет одним вызовом; откатить принятые команды роутер не умеет.
function executeBatch(router: RouterBackend, batch: string[], debug?: boolean): CommandResult[] {
	const results = router.execute(batch);
	printResults(results, debug);
	if (results.some((r) => r.status === "error")) throw new PartialApplyError(results);
	return results;
}

// Каждый интерфейс должен существовать на роутере; owner попадает в текст ошибки.
function checkInterfacesExist(router: RouterBackend, refs: { owner: string; interfaceId: string }[]): void {
	const interfaces = fetchState("interfaces", () => router.getInterfaces());
	for (const { owner, interfaceId } of refs) {
		if (!interfaces.has(interfaceId)) throw new ConfigError(`${owner}: interface '${interfaceId}' not found`);
	}
}

// Приводим роутер к желаемому набору групп: создаём недостающее, чистим лишнее, обновляем маршруты.
export async function applyDnsRouting(groups: DnsRoutingGroup[], deps: DnsRoutingDeps): Promise<ApplyResult> {
	const { router, debug } = deps;
	const result: ApplyResult = { commands: [], results: [], summary: { ...EMPTY_SUMMARY }, conflicts: [] };

	if (!groups.length) {
		console.log("[apply] no DNS-routing groups to add");
		return result;
	}

	validateDnsRoutingGroups(groups);
	checkDnsRoutingSupport(router.getFirmwareVersion());
	checkInterfacesExist(
		router,
		groups.map((g) => ({ owner: `group '${g.name}'`, interfaceId: g.interfaceId })),
	);

	const loadErrors: LoadError[] = [];
	const inputs: GroupInput[] = [];

	for (const group of groups) {
		console.log(`[load] group '${group.name}' -> ${group.interfaceId}`);
		const loaded = await loadGroupSources(group, deps.fetchCtx);
		for (const err of loaded.errors) console.error(`  [load:error] ${err.message}`);
		loadErrors.push(...loaded.errors);
		inputs.push({ name: group.name, sources: loaded.sources });
	}

	const assembled = assembleGroups(inputs, { validator: deps.validator, limit: deps.limit, debug });

	// при ошибках загрузки ничего не применяем
	if (loadErrors.length) throw new DnsRoutingReportError([...loadErrors, ...assembled.errors]);

	result.conflicts = findCrossGroupConflicts(assembled.domains);
	reportConflicts(result.conflicts);

	const existingGroups = fetchState("DNS-routing groups", () => router.getExistingGroups());
	const existingRoutes = fetchState("dns-proxy routes", () => router.getExistingRoutes());

	const plan = planApply(groups, assembled.domains, existingGroups, existingRoutes);
	result.commands = plan.commands;
	result.summary = plan.summary;

	if (!plan.commands.length) {
		console.log("[apply] all DNS-routing groups and domains are up to date");
	} else {
		const { groupsToCreate, domainsToAdd, domainsToRemove, routesToSet } = plan.summary;
		console.log(
			`[plan] groups to create=${groupsToCreate}, domains to add=${domainsToAdd}, domains to remove=${domainsToRemove}, routes to set=${routesToSet}`,
		);
		result.results = executeBatch(router, plan.commands, debug);
		console.log(`[apply] applied ${plan.commands.length} command(s) for ${assembled.domains.size} group(s)`);
	}

	// сверх лимита: соседние группы уже применены, об исключённых сообщаем одним отчётом
	if (assembled.errors.length) throw new DnsRoutingReportError(assembled.errors, result);

	return result;
}

// Удаляем переданные группы: маршруты, затем object-group, затем save.
export async function removeDnsRoutingGroups(
	router: RouterBackend,
	groups: DnsRoutingGroup[],
	debug?: boolean,
): Promise<DeleteResult> {
	if (!groups.length) {
		console.log("[delete] no DNS-routing groups to delete");
		return { groups, commands: [], results: [] };
	}

	checkDnsRoutingSupport(router.getFirmwareVersion());

	const commands = planDelete(groups);
	const results = executeBatch(router, commands, debug);
	console.log(`[delete] deleted ${groups.length} DNS-routing group(s)`);

	return { groups, commands, results };
}

export type DeleteOpts = {
	groups: DnsRoutingGroup[];
	interfaceId?: string;
	debug?: boolean;
};

// Удаляем с роутера все группы, маршруты которых ведут на целевые интерфейсы.
export async function deleteDnsRouting(router: RouterBackend, opts: DeleteOpts): Promise<DeleteResult> {
	const empty: DeleteResult = { groups: [], commands: [], results: [] };

	checkDnsRoutingSupport(router.getFirmwareVersion());

	const targets = opts.interfaceId ? [opts.interfaceId] : [...new Set(opts.groups.map((g) => g.interfaceId))];
	if (!targets.length) {
		console.log("[delete] no DNS-routing interfaces defined in configuration");
		return empty;
	}

	checkInterfacesExist(
		router,
		targets.map((iface) => ({ owner: "delete", interfaceId: iface })),
	);

	const existingGroups = fetchState("DNS-routing groups", () => router.getExistingGroups());
	if (!existingGroups.size) {
		console.log("[delete] no DNS-routing groups found on router");
		return empty;
	}

	const existingRoutes = fetchState("dns-proxy routes", () => router.getExistingRoutes());
	const toDelete: DnsRoutingGroup[] = [];

	for (const [name, domains] of existingGroups) {
		const iface = existingRoutes.get(name);
		if (!iface || !targets.includes(iface)) continue;

		console.log(`  [delete] group ${name} (interface: ${iface}, domains: ${domains.length})`);
		toDelete.push({ name, interfaceId: iface, domainFiles: [], domainURLs: [] });
	}

	if (!toDelete.length) {
		console.log(`[delete] no DNS-routing groups found for interface(s): ${targets.join(", ")}`);
		return empty;
	}

	return removeDnsRoutingGroups(router, toDelete, opts.debug);
}
