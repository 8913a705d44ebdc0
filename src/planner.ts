import type { DnsRoutingGroup, ExistingGroups, ExistingRoutes, Plan, PlanSummary } from "./types";

export const SAVE_COMMAND = "system configuration save";

// Команды CLI роутера для object-group и dns-proxy route.
export const commands = {
	createGroup: (group: string) => `object-group fqdn ${group}`,
	addDomain: (group: string, domain: string) => `object-group fqdn ${group} include ${domain}`,
	removeDomain: (group: string, domain: string) => `no object-group fqdn ${group} include ${domain}`,
	deleteGroup: (group: string) => `no object-group fqdn ${group}`,
	setRoute: (group: string, iface: string) => `dns-proxy route object-group ${group} ${iface} auto`,
	deleteRoute: (group: string, iface: string) => `no dns-proxy route object-group ${group} ${iface}`,
	save: () => SAVE_COMMAND,
};

// save ровно один раз и в самом конце; пустой пакет остаётся пустым.
export function ensureSaveAtEnd(batch: string[]): string[] {
	const withoutSave = batch.filter((cmd) => cmd !== SAVE_COMMAND);
	return withoutSave.length ? [...withoutSave, SAVE_COMMAND] : [];
}

function emptySummary(): PlanSummary {
	return { groupsToCreate: 0, domainsToAdd: 0, domainsToRemove: 0, routesToSet: 0 };
}

// Сравниваем желаемое состояние с роутером и строим упорядоченный список команд.
// Порядок: создание группы, чистка лишних доменов, добавление новых; маршруты после всех групп.
// Группы без собранных доменов (пропущенные или сверх лимита) не трогаем.
export function planApply(
	desired: DnsRoutingGroup[],
	resolved: Map<string, string[]>,
	existingGroups: ExistingGroups,
	existingRoutes: ExistingRoutes,
): Plan {
	const summary = emptySummary();
	const batch: string[] = [];
	const planned = desired.filter((group) => resolved.has(group.name));

	for (const group of planned) {
		const domains = resolved.get(group.name) ?? [];
		const wanted = new Set(domains);
		const existing = existingGroups.get(group.name);

		if (!existing) {
			batch.push(commands.createGroup(group.name));
			summary.groupsToCreate += 1;
		}

		const present = new Set(existing ?? []);

		for (const domain of present) {
			if (wanted.has(domain)) continue;
			batch.push(commands.removeDomain(group.name, domain));
			summary.domainsToRemove += 1;
		}

		for (const domain of domains) {
			if (present.has(domain)) continue;
			batch.push(commands.addDomain(group.name, domain));
			summary.domainsToAdd += 1;
		}
	}

	for (const group of planned) {
		if (existingRoutes.get(group.name) === group.interfaceId) continue;
		batch.push(commands.setRoute(group.name, group.interfaceId));
		summary.routesToSet += 1;
	}

	return { commands: ensureSaveAtEnd(batch), summary };
}

// Удаление: сначала все маршруты, затем сами группы.
export function planDelete(groups: DnsRoutingGroup[]): string[] {
	const batch = [
		...groups.map((group) => commands.deleteRoute(group.name, group.interfaceId)),
		...groups.map((group) => commands.deleteGroup(group.name)),
	];
	return ensureSaveAtEnd(batch);
}
