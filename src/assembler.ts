import { DomainValidator } from "./validator";
import { LimitError } from "./errors";
import type { AssembledGroups, DomainConflict, SourceLines } from "./types";

// Лимит роутера на число записей в одной object-group fqdn.
export const MAX_DOMAINS_PER_GROUP = 300;

export type GroupInput = {
	name: string;
	sources: SourceLines[];
};

export type AssembleOpts = {
	validator: DomainValidator;
	limit?: number;
	debug?: boolean;
};

// Сортируем и убираем дубликаты; порядок после этого не важен, нужен только для детерминизма.
export function sortUnique(domains: string[]): string[] {
	return [...new Set(domains)].sort();
}

// Собираем итоговый набор доменов каждой группы и проверяем лимит.
export function assembleGroups(inputs: GroupInput[], opts: AssembleOpts): AssembledGroups {
	const limit = opts.limit ?? MAX_DOMAINS_PER_GROUP;
	const result: AssembledGroups = { domains: new Map(), skipped: [], errors: [] };

	for (const input of inputs) {
		const collected: string[] = [];

		for (const source of input.sources) {
			const parsed = opts.validator.parseLines(source.label, source.lines, opts.debug);
			if (parsed.rejected > 0) {
				console.log(`  [skip] ${input.name}: ${parsed.rejected} invalid domain(s) from ${source.label}`);
			}
			console.log(`  [load] ${input.name}: ${parsed.domains.length} domain(s) from ${source.label}`);
			collected.push(...parsed.domains);
		}

		if (!collected.length) {
			console.log(`[skip] group '${input.name}': no domains loaded`);
			result.skipped.push(input.name);
			continue;
		}

		const domains = sortUnique(collected);
		const duplicates = collected.length - domains.length;
		if (duplicates > 0) {
			console.log(`  [dedupe] removed ${duplicates} duplicate domain(s) from group ${input.name}`);
		}

		if (domains.length > limit) {
			result.errors.push(new LimitError(input.name, limit, domains.length));
			continue;
		}

		result.domains.set(input.name, domains);
	}

	return result;
}

// Домены, попавшие в несколько групп. Только находим, ничего не удаляем.
export function findCrossGroupConflicts(groupDomains: Map<string, string[]>): DomainConflict[] {
	const domainToGroups = new Map<string, string[]>();

	for (const [groupName, domains] of groupDomains) {
		for (const domain of domains) {
			const groups = domainToGroups.get(domain);
			if (groups) groups.push(groupName);
			else domainToGroups.set(domain, [groupName]);
		}
	}

	return [...domainToGroups.entries()]
		.filter(([, groups]) => groups.length > 1)
		.map(([domain, groups]) => ({ domain, groups }))
		.sort((a, b) => a.domain.localeCompare(b.domain));
}

export function reportConflicts(conflicts: DomainConflict[]): void {
	if (!conflicts.length) return;

	console.warn("[conflict] misconfiguration found: domains cannot appear in multiple groups");
	for (const { domain, groups } of conflicts) {
		console.warn(`  [conflict] ${domain} appears in groups: ${groups.join(", ")}`);
	}
	console.warn("[conflict] continuing anyway; each domain should belong to exactly one group");
}
