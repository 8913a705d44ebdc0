import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { assembleGroups, findCrossGroupConflicts, reportConflicts, sortUnique } from "../src/assembler";
import { MemoryValidationCache } from "../src/cache";
import { LimitError } from "../src/errors";
import { DomainValidator } from "../src/validator";

let logs: string[];

beforeEach(() => {
	logs = [];
	const capture = (...args: unknown[]) => {
		logs.push(args.join(" "));
	};
	vi.spyOn(console, "log").mockImplementation(capture);
	vi.spyOn(console, "warn").mockImplementation(capture);
});

afterEach(() => {
	vi.restoreAllMocks();
});

function domainsOf(count: number, prefix: string): string[] {
	return Array.from({ length: count }, (_, i) => `${prefix}${i}.com`);
}

const validator = () => new DomainValidator({ cache: new MemoryValidationCache() });

describe("assembleGroups", () => {
	it("склеивает источники, сортирует и убирает дубликаты", () => {
		const res = assembleGroups(
			[
				{
					name: "social",
					sources: [
						{ label: "file a.txt", lines: ["b.com", "a.com"] },
						{ label: "https://lists.test/b.txt", lines: ["a.com", "c.com", "bad"] },
					],
				},
			],
			{ validator: validator() },
		);

		expect(res.domains.get("social")).toEqual(["a.com", "b.com", "c.com"]);
		expect(res.errors).toEqual([]);
		expect(logs).toContain("  [dedupe] removed 1 duplicate domain(s) from group social");
		expect(logs).toContain("  [skip] social: 1 invalid domain(s) from https://lists.test/b.txt");
	});

	it("пропускает группу без доменов, не считая это ошибкой", () => {
		const res = assembleGroups([{ name: "empty", sources: [{ label: "file e.txt", lines: ["# only comments", "bare"] }] }], {
			validator: validator(),
		});

		expect(res.domains.has("empty")).toBe(false);
		expect(res.skipped).toEqual(["empty"]);
		expect(res.errors).toEqual([]);
		expect(logs).toContain("[skip] group 'empty': no domains loaded");
	});

	it("исключает группу сверх лимита, соседние остаются", () => {
		const res = assembleGroups(
			[
				{ name: "big", sources: [{ label: "file big.txt", lines: domainsOf(301, "big") }] },
				{ name: "small", sources: [{ label: "file small.txt", lines: domainsOf(50, "small") }] },
			],
			{ validator: validator() },
		);

		expect(res.domains.has("big")).toBe(false);
		expect(res.domains.get("small")).toHaveLength(50);
		expect(res.errors).toHaveLength(1);
		expect(res.errors[0]).toBeInstanceOf(LimitError);
		expect(res.errors[0]?.message).toBe("group 'big': exceeds router limit of 300 domains (has 301 domains)");
	});

	it("ровно 300 доменов проходят, лимит считается после дедупликации", () => {
		const lines = [...domainsOf(300, "d"), ...domainsOf(20, "d")];
		const res = assembleGroups([{ name: "edge", sources: [{ label: "file edge.txt", lines }] }], {
			validator: validator(),
		});

		expect(res.errors).toEqual([]);
		expect(res.domains.get("edge")).toHaveLength(300);
	});
});

describe("пересечения между группами", () => {
	it("находит домены из нескольких групп, ничего не удаляя", () => {
		const groups = new Map([
			["g1", ["a.com", "b.com"]],
			["g2", ["b.com", "c.com"]],
			["g3", ["a.com", "b.com"]],
		]);

		expect(findCrossGroupConflicts(groups)).toEqual([
			{ domain: "a.com", groups: ["g1", "g3"] },
			{ domain: "b.com", groups: ["g1", "g2", "g3"] },
		]);
		expect(groups.get("g2")).toEqual(["b.com", "c.com"]);
	});

	it("печатает предупреждение по каждому домену", () => {
		reportConflicts([{ domain: "b.com", groups: ["g1", "g2"] }]);
		expect(logs).toContain("  [conflict] b.com appears in groups: g1, g2");

		logs.length = 0;
		reportConflicts([]);
		expect(logs).toEqual([]);
	});
});

describe("sortUnique", () => {
	it("детерминирован независимо от исходного порядка", () => {
		expect(sortUnique(["c.com", "a.com", "c.com", "b.com"])).toEqual(["a.com", "b.com", "c.com"]);
		expect(sortUnique(["b.com", "c.com", "a.com"])).toEqual(sortUnique(["a.com", "b.com", "c.com"]));
	});
});
