import { VersionGateError } from "./errors";

export const MIN_DNS_ROUTING_VERSION = "5.0.1";

export type ParsedVersion = {
	release: number[];
	prerelease: string;
};

// Разбираем "5.0.1", "4.3.6.3" или "5.0.1-beta2"; "+build" и хвост после пробела отбрасываем.
export function parseVersion(raw: string): ParsedVersion {
	const match = raw.trim().match(/^([^-+\s]*)(?:-([^+\s]+))?/);
	const core = match?.[1] ?? "";
	const parts = core.split(".");
	if (!core || parts.some((part) => !/^\d+$/.test(part))) {
		throw new Error(`failed to parse router version '${raw}'`);
	}
	return { release: parts.map((part) => Number.parseInt(part, 10)), prerelease: match?.[2] ?? "" };
}

// Покомпонентное числовое сравнение, недостающие компоненты считаем нулями.
// Предрелиз младше того же релиза: 5.0.1-beta2 < 5.0.1.
export function compareVersions(a: string, b: string): number {
	const left = parseVersion(a);
	const right = parseVersion(b);
	const length = Math.max(left.release.length, right.release.length);

	for (let i = 0; i < length; i += 1) {
		const diff = (left.release[i] ?? 0) - (right.release[i] ?? 0);
		if (diff !== 0) return diff < 0 ? -1 : 1;
	}

	if (left.prerelease === right.prerelease) return 0;
	if (!left.prerelease) return 1;
	if (!right.prerelease) return -1;
	return left.prerelease < right.prerelease ? -1 : 1;
}

// Проверяем версию прошивки до любых запросов к роутеру.
export function checkDnsRoutingSupport(version: string, minimum = MIN_DNS_ROUTING_VERSION): void {
	if (!version.trim()) {
		throw new VersionGateError("router version information not available, cannot check DNS-routing support");
	}

	let cmp: number;
	try {
		cmp = compareVersions(version, minimum);
	} catch (err) {
		throw new VersionGateError(err instanceof Error ? err.message : String(err));
	}

	if (cmp < 0) {
		throw new VersionGateError(
			`DNS-routing requires Keenetic firmware version ${minimum} or higher. Current version: ${version}`,
		);
	}
}
