import { isIPv4 } from "node:net";
import { domainToASCII } from "node:url";
import type { LineVerdict, ParsedSource, ValidationCache } from "./types";

// Префиксы v2fly domain-list-community, которые снимаем перед проверкой.
export const LIST_PREFIXES = ["full", "regexp", "domain", "keyword", "include"] as const;
const KNOWN_PREFIXES: ReadonlySet<string> = new Set(LIST_PREFIXES);

const MAX_DOMAIN_LENGTH = 253;
const LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i;
// UTS46 молча выбрасывает такие символы, а в команду роутера ушёл бы исходный токен.
const INVISIBLE_PATTERN = /[\p{Cc}\p{Cf}\p{Co}\p{Cn}]/u;

// Шаг разбора строки: получает токен, возвращает очищенный токен.
export type LineRule = (token: string) => string;

// Оставляем первое поле: "domain.com @cn" -> "domain.com".
export const takeFirstField: LineRule = (token) => token.split(/\s+/)[0] ?? "";

// Снимаем известный префикс списка: "full:a.com" -> "a.com"; прочие "x:y" не трогаем.
export const stripListPrefix: LineRule = (token) => {
	const colonIndex = token.indexOf(":");
	if (colonIndex <= 0) return token;

	const prefix = token.slice(0, colonIndex);
	return KNOWN_PREFIXES.has(prefix) ? token.slice(colonIndex + 1) : token;
};

export const DEFAULT_RULES: readonly LineRule[] = [takeFirstField, stripListPrefix];

const ASCII_PATTERN = /^[\x00-\x7f]*$/;

function checkLabel(label: string): string | null {
	if (label.length > 63) return `label longer than 63 characters: ${label}`;
	if (!LABEL_PATTERN.test(label)) return `invalid label: ${label}`;
	return null;
}

// Структурная проверка домена или IPv4; возвращает причину отказа или null.
export function checkDomain(token: string): string | null {
	if (!token) return "empty domain";
	if (isIPv4(token)) return null;
	if (!token.includes(".")) return "missing TLD (no dot)";

	const labels = token.split(".");
	if (labels.some((label) => !label)) return "empty label";
	if (INVISIBLE_PATTERN.test(token)) return "control or invisible character";

	for (const label of labels) {
		if (!ASCII_PATTERN.test(label)) continue;
		const reason = checkLabel(label);
		if (reason) return reason;
	}

	// UTS46 ToASCII: пустая строка означает отказ
	const ascii = domainToASCII(token);
	if (!ascii || ascii.split(".").length !== labels.length) return "IDNA validation failed";
	if (ascii.length > MAX_DOMAIN_LENGTH) return `domain longer than ${MAX_DOMAIN_LENGTH} characters`;

	for (const label of ascii.split(".")) {
		const reason = checkLabel(label);
		if (reason) return reason;
	}

	return null;
}

export type DomainValidatorOpts = {
	cache: ValidationCache;
	rules?: readonly LineRule[];
};

// Проверка строк списков с мемоизацией результата по очищенному токену.
export class DomainValidator {
	private readonly cache: ValidationCache;
	private readonly rules: readonly LineRule[];

	constructor({ cache, rules = DEFAULT_RULES }: DomainValidatorOpts) {
		this.cache = cache;
		this.rules = rules;
	}

	validate(line: string): LineVerdict {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) return { kind: "ignored" };

		const token = this.rules.reduce((current, rule) => rule(current), trimmed);

		const cached = this.cache.get(token);
		if (cached === true) return { kind: "accepted", token };

		// причину отказа пересчитываем, кэш хранит только вердикт
		const reason = checkDomain(token);
		this.cache.set(token, reason === null);

		return reason === null ? { kind: "accepted", token } : { kind: "rejected", token, reason };
	}

	// Разбираем строки одного источника: принятые домены в исходном порядке и число отказов.
	parseLines(label: string, lines: string[], debug = false): ParsedSource {
		const domains: string[] = [];
		let rejected = 0;

		for (const line of lines) {
			const verdict = this.validate(line);
			if (verdict.kind === "ignored") continue;

			if (verdict.kind === "rejected") {
				rejected += 1;
				if (debug) console.log(`  [skip] ${label}: ${line.trim()} (${verdict.reason})`);
				continue;
			}

			domains.push(verdict.token);
		}

		return { label, domains, rejected };
	}
}
