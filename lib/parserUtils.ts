import debugCreator from "debug";
import { PACKAGE_NAME } from "./const.js";
import { MalformedResponseError } from "./error.js";
import type { PlayerState } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:parserUtils`);

/**
 * Narrows `value` to one of the literal `keys`.
 */
export function isOneOf<K extends string>(
	value: string,
	keys: readonly K[],
): value is K {
	return keys.some((key) => key === value);
}

/**
 * Escapes a string for use as a single protocol argument.
 * Backslashes are escaped first, then the chosen quote character,
 * and the result is wrapped in that quote.
 *
 * @example
 * escapeArg('Say "hi"') // => '"Say \\"hi\\""'
 */
export function escapeArg(arg: unknown, quote: '"' | "'" = '"'): string {
	const escaped = `${arg}`
		.replace(/\\/g, "\\\\")
		.replace(quote === '"' ? /"/g : /'/g, `\\${quote}`);
	return `${quote}${escaped}${quote}`;
}

/**
 * Builds a filter expression such as `(artist == 'Nina Simone')`.
 *
 * The value is single-quoted, then the whole clause is escaped again so it
 * survives as one double-quoted argument. Pass `quote: false` to get the bare
 * clause for combining with {@link and}.
 */
export function filter(
	key: string,
	value: string,
	options: { comparator?: string; quote?: boolean } = {},
): string {
	const { comparator = "==", quote = true } = options;
	const clause = `(${key} ${comparator} ${escapeArg(value, "'")})`
		.replace(/\\/g, "\\\\")
		.replace(/"/g, '\\"');

	return quote ? `"${clause}"` : clause;
}

/**
 * Joins bare filter clauses with `AND` into one double-quoted argument.
 */
export function and(...clauses: string[]): string {
	return `"(${clauses.join(" AND ")})"`;
}

/**
 * Splits a response line on its first colon.
 * The key is lowercased and both sides are trimmed.
 * Example: "Last-Modified: 2024-01-01T00:00:00Z" -> ["last-modified", "2024-01-01T00:00:00Z"]
 *
 * @throws {MalformedResponseError} If the line has no colon.
 */
export function parseLine(line: string): [string, string] {
	const idx = line.indexOf(":");
	if (idx === -1) {
		throw new MalformedResponseError(
			`Line does not contain a key-value separator: ${line}`,
		);
	}
	return [line.slice(0, idx).trim().toLowerCase(), line.slice(idx + 1).trim()];
}

export const parsers = {
	parseNumber: (num: string | undefined): number | undefined => {
		if (num === undefined || num.trim() === "") return undefined;

		const val = Number(num);
		return Number.isNaN(val) ? undefined : val;
	},

	/**
	 * Base-10 integer from the leading digits, so `"3/12"` (track of total) is 3.
	 */
	parseInteger: (num: string | undefined): number | undefined => {
		if (num === undefined) return undefined;

		const val = Number.parseInt(num, 10);
		return Number.isNaN(val) ? undefined : val;
	},

	parseBoolean: (val: string | undefined): boolean | undefined => {
		if (val === undefined) return undefined;
		const lowerVal = val.toLowerCase().trim();
		if (lowerVal === "1" || lowerVal === "true" || lowerVal === "on")
			return true;
		if (lowerVal === "0" || lowerVal === "false" || lowerVal === "off")
			return false;
		debug(`Unrecognised boolean value: ${val}`);
		return undefined;
	},

	parseState: (val: string | undefined): PlayerState | undefined => {
		if (val === undefined) return undefined;
		const lowerVal = val.toLowerCase().trim();
		if (lowerVal === "play" || lowerVal === "stop" || lowerVal === "pause") {
			return lowerVal;
		}
		throw new MalformedResponseError(`Invalid player state: ${val}`);
	},
};
