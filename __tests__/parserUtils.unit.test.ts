import { MalformedResponseError } from "../lib/error.js";
import {
	and,
	escapeArg,
	filter,
	isOneOf,
	parseLine,
	parsers,
} from "../lib/parserUtils.js";

describe("MPD Parser Utilities", () => {
	describe("escapeArg", () => {
		it("should wrap plain values in double quotes", () => {
			expect(escapeArg("Abbey Road")).toBe('"Abbey Road"');
		});

		it("should escape backslashes before quotes", () => {
			expect(escapeArg('a\\b "c"')).toBe('"a\\\\b \\"c\\""');
		});

		it("should escape only the active quote character", () => {
			expect(escapeArg("it's", "'")).toBe("'it\\'s'");
			expect(escapeArg("it's")).toBe('"it\'s"');
		});

		it("should stringify numbers", () => {
			expect(escapeArg(42)).toBe('"42"');
		});
	});

	describe("filter", () => {
		it("should build a quoted filter expression", () => {
			expect(filter("artist", "Nina Simone")).toBe(
				"\"(artist == 'Nina Simone')\"",
			);
		});

		it("should support other comparators", () => {
			expect(filter("title", "", { comparator: "!=" })).toBe(
				"\"(title != '')\"",
			);
		});

		it("should escape quotes inside the value twice", () => {
			// (album == 'Don\'t') then \ -> \\ for the outer argument
			expect(filter("album", "Don't", { quote: false })).toBe(
				"(album == 'Don\\\\'t')",
			);
		});

		it("should escape double quotes for the outer argument", () => {
			expect(filter("title", 'say "hi"')).toBe(
				"\"(title == 'say \\\"hi\\\"')\"",
			);
		});
	});

	describe("and", () => {
		it("should join bare clauses into one argument", () => {
			expect(
				and(
					filter("album", "Blue", { quote: false }),
					filter("albumartist", "Joni Mitchell", { quote: false }),
				),
			).toBe("\"((album == 'Blue') AND (albumartist == 'Joni Mitchell'))\"");
		});
	});

	describe("parseLine", () => {
		it("should lowercase the key and trim both sides", () => {
			expect(parseLine("Last-Modified: 2024-01-01T00:00:00Z")).toEqual([
				"last-modified",
				"2024-01-01T00:00:00Z",
			]);
		});

		it("should split on the first colon only", () => {
			expect(parseLine("file: http://radio.example:8000/live")).toEqual([
				"file",
				"http://radio.example:8000/live",
			]);
		});

		it("should throw without a separator", () => {
			expect(() => parseLine("garbage")).toThrow(MalformedResponseError);
		});
	});

	describe("isOneOf", () => {
		it("should narrow known keys", () => {
			expect(isOneOf("play", ["play", "stop"] as const)).toBe(true);
			expect(isOneOf("seek", ["play", "stop"] as const)).toBe(false);
		});
	});

	describe("parsers", () => {
		it("should parse numbers", () => {
			expect(parsers.parseNumber("12.5")).toBe(12.5);
			expect(parsers.parseNumber("abc")).toBeUndefined();
			expect(parsers.parseNumber("")).toBeUndefined();
			expect(parsers.parseNumber(undefined)).toBeUndefined();
		});

		it("should parse leading integers", () => {
			expect(parsers.parseInteger("3/12")).toBe(3);
			expect(parsers.parseInteger("x")).toBeUndefined();
		});

		it("should parse booleans", () => {
			expect(parsers.parseBoolean("1")).toBe(true);
			expect(parsers.parseBoolean("on")).toBe(true);
			expect(parsers.parseBoolean("0")).toBe(false);
			expect(parsers.parseBoolean("maybe")).toBeUndefined();
		});

		it("should parse player states", () => {
			expect(parsers.parseState("pause")).toBe("pause");
			expect(parsers.parseState(undefined)).toBeUndefined();
			expect(() => parsers.parseState("rewind")).toThrow(
				"Invalid player state: rewind",
			);
		});
	});
});
