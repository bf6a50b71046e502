import { describe, expect, test } from "vitest";
import { Command } from "../lib/index.js";

describe("Command", () => {
	test("should create simple command", () => {
		const cmd = new Command("status");
		expect(cmd.toString()).toBe("status");
	});

	test("should write numeric arguments bare", () => {
		const cmd = new Command("playid", 12);
		expect(cmd.toString()).toBe("playid 12");
	});

	test("should handle multiple arguments", () => {
		const cmd = new Command("playlistadd", "Road Trip", "a/b.flac");
		expect(cmd.toString()).toBe('playlistadd "Road Trip" "a/b.flac"');
	});

	test("should escape quotes and backslashes in arguments", () => {
		const cmd = new Command("add", 'dir\\say "hi".mp3');
		expect(cmd.toString()).toBe('add "dir\\\\say \\"hi\\".mp3"');
	});

	test("should accept arguments as a single array", () => {
		const cmd = Command.cmd("albumart", ["cover.flac", 4096]);
		expect(cmd.args).toEqual(["cover.flac", 4096]);
		expect(cmd.toString()).toBe('albumart "cover.flac" 4096');
	});

	test("should accept rest arguments through cmd", () => {
		const cmd = Command.cmd("playlistmove", "Favorites", 3, 0);
		expect(cmd.name).toBe("playlistmove");
		expect(String(cmd)).toBe('playlistmove "Favorites" 3 0');
	});
});
