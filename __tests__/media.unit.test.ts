import { describe, expect, it } from "vitest";
import {
	Sources,
	albumId,
	mediaId,
	sortArgument,
	sourcePlaylist,
	uniqueBy,
} from "../lib/media.js";
import { Parsers } from "../lib/parsers.js";

const lines = ["file: a/1.flac", "AlbumArtist: Low", "Album: Trust"];

describe("media helpers", () => {
	it("should build sort arguments", () => {
		expect(sortArgument({ option: "album", direction: "ascending" })).toBe(
			"albumsort",
		);
		expect(sortArgument({ option: "song", direction: "descending" })).toBe(
			"-titlesort",
		);
	});

	it("should resolve the playlist behind a source", () => {
		expect(sourcePlaylist(Sources.favorites)).toEqual({ name: "Favorites" });
		expect(sourcePlaylist(Sources.playlist({ name: "Mix" }))).toEqual({
			name: "Mix",
		});
		expect(sourcePlaylist(Sources.queue)).toBeUndefined();
	});

	it("should identify media by kind", () => {
		expect(mediaId(Parsers.parseMediaResponse(lines, "song"))).toBe("a/1.flac");
		expect(mediaId(Parsers.parseMediaResponse(lines, "album"))).toBe(
			"Low - Trust",
		);
		expect(mediaId(Parsers.parseMediaResponse(lines, "artist"))).toBe("Low");
	});

	it("should keep the first item of each id", () => {
		const first = Parsers.parseMediaResponse(lines, "album");
		const second = Parsers.parseMediaResponse(
			["file: a/2.flac", "AlbumArtist: Low", "Album: Trust"],
			"album",
		);

		expect(uniqueBy([first, second], albumId)).toEqual([first]);
	});
});
