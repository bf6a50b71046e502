import debugCreator from "debug";
import {
	CHANGED_EVENT_PREFIX,
	IDLE_EVENTS,
	OK,
	PACKAGE_NAME,
	UNKNOWN_ALBUM,
	UNKNOWN_ARTIST,
	UNKNOWN_TITLE,
} from "./const.js";
import { MalformedResponseError } from "./error.js";
import { isOneOf, parseLine, parsers } from "./parserUtils.js";
import type {
	Album,
	Artist,
	IdleEvent,
	Media,
	MediaKind,
	Output,
	Playlist,
	Song,
	Stats,
	Status,
} from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:parsers`);

const MEDIA_FIELDS = [
	"file",
	"id",
	"pos",
	"artist",
	"artistsort",
	"albumartist",
	"albumartistsort",
	"title",
	"titlesort",
	"name",
	"album",
	"albumsort",
	"date",
	"duration",
	"time",
	"disc",
	"track",
	"genre",
	"composer",
	"performer",
	"conductor",
	"ensemble",
	"mood",
	"comment",
] as const;

const STATUS_FIELDS = [
	"state",
	"consume",
	"random",
	"repeat",
	"elapsed",
	"volume",
] as const;

const STATS_FIELDS = [
	"artists",
	"albums",
	"songs",
	"uptime",
	"db_playtime",
	"db_update",
] as const;

type MediaFields = Partial<Record<(typeof MEDIA_FIELDS)[number], string>>;

/**
 * Accumulates the `keys` of interest from `key: value` lines.
 * The terminal `OK` is skipped, unknown keys are ignored and a repeated key
 * keeps its last value.
 *
 * @throws {MalformedResponseError} If a line has no colon.
 */
function collectFields<K extends string>(
	lines: readonly string[],
	keys: readonly K[],
): Partial<Record<K, string>> {
	const fields: Partial<Record<K, string>> = {};
	for (const line of lines) {
		if (line === OK) continue;
		const [key, value] = parseLine(line);
		if (isOneOf(key, keys)) {
			fields[key] = value;
		}
	}
	return fields;
}

function lineKey(line: string): string | undefined {
	const idx = line.indexOf(":");
	return idx === -1 ? undefined : line.slice(0, idx).trim().toLowerCase();
}

function buildArtist(file: string, fields: MediaFields): Artist {
	return {
		kind: "artist",
		file,
		name: fields.albumartist ?? fields.artist ?? UNKNOWN_ARTIST,
		nameSort: fields.albumartistsort,
	};
}

function buildAlbum(file: string, fields: MediaFields): Album {
	return {
		kind: "album",
		file,
		title: fields.album ?? UNKNOWN_ALBUM,
		titleSort: fields.albumsort,
		date: fields.date,
		artist: buildArtist(file, fields),
	};
}

function buildSong(file: string, fields: MediaFields, index?: number): Song {
	let artist = fields.artist ?? UNKNOWN_ARTIST;
	let title = fields.title ?? UNKNOWN_TITLE;

	// Radio streams often carry only `Name: Artist - Title`.
	if (fields.name !== undefined && !fields.artist && !fields.title) {
		const separator = fields.name.indexOf(" - ");
		if (separator === -1) {
			title = fields.name;
		} else {
			artist = fields.name.slice(0, separator);
			title = fields.name.slice(separator + 3);
		}
	}

	return {
		kind: "song",
		file,
		identifier: parsers.parseInteger(fields.id),
		position: parsers.parseInteger(fields.pos) ?? index,
		artist,
		artistSort: fields.artistsort,
		title,
		titleSort: fields.titlesort,
		date: fields.date,
		duration:
			parsers.parseNumber(fields.duration) ??
			parsers.parseNumber(fields.time) ??
			0,
		disc: parsers.parseInteger(fields.disc) ?? 1,
		track: parsers.parseInteger(fields.track) ?? 1,
		genre: fields.genre,
		composer: fields.composer,
		performer: fields.performer,
		conductor: fields.conductor,
		ensemble: fields.ensemble,
		mood: fields.mood,
		comment: fields.comment,
		album: buildAlbum(file, fields),
	};
}

/**
 * Turns raw response lines into typed records.
 *
 * @example Parsing a `playlistinfo` response
 * ```typescript
 * const lines = await connection.run(["playlistinfo"]);
 * const songs = Parsers.parseMediaResponseArray(lines, "song", { indexBase: 0 });
 * ```
 */
export namespace Parsers {
	/**
	 * Splits a flat multi-record response into one group per record.
	 * A group starts at every line whose key is `marker`; lines before the
	 * first marker are dropped. The terminal `OK` stays in the last group.
	 *
	 * @example With marker `file`:
	 * ```
	 * file: a.flac      ┐
	 * Title: A          ┘ group 1
	 * file: b.flac      ┐
	 * Title: B          │ group 2
	 * OK                ┘
	 * ```
	 */
	export function chunkLines(
		lines: readonly string[],
		marker: string,
	): string[][] {
		const key = marker.toLowerCase();
		const chunks: string[][] = [];
		let current: string[] | undefined;

		for (const line of lines) {
			if (lineKey(line) === key) {
				if (current) chunks.push(current);
				current = [line];
			} else {
				current?.push(line);
			}
		}
		if (current) chunks.push(current);

		return chunks;
	}

	/**
	 * Parses the lines of one record into a song, album or artist.
	 * Absent tags fall back to defaults (`Unknown Artist`, track 1, disc 1,
	 * duration 0). `index` becomes the song position when the record has no
	 * `Pos` field.
	 *
	 * @throws {MalformedResponseError} If a line has no colon or the record has no `file`.
	 */
	export function parseMediaResponse(
		lines: readonly string[],
		kind: "song",
		index?: number,
	): Song;
	export function parseMediaResponse(
		lines: readonly string[],
		kind: "album",
		index?: number,
	): Album;
	export function parseMediaResponse(
		lines: readonly string[],
		kind: "artist",
		index?: number,
	): Artist;
	export function parseMediaResponse(
		lines: readonly string[],
		kind: MediaKind,
		index?: number,
	): Media;
	export function parseMediaResponse(
		lines: readonly string[],
		kind: MediaKind,
		index?: number,
	): Media {
		const fields = collectFields(lines, MEDIA_FIELDS);
		const file = fields.file;
		if (file === undefined) {
			throw new MalformedResponseError("Missing or invalid file field");
		}

		switch (kind) {
			case "song":
				return buildSong(file, fields, index);
			case "album":
				return buildAlbum(file, fields);
			case "artist":
				return buildArtist(file, fields);
		}
	}

	export interface MediaArrayOptions {
		/**
		 * When set, record `i` without a `Pos` field gets position `i + indexBase`.
		 */
		indexBase?: 0 | 1;
	}

	/**
	 * Parses a response holding many records, each starting with `file:`.
	 */
	export function parseMediaResponseArray(
		lines: readonly string[],
		kind: "song",
		options?: MediaArrayOptions,
	): Song[];
	export function parseMediaResponseArray(
		lines: readonly string[],
		kind: "album",
		options?: MediaArrayOptions,
	): Album[];
	export function parseMediaResponseArray(
		lines: readonly string[],
		kind: "artist",
		options?: MediaArrayOptions,
	): Artist[];
	export function parseMediaResponseArray(
		lines: readonly string[],
		kind: MediaKind,
		options: MediaArrayOptions = {},
	): Media[] {
		const { indexBase } = options;
		return chunkLines(lines, "file").map((chunk, i) =>
			parseMediaResponse(
				chunk,
				kind,
				indexBase === undefined ? undefined : i + indexBase,
			),
		);
	}

	/**
	 * Parses the combined response of the `status` + `currentsong` command list.
	 */
	export function parseStatus(lines: readonly string[]): Status {
		const fields = collectFields(lines, STATUS_FIELDS);
		const [songLines] = chunkLines(lines, "file");

		return {
			state: parsers.parseState(fields.state),
			isConsume: parsers.parseBoolean(fields.consume),
			isRandom: parsers.parseBoolean(fields.random),
			isRepeat: parsers.parseBoolean(fields.repeat),
			elapsed: parsers.parseNumber(fields.elapsed),
			volume: parsers.parseInteger(fields.volume),
			song: songLines ? parseMediaResponse(songLines, "song") : undefined,
		};
	}

	export function parseStats(lines: readonly string[]): Stats {
		const fields = collectFields(lines, STATS_FIELDS);

		return {
			artists: parsers.parseInteger(fields.artists),
			albums: parsers.parseInteger(fields.albums),
			songs: parsers.parseInteger(fields.songs),
			uptime: parsers.parseInteger(fields.uptime),
			playtime: parsers.parseInteger(fields.db_playtime),
			dbUpdate: parsers.parseInteger(fields.db_update),
		};
	}

	/**
	 * Parses an `outputs` response. Records without an id or a name are skipped.
	 */
	export function parseOutputs(lines: readonly string[]): Output[] {
		const outputs: Output[] = [];

		for (const chunk of chunkLines(lines, "outputid")) {
			let id: number | undefined;
			let name: string | undefined;
			let plugin: string | undefined;
			let isEnabled = false;
			const attributes: Record<string, string> = {};

			for (const line of chunk) {
				if (line === OK) continue;
				const [key, value] = parseLine(line);
				switch (key) {
					case "outputid":
						id = parsers.parseInteger(value);
						break;
					case "outputname":
						name = value;
						break;
					case "plugin":
						plugin = value;
						break;
					case "outputenabled":
						isEnabled = value === "1";
						break;
					case "attribute": {
						const separator = value.indexOf("=");
						if (separator !== -1) {
							attributes[value.slice(0, separator)] = value.slice(
								separator + 1,
							);
						}
						break;
					}
				}
			}

			if (id === undefined || name === undefined) {
				debug("Skipping output record without id or name: %o", chunk);
				continue;
			}
			outputs.push({ id, name, plugin, isEnabled, attributes });
		}

		return outputs;
	}

	export function parsePlaylists(lines: readonly string[]): Playlist[] {
		const playlists: Playlist[] = [];
		for (const line of lines) {
			if (line === OK) break;
			const [key, value] = parseLine(line);
			if (key === "playlist") {
				playlists.push({ name: value });
			}
		}
		return playlists;
	}

	export interface IdleParseOptions {
		/** Reject tags outside {@link IDLE_EVENTS} instead of skipping them. Defaults to true. */
		strict?: boolean;
	}

	/**
	 * Decodes every `changed:` line of an idle response.
	 *
	 * @throws {MalformedResponseError} On a tag outside {@link IDLE_EVENTS},
	 *   unless `strict` is false.
	 */
	export function parseIdleEvents(
		lines: readonly string[],
		{ strict = true }: IdleParseOptions = {},
	): IdleEvent[] {
		const events: IdleEvent[] = [];
		for (const line of lines) {
			if (!line.startsWith(CHANGED_EVENT_PREFIX)) continue;
			const changed = line.slice(CHANGED_EVENT_PREFIX.length).trim();
			if (isOneOf(changed, IDLE_EVENTS)) {
				events.push(changed);
				continue;
			}
			if (strict) {
				throw new MalformedResponseError(
					`Received unknown idle event: ${changed}`,
				);
			}
			debug("Skipping unknown idle event: %s", changed);
		}
		return events;
	}

	/**
	 * Decodes the first `changed:` line of an idle response.
	 *
	 * @throws {MalformedResponseError} If there is none or the tag is unknown.
	 */
	export function parseIdleEvent(lines: readonly string[]): IdleEvent {
		const [event] = parseIdleEvents(lines);
		if (event === undefined) {
			throw new MalformedResponseError("Missing 'changed' line");
		}
		return event;
	}
}
