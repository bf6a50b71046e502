import debugCreator from "debug";
import { Command } from "./command.js";
import { PACKAGE_NAME } from "./const.js";
import { Connection } from "./connection.js";
import {
	MalformedResponseError,
	UnsupportedOperationError,
} from "./error.js";
import { Sources, sourcePlaylist } from "./media.js";
import { CommandMode } from "./mode.js";
import { filter, parseLine, parsers } from "./parserUtils.js";
import { Parsers } from "./parsers.js";
import type { Media, Output, Playlist, Song, Source } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:command`);

/**
 * The stored playlist a queue-or-playlist operation writes to.
 * Database sources are rejected before any I/O.
 */
function writablePlaylist(source: Source, action: string): Playlist | undefined {
	if (source.kind === "database") {
		throw new UnsupportedOperationError(
			`Only queue and playlist sources are supported for ${action}`,
		);
	}
	return sourcePlaylist(source);
}

/**
 * Groups positions (sorted descending) into runs of consecutive positions.
 * Each run is `[start, end]` with `start >= end`.
 */
function descendingRuns(positions: readonly number[]): [number, number][] {
	const runs: [number, number][] = [];
	for (let i = 0; i < positions.length; i++) {
		const start = positions[i];
		let end = start;
		while (i + 1 < positions.length && positions[i + 1] + 1 === end) {
			i++;
			end = positions[i];
		}
		runs.push([start, end]);
	}
	return runs;
}

/**
 * Connection for queue, playlist, database and playback commands.
 */
export class CommandConnection extends Connection {
	readonly mode = CommandMode;

	/**
	 * Replaces the queue with `playlist`, or with the whole library when
	 * no playlist is given.
	 */
	async loadPlaylist(playlist?: Playlist): Promise<void> {
		await this.run([
			"clear",
			playlist ? Command.cmd("load", playlist.name) : Command.cmd("add", "/"),
		]);
	}

	async clearQueue(): Promise<void> {
		await this.run(["clear"]);
	}

	/**
	 * Creates an empty stored playlist by saving the queue under `name`
	 * and clearing the result.
	 */
	async createPlaylist(name: string): Promise<void> {
		await this.run([
			Command.cmd("save", name),
			Command.cmd("playlistclear", name),
		]);
	}

	async renamePlaylist(playlist: Playlist, name: string): Promise<void> {
		await this.run([Command.cmd("rename", playlist.name, name)]);
	}

	async removePlaylist(playlist: Playlist): Promise<void> {
		await this.run([Command.cmd("rm", playlist.name)]);
	}

	/** Starts a database update, or a full rescan when `force` is set. */
	async update(force = false): Promise<void> {
		await this.run([force ? "rescan" : "update"]);
	}

	/**
	 * Appends the songs not already present in `source`.
	 *
	 * @throws {UnsupportedOperationError} When `source` is the database.
	 */
	async add(songs: readonly Song[], source: Source): Promise<void> {
		const playlist = writablePlaylist(source, "adding songs");
		if (songs.length === 0) {
			return;
		}

		const existing = new Set(
			(await this.getSongs(source)).map((song) => song.file),
		);
		const commands = songs
			.filter((song) => !existing.has(song.file))
			.map((song) =>
				playlist
					? Command.cmd("playlistadd", playlist.name, song.file)
					: Command.cmd("add", song.file),
			);

		if (commands.length === 0) {
			debug("All %d songs already present, nothing to add.", songs.length);
			return;
		}
		await this.run(commands);
	}

	/**
	 * Removes every occurrence of `songs` from `source`. Positions are
	 * deleted from the highest down, so earlier deletions never shift
	 * the ones that follow.
	 *
	 * @throws {UnsupportedOperationError} When `source` is the database.
	 */
	async remove(songs: readonly Song[], source: Source): Promise<void> {
		const playlist = writablePlaylist(source, "removing songs");
		if (songs.length === 0) {
			return;
		}

		const files = new Set(songs.map((song) => song.file));
		const positions = (await this.getSongs(source))
			.flatMap((song) =>
				files.has(song.file) && song.position !== undefined
					? [song.position]
					: [],
			)
			.sort((a, b) => b - a);

		if (positions.length === 0) {
			return;
		}

		const commands: (string | Command)[] = [];
		for (const [start, end] of descendingRuns(positions)) {
			if (!playlist) {
				commands.push(
					start === end
						? Command.cmd("delete", start)
						: `delete ${end}:${start + 1}`,
				);
				continue;
			}
			for (let position = start; position >= end; position--) {
				commands.push(Command.cmd("playlistdelete", playlist.name, position));
			}
		}

		await this.run(commands);
	}

	/**
	 * Moves `song` from its current position to `position`.
	 *
	 * @throws {UnsupportedOperationError} When the song has no position or
	 *   `source` is the database.
	 */
	async move(song: Song, position: number, source: Source): Promise<void> {
		if (song.position === undefined) {
			throw new UnsupportedOperationError("Cannot move song without a position");
		}
		const playlist = writablePlaylist(source, "moving media");

		await this.run([
			playlist
				? Command.cmd("playlistmove", playlist.name, song.position, position)
				: Command.cmd("move", song.position, position),
		]);
	}

	/**
	 * Starts playback of `media` without clearing the queue.
	 *
	 * A queued song is played by id. Otherwise the media's songs that are
	 * missing from the queue are appended with `addid` and the first one
	 * starts playing.
	 *
	 * @throws {MalformedResponseError} When the media has no songs or no id
	 *   can be determined.
	 */
	async play(media: Media): Promise<void> {
		if (media.kind === "song" && media.identifier !== undefined) {
			await this.run([Command.cmd("playid", media.identifier)]);
			return;
		}

		const songs = await this.songsOf(media);
		if (songs.length === 0) {
			throw new MalformedResponseError("No songs found for the specified media");
		}

		const queue = await this.getSongs(Sources.queue);
		let id: number | undefined;
		const commands: Command[] = [];

		for (const [index, song] of songs.entries()) {
			const queued = queue.find((entry) => entry.file === song.file);
			if (!queued) {
				commands.push(Command.cmd("addid", song.file));
			} else if (index === 0) {
				id = queued.identifier;
			}
		}

		if (commands.length > 0) {
			const lines = await this.run(commands);
			id ??= firstAddedId(lines);
		}

		if (id === undefined) {
			throw new MalformedResponseError("Failed to determine song ID to play");
		}
		await this.run([Command.cmd("playid", id)]);
	}

	async pause(value: boolean): Promise<void> {
		await this.run([Command.cmd("pause", value ? 1 : 0)]);
	}

	async previous(): Promise<void> {
		await this.run(["previous"]);
	}

	async next(): Promise<void> {
		await this.run(["next"]);
	}

	async stop(): Promise<void> {
		await this.run(["stop"]);
	}

	async consume(value: boolean): Promise<void> {
		await this.run([Command.cmd("consume", value ? 1 : 0)]);
	}

	async random(value: boolean): Promise<void> {
		await this.run([Command.cmd("random", value ? 1 : 0)]);
	}

	async repeat(value: boolean): Promise<void> {
		await this.run([Command.cmd("repeat", value ? 1 : 0)]);
	}

	/** Seeks within the current song, in seconds. */
	async seek(seconds: number): Promise<void> {
		await this.run([Command.cmd("seekcur", seconds)]);
	}

	/** Sets the volume, 0 to 100. */
	async setVolume(volume: number): Promise<void> {
		await this.run([Command.cmd("setvol", volume)]);
	}

	async toggleOutput(output: Output): Promise<void> {
		await this.run([Command.cmd("toggleoutput", output.id)]);
	}

	private async songsOf(media: Media): Promise<Song[]> {
		switch (media.kind) {
			case "album":
				return this.getSongsIn(media, Sources.database);
			case "artist": {
				const lines = await this.run([`find ${filter("artist", media.name)}`]);
				return Parsers.parseMediaResponseArray(lines, "song");
			}
			case "song":
				return [media];
		}
	}
}

function firstAddedId(lines: readonly string[]): number | undefined {
	for (const line of lines) {
		if (!line.startsWith("Id:")) continue;
		const [, value] = parseLine(line);
		return parsers.parseInteger(value);
	}
	return undefined;
}
