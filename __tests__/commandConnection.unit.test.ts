import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CommandConnection } from "../lib/commandConnection.js";
import { MalformedResponseError, UnsupportedOperationError } from "../lib/error.js";
import { Sources } from "../lib/media.js";
import { Parsers } from "../lib/parsers.js";
import type { Song } from "../lib/types.js";
import { mockServer } from "./helpers/mockServer.js";

vi.mock("node:net", async () => {
	const { mockServer } = await import("./helpers/mockServer.js");
	return { createConnection: mockServer.createConnection };
});

const song = (file: string, ...tags: string[]): Song =>
	Parsers.parseMediaResponse([`file: ${file}`, ...tags], "song");

/** Replies to each write with the first route whose prefix matches. */
const routes =
	(table: Record<string, string>) =>
	(payload: string): string => {
		const match = Object.keys(table).find((prefix) => payload.startsWith(prefix));
		return match === undefined ? "OK\n" : table[match];
	};

const roadTrip = Sources.playlist({ name: "Road Trip" });

describe("CommandConnection", () => {
	let connection: CommandConnection;

	beforeEach(async () => {
		mockServer.reset();
		connection = new CommandConnection({
			host: "localhost",
			port: 6600,
			timeout: 1000,
		});
		await connection.connect();
	});

	afterEach(() => {
		connection.disconnect();
	});

	const written = () => mockServer.lastSocket.written;

	describe("playlists", () => {
		it("should load a playlist or the whole library into a cleared queue", async () => {
			await connection.loadPlaylist({ name: "Road Trip" });
			await connection.loadPlaylist();

			expect(written()).toEqual([
				'command_list_begin\nclear\nload "Road Trip"\ncommand_list_end\n',
				'command_list_begin\nclear\nadd "/"\ncommand_list_end\n',
			]);
		});

		it("should create, rename and remove playlists", async () => {
			await connection.createPlaylist("Mix");
			await connection.renamePlaylist({ name: "Mix" }, "Mix 2");
			await connection.removePlaylist({ name: "Mix 2" });
			await connection.clearQueue();

			expect(written()).toEqual([
				'command_list_begin\nsave "Mix"\nplaylistclear "Mix"\ncommand_list_end\n',
				'rename "Mix" "Mix 2"\n',
				'rm "Mix 2"\n',
				"clear\n",
			]);
		});
	});

	it("should update or rescan the database", async () => {
		await connection.update();
		await connection.update(true);
		expect(written()).toEqual(["update\n", "rescan\n"]);
	});

	describe("add", () => {
		it("should append only songs missing from the queue", async () => {
			mockServer.respondWith(routes({ playlistinfo: "file: a\nOK\n" }));

			await connection.add([song("a"), song("b")], Sources.queue);

			expect(written()).toEqual(["playlistinfo\n", 'add "b"\n']);
		});

		it("should append to the favorites playlist", async () => {
			await connection.add([song("b")], Sources.favorites);

			expect(written()).toEqual([
				'listplaylistinfo "Favorites"\n',
				'playlistadd "Favorites" "b"\n',
			]);
		});

		it("should send nothing when every song is present", async () => {
			mockServer.respondWith(routes({ playlistinfo: "file: a\nOK\n" }));
			await connection.add([song("a")], Sources.queue);
			expect(written()).toEqual(["playlistinfo\n"]);
		});

		it("should refuse the database without I/O", async () => {
			await expect(
				connection.add([song("a")], Sources.database),
			).rejects.toBeInstanceOf(UnsupportedOperationError);
			expect(written()).toEqual([]);
		});
	});

	describe("remove", () => {
		const listing = "file: a\nfile: b\nfile: c\nfile: d\nfile: e\nfile: f\nOK\n";
		const doomed = [song("b"), song("c"), song("d"), song("f")];

		it("should delete consecutive queue positions as ranges, highest first", async () => {
			mockServer.respondWith(routes({ playlistinfo: listing }));

			await connection.remove(doomed, Sources.queue);

			expect(written()[1]).toBe(
				'command_list_begin\ndelete 5\ndelete 1:4\ncommand_list_end\n',
			);
		});

		it("should delete playlist positions one by one, highest first", async () => {
			mockServer.respondWith(routes({ listplaylistinfo: listing }));

			await connection.remove(doomed, roadTrip);

			expect(written()).toEqual([
				'listplaylistinfo "Road Trip"\n',
				[
					"command_list_begin",
					'playlistdelete "Road Trip" 5',
					'playlistdelete "Road Trip" 3',
					'playlistdelete "Road Trip" 2',
					'playlistdelete "Road Trip" 1',
					"command_list_end",
					"",
				].join("\n"),
			]);
		});

		it("should do nothing when no song matches", async () => {
			mockServer.respondWith(routes({ playlistinfo: listing }));
			await connection.remove([song("z")], Sources.queue);
			expect(written()).toEqual(["playlistinfo\n"]);
		});

		it("should refuse the database without I/O", async () => {
			await expect(
				connection.remove(doomed, Sources.database),
			).rejects.toBeInstanceOf(UnsupportedOperationError);
			expect(written()).toEqual([]);
		});
	});

	describe("move", () => {
		it("should move within the queue and playlists", async () => {
			const third = song("c", "Pos: 2");
			await connection.move(third, 0, Sources.queue);
			await connection.move(third, 0, roadTrip);

			expect(written()).toEqual(["move 2 0\n", 'playlistmove "Road Trip" 2 0\n']);
		});

		it("should refuse songs without a position", async () => {
			await expect(connection.move(song("c"), 0, Sources.queue)).rejects.toThrow(
				"Cannot move song without a position",
			);
			expect(written()).toEqual([]);
		});
	});

	describe("play", () => {
		it("should play a queued song by id", async () => {
			await connection.play(song("a", "Id: 7"));
			expect(written()).toEqual(["playid 7\n"]);
		});

		it("should queue missing album songs and play the first", async () => {
			mockServer.respondWith(
				routes({
					find: "file: x\nfile: y\nOK\n",
					playlistinfo: "file: y\nId: 3\nOK\n",
					addid: "Id: 11\nOK\n",
				}),
			);
			const album = Parsers.parseMediaResponse(
				["file: x", "AlbumArtist: Low", "Album: Trust"],
				"album",
			);

			await connection.play(album);

			expect(written()).toEqual([
				"find \"((album == 'Trust') AND (albumartist == 'Low'))\" sort track\n",
				"playlistinfo\n",
				'addid "x"\n',
				"playid 11\n",
			]);
		});

		it("should reuse the queue id when the first song is queued", async () => {
			mockServer.respondWith(
				routes({
					find: "file: x\nfile: y\nOK\n",
					playlistinfo: "file: x\nId: 4\nOK\n",
					addid: "Id: 12\nOK\n",
				}),
			);
			const artist = Parsers.parseMediaResponse(
				["file: x", "Artist: Low"],
				"artist",
			);

			await connection.play(artist);

			expect(written()).toEqual([
				"find \"(artist == 'Low')\"\n",
				"playlistinfo\n",
				'addid "y"\n',
				"playid 4\n",
			]);
		});

		it("should fail when the media has no songs", async () => {
			const artist = Parsers.parseMediaResponse(["file: x", "Artist: Nobody"], "artist");
			await expect(connection.play(artist)).rejects.toThrow(
				new MalformedResponseError("No songs found for the specified media"),
			);
		});
	});

	describe("playback", () => {
		it("should send playback and option commands", async () => {
			await connection.pause(true);
			await connection.pause(false);
			await connection.next();
			await connection.previous();
			await connection.stop();
			await connection.consume(false);
			await connection.random(true);
			await connection.repeat(true);
			await connection.seek(12.5);
			await connection.setVolume(40);
			await connection.toggleOutput({
				id: 2,
				name: "Stream",
				isEnabled: false,
				attributes: {},
			});

			expect(written()).toEqual([
				"pause 1\n",
				"pause 0\n",
				"next\n",
				"previous\n",
				"stop\n",
				"consume 0\n",
				"random 1\n",
				"repeat 1\n",
				"seekcur 12.5\n",
				"setvol 40\n",
				"toggleoutput 2\n",
			]);
		});

		it("should read status through the command connection", async () => {
			mockServer.respondWith(() => "state: pause\nvolume: 30\nOK\n");
			const status = await connection.getStatusData();

			expect(written()).toEqual([
				"command_list_begin\nstatus\ncurrentsong\ncommand_list_end\n",
			]);
			expect(status).toMatchObject({ state: "pause", volume: 30 });
		});
	});
});
