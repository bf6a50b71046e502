import { Buffer } from "node:buffer";
import type { Socket } from "node:net";
import { createConnection } from "node:net";
import debugCreator from "debug";
import { Command } from "./command.js";
import {
	COMMAND_LIST_BEGIN,
	COMMAND_LIST_END,
	FAVORITES_PLAYLIST,
	GREETING_PREFIX,
	MIN_SERVER_VERSION,
	OK,
	PACKAGE_NAME,
} from "./const.js";
import { CommandExecutor } from "./executor.js";
import {
	ConnectionError,
	isError,
	MpdError,
	UnsupportedOperationError,
} from "./error.js";
import {
	albumId,
	artistId,
	DEFAULT_SORT,
	sortArgument,
	uniqueBy,
} from "./media.js";
import type { ConnectionMode } from "./mode.js";
import { and, filter } from "./parserUtils.js";
import { Parsers } from "./parsers.js";
import { LineTransport } from "./transport.js";
import type {
	Album,
	Artist,
	Output,
	Playlist,
	Song,
	SortDescriptor,
	Source,
	Stats,
	Status,
} from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:connection`);

/**
 * Where and how to reach the server.
 */
export interface ConnectionOptions {
	host: string;
	port: number;
	/** Sent with `password` right after the greeting when non-empty. */
	password?: string;
	/** Milliseconds allowed for opening the socket and completing the handshake. */
	timeout: number;
}

function compareVersions(a: string, b: string): number {
	const left = a.split(".").map((part) => Number.parseInt(part, 10) || 0);
	const right = b.split(".").map((part) => Number.parseInt(part, 10) || 0);
	for (let i = 0; i < Math.max(left.length, right.length); i++) {
		const diff = (left[i] ?? 0) - (right[i] ?? 0);
		if (diff !== 0) return diff;
	}
	return 0;
}

/**
 * Resolves once `socket` is connected, rejects if it fails or closes first.
 */
function waitUntilReady(socket: Socket): Promise<void> {
	return new Promise((resolve, reject) => {
		const cleanup = () => {
			socket.off("connect", onConnect);
			socket.off("error", onError);
			socket.off("close", onClose);
		};
		const onConnect = () => {
			cleanup();
			resolve();
		};
		const onError = (error: Error) => {
			cleanup();
			reject(
				new ConnectionError(
					"CONNECTION_FAILURE",
					`Network connection returned an error: ${error.message}`,
					{ cause: error },
				),
			);
		};
		const onClose = () => {
			cleanup();
			reject(
				new ConnectionError(
					"CONNECTION_FAILURE",
					"Connection closed before MPD welcome message.",
				),
			);
		};
		socket.once("connect", onConnect);
		socket.once("error", onError);
		socket.once("close", onClose);
	});
}

/**
 * A single TCP session with the MPD server, bound to one {@link ConnectionMode}.
 *
 * The socket and its receive buffer belong to this object alone. Every
 * protocol exchange goes through a {@link CommandExecutor}, so concurrent
 * callers queue instead of interleaving bytes on the wire.
 *
 * Mode-specific commands live on the subclasses; the queries defined here
 * are available on every mode.
 */
export abstract class Connection {
	abstract readonly mode: ConnectionMode;

	protected readonly transport: LineTransport;
	private readonly executor = new CommandExecutor();
	private socket: Socket | undefined;
	private mpdVersion: string | undefined;

	constructor(protected readonly options: ConnectionOptions) {
		this.transport = new LineTransport((payload) => this.write(payload));
		this.transport.reset(
			new ConnectionError("NOT_CONNECTED", "Not connected to the server."),
		);
	}

	/**
	 * The protocol version from the server greeting, while connected.
	 */
	get version(): string | undefined {
		return this.mpdVersion;
	}

	isConnected(): boolean {
		return this.socket !== undefined;
	}

	/**
	 * Opens the socket, reads the `OK MPD <version>` greeting and
	 * authenticates. Does nothing when already connected.
	 *
	 * @throws {ConnectionError} If the host or port is invalid, the socket
	 *   fails, the greeting is missing or the server is older than 0.22.
	 * @throws {MpdError} If the password is rejected.
	 */
	connect(): Promise<void> {
		return this.executor.execute(() => this.open());
	}

	/**
	 * Closes the socket and drops buffered bytes. Pending reads fail with a
	 * {@link ConnectionError}. Safe to call at any time, any number of times.
	 */
	disconnect(): void {
		const socket = this.socket;
		this.socket = undefined;
		this.mpdVersion = undefined;
		this.transport.reset(
			new ConnectionError("NOT_CONNECTED", "Connection was closed by the client."),
		);

		if (socket && !socket.destroyed) {
			debug("[%s] Disconnecting.", this.mode.name);
			socket.destroy();
		}
	}

	/**
	 * Connects, runs `operation` and disconnects afterwards, whether the
	 * operation succeeds, fails or is aborted through `signal`.
	 */
	async withConnection<T>(
		operation: (connection: this) => Promise<T>,
		signal?: AbortSignal,
	): Promise<T> {
		signal?.throwIfAborted();
		const onAbort = () => this.disconnect();
		signal?.addEventListener("abort", onAbort, { once: true });

		try {
			await this.connect();
			return await operation(this);
		} catch (error) {
			if (signal?.aborted) {
				throw signal.reason;
			}
			throw error;
		} finally {
			signal?.removeEventListener("abort", onAbort);
			this.disconnect();
		}
	}

	/**
	 * Executes one or more commands and returns every response line,
	 * including the terminal `OK`. More than one command is sent as a
	 * command list.
	 *
	 * @throws {MpdError} If the server answers with `ACK`.
	 * @throws {ConnectionError} If the connection is not open or closes mid-response.
	 */
	run(commands: readonly (string | Command)[]): Promise<string[]> {
		return this.exchange(() => this.send(commands));
	}

	async ping(): Promise<void> {
		await this.run(["ping"]);
	}

	/**
	 * Player state, options, volume and the current song, in one round trip.
	 */
	async getStatusData(): Promise<Status> {
		return Parsers.parseStatus(await this.run(["status", "currentsong"]));
	}

	async getStatsData(): Promise<Stats> {
		return Parsers.parseStats(await this.run(["stats"]));
	}

	/**
	 * Every album in the database, taken from the first track of each.
	 */
	async getAlbums(sort: SortDescriptor = DEFAULT_SORT): Promise<Album[]> {
		const lines = await this.run([
			`find ${filter("track", "1")} sort ${sortArgument(sort)}`,
		]);
		return uniqueBy(Parsers.parseMediaResponseArray(lines, "album"), albumId);
	}

	/**
	 * Albums whose album artist is `artist`, ordered by date.
	 *
	 * @throws {UnsupportedOperationError} For sources other than the database or queue.
	 */
	async getAlbumsBy(artist: Artist, source: Source): Promise<Album[]> {
		const clause = filter("albumartist", artist.name);
		let command: string;
		switch (source.kind) {
			case "database":
				command = `find ${clause} sort date`;
				break;
			case "queue":
				command = `playlistfind ${clause} sort date`;
				break;
			default:
				throw new UnsupportedOperationError(
					"Only database and queue sources are supported for retrieving albums by artist",
				);
		}

		const lines = await this.run([command]);
		return uniqueBy(Parsers.parseMediaResponseArray(lines, "album"), albumId);
	}

	async getArtists(sort: SortDescriptor = DEFAULT_SORT): Promise<Artist[]> {
		const albums = await this.getAlbums(sort);
		return uniqueBy(
			albums.map((album) => album.artist),
			artistId,
		);
	}

	/**
	 * All songs of a source. Positions are filled in from the listing order
	 * when the server does not report them. `sort` applies to the database only.
	 */
	async getSongs(
		source: Source,
		sort: SortDescriptor = DEFAULT_SORT,
	): Promise<Song[]> {
		const lines = await this.run([this.songsCommand(source, sort)]);
		return Parsers.parseMediaResponseArray(lines, "song", { indexBase: 0 });
	}

	/**
	 * Songs of `album` (matched on title and album artist).
	 *
	 * @throws {UnsupportedOperationError} For sources other than the database or queue.
	 */
	async getSongsIn(album: Album, source: Source): Promise<Song[]> {
		const clauses = and(
			filter("album", album.title, { quote: false }),
			filter("albumartist", album.artist.name, { quote: false }),
		);

		let command: string;
		switch (source.kind) {
			case "database":
				command = `find ${clauses} sort track`;
				break;
			case "queue":
				command = `playlistfind ${clauses}`;
				break;
			default:
				throw new UnsupportedOperationError(
					"Only database and queue sources are supported for retrieving songs in an album",
				);
		}

		return Parsers.parseMediaResponseArray(await this.run([command]), "song");
	}

	private songsCommand(source: Source, sort: SortDescriptor): string | Command {
		switch (source.kind) {
			case "database":
				return `find ${filter("title", "", { comparator: "!=" })} sort ${sortArgument(sort)}`;
			case "queue":
				return "playlistinfo";
			case "playlist":
				return Command.cmd("listplaylistinfo", source.playlist.name);
			case "favorites":
				return Command.cmd("listplaylistinfo", FAVORITES_PLAYLIST);
		}
	}

	async getPlaylists(): Promise<Playlist[]> {
		return Parsers.parsePlaylists(await this.run(["listplaylists"]));
	}

	async getOutputs(): Promise<Output[]> {
		return Parsers.parseOutputs(await this.run(["outputs"]));
	}

	/**
	 * Runs `task` as one exchange: no other exchange on this connection
	 * starts before it settles. A failure other than an `ACK` or a request
	 * refused before any I/O leaves the rest of the response unread, so the
	 * connection is closed.
	 *
	 * @throws {ConnectionError} If the connection is not open when the task's turn comes.
	 */
	protected exchange<T>(task: () => Promise<T>): Promise<T> {
		return this.executor.execute(async () => {
			if (!this.socket) {
				throw new ConnectionError(
					"NOT_CONNECTED",
					"Not connected to the server.",
				);
			}
			try {
				return await task();
			} catch (error) {
				if (
					!(error instanceof MpdError) &&
					!(error instanceof UnsupportedOperationError)
				) {
					debug("[%s] Exchange failed, closing: %o", this.mode.name, error);
					this.disconnect();
				}
				throw error;
			}
		});
	}

	/**
	 * Reads lines up to and including the terminal `OK`.
	 *
	 * @throws {MpdError} When the terminal line is an `ACK`.
	 */
	protected async readResponse(): Promise<string[]> {
		const lines: string[] = [];
		for (;;) {
			const line = await this.transport.readLine();
			lines.push(line);
			const error = isError(line);
			if (error) {
				debug("[%s] < %s", this.mode.name, line);
				throw error;
			}
			if (line.startsWith(OK)) {
				return lines;
			}
		}
	}

	private async send(commands: readonly (string | Command)[]): Promise<string[]> {
		if (commands.length === 0) {
			throw new UnsupportedOperationError("No command given");
		}

		const list = commands.map(String);
		if (list.length > 1) {
			list.unshift(COMMAND_LIST_BEGIN);
			list.push(COMMAND_LIST_END);
		}

		await this.transport.writeLine(list.join("\n"));
		return this.readResponse();
	}

	private async open(): Promise<void> {
		if (this.socket) {
			return;
		}

		const { host, port, password, timeout } = this.options;
		if (!host.trim()) {
			throw new ConnectionError("INVALID_HOST", "Invalid host provided.");
		}
		if (!Number.isInteger(port) || port <= 0 || port > 65535) {
			throw new ConnectionError(
				"INVALID_PORT",
				"Invalid port provided. Port must be between 1 and 65535.",
			);
		}

		debug("[%s] Connecting to %s:%d", this.mode.name, host, port);
		this.transport.open();

		const socket = createConnection({
			host,
			port,
			noDelay: true,
			onread: {
				buffer: Buffer.alloc(this.mode.bufferSize),
				callback: (bytesRead, buffer) => {
					if (this.socket === socket) {
						this.transport.push(buffer.subarray(0, bytesRead));
					}
					return true;
				},
			},
		});
		this.socket = socket;

		socket.on("error", (error: Error) => {
			if (this.socket !== socket) return;
			debug("[%s] Socket error: %s", this.mode.name, error.message);
			this.transport.close(
				new ConnectionError(
					"CONNECTION_FAILURE",
					`Network connection returned an error: ${error.message}`,
					{ cause: error },
				),
			);
		});
		socket.on("close", () => {
			if (this.socket !== socket) return;
			debug("[%s] Socket closed by the server.", this.mode.name);
			this.socket = undefined;
			this.mpdVersion = undefined;
			this.transport.close(
				new ConnectionError(
					"UNEXPECTED_CLOSURE",
					"Network connection was closed unexpectedly during operation.",
				),
			);
		});

		const timer = setTimeout(() => {
			socket.destroy(new Error(`Connection timed out after ${timeout}ms`));
		}, timeout);

		try {
			await waitUntilReady(socket);

			const greeting = await this.transport.readLine();
			if (!greeting.startsWith(GREETING_PREFIX)) {
				throw new ConnectionError(
					"CONNECTION_FAILURE",
					`Unexpected response from server: ${greeting}`,
				);
			}

			const version = greeting.slice(GREETING_PREFIX.length).trim();
			if (compareVersions(version, MIN_SERVER_VERSION) < 0) {
				throw new ConnectionError(
					"UNSUPPORTED_VERSION",
					`Unsupported MPD server version ${version}. Minimum required version is ${MIN_SERVER_VERSION}.`,
				);
			}
			this.mpdVersion = version;
			debug("[%s] Connected, server version %s", this.mode.name, version);

			if (password) {
				await this.send([Command.cmd("password", password)]);
			}
		} catch (error) {
			this.disconnect();
			throw error;
		} finally {
			clearTimeout(timer);
		}
	}

	private write(payload: string): Promise<void> {
		const socket = this.socket;
		if (!socket || socket.destroyed) {
			return Promise.reject(
				new ConnectionError("NOT_CONNECTED", "Not connected to the server."),
			);
		}

		return new Promise((resolve, reject) => {
			socket.write(payload, (error) => {
				if (error) {
					reject(
						new ConnectionError(
							"CONNECTION_FAILURE",
							`Failed to write to the server: ${error.message}`,
							{ cause: error },
						),
					);
					return;
				}
				resolve();
			});
		});
	}
}
