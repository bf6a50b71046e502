import { Buffer } from "node:buffer";
import debugCreator from "debug";
import { Command } from "./command.js";
import { ARTWORK_COMMANDS, OK, PACKAGE_NAME } from "./const.js";
import type { ConnectionOptions } from "./connection.js";
import { Connection } from "./connection.js";
import { isError, MalformedResponseError, MpdError } from "./error.js";
import { ArtworkMode } from "./mode.js";
import { parseLine, parsers } from "./parserUtils.js";
import type { ArtworkCommand } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:artwork`);

interface ChunkHeader {
	/** Total artwork size, when the server reports it. */
	totalSize?: number;
	chunkSize: number;
}

/**
 * Connection for fetching cover art with `albumart` / `readpicture`.
 */
export class ArtworkConnection extends Connection {
	readonly mode = ArtworkMode;

	constructor(
		options: ConnectionOptions,
		private readonly commands: readonly ArtworkCommand[] = ARTWORK_COMMANDS,
	) {
		super(options);
	}

	/**
	 * Fetches the artwork of `file`, trying each configured command in turn
	 * until one succeeds.
	 *
	 * @throws {MpdError} The error of the last command tried, when all fail.
	 * @throws {MalformedResponseError} When no command is configured.
	 */
	async getArtworkData(file: string): Promise<Buffer> {
		let lastError: MpdError | undefined;
		for (const command of this.commands) {
			try {
				return await this.fetchArtwork(file, command);
			} catch (error) {
				if (!(error instanceof MpdError)) {
					throw error;
				}
				debug("%s failed for %s: %s", command, file, error.message);
				lastError = error;
			}
		}
		throw lastError ?? new MalformedResponseError("No artwork found");
	}

	/**
	 * Requests chunks at increasing offsets until the reported total size is
	 * reached, the server sends an empty chunk or reports no total at all.
	 */
	private async fetchArtwork(
		file: string,
		command: ArtworkCommand,
	): Promise<Buffer> {
		const chunks: Buffer[] = [];
		let offset = 0;
		let totalSize: number | undefined;

		for (;;) {
			const chunk = await this.exchange(() =>
				this.readChunk(file, command, offset),
			);
			totalSize = chunk.totalSize ?? totalSize;
			chunks.push(chunk.data);
			offset += chunk.data.length;

			if (
				totalSize === undefined ||
				chunk.data.length === 0 ||
				offset >= totalSize
			) {
				return Buffer.concat(chunks);
			}
		}
	}

	private async readChunk(
		file: string,
		command: ArtworkCommand,
		offset: number,
	): Promise<{ totalSize?: number; data: Buffer }> {
		await this.transport.writeLine(Command.cmd(command, file, offset).toString());

		const { totalSize, chunkSize } = await this.readChunkHeader();
		const data = await this.transport.readFixedLengthData(chunkSize);
		await this.readResponse();

		return { totalSize, data };
	}

	private async readChunkHeader(): Promise<ChunkHeader> {
		let totalSize: number | undefined;
		for (;;) {
			const line = await this.transport.readLine();
			const error = isError(line);
			if (error) {
				throw error;
			}
			if (line.startsWith(OK)) {
				throw new MalformedResponseError("Missing chunk size");
			}

			const [key, value] = parseLine(line);
			if (key === "size") {
				totalSize = parsers.parseInteger(value);
			} else if (key === "binary") {
				const chunkSize = parsers.parseInteger(value);
				if (chunkSize === undefined || chunkSize < 0) {
					throw new MalformedResponseError(`Invalid chunk size: ${value}`);
				}
				return { totalSize, chunkSize };
			}
		}
	}
}
