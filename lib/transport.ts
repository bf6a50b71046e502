import { Buffer } from "node:buffer";
import debugCreator from "debug";
import { PACKAGE_NAME } from "./const.js";
import { ConnectionError, MalformedResponseError } from "./error.js";

const debug = debugCreator(`${PACKAGE_NAME}:transport`);

const LF = 0x0a;
const CR = 0x0d;

/** Writes one payload to the socket, resolving once it has been flushed. */
export type LineWriter = (payload: string) => Promise<void>;

interface PendingRead {
	resolve: () => void;
	reject: (reason: Error) => void;
}

/**
 * Line and binary reader over the bytes received from one socket.
 *
 * The owning connection pushes every socket chunk into {@link push} and
 * reports the end of the stream with {@link close}. Readers pull text lines
 * or fixed-length binary spans out of the same stream, so a binary payload
 * containing `0x0A` is never split as a line.
 *
 * Received chunks are kept apart and only joined when a read can complete.
 */
export class LineTransport {
	private buffer: Buffer = Buffer.alloc(0);
	private chunks: Buffer[] = [];
	private chunkBytes = 0;
	private chunksHaveLine = false;
	private closedWith: Error | undefined;
	private pending: PendingRead | undefined;
	private readonly decoder = new TextDecoder("utf-8", { fatal: true });

	constructor(private readonly writer: LineWriter) {}

	/** Prepares the transport for a fresh socket. */
	open(): void {
		this.clear();
		this.closedWith = undefined;
	}

	/** Appends bytes read from the socket. The bytes are copied. */
	push(chunk: Uint8Array): void {
		if (chunk.length > 0) {
			this.chunks.push(Buffer.from(chunk));
			this.chunkBytes += chunk.length;
			this.chunksHaveLine ||= chunk.includes(LF);
		}
		const pending = this.pending;
		this.pending = undefined;
		pending?.resolve();
	}

	/**
	 * Marks the end of the stream. Bytes already buffered stay readable;
	 * once they are consumed, reads fail with `reason`.
	 */
	close(reason: Error): void {
		this.closedWith ??= reason;
		const pending = this.pending;
		this.pending = undefined;
		pending?.reject(this.closedWith);
	}

	/** Closes the stream and drops everything buffered. */
	reset(reason: Error): void {
		this.close(reason);
		this.clear();
	}

	/**
	 * Pops the next line, without its trailing CR/LF.
	 *
	 * @throws {ConnectionError} If the stream ends before a line completes.
	 * @throws {MalformedResponseError} If the line is not valid UTF-8.
	 */
	async readLine(): Promise<string> {
		for (;;) {
			const index = this.buffer.indexOf(LF);
			if (index !== -1) {
				const end = index > 0 && this.buffer[index - 1] === CR ? index - 1 : index;
				const bytes = this.buffer.subarray(0, end);
				this.buffer = this.buffer.subarray(index + 1);
				return this.decode(bytes);
			}
			if (this.chunksHaveLine) {
				this.join();
			} else {
				await this.receive();
			}
		}
	}

	/**
	 * Pops exactly `length` bytes, waiting for the socket when fewer are buffered.
	 *
	 * @throws {MalformedResponseError} If `length` is negative.
	 * @throws {ConnectionError} If the stream ends first.
	 */
	async readFixedLengthData(length: number): Promise<Buffer> {
		if (!Number.isInteger(length) || length < 0) {
			throw new MalformedResponseError(
				`Invalid data length requested: ${length}`,
			);
		}

		while (this.buffer.length + this.chunkBytes < length) {
			await this.receive();
		}
		this.join();

		const data = Buffer.from(this.buffer.subarray(0, length));
		this.buffer = this.buffer.subarray(length);
		return data;
	}

	/**
	 * Writes `line` followed by a newline in a single socket write.
	 *
	 * @throws {ConnectionError} If no socket is ready.
	 */
	async writeLine(line: string): Promise<void> {
		if (this.closedWith) {
			throw new ConnectionError(
				"NOT_CONNECTED",
				"Cannot write to a closed connection",
				{ cause: this.closedWith },
			);
		}
		debug("> %s", line.startsWith("password ") ? "password ***" : line);
		await this.writer(`${line}\n`);
	}

	/** Moves every pending chunk into the contiguous buffer. */
	private join(): void {
		if (this.chunks.length === 0) return;
		this.buffer = Buffer.concat([this.buffer, ...this.chunks]);
		this.chunks = [];
		this.chunkBytes = 0;
		this.chunksHaveLine = false;
	}

	private clear(): void {
		this.buffer = Buffer.alloc(0);
		this.chunks = [];
		this.chunkBytes = 0;
		this.chunksHaveLine = false;
	}

	private decode(bytes: Uint8Array): string {
		try {
			return this.decoder.decode(bytes);
		} catch (error) {
			throw new MalformedResponseError(
				"Failed to decode line from buffer (invalid UTF-8)",
				{ cause: error },
			);
		}
	}

	private receive(): Promise<void> {
		if (this.closedWith) {
			return Promise.reject(this.closedWith);
		}
		return new Promise((resolve, reject) => {
			this.pending = { resolve, reject };
		});
	}
}
