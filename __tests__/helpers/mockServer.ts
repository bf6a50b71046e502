import { Buffer } from "node:buffer";
import { EventEmitter } from "node:events";
import type { NetConnectOpts } from "node:net";

export type Reply = string | Buffer;

/**
 * Answers one socket write. Returning undefined leaves the client waiting,
 * e.g. for `idle`.
 */
export type Handler = (payload: string, socket: MockSocket) => Reply | undefined;

/**
 * Stand-in for a `net.Socket` that delivers bytes through the `onread`
 * buffer the client passed to `createConnection`.
 */
export class MockSocket extends EventEmitter {
	destroyed = false;
	readonly written: string[] = [];

	constructor(
		private readonly server: MockServer,
		readonly options: NetConnectOpts,
	) {
		super();
	}

	write(payload: string, callback?: (error?: Error | null) => void): boolean {
		if (this.destroyed) {
			process.nextTick(() => callback?.(new Error("This socket has been destroyed")));
			return false;
		}

		this.written.push(payload);
		const reply = this.server.handle(payload, this);
		process.nextTick(() => {
			callback?.();
			if (reply !== undefined) this.feed(reply);
		});
		return true;
	}

	/** Delivers bytes from the server, at most one read buffer at a time. */
	feed(data: Reply): void {
		const bytes = typeof data === "string" ? Buffer.from(data) : data;
		const onread = this.options.onread;
		if (!onread) {
			this.emit("data", bytes);
			return;
		}

		const target =
			typeof onread.buffer === "function" ? onread.buffer() : onread.buffer;
		for (let offset = 0; offset < bytes.length; offset += target.length) {
			const copied = bytes.copy(target, 0, offset, offset + target.length);
			onread.callback(copied, target);
		}
	}

	destroy(error?: Error): this {
		if (this.destroyed) return this;
		this.destroyed = true;
		process.nextTick(() => {
			if (error) this.emit("error", error);
			this.emit("close", error !== undefined);
		});
		return this;
	}

	/** The server closes the connection. */
	hangUp(): void {
		this.destroyed = true;
		this.emit("close", false);
	}
}

/**
 * In-process MPD stand-in shared by the mocked `node:net` module and the tests.
 */
export class MockServer {
	greeting: string | undefined = "OK MPD 0.23.5\n";
	refuse = false;
	readonly sockets: MockSocket[] = [];
	private handler: Handler = () => "OK\n";

	respondWith(handler: Handler): void {
		this.handler = handler;
	}

	handle(payload: string, socket: MockSocket): Reply | undefined {
		return this.handler(payload, socket);
	}

	get lastSocket(): MockSocket {
		const socket = this.sockets.at(-1);
		if (!socket) throw new Error("No socket was created");
		return socket;
	}

	/** Every payload written, across all sockets, in order of sockets. */
	get written(): string[] {
		return this.sockets.flatMap((socket) => socket.written);
	}

	reset(): void {
		this.greeting = "OK MPD 0.23.5\n";
		this.refuse = false;
		this.sockets.length = 0;
		this.handler = () => "OK\n";
	}

	createConnection = (options: NetConnectOpts): MockSocket => {
		const socket = new MockSocket(this, options);
		this.sockets.push(socket);

		process.nextTick(() => {
			if (this.refuse) {
				socket.destroy(new Error("connect ECONNREFUSED 127.0.0.1:6600"));
				return;
			}
			socket.emit("connect");
			if (this.greeting !== undefined) socket.feed(this.greeting);
		});
		return socket;
	};
}

export const mockServer = new MockServer();

/**
 * Waits until `socket` has received a write starting with `prefix`.
 */
export async function waitForWrite(
	socket: MockSocket,
	prefix: string,
): Promise<void> {
	for (let i = 0; i < 100; i++) {
		if (socket.written.some((payload) => payload.startsWith(prefix))) return;
		await new Promise((resolve) => setImmediate(resolve));
	}
	throw new Error(`Timed out waiting for "${prefix}"`);
}
