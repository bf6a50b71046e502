import { Connection } from "./connection.js";
import { IdleMode } from "./mode.js";
import { Parsers } from "./parsers.js";
import type { IdleEvent } from "./types.js";

/**
 * Connection that waits for server-side changes with `idle`.
 */
export class IdleConnection extends Connection {
	readonly mode = IdleMode;

	/**
	 * Blocks until one of the subsystems in `mask` changes, or any subsystem
	 * when the mask is empty.
	 *
	 * @returns Every subsystem reported, in server order. Empty when the
	 *   wait was cancelled with {@link noidle} before anything changed.
	 * @throws {MalformedResponseError} On an unknown subsystem, unless
	 *   `options.strict` is false, in which case it is skipped.
	 */
	async idle(
		mask: readonly IdleEvent[] = [],
		options?: Parsers.IdleParseOptions,
	): Promise<IdleEvent[]> {
		const lines = await this.run([["idle", ...mask].join(" ")]);
		return Parsers.parseIdleEvents(lines, options);
	}

	/**
	 * Like {@link idle}, returning only the first reported subsystem.
	 *
	 * @throws {MalformedResponseError} If the response carries no `changed:` line.
	 */
	async idleForEvents(mask: readonly IdleEvent[]): Promise<IdleEvent> {
		const lines = await this.run([["idle", ...mask].join(" ")]);
		return Parsers.parseIdleEvent(lines);
	}

	/**
	 * Cancels a pending {@link idle}. Written directly to the socket since
	 * the idle exchange holds the connection until the server answers.
	 */
	async noidle(): Promise<void> {
		await this.transport.writeLine("noidle");
	}
}
