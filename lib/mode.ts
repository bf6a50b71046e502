/**
 * Describes how a connection is used. Each mode gets its own socket because
 * an `idle` request blocks the connection it was sent on.
 */
export interface ConnectionMode {
	readonly name: "idle" | "command" | "artwork";
	/** Size of the socket read buffer in bytes. */
	readonly bufferSize: number;
}

/** Long-lived connection waiting on `idle`. */
export const IdleMode = {
	name: "idle",
	bufferSize: 4096,
} as const satisfies ConnectionMode;

/** Short-lived connection for queue, playlist and playback commands. */
export const CommandMode = {
	name: "command",
	bufferSize: 4096,
} as const satisfies ConnectionMode;

/** Connection tuned for binary throughput. */
export const ArtworkMode = {
	name: "artwork",
	bufferSize: 8192,
} as const satisfies ConnectionMode;
