import { ACK } from "./const.js";

const CODES: Record<string, number> = {
	NOT_LIST: 1,
	ARG: 2,
	PASSWORD: 3,
	PERMISSION: 4,
	UNKNOWN: 5,
	NO_EXIST: 50,
	PLAYLIST_MAX: 51,
	SYSTEM: 52,
	PLAYLIST_LOAD: 53,
	UPDATE_ALREADY: 54,
	PLAYER_SYNC: 55,
	EXIST: 56,
};

const CODES_REVERSED: Record<number, string> = Object.fromEntries(
	Object.entries(CODES).map(([name, errno]) => [errno, name]),
);

/**
 * Represents an error reported by the MPD server (ACK response).
 * Parses the error message to extract details like error code,
 * command index (for command lists), current command, and the message text.
 */
export class MpdError extends Error {
	/** The symbolic error code string (e.g., 'ARG', 'PASSWORD') or the raw line if it could not be parsed. */
	code: string;
	/** The numeric MPD error code. */
	errno?: number;
	/** The index of the command within a command list that caused the error. */
	cmd_list_num?: number;
	/** The command that caused the error. */
	current_command?: string;
	/** The ACK line exactly as the server sent it. */
	readonly line: string;

	/**
	 * @param str - The raw ACK error string from the MPD server.
	 */
	constructor(str: string) {
		super(str);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}

		// error response:
		// ACK [error@command_listNum] {current_command} message_text
		const errCode = str.match(/\[(.*?)\]/);
		this.name = "MPDError";
		this.line = str;

		if (!errCode) {
			this.code = str;
			return;
		}

		const [error, cmdListNum] = errCode[1].split("@");
		const currentCommand = str.match(/{(.*?)}/);
		const closing = str.indexOf("}");

		this.errno = Number(error) | 0;
		this.code = CODES_REVERSED[this.errno] || "??";
		this.cmd_list_num = Number(cmdListNum) | 0;
		this.current_command = currentCommand?.[1];
		this.message =
			closing === -1
				? str.slice(str.indexOf("]") + 1).trim()
				: str.slice(closing + 1).trim();
	}

	/** MPD error codes mapped to their numeric values. */
	static CODES = CODES;
	/** MPD numeric error codes mapped to their symbolic names. */
	static CODES_REVERSED = CODES_REVERSED;
}

export type ConnectionErrorCode =
	| "INVALID_HOST"
	| "INVALID_PORT"
	| "UNSUPPORTED_VERSION"
	| "CONNECTION_FAILURE"
	| "UNEXPECTED_CLOSURE"
	| "NOT_CONNECTED";

/**
 * The socket could not be opened, never became ready, or closed while a
 * response was still expected.
 */
export class ConnectionError extends Error {
	readonly code: ConnectionErrorCode;

	constructor(code: ConnectionErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}

		this.name = "ConnectionError";
		this.code = code;
	}
}

/**
 * The byte stream did not follow the response grammar.
 */
export class MalformedResponseError extends Error {
	readonly code = "MALFORMED_RESPONSE";

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}

		this.name = "MalformedResponseError";
	}
}

/**
 * A command was requested against a source the protocol cannot serve.
 * Always raised before any bytes are written.
 */
export class UnsupportedOperationError extends Error {
	readonly code = "UNSUPPORTED_OPERATION";

	constructor(message: string) {
		super(message);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}

		this.name = "UnsupportedOperationError";
	}
}

/**
 * Checks if a response line string represents an MPD error (starts with "ACK").
 * If it is an error, creates and returns an MpdError instance.
 * @param responseLine - The response line string to check.
 * @returns An MpdError instance if the line is an error, otherwise null.
 */
export const isError = (responseLine: string): MpdError | null => {
	return responseLine.startsWith(ACK) ? new MpdError(responseLine) : null;
};
