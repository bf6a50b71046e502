import { escapeArg } from "./parserUtils.js";

/**
 * Represents an MPD command with a name and arguments.
 * Provides a helper method to create instances and a method to serialize the command to a string.
 */
export class Command {
	readonly name: string;
	readonly args: (string | number)[];

	/**
	 * Creates an instance of Command.
	 * Allows arguments to be passed either as individual arguments or as a single array.
	 * @param name - The name of the MPD command (e.g., 'status', 'playid').
	 * @param inputArgs - The arguments for the command. Can be passed as rest parameters (`...args`) or as a single array (`[arg1, arg2]`).
	 */
	constructor(
		name: string,
		...inputArgs: (string | number)[] | [(string | number)[]]
	) {
		const [first] = inputArgs;
		this.args =
			inputArgs.length === 1 && Array.isArray(first)
				? first
				: inputArgs.filter(
						(arg): arg is string | number => !Array.isArray(arg),
					);
		this.name = name;
	}

	/**
	 * Static factory method to create Command instances using a single array for arguments.
	 * @param name - The name of the MPD command.
	 * @param args - An array containing the arguments for the command.
	 * @returns A new Command instance.
	 */
	static cmd(name: string, args: (string | number)[]): Command;
	/**
	 * Static factory method to create Command instances using rest parameters for arguments.
	 * @param name - The name of the MPD command.
	 * @param args - The arguments for the command passed as individual parameters.
	 * @returns A new Command instance.
	 */
	static cmd(name: string, ...args: (string | number)[]): Command;
	static cmd(
		name: string,
		...argsOrArray: [(string | number)[]] | (string | number)[]
	): Command {
		return new Command(name, ...argsOrArray);
	}

	/**
	 * Serializes the command into the string format expected by the MPD protocol.
	 * String arguments are quoted and escaped; numbers are written as they are.
	 * @returns The command string (e.g., 'albumart "a/cover.flac" 4096').
	 */
	toString(): string {
		if (this.args.length === 0) {
			return this.name;
		}
		const escaped = this.args
			.map((arg) => (typeof arg === "number" ? String(arg) : escapeArg(arg)))
			.join(" ");
		return `${this.name} ${escaped}`;
	}
}
