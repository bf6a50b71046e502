import type { Buffer } from "node:buffer";
import { EventEmitter } from "node:events";
import debugCreator from "debug";
import { ArtworkConnection } from "./artworkConnection.js";
import type { Command } from "./command.js";
import { CommandConnection } from "./commandConnection.js";
import {
	ARTWORK_COMMANDS,
	DEFAULT_HOST,
	DEFAULT_PORT,
	DEFAULT_RECONNECT_DELAY,
	DEFAULT_TIMEOUT,
	PACKAGE_NAME,
} from "./const.js";
import { EventManager } from "./event.js";
import { IdleConnection } from "./idleConnection.js";
import type { ArtworkCommand, IdleEvent } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:client`);

/**
 * Configuration options for the MPD client.
 */
export type Config = {
	/** Server host. Defaults to `MPD_HOST` or localhost; `password@host` is accepted. */
	host?: string;
	/** Defaults to `MPD_PORT` or 6600. */
	port?: number;
	/** MPD server password. */
	password?: string;
	/** Connect and handshake timeout in milliseconds. Defaults to `MPD_TIMEOUT` or 5000. */
	timeout?: number;
	/** Delay in milliseconds before the event connection reconnects. Defaults to 5000. */
	reconnectDelay?: number;
	/** Artwork commands in the order they are tried. */
	artworkCommands?: ArtworkCommand[];
	/** Subsystems monitored for `system` events. Empty means all. */
	idleEvents?: IdleEvent[];
};

export type ResolvedConfig = Required<Omit<Config, "password">> &
	Pick<Config, "password">;

/**
 * Splits an `MPD_HOST` value of the form `password@host`.
 */
export function parseMpdHost(value: string | undefined): {
	host?: string;
	password?: string;
} {
	if (!value) return {};
	const at = value.lastIndexOf("@");
	if (at === -1) return { host: value };
	return {
		password: value.slice(0, at) || undefined,
		host: value.slice(at + 1) || undefined,
	};
}

/**
 * Applies default values to the configuration if they are not set.
 * Reads defaults from environment variables (MPD_HOST, MPD_PORT, MPD_TIMEOUT)
 * or falls back to hardcoded values.
 */
export function applyDefaultValuesIfNotSet(config: Config = {}): ResolvedConfig {
	const fromEnv = parseMpdHost(process.env.MPD_HOST);
	const hostFromConfig = config.host ? parseMpdHost(config.host) : {};

	return {
		host: hostFromConfig.host ?? fromEnv.host ?? DEFAULT_HOST,
		port: config.port ?? (Number(process.env.MPD_PORT) || DEFAULT_PORT),
		password: config.password ?? hostFromConfig.password ?? fromEnv.password,
		timeout: config.timeout ?? (Number(process.env.MPD_TIMEOUT) || DEFAULT_TIMEOUT),
		reconnectDelay: config.reconnectDelay ?? DEFAULT_RECONNECT_DELAY,
		artworkCommands: config.artworkCommands ?? [...ARTWORK_COMMANDS],
		idleEvents: config.idleEvents ?? [],
	};
}

/**
 * Main client class for interacting with an MPD server.
 *
 * Every operation runs on a short-lived connection of the matching mode.
 * Subscribing to `system` or `system-<subsystem>` starts a long-lived idle
 * connection that emits subsystem changes.
 */
export class Client extends EventEmitter {
	readonly config: ResolvedConfig;
	private readonly eventManager: EventManager;
	private mpdVersion = "unknown";

	/**
	 * Private constructor. Use Client.connect() to create instances.
	 */
	private constructor(config: ResolvedConfig) {
		super();
		this.config = config;
		this.eventManager = new EventManager(this, this.createIdleConnection(), {
			reconnectDelay: config.reconnectDelay,
			idleEvents: config.idleEvents,
		});

		this.on("newListener", (event: string | symbol) => {
			if (typeof event !== "string" || !event.startsWith("system")) {
				return;
			}
			if (!this.eventManager.isMonitoring) {
				this.eventManager.startMonitoring();
				debug("Event monitoring started.");
			}
		});
	}

	/**
	 * Creates a client and checks that the server is reachable.
	 * @throws {ConnectionError} If the server cannot be reached or is too old.
	 * @throws {MpdError} If the password is rejected.
	 */
	static async connect(config: Config = {}): Promise<Client> {
		debug("Connecting...");
		const client = new Client(applyDefaultValuesIfNotSet(config));

		try {
			await client.command(async (connection) => {
				client.mpdVersion = connection.version ?? "unknown";
			});
			debug("Successfully connected to MPD server, version: %s", client.mpdVersion);
			return client;
		} catch (error) {
			debug("Connection error: %o", error);
			await client.disconnect();
			throw error;
		}
	}

	createCommandConnection(): CommandConnection {
		return new CommandConnection(this.config);
	}

	createArtworkConnection(): ArtworkConnection {
		return new ArtworkConnection(this.config, this.config.artworkCommands);
	}

	createIdleConnection(): IdleConnection {
		return new IdleConnection(this.config);
	}

	/**
	 * Runs `operation` on a fresh command connection that is closed afterwards.
	 */
	command<T>(
		operation: (connection: CommandConnection) => Promise<T>,
		signal?: AbortSignal,
	): Promise<T> {
		return this.createCommandConnection().withConnection(operation, signal);
	}

	/**
	 * Runs `operation` on a fresh artwork connection that is closed afterwards.
	 */
	artwork<T>(
		operation: (connection: ArtworkConnection) => Promise<T>,
		signal?: AbortSignal,
	): Promise<T> {
		return this.createArtworkConnection().withConnection(operation, signal);
	}

	/**
	 * Sends raw commands, as a command list when more than one, and returns
	 * the response lines including the terminal `OK`.
	 */
	run(commands: (string | Command)[], signal?: AbortSignal): Promise<string[]> {
		debug("Sending commands: %o", commands);
		return this.command((connection) => connection.run(commands), signal);
	}

	getArtworkData(file: string, signal?: AbortSignal): Promise<Buffer> {
		return this.artwork((connection) => connection.getArtworkData(file), signal);
	}

	/**
	 * Stops event monitoring and emits `close`.
	 */
	async disconnect(): Promise<void> {
		debug("Disconnecting...");
		await this.eventManager.stopMonitoring();
		this.emit("close");
		debug("Disconnected.");
	}

	/**
	 * Gets the MPD protocol version reported by the server upon connection.
	 */
	get PROTOCOL_VERSION(): string {
		return this.mpdVersion;
	}
}
