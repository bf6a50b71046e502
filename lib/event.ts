import type { EventEmitter } from "node:events";
import debugCreator from "debug";
import { PACKAGE_NAME } from "./const.js";
import type { IdleConnection } from "./idleConnection.js";
import type { IdleEvent } from "./types.js";

const debug = debugCreator(`${PACKAGE_NAME}:event`);

export interface EventManagerOptions {
	/** Delay in milliseconds before reconnecting after a failure. */
	reconnectDelay: number;
	/** Subsystems to wait for. Empty means all. */
	idleEvents?: readonly IdleEvent[];
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
function delay(ms: number, signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		const done = () => {
			clearTimeout(timer);
			signal.removeEventListener("abort", done);
			resolve();
		};
		const timer = setTimeout(done, ms);
		signal.addEventListener("abort", done, { once: true });
	});
}

/**
 * Keeps an idle connection open and forwards every reported subsystem change
 * to the emitter as `system-<subsystem>` and `system`. Subsystems this
 * library does not know are skipped.
 * Failures are retried indefinitely, waiting `reconnectDelay` between attempts.
 */
export class EventManager {
	private controller?: AbortController;
	private loop?: Promise<void>;

	constructor(
		private readonly emitter: EventEmitter,
		private readonly connection: IdleConnection,
		private readonly options: EventManagerOptions,
	) {}

	get isMonitoring(): boolean {
		return this.controller !== undefined;
	}

	startMonitoring(): void {
		if (this.controller) {
			debug("Event monitoring is already active.");
			return;
		}

		debug("Starting event monitoring...");
		const controller = new AbortController();
		this.controller = controller;
		this.loop = this.monitor(controller.signal);
	}

	/**
	 * Stops the loop and closes the idle connection. Resolves once the loop
	 * has exited.
	 */
	async stopMonitoring(): Promise<void> {
		const controller = this.controller;
		if (!controller) {
			debug("Event monitoring is not active.");
			return;
		}

		debug("Stopping event monitoring...");
		this.controller = undefined;
		controller.abort();
		this.connection.disconnect();

		await this.loop;
		this.loop = undefined;
	}

	private async monitor(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			try {
				await this.connection.connect();
				debug("Idle connection established.");

				while (!signal.aborted) {
					const events = await this.connection.idle(this.options.idleEvents, {
						strict: false,
					});
					for (const event of events) {
						debug(`Emitting event: system-${event}`);
						this.emitter.emit(`system-${event}`);
						this.emitter.emit("system", event);
					}
				}
			} catch (error) {
				if (signal.aborted) {
					break;
				}

				this.connection.disconnect();
				debug(
					"Event connection failed, retrying in %dms: %o",
					this.options.reconnectDelay,
					error,
				);
				if (this.emitter.listenerCount("error") > 0) {
					this.emitter.emit("error", error);
				}
				await delay(this.options.reconnectDelay, signal);
			}
		}

		this.connection.disconnect();
		debug("Event monitoring stopped.");
	}
}
