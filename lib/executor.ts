import debugCreator from "debug";
import { PACKAGE_NAME } from "./const.js";

const debug = debugCreator(`${PACKAGE_NAME}:executor`);

/**
 * A task waiting for its turn on the connection.
 * Settles its caller's promise itself, so it never rejects.
 */
type QueuedTask = () => Promise<void>;

/**
 * Runs protocol exchanges for one connection strictly one at a time,
 * in the order they were submitted.
 */
export class CommandExecutor {
	private readonly queue: QueuedTask[] = [];
	private running = false;

	/**
	 * Queues `task` behind every exchange submitted before it.
	 *
	 * @returns A Promise settled with the task's own result or error.
	 */
	execute<T>(task: () => Promise<T>): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			this.queue.push(async () => {
				try {
					resolve(await task());
				} catch (error) {
					reject(error);
				}
			});

			queueMicrotask(() => {
				void this.processQueue();
			});
		});
	}

	/** Number of tasks waiting or running. */
	get size(): number {
		return this.queue.length + (this.running ? 1 : 0);
	}

	private async processQueue(): Promise<void> {
		if (this.running) {
			return;
		}

		this.running = true;
		try {
			for (
				let task = this.queue.shift();
				task !== undefined;
				task = this.queue.shift()
			) {
				await task();
			}
		} finally {
			this.running = false;
			debug("Queue drained.");
		}
	}
}
