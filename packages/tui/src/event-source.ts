import * as readline from "node:readline";
import { logger } from "@fuzzpick/utils";
import { describeError, IoError } from "./errors";
import { decodeKeypress, formatKey, type InputEvent } from "./keys";

/**
 * Source of input events for the picker.
 *
 * `read()` may only be called after `poll()` resolved to true.
 */
export interface EventSource {
	poll(timeoutMs: number): Promise<boolean>;
	read(): InputEvent;
	close(): void;
}

/** The part of an output stream the event source needs: size and resize notifications. */
export interface ResizableOutput {
	readonly columns?: number;
	readonly rows?: number;
	on(event: "resize", listener: () => void): unknown;
	removeListener(event: "resize", listener: () => void): unknown;
}

/**
 * Queue-backed event source. Producers call `push`; a pending `poll` wakes up
 * as soon as an event arrives. After `fail`, queued events are still delivered
 * and then every poll rejects with the failure.
 */
export class QueuedEventSource implements EventSource {
	#queue: InputEvent[] = [];
	#wake?: () => void;
	#closed = false;
	#failure?: IoError;

	push(event: InputEvent): void {
		if (this.#closed) return;
		this.#queue.push(event);
		this.#wake?.();
	}

	/** Record a fatal input failure. Only the first one is kept. */
	fail(error: IoError): void {
		if (this.#closed || this.#failure) return;
		this.#failure = error;
		this.#wake?.();
	}

	poll(timeoutMs: number): Promise<boolean> {
		if (this.#queue.length > 0) return Promise.resolve(true);
		if (this.#failure) return Promise.reject(this.#failure);
		if (this.#closed) return Promise.resolve(false);
		return new Promise<boolean>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.#wake = undefined;
				resolve(false);
			}, timeoutMs);
			this.#wake = () => {
				clearTimeout(timer);
				this.#wake = undefined;
				if (this.#queue.length === 0 && this.#failure) reject(this.#failure);
				else resolve(true);
			};
		});
	}

	read(): InputEvent {
		const event = this.#queue.shift();
		if (!event) {
			throw this.#failure ?? new IoError("no input event ready");
		}
		return event;
	}

	close(): void {
		this.#closed = true;
		this.#queue = [];
		this.#wake?.();
	}
}

/**
 * Events from a TTY: keypresses decoded through `node:readline`, resizes from
 * the output stream. A read error or end of input fails the source with an
 * {@link IoError}.
 */
export class ProcessEventSource extends QueuedEventSource {
	#attached = false;

	readonly #onKeypress = (str: string | undefined, key: readline.Key | undefined): void => {
		const event = decodeKeypress(str, key);
		if (!event) {
			logger.debug("ignored undecodable keypress", { sequence: key?.sequence });
			return;
		}
		logger.debug("keypress", { key: formatKey(event) });
		this.push(event);
	};

	readonly #onResize = (): void => {
		this.push({ type: "resize", width: this.out.columns || 80, height: this.out.rows || 24 });
	};

	readonly #onError = (err: unknown): void => {
		logger.error("terminal input failed", { error: describeError(err) });
		this.fail(new IoError(`reading terminal input failed: ${describeError(err)}`, undefined, { cause: err }));
	};

	readonly #onEnd = (): void => {
		logger.warn("terminal input closed");
		this.fail(new IoError("terminal input closed"));
	};

	constructor(
		private readonly input: NodeJS.ReadableStream,
		private readonly out: ResizableOutput,
	) {
		super();
	}

	override poll(timeoutMs: number): Promise<boolean> {
		this.#attach();
		return super.poll(timeoutMs);
	}

	#attach(): void {
		if (this.#attached) return;
		this.#attached = true;
		readline.emitKeypressEvents(this.input);
		this.input.on("keypress", this.#onKeypress);
		this.input.on("error", this.#onError);
		this.input.on("end", this.#onEnd);
		this.out.on("resize", this.#onResize);
		this.input.resume();
	}

	override close(): void {
		if (this.#attached) {
			this.input.removeListener("keypress", this.#onKeypress);
			this.input.removeListener("error", this.#onError);
			this.input.removeListener("end", this.#onEnd);
			this.out.removeListener("resize", this.#onResize);
			// Pause stdin so buffered input is not re-read by the shell after raw mode ends
			this.input.pause();
			this.#attached = false;
		}
		super.close();
	}
}
