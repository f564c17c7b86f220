import createDebug from "debug";
import { OperationTimeoutError } from "../error.js";
import { type JsonObject, readBoolean, readRecord } from "../utils.js";
import { type SendRequestOptions, sendRequest } from "./http.js";
import { sleep } from "./retry.js";

const debug = createDebug("opencloud:operation");

/**
 * How a finished operation produces its result:
 *
 * - `materialize` builds the result from the terminal response payload.
 * - `fixed` always yields the same value, for jobs whose payload carries
 *   nothing of interest.
 */
export type OperationResolver<T> =
	| { kind: "materialize"; materialize: (response: JsonObject) => T }
	| { kind: "fixed"; value: T };

export type OperationStatus<T> = { done: false } | { done: true; value: T };

/** Request settings reused for every status poll. */
export type OperationRequestOptions = Pick<
	SendRequestOptions,
	"authorization" | "retry" | "timeoutMillis" | "session" | "signal"
>;

export type WaitOptions = {
	/**
	 * Seconds to keep polling before giving up. `null` waits forever.
	 * @default 60
	 */
	timeoutSeconds?: number | null;
	/**
	 * Seconds between the first two polls, excluding network time.
	 * @default 0
	 */
	intervalSeconds?: number;
	/**
	 * Multiplier applied to the interval after every poll. 1 keeps it constant.
	 * @default 1.3
	 */
	intervalExponent?: number;
	/**
	 * Lower bound for every interval. With the default interval of 0 the
	 * operation is polled back to back unless this is raised.
	 * @default 0
	 */
	minIntervalSeconds?: number;
};

/**
 * A server-side job that completes asynchronously, such as an asset upload
 * or a memory store flush. Poll it with {@link Operation.fetchStatus} or
 * wait for it with {@link Operation.wait}.
 */
export class Operation<T> {
	private readonly path: string;
	private readonly resolver: OperationResolver<T>;
	private readonly requestOptions: OperationRequestOptions;
	private terminalResponse: JsonObject | undefined;
	private done: boolean;
	private result: { value: T } | undefined;

	/**
	 * @param path Status path polled with `GET`.
	 * @param cachedResponse Terminal response already returned by the request
	 * that started the job. The operation is then done from the start.
	 */
	constructor(
		path: string,
		resolver: OperationResolver<T>,
		requestOptions: OperationRequestOptions = {},
		cachedResponse?: JsonObject,
	) {
		this.path = path;
		this.resolver = resolver;
		this.requestOptions = requestOptions;
		this.terminalResponse = cachedResponse;
		this.done = cachedResponse !== undefined;
	}

	/** Whether the job is known to be complete. Once true it stays true. */
	public get isDone(): boolean {
		return this.done;
	}

	/**
	 * Polls the job once.
	 *
	 * @returns `{ done: false }` while the job is running, otherwise the
	 * result.
	 */
	public async fetchStatus(): Promise<OperationStatus<T>> {
		const { body } = await sendRequest("GET", this.path, {
			...this.requestOptions,
			expectedStatus: [200],
		});
		const status = readRecord(body);
		if (!readBoolean(status, "done")) {
			return { done: false };
		}

		if (this.resolver.kind === "materialize") {
			this.terminalResponse = readRecord(status.response, "response");
		}
		this.done = true;
		this.result = undefined;
		return { done: true, value: this.resolve() };
	}

	/**
	 * Polls until the job completes and returns its result. Returns at once,
	 * without a request, when the operation is already done.
	 *
	 * @throws OperationTimeoutError when `timeoutSeconds` elapses first.
	 *
	 * @example
	 * ```ts
	 * const operation = await creator.uploadAsset(file, { assetType: "Decal", name: "Logo", description: "" });
	 * const asset = await operation.wait({ intervalSeconds: 1 });
	 * ```
	 */
	public async wait(options: WaitOptions = {}): Promise<T> {
		if (this.done) {
			return this.resolve();
		}

		const timeoutSeconds =
			options.timeoutSeconds === undefined ? 60 : options.timeoutSeconds;
		const exponent = options.intervalExponent ?? 1.3;
		const minInterval = options.minIntervalSeconds ?? 0;
		let interval = options.intervalSeconds ?? 0;
		const start = Date.now();

		for (let poll = 1; ; poll++) {
			const status = await this.fetchStatus();
			if (status.done) {
				debug("%s done after %d polls", this.path, poll);
				return status.value;
			}

			const elapsed = (Date.now() - start) / 1000;
			if (timeoutSeconds !== null && elapsed >= timeoutSeconds) {
				throw new OperationTimeoutError(timeoutSeconds);
			}

			let delay = Math.max(interval, minInterval);
			if (timeoutSeconds !== null) {
				delay = Math.min(delay, timeoutSeconds - elapsed);
			}
			debug("%s not done (poll %d), next in %ds", this.path, poll, delay);
			if (delay > 0) {
				await sleep(delay * 1000);
			}
			interval *= exponent;
		}
	}

	private resolve(): T {
		if (!this.result) {
			this.result = {
				value:
					this.resolver.kind === "fixed"
						? this.resolver.value
						: this.resolver.materialize(
								readRecord(this.terminalResponse, "response"),
							),
			};
		}
		return this.result.value;
	}
}
