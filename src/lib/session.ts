import createDebug from "debug";
import { NetworkError } from "../error.js";
import { VERSION } from "../version.js";

const debug = createDebug("opencloud:session");

export const DEFAULT_USER_AGENT = `roblox-opencloud-sdk-typescript/${VERSION}`;

export const DEFAULT_TIMEOUT_MILLIS = 15_000;

/** The subset of the global `fetch` signature the SDK relies on. */
export type FetchLike = (
	input: string | URL,
	init?: RequestInit,
) => Promise<Response>;

export type HttpSessionOptions = {
	/**
	 * `fetch` implementation used for every request.
	 * Defaults to the global `fetch`.
	 */
	fetch?: FetchLike;
	/** @default "roblox-opencloud-sdk-typescript/<version>" */
	userAgent?: string;
	/**
	 * Timeout in milliseconds for requests that don't set their own.
	 * @default 15000
	 */
	timeoutMillis?: number;
};

/**
 * Connection context shared by requests: the `fetch` implementation, the
 * user agent, the default timeout and a shutdown signal that cancels every
 * in-flight request when the session is closed.
 */
export class HttpSession {
	public readonly userAgent: string;
	public readonly timeoutMillis: number;
	private readonly fetchImpl: FetchLike;
	private readonly shutdown = new AbortController();

	constructor(options: HttpSessionOptions = {}) {
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
		this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
		this.timeoutMillis = options.timeoutMillis ?? DEFAULT_TIMEOUT_MILLIS;
	}

	public get closed(): boolean {
		return this.shutdown.signal.aborted;
	}

	/**
	 * Issues one HTTP request and hands the response to `consume`. The request
	 * and the body read inside `consume` are cancelled when `signal` aborts,
	 * when `timeoutMillis` elapses or when the session is closed.
	 */
	public async fetch<R>(
		url: URL,
		init: RequestInit & { timeoutMillis?: number },
		consume: (response: Response) => Promise<R>,
	): Promise<R> {
		if (this.closed) {
			throw new NetworkError({ message: "Session closed", code: "ABORTED" });
		}

		const { timeoutMillis, signal, ...rest } = init;
		const linked = linkSignals([
			this.shutdown.signal,
			AbortSignal.timeout(timeoutMillis ?? this.timeoutMillis),
			...(signal ? [signal] : []),
		]);
		try {
			const response = await this.fetchImpl(url, {
				...rest,
				signal: linked.signal,
			});
			return await untilAborted(consume(response), linked.signal);
		} finally {
			linked.dispose();
		}
	}

	/** Cancels in-flight requests and rejects new ones. Idempotent. */
	public close(): void {
		if (this.closed) return;
		debug("closing session");
		this.shutdown.abort(
			new NetworkError({ message: "Session closed", code: "ABORTED" }),
		);
	}
}

function linkSignals(signals: AbortSignal[]): {
	signal: AbortSignal;
	dispose: () => void;
} {
	const controller = new AbortController();
	const cleanups: Array<() => void> = [];
	for (const signal of signals) {
		if (signal.aborted) {
			controller.abort(signal.reason);
			break;
		}
		const onAbort = () => controller.abort(signal.reason);
		signal.addEventListener("abort", onAbort, { once: true });
		cleanups.push(() => signal.removeEventListener("abort", onAbort));
	}
	return {
		signal: controller.signal,
		dispose: () => {
			for (const cleanup of cleanups) cleanup();
		},
	};
}

// Body streams from a custom `fetch` may ignore the request signal.
function untilAborted<R>(work: Promise<R>, signal: AbortSignal): Promise<R> {
	return new Promise<R>((resolve, reject) => {
		const onAbort = () => reject(signal.reason);
		if (signal.aborted) {
			onAbort();
		} else {
			signal.addEventListener("abort", onAbort, { once: true });
		}
		work.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}

let shared: HttpSession | undefined;

/**
 * Returns the process-wide session, creating it on first use.
 * Every later call returns the same instance until {@link closeSession}.
 */
export function getSession(): HttpSession {
	if (!shared) {
		debug("creating shared session");
		shared = new HttpSession();
	}
	return shared;
}

/**
 * Closes the process-wide session. The next request creates a fresh one.
 */
export function closeSession(): void {
	if (!shared) return;
	const session = shared;
	shared = undefined;
	session.close();
}
