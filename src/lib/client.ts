import type { RetryConfig } from "../common.js";
import {
	type HttpMethod,
	type HttpResponse,
	type SendRequestOptions,
	sendRequest,
} from "./http.js";
import { Operation, type OperationResolver } from "./operation.js";
import { type IterateRequestOptions, iterateRequest } from "./paginate.js";
import * as Redacted from "./redacted.js";
import type { HttpSession } from "./session.js";
import type { JsonObject } from "../utils.js";

export type HttpClientOptions = {
	/** API key or `Bearer` token. Requests go out unauthenticated without one. */
	credential?: string;
	retry?: RetryConfig;
	timeoutMillis?: number;
	session?: HttpSession;
};

type CallOptions = Omit<SendRequestOptions, "authorization" | "retry" | "session">;

/**
 * Binds a credential and the client-wide request settings to the transport,
 * paginator and operation primitives. Resource classes receive one of these
 * instead of the raw credential.
 */
export class HttpClient {
	private readonly credential: Redacted.Redacted | undefined;
	private readonly retry: RetryConfig | undefined;
	private readonly timeoutMillis: number | undefined;
	private readonly session: HttpSession | undefined;

	constructor(options: HttpClientOptions) {
		this.credential =
			options.credential === undefined ? undefined : Redacted.make(options.credential);
		this.retry = options.retry;
		this.timeoutMillis = options.timeoutMillis;
		this.session = options.session;
	}

	private shared(): Pick<
		SendRequestOptions,
		"authorization" | "retry" | "timeoutMillis" | "session"
	> {
		return {
			authorization: this.credential && Redacted.value(this.credential),
			retry: this.retry,
			timeoutMillis: this.timeoutMillis,
			session: this.session,
		};
	}

	public request(
		method: HttpMethod,
		path: string,
		options: CallOptions = {},
	): Promise<HttpResponse> {
		return sendRequest(method, path, {
			...this.shared(),
			...options,
			timeoutMillis: options.timeoutMillis ?? this.timeoutMillis,
		});
	}

	public iterate<T>(
		method: HttpMethod,
		path: string,
		options: Omit<IterateRequestOptions, "authorization" | "retry" | "session">,
		map: (item: unknown) => T,
	): AsyncIterable<T> {
		return iterateRequest(
			method,
			path,
			{
				...this.shared(),
				...options,
				timeoutMillis: options.timeoutMillis ?? this.timeoutMillis,
			},
			map,
		);
	}

	public operation<T>(
		path: string,
		resolver: OperationResolver<T>,
		cachedResponse?: JsonObject,
	): Operation<T> {
		return new Operation(path, resolver, this.shared(), cachedResponse);
	}

	/** A client for the same settings with a different credential. */
	public withCredential(credential: string): HttpClient {
		return new HttpClient({
			credential,
			retry: this.retry,
			timeoutMillis: this.timeoutMillis,
			session: this.session,
		});
	}
}
