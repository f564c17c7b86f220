import createDebug from "debug";
import type { RetryConfig } from "../common.js";
import { makeStatusError, networkError } from "../error.js";
import { calculateDelay, isRetryable, resolveRetryConfig, sleep } from "./retry.js";
import { getSession, type HttpSession } from "./session.js";

const debug = createDebug("opencloud:http");

export const BASE_URL = "https://apis.roblox.com/";

/** Prefix for resource paths written as `/universes/...`. */
const CLOUD_V2_PREFIX = "cloud/v2";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | null | undefined;

export type QueryParams = Record<string, QueryValue>;

export type SendRequestOptions = {
	/**
	 * Credential for the request. Sent as the `authorization` header when it
	 * starts with `Bearer `, otherwise as `x-api-key`.
	 */
	authorization?: string;
	/**
	 * Statuses the caller handles itself. When set, any other 401, 403, 404,
	 * 429 or 5xx status throws the matching error, and anything else throws
	 * {@link OpenCloudError}. When omitted, no status ever throws.
	 */
	expectedStatus?: readonly number[];
	retry?: RetryConfig;
	/** Query parameters. `null`/`undefined` values are left out. */
	params?: QueryParams;
	/** Extra headers. `user-agent` and the credential headers always win. */
	headers?: Record<string, string>;
	/** Value serialised as the JSON request body. */
	json?: unknown;
	/** Raw request body, sent as-is. */
	body?: RequestInit["body"];
	/** Fields sent as an `application/x-www-form-urlencoded` body. */
	form?: QueryParams;
	timeoutMillis?: number;
	signal?: AbortSignal;
	/** Defaults to the process-wide session. */
	session?: HttpSession;
};

export type HttpResponse<B = unknown> = {
	status: number;
	/** Parsed JSON for JSON responses, text otherwise. */
	body: B;
	headers: Headers;
};

/**
 * Resolves a request path against {@link BASE_URL}. Paths starting with `/`
 * address Cloud v2 resources and are placed under `cloud/v2`.
 */
export function resolveUrl(path: string, params?: QueryParams): URL {
	const relative = path.startsWith("/") ? `${CLOUD_V2_PREFIX}${path}` : path;
	const url = new URL(relative, BASE_URL);
	if (params) {
		for (const [key, value] of Object.entries(params)) {
			if (value === null || value === undefined) continue;
			url.searchParams.set(key, String(value));
		}
	}
	return url;
}

function encodeForm(form: QueryParams): URLSearchParams {
	const encoded = new URLSearchParams();
	for (const [key, value] of Object.entries(form)) {
		if (value === null || value === undefined) continue;
		encoded.set(key, String(value));
	}
	return encoded;
}

function buildHeaders(
	session: HttpSession,
	options: SendRequestOptions,
): Headers {
	const headers = new Headers(options.headers);
	if (options.json !== undefined) {
		headers.set("content-type", "application/json");
	}
	headers.set("user-agent", session.userAgent);
	if (options.authorization) {
		if (options.authorization.startsWith("Bearer ")) {
			headers.set("authorization", options.authorization);
		} else {
			headers.set("x-api-key", options.authorization);
		}
	}
	return headers;
}

function buildBody(options: SendRequestOptions): RequestInit["body"] {
	if (options.json !== undefined) {
		return JSON.stringify(options.json);
	}
	if (options.form) {
		return encodeForm(options.form);
	}
	return options.body;
}

async function decodeBody(response: Response): Promise<unknown> {
	const text = await response.text();
	const contentType = response.headers.get("content-type") ?? "";
	if (contentType.includes("application/json") && text.length > 0) {
		try {
			return JSON.parse(text);
		} catch {
			// malformed JSON is surfaced as the raw text
			return text;
		}
	}
	return text;
}

/**
 * Sends one logical request to the Open Cloud API and returns the status,
 * decoded body and headers.
 *
 * 5xx responses (unless expected) and network failures are retried with an
 * exponential backoff while the retry budget lasts. Status checks only apply
 * when `expectedStatus` is given.
 *
 * @example
 * ```ts
 * const { body } = await sendRequest("GET", "assets/v1/assets/1818", {
 *   authorization: apiKey,
 *   expectedStatus: [200],
 * });
 * ```
 */
export async function sendRequest(
	method: HttpMethod,
	path: string,
	options: SendRequestOptions = {},
): Promise<HttpResponse> {
	const retry = resolveRetryConfig(options.retry);
	const session = options.session ?? getSession();
	const url = resolveUrl(path, options.params);
	const headers = buildHeaders(session, options);

	for (let attempt = 0; ; attempt++) {
		let response: HttpResponse;
		try {
			response = await session.fetch(
				url,
				{
					method,
					headers,
					body: buildBody(options),
					signal: options.signal,
					timeoutMillis: options.timeoutMillis,
				},
				async (raw) => ({
					status: raw.status,
					body: await decodeBody(raw),
					headers: raw.headers,
				}),
			);
		} catch (error) {
			const failure = networkError(error);
			if (attempt < retry.maxAttempts && isRetryable(failure)) {
				const delay = calculateDelay(attempt, retry);
				debug(
					"%s %s failed (%s), retrying in %dms (%d/%d)",
					method,
					url.pathname,
					failure.message,
					delay,
					attempt + 1,
					retry.maxAttempts,
				);
				await sleep(delay);
				continue;
			}
			throw failure;
		}

		debug("%s %s -> %d", method, url.pathname, response.status);

		const expected = options.expectedStatus;
		if (!expected || expected.includes(response.status)) {
			return response;
		}

		if (response.status >= 500 && attempt < retry.maxAttempts) {
			const delay = calculateDelay(attempt, retry);
			debug(
				"%s %s returned %d, retrying in %dms (%d/%d)",
				method,
				url.pathname,
				response.status,
				delay,
				attempt + 1,
				retry.maxAttempts,
			);
			await sleep(delay);
			continue;
		}

		throw makeStatusError(response.status, response.body);
	}
}
