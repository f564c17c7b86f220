/**
 * Rich error type used by the SDK to surface HTTP and local failures.
 *
 * - `status` is the HTTP status code (0 for errors raised before a response).
 * - `body` is the decoded response body, when there was one.
 * - `origin` tells whether the server answered or the SDK failed locally.
 */
export class OpenCloudError extends Error {
	public readonly status: number;
	/** Decoded response body, kept for diagnostics. */
	public readonly body?: unknown;
	/** Origin of the error: server (HTTP response) or sdk (local). */
	public readonly origin: "server" | "sdk";

	constructor({
		message,
		status,
		body,
		origin,
		cause,
	}: {
		message: string;
		status?: number;
		body?: unknown;
		origin?: "server" | "sdk";
		cause?: unknown;
	}) {
		super(message, cause === undefined ? undefined : { cause });
		this.status = typeof status === "number" ? status : 0;
		this.body = body;
		this.origin = origin ?? "sdk";
		this.name = "OpenCloudError";
	}
}

type StatusErrorArgs = { message?: string; status?: number; body?: unknown };

/** The credential was rejected (HTTP 401). */
export class InvalidKeyError extends OpenCloudError {
	constructor({ message, status = 401, body }: StatusErrorArgs = {}) {
		super({
			message: message ?? "The authorization key is not valid.",
			status,
			body,
			origin: "server",
		});
		this.name = "InvalidKeyError";
	}
}

/** The credential lacks permission for the resource (HTTP 403). */
export class PermissionDeniedError extends OpenCloudError {
	constructor({ message, status = 403, body }: StatusErrorArgs = {}) {
		super({
			message:
				message ?? "The authorization doesn't have scope to access this resource.",
			status,
			body,
			origin: "server",
		});
		this.name = "PermissionDeniedError";
	}
}

/** HTTP 404, or a resource the API reported as missing. */
export class NotFoundError extends OpenCloudError {
	constructor({ message, status = 404, body }: StatusErrorArgs = {}) {
		super({
			message: message ?? "Resource not found.",
			status,
			body,
			origin: "server",
		});
		this.name = "NotFoundError";
	}
}

/** HTTP 429. */
export class RateLimitedError extends OpenCloudError {
	constructor({ message, status = 429, body }: StatusErrorArgs = {}) {
		super({
			message: message ?? "The resource is being rate limited.",
			status,
			body,
			origin: "server",
		});
		this.name = "RateLimitedError";
	}
}

/** A 5xx response that persisted after every retry. */
export class ServiceUnavailableError extends OpenCloudError {
	constructor({ message, status = 503, body }: StatusErrorArgs = {}) {
		super({
			message:
				message ?? "The service is unavailable or has encountered an error.",
			status,
			body,
			origin: "server",
		});
		this.name = "ServiceUnavailableError";
	}
}

/**
 * Thrown when a conditional write fails because the stored entry does not
 * match the requested precondition.
 *
 * `value` and `info` describe the entry as it currently is on the server,
 * when the API reports it.
 */
export class PreconditionFailedError<V = unknown, I = unknown> extends OpenCloudError {
	public readonly value: V | undefined;
	public readonly info: I | undefined;

	constructor({
		message = "Precondition failed.",
		status = 412,
		body,
		value,
		info,
	}: StatusErrorArgs & { value?: V; info?: I }) {
		super({ message, status, body, origin: "server" });
		this.name = "PreconditionFailedError";
		this.value = value;
		this.info = info;
	}
}

/** The OAuth2 authorization code or refresh token was rejected. */
export class InvalidCodeError extends OpenCloudError {
	constructor({ message, status = 401, body }: StatusErrorArgs = {}) {
		super({
			message: message ?? "The authorization code is not valid.",
			status,
			body,
			origin: "server",
		});
		this.name = "InvalidCodeError";
	}
}

/** The uploaded file was rejected as an asset. */
export class InvalidAssetError extends OpenCloudError {
	constructor({ message, status = 400, body }: StatusErrorArgs = {}) {
		super({
			message: message ?? "The file is not a supported asset.",
			status,
			body,
			origin: "server",
		});
		this.name = "InvalidAssetError";
	}
}

/** A name or description was rejected by text moderation. */
export class ModeratedTextError extends OpenCloudError {
	constructor({ message, status = 400, body }: StatusErrorArgs = {}) {
		super({
			message: message ?? "The text was moderated.",
			status,
			body,
			origin: "server",
		});
		this.name = "ModeratedTextError";
	}
}

/**
 * The request never produced a response: DNS failure, refused or reset
 * connection, timeout or cancellation.
 */
export class NetworkError extends OpenCloudError {
	/** Node.js error code (`ECONNRESET`, `ENOTFOUND`, ...), `TIMEOUT` or `ABORTED`. */
	public readonly code: string;

	constructor({
		message,
		code,
		cause,
	}: {
		message: string;
		code: string;
		cause?: unknown;
	}) {
		super({ message, status: 0, origin: "sdk", cause });
		this.name = "NetworkError";
		this.code = code;
	}
}

/**
 * Thrown by `Operation.wait()` when the job is still running after the
 * timeout. Not an HTTP error.
 */
export class OperationTimeoutError extends Error {
	public readonly timeoutSeconds: number;

	constructor(timeoutSeconds: number) {
		super(`Operation did not complete within ${timeoutSeconds} seconds`);
		this.name = "OperationTimeoutError";
		this.timeoutSeconds = timeoutSeconds;
	}
}

/** Extracts the `message` field of a JSON error body, or a non-empty text body. */
export function errorMessageOf(body: unknown): string | undefined {
	if (typeof body === "string") {
		return body.length > 0 ? body : undefined;
	}
	if (body && typeof body === "object" && "message" in body) {
		const message = body.message;
		if (typeof message === "string" && message.length > 0) {
			return message;
		}
	}
	return undefined;
}

/**
 * Maps an unexpected response status to the matching error class.
 * 5xx statuses map to {@link ServiceUnavailableError}; the caller decides
 * whether retries are exhausted first.
 */
export function makeStatusError(status: number, body: unknown): OpenCloudError {
	const message = errorMessageOf(body);
	switch (status) {
		case 401:
			return new InvalidKeyError({ body });
		case 403:
			return new PermissionDeniedError({ body });
		case 404:
			return new NotFoundError({ message, body });
		case 429:
			return new RateLimitedError({ body });
	}
	if (status >= 500) {
		return new ServiceUnavailableError({ status, body });
	}
	return new OpenCloudError({
		message: message ?? `Unexpected HTTP ${status}`,
		status,
		body,
		origin: "server",
	});
}

const CONNECTION_ERROR_CODES = new Set([
	"ECONNREFUSED",
	"ENOTFOUND",
	"ETIMEDOUT",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"ECONNRESET",
	"EPIPE",
	"UND_ERR_SOCKET",
	"UND_ERR_CONNECT_TIMEOUT",
]);

function errorCodeOf(error: unknown): string | undefined {
	if (!error || typeof error !== "object") {
		return undefined;
	}
	if ("cause" in error && error.cause && typeof error.cause === "object") {
		const nested = errorCodeOf(error.cause);
		if (nested) return nested;
	}
	if ("code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

/**
 * Classifies an error thrown by `fetch` into a {@link NetworkError}.
 * Errors that already are {@link OpenCloudError}s pass through unchanged.
 */
export function networkError(error: unknown): OpenCloudError {
	if (error instanceof OpenCloudError) {
		return error;
	}

	if (error instanceof Error && error.name === "TimeoutError") {
		return new NetworkError({
			message: "Request timed out",
			code: "TIMEOUT",
			cause: error,
		});
	}

	if (error instanceof Error && error.name === "AbortError") {
		return new NetworkError({
			message: "Request cancelled",
			code: "ABORTED",
			cause: error,
		});
	}

	const code = errorCodeOf(error);
	if (code && CONNECTION_ERROR_CODES.has(code)) {
		return new NetworkError({
			message: `Connection failed: ${code}`,
			code,
			cause: error,
		});
	}

	return new NetworkError({
		message: error instanceof Error ? error.message : "Unknown network error",
		code: code ?? "NETWORK_ERROR",
		cause: error,
	});
}
