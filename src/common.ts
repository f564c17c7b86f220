import type { HttpSession } from "./lib/session.js";

/**
 * Retry configuration for 5xx responses and network failures.
 */
export type RetryConfig = {
	/**
	 * Number of retries after the first attempt.
	 * Set to 0 to disable retries.
	 * @default 2
	 */
	maxAttempts?: number;

	/**
	 * Delay in milliseconds before the first retry.
	 * Set to 0 for no delay.
	 * @default 1000
	 */
	intervalMillis?: number;

	/**
	 * Multiplier applied to the delay after every retry.
	 * Set to 1 for a constant delay.
	 * @default 2
	 */
	intervalExponent?: number;
};

/**
 * Configuration for constructing the top-level {@link ApiKey} client.
 */
export type ClientOptions = {
	/**
	 * API key sent as `x-api-key`. A value starting with `Bearer ` is sent as
	 * the `authorization` header instead.
	 */
	apiKey: string;
	/**
	 * Retry configuration applied to every request made by this client.
	 * @default { maxAttempts: 2, intervalMillis: 1000, intervalExponent: 2 }
	 */
	retry?: RetryConfig;
	/**
	 * Per-request timeout in milliseconds.
	 * @default 15000
	 */
	timeoutMillis?: number;
	/**
	 * Session used for this client's requests. Defaults to the shared
	 * process-wide session.
	 */
	session?: HttpSession;
};

/**
 * Per-request options that apply to all SDK operations.
 */
export type RequestOptions = {
	/**
	 * Optional abort signal to cancel the underlying HTTP request.
	 */
	signal?: AbortSignal;
};

export type OpenCloudEnvironmentConfig = Partial<
	Pick<ClientOptions, "apiKey" | "timeoutMillis">
>;

export class OpenCloudEnvironment {
	/**
	 * Reads client options from the environment:
	 *
	 * - `OPENCLOUD_API_KEY`: the API key.
	 * - `OPENCLOUD_TIMEOUT_MS`: per-request timeout in milliseconds.
	 *
	 * @example
	 * ```ts
	 * const client = new ApiKey({ apiKey: "fallback", ...OpenCloudEnvironment.parse() });
	 * ```
	 */
	public static parse(
		env: Record<string, string | undefined> = process.env,
	): OpenCloudEnvironmentConfig {
		const config: OpenCloudEnvironmentConfig = {};

		const apiKey = env.OPENCLOUD_API_KEY;
		if (apiKey) {
			config.apiKey = apiKey;
		}

		const timeout = env.OPENCLOUD_TIMEOUT_MS;
		if (timeout) {
			const parsed = Number.parseInt(timeout, 10);
			if (!Number.isFinite(parsed) || parsed <= 0) {
				throw new Error(
					`OPENCLOUD_TIMEOUT_MS must be a positive integer, got "${timeout}"`,
				);
			}
			config.timeoutMillis = parsed;
		}

		return config;
	}
}
