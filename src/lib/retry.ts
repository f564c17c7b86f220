import createDebug from "debug";
import type { RetryConfig } from "../common.js";
import { NetworkError, type OpenCloudError } from "../error.js";

const debug = createDebug("opencloud:retry");

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
	maxAttempts: 2,
	intervalMillis: 1000,
	intervalExponent: 2,
};

/**
 * Whether a failure may be retried: 5xx responses and network failures,
 * except requests that were deliberately cancelled.
 */
export function isRetryable(error: OpenCloudError): boolean {
	if (error instanceof NetworkError) {
		return error.code !== "ABORTED";
	}
	return error.status >= 500;
}

/**
 * Delay before retry number `retry` (0-based): the initial interval grown by
 * the exponent once per earlier retry.
 */
export function calculateDelay(retry: number, config: Required<RetryConfig>): number {
	return config.intervalMillis * Math.pow(config.intervalExponent, retry);
}

/**
 * Sleeps for the specified duration.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolves a partial retry configuration against the defaults and logs the
 * effective budget.
 */
export function resolveRetryConfig(
	retryConfig: RetryConfig | undefined,
): Required<RetryConfig> {
	const config: Required<RetryConfig> = {
		maxAttempts: retryConfig?.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
		intervalMillis:
			retryConfig?.intervalMillis ?? DEFAULT_RETRY_CONFIG.intervalMillis,
		intervalExponent:
			retryConfig?.intervalExponent ?? DEFAULT_RETRY_CONFIG.intervalExponent,
	};
	if (config.maxAttempts < 0) {
		throw new RangeError("retry.maxAttempts must not be negative");
	}
	if (config.maxAttempts === 0) {
		debug("maxAttempts is 0, retries disabled");
	}
	return config;
}
