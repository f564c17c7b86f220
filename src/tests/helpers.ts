import { vi } from "vitest";
import { HttpClient } from "../lib/client.js";
import { HttpSession } from "../lib/session.js";

export type RecordedCall = {
	url: URL;
	method: string;
	headers: Headers;
	body: RequestInit["body"];
};

type Scripted = Response | Error;

export function jsonResponse(
	body: unknown,
	status = 200,
	headers: Record<string, string> = {},
): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json", ...headers },
	});
}

export function emptyResponse(status = 204): Response {
	return new Response(null, { status });
}

/**
 * A session whose `fetch` answers with the scripted responses in order and
 * records every request it saw.
 */
export function scriptedSession(script: Scripted[]) {
	const calls: RecordedCall[] = [];
	const queue = [...script];
	const fetch = vi.fn(async (input: string | URL, init?: RequestInit) => {
		calls.push({
			url: new URL(String(input)),
			method: init?.method ?? "GET",
			headers: new Headers(init?.headers),
			body: init?.body,
		});
		const next = queue.shift();
		if (next === undefined) {
			throw new Error(`Unscripted request to ${String(input)}`);
		}
		if (next instanceof Error) {
			throw next;
		}
		return next;
	});
	const session = new HttpSession({ fetch });
	return { session, calls, fetch };
}

/** A client on a scripted session with retries disabled. */
export function scriptedClient(script: Scripted[], credential = "test-api-key") {
	const scripted = scriptedSession(script);
	const client = new HttpClient({
		credential,
		retry: { maxAttempts: 0 },
		session: scripted.session,
	});
	return { ...scripted, client };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
	const items: T[] = [];
	for await (const item of iterable) {
		items.push(item);
	}
	return items;
}
