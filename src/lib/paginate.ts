import createDebug from "debug";
import { isRecord } from "../utils.js";
import {
	type HttpMethod,
	type HttpResponse,
	type SendRequestOptions,
	sendRequest,
} from "./http.js";

const debug = createDebug("opencloud:paginate");

/** Response fields the next-page cursor is read from, in order. */
const CURSOR_FIELDS = ["nextPageCursor", "nextPageToken", "pageToken"] as const;

export type IterateRequestOptions = SendRequestOptions & {
	/** Response field holding the page's items. */
	dataKey: string;
	/** Query parameter the cursor is sent in. */
	cursorKey: string;
	/** Stop after this many items. No further page is requested once reached. */
	maxYields?: number;
	/** Called with every page response before its items are yielded. */
	postRequestHook?: (response: HttpResponse) => void;
};

/** Reads the next-page cursor from a page body. Empty strings count as absent. */
export function readCursor(body: unknown): string | undefined {
	if (!isRecord(body)) return undefined;
	for (const field of CURSOR_FIELDS) {
		const value = body[field];
		if (typeof value === "string" && value.length > 0) {
			return value;
		}
	}
	return undefined;
}

function readItems(body: unknown, dataKey: string): readonly unknown[] {
	if (!isRecord(body)) return [];
	const items = body[dataKey];
	return Array.isArray(items) ? items : [];
}

/**
 * Creates a lazy async iterable over every item of a cursor-paginated
 * endpoint. Pages are requested one at a time, only when the consumer needs
 * the next item.
 *
 * Iteration ends when a page has no cursor, when `maxYields` items have been
 * produced, or when the server hands back a cursor already used by this
 * iteration.
 *
 * @param map Converts each raw item into the value yielded to the caller.
 *
 * @example
 * ```ts
 * const keys = iterateRequest(
 *   "GET",
 *   `datastores/v1/universes/${universeId}/standard-datastores/datastore/entries`,
 *   { authorization: apiKey, expectedStatus: [200], dataKey: "keys", cursorKey: "cursor" },
 *   (entry) => entry,
 * );
 *
 * for await (const key of keys) {
 *   console.log(key);
 * }
 * ```
 */
export function iterateRequest<T>(
	method: HttpMethod,
	path: string,
	options: IterateRequestOptions,
	map: (item: unknown) => T,
): AsyncIterable<T> {
	const { dataKey, cursorKey, maxYields, postRequestHook, ...request } =
		options;

	return {
		[Symbol.asyncIterator]: async function* () {
			const seen = new Set<string>();
			let cursor: string | undefined;
			let yields = 0;

			while (maxYields === undefined || yields < maxYields) {
				debug({ path, cursor, yields });
				const response = await sendRequest(method, path, {
					...request,
					params: { ...request.params, [cursorKey]: cursor },
				});
				postRequestHook?.(response);

				for (const item of readItems(response.body, dataKey)) {
					yield map(item);
					yields++;
					if (maxYields !== undefined && yields >= maxYields) {
						return;
					}
				}

				const next = readCursor(response.body);
				if (next === undefined) {
					break;
				}
				if (seen.has(next)) {
					debug("cursor %s repeated, stopping", next);
					break;
				}
				seen.add(next);
				cursor = next;
			}
		},
	};
}
