import { describe, expect, it } from "vitest";
import { NotFoundError } from "../error.js";
import { iterateRequest, readCursor } from "../lib/paginate.js";
import { collect, jsonResponse, scriptedSession } from "./helpers.js";

const identity = (item: unknown) => item;

describe("readCursor", () => {
	it("prefers nextPageCursor, then nextPageToken, then pageToken", () => {
		expect(readCursor({ nextPageCursor: "a", nextPageToken: "b" })).toBe("a");
		expect(readCursor({ nextPageToken: "b", pageToken: "c" })).toBe("b");
		expect(readCursor({ pageToken: "c" })).toBe("c");
	});

	it("treats empty strings and non-objects as no cursor", () => {
		expect(readCursor({ nextPageCursor: "" })).toBeUndefined();
		expect(readCursor("text")).toBeUndefined();
	});
});

describe("iterateRequest", () => {
	it("follows cursors until a page has none", async () => {
		const { session, calls } = scriptedSession([
			jsonResponse({ keys: ["a", "b"], nextPageCursor: "c1" }),
			jsonResponse({ keys: ["c"], nextPageCursor: "" }),
		]);

		const items = await collect(
			iterateRequest(
				"GET",
				"datastores/v1/x",
				{ session, dataKey: "keys", cursorKey: "cursor", params: { prefix: "p" } },
				identity,
			),
		);

		expect(items).toEqual(["a", "b", "c"]);
		expect(calls).toHaveLength(2);
		expect(calls[0]?.url.searchParams.get("cursor")).toBeNull();
		expect(calls[0]?.url.searchParams.get("prefix")).toBe("p");
		expect(calls[1]?.url.searchParams.get("cursor")).toBe("c1");
		expect(calls[1]?.url.searchParams.get("prefix")).toBe("p");
	});

	it("stops at maxYields without requesting another page", async () => {
		const { session, calls } = scriptedSession([
			jsonResponse({ items: [1, 2], nextPageToken: "t1" }),
			jsonResponse({ items: [3, 4], nextPageToken: "t2" }),
		]);

		const items = await collect(
			iterateRequest(
				"GET",
				"/items",
				{ session, dataKey: "items", cursorKey: "pageToken", maxYields: 3 },
				identity,
			),
		);

		expect(items).toEqual([1, 2, 3]);
		expect(calls).toHaveLength(2);
	});

	it("stops at maxYields reached exactly at a page boundary", async () => {
		const { session, calls } = scriptedSession([
			jsonResponse({ items: [1, 2], nextPageToken: "t1" }),
		]);

		const items = await collect(
			iterateRequest(
				"GET",
				"/items",
				{ session, dataKey: "items", cursorKey: "pageToken", maxYields: 2 },
				identity,
			),
		);

		expect(items).toEqual([1, 2]);
		expect(calls).toHaveLength(1);
	});

	it("keeps going past empty pages that carry a cursor", async () => {
		const { session } = scriptedSession([
			jsonResponse({ items: [], nextPageToken: "t1" }),
			jsonResponse({ items: ["x"] }),
		]);

		const items = await collect(
			iterateRequest(
				"GET",
				"/items",
				{ session, dataKey: "items", cursorKey: "pageToken" },
				identity,
			),
		);

		expect(items).toEqual(["x"]);
	});

	it("stops when the server repeats a cursor", async () => {
		const { session, calls } = scriptedSession([
			jsonResponse({ items: [1], nextPageToken: "same" }),
			jsonResponse({ items: [2], nextPageToken: "same" }),
		]);

		const items = await collect(
			iterateRequest(
				"GET",
				"/items",
				{ session, dataKey: "items", cursorKey: "pageToken" },
				identity,
			),
		);

		expect(items).toEqual([1, 2]);
		expect(calls).toHaveLength(2);
	});

	it("does not send a request until iterated", async () => {
		const { session, fetch } = scriptedSession([jsonResponse({ items: [] })]);

		const iterable = iterateRequest(
			"GET",
			"/items",
			{ session, dataKey: "items", cursorKey: "pageToken" },
			identity,
		);

		expect(fetch).not.toHaveBeenCalled();
		await collect(iterable);
		expect(fetch).toHaveBeenCalledTimes(1);
	});

	it("propagates request errors to the consumer", async () => {
		const { session } = scriptedSession([
			jsonResponse({ items: [1], nextPageToken: "t1" }),
			jsonResponse({ message: "gone" }, 404),
		]);
		const seen: unknown[] = [];

		const run = async () => {
			for await (const item of iterateRequest(
				"GET",
				"/items",
				{
					session,
					expectedStatus: [200],
					dataKey: "items",
					cursorKey: "pageToken",
				},
				identity,
			)) {
				seen.push(item);
			}
		};

		await expect(run()).rejects.toBeInstanceOf(NotFoundError);
		expect(seen).toEqual([1]);
	});

	it("maps every item and calls the post-request hook per page", async () => {
		const { session } = scriptedSession([
			jsonResponse({ items: [{ n: 1 }], nextPageToken: "t1" }),
			jsonResponse({ items: [{ n: 2 }] }),
		]);
		const statuses: number[] = [];

		const items = await collect(
			iterateRequest(
				"GET",
				"/items",
				{
					session,
					dataKey: "items",
					cursorKey: "pageToken",
					postRequestHook: (response) => statuses.push(response.status),
				},
				(item) => JSON.stringify(item),
			),
		);

		expect(items).toEqual(['{"n":1}', '{"n":2}']);
		expect(statuses).toEqual([200, 200]);
	});
});
