import { describe, expect, it } from "vitest";
import { DataStore, OrderedDataStore } from "../datastore.js";
import { NotFoundError, PreconditionFailedError } from "../error.js";
import { collect, emptyResponse, jsonResponse, scriptedClient } from "./helpers.js";

const ENTRY_HEADERS = {
	"roblox-entry-version": "08DC0000000001",
	"roblox-entry-created-time": "2024-01-01T00:00:00.000Z",
	"roblox-entry-version-created-time": "2024-02-01T00:00:00.000Z",
	"roblox-entry-userids": "[1,2]",
	"roblox-entry-attributes": '{"team":"red"}',
};

describe("DataStore", () => {
	it("fetches an entry with its info from the response headers", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({ coins: 10 }, 200, ENTRY_HEADERS),
		]);
		const store = new DataStore(client, 42, "players");

		const { value, info } = await store.getEntry("user_1");

		expect(value).toEqual({ coins: 10 });
		expect(info).toEqual({
			version: "08DC0000000001",
			created: new Date("2024-01-01T00:00:00.000Z"),
			updated: new Date("2024-02-01T00:00:00.000Z"),
			users: [1, 2],
			metadata: { team: "red" },
		});
		const url = calls[0]?.url;
		expect(url?.pathname).toBe(
			"/datastores/v1/universes/42/standard-datastores/datastore/entries/entry",
		);
		expect(url?.searchParams.get("datastoreName")).toBe("players");
		expect(url?.searchParams.get("scope")).toBe("global");
		expect(url?.searchParams.get("entryKey")).toBe("user_1");
		expect(calls[0]?.headers.get("x-api-key")).toBe("test-api-key");
	});

	it("writes an entry and returns the new version", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({
				version: "08DC0000000002",
				deleted: false,
				contentLength: 12,
				createdTime: "2024-03-01T00:00:00.000Z",
				objectCreatedTime: "2024-01-01T00:00:00.000Z",
			}),
		]);
		const store = new DataStore(client, 42, "players");

		const version = await store.setEntry("user_1", { coins: 11 }, { users: [5] });

		expect(version).toEqual({
			version: "08DC0000000002",
			deleted: false,
			contentLength: 12,
			created: new Date("2024-03-01T00:00:00.000Z"),
			keyCreated: new Date("2024-01-01T00:00:00.000Z"),
			key: "user_1",
			scope: "global",
		});
		expect(calls[0]?.method).toBe("POST");
		expect(calls[0]?.body).toBe('{"coins":11}');
		expect(calls[0]?.headers.get("roblox-entry-userids")).toBe("[5]");
		expect(calls[0]?.headers.get("roblox-entry-attributes")).toBe("{}");
		expect(calls[0]?.url.searchParams.get("exclusiveCreate")).toBe("false");
		expect(calls[0]?.url.searchParams.has("matchVersion")).toBe(false);
	});

	it("throws PreconditionFailedError with the stored entry on 412", async () => {
		const { client } = scriptedClient([
			jsonResponse({ coins: 3 }, 412, ENTRY_HEADERS),
		]);
		const store = new DataStore(client, 42, "players");

		const error = await store
			.setEntry("user_1", { coins: 11 }, { exclusiveCreate: true })
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(PreconditionFailedError);
		expect(error).toMatchObject({
			message: "A value already exists for this key.",
			status: 412,
			value: { coins: 3 },
			info: { version: "08DC0000000001", users: [1, 2] },
		});
	});

	it("rejects exclusiveCreate together with previousVersion", async () => {
		const { client, fetch } = scriptedClient([]);
		const store = new DataStore(client, 42, "players");

		await expect(
			store.setEntry("k", 1, { exclusiveCreate: true, previousVersion: "v" }),
		).rejects.toThrow(TypeError);
		expect(fetch).not.toHaveBeenCalled();
	});

	it("requires scope/key syntax without a fixed scope", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse(5, 200, ENTRY_HEADERS),
		]);
		const store = new DataStore(client, 42, "players", null);

		await expect(store.getEntry("user_1")).rejects.toThrow(
			"'scope/key' syntax expected for key.",
		);

		const { value } = await store.getEntry("season2/user_1");
		expect(value).toBe(5);
		expect(calls[0]?.url.searchParams.get("scope")).toBe("season2");
		expect(calls[0]?.url.searchParams.get("entryKey")).toBe("user_1");
	});

	it("lists keys across pages", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({
				keys: [
					{ key: "a", scope: "global" },
					{ key: "b", scope: "global" },
				],
				nextPageCursor: "next",
			}),
			jsonResponse({ keys: [{ key: "c", scope: "global" }] }),
		]);
		const store = new DataStore(client, 42, "players");

		const keys = await collect(store.listKeys({ prefix: "a" }));

		expect(keys.map((entry) => entry.key)).toEqual(["a", "b", "c"]);
		expect(calls[0]?.url.searchParams.get("prefix")).toBe("a");
		expect(calls[1]?.url.searchParams.get("cursor")).toBe("next");
	});

	it("removes an entry", async () => {
		const { client, calls } = scriptedClient([emptyResponse(204)]);
		const store = new DataStore(client, 42, "players");

		await store.removeEntry("user_1");

		expect(calls[0]?.method).toBe("DELETE");
	});

	it("maps an invalid version id to NotFoundError", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({ message: "Invalid version id." }, 400),
		]);
		const store = new DataStore(client, 42, "players", "season2");

		await expect(store.getVersion("user_1", "nope")).rejects.toBeInstanceOf(
			NotFoundError,
		);
		expect(calls[0]?.url.pathname).toBe(
			"/cloud/v2/universes/42/data-stores/players/scopes/season2/entries/user_1@nope",
		);
	});

	it("fetches the version current at a point in time", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({
				value: { coins: 1 },
				revisionId: "08DC0000000001",
				createTime: "2024-01-01T00:00:00Z",
				revisionCreateTime: "2024-01-02T00:00:00Z",
				users: ["users/9"],
				attributes: { team: "blue" },
			}),
		]);
		const store = new DataStore(client, 42, "players");

		const { value, info } = await store.getVersion(
			"user_1",
			new Date("2024-01-03T12:00:00.500Z"),
		);

		expect(value).toEqual({ coins: 1 });
		expect(info.users).toEqual([9]);
		expect(info.metadata).toEqual({ team: "blue" });
		expect(calls[0]?.url.pathname).toBe(
			"/cloud/v2/universes/42/data-stores/players/entries/user_1@latest%3A2024-01-03T12%3A00%3A00Z",
		);
	});
});

describe("OrderedDataStore", () => {
	it("lists entries by value", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({
				entries: [
					{ id: "a", value: 30 },
					{ id: "b", value: "20" },
				],
			}),
		]);
		const store = new OrderedDataStore(client, 42, "leaderboard");

		const entries = await collect(store.sortKeys({ min: 10, max: 50 }));

		expect(entries).toEqual([
			{ key: "a", scope: "global", value: 30 },
			{ key: "b", scope: "global", value: 20 },
		]);
		const params = calls[0]?.url.searchParams;
		expect(params?.get("order_by")).toBe("desc");
		expect(params?.get("filter")).toBe("entry >= 10 && entry <= 50");
		expect(params?.get("max_page_size")).toBe("100");
	});

	it("refuses to list without a fixed scope", () => {
		const { client } = scriptedClient([]);
		const store = new OrderedDataStore(client, 42, "leaderboard", null);

		expect(() => store.sortKeys()).toThrow(TypeError);
	});

	it("maps an existing entry on exclusive create to PreconditionFailedError", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({ message: "Entry already exists." }, 400),
		]);
		const store = new OrderedDataStore(client, 42, "leaderboard");

		await expect(
			store.setEntry("a", 5, { exclusiveCreate: true }),
		).rejects.toBeInstanceOf(PreconditionFailedError);
		expect(calls[0]?.method).toBe("POST");
		expect(calls[0]?.url.searchParams.get("id")).toBe("a");
	});

	it("maps a missing entry on exclusive update to PreconditionFailedError", async () => {
		const { client, calls } = scriptedClient([jsonResponse({}, 404)]);
		const store = new OrderedDataStore(client, 42, "leaderboard");

		await expect(
			store.setEntry("a", 5, { exclusiveUpdate: true }),
		).rejects.toMatchObject({
			name: "PreconditionFailedError",
			message: "The entry does not exist.",
		});
		expect(calls[0]?.method).toBe("PATCH");
		expect(calls[0]?.url.searchParams.get("allow_missing")).toBe("false");
	});

	it("increments an entry", async () => {
		const { client, calls } = scriptedClient([jsonResponse({ id: "a", value: 8 })]);
		const store = new OrderedDataStore(client, 42, "leaderboard");

		await expect(store.incrementEntry("a", 3)).resolves.toBe(8);
		expect(calls[0]?.url.pathname).toBe(
			"/ordered-data-stores/v1/universes/42/orderedDataStores/leaderboard/scopes/global/entries/a:increment",
		);
		expect(calls[0]?.body).toBe('{"amount":3}');
	});
});
