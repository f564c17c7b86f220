import { afterEach, describe, expect, it, vi } from "vitest";
import { OperationTimeoutError } from "../error.js";
import { Operation } from "../lib/operation.js";
import { readString } from "../utils.js";
import { jsonResponse, scriptedSession } from "./helpers.js";

describe("Operation", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("reports a running job as not done", async () => {
		const { session, calls } = scriptedSession([jsonResponse({ done: false })]);
		const operation = new Operation(
			"/universes/1/memory-store/operations/abc",
			{ kind: "fixed", value: true },
			{ session },
		);

		await expect(operation.fetchStatus()).resolves.toEqual({ done: false });
		expect(operation.isDone).toBe(false);
		expect(calls[0]?.url.pathname).toBe(
			"/cloud/v2/universes/1/memory-store/operations/abc",
		);
	});

	it("materializes the terminal response", async () => {
		const { session } = scriptedSession([
			jsonResponse({ done: true, response: { imageUri: "https://example.com/a.png" } }),
		]);
		const operation = new Operation(
			"/operations/1",
			{
				kind: "materialize",
				materialize: (response) => readString(response, "imageUri"),
			},
			{ session },
		);

		await expect(operation.fetchStatus()).resolves.toEqual({
			done: true,
			value: "https://example.com/a.png",
		});
		expect(operation.isDone).toBe(true);
	});

	it("polls until the job is done", async () => {
		const { session, fetch } = scriptedSession([
			jsonResponse({ done: false }),
			jsonResponse({}),
			jsonResponse({ done: true, response: { assetId: "7" } }),
		]);
		const operation = new Operation(
			"/operations/1",
			{
				kind: "materialize",
				materialize: (response) => Number(readString(response, "assetId")),
			},
			{ session },
		);

		await expect(operation.wait()).resolves.toBe(7);
		expect(fetch).toHaveBeenCalledTimes(3);
	});

	it("returns a cached response without polling", async () => {
		const { session, fetch } = scriptedSession([]);
		const materialize = vi.fn((response: Record<string, unknown>) =>
			readString(response, "imageUri"),
		);
		const operation = new Operation(
			"/operations/1",
			{ kind: "materialize", materialize },
			{ session },
			{ imageUri: "https://example.com/cached.png" },
		);

		expect(operation.isDone).toBe(true);
		await expect(operation.wait()).resolves.toBe("https://example.com/cached.png");
		await expect(operation.wait()).resolves.toBe("https://example.com/cached.png");
		expect(fetch).not.toHaveBeenCalled();
		expect(materialize).toHaveBeenCalledTimes(1);
	});

	it("resolves fixed operations to their value", async () => {
		const { session } = scriptedSession([jsonResponse({ done: true })]);
		const operation = new Operation<true>(
			"/operations/1",
			{ kind: "fixed", value: true },
			{ session },
		);

		await expect(operation.wait()).resolves.toBe(true);
	});

	it("times out once the deadline passes", async () => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
		const { session, fetch } = scriptedSession(
			Array.from({ length: 10 }, () => jsonResponse({ done: false })),
		);
		const operation = new Operation(
			"/operations/1",
			{ kind: "fixed", value: true },
			{ session },
		);

		const result = operation
			.wait({ timeoutSeconds: 5, intervalSeconds: 1, intervalExponent: 1 })
			.catch((error: unknown) => error);

		await vi.advanceTimersByTimeAsync(4999);
		expect(fetch).toHaveBeenCalledTimes(5);

		await vi.advanceTimersByTimeAsync(1);
		const error = await result;
		expect(error).toBeInstanceOf(OperationTimeoutError);
		expect(error).toMatchObject({
			message: "Operation did not complete within 5 seconds",
		});
		expect(fetch).toHaveBeenCalledTimes(6);
	});

	it("holds a zero interval at the minimum", async () => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
		const { session, fetch } = scriptedSession([
			jsonResponse({ done: false }),
			jsonResponse({ done: false }),
			jsonResponse({ done: true }),
		]);
		const operation = new Operation(
			"/operations/1",
			{ kind: "fixed", value: true },
			{ session },
		);

		const result = operation.wait({
			timeoutSeconds: null,
			intervalSeconds: 0,
			minIntervalSeconds: 2,
		});

		await vi.advanceTimersByTimeAsync(1999);
		expect(fetch).toHaveBeenCalledTimes(1);
		await vi.advanceTimersByTimeAsync(1);
		expect(fetch).toHaveBeenCalledTimes(2);
		await vi.advanceTimersByTimeAsync(1999);
		expect(fetch).toHaveBeenCalledTimes(2);
		await vi.advanceTimersByTimeAsync(1);
		await expect(result).resolves.toBe(true);
		expect(fetch).toHaveBeenCalledTimes(3);
	});

	it("waits without polling once a status check saw it finish", async () => {
		const { session, fetch } = scriptedSession([
			jsonResponse({ done: true, response: { assetId: "7" } }),
		]);
		const operation = new Operation(
			"/operations/1",
			{
				kind: "materialize",
				materialize: (response) => Number(readString(response, "assetId")),
			},
			{ session },
		);

		await operation.fetchStatus();
		await expect(operation.wait()).resolves.toBe(7);
		expect(fetch).toHaveBeenCalledTimes(1);
	});
});
