import type { RequestOptions } from "./common.js";
import type { JsonValue } from "./datastore.js";
import { NotFoundError, OpenCloudError, PreconditionFailedError } from "./error.js";
import type { HttpClient } from "./lib/client.js";
import {
	isRecord,
	readArray,
	readDate,
	readOptionalString,
	readRecord,
	readString,
} from "./utils.js";

export type SortedMapEntry = {
	key: string;
	sortKey: number | string | undefined;
	value: unknown;
	etag: string;
	expiresAt: Date;
};

export type ListSortedMapKeysArgs = {
	descending?: boolean;
	limit?: number;
	/** Only keys greater than this one. */
	lowerBoundKey?: string | number;
	/** Only keys less than this one. */
	upperBoundKey?: string | number;
	lowerBoundSortKey?: string | number;
	upperBoundSortKey?: string | number;
};

export type SetSortedMapKeyArgs = {
	/** Seconds the entry lives, up to 3,888,000. */
	expirationSeconds: number;
	sortKey?: number | string;
	/** Fail if the key already exists. */
	exclusiveCreate?: boolean;
	/** Fail if the key doesn't exist yet. */
	exclusiveUpdate?: boolean;
};

function sortedMapEntryFrom(item: unknown, fallbackKey?: string): SortedMapEntry {
	const entry = readRecord(item, "items[]");
	const numeric = entry.numericSortKey;
	return {
		key:
			fallbackKey === undefined
				? readString(entry, "id")
				: (readOptionalString(entry, "id") ?? fallbackKey),
		sortKey:
			typeof numeric === "number"
				? numeric
				: readOptionalString(entry, "stringSortKey"),
		value: entry.value,
		etag: readString(entry, "etag"),
		expiresAt: readDate(entry, "expireTime"),
	};
}

function filterOperand(value: string | number): string {
	return typeof value === "string" ? `"${value}"` : String(value);
}

/**
 * A memory store sorted map in an experience.
 */
export class SortedMap {
	constructor(
		private readonly client: HttpClient,
		public readonly experienceId: number,
		public readonly name: string,
	) {}

	private get itemsPath(): string {
		return `/universes/${this.experienceId}/memory-store/sorted-maps/${encodeURIComponent(this.name)}/items`;
	}

	/**
	 * Lists the entries of the sorted map in key order.
	 */
	public listKeys(
		args: ListSortedMapKeysArgs = {},
		options?: RequestOptions,
	): AsyncIterable<SortedMapEntry> {
		const filter: string[] = [];
		if (args.lowerBoundKey !== undefined) {
			filter.push(`id > ${filterOperand(args.lowerBoundKey)}`);
		}
		if (args.upperBoundKey !== undefined) {
			filter.push(`id < ${filterOperand(args.upperBoundKey)}`);
		}
		if (args.lowerBoundSortKey !== undefined) {
			filter.push(`sortKey > ${filterOperand(args.lowerBoundSortKey)}`);
		}
		if (args.upperBoundSortKey !== undefined) {
			filter.push(`sortKey < ${filterOperand(args.upperBoundSortKey)}`);
		}

		return this.client.iterate(
			"GET",
			this.itemsPath,
			{
				params: {
					orderBy: args.descending ? "desc" : undefined,
					maxPageSize:
						args.limit !== undefined && args.limit < 100 ? args.limit : 100,
					filter: filter.length > 0 ? filter.join(" && ") : undefined,
				},
				expectedStatus: [200],
				dataKey: "items",
				cursorKey: "pageToken",
				maxYields: args.limit,
				signal: options?.signal,
			},
			(item) => sortedMapEntryFrom(item),
		);
	}

	public async getKey(key: string, options?: RequestOptions): Promise<SortedMapEntry> {
		const { body } = await this.client.request(
			"GET",
			`${this.itemsPath}/${encodeURIComponent(key)}`,
			{ expectedStatus: [200], signal: options?.signal },
		);
		return sortedMapEntryFrom(body, key);
	}

	/**
	 * Creates or updates a key.
	 *
	 * @throws PreconditionFailedError when `exclusiveCreate` or
	 * `exclusiveUpdate` does not hold.
	 */
	public async setKey(
		key: string,
		value: JsonValue,
		args: SetSortedMapKeyArgs,
		options?: RequestOptions,
	): Promise<SortedMapEntry> {
		if (args.exclusiveCreate && args.exclusiveUpdate) {
			throw new TypeError(
				"exclusiveCreate and exclusiveUpdate can not both be true",
			);
		}
		const payload: Record<string, JsonValue> = {
			id: key,
			value,
			ttl: `${args.expirationSeconds}s`,
		};
		if (args.sortKey !== undefined) {
			payload[typeof args.sortKey === "string" ? "stringSortKey" : "numericSortKey"] =
				args.sortKey;
		}

		const { status, body } = args.exclusiveCreate
			? await this.client.request("POST", this.itemsPath, {
					params: { id: key },
					json: payload,
					expectedStatus: [200, 409],
					signal: options?.signal,
				})
			: await this.client.request(
					"PATCH",
					`${this.itemsPath}/${encodeURIComponent(key)}`,
					{
						params: { allowMissing: !args.exclusiveUpdate },
						json: payload,
						expectedStatus: [200, 404, 409],
						signal: options?.signal,
					},
				);

		if (status === 404) {
			if (args.exclusiveUpdate) {
				throw new PreconditionFailedError({
					message: "The key does not exist.",
					status,
					body,
				});
			}
			throw new NotFoundError({ body });
		}
		if (status === 409) {
			if (isRecord(body) && body.error === "ALREADY_EXISTS") {
				throw new PreconditionFailedError({
					message: "The key already exists.",
					status,
					body,
				});
			}
			throw new OpenCloudError({
				message: "Unexpected HTTP 409",
				status,
				body,
				origin: "server",
			});
		}
		return sortedMapEntryFrom(body, key);
	}

	/**
	 * Deletes a key. With `etag`, only deletes while the entry still has that
	 * etag.
	 */
	public async removeKey(
		key: string,
		args: { etag?: string } = {},
		options?: RequestOptions,
	): Promise<void> {
		await this.client.request(
			"DELETE",
			`${this.itemsPath}/${encodeURIComponent(key)}`,
			{
				params: { etag: args.etag },
				expectedStatus: [200, 204],
				signal: options?.signal,
			},
		);
	}
}

export type ReadQueueItemsArgs = {
	/** @default 1 */
	count?: number;
	/** Return nothing unless `count` items are available. */
	allOrNothing?: boolean;
	/**
	 * Seconds the read items stay hidden from other reads.
	 * @default 30
	 */
	invisibilitySeconds?: number;
};

/**
 * A memory store queue in an experience.
 */
export class MemoryStoreQueue {
	constructor(
		private readonly client: HttpClient,
		public readonly experienceId: number,
		public readonly name: string,
	) {}

	private get queuePath(): string {
		return `/universes/${this.experienceId}/memory-store/queues/${encodeURIComponent(this.name)}/items`;
	}

	/**
	 * Adds a value to the queue. Higher priorities leave the queue first.
	 */
	public async addItem(
		value: JsonValue,
		args: { expirationSeconds?: number; priority?: number } = {},
		options?: RequestOptions,
	): Promise<void> {
		await this.client.request("POST", `${this.queuePath}:add`, {
			json: {
				data: value,
				ttl: `${args.expirationSeconds ?? 30}s`,
				priority: args.priority ?? 0,
			},
			expectedStatus: [200],
			signal: options?.signal,
		});
	}

	/**
	 * Reads values from the queue.
	 *
	 * @returns The values and the read id to pass to
	 * {@link MemoryStoreQueue.removeItems}. An empty queue gives no values and
	 * no read id.
	 */
	public async readItems(
		args: ReadQueueItemsArgs = {},
		options?: RequestOptions,
	): Promise<{ items: unknown[]; readId: string | undefined }> {
		const { status, body } = await this.client.request(
			"GET",
			`${this.queuePath}:read`,
			{
				params: {
					count: args.count ?? 1,
					allOrNothing: args.allOrNothing ?? false,
					invisibilityTimeoutSeconds: args.invisibilitySeconds ?? 30,
				},
				expectedStatus: [200, 204],
				signal: options?.signal,
			},
		);
		if (status === 204) {
			return { items: [], readId: undefined };
		}
		const read = readRecord(body);
		return { items: readArray(read, "data"), readId: readString(read, "id") };
	}

	/** Permanently removes the values of an earlier read. */
	public async removeItems(readId: string, options?: RequestOptions): Promise<void> {
		await this.client.request("POST", `${this.queuePath}:discard`, {
			params: { readId },
			json: {},
			expectedStatus: [200],
			signal: options?.signal,
		});
	}
}
