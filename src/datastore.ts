import type { RequestOptions } from "./common.js";
import {
	errorMessageOf,
	NotFoundError,
	OpenCloudError,
	PreconditionFailedError,
} from "./error.js";
import type { HttpClient } from "./lib/client.js";
import {
	type JsonObject,
	idFromPath,
	isRecord,
	readArray,
	readBoolean,
	readDate,
	readNumber,
	readOptionalDate,
	readOptionalNumber,
	readRecord,
	readString,
	splitScopedKey,
} from "./utils.js";

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

/** Version, timestamps, users and metadata of a data store entry. */
export type EntryInfo = {
	version: string;
	/** When the key was created. */
	created: Date;
	/** When the key was last written, or when this version was created. */
	updated: Date;
	/** User ids attached to the entry. */
	users: number[];
	metadata: Record<string, unknown>;
};

export type EntryVersion = {
	version: string;
	deleted: boolean;
	contentLength: number;
	created: Date | undefined;
	keyCreated: Date | undefined;
	key: string;
	scope: string;
};

export type ListedEntry = {
	key: string;
	scope: string;
};

export type SetEntryArgs = {
	users?: number[];
	metadata?: Record<string, JsonValue>;
	/** Fail with {@link PreconditionFailedError} when the key already has a value. */
	exclusiveCreate?: boolean;
	/** Fail with {@link PreconditionFailedError} unless this is the current version. */
	previousVersion?: string;
};

export type ListVersionsArgs = {
	after?: Date;
	before?: Date;
	limit?: number;
	/** @default true */
	descending?: boolean;
};

function parseJsonHeader(headers: Headers, name: string): unknown {
	const raw = headers.get(name);
	if (!raw) return undefined;
	try {
		return JSON.parse(raw);
	} catch (error) {
		throw new OpenCloudError({
			message: `Malformed ${name} header`,
			origin: "sdk",
			cause: error,
		});
	}
}

function requireHeader(headers: Headers, name: string): string {
	const value = headers.get(name);
	if (value === null) {
		throw new OpenCloudError({
			message: `Response is missing the ${name} header`,
			origin: "sdk",
		});
	}
	return value;
}

/** Reads {@link EntryInfo} from the `roblox-entry-*` response headers. */
export function entryInfoFromHeaders(headers: Headers): EntryInfo {
	const metadata = parseJsonHeader(headers, "roblox-entry-attributes");
	const users = parseJsonHeader(headers, "roblox-entry-userids");
	return {
		version: requireHeader(headers, "roblox-entry-version"),
		created: new Date(requireHeader(headers, "roblox-entry-created-time")),
		updated: new Date(
			requireHeader(headers, "roblox-entry-version-created-time"),
		),
		users: Array.isArray(users)
			? users.filter((user): user is number => typeof user === "number")
			: [],
		metadata: isRecord(metadata) ? metadata : {},
	};
}

function entryVersionFrom(
	entry: JsonObject,
	key: string,
	scope: string,
): EntryVersion {
	return {
		version: readString(entry, "version"),
		deleted: readBoolean(entry, "deleted"),
		contentLength: readOptionalNumber(entry, "contentLength") ?? 0,
		created: readOptionalDate(entry, "createdTime"),
		keyCreated: readOptionalDate(entry, "objectCreatedTime"),
		key,
		scope,
	};
}

/** Formats a point in time the way `latest:` version selectors expect. */
function latestVersionAt(time: Date): string {
	return `latest:${time.toISOString().split(".")[0]}Z`;
}

/**
 * A standard data store in an experience.
 *
 * With `scope` set to `null`, every key must be given as `scope/key`.
 */
export class DataStore {
	constructor(
		private readonly client: HttpClient,
		public readonly experienceId: number,
		public readonly name: string,
		public readonly scope: string | null = "global",
		/** Creation time, when known from a data store listing. */
		public readonly created?: Date,
	) {}

	private get entriesPath(): string {
		return `datastores/v1/universes/${this.experienceId}/standard-datastores/datastore/entries`;
	}

	/**
	 * Lists the keys of the data store, optionally restricted to a prefix.
	 *
	 * @param args.prefix Only keys starting with this prefix.
	 * @param args.limit Maximum number of keys to yield.
	 */
	public listKeys(
		args: { prefix?: string; limit?: number } = {},
		options?: RequestOptions,
	): AsyncIterable<ListedEntry> {
		return this.client.iterate(
			"GET",
			this.entriesPath,
			{
				params: {
					datastoreName: this.name,
					scope: this.scope,
					AllScopes: this.scope === null,
					prefix: args.prefix ?? "",
				},
				expectedStatus: [200],
				dataKey: "keys",
				cursorKey: "cursor",
				maxYields: args.limit,
				signal: options?.signal,
			},
			(item) => {
				const entry = readRecord(item, "keys[]");
				return {
					key: readString(entry, "key"),
					scope: readString(entry, "scope"),
				};
			},
		);
	}

	/**
	 * Fetches the current value of a key.
	 *
	 * @returns The decoded value and its {@link EntryInfo}.
	 */
	public async getEntry(
		key: string,
		options?: RequestOptions,
	): Promise<{ value: unknown; info: EntryInfo }> {
		const target = splitScopedKey(this.scope, key);
		const { body, headers } = await this.client.request(
			"GET",
			`${this.entriesPath}/entry`,
			{
				params: {
					datastoreName: this.name,
					scope: target.scope,
					entryKey: target.key,
				},
				expectedStatus: [200],
				signal: options?.signal,
			},
		);
		return { value: body, info: entryInfoFromHeaders(headers) };
	}

	/**
	 * Writes the value of a key.
	 *
	 * @throws PreconditionFailedError when `exclusiveCreate` or
	 * `previousVersion` does not hold. The error carries the stored value and
	 * its {@link EntryInfo}.
	 */
	public async setEntry(
		key: string,
		value: JsonValue,
		args: SetEntryArgs = {},
		options?: RequestOptions,
	): Promise<EntryVersion> {
		if (args.previousVersion && args.exclusiveCreate) {
			throw new TypeError(
				"previousVersion and exclusiveCreate are mutually exclusive.",
			);
		}
		const target = splitScopedKey(this.scope, key);
		const { status, body, headers } = await this.client.request(
			"POST",
			`${this.entriesPath}/entry`,
			{
				headers: {
					"roblox-entry-userids": JSON.stringify(args.users ?? []),
					"roblox-entry-attributes": JSON.stringify(args.metadata ?? {}),
				},
				json: value,
				params: {
					datastoreName: this.name,
					scope: target.scope,
					entryKey: target.key,
					exclusiveCreate: args.exclusiveCreate ?? false,
					matchVersion: args.previousVersion,
				},
				expectedStatus: [200, 412],
				signal: options?.signal,
			},
		);

		if (status === 412) {
			throw new PreconditionFailedError<unknown, EntryInfo>({
				message: args.exclusiveCreate
					? "A value already exists for this key."
					: args.previousVersion
						? `The current version is not '${args.previousVersion}'`
						: "Precondition failed.",
				body,
				value: body,
				info: entryInfoFromHeaders(headers),
			});
		}

		return entryVersionFrom(readRecord(body), target.key, target.scope);
	}

	/**
	 * Adds `delta` to a numeric entry. Negative deltas decrement it.
	 *
	 * @returns The new value and its {@link EntryInfo}.
	 */
	public async incrementEntry(
		key: string,
		delta: number,
		args: Pick<SetEntryArgs, "users" | "metadata"> = {},
		options?: RequestOptions,
	): Promise<{ value: unknown; info: EntryInfo }> {
		const target = splitScopedKey(this.scope, key);
		const { body, headers } = await this.client.request(
			"POST",
			`${this.entriesPath}/entry/increment`,
			{
				headers: {
					"roblox-entry-userids": JSON.stringify(args.users ?? []),
					"roblox-entry-attributes": JSON.stringify(args.metadata ?? {}),
				},
				params: {
					datastoreName: this.name,
					scope: target.scope,
					entryKey: target.key,
					incrementBy: delta,
				},
				expectedStatus: [200],
				signal: options?.signal,
			},
		);
		return { value: body, info: entryInfoFromHeaders(headers) };
	}

	public async removeEntry(key: string, options?: RequestOptions): Promise<void> {
		const target = splitScopedKey(this.scope, key);
		await this.client.request("DELETE", `${this.entriesPath}/entry`, {
			params: {
				datastoreName: this.name,
				scope: target.scope,
				entryKey: target.key,
			},
			expectedStatus: [204],
			signal: options?.signal,
		});
	}

	/**
	 * Lists the stored versions of a key, newest first unless
	 * `descending` is false.
	 */
	public listVersions(
		key: string,
		args: ListVersionsArgs = {},
		options?: RequestOptions,
	): AsyncIterable<EntryVersion> {
		const target = splitScopedKey(this.scope, key);
		return this.client.iterate(
			"GET",
			`${this.entriesPath}/versions`,
			{
				params: {
					datastoreName: this.name,
					scope: target.scope,
					entryKey: target.key,
					sortOrder: args.descending === false ? "Ascending" : "Descending",
					startTime: args.after?.toISOString(),
					endTime: args.before?.toISOString(),
				},
				expectedStatus: [200],
				dataKey: "versions",
				cursorKey: "cursor",
				maxYields: args.limit,
				signal: options?.signal,
			},
			(item) =>
				entryVersionFrom(readRecord(item, "versions[]"), target.key, target.scope),
		);
	}

	/**
	 * Fetches the value of a key at a version id, or the latest version at a
	 * point in time.
	 *
	 * @throws NotFoundError when the version does not exist.
	 */
	public async getVersion(
		key: string,
		version: string | Date,
		options?: RequestOptions,
	): Promise<{ value: unknown; info: EntryInfo }> {
		const target = splitScopedKey(this.scope, key);
		const selector =
			typeof version === "string" ? version : latestVersionAt(version);
		const scopePath =
			target.scope === "global"
				? ""
				: `/scopes/${encodeURIComponent(target.scope)}`;
		const { status, body } = await this.client.request(
			"GET",
			`/universes/${this.experienceId}/data-stores/${encodeURIComponent(this.name)}${scopePath}/entries/${encodeURIComponent(target.key)}@${encodeURIComponent(selector)}`,
			{ expectedStatus: [200, 400], signal: options?.signal },
		);

		if (status === 400) {
			const message = errorMessageOf(body);
			if (message === "Invalid version id.") {
				throw new NotFoundError({ message, body });
			}
			throw new OpenCloudError({
				message: message ?? "Unexpected HTTP 400",
				status,
				body,
				origin: "server",
			});
		}

		const entry = readRecord(body);
		const attributes = entry.attributes;
		return {
			value: entry.value,
			info: {
				version: readString(entry, "revisionId"),
				created: readDate(entry, "createTime"),
				updated: readDate(entry, "revisionCreateTime"),
				users: readArray(entry, "users").map((user) =>
					idFromPath(typeof user === "string" ? user : String(user)),
				),
				metadata: isRecord(attributes) ? attributes : {},
			},
		};
	}
}

/** An entry of an ordered data store. */
export type SortedEntry = {
	key: string;
	scope: string;
	value: number;
};

export type SortKeysArgs = {
	/** Largest values first. @default true */
	descending?: boolean;
	limit?: number;
	min?: number;
	max?: number;
};

/**
 * An ordered data store, whose integer entries can be listed by value.
 *
 * With `scope` set to `null`, every key must be given as `scope/key`.
 */
export class OrderedDataStore {
	constructor(
		private readonly client: HttpClient,
		public readonly experienceId: number,
		public readonly name: string,
		public readonly scope: string | null = "global",
	) {}

	private entriesPath(scope: string): string {
		return `ordered-data-stores/v1/universes/${this.experienceId}/orderedDataStores/${encodeURIComponent(this.name)}/scopes/${encodeURIComponent(scope)}/entries`;
	}

	/**
	 * Lists entries ordered by value. Requires a fixed scope.
	 */
	public sortKeys(
		args: SortKeysArgs = {},
		options?: RequestOptions,
	): AsyncIterable<SortedEntry> {
		const scope = this.scope;
		if (scope === null) {
			throw new TypeError("scope is required to list keys with OrderedDataStore.");
		}
		const { min, max, limit } = args;
		if (min !== undefined && max !== undefined && min > max) {
			throw new RangeError("min must not be greater than max.");
		}
		const filter = [
			min !== undefined ? `entry >= ${min}` : undefined,
			max !== undefined ? `entry <= ${max}` : undefined,
		]
			.filter((part) => part !== undefined)
			.join(" && ");

		return this.client.iterate(
			"GET",
			this.entriesPath(scope),
			{
				params: {
					max_page_size: limit !== undefined && limit < 100 ? limit : 100,
					order_by: args.descending === false ? undefined : "desc",
					filter: filter || undefined,
				},
				expectedStatus: [200],
				dataKey: "entries",
				cursorKey: "page_token",
				maxYields: limit,
				signal: options?.signal,
			},
			(item) => {
				const entry = readRecord(item, "entries[]");
				return {
					key: readString(entry, "id"),
					scope,
					value: readNumber(entry, "value"),
				};
			},
		);
	}

	public async getEntry(key: string, options?: RequestOptions): Promise<number> {
		const target = splitScopedKey(this.scope, key);
		const { body } = await this.client.request(
			"GET",
			`${this.entriesPath(target.scope)}/${encodeURIComponent(target.key)}`,
			{ expectedStatus: [200], signal: options?.signal },
		);
		return readNumber(readRecord(body), "value");
	}

	/**
	 * Creates or updates an entry.
	 *
	 * @param args.exclusiveCreate Fail if the key already has a value.
	 * @param args.exclusiveUpdate Fail if the key has no value yet.
	 * @throws PreconditionFailedError when the exclusivity condition fails.
	 */
	public async setEntry(
		key: string,
		value: number,
		args: { exclusiveCreate?: boolean; exclusiveUpdate?: boolean } = {},
		options?: RequestOptions,
	): Promise<number> {
		if (args.exclusiveCreate && args.exclusiveUpdate) {
			throw new TypeError(
				"exclusiveCreate and exclusiveUpdate can not both be true",
			);
		}
		const target = splitScopedKey(this.scope, key);

		const { status, body } = args.exclusiveCreate
			? await this.client.request("POST", this.entriesPath(target.scope), {
					params: { id: target.key },
					json: { value },
					expectedStatus: [200, 400],
					signal: options?.signal,
				})
			: await this.client.request(
					"PATCH",
					`${this.entriesPath(target.scope)}/${encodeURIComponent(target.key)}`,
					{
						params: { allow_missing: !args.exclusiveUpdate },
						json: { value },
						expectedStatus: args.exclusiveUpdate ? [200, 404] : [200],
						signal: options?.signal,
					},
				);

		if (status === 400) {
			const message = errorMessageOf(body);
			if (message === "Entry already exists.") {
				throw new PreconditionFailedError({ message, status, body });
			}
			throw new OpenCloudError({
				message: message ?? "Unexpected HTTP 400",
				status,
				body,
				origin: "server",
			});
		}
		if (status === 404) {
			throw new PreconditionFailedError({
				message: "The entry does not exist.",
				status,
				body,
			});
		}
		return readNumber(readRecord(body), "value");
	}

	/** Adds `delta` to an entry and returns the new value. */
	public async incrementEntry(
		key: string,
		delta: number,
		options?: RequestOptions,
	): Promise<number> {
		const target = splitScopedKey(this.scope, key);
		const { body } = await this.client.request(
			"POST",
			`${this.entriesPath(target.scope)}/${encodeURIComponent(target.key)}:increment`,
			{
				json: { amount: delta },
				expectedStatus: [200],
				signal: options?.signal,
			},
		);
		return readNumber(readRecord(body), "value");
	}

	public async removeEntry(key: string, options?: RequestOptions): Promise<void> {
		const target = splitScopedKey(this.scope, key);
		await this.client.request(
			"DELETE",
			`${this.entriesPath(target.scope)}/${encodeURIComponent(target.key)}`,
			{ expectedStatus: [200, 204], signal: options?.signal },
		);
	}
}
