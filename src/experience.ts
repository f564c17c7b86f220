import type { RequestOptions } from "./common.js";
import { DataStore, OrderedDataStore } from "./datastore.js";
import type { HttpClient } from "./lib/client.js";
import type { Operation } from "./lib/operation.js";
import { MemoryStoreQueue, SortedMap } from "./memoryStore.js";
import {
	type JsonObject,
	idFromPath,
	isRecord,
	readBoolean,
	readDate,
	readNumber,
	readOptionalDate,
	readOptionalNumber,
	readOptionalString,
	readRecord,
	readString,
} from "./utils.js";

export type ExperienceAgeRating =
	| "Unspecified"
	| "AllAges"
	| "NinePlus"
	| "ThirteenPlus"
	| "SeventeenPlus"
	| "Unknown";

const AGE_RATINGS: Record<string, ExperienceAgeRating> = {
	AGE_RATING_UNSPECIFIED: "Unspecified",
	AGE_RATING_ALL: "AllAges",
	AGE_RATING_9_PLUS: "NinePlus",
	AGE_RATING_13_PLUS: "ThirteenPlus",
	AGE_RATING_17_PLUS: "SeventeenPlus",
};

export type SocialLink = { title: string; uri: string };

export type SocialLinkKind =
	| "facebook"
	| "twitter"
	| "youtube"
	| "twitch"
	| "discord"
	| "robloxGroup"
	| "guilded";

const SOCIAL_LINK_KINDS: readonly SocialLinkKind[] = [
	"facebook",
	"twitter",
	"youtube",
	"twitch",
	"discord",
	"robloxGroup",
	"guilded",
];

export type ExperienceOwner = { kind: "User" | "Group"; id: number };

export type ExperienceInfo = {
	id: number;
	name: string;
	description: string;
	createdAt: Date | undefined;
	updatedAt: Date | undefined;
	owner: ExperienceOwner | undefined;
	public: boolean;
	voiceChatEnabled: boolean;
	ageRating: ExperienceAgeRating;
	/** Absent when private servers are disabled. */
	privateServerPriceRobux: number | undefined;
	desktopEnabled: boolean;
	mobileEnabled: boolean;
	tabletEnabled: boolean;
	consoleEnabled: boolean;
	vrEnabled: boolean;
	socialLinks: Partial<Record<SocialLinkKind, SocialLink>>;
};

export type PlaceInfo = {
	id: number;
	experienceId: number;
	name: string;
	description: string;
	createdAt: Date;
	updatedAt: Date;
	serverSize: number | undefined;
};

export type ListDataStoresArgs = {
	/** Only data stores whose name starts with this. */
	prefix?: string;
	limit?: number;
	/** Scope given to the yielded data stores. */
	scope?: string | null;
};

function ownerOf(data: JsonObject): ExperienceOwner | undefined {
	const user = readOptionalString(data, "user");
	if (user) return { kind: "User", id: idFromPath(user) };
	const group = readOptionalString(data, "group");
	if (group) return { kind: "Group", id: idFromPath(group) };
	return undefined;
}

function socialLinksOf(data: JsonObject): ExperienceInfo["socialLinks"] {
	const links: ExperienceInfo["socialLinks"] = {};
	for (const kind of SOCIAL_LINK_KINDS) {
		const link = data[`${kind}SocialLink`];
		if (isRecord(link)) {
			links[kind] = { title: readString(link, "title"), uri: readString(link, "uri") };
		}
	}
	return links;
}

function placeInfoFrom(data: JsonObject, experienceId: number, id: number): PlaceInfo {
	return {
		id,
		experienceId,
		name: readString(data, "displayName"),
		description: readOptionalString(data, "description") ?? "",
		createdAt: readDate(data, "createTime"),
		updatedAt: readDate(data, "updateTime"),
		serverSize: readOptionalNumber(data, "serverSize"),
	};
}

/**
 * A place inside an experience.
 */
export class Place {
	constructor(
		private readonly client: HttpClient,
		public readonly experienceId: number,
		public readonly id: number,
	) {}

	private get path(): string {
		return `/universes/${this.experienceId}/places/${this.id}`;
	}

	public async fetchInfo(options?: RequestOptions): Promise<PlaceInfo> {
		const { body } = await this.client.request("GET", this.path, {
			expectedStatus: [200],
			signal: options?.signal,
		});
		return placeInfoFrom(readRecord(body), this.experienceId, this.id);
	}

	/**
	 * Updates the given fields. Fields left out keep their current value.
	 */
	public async update(
		args: { name?: string; description?: string; serverSize?: number },
		options?: RequestOptions,
	): Promise<PlaceInfo> {
		const updateMask: string[] = [];
		if (args.name !== undefined) updateMask.push("displayName");
		if (args.description !== undefined) updateMask.push("description");
		if (args.serverSize !== undefined) updateMask.push("serverSize");

		const { body } = await this.client.request("PATCH", this.path, {
			params: { updateMask: updateMask.join(",") },
			json: {
				displayName: args.name,
				description: args.description,
				serverSize: args.serverSize,
			},
			expectedStatus: [200],
			signal: options?.signal,
		});
		return placeInfoFrom(readRecord(body), this.experienceId, this.id);
	}

	/**
	 * Uploads an `.rbxl` place file as a new version.
	 *
	 * @returns The new version number.
	 */
	public async uploadPlaceFile(
		contents: Uint8Array,
		args: { publish?: boolean } = {},
		options?: RequestOptions,
	): Promise<number> {
		const { body } = await this.client.request(
			"POST",
			`universes/v1/${this.experienceId}/places/${this.id}/versions`,
			{
				params: { versionType: args.publish ? "Published" : "Saved" },
				headers: { "content-type": "application/octet-stream" },
				body: contents,
				expectedStatus: [200],
				signal: options?.signal,
			},
		);
		return readNumber(readRecord(body), "versionNumber");
	}
}

/**
 * An experience (universe) and the resources that live inside it.
 */
export class Experience {
	constructor(
		private readonly client: HttpClient,
		public readonly id: number,
	) {}

	public async fetchInfo(options?: RequestOptions): Promise<ExperienceInfo> {
		const { body } = await this.client.request("GET", `/universes/${this.id}`, {
			expectedStatus: [200],
			signal: options?.signal,
		});
		const data = readRecord(body);
		const ageRating = readOptionalString(data, "ageRating");
		return {
			id: this.id,
			name: readString(data, "displayName"),
			description: readOptionalString(data, "description") ?? "",
			createdAt: readOptionalDate(data, "createTime"),
			updatedAt: readOptionalDate(data, "updateTime"),
			owner: ownerOf(data),
			public: data.visibility === "PUBLIC",
			voiceChatEnabled: readBoolean(data, "voiceChatEnabled"),
			ageRating: (ageRating && AGE_RATINGS[ageRating]) || "Unknown",
			privateServerPriceRobux: readOptionalNumber(data, "privateServerPriceRobux"),
			desktopEnabled: readBoolean(data, "desktopEnabled"),
			mobileEnabled: readBoolean(data, "mobileEnabled"),
			tabletEnabled: readBoolean(data, "tabletEnabled"),
			consoleEnabled: readBoolean(data, "consoleEnabled"),
			vrEnabled: readBoolean(data, "vrEnabled"),
			socialLinks: socialLinksOf(data),
		};
	}

	public getPlace(placeId: number): Place {
		return new Place(this.client, this.id, placeId);
	}

	/**
	 * @param scope With `null`, keys must be written as `scope/key`.
	 */
	public getDataStore(name: string, scope: string | null = "global"): DataStore {
		return new DataStore(this.client, this.id, name, scope);
	}

	public getOrderedDataStore(
		name: string,
		scope: string | null = "global",
	): OrderedDataStore {
		return new OrderedDataStore(this.client, this.id, name, scope);
	}

	public listDataStores(
		args: ListDataStoresArgs = {},
		options?: RequestOptions,
	): AsyncIterable<DataStore> {
		const scope = args.scope === undefined ? "global" : args.scope;
		return this.client.iterate(
			"GET",
			`datastores/v1/universes/${this.id}/standard-datastores`,
			{
				params: { prefix: args.prefix },
				expectedStatus: [200],
				dataKey: "datastores",
				cursorKey: "cursor",
				maxYields: args.limit,
				signal: options?.signal,
			},
			(item) => {
				const entry = readRecord(item, "datastores[]");
				return new DataStore(
					this.client,
					this.id,
					readString(entry, "name"),
					scope,
					readOptionalDate(entry, "createdTime"),
				);
			},
		);
	}

	/**
	 * Publishes a message to the experience's live servers through
	 * MessagingService. Studio sessions don't receive these messages.
	 */
	public async publishMessage(
		topic: string,
		message: string,
		options?: RequestOptions,
	): Promise<void> {
		await this.client.request(
			"POST",
			`messaging-service/v1/universes/${this.id}/topics/${encodeURIComponent(topic)}`,
			{ json: { message }, expectedStatus: [200], signal: options?.signal },
		);
	}

	/** Shuts down every server that isn't running the latest published version. */
	public async restartServers(options?: RequestOptions): Promise<void> {
		await this.client.request("POST", `/universes/${this.id}:restartServers`, {
			json: {},
			expectedStatus: [200],
			signal: options?.signal,
		});
	}

	public getSortedMap(name: string): SortedMap {
		return new SortedMap(this.client, this.id, name);
	}

	public getMemoryStoreQueue(name: string): MemoryStoreQueue {
		return new MemoryStoreQueue(this.client, this.id, name);
	}

	/**
	 * Deletes every sorted map and queue in the experience's memory store.
	 *
	 * @returns An operation that resolves to `true` once the flush finished.
	 */
	public async flushMemoryStore(options?: RequestOptions): Promise<Operation<true>> {
		const { body } = await this.client.request(
			"POST",
			`/universes/${this.id}/memory-store:flush`,
			{ json: {}, expectedStatus: [200], signal: options?.signal },
		);
		const operationId = readString(readRecord(body), "path").split("/").pop() ?? "";
		return this.client.operation<true>(
			`/universes/${this.id}/memory-store/operations/${operationId}`,
			{ kind: "fixed", value: true },
		);
	}
}
