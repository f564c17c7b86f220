import type { ClientOptions, RequestOptions } from "./common.js";
import { type Asset, assetFrom, type Creator } from "./creator.js";
import { Experience } from "./experience.js";
import { Group } from "./group.js";
import { HttpClient } from "./lib/client.js";
import { User } from "./user.js";
import {
	isRecord,
	type JsonObject,
	readOptionalNumber,
	readRecord,
} from "./utils.js";

/**
 * Entry point for API key access. Wrappers it hands out share its key,
 * retry settings and session.
 *
 * @example
 * ```ts
 * const apiKey = new ApiKey({ apiKey: process.env.OPENCLOUD_API_KEY ?? "" });
 * const store = apiKey.getExperience(1234).getDataStore("players");
 * const { value } = await store.getEntry("user_1");
 * ```
 */
export class ApiKey {
	private readonly client: HttpClient;

	constructor(options: ClientOptions) {
		this.client = new HttpClient({
			credential: options.apiKey,
			retry: options.retry,
			timeoutMillis: options.timeoutMillis,
			session: options.session,
		});
	}

	public getExperience(id: number): Experience {
		return new Experience(this.client, id);
	}

	public getGroup(id: number): Group {
		return new Group(this.client, id);
	}

	public getUser(id: number): User {
		return new User(this.client, id);
	}

	/**
	 * Fetches an asset without knowing its creator up front. The creator is
	 * read from the asset's creation context; a user with id 0 stands in when
	 * the response names none.
	 */
	public async fetchAsset(assetId: number, options?: RequestOptions): Promise<Asset> {
		const { body } = await this.client.request("GET", `assets/v1/assets/${assetId}`, {
			expectedStatus: [200],
			signal: options?.signal,
		});
		const data = readRecord(body);
		return assetFrom(data, this.creatorOf(data));
	}

	private creatorOf(asset: JsonObject): Creator {
		const context = asset.creationContext;
		const creator = isRecord(context) ? context.creator : undefined;
		if (isRecord(creator)) {
			const groupId = readOptionalNumber(creator, "groupId");
			if (groupId !== undefined) return new Group(this.client, groupId);
			const userId = readOptionalNumber(creator, "userId");
			if (userId !== undefined) return new User(this.client, userId);
		}
		return new User(this.client, 0);
	}
}
