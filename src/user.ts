import type { RequestOptions } from "./common.js";
import { Creator } from "./creator.js";
import { type GroupMember, groupMemberFrom } from "./group.js";
import type { HttpClient } from "./lib/client.js";
import type { Operation } from "./lib/operation.js";
import {
	isRecord,
	readBoolean,
	readDate,
	readOptionalString,
	readRecord,
	readString,
} from "./utils.js";

export type UserInfo = {
	id: number;
	username: string;
	displayName: string;
	createdAt: Date;
	about: string | undefined;
	locale: string | undefined;
	/** Only visible with the matching OAuth2 scope. */
	premium: boolean | undefined;
	idVerified: boolean | undefined;
	profileUri: string;
};

export type HeadshotSize = 48 | 50 | 60 | 75 | 100 | 110 | 150 | 180 | 352 | 420 | 720;

export type GenerateHeadshotArgs = {
	/** @default 420 */
	size?: HeadshotSize;
	/** @default "png" */
	format?: "png" | "jpeg";
	/** Cut the headshot out as a circle. */
	circular?: boolean;
};

/**
 * A user on Roblox. Users can own assets, so every {@link Creator}
 * operation is available too.
 */
export class User extends Creator {
	constructor(client: HttpClient, id: number) {
		super(client, id, "User");
	}

	public async fetchInfo(options?: RequestOptions): Promise<UserInfo> {
		const { body } = await this.client.request("GET", `/users/${this.id}`, {
			expectedStatus: [200],
			signal: options?.signal,
		});
		const data = readRecord(body);
		return {
			id: this.id,
			username: readString(data, "name"),
			displayName: readString(data, "displayName"),
			createdAt: readDate(data, "createTime"),
			about: readOptionalString(data, "about"),
			locale: readOptionalString(data, "locale"),
			premium: "premium" in data ? readBoolean(data, "premium") : undefined,
			idVerified: "idVerified" in data ? readBoolean(data, "idVerified") : undefined,
			profileUri: `https://roblox.com/users/${this.id}/profile`,
		};
	}

	/**
	 * Requests a headshot thumbnail of the user.
	 *
	 * @returns An operation resolving to the image URI. The thumbnail is
	 * usually ready immediately, in which case `wait()` returns without
	 * polling.
	 */
	public async generateHeadshot(
		args: GenerateHeadshotArgs = {},
		options?: RequestOptions,
	): Promise<Operation<string>> {
		const { body } = await this.client.request(
			"GET",
			`/users/${this.id}:generateThumbnail`,
			{
				params: {
					shape: args.circular ? undefined : "SQUARE",
					size: args.size ?? 420,
					format: (args.format ?? "png").toUpperCase(),
				},
				expectedStatus: [200],
				signal: options?.signal,
			},
		);
		const data = readRecord(body);
		const cached = data.response;
		return this.client.operation(
			`/${readString(data, "path")}`,
			{
				kind: "materialize",
				materialize: (response) => readString(response, "imageUri"),
			},
			isRecord(cached) ? cached : undefined,
		);
	}

	/** Lists the user's memberships, one per group they are in. */
	public listGroups(
		args: { limit?: number } = {},
		options?: RequestOptions,
	): AsyncIterable<GroupMember> {
		return this.client.iterate(
			"GET",
			"/groups/-/memberships",
			{
				params: {
					maxPageSize: args.limit !== undefined && args.limit <= 99 ? args.limit : 99,
					filter: `user == 'users/${this.id}'`,
				},
				expectedStatus: [200],
				dataKey: "groupMemberships",
				cursorKey: "pageToken",
				maxYields: args.limit,
				signal: options?.signal,
			},
			(item) => groupMemberFrom(readRecord(item, "groupMemberships[]")),
		);
	}
}
