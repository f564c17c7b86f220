import type { RequestOptions } from "./common.js";
import { Creator } from "./creator.js";
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
	readOptionalString,
	readRecord,
	readString,
} from "./utils.js";

export type GroupInfo = {
	id: number;
	name: string;
	description: string;
	createdAt: Date | undefined;
	updatedAt: Date | undefined;
	/** Owner user id, absent for ownerless groups. */
	ownerId: number | undefined;
	memberCount: number;
	/** Whether users can join without approval. */
	publicEntry: boolean;
	locked: boolean;
	verified: boolean;
};

export type GroupMember = {
	userId: number;
	groupId: number;
	roleId: number;
	joinedAt: Date;
	updatedAt: Date;
};

export type GroupJoinRequest = {
	userId: number;
	groupId: number;
	requestedAt: Date;
};

export type GroupShout = {
	content: string;
	posterId: number;
	createdAt: Date | undefined;
	firstCreatedAt: Date | undefined;
};

/** Role permission flags, keyed as the API reports them (`viewWallPosts`, `changeRank`, ...). */
export type GroupRolePermissions = Record<string, boolean>;

export type GroupRole = {
	id: number;
	name: string;
	/** 0-255. */
	rank: number;
	/** Absent when the authorizing user owns the group. */
	description: string | undefined;
	/** Absent for the guest role. */
	memberCount: number | undefined;
	/** Only visible for the guest role, the caller's own role, or to the owner. */
	permissions: GroupRolePermissions | undefined;
};

/** Parses a `groups/{id}/memberships/{membershipId}` resource. */
export function groupMemberFrom(data: JsonObject): GroupMember {
	const role = readString(data, "role");
	return {
		userId: idFromPath(readString(data, "user")),
		// groups/{groupId}/roles/{roleId}
		groupId: Number(role.split("/")[1]),
		roleId: idFromPath(role),
		joinedAt: readDate(data, "createTime"),
		updatedAt: readDate(data, "updateTime"),
	};
}

function groupRoleFrom(data: JsonObject): GroupRole {
	const permissions = data.permissions;
	return {
		id: readNumber(data, "id"),
		name: readString(data, "displayName"),
		rank: readNumber(data, "rank"),
		description: readOptionalString(data, "description"),
		memberCount: readOptionalNumber(data, "memberCount"),
		permissions: isRecord(permissions)
			? Object.fromEntries(
					Object.entries(permissions).filter(
						(entry): entry is [string, boolean] => typeof entry[1] === "boolean",
					),
				)
			: undefined,
	};
}

/**
 * Membership ids are the URL-safe base64 of the user id, without padding.
 */
export function membershipId(userId: number): string {
	return Buffer.from(String(userId)).toString("base64url");
}

/**
 * A group on Roblox. Groups can own assets, so every {@link Creator}
 * operation is available too.
 */
export class Group extends Creator {
	private roleCache = new Map<number, GroupRole>();

	constructor(client: HttpClient, id: number) {
		super(client, id, "Group");
	}

	public async fetchInfo(options?: RequestOptions): Promise<GroupInfo> {
		const { body } = await this.client.request("GET", `/groups/${this.id}`, {
			expectedStatus: [200],
			signal: options?.signal,
		});
		const data = readRecord(body);
		const owner = readOptionalString(data, "owner");
		return {
			id: this.id,
			name: readString(data, "displayName"),
			description: readOptionalString(data, "description") ?? "",
			createdAt: readOptionalDate(data, "createTime"),
			updatedAt: readOptionalDate(data, "updateTime"),
			ownerId: owner ? idFromPath(owner) : undefined,
			memberCount: readOptionalNumber(data, "memberCount") ?? 0,
			publicEntry: readBoolean(data, "publicEntryAllowed"),
			locked: readBoolean(data, "locked"),
			verified: readBoolean(data, "verified"),
		};
	}

	/**
	 * @returns The user's membership, or `undefined` when they aren't in the group.
	 */
	public async fetchMember(
		userId: number,
		options?: RequestOptions,
	): Promise<GroupMember | undefined> {
		const { body } = await this.client.request(
			"GET",
			`/groups/${this.id}/memberships`,
			{
				params: { maxPageSize: 1, filter: `user == 'users/${userId}'` },
				expectedStatus: [200],
				signal: options?.signal,
			},
		);
		const [first] = readArray(readRecord(body), "groupMemberships");
		return first === undefined ? undefined : groupMemberFrom(readRecord(first));
	}

	/**
	 * Changes a member's role. The role can't be Owner or Guest and must rank
	 * below the authorizing user.
	 */
	public async updateMember(
		userId: number,
		args: { roleId?: number } = {},
		options?: RequestOptions,
	): Promise<GroupMember> {
		const id = membershipId(userId);
		const { body } = await this.client.request(
			"PATCH",
			`/groups/${this.id}/memberships/${id}`,
			{
				json: {
					path: `groups/${this.id}/memberships/${id}`,
					user: `users/${userId}`,
					role:
						args.roleId !== undefined
							? `groups/${this.id}/roles/${args.roleId}`
							: null,
				},
				expectedStatus: [200],
				signal: options?.signal,
			},
		);
		return groupMemberFrom(readRecord(body));
	}

	/**
	 * Lists the group's members, optionally only those holding `roleId`.
	 */
	public listMembers(
		args: { limit?: number; roleId?: number } = {},
		options?: RequestOptions,
	): AsyncIterable<GroupMember> {
		return this.client.iterate(
			"GET",
			`/groups/${this.id}/memberships`,
			{
				params: {
					maxPageSize: args.limit !== undefined && args.limit <= 99 ? args.limit : 99,
					filter:
						args.roleId !== undefined
							? `role == 'groups/${this.id}/roles/${args.roleId}'`
							: undefined,
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

	/** Lists the group's roles. */
	public listRoles(
		args: { limit?: number } = {},
		options?: RequestOptions,
	): AsyncIterable<GroupRole> {
		return this.client.iterate(
			"GET",
			`/groups/${this.id}/roles`,
			{
				params: {
					maxPageSize: args.limit !== undefined && args.limit <= 20 ? args.limit : 20,
				},
				expectedStatus: [200],
				dataKey: "groupRoles",
				cursorKey: "pageToken",
				maxYields: args.limit,
				signal: options?.signal,
			},
			(item) => groupRoleFrom(readRecord(item, "groupRoles[]")),
		);
	}

	/**
	 * Looks up a role by id. The first lookup lists every role; later ones are
	 * served from the cache unless `skipCache` is set.
	 *
	 * @returns The role, or `undefined` when the group has no such role.
	 */
	public async fetchRole(
		roleId: number,
		args: { skipCache?: boolean } = {},
		options?: RequestOptions,
	): Promise<GroupRole | undefined> {
		if (args.skipCache || this.roleCache.size === 0) {
			const roles = new Map<number, GroupRole>();
			for await (const role of this.listRoles({}, options)) {
				roles.set(role.id, role);
			}
			this.roleCache = roles;
		}
		return this.roleCache.get(roleId);
	}

	public listJoinRequests(
		args: { limit?: number; userId?: number } = {},
		options?: RequestOptions,
	): AsyncIterable<GroupJoinRequest> {
		return this.client.iterate(
			"GET",
			`/groups/${this.id}/join-requests`,
			{
				params: {
					maxPageSize: args.limit !== undefined && args.limit <= 100 ? args.limit : 100,
					filter:
						args.userId !== undefined ? `user == 'users/${args.userId}'` : undefined,
				},
				expectedStatus: [200],
				dataKey: "groupJoinRequests",
				cursorKey: "pageToken",
				maxYields: args.limit,
				signal: options?.signal,
			},
			(item) => {
				const request = readRecord(item, "groupJoinRequests[]");
				return {
					userId: idFromPath(readString(request, "user")),
					groupId: this.id,
					requestedAt: readDate(request, "createTime"),
				};
			},
		);
	}

	public async acceptJoinRequest(userId: number, options?: RequestOptions): Promise<void> {
		await this.client.request(
			"POST",
			`/groups/${this.id}/join-requests/${userId}:accept`,
			{ json: {}, expectedStatus: [200], signal: options?.signal },
		);
	}

	public async declineJoinRequest(userId: number, options?: RequestOptions): Promise<void> {
		await this.client.request(
			"POST",
			`/groups/${this.id}/join-requests/${userId}:decline`,
			{ json: {}, expectedStatus: [200], signal: options?.signal },
		);
	}

	public async fetchShout(options?: RequestOptions): Promise<GroupShout> {
		const { body } = await this.client.request("GET", `/groups/${this.id}/shout`, {
			expectedStatus: [200],
			signal: options?.signal,
		});
		const shout = readRecord(body);
		return {
			content: readString(shout, "content"),
			posterId: idFromPath(readString(shout, "poster")),
			createdAt: readOptionalDate(shout, "updateTime"),
			firstCreatedAt: readOptionalDate(shout, "createTime"),
		};
	}
}
