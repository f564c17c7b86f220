import { describe, expect, it } from "vitest";
import { OpenCloudError } from "../error.js";
import { Group, membershipId } from "../group.js";
import { collect, jsonResponse, scriptedClient } from "./helpers.js";

function member(userId: number, roleId: number) {
	return {
		path: `groups/99/memberships/${membershipId(userId)}`,
		user: `users/${userId}`,
		role: `groups/99/roles/${roleId}`,
		createTime: "2024-01-01T00:00:00Z",
		updateTime: "2024-01-02T00:00:00Z",
	};
}

describe("Group", () => {
	it("fetches group info", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({
				path: "groups/99",
				displayName: "Builders",
				description: "We build",
				owner: "users/5",
				memberCount: 12,
				publicEntryAllowed: true,
				locked: false,
				verified: true,
				createTime: "2020-05-01T00:00:00Z",
			}),
		]);

		const info = await new Group(client, 99).fetchInfo();

		expect(info).toEqual({
			id: 99,
			name: "Builders",
			description: "We build",
			createdAt: new Date("2020-05-01T00:00:00Z"),
			updatedAt: undefined,
			ownerId: 5,
			memberCount: 12,
			publicEntry: true,
			locked: false,
			verified: true,
		});
		expect(calls[0]?.url.pathname).toBe("/cloud/v2/groups/99");
	});

	it("encodes membership ids as unpadded base64url", () => {
		expect(membershipId(5)).toBe("NQ");
		expect(membershipId(123)).toBe("MTIz");
	});

	it("returns undefined for users outside the group", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({ groupMemberships: [] }),
		]);

		await expect(new Group(client, 99).fetchMember(5)).resolves.toBeUndefined();
		expect(calls[0]?.url.searchParams.get("filter")).toBe("user == 'users/5'");
	});

	it("lists members holding a role", async () => {
		const { client, calls } = scriptedClient([
			jsonResponse({ groupMemberships: [member(5, 3)], nextPageToken: "p2" }),
			jsonResponse({ groupMemberships: [member(6, 3)] }),
		]);

		const members = await collect(new Group(client, 99).listMembers({ roleId: 3 }));

		expect(members).toEqual([
			{
				userId: 5,
				groupId: 99,
				roleId: 3,
				joinedAt: new Date("2024-01-01T00:00:00Z"),
				updatedAt: new Date("2024-01-02T00:00:00Z"),
			},
			expect.objectContaining({ userId: 6 }),
		]);
		expect(calls[0]?.url.searchParams.get("filter")).toBe(
			"role == 'groups/99/roles/3'",
		);
		expect(calls[1]?.url.searchParams.get("pageToken")).toBe("p2");
	});

	it("changes a member's role", async () => {
		const { client, calls } = scriptedClient([jsonResponse(member(5, 4))]);

		const updated = await new Group(client, 99).updateMember(5, { roleId: 4 });

		expect(updated.roleId).toBe(4);
		expect(calls[0]?.method).toBe("PATCH");
		expect(calls[0]?.url.pathname).toBe("/cloud/v2/groups/99/memberships/NQ");
		expect(JSON.parse(String(calls[0]?.body))).toEqual({
			path: "groups/99/memberships/NQ",
			user: "users/5",
			role: "groups/99/roles/4",
		});
	});

	it("serves roles from the cache after the first lookup", async () => {
		const { client, fetch } = scriptedClient([
			jsonResponse({
				groupRoles: [
					{ id: "1", displayName: "Guest", rank: 0, permissions: { viewWallPosts: true } },
					{ id: "3", displayName: "Member", rank: 1, memberCount: 40 },
				],
			}),
		]);
		const group = new Group(client, 99);

		const memberRole = await group.fetchRole(3);
		const guest = await group.fetchRole(1);
		const missing = await group.fetchRole(8);

		expect(memberRole).toEqual({
			id: 3,
			name: "Member",
			rank: 1,
			description: undefined,
			memberCount: 40,
			permissions: undefined,
		});
		expect(guest?.permissions).toEqual({ viewWallPosts: true });
		expect(missing).toBeUndefined();
		expect(fetch).toHaveBeenCalledTimes(1);
	});

	it("keeps the role cache empty when listing roles fails partway", async () => {
		const { client, fetch } = scriptedClient([
			jsonResponse({
				groupRoles: [{ id: "1", displayName: "Guest", rank: 0 }],
				nextPageToken: "p2",
			}),
			jsonResponse({ message: "Bad token." }, 400),
			jsonResponse({
				groupRoles: [{ id: "1", displayName: "Guest", rank: 0 }],
			}),
		]);
		const group = new Group(client, 99);

		await expect(group.fetchRole(1)).rejects.toBeInstanceOf(OpenCloudError);
		await expect(group.fetchRole(1)).resolves.toMatchObject({ id: 1, name: "Guest" });
		expect(fetch).toHaveBeenCalledTimes(3);
	});

	it("accepts and declines join requests", async () => {
		const { client, calls } = scriptedClient([jsonResponse({}), jsonResponse({})]);
		const group = new Group(client, 99);

		await group.acceptJoinRequest(5);
		await group.declineJoinRequest(6);

		expect(calls.map((call) => call.url.pathname)).toEqual([
			"/cloud/v2/groups/99/join-requests/5:accept",
			"/cloud/v2/groups/99/join-requests/6:decline",
		]);
	});

	it("fetches the shout", async () => {
		const { client } = scriptedClient([
			jsonResponse({
				content: "Welcome!",
				poster: "users/5",
				createTime: "2024-01-01T00:00:00Z",
				updateTime: "2024-03-01T00:00:00Z",
			}),
		]);

		await expect(new Group(client, 99).fetchShout()).resolves.toEqual({
			content: "Welcome!",
			posterId: 5,
			createdAt: new Date("2024-03-01T00:00:00Z"),
			firstCreatedAt: new Date("2024-01-01T00:00:00Z"),
		});
	});
});
