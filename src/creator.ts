import type { RequestOptions } from "./common.js";
import {
	errorMessageOf,
	InvalidAssetError,
	ModeratedTextError,
	OpenCloudError,
} from "./error.js";
import type { HttpClient } from "./lib/client.js";
import type { Operation } from "./lib/operation.js";
import {
	type JsonObject,
	isRecord,
	readNumber,
	readOptionalDate,
	readOptionalNumber,
	readOptionalString,
	readRecord,
	readString,
} from "./utils.js";

export type AssetType = "Decal" | "Audio" | "Model" | "Unknown";

export type ModerationStatus = "Reviewing" | "Rejected" | "Approved" | "Unknown";

const ASSET_TYPES: Record<string, AssetType> = {
	Decal: "Decal",
	Audio: "Audio",
	Model: "Model",
	ASSET_TYPE_DECAL: "Decal",
	ASSET_TYPE_AUDIO: "Audio",
	ASSET_TYPE_MODEL: "Model",
};

const MODERATION_STATUSES: Record<string, ModerationStatus> = {
	Reviewing: "Reviewing",
	Rejected: "Rejected",
	Approved: "Approved",
	MODERATION_STATE_REVIEWING: "Reviewing",
	MODERATION_STATE_REJECTED: "Rejected",
	MODERATION_STATE_APPROVED: "Approved",
};

const ASSET_MIME_TYPES: Record<string, string> = {
	mp3: "audio/mpeg",
	ogg: "audio/ogg",
	png: "image/png",
	jpeg: "image/jpeg",
	jpg: "image/jpeg",
	bmp: "image/bmp",
	tga: "image/tga",
	fbx: "model/fbx",
};

export type Asset = {
	id: number;
	name: string | undefined;
	description: string | undefined;
	type: AssetType;
	creator: Creator;
	moderationStatus: ModerationStatus;
	/** Absent for asset types that can't be updated. */
	revisionId: number | undefined;
	revisionTime: Date | undefined;
};

export type AssetVersion = {
	id: number;
	assetId: number;
	creator: Creator;
	moderationStatus: ModerationStatus;
};

/** A file to upload. The extension of `name` selects the content type. */
export type AssetFile = {
	name: string;
	contents: Uint8Array | Blob;
};

export type UploadAssetArgs = {
	assetType: Exclude<AssetType, "Unknown">;
	name: string;
	description: string;
	/**
	 * Robux the upload may cost. The upload fails if the actual price is higher.
	 * @default 0
	 */
	expectedRobuxPrice?: number;
};

function moderationStatusOf(data: JsonObject): ModerationStatus {
	const result = data.moderationResult;
	if (!isRecord(result)) return "Unknown";
	const state = readOptionalString(result, "moderationState");
	return (state && MODERATION_STATUSES[state]) || "Unknown";
}

export function assetFrom(data: JsonObject, creator: Creator): Asset {
	const type = readOptionalString(data, "assetType");
	return {
		id: readNumber(data, "assetId"),
		name: readOptionalString(data, "displayName"),
		description: readOptionalString(data, "description"),
		type: (type && ASSET_TYPES[type]) || "Unknown",
		creator,
		moderationStatus: moderationStatusOf(data),
		revisionId: readOptionalNumber(data, "revisionId"),
		revisionTime: readOptionalDate(data, "revisionCreateTime"),
	};
}

function assetVersionFrom(data: JsonObject, creator: Creator): AssetVersion {
	// assets/{assetId}/versions/{version}
	const [, assetId, , version] = readString(data, "path").split("/");
	return {
		id: Number(version),
		assetId: Number(assetId),
		creator,
		moderationStatus: moderationStatusOf(data),
	};
}

function assetForm(request: JsonObject, file: AssetFile): FormData {
	const extension = file.name.slice(file.name.lastIndexOf(".") + 1).toLowerCase();
	const form = new FormData();
	form.append("request", JSON.stringify(request));
	form.append(
		"fileContent",
		new Blob([file.contents], { type: ASSET_MIME_TYPES[extension] ?? "" }),
		file.name,
	);
	return form;
}

function uploadError(status: number, body: unknown): OpenCloudError {
	const message = errorMessageOf(body);
	switch (message) {
		case '"InvalidImage"':
			return new InvalidAssetError({
				message: "The file is corrupted or not supported.",
				body,
			});
		case "AssetName is moderated.":
			return new ModeratedTextError({
				message: "The asset's name was moderated.",
				body,
			});
		case "AssetDescription is moderated.":
			return new ModeratedTextError({
				message: "The asset's description was moderated.",
				body,
			});
	}
	return new OpenCloudError({
		message: message ?? `Unexpected HTTP ${status}`,
		status,
		body,
		origin: "server",
	});
}

/**
 * Something that owns assets: a user or a group.
 */
export class Creator {
	constructor(
		protected readonly client: HttpClient,
		public readonly id: number,
		public readonly kind: "User" | "Group",
	) {}

	public async fetchAsset(assetId: number, options?: RequestOptions): Promise<Asset> {
		const { body } = await this.client.request("GET", `assets/v1/assets/${assetId}`, {
			expectedStatus: [200],
			signal: options?.signal,
		});
		return assetFrom(readRecord(body), this);
	}

	/**
	 * Uploads a file as a new asset. Decals take `.png`, `.jpeg`, `.bmp` and
	 * `.tga` files, audio `.mp3` and `.ogg`, models `.fbx`.
	 *
	 * @returns An operation resolving to the created asset.
	 * @throws InvalidAssetError when the file is corrupted or of the wrong type.
	 * @throws ModeratedTextError when the name or description was moderated.
	 *
	 * @example
	 * ```ts
	 * const operation = await user.uploadAsset(
	 *   { name: "logo.png", contents: await readFile("logo.png") },
	 *   { assetType: "Decal", name: "Logo", description: "Studio logo" },
	 * );
	 * const asset = await operation.wait({ intervalSeconds: 1 });
	 * ```
	 */
	public async uploadAsset(
		file: AssetFile,
		args: UploadAssetArgs,
		options?: RequestOptions,
	): Promise<Operation<Asset>> {
		const request = {
			assetType: args.assetType,
			creationContext: {
				creator:
					this.kind === "User"
						? { userId: String(this.id) }
						: { groupId: String(this.id) },
				expectedPrice: args.expectedRobuxPrice ?? 0,
			},
			displayName: args.name,
			description: args.description,
		};
		const { status, body } = await this.client.request("POST", "assets/v1/assets", {
			body: assetForm(request, file),
			expectedStatus: [200, 400],
			signal: options?.signal,
		});
		if (status === 400) {
			throw uploadError(status, body);
		}
		return this.assetOperation(body);
	}

	/**
	 * Uploads a new revision of an existing asset. Only models (`.fbx`) can be
	 * updated.
	 */
	public async updateAsset(
		assetId: number,
		file: AssetFile,
		options?: RequestOptions,
	): Promise<Operation<Asset>> {
		const { status, body } = await this.client.request(
			"PATCH",
			`assets/v1/assets/${assetId}`,
			{
				body: assetForm({ assetId }, file),
				expectedStatus: [200, 400],
				signal: options?.signal,
			},
		);
		if (status === 400) {
			throw uploadError(status, body);
		}
		return this.assetOperation(body);
	}

	public listAssetVersions(
		assetId: number,
		args: { limit?: number } = {},
		options?: RequestOptions,
	): AsyncIterable<AssetVersion> {
		return this.client.iterate(
			"GET",
			`assets/v1/assets/${assetId}/versions`,
			{
				params: {
					maxPageSize: args.limit !== undefined && args.limit < 50 ? args.limit : 50,
				},
				expectedStatus: [200],
				dataKey: "assetVersions",
				cursorKey: "pageToken",
				maxYields: args.limit,
				signal: options?.signal,
			},
			(item) => assetVersionFrom(readRecord(item, "assetVersions[]"), this),
		);
	}

	private assetOperation(body: unknown): Operation<Asset> {
		const path = readString(readRecord(body), "path");
		return this.client.operation(`assets/v1/${path}`, {
			kind: "materialize",
			materialize: (response) => assetFrom(response, this),
		});
	}
}
