import { OpenCloudError } from "./error.js";

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(field: string, expected: string): OpenCloudError {
	return new OpenCloudError({
		message: `Unexpected response shape: expected ${expected} at "${field}"`,
		origin: "sdk",
	});
}

/**
 * Narrows a response body to a JSON object.
 * Throws {@link OpenCloudError} when the server sent something else.
 */
export function readRecord(value: unknown, field = "body"): JsonObject {
	if (!isRecord(value)) throw malformed(field, "an object");
	return value;
}

export function readString(object: JsonObject, field: string): string {
	const value = object[field];
	if (typeof value !== "string") throw malformed(field, "a string");
	return value;
}

export function readOptionalString(
	object: JsonObject,
	field: string,
): string | undefined {
	const value = object[field];
	if (value === undefined || value === null) return undefined;
	if (typeof value !== "string") throw malformed(field, "a string");
	return value;
}

/** Numbers may arrive as JSON numbers or as numeric strings (int64 ids). */
export function readNumber(object: JsonObject, field: string): number {
	const value = readOptionalNumber(object, field);
	if (value === undefined) throw malformed(field, "a number");
	return value;
}

export function readOptionalNumber(
	object: JsonObject,
	field: string,
): number | undefined {
	const value = object[field];
	if (value === undefined || value === null) return undefined;
	if (typeof value === "number") return value;
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		if (Number.isFinite(parsed)) return parsed;
	}
	throw malformed(field, "a number");
}

export function readBoolean(
	object: JsonObject,
	field: string,
	fallback = false,
): boolean {
	const value = object[field];
	if (value === undefined || value === null) return fallback;
	if (typeof value !== "boolean") throw malformed(field, "a boolean");
	return value;
}

export function readArray(object: JsonObject, field: string): unknown[] {
	const value = object[field];
	if (value === undefined || value === null) return [];
	if (!Array.isArray(value)) throw malformed(field, "an array");
	return value;
}

export function readOptionalDate(
	object: JsonObject,
	field: string,
): Date | undefined {
	const value = readOptionalString(object, field);
	if (value === undefined) return undefined;
	const date = new Date(value);
	if (Number.isNaN(date.getTime())) throw malformed(field, "a timestamp");
	return date;
}

export function readDate(object: JsonObject, field: string): Date {
	const value = readOptionalDate(object, field);
	if (value === undefined) throw malformed(field, "a timestamp");
	return value;
}

/**
 * Reads the trailing id of a resource path such as `users/123`.
 */
export function idFromPath(path: string): number {
	const id = Number(path.slice(path.lastIndexOf("/") + 1));
	if (!Number.isFinite(id)) {
		throw new OpenCloudError({
			message: `Unexpected resource path "${path}"`,
			origin: "sdk",
		});
	}
	return id;
}

/**
 * Splits a `scope/key` string for stores opened without a fixed scope.
 */
export function splitScopedKey(
	scope: string | null,
	key: string,
): { scope: string; key: string } {
	if (scope !== null) return { scope, key };
	const separator = key.indexOf("/");
	if (separator <= 0) {
		throw new TypeError("'scope/key' syntax expected for key.");
	}
	return { scope: key.slice(0, separator), key: key.slice(separator + 1) };
}
