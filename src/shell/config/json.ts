// CHANGE: JSON value model and field readers for the build description
// PURITY: CORE-like (pure validation helpers living next to the loader)
// INVARIANT: Every reader either returns a well-typed value or a ConfigError naming the field
// COMPLEXITY: O(n) per field where n = field size

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";

/**
 * Type representing any valid JSON value.
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

export type Read<T> = Either.Either<T, ConfigError>;

/**
 * @returns True if value is a non-null, non-array object
 */
export function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isJSONArray(
	value: JSONValue | undefined,
): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

const field = (where: string, key: string): string =>
	where.length === 0 ? key : `${where}.${key}`;

const invalid = <T>(where: string, expected: string): Read<T> =>
	Either.left(new ConfigError({ detail: `${where} must be ${expected}` }));

export function optionalString(
	obj: JSONObject,
	key: string,
	where: string,
): Read<string | undefined> {
	const value = obj[key];
	if (value === undefined || value === null) return Either.right(undefined);
	return typeof value === "string"
		? Either.right(value)
		: invalid(field(where, key), "a string");
}

export function requiredString(
	obj: JSONObject,
	key: string,
	where: string,
): Read<string> {
	const value = obj[key];
	return typeof value === "string" && value.length > 0
		? Either.right(value)
		: invalid(field(where, key), "a non-empty string");
}

export function optionalBoolean(
	obj: JSONObject,
	key: string,
	where: string,
): Read<boolean | undefined> {
	const value = obj[key];
	if (value === undefined || value === null) return Either.right(undefined);
	return typeof value === "boolean"
		? Either.right(value)
		: invalid(field(where, key), "a boolean");
}

export function optionalStringArray(
	obj: JSONObject,
	key: string,
	where: string,
): Read<ReadonlyArray<string> | undefined> {
	const value = obj[key];
	if (value === undefined || value === null) return Either.right(undefined);
	if (!isJSONArray(value)) return invalid(field(where, key), "an array of strings");
	const strings = value.filter((v): v is string => typeof v === "string");
	return strings.length === value.length
		? Either.right(strings)
		: invalid(field(where, key), "an array of strings");
}

export function optionalObject(
	obj: JSONObject,
	key: string,
	where: string,
): Read<JSONObject | undefined> {
	const value = obj[key];
	if (value === undefined || value === null) return Either.right(undefined);
	return isJSONObject(value) ? Either.right(value) : invalid(field(where, key), "an object");
}

export function optionalArray(
	obj: JSONObject,
	key: string,
	where: string,
): Read<ReadonlyArray<JSONValue>> {
	const value = obj[key];
	if (value === undefined || value === null) return Either.right([]);
	return isJSONArray(value) ? Either.right(value) : invalid(field(where, key), "an array");
}

/**
 * A `{ "key": "value" }` map; non-string values are rejected.
 */
export function stringRecord(
	obj: JSONObject,
	key: string,
	where: string,
): Read<Readonly<Record<string, string>>> {
	const value = obj[key];
	if (value === undefined || value === null) return Either.right({});
	if (!isJSONObject(value)) return invalid(field(where, key), "an object of strings");
	const result: Record<string, string> = {};
	for (const [k, v] of Object.entries(value)) {
		if (typeof v !== "string") return invalid(`${field(where, key)}.${k}`, "a string");
		result[k] = v;
	}
	return Either.right(result);
}

/**
 * Require an array element to be an object.
 */
export function objectAt(
	value: JSONValue,
	where: string,
): Read<JSONObject> {
	return isJSONObject(value) ? Either.right(value) : invalid(where, "an object");
}
