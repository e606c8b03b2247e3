/**
 * Core type utilities for querywarden.
 * These types replace 'any' usage and provide strict type safety.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
 * Replaces 'any' for data that must be serializable.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * JSON object type - strictly typed alternative to Record<string, any>
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * JSON array type
 */
export interface JsonArray extends Array<JsonValue> {}

/**
 * Convert a database cell into a JSON-safe value.
 * Drivers hand back Dates, Buffers and bigints that JSON.stringify mangles.
 */
export function toJsonValue(value: unknown): JsonValue {
	if (value === null || value === undefined) return null;
	if (typeof value === 'string' || typeof value === 'boolean') return value;
	if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
	if (typeof value === 'bigint') return value.toString();
	if (value instanceof Date) return value.toISOString();
	if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
	if (Array.isArray(value)) return value.map((item) => toJsonValue(item));
	if (typeof value === 'object') {
		const out: JsonObject = {};
		for (const [key, inner] of Object.entries(value)) {
			out[key] = toJsonValue(inner);
		}
		return out;
	}
	return String(value);
}

/**
 * Convert a driver row into a JSON object.
 */
export function toJsonRow(row: Record<string, unknown>): JsonObject {
	const out: JsonObject = {};
	for (const [key, value] of Object.entries(row)) {
		out[key] = toJsonValue(value);
	}
	return out;
}

/**
 * Narrow an unknown value to a plain record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
