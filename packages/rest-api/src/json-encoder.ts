import { CalendarDate } from "./calendar-date.js";
import { entityFieldsOf, type EntityFields } from "./entity.js";
import { SerializationError } from "./errors.js";
import { ApiResponse, ResponseType } from "./response.js";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Formats as `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatDateTime(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new SerializationError("Cannot encode an invalid Date");
  }
  return (
    `${String(date.getUTCFullYear()).padStart(4, "0")}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`
  );
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

function encodeEntity(entity: object, fields: EntityFields): JsonObject {
  const hidden = new Set(fields.hide ?? []);
  const masked = new Set(fields.mask ?? []);
  const out: JsonObject = {};

  for (const column of fields.columns) {
    if (hidden.has(column)) continue;
    const value: unknown = Reflect.get(entity, column);
    out[column] = masked.has(column)
      ? value !== null && value !== undefined
      : encodeValue(value);
  }

  for (const field of fields.extra ?? []) {
    out[field] = field in entity ? encodeValue(Reflect.get(entity, field)) : null;
  }

  return out;
}

/**
 * Turns a value into a JSON-safe tree. Throws SerializationError for
 * values with no JSON form: functions, symbols, bigints, NaN and the
 * infinities, and class instances that are not entities.
 */
export function encodeValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;

  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new SerializationError(`Cannot encode the non-finite number ${String(value)}`);
    }
    return value;
  }
  if (typeof value !== "object") {
    throw new SerializationError(`Unserializable value of type "${typeof value}"`);
  }

  if (value instanceof ApiResponse) return encodeResponse(value);
  if (value instanceof Date) return formatDateTime(value);
  if (value instanceof CalendarDate) return value.toString();
  if (Array.isArray(value)) {
    const items: readonly unknown[] = value;
    return items.map((item) => encodeValue(item));
  }

  const fields = entityFieldsOf(value);
  if (fields) return encodeEntity(value, fields);

  if (isPlainObject(value)) {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      out[key] = encodeValue(item);
    }
    return out;
  }

  throw new SerializationError(`Unserializable object of type "${describe(value)}"`);
}

/**
 * Encodes the response envelope. Errors carry `error_code` and
 * `error_message`; successes carry `data`, and pagination fields only for
 * resource sets.
 */
export function encodeResponse(response: ApiResponse): JsonObject {
  const out: JsonObject = {
    type: response.type,
    success: response.success,
  };

  if (!response.success) {
    out.error_code = response.errorCode;
    out.error_message = response.errorMessage ?? "";
  } else {
    out.data = encodeValue(response.data);
    if (response.type === ResponseType.RESOURCE_SET) {
      out.page = response.page;
      out.limit = response.limit;
      out.total_items = response.totalItems;
      out.last_page = response.lastPage;
    }
  }

  out.runtime = Math.round(response.runtime * 1000) / 1000;
  return out;
}

export function serializeResponse(response: ApiResponse, pretty = false): string {
  return JSON.stringify(encodeResponse(response), null, pretty ? 2 : undefined);
}
