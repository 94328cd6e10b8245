/**
 * Built-in type adapters
 *
 * One adapter per host type, each supporting one or more column
 * representations. Native representations never reach an adapter.
 */

import { parse as parseUuid, stringify as stringifyUuid, validate as validateUuid } from "uuid";
import { TypeAdapter, conversionError } from "./TypeAdapter";

// ============================================================================
// Boolean
// ============================================================================

const TRUE_TEXT = new Set(["true", "t", "1", "yes", "y"]);
const FALSE_TEXT = new Set(["false", "f", "0", "no", "n"]);

export const BooleanAdapter: TypeAdapter = {
  name: "BooleanAdapter",
  hostType: "boolean",
  dbTypes: ["integer", "text"],

  toDatabase(value, target) {
    if (typeof value !== "boolean") throw conversionError(this.name, value, target);
    return target === "text" ? String(value) : value ? 1 : 0;
  },

  fromDatabase(value, target) {
    if (typeof value === "boolean") return value;
    if (typeof value === "number" || typeof value === "bigint") return value !== 0 && value !== 0n;
    if (typeof value === "string") {
      const text = value.trim().toLowerCase();
      if (TRUE_TEXT.has(text)) return true;
      if (FALSE_TEXT.has(text)) return false;
    }
    throw conversionError(this.name, value, `boolean from ${target}`);
  },
};

// ============================================================================
// Date / time
// ============================================================================

export const DateTimeAdapter: TypeAdapter = {
  name: "DateTimeAdapter",
  hostType: "date",
  /** ISO-8601 text, epoch milliseconds, epoch seconds */
  dbTypes: ["text", "integer", "real"],

  toDatabase(value, target) {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw conversionError(this.name, value, target);
    }
    switch (target) {
      case "integer":
        return value.getTime();
      case "real":
        return value.getTime() / 1000;
      default:
        return value.toISOString();
    }
  },

  fromDatabase(value, target) {
    if (value instanceof Date) return value;
    let date: Date;
    if (typeof value === "string") {
      date = new Date(value);
    } else if (typeof value === "number" || typeof value === "bigint") {
      const numeric = Number(value);
      date = new Date(target === "real" ? Math.round(numeric * 1000) : numeric);
    } else {
      throw conversionError(this.name, value, `date from ${target}`);
    }
    if (Number.isNaN(date.getTime())) {
      throw conversionError(this.name, value, `date from ${target}`);
    }
    return date;
  },
};

// ============================================================================
// JSON
// ============================================================================

export const JsonAdapter: TypeAdapter = {
  name: "JsonAdapter",
  hostType: "json",
  dbTypes: ["text"],

  toDatabase(value) {
    return JSON.stringify(value);
  },

  fromDatabase(value, target) {
    // drivers with a JSON column type hand back parsed values
    if (typeof value !== "string") return value;
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch (error) {
      throw new TypeError(
        `${this.name}: invalid JSON in ${target} column: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  },
};

// ============================================================================
// UUID
// ============================================================================

export const UuidAdapter: TypeAdapter = {
  name: "UuidAdapter",
  hostType: "uuid",
  dbTypes: ["text", "blob"],

  toDatabase(value, target) {
    if (typeof value !== "string" || !validateUuid(value)) {
      throw conversionError(this.name, value, target);
    }
    return target === "blob" ? Buffer.from(parseUuid(value)) : value.toLowerCase();
  },

  fromDatabase(value, target) {
    if (typeof value === "string") return value.toLowerCase();
    if (value instanceof Uint8Array && value.length === 16) return stringifyUuid(value);
    throw conversionError(this.name, value, `uuid from ${target}`);
  },
};

// ============================================================================
// BigInt
// ============================================================================

export const BigIntAdapter: TypeAdapter = {
  name: "BigIntAdapter",
  hostType: "bigint",
  dbTypes: ["text", "integer"],

  toDatabase(value, target) {
    if (typeof value !== "bigint") throw conversionError(this.name, value, target);
    return target === "text" ? value.toString() : value;
  },

  fromDatabase(value, target) {
    if (typeof value === "bigint") return value;
    if (typeof value === "string" || (typeof value === "number" && Number.isInteger(value))) {
      return BigInt(value);
    }
    throw conversionError(this.name, value, `bigint from ${target}`);
  },
};

// ============================================================================
// Binary
// ============================================================================

export const BufferAdapter: TypeAdapter = {
  name: "BufferAdapter",
  hostType: "buffer",
  /** Raw bytes or base64 text */
  dbTypes: ["blob", "text"],

  toDatabase(value, target) {
    if (!(value instanceof Uint8Array)) throw conversionError(this.name, value, target);
    const buffer = Buffer.isBuffer(value) ? value : Buffer.from(value);
    return target === "text" ? buffer.toString("base64") : buffer;
  },

  fromDatabase(value, target) {
    if (Buffer.isBuffer(value)) return value;
    if (value instanceof Uint8Array) return Buffer.from(value);
    if (typeof value === "string" && target === "text") return Buffer.from(value, "base64");
    throw conversionError(this.name, value, `buffer from ${target}`);
  },
};

export const BUILTIN_ADAPTERS: readonly TypeAdapter[] = [
  BooleanAdapter,
  DateTimeAdapter,
  JsonAdapter,
  UuidAdapter,
  BigIntAdapter,
  BufferAdapter,
];
