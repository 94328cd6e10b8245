/**
 * sqlweave Type Adapters
 *
 * An adapter converts one host (JavaScript) type to one or more column
 * representations and back. Conversions are pure functions of
 * (value, target, options).
 */

export type BuiltinHostType =
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "date"
  | "json"
  | "uuid"
  | "buffer"
  | "null"
  | "unknown";

/**
 * Host types are open: custom adapters may introduce their own names
 */
export type HostType = BuiltinHostType | (string & {});

/**
 * Column representation an adapter converts to.
 * `native` means the driver accepts the host value unchanged.
 */
export type DbType = "native" | "text" | "integer" | "real" | "blob";

export type ConversionDirection = "toDatabase" | "fromDatabase";

export type AdapterOptions = Readonly<Record<string, unknown>>;

export interface TypeAdapter {
  readonly name: string;
  readonly hostType: HostType;
  /** Supported column representations, preferred first */
  readonly dbTypes: readonly DbType[];
  toDatabase(value: unknown, target: DbType, options?: AdapterOptions): unknown;
  fromDatabase(value: unknown, target: DbType, options?: AdapterOptions): unknown;
  /** Recognize values of this host type when no hint is given */
  detect?(value: unknown): boolean;
}

/**
 * Host types every driver binds without conversion
 */
export const NATIVE_HOST_TYPES: ReadonlySet<HostType> = new Set<HostType>([
  "string",
  "number",
  "null",
]);

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Infer the built-in host type of a value
 */
export function inferHostType(value: unknown): BuiltinHostType {
  if (value === null || value === undefined) return "null";
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    case "bigint":
      return "bigint";
    case "object":
      if (value instanceof Date) return "date";
      if (value instanceof Uint8Array) return "buffer";
      if (Array.isArray(value) || isPlainObject(value)) return "json";
      return "unknown";
    default:
      return "unknown";
  }
}

/**
 * Error raised by adapters on values they cannot convert
 */
export function conversionError(
  adapter: string,
  value: unknown,
  target: string
): TypeError {
  const actual = value === null ? "null" : typeof value;
  return new TypeError(`${adapter}: cannot convert ${actual} to ${target}`);
}

/**
 * Declared type of a model field. `dbType` and `adapter` override what the
 * dialect would suggest.
 */
export interface FieldDefinition {
  readonly type: HostType;
  readonly dbType?: DbType;
  readonly adapter?: TypeAdapter;
}
