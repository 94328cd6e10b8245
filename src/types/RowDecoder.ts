/**
 * Converts raw result rows into records
 */

import type { Row } from "../db/QueryExecutor";
import type { Dialect } from "../dialect/Dialect";
import { snakeToCamel } from "../utils/naming";
import { FieldDefinition, NATIVE_HOST_TYPES } from "./TypeAdapter";
import { TypeAdapterRegistry, getTypeRegistry } from "./TypeAdapterRegistry";

export type FieldMap = Readonly<Record<string, FieldDefinition>>;

/**
 * Decode a row: columns become camelCase properties and fields with a
 * declared type go through their adapter. Undeclared columns are kept as
 * the driver returned them.
 */
export function decodeRow(
  row: Row,
  fields: FieldMap | undefined,
  dialect: Dialect,
  registry: TypeAdapterRegistry = getTypeRegistry()
): Row {
  const record: Row = {};

  for (const [column, value] of Object.entries(row)) {
    const property = snakeToCamel(column);
    const field = fields?.[property];

    if (!field || value === null || value === undefined) {
      record[property] = value;
      continue;
    }
    const overridden = field.adapter !== undefined || field.dbType !== undefined;
    if (!overridden && NATIVE_HOST_TYPES.has(field.type)) {
      record[property] = value;
      continue;
    }
    record[property] = registry
      .resolve(field.type, "fromDatabase", {
        dialect,
        override: { adapter: field.adapter, dbType: field.dbType },
      })
      .convert(value);
  }

  return record;
}

export function decodeRows(
  rows: readonly Row[],
  fields: FieldMap | undefined,
  dialect: Dialect,
  registry?: TypeAdapterRegistry
): Row[] {
  return rows.map((row) => decodeRow(row, fields, dialect, registry));
}
