/**
 * Column / property name conversion.
 *
 * Columns are snake_case in the database; records expose camelCase keys.
 */

import type { Row } from "../db/QueryExecutor";

/**
 * Convert camelCase to snake_case for SQL
 */
export function camelToSnake(str: string): string {
  return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Convert snake_case to camelCase
 */
export function snakeToCamel(str: string): string {
  return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Transform a database row from snake_case to camelCase
 */
export function transformRow(row: Row): Row {
  const transformed: Row = {};

  for (const [key, value] of Object.entries(row)) {
    transformed[snakeToCamel(key)] = value;
  }

  return transformed;
}
