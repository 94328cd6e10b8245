/**
 * Dialect registry and capability-based selection
 */

import {
  CapabilityCategory,
  CategoryFlags,
  ServerVersion,
  parseServerVersion,
} from "../capabilities/Capabilities";
import { Dialect, DialectName } from "./Dialect";
import { MariadbDialect } from "./MariadbDialect";
import { MysqlDialect } from "./MysqlDialect";
import { OracleDialect } from "./OracleDialect";
import { PostgresDialect } from "./PostgresDialect";
import { SqliteDialect } from "./SqliteDialect";
import { SqlServerDialect } from "./SqlServerDialect";

export * from "./Dialect";
export {
  MariadbDialect,
  MysqlDialect,
  OracleDialect,
  PostgresDialect,
  SqliteDialect,
  SqlServerDialect,
};

export const DIALECT_NAMES: readonly DialectName[] = [
  "sqlite",
  "mysql",
  "mariadb",
  "postgres",
  "oracle",
  "sqlserver",
];

/**
 * Create a dialect for a backend, optionally at a given server version
 * ("3.39.4" or a version triple)
 */
export function createDialect(
  name: DialectName,
  version?: string | ServerVersion
): Dialect {
  const parsed = typeof version === "string" ? parseServerVersion(version) : version;
  switch (name) {
    case "sqlite":
      return new SqliteDialect(parsed);
    case "mysql":
      return new MysqlDialect(parsed);
    case "mariadb":
      return new MariadbDialect(parsed);
    case "postgres":
      return new PostgresDialect(parsed);
    case "oracle":
      return new OracleDialect(parsed);
    case "sqlserver":
      return new SqlServerDialect(parsed);
  }
}

/**
 * Every backend at its default version
 */
export function allDialects(): Dialect[] {
  return DIALECT_NAMES.map((name) => createDialect(name));
}

// ============================================================================
// Test selection
// ============================================================================

export interface CapabilityRequirement {
  readonly category: CapabilityCategory;
  /** Omitted: any capability of the category will do */
  readonly capability?: number;
}

export function requires<C extends CapabilityCategory>(
  category: C,
  capability?: CategoryFlags[C]
): CapabilityRequirement {
  return { category, capability };
}

export function meetsRequirements(
  dialect: Dialect,
  requirements: readonly CapabilityRequirement[]
): boolean {
  return requirements.every(({ category, capability }) => {
    if (capability === undefined) {
      return dialect.capabilities.supportsCategory(category);
    }
    return (dialect.capabilities.mask(category) & capability) === capability;
  });
}

/**
 * Dialects a scenario applies to
 *
 * @example
 * const targets = selectDialects([requires(CapabilityCategory.Cte, CteCapability.Recursive)]);
 */
export function selectDialects(
  requirements: readonly CapabilityRequirement[],
  dialects: readonly Dialect[] = allDialects()
): Dialect[] {
  return dialects.filter((dialect) => meetsRequirements(dialect, requirements));
}
