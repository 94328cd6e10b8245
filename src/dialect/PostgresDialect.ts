/**
 * PostgreSQL dialect
 */

import {
  ALL_GROUPING_FEATURES,
  ALL_JOINS,
  ALL_RETURNING_FEATURES,
  ALL_SET_OPERATIONS,
  ALL_WINDOW_FUNCTIONS,
  BulkOperationCapability,
  CapabilityCategory,
  CapabilityDescriptor,
  CapabilityDescriptorBuilder,
  CteCapability,
  JsonCapability,
  ServerVersion,
  TransactionCapability,
} from "../capabilities/Capabilities";
import type { DbType, HostType } from "../types/TypeAdapter";
import {
  Dialect,
  DialectName,
  ExplainOptions,
  FunctionMapping,
  PaginationStyle,
} from "./Dialect";

const stringAgg: FunctionMapping = (args, distinct) =>
  `STRING_AGG(${distinct ? "DISTINCT " : ""}${args[0]}, ${args[1] ?? "','"})`;

export class PostgresDialect extends Dialect {
  static readonly defaultVersion: ServerVersion = [16, 0, 0];

  readonly name: DialectName = "postgres";
  protected readonly quotes = ['"', '"'] as const;
  protected readonly reserved = Dialect.reservedWords("postgres");
  protected readonly functions: Readonly<Record<string, FunctionMapping>> = {
    IFNULL: "COALESCE",
    NVL: "COALESCE",
    NOW: "NOW",
    GROUP_CONCAT: stringAgg,
    JSON_EXTRACT: "JSONB_EXTRACT_PATH",
  };

  constructor(version: ServerVersion = PostgresDialect.defaultVersion) {
    super(version);
  }

  protected detectCapabilities(version: ServerVersion): CapabilityDescriptor {
    const C = CapabilityCategory;
    return new CapabilityDescriptorBuilder()
      .add(C.SetOperations, ALL_SET_OPERATIONS)
      .add(C.JoinOperations, ALL_JOINS)
      .add(
        C.TransactionFeatures,
        TransactionCapability.Savepoint,
        TransactionCapability.IsolationLevels,
        TransactionCapability.ReadOnly
      )
      .add(
        C.BulkOperations,
        BulkOperationCapability.MultiRowInsert,
        BulkOperationCapability.BatchOperations
      )
      .add(C.ReturningClause, ALL_RETURNING_FEATURES)
      .addSince(
        version,
        [8, 4, 0],
        C.Cte,
        CteCapability.Basic,
        CteCapability.Recursive,
        CteCapability.CompoundRecursive
      )
      .addSince(version, [8, 4, 0], C.WindowFunctions, ALL_WINDOW_FUNCTIONS)
      .addSince(version, [9, 1, 0], C.Cte, CteCapability.InDml)
      .addSince(
        version,
        [9, 2, 0],
        C.JsonOperations,
        JsonCapability.Extract,
        JsonCapability.Array,
        JsonCapability.Object
      )
      .addSince(
        version,
        [9, 4, 0],
        C.JsonOperations,
        JsonCapability.Contains,
        JsonCapability.Exists,
        JsonCapability.Keys
      )
      .addSince(version, [9, 5, 0], C.AdvancedGrouping, ALL_GROUPING_FEATURES)
      .addSince(
        version,
        [9, 5, 0],
        C.JsonOperations,
        JsonCapability.Set,
        JsonCapability.Remove
      )
      .addSince(
        version,
        [9, 6, 0],
        C.JsonOperations,
        JsonCapability.Insert,
        JsonCapability.Replace
      )
      .addSince(version, [12, 0, 0], C.Cte, CteCapability.Materialized)
      .build();
  }

  /**
   * Unquoted names fold to lower case, so mixed-case names need quotes
   */
  protected needsQuoting(identifier: string): boolean {
    return super.needsQuoting(identifier) || /[A-Z]/.test(identifier);
  }

  placeholder(index: number): string {
    return `$${index}`;
  }

  get paginationStyle(): PaginationStyle {
    return "limit-offset";
  }

  explainPrefix(options: ExplainOptions): string {
    const flags: string[] = [];
    if (options.analyze) flags.push("ANALYZE");
    if (options.format === "json") flags.push("FORMAT JSON");
    return flags.length > 0 ? `EXPLAIN (${flags.join(", ")})` : "EXPLAIN";
  }

  suggestDbType(hostType: HostType): DbType | undefined {
    switch (hostType) {
      case "json":
      case "bigint":
        return "text";
      case "boolean":
      case "date":
      case "uuid":
      case "buffer":
        return "native";
      default:
        return undefined;
    }
  }
}
