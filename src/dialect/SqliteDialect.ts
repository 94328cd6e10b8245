/**
 * SQLite dialect
 */

import {
  ALL_RETURNING_FEATURES,
  ALL_WINDOW_FUNCTIONS,
  BulkOperationCapability,
  CapabilityCategory,
  CapabilityDescriptor,
  CapabilityDescriptorBuilder,
  CteCapability,
  JoinCapability,
  JsonCapability,
  ServerVersion,
  SetOperationCapability,
  TransactionCapability,
} from "../capabilities/Capabilities";
import type { DbType, HostType } from "../types/TypeAdapter";
import {
  Dialect,
  DialectName,
  FunctionMapping,
  PaginationStyle,
} from "./Dialect";

export class SqliteDialect extends Dialect {
  static readonly defaultVersion: ServerVersion = [3, 35, 0];

  readonly name: DialectName = "sqlite";
  protected readonly quotes = ['"', '"'] as const;
  protected readonly reserved = Dialect.reservedWords("sqlite");
  protected readonly functions: Readonly<Record<string, FunctionMapping>> = {
    IFNULL: "IFNULL",
    NVL: "IFNULL",
    NOW: () => "CURRENT_TIMESTAMP",
    SUBSTRING: "SUBSTR",
    CONCAT: Dialect.infix("||"),
  };

  // SQLite rejects parenthesized compound-select operands
  readonly parenthesizeSetOperands = false;
  readonly limitAllSentinel = "-1";

  constructor(version: ServerVersion = SqliteDialect.defaultVersion) {
    super(version);
  }

  protected detectCapabilities(version: ServerVersion): CapabilityDescriptor {
    const C = CapabilityCategory;
    return new CapabilityDescriptorBuilder()
      .add(
        C.SetOperations,
        SetOperationCapability.Union,
        SetOperationCapability.UnionAll,
        SetOperationCapability.Intersect,
        SetOperationCapability.Except
      )
      .add(C.JoinOperations, JoinCapability.Inner, JoinCapability.Left, JoinCapability.Cross)
      .add(C.TransactionFeatures, TransactionCapability.Savepoint)
      .add(C.BulkOperations, BulkOperationCapability.BatchOperations)
      .addSince(version, [3, 7, 11], C.BulkOperations, BulkOperationCapability.MultiRowInsert)
      .addSince(version, [3, 8, 3], C.Cte, CteCapability.Basic, CteCapability.Recursive)
      .addSince(
        version,
        [3, 9, 0],
        C.JsonOperations,
        JsonCapability.Extract,
        JsonCapability.Contains,
        JsonCapability.Exists,
        JsonCapability.Keys,
        JsonCapability.Array,
        JsonCapability.Object
      )
      .addSince(version, [3, 25, 0], C.WindowFunctions, ALL_WINDOW_FUNCTIONS)
      .addSince(version, [3, 34, 0], C.Cte, CteCapability.CompoundRecursive)
      .addSince(version, [3, 35, 0], C.Cte, CteCapability.Materialized)
      .addSince(version, [3, 35, 0], C.ReturningClause, ALL_RETURNING_FEATURES)
      .addSince(
        version,
        [3, 38, 0],
        C.JsonOperations,
        JsonCapability.Set,
        JsonCapability.Insert,
        JsonCapability.Replace,
        JsonCapability.Remove
      )
      .addSince(version, [3, 39, 0], C.JoinOperations, JoinCapability.Right, JoinCapability.Full)
      .build();
  }

  placeholder(_index: number): string {
    return "?";
  }

  get paginationStyle(): PaginationStyle {
    return "limit-offset";
  }

  explainPrefix(): string {
    return "EXPLAIN QUERY PLAN";
  }

  suggestDbType(hostType: HostType): DbType | undefined {
    switch (hostType) {
      case "boolean":
      case "bigint":
        return "integer";
      case "date":
      case "json":
      case "uuid":
        return "text";
      case "buffer":
        return "native";
      default:
        return undefined;
    }
  }
}
