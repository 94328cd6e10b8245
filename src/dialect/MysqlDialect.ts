/**
 * MySQL dialect
 */

import {
  ALL_WINDOW_FUNCTIONS,
  AdvancedGroupingCapability,
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
  ExplainOptions,
  FunctionMapping,
  PaginationStyle,
} from "./Dialect";

export class MysqlDialect extends Dialect {
  static readonly defaultVersion: ServerVersion = [8, 0, 35];

  readonly name: DialectName = "mysql";
  protected readonly quotes = ["`", "`"] as const;
  protected readonly reserved = Dialect.reservedWords("mysql");
  protected readonly functions: Readonly<Record<string, FunctionMapping>> = {
    IFNULL: "IFNULL",
    NVL: "IFNULL",
    NOW: "NOW",
    LENGTH: "CHAR_LENGTH",
    RANDOM: "RAND",
  };

  readonly limitAllSentinel = "18446744073709551615";

  constructor(version: ServerVersion = MysqlDialect.defaultVersion) {
    super(version);
  }

  protected detectCapabilities(version: ServerVersion): CapabilityDescriptor {
    const C = CapabilityCategory;
    return new CapabilityDescriptorBuilder()
      .add(C.SetOperations, SetOperationCapability.Union, SetOperationCapability.UnionAll)
      .add(
        C.JoinOperations,
        JoinCapability.Inner,
        JoinCapability.Left,
        JoinCapability.Right,
        JoinCapability.Cross
      )
      .add(
        C.TransactionFeatures,
        TransactionCapability.Savepoint,
        TransactionCapability.IsolationLevels
      )
      .add(
        C.BulkOperations,
        BulkOperationCapability.MultiRowInsert,
        BulkOperationCapability.BatchOperations
      )
      .add(C.AdvancedGrouping, AdvancedGroupingCapability.Rollup)
      .addSince(version, [5, 6, 5], C.TransactionFeatures, TransactionCapability.ReadOnly)
      .addSince(
        version,
        [5, 7, 8],
        C.JsonOperations,
        JsonCapability.Extract,
        JsonCapability.Contains,
        JsonCapability.Set,
        JsonCapability.Insert,
        JsonCapability.Replace,
        JsonCapability.Remove,
        JsonCapability.Keys,
        JsonCapability.Array,
        JsonCapability.Object
      )
      .addSince(
        version,
        [8, 0, 0],
        C.Cte,
        CteCapability.Basic,
        CteCapability.Recursive,
        CteCapability.CompoundRecursive,
        CteCapability.InDml
      )
      .addSince(version, [8, 0, 0], C.WindowFunctions, ALL_WINDOW_FUNCTIONS)
      .addSince(
        version,
        [8, 0, 31],
        C.SetOperations,
        SetOperationCapability.Intersect,
        SetOperationCapability.IntersectAll,
        SetOperationCapability.Except,
        SetOperationCapability.ExceptAll
      )
      .build();
  }

  placeholder(_index: number): string {
    return "?";
  }

  get paginationStyle(): PaginationStyle {
    return "limit-offset";
  }

  explainPrefix(options: ExplainOptions): string {
    if (options.analyze) return "EXPLAIN ANALYZE";
    return options.format === "json" ? "EXPLAIN FORMAT=JSON" : "EXPLAIN";
  }

  suggestDbType(hostType: HostType): DbType | undefined {
    switch (hostType) {
      case "boolean":
        return "integer";
      case "json":
      case "uuid":
      case "bigint":
        return "text";
      case "date":
      case "buffer":
        return "native";
      default:
        return undefined;
    }
  }
}
