/**
 * SQL Server dialect
 */

import {
  ALL_GROUPING_FEATURES,
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
  WindowFunctionCapability,
  versionAtLeast,
} from "../capabilities/Capabilities";
import { UnsupportedFeatureError } from "../errors/OrmErrors";
import type { DbType, HostType } from "../types/TypeAdapter";
import {
  Dialect,
  DialectName,
  FunctionMapping,
  PaginationStyle,
} from "./Dialect";

const stringAgg: FunctionMapping = (args) =>
  `STRING_AGG(${args[0]}, ${args[1] ?? "','"})`;

export class SqlServerDialect extends Dialect {
  static readonly defaultVersion: ServerVersion = [16, 0, 0];

  readonly name: DialectName = "sqlserver";
  protected readonly quotes = ["[", "]"] as const;
  protected readonly reserved = Dialect.reservedWords("sqlserver");
  protected readonly functions: Readonly<Record<string, FunctionMapping>> = {
    IFNULL: "ISNULL",
    NVL: "ISNULL",
    NOW: () => "GETDATE()",
    LENGTH: "LEN",
    RANDOM: "RAND",
    GROUP_CONCAT: stringAgg,
    JSON_EXTRACT: "JSON_VALUE",
  };

  readonly offsetRequiresOrderBy = true;

  constructor(version: ServerVersion = SqlServerDialect.defaultVersion) {
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
        JoinCapability.Full,
        JoinCapability.Cross
      )
      .add(
        C.TransactionFeatures,
        TransactionCapability.Savepoint,
        TransactionCapability.IsolationLevels
      )
      .add(C.BulkOperations, BulkOperationCapability.BatchOperations)
      .addSince(
        version,
        [9, 0, 0],
        C.SetOperations,
        SetOperationCapability.Intersect,
        SetOperationCapability.Except
      )
      .addSince(version, [9, 0, 0], C.Cte, CteCapability.Basic, CteCapability.Recursive)
      .addSince(
        version,
        [9, 0, 0],
        C.WindowFunctions,
        WindowFunctionCapability.RowNumber,
        WindowFunctionCapability.Rank,
        WindowFunctionCapability.DenseRank,
        WindowFunctionCapability.Ntile
      )
      .addSince(version, [10, 0, 0], C.AdvancedGrouping, ALL_GROUPING_FEATURES)
      .addSince(version, [10, 0, 0], C.BulkOperations, BulkOperationCapability.MultiRowInsert)
      .addSince(
        version,
        [11, 0, 0],
        C.WindowFunctions,
        WindowFunctionCapability.Lag,
        WindowFunctionCapability.Lead,
        WindowFunctionCapability.FirstValue,
        WindowFunctionCapability.LastValue,
        WindowFunctionCapability.CumeDist,
        WindowFunctionCapability.PercentRank
      )
      .addSince(
        version,
        [13, 0, 0],
        C.JsonOperations,
        JsonCapability.Extract,
        JsonCapability.Set,
        JsonCapability.Object
      )
      .addSince(version, [16, 0, 0], C.JsonOperations, JsonCapability.Array)
      .build();
  }

  placeholder(index: number): string {
    return `@p${index}`;
  }

  get paginationStyle(): PaginationStyle {
    return versionAtLeast(this.version, [11, 0, 0]) ? "offset-fetch" : "top";
  }

  explainPrefix(): string {
    throw new UnsupportedFeatureError(
      this.label,
      undefined,
      "EXPLAIN",
      "use SET SHOWPLAN_XML ON on the session instead"
    );
  }

  suggestDbType(hostType: HostType): DbType | undefined {
    switch (hostType) {
      case "json":
      case "uuid":
      case "bigint":
        return "text";
      case "boolean":
      case "date":
      case "buffer":
        return "native";
      default:
        return undefined;
    }
  }
}
