/**
 * Oracle dialect
 */

import {
  ALL_GROUPING_FEATURES,
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
  versionAtLeast,
} from "../capabilities/Capabilities";
import type { DbType, HostType } from "../types/TypeAdapter";
import {
  Dialect,
  DialectName,
  FunctionMapping,
  PaginationStyle,
} from "./Dialect";

const listAgg: FunctionMapping = (args) =>
  `LISTAGG(${args[0]}, ${args[1] ?? "','"}) WITHIN GROUP (ORDER BY ${args[0]})`;

export class OracleDialect extends Dialect {
  static readonly defaultVersion: ServerVersion = [19, 0, 0];

  readonly name: DialectName = "oracle";
  protected readonly quotes = ['"', '"'] as const;
  protected readonly reserved = Dialect.reservedWords("oracle");
  protected readonly functions: Readonly<Record<string, FunctionMapping>> = {
    IFNULL: "NVL",
    NVL: "NVL",
    NOW: () => "SYSTIMESTAMP",
    SUBSTRING: "SUBSTR",
    RANDOM: () => "DBMS_RANDOM.VALUE",
    GROUP_CONCAT: listAgg,
    CONCAT: Dialect.infix("||"),
  };

  readonly tableAliasKeyword = " ";
  readonly recursiveKeyword = false;
  readonly recursiveCteRequiresColumns = true;
  readonly selectWithoutFrom = " FROM DUAL";
  readonly maxInListSize = 1000;

  constructor(version: ServerVersion = OracleDialect.defaultVersion) {
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
        TransactionCapability.IsolationLevels,
        TransactionCapability.ReadOnly
      )
      .add(C.BulkOperations, BulkOperationCapability.BatchOperations)
      .add(C.WindowFunctions, ALL_WINDOW_FUNCTIONS)
      .add(C.AdvancedGrouping, ALL_GROUPING_FEATURES)
      .addSince(version, [9, 2, 0], C.Cte, CteCapability.Basic)
      .addSince(version, [11, 2, 0], C.Cte, CteCapability.Recursive)
      .addSince(
        version,
        [12, 1, 0],
        C.JsonOperations,
        JsonCapability.Extract,
        JsonCapability.Exists
      )
      .addSince(
        version,
        [12, 2, 0],
        C.JsonOperations,
        JsonCapability.Array,
        JsonCapability.Object
      )
      .addSince(
        version,
        [21, 0, 0],
        C.SetOperations,
        SetOperationCapability.IntersectAll,
        SetOperationCapability.ExceptAll
      )
      .build();
  }

  placeholder(index: number): string {
    return `:p${index}`;
  }

  get paginationStyle(): PaginationStyle {
    return versionAtLeast(this.version, [12, 1, 0]) ? "offset-fetch" : "rownum";
  }

  explainPrefix(): string {
    return "EXPLAIN PLAN FOR";
  }

  setOperatorKeyword(operator: "UNION" | "INTERSECT" | "EXCEPT"): string {
    return operator === "EXCEPT" ? "MINUS" : operator;
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
