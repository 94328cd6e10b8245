/**
 * MariaDB dialect
 *
 * Same syntax as MySQL; the feature timeline differs.
 */

import {
  ALL_RETURNING_FEATURES,
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
import { DialectName, ExplainOptions } from "./Dialect";
import { MysqlDialect } from "./MysqlDialect";

export class MariadbDialect extends MysqlDialect {
  static readonly defaultVersion: ServerVersion = [10, 11, 0];

  readonly name: DialectName = "mariadb";

  constructor(version: ServerVersion = MariadbDialect.defaultVersion) {
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
        TransactionCapability.IsolationLevels,
        TransactionCapability.ReadOnly
      )
      .add(
        C.BulkOperations,
        BulkOperationCapability.MultiRowInsert,
        BulkOperationCapability.BatchOperations
      )
      .add(C.AdvancedGrouping, AdvancedGroupingCapability.Rollup)
      .addSince(
        version,
        [10, 2, 3],
        C.JsonOperations,
        JsonCapability.Extract,
        JsonCapability.Contains,
        JsonCapability.Exists,
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
        [10, 2, 2],
        C.Cte,
        CteCapability.Basic,
        CteCapability.Recursive,
        CteCapability.CompoundRecursive
      )
      .addSince(version, [10, 2, 0], C.WindowFunctions, ALL_WINDOW_FUNCTIONS)
      .addSince(
        version,
        [10, 3, 0],
        C.SetOperations,
        SetOperationCapability.Intersect,
        SetOperationCapability.Except
      )
      .addSince(
        version,
        [10, 5, 0],
        C.SetOperations,
        SetOperationCapability.IntersectAll,
        SetOperationCapability.ExceptAll
      )
      .addSince(version, [10, 5, 0], C.ReturningClause, ALL_RETURNING_FEATURES)
      .build();
  }

  explainPrefix(options: ExplainOptions): string {
    if (options.analyze) return "ANALYZE";
    return options.format === "json" ? "EXPLAIN FORMAT=JSON" : "EXPLAIN";
  }
}
