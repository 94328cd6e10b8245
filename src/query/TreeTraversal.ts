/**
 * sqlweave Tree Traversal
 *
 * Recursive CTE over an adjacency list (`id`, `parent_id`). Every row
 * carries its depth and the recursive member stops at `maxDepth`, so a
 * cycle in the data still terminates; the outer query returns each
 * reachable id once.
 *
 * @example
 * const ids = await treeTraversal(db, { table: "categories", start: 1 }).all();
 */

import { ormConfig } from "../config/db.config";
import type { Database } from "../db/Database";
import type { Row } from "../db/QueryExecutor";
import { InvalidPlanError } from "../errors/OrmErrors";
import { add, alias, column, eq, lt, raw } from "../expression/ExpressionFactory";
import type { QueryBuilder } from "./QueryBuilder";
import { tableSource } from "./QueryPlan";

export type TraversalDirection = "descendants" | "ancestors";

export interface TreeTraversalOptions {
  readonly table: string;
  /** Starting node id(s), included at depth 0 */
  readonly start: unknown;
  readonly idColumn?: string;
  readonly parentColumn?: string;
  readonly direction?: TraversalDirection;
  readonly maxDepth?: number;
  /** Name of the generated CTE */
  readonly name?: string;
  readonly connection?: string;
}

export function treeTraversal(db: Database, options: TreeTraversalOptions): QueryBuilder<Row> {
  const {
    table,
    start,
    idColumn = "id",
    parentColumn = "parent_id",
    direction = "descendants",
    maxDepth = ormConfig.recursiveMaxDepth,
    name = "tree",
    connection,
  } = options;

  if (!Number.isSafeInteger(maxDepth) || maxDepth < 0) {
    throw new InvalidPlanError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
  const starts: unknown[] = Array.isArray(start) ? start : [start];

  const anchor = db
    .from(table, connection)
    .select(column(idColumn), column(parentColumn), alias(raw("0"), "depth"))
    .whereIn(idColumn, starts);

  // descendants: child.parent = tree.id; ancestors: child.id = tree.parent
  const link =
    direction === "descendants"
      ? eq(column(parentColumn, "t"), column(idColumn, name))
      : eq(column(idColumn, "t"), column(parentColumn, name));

  const step = db
    .from(tableSource(table, "t"), connection)
    .select(
      column(idColumn, "t"),
      column(parentColumn, "t"),
      alias(add(column("depth", name), raw("1")), "depth")
    )
    .join(name, link)
    .where(lt(column("depth", name), raw(String(maxDepth))));

  return db
    .from(name, connection)
    .withCte(name, anchor.union(step, true), { recursive: true })
    .select(column(idColumn))
    .distinct();
}
