/**
 * sqlweave Query Plan
 *
 * The statement-level half of the AST. Builders produce plans; the compiler
 * renders them. Plans are plain frozen data and can be shared freely.
 */

import type { Expression, OrderTerm } from "../expression/Expression";

// ============================================================================
// Sources and joins
// ============================================================================

export interface TableSource {
  readonly kind: "table";
  readonly name: string;
  readonly alias?: string;
}

export interface SubquerySource {
  readonly kind: "subquery";
  readonly plan: QueryPlan;
  readonly alias: string;
}

export type Source = TableSource | SubquerySource;

export type JoinKind = "INNER" | "LEFT" | "RIGHT" | "FULL" | "CROSS";

export interface JoinClause {
  readonly kind: JoinKind;
  readonly target: Source;
  readonly on?: Expression;
}

/**
 * LIMIT / OFFSET. Both are non-negative integers.
 */
export interface Pagination {
  readonly limit?: number;
  readonly offset?: number;
}

export interface CteDefinition {
  readonly name: string;
  readonly plan: QueryPlan;
  readonly columns?: readonly string[];
  /** true → MATERIALIZED, false → NOT MATERIALIZED, unset → no hint */
  readonly materialized?: boolean;
  readonly recursive: boolean;
}

// ============================================================================
// Query plans
// ============================================================================

export interface SelectPlan {
  readonly kind: "select";
  /** Empty means `*` */
  readonly select: readonly Expression[];
  readonly from?: Source;
  readonly joins: readonly JoinClause[];
  readonly where?: Expression;
  readonly groupBy: readonly Expression[];
  readonly having?: Expression;
  readonly orderBy: readonly OrderTerm[];
  readonly pagination?: Pagination;
  readonly distinct: boolean;
  readonly ctes: readonly CteDefinition[];
}

export type SetOperator = "UNION" | "INTERSECT" | "EXCEPT";

export interface SetOperationPlan {
  readonly kind: "setOperation";
  readonly operator: SetOperator;
  readonly all: boolean;
  readonly left: QueryPlan;
  readonly right: QueryPlan;
  readonly orderBy: readonly OrderTerm[];
  readonly pagination?: Pagination;
  readonly ctes: readonly CteDefinition[];
}

export type QueryPlan = SelectPlan | SetOperationPlan;

// ============================================================================
// Data modification plans
// ============================================================================

export interface InsertPlan {
  readonly kind: "insert";
  readonly table: string;
  readonly columns: readonly string[];
  /** One expression per column per row */
  readonly rows: ReadonlyArray<readonly Expression[]>;
  readonly returning: readonly Expression[];
}

export interface Assignment {
  readonly column: string;
  readonly value: Expression;
}

export interface UpdatePlan {
  readonly kind: "update";
  readonly table: string;
  readonly assignments: readonly Assignment[];
  readonly where?: Expression;
  readonly returning: readonly Expression[];
}

export interface DeletePlan {
  readonly kind: "delete";
  readonly table: string;
  readonly where?: Expression;
  readonly returning: readonly Expression[];
}

export type Statement = QueryPlan | InsertPlan | UpdatePlan | DeletePlan;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Anything that can stand in for a plan: a plan or a builder
 */
export interface PlanProvider {
  toPlan(): QueryPlan;
}

export type PlanSource = QueryPlan | PlanProvider;

export function resolvePlan(source: PlanSource): QueryPlan {
  return "toPlan" in source ? source.toPlan() : source;
}

export function emptySelectPlan(from?: Source): SelectPlan {
  return {
    kind: "select",
    select: [],
    from,
    joins: [],
    groupBy: [],
    orderBy: [],
    distinct: false,
    ctes: [],
  };
}

export function tableSource(name: string, alias?: string): TableSource {
  return { kind: "table", name, alias };
}

/**
 * Name a source is referenced by in the rest of the query
 */
export function sourceName(source: Source): string {
  return source.kind === "table" ? source.alias ?? source.name : source.alias;
}
