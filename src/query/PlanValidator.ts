/**
 * sqlweave Plan Validation
 *
 * Structural checks run before compilation. Nothing here depends on a
 * dialect; backend feature checks belong to the compiler.
 */

import { Expression } from "../expression/Expression";
import { ArityMismatchError, InvalidPlanError } from "../errors/OrmErrors";
import {
  CteDefinition,
  Pagination,
  QueryPlan,
  SelectPlan,
  SetOperationPlan,
  Source,
  Statement,
  sourceName,
} from "./QueryPlan";

// ============================================================================
// Arity
// ============================================================================

/**
 * Column count of a plan's result. A wildcard select has an unknown count;
 * `table` identifies what it expands over when that is a single table.
 */
export type PlanArity =
  | { readonly kind: "count"; readonly count: number }
  | { readonly kind: "wildcard"; readonly table?: string };

export function planArity(plan: QueryPlan): PlanArity {
  if (plan.kind === "setOperation") return planArity(plan.left);

  const hasStar = plan.select.some((expr) => expr.kind === "star");
  if (plan.select.length === 0 || hasStar) {
    const singleTable =
      plan.joins.length === 0 && plan.select.length <= 1 && plan.from?.kind === "table"
        ? plan.from.name
        : undefined;
    return { kind: "wildcard", table: singleTable };
  }
  return { kind: "count", count: plan.select.length };
}

function describeArity(arity: PlanArity): number | "wildcard" {
  return arity.kind === "count" ? arity.count : "wildcard";
}

/**
 * Throw ArityMismatchError unless both operands provably select the same
 * number of columns
 */
export function assertSameArity(left: QueryPlan, right: QueryPlan): void {
  const a = planArity(left);
  const b = planArity(right);

  if (a.kind === "count" && b.kind === "count") {
    if (a.count === b.count) return;
  } else if (
    a.kind === "wildcard" &&
    b.kind === "wildcard" &&
    a.table !== undefined &&
    a.table === b.table
  ) {
    return;
  }
  throw new ArityMismatchError(describeArity(a), describeArity(b));
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Visit every plan nested inside an expression (subqueries, IN subqueries)
 */
export function forEachNestedPlan(
  expression: Expression,
  visit: (plan: QueryPlan) => void
): void {
  switch (expression.kind) {
    case "subquery":
      visit(expression.plan);
      return;
    case "inSubquery":
      forEachNestedPlan(expression.operand, visit);
      visit(expression.plan);
      return;
    case "binary":
      forEachNestedPlan(expression.left, visit);
      forEachNestedPlan(expression.right, visit);
      return;
    case "unary":
      forEachNestedPlan(expression.operand, visit);
      return;
    case "in":
      forEachNestedPlan(expression.operand, visit);
      expression.values.forEach((value) => forEachNestedPlan(value, visit));
      return;
    case "function":
      expression.args.forEach((arg) => forEachNestedPlan(arg, visit));
      if (expression.over) forEachNestedPlan(expression.over, visit);
      return;
    case "window":
      expression.partitionBy.forEach((expr) => forEachNestedPlan(expr, visit));
      expression.orderBy.forEach((term) => forEachNestedPlan(term.expression, visit));
      return;
    case "case":
      for (const branch of expression.branches) {
        forEachNestedPlan(branch.when, visit);
        forEachNestedPlan(branch.then, visit);
      }
      if (expression.else) forEachNestedPlan(expression.else, visit);
      return;
    case "alias":
      forEachNestedPlan(expression.expression, visit);
      return;
    case "column":
    case "star":
    case "literal":
    case "raw":
      return;
  }
}

// ============================================================================
// Validation
// ============================================================================

function validatePagination(pagination: Pagination | undefined): void {
  if (!pagination) return;
  for (const [label, value] of [
    ["LIMIT", pagination.limit],
    ["OFFSET", pagination.offset],
  ] as const) {
    if (value !== undefined && !(Number.isSafeInteger(value) && value >= 0)) {
      throw new InvalidPlanError(
        `${label} must be a non-negative integer, got ${value}`
      );
    }
  }
}

function validateCtes(ctes: readonly CteDefinition[]): void {
  const names = new Set<string>();
  for (const cte of ctes) {
    if (names.has(cte.name)) {
      throw new InvalidPlanError(`Duplicate CTE name "${cte.name}"`);
    }
    names.add(cte.name);

    if (cte.recursive) {
      const body = cte.plan;
      if (body.kind !== "setOperation" || body.operator !== "UNION") {
        throw new InvalidPlanError(
          `Recursive CTE "${cte.name}" must combine its anchor and recursive member with UNION or UNION ALL`
        );
      }
    }
    if (cte.columns && cte.columns.length === 0) {
      throw new InvalidPlanError(`CTE "${cte.name}" has an empty column list`);
    }
    validatePlan(cte.plan);
  }
}

function validateSource(source: Source): void {
  if (source.kind === "subquery") validatePlan(source.plan);
}

function validateExpressions(expressions: readonly (Expression | undefined)[]): void {
  for (const expression of expressions) {
    if (expression) forEachNestedPlan(expression, validatePlan);
  }
}

function validateSelect(plan: SelectPlan): void {
  if (plan.having && plan.groupBy.length === 0) {
    throw new InvalidPlanError("HAVING requires a GROUP BY clause");
  }
  if (plan.joins.length > 0 && !plan.from) {
    throw new InvalidPlanError("JOIN requires a FROM clause");
  }

  const seen = new Set<string>();
  if (plan.from) {
    validateSource(plan.from);
    seen.add(sourceName(plan.from));
  }

  for (const join of plan.joins) {
    if (join.kind === "CROSS" && join.on) {
      throw new InvalidPlanError("CROSS JOIN cannot have an ON condition");
    }
    if (join.kind !== "CROSS" && !join.on) {
      throw new InvalidPlanError(`${join.kind} JOIN requires an ON condition`);
    }
    const name = sourceName(join.target);
    if (seen.has(name)) {
      throw new InvalidPlanError(
        `"${name}" appears more than once in FROM/JOIN; give the join target an alias`
      );
    }
    seen.add(name);
    validateSource(join.target);
  }

  validatePagination(plan.pagination);
  validateCtes(plan.ctes);
  validateExpressions([
    ...plan.select,
    plan.where,
    ...plan.groupBy,
    plan.having,
    ...plan.orderBy.map((term) => term.expression),
    ...plan.joins.map((join) => join.on),
  ]);
}

function validateSetOperation(plan: SetOperationPlan): void {
  for (const operand of [plan.left, plan.right]) {
    if (operand.ctes.length > 0) {
      throw new InvalidPlanError(
        "WITH clauses belong to the outermost query, not to set-operation operands"
      );
    }
    validatePlan(operand);
  }
  assertSameArity(plan.left, plan.right);
  validatePagination(plan.pagination);
  validateCtes(plan.ctes);
}

/**
 * Validate a query plan and everything nested in it
 */
export function validatePlan(plan: QueryPlan): void {
  if (plan.kind === "select") validateSelect(plan);
  else validateSetOperation(plan);
}

/**
 * Validate any statement, including data modification
 */
export function validateStatement(statement: Statement): void {
  switch (statement.kind) {
    case "select":
    case "setOperation":
      validatePlan(statement);
      return;

    case "insert":
      if (statement.columns.length === 0) {
        throw new InvalidPlanError(`INSERT into ${statement.table} has no columns`);
      }
      if (statement.rows.length === 0) {
        throw new InvalidPlanError(`INSERT into ${statement.table} has no rows`);
      }
      for (const row of statement.rows) {
        if (row.length !== statement.columns.length) {
          throw new InvalidPlanError(
            `INSERT row has ${row.length} values for ${statement.columns.length} columns`
          );
        }
        validateExpressions(row);
      }
      return;

    case "update":
      if (statement.assignments.length === 0) {
        throw new InvalidPlanError("UPDATE requires at least one assignment");
      }
      if (!statement.where) {
        throw new InvalidPlanError(
          "UPDATE requires at least one WHERE condition for safety"
        );
      }
      validateExpressions([
        statement.where,
        ...statement.assignments.map((assignment) => assignment.value),
      ]);
      return;

    case "delete":
      if (!statement.where) {
        throw new InvalidPlanError(
          "DELETE requires at least one WHERE condition for safety"
        );
      }
      validateExpressions([statement.where]);
      return;
  }
}
