/**
 * sqlweave Set Operation Builder
 *
 * UNION / INTERSECT / EXCEPT over two or more plans. ORDER BY and
 * pagination apply to the combined result.
 */

import { CompiledQuery, SqlCompiler } from "../compiler/SqlCompiler";
import type { Database } from "../db/Database";
import { QueryExecutor, Row, runCompiled, runCompiledSync } from "../db/QueryExecutor";
import type { Dialect } from "../dialect/Dialect";
import { Expression, OrderTerm, SortDirection, isExpression } from "../expression/Expression";
import { column } from "../expression/ExpressionFactory";
import { camelToSnake, transformRow } from "../utils/naming";
import { assertSameArity } from "./PlanValidator";
import {
  PlanProvider,
  PlanSource,
  QueryPlan,
  SetOperationPlan,
  SetOperator,
  resolvePlan,
} from "./QueryPlan";

/**
 * Combine two plans; operand arity is checked here, before any SQL exists
 */
export function combinePlans(
  left: QueryPlan,
  operator: SetOperator,
  all: boolean,
  right: QueryPlan
): SetOperationPlan {
  assertSameArity(left, right);
  return Object.freeze({
    kind: "setOperation",
    operator,
    all,
    left,
    right,
    orderBy: [],
    ctes: [],
  });
}

export class SetOperationBuilder implements PlanProvider {
  constructor(
    private readonly db: Database,
    private readonly plan: SetOperationPlan,
    private readonly connection: string,
    private readonly executor?: QueryExecutor
  ) {}

  orderBy(target: string | Expression | OrderTerm, direction: SortDirection = "ASC"): SetOperationBuilder {
    const term: OrderTerm =
      typeof target === "string"
        ? { expression: column(camelToSnake(target)), direction }
        : isExpression(target)
        ? { expression: target, direction }
        : target;
    return this.derive({ ...this.plan, orderBy: [...this.plan.orderBy, Object.freeze(term)] });
  }

  limit(count: number): SetOperationBuilder {
    return this.derive({ ...this.plan, pagination: { ...this.plan.pagination, limit: count } });
  }

  offset(count: number): SetOperationBuilder {
    return this.derive({ ...this.plan, pagination: { ...this.plan.pagination, offset: count } });
  }

  union(other: PlanSource, all = false): SetOperationBuilder {
    return this.combine("UNION", other, all);
  }

  intersect(other: PlanSource, all = false): SetOperationBuilder {
    return this.combine("INTERSECT", other, all);
  }

  except(other: PlanSource, all = false): SetOperationBuilder {
    return this.combine("EXCEPT", other, all);
  }

  using(executor: QueryExecutor): SetOperationBuilder {
    return new SetOperationBuilder(this.db, this.plan, this.connection, executor);
  }

  toPlan(): SetOperationPlan {
    return this.plan;
  }

  toSQL(dialect?: Dialect): CompiledQuery {
    return new SqlCompiler(dialect ?? this.resolveExecutor().dialect).compile(this.plan);
  }

  /**
   * Rows as dictionaries with camelCase keys
   */
  async all(): Promise<Row[]> {
    const executor = this.resolveExecutor();
    const compiled = new SqlCompiler(executor.dialect).compile(this.plan);
    const result = await runCompiled(executor, compiled, this.db.types);
    return result.rows.map(transformRow);
  }

  allSync(): Row[] {
    const executor = this.resolveExecutor();
    const compiled = new SqlCompiler(executor.dialect).compile(this.plan);
    return runCompiledSync(executor, compiled, this.db.types).rows.map(transformRow);
  }

  private derive(plan: SetOperationPlan): SetOperationBuilder {
    return new SetOperationBuilder(this.db, Object.freeze(plan), this.connection, this.executor);
  }

  /**
   * The current plan (with its ordering and pagination) becomes the left
   * operand of the new operation
   */
  private combine(operator: SetOperator, other: PlanSource, all: boolean): SetOperationBuilder {
    return this.derive(combinePlans(this.plan, operator, all, resolvePlan(other)));
  }

  private resolveExecutor(): QueryExecutor {
    return this.executor ?? this.db.connection(this.connection);
  }
}
