/**
 * sqlweave Query Builder
 *
 * A fluent, copy-on-chain SELECT builder. Every method returns a new
 * builder, so a base query can be branched freely. Builders only produce
 * plans; the dialect compiler turns them into SQL when a terminal runs.
 *
 * @template TModel - The record type returned by `all()` / `one()`
 */

import { SqlCompiler, CompiledQuery } from "../compiler/SqlCompiler";
import type { Database, ModelMeta } from "../db/Database";
import {
  QueryExecutor,
  Row,
  runCompiled,
  runCompiledSync,
} from "../db/QueryExecutor";
import type { Dialect, ExplainOptions } from "../dialect/Dialect";
import { InvalidPlanError } from "../errors/OrmErrors";
import {
  Expression,
  OrderTerm,
  SortDirection,
  isExpression,
} from "../expression/Expression";
import {
  alias,
  and_,
  func,
  inSubquery,
  or_,
  raw,
} from "../expression/ExpressionFactory";
import type { EagerLoadRequest } from "../relation/EagerLoadTree";
import {
  EagerLoadPlan,
  loadRelations,
  loadRelationsSync,
  planEagerLoad,
} from "../relation/RelationLoader";
import { decodeRows } from "../types/RowDecoder";
import { ColumnResolver, WhereArgs, WhereOperator } from "./Conditions";
import {
  CteDefinition,
  JoinClause,
  JoinKind,
  PlanProvider,
  PlanSource,
  SelectPlan,
  SetOperator,
  Source,
  emptySelectPlan,
  resolvePlan,
  tableSource,
} from "./QueryPlan";
import { SetOperationBuilder, combinePlans } from "./SetOperationBuilder";

// ============================================================================
// Type Utilities
// ============================================================================

/**
 * A model property, or a table-qualified column ("posts.userId")
 */
export type ColumnRef<TModel> = (keyof TModel & string) | `${string}.${string}`;

/**
 * Filter object keyed by model properties
 */
export type WhereFilter<TModel> = { readonly [K in keyof TModel & string]?: unknown };

export interface CteOptions {
  readonly columns?: readonly string[];
  /** true → MATERIALIZED, false → NOT MATERIALIZED */
  readonly materialized?: boolean;
  /** Overrides the builder-wide `recursive()` flag for this CTE */
  readonly recursive?: boolean;
}

export interface ExecuteOptions {
  /** Cancels eager loading between batches */
  readonly signal?: AbortSignal;
}

/**
 * Where a builder reads from and which model metadata applies
 */
export interface BuilderContext {
  readonly db: Database;
  readonly model?: ModelMeta;
  readonly source: Source;
  readonly connection: string;
}

interface CteEntry {
  readonly name: string;
  readonly plan: PlanSource;
  readonly options: CteOptions;
}

interface BuilderState {
  readonly select: readonly Expression[];
  readonly joins: readonly JoinClause[];
  readonly where?: Expression;
  readonly groupBy: readonly Expression[];
  readonly having?: Expression;
  readonly orderBy: readonly OrderTerm[];
  readonly limit?: number;
  readonly offset?: number;
  readonly distinct: boolean;
  readonly ctes: readonly CteEntry[];
  readonly recursive: boolean;
  readonly eager: readonly EagerLoadRequest[];
  readonly executor?: QueryExecutor;
  readonly explain?: ExplainOptions;
}

const INITIAL_STATE: BuilderState = Object.freeze({
  select: [],
  joins: [],
  groupBy: [],
  orderBy: [],
  distinct: false,
  ctes: [],
  recursive: false,
  eager: [],
});

function isOrderTerm(value: string | Expression | OrderTerm): value is OrderTerm {
  return typeof value !== "string" && !isExpression(value);
}

function isValueList(values: readonly unknown[] | PlanSource): values is readonly unknown[] {
  return Array.isArray(values);
}

function isRecursiveBody(source: PlanSource): boolean {
  const plan = resolvePlan(source);
  return plan.kind === "setOperation" && plan.operator === "UNION";
}

// ============================================================================
// QueryBuilder Class
// ============================================================================

export class QueryBuilder<TModel extends object = Row> implements PlanProvider {
  private readonly context: BuilderContext;
  private readonly state: BuilderState;

  constructor(context: BuilderContext, state: BuilderState = INITIAL_STATE) {
    this.context = context;
    this.state = state;
  }

  // ==========================================================================
  // SELECT
  // ==========================================================================

  /**
   * Columns to return; no call (or no arguments) selects `*`
   */
  select(...columns: Array<ColumnRef<TModel> | Expression>): QueryBuilder<TModel> {
    return this.derive({ select: columns.map((c) => this.toColumn(c)) });
  }

  distinct(flag = true): QueryBuilder<TModel> {
    return this.derive({ distinct: flag });
  }

  // ==========================================================================
  // WHERE - calls compose with AND
  // ==========================================================================

  where(condition: Expression): QueryBuilder<TModel>;
  where(filter: WhereFilter<TModel>): QueryBuilder<TModel>;
  where(column: ColumnRef<TModel>, value: unknown): QueryBuilder<TModel>;
  where(
    column: ColumnRef<TModel>,
    operator: WhereOperator,
    value: unknown
  ): QueryBuilder<TModel>;
  where(...args: WhereArgs): QueryBuilder<TModel> {
    return this.andWhere(this.resolver().conditions(args));
  }

  /**
   * OR the new condition with everything accumulated so far
   */
  orWhere(condition: Expression): QueryBuilder<TModel>;
  orWhere(filter: WhereFilter<TModel>): QueryBuilder<TModel>;
  orWhere(column: ColumnRef<TModel>, value: unknown): QueryBuilder<TModel>;
  orWhere(
    column: ColumnRef<TModel>,
    operator: WhereOperator,
    value: unknown
  ): QueryBuilder<TModel>;
  orWhere(...args: WhereArgs): QueryBuilder<TModel> {
    const [first, ...rest] = this.resolver().conditions(args);
    if (first === undefined) return this;
    const condition = and_(first, ...rest);
    return this.derive({
      where: this.state.where ? or_(this.state.where, condition) : condition,
    });
  }

  whereNull(column: ColumnRef<TModel>): QueryBuilder<TModel> {
    return this.andWhere([this.resolver().compare(column, "=", null)]);
  }

  whereNotNull(column: ColumnRef<TModel>): QueryBuilder<TModel> {
    return this.andWhere([this.resolver().compare(column, "<>", null)]);
  }

  /**
   * IN over a list of values or a subquery. An empty list matches nothing.
   */
  whereIn(column: ColumnRef<TModel>, values: readonly unknown[] | PlanSource): QueryBuilder<TModel> {
    const resolver = this.resolver();
    const condition = isValueList(values)
      ? resolver.compare(column, "IN", [...values])
      : inSubquery(resolver.column(column), values);
    return this.andWhere([condition]);
  }

  whereNotIn(column: ColumnRef<TModel>, values: readonly unknown[] | PlanSource): QueryBuilder<TModel> {
    const resolver = this.resolver();
    const condition = isValueList(values)
      ? resolver.compare(column, "NOT IN", [...values])
      : inSubquery(resolver.column(column), values, true);
    return this.andWhere([condition]);
  }

  // ==========================================================================
  // ORDER BY / GROUP BY / HAVING
  // ==========================================================================

  orderBy(
    column: ColumnRef<TModel> | Expression | OrderTerm,
    direction: SortDirection = "ASC"
  ): QueryBuilder<TModel> {
    const term: OrderTerm = isOrderTerm(column)
      ? column
      : { expression: this.toColumn(column), direction };
    return this.derive({ orderBy: [...this.state.orderBy, Object.freeze(term)] });
  }

  groupBy(...columns: Array<ColumnRef<TModel> | Expression>): QueryBuilder<TModel> {
    return this.derive({
      groupBy: [...this.state.groupBy, ...columns.map((c) => this.toColumn(c))],
    });
  }

  having(condition: Expression): QueryBuilder<TModel> {
    return this.derive({
      having: this.state.having ? and_(this.state.having, condition) : condition,
    });
  }

  // ==========================================================================
  // LIMIT & OFFSET
  // ==========================================================================

  limit(count: number): QueryBuilder<TModel> {
    return this.derive({ limit: count });
  }

  offset(count: number): QueryBuilder<TModel> {
    return this.derive({ offset: count });
  }

  // ==========================================================================
  // JOIN
  // ==========================================================================

  /**
   * Join a table (optionally aliased) or a subquery (alias required)
   */
  join(target: string | PlanSource, on: Expression, aliasName?: string): QueryBuilder<TModel> {
    return this.addJoin("INNER", target, on, aliasName);
  }

  leftJoin(target: string | PlanSource, on: Expression, aliasName?: string): QueryBuilder<TModel> {
    return this.addJoin("LEFT", target, on, aliasName);
  }

  rightJoin(target: string | PlanSource, on: Expression, aliasName?: string): QueryBuilder<TModel> {
    return this.addJoin("RIGHT", target, on, aliasName);
  }

  fullJoin(target: string | PlanSource, on: Expression, aliasName?: string): QueryBuilder<TModel> {
    return this.addJoin("FULL", target, on, aliasName);
  }

  crossJoin(target: string | PlanSource, aliasName?: string): QueryBuilder<TModel> {
    return this.addJoin("CROSS", target, undefined, aliasName);
  }

  // ==========================================================================
  // CTE
  // ==========================================================================

  withCte(name: string, query: PlanSource, options: CteOptions = {}): QueryBuilder<TModel> {
    return this.derive({ ctes: [...this.state.ctes, { name, plan: query, options }] });
  }

  /**
   * Mark the WITH clause recursive. CTEs without their own `recursive`
   * option become recursive when their body is a UNION.
   */
  recursive(flag = true): QueryBuilder<TModel> {
    return this.derive({ recursive: flag });
  }

  // ==========================================================================
  // INCLUDE - Eager Loading Relationships
  // ==========================================================================

  /**
   * Eager-load relations into the records returned by `all()` / `one()`
   *
   * @example
   * await db.query<User>("User")
   *   .with("posts.comments", ["profile", (q) => q.select("id", "bio")])
   *   .all();
   */
  with(...requests: EagerLoadRequest[]): QueryBuilder<TModel> {
    return this.derive({ eager: [...this.state.eager, ...requests] });
  }

  includes(...requests: EagerLoadRequest[]): QueryBuilder<TModel> {
    return this.with(...requests);
  }

  // ==========================================================================
  // SET OPERATIONS
  // ==========================================================================

  union(other: PlanSource, all = false): SetOperationBuilder {
    return this.combine("UNION", other, all);
  }

  intersect(other: PlanSource, all = false): SetOperationBuilder {
    return this.combine("INTERSECT", other, all);
  }

  except(other: PlanSource, all = false): SetOperationBuilder {
    return this.combine("EXCEPT", other, all);
  }

  // ==========================================================================
  // EXECUTION SETTINGS
  // ==========================================================================

  /**
   * Run on a specific executor (a transaction client, another pool)
   */
  using(executor: QueryExecutor): QueryBuilder<TModel> {
    return this.derive({ executor });
  }

  /**
   * Make `aggregate()` return the backend's query plan instead of rows
   */
  explain(options: ExplainOptions = {}): QueryBuilder<TModel> {
    return this.derive({ explain: options });
  }

  // ==========================================================================
  // PLAN / SQL
  // ==========================================================================

  toPlan(): SelectPlan {
    const { state } = this;
    const ctes: CteDefinition[] = state.ctes.map(({ name, plan, options }) => ({
      name,
      plan: resolvePlan(plan),
      columns: options.columns,
      materialized: options.materialized,
      recursive: options.recursive ?? (state.recursive && isRecursiveBody(plan)),
    }));
    const pagination =
      state.limit === undefined && state.offset === undefined
        ? undefined
        : { limit: state.limit, offset: state.offset };

    return Object.freeze({
      ...emptySelectPlan(this.context.source),
      select: state.select,
      joins: state.joins,
      where: state.where,
      groupBy: state.groupBy,
      having: state.having,
      orderBy: state.orderBy,
      pagination,
      distinct: state.distinct,
      ctes,
    });
  }

  /**
   * Compile for a dialect, by default the one of the executor this builder
   * would run on
   */
  toSQL(dialect?: Dialect): CompiledQuery {
    return new SqlCompiler(dialect ?? this.executor().dialect).compile(this.toPlan());
  }

  // ==========================================================================
  // TERMINALS
  // ==========================================================================

  /**
   * Execute and return records, with eager-loaded relations attached
   */
  async all(options: ExecuteOptions = {}): Promise<TModel[]> {
    const eager = this.eagerPlan();
    const executor = this.executor();
    const rows = await this.fetch(executor, this.toPlan());
    if (eager) {
      await loadRelations(this.context.db, eager, rows, {
        signal: options.signal,
        executor: this.state.executor,
        connection: this.context.connection,
      });
    }
    return this.toModels(rows);
  }

  /**
   * Execute and return the first record or null
   */
  async one(options: ExecuteOptions = {}): Promise<TModel | null> {
    const [first] = await this.limit(1).all(options);
    return first ?? null;
  }

  async exists(): Promise<boolean> {
    const rows = await this.fetch(this.executor(), this.existsPlan());
    return rows.length > 0;
  }

  /**
   * Execute and return the count of matching rows
   */
  async count(): Promise<number> {
    const rows = await this.fetch(this.executor(), this.countPlan());
    return Number(rows[0]?.count ?? 0);
  }

  /**
   * Rows as plain dictionaries (aggregates, projections), or the EXPLAIN
   * output when `explain()` was called
   */
  async aggregate(): Promise<Row[]> {
    const executor = this.executor();
    if (this.state.explain) {
      const compiled = new SqlCompiler(executor.dialect).explain(this.toPlan(), this.state.explain);
      return (await runCompiled(executor, compiled, this.context.db.types)).rows;
    }
    return this.fetch(executor, this.toPlan());
  }

  // ==========================================================================
  // BLOCKING TERMINALS
  // ==========================================================================

  allSync(options: ExecuteOptions = {}): TModel[] {
    const eager = this.eagerPlan();
    const rows = this.fetchSync(this.executor(), this.toPlan());
    if (eager) {
      loadRelationsSync(this.context.db, eager, rows, {
        signal: options.signal,
        executor: this.state.executor,
        connection: this.context.connection,
      });
    }
    return this.toModels(rows);
  }

  oneSync(options: ExecuteOptions = {}): TModel | null {
    const [first] = this.limit(1).allSync(options);
    return first ?? null;
  }

  existsSync(): boolean {
    return this.fetchSync(this.executor(), this.existsPlan()).length > 0;
  }

  countSync(): number {
    const rows = this.fetchSync(this.executor(), this.countPlan());
    return Number(rows[0]?.count ?? 0);
  }

  aggregateSync(): Row[] {
    const executor = this.executor();
    if (this.state.explain) {
      const compiled = new SqlCompiler(executor.dialect).explain(this.toPlan(), this.state.explain);
      return runCompiledSync(executor, compiled, this.context.db.types).rows;
    }
    return this.fetchSync(executor, this.toPlan());
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  /**
   * New builder with part of the state replaced; this one is untouched
   */
  private derive(patch: Partial<BuilderState>): QueryBuilder<TModel> {
    return new QueryBuilder<TModel>(this.context, Object.freeze({ ...this.state, ...patch }));
  }

  private resolver(): ColumnResolver {
    return new ColumnResolver(this.context.model?.fields);
  }

  private toColumn(column: string | Expression): Expression {
    return typeof column === "string" ? this.resolver().column(column) : column;
  }

  private andWhere(conditions: Expression[]): QueryBuilder<TModel> {
    const all = this.state.where ? [this.state.where, ...conditions] : conditions;
    const [first, ...rest] = all;
    if (first === undefined) return this;
    return this.derive({ where: and_(first, ...rest) });
  }

  private addJoin(
    kind: JoinKind,
    target: string | PlanSource,
    on: Expression | undefined,
    aliasName: string | undefined
  ): QueryBuilder<TModel> {
    let source: Source;
    if (typeof target === "string") {
      source = tableSource(target, aliasName);
    } else {
      if (!aliasName) {
        throw new InvalidPlanError(`A joined subquery needs an alias`);
      }
      source = { kind: "subquery", plan: resolvePlan(target), alias: aliasName };
    }
    return this.derive({ joins: [...this.state.joins, { kind, target: source, on }] });
  }

  private combine(operator: SetOperator, other: PlanSource, all: boolean): SetOperationBuilder {
    return new SetOperationBuilder(
      this.context.db,
      combinePlans(this.toPlan(), operator, all, resolvePlan(other)),
      this.context.connection,
      this.state.executor
    );
  }

  private executor(): QueryExecutor {
    return this.state.executor ?? this.context.db.connection(this.context.connection);
  }

  private eagerPlan(): EagerLoadPlan | undefined {
    if (this.state.eager.length === 0) return undefined;
    const { model } = this.context;
    if (!model) {
      throw new InvalidPlanError("Eager loading needs a model; start the query from a table");
    }
    return planEagerLoad(this.context.db, model, this.state.eager);
  }

  private existsPlan(): SelectPlan {
    const plan = this.toPlan();
    const offset = plan.pagination?.offset;
    return {
      ...plan,
      select: [raw("1")],
      orderBy: offset ? plan.orderBy : [],
      pagination: { limit: 1, offset },
    };
  }

  /**
   * COUNT(*) over the query. Grouped, distinct or paginated queries are
   * counted through a subquery.
   */
  private countPlan(): SelectPlan {
    const plan = this.toPlan();
    const select = [alias(func.count(), "count")];
    if (plan.groupBy.length === 0 && !plan.distinct && plan.pagination === undefined) {
      return { ...plan, select, orderBy: [] };
    }
    const inner: SelectPlan = {
      ...plan,
      ctes: [],
      orderBy: plan.pagination ? plan.orderBy : [],
    };
    return {
      ...emptySelectPlan({ kind: "subquery", plan: inner, alias: "count_q" }),
      select,
      ctes: plan.ctes,
    };
  }

  private compile(executor: QueryExecutor, plan: SelectPlan): CompiledQuery {
    return new SqlCompiler(executor.dialect).compile(plan);
  }

  private async fetch(executor: QueryExecutor, plan: SelectPlan): Promise<Row[]> {
    const result = await runCompiled(executor, this.compile(executor, plan), this.context.db.types);
    return decodeRows(result.rows, this.context.model?.fields, executor.dialect, this.context.db.types);
  }

  private fetchSync(executor: QueryExecutor, plan: SelectPlan): Row[] {
    const result = runCompiledSync(executor, this.compile(executor, plan), this.context.db.types);
    return decodeRows(result.rows, this.context.model?.fields, executor.dialect, this.context.db.types);
  }

  private toModels(rows: Row[]): TModel[] {
    return rows as TModel[];
  }
}
