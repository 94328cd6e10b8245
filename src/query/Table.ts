/**
 * sqlweave Table Repository
 *
 * Provides type-safe CRUD operations for a model's table.
 * Wraps QueryBuilder and adds insert/update/delete functionality.
 * Writes ask for RETURNING rows where the dialect has them; elsewhere only
 * affected counts come back.
 *
 * @template TModel - The model interface for this table
 * @template TAutoFields - Keys of auto-generated fields (excluded from insert)
 */

import { CapabilityCategory, ReturningCapability } from "../capabilities/Capabilities";
import { SqlCompiler } from "../compiler/SqlCompiler";
import type { Database, ModelMeta } from "../db/Database";
import {
  QueryExecutor,
  QueryResultSet,
  Row,
  runCompiled,
} from "../db/QueryExecutor";
import type { Dialect } from "../dialect/Dialect";
import { Expression } from "../expression/Expression";
import { and_, func, star } from "../expression/ExpressionFactory";
import type { EagerLoadRequest } from "../relation/EagerLoadTree";
import {
  RelationState,
  cachedRelation,
  clearRelation,
  hasCachedRelation,
  relationState,
} from "../relation/RelationCache";
import { loadRelations, loadRelationsSync, planEagerLoad } from "../relation/RelationLoader";
import { decodeRows } from "../types/RowDecoder";
import { camelToSnake } from "../utils/naming";
import { ColumnResolver, WhereArgs, WhereOperator } from "./Conditions";
import type { Assignment, Statement } from "./QueryPlan";
import type { ColumnRef, QueryBuilder, WhereFilter } from "./QueryBuilder";

/**
 * Helper type: Get keys where value extends a type
 */
type KeysWhereValueExtends<T, V> = {
  [K in keyof T]: V extends T[K] ? K : never;
}[keyof T];

/**
 * Helper type: Get keys where value does NOT extend a type
 */
type KeysWhereValueNotExtends<T, V> = {
  [K in keyof T]: V extends T[K] ? never : K;
}[keyof T];

/**
 * Helper type: Get keys of nullable properties (those that accept null)
 */
type NullableKeys<T> = KeysWhereValueExtends<T, null>;

/**
 * Helper type: Get keys of non-nullable properties
 */
type RequiredKeys<T> = KeysWhereValueNotExtends<T, null>;

/**
 * Helper type: Exclude relationship properties. Dates, buffers and plain
 * JSON values are data; arrays of records and single records are relations.
 */
type DataKeys<T> = {
  [K in keyof T]: T[K] extends Date | Uint8Array | null | undefined
    ? K
    : T[K] extends (infer U)[] | undefined
    ? U extends object
      ? never // Array relationships
      : K
    : T[K] extends object | undefined
    ? never // Object relationships
    : K;
}[keyof T];

/**
 * Type for insertable data - excludes auto-generated fields
 * Makes nullable fields optional, requires non-nullable fields
 */
export type InsertData<TModel, TAutoFields extends keyof TModel> =
  // Required non-nullable fields (excluding auto-fields)
  Pick<TModel, Exclude<RequiredKeys<TModel> & DataKeys<TModel>, TAutoFields>> &
    // Optional nullable fields (excluding auto-fields)
    Partial<Pick<TModel, Exclude<NullableKeys<TModel> & DataKeys<TModel>, TAutoFields>>>;

/**
 * Type for updatable data - all fields optional, excludes auto-generated
 */
export type UpdateData<TModel, TAutoFields extends keyof TModel> = Partial<
  Pick<TModel, Exclude<DataKeys<TModel>, TAutoFields>>
>;

/**
 * Outcome of a write: returned records (empty without RETURNING) and the
 * number of rows touched
 */
export interface WriteResult<TModel> {
  readonly records: TModel[];
  readonly affected: number;
}

/**
 * Shared plumbing of the repository and its write builders
 */
export class TableContext<TModel extends object> {
  constructor(
    readonly db: Database,
    readonly model: ModelMeta,
    readonly executorOverride?: QueryExecutor
  ) {}

  get executor(): QueryExecutor {
    return this.executorOverride ?? this.db.connection(this.model.connection);
  }

  get resolver(): ColumnResolver {
    return new ColumnResolver(this.model.fields);
  }

  canReturn(dialect: Dialect): boolean {
    return dialect.capabilities.supports(
      CapabilityCategory.ReturningClause,
      ReturningCapability.Basic
    );
  }

  writableEntries(data: object): Array<[string, unknown]> {
    const entries: Array<[string, unknown]> = Object.entries(data);
    return entries.filter(
      ([key, value]) => value !== undefined && !this.model.autoFields.includes(key)
    );
  }

  primaryKey(id: unknown): Expression {
    return this.resolver.compare(this.model.primaryKey, "=", id);
  }

  condition(args: WhereArgs): Expression | undefined {
    const [first, ...rest] = this.resolver.conditions(args);
    return first === undefined ? undefined : and_(first, ...rest);
  }

  async run(statement: Statement): Promise<{ result: QueryResultSet; dialect: Dialect }> {
    const executor = this.executor;
    const compiled = new SqlCompiler(executor.dialect).compile(statement);
    const result = await runCompiled(executor, compiled, this.db.types);
    return { result, dialect: executor.dialect };
  }

  toModels(rows: Row[], dialect: Dialect): TModel[] {
    return decodeRows(rows, this.model.fields, dialect, this.db.types) as TModel[];
  }
}

// ============================================================================
// Table Repository
// ============================================================================

export class Table<TModel extends object, TAutoFields extends keyof TModel = never> {
  private readonly context: TableContext<TModel>;

  constructor(db: Database, model: ModelMeta, executor?: QueryExecutor) {
    this.context = new TableContext<TModel>(db, model, executor);
  }

  get model(): ModelMeta {
    return this.context.model;
  }

  /**
   * Same table, running every statement on the given executor
   */
  using(executor: QueryExecutor): Table<TModel, TAutoFields> {
    return new Table<TModel, TAutoFields>(this.context.db, this.context.model, executor);
  }

  // ==========================================================================
  // QUERY BUILDER - Start a SELECT query
  // ==========================================================================

  query(): QueryBuilder<TModel> {
    const builder = this.context.db.query<TModel>(this.context.model.name);
    const { executorOverride } = this.context;
    return executorOverride ? builder.using(executorOverride) : builder;
  }

  select(...columns: Array<ColumnRef<TModel> | Expression>): QueryBuilder<TModel> {
    return this.query().select(...columns);
  }

  /**
   * Start a query with a WHERE clause
   */
  where(condition: Expression): QueryBuilder<TModel>;
  where(filter: WhereFilter<TModel>): QueryBuilder<TModel>;
  where(column: ColumnRef<TModel>, value: unknown): QueryBuilder<TModel>;
  where(column: ColumnRef<TModel>, operator: WhereOperator, value: unknown): QueryBuilder<TModel>;
  where(...args: WhereArgs): QueryBuilder<TModel> {
    const condition = this.context.condition(args);
    return condition ? this.query().where(condition) : this.query();
  }

  with(...requests: EagerLoadRequest[]): QueryBuilder<TModel> {
    return this.query().with(...requests);
  }

  /**
   * Find a record by primary key
   */
  async findById(id: unknown): Promise<TModel | null> {
    return this.query().where(this.context.primaryKey(id)).one();
  }

  /**
   * Get all records
   */
  async findAll(): Promise<TModel[]> {
    return this.query().all();
  }

  // ==========================================================================
  // INSERT - Type-safe with auto-field exclusion
  // ==========================================================================

  /**
   * Insert a single record
   *
   * @returns The inserted record, or null where the dialect has no RETURNING
   */
  async insert(data: InsertData<TModel, TAutoFields>): Promise<TModel | null> {
    const { records } = await this.insertMany([data]);
    return records[0] ?? null;
  }

  /**
   * Insert multiple records in one statement. Columns are the union of the
   * records' keys; a record without a key gets NULL.
   */
  async insertMany(dataArray: InsertData<TModel, TAutoFields>[]): Promise<WriteResult<TModel>> {
    if (dataArray.length === 0) return { records: [], affected: 0 };

    const { context } = this;
    const resolver = context.resolver;
    const records = dataArray.map((data) => new Map(context.writableEntries(data)));
    const keys = [...new Set(records.flatMap((record) => [...record.keys()]))];

    const returning = context.canReturn(context.executor.dialect) ? [star()] : [];
    const { result, dialect } = await context.run({
      kind: "insert",
      table: context.model.table,
      columns: keys.map(camelToSnake),
      rows: records.map((record) => keys.map((key) => resolver.value(key, record.get(key) ?? null))),
      returning,
    });

    return returning.length > 0
      ? { records: context.toModels(result.rows, dialect), affected: result.rows.length }
      : { records: [], affected: result.rowCount };
  }

  // ==========================================================================
  // UPDATE - Type-safe partial updates
  // ==========================================================================

  /**
   * Update records matching a condition
   *
   * @returns UpdateBuilder for chaining where conditions
   */
  update(data: UpdateData<TModel, TAutoFields>): UpdateBuilder<TModel> {
    return new UpdateBuilder<TModel>(this.context, this.context.writableEntries(data));
  }

  /**
   * Update a record by primary key
   *
   * @returns Updated record or null if not found
   */
  async updateById(id: unknown, data: UpdateData<TModel, TAutoFields>): Promise<TModel | null> {
    const { records, affected } = await this.update(data)
      .where(this.context.primaryKey(id))
      .exec();
    if (records.length > 0) return records[0];
    return affected > 0 ? this.findById(id) : null;
  }

  // ==========================================================================
  // DELETE
  // ==========================================================================

  delete(): DeleteBuilder<TModel> {
    return new DeleteBuilder<TModel>(this.context);
  }

  /**
   * @returns true if deleted, false if not found
   */
  async deleteById(id: unknown): Promise<boolean> {
    const count = await this.delete().where(this.context.primaryKey(id)).exec();
    return count > 0;
  }

  // ==========================================================================
  // RELATIONS - lazy access
  // ==========================================================================

  /**
   * Value of a relation on one record, loading it when the slot is not
   * loaded (never fetched, cleared or expired)
   */
  async load(record: TModel, relation: string): Promise<unknown> {
    const slot = relation.split(".")[0];
    if (!relation.includes(".") && hasCachedRelation(record, slot)) {
      return cachedRelation(record, slot);
    }
    const plan = planEagerLoad(this.context.db, this.context.model, [relation]);
    await loadRelations(this.context.db, plan, [record], {
      executor: this.context.executorOverride,
    });
    return cachedRelation(record, slot);
  }

  loadSync(record: TModel, relation: string): unknown {
    const slot = relation.split(".")[0];
    if (!relation.includes(".") && hasCachedRelation(record, slot)) {
      return cachedRelation(record, slot);
    }
    const plan = planEagerLoad(this.context.db, this.context.model, [relation]);
    loadRelationsSync(this.context.db, plan, [record], {
      executor: this.context.executorOverride,
    });
    return cachedRelation(record, slot);
  }

  relationState(record: TModel, slot: string): RelationState {
    return relationState(record, slot);
  }

  clearRelations(record: TModel, slot?: string): void {
    clearRelation(record, slot);
  }
}

// ============================================================================
// UPDATE BUILDER
// ============================================================================

/**
 * Builder for UPDATE operations with WHERE support
 */
export class UpdateBuilder<TModel extends object> {
  private readonly conditions: Expression[] = [];

  constructor(
    private readonly context: TableContext<TModel>,
    private readonly data: Array<[string, unknown]>
  ) {}

  /**
   * Add WHERE condition
   */
  where(condition: Expression): UpdateBuilder<TModel>;
  where(filter: WhereFilter<TModel>): UpdateBuilder<TModel>;
  where(column: ColumnRef<TModel>, value: unknown): UpdateBuilder<TModel>;
  where(column: ColumnRef<TModel>, operator: WhereOperator, value: unknown): UpdateBuilder<TModel>;
  where(...args: WhereArgs): UpdateBuilder<TModel> {
    this.conditions.push(...this.context.resolver.conditions(args));
    return this;
  }

  /**
   * Execute the update. A model with an `updatedAt` field gets it set to
   * the current time.
   */
  async exec(): Promise<WriteResult<TModel>> {
    const { context } = this;
    const resolver = context.resolver;

    const assignments: Assignment[] = this.data.map(([key, value]) => ({
      column: camelToSnake(key),
      value: resolver.value(key, value),
    }));
    if (context.model.fields.updatedAt) {
      assignments.push({ column: camelToSnake("updatedAt"), value: func.now() });
    }

    const [first, ...rest] = this.conditions;
    const returning = context.canReturn(context.executor.dialect) ? [star()] : [];
    const { result, dialect } = await context.run({
      kind: "update",
      table: context.model.table,
      assignments,
      where: first === undefined ? undefined : and_(first, ...rest),
      returning,
    });

    return returning.length > 0
      ? { records: context.toModels(result.rows, dialect), affected: result.rows.length }
      : { records: [], affected: result.rowCount };
  }
}

// ============================================================================
// DELETE BUILDER
// ============================================================================

/**
 * Builder for DELETE operations with WHERE support
 */
export class DeleteBuilder<TModel extends object> {
  private readonly conditions: Expression[] = [];

  constructor(private readonly context: TableContext<TModel>) {}

  where(condition: Expression): DeleteBuilder<TModel>;
  where(filter: WhereFilter<TModel>): DeleteBuilder<TModel>;
  where(column: ColumnRef<TModel>, value: unknown): DeleteBuilder<TModel>;
  where(column: ColumnRef<TModel>, operator: WhereOperator, value: unknown): DeleteBuilder<TModel>;
  where(...args: WhereArgs): DeleteBuilder<TModel> {
    this.conditions.push(...this.context.resolver.conditions(args));
    return this;
  }

  /**
   * Execute the delete
   * @returns Number of deleted rows
   */
  async exec(): Promise<number> {
    const [first, ...rest] = this.conditions;
    const { result } = await this.context.run({
      kind: "delete",
      table: this.context.model.table,
      where: first === undefined ? undefined : and_(first, ...rest),
      returning: [],
    });
    return result.rowCount;
  }
}
