/**
 * sqlweave Database
 *
 * Model registry and named connections. Models declare their table,
 * fields and relations once; builders and the relation loader look them up
 * here by name.
 *
 * @example
 * const db = new Database({ connections: { default: new SqliteAdapter() } });
 * const users = db.define<User, "id">({
 *   name: "User",
 *   table: "users",
 *   relations: { posts: hasMany("Post", "userId") },
 * });
 * const rows = await users.query().with("posts").all();
 */

import { ormConfig } from "../config/db.config";
import { CrossBackendRelation, InvalidPlanError } from "../errors/OrmErrors";
import { Logger, getLogger } from "../logging/Logger";
import { QueryBuilder } from "../query/QueryBuilder";
import { Source, tableSource } from "../query/QueryPlan";
import { Table } from "../query/Table";
import type { RelationMap } from "../relation/RelationDescriptor";
import type { FieldMap } from "../types/RowDecoder";
import { TypeAdapterRegistry, getTypeRegistry } from "../types/TypeAdapterRegistry";
import { getDbAdapter } from "./DbAdapter";
import type { QueryExecutor, Row } from "./QueryExecutor";

export const DEFAULT_CONNECTION = "default";

/**
 * Fields never written by insert/update unless a model says otherwise
 */
export const DEFAULT_AUTO_FIELDS: readonly string[] = ["id", "createdAt", "updatedAt"];

export interface ModelDefinition {
  readonly name: string;
  readonly table: string;
  /** Property name, defaults to "id" */
  readonly primaryKey?: string;
  readonly connection?: string;
  readonly fields?: FieldMap;
  readonly relations?: RelationMap;
  /** Properties the database fills in (excluded from writes) */
  readonly autoFields?: readonly string[];
}

export interface ModelMeta {
  readonly name: string;
  readonly table: string;
  readonly primaryKey: string;
  readonly connection: string;
  readonly fields: FieldMap;
  readonly relations: RelationMap;
  readonly autoFields: readonly string[];
}

export type WarningHandler = (warning: CrossBackendRelation) => void;

export interface DatabaseOptions {
  connections?: Record<string, QueryExecutor>;
  types?: TypeAdapterRegistry;
  onWarning?: WarningHandler;
  /** Default relation cache lifetime; 0 keeps loaded relations until cleared */
  relationCacheTtlMs?: number;
}

export class Database {
  readonly types: TypeAdapterRegistry;
  readonly relationCacheTtlMs: number | undefined;
  readonly logger: Logger = getLogger("database");

  private readonly models = new Map<string, ModelMeta>();
  private readonly connections = new Map<string, QueryExecutor>();
  private readonly onWarning: WarningHandler | undefined;

  constructor(options: DatabaseOptions = {}) {
    this.types = options.types ?? getTypeRegistry();
    this.relationCacheTtlMs = options.relationCacheTtlMs ?? ormConfig.relationCacheTtlMs;
    this.onWarning = options.onWarning;
    for (const [name, executor] of Object.entries(options.connections ?? {})) {
      this.connections.set(name, executor);
    }
  }

  // ==========================================================================
  // Models
  // ==========================================================================

  /**
   * Register a model and get its table repository
   *
   * @template TModel - Record shape (camelCase properties)
   * @template TAutoFields - Properties excluded from insert data
   */
  define<TModel extends object, TAutoFields extends keyof TModel = never>(
    definition: ModelDefinition
  ): Table<TModel, TAutoFields> {
    if (this.models.has(definition.name)) {
      throw new InvalidPlanError(`Model "${definition.name}" is already defined`);
    }
    const meta: ModelMeta = Object.freeze({
      name: definition.name,
      table: definition.table,
      primaryKey: definition.primaryKey ?? "id",
      connection: definition.connection ?? DEFAULT_CONNECTION,
      fields: Object.freeze({ ...definition.fields }),
      relations: Object.freeze({ ...definition.relations }),
      autoFields: Object.freeze([...(definition.autoFields ?? DEFAULT_AUTO_FIELDS)]),
    });
    this.models.set(meta.name, meta);
    this.logger.debug(`Defined model ${meta.name} on table ${meta.table}`);
    return new Table<TModel, TAutoFields>(this, meta);
  }

  getModel(name: string): ModelMeta | undefined {
    return this.models.get(name);
  }

  /**
   * Model by name; throws when it was never defined
   */
  model(name: string): ModelMeta {
    const meta = this.models.get(name);
    if (!meta) {
      throw new InvalidPlanError(`Model "${name}" is not defined`);
    }
    return meta;
  }

  table<TModel extends object, TAutoFields extends keyof TModel = never>(
    name: string
  ): Table<TModel, TAutoFields> {
    return new Table<TModel, TAutoFields>(this, this.model(name));
  }

  /**
   * Query builder over a model's table, on the model's connection
   */
  query<TModel extends object = Row>(modelName: string): QueryBuilder<TModel> {
    const meta = this.model(modelName);
    return new QueryBuilder<TModel>({
      db: this,
      model: meta,
      source: tableSource(meta.table),
      connection: meta.connection,
    });
  }

  /**
   * Query builder over any table or subquery, without model metadata
   */
  from(source: string | Source, connection: string = DEFAULT_CONNECTION): QueryBuilder<Row> {
    return new QueryBuilder<Row>({
      db: this,
      source: typeof source === "string" ? tableSource(source) : source,
      connection,
    });
  }

  // ==========================================================================
  // Connections
  // ==========================================================================

  addConnection(name: string, executor: QueryExecutor): this {
    this.connections.set(name, executor);
    return this;
  }

  /**
   * Executor for a connection. Without a registered default, the shared
   * PostgreSQL pool is used.
   */
  connection(name: string = DEFAULT_CONNECTION): QueryExecutor {
    const executor = this.connections.get(name);
    if (executor) return executor;
    if (name === DEFAULT_CONNECTION) return getDbAdapter();
    throw new InvalidPlanError(`Connection "${name}" is not configured`);
  }

  reportWarning(warning: CrossBackendRelation): void {
    this.logger.warn(warning.message);
    this.onWarning?.(warning);
  }
}
