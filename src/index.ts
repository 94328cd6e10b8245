/**
 * sqlweave - Type-Safe TypeScript query core
 *
 * Main entry point for the library.
 * Exports all public APIs: expressions, dialects, builders, relations,
 * type adapters and executors.
 */

// Expressions
export * from "./expression/Expression";
export * from "./expression/ExpressionFactory";

// Capabilities & Dialects
export * from "./capabilities/Capabilities";
export * from "./dialect";

// Compiler
export { SqlCompiler, CompiledQuery } from "./compiler/SqlCompiler";
export { Binding, ParameterCollector } from "./compiler/ParameterCollector";

// Query Builder
export * from "./query/QueryPlan";
export { validatePlan, validateStatement, planArity } from "./query/PlanValidator";
export { WhereOperator, Filter } from "./query/Conditions";
export {
  QueryBuilder,
  ColumnRef,
  WhereFilter,
  CteOptions,
  ExecuteOptions,
} from "./query/QueryBuilder";
export { SetOperationBuilder } from "./query/SetOperationBuilder";
export { treeTraversal, TreeTraversalOptions, TraversalDirection } from "./query/TreeTraversal";
export {
  Table,
  InsertData,
  UpdateData,
  WriteResult,
  UpdateBuilder,
  DeleteBuilder,
} from "./query/Table";

// Relations
export * from "./relation/RelationDescriptor";
export { EagerLoadRequest, EagerLoadSpec, RelationModifier } from "./relation/EagerLoadTree";
export { RelationState, setRelationClock, resetRelationClock } from "./relation/RelationCache";
export {
  EagerLoadPlan,
  EagerLoadReport,
  LoadOptions,
  loadRelations,
  loadRelationsSync,
  planEagerLoad,
} from "./relation/RelationLoader";

// Type Adapters
export * from "./types/TypeAdapter";
export * from "./types/BuiltinAdapters";
export {
  TypeAdapterRegistry,
  ResolvedAdapter,
  ResolveOptions,
  AdapterOverride,
  getTypeRegistry,
  resetTypeRegistry,
} from "./types/TypeAdapterRegistry";
export { bindParameters, bindValue } from "./types/ParameterBinder";
export { FieldMap, decodeRow, decodeRows } from "./types/RowDecoder";

// Database & Executors
export {
  Database,
  DatabaseOptions,
  ModelDefinition,
  ModelMeta,
  DEFAULT_CONNECTION,
} from "./db/Database";
export {
  QueryExecutor,
  SyncQueryExecutor,
  QueryResultSet,
  Row,
  isSyncExecutor,
  runCompiled,
  runCompiledSync,
} from "./db/QueryExecutor";
export { DbAdapter, getDbAdapter } from "./db/DbAdapter";
export { SqliteAdapter, SqliteAdapterOptions } from "./db/SqliteAdapter";

// Transactions
export {
  transaction,
  TransactionClient,
  TransactionOptions,
  IsolationLevel,
} from "./transactions/TransactionManager";

// Errors & Logging
export * from "./errors/OrmErrors";
export { Logger, LogLevel, getLogger } from "./logging/Logger";

// Configuration
export { dbConfig, ormConfig } from "./config/db.config";
