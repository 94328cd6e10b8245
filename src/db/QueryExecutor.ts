/**
 * sqlweave Query Executor
 *
 * The boundary between the core and a driver. An executor runs SQL with
 * positional parameters that are already converted for the driver.
 * Asynchronous executors implement `query`; executors that can also block
 * implement `querySync`.
 */

import type { CompiledQuery } from "../compiler/SqlCompiler";
import type { Dialect } from "../dialect/Dialect";
import { bindParameters } from "../types/ParameterBinder";
import type { TypeAdapterRegistry } from "../types/TypeAdapterRegistry";

export type Row = Record<string, unknown>;

export interface QueryResultSet {
  rows: Row[];
  /** Rows returned, or rows affected for statements without a result set */
  rowCount: number;
}

export interface QueryExecutor {
  readonly dialect: Dialect;
  query(sql: string, params?: readonly unknown[]): Promise<QueryResultSet>;
  querySync?(sql: string, params?: readonly unknown[]): QueryResultSet;
}

/**
 * An executor that can block the calling thread
 */
export interface SyncQueryExecutor extends QueryExecutor {
  querySync(sql: string, params?: readonly unknown[]): QueryResultSet;
}

export function isSyncExecutor(executor: QueryExecutor): executor is SyncQueryExecutor {
  return typeof executor.querySync === "function";
}

/**
 * Bind a compiled query's parameters and run it
 */
export function runCompiled(
  executor: QueryExecutor,
  compiled: CompiledQuery,
  registry?: TypeAdapterRegistry
): Promise<QueryResultSet> {
  return executor.query(compiled.sql, bindParameters(compiled, executor.dialect, registry));
}

/**
 * Blocking twin of runCompiled
 */
export function runCompiledSync(
  executor: QueryExecutor,
  compiled: CompiledQuery,
  registry?: TypeAdapterRegistry
): QueryResultSet {
  if (!isSyncExecutor(executor)) {
    throw new Error(
      `Executor for ${executor.dialect.label} does not support blocking queries`
    );
  }
  return executor.querySync(compiled.sql, bindParameters(compiled, executor.dialect, registry));
}
