/**
 * sqlweave Transaction Manager
 *
 * Provides a high-level API for database transactions with
 * automatic COMMIT on success and ROLLBACK on failure. The transaction
 * client is a QueryExecutor, so builders and tables can run inside it
 * through `using(trx)`.
 */

import { PoolClient, QueryResultRow } from "pg";
import { DbAdapter, getDbAdapter } from "../db/DbAdapter";
import { QueryExecutor, QueryResultSet } from "../db/QueryExecutor";
import type { PostgresDialect } from "../dialect/PostgresDialect";
import { OrmError } from "../errors/OrmErrors";
import { getLogger } from "../logging/Logger";

const logger = getLogger("transaction");

/**
 * Raised when a completed transaction is used again
 */
export class TransactionClosedError extends OrmError {
  constructor() {
    super("Transaction has already been completed", "TRANSACTION_CLOSED");
  }
}

/**
 * Transaction client
 *
 * Same query interface as DbAdapter, on a dedicated pooled client.
 */
export class TransactionClient implements QueryExecutor {
  private client: PoolClient;
  private isCompleted: boolean = false;
  readonly dialect: PostgresDialect;

  constructor(client: PoolClient, dialect: PostgresDialect) {
    this.client = client;
    this.dialect = dialect;
  }

  /**
   * Execute a parameterized query within the transaction
   */
  async query(sql: string, params: readonly unknown[] = []): Promise<QueryResultSet> {
    if (this.isCompleted) {
      throw new TransactionClosedError();
    }

    const result = await this.client.query<QueryResultRow>(sql, [...params]);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? result.rows.length,
    };
  }

  async commit(): Promise<void> {
    if (this.isCompleted) {
      throw new TransactionClosedError();
    }

    await this.client.query("COMMIT");
    this.isCompleted = true;
  }

  /**
   * Rollback the transaction; a no-op once it has completed
   */
  async rollback(): Promise<void> {
    if (this.isCompleted) return;

    await this.client.query("ROLLBACK");
    this.isCompleted = true;
  }

  /**
   * Release the client back to the pool
   */
  release(): void {
    this.client.release();
  }

  get isActive(): boolean {
    return !this.isCompleted;
  }
}

export type TransactionCallback<T> = (trx: TransactionClient) => Promise<T>;

export type IsolationLevel =
  | "READ UNCOMMITTED"
  | "READ COMMITTED"
  | "REPEATABLE READ"
  | "SERIALIZABLE";

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  /** Pool to take the client from, defaults to the shared adapter */
  adapter?: DbAdapter;
}

/**
 * Execute a function within a database transaction
 *
 * The transaction will automatically:
 * - COMMIT if the callback succeeds
 * - ROLLBACK if the callback throws an error
 *
 * @example
 * const user = await transaction(async (trx) => {
 *   const created = await users.using(trx).insert({ email: "a@example.com" });
 *   await profiles.using(trx).insert({ userId: created?.id ?? 0 });
 *   return created;
 * }, { isolationLevel: "SERIALIZABLE" });
 */
export async function transaction<T>(
  callback: TransactionCallback<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const adapter = options.adapter ?? getDbAdapter();
  const client = await adapter.getClient();
  const trx = new TransactionClient(client, adapter.dialect);

  try {
    await client.query(
      options.isolationLevel ? `BEGIN ISOLATION LEVEL ${options.isolationLevel}` : "BEGIN"
    );

    const result = await callback(trx);

    await trx.commit();

    return result;
  } catch (error) {
    logger.warn("Rolling back transaction", error);
    await trx.rollback();
    throw error;
  } finally {
    trx.release();
  }
}
