/**
 * sqlweave PostgreSQL Adapter
 *
 * Pooled executor for PostgreSQL. Parameters arrive already bound in
 * `$1, $2, ...` order; driver errors are logged and rethrown unchanged.
 */

import { Pool, PoolClient, QueryResultRow } from "pg";
import { ServerVersion } from "../capabilities/Capabilities";
import { dbConfig } from "../config/db.config";
import { PostgresDialect } from "../dialect/PostgresDialect";
import { getLogger } from "../logging/Logger";
import { QueryExecutor, QueryResultSet } from "./QueryExecutor";

const logger = getLogger("pg");

/**
 * Convert `server_version_num` (e.g. 160002 or 90605) to a version triple
 */
export function parsePgVersionNum(value: number): ServerVersion {
  if (value >= 100000) {
    return [Math.floor(value / 10000), value % 10000, 0];
  }
  return [Math.floor(value / 10000), Math.floor(value / 100) % 100, value % 100];
}

/**
 * Database Adapter Class
 *
 * Singleton pooled connection to PostgreSQL.
 */
export class DbAdapter implements QueryExecutor {
  private static instance: DbAdapter | null = null;
  private pool: Pool;
  private isConnected: boolean = false;
  private currentDialect: PostgresDialect = new PostgresDialect();

  /**
   * Private constructor - use getInstance() to get the adapter
   */
  private constructor() {
    this.pool = new Pool(dbConfig);

    this.pool.on("error", (err: Error) => {
      logger.error("Unexpected error on idle client:", err);
    });

    this.pool.on("connect", () => {
      this.isConnected = true;
    });
  }

  /**
   * Get the singleton instance of DbAdapter
   */
  public static getInstance(): DbAdapter {
    if (!DbAdapter.instance) {
      DbAdapter.instance = new DbAdapter();
    }
    return DbAdapter.instance;
  }

  get dialect(): PostgresDialect {
    return this.currentDialect;
  }

  /**
   * Execute a parameterized SQL query
   *
   * @example
   * const result = await adapter.query(
   *   "SELECT * FROM users WHERE id = $1 AND status = $2",
   *   [userId, "active"]
   * );
   */
  public async query(
    sql: string,
    params: readonly unknown[] = []
  ): Promise<QueryResultSet> {
    try {
      const result = await this.pool.query<QueryResultRow>(sql, [...params]);
      return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
    } catch (error) {
      logger.error(`Query failed: ${sql}`, error);
      throw error;
    }
  }

  /**
   * Ask the server for its version and rebuild the dialect's capabilities
   */
  public async detectServerVersion(): Promise<PostgresDialect> {
    const result = await this.query("SHOW server_version_num");
    const raw = result.rows[0]?.server_version_num;
    const versionNum = Number(raw);
    if (!Number.isInteger(versionNum)) {
      throw new Error(`Unexpected server_version_num: ${String(raw)}`);
    }
    this.currentDialect = new PostgresDialect(parsePgVersionNum(versionNum));
    logger.info(`Connected to ${this.currentDialect.label}`);
    return this.currentDialect;
  }

  /**
   * Get a client from the pool for transaction support.
   * Release it when done.
   */
  public async getClient(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      logger.error("Failed to get database client", error);
      throw error;
    }
  }

  /**
   * Test the database connection
   */
  public async testConnection(): Promise<boolean> {
    try {
      await this.query("SELECT 1");
      this.isConnected = true;
      return true;
    } catch (error) {
      this.isConnected = false;
      throw error;
    }
  }

  public getConnectionStatus(): boolean {
    return this.isConnected;
  }

  public getPoolStats(): {
    totalCount: number;
    idleCount: number;
    waitingCount: number;
  } {
    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  /**
   * Close all connections in the pool
   */
  public async close(): Promise<void> {
    await this.pool.end();
    this.isConnected = false;
    DbAdapter.instance = null;
  }
}

/**
 * Convenience accessor for the shared adapter
 */
export function getDbAdapter(): DbAdapter {
  return DbAdapter.getInstance();
}
