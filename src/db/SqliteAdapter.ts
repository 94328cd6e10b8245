/**
 * sqlweave SQLite Adapter
 *
 * Executor over better-sqlite3. The driver is synchronous, so this adapter
 * serves both the blocking path (`querySync`) and the promise path.
 */

import BetterSqlite3 from "better-sqlite3";
import { parseServerVersion } from "../capabilities/Capabilities";
import { ormConfig } from "../config/db.config";
import { SqliteDialect } from "../dialect/SqliteDialect";
import { getLogger } from "../logging/Logger";
import { QueryResultSet, Row, SyncQueryExecutor } from "./QueryExecutor";

const logger = getLogger("sqlite");

export interface SqliteAdapterOptions {
  /** Database file; defaults to SQLITE_FILENAME or an in-memory database */
  filename?: string;
  foreignKeys?: boolean;
  readonly?: boolean;
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null;
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Integers are read as bigint so nothing above 2^53 is rounded; those
 * that fit a number are handed back as one.
 */
function narrowIntegers(row: Row): Row {
  const narrowed: Row = {};
  for (const [key, value] of Object.entries(row)) {
    narrowed[key] =
      typeof value === "bigint" && value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value;
  }
  return narrowed;
}

export class SqliteAdapter implements SyncQueryExecutor {
  readonly dialect: SqliteDialect;
  private readonly db: BetterSqlite3.Database;

  constructor(options: SqliteAdapterOptions = {}) {
    this.db = new BetterSqlite3(options.filename ?? ormConfig.sqliteFilename, {
      readonly: options.readonly ?? false,
    });
    if (options.foreignKeys) {
      this.db.pragma("foreign_keys = ON");
    }

    const versionRow: unknown = this.db.prepare("select sqlite_version() as version").get();
    const version =
      isRow(versionRow) && typeof versionRow.version === "string"
        ? parseServerVersion(versionRow.version)
        : SqliteDialect.defaultVersion;
    this.dialect = new SqliteDialect(version);
    logger.debug(`Opened ${this.db.name} (${this.dialect.label})`);
  }

  querySync(sql: string, params: readonly unknown[] = []): QueryResultSet {
    try {
      const statement = this.db.prepare(sql);
      if (statement.reader) {
        const rows = statement
          .safeIntegers(true)
          .all(...params)
          .filter(isRow)
          .map(narrowIntegers);
        return { rows, rowCount: rows.length };
      }
      const info = statement.run(...params);
      return { rows: [], rowCount: info.changes };
    } catch (error) {
      logger.error(`Query failed: ${sql}`, error);
      throw error;
    }
  }

  async query(sql: string, params: readonly unknown[] = []): Promise<QueryResultSet> {
    return this.querySync(sql, params);
  }

  /**
   * Run a script of one or more statements without parameters
   */
  exec(script: string): void {
    this.db.exec(script);
  }

  /**
   * Run a function inside BEGIN/COMMIT, rolling back if it throws
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  get open(): boolean {
    return this.db.open;
  }

  close(): void {
    this.db.close();
  }
}
