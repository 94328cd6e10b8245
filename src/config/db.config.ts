/**
 * sqlweave Configuration
 *
 * This file contains:
 * 1. PostgreSQL connection settings for the pooled adapter
 * 2. ORM-level settings (logging, relation cache, recursion guard)
 *
 * Values come from the environment; a local `.env` file is loaded first.
 */

import "dotenv/config";
import { PoolConfig } from "pg";

/**
 * PostgreSQL connection configuration
 */
export const dbConfig: PoolConfig = {
  host: process.env.DB_HOST || "localhost",
  port: parseInt(process.env.DB_PORT || "5432", 10),
  database: process.env.DB_NAME || "sqlweave",
  user: process.env.DB_USER || "postgres",
  password: process.env.DB_PASSWORD || "postgres",

  // Connection pool settings
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
};

/**
 * Parse an optional non-negative integer from the environment
 */
function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? undefined : parsed;
}

export interface OrmConfig {
  /** Minimum level written by the console logger */
  logLevel: string;
  /** Default TTL for relation cache entries; undefined keeps them until cleared */
  relationCacheTtlMs: number | undefined;
  /** Depth guard used by recursive tree traversals */
  recursiveMaxDepth: number;
  /** File used by the SQLite adapter when none is given */
  sqliteFilename: string;
}

export const ormConfig: OrmConfig = {
  logLevel: process.env.ORM_LOG_LEVEL || "warn",
  relationCacheTtlMs: optionalInt(process.env.ORM_RELATION_CACHE_TTL_MS),
  recursiveMaxDepth: optionalInt(process.env.ORM_RECURSIVE_MAX_DEPTH) ?? 100,
  sqliteFilename: process.env.SQLITE_FILENAME || ":memory:",
};
