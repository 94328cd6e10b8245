/**
 * sqlweave Dialect Base
 *
 * A dialect is a backend's SQL syntax profile plus its capability
 * descriptor. The compiler asks the dialect how to render placeholders,
 * identifiers, pagination and functions; it never branches on the
 * dialect's name.
 */

import {
  CapabilityDescriptor,
  ServerVersion,
  formatVersion,
} from "../capabilities/Capabilities";
import type { DbType, HostType } from "../types/TypeAdapter";
import reservedWords from "./reserved-words.json";

// ============================================================================
// Types
// ============================================================================

export type DialectName =
  | "sqlite"
  | "mysql"
  | "mariadb"
  | "postgres"
  | "oracle"
  | "sqlserver";

/**
 * How LIMIT/OFFSET is written
 * - limit-offset: `LIMIT n OFFSET m`
 * - offset-fetch: `OFFSET m ROWS FETCH NEXT n ROWS ONLY`
 * - rownum: wrapping subquery filtered on ROWNUM
 * - top: `SELECT TOP n`, no offset
 */
export type PaginationStyle = "limit-offset" | "offset-fetch" | "rownum" | "top";

/**
 * Renders a function call from already-compiled argument SQL
 */
export type FunctionRenderer = (args: readonly string[], distinct: boolean) => string;

/**
 * A function is either renamed or rendered entirely by the dialect
 */
export type FunctionMapping = string | FunctionRenderer;

export interface ExplainOptions {
  /** Execute the statement and report actual timings (PostgreSQL) */
  analyze?: boolean;
  format?: "text" | "json";
}

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

type ReservedWordList = keyof typeof reservedWords;

function wordSet(...lists: ReservedWordList[]): ReadonlySet<string> {
  return new Set(lists.flatMap((list) => reservedWords[list]));
}

function callWithArgs(name: string): FunctionRenderer {
  return (args, distinct) =>
    `${name}(${distinct ? "DISTINCT " : ""}${args.join(", ")})`;
}

// ============================================================================
// Dialect
// ============================================================================

export abstract class Dialect {
  abstract readonly name: DialectName;

  readonly version: ServerVersion;
  readonly capabilities: CapabilityDescriptor;

  /** Opening and closing identifier quote */
  protected abstract readonly quotes: readonly [string, string];
  protected abstract readonly reserved: ReadonlySet<string>;
  protected abstract readonly functions: Readonly<Record<string, FunctionMapping>>;

  /** Keyword between a table and its alias */
  readonly tableAliasKeyword: string = " AS ";
  /** Predicates used where a clause must be constant */
  readonly falsePredicate: string = "1 = 0";
  readonly truePredicate: string = "1 = 1";
  /** Whether set-operation operands may be parenthesized */
  readonly parenthesizeSetOperands: boolean = true;
  /** Whether `WITH RECURSIVE` is spelled with the keyword */
  readonly recursiveKeyword: boolean = true;
  /** Whether a recursive CTE must declare its column list */
  readonly recursiveCteRequiresColumns: boolean = false;
  /** Appended to a SELECT that has no FROM */
  readonly selectWithoutFrom: string = "";
  /** Largest IN list the backend accepts; longer lists are split */
  readonly maxInListSize: number | undefined = undefined;
  /** LIMIT value meaning "no limit" when only an offset is given */
  readonly limitAllSentinel: string | undefined = undefined;
  /** OFFSET ... FETCH needs an ORDER BY */
  readonly offsetRequiresOrderBy: boolean = false;

  constructor(version: ServerVersion) {
    this.version = version;
    this.capabilities = this.detectCapabilities(version);
  }

  /**
   * Build the capability descriptor for a server version
   */
  protected abstract detectCapabilities(version: ServerVersion): CapabilityDescriptor;

  /**
   * Placeholder for the 1-based parameter index
   */
  abstract placeholder(index: number): string;

  abstract get paginationStyle(): PaginationStyle;

  /**
   * Prefix that turns a query into its plan description
   */
  abstract explainPrefix(options: ExplainOptions): string;

  /**
   * Column representation this backend prefers for a host type.
   * `undefined` leaves the choice to the adapter.
   */
  abstract suggestDbType(hostType: HostType): DbType | undefined;

  /**
   * Human readable name, e.g. `postgres 16.0.0`
   */
  get label(): string {
    return `${this.name} ${formatVersion(this.version)}`;
  }

  // ==========================================================================
  // Identifiers
  // ==========================================================================

  protected needsQuoting(identifier: string): boolean {
    return (
      !PLAIN_IDENTIFIER.test(identifier) ||
      this.reserved.has(identifier.toUpperCase())
    );
  }

  /**
   * Quote an identifier when it is reserved or not a plain name
   */
  quoteIdentifier(identifier: string): string {
    if (!this.needsQuoting(identifier)) return identifier;
    const [open, close] = this.quotes;
    return `${open}${identifier.split(close).join(close + close)}${close}`;
  }

  /**
   * Quote each part of a dotted name
   */
  quoteQualified(name: string): string {
    return name
      .split(".")
      .map((part) => (part === "*" ? part : this.quoteIdentifier(part)))
      .join(".");
  }

  // ==========================================================================
  // Set operations and functions
  // ==========================================================================

  setOperatorKeyword(operator: "UNION" | "INTERSECT" | "EXCEPT"): string {
    return operator;
  }

  /**
   * Render a function call. Unmapped names pass through verbatim.
   */
  renderFunction(name: string, args: readonly string[], distinct: boolean): string {
    const mapping = this.functions[name.toUpperCase()];
    if (mapping === undefined) return callWithArgs(name)(args, distinct);
    if (typeof mapping === "string") return callWithArgs(mapping)(args, distinct);
    return mapping(args, distinct);
  }

  /**
   * Whether a function name has a dialect-specific rendering
   */
  mapsFunction(name: string): boolean {
    return name.toUpperCase() in this.functions;
  }

  // ==========================================================================
  // Helpers for subclasses
  // ==========================================================================

  protected static reservedWords(...lists: ReservedWordList[]): ReadonlySet<string> {
    return wordSet("common", ...lists);
  }

  protected static call(name: string): FunctionRenderer {
    return callWithArgs(name);
  }

  protected static infix(operator: string): FunctionRenderer {
    return (args) => `(${args.join(` ${operator} `)})`;
  }
}
