/**
 * sqlweave Error Types
 *
 * Every structural problem is detected locally, before any SQL reaches a
 * backend. Driver errors are not wrapped; they propagate unchanged.
 */

import type { CapabilityCategory } from "../capabilities/Capabilities";

export class OrmError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A query plan that cannot be rendered as valid SQL on any backend
 * (HAVING without GROUP BY, JOIN without ON, and so on)
 */
export class InvalidPlanError extends OrmError {
  constructor(message: string, code = "INVALID_PLAN") {
    super(message, code);
  }
}

/**
 * Set-operation operands that select a different number of columns
 */
export class ArityMismatchError extends InvalidPlanError {
  readonly left: number | "wildcard";
  readonly right: number | "wildcard";

  constructor(left: number | "wildcard", right: number | "wildcard") {
    super(
      `Set operation operands must select the same number of columns (left: ${left}, right: ${right})`,
      "ARITY_MISMATCH"
    );
    this.left = left;
    this.right = right;
  }
}

/**
 * The plan needs a feature the target backend does not declare
 */
export class UnsupportedFeatureError extends OrmError {
  readonly dialect: string;
  readonly category: CapabilityCategory | undefined;
  readonly feature: string;

  constructor(
    dialect: string,
    category: CapabilityCategory | undefined,
    feature: string,
    detail?: string
  ) {
    super(
      `${feature} is not supported by ${dialect}${detail ? `: ${detail}` : ""}`,
      "UNSUPPORTED_FEATURE"
    );
    this.dialect = dialect;
    this.category = category;
    this.feature = feature;
  }
}

/**
 * No adapter could be resolved for a value at bind or decode time
 */
export class UnregisteredTypeError extends OrmError {
  readonly hostType: string;
  readonly dbType: string | undefined;

  constructor(hostType: string, dbType?: string) {
    super(
      dbType
        ? `No type adapter registered for ${hostType} -> ${dbType}`
        : `No type adapter registered for ${hostType}`,
      "UNREGISTERED_TYPE"
    );
    this.hostType = hostType;
    this.dbType = dbType;
  }
}

/**
 * An eager-load path names a relation the model does not declare
 */
export class UnknownRelationError extends OrmError {
  readonly model: string;
  readonly relation: string;

  constructor(model: string, relation: string, detail?: string) {
    super(
      `Unknown relation "${relation}" on ${model}${detail ? ` (${detail})` : ""}`,
      "UNKNOWN_RELATION"
    );
    this.model = model;
    this.relation = relation;
  }
}

/**
 * An eager-load sequence was aborted between two batches
 */
export class EagerLoadCancelledError extends OrmError {
  readonly completed: readonly string[];
  readonly pending: readonly string[];

  constructor(completed: string[], pending: string[], reason?: unknown) {
    super(
      `Eager loading cancelled with ${pending.length} relation path(s) pending`,
      "EAGER_LOAD_CANCELLED"
    );
    this.completed = completed;
    this.pending = pending;
    if (reason !== undefined) this.cause = reason;
  }
}

/**
 * Reported when a relation's target lives on another connection.
 * The two round trips cannot share a transaction.
 */
export class CrossBackendRelation {
  readonly path: string;
  readonly parentConnection: string;
  readonly childConnection: string;

  constructor(path: string, parentConnection: string, childConnection: string) {
    this.path = path;
    this.parentConnection = parentConnection;
    this.childConnection = childConnection;
  }

  get message(): string {
    return `Relation "${this.path}" loads from connection "${this.childConnection}" while its parent uses "${this.parentConnection}"; the queries are not atomic`;
  }
}
