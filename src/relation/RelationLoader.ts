/**
 * sqlweave Relation Loader
 *
 * Eager loading without N+1: one `IN (...)` query per relation node, issued
 * level by level. The traversal is a generator that yields batch requests
 * and receives their rows, so the async and the blocking drivers below
 * share every step except the I/O.
 */

import type { Database, ModelMeta } from "../db/Database";
import type { QueryExecutor, Row } from "../db/QueryExecutor";
import {
  CrossBackendRelation,
  EagerLoadCancelledError,
  UnknownRelationError,
} from "../errors/OrmErrors";
import { column, inList } from "../expression/ExpressionFactory";
import { getLogger } from "../logging/Logger";
import { ColumnResolver } from "../query/Conditions";
import type { QueryBuilder } from "../query/QueryBuilder";
import { camelToSnake } from "../utils/naming";
import {
  EagerLoadNode,
  EagerLoadRequest,
  buildEagerLoadTree,
  flattenPaths,
} from "./EagerLoadTree";
import { attachRelation, clearRelation } from "./RelationCache";
import { RelationDescriptor, isToMany } from "./RelationDescriptor";

const logger = getLogger("relations");

// ============================================================================
// Planning
// ============================================================================

export interface ResolvedRelation {
  readonly node: EagerLoadNode;
  readonly owner: ModelMeta;
  readonly target: ModelMeta;
  readonly relation: RelationDescriptor;
  /** Property read on each parent */
  readonly parentKey: string;
  /** Property matched on each child */
  readonly childKey: string;
  readonly many: boolean;
  readonly children: readonly ResolvedRelation[];
}

export interface EagerLoadPlan {
  readonly model: ModelMeta;
  readonly nodes: readonly ResolvedRelation[];
  readonly paths: readonly string[];
}

function resolveNode(db: Database, owner: ModelMeta, node: EagerLoadNode): ResolvedRelation {
  if (!Object.prototype.hasOwnProperty.call(owner.relations, node.relation)) {
    throw new UnknownRelationError(owner.name, node.relation);
  }
  const relation = owner.relations[node.relation];
  const target = db.getModel(relation.target);
  if (!target) {
    throw new UnknownRelationError(
      owner.name,
      node.relation,
      `target model "${relation.target}" is not defined`
    );
  }

  const owningSide =
    relation.kind === "belongsTo"
      ? { parentKey: relation.foreignKey, childKey: relation.ownerKey ?? target.primaryKey }
      : { parentKey: relation.localKey ?? owner.primaryKey, childKey: relation.foreignKey };

  return {
    node,
    owner,
    target,
    relation,
    ...owningSide,
    many: isToMany(relation),
    children: node.children.map((child) => resolveNode(db, target, child)),
  };
}

/**
 * Parse and resolve eager-load requests against the model registry.
 * Throws before any query runs.
 */
export function planEagerLoad(
  db: Database,
  model: ModelMeta,
  requests: readonly EagerLoadRequest[]
): EagerLoadPlan {
  const tree = buildEagerLoadTree(requests);
  return {
    model,
    nodes: tree.map((node) => resolveNode(db, model, node)),
    paths: flattenPaths(tree),
  };
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * One batch query the driver must run
 */
export interface BatchRequest {
  readonly path: string;
  readonly connection: string;
  readonly query: QueryBuilder<Row>;
}

export interface EagerLoadReport {
  readonly queries: number;
  readonly completed: readonly string[];
  readonly warnings: readonly CrossBackendRelation[];
}

export interface LoadOptions {
  readonly signal?: AbortSignal;
  /** Runs batches that stay on the root connection (e.g. a transaction) */
  readonly executor?: QueryExecutor;
  /** Connection of the root records, defaults to the root model's */
  readonly connection?: string;
}

interface Frame {
  readonly relation: ResolvedRelation;
  readonly parents: readonly object[];
}

function readProperty(record: object, property: string): unknown {
  return Reflect.get(record, property);
}

/**
 * Key used to match parents and children. Numbers, bigints and numeric
 * strings compare equal, since drivers differ on how they return ids.
 */
function matchKey(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) return `date:${value.toISOString()}`;
  if (value instanceof Uint8Array) return `bytes:${Buffer.from(value).toString("hex")}`;
  if (typeof value === "object") return `json:${JSON.stringify(value)}`;
  return String(value);
}

function distinctKeys(parents: readonly object[], property: string): unknown[] {
  const seen = new Map<string, unknown>();
  for (const parent of parents) {
    const value = readProperty(parent, property);
    const key = matchKey(value);
    if (key !== undefined && !seen.has(key)) seen.set(key, value);
  }
  return [...seen.values()];
}

function batchQuery(db: Database, resolved: ResolvedRelation, keys: unknown[]): QueryBuilder<Row> {
  const { node, owner, target, relation, childKey } = resolved;
  const resolver = new ColumnResolver(target.fields);

  let query = db.query<Row>(target.name);
  if (node.modifier) query = node.modifier(query);
  query = query.where(
    inList(
      column(camelToSnake(childKey), target.table),
      keys.map((key) => resolver.value(childKey, key))
    )
  );
  if (relation.kind === "polymorphic") {
    query = query.where(relation.typeColumn, relation.typeValue ?? owner.name);
  }
  return query;
}

class EagerLoadRun {
  private readonly queue: Frame[];
  private position = 0;
  private readonly completed: string[] = [];
  private readonly warnings: CrossBackendRelation[] = [];
  private queries = 0;

  constructor(
    private readonly db: Database,
    private readonly plan: EagerLoadPlan,
    roots: readonly object[],
    private readonly rootConnection: string
  ) {
    this.queue = plan.nodes.map((relation) => ({ relation, parents: roots }));
  }

  *batches(): Generator<BatchRequest, EagerLoadReport, Row[]> {
    for (; this.position < this.queue.length; this.position++) {
      const { relation, parents } = this.queue[this.position];
      const { node, owner, target } = relation;
      const keys = distinctKeys(parents, relation.parentKey);

      let children: Row[] = [];
      if (keys.length > 0) {
        const parentConnection = this.connectionOf(owner);
        if (target.connection !== parentConnection) {
          const warning = new CrossBackendRelation(node.path, parentConnection, target.connection);
          this.warnings.push(warning);
          this.db.reportWarning(warning);
        }
        logger.debug(`Loading ${node.path} for ${keys.length} key(s)`);
        this.queries++;
        children = yield {
          path: node.path,
          connection: target.connection,
          query: batchQuery(this.db, relation, keys),
        };
      }

      this.attach(relation, parents, children);
      this.completed.push(node.path);
      for (const child of relation.children) {
        this.queue.push({ relation: child, parents: children });
      }
    }

    return {
      queries: this.queries,
      completed: [...this.completed],
      warnings: [...this.warnings],
    };
  }

  /**
   * Stop before the next batch. Relations that were not attached are left
   * (or reset to) not loaded.
   */
  cancel(reason: unknown): never {
    for (const { relation, parents } of this.queue.slice(this.position)) {
      for (const parent of parents) clearRelation(parent, relation.node.slot);
    }
    const done = new Set(this.completed);
    const pending = this.plan.paths.filter((path) => !done.has(path));
    logger.info(`Eager loading cancelled, pending: ${pending.join(", ")}`);
    throw new EagerLoadCancelledError([...this.completed], pending, reason);
  }

  private connectionOf(model: ModelMeta): string {
    return model === this.plan.model ? this.rootConnection : model.connection;
  }

  private attach(resolved: ResolvedRelation, parents: readonly object[], children: Row[]): void {
    const { node, relation, parentKey, childKey, many } = resolved;
    const ttlMs = relation.cacheTtlMs ?? this.db.relationCacheTtlMs;

    const groups = new Map<string, Row[]>();
    for (const child of children) {
      const key = matchKey(child[childKey]);
      if (key === undefined) continue;
      const group = groups.get(key);
      if (group) {
        group.push(child);
      } else {
        groups.set(key, [child]);
      }
    }

    const inverse = relation.kind === "belongsTo" ? undefined : relation.inverseOf;
    for (const parent of parents) {
      const key = matchKey(readProperty(parent, parentKey));
      const matches = (key !== undefined && groups.get(key)) || [];
      attachRelation(parent, node.slot, many ? matches : matches[0] ?? null, { ttlMs });
      if (inverse) {
        for (const child of matches) {
          attachRelation(child, inverse, parent, { ttlMs, enumerable: false });
        }
      }
    }
  }
}

// ============================================================================
// Drivers
// ============================================================================

function prepare(request: BatchRequest, rootConnection: string, options: LoadOptions): QueryBuilder<Row> {
  return options.executor && request.connection === rootConnection
    ? request.query.using(options.executor)
    : request.query;
}

/**
 * Load a plan onto already-fetched root records
 */
export async function loadRelations(
  db: Database,
  plan: EagerLoadPlan,
  roots: readonly object[],
  options: LoadOptions = {}
): Promise<EagerLoadReport> {
  const rootConnection = options.connection ?? plan.model.connection;
  const run = new EagerLoadRun(db, plan, roots, rootConnection);
  const batches = run.batches();

  let step = batches.next();
  while (!step.done) {
    if (options.signal?.aborted) run.cancel(options.signal.reason);
    const rows = await prepare(step.value, rootConnection, options).all({ signal: options.signal });
    step = batches.next(rows);
  }
  return step.value;
}

/**
 * Blocking twin of loadRelations; every connection involved must support
 * blocking queries
 */
export function loadRelationsSync(
  db: Database,
  plan: EagerLoadPlan,
  roots: readonly object[],
  options: LoadOptions = {}
): EagerLoadReport {
  const rootConnection = options.connection ?? plan.model.connection;
  const run = new EagerLoadRun(db, plan, roots, rootConnection);
  const batches = run.batches();

  let step = batches.next();
  while (!step.done) {
    if (options.signal?.aborted) run.cancel(options.signal.reason);
    const rows = prepare(step.value, rootConnection, options).allSync();
    step = batches.next(rows);
  }
  return step.value;
}
