/**
 * sqlweave Eager-Load Tree
 *
 * Turns `with(...)` requests into a tree of relation nodes. Shared path
 * prefixes merge into one node; each distinct (relation, modifier, slot)
 * on a parent is its own node and its own batch query.
 */

import type { Row } from "../db/QueryExecutor";
import { InvalidPlanError } from "../errors/OrmErrors";
import type { QueryBuilder } from "../query/QueryBuilder";

/**
 * Adjusts the batch query of one relation path (filters, ordering, columns)
 */
export type RelationModifier = (query: QueryBuilder<Row>) => QueryBuilder<Row>;

export interface EagerLoadSpec {
  readonly path: string;
  readonly modify?: RelationModifier;
  /** Slot name on the parent, defaults to the relation name */
  readonly as?: string;
}

export type EagerLoadRequest = string | readonly [string, RelationModifier] | EagerLoadSpec;

export interface EagerLoadNode {
  readonly relation: string;
  readonly slot: string;
  readonly modifier?: RelationModifier;
  /** Dotted slot path from the root, e.g. `posts.comments` */
  readonly path: string;
  readonly children: EagerLoadNode[];
}

// `Array.isArray` does not narrow readonly tuples out of a union
function isTuple(
  request: readonly [string, RelationModifier] | EagerLoadSpec
): request is readonly [string, RelationModifier] {
  return Array.isArray(request);
}

function toSpec(request: EagerLoadRequest): EagerLoadSpec {
  if (typeof request === "string") return { path: request };
  return isTuple(request) ? { path: request[0], modify: request[1] } : request;
}

function addChild(
  siblings: EagerLoadNode[],
  intermediates: Set<EagerLoadNode>,
  parentPath: string,
  relation: string,
  slot: string,
  modifier: RelationModifier | undefined
): EagerLoadNode {
  const index = siblings.findIndex((node) => node.slot === slot);
  if (index === -1) {
    const node: EagerLoadNode = {
      relation,
      slot,
      modifier,
      path: parentPath ? `${parentPath}.${slot}` : slot,
      children: [],
    };
    siblings.push(node);
    return node;
  }

  const existing = siblings[index];
  if (existing.relation === relation && existing.modifier === modifier) {
    intermediates.delete(existing);
    return existing;
  }

  // a node only created to reach deeper paths takes the options of a later request
  if (intermediates.has(existing) && existing.relation === relation) {
    const node: EagerLoadNode = { ...existing, modifier };
    intermediates.delete(existing);
    siblings[index] = node;
    return node;
  }

  const where = parentPath ? ` under "${parentPath}"` : "";
  throw new InvalidPlanError(
    `Relation slot "${slot}"${where} is requested twice with different options; give one of them a name with "as"`
  );
}

/**
 * Build the load tree. Intermediate path segments are plain nodes; the
 * last segment carries the modifier and the alias. Request order does not
 * matter: a later request may give options to a node that so far only led
 * to deeper paths.
 */
export function buildEagerLoadTree(requests: readonly EagerLoadRequest[]): EagerLoadNode[] {
  const roots: EagerLoadNode[] = [];
  const intermediates = new Set<EagerLoadNode>();

  for (const request of requests) {
    const { path, modify, as } = toSpec(request);
    const segments = path.split(".").map((segment) => segment.trim());
    if (segments.some((segment) => segment === "")) {
      throw new InvalidPlanError(`Invalid relation path "${path}"`);
    }

    let siblings = roots;
    let parentPath = "";
    segments.forEach((segment, index) => {
      let node: EagerLoadNode;
      if (index === segments.length - 1) {
        node = addChild(siblings, intermediates, parentPath, segment, as ?? segment, modify);
      } else {
        // intermediate segments name slots and reuse whatever node fills them
        const found = siblings.find((sibling) => sibling.slot === segment);
        if (found) {
          node = found;
        } else {
          node = addChild(siblings, intermediates, parentPath, segment, segment, undefined);
          intermediates.add(node);
        }
      }
      siblings = node.children;
      parentPath = node.path;
    });
  }

  return roots;
}

/**
 * Every node path, parents before children
 */
export function flattenPaths(nodes: readonly EagerLoadNode[]): string[] {
  const paths: string[] = [];
  const queue = [...nodes];
  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) break;
    paths.push(node.path);
    queue.push(...node.children);
  }
  return paths;
}
