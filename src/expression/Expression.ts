/**
 * sqlweave Expression AST
 *
 * Database-agnostic nodes for the parts of a SQL statement. Nodes are
 * frozen plain objects tagged by `kind`; composing them always creates new
 * nodes, so a fragment can be shared between any number of queries.
 * No node knows about dialects: rendering belongs to the compiler.
 */

import type { QueryPlan } from "../query/QueryPlan";
import type { DbType, HostType, TypeAdapter } from "../types/TypeAdapter";

/**
 * Brand carried by every node, used to tell expressions from filter objects
 */
export const EXPRESSION: unique symbol = Symbol("sqlweave.expression");

interface NodeBase {
  readonly [EXPRESSION]: true;
}

// ============================================================================
// Operators
// ============================================================================

export type ComparisonOperator =
  | "="
  | "<>"
  | "<"
  | "<="
  | ">"
  | ">="
  | "LIKE"
  | "NOT LIKE";

export type LogicalOperator = "AND" | "OR";

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";

export type BinaryOperator =
  | ComparisonOperator
  | LogicalOperator
  | ArithmeticOperator;

export type UnaryOperator =
  | "NOT"
  | "-"
  | "IS NULL"
  | "IS NOT NULL"
  | "EXISTS"
  | "NOT EXISTS";

export type SortDirection = "ASC" | "DESC";

// ============================================================================
// Nodes
// ============================================================================

export interface ColumnNode extends NodeBase {
  readonly kind: "column";
  readonly table?: string;
  readonly name: string;
  readonly alias?: string;
}

export interface StarNode extends NodeBase {
  readonly kind: "star";
  readonly table?: string;
}

export interface LiteralNode extends NodeBase {
  readonly kind: "literal";
  readonly value: unknown;
  readonly inferredType: HostType;
  /** Per-value override of the column representation */
  readonly dbType?: DbType;
  /** Per-value override of the adapter */
  readonly adapter?: TypeAdapter;
}

export interface BinaryNode extends NodeBase {
  readonly kind: "binary";
  readonly op: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface UnaryNode extends NodeBase {
  readonly kind: "unary";
  readonly op: UnaryOperator;
  readonly operand: Expression;
}

export interface InListNode extends NodeBase {
  readonly kind: "in";
  readonly operand: Expression;
  readonly values: readonly Expression[];
  readonly negated: boolean;
}

export interface InSubqueryNode extends NodeBase {
  readonly kind: "inSubquery";
  readonly operand: Expression;
  readonly plan: QueryPlan;
  readonly negated: boolean;
}

export interface OrderTerm {
  readonly expression: Expression;
  readonly direction: SortDirection;
}

export type FrameBound =
  | "UNBOUNDED PRECEDING"
  | "CURRENT ROW"
  | "UNBOUNDED FOLLOWING"
  | { readonly preceding: number }
  | { readonly following: number };

export interface WindowFrame {
  readonly unit: "ROWS" | "RANGE" | "GROUPS";
  readonly start: FrameBound;
  readonly end?: FrameBound;
}

export interface WindowNode extends NodeBase {
  readonly kind: "window";
  readonly partitionBy: readonly Expression[];
  readonly orderBy: readonly OrderTerm[];
  readonly frame?: WindowFrame;
}

export interface FunctionNode extends NodeBase {
  readonly kind: "function";
  readonly name: string;
  readonly args: readonly Expression[];
  readonly distinct: boolean;
  readonly over?: WindowNode;
}

export interface SubqueryNode extends NodeBase {
  readonly kind: "subquery";
  readonly plan: QueryPlan;
}

export interface CaseBranch {
  readonly when: Expression;
  readonly then: Expression;
}

export interface CaseNode extends NodeBase {
  readonly kind: "case";
  readonly branches: readonly CaseBranch[];
  readonly else?: Expression;
}

export interface AliasNode extends NodeBase {
  readonly kind: "alias";
  readonly expression: Expression;
  readonly alias: string;
}

/**
 * Verbatim SQL; each `?` is replaced by the dialect's placeholder
 */
export interface RawNode extends NodeBase {
  readonly kind: "raw";
  readonly sql: string;
  readonly params: readonly unknown[];
}

export type Expression =
  | ColumnNode
  | StarNode
  | LiteralNode
  | BinaryNode
  | UnaryNode
  | InListNode
  | InSubqueryNode
  | WindowNode
  | FunctionNode
  | SubqueryNode
  | CaseNode
  | AliasNode
  | RawNode;

export type ExpressionKind = Expression["kind"];

/**
 * Check if a value is an expression node
 */
export function isExpression(value: unknown): value is Expression {
  return typeof value === "object" && value !== null && EXPRESSION in value;
}

/**
 * Name under which an expression appears in a result row, when known
 */
export function outputName(expression: Expression): string | undefined {
  switch (expression.kind) {
    case "alias":
      return expression.alias;
    case "column":
      return expression.alias ?? expression.name;
    default:
      return undefined;
  }
}
