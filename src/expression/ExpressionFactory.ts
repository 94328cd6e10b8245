/**
 * sqlweave Expression Constructors
 *
 * Functions that build AST nodes. Plain values passed where an expression is
 * expected become literals (bound as parameters by the compiler).
 *
 * @example
 * const adults = and_(gte(column("age"), 18), eq(column("active"), true));
 * const total = alias(func.count(), "total");
 */

import { PlanSource, resolvePlan } from "../query/QueryPlan";
import type { DbType, HostType, TypeAdapter } from "../types/TypeAdapter";
import { inferHostType } from "../types/TypeAdapter";
import {
  AliasNode,
  BinaryNode,
  BinaryOperator,
  CaseBranch,
  CaseNode,
  ColumnNode,
  EXPRESSION,
  Expression,
  FunctionNode,
  InListNode,
  InSubqueryNode,
  LiteralNode,
  OrderTerm,
  RawNode,
  StarNode,
  SubqueryNode,
  UnaryNode,
  UnaryOperator,
  WindowFrame,
  WindowNode,
  isExpression,
} from "./Expression";

/**
 * Anything accepted where an expression is expected
 */
export type Operand = Expression | unknown;

const brand = { [EXPRESSION]: true } as const;

function freezeNode<T extends Expression>(node: T): T {
  Object.freeze(node);
  return node;
}

// ============================================================================
// Leaves
// ============================================================================

/**
 * Column reference. "posts.title" is split into table and name.
 */
export function column(name: string, table?: string): ColumnNode {
  if (table === undefined) {
    const dot = name.lastIndexOf(".");
    if (dot > 0) {
      return freezeNode<ColumnNode>({
        ...brand,
        kind: "column",
        table: name.slice(0, dot),
        name: name.slice(dot + 1),
      });
    }
  }
  return freezeNode<ColumnNode>({ ...brand, kind: "column", table, name });
}

export function star(table?: string): StarNode {
  return freezeNode<StarNode>({ ...brand, kind: "star", table });
}

export interface LiteralHint {
  type?: HostType;
  dbType?: DbType;
  adapter?: TypeAdapter;
}

export function literal(value: unknown, hint: LiteralHint = {}): LiteralNode {
  return freezeNode<LiteralNode>({
    ...brand,
    kind: "literal",
    value,
    inferredType: hint.type ?? hint.adapter?.hostType ?? inferHostType(value),
    dbType: hint.dbType,
    adapter: hint.adapter,
  });
}

/**
 * Wrap a plain value as a literal; expressions pass through
 */
export function toExpression(value: Operand): Expression {
  return isExpression(value) ? value : literal(value);
}

export function raw(sql: string, params: readonly unknown[] = []): RawNode {
  return freezeNode<RawNode>({
    ...brand,
    kind: "raw",
    sql,
    params: Object.freeze([...params]),
  });
}

// ============================================================================
// Operators
// ============================================================================

export function binary(
  op: BinaryOperator,
  left: Operand,
  right: Operand
): BinaryNode {
  return freezeNode<BinaryNode>({
    ...brand,
    kind: "binary",
    op,
    left: toExpression(left),
    right: toExpression(right),
  });
}

export function unary(op: UnaryOperator, operand: Operand): UnaryNode {
  return freezeNode<UnaryNode>({
    ...brand,
    kind: "unary",
    op,
    operand: toExpression(operand),
  });
}

function isNullValue(value: Operand): boolean {
  return value === null || value === undefined;
}

export function eq(left: Operand, right: Operand): Expression {
  if (isNullValue(right)) return isNull(left);
  return binary("=", left, right);
}

export function ne(left: Operand, right: Operand): Expression {
  if (isNullValue(right)) return isNotNull(left);
  return binary("<>", left, right);
}

export const gt = (left: Operand, right: Operand): BinaryNode =>
  binary(">", left, right);
export const gte = (left: Operand, right: Operand): BinaryNode =>
  binary(">=", left, right);
export const lt = (left: Operand, right: Operand): BinaryNode =>
  binary("<", left, right);
export const lte = (left: Operand, right: Operand): BinaryNode =>
  binary("<=", left, right);
export const like = (left: Operand, pattern: Operand): BinaryNode =>
  binary("LIKE", left, pattern);
export const notLike = (left: Operand, pattern: Operand): BinaryNode =>
  binary("NOT LIKE", left, pattern);
export const add = (left: Operand, right: Operand): BinaryNode =>
  binary("+", left, right);
export const sub = (left: Operand, right: Operand): BinaryNode =>
  binary("-", left, right);
export const mul = (left: Operand, right: Operand): BinaryNode =>
  binary("*", left, right);
export const div = (left: Operand, right: Operand): BinaryNode =>
  binary("/", left, right);

function fold(
  op: "AND" | "OR",
  first: Expression,
  rest: Expression[]
): Expression {
  return rest.reduce<Expression>((acc, next) => binary(op, acc, next), first);
}

/**
 * Conjunction; `and_(a, b, c)` renders as `a AND b AND c`
 */
export function and_(first: Expression, ...rest: Expression[]): Expression {
  return fold("AND", first, rest);
}

export function or_(first: Expression, ...rest: Expression[]): Expression {
  return fold("OR", first, rest);
}

export function not_(operand: Expression): UnaryNode {
  return unary("NOT", operand);
}

export function isNull(operand: Operand): UnaryNode {
  return unary("IS NULL", operand);
}

export function isNotNull(operand: Operand): UnaryNode {
  return unary("IS NOT NULL", operand);
}

export function between(
  operand: Operand,
  low: Operand,
  high: Operand
): Expression {
  return and_(gte(operand, low), lte(operand, high));
}

/**
 * IN over a list of values; an empty list compiles to an always-false
 * predicate
 */
export function inList(
  operand: Operand,
  values: readonly Operand[]
): InListNode {
  return freezeNode<InListNode>({
    ...brand,
    kind: "in",
    operand: toExpression(operand),
    values: Object.freeze(values.map(toExpression)),
    negated: false,
  });
}

export function notIn(
  operand: Operand,
  values: readonly Operand[]
): InListNode {
  return freezeNode<InListNode>({
    ...brand,
    kind: "in",
    operand: toExpression(operand),
    values: Object.freeze(values.map(toExpression)),
    negated: true,
  });
}

export function inSubquery(
  operand: Operand,
  source: PlanSource,
  negated = false
): InSubqueryNode {
  return freezeNode<InSubqueryNode>({
    ...brand,
    kind: "inSubquery",
    operand: toExpression(operand),
    plan: resolvePlan(source),
    negated,
  });
}

export function subquery(source: PlanSource): SubqueryNode {
  return freezeNode<SubqueryNode>({ ...brand, kind: "subquery", plan: resolvePlan(source) });
}

export function exists(source: PlanSource): UnaryNode {
  return unary("EXISTS", subquery(source));
}

export function notExists(source: PlanSource): UnaryNode {
  return unary("NOT EXISTS", subquery(source));
}

export function caseWhen(
  branches: ReadonlyArray<readonly [Expression, Operand]>,
  otherwise?: Operand
): CaseNode {
  const nodes: CaseBranch[] = branches.map(([when, then]) => ({
    when,
    then: toExpression(then),
  }));
  return freezeNode<CaseNode>({
    ...brand,
    kind: "case",
    branches: Object.freeze(nodes),
    else: otherwise === undefined ? undefined : toExpression(otherwise),
  });
}

export function alias(expression: Expression, name: string): AliasNode {
  return freezeNode<AliasNode>({ ...brand, kind: "alias", expression, alias: name });
}

// ============================================================================
// Ordering and windows
// ============================================================================

export function asc(expression: Expression): OrderTerm {
  const term: OrderTerm = { expression, direction: "ASC" };
  return Object.freeze(term);
}

export function desc(expression: Expression): OrderTerm {
  const term: OrderTerm = { expression, direction: "DESC" };
  return Object.freeze(term);
}

export interface WindowSpec {
  readonly partitionBy?: readonly Expression[];
  readonly orderBy?: readonly OrderTerm[];
  readonly frame?: WindowFrame;
}

export function window(spec: WindowSpec = {}): WindowNode {
  return freezeNode<WindowNode>({
    ...brand,
    kind: "window",
    partitionBy: Object.freeze([...(spec.partitionBy ?? [])]),
    orderBy: Object.freeze([...(spec.orderBy ?? [])]),
    frame: spec.frame,
  });
}

/**
 * Attach a window to a function call: `ROW_NUMBER() OVER (...)`
 */
export function over(
  call: FunctionNode,
  spec: WindowSpec = {}
): FunctionNode {
  return freezeNode<FunctionNode>({ ...call, over: window(spec) });
}

// ============================================================================
// Functions
// ============================================================================

/**
 * Generic function call; the name passes through unless the dialect maps it
 */
export function fn(name: string, ...args: Operand[]): FunctionNode {
  return freezeNode<FunctionNode>({
    ...brand,
    kind: "function",
    name,
    args: Object.freeze(args.map(toExpression)),
    distinct: false,
  });
}

function distinctCall(name: string, arg: Operand): FunctionNode {
  return freezeNode<FunctionNode>({
    ...brand,
    kind: "function",
    name,
    args: Object.freeze([toExpression(arg)]),
    distinct: true,
  });
}

export const func = {
  count: (arg?: Operand): FunctionNode => fn("COUNT", arg === undefined ? star() : arg),
  countDistinct: (arg: Operand): FunctionNode => distinctCall("COUNT", arg),
  sum: (arg: Operand): FunctionNode => fn("SUM", arg),
  avg: (arg: Operand): FunctionNode => fn("AVG", arg),
  min: (arg: Operand): FunctionNode => fn("MIN", arg),
  max: (arg: Operand): FunctionNode => fn("MAX", arg),
  coalesce: (...args: Operand[]): FunctionNode => fn("COALESCE", ...args),
  ifnull: (value: Operand, fallback: Operand): FunctionNode =>
    fn("IFNULL", value, fallback),
  now: (): FunctionNode => fn("NOW"),
  length: (arg: Operand): FunctionNode => fn("LENGTH", arg),
  lower: (arg: Operand): FunctionNode => fn("LOWER", arg),
  upper: (arg: Operand): FunctionNode => fn("UPPER", arg),
  substring: (arg: Operand, start: Operand, length?: Operand): FunctionNode =>
    length === undefined
      ? fn("SUBSTRING", arg, start)
      : fn("SUBSTRING", arg, start, length),
  concat: (...args: Operand[]): FunctionNode => fn("CONCAT", ...args),
  groupConcat: (arg: Operand): FunctionNode => fn("GROUP_CONCAT", arg),
  random: (): FunctionNode => fn("RANDOM"),
  rowNumber: (): FunctionNode => fn("ROW_NUMBER"),
  rank: (): FunctionNode => fn("RANK"),
  denseRank: (): FunctionNode => fn("DENSE_RANK"),
  lag: (arg: Operand, offset?: number): FunctionNode =>
    offset === undefined ? fn("LAG", arg) : fn("LAG", arg, raw(String(offset))),
  lead: (arg: Operand, offset?: number): FunctionNode =>
    offset === undefined ? fn("LEAD", arg) : fn("LEAD", arg, raw(String(offset))),
  jsonExtract: (document: Operand, path: Operand): FunctionNode =>
    fn("JSON_EXTRACT", document, path),
  call: fn,
};
