/**
 * sqlweave SQL Compiler
 *
 * Renders statements for one dialect. Output is built strictly in text
 * order, so the parameter list always lines up with the placeholders.
 * Compilation is pure: the same statement and dialect give the same SQL
 * and parameters.
 *
 * @example
 * const compiler = new SqlCompiler(new PostgresDialect());
 * const { sql, params } = compiler.compile(plan);
 */

import {
  BulkOperationCapability,
  CapabilityCategory,
  CategoryFlags,
  CteCapability,
  JoinCapability,
  JsonCapability,
  ReturningCapability,
  SetOperationCapability,
  WindowFunctionCapability,
  describeCapability,
} from "../capabilities/Capabilities";
import type { Dialect, ExplainOptions } from "../dialect/Dialect";
import { InvalidPlanError, UnsupportedFeatureError } from "../errors/OrmErrors";
import {
  BinaryNode,
  BinaryOperator,
  Expression,
  FrameBound,
  FunctionNode,
  InListNode,
  OrderTerm,
  RawNode,
  UnaryNode,
  WindowNode,
  outputName,
} from "../expression/Expression";
import { validateStatement } from "../query/PlanValidator";
import {
  CteDefinition,
  DeletePlan,
  InsertPlan,
  JoinKind,
  Pagination,
  QueryPlan,
  SelectPlan,
  SetOperationPlan,
  SetOperator,
  Source,
  Statement,
  UpdatePlan,
} from "../query/QueryPlan";
import { Binding, ParameterCollector } from "./ParameterCollector";

export interface CompiledQuery {
  readonly sql: string;
  /** Values in placeholder order, before type conversion */
  readonly params: readonly unknown[];
  readonly bindings: readonly Binding[];
}

// ============================================================================
// Lookup tables
// ============================================================================

const PRECEDENCE: Record<BinaryOperator, number> = {
  OR: 1,
  AND: 2,
  "=": 4,
  "<>": 4,
  "<": 4,
  "<=": 4,
  ">": 4,
  ">=": 4,
  LIKE: 4,
  "NOT LIKE": 4,
  "+": 5,
  "-": 5,
  "*": 6,
  "/": 6,
  "%": 6,
};

const NOT_PRECEDENCE = 3;
const PREDICATE_PRECEDENCE = 4;
const ATOMIC_PRECEDENCE = 10;

const ASSOCIATIVE = new Set<BinaryOperator>(["AND", "OR", "+", "*"]);

const SET_OPERATION_FLAGS: Record<
  SetOperator,
  readonly [SetOperationCapability, SetOperationCapability]
> = {
  UNION: [SetOperationCapability.Union, SetOperationCapability.UnionAll],
  INTERSECT: [SetOperationCapability.Intersect, SetOperationCapability.IntersectAll],
  EXCEPT: [SetOperationCapability.Except, SetOperationCapability.ExceptAll],
};

const JOIN_FLAGS: Record<JoinKind, JoinCapability> = {
  INNER: JoinCapability.Inner,
  LEFT: JoinCapability.Left,
  RIGHT: JoinCapability.Right,
  FULL: JoinCapability.Full,
  CROSS: JoinCapability.Cross,
};

const WINDOW_FUNCTIONS: Readonly<Record<string, WindowFunctionCapability>> = {
  ROW_NUMBER: WindowFunctionCapability.RowNumber,
  RANK: WindowFunctionCapability.Rank,
  DENSE_RANK: WindowFunctionCapability.DenseRank,
  LAG: WindowFunctionCapability.Lag,
  LEAD: WindowFunctionCapability.Lead,
  FIRST_VALUE: WindowFunctionCapability.FirstValue,
  LAST_VALUE: WindowFunctionCapability.LastValue,
  NTH_VALUE: WindowFunctionCapability.NthValue,
  CUME_DIST: WindowFunctionCapability.CumeDist,
  PERCENT_RANK: WindowFunctionCapability.PercentRank,
  NTILE: WindowFunctionCapability.Ntile,
};

const JSON_FUNCTIONS: Readonly<Record<string, JsonCapability>> = {
  JSON_EXTRACT: JsonCapability.Extract,
  JSON_CONTAINS: JsonCapability.Contains,
  JSON_EXISTS: JsonCapability.Exists,
  JSON_SET: JsonCapability.Set,
  JSON_INSERT: JsonCapability.Insert,
  JSON_REPLACE: JsonCapability.Replace,
  JSON_REMOVE: JsonCapability.Remove,
  JSON_KEYS: JsonCapability.Keys,
  JSON_ARRAY: JsonCapability.Array,
  JSON_OBJECT: JsonCapability.Object,
};

function hasOwn<T extends object>(table: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(table, key);
}

// ============================================================================
// Compiler
// ============================================================================

export class SqlCompiler {
  constructor(readonly dialect: Dialect) {}

  /**
   * Validate and render a statement
   */
  compile(statement: Statement): CompiledQuery {
    validateStatement(statement);
    const params = new ParameterCollector(this.dialect);
    const sql = this.renderStatement(statement, params);
    return Object.freeze({
      sql,
      params: Object.freeze(params.values()),
      bindings: params.bindings(),
    });
  }

  /**
   * Render a statement wrapped in the dialect's EXPLAIN syntax
   */
  explain(statement: Statement, options: ExplainOptions = {}): CompiledQuery {
    const prefix = this.dialect.explainPrefix(options);
    const compiled = this.compile(statement);
    return Object.freeze({ ...compiled, sql: `${prefix} ${compiled.sql}` });
  }

  // ==========================================================================
  // Capability gate
  // ==========================================================================

  private require<C extends CapabilityCategory>(
    category: C,
    capability: CategoryFlags[C],
    detail?: string
  ): void {
    if (!this.dialect.capabilities.supports(category, capability)) {
      throw new UnsupportedFeatureError(
        this.dialect.label,
        category,
        describeCapability(category, capability),
        detail
      );
    }
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  private renderStatement(statement: Statement, params: ParameterCollector): string {
    switch (statement.kind) {
      case "select":
      case "setOperation":
        return this.renderQuery(statement, params);
      case "insert":
        return this.renderInsert(statement, params);
      case "update":
        return this.renderUpdate(statement, params);
      case "delete":
        return this.renderDelete(statement, params);
    }
  }

  private renderQuery(plan: QueryPlan, params: ParameterCollector): string {
    const withClause = this.renderWith(plan.ctes, params);
    const body =
      plan.kind === "select"
        ? this.renderSelect(plan, params)
        : this.renderSetOperation(plan, params);
    return withClause ? `${withClause} ${body}` : body;
  }

  private renderWith(
    ctes: readonly CteDefinition[],
    params: ParameterCollector
  ): string {
    if (ctes.length === 0) return "";
    this.require(CapabilityCategory.Cte, CteCapability.Basic);

    const anyRecursive = ctes.some((cte) => cte.recursive);
    if (anyRecursive) this.require(CapabilityCategory.Cte, CteCapability.Recursive);

    const rendered = ctes.map((cte) => {
      if (cte.materialized !== undefined) {
        this.require(CapabilityCategory.Cte, CteCapability.Materialized);
      }
      const columns = cte.columns ?? this.requiredCteColumns(cte);
      const columnList = columns
        ? ` (${columns.map((c) => this.dialect.quoteIdentifier(c)).join(", ")})`
        : "";
      const hint =
        cte.materialized === undefined
          ? ""
          : cte.materialized
            ? " MATERIALIZED"
            : " NOT MATERIALIZED";
      const body = this.renderQuery(cte.plan, params);
      return `${this.dialect.quoteIdentifier(cte.name)}${columnList} AS${hint} (${body})`;
    });

    const keyword = anyRecursive && this.dialect.recursiveKeyword ? "WITH RECURSIVE" : "WITH";
    return `${keyword} ${rendered.join(", ")}`;
  }

  /**
   * Column list for recursive CTEs on backends that insist on one,
   * taken from the anchor's output names
   */
  private requiredCteColumns(cte: CteDefinition): readonly string[] | undefined {
    if (!cte.recursive || !this.dialect.recursiveCteRequiresColumns) return undefined;
    let anchor: QueryPlan = cte.plan;
    while (anchor.kind === "setOperation") anchor = anchor.left;
    const names = anchor.select.map(outputName);
    const known = names.filter((name): name is string => name !== undefined);
    if (names.length === 0 || known.length !== names.length) {
      throw new InvalidPlanError(
        `Recursive CTE "${cte.name}" needs an explicit column list on ${this.dialect.name}`
      );
    }
    return known;
  }

  private renderSelect(plan: SelectPlan, params: ParameterCollector): string {
    const top =
      this.dialect.paginationStyle === "top" && plan.pagination?.limit !== undefined
        ? ` TOP ${plan.pagination.limit}`
        : "";
    const columns =
      plan.select.length === 0
        ? "*"
        : plan.select.map((item) => this.renderSelectItem(item, params)).join(", ");

    let sql = `SELECT${plan.distinct ? " DISTINCT" : ""}${top} ${columns}`;
    sql += plan.from
      ? ` FROM ${this.renderSource(plan.from, params)}`
      : this.dialect.selectWithoutFrom;

    for (const join of plan.joins) {
      this.require(CapabilityCategory.JoinOperations, JOIN_FLAGS[join.kind]);
      sql += ` ${join.kind} JOIN ${this.renderSource(join.target, params)}`;
      if (join.on) sql += ` ON ${this.renderExpression(join.on, params)}`;
    }

    if (plan.where) sql += ` WHERE ${this.renderExpression(plan.where, params)}`;
    if (plan.groupBy.length > 0) {
      sql += ` GROUP BY ${plan.groupBy
        .map((expr) => this.renderExpression(expr, params))
        .join(", ")}`;
    }
    if (plan.having) sql += ` HAVING ${this.renderExpression(plan.having, params)}`;

    return this.finish(sql, plan.orderBy, plan.pagination, top !== "", params);
  }

  private renderSetOperation(
    plan: SetOperationPlan,
    params: ParameterCollector
  ): string {
    const [plain, withAll] = SET_OPERATION_FLAGS[plan.operator];
    this.require(CapabilityCategory.SetOperations, plan.all ? withAll : plain);

    const left = this.renderSetOperand(plan.left, "left", params);
    const keyword = this.dialect.setOperatorKeyword(plan.operator);
    const right = this.renderSetOperand(plan.right, "right", params);
    const core = `${left} ${keyword}${plan.all ? " ALL" : ""} ${right}`;

    return this.finish(core, plan.orderBy, plan.pagination, false, params);
  }

  private renderSetOperand(
    operand: QueryPlan,
    side: "left" | "right",
    params: ParameterCollector
  ): string {
    const sql = this.renderQuery(operand, params);
    if (this.dialect.parenthesizeSetOperands) return `(${sql})`;

    const ordered = operand.orderBy.length > 0 || operand.pagination !== undefined;
    const nestedRight = side === "right" && operand.kind === "setOperation";
    return ordered || nestedRight ? `SELECT * FROM (${sql})` : sql;
  }

  /**
   * Append ORDER BY and pagination in the dialect's style
   */
  private finish(
    core: string,
    orderBy: readonly OrderTerm[],
    pagination: Pagination | undefined,
    topApplied: boolean,
    params: ParameterCollector
  ): string {
    const order =
      orderBy.length > 0
        ? ` ORDER BY ${orderBy.map((term) => this.renderOrderTerm(term, params)).join(", ")}`
        : "";
    const limit = pagination?.limit;
    const offset = pagination?.offset;
    if (limit === undefined && offset === undefined) return core + order;

    switch (this.dialect.paginationStyle) {
      case "limit-offset": {
        let sql = core + order;
        if (limit !== undefined) sql += ` LIMIT ${limit}`;
        else if (this.dialect.limitAllSentinel) sql += ` LIMIT ${this.dialect.limitAllSentinel}`;
        if (offset !== undefined) sql += ` OFFSET ${offset}`;
        return sql;
      }

      case "offset-fetch": {
        const ordering =
          order || (this.dialect.offsetRequiresOrderBy ? " ORDER BY (SELECT NULL)" : "");
        let sql = `${core}${ordering} OFFSET ${offset ?? 0} ROWS`;
        if (limit !== undefined) sql += ` FETCH NEXT ${limit} ROWS ONLY`;
        return sql;
      }

      case "rownum": {
        const inner = core + order;
        const skip = offset ?? 0;
        if (skip === 0 && limit !== undefined) {
          return `SELECT * FROM (${inner}) WHERE ROWNUM <= ${limit}`;
        }
        const bound = limit !== undefined ? ` WHERE ROWNUM <= ${skip + limit}` : "";
        return `SELECT * FROM (SELECT q_.*, ROWNUM rn_ FROM (${inner}) q_${bound}) WHERE rn_ > ${skip}`;
      }

      case "top": {
        if (offset !== undefined && offset > 0) {
          throw new UnsupportedFeatureError(
            this.dialect.label,
            undefined,
            "OFFSET",
            "requires OFFSET/FETCH support"
          );
        }
        if (topApplied || limit === undefined) return core + order;
        return `SELECT TOP ${limit} * FROM (${core}) AS q_${order}`;
      }
    }
  }

  private renderSource(source: Source, params: ParameterCollector): string {
    const keyword = this.dialect.tableAliasKeyword;
    if (source.kind === "table") {
      const name = this.dialect.quoteQualified(source.name);
      return source.alias
        ? `${name}${keyword}${this.dialect.quoteIdentifier(source.alias)}`
        : name;
    }
    const body = this.renderQuery(source.plan, params);
    return `(${body})${keyword}${this.dialect.quoteIdentifier(source.alias)}`;
  }

  private renderSelectItem(item: Expression, params: ParameterCollector): string {
    if (item.kind === "alias") {
      const inner = this.renderExpression(item.expression, params);
      return `${inner} AS ${this.dialect.quoteIdentifier(item.alias)}`;
    }
    if (item.kind === "column" && item.alias) {
      const inner = this.renderExpression(item, params);
      return `${inner} AS ${this.dialect.quoteIdentifier(item.alias)}`;
    }
    return this.renderExpression(item, params);
  }

  private renderOrderTerm(term: OrderTerm, params: ParameterCollector): string {
    return `${this.renderExpression(term.expression, params)} ${term.direction}`;
  }

  // ==========================================================================
  // Data modification
  // ==========================================================================

  private renderReturning(
    returning: readonly Expression[],
    params: ParameterCollector
  ): string {
    if (returning.length === 0) return "";
    this.require(CapabilityCategory.ReturningClause, ReturningCapability.Basic);
    for (const item of returning) {
      if (item.kind === "alias") {
        this.require(CapabilityCategory.ReturningClause, ReturningCapability.Aliases);
        if (item.expression.kind !== "column") {
          this.require(CapabilityCategory.ReturningClause, ReturningCapability.Expressions);
        }
      } else if (item.kind !== "column" && item.kind !== "star") {
        this.require(CapabilityCategory.ReturningClause, ReturningCapability.Expressions);
      }
    }
    return ` RETURNING ${returning
      .map((item) => this.renderSelectItem(item, params))
      .join(", ")}`;
  }

  private renderInsert(plan: InsertPlan, params: ParameterCollector): string {
    if (plan.rows.length > 1) {
      this.require(CapabilityCategory.BulkOperations, BulkOperationCapability.MultiRowInsert);
    }
    const table = this.dialect.quoteQualified(plan.table);
    const columns = plan.columns.map((c) => this.dialect.quoteIdentifier(c)).join(", ");
    const rows = plan.rows
      .map((row) => `(${row.map((value) => this.renderExpression(value, params)).join(", ")})`)
      .join(", ");
    return `INSERT INTO ${table} (${columns}) VALUES ${rows}${this.renderReturning(plan.returning, params)}`;
  }

  private renderUpdate(plan: UpdatePlan, params: ParameterCollector): string {
    const table = this.dialect.quoteQualified(plan.table);
    const assignments = plan.assignments
      .map(
        ({ column, value }) =>
          `${this.dialect.quoteIdentifier(column)} = ${this.renderExpression(value, params)}`
      )
      .join(", ");
    let sql = `UPDATE ${table} SET ${assignments}`;
    if (plan.where) sql += ` WHERE ${this.renderExpression(plan.where, params)}`;
    return sql + this.renderReturning(plan.returning, params);
  }

  private renderDelete(plan: DeletePlan, params: ParameterCollector): string {
    let sql = `DELETE FROM ${this.dialect.quoteQualified(plan.table)}`;
    if (plan.where) sql += ` WHERE ${this.renderExpression(plan.where, params)}`;
    return sql + this.renderReturning(plan.returning, params);
  }

  // ==========================================================================
  // Expressions
  // ==========================================================================

  private precedenceOf(expression: Expression): number {
    switch (expression.kind) {
      case "binary":
        return PRECEDENCE[expression.op];
      case "unary":
        if (expression.op === "NOT") return NOT_PRECEDENCE;
        if (expression.op === "-") return ATOMIC_PRECEDENCE;
        return PREDICATE_PRECEDENCE;
      case "in":
      case "inSubquery":
        return PREDICATE_PRECEDENCE;
      default:
        return ATOMIC_PRECEDENCE;
    }
  }

  /**
   * Whether a child of a binary node needs parentheses
   */
  private needsParens(parent: BinaryNode, child: Expression, side: "left" | "right"): boolean {
    const parentPrecedence = PRECEDENCE[parent.op];
    const childPrecedence = this.precedenceOf(child);

    if (child.kind === "binary") {
      const logical = (op: BinaryOperator) => op === "AND" || op === "OR";
      if (logical(parent.op) && logical(child.op) && parent.op !== child.op) return true;
      if (childPrecedence < parentPrecedence) return true;
      if (childPrecedence > parentPrecedence) return false;
      if (logical(child.op)) return false;
      if (childPrecedence === PREDICATE_PRECEDENCE) return true;
      if (side === "left") return false;
      return !(child.op === parent.op && ASSOCIATIVE.has(child.op));
    }

    if (childPrecedence < parentPrecedence) return true;
    return childPrecedence === parentPrecedence && childPrecedence === PREDICATE_PRECEDENCE;
  }

  private renderOperand(
    parent: BinaryNode,
    child: Expression,
    side: "left" | "right",
    params: ParameterCollector
  ): string {
    const sql = this.renderExpression(child, params);
    return this.needsParens(parent, child, side) ? `(${sql})` : sql;
  }

  /**
   * Operand of a unary or predicate node; anything that is not atomic is
   * parenthesized
   */
  private renderPredicateOperand(child: Expression, params: ParameterCollector): string {
    const sql = this.renderExpression(child, params);
    return this.precedenceOf(child) === ATOMIC_PRECEDENCE ? sql : `(${sql})`;
  }

  renderExpression(expression: Expression, params: ParameterCollector): string {
    switch (expression.kind) {
      case "column":
        return expression.table
          ? `${this.dialect.quoteQualified(expression.table)}.${this.dialect.quoteIdentifier(expression.name)}`
          : this.dialect.quoteIdentifier(expression.name);

      case "star":
        return expression.table
          ? `${this.dialect.quoteQualified(expression.table)}.*`
          : "*";

      case "literal":
        return params.add({
          value: expression.value === undefined ? null : expression.value,
          hostType: expression.inferredType,
          dbType: expression.dbType,
          adapter: expression.adapter,
        });

      case "binary": {
        const left = this.renderOperand(expression, expression.left, "left", params);
        const right = this.renderOperand(expression, expression.right, "right", params);
        return `${left} ${expression.op} ${right}`;
      }

      case "unary":
        return this.renderUnary(expression, params);

      case "in":
        return this.renderInList(expression, params);

      case "inSubquery": {
        const operand = this.renderPredicateOperand(expression.operand, params);
        const body = this.renderQuery(expression.plan, params);
        return `${operand} ${expression.negated ? "NOT IN" : "IN"} (${body})`;
      }

      case "function":
        return this.renderFunction(expression, params);

      case "window":
        return this.renderWindow(expression, params);

      case "subquery":
        return `(${this.renderQuery(expression.plan, params)})`;

      case "case": {
        let sql = "CASE";
        for (const branch of expression.branches) {
          const when = this.renderExpression(branch.when, params);
          const then = this.renderExpression(branch.then, params);
          sql += ` WHEN ${when} THEN ${then}`;
        }
        if (expression.else) sql += ` ELSE ${this.renderExpression(expression.else, params)}`;
        return `${sql} END`;
      }

      // Aliases only take effect in select lists
      case "alias":
        return this.renderExpression(expression.expression, params);

      case "raw":
        return this.renderRaw(expression, params);
    }
  }

  private renderUnary(expression: UnaryNode, params: ParameterCollector): string {
    switch (expression.op) {
      case "NOT":
        return `NOT ${this.renderPredicateOperand(expression.operand, params)}`;
      case "-":
        return `-${this.renderPredicateOperand(expression.operand, params)}`;
      case "IS NULL":
      case "IS NOT NULL":
        return `${this.renderPredicateOperand(expression.operand, params)} ${expression.op}`;
      case "EXISTS":
      case "NOT EXISTS":
        return `${expression.op} ${this.renderExpression(expression.operand, params)}`;
    }
  }

  private renderInList(expression: InListNode, params: ParameterCollector): string {
    if (expression.values.length === 0) {
      return expression.negated ? this.dialect.truePredicate : this.dialect.falsePredicate;
    }

    const size = this.dialect.maxInListSize ?? expression.values.length;
    const keyword = expression.negated ? "NOT IN" : "IN";
    const chunks: string[] = [];
    for (let start = 0; start < expression.values.length; start += size) {
      const operand = this.renderPredicateOperand(expression.operand, params);
      const values = expression.values
        .slice(start, start + size)
        .map((value) => this.renderExpression(value, params))
        .join(", ");
      chunks.push(`${operand} ${keyword} (${values})`);
    }
    if (chunks.length === 1) return chunks[0];
    return `(${chunks.join(expression.negated ? " AND " : " OR ")})`;
  }

  private renderFunction(expression: FunctionNode, params: ParameterCollector): string {
    const upper = expression.name.toUpperCase();

    if (hasOwn(WINDOW_FUNCTIONS, upper)) {
      if (!expression.over) {
        throw new InvalidPlanError(`${upper} requires an OVER clause`);
      }
      this.require(CapabilityCategory.WindowFunctions, WINDOW_FUNCTIONS[upper]);
    } else if (expression.over && !this.dialect.capabilities.supportsCategory(CapabilityCategory.WindowFunctions)) {
      throw new UnsupportedFeatureError(
        this.dialect.label,
        CapabilityCategory.WindowFunctions,
        "WINDOW_FUNCTIONS",
        `${upper} OVER (...)`
      );
    }
    if (hasOwn(JSON_FUNCTIONS, upper)) {
      this.require(CapabilityCategory.JsonOperations, JSON_FUNCTIONS[upper]);
    }

    const args = expression.args.map((arg) => this.renderExpression(arg, params));
    const call = this.dialect.renderFunction(expression.name, args, expression.distinct);
    return expression.over ? `${call} OVER (${this.renderWindow(expression.over, params)})` : call;
  }

  private renderWindow(window: WindowNode, params: ParameterCollector): string {
    const parts: string[] = [];
    if (window.partitionBy.length > 0) {
      parts.push(
        `PARTITION BY ${window.partitionBy
          .map((expr) => this.renderExpression(expr, params))
          .join(", ")}`
      );
    }
    if (window.orderBy.length > 0) {
      parts.push(
        `ORDER BY ${window.orderBy.map((term) => this.renderOrderTerm(term, params)).join(", ")}`
      );
    }
    if (window.frame) {
      const { unit, start, end } = window.frame;
      parts.push(
        end === undefined
          ? `${unit} ${this.renderFrameBound(start)}`
          : `${unit} BETWEEN ${this.renderFrameBound(start)} AND ${this.renderFrameBound(end)}`
      );
    }
    return parts.join(" ");
  }

  private renderFrameBound(bound: FrameBound): string {
    if (typeof bound === "string") return bound;
    return "preceding" in bound ? `${bound.preceding} PRECEDING` : `${bound.following} FOLLOWING`;
  }

  private renderRaw(expression: RawNode, params: ParameterCollector): string {
    const pieces = splitPlaceholders(expression.sql);
    if (pieces.length - 1 !== expression.params.length) {
      throw new InvalidPlanError(
        `Raw SQL has ${pieces.length - 1} placeholder(s) but ${expression.params.length} parameter(s)`
      );
    }
    return pieces.reduce((sql, piece, index) =>
      sql + params.addValue(expression.params[index - 1]) + piece
    );
  }
}

/**
 * Split raw SQL at its `?` placeholders. A `?` inside a single-quoted
 * literal is text; a doubled quote stays inside the literal.
 */
function splitPlaceholders(sql: string): string[] {
  const pieces: string[] = [];
  let quoted = false;
  let start = 0;
  for (let index = 0; index < sql.length; index++) {
    const char = sql[index];
    if (char === "'") {
      quoted = !quoted;
    } else if (char === "?" && !quoted) {
      pieces.push(sql.slice(start, index));
      start = index + 1;
    }
  }
  pieces.push(sql.slice(start));
  return pieces;
}
