/**
 * sqlweave WHERE helpers
 *
 * Shared by the query builder and the write builders: turns property names
 * into columns and the accepted `where(...)` forms into expressions.
 */

import { ColumnNode, Expression, isExpression } from "../expression/Expression";
import {
  binary,
  column,
  eq,
  inList,
  isNull,
  literal,
  ne,
  notIn,
} from "../expression/ExpressionFactory";
import type { FieldMap } from "../types/RowDecoder";
import { camelToSnake } from "../utils/naming";

/**
 * Operators accepted by `where(column, operator, value)`
 */
export type WhereOperator =
  | "="
  | "!="
  | "<>"
  | ">"
  | "<"
  | ">="
  | "<="
  | "LIKE"
  | "NOT LIKE"
  | "IN"
  | "NOT IN";

/**
 * Property → value. `null` means IS NULL, an array means IN.
 */
export type Filter = Readonly<Record<string, unknown>>;

export type WhereArgs =
  | [condition: Expression]
  | [filter: Filter]
  | [column: string, value: unknown]
  | [column: string, operator: WhereOperator, value: unknown];

/**
 * Property name of a possibly qualified reference ("posts.userId" → "userId")
 */
function propertyOf(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot >= 0 ? name.slice(dot + 1) : name;
}

export class ColumnResolver {
  constructor(private readonly fields: FieldMap | undefined) {}

  /**
   * Column for a camelCase property, optionally qualified with a table
   */
  column(name: string): ColumnNode {
    return column(camelToSnake(name));
  }

  /**
   * Bound value carrying the field's type hint when the property has one
   */
  value(name: string, value: unknown): Expression {
    if (isExpression(value)) return value;
    const field = this.fields?.[propertyOf(name)];
    return field
      ? literal(value, { type: field.type, dbType: field.dbType, adapter: field.adapter })
      : literal(value);
  }

  compare(name: string, operator: WhereOperator, value: unknown): Expression {
    const target = this.column(name);
    const missing = value === null || value === undefined;

    switch (operator) {
      case "=":
        return missing ? isNull(target) : eq(target, this.value(name, value));
      case "!=":
      case "<>":
        return missing ? ne(target, null) : ne(target, this.value(name, value));
      case "IN":
      case "NOT IN": {
        const values = Array.isArray(value) ? value : [value];
        const items = values.map((item: unknown) => this.value(name, item));
        return operator === "IN" ? inList(target, items) : notIn(target, items);
      }
      default:
        return binary(operator, target, this.value(name, value));
    }
  }

  /**
   * AND of one condition per filter key
   */
  filter(filter: Filter): Expression[] {
    return Object.entries(filter).map(([name, value]) =>
      Array.isArray(value) ? this.compare(name, "IN", value) : this.compare(name, "=", value)
    );
  }

  /**
   * Conditions for one `where(...)` call; the caller ANDs them
   */
  conditions(args: WhereArgs): Expression[] {
    switch (args.length) {
      case 1: {
        const [first] = args;
        return isExpression(first) ? [first] : this.filter(first);
      }
      case 2:
        return [this.compare(args[0], "=", args[1])];
      case 3:
        return [this.compare(args[0], args[1], args[2])];
    }
  }
}
