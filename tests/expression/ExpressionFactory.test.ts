/**
 * sqlweave Expression Unit Tests
 */

import { isExpression, outputName } from "../../src/expression/Expression";
import {
  alias,
  and_,
  between,
  column,
  desc,
  eq,
  func,
  gt,
  inList,
  literal,
  ne,
  or_,
  over,
  raw,
  star,
  toExpression,
} from "../../src/expression/ExpressionFactory";

describe("column()", () => {
  it("should split a qualified name", () => {
    const node = column("posts.title");
    expect(node.kind).toBe("column");
    expect(node.table).toBe("posts");
    expect(node.name).toBe("title");
  });

  it("should split on the last dot only", () => {
    const node = column("main.posts.title");
    expect(node.table).toBe("main.posts");
    expect(node.name).toBe("title");
  });

  it("should keep an explicit table", () => {
    const node = column("id", "t");
    expect(node.table).toBe("t");
    expect(node.name).toBe("id");
  });
});

describe("literals", () => {
  it("should infer the host type of a value", () => {
    expect(literal("a").inferredType).toBe("string");
    expect(literal(1).inferredType).toBe("number");
    expect(literal(true).inferredType).toBe("boolean");
    expect(literal(10n).inferredType).toBe("bigint");
    expect(literal(new Date(0)).inferredType).toBe("date");
    expect(literal({ a: 1 }).inferredType).toBe("json");
    expect(literal(null).inferredType).toBe("null");
  });

  it("should prefer an explicit type hint", () => {
    const node = literal("0b0e7c1e-0000-4000-8000-000000000000", { type: "uuid", dbType: "blob" });
    expect(node.inferredType).toBe("uuid");
    expect(node.dbType).toBe("blob");
  });

  it("should wrap plain values and pass expressions through", () => {
    const col = column("id");
    expect(toExpression(col)).toBe(col);
    expect(toExpression(5)).toMatchObject({ kind: "literal", value: 5 });
  });
});

describe("nodes", () => {
  it("should be frozen and recognizable", () => {
    const node = gt(column("age"), 18);
    expect(Object.isFrozen(node)).toBe(true);
    expect(isExpression(node)).toBe(true);
    expect(isExpression({ kind: "column", name: "id" })).toBe(false);
  });

  it("should turn comparisons with null into IS [NOT] NULL", () => {
    expect(eq(column("deleted_at"), null)).toMatchObject({ kind: "unary", op: "IS NULL" });
    expect(ne(column("deleted_at"), undefined)).toMatchObject({ kind: "unary", op: "IS NOT NULL" });
  });

  it("should fold conjunctions to the left", () => {
    const a = eq(column("a"), 1);
    const b = eq(column("b"), 2);
    const c = eq(column("c"), 3);
    const node = and_(a, b, c);

    expect(node).toMatchObject({ kind: "binary", op: "AND", right: c });
    expect(node.kind === "binary" && node.left).toMatchObject({ op: "AND", left: a, right: b });
  });

  it("should return a single operand unchanged", () => {
    const a = eq(column("a"), 1);
    expect(or_(a)).toBe(a);
  });

  it("should express BETWEEN as two comparisons", () => {
    expect(between(column("age"), 18, 65)).toMatchObject({
      op: "AND",
      left: { op: ">=" },
      right: { op: "<=" },
    });
  });

  it("should keep an empty IN list", () => {
    const node = inList(column("id"), []);
    expect(node.values).toEqual([]);
    expect(node.negated).toBe(false);
  });

  it("should copy raw parameters", () => {
    const params = [1, 2];
    const node = raw("? + ?", params);
    params.push(3);
    expect(node.params).toEqual([1, 2]);
  });
});

describe("functions and windows", () => {
  it("should count rows with a star by default", () => {
    expect(func.count().args).toEqual([star()]);
    expect(func.countDistinct(column("email")).distinct).toBe(true);
  });

  it("should attach a window to a call", () => {
    const ranked = over(func.rowNumber(), { orderBy: [desc(column("score"))] });
    expect(ranked.over?.orderBy).toEqual([{ expression: column("score"), direction: "DESC" }]);
    expect(ranked.over?.partitionBy).toEqual([]);
  });
});

describe("outputName()", () => {
  it("should name aliases and columns", () => {
    expect(outputName(alias(func.count(), "total"))).toBe("total");
    expect(outputName(column("users.email"))).toBe("email");
    expect(outputName(func.count())).toBeUndefined();
  });
});
