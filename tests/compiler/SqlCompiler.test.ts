/**
 * sqlweave SqlCompiler Unit Tests
 *
 * Rendering per dialect: pagination, IN lists, CTEs, set operations,
 * operator precedence, capability gates and parameter order.
 */

import { CapabilityCategory } from "../../src/capabilities/Capabilities";
import { SqlCompiler } from "../../src/compiler/SqlCompiler";
import { Database } from "../../src/db/Database";
import {
  Dialect,
  MariadbDialect,
  MysqlDialect,
  OracleDialect,
  PostgresDialect,
  SqlServerDialect,
  SqliteDialect,
  allDialects,
  createDialect,
} from "../../src/dialect";
import {
  ArityMismatchError,
  InvalidPlanError,
  UnsupportedFeatureError,
} from "../../src/errors/OrmErrors";
import {
  add,
  alias,
  and_,
  column,
  desc,
  eq,
  func,
  gt,
  isNull,
  literal,
  mul,
  not_,
  or_,
  over,
  raw,
  star,
  sub,
} from "../../src/expression/ExpressionFactory";
import { Statement, emptySelectPlan, tableSource } from "../../src/query/QueryPlan";
import { treeTraversal } from "../../src/query/TreeTraversal";

const db = new Database();

function sql(statement: Statement, dialect: Dialect): string {
  return new SqlCompiler(dialect).compile(statement).sql;
}

describe("SqlCompiler", () => {
  describe("pagination", () => {
    const query = db
      .from("users")
      .select("id", "email")
      .where("age", ">", 18)
      .orderBy("createdAt", "DESC")
      .limit(10)
      .offset(20);

    it("should use LIMIT/OFFSET on SQLite, MySQL and PostgreSQL", () => {
      expect(query.toSQL(new SqliteDialect()).sql).toBe(
        "SELECT id, email FROM users WHERE age > ? ORDER BY created_at DESC LIMIT 10 OFFSET 20"
      );
      expect(query.toSQL(new MysqlDialect()).sql).toBe(
        "SELECT id, email FROM users WHERE age > ? ORDER BY created_at DESC LIMIT 10 OFFSET 20"
      );
      expect(query.toSQL(new PostgresDialect()).sql).toBe(
        "SELECT id, email FROM users WHERE age > $1 ORDER BY created_at DESC LIMIT 10 OFFSET 20"
      );
    });

    it("should use OFFSET/FETCH on Oracle 12c+ and SQL Server 2012+", () => {
      expect(query.toSQL(new OracleDialect()).sql).toBe(
        "SELECT id, email FROM users WHERE age > :p1 ORDER BY created_at DESC OFFSET 20 ROWS FETCH NEXT 10 ROWS ONLY"
      );
      expect(query.toSQL(new SqlServerDialect()).sql).toBe(
        "SELECT id, email FROM users WHERE age > @p1 ORDER BY created_at DESC OFFSET 20 ROWS FETCH NEXT 10 ROWS ONLY"
      );
    });

    it("should wrap the query in ROWNUM filters on old Oracle", () => {
      expect(query.toSQL(createDialect("oracle", "11.2")).sql).toBe(
        "SELECT * FROM (SELECT q_.*, ROWNUM rn_ FROM (SELECT id, email FROM users WHERE age > :p1 ORDER BY created_at DESC) q_ WHERE ROWNUM <= 30) WHERE rn_ > 20"
      );
      expect(db.from("users").limit(5).toSQL(createDialect("oracle", "11.2")).sql).toBe(
        "SELECT * FROM (SELECT * FROM users) WHERE ROWNUM <= 5"
      );
    });

    it("should use TOP on old SQL Server and refuse an offset there", () => {
      const legacy = createDialect("sqlserver", "10.50");
      expect(query.offset(0).toSQL(legacy).sql).toBe(
        "SELECT TOP 10 id, email FROM users WHERE age > @p1 ORDER BY created_at DESC"
      );
      expect(() => query.toSQL(legacy)).toThrow(UnsupportedFeatureError);
      expect(() => query.toSQL(legacy)).toThrow(
        "OFFSET is not supported by sqlserver 10.50.0: requires OFFSET/FETCH support"
      );
    });

    it("should render an offset without a limit", () => {
      const skip = db.from("users").offset(5);
      expect(skip.toSQL(new SqliteDialect()).sql).toBe("SELECT * FROM users LIMIT -1 OFFSET 5");
      expect(skip.toSQL(new MysqlDialect()).sql).toBe(
        "SELECT * FROM users LIMIT 18446744073709551615 OFFSET 5"
      );
      expect(skip.toSQL(new PostgresDialect()).sql).toBe("SELECT * FROM users OFFSET 5");
      expect(skip.toSQL(new SqlServerDialect()).sql).toBe(
        "SELECT * FROM users ORDER BY (SELECT NULL) OFFSET 5 ROWS"
      );
    });

    it("should inline pagination instead of binding it", () => {
      expect(query.toSQL(new PostgresDialect()).params).toEqual([18]);
    });

    it("should reject negative or fractional values", () => {
      expect(() => db.from("users").limit(-1).toSQL(new SqliteDialect())).toThrow(
        "LIMIT must be a non-negative integer, got -1"
      );
      expect(() => db.from("users").offset(1.5).toSQL(new SqliteDialect())).toThrow(
        "OFFSET must be a non-negative integer, got 1.5"
      );
    });
  });

  describe("IN lists", () => {
    it.each(allDialects().map((dialect) => [dialect.name, dialect] as const))(
      "should compile an empty IN list to a false predicate on %s",
      (_name, dialect) => {
        const compiled = db.from("users").whereIn("id", []).toSQL(dialect);
        expect(compiled.sql).toBe("SELECT * FROM users WHERE 1 = 0");
        expect(compiled.params).toEqual([]);
      }
    );

    it("should compile an empty NOT IN list to a true predicate", () => {
      expect(db.from("users").whereNotIn("id", []).toSQL(new MysqlDialect()).sql).toBe(
        "SELECT * FROM users WHERE 1 = 1"
      );
    });

    it("should bind one parameter per value", () => {
      const compiled = db.from("users").whereIn("id", [1, 2, 3]).toSQL(new PostgresDialect());
      expect(compiled.sql).toBe("SELECT * FROM users WHERE id IN ($1, $2, $3)");
      expect(compiled.params).toEqual([1, 2, 3]);
    });

    it("should split lists longer than Oracle accepts", () => {
      const ids = Array.from({ length: 1001 }, (_, index) => index + 1);
      const compiled = db.from("users").whereIn("id", ids).toSQL(new OracleDialect());
      const first = ids.slice(0, 1000).map((id) => `:p${id}`).join(", ");

      expect(compiled.sql).toBe(`SELECT * FROM users WHERE (id IN (${first}) OR id IN (:p1001))`);
      expect(compiled.params).toHaveLength(1001);
    });

    it("should render an IN subquery", () => {
      const spenders = db.from("orders").select("userId").where("total", ">", 100);
      expect(db.from("users").whereIn("id", spenders).toSQL(new SqliteDialect()).sql).toBe(
        "SELECT * FROM users WHERE id IN (SELECT user_id FROM orders WHERE total > ?)"
      );
    });
  });

  describe("precedence", () => {
    const postgres = new PostgresDialect();
    const render = (condition: ReturnType<typeof and_>) =>
      db.from("t").where(condition).toSQL(postgres).sql.replace("SELECT * FROM t WHERE ", "");

    it("should parenthesize OR inside AND", () => {
      const compiled = db
        .from("t")
        .where(or_(eq(column("a"), 1), eq(column("b"), 2)))
        .where(eq(column("c"), 3))
        .toSQL(postgres);

      expect(compiled.sql).toBe("SELECT * FROM t WHERE (a = $1 OR b = $2) AND c = $3");
      expect(compiled.params).toEqual([1, 2, 3]);
    });

    it("should not parenthesize a flat conjunction", () => {
      expect(render(and_(eq(column("a"), 1), eq(column("b"), 2), eq(column("c"), 3)))).toBe(
        "a = $1 AND b = $2 AND c = $3"
      );
    });

    it("should keep arithmetic grouping", () => {
      expect(render(eq(sub(column("a"), sub(column("b"), column("c"))), 0))).toBe(
        "a - (b - c) = $1"
      );
      expect(render(eq(add(column("a"), add(column("b"), column("c"))), 0))).toBe(
        "a + b + c = $1"
      );
      expect(render(eq(mul(add(column("a"), column("b")), column("c")), 0))).toBe(
        "(a + b) * c = $1"
      );
    });

    it("should parenthesize the operand of NOT", () => {
      expect(render(not_(and_(eq(column("a"), 1), isNull(column("b")))))).toBe(
        "NOT (a = $1 AND b IS NULL)"
      );
    });

    it("should compose orWhere with what came before", () => {
      const compiled = db
        .from("t")
        .where("a", 1)
        .where("b", 2)
        .orWhere("c", 3)
        .toSQL(postgres);
      expect(compiled.sql).toBe("SELECT * FROM t WHERE (a = $1 AND b = $2) OR c = $3");
    });
  });

  describe("CTEs", () => {
    const spenders = db.from("orders").select("userId").where("total", ">", 100);

    it("should render a WITH clause before the query", () => {
      const compiled = db
        .from("users")
        .withCte("big_spenders", spenders)
        .whereIn("id", db.from("big_spenders").select("userId"))
        .toSQL(new PostgresDialect());

      expect(compiled.sql).toBe(
        "WITH big_spenders AS (SELECT user_id FROM orders WHERE total > $1) SELECT * FROM users WHERE id IN (SELECT user_id FROM big_spenders)"
      );
      expect(compiled.params).toEqual([100]);
    });

    it("should render column lists and materialization hints", () => {
      const compiled = db
        .from("s")
        .withCte("s", spenders, { columns: ["uid"], materialized: false })
        .toSQL(new PostgresDialect());
      expect(compiled.sql).toBe(
        "WITH s (uid) AS NOT MATERIALIZED (SELECT user_id FROM orders WHERE total > $1) SELECT * FROM s"
      );
    });

    it("should refuse CTEs where the backend has none", () => {
      const query = db.from("s").withCte("s", spenders);
      expect(() => query.toSQL(createDialect("mysql", "5.7.40"))).toThrow(
        "CTE.Basic is not supported by mysql 5.7.40"
      );
      expect(() =>
        db.from("s").withCte("s", spenders, { materialized: true }).toSQL(new MysqlDialect())
      ).toThrow("CTE.Materialized is not supported by mysql 8.0.35");
    });

    it("should report the dialect, category and feature of a refused CTE", () => {
      let caught: unknown;
      try {
        db.from("s").withCte("s", spenders).toSQL(createDialect("mysql", "5.7.40"));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnsupportedFeatureError);
      expect(caught).toMatchObject({
        dialect: "mysql 5.7.40",
        category: CapabilityCategory.Cte,
        feature: "CTE.Basic",
        code: "UNSUPPORTED_FEATURE",
      });
    });

    it("should reject duplicate names and non-UNION recursive bodies", () => {
      expect(() =>
        db.from("s").withCte("s", spenders).withCte("s", spenders).toSQL(new SqliteDialect())
      ).toThrow('Duplicate CTE name "s"');
      expect(() =>
        db.from("s").withCte("s", spenders, { recursive: true }).toSQL(new SqliteDialect())
      ).toThrow(
        'Recursive CTE "s" must combine its anchor and recursive member with UNION or UNION ALL'
      );
    });

    it("should render a recursive tree traversal", () => {
      const tree = treeTraversal(db, { table: "categories", start: 1, maxDepth: 10 });

      expect(tree.toSQL(new SqliteDialect()).sql).toBe(
        "WITH RECURSIVE tree AS (SELECT id, parent_id, 0 AS depth FROM categories WHERE id IN (?) UNION ALL SELECT t.id, t.parent_id, tree.depth + 1 AS depth FROM categories AS t INNER JOIN tree ON t.parent_id = tree.id WHERE tree.depth < 10) SELECT DISTINCT id FROM tree"
      );
      expect(tree.toSQL(new PostgresDialect()).sql).toBe(
        "WITH RECURSIVE tree AS ((SELECT id, parent_id, 0 AS depth FROM categories WHERE id IN ($1)) UNION ALL (SELECT t.id, t.parent_id, tree.depth + 1 AS depth FROM categories AS t INNER JOIN tree ON t.parent_id = tree.id WHERE tree.depth < 10)) SELECT DISTINCT id FROM tree"
      );
    });

    it("should name recursive CTE columns and drop RECURSIVE on Oracle", () => {
      const tree = treeTraversal(db, {
        table: "categories",
        start: [1, 2],
        direction: "ancestors",
        maxDepth: 5,
      });
      expect(tree.toSQL(new OracleDialect()).sql).toBe(
        "WITH tree (id, parent_id, depth) AS ((SELECT id, parent_id, 0 AS depth FROM categories WHERE id IN (:p1, :p2)) UNION ALL (SELECT t.id, t.parent_id, tree.depth + 1 AS depth FROM categories t INNER JOIN tree ON t.id = tree.parent_id WHERE tree.depth < 5)) SELECT DISTINCT id FROM tree"
      );
    });

    it("should reject a negative depth bound", () => {
      expect(() => treeTraversal(db, { table: "categories", start: 1, maxDepth: -1 })).toThrow(
        "maxDepth must be a non-negative integer, got -1"
      );
    });
  });

  describe("set operations", () => {
    const left = db.from("a").select("id");
    const right = db.from("b").select("id");

    it("should parenthesize operands where the backend allows it", () => {
      expect(left.union(right).toSQL(new SqliteDialect()).sql).toBe(
        "SELECT id FROM a UNION SELECT id FROM b"
      );
      expect(left.union(right).toSQL(new PostgresDialect()).sql).toBe(
        "(SELECT id FROM a) UNION (SELECT id FROM b)"
      );
    });

    it("should spell EXCEPT as MINUS on Oracle", () => {
      expect(left.except(right).toSQL(new OracleDialect()).sql).toBe(
        "(SELECT id FROM a) MINUS (SELECT id FROM b)"
      );
    });

    it("should order and paginate the combined result", () => {
      expect(left.union(right, true).orderBy("id").limit(5).toSQL(new SqliteDialect()).sql).toBe(
        "SELECT id FROM a UNION ALL SELECT id FROM b ORDER BY id ASC LIMIT 5"
      );
      expect(left.union(right).limit(3).toSQL(createDialect("sqlserver", "10.0")).sql).toBe(
        "SELECT TOP 3 * FROM ((SELECT id FROM a) UNION (SELECT id FROM b)) AS q_"
      );
    });

    it("should wrap ordered and nested operands on SQLite", () => {
      const third = db.from("c").select("id");
      expect(left.union(right.union(third)).toSQL(new SqliteDialect()).sql).toBe(
        "SELECT id FROM a UNION SELECT * FROM (SELECT id FROM b UNION SELECT id FROM c)"
      );
      expect(left.orderBy("id").limit(2).union(right).toSQL(new SqliteDialect()).sql).toBe(
        "SELECT * FROM (SELECT id FROM a ORDER BY id ASC LIMIT 2) UNION SELECT id FROM b"
      );
    });

    it("should reject operands of different arity before any SQL is built", () => {
      expect(() => db.from("a").select("id", "name").union(right)).toThrow(ArityMismatchError);
      expect(() => db.from("a").select("id", "name").union(right)).toThrow(
        "Set operation operands must select the same number of columns (left: 2, right: 1)"
      );
    });

    it("should accept wildcards only over the same table", () => {
      expect(db.from("a").union(db.from("a").where("id", 1)).toSQL(new SqliteDialect()).sql).toBe(
        "SELECT * FROM a UNION SELECT * FROM a WHERE id = ?"
      );
      expect(() => db.from("a").union(db.from("b"))).toThrow(
        "Set operation operands must select the same number of columns (left: wildcard, right: wildcard)"
      );
    });

    it("should refuse operations the backend lacks", () => {
      expect(() => left.intersect(right).toSQL(createDialect("mysql", "8.0.30"))).toThrow(
        "SET_OPERATIONS.Intersect is not supported by mysql 8.0.30"
      );
      expect(() => left.intersect(right, true).toSQL(new SqliteDialect())).toThrow(
        "SET_OPERATIONS.IntersectAll is not supported by sqlite 3.35.0"
      );
    });
  });

  describe("joins", () => {
    it("should render aliases with the dialect's keyword", () => {
      const query = db
        .from(tableSource("users", "u"))
        .select(column("name", "u"), column("title", "p"))
        .leftJoin("posts", eq(column("id", "u"), column("user_id", "p")), "p");

      expect(query.toSQL(new SqliteDialect()).sql).toBe(
        "SELECT u.name, p.title FROM users AS u LEFT JOIN posts AS p ON u.id = p.user_id"
      );
      expect(query.toSQL(new OracleDialect()).sql).toBe(
        "SELECT u.name, p.title FROM users u LEFT JOIN posts p ON u.id = p.user_id"
      );
    });

    it("should refuse join types the backend lacks", () => {
      const on = eq(column("users.id"), column("posts.user_id"));
      expect(() => db.from("users").rightJoin("posts", on).toSQL(new SqliteDialect())).toThrow(
        "JOIN_OPERATIONS.Right is not supported by sqlite 3.35.0"
      );
      expect(() => db.from("users").fullJoin("posts", on).toSQL(new MysqlDialect())).toThrow(
        "JOIN_OPERATIONS.Full is not supported by mysql 8.0.35"
      );
    });

    it("should reject a repeated source without an alias", () => {
      expect(() =>
        db.from("users").join("users", eq(column("id"), column("id"))).toSQL(new SqliteDialect())
      ).toThrow('"users" appears more than once in FROM/JOIN; give the join target an alias');
    });

    it("should require an alias for a joined subquery", () => {
      expect(() => db.from("users").join(db.from("posts"), eq(column("id"), 1))).toThrow(
        "A joined subquery needs an alias"
      );
    });
  });

  describe("functions", () => {
    it("should map functions per dialect", () => {
      const query = db.from("users").select(func.ifnull(column("nick"), "anon"));
      expect(query.toSQL(new SqlServerDialect()).sql).toBe("SELECT ISNULL(nick, @p1) FROM users");
      expect(query.toSQL(new OracleDialect()).sql).toBe("SELECT NVL(nick, :p1) FROM users");
    });

    it("should render window functions", () => {
      const ranked = over(func.rowNumber(), {
        partitionBy: [column("team")],
        orderBy: [desc(column("score"))],
      });
      expect(db.from("players").select("id", alias(ranked, "pos")).toSQL(new MariadbDialect()).sql).toBe(
        "SELECT id, ROW_NUMBER() OVER (PARTITION BY team ORDER BY score DESC) AS pos FROM players"
      );
    });

    it("should refuse window functions on old backends", () => {
      const ranked = over(func.rowNumber(), { orderBy: [desc(column("score"))] });
      expect(() =>
        db.from("players").select(ranked).toSQL(createDialect("mysql", "5.7.40"))
      ).toThrow("WINDOW_FUNCTIONS.RowNumber is not supported by mysql 5.7.40");
    });

    it("should require OVER for ranking functions", () => {
      expect(() => db.from("players").select(func.rank()).toSQL(new PostgresDialect())).toThrow(
        "RANK requires an OVER clause"
      );
    });

    it("should gate JSON functions", () => {
      const query = db.from("docs").select(func.jsonExtract(column("payload"), "$.a"));
      expect(() => query.toSQL(createDialect("sqlserver", "12.0"))).toThrow(
        "JSON_OPERATIONS.Extract is not supported by sqlserver 12.0.0"
      );
      expect(query.toSQL(new SqlServerDialect()).sql).toBe(
        "SELECT JSON_VALUE(payload, @p1) FROM docs"
      );
    });
  });

  describe("parameters", () => {
    it("should bind in text order across CTEs, select list and WHERE", () => {
      const compiled = db
        .from("users")
        .withCte("c", db.from("x").where("a", 1))
        .select(alias(add(column("score"), 5), "boosted"))
        .where("b", 2)
        .toSQL(new PostgresDialect());

      expect(compiled.sql).toBe(
        "WITH c AS (SELECT * FROM x WHERE a = $1) SELECT score + $2 AS boosted FROM users WHERE b = $3"
      );
      expect(compiled.params).toEqual([1, 5, 2]);
    });

    it("should give repeated values their own placeholders", () => {
      const compiled = db.from("t").where("a", 7).where("b", 7).toSQL(new PostgresDialect());
      expect(compiled.sql).toBe("SELECT * FROM t WHERE a = $1 AND b = $2");
      expect(compiled.params).toEqual([7, 7]);
    });

    it("should splice raw SQL parameters into the sequence", () => {
      const compiled = db
        .from("users")
        .where(raw("score > ? AND score < ?", [1, 9]))
        .toSQL(new OracleDialect());
      expect(compiled.sql).toBe("SELECT * FROM users WHERE score > :p1 AND score < :p2");
      expect(compiled.params).toEqual([1, 9]);
    });

    it("should leave question marks inside quoted literals alone", () => {
      const compiled = db
        .from("notes")
        .where(raw("body = 'why?' AND title <> 'it''s ?' AND id = ?", [3]))
        .toSQL(new PostgresDialect());
      expect(compiled.sql).toBe(
        "SELECT * FROM notes WHERE body = 'why?' AND title <> 'it''s ?' AND id = $1"
      );
      expect(compiled.params).toEqual([3]);
      expect(() => db.from("notes").where(raw("body = 'why?'")).toSQL(new SqliteDialect())).not.toThrow();
    });

    it("should reject raw SQL with a wrong parameter count", () => {
      expect(() => db.from("users").where(raw("a = ?")).toSQL(new SqliteDialect())).toThrow(
        "Raw SQL has 1 placeholder(s) but 0 parameter(s)"
      );
    });

    it("should keep type hints on bindings", () => {
      const compiled = db
        .from("users")
        .where(eq(column("active"), literal(true, { dbType: "text" })))
        .toSQL(new SqliteDialect());
      expect(compiled.bindings).toEqual([{ value: true, hostType: "boolean", dbType: "text", adapter: undefined }]);
    });

    it("should compile the same plan to the same output", () => {
      const query = db.from("users").where("id", 3);
      expect(query.toSQL(new MysqlDialect())).toEqual(query.toSQL(new MysqlDialect()));
    });
  });

  describe("data modification", () => {
    const insert: Statement = {
      kind: "insert",
      table: "users",
      columns: ["email", "name"],
      rows: [
        [literal("a@example.com"), literal("A")],
        [literal("b@example.com"), literal("B")],
      ],
      returning: [star()],
    };

    it("should render a multi-row insert with RETURNING", () => {
      const compiled = new SqlCompiler(new PostgresDialect()).compile(insert);
      expect(compiled.sql).toBe(
        "INSERT INTO users (email, name) VALUES ($1, $2), ($3, $4) RETURNING *"
      );
      expect(compiled.params).toEqual(["a@example.com", "A", "b@example.com", "B"]);
    });

    it("should refuse RETURNING and multi-row inserts where unsupported", () => {
      expect(() => sql(insert, new MysqlDialect())).toThrow(
        "RETURNING_CLAUSE.Basic is not supported by mysql 8.0.35"
      );
      expect(() => sql(insert, new OracleDialect())).toThrow(
        "BULK_OPERATIONS.MultiRowInsert is not supported by oracle 19.0.0"
      );
    });

    it("should render updates and deletes", () => {
      expect(
        sql(
          {
            kind: "update",
            table: "users",
            assignments: [{ column: "name", value: literal("C") }],
            where: eq(column("id"), 1),
            returning: [],
          },
          new SqliteDialect()
        )
      ).toBe("UPDATE users SET name = ? WHERE id = ?");
      expect(
        sql(
          { kind: "delete", table: "users", where: gt(column("age"), 90), returning: [] },
          new SqlServerDialect()
        )
      ).toBe("DELETE FROM users WHERE age > @p1");
    });

    it("should reject updates and deletes without WHERE", () => {
      expect(() =>
        sql(
          {
            kind: "update",
            table: "users",
            assignments: [{ column: "name", value: literal("C") }],
            returning: [],
          },
          new SqliteDialect()
        )
      ).toThrow("UPDATE requires at least one WHERE condition for safety");
      expect(() =>
        sql({ kind: "delete", table: "users", returning: [] }, new SqliteDialect())
      ).toThrow("DELETE requires at least one WHERE condition for safety");
    });
  });

  describe("structure", () => {
    it("should reject HAVING without GROUP BY", () => {
      expect(() =>
        db.from("orders").having(gt(func.count(), 1)).toSQL(new SqliteDialect())
      ).toThrow(InvalidPlanError);
    });

    it("should render GROUP BY and HAVING", () => {
      expect(
        db
          .from("orders")
          .select("userId", alias(func.count(), "count"))
          .groupBy("userId")
          .having(gt(func.count(), 1))
          .toSQL(new SqliteDialect()).sql
      ).toBe("SELECT user_id, COUNT(*) AS count FROM orders GROUP BY user_id HAVING COUNT(*) > ?");
    });

    it("should select from DUAL on Oracle when there is no table", () => {
      const plan = { ...emptySelectPlan(), select: [alias(raw("1"), "one")] };
      expect(sql(plan, new OracleDialect())).toBe("SELECT 1 AS one FROM DUAL");
      expect(sql(plan, new PostgresDialect())).toBe("SELECT 1 AS one");
    });
  });

  describe("explain()", () => {
    it("should prefix the compiled statement", () => {
      const plan = db.from("users").where("id", 1).toPlan();
      expect(new SqlCompiler(new PostgresDialect()).explain(plan, { analyze: true }).sql).toBe(
        "EXPLAIN (ANALYZE) SELECT * FROM users WHERE id = $1"
      );
      expect(new SqlCompiler(new SqliteDialect()).explain(plan).sql).toBe(
        "EXPLAIN QUERY PLAN SELECT * FROM users WHERE id = ?"
      );
    });
  });
});
