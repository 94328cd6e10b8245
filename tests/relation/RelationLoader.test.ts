/**
 * sqlweave RelationLoader Unit Tests
 *
 * Batched eager loading against in-memory SQLite. A counting executor
 * records every statement so the number of round trips can be asserted.
 */

import { Database } from "../../src/db/Database";
import { QueryResultSet, SyncQueryExecutor } from "../../src/db/QueryExecutor";
import { SqliteAdapter } from "../../src/db/SqliteAdapter";
import type { SqliteDialect } from "../../src/dialect";
import {
  CrossBackendRelation,
  EagerLoadCancelledError,
  UnknownRelationError,
} from "../../src/errors/OrmErrors";
import {
  relationState,
  resetRelationClock,
  setRelationClock,
} from "../../src/relation/RelationCache";
import { belongsTo, hasMany, hasOne, polymorphic } from "../../src/relation/RelationDescriptor";
import { loadRelations, planEagerLoad } from "../../src/relation/RelationLoader";

interface User {
  id: number;
  name: string;
  posts?: Post[];
  publishedPosts?: Post[];
  profile?: Profile | null;
  notes?: Note[];
}

interface Post {
  id: number;
  userId: number;
  title: string;
  published: boolean;
  author?: User | null;
  comments?: Comment[];
}

interface Comment {
  id: number;
  postId: number;
  body: string;
}

interface Profile {
  id: number;
  userId: number;
  bio: string;
}

interface Note {
  id: number;
  notableType: string;
  notableId: number;
  body: string;
}

const SCHEMA = `
  CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL);
  CREATE TABLE posts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    title TEXT NOT NULL,
    published INTEGER NOT NULL
  );
  CREATE TABLE comments (id INTEGER PRIMARY KEY AUTOINCREMENT, post_id INTEGER NOT NULL, body TEXT NOT NULL);
  CREATE TABLE profiles (id INTEGER PRIMARY KEY AUTOINCREMENT, user_id INTEGER NOT NULL, bio TEXT NOT NULL);
  CREATE TABLE notes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    notable_type TEXT NOT NULL,
    notable_id INTEGER NOT NULL,
    body TEXT NOT NULL
  );
`;

/**
 * Forwards to a SQLite adapter and records each statement
 */
class CountingExecutor implements SyncQueryExecutor {
  readonly statements: string[] = [];
  onQuery: (() => void) | undefined;

  constructor(private readonly inner: SqliteAdapter) {}

  get dialect(): SqliteDialect {
    return this.inner.dialect;
  }

  async query(sql: string, params: readonly unknown[] = []): Promise<QueryResultSet> {
    return this.querySync(sql, params);
  }

  querySync(sql: string, params: readonly unknown[] = []): QueryResultSet {
    this.statements.push(sql);
    const result = this.inner.querySync(sql, params);
    this.onQuery?.();
    return result;
  }
}

interface Fixture {
  db: Database;
  adapter: SqliteAdapter;
  executor: CountingExecutor;
}

function createFixture(options: { relationCacheTtlMs?: number } = {}): Fixture {
  const adapter = new SqliteAdapter({ filename: ":memory:" });
  adapter.exec(SCHEMA);
  const executor = new CountingExecutor(adapter);
  const db = new Database({ connections: { default: executor }, ...options });

  db.define<User, "id">({
    name: "User",
    table: "users",
    relations: {
      posts: hasMany("Post", "userId", { inverseOf: "author" }),
      profile: hasOne("Profile", "userId"),
      notes: polymorphic("Note", "notableId", { typeColumn: "notable_type" }),
    },
  });
  db.define<Post, "id">({
    name: "Post",
    table: "posts",
    fields: { published: { type: "boolean" } },
    relations: {
      author: belongsTo("User", "userId"),
      comments: hasMany("Comment", "postId"),
      notes: polymorphic("Note", "notableId", { typeColumn: "notable_type" }),
    },
  });
  db.define<Comment, "id">({ name: "Comment", table: "comments" });
  db.define<Profile, "id">({ name: "Profile", table: "profiles" });
  db.define<Note, "id">({ name: "Note", table: "notes" });

  return { db, adapter, executor };
}

/**
 * `users` users; the first `withPosts` get a published and a draft post,
 * each post gets one comment
 */
function seed(adapter: SqliteAdapter, users: number, withPosts: number): void {
  adapter.transaction(() => {
    for (let id = 1; id <= users; id++) {
      adapter.querySync("INSERT INTO users (id, name) VALUES (?, ?)", [id, `user${id}`]);
    }
    for (let id = 1; id <= withPosts; id++) {
      for (const [title, published] of [
        [`published by ${id}`, 1],
        [`draft by ${id}`, 0],
      ] as const) {
        const { rows } = adapter.querySync(
          "INSERT INTO posts (user_id, title, published) VALUES (?, ?, ?) RETURNING id",
          [id, title, published]
        );
        adapter.querySync("INSERT INTO comments (post_id, body) VALUES (?, ?)", [
          rows[0].id,
          `on ${title}`,
        ]);
      }
    }
  });
}

describe("RelationLoader", () => {
  let fixture: Fixture;

  afterEach(() => {
    fixture.adapter.close();
    resetRelationClock();
    jest.restoreAllMocks();
  });

  describe("batching", () => {
    it.each([1, 10, 1000])("should load %i users with two relation levels in 1 + 3 queries", async (count) => {
      fixture = createFixture();
      seed(fixture.adapter, count, count);

      const users = await fixture.db.query<User>("User").with("posts.comments", "profile").all();

      expect(users).toHaveLength(count);
      expect(fixture.executor.statements).toHaveLength(4);
      expect(users.every((user) => user.posts?.length === 2)).toBe(true);
    });

    it("should issue one IN query per relation path", async () => {
      fixture = createFixture();
      seed(fixture.adapter, 1, 1);

      await fixture.db.query<User>("User").with("posts.comments", "profile").all();

      expect(fixture.executor.statements).toEqual([
        "SELECT * FROM users",
        "SELECT * FROM posts WHERE posts.user_id IN (?)",
        "SELECT * FROM profiles WHERE profiles.user_id IN (?)",
        "SELECT * FROM comments WHERE comments.post_id IN (?, ?)",
      ]);
    });

    it("should give parents without children an empty list or null", async () => {
      fixture = createFixture();
      seed(fixture.adapter, 50, 25);

      const users = await fixture.db.query<User>("User").orderBy("id").with("posts.comments", "profile").all();

      expect(fixture.executor.statements).toHaveLength(4);
      expect(users[0].posts?.map((post) => post.title).sort()).toEqual([
        "draft by 1",
        "published by 1",
      ]);
      expect(users[0].posts?.every((post) => post.comments?.length === 1)).toBe(true);
      expect(users[25].posts).toEqual([]);
      expect(users[49].posts).toEqual([]);
      expect(users[0].profile).toBeNull();
    });

    it("should not query when there are no keys", async () => {
      fixture = createFixture();

      const users = await fixture.db.query<User>("User").with("posts.comments").all();

      expect(users).toEqual([]);
      expect(fixture.executor.statements).toEqual(["SELECT * FROM users"]);
    });

    it("should load through the blocking path", () => {
      fixture = createFixture();
      seed(fixture.adapter, 3, 2);

      const users = fixture.db.query<User>("User").orderBy("id").with("posts").allSync();

      expect(fixture.executor.statements).toHaveLength(2);
      expect(users.map((user) => user.posts?.length)).toEqual([2, 2, 0]);
    });
  });

  describe("relation kinds", () => {
    beforeEach(() => {
      fixture = createFixture();
      seed(fixture.adapter, 2, 2);
    });

    it("should attach belongsTo targets and null for a missing owner", async () => {
      fixture.adapter.querySync(
        "INSERT INTO posts (user_id, title, published) VALUES (99, 'orphan', 1)"
      );

      const posts = await fixture.db.query<Post>("Post").orderBy("id").with("author").all();

      expect(fixture.executor.statements[1]).toBe("SELECT * FROM users WHERE users.id IN (?, ?, ?)");
      expect(posts.map((post) => post.author?.name ?? null)).toEqual([
        "user1",
        "user1",
        "user2",
        "user2",
        null,
      ]);
    });

    it("should attach hasOne targets", async () => {
      fixture.adapter.querySync("INSERT INTO profiles (user_id, bio) VALUES (2, 'hello')");

      const users = await fixture.db.query<User>("User").orderBy("id").with("profile").all();

      expect(users[0].profile).toBeNull();
      expect(users[1].profile).toEqual({ id: 1, userId: 2, bio: "hello" });
    });

    it("should filter polymorphic targets by owner type", async () => {
      fixture.adapter.exec(`
        INSERT INTO notes (notable_type, notable_id, body) VALUES ('User', 1, 'about user 1');
        INSERT INTO notes (notable_type, notable_id, body) VALUES ('Post', 1, 'about post 1');
      `);

      const users = await fixture.db.query<User>("User").where("id", 1).with("notes").all();

      expect(fixture.executor.statements[1]).toBe(
        "SELECT * FROM notes WHERE notes.notable_id IN (?) AND notable_type = ?"
      );
      expect(users[0].notes?.map((note) => note.body)).toEqual(["about user 1"]);
    });

    it("should point children back at their parent without exposing the slot", async () => {
      const [user] = await fixture.db.query<User>("User").where("id", 1).with("posts").all();
      const post = user.posts?.[0];

      expect(post?.author).toBe(user);
      expect(Object.keys(post ?? {})).toEqual(["id", "userId", "title", "published"]);
    });
  });

  describe("modifiers", () => {
    beforeEach(() => {
      fixture = createFixture();
      seed(fixture.adapter, 1, 1);
    });

    it("should apply a modifier to its own batch only", async () => {
      const [user] = await fixture.db
        .query<User>("User")
        .with("posts", {
          path: "posts",
          as: "publishedPosts",
          modify: (query) => query.where("published", true),
        })
        .all();

      expect(fixture.executor.statements).toEqual([
        "SELECT * FROM users",
        "SELECT * FROM posts WHERE posts.user_id IN (?)",
        "SELECT * FROM posts WHERE published = ? AND posts.user_id IN (?)",
      ]);
      expect(user.posts).toHaveLength(2);
      expect(user.publishedPosts?.map((post) => post.title)).toEqual(["published by 1"]);
    });

    it("should give a modifier to a prefix already requested through a nested path", async () => {
      const [user] = await fixture.db
        .query<User>("User")
        .with("posts.comments", ["posts", (query) => query.where("published", true)])
        .all();

      expect(fixture.executor.statements).toEqual([
        "SELECT * FROM users",
        "SELECT * FROM posts WHERE published = ? AND posts.user_id IN (?)",
        "SELECT * FROM comments WHERE comments.post_id IN (?)",
      ]);
      expect(user.posts?.map((post) => post.title)).toEqual(["published by 1"]);
      expect(user.posts?.[0].comments?.map((comment) => comment.body)).toEqual([
        "on published by 1",
      ]);
    });

    it("should not leak a modifier into later queries", async () => {
      await fixture.db
        .query<User>("User")
        .with(["posts", (query) => query.where("published", false)])
        .all();
      const [user] = await fixture.db.query<User>("User").with("posts").all();

      expect(user.posts).toHaveLength(2);
    });
  });

  describe("errors", () => {
    beforeEach(() => {
      fixture = createFixture();
      seed(fixture.adapter, 1, 1);
    });

    it("should reject unknown relations before any query", async () => {
      await expect(fixture.db.query<User>("User").with("followers").all()).rejects.toThrow(
        UnknownRelationError
      );
      await expect(fixture.db.query<User>("User").with("posts.likes").all()).rejects.toThrow(
        'Unknown relation "likes" on Post'
      );
      expect(fixture.executor.statements).toEqual([]);
    });

    it("should reject a relation whose target is not defined", () => {
      fixture.db.define({
        name: "Team",
        table: "teams",
        relations: { members: hasMany("Member", "teamId") },
      });

      expect(() => planEagerLoad(fixture.db, fixture.db.model("Team"), ["members"])).toThrow(
        'Unknown relation "members" on Team (target model "Member" is not defined)'
      );
    });
  });

  describe("cancellation", () => {
    beforeEach(() => {
      fixture = createFixture();
      seed(fixture.adapter, 2, 2);
    });

    it("should stop between batches and keep completed relations", async () => {
      const users = await fixture.db.query<User>("User").all();
      const plan = planEagerLoad(fixture.db, fixture.db.model("User"), ["posts.comments"]);
      const controller = new AbortController();
      fixture.executor.onQuery = () => controller.abort();

      const error = await loadRelations(fixture.db, plan, users, { signal: controller.signal }).catch(
        (reason: unknown) => reason
      );

      expect(error).toBeInstanceOf(EagerLoadCancelledError);
      if (!(error instanceof EagerLoadCancelledError)) return;
      expect(error.completed).toEqual(["posts"]);
      expect(error.pending).toEqual(["posts.comments"]);
      expect(fixture.executor.statements).toHaveLength(2);

      const posts = users[0].posts ?? [];
      expect(posts).toHaveLength(2);
      expect(posts.map((post) => relationState(post, "comments"))).toEqual([
        "not_loaded",
        "not_loaded",
      ]);
    });

    it("should not start when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        fixture.db.query<User>("User").with("posts").all({ signal: controller.signal })
      ).rejects.toThrow("Eager loading cancelled with 1 relation path(s) pending");
      expect(fixture.executor.statements).toEqual(["SELECT * FROM users"]);
    });
  });

  describe("cross-backend relations", () => {
    it("should warn when a relation loads from another connection", async () => {
      jest.spyOn(console, "warn").mockImplementation(() => undefined);
      const warnings: CrossBackendRelation[] = [];
      const archive = new SqliteAdapter({ filename: ":memory:" });
      archive.exec("CREATE TABLE comments (id INTEGER PRIMARY KEY, post_id INTEGER, body TEXT)");
      archive.querySync("INSERT INTO comments (id, post_id, body) VALUES (1, 1, 'archived')");

      const adapter = new SqliteAdapter({ filename: ":memory:" });
      adapter.exec(SCHEMA);
      const executor = new CountingExecutor(adapter);
      const db = new Database({
        connections: { default: executor, archive },
        onWarning: (warning) => warnings.push(warning),
      });
      fixture = { adapter, executor, db };
      db.define<Post, "id">({
        name: "Post",
        table: "posts",
        relations: { comments: hasMany("Comment", "postId") },
      });
      db.define<Comment, "id">({ name: "Comment", table: "comments", connection: "archive" });
      adapter.querySync("INSERT INTO posts (user_id, title, published) VALUES (1, 'kept', 1)");

      const [post] = await db.query<Post>("Post").with("comments").all();

      expect(post.comments?.map((comment) => comment.body)).toEqual(["archived"]);
      expect(warnings).toHaveLength(1);
      expect(warnings[0].path).toBe("comments");
      expect(warnings[0].message).toBe(
        'Relation "comments" loads from connection "archive" while its parent uses "default"; the queries are not atomic'
      );
      archive.close();
    });
  });

  describe("relation cache", () => {
    it("should expire loaded relations after the configured lifetime", async () => {
      let now = 1_000;
      setRelationClock(() => now);
      fixture = createFixture({ relationCacheTtlMs: 500 });
      seed(fixture.adapter, 1, 1);

      const [user] = await fixture.db.query<User>("User").with("posts").all();
      expect(relationState(user, "posts")).toBe("loaded");

      now = 1_499;
      expect(user.posts).toHaveLength(2);

      now = 1_500;
      expect(relationState(user, "posts")).toBe("not_loaded");
      expect(user.posts).toBeUndefined();
    });

    it("should keep relations without a lifetime until cleared", async () => {
      let now = 0;
      setRelationClock(() => now);
      fixture = createFixture();
      seed(fixture.adapter, 1, 1);

      const [user] = await fixture.db.query<User>("User").with("posts").all();
      now = Number.MAX_SAFE_INTEGER;

      expect(relationState(user, "posts")).toBe("loaded");
    });
  });
});
