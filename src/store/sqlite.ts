import fs from "fs";
import path from "path";
import sqlite3 from "sqlite3";
import type { Database, RunResult } from "sqlite3";
import { z } from "zod";
import { InsertResult, SubmissionSchema, SubmissionStore, materialize } from "./store.js";
import { RateScope, Submission, SubmissionDraft } from "../types/contracts.js";

type SqlParam = string | number | null;

function open(dbPath: string) {
  return new Promise<Database>((resolve, reject) => {
    const db = new sqlite3.Database(dbPath, (err) => (err ? reject(err) : resolve(db)));
  });
}
function run(db: Database, sql: string, params: SqlParam[] = []) {
  return new Promise<number>((resolve, reject) => {
    db.run(sql, params, function (this: RunResult, err: Error | null) {
      if (err) reject(err);
      else resolve(this.changes);
    });
  });
}
function get(db: Database, sql: string, params: SqlParam[] = []) {
  return new Promise<unknown>((resolve, reject) => {
    db.get(sql, params, (err: Error | null, row: unknown) => (err ? reject(err) : resolve(row)));
  });
}
function all(db: Database, sql: string, params: SqlParam[] = []) {
  return new Promise<unknown[]>((resolve, reject) => {
    db.all(sql, params, (err: Error | null, rows: unknown[]) => (err ? reject(err) : resolve(rows)));
  });
}

const CreatedAtRow = z.object({ createdAt: z.string() });

// Fixed map: scope names never reach the SQL text from input.
const scopeColumn: Record<RateScope, string> = {
  sourceIdentity: "sourceIdentity",
  email: "email"
};

export class SqliteStore implements SubmissionStore {
  private db: Database | null = null;

  constructor(private dbPath: string, private busyTimeoutMs: number = 5000) {}

  private conn(): Database {
    if (!this.db) throw new Error("SqliteStore used before init()");
    return this.db;
  }

  async init(): Promise<void> {
    if (!this.db) {
      if (this.dbPath !== ":memory:") fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      this.db = await open(this.dbPath);
      this.db.configure("busyTimeout", this.busyTimeoutMs);
    }
    const db = this.conn();
    await run(db, `pragma journal_mode = wal;`);
    await run(db, `
      create table if not exists submissions (
        id text primary key,
        name text not null,
        email text not null,
        body text not null,
        contentHash text not null,
        sourceIdentity text not null,
        createdAt text not null
      );
    `);
    await run(db, `create index if not exists idx_submissions_hash_created on submissions(contentHash, createdAt);`);
    await run(db, `create index if not exists idx_submissions_source_created on submissions(sourceIdentity, createdAt);`);
    await run(db, `create index if not exists idx_submissions_email_created on submissions(email, createdAt);`);
  }

  async insertIfAbsent(draft: SubmissionDraft, since: string | null, signal?: AbortSignal): Promise<InsertResult> {
    signal?.throwIfAborted();
    const db = this.conn();
    const s = materialize(draft);

    // Past the deadline the running statement is interrupted and rolled
    // back. If it already committed, the callback still reports success.
    const interrupt = () => db.interrupt();
    signal?.addEventListener("abort", interrupt, { once: true });
    try {
      // Single statement: sqlite serialises writers, so the not-exists check
      // and the insert cannot interleave with another insert.
      const changes = await run(db, `
        insert into submissions (id, name, email, body, contentHash, sourceIdentity, createdAt)
        select ?,?,?,?,?,?,?
        where not exists (
          select 1 from submissions where contentHash = ? and createdAt >= ?
        )
      `, [
        s.id, s.name, s.email, s.body, s.contentHash, s.sourceIdentity, s.createdAt,
        s.contentHash, since ?? ""
      ]);
      return changes > 0 ? { inserted: true, submission: s } : { inserted: false };
    } finally {
      signal?.removeEventListener("abort", interrupt);
    }
  }

  async findByContentHash(contentHash: string, since: string | null): Promise<Submission | null> {
    const row = await get(this.conn(), `
      select * from submissions
      where contentHash = ? and createdAt >= ?
      order by createdAt desc
      limit 1
    `, [contentHash, since ?? ""]);
    return row ? SubmissionSchema.parse(row) : null;
  }

  async recentActivity(scope: RateScope, key: string, since: string): Promise<string[]> {
    const rows = await all(this.conn(), `
      select createdAt from submissions
      where ${scopeColumn[scope]} = ? and createdAt >= ?
      order by createdAt asc
    `, [key, since]);
    return rows.map((r) => CreatedAtRow.parse(r).createdAt);
  }

  async getSubmission(id: string): Promise<Submission | null> {
    const row = await get(this.conn(), `select * from submissions where id = ?`, [id]);
    return row ? SubmissionSchema.parse(row) : null;
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) return;
    this.db = null;
    await new Promise<void>((resolve, reject) => db.close((err) => (err ? reject(err) : resolve())));
  }
}
