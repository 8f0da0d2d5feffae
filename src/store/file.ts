import fs from "fs";
import path from "path";
import { InsertResult, SubmissionSchema, SubmissionStore, materialize } from "./store.js";
import { RateScope, Submission, SubmissionDraft } from "../types/contracts.js";

type Index = {
  byId: Map<string, Submission>;
  byHash: Map<string, Submission[]>;
  bySource: Map<string, Submission[]>;
  byEmail: Map<string, Submission[]>;
};

function parseLine(line: string): Submission | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = SubmissionSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function push(map: Map<string, Submission[]>, key: string, s: Submission) {
  const arr = map.get(key) ?? [];
  arr.push(s);
  map.set(key, arr);
}

/**
 * JSONL append log with in-memory indexes. Meant for a single process:
 * insertIfAbsent checks and appends without yielding, so it is atomic
 * against other calls in the same event loop only.
 */
export class FileStore implements SubmissionStore {
  private dir: string;
  private logPath: string;

  private idx: Index = {
    byId: new Map(),
    byHash: new Map(),
    bySource: new Map(),
    byEmail: new Map()
  };

  constructor(dataDir: string) {
    this.dir = dataDir;
    this.logPath = path.join(this.dir, "submissions.jsonl");
  }

  async init(): Promise<void> {
    fs.mkdirSync(this.dir, { recursive: true });
    if (!fs.existsSync(this.logPath)) fs.writeFileSync(this.logPath, "", "utf8");
    this.load();
  }

  private load() {
    this.idx = { byId: new Map(), byHash: new Map(), bySource: new Map(), byEmail: new Map() };
    const lines = fs.readFileSync(this.logPath, "utf8").split("\n").filter(Boolean);
    for (const line of lines) {
      const s = parseLine(line);
      if (s) this.index(s);
    }
  }

  private index(s: Submission) {
    this.idx.byId.set(s.id, s);
    push(this.idx.byHash, s.contentHash, s);
    push(this.idx.bySource, s.sourceIdentity, s);
    push(this.idx.byEmail, s.email, s);
  }

  private newestSince(list: Submission[] | undefined, since: string | null): Submission | null {
    if (!list) return null;
    for (let i = list.length - 1; i >= 0; i--) {
      const s = list[i];
      if (since === null || s.createdAt >= since) return s;
    }
    return null;
  }

  async insertIfAbsent(draft: SubmissionDraft, since: string | null, signal?: AbortSignal): Promise<InsertResult> {
    // everything below runs without yielding, so this is the last chance to back out
    signal?.throwIfAborted();
    if (this.newestSince(this.idx.byHash.get(draft.contentHash), since)) {
      return { inserted: false };
    }
    const submission = materialize(draft);
    fs.appendFileSync(this.logPath, JSON.stringify(submission) + "\n", "utf8");
    this.index(submission);
    return { inserted: true, submission };
  }

  async findByContentHash(contentHash: string, since: string | null): Promise<Submission | null> {
    return this.newestSince(this.idx.byHash.get(contentHash), since);
  }

  async recentActivity(scope: RateScope, key: string, since: string): Promise<string[]> {
    const list = (scope === "email" ? this.idx.byEmail : this.idx.bySource).get(key) ?? [];
    return list
      .map((s) => s.createdAt)
      .filter((at) => at >= since)
      .sort();
  }

  async getSubmission(id: string): Promise<Submission | null> {
    return this.idx.byId.get(id) ?? null;
  }

  async close(): Promise<void> {
    // appends are synchronous; nothing buffered
  }
}
