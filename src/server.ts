import fs from "fs";
import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import pino from "pino";

import { loadConfig } from "./config.js";
import { makeApp } from "./app.js";
import { createContactPipeline } from "./plugin/createPipeline.js";
import { selectNotifier } from "./notify/select.js";
import { SubmissionStore } from "./store/store.js";
import { SqliteStore } from "./store/sqlite.js";
import { FileStore } from "./store/file.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

fs.mkdirSync(config.dataDir, { recursive: true });
const store: SubmissionStore = config.store.driver === "file"
  ? new FileStore(config.dataDir)
  : new SqliteStore(config.store.dbPath, config.store.timeoutMs);

const { notifier, operator } = selectNotifier(config.notify);

async function main() {
  await store.init();

  const pipeline = createContactPipeline({
    store,
    storeTimeoutMs: config.store.timeoutMs,
    limits: config.limits,
    notifier,
    operator,
    logger: log
  });

  const app = makeApp({ pipeline, http: config.http, log });

  const server = app.listen(config.http.port, () => {
    log.info(
      {
        PORT: config.http.port,
        STORE_DRIVER: config.store.driver,
        DATA_DIR: config.dataDir,
        DEDUPE_WINDOW_SECONDS: config.limits.dedupeWindowSeconds,
        RATE_WINDOW_SECONDS: config.limits.windowSeconds,
        MAX_PER_SOURCE: config.limits.maxPerSource,
        MAX_PER_EMAIL: config.limits.maxPerEmail,
        NOTIFIER: notifier?.kind ?? "disabled"
      },
      "contact-intake running"
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, "store close failed");
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
