import pino from "pino";
import { SqliteStore } from "../store/sqlite.js";
import { loadConfig } from "../config.js";

const log = pino({ level: "info" });
const config = loadConfig();
const store = new SqliteStore(config.store.dbPath);

store.init()
  .then(() => store.close())
  .then(() => {
    log.info({ dbPath: config.store.dbPath }, "ok: db initialized");
  })
  .catch((err: unknown) => {
    log.error({ err, dbPath: config.store.dbPath }, "db init failed");
    process.exit(1);
  });
