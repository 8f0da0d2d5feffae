import path from "node:path";
import { z } from "zod";
import type { PipelineLimits } from "./plugin/createPipeline.js";

const optionalText = z.string().optional().transform((v) => (v ?? "").trim() || undefined);
// `KEY=` in a .env file arrives as "", which should mean "use the default"
const blankAsUnset = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);
const positiveInt = (def: number) => z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(def));

function parseTrustProxy(v: string): boolean | number | string {
  const s = v.trim().toLowerCase();
  if (s === "" || s === "false") return false;
  if (s === "true") return true;
  if (/^\d+$/.test(s)) return Number(s);
  return v.trim(); // subnet list, e.g. "loopback, 10.0.0.0/8"
}

const EnvSchema = z.object({
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65535).default(7090)),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATA_DIR: z.string().default("./data"),

  STORE_DRIVER: z.enum(["sqlite", "file"]).default("sqlite"),
  DB_PATH: optionalText,
  STORE_TIMEOUT_MS: positiveInt(5000),

  DEDUPE_WINDOW_SECONDS: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(0)),
  RATE_WINDOW_SECONDS: positiveInt(3600),
  MAX_PER_SOURCE: positiveInt(10),
  MAX_PER_EMAIL: positiveInt(5),

  NOTIFY_TO: optionalText.pipe(z.string().email().optional()),
  NOTIFY_FROM: optionalText,
  RESEND_API_KEY: optionalText,
  SMTP_URL: optionalText.pipe(z.string().url().optional()),
  NOTIFY_TIMEOUT_MS: positiveInt(5000),

  ALLOWED_ORIGIN: z.string().default("*"),
  TRUST_PROXY: z.string().default("false").transform(parseTrustProxy),
  FRONTDOOR_WINDOW_MS: positiveInt(60_000),
  FRONTDOOR_MAX: positiveInt(60)
});

export type HttpConfig = {
  port: number;
  allowedOrigin: string;
  trustProxy: boolean | number | string;
  frontDoorWindowMs: number;
  frontDoorMax: number;
};

export type NotifyConfig = {
  to?: string;
  from?: string;
  resendApiKey?: string;
  smtpUrl?: string;
  timeoutMs: number;
  outboxDir: string;
};

export type AppConfig = {
  logLevel: string;
  dataDir: string;
  store: { driver: "sqlite" | "file"; dbPath: string; timeoutMs: number };
  limits: PipelineLimits;
  notify: NotifyConfig;
  http: HttpConfig;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  const e = result.data;
  const dataDir = path.resolve(e.DATA_DIR);

  return {
    logLevel: e.LOG_LEVEL,
    dataDir,
    store: {
      driver: e.STORE_DRIVER,
      dbPath: e.DB_PATH ?? path.join(dataDir, "contact.sqlite"),
      timeoutMs: e.STORE_TIMEOUT_MS
    },
    limits: {
      dedupeWindowSeconds: e.DEDUPE_WINDOW_SECONDS,
      windowSeconds: e.RATE_WINDOW_SECONDS,
      maxPerSource: e.MAX_PER_SOURCE,
      maxPerEmail: e.MAX_PER_EMAIL
    },
    notify: {
      to: e.NOTIFY_TO,
      from: e.NOTIFY_FROM ?? e.NOTIFY_TO,
      resendApiKey: e.RESEND_API_KEY,
      smtpUrl: e.SMTP_URL,
      timeoutMs: e.NOTIFY_TIMEOUT_MS,
      outboxDir: path.join(dataDir, "outbox")
    },
    http: {
      port: e.PORT,
      allowedOrigin: e.ALLOWED_ORIGIN,
      trustProxy: e.TRUST_PROXY,
      frontDoorWindowMs: e.FRONTDOOR_WINDOW_MS,
      frontDoorMax: e.FRONTDOOR_MAX
    }
  };
}
