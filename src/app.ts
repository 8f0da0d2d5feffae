import express from "express";
import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "pino";
import { ContactPipeline } from "./plugin/createPipeline.js";
import { makeContactRoutes } from "./api/contact.js";
import { makeFrontDoorLimiter } from "./api/rate-limit.js";
import type { HttpConfig } from "./config.js";

function corsHeaders(allowedOrigin: string): RequestHandler {
  return (req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", allowedOrigin);
    res.setHeader("Access-Control-Allow-Methods", "POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (allowedOrigin !== "*") res.setHeader("Vary", "Origin");
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  };
}

function bodyParserStatus(err: unknown): { status: number; type: string } | null {
  if (typeof err !== "object" || err === null) return null;
  if (!("type" in err) || typeof err.type !== "string") return null;
  if (!("status" in err) || typeof err.status !== "number") return null;
  return { status: err.status, type: err.type };
}

function errorHandler(log: Logger): ErrorRequestHandler {
  return (err, _req, res, _next) => {
    const parsed = bodyParserStatus(err);
    if (parsed?.type === "entity.parse.failed") {
      res.status(400).json({ errors: ["body"] });
      return;
    }
    if (parsed?.type === "entity.too.large") {
      res.status(413).json({ error: "payload_too_large" });
      return;
    }
    if (parsed && parsed.status >= 400 && parsed.status < 500) {
      res.status(parsed.status).json({ error: "bad_request" });
      return;
    }
    log.error({ err }, "http: unhandled error");
    res.status(500).json({ error: "internal_error" });
  };
}

export function makeApp(args: { pipeline: ContactPipeline; http: HttpConfig; log: Logger }) {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", args.http.trustProxy);

  app.use(corsHeaders(args.http.allowedOrigin));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use(makeContactRoutes({
    pipeline: args.pipeline,
    frontDoor: makeFrontDoorLimiter({ windowMs: args.http.frontDoorWindowMs, max: args.http.frontDoorMax })
  }));

  app.use((_req, res) => {
    res.status(404).json({ error: "not_found" });
  });
  app.use(errorHandler(args.log));

  return app;
}
