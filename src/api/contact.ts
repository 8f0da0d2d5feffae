import express, { Router } from "express";
import type { RequestHandler } from "express";
import { ContactPipeline } from "../plugin/createPipeline.js";
import { toHttpResponse } from "../core/response.js";
import { resolveSourceIdentity } from "./source-identity.js";

export const BODY_LIMIT = "64kb";

export function makeContactRoutes(args: {
  pipeline: ContactPipeline;
  frontDoor?: RequestHandler;
}) {
  const r = Router();
  const guards: RequestHandler[] = args.frontDoor ? [args.frontDoor] : [];

  r.post("/contact", ...guards, express.json({ limit: BODY_LIMIT }), async (req, res, next) => {
    try {
      const sourceIdentity = resolveSourceIdentity(req);
      const outcome = await args.pipeline.submit(req.body, sourceIdentity);
      const out = toHttpResponse(outcome);

      for (const [k, v] of Object.entries(out.headers)) res.setHeader(k, v);
      res.status(out.status).json(out.body);
    } catch (e) {
      next(e);
    }
  });

  return r;
}
