import { Router } from "express";
import { ZodError } from "zod";
import { nanoid } from "nanoid";
import { pino, type Logger } from "pino";
import { Deriver } from "../plugin/createDeriver.js";
import { presentResult } from "../core/present.js";
import { UnknownCodeError } from "../core/errors.js";

export function makeRoutes(args: { deriver: Deriver; logger?: Logger }) {
  const r = Router();
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  r.get("/codes", (_req, res) => {
    res.json({ ok: true, codes: args.deriver.describeCodes() });
  });

  // Live derivation; nothing is stored.
  r.post("/derive", (req, res) => {
    const requestId = nanoid(12);
    try {
      const result = args.deriver.derive(req.body, { requestId });
      res.json({ ok: true, requestId, result: presentResult(result, args.deriver.registry) });
    } catch (e) {
      if (e instanceof ZodError) {
        res.status(400).json({ ok: false, error: "invalid_request", issues: e.issues });
        return;
      }
      if (e instanceof UnknownCodeError) {
        res.status(400).json({ ok: false, error: "unknown_code", message: e.message, knownIds: e.knownIds });
        return;
      }
      log.error({ err: e, requestId }, "derive failed");
      res.status(500).json({ ok: false, error: "internal_error" });
    }
  });

  return r;
}
