import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import type { Server } from "node:http";
import express from "express";
import { pino } from "pino";
import { z } from "zod";
import { makeRoutes } from "./routes.js";
import { createDeriver, Deriver } from "../plugin/createDeriver.js";
import { CodeRegistry } from "../core/registry.js";
import { registerBuiltinCodes } from "../codes/index.js";
import { loadPositionCatalog } from "../lookups/positions.js";

const logger = pino({ level: "silent" });

function startApp(deriver: Deriver): Promise<{ server: Server; base: string }> {
  const app = express();
  app.use(express.json());
  app.use("/api", makeRoutes({ deriver, logger }));
  return new Promise(resolve => {
    const server = app.listen(0, () => {
      const addr = server.address();
      const port = addr && typeof addr === "object" ? addr.port : 0;
      resolve({ server, base: `http://127.0.0.1:${port}/api` });
    });
  });
}

const Plain = z.union([z.string(), z.number()]);

const DeriveBody = z.object({
  ok: z.literal(true),
  requestId: z.string().min(1),
  result: z.object({
    perCode: z.record(z.record(Plain)),
    governing: z.record(Plain),
    skippedFields: z.array(z.string())
  })
});

const InvalidBody = z.object({
  ok: z.literal(false),
  error: z.string(),
  issues: z.array(z.object({ path: z.array(z.union([z.string(), z.number()])) }))
});

function post(url: string, body: unknown) {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

describe("HTTP routes", () => {
  const registry = new CodeRegistry();
  registerBuiltinCodes(registry);
  const deriver = createDeriver({ registry, lookup: loadPositionCatalog(), logger });

  let server: Server;
  let base = "";

  before(async () => {
    ({ server, base } = await startApp(deriver));
  });

  after(() => {
    server.close();
  });

  it("GET /health", async () => {
    const res = await fetch(`${base}/health`);
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(await res.json(), { ok: true });
  });

  it("GET /codes lists registered codes", async () => {
    const res = await fetch(`${base}/codes`);
    assert.deepStrictEqual(await res.json(), {
      ok: true,
      codes: [
        { codeId: "asme_ix", codeName: "ASME BPVC Section IX", formTypes: ["wpq", "bpqr"] },
        { codeId: "aws_d1_1", codeName: "AWS D1.1", formTypes: ["wpq"] }
      ]
    });
  });

  it("POST /derive returns the presented result", async () => {
    const res = await post(`${base}/derive`, {
      formType: "wpq",
      record: { coupon_thickness: 0.3, test_position: "Vertical", backing_actual: "open root" }
    });
    assert.strictEqual(res.status, 200);
    const body = DeriveBody.parse(await res.json());
    assert.strictEqual(body.result.perCode.aws_d1_1.code_name, "AWS D1.1");
    assert.deepStrictEqual(body.result.governing, {
      thickness_qualified_min: 0.125,
      thickness_qualified_max: 0.6,
      groove_positions_qualified: "1G, 3G",
      fillet_positions_qualified: "1F, 2F, 3F",
      backing_type: "With or Without"
    });
    assert.deepStrictEqual(body.result.skippedFields, ["asme_ix:diameter", "aws_d1_1:diameter"]);
  });

  it("rejects an invalid request", async () => {
    const res = await post(`${base}/derive`, { formType: "xyz", record: {} });
    assert.strictEqual(res.status, 400);
    const body = InvalidBody.parse(await res.json());
    assert.strictEqual(body.error, "invalid_request");
    assert.strictEqual(body.issues[0].path[0], "formType");
  });

  it("rejects an unknown code id", async () => {
    const res = await post(`${base}/derive`, { formType: "wpq", record: { coupon_thickness: 0.3 }, codes: ["csa_w47"] });
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await res.json(), {
      ok: false,
      error: "unknown_code",
      message: "Unknown code 'csa_w47'. Registered: asme_ix, aws_d1_1",
      knownIds: ["asme_ix", "aws_d1_1"]
    });
  });
});

describe("HTTP routes: unexpected failures", () => {
  it("answers 500 without leaking the error", async () => {
    const registry = new CodeRegistry();
    const broken: Deriver = {
      ...createDeriver({ registry, logger }),
      derive() {
        throw new Error("disk on fire");
      }
    };
    const { server, base } = await startApp(broken);
    try {
      const res = await post(`${base}/derive`, { formType: "wpq", record: {} });
      assert.strictEqual(res.status, 500);
      assert.deepStrictEqual(await res.json(), { ok: false, error: "internal_error" });
    } finally {
      server.close();
    }
  });
});
