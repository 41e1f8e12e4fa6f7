import path from "node:path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import express from "express";
import { pino } from "pino";

import { makeRoutes } from "./api/routes.js";
import { registerBuiltinCodes } from "./codes/index.js";
import { defaultRegistry } from "./core/registry.js";
import { DEFAULT_POSITIONS_FILE, loadPositionCatalog } from "./lookups/positions.js";
import { createDeriver } from "./plugin/createDeriver.js";

const log = pino({ level: process.env.LOG_LEVEL || "info" });

const PORT = Number(process.env.PORT || 7091);
const POSITIONS_FILE = process.env.POSITIONS_FILE || DEFAULT_POSITIONS_FILE;
const ENABLED_CODES = (process.env.ENABLED_CODES || "")
  .split(",")
  .map(s => s.trim())
  .filter(Boolean);

async function main() {
  registerBuiltinCodes(defaultRegistry, ENABLED_CODES.length ? ENABLED_CODES : undefined);
  const catalog = loadPositionCatalog(path.resolve(POSITIONS_FILE));
  const deriver = createDeriver({ registry: defaultRegistry, lookup: catalog, logger: log });

  const app = express();
  app.use(express.json({ limit: "256kb" }));
  app.use("/api", makeRoutes({ deriver, logger: log }));

  app.listen(PORT, () => {
    log.info(
      {
        PORT,
        POSITIONS_FILE,
        CODES: defaultRegistry.listIds(),
        POSITIONS_LOADED: catalog.list().length
      },
      "Weld qualification engine running"
    );
  });
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
