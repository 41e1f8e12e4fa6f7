import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { LookupHandle } from "../types/contracts.js";

/**
 * Test position names (QW-461 seed data): code, description, aliases.
 * What a position qualifies for lives in the code tables, not here.
 * Canonical file: <repo>/data/positions.v1.json. Read-only once loaded.
 */

const PositionEntrySchema = z.object({
  code: z.string().min(1),
  description: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([])
});

const CatalogSchema = z.object({
  version: z.number().int(),
  positions: z.array(PositionEntrySchema)
});

export type PositionEntry = z.infer<typeof PositionEntrySchema>;

// Relative to the working directory so src/ and dist/ runs read the same file.
export const DEFAULT_POSITIONS_FILE = path.resolve(process.cwd(), "data/positions.v1.json");

function keyOf(text: string): string {
  return text.trim().replace(/\s+/g, " ").toUpperCase();
}

export class PositionCatalog implements LookupHandle {
  private readonly byKey = new Map<string, string>();

  constructor(private readonly entries: readonly PositionEntry[]) {
    for (const e of entries) {
      for (const name of [e.code, e.description, ...e.aliases]) {
        const k = keyOf(name);
        // first entry wins on a clash
        if (!this.byKey.has(k)) this.byKey.set(k, e.code);
      }
    }
  }

  resolvePosition(text: string): string | undefined {
    return this.byKey.get(keyOf(text));
  }

  list(): readonly PositionEntry[] {
    return this.entries;
  }
}

export function loadPositionCatalog(filePath: string = DEFAULT_POSITIONS_FILE): PositionCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return new PositionCatalog(CatalogSchema.parse(raw).positions);
}
