import { z } from "zod";
import { pino, type Logger } from "pino";
import { CodeRegistry, defaultRegistry } from "../core/registry.js";
import { deriveQualifiedRanges } from "../core/engine.js";
import { DerivationResult, FORM_TYPES, LookupHandle } from "../types/contracts.js";

const DeriveRequestSchema = z.object({
  formType: z.enum(FORM_TYPES),
  record: z.record(z.union([z.string(), z.number(), z.null()])),
  codes: z.array(z.string().min(1)).optional()
});

export type DeriveRequest = z.infer<typeof DeriveRequestSchema>;

export interface CodeSummary {
  codeId: string;
  codeName: string;
  formTypes: string[];
}

export function createDeriver(args: {
  registry?: CodeRegistry;
  lookup?: LookupHandle;
  logger?: Logger;
} = {}) {
  const registry = args.registry ?? defaultRegistry;
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  /** Validates `raw` (throws ZodError) and runs every applicable code. */
  function derive(raw: unknown, meta: { requestId?: string } = {}): DerivationResult {
    const req = DeriveRequestSchema.parse(raw);
    const scoped = meta.requestId ? log.child({ requestId: meta.requestId }) : log;

    const result = deriveQualifiedRanges(req.record, req.formType, {
      codes: req.codes,
      lookup: args.lookup,
      registry
    });

    scoped.info(
      {
        formType: req.formType,
        codes: Object.keys(result.perCode),
        rulesFired: result.rulesFired.length,
        governed: Object.keys(result.governing).length,
        skipped: result.skippedFields.length
      },
      "derivation: complete"
    );
    if (result.warnings.length) {
      scoped.warn({ warnings: result.warnings }, "derivation: warnings");
    }
    return result;
  }

  function describeCodes(): CodeSummary[] {
    return registry.listIds().map(id => {
      const code = registry.get(id);
      return { codeId: code.codeId, codeName: code.codeName, formTypes: [...code.formTypes] };
    });
  }

  return { derive, describeCodes, registry };
}

export type Deriver = ReturnType<typeof createDeriver>;
