import { DerivationResult, FieldValue, GoverningKey } from "../types/contracts.js";
import { boundToPlain } from "./bounds.js";
import { CodeRegistry, defaultRegistry } from "./registry.js";

export type PlainValue = number | string;

export interface PresentedRule {
  code: string;
  field: string;
  reference: string;
  value: PlainValue | { min: PlainValue; max: PlainValue };
}

/** JSON/display shape: bounds become numbers or "Unlimited", per-code fields become flat columns. */
export interface PresentedResult {
  perCode: Record<string, Record<string, PlainValue>>;
  governing: Record<string, PlainValue>;
  governingCode: Partial<Record<GoverningKey, string>>;
  rulesFired: PresentedRule[];
  warnings: string[];
  skippedFields: string[];
}

function plainValue(v: FieldValue): PresentedRule["value"] {
  if (typeof v === "number" || typeof v === "string") return v;
  return { min: boundToPlain(v.min), max: boundToPlain(v.max) };
}

export function presentResult(result: DerivationResult, registry: CodeRegistry = defaultRegistry): PresentedResult {
  const perCode: PresentedResult["perCode"] = {};
  for (const [codeId, fields] of Object.entries(result.perCode)) {
    const row: Record<string, PlainValue> = {
      code_name: registry.has(codeId) ? registry.get(codeId).codeName : codeId
    };
    for (const [name, field] of Object.entries(fields)) {
      if (!field) continue;
      if (field.kind === "range") {
        row[`${name}_min`] = boundToPlain(field.min);
        row[`${name}_max`] = boundToPlain(field.max);
      } else {
        row[name] = field.value;
      }
      row[`${name}_reference`] = field.reference;
    }
    perCode[codeId] = row;
  }

  const governing: PresentedResult["governing"] = {};
  for (const [key, value] of Object.entries(result.governing)) {
    if (value === undefined) continue;
    governing[key] = typeof value === "object" ? boundToPlain(value) : value;
  }

  return {
    perCode,
    governing,
    governingCode: { ...result.governingCode },
    rulesFired: result.rulesFired.map(r => ({ ...r, value: plainValue(r.value) })),
    warnings: [...result.warnings],
    skippedFields: [...result.skippedFields]
  };
}
