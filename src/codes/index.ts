import { QualificationCode } from "../types/contracts.js";
import { CodeRegistry } from "../core/registry.js";
import { UnknownCodeError } from "../core/errors.js";
import { asmeIx } from "./asme-ix.js";
import { awsD11 } from "./aws-d1-1.js";

// Priority order: earlier codes win free-text ties in the governing result.
export const BUILTIN_CODES: readonly QualificationCode[] = [asmeIx, awsD11];

export function registerBuiltinCodes(registry: CodeRegistry, enabled?: readonly string[]): void {
  const wanted = enabled ? new Set(enabled) : null;
  if (wanted) {
    const known = BUILTIN_CODES.map(c => c.codeId);
    for (const id of wanted) {
      if (!known.includes(id)) throw new UnknownCodeError(id, [...known].sort());
    }
  }
  for (const code of BUILTIN_CODES) {
    if (!wanted || wanted.has(code.codeId)) registry.register(code);
  }
}

export { asmeIx, awsD11 };
