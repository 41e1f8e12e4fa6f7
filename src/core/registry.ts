import { QualificationCode } from "../types/contracts.js";
import { UnknownCodeError } from "./errors.js";

/**
 * Code id -> implementation. Filled once during host start-up, read-only after.
 * Iteration follows registration order, which is also code priority.
 */
export class CodeRegistry {
  private readonly codes = new Map<string, QualificationCode>();

  /** Re-registering an id replaces the implementation but keeps its slot. */
  register(code: QualificationCode): void {
    this.codes.set(code.codeId, code);
  }

  has(codeId: string): boolean {
    return this.codes.has(codeId);
  }

  get(codeId: string): QualificationCode {
    const code = this.codes.get(codeId);
    if (!code) throw new UnknownCodeError(codeId, this.listIds());
    return code;
  }

  listIds(): string[] {
    return [...this.codes.keys()].sort();
  }

  list(): QualificationCode[] {
    return [...this.codes.values()];
  }
}

export const defaultRegistry = new CodeRegistry();

export function registerCode(code: QualificationCode): void {
  defaultRegistry.register(code);
}

export function getCode(codeId: string): QualificationCode {
  return defaultRegistry.get(codeId);
}

export function listCodes(): string[] {
  return defaultRegistry.listIds();
}
