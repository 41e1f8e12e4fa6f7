import { Bound } from "../types/contracts.js";

export const UNLIMITED: Bound = Object.freeze({ kind: "unlimited" });

export function bound(value: number): Bound {
  return { kind: "value", value };
}

/** Total order: any value sorts below unlimited. */
export function compareBounds(a: Bound, b: Bound): number {
  if (a.kind === "unlimited") return b.kind === "unlimited" ? 0 : 1;
  if (b.kind === "unlimited") return -1;
  return a.value - b.value;
}

export function isUnlimited(b: Bound): boolean {
  return b.kind === "unlimited";
}

export function boundToPlain(b: Bound): number | "Unlimited" {
  return b.kind === "unlimited" ? "Unlimited" : b.value;
}
