import { ActualValueRecord, LookupHandle, Scalar } from "../types/contracts.js";

const NUMBER = String.raw`(\d+\.?\d*|\.\d+)`;

const OD_RE = new RegExp(`${NUMBER}\\s*["\\u201d]?\\s*OD`, "i");
const MIXED_FRACTION_RE = /^(\d+)-(\d+)\/(\d+)$/;
const FRACTION_RE = /^(\d+)\/(\d+)$/;
const DECIMAL_RE = new RegExp(`^${NUMBER}$`);

// Any of these in the backing description means the coupon was welded without backing.
const NO_BACKING_PHRASES = [
  "open root",
  "without",
  "n/a",
  "none",
  "no backing",
  "single sided",
  "consumable insert"
];

function ratio(num: string, den: string): number | null {
  const d = Number(den);
  return d === 0 ? null : Number(num) / d;
}

/**
 * Outer diameter in inches from text such as `2" N.P.S (2.375" OD)`, `2-7/8`,
 * `7/8` or `24`. Returns null when nothing usable is found.
 */
export function parseDiameter(text: Scalar | undefined): number | null {
  if (text == null) return null;
  if (typeof text === "number") return Number.isFinite(text) && text >= 0 ? text : null;
  const s = text.trim();
  if (!s) return null;

  const od = OD_RE.exec(s);
  if (od) return Number(od[1]);

  const mixed = MIXED_FRACTION_RE.exec(s);
  if (mixed) {
    const frac = ratio(mixed[2], mixed[3]);
    return frac === null ? null : Number(mixed[1]) + frac;
  }

  const frac = FRACTION_RE.exec(s);
  if (frac) return ratio(frac[1], frac[2]);

  if (DECIMAL_RE.test(s)) return Number(s);

  return null;
}

export function parsePosition(text: Scalar | undefined): string | null {
  if (text == null) return null;
  const s = String(text).trim().toUpperCase();
  return s || null;
}

export function readText(record: ActualValueRecord, key: string): string | null {
  const v = record[key];
  if (typeof v === "number") return Number.isFinite(v) ? String(v) : null;
  if (typeof v !== "string") return null;
  const s = v.trim();
  return s || null;
}

/** Non-negative measurement; numeric strings are accepted. */
export function readNumber(record: ActualValueRecord, key: string): number | null {
  const v = record[key];
  if (typeof v === "number") return Number.isFinite(v) && v >= 0 ? v : null;
  if (typeof v !== "string") return null;
  const s = v.trim();
  return DECIMAL_RE.test(s) ? Number(s) : null;
}

/** Blank or unrecognised backing text counts as "with backing". */
export function hasBacking(record: ActualValueRecord): boolean {
  const backing = (readText(record, "backing_actual") ?? "").toLowerCase();
  if (!backing) return true;
  return !NO_BACKING_PHRASES.some(phrase => backing.includes(phrase));
}

/**
 * Parsed test position. When the code's tables do not know it and a lookup
 * handle is available, the lookup's translation is used instead.
 */
export function canonicalPosition(
  text: Scalar | undefined,
  isKnown: (position: string) => boolean,
  lookup?: LookupHandle
): string | null {
  const pos = parsePosition(text);
  if (!pos || isKnown(pos) || !lookup) return pos;
  return parsePosition(lookup.resolvePosition(pos)) ?? pos;
}
