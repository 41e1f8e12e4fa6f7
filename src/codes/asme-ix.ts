import {
  ActualValueRecord,
  BackingDerivation,
  FormType,
  LookupHandle,
  PositionDerivation,
  POSITIONS_ALL,
  QualificationCode,
  RangeDerivation,
  SupplementalDerivation
} from "../types/contracts.js";
import { bound, UNLIMITED } from "../core/bounds.js";
import { canonicalPosition, hasBacking, parseDiameter, parsePosition, readNumber, readText } from "../core/parse.js";
import { cascadePositions, isKnownPosition, PositionTables } from "./cascade.js";

export const codeId = "asme_ix";
export const codeName = "ASME BPVC Section IX";

const THICKNESS_FLOOR = 1 / 16;
const WELD_THICK_AT = 3 / 8;
const BRAZE_THICK_AT = 3 / 16;

const SMALL_PIPE_BELOW = 1.0;
const LARGE_PIPE_AT = 2.875;

// QW-423.1: P-1 through P-11 qualify as a group.
const P_GROUP_CEILING = 11;
const P_GROUP_LABEL = "P-1 thru P-11 & P-4X";

// QW-432 groups F1-F6 cascade downward; higher groups stand alone.
export const F_CASCADE_CEILING = 6;

// QW-461.9
const POSITIONS: PositionTables = {
  groove: {
    "1G": ["1G"],
    "2G": ["1G", "2G"],
    "3G": ["1G", "3G"],
    "4G": ["1G", "4G"],
    "5G": ["1G", "2G", "3G", "4G", "5G"],
    "6G": ["1G", "2G", "3G", "4G", "5G", "6G"],
    "6GR": ["1G", "2G", "3G", "4G", "5G", "6G", "6GR"]
  },
  filletFromGroove: {
    "1G": ["1F"],
    "2G": ["1F", "2F"],
    "3G": ["1F", "2F", "3F"],
    "4G": ["1F", "4F"],
    "5G": ["1F", "2F", "3F", "4F", "5F"],
    "6G": ["1F", "2F", "3F", "4F", "5F"],
    "6GR": ["1F", "2F", "3F", "4F", "5F"]
  },
  filletOnly: {
    "1F": ["1F"],
    "2F": ["1F", "2F"],
    "3F": ["1F", "3F"],
    "4F": ["1F", "4F"],
    "5F": ["1F", "2F", "3F", "4F", "5F"]
  }
};

const BRAZE_FLAT_POSITIONS = new Set(["1", "FLAT", "1F", "1G"]);

function thicknessRange(t: number, thickAt: number, section: string): RangeDerivation {
  if (t < THICKNESS_FLOOR) return { min: bound(t), max: bound(t), reference: `${section}(a)` };
  if (t < thickAt) return { min: bound(THICKNESS_FLOOR), max: bound(2 * t), reference: `${section}(b)` };
  return { min: bound(THICKNESS_FLOOR), max: UNLIMITED, reference: `${section}(c)` };
}

function diameterRange(od: number, section: string): RangeDerivation {
  if (od < SMALL_PIPE_BELOW) return { min: bound(od), max: bound(SMALL_PIPE_BELOW), reference: `${section}(a)` };
  if (od < LARGE_PIPE_AT) return { min: bound(SMALL_PIPE_BELOW), max: UNLIMITED, reference: `${section}(b)` };
  return { min: bound(LARGE_PIPE_AT), max: UNLIMITED, reference: `${section}(c)` };
}

function numbersIn(text: string, prefix: "P" | "F"): number[] {
  const re = new RegExp(`${prefix}-?(\\d+)`, "gi");
  return Array.from(text.matchAll(re), m => Number(m[1]));
}

export function expandPNumber(text: string): string | null {
  const nums = numbersIn(text, "P");
  if (nums.length === 0) return null;
  const base = nums.reduce((a, b) => Math.min(a, b));
  return base <= P_GROUP_CEILING ? P_GROUP_LABEL : `P-${base}`;
}

/**
 * Highest tested F-number qualifies itself and every lower one: F4 -> "F4, F3, F2, F1".
 * Above {@link F_CASCADE_CEILING} the number qualifies itself only.
 */
export function expandFNumber(text: string): string | null {
  const nums = numbersIn(text, "F");
  if (nums.length === 0) return null;
  const top = nums.reduce((a, b) => Math.max(a, b));
  if (top < 1) return null;
  if (top > F_CASCADE_CEILING) return `F${top}`;
  const qualified: string[] = [];
  for (let f = top; f >= 1; f--) qualified.push(`F${f}`);
  return qualified.join(", ");
}

function weldingSupplemental(record: ActualValueRecord): SupplementalDerivation {
  const out: SupplementalDerivation = {};

  const pActual = readText(record, "p_number_actual");
  const pQualified = pActual ? expandPNumber(pActual) : null;
  if (pQualified) out.p_number_qualified = { value: pQualified, reference: "QW-423" };

  const fActual = readText(record, "f_number_actual");
  const fQualified = fActual ? expandFNumber(fActual) : null;
  if (fQualified) out.f_number_qualified = { value: fQualified, reference: "QW-433" };

  const deposit = readNumber(record, "deposit_thickness_actual");
  if (deposit !== null) out.deposit_thickness_max = { value: 2 * deposit, reference: "QW-452.5" };

  const filler = readText(record, "filler_type");
  if (filler) out.filler_type_qualified = { value: filler, reference: "QW-404" };

  return out;
}

function brazingSupplemental(record: ActualValueRecord): SupplementalDerivation {
  const out: SupplementalDerivation = {};

  // Brazing P-numbers qualify the same group only.
  const pActual = readText(record, "p_number_actual");
  if (pActual) out.p_number_qualified = { value: pActual, reference: "QB-423" };

  const fNumber = readText(record, "f_number");
  if (fNumber) out.f_number_qualified = { value: fNumber, reference: "QB-432" };

  const joint = readText(record, "joint_type");
  if (joint) out.joint_type_qualified = { value: joint, reference: "QB-402.1" };

  const overlap = readNumber(record, "overlap_length");
  if (overlap !== null) {
    out.overlap_qualified = { value: `${overlap.toFixed(3)}" and greater`, reference: "QB-452.2" };
  }

  return out;
}

export const asmeIx: QualificationCode = {
  codeId,
  codeName,
  formTypes: ["wpq", "bpqr"],

  deriveThickness(record: ActualValueRecord, formType: FormType): RangeDerivation | null {
    const t = readNumber(record, "coupon_thickness");
    if (t === null) return null;
    return formType === "bpqr"
      ? thicknessRange(t, BRAZE_THICK_AT, "QB-452.1")
      : thicknessRange(t, WELD_THICK_AT, "QW-452.1");
  },

  deriveDiameter(record: ActualValueRecord, formType: FormType): RangeDerivation | null {
    const od = parseDiameter(record.coupon_diameter);
    if (od === null) return null;
    return diameterRange(od, formType === "bpqr" ? "QB-452.3" : "QW-452.3");
  },

  derivePositions(record: ActualValueRecord, formType: FormType, lookup?: LookupHandle): PositionDerivation | null {
    if (formType === "bpqr") {
      const pos = parsePosition(record.test_position);
      if (!pos) return null;
      // QB-461: flat qualifies flat; any other position qualifies all.
      return { groove: BRAZE_FLAT_POSITIONS.has(pos) ? "Flat" : POSITIONS_ALL, fillet: null, reference: "QB-461" };
    }

    const pos = canonicalPosition(record.test_position, p => isKnownPosition(POSITIONS, p), lookup);
    if (!pos) return null;
    return cascadePositions(pos, POSITIONS, "QW-461.9");
  },

  deriveBacking(record: ActualValueRecord, formType: FormType): BackingDerivation | null {
    if (formType === "bpqr") return null;
    return { backingType: hasBacking(record) ? "With Only" : "With or Without", reference: "QW-402.4" };
  },

  deriveSupplemental(record: ActualValueRecord, formType: FormType): SupplementalDerivation {
    if (formType === "wpq") return weldingSupplemental(record);
    if (formType === "bpqr") return brazingSupplemental(record);
    return {};
  }
};
