import {
  ActualValueRecord,
  BackingDerivation,
  FormType,
  LookupHandle,
  PositionDerivation,
  QualificationCode,
  RangeDerivation,
  SupplementalDerivation
} from "../types/contracts.js";
import { bound, UNLIMITED } from "../core/bounds.js";
import { canonicalPosition, hasBacking, parseDiameter, readNumber } from "../core/parse.js";
import { cascadePositions, isKnownPosition, PositionTables } from "./cascade.js";

export const codeId = "aws_d1_1";
export const codeName = "AWS D1.1";

// Table 6.11
const THICKNESS_FLOOR = 1 / 8;
const THICK_AT = 1.0;
const LARGE_PIPE_AT = 4.0;

// Table 6.10
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

/** Structural steel only: AWS D1.1 has no brazing or P/F-number rules. */
export const awsD11: QualificationCode = {
  codeId,
  codeName,
  formTypes: ["wpq"],

  deriveThickness(record: ActualValueRecord): RangeDerivation | null {
    const t = readNumber(record, "coupon_thickness");
    if (t === null) return null;
    if (t < THICKNESS_FLOOR) return { min: bound(t), max: bound(t), reference: "Table 6.11" };
    if (t < THICK_AT) return { min: bound(THICKNESS_FLOOR), max: bound(2 * t), reference: "Table 6.11" };
    return { min: bound(THICKNESS_FLOOR), max: UNLIMITED, reference: "Table 6.11" };
  },

  deriveDiameter(record: ActualValueRecord): RangeDerivation | null {
    const od = parseDiameter(record.coupon_diameter);
    if (od === null) return null;
    if (od < LARGE_PIPE_AT) return { min: bound(od), max: bound(2 * od), reference: "Table 6.11" };
    return { min: bound(LARGE_PIPE_AT), max: UNLIMITED, reference: "Table 6.11" };
  },

  derivePositions(record: ActualValueRecord, _formType: FormType, lookup?: LookupHandle): PositionDerivation | null {
    const pos = canonicalPosition(record.test_position, p => isKnownPosition(POSITIONS, p), lookup);
    if (!pos) return null;
    return cascadePositions(pos, POSITIONS, "Table 6.10");
  },

  deriveBacking(record: ActualValueRecord): BackingDerivation | null {
    return { backingType: hasBacking(record) ? "With Only" : "With or Without", reference: "Clause 6.16" };
  },

  deriveSupplemental(): SupplementalDerivation {
    return {};
  }
};
