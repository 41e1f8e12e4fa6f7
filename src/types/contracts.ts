export const FORM_TYPES = ["wpq", "bpqr", "wps", "pqr", "bps", "bpq"] as const;
export type FormType = (typeof FORM_TYPES)[number];

export type Scalar = string | number | null;

/** What was actually used on the test coupon, keyed by form column name. */
export type ActualValueRecord = Readonly<Record<string, Scalar | undefined>>;

export type Bound = { kind: "value"; value: number } | { kind: "unlimited" };

export type BackingType = "With Only" | "With or Without";

export type RangeDerivation = { min: Bound; max: Bound; reference: string };

export interface PositionDerivation {
  groove: string;
  fillet: string | null;
  reference: string;
}

export interface BackingDerivation {
  backingType: BackingType;
  reference: string;
}

export type Derived<T> = { value: T; reference: string };

export interface SupplementalDerivation {
  p_number_qualified?: Derived<string>;
  f_number_qualified?: Derived<string>;
  deposit_thickness_max?: Derived<number>;
  filler_type_qualified?: Derived<string>;
  joint_type_qualified?: Derived<string>;
  overlap_qualified?: Derived<string>;
}

/** Read-only reference data a code may consult while deriving positions. */
export interface LookupHandle {
  resolvePosition(text: string): string | undefined;
}

export interface QualificationCode {
  readonly codeId: string;
  readonly codeName: string;
  readonly formTypes: readonly FormType[];
  deriveThickness(record: ActualValueRecord, formType: FormType): RangeDerivation | null;
  deriveDiameter(record: ActualValueRecord, formType: FormType): RangeDerivation | null;
  derivePositions(record: ActualValueRecord, formType: FormType, lookup?: LookupHandle): PositionDerivation | null;
  deriveBacking(record: ActualValueRecord, formType: FormType): BackingDerivation | null;
  deriveSupplemental(record: ActualValueRecord, formType: FormType): SupplementalDerivation;
}

/** Position-list sentinels: every position of the kind, and "this code did not evaluate it". */
export const POSITIONS_ALL = "All";
export const NOT_EVALUATED = "N/A";

export type FieldKind = "range" | "scalar" | "positions" | "backing" | "text";

export const FIELD_NAMES = [
  "thickness_qualified",
  "diameter_qualified",
  "groove_positions_qualified",
  "fillet_positions_qualified",
  "backing_type",
  "deposit_thickness_max",
  "p_number_qualified",
  "f_number_qualified",
  "filler_type_qualified",
  "joint_type_qualified",
  "overlap_qualified"
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export const FIELD_KINDS: Readonly<Record<FieldName, FieldKind>> = {
  thickness_qualified: "range",
  diameter_qualified: "range",
  groove_positions_qualified: "positions",
  fillet_positions_qualified: "positions",
  backing_type: "backing",
  deposit_thickness_max: "scalar",
  p_number_qualified: "text",
  f_number_qualified: "text",
  filler_type_qualified: "text",
  joint_type_qualified: "text",
  overlap_qualified: "text"
};

export type RangeField = "thickness_qualified" | "diameter_qualified";

export type DerivedField =
  | { kind: "range"; min: Bound; max: Bound; reference: string }
  | { kind: "scalar"; value: number; reference: string }
  | { kind: "positions"; value: string; reference: string }
  | { kind: "backing"; value: BackingType; reference: string }
  | { kind: "text"; value: string; reference: string };

export type FieldMap = Partial<Record<FieldName, DerivedField>>;

export type GoverningKey =
  | "thickness_qualified_min"
  | "thickness_qualified_max"
  | "diameter_qualified_min"
  | "diameter_qualified_max"
  | Exclude<FieldName, RangeField>;

export type GoverningValue = Bound | number | string;

export type FieldValue = { min: Bound; max: Bound } | number | string;

export interface RuleFired {
  code: string;
  field: FieldName;
  reference: string;
  value: FieldValue;
}

export interface DerivationResult {
  perCode: Record<string, FieldMap>;
  governing: Partial<Record<GoverningKey, GoverningValue>>;
  governingCode: Partial<Record<GoverningKey, string>>;
  rulesFired: RuleFired[];
  warnings: string[];
  skippedFields: string[];
}

export type Operation = "thickness" | "diameter" | "positions" | "backing" | "supplemental";
