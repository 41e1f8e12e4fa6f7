import {
  DerivationResult,
  DerivedField,
  FIELD_KINDS,
  FIELD_NAMES,
  FieldKind,
  FieldMap,
  FieldName,
  GoverningKey,
  GoverningValue,
  NOT_EVALUATED,
  POSITIONS_ALL,
  RangeField
} from "../types/contracts.js";
import { compareBounds } from "./bounds.js";
import { assertUnreachable } from "./errors.js";

type Governing = Pick<DerivationResult, "governing" | "governingCode" | "warnings">;

type FieldOfKind<K extends FieldKind> = Extract<DerivedField, { kind: K }>;
type Contributor<F extends DerivedField = DerivedField> = { codeId: string; field: F };

const RANGE_KEYS: Record<RangeField, { min: GoverningKey; max: GoverningKey }> = {
  thickness_qualified: { min: "thickness_qualified_min", max: "thickness_qualified_max" },
  diameter_qualified: { min: "diameter_qualified_min", max: "diameter_qualified_max" }
};

function isKind<K extends FieldKind>(field: DerivedField, kind: K): field is FieldOfKind<K> {
  return field.kind === kind;
}

function collect<K extends FieldKind>(
  perCode: ReadonlyMap<string, FieldMap>,
  name: FieldName,
  kind: K
): Contributor<FieldOfKind<K>>[] {
  const out: Contributor<FieldOfKind<K>>[] = [];
  for (const [codeId, fields] of perCode) {
    const field = fields[name];
    if (field && isKind(field, kind)) out.push({ codeId, field });
  }
  return out;
}

export function isRangeField(name: FieldName): name is RangeField {
  return name === "thickness_qualified" || name === "diameter_qualified";
}

function set(out: Governing, key: GoverningKey, value: GoverningValue, codeId: string) {
  out.governing[key] = value;
  out.governingCode[key] = codeId;
}

/** Interval intersection: highest min, lowest max. First code wins ties. */
function governRange(name: RangeField, cs: Contributor<FieldOfKind<"range">>[], out: Governing) {
  const [first, ...rest] = cs;
  if (!first) return;
  let lo = first;
  let hi = first;
  for (const c of rest) {
    if (compareBounds(c.field.min, lo.field.min) > 0) lo = c;
    if (compareBounds(c.field.max, hi.field.max) < 0) hi = c;
  }
  const keys = RANGE_KEYS[name];
  set(out, keys.min, lo.field.min, lo.codeId);
  set(out, keys.max, hi.field.max, hi.codeId);
  if (compareBounds(lo.field.min, hi.field.max) > 0) {
    out.warnings.push(`Governing ${name} range is empty: ${lo.codeId} min exceeds ${hi.codeId} max`);
  }
}

/** Smallest ceiling is the most restrictive. */
function governScalar(name: GoverningKey, cs: Contributor<FieldOfKind<"scalar">>[], out: Governing) {
  const [first, ...rest] = cs;
  if (!first) return;
  let best = first;
  for (const c of rest) if (c.field.value < best.field.value) best = c;
  set(out, name, best.field.value, best.codeId);
}

function splitPositions(value: string): Set<string> {
  return new Set(value.split(",").map(p => p.trim()).filter(Boolean));
}

function governPositions(name: GoverningKey, cs: Contributor<FieldOfKind<"positions">>[], out: Governing) {
  const [first] = cs;
  if (!first) return;

  if (cs.every(c => c.field.value === POSITIONS_ALL)) {
    set(out, name, POSITIONS_ALL, first.codeId);
    return;
  }

  // N/A means "not evaluated by that code", not "qualifies nothing".
  if (cs.some(c => c.field.value === NOT_EVALUATED)) {
    const evaluated = cs.find(c => c.field.value !== NOT_EVALUATED);
    if (evaluated) set(out, name, evaluated.field.value, evaluated.codeId);
    return;
  }

  const restricting = cs.filter(c => c.field.value !== POSITIONS_ALL);
  const [head, ...tail] = restricting;
  if (!head) return;
  let common = splitPositions(head.field.value);
  for (const c of tail) {
    const next = splitPositions(c.field.value);
    common = new Set([...common].filter(p => next.has(p)));
  }
  set(out, name, [...common].sort().join(", "), head.codeId);
  if (common.size === 0) {
    out.warnings.push(`No common ${name} across ${restricting.map(c => c.codeId).join(", ")}`);
  }
}

function governText(name: GoverningKey, cs: Contributor<FieldOfKind<"text">>[], out: Governing) {
  const [first] = cs;
  if (first) set(out, name, first.field.value, first.codeId);
}

/** "With Only" is the conservative posture and beats "With or Without" from any code. */
function governBacking(name: GoverningKey, cs: Contributor<FieldOfKind<"backing">>[], out: Governing) {
  const pick = cs.find(c => c.field.value === "With Only") ?? cs[0];
  if (pick) set(out, name, pick.field.value, pick.codeId);
}

/**
 * Most restrictive value per field across every code that produced it.
 * Code priority is the map's insertion order.
 */
export function computeGoverning(perCode: ReadonlyMap<string, FieldMap>): Governing {
  const out: Governing = { governing: {}, governingCode: {}, warnings: [] };

  for (const name of FIELD_NAMES) {
    const kind = FIELD_KINDS[name];
    // Range fields govern two keys (_min, _max); every other field governs its own name.
    const key = isRangeField(name) ? null : name;
    switch (kind) {
      case "range":
        if (isRangeField(name)) governRange(name, collect(perCode, name, "range"), out);
        break;
      case "scalar":
        if (key) governScalar(key, collect(perCode, name, "scalar"), out);
        break;
      case "positions":
        if (key) governPositions(key, collect(perCode, name, "positions"), out);
        break;
      case "backing":
        if (key) governBacking(key, collect(perCode, name, "backing"), out);
        break;
      case "text":
        if (key) governText(key, collect(perCode, name, "text"), out);
        break;
      default:
        assertUnreachable(kind);
    }
  }

  return out;
}
