import {
  ActualValueRecord,
  DerivationResult,
  DerivedField,
  FieldMap,
  FieldName,
  FieldValue,
  FormType,
  LookupHandle,
  Operation,
  QualificationCode,
  SupplementalDerivation
} from "../types/contracts.js";
import { CodeRegistry, defaultRegistry } from "./registry.js";
import { computeGoverning } from "./governing.js";
import { errorMessage } from "./errors.js";

export interface DeriveOptions {
  /** Restrict to these code ids. Unknown ids throw UnknownCodeError. */
  codes?: readonly string[];
  lookup?: LookupHandle;
  registry?: CodeRegistry;
}

function emptyResult(): DerivationResult {
  return { perCode: {}, governing: {}, governingCode: {}, rulesFired: [], warnings: [], skippedFields: [] };
}

function fieldValue(field: DerivedField): FieldValue {
  return field.kind === "range" ? { min: field.min, max: field.max } : field.value;
}

function resolveCandidates(
  registry: CodeRegistry,
  formType: FormType,
  filter: readonly string[] | undefined,
  warnings: string[]
): QualificationCode[] {
  if (!filter) return registry.list().filter(c => c.formTypes.includes(formType));

  const selected = new Set<string>();
  for (const id of filter) {
    const code = registry.get(id);
    if (code.formTypes.includes(formType)) selected.add(code.codeId);
    else warnings.push(`Code '${id}' not applicable to form type '${formType}'`);
  }
  // Registration order, whatever order the filter named them in.
  return registry.list().filter(c => selected.has(c.codeId));
}

function runCode(
  code: QualificationCode,
  record: ActualValueRecord,
  formType: FormType,
  lookup: LookupHandle | undefined,
  result: DerivationResult
): FieldMap {
  const fields: FieldMap = {};

  const store = (name: FieldName, field: DerivedField) => {
    fields[name] = field;
    result.rulesFired.push({ code: code.codeId, field: name, reference: field.reference, value: fieldValue(field) });
  };

  // One operation's failure is recorded and never stops the others.
  const guard = <T>(op: Operation, run: () => T | null, apply: (value: T) => void) => {
    try {
      const value = run();
      if (value === null) {
        result.skippedFields.push(`${code.codeId}:${op}`);
        return;
      }
      apply(value);
    } catch (err) {
      result.warnings.push(`${code.codeId} ${op} error: ${errorMessage(err)}`);
    }
  };

  guard("thickness", () => code.deriveThickness(record, formType), t => {
    store("thickness_qualified", { kind: "range", min: t.min, max: t.max, reference: t.reference });
  });

  guard("diameter", () => code.deriveDiameter(record, formType), d => {
    store("diameter_qualified", { kind: "range", min: d.min, max: d.max, reference: d.reference });
  });

  guard("positions", () => code.derivePositions(record, formType, lookup), p => {
    store("groove_positions_qualified", { kind: "positions", value: p.groove, reference: p.reference });
    if (p.fillet !== null) {
      store("fillet_positions_qualified", { kind: "positions", value: p.fillet, reference: p.reference });
    }
  });

  guard("backing", () => code.deriveBacking(record, formType), b => {
    store("backing_type", { kind: "backing", value: b.backingType, reference: b.reference });
  });

  guard<SupplementalDerivation>("supplemental", () => code.deriveSupplemental(record, formType), s => {
    if (s.deposit_thickness_max) {
      store("deposit_thickness_max", { kind: "scalar", ...s.deposit_thickness_max });
    }
    const textFields = [
      "p_number_qualified",
      "f_number_qualified",
      "filler_type_qualified",
      "joint_type_qualified",
      "overlap_qualified"
    ] as const;
    for (const name of textFields) {
      const entry = s[name];
      if (entry) store(name, { kind: "text", ...entry });
    }
  });

  return fields;
}

/**
 * Qualified ranges for one test record under every applicable code, plus the
 * governing (most restrictive) value per field.
 *
 * Never throws for bad data; only an unknown id in `options.codes` does.
 */
export function deriveQualifiedRanges(
  record: ActualValueRecord,
  formType: FormType,
  options: DeriveOptions = {}
): DerivationResult {
  const result = emptyResult();
  const registry = options.registry ?? defaultRegistry;

  if (Object.keys(record).length === 0) {
    result.warnings.push("No actual values for derivation");
    return result;
  }

  const candidates = resolveCandidates(registry, formType, options.codes, result.warnings);
  if (candidates.length === 0) {
    result.warnings.push(`No applicable codes for form type '${formType}'`);
    return result;
  }

  // perCode is output only; an object would hoist integer-like ids ahead of registration order.
  const ordered = new Map<string, FieldMap>();
  for (const code of candidates) {
    const fields = runCode(code, record, formType, options.lookup, result);
    ordered.set(code.codeId, fields);
    result.perCode[code.codeId] = fields;
  }

  const governing = computeGoverning(ordered);
  result.governing = governing.governing;
  result.governingCode = governing.governingCode;
  result.warnings.push(...governing.warnings);

  return result;
}
