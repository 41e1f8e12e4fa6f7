export { deriveQualifiedRanges } from "./core/engine.js";
export type { DeriveOptions } from "./core/engine.js";
export { CodeRegistry, defaultRegistry, registerCode, getCode, listCodes } from "./core/registry.js";
export { computeGoverning } from "./core/governing.js";
export { presentResult } from "./core/present.js";
export type { PresentedResult, PresentedRule, PlainValue } from "./core/present.js";
export { UNLIMITED, bound, compareBounds, boundToPlain } from "./core/bounds.js";
export { parseDiameter, parsePosition, hasBacking } from "./core/parse.js";
export { UnknownCodeError } from "./core/errors.js";
export { BUILTIN_CODES, registerBuiltinCodes, asmeIx, awsD11 } from "./codes/index.js";
export { PositionCatalog, loadPositionCatalog } from "./lookups/positions.js";
export { createDeriver } from "./plugin/createDeriver.js";
export type { Deriver, DeriveRequest, CodeSummary } from "./plugin/createDeriver.js";
export { makeRoutes } from "./api/routes.js";
export type {
  ActualValueRecord,
  Bound,
  DerivationResult,
  DerivedField,
  FieldName,
  FormType,
  LookupHandle,
  QualificationCode,
  RuleFired
} from "./types/contracts.js";
