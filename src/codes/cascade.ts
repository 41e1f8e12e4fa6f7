import { NOT_EVALUATED, PositionDerivation, POSITIONS_ALL } from "../types/contracts.js";

type PositionMap = Readonly<Record<string, readonly string[] | undefined>>;

export interface PositionTables {
  groove: PositionMap;
  filletFromGroove: PositionMap;
  filletOnly: PositionMap;
}

// Sets this large cover every position of their kind.
const ALL_GROOVE_AT = 6;
const ALL_FILLET_AT = 5;

export function isKnownPosition(tables: PositionTables, pos: string): boolean {
  return Object.hasOwn(tables.groove, pos) || Object.hasOwn(tables.filletOnly, pos);
}

function render(positions: readonly string[], allAt: number): string {
  return positions.length >= allAt ? POSITIONS_ALL : positions.join(", ");
}

export function cascadePositions(pos: string, tables: PositionTables, reference: string): PositionDerivation | null {
  const groove = Object.hasOwn(tables.groove, pos) ? tables.groove[pos] : undefined;
  if (!groove) {
    const filletOnly = Object.hasOwn(tables.filletOnly, pos) ? tables.filletOnly[pos] : undefined;
    if (!filletOnly) return null;
    return { groove: NOT_EVALUATED, fillet: filletOnly.join(", "), reference };
  }

  const fillet = tables.filletFromGroove[pos];
  return {
    groove: render(groove, ALL_GROOVE_AT),
    fillet: fillet ? render(fillet, ALL_FILLET_AT) : null,
    reference
  };
}
