export class UnknownCodeError extends Error {
  public readonly code = "UNKNOWN_CODE";
  public readonly codeId: string;
  public readonly knownIds: string[];

  constructor(codeId: string, knownIds: string[]) {
    super(`Unknown code '${codeId}'. Registered: ${knownIds.join(", ") || "(none)"}`);
    this.name = "UnknownCodeError";
    this.codeId = codeId;
    this.knownIds = knownIds;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function assertUnreachable(x: never): never {
  throw new Error(`Unreachable: ${String(x)}`);
}
