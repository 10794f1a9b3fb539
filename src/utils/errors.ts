export type TzdbErrorKind = "InvalidInput" | "InvalidConfig" | "ToolMissing";

export class TzdbError extends Error {
  readonly kind: TzdbErrorKind;

  constructor(kind: TzdbErrorKind, message: string) {
    super(message);
    this.name = "TzdbError";
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
