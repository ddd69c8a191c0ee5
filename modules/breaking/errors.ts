export type BreakCalcErrorKind =
  | "UNKNOWN_MATERIAL"
  | "INVALID_MATERIAL_DEFINITION"
  | "INVALID_LAYER_COUNT"
  | "INVALID_CONTACT_AREA"
  | "INVALID_CONSTANT"
  | "INVALID_SPACING";

export type BreakCalcFailure = {
  kind: BreakCalcErrorKind;
  message: string;
};

export class BreakCalcError extends Error {
  kind: BreakCalcErrorKind;
  constructor(kind: BreakCalcErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = "BreakCalcError";
  }

  toFailure(): BreakCalcFailure {
    return { kind: this.kind, message: this.message };
  }
}

export const isBreakCalcError = (err: unknown): err is BreakCalcError =>
  err instanceof BreakCalcError;
