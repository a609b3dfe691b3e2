export type WaterCalcErrorKind = "VALIDATION" | "DIVISION" | "PRECONDITION";

export class WaterCalcError extends Error {
  readonly kind: WaterCalcErrorKind;
  readonly code: string;
  constructor(kind: WaterCalcErrorKind, code: string, message: string) {
    super(message);
    this.name = "WaterCalcError";
    this.kind = kind;
    this.code = code;
  }
}

/** Negative, inverted or non-numeric input. */
export class ValidationError extends WaterCalcError {
  constructor(code: string, message: string) {
    super("VALIDATION", code, message);
    this.name = "ValidationError";
  }
}

/** A ratio split was asked for with no usage to divide by. */
export class DivisionError extends WaterCalcError {
  constructor(code: string, message: string) {
    super("DIVISION", code, message);
    this.name = "DivisionError";
  }
}

/** A mismatch override was selected but no mismatch could be evaluated. */
export class PreconditionError extends WaterCalcError {
  constructor(code: string, message: string) {
    super("PRECONDITION", code, message);
    this.name = "PreconditionError";
  }
}

export function isWaterCalcError(e: unknown): e is WaterCalcError {
  return e instanceof WaterCalcError;
}
