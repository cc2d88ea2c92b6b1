export type ProtocolErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "WINDOW_CLOSED"
  | "INSOLVENT"
  | "REENTRANT";

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}

/** Malformed input, wrong phase, expired window, unmet threshold or unauthorized sender. */
export class ValidationError extends ProtocolError {
  constructor(message: string, code: "VALIDATION" | "NOT_FOUND" | "UNAUTHORIZED" | "WINDOW_CLOSED" = "VALIDATION") {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** The ledger cannot cover a payout; never a partial payout. */
export class SolvencyError extends ProtocolError {
  constructor(message: string) {
    super("INSOLVENT", message);
    this.name = "SolvencyError";
  }
}

export class ReentrancyError extends ProtocolError {
  constructor(operation: string) {
    super("REENTRANT", `Reentrant call into ${operation} rejected`);
    this.name = "ReentrancyError";
  }
}

export function ensure(condition: boolean, message: string): asserts condition {
  if (!condition) throw new ValidationError(message);
}
