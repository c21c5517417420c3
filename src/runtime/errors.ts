/**
 * Failures raised by the ledger runtime itself, as opposed to a program.
 */
export type RuntimeErrorKind =
  | "MissingRequiredSignature"
  | "NotEnoughAccountKeys"
  | "InvalidInstructionData"
  | "UnsupportedProgramId"
  | "AccountNotPassed"
  | "PrivilegeEscalation"
  | "ReadonlyAccountModified"
  | "ExternalAccountLamportSpend"
  | "ExternalAccountDataModified"
  | "ModifiedProgramId"
  | "UnbalancedInstruction"
  | "InsufficientFundsForFee"
  | "CallDepthExceeded"
  | "IncorrectProgramId"
  | "InvalidAccountData";

export class RuntimeError extends Error {
  constructor(public readonly kind: RuntimeErrorKind, detail?: string) {
    super(detail ? `${kind}: ${detail}` : kind);
    this.name = "RuntimeError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type NativeProgram = "system" | "stake" | "token" | "associated-token" | "metadata";

/**
 * Rejection from one of the native program stand-ins. `reason` mirrors the
 * error variant the real program would return.
 */
export class NativeProgramError extends Error {
  constructor(
    public readonly program: NativeProgram,
    public readonly reason: string,
    detail?: string
  ) {
    super(`${program} program: ${reason}${detail ? ` (${detail})` : ""}`);
    this.name = "NativeProgramError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A transaction that failed and was rolled back. Carries the index of the
 * failing top-level instruction and the logs up to the failure.
 */
export class TransactionError extends Error {
  constructor(
    public readonly instructionIndex: number,
    public readonly failure: Error,
    public readonly logs: readonly string[]
  ) {
    super(`Transaction failed at instruction ${instructionIndex}: ${failure.message}`);
    this.name = "TransactionError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
