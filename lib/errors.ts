export type ReputationErrorCode =
  | "AlreadyActioned"
  | "InvalidInput"
  | "SelfEndorsement"
  | "DuplicateEndorsement"
  | "InsufficientReputation"
  | "OutOfRange"
  | "BadgeLocked"
  | "AlreadyMinted"
  | "NotFound"
  | "NonTransferable"
  | "Unauthorized";

export class ReputationError extends Error {
  readonly code: ReputationErrorCode;

  constructor(code: ReputationErrorCode, message: string) {
    super(message);
    this.name = "ReputationError";
    this.code = code;
  }
}

export function isReputationError(error: unknown): error is ReputationError {
  return error instanceof ReputationError;
}
