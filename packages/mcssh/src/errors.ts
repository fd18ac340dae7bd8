export type McsshErrorCode =
  | "NO_TOKEN_FOUND"
  | "TOKEN_TOO_LONG"
  | "ENDPOINT_NOT_FOUND"
  | "TLS_VERIFICATION_FAILED"
  | "ACCOUNT_PENDING"
  | "RESOLUTION_FAILED"
  | "DEPLOY_FAILED"
  | "UNEXPECTED_STATE"
  | "AGENT_ERROR"
  | "INVALID_ARGUMENT";

export class McsshError extends Error {
  public readonly code: McsshErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: McsshErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "McsshError";
    this.code = code;
    this.details = details;
  }
}

export function isMcsshError(error: unknown, code?: McsshErrorCode): error is McsshError {
  if (!(error instanceof McsshError)) return false;
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
