/**
 * @swapvault/runtime — Errors.
 */

export type RuntimeErrorCode =
  | "ASYNC_OPERATION"
  | "REENTRANT_CALL"
  | "UNKNOWN_TOKEN"
  | "DUPLICATE_REGISTRATION"
  | "POOL_DEPLETED";

/**
 * Structured error from the execution environment.
 */
export class RuntimeError extends Error {
  public readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string) {
    super(message);
    this.name = "RuntimeError";
    this.code = code;
  }
}
