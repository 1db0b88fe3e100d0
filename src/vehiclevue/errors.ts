import { TimeoutError } from "rxjs";
import type { FailureKind } from "./types";

export class VendorError extends Error {
  constructor(
    public kind: FailureKind,
    message: string,
    public httpStatus?: number,
    public retryAfterMs?: number
  ) {
    super(message);
    this.name = "VendorError";
  }
}

/**
 * Thrown at the top level once polling has halted on bad credentials.
 */
export class AuthenticationRequiredError extends Error {
  constructor(public reason: string) {
    super(`re-authentication required: ${reason}`);
    this.name = "AuthenticationRequiredError";
  }
}

export function toVendorError(err: unknown, timeoutMs?: number): VendorError {
  if (err instanceof VendorError) {
    return err;
  }

  if (err instanceof TimeoutError) {
    return new VendorError(
      "transient",
      timeoutMs === undefined ? "timed out" : `timed out after ${timeoutMs}ms`
    );
  }

  const message =
    typeof err === "object" && err !== null && "message" in err
      ? String(err.message)
      : String(err);

  return new VendorError("transient", message);
}

/**
 * Maps an HTTP status from the vendor onto a failure kind.
 * Returns null for statuses that are not failures.
 */
export function kindForStatus(status: number): FailureKind | null {
  if (status === 401 || status === 403) {
    return "auth";
  }

  if (status === 404) {
    return "not_found";
  }

  if (status === 429) {
    return "rate_limited";
  }

  return status >= 400 ? "transient" : null;
}
