import { StoreError, StoreErrorKind } from "../domain/storeResult";
import { ConnectionError, errorMessage, isConnectionLoss } from "./connection";

// https://www.postgresql.org/docs/current/errcodes-appendix.html
const UNIQUE_VIOLATION = "23505";
const CONSTRAINT_CODES = new Set(["23502", "23514"]);
const CONNECTION_CODES = new Set(["3D000", "57P01", "57P02", "57P03"]);
const SOCKET_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "ETIMEDOUT", "EHOSTUNREACH"]);

/**
 * SQLSTATE from a pg DatabaseError, or errno code from a socket error
 */
function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function classifyError(err: unknown): StoreErrorKind {
  if (err instanceof ConnectionError || isConnectionLoss(err)) {
    return "connection_failed";
  }

  const code = errorCode(err);
  if (code === undefined) {
    return "query_failed";
  }
  if (code === UNIQUE_VIOLATION) {
    return "unique_violation";
  }
  if (CONSTRAINT_CODES.has(code)) {
    return "constraint_violation";
  }
  // Class 08: connection exception, class 28: invalid authorization
  if (code.startsWith("08") || code.startsWith("28") || CONNECTION_CODES.has(code) || SOCKET_CODES.has(code)) {
    return "connection_failed";
  }
  return "query_failed";
}

export function toStoreError(err: unknown): StoreError {
  return { kind: classifyError(err), message: errorMessage(err), cause: err };
}
