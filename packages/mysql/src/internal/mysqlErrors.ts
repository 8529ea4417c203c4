import { SessionStoreError, type ErrorCode } from "@rowsession/core";

export type MySqlOperation =
  | "connect"
  | "select"
  | "save"
  | "delete"
  | "gc"
  | "begin"
  | "commit"
  | "rollback";

const LOCK_CODES = new Set(["ER_LOCK_WAIT_TIMEOUT", "ER_LOCK_DEADLOCK"]);

const UNAVAILABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "PROTOCOL_CONNECTION_LOST",
  "PROTOCOL_SEQUENCE_TIMEOUT",
  "ER_CON_COUNT_ERROR",
  "ER_ACCESS_DENIED_ERROR",
  "ER_SERVER_SHUTDOWN",
]);

const UNAVAILABLE_KEYWORDS = [
  "connect",
  "connection",
  "socket",
  "closed state",
  "server has gone away",
];

/**
 * Wraps a driver error in a {@link SessionStoreError} whose code tells the caller
 * whether the database is unreachable, a lock wait gave up, or the statement failed.
 */
export function toMySqlError(error: unknown, operation: MySqlOperation): SessionStoreError {
  if (error instanceof SessionStoreError) {
    return error;
  }

  const code = classifyMySqlError(error);
  return new SessionStoreError(code, messageFor(code, operation), error, {
    operation,
    mysqlCode: getErrorCode(error),
  });
}

export function classifyMySqlError(error: unknown): ErrorCode {
  const code = getErrorCode(error);

  if (LOCK_CODES.has(code)) {
    return "LOCK_TIMEOUT";
  }

  if (UNAVAILABLE_CODES.has(code)) {
    return "STORE_UNAVAILABLE";
  }

  const msg = getErrorMessage(error).toLowerCase();
  if (UNAVAILABLE_KEYWORDS.some((k) => msg.includes(k))) {
    return "STORE_UNAVAILABLE";
  }

  return "BACKEND_FAILURE";
}

function messageFor(code: ErrorCode, operation: MySqlOperation): string {
  switch (code) {
    case "LOCK_TIMEOUT":
      return "Timed out waiting for the session row lock.";
    case "STORE_UNAVAILABLE":
      return "Session store is unavailable.";
    default:
      return `MySQL session ${operation} failed.`;
  }
}

function getErrorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    return String(error.code ?? "").toUpperCase();
  }
  return "";
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "");
}
