import { getLogger } from "./logger.js";

const logger = getLogger("errors");

// ─── Error Classification ───────────────────────────────────

export type ErrorCategory = "fatal" | "config" | "transient" | "abort" | "unknown";

const FATAL_CODES = new Set([
  "ERR_OUT_OF_MEMORY",
  "ERR_WORKER_OUT_OF_MEMORY",
  "ERR_WORKER_UNCAUGHT_EXCEPTION",
  "ERR_SCRIPT_EXECUTION_TIMEOUT",
  "SQLITE_CORRUPT",
]);

const CONFIG_CODES = new Set([
  "INVALID_CONFIG",
  "MISSING_CREDENTIALS",
  "SQLITE_CANTOPEN",
]);

const TRANSIENT_CODES = new Set([
  // Node.js errno
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "ECONNABORTED",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  // Undici (native fetch)
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  // Our own collaborator timeouts
  "COLLABORATOR_TIMEOUT",
  // SQLite lock contention
  "SQLITE_BUSY",
]);

// ─── Collaborator Errors ────────────────────────────────────

/**
 * Base class for failures reported by an external collaborator
 * (price feed, fee estimator, signer/broadcaster).
 */
export class CollaboratorError extends Error {
  readonly code: string;
  readonly collaborator: string;

  constructor(collaborator: string, message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    this.code = code;
  }
}

export class CollaboratorTimeoutError extends CollaboratorError {
  readonly timeoutMs: number;

  constructor(collaborator: string, timeoutMs: number) {
    super(collaborator, `${collaborator} did not answer within ${timeoutMs}ms`, "COLLABORATOR_TIMEOUT");
    this.name = "CollaboratorTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Extract error code from an error object.
 */
function extractErrorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

/**
 * Walk the error cause chain to find a matching code.
 */
function findInCauseChain(
  err: unknown,
  predicate: (code: string) => boolean,
  depth = 0,
): boolean {
  if (depth > 10) return false;

  const code = extractErrorCode(err);
  if (code && predicate(code)) return true;

  if (err && typeof err === "object" && "cause" in err) {
    return findInCauseChain(err.cause, predicate, depth + 1);
  }

  return false;
}

/**
 * Check if an error represents an intentional abort.
 */
export function isAbortError(err: unknown): boolean {
  if (err instanceof DOMException && err.name === "AbortError") return true;
  if (err && typeof err === "object" && "name" in err) {
    return err.name === "AbortError";
  }
  return false;
}

/**
 * Check if an error is a transient issue that may resolve on retry.
 */
export function isTransientError(err: unknown): boolean {
  if (findInCauseChain(err, (code) => TRANSIENT_CODES.has(code))) return true;

  // TypeError("fetch failed") from undici wraps the real cause
  if (err instanceof TypeError && err.message === "fetch failed" && err.cause) {
    return isTransientError(err.cause);
  }

  if (err instanceof AggregateError) {
    return err.errors.some((e) => isTransientError(e));
  }

  return false;
}

/**
 * Classify an error into a category for handling decisions.
 */
export function classifyError(err: unknown): ErrorCategory {
  if (isAbortError(err)) return "abort";
  if (findInCauseChain(err, (code) => FATAL_CODES.has(code))) return "fatal";
  if (findInCauseChain(err, (code) => CONFIG_CODES.has(code))) return "config";
  if (isTransientError(err)) return "transient";
  return "unknown";
}

/**
 * Human-readable message for any thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "unknown error";
}

// ─── Process-level Handler ──────────────────────────────────

/**
 * Install a process-level unhandled rejection handler.
 *
 * - Fatal/config/unknown errors: log and exit(1)
 * - Transient/abort errors: log and continue
 */
export function installUnhandledRejectionHandler(): void {
  process.on("unhandledRejection", (reason: unknown) => {
    const category = classifyError(reason);

    switch (category) {
      case "transient":
        logger.warn({ err: reason }, "Transient error (unhandled rejection), continuing");
        break;

      case "abort":
        logger.debug({ err: reason }, "Abort error (unhandled rejection)");
        break;

      case "fatal":
        logger.error({ err: reason }, "Fatal error, exiting");
        process.exit(1);
        break;

      case "config":
        logger.error({ err: reason }, "Configuration error, exiting");
        process.exit(1);
        break;

      default:
        logger.error({ err: reason }, "Unhandled rejection (unknown category), exiting");
        process.exit(1);
    }
  });
}
