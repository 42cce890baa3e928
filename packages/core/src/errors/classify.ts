const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const PERMANENT_STATUS_CODES = new Set([400, 401, 403, 404, 409, 422]);

const TRANSIENT_MESSAGES = [
  "timeout",
  "timed out",
  "econnreset",
  "econnrefused",
  "enotfound",
  "eai_again",
  "network",
  "fetch failed",
  "socket hang up",
  "overloaded",
  "capacity",
  "unavailable",
  "rate limit",
  "too many requests",
];

function numericField(error: Error, field: "status" | "statusCode"): number | undefined {
  if (!(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === "number" ? value : undefined;
}

function statusOf(error: Error): number | undefined {
  return numericField(error, "status") ?? numericField(error, "statusCode");
}

function errnoOf(error: Error): string | undefined {
  const value: unknown = "code" in error ? Reflect.get(error, "code") : undefined;
  return typeof value === "string" ? value : undefined;
}

/**
 * Classifies whether an unexpected error looks temporary.
 * Transient: 408/429/5xx, timeouts, connection and DNS failures, provider capacity.
 * Aborts are never transient.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === "AbortError") return false;

  const status = statusOf(error);
  if (status !== undefined) {
    if (TRANSIENT_STATUS_CODES.has(status)) return true;
    if (PERMANENT_STATUS_CODES.has(status)) return false;
  }

  const message = error.message.toLowerCase();
  const statusMatch = message.match(/\b(\d{3})\b/);
  if (statusMatch) {
    const code = Number(statusMatch[1]);
    if (TRANSIENT_STATUS_CODES.has(code)) return true;
    if (PERMANENT_STATUS_CODES.has(code)) return false;
  }

  const errno = errnoOf(error);
  if (errno && TRANSIENT_MESSAGES.includes(errno.toLowerCase())) return true;

  return TRANSIENT_MESSAGES.some((needle) => message.includes(needle));
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
