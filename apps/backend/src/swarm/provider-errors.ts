import { AuthError, RateLimitError, RelayError, UpstreamError } from "./errors.js";

const AUTH_PATTERNS = [
  "authentication_error",
  "permission_error",
  "unauthorized",
  "invalid api key",
  "invalid x-api-key",
  "no api key",
  "api key not found",
  "authentication failed",
  "forbidden"
];

const RATE_LIMIT_PATTERNS = ["rate_limit_error", "rate limit", "too many requests"];

/**
 * Turns a provider failure into a relay error. Looks at an HTTP status on the error object
 * first, then at a leading status code in the message (provider SDKs format errors as
 * `429 {"type":"error",...}`), then at message patterns.
 */
export function classifyProviderError(error: unknown): RelayError {
  if (error instanceof RelayError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error) ?? readLeadingStatus(message);

  if (status === 401 || status === 403) {
    return new AuthError(`Provider rejected the credential: ${message}`, error);
  }
  if (status === 429) {
    return new RateLimitError(`Provider is throttling requests: ${message}`, error);
  }

  const lower = message.toLowerCase();
  if (AUTH_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new AuthError(`Provider rejected the credential: ${message}`, error);
  }
  if (RATE_LIMIT_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new RateLimitError(`Provider is throttling requests: ${message}`, error);
  }

  return new UpstreamError(`Provider request failed: ${message}`, status, error);
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }

  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function readLeadingStatus(message: string): number | undefined {
  const match = /^\s*(\d{3})\b/.exec(message);
  if (!match) {
    return undefined;
  }

  const status = Number.parseInt(match[1], 10);
  return status >= 400 && status < 600 ? status : undefined;
}
