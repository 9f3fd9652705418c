import type { ToolErrorKind } from "@handoff-relay/protocol";

export type RelayErrorKind = ToolErrorKind;

export class RelayError extends Error {
  readonly kind: RelayErrorKind;
  readonly retryable: boolean;

  constructor(kind: RelayErrorKind, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.retryable = options.retryable ?? false;
  }
}

export class NotFoundError extends RelayError {
  constructor(
    readonly entity: "agent" | "conversation",
    readonly identifier: string
  ) {
    super("NotFound", `${entity === "agent" ? "Agent" : "Conversation"} "${identifier}" not found`);
  }
}

export class DuplicateNameError extends RelayError {
  constructor(readonly agentName: string) {
    super("DuplicateName", `Agent "${agentName}" already exists`);
  }
}

export class AuthError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super("AuthError", message, { cause });
  }
}

export class RateLimitError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super("RateLimitError", message, { cause, retryable: true });
  }
}

export class UpstreamError extends RelayError {
  constructor(
    message: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super("UpstreamError", message, { cause });
  }
}

export class StorageError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super("StorageError", message, { cause });
  }
}

export class ValidationError extends RelayError {
  constructor(message: string) {
    super("ValidationError", message);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export function isEnoentError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
