import type { DebugLogger } from "./types.js";

const LOG_PREFIX = "[handoff-relay]";

// stdout carries the MCP stream, so every log line goes to stderr.
export function createDebugLogger(options: { debug: boolean; now?: () => string }): DebugLogger {
  const now = options.now ?? (() => new Date().toISOString());

  return (message, details) => {
    if (!options.debug) return;

    const prefix = `${LOG_PREFIX}[${now()}] ${message}`;
    if (details === undefined) {
      console.error(prefix);
      return;
    }
    console.error(prefix, details);
  };
}

export function logWarning(message: string, details?: unknown): void {
  if (details === undefined) {
    console.warn(`${LOG_PREFIX} ${message}`);
    return;
  }
  console.warn(`${LOG_PREFIX} ${message}`, details);
}

export function logError(message: string, details?: unknown): void {
  if (details === undefined) {
    console.error(`${LOG_PREFIX} ${message}`);
    return;
  }
  console.error(`${LOG_PREFIX} ${message}`, details);
}
