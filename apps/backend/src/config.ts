import { isAbsolute, resolve } from "node:path";
import { homedir } from "node:os";
import type { AgentModelDescriptor, RelayConfig } from "./swarm/types.js";

const DEFAULT_MODEL: AgentModelDescriptor = {
  provider: "anthropic",
  modelId: "claude-sonnet-4-20250514"
};
const DEFAULT_MAX_HOPS = 5;
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_CONVERSATION_ID = "default";

export interface ConfigOverrides {
  dataDir?: string;
  apiKey?: string;
  debug?: boolean;
  maxHops?: number;
  maxTurns?: number;
  maxTokens?: number;
  defaultModel?: AgentModelDescriptor;
}

export function createConfig(overrides: ConfigOverrides = {}): RelayConfig {
  const debugEnv = process.env.HANDOFF_RELAY_DEBUG?.trim().toLowerCase();
  const debug = overrides.debug ?? (debugEnv ? !["0", "false", "off", "no"].includes(debugEnv) : false);

  const dataDirEnv = process.env.HANDOFF_RELAY_DATA_DIR?.trim();
  const dataDir = overrides.dataDir
    ? resolvePathLike(overrides.dataDir)
    : dataDirEnv
      ? resolvePathLike(dataDirEnv)
      : resolve(homedir(), ".handoff-relay");

  const apiKey =
    normalizeOptionalString(overrides.apiKey) ??
    normalizeOptionalString(process.env.HANDOFF_RELAY_API_KEY) ??
    normalizeOptionalString(process.env.ANTHROPIC_API_KEY);

  const maxHops = Math.max(
    1,
    overrides.maxHops ?? parsePositiveInt("HANDOFF_RELAY_MAX_HOPS", process.env.HANDOFF_RELAY_MAX_HOPS) ?? DEFAULT_MAX_HOPS
  );
  const maxTurns =
    overrides.maxTurns ?? parsePositiveInt("HANDOFF_RELAY_MAX_TURNS", process.env.HANDOFF_RELAY_MAX_TURNS);
  const maxTokens =
    overrides.maxTokens ??
    parsePositiveInt("HANDOFF_RELAY_MAX_TOKENS", process.env.HANDOFF_RELAY_MAX_TOKENS) ??
    DEFAULT_MAX_TOKENS;

  const defaultModel = overrides.defaultModel ?? {
    provider: normalizeOptionalString(process.env.HANDOFF_RELAY_MODEL_PROVIDER) ?? DEFAULT_MODEL.provider,
    modelId: normalizeOptionalString(process.env.HANDOFF_RELAY_MODEL_ID) ?? DEFAULT_MODEL.modelId
  };

  return {
    debug,
    apiKey,
    defaultModel,
    maxTokens,
    maxHops,
    maxTurns,
    defaultConversationId: DEFAULT_CONVERSATION_ID,
    paths: {
      dataDir,
      agentsDir: resolve(dataDir, "agents"),
      conversationsDir: resolve(dataDir, "conversations")
    }
  };
}

function normalizeOptionalString(value: string | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function parsePositiveInt(name: string, raw: string | undefined): number | undefined {
  const value = normalizeOptionalString(raw);
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value) {
    console.warn(`[handoff-relay] Ignoring invalid ${name}=${value}: expected a positive integer`);
    return undefined;
  }

  return parsed;
}

function resolvePathLike(rawPath: string): string {
  if (rawPath === "~") {
    return homedir();
  }

  if (rawPath.startsWith("~/")) {
    return resolve(homedir(), rawPath.slice(2));
  }

  if (isAbsolute(rawPath)) {
    return resolve(rawPath);
  }

  return resolve(process.cwd(), rawPath);
}
