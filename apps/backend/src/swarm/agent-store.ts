import { join } from "node:path";
import { slugWithDigest } from "../utils/normalize.js";
import { DuplicateNameError, NotFoundError, StorageError, ValidationError } from "./errors.js";
import { deleteFile, ensureDirectory, listJsonFiles, readJsonFile, writeJsonFileAtomic } from "./json-file.js";
import { KeyedLock } from "./keyed-lock.js";
import { logWarning } from "./logger.js";
import { AgentRecordSchema, validateRecord } from "./record-schemas.js";
import type { AgentDefinitionInput, AgentRecord, DebugLogger, RelayConfig } from "./types.js";

interface AgentStoreDependencies {
  config: Pick<RelayConfig, "defaultModel" | "paths">;
  logDebug: DebugLogger;
  now?: () => string;
}

/**
 * One JSON record per agent under `paths.agentsDir`. The trimmed name is the agent's identity;
 * the file stem (`agentId`) is a slug of it plus a digest of the exact name.
 */
export class AgentStore {
  private readonly lock = new KeyedLock();
  private readonly now: () => string;
  private lastCreatedAt = "";

  constructor(private readonly deps: AgentStoreDependencies) {
    this.now = deps.now ?? (() => new Date().toISOString());
  }

  async ensureDirectories(): Promise<void> {
    await ensureDirectory(this.deps.config.paths.agentsDir);
  }

  async create(input: AgentDefinitionInput): Promise<AgentRecord> {
    const agentId = resolveAgentId(input.name);

    return this.lock.run(agentId, async () => {
      const existing = await this.readRecord(agentId);
      if (existing) {
        throw new DuplicateNameError(existing.name);
      }

      const createdAt = this.nextCreatedAt();
      const record = buildRecord(agentId, input, this.deps.config.defaultModel, createdAt, createdAt);
      await writeJsonFileAtomic(this.recordPath(agentId), record);

      this.deps.logDebug("agent:create", { agentId, name: record.name });
      return record;
    });
  }

  /** Full replacement: every field except the id and creation time comes from `input`. */
  async replace(name: string, input: AgentDefinitionInput): Promise<AgentRecord> {
    const agentId = resolveAgentId(name);
    if (input.name.trim() !== name.trim()) {
      throw new ValidationError(`Agent "${name}" cannot be renamed to "${input.name}"`);
    }

    return this.lock.run(agentId, async () => {
      const existing = await this.readRecord(agentId);
      if (!existing || existing.name !== name.trim()) {
        throw new NotFoundError("agent", name);
      }

      const record = buildRecord(
        agentId,
        input,
        this.deps.config.defaultModel,
        existing.metadata.createdAt,
        this.now()
      );
      await writeJsonFileAtomic(this.recordPath(agentId), record);

      this.deps.logDebug("agent:replace", { agentId });
      return record;
    });
  }

  async get(name: string): Promise<AgentRecord> {
    const record = await this.find(name);
    if (!record) {
      throw new NotFoundError("agent", name);
    }
    return record;
  }

  async find(name: string): Promise<AgentRecord | undefined> {
    const trimmed = name.trim();
    if (!trimmed) {
      return undefined;
    }

    const record = await this.readRecord(slugWithDigest(trimmed, "agent"));
    return record && record.name === trimmed ? record : undefined;
  }

  async has(name: string): Promise<boolean> {
    return (await this.find(name)) !== undefined;
  }

  /** Agents in creation order. Unreadable records are skipped with a warning. */
  async list(): Promise<AgentRecord[]> {
    const fileNames = await listJsonFiles(this.deps.config.paths.agentsDir);
    const records: AgentRecord[] = [];

    for (const fileName of fileNames) {
      const agentId = fileName.slice(0, -".json".length);
      try {
        const record = await this.readRecord(agentId);
        if (record) {
          records.push(record);
        }
      } catch (error) {
        if (!(error instanceof StorageError)) {
          throw error;
        }
        logWarning(`Skipping agent record ${fileName}: ${error.message}`);
      }
    }

    return records.sort((a, b) => {
      if (a.metadata.createdAt !== b.metadata.createdAt) {
        return a.metadata.createdAt.localeCompare(b.metadata.createdAt);
      }
      return a.agentId.localeCompare(b.agentId);
    });
  }

  async delete(name: string): Promise<void> {
    if (!name.trim()) {
      throw new NotFoundError("agent", name);
    }

    const agentId = resolveAgentId(name);
    await this.lock.run(agentId, async () => {
      const existing = await this.readRecord(agentId);
      if (!existing || existing.name !== name.trim()) {
        throw new NotFoundError("agent", name);
      }

      const removed = await deleteFile(this.recordPath(agentId));
      if (!removed) {
        throw new NotFoundError("agent", name);
      }
      this.deps.logDebug("agent:delete", { agentId });
    });
  }

  private async readRecord(agentId: string): Promise<AgentRecord | undefined> {
    const path = this.recordPath(agentId);
    const raw = await readJsonFile(path);
    if (raw === undefined) {
      return undefined;
    }

    const validated = validateRecord(AgentRecordSchema, raw);
    if (typeof validated === "string") {
      throw new StorageError(`Invalid agent record ${path}: ${validated}`);
    }
    return validated;
  }

  private recordPath(agentId: string): string {
    return join(this.deps.config.paths.agentsDir, `${agentId}.json`);
  }

  // Creation timestamps double as the list order, so they must be strictly increasing.
  private nextCreatedAt(): string {
    let candidate = this.now();
    if (candidate <= this.lastCreatedAt) {
      candidate = new Date(Date.parse(this.lastCreatedAt) + 1).toISOString();
    }
    this.lastCreatedAt = candidate;
    return candidate;
  }
}

function resolveAgentId(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError("Agent name must not be empty");
  }
  return slugWithDigest(trimmed, "agent");
}

function buildRecord(
  agentId: string,
  input: AgentDefinitionInput,
  defaultModel: AgentRecord["model"],
  createdAt: string,
  updatedAt: string
): AgentRecord {
  const instructions = input.instructions.trim();
  if (!instructions) {
    throw new ValidationError("Agent instructions must not be empty");
  }

  const record: AgentRecord = {
    agentId,
    name: input.name.trim(),
    instructions,
    model: input.model ? { ...input.model } : { ...defaultModel },
    metadata: { createdAt, updatedAt }
  };

  const tools = normalizeStringList(input.tools);
  if (tools) {
    record.tools = tools;
  }

  const tags = normalizeStringList(input.tags);
  if (tags) {
    record.metadata.tags = tags;
  }

  return record;
}

function normalizeStringList(values: string[] | undefined): string[] | undefined {
  if (!values) {
    return undefined;
  }

  const normalized = Array.from(new Set(values.map((value) => value.trim()).filter((value) => value.length > 0)));
  return normalized;
}
