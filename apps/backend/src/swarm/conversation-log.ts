import { join } from "node:path";
import { slugWithDigest } from "../utils/normalize.js";
import { NotFoundError, StorageError, ValidationError } from "./errors.js";
import { ensureDirectory, readJsonFile, writeJsonFileAtomic } from "./json-file.js";
import { ConversationRecordSchema, validateRecord } from "./record-schemas.js";
import type { ConversationRecord, ConversationTurn, DebugLogger, RelayConfig } from "./types.js";

interface ConversationLogDependencies {
  config: Pick<RelayConfig, "maxTurns" | "paths">;
  logDebug: DebugLogger;
  now?: () => string;
}

/**
 * Conversation records (turns + active agent pointer), one JSON file per conversation id.
 *
 * Callers serialize access per conversation id; the log itself only guarantees that each
 * record write replaces the previous file atomically.
 */
export class ConversationLog {
  private readonly now: () => string;

  constructor(private readonly deps: ConversationLogDependencies) {
    this.now = deps.now ?? (() => new Date().toISOString());
  }

  async ensureDirectories(): Promise<void> {
    await ensureDirectory(this.deps.config.paths.conversationsDir);
  }

  async get(conversationId: string): Promise<ConversationRecord | undefined> {
    const path = this.recordPath(conversationId);
    const raw = await readJsonFile(path);
    if (raw === undefined) {
      return undefined;
    }

    const validated = validateRecord(ConversationRecordSchema, raw);
    if (typeof validated === "string") {
      throw new StorageError(`Invalid conversation record ${path}: ${validated}`);
    }
    return validated;
  }

  async require(conversationId: string): Promise<ConversationRecord> {
    const record = await this.get(conversationId);
    if (!record) {
      throw new NotFoundError("conversation", conversationId);
    }
    return record;
  }

  /** Returns the existing conversation, or creates an empty one pointed at `activeAgent`. */
  async ensure(conversationId: string, activeAgent: string): Promise<ConversationRecord> {
    const existing = await this.get(conversationId);
    if (existing) {
      return existing;
    }

    const timestamp = this.now();
    const record: ConversationRecord = {
      conversationId,
      activeAgent,
      turns: [],
      createdAt: timestamp,
      updatedAt: timestamp
    };
    await this.save(record);
    this.deps.logDebug("conversation:create", { conversationId, activeAgent });
    return record;
  }

  async append(conversationId: string, turn: ConversationTurn): Promise<ConversationRecord> {
    const record = await this.require(conversationId);
    record.turns.push(turn);

    const maxTurns = this.deps.config.maxTurns;
    if (maxTurns !== undefined && record.turns.length > maxTurns) {
      record.turns.splice(0, record.turns.length - maxTurns);
    }

    record.updatedAt = this.now();
    await this.save(record);
    return record;
  }

  async history(conversationId: string): Promise<ConversationTurn[]> {
    const record = await this.require(conversationId);
    return record.turns;
  }

  /** Drops every turn; the conversation id and active agent stay as they were. */
  async reset(conversationId: string): Promise<ConversationRecord> {
    const record = await this.require(conversationId);
    record.turns = [];
    record.updatedAt = this.now();
    await this.save(record);
    this.deps.logDebug("conversation:reset", { conversationId });
    return record;
  }

  async setActiveAgent(conversationId: string, agentName: string): Promise<ConversationRecord> {
    const record = await this.require(conversationId);
    if (record.activeAgent === agentName) {
      return record;
    }

    record.activeAgent = agentName;
    record.updatedAt = this.now();
    await this.save(record);
    return record;
  }

  private async save(record: ConversationRecord): Promise<void> {
    await writeJsonFileAtomic(this.recordPath(record.conversationId), record);
  }

  private recordPath(conversationId: string): string {
    return join(this.deps.config.paths.conversationsDir, conversationFileName(conversationId));
  }
}

/**
 * Conversation ids are caller-chosen strings, so they are mapped to a filesystem-safe name:
 * a readable slug plus a short hash of the exact id.
 */
export function conversationFileName(conversationId: string): string {
  const trimmed = conversationId.trim();
  if (!trimmed) {
    throw new ValidationError("conversationId must be a non-empty string");
  }

  return `${slugWithDigest(trimmed, "conversation")}.json`;
}
