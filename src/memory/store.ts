import { randomUUID } from "crypto";
import type { RecordMetadata } from "@pinecone-database/pinecone";
import {
  getPineconeIndex,
  placeholderVector,
  type PineconeIndex,
} from "./pinecone.js";
import { sanitizeFacts } from "./facts.js";
import { byHappenedAt } from "./order.js";
import type {
  ChatRole,
  ChatTurn,
  ListMemoriesOptions,
  Memory,
  MemoryMergeDelta,
  MemoryPage,
  MemoryStore,
  NewChatTurn,
  NewMemory,
  RecentWrites,
} from "./types.js";
import {
  NotFoundError,
  StoreUnavailableError,
  errorMessage,
} from "../errors.js";
import { log } from "../logger.js";

// ── Pinecone Memory Store ────────────────────────────────

/**
 * Memories and chat turns live as records in one Pinecone index,
 * told apart by the `kind` metadata field:
 *
 *   memory     values = embedding (placeholder when not embedded yet)
 *   chat_turn  values = placeholder; ordered by `createdAt`
 *
 * Metadata cannot hold nested objects, so facts are stored as JSON text.
 *
 * Queries only see a write once the index has caught up, so memories this
 * process wrote are also kept for RECENT_WRITE_TTL_MS and laid over every
 * read. Dedup relies on it: a repeat that lands right after the original
 * must still find it.
 */

/** Pinecone caps queries that return values at 1000 matches. */
const MAX_QUERY_TOP_K = 1000;
/** Pinecone metadata is capped at 40KB per record. */
const MAX_CONTENT_CHARS = 8000;
/** Comfortably longer than the index takes to serve a fresh write. */
export const RECENT_WRITE_TTL_MS = 5 * 60_000;

type MemoryFilter = (m: Memory) => boolean;

type Metadata = Record<string, unknown>;

function str(meta: Metadata, key: string): string {
  const v = meta[key];
  return typeof v === "string" ? v : "";
}

function num(meta: Metadata, key: string): number {
  const v = meta[key];
  return typeof v === "number" ? v : Number(v ?? 0) || 0;
}

function parseFactsJson(raw: string, id: string) {
  if (!raw) return sanitizeFacts({});
  try {
    return sanitizeFacts(JSON.parse(raw));
  } catch (err) {
    log.warn({ id, error: errorMessage(err) }, "⚠️ Unreadable facts on record");
    return sanitizeFacts({});
  }
}

function memoryMetadata(m: Memory): RecordMetadata {
  return {
    kind: "memory",
    targetId: m.targetId,
    happenedAt: m.happenedAt.getTime(),
    createdAt: m.createdAt.getTime(),
    content: m.content.slice(0, MAX_CONTENT_CHARS),
    sourceType: m.sourceType,
    facts: JSON.stringify(m.extractedFacts),
    sentimentScore: m.sentimentScore,
    fingerprint: m.contentFingerprint ?? "",
    embedded: m.embedding !== null,
    needsReembedding: m.needsReembedding,
  };
}

function recordToMemory(
  id: string,
  values: number[] | undefined,
  meta: Metadata,
): Memory {
  const embedded = meta["embedded"] === true;
  return {
    id,
    targetId: str(meta, "targetId"),
    happenedAt: new Date(num(meta, "happenedAt")),
    createdAt: new Date(num(meta, "createdAt")),
    content: str(meta, "content"),
    sourceType: str(meta, "sourceType") || "manual",
    extractedFacts: parseFactsJson(str(meta, "facts"), id),
    sentimentScore: num(meta, "sentimentScore"),
    embedding: embedded && values && values.length > 0 ? [...values] : null,
    contentFingerprint: str(meta, "fingerprint") || null,
    needsReembedding: meta["needsReembedding"] === true,
  };
}

function recordToTurn(id: string, meta: Metadata): ChatTurn {
  const role: ChatRole = meta["role"] === "assistant" ? "assistant" : "user";
  return {
    id,
    chatbotId: str(meta, "chatbotId"),
    role,
    content: str(meta, "content"),
    createdAt: new Date(num(meta, "createdAt")),
  };
}

/** Run a Pinecone call; any failure becomes StoreUnavailableError. */
async function guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof NotFoundError) throw err;
    log.error({ op, error: errorMessage(err) }, "❌ Pinecone store call failed");
    throw new StoreUnavailableError(`Store ${op} failed: ${errorMessage(err)}`, err);
  }
}

export interface PineconeMemoryStoreOptions {
  dimension: number;
  index?: PineconeIndex;
  now?: () => number;
}

export class PineconeMemoryStore implements MemoryStore, RecentWrites {
  private readonly index: () => PineconeIndex;
  private readonly placeholder: number[];
  private readonly now: () => number;

  /** Memories written by this process, by id, with their write time. */
  private recent = new Map<string, { memory: Memory; writtenAt: number }>();

  /**
   * Per-chatbot turn cache, populated on first read and written through on
   * every append. Keeps history reads off the index.
   */
  private turnCache = new Map<string, ChatTurn[]>();

  constructor(opts: PineconeMemoryStoreOptions) {
    const { index } = opts;
    this.index = index ? () => index : getPineconeIndex;
    this.placeholder = placeholderVector(opts.dimension);
    this.now = opts.now ?? Date.now;
  }

  // ── Memories ───────────────────────────────────────────

  findByFingerprint(targetId: string, fingerprint: string): Promise<Memory[]> {
    return this.queryMemories(
      "findByFingerprint",
      {
        kind: { $eq: "memory" },
        targetId: { $eq: targetId },
        fingerprint: { $eq: fingerprint },
      },
      targetId,
      (m) => m.contentFingerprint === fingerprint,
    );
  }

  findEmbeddedCandidates(targetId: string): Promise<Memory[]> {
    return this.queryMemories(
      "findEmbeddedCandidates",
      {
        kind: { $eq: "memory" },
        targetId: { $eq: targetId },
        embedded: { $eq: true },
      },
      targetId,
      (m) => m.embedding !== null,
    );
  }

  getMemory(id: string): Promise<Memory | null> {
    return guard("getMemory", () => this.fetchMemory(id));
  }

  insert(memory: NewMemory): Promise<Memory> {
    const stored: Memory = {
      ...memory,
      id: randomUUID(),
      createdAt: new Date(this.now()),
    };
    return guard("insert", async () => {
      await this.writeMemory(stored);
      return stored;
    });
  }

  merge(existingId: string, delta: MemoryMergeDelta): Promise<Memory> {
    return guard("merge", async () => {
      const existing = await this.fetchMemory(existingId);
      if (!existing) throw new NotFoundError("Memory", existingId);

      const updated: Memory = {
        ...existing,
        extractedFacts: delta.extractedFacts,
        happenedAt: delta.happenedAt,
        sentimentScore: delta.sentimentScore,
      };
      await this.writeMemory(updated);
      return updated;
    });
  }

  async listMemories(
    targetId: string,
    opts: ListMemoriesOptions,
  ): Promise<MemoryPage> {
    const all = await this.queryMemories(
      "listMemories",
      { kind: { $eq: "memory" }, targetId: { $eq: targetId } },
      targetId,
      () => true,
    );
    all.sort(byHappenedAt(opts.order));
    return {
      memories: all.slice(opts.skip, opts.skip + opts.limit),
      total: all.length,
    };
  }

  /** Memories of `targetId` written within RECENT_WRITE_TTL_MS. */
  recentWrites(targetId: string): Memory[] {
    const cutoff = this.now() - RECENT_WRITE_TTL_MS;
    const out: Memory[] = [];
    for (const [id, entry] of this.recent) {
      if (entry.writtenAt < cutoff) {
        this.recent.delete(id);
      } else if (entry.memory.targetId === targetId) {
        out.push(entry.memory);
      }
    }
    return out;
  }

  private async fetchMemory(id: string): Promise<Memory | null> {
    const fresh = this.recent.get(id);
    if (fresh && fresh.writtenAt >= this.now() - RECENT_WRITE_TTL_MS) {
      return fresh.memory;
    }

    const result = await this.index().fetch({ ids: [id] });
    const record = result.records?.[id];
    if (!record?.metadata || record.metadata["kind"] !== "memory") {
      return null;
    }
    return recordToMemory(id, record.values, record.metadata);
  }

  private async writeMemory(m: Memory): Promise<void> {
    await this.index().upsert({
      records: [
        {
          id: m.id,
          values: m.embedding ?? this.placeholder,
          metadata: memoryMetadata(m),
        },
      ],
    });
    this.recent.set(m.id, { memory: m, writtenAt: this.now() });
  }

  /** Query the index, then lay this process's recent writes over the rows. */
  private queryMemories(
    op: string,
    filter: object,
    targetId: string,
    matchesFilter: MemoryFilter,
  ): Promise<Memory[]> {
    return guard(op, async () => {
      const result = await this.index().query({
        vector: this.placeholder,
        topK: MAX_QUERY_TOP_K,
        filter,
        includeMetadata: true,
        includeValues: true,
      });

      const byId = new Map<string, Memory>();
      for (const match of result.matches ?? []) {
        if (!match.metadata) continue;
        byId.set(match.id, recordToMemory(match.id, match.values, match.metadata));
      }
      for (const m of this.recentWrites(targetId)) {
        if (matchesFilter(m)) byId.set(m.id, m);
        else byId.delete(m.id);
      }
      return [...byId.values()];
    });
  }

  // ── Chat turns ─────────────────────────────────────────

  appendChatTurn(turn: NewChatTurn): Promise<ChatTurn> {
    return guard("appendChatTurn", async () => {
      const history = await this.loadTurns(turn.chatbotId);

      // Strictly increasing per chatbot so same-millisecond turns keep order
      const last = history[history.length - 1];
      const createdAtMs = Math.max(
        this.now(),
        last ? last.createdAt.getTime() + 1 : 0,
      );
      const stored: ChatTurn = {
        ...turn,
        id: randomUUID(),
        createdAt: new Date(createdAtMs),
      };

      // Reserve the slot before awaiting so concurrent appends stay ordered
      history.push(stored);
      try {
        await this.index().upsert({
          records: [
            {
              id: stored.id,
              values: this.placeholder,
              metadata: {
                kind: "chat_turn",
                chatbotId: stored.chatbotId,
                role: stored.role,
                content: stored.content.slice(0, MAX_CONTENT_CHARS),
                createdAt: createdAtMs,
              },
            },
          ],
        });
      } catch (err) {
        const idx = history.indexOf(stored);
        if (idx !== -1) history.splice(idx, 1);
        throw err;
      }

      return { ...stored };
    });
  }

  recentChatTurns(chatbotId: string, limit: number): Promise<ChatTurn[]> {
    if (limit <= 0) return Promise.resolve([]);
    return guard("recentChatTurns", async () => {
      const history = await this.loadTurns(chatbotId);
      return history.slice(-limit).map((t) => ({ ...t }));
    });
  }

  private async loadTurns(chatbotId: string): Promise<ChatTurn[]> {
    const cached = this.turnCache.get(chatbotId);
    if (cached) return cached;

    const result = await this.index().query({
      vector: this.placeholder,
      topK: MAX_QUERY_TOP_K,
      filter: { kind: { $eq: "chat_turn" }, chatbotId: { $eq: chatbotId } },
      includeMetadata: true,
    });

    const turns = (result.matches ?? [])
      .filter((m) => m.metadata)
      .map((m) => recordToTurn(m.id, m.metadata ?? {}))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());

    // Another caller may have loaded while we awaited
    const existing = this.turnCache.get(chatbotId);
    if (existing) return existing;

    this.turnCache.set(chatbotId, turns);
    log.info({ chatbotId, turns: turns.length }, "📦 Chat history loaded");
    return turns;
  }
}
