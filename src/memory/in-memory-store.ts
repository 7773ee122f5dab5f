import { randomUUID } from "crypto";
import type {
  ChatTurn,
  ListMemoriesOptions,
  Memory,
  MemoryMergeDelta,
  MemoryPage,
  MemoryStore,
  NewChatTurn,
  NewMemory,
} from "./types.js";
import { byHappenedAt } from "./order.js";
import { NotFoundError } from "../errors.js";

// ── In-Memory Store ──────────────────────────────────────
// Process-local backend for STORE_BACKEND=memory and for tests.
// Returns copies so callers can never mutate stored rows.

function cloneMemory(m: Memory): Memory {
  return {
    ...m,
    happenedAt: new Date(m.happenedAt),
    createdAt: new Date(m.createdAt),
    extractedFacts: structuredClone(m.extractedFacts),
    embedding: m.embedding ? [...m.embedding] : null,
  };
}

function cloneTurn(t: ChatTurn): ChatTurn {
  return { ...t, createdAt: new Date(t.createdAt) };
}

export class InMemoryMemoryStore implements MemoryStore {
  private memories = new Map<string, Memory>();
  private turns = new Map<string, ChatTurn[]>();
  private readonly now: () => Date;

  constructor(opts: { now?: () => Date } = {}) {
    this.now = opts.now ?? (() => new Date());
  }

  async findByFingerprint(
    targetId: string,
    fingerprint: string,
  ): Promise<Memory[]> {
    return [...this.memories.values()]
      .filter(
        (m) => m.targetId === targetId && m.contentFingerprint === fingerprint,
      )
      .map(cloneMemory);
  }

  async findEmbeddedCandidates(targetId: string): Promise<Memory[]> {
    return [...this.memories.values()]
      .filter((m) => m.targetId === targetId && m.embedding !== null)
      .map(cloneMemory);
  }

  async getMemory(id: string): Promise<Memory | null> {
    const m = this.memories.get(id);
    return m ? cloneMemory(m) : null;
  }

  async insert(memory: NewMemory): Promise<Memory> {
    const stored: Memory = cloneMemory({
      ...memory,
      id: randomUUID(),
      createdAt: this.now(),
    });
    this.memories.set(stored.id, stored);
    return cloneMemory(stored);
  }

  async merge(existingId: string, delta: MemoryMergeDelta): Promise<Memory> {
    const existing = this.memories.get(existingId);
    if (!existing) throw new NotFoundError("Memory", existingId);

    const updated: Memory = cloneMemory({
      ...existing,
      extractedFacts: delta.extractedFacts,
      happenedAt: delta.happenedAt,
      sentimentScore: delta.sentimentScore,
    });
    this.memories.set(existingId, updated);
    return cloneMemory(updated);
  }

  async appendChatTurn(turn: NewChatTurn): Promise<ChatTurn> {
    const stored: ChatTurn = { ...turn, id: randomUUID(), createdAt: this.now() };
    const list = this.turns.get(turn.chatbotId) ?? [];
    list.push(stored);
    this.turns.set(turn.chatbotId, list);
    return cloneTurn(stored);
  }

  async recentChatTurns(chatbotId: string, limit: number): Promise<ChatTurn[]> {
    if (limit <= 0) return [];
    const list = this.turns.get(chatbotId) ?? [];
    return list.slice(-limit).map(cloneTurn);
  }

  async listMemories(
    targetId: string,
    opts: ListMemoriesOptions,
  ): Promise<MemoryPage> {
    const all = [...this.memories.values()]
      .filter((m) => m.targetId === targetId)
      .sort(byHappenedAt(opts.order));
    return {
      memories: all.slice(opts.skip, opts.skip + opts.limit).map(cloneMemory),
      total: all.length,
    };
  }
}
