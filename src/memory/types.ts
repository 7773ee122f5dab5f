// ── Memory Module: Shared Types ─────────────────────────

/** Structured facts pulled out of an interaction. Unknown keys are kept. */
export interface ExtractedFacts {
  sentiment?: string;
  keyEvent?: string;
  topics?: string[];
  redFlags?: string[];
  greenFlags?: string[];
  [key: string]: unknown;
}

export interface Memory {
  id: string;
  targetId: string;
  happenedAt: Date;
  /** Free text summary; empty for image-only records. */
  content: string;
  sourceType: string;
  extractedFacts: ExtractedFacts;
  /** Integer in [-10, 10]. */
  sentimentScore: number;
  embedding: number[] | null;
  /** SHA-256 of the normalized content, null when content is empty. */
  contentFingerprint: string | null;
  /** Persisted without an embedding; picked up by a re-embedding job. */
  needsReembedding: boolean;
  createdAt: Date;
}

export type NewMemory = Omit<Memory, "id" | "createdAt">;

/** Fields a dedup merge may rewrite on an existing memory. */
export interface MemoryMergeDelta {
  extractedFacts: ExtractedFacts;
  happenedAt: Date;
  sentimentScore: number;
}

export type ChatRole = "user" | "assistant";

export interface ChatTurn {
  id: string;
  chatbotId: string;
  role: ChatRole;
  content: string;
  createdAt: Date;
}

export type NewChatTurn = Omit<ChatTurn, "id" | "createdAt">;

export interface RAGSettings {
  enabled: boolean;
  maxMemories: number;
  maxRecentMessages: number;
  /** Steepness of the recency curve, 0..1. 0 disables decay. */
  timeDecayFactor: number;
  /** Results below this combined score are dropped, 0..1. */
  minRelevanceScore: number;
}

export interface RetrievalResult {
  memory: Memory;
  similarity: number;
  recency: number;
  relevanceScore: number;
  /** 1-based position after sorting. */
  rank: number;
}

/** e5-style models embed search queries and stored passages differently. */
export type EmbedInputType = "query" | "passage";

export interface EmbedOptions {
  /** Defaults to "passage". */
  inputType?: EmbedInputType;
  signal?: AbortSignal;
}

export interface ListMemoriesOptions {
  skip: number;
  limit: number;
  /** By `happenedAt`; "asc" reads as a timeline. */
  order: "asc" | "desc";
}

export interface MemoryPage {
  memories: Memory[];
  total: number;
}

export interface Neighbor {
  memoryId: string;
  similarity: number;
}

// ── Boundaries ───────────────────────────────────────────

/**
 * Text → vector, plus nearest-neighbour lookup scoped to a target.
 * Implementations throw EmbeddingUnavailableError when the model is down.
 */
export interface EmbeddingGateway {
  embed(text: string, opts?: EmbedOptions): Promise<number[]>;
  nearestNeighbors(
    targetId: string,
    vector: number[],
    limit: number,
  ): Promise<Neighbor[]>;
}

/** Memories this process wrote that a lagging index may not return yet. */
export interface RecentWrites {
  recentWrites(targetId: string): Memory[];
}

/**
 * Persistence for memories and chat turns. Every method rejects with
 * StoreUnavailableError when the backend cannot be reached.
 */
export interface MemoryStore {
  findByFingerprint(targetId: string, fingerprint: string): Promise<Memory[]>;
  findEmbeddedCandidates(targetId: string): Promise<Memory[]>;
  getMemory(id: string): Promise<Memory | null>;
  insert(memory: NewMemory): Promise<Memory>;
  merge(existingId: string, delta: MemoryMergeDelta): Promise<Memory>;
  listMemories(targetId: string, opts: ListMemoriesOptions): Promise<MemoryPage>;
  appendChatTurn(turn: NewChatTurn): Promise<ChatTurn>;
  /** Most recent turns for a chatbot, oldest first. */
  recentChatTurns(chatbotId: string, limit: number): Promise<ChatTurn[]>;
}
