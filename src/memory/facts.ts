import type { ExtractedFacts, Memory, MemoryMergeDelta } from "./types.js";

// ── Extracted Facts: sanitising and merging ─────────────

const LIST_KEYS = ["topics", "redFlags", "greenFlags"] as const;

/** snake_case keys as emitted by extraction prompts and older clients. */
const KEY_ALIASES: Record<string, string> = {
  key_event: "keyEvent",
  red_flags: "redFlags",
  green_flags: "greenFlags",
};

export const SENTIMENT_MIN = -10;
export const SENTIMENT_MAX = 10;

/** Round to an integer and clamp into [-10, 10]. Non-numbers become 0. */
export function clampSentiment(value: unknown): number {
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(n)) return 0;
  return Math.max(SENTIMENT_MIN, Math.min(SENTIMENT_MAX, Math.round(n)));
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") continue;
    const trimmed = item.trim();
    if (trimmed && !out.includes(trimmed)) out.push(trimmed);
  }
  return out;
}

/**
 * Coerce untrusted input (request bodies, model output, stored JSON) into
 * ExtractedFacts. List fields always come back as arrays, even when empty.
 */
export function sanitizeFacts(raw: unknown): ExtractedFacts {
  const facts: ExtractedFacts = { topics: [], redFlags: [], greenFlags: [] };
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return facts;
  }

  for (const [rawKey, value] of Object.entries(raw)) {
    const key = KEY_ALIASES[rawKey] ?? rawKey;
    if (value === undefined || value === null) continue;

    if (key === "topics" || key === "redFlags" || key === "greenFlags") {
      facts[key] = stringList(value);
    } else if (key === "sentiment" || key === "keyEvent") {
      if (typeof value === "string" && value.trim()) facts[key] = value.trim();
    } else {
      facts[key] = value;
    }
  }
  return facts;
}

function union(a: string[] | undefined, b: string[] | undefined): string[] {
  const out = [...(a ?? [])];
  for (const item of b ?? []) {
    if (!out.includes(item)) out.push(item);
  }
  return out;
}

/**
 * Union the list fields (existing order first). Scalar facts already on the
 * existing record win; the incoming record only fills gaps.
 */
export function mergeFacts(
  existing: ExtractedFacts,
  incoming: ExtractedFacts,
): ExtractedFacts {
  const merged: ExtractedFacts = { ...incoming, ...existing };
  for (const key of LIST_KEYS) {
    merged[key] = union(existing[key], incoming[key]);
  }
  for (const [key, value] of Object.entries(existing)) {
    if (value === undefined && incoming[key] !== undefined) {
      merged[key] = incoming[key];
    }
  }
  return merged;
}

/** Higher magnitude wins; a tie keeps the existing score. */
export function pickSentiment(existing: number, incoming: number): number {
  return Math.abs(incoming) > Math.abs(existing) ? incoming : existing;
}

export interface MergeCandidate {
  facts: ExtractedFacts;
  happenedAt: Date;
  sentimentScore: number;
}

/** The delta that folds a duplicate candidate into an existing memory. */
export function mergeMemory(
  existing: Memory,
  candidate: MergeCandidate,
): MemoryMergeDelta {
  return {
    extractedFacts: mergeFacts(existing.extractedFacts, candidate.facts),
    happenedAt:
      candidate.happenedAt.getTime() < existing.happenedAt.getTime()
        ? new Date(candidate.happenedAt)
        : new Date(existing.happenedAt),
    sentimentScore: pickSentiment(
      existing.sentimentScore,
      candidate.sentimentScore,
    ),
  };
}
