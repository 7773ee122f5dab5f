import { createHash } from "crypto";
import type { ExtractedFacts } from "./types.js";

// ── Content Fingerprint ──────────────────────────────────

/** Trim, lowercase and collapse runs of whitespace to a single space. */
export function normalizeContent(content: string): string {
  return content.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * SHA-256 hex digest of the normalized content.
 * Returns null for empty content so image-only memories never collide.
 */
export function contentFingerprint(content: string): string | null {
  const normalized = normalizeContent(content);
  if (!normalized) return null;
  return createHash("sha256").update(normalized, "utf8").digest("hex");
}

/**
 * Text that gets embedded for a memory: the content followed by its facts.
 * Keys are sorted so the same facts always serialize the same way.
 */
export function embeddingText(content: string, facts: ExtractedFacts): string {
  const keys = Object.keys(facts)
    .filter((k) => facts[k] !== undefined && facts[k] !== null)
    .sort();
  if (keys.length === 0) return content.trim();

  const ordered: Record<string, unknown> = {};
  for (const k of keys) ordered[k] = facts[k];
  const serialized = JSON.stringify(ordered);

  return content.trim() ? `${content.trim()}\n${serialized}` : serialized;
}
