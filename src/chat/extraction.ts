import type { ChatModel } from "../llm/chat-model.js";
import type { DedupEngine, IngestResult } from "../memory/dedup.js";
import { clampSentiment, sanitizeFacts } from "../memory/facts.js";
import type { ExtractedFacts } from "../memory/types.js";
import { ValidationError, errorMessage } from "../errors.js";
import { log } from "../logger.js";

// ── Fact Extractor: chat turns → memories ───────────────

const EXTRACTION_PROMPT =
  "You analyse one message a user sent to their relationship mentor. " +
  "Decide whether it reveals a NEW fact about the person they are talking about " +
  "(an event, a behaviour, a change of attitude, important information). " +
  "Reply with a single JSON object:\n" +
  "{\n" +
  '  "has_new_fact": true | false,\n' +
  '  "content_summary": "one-sentence summary of the fact",\n' +
  '  "sentiment": "positive" | "neutral" | "negative",\n' +
  '  "sentiment_score": integer from -10 to 10,\n' +
  '  "key_event": "the key event, or null",\n' +
  '  "topics": ["topic", ...],\n' +
  '  "red_flags": ["worrying sign", ...],\n' +
  '  "green_flags": ["good sign", ...]\n' +
  "}\n" +
  'If there is nothing new, reply {"has_new_fact": false}. Never invent information.';

export interface ExtractedFact {
  content: string;
  facts: ExtractedFacts;
  sentimentScore: number;
}

function stripCodeFence(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\n?/, "")
    .replace(/\n?```$/, "");
}

/**
 * Parse the model's verdict. Null when it found nothing new; throws
 * ValidationError when the reply is not a JSON object.
 */
export function parseExtraction(
  raw: string,
  fallbackContent: string,
): ExtractedFact | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch (err) {
    throw new ValidationError(`Extraction reply is not JSON: ${errorMessage(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError("Extraction reply is not a JSON object");
  }

  const result: Record<string, unknown> = { ...parsed };
  if (result["has_new_fact"] !== true) return null;

  const summary = result["content_summary"];
  const content =
    typeof summary === "string" && summary.trim()
      ? summary.trim()
      : fallbackContent.trim();
  if (!content) return null;

  return {
    content,
    facts: sanitizeFacts({
      sentiment: result["sentiment"],
      key_event: result["key_event"],
      topics: result["topics"],
      red_flags: result["red_flags"],
      green_flags: result["green_flags"],
      source: "chat_analysis",
    }),
    sentimentScore: clampSentiment(result["sentiment_score"] ?? 0),
  };
}

export class FactExtractor {
  constructor(
    private readonly model: ChatModel,
    private readonly dedup: DedupEngine,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Ask the model whether `userMessage` says something new about the target
   * and ingest it. Never throws: this runs after the turn has finished.
   */
  async extractFromTurn(
    targetId: string,
    userMessage: string,
  ): Promise<IngestResult | null> {
    try {
      const raw = await this.model.completeJson({
        systemPrompt: EXTRACTION_PROMPT,
        userMessage,
      });
      const fact = parseExtraction(raw, userMessage);
      if (!fact) {
        log.debug({ targetId }, "🧐 No new fact in message");
        return null;
      }

      const result = await this.dedup.ingest({
        targetId,
        content: fact.content,
        facts: fact.facts,
        happenedAt: this.now(),
        sentimentScore: fact.sentimentScore,
        sourceType: "chat",
      });
      log.info(
        { targetId, memoryId: result.memory.id, status: result.status },
        "💡 Fact extracted from chat",
      );
      return result;
    } catch (err) {
      log.warn({ targetId, error: errorMessage(err) }, "⚠️ Fact extraction failed");
      return null;
    }
  }
}
