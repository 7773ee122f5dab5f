import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "http";
import type { Readable } from "stream";
import type { ChatStreamOrchestrator, TurnRequest } from "../chat/orchestrator.js";
import type { DedupEngine } from "../memory/dedup.js";
import type { Memory, MemoryStore } from "../memory/types.js";
import { pipeTurnToSse, turnToDto } from "./sse.js";
import {
  AppError,
  NotFoundError,
  ValidationError,
  errorMessage,
  toAppError,
} from "../errors.js";
import { log } from "../logger.js";

// ── HTTP API ─────────────────────────────────────────────

export interface ApiDeps {
  orchestrator: ChatStreamOrchestrator;
  dedup: DedupEngine;
  store: MemoryStore;
}

const MAX_BODY_BYTES = 1_000_000;
const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 200;
const DEFAULT_MEMORY_PAGE = 50;
const MAX_MEMORY_PAGE = 200;
const DEFAULT_TIMELINE_PAGE = 100;
const MAX_TIMELINE_PAGE = 500;
const DEFAULT_SIMILAR_LIMIT = 5;
const MAX_SIMILAR_LIMIT = 50;

type Body = Record<string, unknown>;

// ── Helpers ──────────────────────────────────────────────

/**
 * Read a request body as UTF-8. Chunks are decoded together so a character
 * split across two of them survives. Past `maxBytes` the rest is drained
 * and dropped, leaving the connection able to carry the error response.
 */
export function readBody(
  req: Readable,
  maxBytes = MAX_BODY_BYTES,
): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on("data", (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > maxBytes) {
        tooLarge = true;
        chunks.length = 0;
        reject(new ValidationError("Request body too large"));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

async function readJson(req: IncomingMessage): Promise<Body> {
  const raw = await readBody(req);
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError("Body must be valid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError("Body must be a JSON object");
  }
  return { ...parsed };
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, err: unknown): void {
  const error = toAppError(err);
  if (error.statusCode >= 500) {
    log.error({ code: error.code, error: error.message }, "❌ Request failed");
  }
  if (res.headersSent) {
    if (!res.writableEnded) res.end();
    return;
  }
  sendJson(res, error.statusCode, { error: error.message, code: error.code });
}

export function memoryToDto(m: Memory) {
  return {
    id: m.id,
    targetId: m.targetId,
    happenedAt: m.happenedAt.toISOString(),
    content: m.content,
    sourceType: m.sourceType,
    extractedFacts: m.extractedFacts,
    sentimentScore: m.sentimentScore,
    needsReembedding: m.needsReembedding,
    createdAt: m.createdAt.toISOString(),
  };
}

function optionalString(body: Body, key: string): string | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new ValidationError(`"${key}" must be a string`);
  return v;
}

function parseDate(value: unknown, key: string): Date | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" && typeof value !== "number") {
    throw new ValidationError(`"${key}" must be an ISO date or epoch ms`);
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`"${key}" is not a valid date`);
  }
  return date;
}

export function parseTurnBody(chatbotId: string, body: Body): TurnRequest {
  if (body["retry"] === true) return { chatbotId, retry: true };
  const message = optionalString(body, "message");
  if (!message?.trim()) throw new ValidationError('"message" is required');
  return { chatbotId, message };
}

/** A non-negative integer query parameter, capped at `max`. */
function parseCount(
  url: URL,
  key: string,
  fallback: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = url.searchParams.get(key);
  if (raw === null) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError(`"${key}" must be a non-negative integer`);
  }
  return Math.min(n, max);
}

function optionalNumber(body: Body, key: string): number | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new ValidationError(`"${key}" must be a number`);
  }
  return v;
}

// ── Routes ───────────────────────────────────────────────

const STREAM_ROUTE = /^\/api\/chatbots\/([^/]+)\/messages\/stream$/;
const MESSAGES_ROUTE = /^\/api\/chatbots\/([^/]+)\/messages$/;
const PREVIEW_ROUTE = /^\/api\/chatbots\/([^/]+)\/preview$/;
const MEMORIES_ROUTE = /^\/api\/targets\/([^/]+)\/memories$/;
const SIMILAR_ROUTE = /^\/api\/targets\/([^/]+)\/memories\/similar$/;
const TIMELINE_ROUTE = /^\/api\/targets\/([^/]+)\/timeline$/;
const MEMORY_ROUTE = /^\/api\/memories\/([^/]+)$/;

async function route(
  deps: ApiDeps,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const url = new URL(req.url || "/", "http://localhost");
  const path = url.pathname;
  const method = req.method || "GET";
  let m: RegExpExecArray | null;

  if (path === "/health" && method === "GET") {
    sendJson(res, 200, { ok: true });
    return;
  }

  if ((m = STREAM_ROUTE.exec(path)) && method === "POST") {
    const turn = parseTurnBody(decodeURIComponent(m[1] ?? ""), await readJson(req));

    // A client that goes away cancels the turn
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    await pipeTurnToSse(
      deps.orchestrator.runTurn({ ...turn, signal: controller.signal }),
      res,
    );
    return;
  }

  if ((m = MESSAGES_ROUTE.exec(path)) && method === "GET") {
    const limit = parseCount(url, "limit", DEFAULT_HISTORY_LIMIT, MAX_HISTORY_LIMIT);
    const turns = await deps.store.recentChatTurns(decodeURIComponent(m[1] ?? ""), limit);
    sendJson(res, 200, { messages: turns.map(turnToDto) });
    return;
  }

  if ((m = PREVIEW_ROUTE.exec(path)) && method === "POST") {
    const body = await readJson(req);
    const preview = await deps.orchestrator.previewPrompt(
      decodeURIComponent(m[1] ?? ""),
      optionalString(body, "message"),
    );
    sendJson(res, 200, {
      systemPrompt: preview.systemPrompt,
      settings: preview.settings,
      degraded: preview.degraded,
      memories: preview.memories.map((r) => ({
        rank: r.rank,
        similarity: r.similarity,
        recency: r.recency,
        relevanceScore: r.relevanceScore,
        memory: memoryToDto(r.memory),
      })),
    });
    return;
  }

  if ((m = MEMORIES_ROUTE.exec(path)) && method === "POST") {
    const body = await readJson(req);
    const content = body["content"];
    if (typeof content !== "string") {
      throw new ValidationError('"content" must be a string');
    }
    const sentiment = optionalNumber(body, "sentimentScore");

    const result = await deps.dedup.ingest({
      targetId: decodeURIComponent(m[1] ?? ""),
      content,
      facts: body["facts"],
      happenedAt: parseDate(body["happenedAt"], "happenedAt") ?? new Date(),
      sentimentScore: sentiment,
      sourceType: optionalString(body, "sourceType"),
    });
    sendJson(res, result.status === "created" ? 201 : 200, {
      status: result.status,
      degraded: result.degraded,
      memory: memoryToDto(result.memory),
    });
    return;
  }

  if ((m = MEMORIES_ROUTE.exec(path)) && method === "GET") {
    const page = await deps.store.listMemories(decodeURIComponent(m[1] ?? ""), {
      skip: parseCount(url, "skip", 0),
      limit: parseCount(url, "limit", DEFAULT_MEMORY_PAGE, MAX_MEMORY_PAGE),
      order: "desc",
    });
    sendJson(res, 200, { total: page.total, memories: page.memories.map(memoryToDto) });
    return;
  }

  if ((m = TIMELINE_ROUTE.exec(path)) && method === "GET") {
    const page = await deps.store.listMemories(decodeURIComponent(m[1] ?? ""), {
      skip: parseCount(url, "skip", 0),
      limit: parseCount(url, "limit", DEFAULT_TIMELINE_PAGE, MAX_TIMELINE_PAGE),
      order: "asc",
    });
    sendJson(res, 200, { total: page.total, memories: page.memories.map(memoryToDto) });
    return;
  }

  if ((m = SIMILAR_ROUTE.exec(path)) && method === "POST") {
    const body = await readJson(req);
    const text = optionalString(body, "text");
    if (!text?.trim()) throw new ValidationError('"text" is required');
    const limit = optionalNumber(body, "limit") ?? DEFAULT_SIMILAR_LIMIT;
    const similar = await deps.dedup.findSimilar(
      decodeURIComponent(m[1] ?? ""),
      text,
      Math.min(Math.max(1, Math.floor(limit)), MAX_SIMILAR_LIMIT),
      optionalNumber(body, "minSimilarity"),
    );
    sendJson(res, 200, {
      memories: similar.map((s) => ({
        similarity: s.similarity,
        memory: memoryToDto(s.memory),
      })),
    });
    return;
  }

  if ((m = MEMORY_ROUTE.exec(path)) && method === "GET") {
    const id = decodeURIComponent(m[1] ?? "");
    const memory = await deps.store.getMemory(id);
    if (!memory) throw new NotFoundError("Memory", id);
    sendJson(res, 200, memoryToDto(memory));
    return;
  }

  sendJson(res, 404, { error: "Not found", code: "NOT_FOUND" });
}

export function createApiServer(deps: ApiDeps): Server {
  return createServer((req, res) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    route(deps, req, res).catch((err: unknown) => {
      if (!(err instanceof AppError)) {
        log.warn({ url: req.url, error: errorMessage(err) }, "⚠️ Unhandled request error");
      }
      sendError(res, err);
    });
  });
}
