import type { Server } from "http";
import { WebSocket, WebSocketServer } from "ws";
import type { ChatStreamOrchestrator, TurnEvent, TurnRequest } from "../chat/orchestrator.js";
import { errorMessage } from "../errors.js";
import { log } from "../logger.js";

// ── Chat WebSocket ───────────────────────────────────────
//
// in:  { type: "send", chatbotId, message } | { type: "retry", chatbotId } | { type: "cancel" }
// out: { type: "chunk", text } … then { type: "done" } or { type: "error", code, message }

export type ClientMessage =
  | { type: "send"; chatbotId: string; message: string }
  | { type: "retry"; chatbotId: string }
  | { type: "cancel" };

export type ServerMessage =
  | { type: "chunk"; text: string }
  | { type: "done"; assistantTurnId: string | null }
  | { type: "error"; code: string; message: string };

export function parseClientMessage(raw: string): ClientMessage | null {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof msg !== "object" || msg === null) return null;

  const type = "type" in msg ? msg.type : undefined;
  const chatbotId = "chatbotId" in msg && typeof msg.chatbotId === "string" ? msg.chatbotId : "";
  if (type === "cancel") return { type: "cancel" };
  if (type === "retry" && chatbotId) return { type: "retry", chatbotId };
  if (type === "send" && chatbotId && "message" in msg && typeof msg.message === "string") {
    return { type: "send", chatbotId, message: msg.message };
  }
  return null;
}

export function toServerMessage(ev: TurnEvent): ServerMessage {
  switch (ev.type) {
    case "chunk":
      return { type: "chunk", text: ev.text };
    case "done":
      return { type: "done", assistantTurnId: ev.assistantTurn?.id ?? null };
    case "error":
      return { type: "error", code: ev.error.code, message: ev.error.message };
  }
}

export function attachChatSocket(
  server: Server,
  orchestrator: ChatStreamOrchestrator,
): WebSocketServer {
  const wss = new WebSocketServer({ server, path: "/ws" });

  wss.on("connection", (ws) => {
    // One turn in flight per socket
    let inFlight: AbortController | null = null;

    const send = (msg: ServerMessage) => {
      if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(msg));
    };

    const start = (req: TurnRequest) => {
      inFlight?.abort();
      const controller = new AbortController();
      inFlight = controller;

      void (async () => {
        try {
          for await (const ev of orchestrator.runTurn({ ...req, signal: controller.signal })) {
            send(toServerMessage(ev));
          }
        } catch (err) {
          log.error({ error: errorMessage(err) }, "❌ WebSocket turn crashed");
          send({ type: "error", code: "INTERNAL", message: errorMessage(err) });
        } finally {
          if (inFlight === controller) inFlight = null;
        }
      })();
    };

    ws.on("message", (raw) => {
      const msg = parseClientMessage(raw.toString());
      if (!msg) {
        send({ type: "error", code: "VALIDATION_FAILED", message: "Unrecognised message" });
        return;
      }
      if (msg.type === "cancel") {
        inFlight?.abort();
      } else if (msg.type === "retry") {
        start({ chatbotId: msg.chatbotId, retry: true });
      } else {
        start({ chatbotId: msg.chatbotId, message: msg.message });
      }
    });

    // ws closes the socket itself after a protocol error (bad UTF-8, oversized frame)
    ws.on("error", (err) => {
      log.warn({ error: errorMessage(err) }, "⚠️ Chat socket error");
      inFlight?.abort();
    });

    ws.on("close", () => {
      inFlight?.abort();
      log.debug("🔌 Chat socket closed");
    });

    log.debug("🔌 Chat socket connected");
  });

  wss.on("error", (err) => {
    log.error({ error: errorMessage(err) }, "❌ Chat socket server error");
  });

  return wss;
}
