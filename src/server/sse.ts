import type { ServerResponse } from "http";
import type { ChatTurnRun, TurnEvent } from "../chat/orchestrator.js";
import type { ChatTurn } from "../memory/types.js";

// ── Server-Sent Events framing ───────────────────────────

/**
 * One SSE frame. Multi-line data is split across `data:` lines so the
 * client's EventSource joins it back with newlines.
 */
export function sseFrame(data: string, event?: string): string {
  const lines = data.split(/\r?\n/).map((line) => `data: ${line}`);
  return `${event ? `event: ${event}\n` : ""}${lines.join("\n")}\n\n`;
}

export function turnToDto(turn: ChatTurn) {
  return {
    id: turn.id,
    chatbotId: turn.chatbotId,
    role: turn.role,
    content: turn.content,
    createdAt: turn.createdAt.toISOString(),
  };
}

/** Frame for a turn event: chunks are unnamed, done and error are named. */
export function eventFrame(ev: TurnEvent): string {
  switch (ev.type) {
    case "chunk":
      return sseFrame(JSON.stringify({ text: ev.text }));
    case "done":
      return sseFrame(
        JSON.stringify({
          userTurnId: ev.userTurn.id,
          assistantTurn: ev.assistantTurn ? turnToDto(ev.assistantTurn) : null,
        }),
        "done",
      );
    case "error":
      return sseFrame(
        JSON.stringify({ code: ev.error.code, message: ev.error.message }),
        "error",
      );
  }
}

/** Pipe a turn into an open SSE response and end it. */
export async function pipeTurnToSse(run: ChatTurnRun, res: ServerResponse): Promise<void> {
  res.writeHead(200, {
    "Content-Type": "text/event-stream; charset=utf-8",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
    "X-Accel-Buffering": "no",
  });
  res.flushHeaders();

  for await (const ev of run) {
    if (res.writableEnded || res.destroyed) break;
    res.write(eventFrame(ev));
  }
  if (!res.writableEnded) res.end();
}
