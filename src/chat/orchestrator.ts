import type { Chatbot, Directory, Mentor, TargetProfile } from "./directory.js";
import type { FactExtractor } from "./extraction.js";
import { renderPrompt, selectTemplate, type ChatMessage } from "./prompt.js";
import type { ChatModel } from "../llm/chat-model.js";
import { resolveRagSettings, type RetrievalRanker } from "../memory/retrieval.js";
import type {
  ChatTurn,
  MemoryStore,
  RAGSettings,
  RetrievalResult,
} from "../memory/types.js";
import {
  AppError,
  EmbeddingUnavailableError,
  ModelStreamCancelledError,
  ModelStreamFailedError,
  ValidationError,
  errorMessage,
  toAppError,
} from "../errors.js";
import { log } from "../logger.js";

// ── Chat Stream Orchestrator ─────────────────────────────
//
//   Idle → ContextAssembling → ModelStreaming → Finalizing → Done
//                 ↓                  ↓               ↓
//              Errored            Errored         Errored

export type TurnState =
  | "Idle"
  | "ContextAssembling"
  | "ModelStreaming"
  | "Finalizing"
  | "Done"
  | "Errored";

export type TurnEvent =
  | { type: "chunk"; text: string }
  | { type: "done"; userTurn: ChatTurn; assistantTurn: ChatTurn | null }
  | { type: "error"; error: AppError };

export type TurnRequest = {
  chatbotId: string;
  signal?: AbortSignal;
} & ({ message: string; retry?: false } | { retry: true });

export interface ChatTurnRun extends AsyncIterable<TurnEvent> {
  readonly state: TurnState;
}

export interface PromptPreview {
  systemPrompt: string;
  memories: RetrievalResult[];
  settings: RAGSettings;
  /** True when retrieval was skipped because embeddings were unavailable. */
  degraded: boolean;
}

export interface ChatStreamOrchestratorDeps {
  directory: Directory;
  store: MemoryStore;
  ranker: RetrievalRanker;
  model: ChatModel;
  /** Background fact extraction after each completed turn; off when null. */
  extractor?: FactExtractor | null;
  modelStreamTimeoutMs: number;
}

interface TurnContext {
  chatbot: Chatbot;
  mentor: Mentor;
  target: TargetProfile;
  settings: RAGSettings;
}

interface AssembledTurn {
  ctx: TurnContext;
  userTurn: ChatTurn;
  history: ChatMessage[];
  systemPrompt: string;
}

// ── Helpers ──────────────────────────────────────────────

/** Settle with `promise`, or reject as soon as `signal` aborts. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function historyMessages(turns: ChatTurn[]): ChatMessage[] {
  return turns.map((t) => ({ role: t.role, content: t.content }));
}

// ── Orchestrator ─────────────────────────────────────────

export class ChatStreamOrchestrator {
  constructor(private readonly deps: ChatStreamOrchestratorDeps) {}

  /** Start a turn. Nothing happens until the run is iterated. */
  runTurn(req: TurnRequest): ChatTurnRun {
    return new TurnRun(this, req);
  }

  /** The system prompt and memories a turn would use, without calling the model. */
  async previewPrompt(chatbotId: string, message?: string): Promise<PromptPreview> {
    const ctx = await this.loadContext(chatbotId);
    const { memories, degraded } = message?.trim()
      ? await this.retrieve(ctx, message)
      : { memories: [], degraded: false };
    return {
      systemPrompt: this.composePrompt(ctx, memories),
      memories,
      settings: ctx.settings,
      degraded,
    };
  }

  // ── Steps (used by TurnRun) ────────────────────────────

  /** @internal */
  async assemble(req: TurnRequest): Promise<AssembledTurn> {
    const ctx = await this.loadContext(req.chatbotId);
    const userTurn = req.retry
      ? await this.pendingUserTurn(req.chatbotId)
      : await this.persistUserTurn(req.chatbotId, req.message);

    const history = await this.loadHistory(userTurn, ctx.settings.maxRecentMessages);
    const { memories } = await this.retrieve(ctx, userTurn.content);
    return {
      ctx,
      userTurn,
      history,
      systemPrompt: this.composePrompt(ctx, memories),
    };
  }

  /** @internal */
  streamModel(turn: AssembledTurn, signal: AbortSignal): AsyncIterable<string> {
    return this.deps.model.streamChat({
      systemPrompt: turn.systemPrompt,
      history: turn.history,
      userMessage: turn.userTurn.content,
      signal,
    });
  }

  /** @internal */
  async finalize(turn: AssembledTurn, text: string): Promise<ChatTurn | null> {
    const assistantTurn = text
      ? await this.deps.store.appendChatTurn({
          chatbotId: turn.ctx.chatbot.id,
          role: "assistant",
          content: text,
        })
      : null;

    const { extractor } = this.deps;
    if (extractor) {
      // Fire-and-forget; extractFromTurn logs its own failures
      void extractor.extractFromTurn(turn.ctx.target.id, turn.userTurn.content);
    }
    return assistantTurn;
  }

  get modelStreamTimeoutMs(): number {
    return this.deps.modelStreamTimeoutMs;
  }

  // ── Internals ──────────────────────────────────────────

  private async loadContext(chatbotId: string): Promise<TurnContext> {
    const { directory } = this.deps;
    const chatbot = await directory.getChatbot(chatbotId);
    const [mentor, target] = await Promise.all([
      directory.getMentor(chatbot.mentorId),
      directory.getTarget(chatbot.targetId),
    ]);
    const settings = resolveRagSettings(mentor.defaultRagSettings, chatbot.ragSettings);
    return { chatbot, mentor, target, settings };
  }

  private async persistUserTurn(chatbotId: string, message: string): Promise<ChatTurn> {
    const content = message.trim();
    if (!content) throw new ValidationError("Message must not be empty");
    return this.deps.store.appendChatTurn({ chatbotId, role: "user", content });
  }

  /** The latest user turn that never got a reply; retry answers it again. */
  private async pendingUserTurn(chatbotId: string): Promise<ChatTurn> {
    const [last] = await this.deps.store.recentChatTurns(chatbotId, 1);
    if (!last || last.role !== "user") {
      throw new ValidationError("Nothing to retry: there is no unanswered message");
    }
    return last;
  }

  private async loadHistory(current: ChatTurn, limit: number): Promise<ChatMessage[]> {
    if (limit <= 0) return [];
    const turns = await this.deps.store.recentChatTurns(current.chatbotId, limit + 1);
    return historyMessages(turns.filter((t) => t.id !== current.id).slice(-limit));
  }

  private async retrieve(
    ctx: TurnContext,
    queryText: string,
  ): Promise<{ memories: RetrievalResult[]; degraded: boolean }> {
    try {
      const memories = await this.deps.ranker.retrieve(
        ctx.target.id,
        queryText,
        ctx.settings,
      );
      return { memories, degraded: false };
    } catch (err) {
      if (!(err instanceof EmbeddingUnavailableError)) throw err;
      log.warn(
        { chatbotId: ctx.chatbot.id, error: err.message },
        "⚠️ Retrieval unavailable, answering without memories",
      );
      return { memories: [], degraded: true };
    }
  }

  private composePrompt(ctx: TurnContext, memories: RetrievalResult[]): string {
    return renderPrompt(selectTemplate(ctx.chatbot, ctx.mentor), {
      targetName: ctx.target.name,
      profile: ctx.target,
      preferences: ctx.target.preferences,
      retrievalResults: memories,
    });
  }
}

// ── One turn ─────────────────────────────────────────────

class TurnRun implements ChatTurnRun {
  private current: TurnState = "Idle";
  private events: AsyncGenerator<TurnEvent> | null = null;

  constructor(
    private readonly orchestrator: ChatStreamOrchestrator,
    private readonly req: TurnRequest,
  ) {}

  get state(): TurnState {
    return this.current;
  }

  [Symbol.asyncIterator](): AsyncGenerator<TurnEvent> {
    if (!this.events) this.events = this.run();
    return this.events;
  }

  private async *run(): AsyncGenerator<TurnEvent> {
    const { chatbotId } = this.req;
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    this.req.signal?.addEventListener("abort", onCallerAbort, { once: true });
    if (this.req.signal?.aborted) controller.abort();

    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let finished = false;
    const cancelled = () => new ModelStreamCancelledError(timedOut ? "timeout" : "cancelled");

    try {
      this.current = "ContextAssembling";
      const turn = await this.orchestrator.assemble(this.req);
      if (controller.signal.aborted) throw cancelled();

      this.current = "ModelStreaming";
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.orchestrator.modelStreamTimeoutMs);

      let text = "";
      const iterator = this.orchestrator
        .streamModel(turn, controller.signal)
        [Symbol.asyncIterator]();
      let drained = false;
      try {
        for (;;) {
          if (controller.signal.aborted) throw cancelled();
          let next: IteratorResult<string>;
          try {
            next = await abortable(iterator.next(), controller.signal);
          } catch (err) {
            if (controller.signal.aborted) throw cancelled();
            throw err instanceof AppError
              ? err
              : new ModelStreamFailedError(errorMessage(err), err);
          }
          if (next.done) {
            drained = true;
            break;
          }
          if (controller.signal.aborted) throw cancelled();
          text += next.value;
          yield { type: "chunk", text: next.value };
        }
      } finally {
        clearTimeout(timer);
        if (!drained) {
          controller.abort();
          const release = iterator.return?.();
          if (release) {
            release.catch((err: unknown) =>
              log.debug({ chatbotId, error: errorMessage(err) }, "Model stream release failed"),
            );
          }
        }
      }

      this.current = "Finalizing";
      const assistantTurn = await this.orchestrator.finalize(turn, text);

      this.current = "Done";
      finished = true;
      log.info(
        { chatbotId, chars: text.length, persisted: assistantTurn !== null },
        "✅ Chat turn completed",
      );
      yield { type: "done", userTurn: turn.userTurn, assistantTurn };
    } catch (err) {
      const error = toAppError(err);
      this.current = "Errored";
      finished = true;
      if (error instanceof ModelStreamCancelledError) {
        log.info({ chatbotId, reason: error.reason }, "🛑 Chat turn cancelled");
      } else {
        log.error({ chatbotId, code: error.code, error: error.message }, "❌ Chat turn failed");
      }
      yield { type: "error", error };
    } finally {
      clearTimeout(timer);
      this.req.signal?.removeEventListener("abort", onCallerAbort);
      if (!finished) {
        // The consumer stopped iterating mid-stream
        this.current = "Errored";
        controller.abort();
        log.info({ chatbotId, reason: "cancelled" }, "🛑 Chat turn cancelled");
      }
    }
  }
}
