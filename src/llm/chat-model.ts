import type OpenAI from "openai";
import { getLlmClient } from "./client.js";
import { withRetry } from "./retry.js";
import { buildChatMessages, type ChatMessage } from "../chat/prompt.js";
import { ModelStreamFailedError, errorMessage } from "../errors.js";

// ── Chat Model: streaming + JSON completions ────────────

export interface StreamChatRequest {
  systemPrompt: string;
  history: ChatMessage[];
  userMessage: string;
  signal?: AbortSignal;
}

export interface CompleteJsonRequest {
  systemPrompt: string;
  userMessage: string;
  signal?: AbortSignal;
}

export interface ChatModel {
  /**
   * Text deltas in model order. Rejects with ModelStreamFailedError on an
   * upstream failure; after `signal` aborts the iterator may throw anything.
   */
  streamChat(req: StreamChatRequest): AsyncIterable<string>;
  /** One non-streamed completion whose content is a JSON object. */
  completeJson(req: CompleteJsonRequest): Promise<string>;
}

export interface OpenAIChatModelOptions {
  model: string;
  extractionModel?: string;
  temperature?: number;
  maxTokens?: number;
  client?: OpenAI;
}

export class OpenAIChatModel implements ChatModel {
  private readonly client: () => OpenAI;

  constructor(private readonly opts: OpenAIChatModelOptions) {
    const { client } = opts;
    this.client = client ? () => client : getLlmClient;
  }

  async *streamChat(req: StreamChatRequest): AsyncGenerator<string> {
    const { signal } = req;
    const stream = await this.openStream(req).catch((err: unknown) => {
      if (signal?.aborted) throw err;
      throw new ModelStreamFailedError(errorMessage(err), err);
    });

    try {
      for await (const part of stream) {
        const text = part.choices[0]?.delta?.content;
        if (text) yield text;
      }
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ModelStreamFailedError(errorMessage(err), err);
    } finally {
      stream.controller.abort();
    }
  }

  // Only opening the stream is retried; a stream that broke mid-way has
  // already delivered text and cannot be replayed.
  private openStream(req: StreamChatRequest) {
    return withRetry(
      () =>
        this.client().chat.completions.create(
          {
            model: this.opts.model,
            messages: buildChatMessages(
              req.systemPrompt,
              req.history,
              req.userMessage,
            ),
            temperature: this.opts.temperature,
            max_tokens: this.opts.maxTokens,
            stream: true,
          },
          { signal: req.signal },
        ),
      {
        label: `chat stream (${this.opts.model})`,
        maxRetries: 2,
        signal: req.signal,
      },
    );
  }

  async completeJson(req: CompleteJsonRequest): Promise<string> {
    const model = this.opts.extractionModel ?? this.opts.model;
    const response = await withRetry(
      () =>
        this.client().chat.completions.create(
          {
            model,
            max_tokens: 512,
            temperature: 0,
            response_format: { type: "json_object" },
            messages: [
              { role: "system", content: req.systemPrompt },
              { role: "user", content: req.userMessage },
            ],
          },
          { signal: req.signal },
        ),
      { label: `json completion (${model})`, signal: req.signal },
    );
    return response.choices[0]?.message?.content?.trim() ?? "{}";
  }
}
