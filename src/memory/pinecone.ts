import { Pinecone, type RecordMetadata } from "@pinecone-database/pinecone";
import { config } from "../config.js";
import type { EmbedInputType } from "./types.js";

// ── Pinecone Client ───────────────────────────────────────

let _pc: Pinecone | null = null;
let _index: PineconeIndex | null = null;

export interface IndexRecord {
  id: string;
  values: number[];
  metadata?: RecordMetadata;
}

export interface IndexMatch {
  id: string;
  score?: number;
  values?: number[];
  metadata?: RecordMetadata;
}

/** The slice of a Pinecone index the memory store and gateway use. */
export interface PineconeIndex {
  query(options: {
    vector: number[];
    topK: number;
    filter?: object;
    includeMetadata?: boolean;
    includeValues?: boolean;
  }): Promise<{ matches?: IndexMatch[] }>;
  upsert(options: { records: IndexRecord[] }): Promise<unknown>;
  fetch(options: {
    ids: string[];
  }): Promise<{ records?: Record<string, Omit<IndexMatch, "id" | "score">> }>;
}

export interface InferenceEmbedRequest {
  model: string;
  inputs: string[];
  parameters: { inputType: EmbedInputType; truncate: "END" };
}

/** Pinecone Inference's embed call; `data` holds one embedding per input. */
export type InferenceEmbed = (
  request: InferenceEmbedRequest,
) => Promise<{ data?: ReadonlyArray<object> }>;

/** Get the shared Pinecone client instance. */
export function getPineconeClient(): Pinecone {
  if (!_pc) {
    _pc = new Pinecone({ apiKey: config.pineconeApiKey });
  }
  return _pc;
}

/** Get the Pinecone index that holds memories and chat turns. */
export function getPineconeIndex(): PineconeIndex {
  if (!_index) {
    _index = getPineconeClient().index(config.pineconeIndex);
  }
  return _index;
}

/** Embed through the shared client's hosted inference. */
export const pineconeInferenceEmbed: InferenceEmbed = (request) =>
  getPineconeClient().inference.embed({
    model: request.model,
    inputs: request.inputs,
    parameters: { ...request.parameters },
  });

/**
 * Stand-in values for records that carry no embedding (chat turns and
 * memories waiting for re-embedding). Cosine indexes reject all-zero
 * vectors, so one component is set.
 */
export function placeholderVector(dimension: number): number[] {
  const values = new Array<number>(dimension).fill(0);
  values[0] = 1;
  return values;
}
