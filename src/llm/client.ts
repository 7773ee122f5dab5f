import OpenAI from "openai";
import { config } from "../config.js";

// Any OpenAI-compatible endpoint (OpenAI, OpenRouter, a local gateway)
let client: OpenAI | null = null;

export function getLlmClient(): OpenAI {
  if (!client) {
    client = new OpenAI({
      baseURL: config.openAiBaseUrl,
      apiKey: config.openAiApiKey,
    });
  }
  return client;
}
