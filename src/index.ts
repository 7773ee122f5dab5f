import { assertRuntimeConfig, config } from "./config.js";
import { log } from "./logger.js";
import { loadDirectory } from "./chat/directory.js";
import { FactExtractor } from "./chat/extraction.js";
import { ChatStreamOrchestrator } from "./chat/orchestrator.js";
import { OpenAIChatModel } from "./llm/chat-model.js";
import { DedupEngine } from "./memory/dedup.js";
import { PineconeGateway } from "./memory/embedder.js";
import { InMemoryMemoryStore } from "./memory/in-memory-store.js";
import { LocalEmbeddingGateway } from "./memory/local-gateway.js";
import { RetrievalRanker } from "./memory/retrieval.js";
import { PineconeMemoryStore } from "./memory/store.js";
import type { EmbeddingGateway, MemoryStore } from "./memory/types.js";
import { createApiServer } from "./server/http.js";
import { attachChatSocket } from "./server/ws.js";

// ── Wiring ───────────────────────────────────────────────

function createBackend(): { store: MemoryStore; gateway: EmbeddingGateway } {
  if (config.storeBackend === "memory") {
    // Pinecone still embeds; neighbours come from a scan of the local store
    const pinecone = new PineconeGateway({ model: config.embeddingModel });
    const store = new InMemoryMemoryStore();
    const gateway = new LocalEmbeddingGateway(
      (text, opts) => pinecone.embed(text, opts),
      store,
    );
    return { store, gateway };
  }

  // Neighbour queries also see this process's writes the index lags behind on
  const store = new PineconeMemoryStore({ dimension: config.embeddingDimension });
  const gateway = new PineconeGateway({
    model: config.embeddingModel,
    recent: store,
  });
  return { store, gateway };
}

// ── Main ─────────────────────────────────────────────────

async function main() {
  assertRuntimeConfig();
  log.info(
    {
      model: config.llmModel,
      backend: config.storeBackend,
      embeddingModel: config.embeddingModel,
    },
    "💬 Rapport starting",
  );

  const directory = loadDirectory(config.directoryPath);
  const { store, gateway } = createBackend();
  const embedOpts = {
    embeddingTimeoutMs: config.embeddingTimeoutMs,
    embeddingDimension: config.embeddingDimension,
  };

  const dedup = new DedupEngine(store, gateway, embedOpts);
  const ranker = new RetrievalRanker(store, gateway, embedOpts);
  const model = new OpenAIChatModel({
    model: config.llmModel,
    extractionModel: config.extractionModel,
    temperature: config.llmTemperature,
    maxTokens: config.llmMaxTokens,
  });

  const orchestrator = new ChatStreamOrchestrator({
    directory,
    store,
    ranker,
    model,
    extractor: config.memoryExtraction ? new FactExtractor(model, dedup) : null,
    modelStreamTimeoutMs: config.modelStreamTimeoutMs,
  });

  const server = createApiServer({ orchestrator, dedup, store });
  const wss = attachChatSocket(server, orchestrator);

  // Graceful shutdown
  const shutdown = async () => {
    log.info("👋 Shutting down...");
    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve) => server.close(() => resolve()));
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await new Promise<void>((resolve) => server.listen(config.port, resolve));
  log.info({ port: config.port }, "✅ Rapport is online");
}

main().catch((error) => {
  log.fatal(error, "💀 Fatal error");
  process.exit(1);
});
