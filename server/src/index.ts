import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { createApp } from "./app.js";
import { createCompletionClient } from "./ai/completion.js";
import { createChannelRegistry } from "./channels/registry.js";
import { loadConfig } from "./config.js";
import { createConversationResolver } from "./conversation/resolver.js";
import { createFlowEngine } from "./flows/engine.js";
import { createLeadExtractor } from "./leads/extractor.js";
import { createLeadNotifier } from "./leads/notifier.js";
import { createRuleCache } from "./rules/cache.js";
import { formatUnknownError } from "./shared/errors.js";
import { KeyedMutex } from "./shared/mutex.js";
import { BackgroundQueue } from "./shared/queue.js";
import { InMemoryChatStore } from "./store/memory.js";
import { SupabaseChatStore, createSupabaseClient } from "./store/supabase.js";
import type { ChatStore } from "./store/types.js";
import { createWebhookService } from "./webhooks/service.js";

const loadEnv = () => {
  const rootEnv = path.resolve(process.cwd(), "..", ".env");
  const localEnv = path.resolve(process.cwd(), ".env");
  const envPath = fs.existsSync(localEnv) ? localEnv : rootEnv;
  dotenv.config({ path: envPath });
};

loadEnv();

const config = loadConfig();

const createStore = (): ChatStore => {
  if (config.supabase) {
    return new SupabaseChatStore(createSupabaseClient(config.supabase));
  }
  console.warn("Supabase not configured; using the in-memory store. Data is lost on restart.");
  return new InMemoryChatStore();
};

const store = createStore();
const completion = createCompletionClient({ config: config.llm });
const queue = new BackgroundQueue(config.background);

const webhooks = createWebhookService({
  store,
  resolver: createConversationResolver({
    store,
    flowEngine: createFlowEngine({ store }),
    ruleCache: createRuleCache({ store, ttlMs: config.ruleCacheTtlMs }),
    completion,
    mutex: new KeyedMutex(),
  }),
  leadExtractor: createLeadExtractor({
    store,
    completion,
    notifier: createLeadNotifier({ timeoutMs: config.webhookTimeoutMs }),
  }),
  channels: createChannelRegistry({ graphVersion: config.meta.graphVersion }),
  queue,
});

const app = createApp({ config, webhooks });

const server = app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  if (!completion.isConfigured()) {
    console.warn("No LLM API key set; AI replies will report that AI is not configured.");
  }
});

const shutdown = (signal: string) => {
  console.log(`${signal} received, finishing background work...`);
  server.close();
  queue
    .drain()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error("Shutdown failed:", formatUnknownError(error));
      process.exit(1);
    });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
