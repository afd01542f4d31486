import "dotenv/config";
import express from "express";
import { loadRuntimeConfig, type RuntimeConfig } from "./config/runtime";
import { createDb } from "./db";
import { OpenAIInferenceProvider } from "./llm/client";
import { registerRoutes } from "./routes";
import { DbCheckpointStore, MemCheckpointStore, type CheckpointStore } from "./storage";
import { createDefaultTools, DocumentRetriever } from "./tools";
import { createTurnRouter } from "./turnRouter";
import { logError } from "./utils/errorHandler";
import { configureLogger, logInfo } from "./utils/logger";

function createCheckpointStore(config: RuntimeConfig): CheckpointStore {
  if (config.CHECKPOINT_BACKEND === "postgres") {
    return new DbCheckpointStore(createDb(config.DATABASE_URL));
  }
  return new MemCheckpointStore();
}

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  configureLogger({ level: config.LOG_LEVEL, toFile: config.LOG_TO_FILE });

  const router = createTurnRouter({
    inference: new OpenAIInferenceProvider({ apiKey: config.OPENAI_API_KEY }),
    tools: createDefaultTools(new DocumentRetriever()),
    checkpointStore: createCheckpointStore(config),
  });

  const app = express();
  app.use(express.json());

  const server = registerRoutes(app, router);
  await new Promise<void>(resolve => {
    server.listen(config.PORT, () => resolve());
  });
  logInfo(`[Server] Listening on port ${config.PORT} (checkpoints: ${config.CHECKPOINT_BACKEND})`);
}

main().catch(error => {
  logError("Server", error);
  process.exit(1);
});
