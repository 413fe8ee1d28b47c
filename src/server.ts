import { createServer } from "http";
import { createApp } from "./app";
import { loadDotenv, NODE_ENV } from "./env/detector";
import logger from "./logger";
import { buildAllowedOrigins } from "./middleware/cors";
import { RagError, createRagContext, loadRagConfig } from "./rag";
import type { RagAvailability } from "./routers/apiRouters";
import { EnvLoader } from "./util/EnvLoader";

const loadedEnvFile = loadDotenv();
const PORT = EnvLoader.getInt("PORT") ?? 4000;

logger.info(
  `Env initialized: NODE_ENV=${NODE_ENV}` +
    (loadedEnvFile ? `, file=${loadedEnvFile}` : ", file=<process env / .env>")
);

const initRag = (): RagAvailability => {
  try {
    return { ready: true, context: createRagContext(loadRagConfig()) };
  } catch (error) {
    // Missing credentials keep the server up so the chat can explain what is wrong
    if (error instanceof RagError) {
      logger.error(`Assistant unavailable: ${error.message}`);
      return { ready: false, error };
    }
    throw error;
  }
};

try {
  const allowedOrigins = buildAllowedOrigins();
  logger.info(`CORS allowlist: ${allowedOrigins.join(", ") || "<empty>"}`);

  const rag = initRag();
  const app = createApp(rag, { allowedOrigins });
  const httpServer = createServer(app);

  httpServer.keepAliveTimeout = 65_000;
  httpServer.headersTimeout = 66_000;

  httpServer.listen(PORT, () => {
    logger.info(`🚀 Assistant API running at http://localhost:${PORT}/api/v1/chat`);
  });

  const shutdown = () => {
    logger.info("Shutting down server...");
    httpServer.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  // `npm run index:build` while serving: send SIGHUP to pick up the new index
  if (rag.ready) {
    process.on("SIGHUP", () => {
      logger.info("Reloading vector index on next question");
      rag.context.index.reload();
    });
  }
} catch (err) {
  logger.error(
    `Server failed to start: ${err instanceof Error ? err.stack || err.message : String(err)}`
  );
  process.exit(1);
}
