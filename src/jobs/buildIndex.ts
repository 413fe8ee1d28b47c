import { loadDotenv } from "../env/detector";
import logger from "../logger";
import { createRagContext, loadRagConfig } from "../rag";

loadDotenv();

const run = async () => {
  const { ingestion } = createRagContext(loadRagConfig());
  const report = await ingestion.buildIndex();

  logger.info(
    `Indexed ${report.chunksIndexed} chunks from ${report.documentsLoaded} documents into ${report.indexDir}`
  );
  for (const item of report.skipped) {
    logger.warn(`Skipped ${item.source} [${item.code}]: ${item.reason}`);
  }
};

run().catch((err: unknown) => {
  logger.error(`Index build failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
