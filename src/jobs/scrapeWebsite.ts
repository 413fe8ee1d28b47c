import { loadDotenv } from "../env/detector";
import logger from "../logger";
import { WebScraper, loadRagConfig, readSourceUrls } from "../rag";

loadDotenv();

const run = async () => {
  const config = loadRagConfig();
  const urls = config.scrapeUrls ?? (await readSourceUrls(config.paths.sourcesFile));

  logger.info(`Scraping ${urls.length} pages into ${config.paths.scrapedDir}`);
  const result = await new WebScraper(config.requestTimeoutMs).scrapeAll(
    urls,
    config.paths.scrapedDir
  );

  logger.info(`Pages scraped successfully: ${result.succeeded.length}/${urls.length}`);
  if (result.succeeded.length === 0) {
    logger.error("No page could be scraped. Check the network or the URL list.");
    process.exitCode = 1;
  }
};

run().catch((err: unknown) => {
  logger.error(`Scrape failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
