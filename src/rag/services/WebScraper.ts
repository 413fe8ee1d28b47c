import * as cheerio from "cheerio";
import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import logger from "../../logger";
import {
  FetchError,
  SourceUnreadableError,
  foldOutcomes,
  settle,
  type BatchOutcome,
  type Outcome,
} from "../errors";
import type { Document } from "../types/rag.types";

// Some sites refuse requests without a browser user agent
const REQUEST_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
};

const BOILERPLATE_SELECTOR = "script, style, nav, footer, header, iframe, noscript";
const CONTENT_SELECTOR = "h1, h2, h3, h4, p, li, td, th, span";
const MIN_FRAGMENT_LENGTH = 25;

const sourcesFileSchema = z.object({
  urls: z.array(z.string().url()).min(1),
});

/** Reads `{ "urls": [...] }` from the sources file. */
export async function readSourceUrls(sourcesFile: string): Promise<string[]> {
  try {
    const parsed = sourcesFileSchema.parse(JSON.parse(await readFile(sourcesFile, "utf8")));
    return parsed.urls;
  } catch (error) {
    throw new SourceUnreadableError(sourcesFile, error);
  }
}

/**
 * Plain text of the content elements of a page, one fragment per line.
 * Fragments of 25 characters or fewer are dropped as menu and label noise.
 */
export function extractPageText(html: string): string {
  const $ = cheerio.load(html);
  $(BOILERPLATE_SELECTOR).remove();

  const seen = new Set<string>();
  const fragments: string[] = [];

  $(CONTENT_SELECTOR).each((_, element) => {
    const text = $(element).text().replace(/\s+/g, " ").trim();
    if (text.length <= MIN_FRAGMENT_LENGTH || seen.has(text)) return;
    seen.add(text);
    fragments.push(text);
  });

  return fragments.join("\n");
}

export function slugForUrl(url: string): string {
  const { hostname, pathname, search } = new URL(url);
  const slug = `${hostname}${pathname}${search}`
    .replace(/[^a-zA-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "page";
}

export class WebScraper {
  constructor(private readonly timeoutMs: number) {}

  /** Single attempt, no retry. Every failure is a FetchError. */
  async scrapePage(url: string): Promise<Document> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: REQUEST_HEADERS,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new FetchError(url, this.describeFailure(error), undefined, error);
    }

    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`, response.status);
    }

    // The timeout signal also covers the body download
    let html: string;
    try {
      html = await response.text();
    } catch (error) {
      throw new FetchError(url, this.describeFailure(error), response.status, error);
    }

    const rawText = extractPageText(html);
    if (!rawText) {
      throw new FetchError(url, "page has no readable text", response.status);
    }

    logger.info("WebScraper.scrapePage completed", { url, characters: rawText.length });
    return { sourceId: url, kind: "web", rawText };
  }

  /** Writes `<slug>.txt` with a `SOURCE:` header line and returns its path. */
  async saveDocument(doc: Document, dir: string): Promise<string> {
    await mkdir(dir, { recursive: true });
    const filePath = path.join(dir, `${slugForUrl(doc.sourceId)}.txt`);
    await writeFile(filePath, `SOURCE: ${doc.sourceId}\n${doc.rawText}`, "utf8");
    return filePath;
  }

  /** One text file per page; pages that fail are skipped and reported. */
  async scrapeAll(urls: string[], outputDir: string): Promise<BatchOutcome<string>> {
    const outcomes: Outcome<string>[] = [];
    for (const url of urls) {
      outcomes.push(
        await settle(url, async () => this.saveDocument(await this.scrapePage(url), outputDir))
      );
    }

    const result = foldOutcomes(outcomes);
    for (const { source, error } of result.skipped) {
      logger.warn("WebScraper.scrapeAll skipped page", { url: source, reason: error.message });
    }
    logger.info("WebScraper.scrapeAll completed", {
      saved: result.succeeded.length,
      total: urls.length,
    });
    return result;
  }

  private describeFailure(error: unknown): string {
    if (error instanceof Error && error.name === "TimeoutError") {
      return `no response within ${this.timeoutMs}ms`;
    }
    return error instanceof Error ? error.message : String(error);
  }
}
