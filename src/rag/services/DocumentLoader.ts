import fs from "fs";
import { readFile, readdir } from "fs/promises";
import path from "path";
import logger from "../../logger";
import { SourceUnreadableError } from "../errors";
import type { Document } from "../types/rag.types";

export interface PDFExtractionResult {
  pageTexts: string[];
  totalPages: number;
}

export type PdfTextExtractor = (buffer: Buffer) => Promise<PDFExtractionResult>;

const SOURCE_HEADER = "SOURCE: ";

/** pdf-parse is loaded on first use; it pulls in pdf.js. */
export const extractPdfText: PdfTextExtractor = async (buffer) => {
  const { PDFParse } = await import("pdf-parse");
  const parser = new PDFParse({ data: buffer });
  try {
    const textResult = await parser.getText();
    const pageTexts = textResult.pages.map((page) => page.text);
    return { pageTexts, totalPages: textResult.total };
  } finally {
    await parser.destroy();
  }
};

export class DocumentLoader {
  constructor(private readonly extractPdf: PdfTextExtractor = extractPdfText) {}

  async loadPdf(filePath: string): Promise<Document> {
    const buffer = await this.readSource(filePath);

    let extraction: PDFExtractionResult;
    try {
      extraction = await this.extractPdf(buffer);
    } catch (error) {
      throw new SourceUnreadableError(filePath, error);
    }

    const rawText = extraction.pageTexts.join("\n");
    logger.info("DocumentLoader.loadPdf completed", {
      filePath,
      totalPages: extraction.totalPages,
      characters: rawText.length,
    });
    return { sourceId: filePath, kind: "pdf", rawText };
  }

  /**
   * Reads a scraped page. A leading `SOURCE: <url>` line names the page it
   * came from and is not part of the text.
   */
  async loadTextFile(filePath: string): Promise<Document> {
    const content = (await this.readSource(filePath)).toString("utf8");

    if (content.startsWith(SOURCE_HEADER)) {
      const newline = content.indexOf("\n");
      const header = newline === -1 ? content : content.slice(0, newline);
      return {
        sourceId: header.slice(SOURCE_HEADER.length).trim(),
        kind: "web",
        rawText: newline === -1 ? "" : content.slice(newline + 1),
      };
    }

    return { sourceId: filePath, kind: "text", rawText: content };
  }

  load(filePath: string): Promise<Document> {
    return path.extname(filePath).toLowerCase() === ".pdf"
      ? this.loadPdf(filePath)
      : this.loadTextFile(filePath);
  }

  /** Handbook PDFs then scraped pages, each sorted by file name. */
  async listCorpusFiles(handbookDir: string, scrapedDir: string): Promise<string[]> {
    const [pdfs, pages] = await Promise.all([
      this.listFiles(handbookDir, ".pdf"),
      this.listFiles(scrapedDir, ".txt"),
    ]);
    return [...pdfs, ...pages];
  }

  private async listFiles(dir: string, extension: string): Promise<string[]> {
    if (!fs.existsSync(dir)) {
      logger.warn("DocumentLoader.listFiles: directory not found", { dir });
      return [];
    }
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && path.extname(e.name).toLowerCase() === extension)
      .map((e) => e.name)
      .sort()
      .map((name) => path.join(dir, name));
  }

  private async readSource(filePath: string): Promise<Buffer> {
    try {
      return await readFile(filePath);
    } catch (error) {
      throw new SourceUnreadableError(filePath, error);
    }
  }
}
