import { promises as fs } from "node:fs";
import path from "node:path";
import { DocumentHandle, DocumentSource, TocEntry } from "../../domain/documentSource.js";
import { DocumentExtractionError } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";

const PAGE_BREAK = "\f";
const MARKDOWN_HEADING = /^(#{1,6})\s+(.+?)\s*#*\s*$/;

// Form feeds separate pages; a file without one is a single page.
export class TextDocumentSource implements DocumentSource {
  async open(filePath: string): Promise<DocumentHandle> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw new DocumentExtractionError(
        `Unable to read text document: ${error instanceof Error ? error.message : "unknown error"}`,
        filePath,
        { cause: error },
      );
    }

    const pages = raw.split(PAGE_BREAK).map((page) => normalizeText(page));
    const isMarkdown = path.extname(filePath).toLowerCase() === ".md";
    return new TextDocumentHandle(pages, isMarkdown, filePath);
  }
}

class TextDocumentHandle implements DocumentHandle {
  readonly pageCount: number;

  constructor(
    private readonly pages: string[],
    private readonly isMarkdown: boolean,
    private readonly filePath: string,
  ) {
    this.pageCount = pages.length;
  }

  async pageText(index: number): Promise<string> {
    const page = this.pages[index];
    if (page === undefined) {
      throw new DocumentExtractionError(
        `Page index ${index} is out of range (0-${this.pageCount - 1}).`,
        this.filePath,
      );
    }
    return page;
  }

  async tableOfContents(): Promise<TocEntry[]> {
    if (!this.isMarkdown) {
      return [];
    }

    const entries: TocEntry[] = [];
    this.pages.forEach((page, index) => {
      page.split("\n").forEach((text, line) => {
        const match = MARKDOWN_HEADING.exec(text.trim());
        if (match) {
          entries.push({ level: match[1].length, title: match[2], page: index + 1, line });
        }
      });
    });
    return entries;
  }

  async close(): Promise<void> {}
}
