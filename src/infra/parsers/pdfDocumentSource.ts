import { promises as fs } from "node:fs";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { DocumentHandle, DocumentSource, TocEntry } from "../../domain/documentSource.js";
import { DocumentExtractionError } from "../../domain/errors.js";

type PdfDocumentProxy = Awaited<ReturnType<typeof getDocument>["promise"]>;

interface OutlineNode {
  title: string;
  dest: unknown;
  items: unknown;
}

interface RefLike {
  num: number;
  gen: number;
}

const LINE_Y_TOLERANCE = 1;

export class PdfDocumentSource implements DocumentSource {
  async open(filePath: string): Promise<DocumentHandle> {
    let doc: PdfDocumentProxy;
    try {
      const data = new Uint8Array(await fs.readFile(filePath));
      doc = await getDocument({
        data,
        isEvalSupported: false,
        disableFontFace: true,
        useSystemFonts: false,
        verbosity: 0,
      }).promise;
    } catch (error) {
      throw new DocumentExtractionError(
        `Unable to open PDF: ${error instanceof Error ? error.message : "unknown error"}`,
        filePath,
        { cause: error },
      );
    }

    return new PdfDocumentHandle(doc, filePath);
  }
}

class PdfDocumentHandle implements DocumentHandle {
  readonly pageCount: number;

  constructor(
    private readonly doc: PdfDocumentProxy,
    private readonly filePath: string,
  ) {
    this.pageCount = doc.numPages;
  }

  async pageText(index: number): Promise<string> {
    if (index < 0 || index >= this.pageCount) {
      throw new DocumentExtractionError(
        `Page index ${index} is out of range (0-${this.pageCount - 1}).`,
        this.filePath,
      );
    }

    try {
      const page = await this.doc.getPage(index + 1);
      const content = await page.getTextContent();
      let assembled = "";
      let lastY: number | null = null;

      for (const item of content.items) {
        if (!("str" in item)) {
          continue;
        }
        const y: unknown = item.transform[5];
        const currentY = typeof y === "number" ? y : null;
        if (lastY !== null && currentY !== null && Math.abs(currentY - lastY) > LINE_Y_TOLERANCE) {
          assembled = `${assembled.trimEnd()}\n`;
        }
        assembled += item.str;
        lastY = currentY ?? lastY;
        if (item.hasEOL) {
          assembled = `${assembled.trimEnd()}\n`;
        }
      }

      page.cleanup();
      return assembled.trim();
    } catch (error) {
      throw new DocumentExtractionError(
        `Unable to read page ${index + 1}: ${error instanceof Error ? error.message : "unknown error"}`,
        this.filePath,
        { cause: error },
      );
    }
  }

  async tableOfContents(): Promise<TocEntry[]> {
    const outline: unknown = await this.doc.getOutline();
    if (!Array.isArray(outline)) {
      return [];
    }

    const entries: TocEntry[] = [];
    await this.walkOutline(outline, 1, entries);
    return entries;
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }

  private async walkOutline(nodes: unknown[], level: number, entries: TocEntry[]): Promise<void> {
    for (const node of nodes) {
      if (!isOutlineNode(node)) {
        continue;
      }
      const page = await this.resolveDestinationPage(node.dest);
      const title = node.title.replace(/\s+/g, " ").trim();
      if (page !== null && title) {
        entries.push({ level, title, page });
      }
      if (Array.isArray(node.items) && node.items.length > 0) {
        await this.walkOutline(node.items, level + 1, entries);
      }
    }
  }

  private async resolveDestinationPage(dest: unknown): Promise<number | null> {
    try {
      const explicit: unknown =
        typeof dest === "string" ? await this.doc.getDestination(dest) : dest;
      if (!Array.isArray(explicit) || explicit.length === 0) {
        return null;
      }

      const target: unknown = explicit[0];
      if (typeof target === "number") {
        return target + 1;
      }
      if (isRefLike(target)) {
        return (await this.doc.getPageIndex(target)) + 1;
      }
      return null;
    } catch {
      // Dangling destinations are common in generated PDFs; the entry is dropped.
      return null;
    }
  }
}

function isOutlineNode(value: unknown): value is OutlineNode {
  return (
    typeof value === "object" &&
    value !== null &&
    "title" in value &&
    typeof value.title === "string" &&
    "dest" in value &&
    "items" in value
  );
}

function isRefLike(value: unknown): value is RefLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "num" in value &&
    typeof value.num === "number" &&
    "gen" in value &&
    typeof value.gen === "number"
  );
}
